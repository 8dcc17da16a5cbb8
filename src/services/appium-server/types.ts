/**
 * Type definitions for the automation server controller
 */

/**
 * Appium log level
 */
export type AppiumLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Settings shared by every server the controller starts
 */
export interface AppiumServerConfig {
  /**
   * Host address to bind to
   * @default '127.0.0.1'
   */
  host?: string;

  /**
   * Path to the Appium executable
   * @default 'appium'
   */
  appiumPath?: string;

  /**
   * Additional CLI arguments to pass to Appium
   */
  args?: string[];

  /**
   * @default 'info'
   */
  logLevel?: AppiumLogLevel;

  /**
   * Forward server output to the logger
   * @default false
   */
  debugOutput?: boolean;

  /**
   * Maximum time to wait for /status to report ready (ms)
   * @default 60000
   */
  startupTimeout?: number;

  /**
   * Maximum time to wait for the process to exit after SIGTERM (ms)
   * @default 10000
   */
  shutdownTimeout?: number;

  /**
   * Custom environment variables for the Appium process
   */
  env?: Record<string, string>;
}

/**
 * A server the controller has started
 */
export interface AppiumServerHandle {
  port: number;
  serverUrl: string;
  pid?: number;
  startedAt: Date;
}

/**
 * Starts and stops one automation server per port
 */
export interface AutomationServerController {
  start(port: number, signal?: AbortSignal): Promise<AppiumServerHandle>;
  stop(port: number): Promise<void>;
  isRunning(port: number): boolean;
}

/**
 * Health check result
 */
export interface HealthCheckResult {
  healthy: boolean;
  status?: unknown;
  responseTime?: number;
  error?: string;
}

/**
 * Log entry from Appium output
 */
export interface AppiumLogEntry {
  timestamp: Date;
  level: AppiumLogLevel;
  message: string;
}

/**
 * Error thrown when Appium server operations fail
 */
export class AppiumServerError extends Error {
  constructor(
    message: string,
    public code: string,
    public port?: number
  ) {
    super(message);
    this.name = 'AppiumServerError';
  }
}

/**
 * Error thrown when server fails to start
 */
export class AppiumStartupError extends AppiumServerError {
  constructor(
    message: string,
    port?: number,
    public recentOutput: string[] = []
  ) {
    super(message, 'STARTUP_ERROR', port);
    this.name = 'AppiumStartupError';
  }
}

/**
 * Error thrown when server fails to stop
 */
export class AppiumShutdownError extends AppiumServerError {
  constructor(message: string, port?: number) {
    super(message, 'SHUTDOWN_ERROR', port);
    this.name = 'AppiumShutdownError';
  }
}
