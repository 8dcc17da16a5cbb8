/**
 * Appium server controller - one managed Appium process per port
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { delay } from '../../utils/polling.js';
import { LogBuffer, LogCaptureStream } from './log-capture.js';
import {
  AppiumShutdownError,
  AppiumStartupError,
  type AppiumLogEntry,
  type AppiumServerConfig,
  type AppiumServerHandle,
  type AutomationServerController,
  type HealthCheckResult,
} from './types.js';

/**
 * Default configuration values
 */
const DEFAULTS = {
  host: '127.0.0.1',
  appiumPath: 'appium',
  logLevel: 'info' as const,
  startupTimeout: 60000,
  shutdownTimeout: 10000,
  healthCheckRetryDelay: 500,
  healthCheckTimeout: 2000,
  killTimeout: 5000,
};

interface RunningServer {
  handle: AppiumServerHandle;
  process: ChildProcess;
  output: LogCaptureStream;
}

/**
 * Query GET /status. Appium 2 reports `value.ready`; older servers only
 * answer 200 with a `value` object.
 */
export async function checkServerStatus(serverUrl: string, timeoutMs: number): Promise<HealthCheckResult> {
  const startTime = Date.now();
  try {
    const response = await fetch(new URL('/status', serverUrl), { signal: AbortSignal.timeout(timeoutMs) });
    const responseTime = Date.now() - startTime;
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { healthy: false, responseTime, error: `Unparseable /status response (HTTP ${response.status})` };
    }

    const value: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'value') : undefined;
    if (typeof value !== 'object' || value === null) {
      return { healthy: false, responseTime, error: 'Missing value in /status response' };
    }
    const ready: unknown = Reflect.get(value, 'ready');
    return { healthy: response.ok && ready !== false, status: value, responseTime };
  } catch (error) {
    return { healthy: false, error: error instanceof Error ? error.message : String(error) };
  }
}

export class AppiumServerController implements AutomationServerController {
  private config: Required<Omit<AppiumServerConfig, 'env' | 'args'>> & Pick<AppiumServerConfig, 'env' | 'args'>;
  private servers = new Map<number, RunningServer>();
  private logger: Logger;

  constructor(config: AppiumServerConfig = {}, logger?: Logger) {
    this.logger = logger ?? createModuleLogger('appium-server');
    this.config = {
      host: config.host || DEFAULTS.host,
      appiumPath: config.appiumPath || DEFAULTS.appiumPath,
      logLevel: config.logLevel || DEFAULTS.logLevel,
      debugOutput: config.debugOutput ?? false,
      startupTimeout: config.startupTimeout || DEFAULTS.startupTimeout,
      shutdownTimeout: config.shutdownTimeout || DEFAULTS.shutdownTimeout,
      args: config.args,
      env: config.env,
    };
  }

  serverUrl(port: number): string {
    return `http://${this.config.host}:${port}`;
  }

  isRunning(port: number): boolean {
    const server = this.servers.get(port);
    return server !== undefined && server.process.exitCode === null && server.process.signalCode === null;
  }

  /**
   * Start a server on the port and wait until it reports ready
   */
  async start(port: number, signal?: AbortSignal): Promise<AppiumServerHandle> {
    const existing = this.servers.get(port);
    if (existing && this.isRunning(port)) {
      this.logger.info({ port }, 'Appium server already running on port');
      return existing.handle;
    }

    const serverUrl = this.serverUrl(port);
    const preexisting = await checkServerStatus(serverUrl, DEFAULTS.healthCheckTimeout);
    if (preexisting.healthy) {
      throw new AppiumStartupError(`Port ${port} is already serving another automation server`, port);
    }

    const args = buildAppiumArgs(this.config.host, port, this.config.logLevel, this.config.args);
    this.logger.info({ port, command: this.config.appiumPath, args }, 'Starting Appium server');

    const output = new LogCaptureStream(new LogBuffer(), (entry) => this.handleLogEntry(port, entry));
    const child = spawn(this.config.appiumPath, args, {
      env: { ...process.env, ...this.config.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: false,
    });
    child.stdout?.pipe(output, { end: false });
    child.stderr?.pipe(output, { end: false });

    const handle: AppiumServerHandle = { port, serverUrl, pid: child.pid, startedAt: new Date() };
    const server: RunningServer = { handle, process: child, output };
    this.servers.set(port, server);
    this.setupProcessHandlers(server);

    try {
      await this.waitForReady(server, signal);
    } catch (error) {
      await this.terminate(server);
      this.servers.delete(port);
      const recentOutput = output.getBuffer().getRecent(20).map((entry) => entry.message);
      if (signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AppiumStartupError(`Failed to start Appium server on port ${port}: ${message}`, port, recentOutput);
    }

    this.logger.info({ port, url: serverUrl, pid: child.pid }, 'Appium server started');
    return handle;
  }

  /**
   * Stop the server on the port: SIGTERM, then SIGKILL after the shutdown timeout
   */
  async stop(port: number): Promise<void> {
    const server = this.servers.get(port);
    if (!server) {
      return;
    }
    this.servers.delete(port);

    const startTime = Date.now();
    this.logger.info({ port, pid: server.process.pid }, 'Stopping Appium server');
    try {
      await this.terminate(server);
    } catch (error) {
      throw new AppiumShutdownError(
        `Failed to stop Appium server on port ${port}: ${error instanceof Error ? error.message : String(error)}`,
        port
      );
    }
    this.logger.info({ port, duration: Date.now() - startTime }, 'Appium server stopped');
  }

  private async terminate(server: RunningServer): Promise<void> {
    const child = server.process;
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
      const exited = await waitForExit(child, this.config.shutdownTimeout);
      if (!exited) {
        this.logger.warn({ port: server.handle.port }, 'Process did not exit gracefully, forcing shutdown');
        child.kill('SIGKILL');
        if (!(await waitForExit(child, DEFAULTS.killTimeout))) {
          throw new Error(`Process ${child.pid ?? 'unknown'} did not exit after SIGKILL`);
        }
      }
    }
    server.output.end();
  }

  private setupProcessHandlers(server: RunningServer): void {
    const { port } = server.handle;

    server.process.on('error', (error) => {
      this.logger.error({ port, error: error.message }, 'Appium process error');
    });

    server.process.on('exit', (code, signal) => {
      this.logger.debug({ port, code, signal }, 'Appium process exited');
      if (this.servers.get(port) === server) {
        this.servers.delete(port);
      }
    });
  }

  private async waitForReady(server: RunningServer, signal?: AbortSignal): Promise<void> {
    const deadline = Date.now() + this.config.startupTimeout;

    while (Date.now() < deadline) {
      signal?.throwIfAborted();
      if (server.process.exitCode !== null || server.process.signalCode !== null) {
        throw new Error(`Appium exited during startup (code ${server.process.exitCode ?? server.process.signalCode})`);
      }

      const result = await checkServerStatus(server.handle.serverUrl, DEFAULTS.healthCheckTimeout);
      if (result.healthy) {
        return;
      }
      await delay(DEFAULTS.healthCheckRetryDelay, signal);
    }

    throw new Error(`Server did not become ready within ${this.config.startupTimeout}ms`);
  }

  private handleLogEntry(port: number, entry: AppiumLogEntry): void {
    if (!this.config.debugOutput) return;

    switch (entry.level) {
      case 'error':
        this.logger.error({ port }, entry.message);
        break;
      case 'warn':
        this.logger.warn({ port }, entry.message);
        break;
      case 'debug':
        this.logger.debug({ port }, entry.message);
        break;
      default:
        this.logger.info({ port }, entry.message);
    }
  }
}

/**
 * Command line for one server instance
 */
export function buildAppiumArgs(
  host: string,
  port: number,
  logLevel: string,
  extraArgs: readonly string[] = []
): string[] {
  const args = [...extraArgs, '--address', host, '--port', String(port), '--log-level', logLevel];
  if (!args.includes('--relaxed-security')) {
    args.push('--relaxed-security');
  }
  return args;
}

function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    if (child.exitCode !== null || child.signalCode !== null) {
      resolve(true);
      return;
    }

    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);

    const onExit = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once('exit', onExit);
  });
}
