/**
 * Device management types
 */

import type { AndroidStatusBar, IosStatusBar } from '../run-config/types.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

export interface BackgroundProcess {
  readonly pid: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
}

/**
 * Runs external tools. A non-zero exit is reported in the result,
 * not thrown.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
  spawnBackground(command: string, args: readonly string[], options?: Omit<CommandOptions, 'timeoutMs'>): BackgroundProcess;
}

/**
 * Operations shared by simulators and emulators
 */
export interface DeviceDriver {
  shutdown(deviceId: string, signal?: AbortSignal): Promise<void>;
  setLocale(deviceId: string, locale: string, signal?: AbortSignal): Promise<void>;
  installApp(deviceId: string, appPath: string, signal?: AbortSignal): Promise<void>;
  resetAppData(deviceId: string, bundleId: string, signal?: AbortSignal): Promise<void>;
  screenshot(deviceId: string, outputPath: string, signal?: AbortSignal): Promise<void>;
  captureLogs(deviceId: string, signal?: AbortSignal): Promise<string>;
}

export interface IosDeviceDriver extends DeviceDriver {
  boot(deviceId: string, signal?: AbortSignal): Promise<void>;
  setStatusBar(deviceId: string, statusBar: IosStatusBar, signal?: AbortSignal): Promise<void>;
}

export interface EmulatorPortRange {
  start: number;
  end: number;
}

export interface AndroidDeviceDriver extends DeviceDriver {
  /**
   * Start an emulator for the AVD and wait until it has booted.
   * Resolves to the adb serial, e.g. emulator-5554. `onStarted` receives the
   * serial as soon as the emulator process exists, before the boot wait.
   */
  boot(
    avd: string,
    ports: EmulatorPortRange,
    signal?: AbortSignal,
    onStarted?: (serial: string) => void
  ): Promise<string>;
  setStatusBar(serial: string, statusBar: AndroidStatusBar, signal?: AbortSignal): Promise<void>;
}

export const DEVICE_TIMEOUTS = {
  shortOperationMs: 10_000,
  commandMs: 60_000,
  installMs: 5 * 60_000,
  shutdownMs: 2 * 60_000,
  iosBootMs: 3 * 60_000,
  iosBootPollMs: 3_000,
  androidBootMs: 5 * 60_000,
  androidBootPollMs: 5_000,
  logCaptureMs: 30_000,
} as const;

/** Device logs keep at most this many trailing characters */
export const MAX_DEVICE_LOG_SIZE = 50000;
export const LOG_TRUNCATION_MARKER = '... (truncated) ...\n';
