/**
 * Android emulator control using adb and the SDK emulator binary
 */

import { join } from 'node:path';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { delay, pollUntil } from '../../utils/polling.js';
import type { AndroidStatusBar } from '../run-config/types.js';
import { truncateLog } from './command-runner.js';
import { DeviceError, DeviceTimeoutError } from './errors.js';
import { assertFileExists } from './ios-simulator.js';
import {
  DEVICE_TIMEOUTS,
  LOG_TRUNCATION_MARKER,
  MAX_DEVICE_LOG_SIZE,
  type AndroidDeviceDriver,
  type CommandResult,
  type CommandRunner,
  type EmulatorPortRange,
} from './types.js';

const DEVICE_SCREENSHOT_PATH = '/sdcard/screenshot.png';
const EMULATOR_STARTUP_GRACE_MS = 5_000;

export interface AndroidEmulatorOptions {
  androidHome?: string;
  logger?: Logger;
  /** Override for tests; defaults to five seconds */
  startupGraceMs?: number;
  bootTimeoutMs?: number;
  bootPollMs?: number;
}

/**
 * Pick the first even console port in [start, end) that `adb devices` does
 * not list and no emulator started by this process holds
 */
export function findFreeEmulatorPort(
  adbDevicesOutput: string,
  range: EmulatorPortRange,
  reserved: ReadonlySet<number> = new Set()
): number | undefined {
  const listed = new Set(
    adbDevicesOutput
      .split('\n')
      .map((line) => /^emulator-(\d+)\s/.exec(line.trim() + ' ')?.[1])
      .filter((port): port is string => port !== undefined)
      .map(Number)
  );

  const first = range.start % 2 === 0 ? range.start : range.start + 1;
  for (let port = first; port < range.end; port += 2) {
    if (!listed.has(port) && !reserved.has(port)) {
      return port;
    }
  }
  return undefined;
}

export class AndroidEmulatorDriver implements AndroidDeviceDriver {
  private logger: Logger;
  private androidHome?: string;
  private startupGraceMs: number;
  private bootTimeoutMs: number;
  private bootPollMs: number;
  // Console ports of emulators this driver started, keyed by serial
  private reservedPorts = new Map<string, number>();

  constructor(
    private runner: CommandRunner,
    options: AndroidEmulatorOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('device-management:android');
    this.androidHome = options.androidHome;
    this.startupGraceMs = options.startupGraceMs ?? EMULATOR_STARTUP_GRACE_MS;
    this.bootTimeoutMs = options.bootTimeoutMs ?? DEVICE_TIMEOUTS.androidBootMs;
    this.bootPollMs = options.bootPollMs ?? DEVICE_TIMEOUTS.androidBootPollMs;
  }

  private adb(serial: string, args: string[], timeoutMs: number, signal?: AbortSignal): Promise<CommandResult> {
    return this.runner.run('adb', ['-s', serial, ...args], { timeoutMs, signal });
  }

  private emulatorBinary(): string {
    if (!this.androidHome) {
      throw new DeviceError('ANDROID_HOME environment variable is not set', 'ANDROID_HOME_MISSING');
    }
    return join(this.androidHome, 'emulator', process.platform === 'win32' ? 'emulator.exe' : 'emulator');
  }

  async boot(
    avd: string,
    ports: EmulatorPortRange,
    signal?: AbortSignal,
    onStarted?: (serial: string) => void
  ): Promise<string> {
    if (ports.start < 1024 || ports.end > 65535 || ports.start >= ports.end) {
      throw new DeviceError(`Invalid emulator port range ${ports.start}-${ports.end}`, 'INVALID_PORT_RANGE');
    }

    const emulator = this.emulatorBinary();
    const devices = await this.runner.run('adb', ['devices'], { timeoutMs: DEVICE_TIMEOUTS.shortOperationMs, signal });
    const port = findFreeEmulatorPort(devices.stdout, ports, new Set(this.reservedPorts.values()));
    if (port === undefined) {
      throw new DeviceError(`No available emulator ports found in range ${ports.start}-${ports.end}`, 'NO_EMULATOR_PORT');
    }

    const serial = `emulator-${port}`;
    this.reservedPorts.set(serial, port);
    this.logger.info({ avd, serial }, 'Starting Android emulator');

    const child = this.runner.spawnBackground(emulator, [
      '-avd',
      avd,
      '-port',
      String(port),
      '-no-window',
      '-no-audio',
      '-no-snapshot-save',
    ]);

    try {
      onStarted?.(serial);
      await delay(this.startupGraceMs, signal);
      const booted = await pollUntil(() => this.isBootCompleted(serial, signal), {
        timeoutMs: this.bootTimeoutMs,
        intervalMs: this.bootPollMs,
        signal,
      });
      if (!booted) {
        throw new DeviceTimeoutError(`Android emulator ${serial} did not finish booting within ${this.bootTimeoutMs}ms`, serial);
      }
    } catch (error) {
      child.kill('SIGKILL');
      this.reservedPorts.delete(serial);
      throw error;
    }

    this.logger.info({ avd, serial }, 'Android emulator is booted');
    return serial;
  }

  private async isBootCompleted(serial: string, signal?: AbortSignal): Promise<boolean> {
    const result = await this.adb(serial, ['shell', 'getprop', 'sys.boot_completed'], DEVICE_TIMEOUTS.shortOperationMs, signal);
    return result.exitCode === 0 && result.stdout.trim() === '1';
  }

  async setLocale(serial: string, locale: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ serial, locale }, 'Setting Android emulator locale');

    const result = await this.adb(serial, ['shell', 'setprop', 'persist.sys.locale', locale], DEVICE_TIMEOUTS.commandMs, signal);
    if (result.exitCode !== 0) {
      throw new DeviceError(`Failed to set locale: ${result.stderr.trim()}`, 'LOCALE_FAILED', serial);
    }

    const broadcast = await this.adb(
      serial,
      ['shell', 'am', 'broadcast', '-a', 'android.intent.action.LOCALE_CHANGED'],
      DEVICE_TIMEOUTS.commandMs,
      signal
    );
    if (broadcast.exitCode !== 0) {
      this.logger.warn({ serial, stderr: broadcast.stderr.trim() }, 'Failed to broadcast locale change');
    }
  }

  async setStatusBar(serial: string, statusBar: AndroidStatusBar, signal?: AbortSignal): Promise<void> {
    if (!statusBar.demoMode) {
      return;
    }

    this.logger.info({ serial }, 'Enabling status bar demo mode');
    const enable = await this.adb(
      serial,
      ['shell', 'settings', 'put', 'global', 'sysui_demo_allowed', '1'],
      DEVICE_TIMEOUTS.commandMs,
      signal
    );
    if (enable.exitCode !== 0) {
      throw new DeviceError(`Failed to enable demo mode: ${enable.stderr.trim()}`, 'STATUS_BAR_FAILED', serial);
    }

    const demo = ['shell', 'am', 'broadcast', '-a', 'com.android.systemui.demo', '-e', 'command'];
    const commands: string[][] = [[...demo, 'enter']];
    if (statusBar.clock !== undefined) {
      commands.push([...demo, 'clock', '-e', 'hhmm', statusBar.clock]);
    }
    if (statusBar.battery !== undefined) {
      commands.push([...demo, 'battery', '-e', 'level', String(statusBar.battery), '-e', 'plugged', 'false']);
    }
    if (statusBar.wifi !== undefined) {
      commands.push([...demo, 'network', '-e', 'wifi', 'show', '-e', 'level', statusBar.wifi]);
    }
    if (statusBar.notifications !== undefined) {
      commands.push([...demo, 'notifications', '-e', 'visible', String(statusBar.notifications)]);
    }

    for (const args of commands) {
      const result = await this.adb(serial, args, DEVICE_TIMEOUTS.commandMs, signal);
      if (result.exitCode !== 0) {
        this.logger.warn({ serial, command: args.join(' '), stderr: result.stderr.trim() }, 'Failed to set status bar element');
      }
    }
  }

  async installApp(serial: string, apkPath: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ serial, apkPath }, 'Installing Android app');
    const result = await this.adb(serial, ['install', '-r', apkPath], DEVICE_TIMEOUTS.installMs, signal);
    if (result.exitCode !== 0) {
      throw new DeviceError(`Failed to install app ${apkPath}: ${result.stderr.trim()}`, 'INSTALL_FAILED', serial);
    }
  }

  async resetAppData(serial: string, packageName: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ serial, packageName }, 'Clearing Android app data');
    const result = await this.adb(serial, ['shell', 'pm', 'clear', packageName], DEVICE_TIMEOUTS.commandMs, signal);
    if (result.exitCode !== 0) {
      this.logger.warn({ serial, packageName, stderr: result.stderr.trim() }, 'App data reset failed');
    }
  }

  async screenshot(serial: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    const capture = await this.adb(serial, ['shell', 'screencap', '-p', DEVICE_SCREENSHOT_PATH], DEVICE_TIMEOUTS.commandMs, signal);
    if (capture.exitCode !== 0) {
      throw new DeviceError(`Failed to take screenshot: ${capture.stderr.trim()}`, 'SCREENSHOT_FAILED', serial);
    }

    const pull = await this.adb(serial, ['pull', DEVICE_SCREENSHOT_PATH, outputPath], DEVICE_TIMEOUTS.commandMs, signal);
    if (pull.exitCode !== 0) {
      throw new DeviceError(`Failed to pull screenshot: ${pull.stderr.trim()}`, 'SCREENSHOT_FAILED', serial);
    }

    const cleanup = await this.adb(serial, ['shell', 'rm', DEVICE_SCREENSHOT_PATH], DEVICE_TIMEOUTS.shortOperationMs, signal);
    if (cleanup.exitCode !== 0) {
      this.logger.debug({ serial }, 'Could not remove screenshot from device');
    }

    await assertFileExists(outputPath, serial);
    this.logger.debug({ serial, outputPath }, 'Screenshot saved');
  }

  async captureLogs(serial: string, signal?: AbortSignal): Promise<string> {
    const result = await this.adb(
      serial,
      ['logcat', '-d', '-v', 'time', '*:W', 'System.err:V'],
      DEVICE_TIMEOUTS.logCaptureMs,
      signal
    );
    if (result.exitCode !== 0) {
      this.logger.warn({ serial, exitCode: result.exitCode }, 'Failed to capture Android logs');
      return `Failed to capture Android logs: ${result.stderr.trim()}`;
    }
    return truncateLog(result.stdout, MAX_DEVICE_LOG_SIZE, LOG_TRUNCATION_MARKER);
  }

  async shutdown(serial: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ serial }, 'Stopping Android emulator');
    const result = await this.adb(serial, ['emu', 'kill'], DEVICE_TIMEOUTS.commandMs, signal);
    this.reservedPorts.delete(serial);
    if (result.exitCode !== 0) {
      this.logger.warn({ serial, stderr: result.stderr.trim() }, 'Failed to stop emulator gracefully');
    }
  }
}
