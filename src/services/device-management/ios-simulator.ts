/**
 * iOS simulator control using xcrun simctl
 */

import { access } from 'node:fs/promises';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { pollUntil } from '../../utils/polling.js';
import type { IosStatusBar } from '../run-config/types.js';
import { truncateLog } from './command-runner.js';
import { DeviceError, DeviceTimeoutError } from './errors.js';
import {
  DEVICE_TIMEOUTS,
  LOG_TRUNCATION_MARKER,
  MAX_DEVICE_LOG_SIZE,
  type CommandResult,
  type CommandRunner,
  type IosDeviceDriver,
} from './types.js';

/**
 * Pull the state of a simulator, matched by udid or name, out of
 * `simctl list devices -j` output
 */
export function findSimulatorState(listJson: string, udidOrName: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(listJson);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || !('devices' in parsed)) {
    return undefined;
  }
  const runtimes: unknown = parsed.devices;
  if (typeof runtimes !== 'object' || runtimes === null) {
    return undefined;
  }

  for (const devices of Object.values(runtimes)) {
    if (!Array.isArray(devices)) continue;
    for (const device of devices) {
      const entry: unknown = device;
      if (typeof entry !== 'object' || entry === null) continue;
      const udid: unknown = Reflect.get(entry, 'udid');
      const name: unknown = Reflect.get(entry, 'name');
      const state: unknown = Reflect.get(entry, 'state');
      if ((udid === udidOrName || name === udidOrName) && typeof state === 'string') {
        return state;
      }
    }
  }
  return undefined;
}

export class IosSimulatorDriver implements IosDeviceDriver {
  private logger: Logger;

  constructor(
    private runner: CommandRunner,
    logger?: Logger
  ) {
    this.logger = logger ?? createModuleLogger('device-management:ios');
  }

  private simctl(args: string[], timeoutMs: number, signal?: AbortSignal): Promise<CommandResult> {
    return this.runner.run('xcrun', ['simctl', ...args], { timeoutMs, signal });
  }

  async shutdown(udidOrName: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ device: udidOrName }, 'Shutting down iOS simulator');
    const result = await this.simctl(['shutdown', udidOrName], DEVICE_TIMEOUTS.shutdownMs, signal);

    // Already shut down is not an error
    if (result.exitCode !== 0) {
      this.logger.warn({ device: udidOrName, exitCode: result.exitCode, stderr: result.stderr.trim() }, 'Simulator shutdown failed');
    }
  }

  async boot(udidOrName: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ device: udidOrName }, 'Booting iOS simulator');
    const result = await this.simctl(['boot', udidOrName], DEVICE_TIMEOUTS.commandMs, signal);

    if (result.exitCode !== 0 && !result.stderr.includes('current state: Booted')) {
      throw new DeviceError(`Failed to boot simulator ${udidOrName}: ${result.stderr.trim()}`, 'BOOT_FAILED', udidOrName);
    }

    const booted = await pollUntil(() => this.isBooted(udidOrName, signal), {
      timeoutMs: DEVICE_TIMEOUTS.iosBootMs,
      intervalMs: DEVICE_TIMEOUTS.iosBootPollMs,
      signal,
    });
    if (!booted) {
      throw new DeviceTimeoutError(`Simulator ${udidOrName} did not reach booted state within timeout`, udidOrName);
    }

    this.logger.info({ device: udidOrName }, 'iOS simulator is booted');
  }

  private async isBooted(udidOrName: string, signal?: AbortSignal): Promise<boolean> {
    const result = await this.simctl(['list', 'devices', '-j'], DEVICE_TIMEOUTS.shortOperationMs, signal);
    if (result.exitCode !== 0) {
      this.logger.debug({ stderr: result.stderr.trim() }, 'Could not list simulators');
      return false;
    }
    return findSimulatorState(result.stdout, udidOrName) === 'Booted';
  }

  async setLocale(udidOrName: string, locale: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ device: udidOrName, locale }, 'Setting iOS simulator locale');

    const languages = await this.simctl(
      ['spawn', udidOrName, 'defaults', 'write', '-g', 'AppleLanguages', '-array', locale],
      DEVICE_TIMEOUTS.commandMs,
      signal
    );
    if (languages.exitCode !== 0) {
      throw new DeviceError(`Failed to set AppleLanguages: ${languages.stderr.trim()}`, 'LOCALE_FAILED', udidOrName);
    }

    const appleLocale = await this.simctl(
      ['spawn', udidOrName, 'defaults', 'write', '-g', 'AppleLocale', locale],
      DEVICE_TIMEOUTS.commandMs,
      signal
    );
    if (appleLocale.exitCode !== 0) {
      throw new DeviceError(`Failed to set AppleLocale: ${appleLocale.stderr.trim()}`, 'LOCALE_FAILED', udidOrName);
    }
  }

  async setStatusBar(udidOrName: string, statusBar: IosStatusBar, signal?: AbortSignal): Promise<void> {
    const args = ['status_bar', udidOrName, 'override'];
    if (statusBar.time !== undefined) args.push('--time', statusBar.time);
    if (statusBar.wifiBars !== undefined) args.push('--wifiBars', String(statusBar.wifiBars));
    if (statusBar.cellularBars !== undefined) args.push('--cellularBars', String(statusBar.cellularBars));
    if (statusBar.batteryState !== undefined) args.push('--batteryState', statusBar.batteryState);

    this.logger.info({ device: udidOrName }, 'Applying iOS status bar overrides');
    const result = await this.simctl(args, DEVICE_TIMEOUTS.commandMs, signal);
    if (result.exitCode !== 0) {
      throw new DeviceError(`Failed to set status bar overrides: ${result.stderr.trim()}`, 'STATUS_BAR_FAILED', udidOrName);
    }
  }

  async installApp(udidOrName: string, appPath: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ device: udidOrName, appPath }, 'Installing iOS app');
    const result = await this.simctl(['install', udidOrName, appPath], DEVICE_TIMEOUTS.installMs, signal);
    if (result.exitCode !== 0) {
      throw new DeviceError(`Failed to install app ${appPath}: ${result.stderr.trim()}`, 'INSTALL_FAILED', udidOrName);
    }
  }

  async resetAppData(udidOrName: string, bundleId: string, signal?: AbortSignal): Promise<void> {
    this.logger.info({ device: udidOrName, bundleId }, 'Resetting iOS app permissions');
    const result = await this.simctl(['privacy', udidOrName, 'reset', 'all', bundleId], DEVICE_TIMEOUTS.commandMs, signal);
    if (result.exitCode !== 0) {
      this.logger.warn({ device: udidOrName, bundleId, stderr: result.stderr.trim() }, 'App data reset failed');
    }
  }

  async screenshot(udidOrName: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    const result = await this.simctl(['io', udidOrName, 'screenshot', outputPath], DEVICE_TIMEOUTS.commandMs, signal);
    if (result.exitCode !== 0) {
      throw new DeviceError(`Failed to take screenshot: ${result.stderr.trim()}`, 'SCREENSHOT_FAILED', udidOrName);
    }
    await assertFileExists(outputPath, udidOrName);
    this.logger.debug({ device: udidOrName, outputPath }, 'Screenshot saved');
  }

  async captureLogs(udidOrName: string, signal?: AbortSignal): Promise<string> {
    const result = await this.simctl(
      ['spawn', udidOrName, 'log', 'show', '--style', 'compact', '--last', '5m'],
      DEVICE_TIMEOUTS.logCaptureMs,
      signal
    );
    if (result.exitCode !== 0) {
      this.logger.warn({ device: udidOrName, exitCode: result.exitCode }, 'Failed to capture iOS logs');
      return `Failed to capture iOS logs: ${result.stderr.trim()}`;
    }
    return truncateLog(result.stdout, MAX_DEVICE_LOG_SIZE, LOG_TRUNCATION_MARKER);
  }
}

export async function assertFileExists(path: string, deviceId: string): Promise<void> {
  try {
    await access(path);
  } catch {
    throw new DeviceError(`Screenshot was not created at expected path: ${path}`, 'SCREENSHOT_FAILED', deviceId);
  }
}
