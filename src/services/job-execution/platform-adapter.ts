/**
 * Platform adapters
 *
 * One adapter is created per job and owns everything that differs between
 * simulators and emulators: how the device is acquired, which capabilities
 * the session gets, and how it is stopped.
 */

import type { Logger } from '../../utils/logger.js';
import type { AndroidSessionCapabilities, IosSessionCapabilities, SessionCapabilities } from '../driver-session/capabilities.js';
import type { AndroidDeviceDriver, DeviceDriver, IosDeviceDriver } from '../device-management/types.js';
import { ManagedAndroidEmulator, ManagedIosSimulator } from '../process-registry/managed-resources.js';
import type { ProcessRegistry } from '../process-registry/registry.js';
import type { ManagedResource } from '../process-registry/types.js';
import { CONFIG_DEFAULTS, type Platform, type PlatformPair, type RunConfig } from '../run-config/types.js';
import type { AndroidRunJob, IosRunJob, RunJob } from '../run-plan/types.js';

export interface ProvisionedDevice {
  platform: Platform;
  /** simctl udid or name, or adb serial */
  deviceId: string;
  /** Registry id of the device */
  resourceId: string;
}

export interface PlatformAdapter {
  readonly platform: Platform;

  /**
   * The device acquired so far. Set as soon as the device exists, so a
   * provisioning failure after boot still leaves something to tear down.
   */
  readonly device: ProvisionedDevice | undefined;

  provision(signal?: AbortSignal): Promise<ProvisionedDevice>;
  capabilities(device: ProvisionedDevice): SessionCapabilities;
  screenshot(device: ProvisionedDevice, outputPath: string, signal?: AbortSignal): Promise<void>;
  captureLogs(device: ProvisionedDevice, signal?: AbortSignal): Promise<string>;

  /** This platform's entry of a per-platform setting */
  pick<T>(pair: PlatformPair<T> | undefined): T | undefined;

  /** Stop the device and unregister it */
  teardown(device: ProvisionedDevice): Promise<void>;
}

export interface PlatformAdapterDeps {
  iosDriver: IosDeviceDriver;
  androidDriver: AndroidDeviceDriver;
  registry: ProcessRegistry;
  config: RunConfig;
  logger: Logger;
}

const SESSION_DEFAULTS = {
  noReset: true,
  newCommandTimeout: 300,
};

abstract class BasePlatformAdapter<TJob extends RunJob, TDriver extends DeviceDriver> implements PlatformAdapter {
  abstract readonly platform: Platform;
  private acquired: ProvisionedDevice | undefined;

  constructor(
    protected job: TJob,
    protected driver: TDriver,
    protected deps: PlatformAdapterDeps
  ) {}

  get device(): ProvisionedDevice | undefined {
    return this.acquired;
  }

  /**
   * Boot or acquire the device and set its locale
   */
  protected abstract acquire(signal?: AbortSignal): Promise<ProvisionedDevice>;

  protected abstract applyStatusBar(device: ProvisionedDevice, signal?: AbortSignal): Promise<void>;

  abstract capabilities(device: ProvisionedDevice): SessionCapabilities;

  async provision(signal?: AbortSignal): Promise<ProvisionedDevice> {
    const device = await this.acquire(signal);
    await this.applyStatusBar(device, signal);

    this.deps.logger.info({ deviceId: device.deviceId, appPath: this.job.appPath }, 'Installing app');
    await this.driver.installApp(device.deviceId, this.job.appPath, signal);

    await this.applyResetPolicy(device, signal);
    return device;
  }

  pick<T>(pair: PlatformPair<T> | undefined): T | undefined {
    return pair?.[this.platform];
  }

  screenshot(device: ProvisionedDevice, outputPath: string, signal?: AbortSignal): Promise<void> {
    return this.driver.screenshot(device.deviceId, outputPath, signal);
  }

  captureLogs(device: ProvisionedDevice, signal?: AbortSignal): Promise<string> {
    return this.driver.captureLogs(device.deviceId, signal);
  }

  async teardown(device: ProvisionedDevice): Promise<void> {
    try {
      await this.driver.shutdown(device.deviceId);
    } finally {
      this.deps.registry.unregister(device.resourceId);
      if (this.acquired === device) {
        this.acquired = undefined;
      }
    }
  }

  /**
   * Drop a device that was registered but never came up
   */
  protected release(): void {
    if (this.acquired) {
      this.deps.registry.unregister(this.acquired.resourceId);
      this.acquired = undefined;
    }
  }

  /**
   * Register the device so it is stopped even if the job never reaches teardown
   */
  protected track(deviceId: string, resource: ManagedResource): ProvisionedDevice {
    this.deps.registry.register(resource.id, resource);
    this.acquired = { platform: this.platform, deviceId, resourceId: resource.id };
    return this.acquired;
  }

  private async applyResetPolicy(device: ProvisionedDevice, signal?: AbortSignal): Promise<void> {
    const { policy, clearDataOnLanguageChange } = this.deps.config.appReset;
    if (policy === 'never') {
      return;
    }
    if (policy === 'on_language_change' && !clearDataOnLanguageChange) {
      return;
    }

    const bundleId = this.pick(this.deps.config.buildConfig)?.package;
    if (!bundleId) {
      this.deps.logger.warn({ policy }, 'App reset skipped, no package configured');
      return;
    }

    this.deps.logger.info({ policy, bundleId }, 'Resetting app data');
    await this.driver.resetAppData(device.deviceId, bundleId, signal);

    if (policy === 'always') {
      await this.driver.installApp(device.deviceId, this.job.appPath, signal);
    }
  }
}

export class IosPlatformAdapter extends BasePlatformAdapter<IosRunJob, IosDeviceDriver> {
  readonly platform = 'ios';

  private get deviceId(): string {
    return this.job.iosDevice.udid ?? this.job.iosDevice.name;
  }

  protected async acquire(signal?: AbortSignal): Promise<ProvisionedDevice> {
    const deviceId = this.deviceId;

    // Locale changes only take effect on a fresh boot
    await this.driver.shutdown(deviceId, signal);
    const device = this.track(deviceId, new ManagedIosSimulator(this.driver, deviceId));

    await this.driver.setLocale(deviceId, this.job.localeMapping.ios, signal);
    await this.driver.boot(deviceId, signal);
    return device;
  }

  protected async applyStatusBar(device: ProvisionedDevice, signal?: AbortSignal): Promise<void> {
    const statusBar = this.deps.config.statusBar.ios;
    if (statusBar) {
      await this.driver.setStatusBar(device.deviceId, statusBar, signal);
    }
  }

  capabilities(device: ProvisionedDevice): IosSessionCapabilities {
    const locale = this.job.localeMapping.ios;
    return {
      platform: 'ios',
      platformName: 'iOS',
      automationName: 'XCUITest',
      platformVersion: this.job.iosDevice.platformVersion,
      deviceName: this.job.iosDevice.name,
      udid: device.deviceId,
      app: this.job.appPath,
      language: locale,
      locale,
      ...SESSION_DEFAULTS,
      autoAcceptAlerts: true,
      wdaStartupRetries: 3,
      wdaLocalPort: this.job.ports.iosAuxPort,
      extensions: this.deps.config.capabilities.ios ?? {},
    };
  }
}

export class AndroidPlatformAdapter extends BasePlatformAdapter<AndroidRunJob, AndroidDeviceDriver> {
  readonly platform = 'android';

  protected async acquire(signal?: AbortSignal): Promise<ProvisionedDevice> {
    const { ports } = this.deps.config;
    const register = (serial: string): ProvisionedDevice =>
      this.track(serial, new ManagedAndroidEmulator(this.driver, serial));

    let serial: string;
    try {
      // Registered while it boots, so an interrupt during the wait still stops it
      serial = await this.driver.boot(
        this.job.androidDevice.avd,
        {
          start: ports.emulatorStartPort ?? CONFIG_DEFAULTS.emulatorStartPort,
          end: ports.emulatorEndPort ?? CONFIG_DEFAULTS.emulatorEndPort,
        },
        signal,
        register
      );
    } catch (error) {
      // The driver has already killed the emulator process
      this.release();
      throw error;
    }

    const device = this.device?.deviceId === serial ? this.device : register(serial);
    await this.driver.setLocale(serial, this.job.localeMapping.android, signal);
    return device;
  }

  protected async applyStatusBar(device: ProvisionedDevice, signal?: AbortSignal): Promise<void> {
    const statusBar = this.deps.config.statusBar.android;
    if (statusBar) {
      await this.driver.setStatusBar(device.deviceId, statusBar, signal);
    }
  }

  capabilities(device: ProvisionedDevice): AndroidSessionCapabilities {
    const locale = this.job.localeMapping.android;
    return {
      platform: 'android',
      platformName: 'Android',
      automationName: 'UiAutomator2',
      platformVersion: this.job.androidDevice.platformVersion,
      deviceName: this.job.androidDevice.name,
      avd: this.job.androidDevice.avd,
      udid: device.deviceId,
      app: this.job.appPath,
      language: locale,
      locale,
      ...SESSION_DEFAULTS,
      autoGrantPermissions: true,
      adbExecTimeout: 60000,
      androidInstallTimeout: 300000,
      systemPort: this.job.ports.androidAuxPort,
      extensions: this.deps.config.capabilities.android ?? {},
    };
  }
}

/**
 * Select the adapter for a job once, at construction
 */
export function createPlatformAdapter(job: RunJob, deps: PlatformAdapterDeps): PlatformAdapter {
  switch (job.platform) {
    case 'ios':
      return new IosPlatformAdapter(job, deps.iosDriver, deps);
    case 'android':
      return new AndroidPlatformAdapter(job, deps.androidDriver, deps);
  }
}
