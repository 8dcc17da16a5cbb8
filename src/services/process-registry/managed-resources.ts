/**
 * Registry entries for the long-lived processes a job starts
 */

import type { AutomationServerController } from '../appium-server/types.js';
import type { AndroidDeviceDriver, IosDeviceDriver } from '../device-management/types.js';
import type { ManagedResource, ManagedResourceKind } from './types.js';

export const resourceIds = {
  automationServer: (port: number): string => `appium-${port}`,
  iosSimulator: (deviceId: string): string => `ios-simulator-${deviceId}`,
  androidEmulator: (serial: string): string => `android-emulator-${serial}`,
};

export class ManagedAutomationServer implements ManagedResource {
  readonly kind: ManagedResourceKind = 'automation-server';
  readonly id: string;

  constructor(
    private controller: AutomationServerController,
    private port: number
  ) {
    this.id = resourceIds.automationServer(port);
  }

  stop(): Promise<void> {
    return this.controller.stop(this.port);
  }
}

export class ManagedIosSimulator implements ManagedResource {
  readonly kind: ManagedResourceKind = 'ios-simulator';
  readonly id: string;

  constructor(
    private driver: IosDeviceDriver,
    private deviceId: string
  ) {
    this.id = resourceIds.iosSimulator(deviceId);
  }

  stop(): Promise<void> {
    return this.driver.shutdown(this.deviceId);
  }
}

export class ManagedAndroidEmulator implements ManagedResource {
  readonly kind: ManagedResourceKind = 'android-emulator';
  readonly id: string;

  constructor(
    private driver: AndroidDeviceDriver,
    private serial: string
  ) {
    this.id = resourceIds.androidEmulator(serial);
  }

  stop(): Promise<void> {
    return this.driver.shutdown(this.serial);
  }
}
