/**
 * Session capabilities per platform
 */

import { InvalidCapabilitiesError } from './errors.js';
import type { Capabilities, CapabilityValue } from './types.js';

interface CommonCapabilities {
  platformVersion: string;
  deviceName: string;
  app: string;
  language: string;
  locale: string;
  noReset: boolean;
  newCommandTimeout: number;
  /** Provider-specific keys, merged last */
  extensions: Record<string, CapabilityValue>;
}

export interface IosSessionCapabilities extends CommonCapabilities {
  platform: 'ios';
  platformName: 'iOS';
  automationName: 'XCUITest';
  udid?: string;
  wdaLocalPort: number;
  autoAcceptAlerts: boolean;
  wdaStartupRetries: number;
}

export interface AndroidSessionCapabilities extends CommonCapabilities {
  platform: 'android';
  platformName: 'Android';
  automationName: 'UiAutomator2';
  avd: string;
  udid?: string;
  systemPort: number;
  autoGrantPermissions: boolean;
  adbExecTimeout: number;
  androidInstallTimeout: number;
}

export type SessionCapabilities = IosSessionCapabilities | AndroidSessionCapabilities;

/**
 * Capability names defined by W3C; everything else needs a vendor prefix
 */
const W3C_CAPABILITIES = new Set([
  'platformName',
  'browserName',
  'browserVersion',
  'acceptInsecureCerts',
  'pageLoadStrategy',
  'proxy',
  'setWindowRect',
  'timeouts',
  'strictFileInteractability',
  'unhandledPromptBehavior',
  'webSocketUrl',
]);

/**
 * Flatten typed capabilities into one map
 */
export function flattenCapabilities(capabilities: SessionCapabilities): Capabilities {
  const { platform: _platform, extensions, ...typed } = capabilities;
  const result: Capabilities = {};
  for (const [key, value] of Object.entries(typed)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return { ...result, ...extensions };
}

/**
 * Prefix Appium capabilities with `appium:` as W3C session creation expects
 */
export function toW3CCapabilities(capabilities: SessionCapabilities): Capabilities {
  const flat = flattenCapabilities(capabilities);
  if (typeof flat.platformName !== 'string' || flat.platformName === '') {
    throw new InvalidCapabilitiesError('platformName capability is required', flat);
  }

  const result: Capabilities = {};
  for (const [key, value] of Object.entries(flat)) {
    const name = W3C_CAPABILITIES.has(key) || key.includes(':') ? key : `appium:${key}`;
    result[name] = value;
  }
  return result;
}
