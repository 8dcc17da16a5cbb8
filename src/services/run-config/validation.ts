/**
 * Semantic checks that the schema cannot express
 */

import type { RunConfig, Selector } from './types.js';

export interface ConfigValidationResult {
  errors: string[];
  warnings: string[];
}

const IOS_VERSION = /^\d+\.\d+$/;
const ANDROID_VERSION = /^\d+$/;

/**
 * Whether a selector names at least one locator strategy
 */
export function hasLocatorStrategy(selector: Selector): boolean {
  return Boolean(
    selector.accessibilityId ||
      selector.id ||
      selector.iosClassChain ||
      selector.androidUiautomator ||
      selector.xpath
  );
}

function checkSelector(selector: Selector, context: string, errors: string[]): void {
  if (!hasLocatorStrategy(selector)) {
    errors.push(
      `${context} has a selector with no locator strategy (accessibility_id, id, ios_class_chain, android_uiautomator or xpath required)`
    );
  }
  if (selector.xpath && !selector.xpath.startsWith('/') && !selector.xpath.startsWith('(')) {
    errors.push(`${context} has invalid xpath '${selector.xpath}': must start with '/' or '('`);
  }
}

function checkLocales(config: RunConfig, errors: string[]): void {
  const missing = config.languages.filter((lang) => !(lang in config.localeMapping));
  if (missing.length > 0) {
    errors.push(`Languages missing from locale_mapping: [${missing.join(', ')}]`);
  }

  for (const [lang, mapping] of Object.entries(config.localeMapping)) {
    if (!mapping.ios.trim()) {
      errors.push(`Language '${lang}' is missing its iOS locale`);
    }
    if (!mapping.android.trim()) {
      errors.push(`Language '${lang}' is missing its Android locale`);
    }
  }
}

function checkDevices(config: RunConfig, errors: string[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const device of [...config.devices.ios, ...config.devices.android]) {
    if (seen.has(device.folder)) {
      duplicates.add(device.folder);
    }
    seen.add(device.folder);
  }
  if (duplicates.size > 0) {
    errors.push(`Device folders must be unique across platforms. Duplicates: [${[...duplicates].join(', ')}]`);
  }

  for (const device of config.devices.ios) {
    if (device.name.includes('"') || device.name.includes("'")) {
      errors.push(`iOS device name '${device.name}' contains quotes`);
    }
    if (device.name.length > 100) {
      errors.push(`iOS device name '${device.name}' is too long (>100 characters)`);
    }
    if (!IOS_VERSION.test(device.platformVersion)) {
      errors.push(
        `iOS device '${device.name}' has invalid platform version '${device.platformVersion}': expected a form like '18.5'`
      );
    } else if (device.platformVersion.startsWith('0')) {
      errors.push(`iOS device '${device.name}' has platform version '${device.platformVersion}' starting with 0`);
    }
  }

  for (const device of config.devices.android) {
    if (!device.avd.trim()) {
      errors.push(`Android device '${device.name}' has an empty AVD name`);
    } else if (device.avd.includes(' ')) {
      errors.push(`Android AVD name '${device.avd}' contains spaces`);
    }
    if (!ANDROID_VERSION.test(device.platformVersion)) {
      errors.push(
        `Android device '${device.name}' has invalid platform version '${device.platformVersion}': expected a number like '34'`
      );
    }
  }
}

function checkScreenshots(config: RunConfig, errors: string[], warnings: string[]): void {
  for (const plan of config.screenshots) {
    if (!plan.actions.some((action) => action.type === 'capture')) {
      warnings.push(`Screenshot '${plan.name}' has no capture action`);
    }
    for (const action of plan.actions) {
      if (action.type === 'tap') {
        checkSelector(action.selector, `Screenshot '${plan.name}' tap action`, errors);
      } else if (action.type === 'wait_for') {
        checkSelector(action.selector, `Screenshot '${plan.name}' wait_for action`, errors);
      }
    }
    if (plan.assert?.ios) {
      checkSelector(plan.assert.ios, `Screenshot '${plan.name}' iOS assert`, errors);
    }
    if (plan.assert?.android) {
      checkSelector(plan.assert.android, `Screenshot '${plan.name}' Android assert`, errors);
    }
  }

  for (const selector of config.dismissors.ios ?? []) {
    checkSelector(selector, 'iOS dismissor', errors);
  }
  for (const selector of config.dismissors.android ?? []) {
    checkSelector(selector, 'Android dismissor', errors);
  }
}

function checkAppReset(config: RunConfig, errors: string[]): void {
  if (config.appReset.policy === 'never') {
    return;
  }
  if (config.devices.ios.length > 0 && !config.buildConfig.ios?.package) {
    errors.push(`app_reset policy '${config.appReset.policy}' requires build_config.ios.package`);
  }
  if (config.devices.android.length > 0 && !config.buildConfig.android?.package) {
    errors.push(`app_reset policy '${config.appReset.policy}' requires build_config.android.package`);
  }
}

/**
 * Run every semantic check and collect all issues
 */
export function validateRunConfig(config: RunConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  checkLocales(config, errors);
  checkDevices(config, errors);
  checkScreenshots(config, errors, warnings);
  checkAppReset(config, errors);

  return { errors, warnings };
}
