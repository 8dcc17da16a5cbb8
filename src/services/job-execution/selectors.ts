/**
 * Selector to WebDriver locator mapping
 */

import type { Selector } from '../run-config/types.js';
import type { Locator, LocatorStrategy } from '../driver-session/types.js';

const STRATEGY_PRIORITY: ReadonlyArray<[keyof Selector, LocatorStrategy]> = [
  ['accessibilityId', 'accessibility id'],
  ['id', 'id'],
  ['iosClassChain', '-ios class chain'],
  ['androidUiautomator', '-android uiautomator'],
  ['xpath', 'xpath'],
];

/**
 * First non-empty strategy in priority order, or undefined
 */
export function toLocator(selector: Selector): Locator | undefined {
  for (const [key, using] of STRATEGY_PRIORITY) {
    const value = selector[key];
    if (value) {
      return { using, value };
    }
  }
  return undefined;
}

export function describeLocator(locator: Locator): string {
  return `${locator.using}=${locator.value}`;
}
