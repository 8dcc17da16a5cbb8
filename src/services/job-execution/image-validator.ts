/**
 * Screenshot dimension checks against configured device sizes
 */

import type { Platform, ValidationSettings } from '../run-config/types.js';
import type { ScreenshotResult } from './types.js';

export interface ImageValidationOutcome {
  valid: boolean;
  /** Configured [width, height], when there is one */
  expected?: readonly [number, number];
  message?: string;
}

/**
 * Expected size for a device folder and orientation, if configured
 */
export function expectedSize(
  settings: ValidationSettings | undefined,
  platform: Platform,
  deviceFolder: string,
  orientation: ScreenshotResult['orientation']
): readonly [number, number] | undefined {
  return settings?.expectedSizes[platform]?.[deviceFolder]?.[orientation];
}

/**
 * Compare a captured screenshot with the configured size. Screenshots
 * without a configured size always pass.
 */
export function validateScreenshot(
  screenshot: ScreenshotResult,
  platform: Platform,
  deviceFolder: string,
  settings: ValidationSettings | undefined
): ImageValidationOutcome {
  const expected = expectedSize(settings, platform, deviceFolder, screenshot.orientation);
  if (!expected) {
    return { valid: true };
  }

  const [width, height] = expected;
  const actual = screenshot.dimensions;
  if (!actual) {
    return {
      valid: false,
      expected,
      message: `Screenshot ${screenshot.name} has no readable dimensions, expected ${width}x${height}`,
    };
  }

  if (actual.width !== width || actual.height !== height) {
    return {
      valid: false,
      expected,
      message: `Screenshot ${screenshot.name} is ${actual.width}x${actual.height}, expected ${width}x${height} (${deviceFolder}, ${screenshot.orientation})`,
    };
  }

  return { valid: true, expected };
}
