/**
 * Options shared by the run and generate-matrix commands
 */

import type { AppOverrides, PlanFilters } from '../../services/run-plan/types.js';

export const planOptions = {
  config: { type: 'string', short: 'c' },
  output: { type: 'string', short: 'o' },
  platforms: { type: 'string' },
  devices: { type: 'string' },
  langs: { type: 'string' },
  screens: { type: 'string' },
  'ios-app': { type: 'string' },
  'android-app': { type: 'string' },
  'base-port': { type: 'string' },
  verbose: { type: 'boolean', short: 'v', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export const DEFAULT_OUTPUT_DIR = 'Screenshots';

/**
 * Split a comma-separated option into trimmed, non-empty values
 */
export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

interface PlanOptionValues {
  platforms?: string;
  devices?: string;
  langs?: string;
  screens?: string;
  'ios-app'?: string;
  'android-app'?: string;
}

export function toPlanFilters(values: PlanOptionValues): PlanFilters {
  return {
    platforms: splitList(values.platforms),
    devices: splitList(values.devices),
    languages: splitList(values.langs),
    screenshots: splitList(values.screens),
  };
}

export function toAppOverrides(values: PlanOptionValues): AppOverrides {
  const overrides: AppOverrides = {};
  if (values['ios-app']) {
    overrides.ios = values['ios-app'];
  }
  if (values['android-app']) {
    overrides.android = values['android-app'];
  }
  return overrides;
}

/**
 * Parse an integer option; undefined when absent
 */
export function parseIntegerOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`--${name} must be a positive integer, got '${value}'`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Bad command line; printed with a hint to use --help
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  cancelled: 130,
} as const;
