/**
 * Run configuration types
 */

import type { z } from 'zod';
import type { runConfigSchema, screenshotActionSchema, screenshotPlanSchema, selectorSchema } from './schema.js';

/**
 * Target platform of a job
 */
export type Platform = 'ios' | 'android';

export const PLATFORMS: readonly Platform[] = ['ios', 'android'];

/**
 * Display name used in output paths and reports
 */
export const PLATFORM_LABELS: Record<Platform, string> = {
  ios: 'iOS',
  android: 'Android',
};

/**
 * Value configured separately for each platform
 */
export interface PlatformPair<T> {
  ios?: T;
  android?: T;
}

export type RunConfig = z.output<typeof runConfigSchema>;
export type Selector = z.output<typeof selectorSchema>;
export type ScreenshotAction = z.output<typeof screenshotActionSchema>;
export type ScreenshotPlan = z.output<typeof screenshotPlanSchema>;

export type IosDevice = RunConfig['devices']['ios'][number];
export type AndroidDevice = RunConfig['devices']['android'][number];
export type LocaleMapping = RunConfig['localeMapping'][string];
export type IosStatusBar = NonNullable<RunConfig['statusBar']['ios']>;
export type AndroidStatusBar = NonNullable<RunConfig['statusBar']['android']>;
export type ValidationSettings = NonNullable<RunConfig['validation']>;
export type FailureArtifactSettings = RunConfig['failureArtifacts'];
export type AppResetSettings = RunConfig['appReset'];

export type Orientation = 'portrait' | 'landscape';

/**
 * Defaults applied where the configuration is silent
 */
export const CONFIG_DEFAULTS = {
  basePort: 4723,
  portOffset: 10,
  emulatorStartPort: 5554,
  emulatorEndPort: 5600,
  elementTimeoutMs: 10000,
  waitSeconds: 1,
} as const;
