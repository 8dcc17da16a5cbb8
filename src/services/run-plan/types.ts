/**
 * Run plan types
 */

import type {
  AndroidDevice,
  IosDevice,
  LocaleMapping,
  Platform,
  ScreenshotPlan,
} from '../run-config/types.js';

/**
 * Ports reserved for one job. Only one auxiliary port is used at a time,
 * but both are reserved so the layout does not depend on the platform.
 */
export interface PortAllocation {
  /** Automation server port */
  readonly automationPort: number;

  /** WebDriverAgent local port (iOS jobs) */
  readonly iosAuxPort: number;

  /** UiAutomator2 system port (Android jobs) */
  readonly androidAuxPort: number;
}

interface RunJobBase {
  /** Position in the filtered plan, 0..N-1 */
  readonly index: number;
  readonly language: string;
  readonly localeMapping: LocaleMapping;
  readonly screenshots: readonly ScreenshotPlan[];
  readonly outputDirectory: string;
  readonly ports: PortAllocation;
  readonly appPath: string;
  readonly deviceName: string;
  readonly deviceFolder: string;
}

export interface IosRunJob extends RunJobBase {
  readonly platform: 'ios';
  readonly iosDevice: IosDevice;
  readonly androidDevice: null;
}

export interface AndroidRunJob extends RunJobBase {
  readonly platform: 'android';
  readonly iosDevice: null;
  readonly androidDevice: AndroidDevice;
}

/**
 * Immutable plan for one platform + device + language combination
 */
export type RunJob = IosRunJob | AndroidRunJob;

/**
 * Ordered jobs plus aggregate counts
 */
export interface RunPlan {
  readonly jobs: readonly RunJob[];
  readonly totalPlatforms: number;
  readonly totalDevices: number;
  readonly totalLanguages: number;
  readonly totalScreenshots: number;
  readonly estimatedDurationMinutes: number;
  readonly artifactPaths: Readonly<Partial<Record<Platform, string>>>;
}

/**
 * Allow-list filters. An absent or empty list keeps everything.
 */
export interface PlanFilters {
  platforms?: readonly string[];
  devices?: readonly string[];
  languages?: readonly string[];
  screenshots?: readonly string[];
}

/**
 * Application paths given on the command line
 */
export type AppOverrides = Partial<Record<Platform, string>>;

export type MatrixFormat = 'github' | 'gitlab' | 'azure';

export const MATRIX_FORMATS: readonly MatrixFormat[] = ['github', 'gitlab', 'azure'];

/**
 * Read-only projection of one job for CI matrices
 */
export interface MatrixRecord {
  /** Stable identifier, job-<index> */
  id: string;
  index: number;
  platform: Platform;
  device: string;
  deviceName: string;
  language: string;
  screenshots: number;
  outputDirectory: string;
}

/** Minutes budgeted per job when estimating run duration */
export const MINUTES_PER_JOB = 2;
