/**
 * Job execution types
 */

import type { RunJob } from '../run-plan/types.js';
import type { Orientation } from '../run-config/types.js';

/**
 * Externally visible status of a job
 */
export type JobStatus = 'Pending' | 'Running' | 'Success' | 'Failed' | 'Cancelled';

/**
 * Internal state machine of a job.
 *
 * Pending -> Provisioning -> Executing -> Validating -> Succeeded | Failed,
 * with Cancelled reachable from every non-terminal state.
 */
export type JobState = 'Pending' | 'Provisioning' | 'Executing' | 'Validating' | 'Succeeded' | 'Failed' | 'Cancelled';

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['Succeeded', 'Failed', 'Cancelled']);

/**
 * Allowed forward transitions. Failed and Cancelled are checked separately.
 */
export const NEXT_STATE: Readonly<Partial<Record<JobState, JobState>>> = {
  Pending: 'Provisioning',
  Provisioning: 'Executing',
  Executing: 'Validating',
  Validating: 'Succeeded',
};

export interface StateTransition {
  state: JobState;
  at: Date;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ScreenshotResult {
  name: string;
  language: string;
  path: string;
  orientation: Orientation;
  dimensions?: ImageDimensions;
  sizeBytes?: number;
  timestamp: Date;
  success: boolean;
  error?: string;
}

export type FailureArtifactKind = 'PageSource' | 'Screenshot' | 'DeviceLogs';

export interface FailureArtifact {
  kind: FailureArtifactKind;
  path: string;
  timestamp: Date;
  sizeBytes: number;
}

export interface JobResult {
  job: RunJob;
  /** <platform>-<folder>-<language> */
  jobId: string;
  status: JobStatus;
  /** Final state-machine state */
  state: JobState;
  stateHistory: StateTransition[];
  screenshots: ScreenshotResult[];
  failureArtifacts: FailureArtifact[];
  warnings: string[];
  startTime: Date;
  endTime?: Date;
  durationMs?: number;
  errorMessage?: string;
  errorCode?: string;
}

/**
 * Reads image dimensions from a file on disk
 */
export interface ImageInspector {
  dimensions(path: string): Promise<ImageDimensions>;
}

/**
 * Per-run settings a job needs besides its RunJob
 */
export interface JobOverrides {
  /** Use an already running automation server instead of spawning one */
  serverUrl?: string;
}
