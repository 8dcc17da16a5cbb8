/**
 * Run-level result types
 */

import type { JobOverrides, JobResult } from '../job-execution/types.js';
import type { RunConfig } from '../run-config/types.js';
import type { RunJob } from '../run-plan/types.js';

export interface RunOverrides extends JobOverrides {
  /** Upper bound on concurrent jobs */
  maxParallel?: number;
}

export interface RunSummary {
  totalJobs: number;
  successfulJobs: number;
  failedJobs: number;
  cancelledJobs: number;
  platforms: string[];
  devices: string[];
  languages: string[];
  totalScreenshots: number;
  totalFailureArtifacts: number;
}

export interface EnvironmentInfo {
  operatingSystem: string;
  nodeVersion: string;
  hostname: string;
  workingDirectory: string;
  toolVersion: string;
}

export interface RunResult {
  /** 8 hex characters */
  runId: string;
  startTime: Date;
  endTime: Date;
  durationMs: number;
  /** True iff every job succeeded */
  success: boolean;
  summary: RunSummary;
  environment: EnvironmentInfo;
  /** In plan order */
  jobResults: JobResult[];
  errorMessage?: string;
}

/**
 * Runs one job; implemented by JobExecutor
 */
export interface JobRunner {
  execute(job: RunJob, config: RunConfig, overrides: JobOverrides, signal?: AbortSignal): Promise<JobResult>;
}

export interface ManifestFiles {
  manifestPath: string;
  summaryPath: string;
}
