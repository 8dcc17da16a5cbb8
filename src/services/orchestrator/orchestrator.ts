/**
 * Orchestrator - runs every job of a plan on a bounded worker pool, one job
 * per device at a time
 */

import { randomBytes } from 'node:crypto';
import { hostname, release, type } from 'node:os';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { getToolVersion } from '../../utils/version.js';
import { errorMessage } from '../job-execution/errors.js';
import { jobIdFor } from '../job-execution/job-executor.js';
import type { JobResult } from '../job-execution/types.js';
import type { RunConfig } from '../run-config/types.js';
import type { RunJob, RunPlan } from '../run-plan/types.js';
import type { EnvironmentInfo, JobRunner, RunOverrides, RunResult, RunSummary } from './types.js';
import { WorkerPool, degreeOfParallelism } from './worker-pool.js';

export interface OrchestratorOptions {
  logger?: Logger;
  /** Defaults to os.cpus().length */
  processorCount?: number;
}

export function newRunId(): string {
  return randomBytes(4).toString('hex');
}

export function summarize(jobResults: readonly JobResult[]): RunSummary {
  const distinct = (values: string[]): string[] => [...new Set(values)];
  const count = (status: JobResult['status']): number => jobResults.filter((r) => r.status === status).length;

  return {
    totalJobs: jobResults.length,
    successfulJobs: count('Success'),
    failedJobs: count('Failed'),
    cancelledJobs: count('Cancelled'),
    platforms: distinct(jobResults.map((r) => r.job.platform)),
    devices: distinct(jobResults.map((r) => r.job.deviceName)),
    languages: distinct(jobResults.map((r) => r.job.language)),
    totalScreenshots: jobResults.reduce((sum, r) => sum + r.screenshots.length, 0),
    totalFailureArtifacts: jobResults.reduce((sum, r) => sum + r.failureArtifacts.length, 0),
  };
}

export function environmentInfo(): EnvironmentInfo {
  return {
    operatingSystem: `${type()} ${release()}`,
    nodeVersion: process.version,
    hostname: hostname(),
    workingDirectory: process.cwd(),
    toolVersion: getToolVersion(),
  };
}

/**
 * Identity of the simulator or emulator a job runs on. Jobs with the same
 * key share a device and never run at the same time.
 */
export function deviceKey(job: RunJob): string {
  switch (job.platform) {
    case 'ios':
      return `ios:${job.iosDevice.udid ?? job.iosDevice.name}`;
    case 'android':
      return `android:${job.androidDevice.avd}`;
  }
}

/**
 * Plan positions grouped by device, groups in order of their first job and
 * positions ascending within a group
 */
export function groupByDevice(jobs: readonly RunJob[]): number[][] {
  const groups = new Map<string, number[]>();
  jobs.forEach((job, position) => {
    const key = deviceKey(job);
    const group = groups.get(key);
    if (group) {
      group.push(position);
    } else {
      groups.set(key, [position]);
    }
  });
  return [...groups.values()];
}

/**
 * Failed result for a job whose executor threw instead of reporting
 */
function crashedJobResult(job: RunJob, error: unknown): JobResult {
  const now = new Date();
  return {
    job,
    jobId: jobIdFor(job),
    status: 'Failed',
    state: 'Failed',
    stateHistory: [{ state: 'Failed', at: now }],
    screenshots: [],
    failureArtifacts: [],
    warnings: [],
    startTime: now,
    endTime: now,
    durationMs: 0,
    errorMessage: errorMessage(error),
    errorCode: 'EXECUTION_ERROR',
  };
}

export class Orchestrator {
  private logger: Logger;
  private processorCount?: number;

  constructor(
    private executor: JobRunner,
    options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? createModuleLogger('orchestrator');
    this.processorCount = options.processorCount;
  }

  async execute(plan: RunPlan, config: RunConfig, overrides: RunOverrides = {}, signal?: AbortSignal): Promise<RunResult> {
    const runId = newRunId();
    const startTime = new Date();
    const logger = this.logger.child({ runId });

    // Each worker takes a whole device group, so a device has one job at a time
    const groups = groupByDevice(plan.jobs);
    const parallelism = degreeOfParallelism(groups.length, overrides.maxParallel, this.processorCount);
    const pool = new WorkerPool(parallelism);
    const jobOverrides = { serverUrl: overrides.serverUrl };

    logger.info(
      { jobs: plan.jobs.length, devices: groups.length, parallelism, serverUrl: overrides.serverUrl },
      'Starting run'
    );

    const runJob = async (job: RunJob): Promise<JobResult> => {
      try {
        return await this.executor.execute(job, config, jobOverrides, signal);
      } catch (error) {
        logger.error({ jobId: jobIdFor(job), error: errorMessage(error) }, 'Job executor crashed');
        return crashedJobResult(job, error);
      }
    };

    let jobResults: JobResult[] = [];
    let runError: string | undefined;

    try {
      const slots = new Array<JobResult>(plan.jobs.length);
      await pool.map(groups, async (positions) => {
        for (const position of positions) {
          slots[position] = await runJob(plan.jobs[position]);
        }
      });
      jobResults = slots;
    } catch (error) {
      runError = errorMessage(error);
      logger.error({ error: runError }, 'Run failed');
    }

    const endTime = new Date();
    const summary = summarize(jobResults);
    const success = runError === undefined && jobResults.every((r) => r.status === 'Success');

    const result: RunResult = {
      runId,
      startTime,
      endTime,
      durationMs: endTime.getTime() - startTime.getTime(),
      success,
      summary,
      environment: environmentInfo(),
      jobResults,
      errorMessage: runError,
    };

    logger.info(
      {
        success,
        successful: summary.successfulJobs,
        failed: summary.failedJobs,
        cancelled: summary.cancelledJobs,
        screenshots: summary.totalScreenshots,
        durationMs: result.durationMs,
      },
      'Run completed'
    );
    return result;
  }
}
