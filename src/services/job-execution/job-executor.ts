/**
 * Job Executor - runs one RunJob from provisioning to teardown
 */

import { mkdir } from 'node:fs/promises';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import type { AutomationServerController } from '../appium-server/types.js';
import type { AutomationSession, SessionFactory } from '../driver-session/types.js';
import type { AndroidDeviceDriver, IosDeviceDriver } from '../device-management/types.js';
import { ManagedAutomationServer, resourceIds } from '../process-registry/managed-resources.js';
import type { ProcessRegistry } from '../process-registry/registry.js';
import { PLATFORM_LABELS, type RunConfig } from '../run-config/types.js';
import type { RunJob } from '../run-plan/types.js';
import { ActionRunner } from './action-runner.js';
import {
  JobError,
  ProvisioningError,
  ScreenshotValidationError,
  TeardownError,
  errorMessage,
  toError,
} from './errors.js';
import { captureFailureArtifacts } from './failure-artifacts.js';
import { PngImageInspector } from './image-inspector.js';
import { validateScreenshot } from './image-validator.js';
import { createPlatformAdapter, type PlatformAdapter } from './platform-adapter.js';
import {
  NEXT_STATE,
  TERMINAL_STATES,
  type ImageInspector,
  type JobOverrides,
  type JobResult,
  type JobState,
  type JobStatus,
} from './types.js';

export interface JobExecutorDeps {
  iosDriver: IosDeviceDriver;
  androidDriver: AndroidDeviceDriver;
  serverController: AutomationServerController;
  sessionFactory: SessionFactory;
  registry: ProcessRegistry;
  /** @default PngImageInspector */
  imageInspector?: ImageInspector;
  logger?: Logger;
}

/**
 * Log and report identifier, e.g. iOS-iphone15-en-US
 */
export function jobIdFor(job: RunJob): string {
  return `${PLATFORM_LABELS[job.platform]}-${job.deviceFolder}-${job.language}`;
}

const STATUS_BY_STATE: Partial<Record<JobState, JobStatus>> = {
  Succeeded: 'Success',
  Failed: 'Failed',
  Cancelled: 'Cancelled',
};

/**
 * Owns the JobResult of one job and the only place its state changes
 */
class JobTracker {
  readonly result: JobResult;

  constructor(job: RunJob, jobId: string) {
    const now = new Date();
    this.result = {
      job,
      jobId,
      status: 'Pending',
      state: 'Pending',
      stateHistory: [{ state: 'Pending', at: now }],
      screenshots: [],
      failureArtifacts: [],
      warnings: [],
      startTime: now,
    };
  }

  get state(): JobState {
    return this.result.state;
  }

  transition(next: JobState): void {
    const current = this.result.state;
    const allowed =
      !TERMINAL_STATES.has(current) && (next === 'Failed' || next === 'Cancelled' || NEXT_STATE[current] === next);
    if (!allowed) {
      throw new JobError(`Invalid job state transition ${current} -> ${next}`, 'INVALID_TRANSITION', this.result.jobId);
    }

    this.result.state = next;
    this.result.status = STATUS_BY_STATE[next] ?? 'Running';
    this.result.stateHistory.push({ state: next, at: new Date() });
  }

  fail(error: unknown): void {
    this.result.errorMessage = errorMessage(error);
    this.result.errorCode = errorCode(error);
    this.transition('Failed');
  }

  cancel(): void {
    this.result.errorMessage = 'Job cancelled';
    this.result.errorCode = 'JOB_CANCELLED';
    this.transition('Cancelled');
  }

  finish(): JobResult {
    const endTime = new Date();
    this.result.endTime = endTime;
    this.result.durationMs = endTime.getTime() - this.result.startTime.getTime();
    return this.result;
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return 'EXECUTION_ERROR';
}

interface JobContext {
  job: RunJob;
  config: RunConfig;
  tracker: JobTracker;
  adapter: PlatformAdapter;
  logger: Logger;
  session?: AutomationSession;
  serverPort?: number;
}

export class JobExecutor {
  private logger: Logger;
  private imageInspector: ImageInspector;

  constructor(private deps: JobExecutorDeps) {
    this.logger = deps.logger ?? createModuleLogger('job-executor');
    this.imageInspector = deps.imageInspector ?? new PngImageInspector();
  }

  /**
   * Run a job to a terminal state. Never rejects: every failure, including
   * cancellation, is reported in the returned JobResult. Teardown always runs.
   */
  async execute(job: RunJob, config: RunConfig, overrides: JobOverrides = {}, signal?: AbortSignal): Promise<JobResult> {
    const jobId = jobIdFor(job);
    const logger = this.logger.child({ jobId });
    const tracker = new JobTracker(job, jobId);
    const adapter = createPlatformAdapter(job, {
      iosDriver: this.deps.iosDriver,
      androidDriver: this.deps.androidDriver,
      registry: this.deps.registry,
      config,
      logger,
    });
    const context: JobContext = { job, config, tracker, adapter, logger };

    logger.info({ index: job.index, device: job.deviceName, ports: job.ports }, 'Starting job');

    try {
      signal?.throwIfAborted();
      await this.provision(context, overrides, signal);
      await this.runPlans(context, signal);
      this.validate(context);
      tracker.transition('Succeeded');
    } catch (error) {
      if (signal?.aborted) {
        logger.warn({ state: tracker.state }, 'Job cancelled');
        tracker.cancel();
      } else {
        logger.error({ state: tracker.state, error: errorMessage(error), code: errorCode(error) }, 'Job failed');
        tracker.fail(error);
        tracker.result.failureArtifacts = await captureFailureArtifacts({
          outputDirectory: job.outputDirectory,
          settings: config.failureArtifacts,
          adapter,
          session: context.session,
          logger,
        });
      }
    } finally {
      await this.teardown(context);
    }

    const result = tracker.finish();
    logger.info(
      { status: result.status, screenshots: result.screenshots.length, durationMs: result.durationMs },
      'Job finished'
    );
    return result;
  }

  private async provision(context: JobContext, overrides: JobOverrides, signal?: AbortSignal): Promise<void> {
    const { job, tracker, adapter, logger } = context;
    tracker.transition('Provisioning');

    try {
      const serverUrl = overrides.serverUrl ?? (await this.startServer(context, signal));
      const device = await adapter.provision(signal);

      logger.info({ serverUrl, deviceId: device.deviceId }, 'Device ready, creating session');
      context.session = await this.deps.sessionFactory.create(serverUrl, adapter.capabilities(device), signal);
    } catch (error) {
      if (signal?.aborted || error instanceof JobError) {
        throw error;
      }
      throw new ProvisioningError(`Provisioning failed: ${errorMessage(error)}`, tracker.result.jobId, toError(error));
    }

    await mkdir(job.outputDirectory, { recursive: true });
  }

  private async startServer(context: JobContext, signal?: AbortSignal): Promise<string> {
    const port = context.job.ports.automationPort;
    const { serverController, registry } = this.deps;

    const handle = await serverController.start(port, signal);
    context.serverPort = port;
    const resource = new ManagedAutomationServer(serverController, port);
    registry.register(resource.id, resource);
    return handle.serverUrl;
  }

  private async runPlans(context: JobContext, signal?: AbortSignal): Promise<void> {
    const { job, config, tracker, adapter, session, logger } = context;
    const device = adapter.device;
    if (!session || !device) {
      throw new JobError('Session or device missing after provisioning', 'EXECUTION_ERROR', tracker.result.jobId);
    }

    tracker.transition('Executing');
    const runner = new ActionRunner({
      job,
      config,
      session,
      adapter,
      device,
      imageInspector: this.imageInspector,
      logger,
    });

    for (const plan of job.screenshots) {
      signal?.throwIfAborted();
      const outcome = await runner.runPlan(plan, signal);
      tracker.result.screenshots.push(...outcome.screenshots);
      tracker.result.warnings.push(...outcome.warnings);
    }
  }

  private validate(context: JobContext): void {
    const { job, config, tracker, logger } = context;
    tracker.transition('Validating');

    const enforce = config.validation?.enforceImageSize ?? false;
    for (const screenshot of tracker.result.screenshots) {
      const outcome = validateScreenshot(screenshot, job.platform, job.deviceFolder, config.validation);
      if (outcome.valid || !outcome.message) {
        continue;
      }

      if (enforce) {
        screenshot.success = false;
        screenshot.error = outcome.message;
        throw new ScreenshotValidationError(outcome.message, screenshot.name);
      }
      logger.warn({ screenshot: screenshot.name, expected: outcome.expected }, outcome.message);
      tracker.result.warnings.push(outcome.message);
    }
  }

  /**
   * Close the session, stop the server and stop the device. Runs once per
   * job; failures are logged and never change the job's result.
   */
  private async teardown(context: JobContext): Promise<void> {
    const { adapter, session, serverPort, logger } = context;
    const steps: Array<[string, () => Promise<void>]> = [];

    if (session) {
      steps.push(['session', () => session.close()]);
    }
    if (serverPort !== undefined) {
      steps.push([
        resourceIds.automationServer(serverPort),
        async () => {
          try {
            await this.deps.serverController.stop(serverPort);
          } finally {
            this.deps.registry.unregister(resourceIds.automationServer(serverPort));
          }
        },
      ]);
    }
    const device = adapter.device;
    if (device) {
      steps.push([device.resourceId, () => adapter.teardown(device)]);
    }

    for (const [resource, stop] of steps) {
      try {
        await stop();
      } catch (error) {
        const teardownError = new TeardownError(`Failed to stop ${resource}: ${errorMessage(error)}`, resource, toError(error));
        logger.warn({ resource, code: teardownError.code }, teardownError.message);
      }
    }
    logger.debug({ steps: steps.length }, 'Teardown complete');
  }
}
