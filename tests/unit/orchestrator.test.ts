/**
 * Orchestrator and worker pool tests
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  Orchestrator,
  WorkerPool,
  degreeOfParallelism,
  deviceKey,
  groupByDevice,
  summarize,
  type JobRunner,
} from '../../src/services/orchestrator/index.js';
import {
  JobExecutor,
  jobIdFor,
  type JobOverrides,
  type JobResult,
  type JobStatus,
} from '../../src/services/job-execution/index.js';
import { ProcessRegistry } from '../../src/services/process-registry/index.js';
import type { RunConfig } from '../../src/services/run-config/types.js';
import { RunPlanBuilder, type RunJob, type RunPlan } from '../../src/services/run-plan/index.js';
import { createModuleLogger } from '../../src/utils/logger.js';
import {
  FakeAndroidDriver,
  FakeImageInspector,
  FakeIosDriver,
  FakeServerController,
  FakeSession,
  FakeSessionFactory,
} from '../fixtures/fakes.js';
import { createRunConfig, StaticArtifactResolver } from '../fixtures/run-config.fixture.js';

function resultFor(job: RunJob, status: JobStatus): JobResult {
  const now = new Date();
  return {
    job,
    jobId: jobIdFor(job),
    status,
    state: status === 'Success' ? 'Succeeded' : status === 'Cancelled' ? 'Cancelled' : 'Failed',
    stateHistory: [],
    screenshots: [],
    failureArtifacts: [],
    warnings: [],
    startTime: now,
    endTime: now,
    durationMs: 0,
  };
}

/**
 * Completes jobs after a per-index delay and tracks concurrency
 */
class ScriptedJobRunner implements JobRunner {
  inFlight = 0;
  maxInFlight = 0;
  readonly overrides: JobOverrides[] = [];
  /** Jobs that started while another job held the same device */
  readonly deviceConflicts: string[] = [];
  private busyDevices = new Set<string>();

  constructor(private outcome: (job: RunJob) => JobStatus | Error = () => 'Success') {}

  async execute(job: RunJob, _config: RunConfig, overrides: JobOverrides): Promise<JobResult> {
    this.overrides.push(overrides);
    const device = deviceKey(job);
    if (this.busyDevices.has(device)) {
      this.deviceConflicts.push(jobIdFor(job));
    }
    this.busyDevices.add(device);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await sleep((4 - job.index) * 5);
      const outcome = this.outcome(job);
      if (outcome instanceof Error) {
        throw outcome;
      }
      return resultFor(job, outcome);
    } finally {
      this.inFlight--;
      this.busyDevices.delete(device);
    }
  }
}

describe('degreeOfParallelism', () => {
  it('should use half the processors', () => {
    assert.strictEqual(degreeOfParallelism(10, undefined, 8), 4);
  });

  it('should never exceed the job count or the cap', () => {
    assert.strictEqual(degreeOfParallelism(2, undefined, 16), 2);
    assert.strictEqual(degreeOfParallelism(10, 3, 16), 3);
  });

  it('should never drop below one', () => {
    assert.strictEqual(degreeOfParallelism(10, undefined, 1), 1);
    assert.strictEqual(degreeOfParallelism(0, undefined, 8), 1);
  });
});

describe('WorkerPool', () => {
  it('should reject a size that is not a positive integer', () => {
    assert.throws(() => new WorkerPool(0), RangeError);
    assert.throws(() => new WorkerPool(1.5), RangeError);
  });

  it('should keep results in item order and bound concurrency', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    const results = await new WorkerPool(2).map([30, 10, 20, 5], async (ms, index) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(ms);
      inFlight--;
      return `${index}:${ms}`;
    });

    assert.deepStrictEqual(results, ['0:30', '1:10', '2:20', '3:5']);
    assert.strictEqual(maxInFlight, 2);
  });

  it('should return an empty list for no items', async () => {
    assert.deepStrictEqual(await new WorkerPool(3).map([], async () => 1), []);
  });
});

describe('groupByDevice', () => {
  it('should key simulators by udid or name and emulators by AVD', async () => {
    const config = createRunConfig({
      devices: {
        ios: [
          { name: 'iPhone 15', udid: 'SIM-0001', folder: 'iphone15', platform_version: '17.5' },
          { name: 'iPad Air', folder: 'ipadair', platform_version: '17.5' },
        ],
        android: [{ name: 'Pixel 7', avd: 'Pixel_7_API_34', folder: 'pixel7', platform_version: '34' }],
      },
    });
    const plan = await new RunPlanBuilder({ artifactResolver: new StaticArtifactResolver() }).build(
      config,
      join(tmpdir(), 'screens')
    );

    assert.deepStrictEqual(
      plan.jobs.map((job) => deviceKey(job)),
      [
        'ios:SIM-0001',
        'ios:SIM-0001',
        'ios:iPad Air',
        'ios:iPad Air',
        'android:Pixel_7_API_34',
        'android:Pixel_7_API_34',
      ]
    );
    assert.deepStrictEqual(groupByDevice(plan.jobs), [
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });
});

describe('Orchestrator', () => {
  let config: RunConfig;
  let plan: RunPlan;
  const logger = createModuleLogger('orchestrator-test');

  before(async () => {
    config = createRunConfig();
    plan = await new RunPlanBuilder({ artifactResolver: new StaticArtifactResolver() }).build(
      config,
      join(tmpdir(), 'screens')
    );
  });

  it('should run every job and report success', async () => {
    const runner = new ScriptedJobRunner();

    const result = await new Orchestrator(runner, { logger, processorCount: 4 }).execute(plan, config);

    assert.strictEqual(result.success, true);
    assert.match(result.runId, /^[0-9a-f]{8}$/);
    assert.deepStrictEqual(
      result.jobResults.map((r) => r.jobId),
      ['iOS-iphone15-en-US', 'iOS-iphone15-de-DE', 'Android-pixel7-en-US', 'Android-pixel7-de-DE']
    );
    assert.strictEqual(runner.maxInFlight, 2);
    assert.strictEqual(result.summary.totalJobs, 4);
    assert.strictEqual(result.summary.successfulJobs, 4);
    assert.strictEqual(result.environment.nodeVersion, process.version);
    assert.strictEqual(result.durationMs, result.endTime.getTime() - result.startTime.getTime());
  });

  it('should never run two jobs on the same device at once', async () => {
    const runner = new ScriptedJobRunner();

    const result = await new Orchestrator(runner, { logger, processorCount: 16 }).execute(plan, config);

    assert.deepStrictEqual(runner.deviceConflicts, []);
    assert.strictEqual(runner.maxInFlight, 2);
    assert.deepStrictEqual(
      result.jobResults.map((r) => r.jobId),
      ['iOS-iphone15-en-US', 'iOS-iphone15-de-DE', 'Android-pixel7-en-US', 'Android-pixel7-de-DE']
    );
  });

  it('should honour the parallelism cap', async () => {
    const runner = new ScriptedJobRunner();

    await new Orchestrator(runner, { logger, processorCount: 16 }).execute(plan, config, { maxParallel: 1 });

    assert.strictEqual(runner.maxInFlight, 1);
  });

  it('should pass the server override to every job', async () => {
    const runner = new ScriptedJobRunner();

    await new Orchestrator(runner, { logger, processorCount: 4 }).execute(plan, config, {
      serverUrl: 'http://grid.local:4444',
      maxParallel: 2,
    });

    assert.deepStrictEqual(
      runner.overrides.map((o) => o.serverUrl),
      Array(4).fill('http://grid.local:4444')
    );
  });

  it('should isolate failures and report the run as unsuccessful', async () => {
    const runner = new ScriptedJobRunner((job) => (job.index === 1 ? 'Failed' : 'Success'));

    const result = await new Orchestrator(runner, { logger, processorCount: 8 }).execute(plan, config);

    assert.strictEqual(result.success, false);
    assert.deepStrictEqual(
      result.jobResults.map((r) => r.status),
      ['Success', 'Failed', 'Success', 'Success']
    );
    assert.strictEqual(result.summary.failedJobs, 1);
    assert.strictEqual(result.errorMessage, undefined);
  });

  it('should turn an executor crash into a failed job', async () => {
    const runner = new ScriptedJobRunner((job) => (job.index === 2 ? new Error('executor exploded') : 'Success'));

    const result = await new Orchestrator(runner, { logger, processorCount: 8 }).execute(plan, config);

    const crashed = result.jobResults[2];
    assert.strictEqual(crashed.status, 'Failed');
    assert.strictEqual(crashed.errorCode, 'EXECUTION_ERROR');
    assert.strictEqual(crashed.errorMessage, 'executor exploded');
    assert.strictEqual(crashed.jobId, 'Android-pixel7-en-US');
    assert.strictEqual(result.summary.successfulJobs, 3);
  });
});

describe('Orchestrator cancellation', () => {
  let outputRoot: string;

  before(async () => {
    outputRoot = await mkdtemp(join(tmpdir(), 'orchestrator-'));
  });

  after(async () => {
    await rm(outputRoot, { recursive: true, force: true });
  });

  it('should bring every job to a terminal state and release every resource', async () => {
    const config = createRunConfig();
    const plan = await new RunPlanBuilder({ artifactResolver: new StaticArtifactResolver() }).build(config, outputRoot);
    const controller = new AbortController();
    const session = new FakeSession();
    session.onFind = () => controller.abort(new Error('Cancelled by SIGINT'));
    const serverController = new FakeServerController();
    const registry = new ProcessRegistry();
    const executor = new JobExecutor({
      iosDriver: new FakeIosDriver(),
      androidDriver: new FakeAndroidDriver(),
      serverController,
      sessionFactory: new FakeSessionFactory(session),
      registry,
      imageInspector: new FakeImageInspector(),
      logger: createModuleLogger('orchestrator-test'),
    });

    const result = await new Orchestrator(executor, {
      logger: createModuleLogger('orchestrator-test'),
      processorCount: 8,
    }).execute(plan, config, {}, controller.signal);

    assert.deepStrictEqual(
      result.jobResults.map((r) => r.state),
      ['Cancelled', 'Cancelled', 'Cancelled', 'Cancelled']
    );
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.summary.cancelledJobs, 4);
    assert.strictEqual(registry.size, 0);
    assert.deepStrictEqual([...serverController.stopped].sort(), [...serverController.started].sort());
  });
});

describe('summarize', () => {
  it('should count statuses and list distinct dimensions', async () => {
    const config = createRunConfig();
    const plan = await new RunPlanBuilder({ artifactResolver: new StaticArtifactResolver() }).build(
      config,
      join(tmpdir(), 'screens')
    );
    const statuses: JobStatus[] = ['Success', 'Failed', 'Cancelled', 'Success'];

    const summary = summarize(plan.jobs.map((job, i) => resultFor(job, statuses[i])));

    assert.deepStrictEqual(summary, {
      totalJobs: 4,
      successfulJobs: 2,
      failedJobs: 1,
      cancelledJobs: 1,
      platforms: ['ios', 'android'],
      devices: ['iPhone 15', 'Pixel 7'],
      languages: ['en-US', 'de-DE'],
      totalScreenshots: 0,
      totalFailureArtifacts: 0,
    });
  });
});
