/**
 * CLI Command: run
 * Build the job matrix, execute it and write the run manifest
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { getConfig } from '../../config/env.js';
import {
  ManifestWriter,
  Orchestrator,
  createJobExecutor,
  type RunResult,
} from '../../services/orchestrator/index.js';
import { ProcessRegistry, installLifecycleHooks } from '../../services/process-registry/index.js';
import { loadRunConfig } from '../../services/run-config/index.js';
import { PLATFORM_LABELS } from '../../services/run-config/types.js';
import { PortAllocator, RunPlanBuilder, type RunPlan } from '../../services/run-plan/index.js';
import { createModuleLogger, logger as rootLogger } from '../../utils/logger.js';
import {
  DEFAULT_OUTPUT_DIR,
  EXIT_CODES,
  UsageError,
  parseIntegerOption,
  planOptions,
  toAppOverrides,
  toPlanFilters,
} from './shared-options.js';

const logger = createModuleLogger('cli:run');

export function displayRunHelp(): void {
  console.log(`
Usage:
  screenshot-matrix run --config <file> [options]

Options:
  -c, --config <file>       Run configuration (JSON)
  -o, --output <dir>        Output root (default: ./${DEFAULT_OUTPUT_DIR})
  --platforms <list>        Comma-separated platforms: ios, android
  --devices <list>          Comma-separated device names
  --langs <list>            Comma-separated languages
  --screens <list>          Comma-separated screenshot plan names
  --ios-app <path>          iOS app to install instead of the configured artifact
  --android-app <path>      Android APK to install instead of the configured artifact
  --base-port <port>        First automation server port (default from config, 4723)
  --server-url <url>        Use a running automation server instead of starting one per job
  --max-parallel <n>        Upper bound on concurrent jobs
  --dry-run                 Print the plan and exit
  -v, --verbose             Debug logging
  -h, --help                Show this help message

Exit codes:
  0    all jobs succeeded
  1    a job failed or the run could not start
  130  cancelled
`);
}

function printPlan(plan: RunPlan): void {
  console.log(`\nRun plan: ${plan.jobs.length} job(s), about ${plan.estimatedDurationMinutes} minute(s)\n`);
  for (const job of plan.jobs) {
    console.log(
      `  [${job.index}] ${PLATFORM_LABELS[job.platform]} ${job.deviceName} ${job.language} ` +
        `(${job.screenshots.length} plan(s), port ${job.ports.automationPort})`
    );
    console.log(`      -> ${job.outputDirectory}`);
  }
  console.log();
}

function printResult(result: RunResult, manifestPath: string): void {
  const { summary } = result;
  console.log(`\nRun ${result.runId} ${result.success ? 'succeeded' : 'did not succeed'}`);
  console.log(`   Jobs: ${summary.successfulJobs} succeeded, ${summary.failedJobs} failed, ${summary.cancelledJobs} cancelled`);
  console.log(`   Screenshots: ${summary.totalScreenshots}`);
  for (const job of result.jobResults) {
    if (job.status !== 'Success' && job.errorMessage) {
      console.log(`   ${job.jobId}: ${job.errorMessage}`);
    }
  }
  console.log(`   Manifest: ${manifestPath}\n`);
}

export async function executeRunCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...planOptions,
      'server-url': { type: 'string' },
      'max-parallel': { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) {
    displayRunHelp();
    return EXIT_CODES.success;
  }
  if (!values.config) {
    throw new UsageError('--config is required');
  }
  if (values.verbose) {
    rootLogger.setLevel('debug');
  }

  const env = getConfig();
  const config = await loadRunConfig(values.config);
  const basePort = parseIntegerOption('base-port', values['base-port']);
  const maxParallel = parseIntegerOption('max-parallel', values['max-parallel']) ?? env.MAX_PARALLEL;
  const outputRoot = resolve(values.output ?? DEFAULT_OUTPUT_DIR);

  const allocator = basePort === undefined ? undefined : new PortAllocator(basePort, config.ports.portOffset);
  const plan = await new RunPlanBuilder().build(
    config,
    outputRoot,
    toPlanFilters(values),
    allocator,
    toAppOverrides(values)
  );

  if (values['dry-run']) {
    printPlan(plan);
    return EXIT_CODES.success;
  }

  const registry = new ProcessRegistry();
  const cancellation = new AbortController();
  const disposeHooks = installLifecycleHooks(registry, {
    onCancel: (signal) => cancellation.abort(new Error(`Cancelled by ${signal}`)),
    timeoutMs: env.PROCESS_DRAIN_TIMEOUT,
  });

  try {
    const result = await new Orchestrator(createJobExecutor(registry, env)).execute(
      plan,
      config,
      { serverUrl: values['server-url'], maxParallel },
      cancellation.signal
    );
    const files = await new ManifestWriter().write(result, outputRoot);
    printResult(result, files.manifestPath);

    if (cancellation.signal.aborted) {
      return EXIT_CODES.cancelled;
    }
    return result.success ? EXIT_CODES.success : EXIT_CODES.failure;
  } finally {
    disposeHooks();
    const drained = await registry.drain(env.PROCESS_DRAIN_TIMEOUT);
    if (drained.failed.length > 0 || drained.timedOut.length > 0) {
      logger.warn({ failed: drained.failed, timedOut: drained.timedOut }, 'Resources left running after the run');
    }
  }
}
