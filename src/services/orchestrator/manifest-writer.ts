/**
 * Manifest Writer - run_manifest.json and run_summary.txt
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createModuleLogger, type Logger } from '../../utils/logger.js';
import type { JobResult } from '../job-execution/types.js';
import { PLATFORM_LABELS } from '../run-config/types.js';
import type { ManifestFiles, RunResult } from './types.js';

export const MANIFEST_FILE = 'run_manifest.json';
export const SUMMARY_FILE = 'run_summary.txt';

/** Screenshots listed per job in the text summary */
const SUMMARY_SCREENSHOT_LIMIT = 3;

export function manifestJobId(result: JobResult): string {
  return `${result.job.platform}_${result.job.deviceFolder}_${result.job.language}`;
}

/**
 * snake_case document describing the run
 */
export function buildManifest(result: RunResult): Record<string, unknown> {
  return {
    run_id: result.runId,
    start_time: result.startTime.toISOString(),
    end_time: result.endTime.toISOString(),
    duration_ms: result.durationMs,
    success: result.success,
    environment: {
      operating_system: result.environment.operatingSystem,
      node_version: result.environment.nodeVersion,
      hostname: result.environment.hostname,
      working_directory: result.environment.workingDirectory,
      tool_version: result.environment.toolVersion,
    },
    summary: {
      total_jobs: result.summary.totalJobs,
      successful_jobs: result.summary.successfulJobs,
      failed_jobs: result.summary.failedJobs,
      cancelled_jobs: result.summary.cancelledJobs,
      platforms: result.summary.platforms,
      devices: result.summary.devices,
      languages: result.summary.languages,
      total_screenshots: result.summary.totalScreenshots,
      total_failure_artifacts: result.summary.totalFailureArtifacts,
    },
    jobs: result.jobResults.map((job) => ({
      job_id: manifestJobId(job),
      platform: job.job.platform,
      device: job.job.deviceName,
      device_folder: job.job.deviceFolder,
      language: job.job.language,
      output_dir: job.job.outputDirectory,
      start_time: job.startTime.toISOString(),
      end_time: job.endTime?.toISOString() ?? null,
      duration_ms: job.durationMs ?? null,
      status: job.status.toLowerCase(),
      success: job.status === 'Success',
      error_message: job.errorMessage ?? null,
      error_code: job.errorCode ?? null,
      warnings: job.warnings,
      screenshots: job.screenshots.map((screenshot) => ({
        name: screenshot.name,
        language: screenshot.language,
        path: screenshot.path,
        orientation: screenshot.orientation,
        timestamp: screenshot.timestamp.toISOString(),
        success: screenshot.success,
        dimensions: screenshot.dimensions
          ? { width: screenshot.dimensions.width, height: screenshot.dimensions.height }
          : null,
        file_size_bytes: screenshot.sizeBytes ?? null,
        error_message: screenshot.error ?? null,
      })),
      failure_artifacts: job.failureArtifacts.map((artifact) => ({
        type: artifact.kind.toLowerCase(),
        path: artifact.path,
        timestamp: artifact.timestamp.toISOString(),
        file_size_bytes: artifact.sizeBytes,
      })),
    })),
    error_message: result.errorMessage ?? null,
  };
}

function seconds(ms: number | undefined): string {
  return ms === undefined ? '?' : (ms / 1000).toFixed(1);
}

/**
 * Human-readable report
 */
export function buildSummary(result: RunResult): string {
  const { summary, environment } = result;
  const lines: string[] = [
    'Screenshot Run Summary',
    '======================',
    '',
    `Run ID: ${result.runId}`,
    `Start Time: ${result.startTime.toISOString()}`,
    `End Time: ${result.endTime.toISOString()}`,
    `Duration: ${seconds(result.durationMs)} seconds`,
    `Overall Success: ${result.success ? 'Yes' : 'No'}`,
  ];
  if (result.errorMessage) {
    lines.push(`Run Error: ${result.errorMessage}`);
  }

  lines.push(
    '',
    'Environment:',
    `  OS: ${environment.operatingSystem}`,
    `  Node.js: ${environment.nodeVersion}`,
    `  Host: ${environment.hostname}`,
    `  Version: ${environment.toolVersion}`,
    '',
    'Summary:',
    `  Total Jobs: ${summary.totalJobs}`,
    `  Successful: ${summary.successfulJobs}`,
    `  Failed: ${summary.failedJobs}`,
    `  Cancelled: ${summary.cancelledJobs}`,
    `  Screenshots: ${summary.totalScreenshots}`,
    `  Failure Artifacts: ${summary.totalFailureArtifacts}`,
    '',
    'Job Results:'
  );

  for (const job of result.jobResults) {
    const marker = job.status === 'Success' ? 'PASS' : job.status === 'Cancelled' ? 'SKIP' : 'FAIL';
    lines.push(
      `  [${marker}] ${PLATFORM_LABELS[job.job.platform]} ${job.job.deviceFolder} ${job.job.language} (${seconds(job.durationMs)}s)`
    );
    if (job.errorMessage) {
      lines.push(`    Error: ${job.errorMessage}`);
    }
    for (const warning of job.warnings) {
      lines.push(`    Warning: ${warning}`);
    }
    if (job.screenshots.length > 0) {
      lines.push(`    Screenshots: ${job.screenshots.length}`);
      for (const screenshot of job.screenshots.slice(0, SUMMARY_SCREENSHOT_LIMIT)) {
        lines.push(`      [${screenshot.success ? 'ok' : 'x'}] ${screenshot.name}`);
      }
      if (job.screenshots.length > SUMMARY_SCREENSHOT_LIMIT) {
        lines.push(`      ... and ${job.screenshots.length - SUMMARY_SCREENSHOT_LIMIT} more`);
      }
    }
    if (job.failureArtifacts.length > 0) {
      lines.push(`    Failure Artifacts: ${job.failureArtifacts.length}`);
      for (const artifact of job.failureArtifacts) {
        lines.push(`      ${artifact.kind}: ${basename(artifact.path)}`);
      }
    }
    lines.push('');
  }

  if (summary.failedJobs > 0) {
    lines.push(`${summary.failedJobs} job(s) failed. See the failure artifacts listed above.`);
  } else if (summary.cancelledJobs > 0) {
    lines.push(`Run cancelled; ${summary.cancelledJobs} job(s) did not finish.`);
  } else if (summary.totalJobs > 0) {
    lines.push('All jobs completed successfully.');
  }

  return `${lines.join('\n')}\n`;
}

export class ManifestWriter {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createModuleLogger('manifest-writer');
  }

  async write(result: RunResult, outputDirectory: string): Promise<ManifestFiles> {
    await mkdir(outputDirectory, { recursive: true });

    const manifestPath = join(outputDirectory, MANIFEST_FILE);
    const summaryPath = join(outputDirectory, SUMMARY_FILE);

    await writeFile(manifestPath, `${JSON.stringify(buildManifest(result), null, 2)}\n`, 'utf8');
    this.logger.info({ path: manifestPath }, 'Wrote run manifest');

    await writeFile(summaryPath, buildSummary(result), 'utf8');
    this.logger.info({ path: summaryPath }, 'Wrote run summary');

    return { manifestPath, summaryPath };
  }
}
