/**
 * CI matrix views over a run plan
 */

import { ConfigurationError } from '../run-config/errors.js';
import { MATRIX_FORMATS, type MatrixFormat, type MatrixRecord, type RunPlan } from './types.js';

export interface GitHubMatrix {
  include: Array<{
    job_id: string;
    platform: string;
    device: string;
    language: string;
    screenshots: number;
    output_dir: string;
  }>;
}

export type GitLabMatrix = Record<
  string,
  { PLATFORM: string; DEVICE: string; LANGUAGE: string; OUTPUT_DIR: string }
>;

export interface AzureMatrix {
  strategy: {
    matrix: Record<string, { platform: string; device: string; language: string; outputDir: string }>;
  };
}

export type RenderedMatrix = GitHubMatrix | GitLabMatrix | AzureMatrix;

export function isMatrixFormat(value: string): value is MatrixFormat {
  return MATRIX_FORMATS.some((format) => format === value);
}

/**
 * One record per job, keyed job-<index>
 */
export function toMatrixRecords(plan: RunPlan): MatrixRecord[] {
  return plan.jobs.map((job) => ({
    id: `job-${job.index}`,
    index: job.index,
    platform: job.platform,
    device: job.deviceFolder,
    deviceName: job.deviceName,
    language: job.language,
    screenshots: job.screenshots.length,
    outputDirectory: job.outputDirectory,
  }));
}

export function toGitHubMatrix(records: readonly MatrixRecord[]): GitHubMatrix {
  return {
    include: records.map((record) => ({
      job_id: record.id,
      platform: record.platform,
      device: record.device,
      language: record.language,
      screenshots: record.screenshots,
      output_dir: record.outputDirectory,
    })),
  };
}

export function toGitLabMatrix(records: readonly MatrixRecord[]): GitLabMatrix {
  const variables: GitLabMatrix = {};
  for (const record of records) {
    variables[`JOB_${record.index}`] = {
      PLATFORM: record.platform,
      DEVICE: record.device,
      LANGUAGE: record.language,
      OUTPUT_DIR: record.outputDirectory,
    };
  }
  return variables;
}

export function toAzureMatrix(records: readonly MatrixRecord[]): AzureMatrix {
  const matrix: AzureMatrix['strategy']['matrix'] = {};
  for (const record of records) {
    matrix[`job_${record.index}`] = {
      platform: record.platform,
      device: record.device,
      language: record.language,
      outputDir: record.outputDirectory,
    };
  }
  return { strategy: { matrix } };
}

/**
 * Render the plan in the requested CI format
 */
export function renderMatrix(plan: RunPlan, format: string): RenderedMatrix {
  const normalized = format.trim().toLowerCase();
  if (!isMatrixFormat(normalized)) {
    throw new ConfigurationError(
      `Unknown matrix format '${format}'. Expected one of: ${MATRIX_FORMATS.join(', ')}`
    );
  }

  const records = toMatrixRecords(plan);
  switch (normalized) {
    case 'github':
      return toGitHubMatrix(records);
    case 'gitlab':
      return toGitLabMatrix(records);
    case 'azure':
      return toAzureMatrix(records);
  }
}
