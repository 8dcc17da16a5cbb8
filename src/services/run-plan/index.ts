/**
 * Run Plan Service - Index
 *
 * Port allocation, plan building and CI matrix projection
 */

export {
  MATRIX_FORMATS,
  MINUTES_PER_JOB,
  type PortAllocation,
  type RunJob,
  type IosRunJob,
  type AndroidRunJob,
  type RunPlan,
  type PlanFilters,
  type AppOverrides,
  type MatrixFormat,
  type MatrixRecord,
} from './types.js';

export { PortAllocator, MIN_PORT, MAX_PORT, MAX_PORT_OFFSET, PORTS_PER_JOB } from './port-allocator.js';
export { GlobArtifactResolver, type ArtifactResolver } from './artifact-resolver.js';
export { RunPlanBuilder, buildPlan, type RunPlanBuilderOptions } from './run-plan-builder.js';
export {
  toMatrixRecords,
  toGitHubMatrix,
  toGitLabMatrix,
  toAzureMatrix,
  renderMatrix,
  isMatrixFormat,
  type GitHubMatrix,
  type GitLabMatrix,
  type AzureMatrix,
  type RenderedMatrix,
} from './matrix-export.js';
