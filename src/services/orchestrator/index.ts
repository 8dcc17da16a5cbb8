/**
 * Orchestration and reporting
 */

export {
  Orchestrator,
  deviceKey,
  groupByDevice,
  summarize,
  environmentInfo,
  newRunId,
  type OrchestratorOptions,
} from './orchestrator.js';
export { WorkerPool, degreeOfParallelism } from './worker-pool.js';
export {
  ManifestWriter,
  buildManifest,
  buildSummary,
  manifestJobId,
  MANIFEST_FILE,
  SUMMARY_FILE,
} from './manifest-writer.js';
export { createJobExecutor, execute } from './runtime.js';
export * from './types.js';
