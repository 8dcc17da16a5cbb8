/**
 * Job execution
 *
 * Provisioning, screenshot plans, validation, failure artifacts and
 * teardown for a single job.
 */

export { JobExecutor, jobIdFor, type JobExecutorDeps } from './job-executor.js';
export {
  ActionRunner,
  parseOrientation,
  screenshotFileName,
  type ActionRunnerOptions,
  type PlanOutcome,
} from './action-runner.js';
export {
  createPlatformAdapter,
  IosPlatformAdapter,
  AndroidPlatformAdapter,
  type PlatformAdapter,
  type PlatformAdapterDeps,
  type ProvisionedDevice,
} from './platform-adapter.js';
export { captureFailureArtifacts, FAILURE_ARTIFACT_FILES } from './failure-artifacts.js';
export { PngImageInspector } from './image-inspector.js';
export { validateScreenshot, expectedSize, type ImageValidationOutcome } from './image-validator.js';
export { toLocator } from './selectors.js';
export * from './errors.js';
export * from './types.js';
