/**
 * Job-scoped error types. None of these abort sibling jobs.
 */

/**
 * Base error class for job failures
 */
export class JobError extends Error {
  constructor(
    message: string,
    public code: string,
    public jobId?: string
  ) {
    super(message);
    this.name = 'JobError';
  }
}

/**
 * Boot, locale, install or server start-up failed
 */
export class ProvisioningError extends JobError {
  constructor(
    message: string,
    jobId?: string,
    public cause?: Error
  ) {
    super(message, 'PROVISIONING_ERROR', jobId);
    this.name = 'ProvisioningError';
  }
}

/**
 * Action error types
 */
export enum ActionErrorType {
  /** Element not found */
  ELEMENT_NOT_FOUND = 'ELEMENT_NOT_FOUND',

  /** wait_for expired */
  TIMEOUT = 'TIMEOUT',

  /** Orientation other than portrait or landscape */
  INVALID_ORIENTATION = 'INVALID_ORIENTATION',

  /** Selector without any locator strategy */
  INVALID_SELECTOR = 'INVALID_SELECTOR',

  /** Device screenshot failed */
  CAPTURE_FAILED = 'CAPTURE_FAILED',

  /** The automation server rejected a lookup or click */
  COMMAND_FAILED = 'COMMAND_FAILED',
}

/**
 * A screenshot plan action failed; the job's remaining actions are skipped
 */
export class ActionError extends JobError {
  constructor(
    public type: ActionErrorType,
    message: string,
    public plan?: string,
    public cause?: Error
  ) {
    super(`${type}: ${message}${plan ? ` (plan: ${plan})` : ''}`, 'ACTION_ERROR');
    this.name = 'ActionError';
  }
}

/**
 * A screenshot does not have the configured dimensions
 */
export class ScreenshotValidationError extends JobError {
  constructor(
    message: string,
    public screenshot: string
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ScreenshotValidationError';
  }
}

/**
 * Stopping a device, server or session failed. Logged, never surfaced as a job failure.
 */
export class TeardownError extends JobError {
  constructor(
    message: string,
    public resource: string,
    public cause?: Error
  ) {
    super(message, 'TEARDOWN_ERROR');
    this.name = 'TeardownError';
  }
}

export class JobCancelledError extends JobError {
  constructor(jobId?: string) {
    super('Job cancelled', 'JOB_CANCELLED', jobId);
    this.name = 'JobCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
