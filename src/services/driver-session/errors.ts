/**
 * Error types for driver sessions
 */

/**
 * Base error class for driver session errors
 */
export class DriverSessionError extends Error {
  constructor(
    message: string,
    public code: string,
    public sessionId?: string
  ) {
    super(message);
    this.name = 'DriverSessionError';
  }
}

/**
 * Error thrown when session creation fails
 */
export class SessionCreationError extends DriverSessionError {
  constructor(message: string, public cause?: Error) {
    super(message, 'SESSION_CREATION_ERROR');
    this.name = 'SessionCreationError';
  }
}

/**
 * Error thrown when session termination fails
 */
export class SessionTerminationError extends DriverSessionError {
  constructor(message: string, sessionId?: string, public cause?: Error) {
    super(message, 'SESSION_TERMINATION_ERROR', sessionId);
    this.name = 'SessionTerminationError';
  }
}

/**
 * A WebDriver command returned an error response
 */
export class WebDriverCommandError extends DriverSessionError {
  constructor(
    message: string,
    public status: number,
    public webdriverError: string,
    sessionId?: string
  ) {
    super(message, 'WEBDRIVER_COMMAND_ERROR', sessionId);
    this.name = 'WebDriverCommandError';
  }
}

/**
 * Error thrown when capabilities are invalid
 */
export class InvalidCapabilitiesError extends DriverSessionError {
  constructor(message: string, public capabilities: unknown) {
    super(message, 'INVALID_CAPABILITIES');
    this.name = 'InvalidCapabilitiesError';
  }
}
