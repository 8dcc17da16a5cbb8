/**
 * Error types for configuration and planning
 */

/**
 * Raised before any job starts when the configuration or the requested
 * filters cannot produce a runnable plan
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public code: string = 'CONFIGURATION_ERROR',
    public issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Invalid base port or port offset
 */
export class PortRangeError extends ConfigurationError {
  constructor(message: string) {
    super(message, 'PORT_RANGE_ERROR');
    this.name = 'PortRangeError';
  }
}

/**
 * No application artifact could be resolved for a platform
 */
export class BuildRequiredError extends ConfigurationError {
  constructor(
    message: string,
    public platform: string
  ) {
    super(message, 'BUILD_REQUIRED');
    this.name = 'BuildRequiredError';
  }
}
