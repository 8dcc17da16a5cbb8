/**
 * Error types for external commands and device control
 */

/**
 * Base error class for device management failures
 */
export class DeviceError extends Error {
  constructor(
    message: string,
    public code: string,
    public deviceId?: string
  ) {
    super(message);
    this.name = 'DeviceError';
  }
}

/**
 * An external command could not be run to completion
 */
export class CommandError extends DeviceError {
  constructor(
    message: string,
    code: 'COMMAND_FAILED' | 'COMMAND_TIMEOUT',
    public commandLine: string,
    public exitCode?: number,
    public stderr?: string
  ) {
    super(message, code);
    this.name = 'CommandError';
  }
}

/**
 * A device did not reach the expected state in time
 */
export class DeviceTimeoutError extends DeviceError {
  constructor(message: string, deviceId: string) {
    super(message, 'DEVICE_TIMEOUT', deviceId);
    this.name = 'DeviceTimeoutError';
  }
}
