/**
 * Automation server control
 *
 * Starts one Appium server per job port, waits for it to report ready,
 * and stops it again with SIGTERM followed by SIGKILL.
 */

export { AppiumServerController, buildAppiumArgs, checkServerStatus } from './appium-server.js';
export { LogBuffer, LogCaptureStream, parseLogLevel } from './log-capture.js';

export type {
  AppiumServerConfig,
  AppiumServerHandle,
  AppiumLogLevel,
  AppiumLogEntry,
  AutomationServerController,
  HealthCheckResult,
} from './types.js';

export { AppiumServerError, AppiumStartupError, AppiumShutdownError } from './types.js';
