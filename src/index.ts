/**
 * screenshot-matrix
 *
 * Plans and runs localized screenshot jobs across iOS simulators and
 * Android emulators, one job per platform, device and language.
 */

export * from './services/run-config/index.js';
export * from './services/run-plan/index.js';
export * from './services/process-registry/index.js';
export * from './services/device-management/index.js';
export * from './services/appium-server/index.js';
export * from './services/driver-session/index.js';
export * from './services/job-execution/index.js';
export * from './services/orchestrator/index.js';

export { Logger, createModuleLogger, logger } from './utils/logger.js';
export { getConfig, parseEnv, type Env } from './config/env.js';
