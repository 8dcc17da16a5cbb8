/**
 * Device management module
 */

export * from './types.js';
export * from './errors.js';
export { ExecCommandRunner, truncateLog } from './command-runner.js';
export { IosSimulatorDriver, findSimulatorState } from './ios-simulator.js';
export { AndroidEmulatorDriver, findFreeEmulatorPort, type AndroidEmulatorOptions } from './android-emulator.js';
