/**
 * Default wiring of the job executor against real tools
 */

import type { Env } from '../../config/env.js';
import { getConfig } from '../../config/env.js';
import { AppiumServerController } from '../appium-server/appium-server.js';
import { AndroidEmulatorDriver } from '../device-management/android-emulator.js';
import { ExecCommandRunner } from '../device-management/command-runner.js';
import { IosSimulatorDriver } from '../device-management/ios-simulator.js';
import { WebDriverSessionFactory } from '../driver-session/driver-session.js';
import { JobExecutor } from '../job-execution/job-executor.js';
import { ProcessRegistry } from '../process-registry/registry.js';
import type { RunConfig } from '../run-config/types.js';
import type { RunPlan } from '../run-plan/types.js';
import { Orchestrator } from './orchestrator.js';
import type { RunOverrides, RunResult } from './types.js';

/**
 * Job executor using xcrun, adb, the emulator binary and Appium
 */
export function createJobExecutor(registry: ProcessRegistry, env: Env = getConfig()): JobExecutor {
  const commandRunner = new ExecCommandRunner();
  return new JobExecutor({
    iosDriver: new IosSimulatorDriver(commandRunner),
    androidDriver: new AndroidEmulatorDriver(commandRunner, { androidHome: env.ANDROID_HOME }),
    serverController: new AppiumServerController({
      host: env.APPIUM_HOST,
      appiumPath: env.APPIUM_PATH,
      startupTimeout: env.APPIUM_STARTUP_TIMEOUT,
      debugOutput: env.APPIUM_DEBUG_OUTPUT,
    }),
    sessionFactory: new WebDriverSessionFactory(),
    registry,
  });
}

/**
 * Run a plan with the default executor. Resources are registered with the
 * given registry; draining it stays with the caller.
 */
export function execute(
  plan: RunPlan,
  config: RunConfig,
  overrides: RunOverrides = {},
  signal?: AbortSignal,
  registry: ProcessRegistry = new ProcessRegistry()
): Promise<RunResult> {
  const env = getConfig();
  const orchestrator = new Orchestrator(createJobExecutor(registry, env));
  return orchestrator.execute(plan, config, { ...overrides, maxParallel: overrides.maxParallel ?? env.MAX_PARALLEL }, signal);
}
