/**
 * Process registry
 *
 * Tracks emulators, simulators and automation servers started during a
 * run so they can be stopped on exit, cancellation or crash.
 */

export { ProcessRegistry } from './registry.js';
export { installLifecycleHooks, type LifecycleEventSource, type LifecycleHookOptions } from './lifecycle.js';
export {
  ManagedAutomationServer,
  ManagedIosSimulator,
  ManagedAndroidEmulator,
  resourceIds,
} from './managed-resources.js';
export * from './types.js';
