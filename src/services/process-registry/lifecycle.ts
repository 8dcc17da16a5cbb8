/**
 * Process exit hooks that drain the registry
 */

import { createModuleLogger, type Logger } from '../../utils/logger.js';
import type { ProcessRegistry } from './registry.js';
import { DEFAULT_DRAIN_TIMEOUT_MS } from './types.js';

type SignalListener = (signal: NodeJS.Signals) => void;
type FaultListener = (error: unknown) => void;

/**
 * The part of `process` the hooks subscribe to
 */
export interface LifecycleEventSource {
  on(event: 'SIGINT' | 'SIGTERM', listener: SignalListener): unknown;
  on(event: 'uncaughtException', listener: FaultListener): unknown;
  on(event: 'unhandledRejection', listener: FaultListener): unknown;
  off(event: 'SIGINT' | 'SIGTERM', listener: SignalListener): unknown;
  off(event: 'uncaughtException', listener: FaultListener): unknown;
  off(event: 'unhandledRejection', listener: FaultListener): unknown;
}

export interface LifecycleHookOptions {
  /** Called on the first SIGINT/SIGTERM so the run can wind down on its own */
  onCancel: (signal: NodeJS.Signals) => void;
  timeoutMs?: number;
  exit?: (code: number) => void;
  /** Defaults to the current process */
  target?: LifecycleEventSource;
  logger?: Logger;
}

const SIGNAL_EXIT_CODE = 130;
const FAULT_EXIT_CODE = 1;

/**
 * Wire SIGINT, SIGTERM and process faults to the registry. The first
 * signal cancels the run; a second signal or any fault drains the
 * registry and exits. Returns a function that removes the hooks.
 */
export function installLifecycleHooks(registry: ProcessRegistry, options: LifecycleHookOptions): () => void {
  const target: LifecycleEventSource = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const timeoutMs = options.timeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  const logger = options.logger ?? createModuleLogger('lifecycle');

  let cancelled = false;
  let shuttingDown = false;

  const drainAndExit = async (reason: string, code: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.warn({ reason, resources: registry.size }, 'Shutting down, stopping registered resources');
    try {
      const result = await registry.drain(timeoutMs);
      if (result.failed.length > 0 || result.timedOut.length > 0) {
        logger.error({ failed: result.failed, timedOut: result.timedOut }, 'Some resources could not be stopped');
      }
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Registry drain failed');
    } finally {
      exit(code);
    }
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    if (!cancelled) {
      cancelled = true;
      logger.warn({ signal }, 'Received signal, cancelling run (repeat to force exit)');
      options.onCancel(signal);
      return;
    }
    void drainAndExit(signal, SIGNAL_EXIT_CODE);
  };

  const onFault = (error: unknown): void => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled fault');
    void drainAndExit('fault', FAULT_EXIT_CODE);
  };

  target.on('SIGINT', onSignal);
  target.on('SIGTERM', onSignal);
  target.on('uncaughtException', onFault);
  target.on('unhandledRejection', onFault);

  return () => {
    target.off('SIGINT', onSignal);
    target.off('SIGTERM', onSignal);
    target.off('uncaughtException', onFault);
    target.off('unhandledRejection', onFault);
  };
}
