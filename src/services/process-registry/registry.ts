/**
 * Registry of spawned emulators, simulators and automation servers
 */

import { createModuleLogger, type Logger } from '../../utils/logger.js';
import { DEFAULT_DRAIN_TIMEOUT_MS, type DrainResult, type ManagedResource } from './types.js';

export class ProcessRegistry {
  private resources = new Map<string, ManagedResource>();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createModuleLogger('process-registry');
  }

  register(id: string, resource: ManagedResource): void {
    if (this.resources.has(id)) {
      this.logger.warn({ id }, 'Replacing registered resource with the same id');
    }
    this.resources.set(id, resource);
    this.logger.debug({ id, kind: resource.kind, count: this.resources.size }, 'Registered resource');
  }

  /**
   * Forget a resource without stopping it. Returns false if it was not registered.
   */
  unregister(id: string): boolean {
    const removed = this.resources.delete(id);
    if (removed) {
      this.logger.debug({ id, count: this.resources.size }, 'Unregistered resource');
    }
    return removed;
  }

  has(id: string): boolean {
    return this.resources.has(id);
  }

  get size(): number {
    return this.resources.size;
  }

  ids(): string[] {
    return [...this.resources.keys()];
  }

  /**
   * Stop every registered resource in parallel, bounded by a timeout, then
   * clear the registry
   */
  async drain(timeoutMs: number = DEFAULT_DRAIN_TIMEOUT_MS): Promise<DrainResult> {
    const entries = [...this.resources.entries()];
    this.resources.clear();

    const result: DrainResult = { stopped: [], failed: [], timedOut: [] };
    if (entries.length === 0) {
      return result;
    }

    this.logger.info({ count: entries.length, timeoutMs }, 'Stopping registered resources');

    const pending = new Set(entries.map(([id]) => id));
    const stops = entries.map(async ([id, resource]) => {
      try {
        await resource.stop();
        result.stopped.push(id);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        result.failed.push({ id, error: message });
        this.logger.warn({ id, error: message }, 'Failed to stop resource');
      } finally {
        pending.delete(id);
      }
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    const outcome = await Promise.race([Promise.all(stops).then(() => 'done' as const), timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      result.timedOut = [...pending];
      this.logger.error({ timedOut: result.timedOut, timeoutMs }, 'Resource cleanup timed out');
    } else {
      this.logger.info({ stopped: result.stopped.length, failed: result.failed.length }, 'Resource cleanup finished');
    }

    return result;
  }
}
