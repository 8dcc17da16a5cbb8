/**
 * Deterministic port allocation for parallel jobs
 *
 * Each job gets a block of `portOffset` ports starting at
 * `basePort + index * portOffset`; the first three are reserved.
 */

import { PortRangeError } from '../run-config/errors.js';
import { CONFIG_DEFAULTS } from '../run-config/types.js';
import type { PortAllocation } from './types.js';

export const MIN_PORT = 1024;
export const MAX_PORT = 65535;
export const MAX_PORT_OFFSET = 100;

/** Ports reserved per job: automation, iOS auxiliary, Android auxiliary */
export const PORTS_PER_JOB = 3;

export class PortAllocator {
  readonly basePort: number;
  readonly portOffset: number;

  constructor(basePort: number = CONFIG_DEFAULTS.basePort, portOffset: number = CONFIG_DEFAULTS.portOffset) {
    if (!Number.isInteger(basePort) || basePort < MIN_PORT || basePort > MAX_PORT) {
      throw new PortRangeError(`Base port must be between ${MIN_PORT} and ${MAX_PORT}, got ${basePort}`);
    }
    if (!Number.isInteger(portOffset) || portOffset < PORTS_PER_JOB || portOffset > MAX_PORT_OFFSET) {
      throw new PortRangeError(
        `Port offset must be between ${PORTS_PER_JOB} and ${MAX_PORT_OFFSET}, got ${portOffset}`
      );
    }
    this.basePort = basePort;
    this.portOffset = portOffset;
  }

  /**
   * Ports for the job at a zero-based index
   */
  allocate(jobIndex: number): PortAllocation {
    if (!Number.isInteger(jobIndex) || jobIndex < 0) {
      throw new PortRangeError(`Job index must be a non-negative integer, got ${jobIndex}`);
    }

    const jobPortBase = this.basePort + jobIndex * this.portOffset;
    if (jobPortBase + this.portOffset > MAX_PORT) {
      throw new PortRangeError(
        `Port allocation for job ${jobIndex} exceeds ${MAX_PORT} (base ${this.basePort}, offset ${this.portOffset})`
      );
    }

    return {
      automationPort: jobPortBase,
      iosAuxPort: jobPortBase + 1,
      androidAuxPort: jobPortBase + 2,
    };
  }

  /**
   * Number of jobs that fit before the port range runs out
   */
  maxParallelJobs(): number {
    return Math.floor((MAX_PORT - this.basePort) / this.portOffset);
  }

  /**
   * True when no port appears in more than one allocation
   */
  static validateAllocations(allocations: Iterable<PortAllocation>): boolean {
    const used = new Set<number>();
    for (const allocation of allocations) {
      for (const port of [allocation.automationPort, allocation.iosAuxPort, allocation.androidAuxPort]) {
        if (used.has(port)) {
          return false;
        }
        used.add(port);
      }
    }
    return true;
  }
}
