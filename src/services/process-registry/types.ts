/**
 * Process registry types
 */

export type ManagedResourceKind = 'automation-server' | 'ios-simulator' | 'android-emulator';

/**
 * A long-lived external resource that must be stopped before the process exits
 */
export interface ManagedResource {
  readonly id: string;
  readonly kind: ManagedResourceKind;
  stop(): Promise<void>;
}

export interface DrainResult {
  /** Resources stopped cleanly */
  stopped: string[];

  /** Resources whose stop rejected */
  failed: Array<{ id: string; error: string }>;

  /** Resources still stopping when the timeout expired */
  timedOut: string[];
}

export const DEFAULT_DRAIN_TIMEOUT_MS = 30000;
