/**
 * ABOUTME: Stagnation circuit breaker.
 * Keeps a bounded window of recent workspace fingerprints and reports
 * 'stagnant' once a full window of identical fingerprints sees the same one again.
 */

import { fingerprintsEqual, type WorkspaceFingerprint } from '../workspace/fingerprint.js';

export type ProgressSignal = 'progressing' | 'stagnant';

/**
 * Fixed-capacity ring buffer; inserting into a full window evicts the oldest entry.
 */
export class StagnationWindow<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  push(item: T): void {
    if (this.isFull) {
      this.items.shift();
    }
    this.items.push(item);
  }

  every(predicate: (item: T) => boolean): boolean {
    return this.items.every(predicate);
  }
}

export class ProgressTracker {
  private readonly window: StagnationWindow<WorkspaceFingerprint>;

  constructor(threshold: number) {
    this.window = new StagnationWindow(threshold);
  }

  /**
   * Feed one fingerprint. A stagnant observation is not inserted, so
   * repeating it keeps returning 'stagnant'.
   */
  observe(fingerprint: WorkspaceFingerprint): ProgressSignal {
    if (this.window.isFull && this.window.every((seen) => fingerprintsEqual(seen, fingerprint))) {
      return 'stagnant';
    }
    this.window.push(fingerprint);
    return 'progressing';
  }
}
