/**
 * Rotation state for the fallback bank: last-use stamps per entry id.
 *
 * Claims are serialized through a promise queue, so two concurrent requests
 * for the same key always receive different entries when the key has more
 * than one. Stamps strictly increase even when the clock does not.
 */

import type { Clock } from './types';

export type RotationClaim = {
  id: string;
  lastUsedAt: number;
};

export interface RotationStore {
  /** Picks the least recently used id (never-used first, ties by list order) and stamps it. */
  claimOldest(entryIds: readonly string[]): Promise<RotationClaim | null>;
  lastUsedAt(id: string): number | undefined;
}

export class InMemoryRotationStore implements RotationStore {
  private readonly stamps = new Map<string, number>();
  private lastStamp = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly clock: Clock,
    private readonly capacity = 10_000
  ) {}

  claimOldest(entryIds: readonly string[]): Promise<RotationClaim | null> {
    return this.runExclusive(() => {
      let best: string | null = null;
      let bestStamp = Number.POSITIVE_INFINITY;
      for (const id of entryIds) {
        const stamp = this.stamps.get(id) ?? Number.NEGATIVE_INFINITY;
        if (stamp < bestStamp) {
          best = id;
          bestStamp = stamp;
        }
      }
      if (best === null) return null;

      const stamp = Math.max(this.clock.now(), this.lastStamp + 1);
      this.lastStamp = stamp;
      // re-insert so Map order tracks recency for eviction
      this.stamps.delete(best);
      this.stamps.set(best, stamp);
      this.evict();
      return { id: best, lastUsedAt: stamp };
    });
  }

  lastUsedAt(id: string): number | undefined {
    return this.stamps.get(id);
  }

  get size(): number {
    return this.stamps.size;
  }

  private evict(): void {
    for (const id of this.stamps.keys()) {
      if (this.stamps.size <= this.capacity) return;
      this.stamps.delete(id);
    }
  }

  private runExclusive<T>(fn: () => T): Promise<T> {
    const run = this.queue.then(fn);
    this.queue = run.catch(() => undefined);
    return run;
  }
}
