/**
 * Per-(persona, number pair) cache of scored fragments with a TTL.
 * Expired entries are never served; they are dropped on read and swept on write.
 */

import type { Clock, ScoredFragment } from './types';

type CacheEntry = {
  scored: readonly ScoredFragment[];
  storedAt: number;
};

export type ScoreCacheStats = {
  entries: number;
  hits: number;
  misses: number;
  expired: number;
  hitRate: number;
};

export class ScoreCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private expired = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock
  ) {}

  get(key: string): readonly ScoredFragment[] | null {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return null;
    }
    if (this.clock.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return null;
    }
    this.hits++;
    return entry.scored;
  }

  set(key: string, scored: readonly ScoredFragment[]): void {
    if (this.ttlMs <= 0) return;
    const now = this.clock.now();
    for (const [k, entry] of this.entries) {
      if (now - entry.storedAt >= this.ttlMs) {
        this.entries.delete(k);
        this.expired++;
      }
    }
    this.entries.set(key, { scored, storedAt: now });
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.expired = 0;
  }

  stats(): ScoreCacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      expired: this.expired,
      hitRate: lookups ? this.hits / lookups : 0,
    };
  }
}
