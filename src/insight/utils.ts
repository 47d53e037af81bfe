/**
 * Insight Gate Utility Functions
 *
 * Pure helpers shared by the pipeline stages:
 * - Clamping and score rounding
 * - Seedable RNG (mulberry32 over an FNV-1a seed hash)
 * - Small string helpers
 */

import { randomBytes } from 'crypto';

// ============================================================================
// RNG Type
// ============================================================================

export type Rng = {
  next01: () => number;
  pick: <T>(items: readonly T[]) => T;
  pickK: <T>(items: readonly T[], k: number) => T[];
};

// ============================================================================
// Clamping Functions
// ============================================================================

export function clamp01(value: number, fallback = 0): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(0, Math.min(1, value));
}

/** Scores are compared against thresholds after rounding to 4 places. */
export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

// ============================================================================
// RNG Functions
// ============================================================================

export function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeRng(seed: number): Rng {
  const next = mulberry32(seed);
  return {
    next01: () => next(),
    pick: (items) => {
      const item = items[Math.floor(next() * items.length)];
      if (item === undefined) throw new Error('Rng.pick called with an empty list');
      return item;
    },
    pickK: (items, k) => {
      const copy = [...items];
      for (let i = copy.length - 1; i > 0; i--) {
        const j = Math.floor(next() * (i + 1));
        const a = copy[i];
        const b = copy[j];
        if (a === undefined || b === undefined) continue;
        copy[i] = b;
        copy[j] = a;
      }
      return copy.slice(0, Math.max(0, Math.min(k, copy.length)));
    },
  };
}

export function facetSeed(seed: string, facet: string): number {
  return fnv1a32(`${seed}::${facet}`);
}

export function normalizeSeed(seed: string): string {
  return seed.trim().replace(/\s+/g, ' ').slice(0, 200);
}

export function randomSeedString(): string {
  let n = 0n;
  for (const b of randomBytes(8)) n = (n << 8n) | BigInt(b);
  return n.toString(36);
}

// ============================================================================
// String helpers
// ============================================================================

export function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function capitalizeFirst(input: string): string {
  if (!input) return input;
  return input.charAt(0).toUpperCase() + input.slice(1);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}
