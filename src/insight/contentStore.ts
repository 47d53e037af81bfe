/**
 * Content store: read-only fragments indexed by (persona, number).
 *
 * Records are validated once when the store is built. Malformed fragments are
 * logged and left out of the index; they never reach the selector.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { ContentStoreError } from './errors';
import type { Logger } from './logger';
import { isCoreNumber, isPersonaId } from './context';
import { countWords, findMalformations, splitSentences } from './text';
import type { ContentFragment, CoreNumber, PersonaId } from './types';
import { isRecord } from './utils';

export interface ContentStore {
  readonly release: string;
  fetchFragments(persona: PersonaId, n: CoreNumber): Promise<readonly ContentFragment[]>;
}

export const DEFAULT_CORPUS_PATH = fileURLToPath(new URL('../../data/corpus/content-fragments.v1.json', import.meta.url));

const MIN_FRAGMENT_WORDS = 6;
const MAX_FRAGMENT_WORDS = 40;

export type FragmentRejection = {
  id: string;
  reason: string;
};

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

type FragmentCheck = { ok: true; fragment: ContentFragment } | { ok: false; rejection: FragmentRejection };

export function checkFragment(raw: unknown, index: number): FragmentCheck {
  const reject = (id: string, reason: string): FragmentCheck => ({ ok: false, rejection: { id, reason } });
  if (!isRecord(raw)) return reject(`#${index}`, 'not an object');

  const id = typeof raw.id === 'string' && raw.id.trim() ? raw.id.trim() : `#${index}`;
  if (id.startsWith('#')) return reject(id, 'missing id');
  if (!isPersonaId(raw.persona)) return reject(id, `unknown persona ${JSON.stringify(raw.persona)}`);
  if (!isCoreNumber(raw.associatedNumber)) return reject(id, `associatedNumber out of range: ${JSON.stringify(raw.associatedNumber)}`);
  if (typeof raw.category !== 'string' || !raw.category.trim()) return reject(id, 'missing category');
  if (typeof raw.text !== 'string') return reject(id, 'missing text');

  const intensity = raw.intensity === undefined ? 0.5 : raw.intensity;
  if (typeof intensity !== 'number' || intensity < 0 || intensity > 1) return reject(id, 'intensity must be within [0, 1]');

  const tagsRaw = raw.tags === undefined ? [] : raw.tags;
  if (!Array.isArray(tagsRaw) || !tagsRaw.every(t => typeof t === 'string')) return reject(id, 'tags must be a list of strings');

  const text = raw.text.trim();
  const words = countWords(text);
  if (words < MIN_FRAGMENT_WORDS || words > MAX_FRAGMENT_WORDS) {
    return reject(id, `text has ${words} words, expected ${MIN_FRAGMENT_WORDS}-${MAX_FRAGMENT_WORDS}`);
  }
  if (splitSentences(text).length !== 1) return reject(id, 'text must be a single sentence');
  const malformations = findMalformations(text);
  if (malformations.length) return reject(id, `malformed text (${malformations.join(', ')})`);

  const tags: string[] = tagsRaw.map(t => String(t).trim().toLowerCase()).filter(Boolean);
  return {
    ok: true,
    fragment: Object.freeze({
      id,
      persona: raw.persona,
      associatedNumber: raw.associatedNumber,
      category: raw.category.trim(),
      text,
      intensity,
      tags: Object.freeze(tags),
    }),
  };
}

// ─────────────────────────────────────────────────────────────
// In-memory indexed store
// ─────────────────────────────────────────────────────────────

function indexKey(persona: PersonaId, n: CoreNumber): string {
  return `${persona}:${n}`;
}

export class IndexedContentStore implements ContentStore {
  readonly release: string;
  readonly rejected: readonly FragmentRejection[];
  private readonly index = new Map<string, readonly ContentFragment[]>();
  private readonly total: number;

  private constructor(release: string, fragments: readonly ContentFragment[], rejected: readonly FragmentRejection[]) {
    this.release = release;
    this.rejected = rejected;
    this.total = fragments.length;
    const buckets = new Map<string, ContentFragment[]>();
    for (const fragment of fragments) {
      const key = indexKey(fragment.persona, fragment.associatedNumber);
      const bucket = buckets.get(key) ?? [];
      bucket.push(fragment);
      buckets.set(key, bucket);
    }
    for (const [key, bucket] of buckets) this.index.set(key, Object.freeze(bucket));
  }

  /** Validates every record; duplicates and malformed records are logged and excluded. */
  static fromRecords(records: readonly unknown[], options: { release?: string; logger: Logger }): IndexedContentStore {
    const { logger } = options;
    const fragments: ContentFragment[] = [];
    const rejected: FragmentRejection[] = [];
    const seen = new Set<string>();

    records.forEach((raw, i) => {
      const result = checkFragment(raw, i);
      if (!result.ok) {
        rejected.push(result.rejection);
        logger.warn(`Excluded malformed fragment ${result.rejection.id}: ${result.rejection.reason}`);
        return;
      }
      if (seen.has(result.fragment.id)) {
        const rejection = { id: result.fragment.id, reason: 'duplicate id' };
        rejected.push(rejection);
        logger.warn(`Excluded malformed fragment ${rejection.id}: ${rejection.reason}`);
        return;
      }
      seen.add(result.fragment.id);
      fragments.push(result.fragment);
    });

    logger.info(`Content store ready: ${fragments.length} fragments, ${rejected.length} excluded`);
    return new IndexedContentStore(options.release ?? 'inline', fragments, rejected);
  }

  get size(): number {
    return this.total;
  }

  async fetchFragments(persona: PersonaId, n: CoreNumber): Promise<readonly ContentFragment[]> {
    return this.index.get(indexKey(persona, n)) ?? [];
  }
}

// ─────────────────────────────────────────────────────────────
// File loading
// ─────────────────────────────────────────────────────────────

export async function loadContentStore(options: { path?: string; logger: Logger }): Promise<IndexedContentStore> {
  const path = options.path ?? DEFAULT_CORPUS_PATH;
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ContentStoreError(`Cannot read content corpus at ${path}`, { cause: err });
  }
  if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.fragments)) {
    throw new ContentStoreError(`Content corpus at ${path} is not a version 1 fragment file`);
  }
  const release = typeof parsed.release === 'string' ? parsed.release : 'unversioned';
  return IndexedContentStore.fromRecords(parsed.fragments, { release, logger: options.logger });
}
