/**
 * Curated fallback bank: pre-scored passages keyed by number pair, rotated
 * least-recently-used first through a `RotationStore`.
 *
 * Entries are checked at load. One whose curated score is under the gate's
 * threshold, or whose text would fail the gate's structure or directive
 * checks, is logged and left out.
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { StructureBounds } from '../config';
import { isCoreNumber, isPersonaId, numberPairKey } from '../context';
import { ContentStoreError } from '../errors';
import type { Logger } from '../logger';
import type { RotationStore } from '../rotationStore';
import { countWords, findMalformations } from '../text';
import type { CoreNumber, FallbackEntry, FallbackSelection, InsightContext, PersonaId } from '../types';
import { isRecord } from '../utils';
import type { Vocabulary } from '../vocabulary';

export const DEFAULT_FALLBACK_PATH = fileURLToPath(new URL('../../../data/fallback-bank.v1.json', import.meta.url));

export type FallbackRejection = {
  id: string;
  reason: string;
};

export type FallbackBankOptions = {
  minimumQualityThreshold: number;
  structure: StructureBounds;
  vocabulary: Vocabulary;
  rotation: RotationStore;
  logger: Logger;
};

type EntryCheck = { ok: true; entry: FallbackEntry } | { ok: false; rejection: FallbackRejection };

function checkEntry(raw: unknown, index: number, options: FallbackBankOptions): EntryCheck {
  const reject = (id: string, reason: string): EntryCheck => ({ ok: false, rejection: { id, reason } });
  if (!isRecord(raw)) return reject(`#${index}`, 'not an object');
  const id = typeof raw.id === 'string' && raw.id.trim() ? raw.id.trim() : '';
  if (!id) return reject(`#${index}`, 'missing id');
  if (!isCoreNumber(raw.numberA) || !isCoreNumber(raw.numberB)) return reject(id, 'numbers must be integers from 1 to 9');
  if (typeof raw.baseText !== 'string') return reject(id, 'missing baseText');
  if (typeof raw.qualityScore !== 'number' || raw.qualityScore < 0 || raw.qualityScore > 1) {
    return reject(id, 'qualityScore must be within [0, 1]');
  }
  if (raw.qualityScore < options.minimumQualityThreshold) {
    return reject(id, `qualityScore ${raw.qualityScore} is below the gate threshold ${options.minimumQualityThreshold}`);
  }

  const variantsRaw = raw.personaVariants === undefined ? {} : raw.personaVariants;
  if (!isRecord(variantsRaw)) return reject(id, 'personaVariants must be a mapping');
  const personaVariants: Partial<Record<PersonaId, string>> = {};
  const texts: Array<[string, string]> = [['base', raw.baseText.trim()]];
  for (const [persona, text] of Object.entries(variantsRaw)) {
    if (!isPersonaId(persona)) return reject(id, `unknown persona variant "${persona}"`);
    if (typeof text !== 'string') return reject(id, `variant for ${persona} is not text`);
    personaVariants[persona] = text.trim();
    texts.push([persona, text.trim()]);
  }

  for (const [label, text] of texts) {
    const words = countWords(text);
    if (words < options.structure.minWords || words > options.structure.maxWords) {
      return reject(id, `${label} text has ${words} words`);
    }
    const malformations = findMalformations(text);
    if (malformations.length) return reject(id, `${label} text is malformed (${malformations.join(', ')})`);
    if (!options.vocabulary.hasDirectiveClause(text)) return reject(id, `${label} text has no directive`);
  }

  const tags = Array.isArray(raw.tags) ? raw.tags.filter((t): t is string => typeof t === 'string') : [];
  return {
    ok: true,
    entry: Object.freeze({
      id,
      numberPairKey: numberPairKey(raw.numberA, raw.numberB),
      baseText: raw.baseText.trim(),
      personaVariants: Object.freeze(personaVariants),
      qualityScore: raw.qualityScore,
      tags: Object.freeze(tags),
    }),
  };
}

export class FallbackBank {
  readonly rejected: readonly FallbackRejection[];
  private readonly byKey: ReadonlyMap<string, readonly FallbackEntry[]>;
  private readonly byId: ReadonlyMap<string, FallbackEntry>;
  private readonly rotation: RotationStore;
  private readonly logger: Logger;

  private constructor(entries: readonly FallbackEntry[], rejected: readonly FallbackRejection[], options: FallbackBankOptions) {
    this.rejected = rejected;
    this.rotation = options.rotation;
    this.logger = options.logger;
    const byKey = new Map<string, FallbackEntry[]>();
    const byId = new Map<string, FallbackEntry>();
    for (const entry of entries) {
      const bucket = byKey.get(entry.numberPairKey) ?? [];
      bucket.push(entry);
      byKey.set(entry.numberPairKey, bucket);
      byId.set(entry.id, entry);
    }
    this.byKey = byKey;
    this.byId = byId;
  }

  static fromRecords(records: readonly unknown[], options: FallbackBankOptions): FallbackBank {
    const entries: FallbackEntry[] = [];
    const rejected: FallbackRejection[] = [];
    const seen = new Set<string>();
    records.forEach((raw, i) => {
      const result = checkEntry(raw, i, options);
      const rejection = result.ok
        ? (seen.has(result.entry.id) ? { id: result.entry.id, reason: 'duplicate id' } : null)
        : result.rejection;
      if (rejection) {
        rejected.push(rejection);
        options.logger.warn(`Excluded fallback entry ${rejection.id}: ${rejection.reason}`);
        return;
      }
      if (result.ok) {
        seen.add(result.entry.id);
        entries.push(result.entry);
      }
    });
    options.logger.info(`Fallback bank ready: ${entries.length} entries, ${rejected.length} excluded`);
    return new FallbackBank(entries, rejected, options);
  }

  get size(): number {
    return this.byId.size;
  }

  entriesFor(a: CoreNumber, b: CoreNumber): readonly FallbackEntry[] {
    return this.byKey.get(numberPairKey(a, b)) ?? [];
  }

  /** Takes the least recently used entry for `A-B` and marks it used. Null when the key has none. */
  async claim(context: InsightContext): Promise<FallbackSelection | null> {
    const entries = this.entriesFor(context.numberA, context.numberB);
    if (!entries.length) return null;
    const claimed = await this.rotation.claimOldest(entries.map(e => e.id));
    const entry = claimed ? this.byId.get(claimed.id) : undefined;
    if (!claimed || !entry) return null;

    const variant = entry.personaVariants[context.persona];
    this.logger.debug(`Fallback ${entry.id} claimed for ${context.persona}${variant ? ' (persona variant)' : ''}`);
    return {
      entry,
      text: variant ?? entry.baseText,
      usedVariant: variant !== undefined,
      lastUsedAt: claimed.lastUsedAt,
    };
  }
}

export async function loadFallbackBank(options: FallbackBankOptions & { path?: string }): Promise<FallbackBank> {
  const path = options.path ?? DEFAULT_FALLBACK_PATH;
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new ContentStoreError(`Cannot read fallback bank at ${path}`, { cause: err });
  }
  if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.entries)) {
    throw new ContentStoreError(`Fallback bank at ${path} is not a version 1 entry file`);
  }
  return FallbackBank.fromRecords(parsed.entries, options);
}
