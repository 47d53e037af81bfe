/**
 * Selector: ranks a persona's fragments for the two numbers and picks a
 * small, diverse candidate set for one composition attempt.
 *
 * Ranking = keyword match + depth indicators + persona voice + semantic
 * similarity (weights from config). Scoring runs in concurrent batches with
 * the deadline checked between batches; a partial ranking is still returned.
 * The cache holds tag-independent terms per persona/pair; the situational tag
 * boost is applied on every read.
 */

import type { InsightConfig } from '../config';
import type { ContentStore } from '../contentStore';
import { contextNumbers } from '../context';
import type { Logger } from '../logger';
import { ScoreCache, type ScoreCacheStats } from '../scoreCache';
import { BagOfWordsScorer, cosine, termVector, type SimilarityScorer, type TermVector } from '../similarity';
import {
  systemClock,
  type CandidateSet,
  type Clock,
  type ContentFragment,
  type CoreNumber,
  type InsightContext,
  type PersonaId,
  type RankedFragment,
  type ScoredFragment,
} from '../types';
import { clamp01, roundScore } from '../utils';
import type { Vocabulary } from '../vocabulary';

const KEYWORD_SATURATION = 2;
const DEPTH_SATURATION = 2;
const VOICE_SATURATION = 2;

// pair similarity blend used for diversity
const PAIR_TEXT_WEIGHT = 0.5;
const PAIR_CATEGORY_WEIGHT = 0.3;
const PAIR_NUMBER_WEIGHT = 0.2;

export type SelectorOptions = {
  config: InsightConfig['selector'];
  store: ContentStore;
  vocabulary: Vocabulary;
  logger: Logger;
  similarity?: SimilarityScorer;
  clock?: Clock;
};

export type SelectOptions = {
  signal?: AbortSignal;
};

export interface CandidateSelector {
  select(context: InsightContext, options?: SelectOptions): Promise<CandidateSet>;
}

type ScoringPass = {
  scored: ScoredFragment[];
  complete: boolean;
};

function byRankDesc(a: RankedFragment, b: RankedFragment): number {
  return (b.rank - a.rank) || a.fragment.id.localeCompare(b.fragment.id);
}

export class Selector implements CandidateSelector {
  private readonly config: InsightConfig['selector'];
  private readonly store: ContentStore;
  private readonly vocabulary: Vocabulary;
  private readonly logger: Logger;
  private readonly scorer: SimilarityScorer;
  private readonly clock: Clock;
  private readonly cache: ScoreCache;
  private readonly vectors = new WeakMap<ContentFragment, TermVector>();

  constructor(options: SelectorOptions) {
    this.config = options.config;
    this.store = options.store;
    this.vocabulary = options.vocabulary;
    this.logger = options.logger;
    this.scorer = options.similarity ?? new BagOfWordsScorer(options.vocabulary.stopwords);
    this.clock = options.clock ?? systemClock;
    this.cache = new ScoreCache(options.config.scoreCacheTtlMs, this.clock);
  }

  async select(context: InsightContext, options: SelectOptions = {}): Promise<CandidateSet> {
    const numbers = contextNumbers(context);
    const key = cacheKey(context);

    const cached = this.cache.get(key);
    if (cached) {
      return {
        kind: 'selected',
        candidates: this.diversify(this.rankAll(cached, context.situationalTag)),
        totalCandidates: cached.length,
        timedOut: false,
        fromCache: true,
      };
    }

    const pools = await Promise.all(numbers.map(n => this.store.fetchFragments(context.persona, n)));
    const fragments = pools.flat();
    const [first] = fragments;
    if (!first) {
      this.logger.debug(`No fragments for ${context.persona} ${numbers.join('-')}`);
      return { kind: 'content_unavailable', persona: context.persona, numbers };
    }

    const pass = await this.scoreAll(fragments, context.persona, numbers, options.signal);
    if (pass.complete) {
      this.cache.set(key, pass.scored);
    } else {
      this.logger.debug(`Selector deadline hit after ranking ${pass.scored.length}/${fragments.length} fragments`);
    }
    // never empty: with nothing ranked in time, fall back to the first fragment
    const ranked = pass.scored.length ? this.rankAll(pass.scored, context.situationalTag) : [{ fragment: first, rank: 0 }];

    return {
      kind: 'selected',
      candidates: this.diversify(ranked),
      totalCandidates: fragments.length,
      timedOut: !pass.complete,
      fromCache: false,
    };
  }

  /** Ranks and caches every persona × number pair given. Returns the number of pairs warmed. */
  async prewarm(personas: readonly PersonaId[], numbers: readonly CoreNumber[]): Promise<number> {
    let warmed = 0;
    for (const persona of personas) {
      for (const numberA of numbers) {
        for (const numberB of numbers) {
          const result = await this.select({ numberA, numberB, persona, situationalTag: null });
          if (result.kind === 'selected') warmed++;
        }
      }
    }
    this.logger.info(`Selector cache prewarmed: ${warmed} pairs`);
    return warmed;
  }

  clearCache(): void {
    this.cache.clear();
  }

  cacheStats(): ScoreCacheStats {
    return this.cache.stats();
  }

  // ─────────────────────────────────────────────────────────────
  // Ranking
  // ─────────────────────────────────────────────────────────────

  private referenceText(numbers: readonly CoreNumber[]): string {
    return numbers
      .flatMap(n => {
        const theme = this.vocabulary.theme(n);
        return [theme.label, ...theme.keywords.map(k => k.term)];
      })
      .join(' ');
  }

  private async scoreAll(
    fragments: readonly ContentFragment[],
    persona: PersonaId,
    numbers: readonly CoreNumber[],
    signal: AbortSignal | undefined
  ): Promise<ScoringPass> {
    const deadline = this.clock.now() + this.config.timeoutMs;
    const reference = this.referenceText(numbers);
    const scored: ScoredFragment[] = [];

    for (let i = 0; i < fragments.length; i += this.config.batchSize) {
      if (signal?.aborted || this.clock.now() >= deadline) {
        return { scored, complete: false };
      }
      const batch = fragments.slice(i, i + this.config.batchSize);
      scored.push(...(await Promise.all(batch.map(f => this.scoreFragment(f, persona, reference)))));
    }
    return { scored, complete: true };
  }

  private async scoreFragment(fragment: ContentFragment, persona: PersonaId, reference: string): Promise<ScoredFragment> {
    return {
      fragment,
      keywordHits: this.vocabulary.keywordHits(fragment.text, fragment.associatedNumber).length,
      depthIndicator: Math.min(1, this.vocabulary.depthHits(fragment.text).length / DEPTH_SATURATION),
      personaVoiceMatch: Math.min(1, this.vocabulary.markerHits(fragment.text, persona).length / VOICE_SATURATION),
      semanticSimilarity: clamp01(await this.scorer.similarity(fragment.text, reference)),
    };
  }

  /** Weighted rank per fragment; a fragment carrying the tag counts it as one more keyword hit. */
  private rankAll(scored: readonly ScoredFragment[], tag: string | null): RankedFragment[] {
    const w = this.config.rankingWeights;
    return scored
      .map(s => {
        const tagBoost = tag && s.fragment.tags.includes(tag) ? 1 : 0;
        const keywordMatch = Math.min(1, (s.keywordHits + tagBoost) / KEYWORD_SATURATION);
        const rank =
          w.keywordMatch * keywordMatch +
          w.depthIndicator * s.depthIndicator +
          w.personaVoiceMatch * s.personaVoiceMatch +
          w.semanticSimilarity * s.semanticSimilarity;
        return { fragment: s.fragment, rank: roundScore(rank) };
      })
      .sort(byRankDesc);
  }

  // ─────────────────────────────────────────────────────────────
  // Diversity
  // ─────────────────────────────────────────────────────────────

  private vectorFor(fragment: ContentFragment): TermVector {
    const existing = this.vectors.get(fragment);
    if (existing) return existing;
    const vector = termVector(fragment.text, this.vocabulary.stopwords);
    this.vectors.set(fragment, vector);
    return vector;
  }

  pairSimilarity(a: ContentFragment, b: ContentFragment): number {
    const text = cosine(this.vectorFor(a), this.vectorFor(b));
    const sameCategory = a.category === b.category ? 1 : 0;
    const sameNumber = a.associatedNumber === b.associatedNumber ? 1 : 0;
    return PAIR_TEXT_WEIGHT * text + PAIR_CATEGORY_WEIGHT * sameCategory + PAIR_NUMBER_WEIGHT * sameNumber;
  }

  /**
   * Greedy pick over the ranking: once the minimum count is met, a candidate
   * too similar to one already chosen is skipped. Final order blends rank
   * with novelty.
   */
  diversify(ranked: readonly RankedFragment[]): RankedFragment[] {
    const { minCandidates, maxCandidates, diversityThreshold, relevanceWeight, diversityWeight } = this.config;
    const chosen: Array<{ item: RankedFragment; maxSim: number; order: number }> = [];

    for (const item of ranked) {
      if (chosen.length >= maxCandidates) break;
      let maxSim = 0;
      for (const c of chosen) maxSim = Math.max(maxSim, this.pairSimilarity(item.fragment, c.item.fragment));
      if (maxSim > diversityThreshold && chosen.length >= minCandidates) continue;
      chosen.push({ item, maxSim, order: chosen.length });
    }

    const combined = (c: { item: RankedFragment; maxSim: number }): number =>
      relevanceWeight * c.item.rank + diversityWeight * (1 - c.maxSim);
    return chosen
      .sort((a, b) => (combined(b) - combined(a)) || (a.order - b.order))
      .map(c => c.item);
  }
}

function cacheKey(context: InsightContext): string {
  return `${context.persona}:${context.numberA}-${context.numberB}`;
}
