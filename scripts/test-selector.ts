#!/usr/bin/env node
/**
 * Selector Test Harness
 *
 * Ranking weights, tag boost, greedy diversity, the score cache TTL and the
 * time-bounded partial ranking (including the size-1 degradation).
 */

import {
  createMemoryLogger,
  defaultVocabulary,
  IndexedContentStore,
  loadContentStore,
  loadInsightConfig,
  parseInsightContext,
  Selector,
  type Clock,
  type SimilarityScorer,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

const BRIGHT = 'Your soul glows with creativity and sacred joy tonight.';
const DIM = 'Sometimes quiet doubts crowd out the usual inspiration.';

const constantScorer: SimilarityScorer = { similarity: async () => 0.5 };

async function run(): Promise<void> {
  const config = loadInsightConfig();
  const vocabulary = defaultVocabulary();
  const { logger, records } = createMemoryLogger('selector');
  let now = 1_000;
  const clock: Clock = { now: () => now };

  // ── Ranking: exact weighted sums with a constant semantic score ──
  const controlled = IndexedContentStore.fromRecords(
    [
      { id: 'c-1', persona: 'Oracle', associatedNumber: 3, category: 'insight', text: BRIGHT },
      { id: 'c-2', persona: 'Oracle', associatedNumber: 3, category: 'tension', text: DIM, tags: ['challenge'] },
    ],
    { logger }
  );
  const ranker = new Selector({ config: config.selector, store: controlled, vocabulary, logger, similarity: constantScorer, clock });

  const plain = await ranker.select(parseInsightContext({ numberA: 3, numberB: 3, persona: 'Oracle' }));
  if (plain.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(plain.candidates.map(c => c.fragment.id).join(','), 'c-1,c-2', 'ranked order');
  // 0.30·1 + 0.20·1 + 0.20·1 + 0.30·0.5
  assertEqual(plain.candidates[0]?.rank, 0.85, 'full-coverage rank');
  // 0.30·0.5 + 0.30·0.5
  assertEqual(plain.candidates[1]?.rank, 0.3, 'weak rank');

  const tagged = await ranker.select(parseInsightContext({ numberA: 3, numberB: 3, persona: 'Oracle', situationalTag: 'challenge' }));
  if (tagged.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(tagged.candidates[1]?.fragment.id, 'c-2', 'tagged fragment position');
  assertEqual(tagged.candidates[1]?.rank, 0.45, 'tag boost lifts keyword match');
  assertEqual(tagged.fromCache, true, 'tagged request reuses the untagged scores');

  // ── Free-form tags share one cache entry per persona/pair ──
  for (const tag of ['career', 'love', 'a tag nobody has used before', 'challenge ']) {
    const result = await ranker.select(parseInsightContext({ numberA: 3, numberB: 3, persona: 'Oracle', situationalTag: tag }));
    if (result.kind !== 'selected') throw new Error('Expected a selected set');
    assertEqual(result.fromCache, true, `cached for tag "${tag}"`);
  }
  assertEqual(ranker.cacheStats().entries, 1, 'one entry for the pair');
  const untaggedAgain = await ranker.select(parseInsightContext({ numberA: 3, numberB: 3, persona: 'Oracle' }));
  if (untaggedAgain.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(untaggedAgain.candidates[1]?.rank, 0.3, 'boost not carried into later reads');

  // ── Diversity: near-duplicates are skipped once the minimum is met ──
  const dupes = IndexedContentStore.fromRecords(
    [
      ...['d-1', 'd-2', 'd-3', 'd-4'].map(id => ({ id, persona: 'Oracle', associatedNumber: 3, category: 'insight', text: BRIGHT })),
      { id: 'd-x', persona: 'Oracle', associatedNumber: 3, category: 'practice', text: DIM },
    ],
    { logger }
  );
  const diverse = new Selector({ config: config.selector, store: dupes, vocabulary, logger, similarity: constantScorer, clock });
  const spread = await diverse.select(parseInsightContext({ numberA: 3, numberB: 3, persona: 'Oracle' }));
  if (spread.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(spread.candidates.map(c => c.fragment.id).join(','), 'd-1,d-2,d-3,d-x', 'diverse selection');
  assertEqual(spread.totalCandidates, 5, 'total candidates');

  // ── No fragments for the persona/pair ──
  const missing = await ranker.select(parseInsightContext({ numberA: 4, numberB: 8, persona: 'Oracle' }));
  assertEqual(missing.kind, 'content_unavailable', 'unavailable marker');
  if (missing.kind === 'content_unavailable') assertEqual(missing.numbers.join(','), '4,8', 'unavailable numbers');

  // ── Bundled corpus: set size, cache and TTL ──
  const store = await loadContentStore({ logger });
  const selector = new Selector({ config: config.selector, store, vocabulary, logger, clock });
  const context = parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' });

  const first = await selector.select(context);
  if (first.kind !== 'selected') throw new Error('Expected a selected set');
  const size = first.candidates.length;
  if (size < config.selector.minCandidates || size > config.selector.maxCandidates) {
    throw new Error(`Candidate set size ${size} outside ${config.selector.minCandidates}-${config.selector.maxCandidates}`);
  }
  assertEqual(first.totalCandidates, 6, 'pair pool size');
  assertEqual(first.fromCache, false, 'first pass uncached');
  assertEqual(first.timedOut, false, 'first pass complete');
  for (const c of first.candidates) {
    assertEqual(c.fragment.persona, 'Oracle', `${c.fragment.id} persona`);
    if (c.fragment.associatedNumber !== 1 && c.fragment.associatedNumber !== 2) {
      throw new Error(`${c.fragment.id} belongs to neither number`);
    }
  }

  const second = await selector.select(context);
  if (second.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(second.fromCache, true, 'second pass cached');
  assertEqual(
    second.candidates.map(c => c.fragment.id).join(','),
    first.candidates.map(c => c.fragment.id).join(','),
    'cached selection matches'
  );

  now += config.selector.scoreCacheTtlMs;
  const third = await selector.select(context);
  if (third.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(third.fromCache, false, 'expired entry recomputed');
  assertEqual(selector.cacheStats().expired, 1, 'expired count');

  // ── Deadline: partial ranking, then size-1 degradation ──
  const slowScorer: SimilarityScorer = {
    similarity: async () => {
      now += 30;
      return 0.5;
    },
  };
  const hurried = new Selector({
    config: { ...config.selector, batchSize: 1, timeoutMs: 50 },
    store,
    vocabulary,
    logger,
    similarity: slowScorer,
    clock,
  });
  const partial = await hurried.select(context);
  if (partial.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(partial.timedOut, true, 'partial pass timed out');
  assertEqual(partial.candidates.length, 2, 'two fragments ranked before the deadline');
  assertEqual(partial.totalCandidates, 6, 'partial pool size');
  assertEqual(hurried.cacheStats().entries, 0, 'partial ranking not cached');

  const controller = new AbortController();
  controller.abort();
  const degraded = await hurried.select(context, { signal: controller.signal });
  if (degraded.kind !== 'selected') throw new Error('Expected a selected set');
  assertEqual(degraded.candidates.length, 1, 'size-1 degradation');
  assertEqual(degraded.candidates[0]?.fragment.id, 'oracle-1-insight', 'degraded set keeps the first fragment');
  assertEqual(degraded.candidates[0]?.rank, 0, 'unranked fallback fragment');

  // ── Prewarm ──
  selector.clearCache();
  const warmed = await selector.prewarm(['Oracle', 'Philosopher'], [1, 2]);
  assertEqual(warmed, 8, 'warmed pairs');
  assertEqual(selector.cacheStats().entries, 8, 'cache entries after prewarm');
  assertEqual(records.at(-1)?.message, 'Selector cache prewarmed: 8 pairs', 'prewarm log line');

  console.log('Selector test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
