#!/usr/bin/env node
/**
 * Composer Test Harness
 *
 * Seeded determinism, strategy framing and word caps, trimming at sentence
 * boundaries, and the phrase-map paraphrase.
 */

import {
  Composer,
  countWords,
  createMemoryLogger,
  defaultVocabulary,
  facetSeed,
  loadContentStore,
  loadInsightConfig,
  makeRng,
  paraphrase,
  parseInsightContext,
  Selector,
  type GenerationStrategy,
  type InsightContext,
  type SelectedCandidates,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function assertTrue(condition: boolean, label: string): void {
  if (!condition) throw new Error(`Expected ${label}`);
}

async function run(): Promise<void> {
  const config = loadInsightConfig();
  const vocabulary = defaultVocabulary();
  const { logger } = createMemoryLogger('composer');
  const store = await loadContentStore({ logger });
  const selector = new Selector({ config: config.selector, store, vocabulary, logger });
  const composer = new Composer({ config: config.composer, vocabulary });

  const selectFor = async (context: InsightContext): Promise<SelectedCandidates> => {
    const set = await selector.select(context);
    if (set.kind !== 'selected') throw new Error('Expected a selected set');
    return set;
  };
  const rngFor = (seed: string, strategy: GenerationStrategy) => makeRng(facetSeed(seed, `compose:${strategy}`));

  const context = parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' });
  const set = await selectFor(context);
  const candidateIds = new Set(set.candidates.map(c => c.fragment.id));
  const voice = vocabulary.voice('Oracle');
  const renderOpening = (template: string): string =>
    template.replaceAll('#themeA#', vocabulary.label(1)).replaceAll('#themeB#', vocabulary.label(2));
  const pairOpenings = voice.grammar.openingPair.map(renderOpening);

  // ── Determinism ──
  const a = composer.compose(set, 'enhanced', context, rngFor('seed-a', 'enhanced'));
  const b = composer.compose(set, 'enhanced', context, rngFor('seed-a', 'enhanced'));
  assertEqual(a.text, b.text, 'same seed, same passage');
  assertEqual(a.sourceFragmentIds.join(','), b.sourceFragmentIds.join(','), 'same seed, same sources');

  const variety = new Set<string>();
  for (let i = 0; i < 12; i++) variety.add(composer.compose(set, 'enhanced', context, rngFor(`seed-${i}`, 'enhanced')).text);
  assertTrue(variety.size > 1, 'different seeds vary the passage');

  // ── Enhanced: framed, capped at 60 words ──
  assertEqual(a.strategy, 'enhanced', 'enhanced strategy tag');
  assertTrue(countWords(a.text) <= config.composer.strategies.enhanced.maxWords, 'enhanced word cap');
  assertTrue(pairOpenings.some(o => a.text.startsWith(o)), 'enhanced opens with a persona opening');
  assertTrue(voice.grammar.closing.some(c => a.text.endsWith(c)), 'enhanced ends with a persona closing');
  assertTrue(a.sourceFragmentIds.every(id => candidateIds.has(id)), 'enhanced draws only from the candidate set');

  // ── Strict: tighter cap ──
  for (let i = 0; i < 6; i++) {
    const strict = composer.compose(set, 'strict', context, rngFor(`strict-${i}`, 'strict'));
    assertTrue(countWords(strict.text) <= config.composer.strategies.strict.maxWords, `strict word cap (seed ${i})`);
    assertTrue(strict.sourceFragmentIds.length <= config.composer.strategies.strict.bodyFragments, 'strict body size');
  }

  // ── Pure: no opening, body kept ──
  const pure = composer.compose(set, 'pure', context, rngFor('seed-a', 'pure'));
  assertEqual(pure.strategy, 'pure', 'pure strategy tag');
  assertTrue(!pairOpenings.some(o => pure.text.startsWith(o)), 'pure has no opening');
  assertTrue(pure.sourceFragmentIds.length >= 1, 'pure keeps at least one body fragment');
  assertTrue(vocabulary.hasDirectiveClause(pure.text), 'pure carries a directive');

  // ── Trimming drops trailing body fragments ──
  const tight = new Composer({
    config: { strategies: { ...config.composer.strategies, enhanced: { ...config.composer.strategies.enhanced, maxWords: 30 } } },
    vocabulary,
  });
  const trimmed = tight.compose(set, 'enhanced', context, rngFor('seed-a', 'enhanced'));
  assertEqual(trimmed.sourceFragmentIds.length, 0, 'every body fragment trimmed');
  assertTrue(countWords(trimmed.text) <= 30, 'trimmed passage under the cap');

  // ── Single number uses the single-number openings ──
  const single = parseInsightContext({ numberA: 7, numberB: 7, persona: 'Oracle' });
  const skeleton = composer.renderSkeleton(voice, single, makeRng(7));
  const singleOpenings = voice.grammar.openingSingle.map(t => t.replaceAll('#themeA#', vocabulary.label(7)));
  assertTrue(singleOpenings.includes(skeleton.opening), 'single-number opening');

  // ── Paraphrase ──
  assertEqual(paraphrase('The path reveals itself quietly.', voice.phraseMap), 'The road unveils itself softly.', 'phrase swaps');
  assertEqual(paraphrase('Path first, then the rest.', voice.phraseMap), 'Road first, then the rest.', 'capitalized swap');
  assertEqual(paraphrase('A footpath stays put.', voice.phraseMap), 'A footpath stays put.', 'whole words only');

  console.log('Composer test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
