#!/usr/bin/env node
/**
 * Fallback Bank Test Harness
 *
 * Load-time rejection of entries the gate would not accept, least-recently
 * used rotation with strictly increasing stamps, persona variants, and
 * serialized claims under concurrency.
 */

import {
  createMemoryLogger,
  defaultVocabulary,
  FallbackBank,
  InMemoryRotationStore,
  loadFallbackBank,
  loadInsightConfig,
  parseInsightContext,
  type Clock,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

const BASE_A = 'Wisdom and creativity meet in you today. Write down one question you keep returning to and give it ten quiet minutes.';
const ORACLE_A = 'Your soul joins ancient wisdom with sacred creativity today. Take one quiet hour to write what the stars stir in you.';
const BASE_B = 'Curiosity about truth can open new creative doors. Choose one small idea this week and give it a full afternoon.';
const PASSIVE = 'Wisdom and creativity can meet in surprising ways. There is room for both in the days ahead of you.';

function entry(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { id, numberA: 3, numberB: 7, qualityScore: 0.9, baseText: BASE_A, tags: ['growth'], ...overrides };
}

async function run(): Promise<void> {
  const config = loadInsightConfig();
  const vocabulary = defaultVocabulary();
  const { logger, records } = createMemoryLogger('fallback');
  const now = 5_000;
  const clock: Clock = { now: () => now };

  const bankOptions = (rotation: InMemoryRotationStore) => ({
    minimumQualityThreshold: config.qualityGate.minimumQualityThreshold,
    structure: config.evaluator.structure,
    vocabulary,
    rotation,
    logger,
  });
  const records37 = [
    entry('fb-a', { personaVariants: { Oracle: ORACLE_A } }),
    entry('fb-b', { baseText: BASE_B, qualityScore: 0.88 }),
    entry('fb-low', { qualityScore: 0.7 }),
    entry('fb-passive', { baseText: PASSIVE }),
    entry('fb-short', { baseText: 'Take a breath.' }),
    entry('fb-variant', { personaVariants: { Trickster: ORACLE_A } }),
    entry('fb-range', { numberA: 0 }),
    entry('fb-a'),
  ];

  const rotation = new InMemoryRotationStore(clock);
  const bank = FallbackBank.fromRecords(records37, bankOptions(rotation));

  assertEqual(bank.size, 2, 'accepted entries');
  const reasons = new Map(bank.rejected.map(r => [r.id, r.reason]));
  assertEqual(reasons.get('fb-low'), 'qualityScore 0.7 is below the gate threshold 0.85', 'low score reason');
  assertEqual(reasons.get('fb-passive'), 'base text has no directive', 'no directive reason');
  assertEqual(reasons.get('fb-short'), 'base text has 3 words', 'short reason');
  assertEqual(reasons.get('fb-variant'), 'unknown persona variant "Trickster"', 'unknown variant reason');
  assertEqual(reasons.get('fb-range'), 'numbers must be integers from 1 to 9', 'range reason');
  assertEqual(reasons.get('fb-a'), 'duplicate id', 'duplicate reason');
  assertEqual(
    records.find(r => r.level === 'warn')?.message,
    'Excluded fallback entry fb-low: qualityScore 0.7 is below the gate threshold 0.85',
    'first warning'
  );
  assertEqual(records.at(-1)?.message, 'Fallback bank ready: 2 entries, 6 excluded', 'summary line');

  // Rotation: never-used first, then least recently used
  const oracle = parseInsightContext({ numberA: 3, numberB: 7, persona: 'Oracle' });
  const psych = parseInsightContext({ numberA: 3, numberB: 7, persona: 'Psychologist' });

  const first = await bank.claim(oracle);
  assertEqual(first?.entry.id, 'fb-a', 'first claim');
  assertEqual(first?.text, ORACLE_A, 'persona variant text');
  assertEqual(first?.usedVariant, true, 'variant used');
  assertEqual(first?.lastUsedAt, 5_000, 'first stamp');

  const second = await bank.claim(psych);
  assertEqual(second?.entry.id, 'fb-b', 'second claim takes the unused entry');
  assertEqual(second?.text, BASE_B, 'base text without a variant');
  assertEqual(second?.usedVariant, false, 'no variant');
  assertEqual(second?.lastUsedAt, 5_001, 'stamp increases under a frozen clock');

  const third = await bank.claim(psych);
  assertEqual(third?.entry.id, 'fb-a', 'third claim returns to the oldest');
  assertEqual(third?.text, BASE_A, 'base text for a persona without a variant');
  assertEqual(rotation.lastUsedAt('fb-a'), 5_002, 'stamp recorded');

  assertEqual(await bank.claim(parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' })), null, 'no entry for key');
  assertEqual(bank.entriesFor(7, 3).length, 0, 'keys are ordered pairs');

  // Concurrent claims on one key get different entries
  const fresh = FallbackBank.fromRecords(records37.slice(0, 2), bankOptions(new InMemoryRotationStore(clock)));
  const [x, y] = await Promise.all([fresh.claim(oracle), fresh.claim(psych)]);
  if (!x || !y) throw new Error('Expected both concurrent claims to succeed');
  if (x.entry.id === y.entry.id) throw new Error(`Concurrent claims both received ${x.entry.id}`);
  if (y.lastUsedAt <= x.lastUsedAt) throw new Error('Expected strictly increasing stamps across concurrent claims');

  // Rotation store evicts beyond capacity
  const small = new InMemoryRotationStore(clock, 1);
  await small.claimOldest(['x']);
  await small.claimOldest(['y']);
  assertEqual(small.size, 1, 'bounded rotation size');
  assertEqual(small.lastUsedAt('x'), undefined, 'oldest stamp evicted');
  assertEqual(await small.claimOldest([]), null, 'empty id list');

  // Bundled bank loads clean
  const bundled = await loadFallbackBank(bankOptions(new InMemoryRotationStore(clock)));
  assertEqual(bundled.rejected.length, 0, 'bundled rejections');
  assertEqual(bundled.size, 10, 'bundled size');
  assertEqual(bundled.entriesFor(1, 1).length, 2, 'bundled 1-1 entries');
  for (const e of bundled.entriesFor(1, 1)) {
    if (e.qualityScore < config.qualityGate.minimumQualityThreshold) throw new Error(`${e.id} below threshold`);
  }

  console.log('Fallback bank test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
