#!/usr/bin/env node
/**
 * Content Store Test Harness
 *
 * Malformed fragments are logged and excluded at the store boundary; the
 * bundled corpus loads clean and is indexed by persona and number.
 */

import {
  ContentStoreError,
  createMemoryLogger,
  IndexedContentStore,
  loadContentStore,
  PERSONA_IDS,
  CORE_NUMBERS,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function fragment(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    persona: 'Oracle',
    associatedNumber: 1,
    category: 'insight',
    text: 'Your soul carries a spark of leadership and quiet courage.',
    ...overrides,
  };
}

async function run(): Promise<void> {
  const { logger, records } = createMemoryLogger('content');
  const store = IndexedContentStore.fromRecords(
    [
      fragment('f-ok', { tags: ['Career ', 'daily'] }),
      fragment('f-range', { associatedNumber: 10 }),
      fragment('f-persona', { persona: 'Trickster' }),
      fragment('f-trailing', { text: 'Your soul carries a spark of leadership and courage and.' }),
      fragment('f-two', { text: 'Lead with courage. Trust your initiative today.' }),
      fragment('f-ok'),
      fragment('f-short', { text: 'Lead now.' }),
      'oops',
    ],
    { release: 'test', logger }
  );

  assertEqual(store.size, 1, 'indexed fragment count');
  assertEqual(store.release, 'test', 'release');
  assertEqual(store.rejected.length, 7, 'rejected count');
  const reasons = new Map(store.rejected.map(r => [r.id, r.reason]));
  assertEqual(reasons.get('f-range'), 'associatedNumber out of range: 10', 'out-of-range reason');
  assertEqual(reasons.get('f-persona'), 'unknown persona "Trickster"', 'unknown persona reason');
  assertEqual(reasons.get('f-trailing'), 'malformed text (trailing_conjunction)', 'trailing conjunction reason');
  assertEqual(reasons.get('f-two'), 'text must be a single sentence', 'two sentences reason');
  assertEqual(reasons.get('f-ok'), 'duplicate id', 'duplicate reason');
  assertEqual(reasons.get('f-short'), 'text has 2 words, expected 6-40', 'short reason');
  assertEqual(reasons.get('#7'), 'not an object', 'non-object reason');

  const warnings = records.filter(r => r.level === 'warn');
  assertEqual(warnings.length, 7, 'warning count');
  assertEqual(warnings[0]?.message, 'Excluded malformed fragment f-range: associatedNumber out of range: 10', 'first warning');
  assertEqual(records.at(-1)?.message, 'Content store ready: 1 fragments, 7 excluded', 'summary line');

  const [kept] = await store.fetchFragments('Oracle', 1);
  assertEqual(kept?.id, 'f-ok', 'kept fragment');
  assertEqual(kept?.tags.join(','), 'career,daily', 'normalized tags');
  assertEqual(kept?.intensity, 0.5, 'default intensity');
  assertEqual(Object.isFrozen(kept), true, 'fragment frozen');
  assertEqual((await store.fetchFragments('Oracle', 2)).length, 0, 'empty bucket');
  assertEqual((await store.fetchFragments('Psychologist', 1)).length, 0, 'other persona bucket');

  // Bundled corpus: every persona has three fragments per number, none excluded
  const bundled = await loadContentStore({ logger: createMemoryLogger().logger });
  assertEqual(bundled.release, '2025.09', 'bundled release');
  assertEqual(bundled.rejected.length, 0, 'bundled rejections');
  assertEqual(bundled.size, 135, 'bundled size');
  for (const persona of PERSONA_IDS) {
    for (const n of CORE_NUMBERS) {
      const fragments = await bundled.fetchFragments(persona, n);
      assertEqual(fragments.length, 3, `${persona} ${n} fragment count`);
    }
  }

  let threw = false;
  try {
    await loadContentStore({ path: '/nonexistent/corpus.json', logger });
  } catch (err) {
    threw = err instanceof ContentStoreError && err.code === 'content_store_unreadable';
  }
  assertEqual(threw, true, 'missing corpus throws ContentStoreError');

  console.log('Content store test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
