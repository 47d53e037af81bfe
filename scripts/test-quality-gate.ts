#!/usr/bin/env node
/**
 * Quality Gate Test Harness
 *
 * Drives the retry loop with scripted stages: acceptance on the first and a
 * later attempt, fallback after low scores, the emergency tier when the bank
 * has nothing, unavailable content, stage errors, per-attempt and total
 * time budgets, and cancellation. Every path must still return a passage at
 * or above the threshold.
 */

import {
  Composer,
  countWords,
  createMemoryLogger,
  defaultVocabulary,
  EmergencyTemplates,
  Evaluator,
  facetSeed,
  FallbackBank,
  IndexedContentStore,
  InMemoryRotationStore,
  loadContentStore,
  loadFallbackBank,
  loadInsightConfig,
  makeRng,
  parseInsightContext,
  QualityGate,
  Selector,
  strategyForAttempt,
  type CandidateSelector,
  type CandidateSet,
  type Clock,
  type GenerationResult,
  type PassageEvaluator,
  type QualityGateOptions,
  type QualityScore,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function assertTrue(condition: boolean, label: string): void {
  if (!condition) throw new Error(`Expected ${label}`);
}

function scoreOf(overall: number): QualityScore {
  return { overall, subscores: { relevance: overall, voice: overall, structure: overall, actionability: 1, safety: 1 } };
}

/** Returns the scripted scores in order, repeating the last one. */
function scriptedEvaluator(...scores: number[]): PassageEvaluator & { calls: number } {
  const evaluator = {
    calls: 0,
    evaluate(): QualityScore {
      const overall = scores[Math.min(evaluator.calls, scores.length - 1)] ?? 0;
      evaluator.calls++;
      return scoreOf(overall);
    },
  };
  return evaluator;
}

/** Resolves only after `delayMs`; rejects as soon as the attempt signal aborts. */
function slowSelector(delayMs: number): CandidateSelector & { aborts: number } {
  const selector = {
    aborts: 0,
    select(_context: unknown, options: { signal?: AbortSignal } = {}): Promise<CandidateSet> {
      return new Promise<CandidateSet>((resolve, reject) => {
        const timer = setTimeout(() => resolve({ kind: 'content_unavailable', persona: 'Oracle', numbers: [1] }), delayMs);
        options.signal?.addEventListener('abort', () => {
          clearTimeout(timer);
          selector.aborts++;
          reject(new Error('attempt aborted'));
        }, { once: true });
      });
    },
  };
  return selector;
}

const failureReasons = (result: GenerationResult): string =>
  result.attempts.map(a => a.failureReason ?? 'ok').join(',');

const strategies = (result: GenerationResult): string =>
  result.attempts.map(a => a.strategy).join(',');

const ORACLE_1_1_VARIANT =
  'Your soul carries a double measure of leadership and initiative under these sacred stars. ' +
  'Choose one decision you have been delaying and make it before noon.';
const BASE_1_1_B =
  'Independence and courage are asking to be used rather than admired. ' +
  'Take the first step on a plan you have kept waiting and tell one person about it.';
const ORACLE_1_2_EMERGENCY =
  'Your soul carries the sacred gift of leadership and initiative, and the cosmic current now turns it toward cooperation and harmony. ' +
  'Take one small step today that honors both.';

async function run(): Promise<void> {
  const config = loadInsightConfig({ overrides: { qualityGate: { attemptTimeoutMs: 1_000, totalTimeoutMs: 3_000 } } });
  const threshold = config.qualityGate.minimumQualityThreshold;
  const vocabulary = defaultVocabulary();
  const { logger, records } = createMemoryLogger('gate');
  const store = await loadContentStore({ logger });
  const evaluator = new Evaluator({ config: config.evaluator, vocabulary });
  const emergency = new EmergencyTemplates({ vocabulary, evaluator, minimumQualityThreshold: threshold });
  const composer = new Composer({ config: config.composer, vocabulary });
  const newSelector = (): Selector => new Selector({ config: config.selector, store, vocabulary, logger });

  const bankOptions = () => ({
    minimumQualityThreshold: threshold,
    structure: config.evaluator.structure,
    vocabulary,
    rotation: new InMemoryRotationStore({ now: () => 1_000 }),
    logger,
  });
  const makeGate = async (parts: Partial<QualityGateOptions> = {}): Promise<QualityGate> =>
    new QualityGate({
      config: config.qualityGate,
      selector: newSelector(),
      composer,
      evaluator,
      fallbackBank: await loadFallbackBank(bankOptions()),
      emergency,
      minimumWords: config.evaluator.structure.minWords,
      logger,
      ...parts,
    });

  const oracle12 = parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' });
  const oracle11 = parseInsightContext({ numberA: 1, numberB: 1, persona: 'Oracle' });

  // ── Strategy order ──
  const order = config.qualityGate.strategyOrder;
  assertEqual(order.join(','), 'enhanced,strict,pure', 'configured order');
  assertEqual(strategyForAttempt(1, order), 'enhanced', 'first strategy');
  assertEqual(strategyForAttempt(3, order), 'pure', 'third strategy');
  assertEqual(strategyForAttempt(5, order), 'pure', 'attempts past the list reuse the last');

  // ── Accepted on the first attempt ──
  {
    const gate = await makeGate({ evaluator: scriptedEvaluator(0.9) });
    const result = await gate.run(oracle12, { seed: 'gate-seed' });
    const set = await newSelector().select(oracle12);
    if (set.kind !== 'selected') throw new Error('Expected candidates for Oracle 1-2');
    const expected = composer.compose(set, 'enhanced', oracle12, makeRng(facetSeed('gate-seed', 'compose:enhanced')));

    assertEqual(result.successPath, 'generation', 'first-attempt path');
    assertEqual(result.strategyUsed, 'enhanced', 'first-attempt strategy');
    assertEqual(result.attemptsUsed, 1, 'first-attempt count');
    assertEqual(result.finalScore, 0.9, 'first-attempt score');
    assertEqual(result.grade, 'A', 'first-attempt grade');
    assertEqual(result.usedFallback, false, 'no fallback');
    assertEqual(result.fallbackReason, null, 'no fallback reason');
    assertEqual(result.text, expected.text, 'composed text');
    assertEqual(result.seed, 'gate-seed', 'seed echoed');
    assertTrue(Object.isFrozen(result) && Object.isFrozen(result.attempts), 'frozen result');
  }

  // ── Accepted on a later strategy ──
  {
    const gate = await makeGate({ evaluator: scriptedEvaluator(0.5, 0.88) });
    const result = await gate.run(oracle12, { seed: 'gate-seed' });
    assertEqual(result.strategyUsed, 'strict', 'second-attempt strategy');
    assertEqual(result.attemptsUsed, 2, 'second-attempt count');
    assertEqual(failureReasons(result), 'quality_below_threshold,ok', 'second-attempt reasons');
    assertEqual(result.attempts[0]?.score?.overall, 0.5, 'failed attempt keeps its score');
  }

  // ── A high-scoring passage under the minimum word count is rejected ──
  {
    const terse = IndexedContentStore.fromRecords(
      [{ id: 'short-1', persona: 'Oracle', associatedNumber: 1, category: 'practice', text: 'Take your sacred leadership and soul courage forward.' }],
      { logger }
    );
    const gate = await makeGate({
      selector: new Selector({ config: config.selector, store: terse, vocabulary, logger }),
      config: { ...config.qualityGate, strategyOrder: ['pure', 'enhanced', 'strict'] },
    });
    const result = await gate.run(oracle11, { seed: 'terse' });
    const first = result.attempts[0];
    assertEqual(first?.strategy, 'pure', 'plain attempt first');
    assertEqual(first?.passage?.text, 'Take your sacred leadership and soul courage forward.', 'plain passage is the lone fragment');
    // relevance 1, voice 1, structure 0.25 (too short, one sentence), actionability 1, safety 1
    assertEqual(first?.score?.overall, 0.8875, 'short passage still scores above threshold');
    assertEqual(first?.failureReason, 'quality_below_threshold', 'short passage rejected');
    assertTrue(records.some(r => r.message === 'Attempt 1 (pure) has 8 words, below 12'), 'word count rejection logged');
    assertTrue(countWords(result.text) >= config.evaluator.structure.minWords, `delivered ${countWords(result.text)} words`);
    assertTrue(result.strategyUsed !== 'pure', 'short passage never delivered');
    assertTrue(result.finalScore >= threshold, 'delivered passage clears the gate');
  }

  // ── Every attempt below threshold: curated fallback, rotated ──
  {
    const scripted = scriptedEvaluator(0.5);
    const gate = await makeGate({ evaluator: scripted });
    const first = await gate.run(oracle11, { seed: 'low' });
    assertEqual(scripted.calls, 3, 'every strategy evaluated');
    assertEqual(first.successPath, 'fallback', 'fallback path');
    assertEqual(first.strategyUsed, 'fallback', 'fallback strategy');
    assertEqual(first.usedFallback, true, 'fallback flag');
    assertEqual(first.attemptsUsed, 3, 'fallback counts every retry');
    assertEqual(first.fallbackReason, 'quality_below_threshold', 'fallback reason');
    assertEqual(first.text, ORACLE_1_1_VARIANT, 'persona variant delivered');
    assertEqual(first.finalScore, 0.93, 'curated score');
    assertEqual(first.grade, 'A', 'curated grade');
    assertEqual(strategies(first), 'enhanced,strict,pure,fallback', 'attempt trail');
    assertEqual(first.attempts[3]?.passage?.sourceFragmentIds.join(','), 'fb-1-1-a', 'fallback source');

    const second = await gate.run(oracle11, { seed: 'low' });
    assertEqual(second.text, BASE_1_1_B, 'next request rotates to the other entry');
    assertEqual(second.finalScore, 0.91, 'rotated entry score');
  }

  // ── Concurrent fallbacks on one key receive different entries ──
  {
    const gate = await makeGate({ evaluator: scriptedEvaluator(0.5) });
    const [x, y] = await Promise.all([gate.run(oracle11), gate.run(oracle11)]);
    const ids = [x, y].map(r => r.attempts.at(-1)?.passage?.sourceFragmentIds[0]);
    assertTrue(ids[0] !== ids[1], `distinct concurrent fallback entries (${ids.join(', ')})`);
  }

  // ── Bank has nothing for the key: emergency template ──
  {
    const gate = await makeGate({
      evaluator: scriptedEvaluator(0.5),
      fallbackBank: FallbackBank.fromRecords([], bankOptions()),
    });
    const result = await gate.run(oracle12);
    assertEqual(result.successPath, 'emergency', 'emergency path');
    assertEqual(result.strategyUsed, 'emergency', 'emergency strategy');
    assertEqual(result.text, ORACLE_1_2_EMERGENCY, 'emergency text');
    assertEqual(result.finalScore, 1, 'emergency score');
    assertEqual(result.grade, 'A+', 'emergency grade');
    assertEqual(result.fallbackReason, 'quality_below_threshold', 'last generation failure kept');
    assertEqual(strategies(result), 'enhanced,strict,pure,fallback,emergency', 'emergency trail');
    assertEqual(result.attempts[3]?.failureReason, 'fallback_exhausted', 'exhausted bank recorded');
    assertEqual(records.at(-1)?.message, 'Emergency template used for Oracle 1-2', 'emergency warning');
  }

  // ── Rotation failure degrades to emergency ──
  {
    const brokenRotation = {
      claimOldest: async (): Promise<null> => { throw new Error('rotation offline'); },
      lastUsedAt: (): undefined => undefined,
    };
    const gate = await makeGate({
      evaluator: scriptedEvaluator(0.5),
      fallbackBank: await loadFallbackBank({ ...bankOptions(), rotation: brokenRotation }),
    });
    const result = await gate.run(oracle11);
    assertEqual(result.successPath, 'emergency', 'rotation failure path');
    assertTrue(records.some(r => r.level === 'error' && r.message === 'Fallback rotation failed: rotation offline'), 'rotation error logged');
  }

  // ── No content: one attempt, then straight to fallback ──
  {
    const empty = IndexedContentStore.fromRecords([], { logger });
    const gate = await makeGate({ selector: new Selector({ config: config.selector, store: empty, vocabulary, logger }) });
    const result = await gate.run(oracle11);
    assertEqual(failureReasons(result), 'content_unavailable,ok', 'unavailable trail');
    assertEqual(result.attemptsUsed, 3, 'unavailable still reports every retry');
    assertEqual(result.successPath, 'fallback', 'unavailable path');
    assertEqual(result.fallbackReason, 'content_unavailable', 'unavailable reason');
    assertTrue(result.finalScore >= threshold, 'unavailable result clears the gate');
  }

  // ── A stage that throws costs one attempt ──
  {
    const failing: CandidateSelector = { select: async () => { throw new Error('index offline'); } };
    const gate = await makeGate({ selector: failing });
    const result = await gate.run(oracle11);
    assertEqual(failureReasons(result), 'attempt_error,attempt_error,attempt_error,ok', 'error trail');
    assertEqual(result.successPath, 'fallback', 'error path');
    assertTrue(records.some(r => r.message === 'Attempt 1 (enhanced) failed: index offline'), 'attempt error logged');
  }

  // ── Per-attempt budget: slow stages are abandoned and aborted ──
  {
    const slow = slowSelector(5_000);
    const gate = await makeGate({
      selector: slow,
      config: { ...config.qualityGate, attemptTimeoutMs: 20, totalTimeoutMs: 1_000 },
    });
    const started = Date.now();
    const result = await gate.run(oracle11);
    assertEqual(failureReasons(result), 'timeout,timeout,timeout,ok', 'timeout trail');
    assertEqual(slow.aborts, 3, 'each timed-out attempt aborted');
    assertEqual(result.fallbackReason, 'timeout', 'timeout reason');
    assertTrue(Date.now() - started < 1_000, 'timeouts bound the request');
  }

  // ── Wall-clock bound: a stalled stage never holds a request past the total budget ──
  {
    const slack = 50;
    const budget = { ...config.qualityGate, attemptTimeoutMs: 100, totalTimeoutMs: 200 };
    for (let i = 0; i < 5; i++) {
      const gate = await makeGate({ selector: slowSelector(500), config: budget });
      const result = await gate.run(oracle11);
      assertEqual(result.usedFallback, true, `stalled run ${i} falls back`);
      assertEqual(result.fallbackReason, 'timeout', `stalled run ${i} reason`);
      assertTrue(
        result.totalDurationMs <= budget.totalTimeoutMs + slack,
        `stalled run ${i} took ${result.totalDurationMs}ms, within ${budget.totalTimeoutMs}ms`
      );
    }
  }

  // ── Total budget: no new attempt once it is spent ──
  {
    let now = 0;
    const clock: Clock = { now: () => now };
    const inner = newSelector();
    const costly: CandidateSelector = {
      select: (context, options) => {
        now += 250;
        return inner.select(context, options);
      },
    };
    const gate = await makeGate({
      selector: costly,
      evaluator: scriptedEvaluator(0.5),
      clock,
      config: { ...config.qualityGate, attemptTimeoutMs: 100, totalTimeoutMs: 200 },
    });
    const result = await gate.run(oracle11);
    assertEqual(failureReasons(result), 'quality_below_threshold,timeout,ok', 'total budget trail');
    assertEqual(strategies(result), 'enhanced,strict,fallback', 'total budget strategies');
    assertEqual(result.fallbackReason, 'timeout', 'total budget reason');
    assertEqual(result.totalDurationMs, 250, 'duration from the injected clock');
  }

  // ── Cancellation still returns a safe passage ──
  {
    const gate = await makeGate();
    const controller = new AbortController();
    controller.abort();
    const result = await gate.run(oracle11, { signal: controller.signal });
    assertEqual(failureReasons(result), 'cancelled,ok', 'pre-cancelled trail');
    assertEqual(result.text, ORACLE_1_1_VARIANT, 'pre-cancelled fallback text');
  }
  {
    const slow = slowSelector(5_000);
    const gate = await makeGate({ selector: slow });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const result = await gate.run(oracle11, { signal: controller.signal });
    assertEqual(failureReasons(result), 'cancelled,ok', 'mid-flight cancel trail');
    assertEqual(slow.aborts, 1, 'in-flight stage aborted');
    assertEqual(result.fallbackReason, 'cancelled', 'cancel reason');
  }

  // ── Real stages: deterministic per seed, always at or above threshold ──
  {
    const first = await (await makeGate()).run(oracle12, { seed: 'repeatable' });
    const second = await (await makeGate()).run(oracle12, { seed: 'repeatable' });
    assertEqual(second.text, first.text, 'same seed, same passage');
    assertEqual(second.strategyUsed, first.strategyUsed, 'same seed, same strategy');
    assertTrue(first.finalScore >= threshold, 'real pipeline clears the gate');
    assertTrue(first.text.trim().length > 0, 'real pipeline text');
  }

  console.log('Quality gate test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
