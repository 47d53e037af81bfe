#!/usr/bin/env node
/**
 * Insight Service Test Harness
 *
 * End-to-end through the public entry point: input validation, startup
 * configuration errors, statistics and telemetry, keyword coverage on a mixed
 * pair, and the emergency tier when neither content nor fallback entries exist.
 */

import {
  createMemoryLogger,
  IndexedContentStore,
  InsightConfigError,
  InsightService,
  InvalidInsightContextError,
  parseInsightContext,
  type InsightGeneratedEvent,
  type InsightServiceOptions,
} from '../src';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function assertTrue(condition: boolean, label: string): void {
  if (!condition) throw new Error(`Expected ${label}`);
}

async function expectRejection<E extends Error>(
  work: () => Promise<unknown>,
  type: new (...args: never[]) => E,
  label: string
): Promise<E> {
  try {
    await work();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`Expected ${label} to throw ${type.name}`);
}

const ORACLE_1_2_EMERGENCY =
  'Your soul carries the sacred gift of leadership and initiative, and the cosmic current now turns it toward cooperation and harmony. ' +
  'Take one small step today that honors both.';

async function run(): Promise<void> {
  const { logger, records } = createMemoryLogger('service');
  const events: InsightGeneratedEvent[] = [];
  const base: InsightServiceOptions = {
    overrides: { qualityGate: { attemptTimeoutMs: 1_000, totalTimeoutMs: 3_000 } },
    logger,
  };

  const service = await InsightService.create({
    ...base,
    telemetry: { emit: (event) => { events.push(event); } },
    clock: { now: () => 42 },
  });
  const threshold = service.config.qualityGate.minimumQualityThreshold;
  assertEqual(service.fallbackBank.size, 10, 'bundled fallback bank');

  // ── Happy path ──
  const result = await service.generate(1, 2, 'Oracle', null, { seed: 'service-seed' });
  assertTrue(result.finalScore >= threshold, `score ${result.finalScore} at or above threshold`);
  assertTrue(result.text.length > 0, 'non-empty text');
  assertEqual(result.persona, 'Oracle', 'persona');
  assertEqual(result.numberA, 1, 'numberA');
  assertEqual(result.numberB, 2, 'numberB');
  assertEqual(result.totalDurationMs, 0, 'duration under a frozen clock');

  assertEqual(events.length, 1, 'telemetry events');
  assertEqual(events[0]?.at, 42, 'event stamped by the service clock');
  assertEqual(events[0]?.strategyUsed, result.strategyUsed, 'event strategy');
  assertEqual(events[0]?.finalScore, result.finalScore, 'event score');

  const repeat = await service.generate(1, 2, 'Oracle', null, { seed: 'service-seed' });
  if (result.successPath === 'generation') assertEqual(repeat.text, result.text, 'seeded repeat');

  // ── Persona spelling and tags are normalized at the boundary ──
  const coach = await service.generate(4, 6, 'mindfulness coach', 'Career');
  assertEqual(coach.persona, 'MindfulnessCoach', 'normalized persona');
  assertTrue(coach.finalScore >= threshold, 'tagged request clears the gate');

  // ── Invalid input throws before the pipeline runs ──
  const badNumber = await expectRejection(() => service.generate(0, 2, 'Oracle'), InvalidInsightContextError, 'number 0');
  assertEqual(badNumber.field, 'numberA', 'bad number field');
  assertEqual(badNumber.message, 'numberA must be an integer from 1 to 9, got 0', 'bad number message');
  const badFraction = await expectRejection(() => service.generate(3, 2.5, 'Oracle'), InvalidInsightContextError, 'number 2.5');
  assertEqual(badFraction.field, 'numberB', 'fraction field');
  const badPersona = await expectRejection(() => service.generate(3, 4, 'Sage'), InvalidInsightContextError, 'unknown persona');
  assertEqual(badPersona.field, 'persona', 'bad persona field');
  assertEqual(badPersona.code, 'invalid_context', 'error code');

  // ── Statistics ──
  const stats = service.statistics();
  assertEqual(stats.totalRequests, 3, 'only valid requests counted');
  assertEqual(stats.personaUsage.Oracle, 2, 'Oracle requests');
  assertEqual(stats.personaUsage.MindfulnessCoach, 1, 'coach requests');
  assertEqual(stats.topCombinations[0]?.key, 'Oracle:1-2', 'most used combination');
  assertEqual(stats.generationSuccesses + stats.fallbackUses + stats.emergencyUses, 3, 'paths add up');
  service.resetStatistics();
  assertEqual(service.statistics().totalRequests, 0, 'statistics reset');

  // ── Bundled corpus: a mixed pair is answered by generation and covers both numbers ──
  const mixed = await service.generate(3, 7, 'Oracle', null, { seed: 'scenario-one' });
  assertEqual(mixed.usedFallback, false, '3-7 generated');
  assertEqual(mixed.successPath, 'generation', '3-7 path');
  assertTrue(mixed.finalScore >= threshold, `3-7 score ${mixed.finalScore} at or above threshold`);
  const report = service.evaluator.explain(mixed.text, parseInsightContext({ numberA: 3, numberB: 7, persona: 'Oracle' }));
  assertTrue((report.keywordHits[3]?.length ?? 0) > 0, `creativity keywords in "${mixed.text}"`);
  assertTrue((report.keywordHits[7]?.length ?? 0) > 0, `introspection keywords in "${mixed.text}"`);

  // ── Telemetry failures never reach the caller ──
  const noisy = await InsightService.create({
    ...base,
    telemetry: { emit: () => { throw new Error('sink offline'); } },
  });
  const delivered = await noisy.generate(5, 5, 'Psychologist');
  assertTrue(delivered.finalScore >= threshold, 'delivered despite telemetry failure');
  assertTrue(records.some(r => r.level === 'warn' && r.message === 'Telemetry sink failed: sink offline'), 'telemetry failure logged');

  // ── Nothing to compose and nothing in the bank: emergency tier ──
  const bare = await InsightService.create({
    ...base,
    contentStore: IndexedContentStore.fromRecords([], { logger }),
    fallbackRecords: [],
  });
  const emergency = await bare.generate(1, 2, 'Oracle');
  assertEqual(emergency.successPath, 'emergency', 'emergency path');
  assertEqual(emergency.text, ORACLE_1_2_EMERGENCY, 'emergency text');
  assertEqual(emergency.fallbackReason, 'content_unavailable', 'emergency reason');
  assertEqual(emergency.attemptsUsed, 3, 'emergency attempts');
  assertEqual(
    emergency.attempts.map(a => a.failureReason ?? 'ok').join(','),
    'content_unavailable,fallback_exhausted,ok',
    'emergency trail'
  );
  assertEqual(bare.statistics().emergencyRate, 1, 'emergency rate');

  // ── Configuration defects surface at startup ──
  const configError = await expectRejection(
    () => InsightService.create({ ...base, overrides: { qualityGate: { maxRetryAttempts: 4 } } }),
    InsightConfigError,
    'too many retries for the strategy list'
  );
  assertEqual(configError.key, 'qualityGate.strategyOrder', 'config error key');

  console.log('Insight service test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
