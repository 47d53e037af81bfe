#!/usr/bin/env node
/**
 * Usage Statistics Test Harness
 *
 * Aggregates across tiers, snapshot isolation, reset, and fire-and-forget
 * telemetry whose failures are logged.
 */

import {
  createMemoryLogger,
  dispatchTelemetry,
  summarizeResult,
  UsageStatistics,
  type FailureReason,
  type GenerationAttempt,
  type GenerationResult,
  type InsightGeneratedEvent,
  type StrategyUsed,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function attempt(attemptNumber: number, strategy: StrategyUsed, failureReason?: FailureReason): GenerationAttempt {
  return { attemptNumber, strategy, passage: null, score: null, durationMs: 1, failureReason };
}

const base: GenerationResult = {
  text: 'placeholder',
  finalScore: 0.875,
  grade: 'A-',
  strategyUsed: 'enhanced',
  successPath: 'generation',
  attemptsUsed: 1,
  totalDurationMs: 10,
  usedFallback: false,
  fallbackReason: null,
  persona: 'Oracle',
  numberA: 1,
  numberB: 2,
  seed: 'test-seed',
  attempts: [attempt(1, 'enhanced')],
};

async function run(): Promise<void> {
  const stats = new UsageStatistics();
  stats.record(base);
  stats.record({
    ...base,
    strategyUsed: 'strict',
    attemptsUsed: 2,
    totalDurationMs: 20,
    attempts: [attempt(1, 'enhanced', 'quality_below_threshold'), attempt(2, 'strict')],
  });
  stats.record({
    ...base,
    strategyUsed: 'fallback',
    successPath: 'fallback',
    usedFallback: true,
    fallbackReason: 'quality_below_threshold',
    attemptsUsed: 3,
    totalDurationMs: 30,
    persona: 'Psychologist',
    numberA: 5,
    numberB: 5,
    attempts: [
      attempt(1, 'enhanced', 'quality_below_threshold'),
      attempt(2, 'strict', 'quality_below_threshold'),
      attempt(3, 'pure', 'quality_below_threshold'),
      attempt(4, 'fallback'),
    ],
  });
  stats.record({
    ...base,
    finalScore: 1,
    grade: 'A+',
    strategyUsed: 'emergency',
    successPath: 'emergency',
    usedFallback: true,
    fallbackReason: 'content_unavailable',
    attemptsUsed: 3,
    totalDurationMs: 40,
    persona: 'Philosopher',
    numberA: 9,
    numberB: 9,
    attempts: [attempt(1, 'enhanced', 'content_unavailable'), attempt(2, 'fallback', 'fallback_exhausted'), attempt(3, 'emergency')],
  });

  const snap = stats.snapshot();
  assertEqual(snap.totalRequests, 4, 'total requests');
  assertEqual(snap.generationSuccesses, 2, 'generation successes');
  assertEqual(snap.fallbackUses, 1, 'fallback uses');
  assertEqual(snap.emergencyUses, 1, 'emergency uses');
  assertEqual(snap.successRate, 0.5, 'success rate');
  assertEqual(snap.fallbackRate, 0.25, 'fallback rate');
  assertEqual(snap.emergencyRate, 0.25, 'emergency rate');
  assertEqual(snap.averageQuality, 0.90625, 'average quality');
  assertEqual(snap.averageDurationMs, 25, 'average duration');
  assertEqual(snap.averageAttempts, 2.25, 'average attempts');
  assertEqual(snap.strategyCounts.enhanced, 1, 'enhanced count');
  assertEqual(snap.strategyCounts.strict, 1, 'strict count');
  assertEqual(snap.strategyCounts.pure, 0, 'pure count');
  assertEqual(snap.strategyCounts.fallback, 1, 'fallback strategy count');
  assertEqual(snap.strategyCounts.emergency, 1, 'emergency strategy count');
  assertEqual(snap.failureReasonCounts.quality_below_threshold, 4, 'quality failures');
  assertEqual(snap.failureReasonCounts.content_unavailable, 1, 'unavailable failures');
  assertEqual(snap.failureReasonCounts.fallback_exhausted, 1, 'exhausted failures');
  assertEqual(snap.failureReasonCounts.timeout, undefined, 'absent failure reason');
  assertEqual(snap.gradeCounts['A-'], 3, 'A- grades');
  assertEqual(snap.gradeCounts['A+'], 1, 'A+ grades');
  assertEqual(snap.personaUsage.Oracle, 2, 'Oracle usage');
  assertEqual(snap.personaUsage.MindfulnessCoach, 0, 'unused persona');
  assertEqual(
    snap.topCombinations.map(c => `${c.key}=${c.count}`).join(','),
    'Oracle:1-2=2,Philosopher:9-9=1,Psychologist:5-5=1',
    'top combinations'
  );

  snap.strategyCounts.enhanced = 99;
  assertEqual(stats.snapshot().strategyCounts.enhanced, 1, 'snapshot is a copy');

  stats.reset();
  const cleared = stats.snapshot();
  assertEqual(cleared.totalRequests, 0, 'reset total');
  assertEqual(cleared.successRate, 0, 'reset rate');
  assertEqual(cleared.topCombinations.length, 0, 'reset combinations');

  // Telemetry
  const event = summarizeResult(base, 123);
  assertEqual(event.type, 'insight.generated', 'event type');
  assertEqual(event.at, 123, 'event time');
  assertEqual(event.strategyUsed, 'enhanced', 'event strategy');

  const received: InsightGeneratedEvent[] = [];
  const { logger, records } = createMemoryLogger('telemetry');
  dispatchTelemetry({ emit: (e) => { received.push(e); } }, event, logger);
  assertEqual(received.length, 1, 'sink received event');

  dispatchTelemetry({ emit: () => { throw new Error('sink offline'); } }, event, logger);
  assertEqual(records.at(-1)?.message, 'Telemetry sink failed: sink offline', 'sync sink failure logged');

  dispatchTelemetry({ emit: async () => { throw new Error('sink rejected'); } }, event, logger);
  await new Promise<void>((resolve) => setImmediate(resolve));
  assertEqual(records.at(-1)?.message, 'Telemetry sink failed: sink rejected', 'async sink failure logged');

  console.log('Statistics test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
