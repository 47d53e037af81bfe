#!/usr/bin/env node
/**
 * Delivery Guarantees Test Harness
 *
 * Runs the service once for every persona × number pair with a fixed seed and
 * checks each delivered passage: score at or above the threshold, at least the
 * minimum word count, a directive clause, and no more attempts than allowed.
 */

import {
  CORE_NUMBERS,
  countWords,
  InsightService,
  PERSONA_IDS,
  silentLogger,
  type GenerationResult,
  type SuccessPath,
} from '../src';

const SEED = 'matrix-001';

type Violation = {
  source: string;
  check: string;
  detail: string;
};

async function run(): Promise<void> {
  const service = await InsightService.create({
    overrides: { qualityGate: { attemptTimeoutMs: 1_000, totalTimeoutMs: 3_000 } },
    logger: silentLogger,
  });
  const threshold = service.config.qualityGate.minimumQualityThreshold;
  const minWords = service.config.evaluator.structure.minWords;
  const maxAttempts = service.config.qualityGate.maxRetryAttempts;

  const violations: Violation[] = [];
  const paths: Record<SuccessPath, number> = { generation: 0, fallback: 0, emergency: 0 };
  let total = 0;

  const inspect = (source: string, result: GenerationResult): void => {
    const flag = (check: string, detail: string): void => { violations.push({ source, check, detail }); };
    if (result.finalScore < threshold) flag('score', `${result.finalScore} below ${threshold}`);
    const words = countWords(result.text);
    if (words < minWords) flag('length', `${words} words, below ${minWords}: "${result.text}"`);
    if (!service.evaluator.hasDirectiveClause(result.text)) flag('directive', `no directive clause: "${result.text}"`);
    if (result.attemptsUsed < 1 || result.attemptsUsed > maxAttempts) flag('attempts', `${result.attemptsUsed} attempts`);
  };

  for (const persona of PERSONA_IDS) {
    for (const numberA of CORE_NUMBERS) {
      for (const numberB of CORE_NUMBERS) {
        const result = await service.generate(numberA, numberB, persona, null, { seed: SEED });
        total++;
        paths[result.successPath]++;
        inspect(`${persona} ${numberA}-${numberB} (${result.successPath})`, result);
      }
    }
  }

  const expected = PERSONA_IDS.length * CORE_NUMBERS.length * CORE_NUMBERS.length;
  if (total !== expected) throw new Error(`Expected ${expected} runs, got ${total}`);
  if (service.statistics().totalRequests !== expected) {
    throw new Error(`Expected ${expected} requests in statistics, got ${service.statistics().totalRequests}`);
  }

  console.log(`Runs: ${total} (generation ${paths.generation}, fallback ${paths.fallback}, emergency ${paths.emergency})`);
  if (violations.length > 0) {
    for (const v of violations.slice(0, 20)) console.log(`  [${v.check}] ${v.source}: ${v.detail}`);
    if (violations.length > 20) console.log(`  ... and ${violations.length - 20} more`);
    throw new Error(`${violations.length} delivery guarantee violations`);
  }

  console.log('Delivery guarantees test passed.');
}

run().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
