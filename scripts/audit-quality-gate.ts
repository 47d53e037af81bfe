#!/usr/bin/env node
/**
 * Quality Gate Audit Script
 *
 * Runs every persona × number pair through the full pipeline and reports tier
 * rates, latency and grade distribution. Exits non-zero when any returned
 * passage breaks the delivery guarantees (score floor, minimum length,
 * directive present, attempt bound).
 *
 * Usage: npx tsx scripts/audit-quality-gate.ts [--runs 3] [--seedPrefix audit] [--out report.json]
 */

import { writeFileSync } from 'fs';
import { CORE_NUMBERS, countWords, InsightService, PERSONA_IDS, type GenerationResult } from '../src';

function getArgValue(args: string[], name: string): string | null {
  const idx = args.indexOf(name);
  if (idx === -1) return null;
  const v = args[idx + 1];
  if (!v || v.startsWith('--')) return null;
  return v;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function parseIntArg(raw: string | null, fallback: number): number {
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

function percentile(sorted: readonly number[], p: number): number {
  if (!sorted.length) return 0;
  const idx = Math.min(sorted.length - 1, Math.max(0, Math.ceil((p / 100) * sorted.length) - 1));
  return sorted[idx] ?? 0;
}

function pct(n: number, total: number): string {
  return total ? `${((n / total) * 100).toFixed(1)}%` : '0.0%';
}

function printUsage(): never {
  console.error(
    [
      'Usage: npx tsx scripts/audit-quality-gate.ts [options]',
      '',
      'Options:',
      '  --runs <n>          Runs per persona × pair (default 3)',
      '  --seedPrefix <str>  Seed prefix (default "audit")',
      '  --out <path>        Write JSON report to file',
      '  --help              Show this help',
    ].join('\n')
  );
  process.exit(2);
}

type Violation = {
  property: string;
  persona: string;
  pair: string;
  seed: string;
  detail: string;
};

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (hasFlag(args, '--help')) printUsage();

  const runs = Math.max(1, Math.min(100, parseIntArg(getArgValue(args, '--runs'), 3)));
  const seedPrefix = getArgValue(args, '--seedPrefix') ?? 'audit';
  const outPath = getArgValue(args, '--out');

  console.log('='.repeat(60));
  console.log('Quality Gate Audit');
  console.log('='.repeat(60));

  const service = await InsightService.create({ overrides: { logging: { level: 'warn' } } });
  const { minimumQualityThreshold, maxRetryAttempts } = service.config.qualityGate;
  const { minWords } = service.config.evaluator.structure;

  const total = PERSONA_IDS.length * CORE_NUMBERS.length * CORE_NUMBERS.length * runs;
  console.log(`Running ${total} requests (${runs} per persona × pair)...\n`);

  const violations: Violation[] = [];
  const durations: number[] = [];
  const startTime = Date.now();

  const check = (result: GenerationResult): void => {
    const where = { persona: result.persona, pair: `${result.numberA}-${result.numberB}`, seed: result.seed };
    if (result.finalScore < minimumQualityThreshold) {
      violations.push({ property: 'P1 quality floor', ...where, detail: `score ${result.finalScore}` });
    }
    if (!result.text.trim() || countWords(result.text) < minWords) {
      violations.push({ property: 'P2 minimum length', ...where, detail: `${countWords(result.text)} words` });
    }
    if (!service.evaluator.hasDirectiveClause(result.text)) {
      violations.push({ property: 'P3 actionability', ...where, detail: result.text });
    }
    if (result.attemptsUsed > maxRetryAttempts) {
      violations.push({ property: 'P4 attempt bound', ...where, detail: `${result.attemptsUsed} attempts` });
    }
  };

  for (const persona of PERSONA_IDS) {
    for (const a of CORE_NUMBERS) {
      for (const b of CORE_NUMBERS) {
        for (let i = 0; i < runs; i++) {
          const result = await service.generate(a, b, persona, null, { seed: `${seedPrefix}-${persona}-${a}-${b}-${i}` });
          durations.push(result.totalDurationMs);
          check(result);
        }
      }
    }
  }

  const stats = service.statistics();
  durations.sort((x, y) => x - y);

  console.log('Tier rates:');
  console.log(`  generation  ${pct(stats.generationSuccesses, stats.totalRequests)}`);
  console.log(`  fallback    ${pct(stats.fallbackUses, stats.totalRequests)}`);
  console.log(`  emergency   ${pct(stats.emergencyUses, stats.totalRequests)}`);
  console.log('\nStrategies:');
  for (const [strategy, count] of Object.entries(stats.strategyCounts)) {
    console.log(`  ${strategy.padEnd(10)} ${count}`);
  }
  console.log('\nGrades:');
  for (const [grade, count] of Object.entries(stats.gradeCounts)) {
    console.log(`  ${grade.padEnd(3)} ${count}`);
  }
  console.log('\nLatency (ms):');
  console.log(`  p50 ${percentile(durations, 50)}  p95 ${percentile(durations, 95)}  max ${percentile(durations, 100)}`);
  console.log(`\nAverage quality ${stats.averageQuality.toFixed(3)}, average attempts ${stats.averageAttempts.toFixed(2)}`);
  console.log(`Audit finished in ${Date.now() - startTime}ms`);

  if (outPath) {
    writeFileSync(outPath, JSON.stringify({ runs, seedPrefix, statistics: stats, violations }, null, 2));
    console.log(`Report written to ${outPath}`);
  }

  if (violations.length) {
    console.log(`\n❌ ${violations.length} violation(s):`);
    for (const v of violations.slice(0, 20)) {
      console.log(`  [${v.property}] ${v.persona} ${v.pair} (${v.seed}): ${v.detail}`);
    }
    process.exit(1);
  }
  console.log('\n✅ All delivery guarantees held.');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
