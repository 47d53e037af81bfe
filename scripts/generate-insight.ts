#!/usr/bin/env node
/**
 * Generate one guidance passage from the command line.
 *
 * Usage: npx tsx scripts/generate-insight.ts --a 3 --b 7 --persona Oracle [--tag career] [--seed s] [--json]
 */

import { describeScore, InsightError, InsightService, PERSONA_IDS } from '../src';

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

function printUsage(): never {
  console.error(
    [
      'Usage: npx tsx scripts/generate-insight.ts --a <1-9> --b <1-9> --persona <id> [options]',
      '',
      'Options:',
      '  --a <n>            First number (1-9)',
      '  --b <n>            Second number (1-9)',
      `  --persona <id>     One of ${PERSONA_IDS.join(', ')}`,
      '  --tag <tag>        Situational tag (e.g. career, relationships)',
      '  --seed <str>       Seed for reproducible output',
      '  --json             Print the full result as JSON',
      '  --help             Show this help',
    ].join('\n')
  );
  process.exit(2);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (hasFlag(args, '--help')) printUsage();

  const a = getArgValue(args, '--a');
  const b = getArgValue(args, '--b');
  const persona = getArgValue(args, '--persona');
  if (!a || !b || !persona) printUsage();

  const service = await InsightService.create();
  const result = await service.generate(Number(a), Number(b), persona, getArgValue(args, '--tag'), {
    seed: getArgValue(args, '--seed') ?? undefined,
  });

  if (hasFlag(args, '--json')) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log('\n' + result.text + '\n');
  console.log('-'.repeat(60));
  console.log(`Persona:   ${result.persona} (${result.numberA}-${result.numberB})`);
  console.log(`Strategy:  ${result.strategyUsed} via ${result.successPath}, ${result.attemptsUsed} attempt(s)`);
  console.log(`Score:     ${result.finalScore.toFixed(3)} (${result.grade})`);
  console.log(`Duration:  ${result.totalDurationMs}ms`);
  console.log(`Seed:      ${result.seed}`);
  if (result.fallbackReason) console.log(`Fallback:  ${result.fallbackReason}`);

  const lastScored = [...result.attempts].reverse().find(x => x.score);
  if (lastScored?.score) {
    const { strengths, weaknesses } = describeScore(lastScored.score);
    for (const s of strengths) console.log(`  + ${s}`);
    for (const w of weaknesses) console.log(`  - ${w}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof InsightError) {
    console.error(`❌ ${err.message}`);
    process.exit(2);
  }
  console.error(err);
  process.exit(1);
});
