#!/usr/bin/env node
/**
 * Passage Pattern Test Harness
 *
 * Composes every persona × number pair under every strategy for a fixed set
 * of seeds, renders every emergency template and every fallback text, and
 * checks the output for banned surface patterns.
 * Deterministic and requires no network access.
 */

import {
  Composer,
  CORE_NUMBERS,
  createMemoryLogger,
  defaultVocabulary,
  EmergencyTemplates,
  Evaluator,
  facetSeed,
  GENERATION_STRATEGIES,
  InMemoryRotationStore,
  loadContentStore,
  loadFallbackBank,
  loadInsightConfig,
  makeRng,
  parseInsightContext,
  PERSONA_IDS,
  Selector,
} from '../src/insight';

// ─────────────────────────────────────────────────────────────
// Test seeds
// ─────────────────────────────────────────────────────────────

const TEST_SEEDS = ['alpha-001', 'beta-002', 'gamma-003', 'delta-004'];

// ─────────────────────────────────────────────────────────────
// Banned patterns
// ─────────────────────────────────────────────────────────────

type BannedPattern = {
  name: string;
  regex: RegExp;
  description: string;
};

const BANNED_PATTERNS: BannedPattern[] = [
  {
    name: 'article-vowel-error',
    regex: /\ba\s+(?!uni|use|user|euro|one|once)[aeiou]/i,
    description: 'Article error: "a [vowel]" should be "an [vowel]"',
  },
  {
    name: 'double-space',
    regex: / {2}/,
    description: 'Double space in text',
  },
  {
    name: 'double-punctuation',
    regex: /[;,.]\s*[;,.]|;;\s|\.\.|\. \./,
    description: 'Double punctuation: "; ;" or ". ." or similar',
  },
  {
    name: 'dangling-comma',
    regex: /,\s*\./,
    description: 'Dangling comma before period',
  },
  {
    name: 'empty-parens',
    regex: /\(\s*\)/,
    description: 'Empty parentheses',
  },
  {
    name: 'leading-and',
    regex: /^\s*and\b/i,
    description: 'Passage starting with "and"',
  },
  {
    name: 'unrendered-slot',
    regex: /#\w+#|\{\w+\}|\(\(|\)\)/,
    description: 'Template slot left in the output',
  },
  {
    name: 'lowercase-start',
    regex: /^[^A-Z]/,
    description: 'Passage does not start with a capital letter',
  },
  {
    name: 'unterminated',
    regex: /[^.!?]$/,
    description: 'Passage does not end with terminal punctuation',
  },
];

// ─────────────────────────────────────────────────────────────
// Test runner
// ─────────────────────────────────────────────────────────────

type TestFailure = {
  source: string;
  patternName: string;
  description: string;
  context: string;
};

function check(source: string, text: string, failures: TestFailure[]): boolean {
  let clean = true;
  for (const pattern of BANNED_PATTERNS) {
    const match = text.match(pattern.regex);
    if (!match) continue;
    clean = false;
    const idx = match.index ?? 0;
    const start = Math.max(0, idx - 30);
    const end = Math.min(text.length, idx + match[0].length + 30);
    failures.push({
      source,
      patternName: pattern.name,
      description: pattern.description,
      context: (start > 0 ? '...' : '') + text.slice(start, end) + (end < text.length ? '...' : ''),
    });
  }
  return clean;
}

async function runTests(): Promise<{ passed: number; failed: number; failures: TestFailure[] }> {
  const config = loadInsightConfig();
  const vocabulary = defaultVocabulary();
  const { logger } = createMemoryLogger('patterns');
  const store = await loadContentStore({ logger });
  const selector = new Selector({ config: config.selector, store, vocabulary, logger });
  const composer = new Composer({ config: config.composer, vocabulary });
  const evaluator = new Evaluator({ config: config.evaluator, vocabulary });
  const threshold = config.qualityGate.minimumQualityThreshold;
  const emergency = new EmergencyTemplates({ vocabulary, evaluator, minimumQualityThreshold: threshold });
  const bank = await loadFallbackBank({
    minimumQualityThreshold: threshold,
    structure: config.evaluator.structure,
    vocabulary,
    rotation: new InMemoryRotationStore({ now: () => 0 }),
    logger,
  });

  const failures: TestFailure[] = [];
  let passed = 0;
  let total = 0;
  const tally = (source: string, text: string): void => {
    total++;
    if (check(source, text, failures)) passed++;
  };

  for (const persona of PERSONA_IDS) {
    for (const numberA of CORE_NUMBERS) {
      for (const numberB of CORE_NUMBERS) {
        const context = parseInsightContext({ numberA, numberB, persona });
        const set = await selector.select(context);
        if (set.kind !== 'selected') throw new Error(`No candidates for ${persona} ${numberA}-${numberB}`);
        for (const seed of TEST_SEEDS) {
          for (const strategy of GENERATION_STRATEGIES) {
            const passage = composer.compose(set, strategy, context, makeRng(facetSeed(seed, `compose:${strategy}`)));
            tally(`${persona} ${numberA}-${numberB} ${strategy} ${seed}`, passage.text);
          }
        }
        tally(`${persona} ${numberA}-${numberB} emergency`, emergency.render(context));
      }
    }
  }

  for (const numberA of CORE_NUMBERS) {
    for (const numberB of CORE_NUMBERS) {
      for (const entry of bank.entriesFor(numberA, numberB)) {
        tally(`fallback ${entry.id}`, entry.baseText);
        for (const [persona, text] of Object.entries(entry.personaVariants)) {
          if (text) tally(`fallback ${entry.id} (${persona})`, text);
        }
      }
    }
  }

  return { passed, failed: total - passed, failures };
}

// ─────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  console.log('='.repeat(60));
  console.log('Passage Pattern Test Harness');
  console.log('='.repeat(60) + '\n');

  const { passed, failed, failures } = await runTests();

  if (failures.length > 0) {
    const byPattern = new Map<string, TestFailure[]>();
    for (const f of failures) {
      const list = byPattern.get(f.patternName) ?? [];
      list.push(f);
      byPattern.set(f.patternName, list);
    }
    for (const [patternName, patternFailures] of byPattern) {
      console.log(`\n[${patternName}] ${patternFailures[0]?.description ?? ''}`);
      console.log('-'.repeat(50));
      for (const f of patternFailures.slice(0, 5)) {
        console.log(`  Source: ${f.source}`);
        console.log(`  Context: ${f.context}`);
        console.log('');
      }
      if (patternFailures.length > 5) console.log(`  ... and ${patternFailures.length - 5} more\n`);
    }
  }

  console.log(`Passed: ${passed}`);
  console.log(`Failed: ${failed}`);
  console.log(`Total:  ${passed + failed}`);

  if (failed > 0) {
    console.log('❌ Some passages failed. See details above.\n');
    process.exit(1);
  }
  console.log('✓ Passage pattern test passed.\n');
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
