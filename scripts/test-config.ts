#!/usr/bin/env node
/**
 * Config Test Harness
 *
 * Loads the bundled YAML, applies overrides and checks that every defect is
 * reported as InsightConfigError naming the offending key.
 */

import { readFileSync } from 'fs';
import * as yaml from 'yaml';
import lexiconJson from '../src/insight/lexicon.v1.json';
import voicesJson from '../src/insight/personaVoices.v1.json';
import {
  DEFAULT_CONFIG_PATH,
  InsightConfigError,
  loadInsightConfig,
  mergeOverrides,
  parseInsightConfig,
  Vocabulary,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function expectConfigError(fn: () => unknown, key: string, label: string): InsightConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InsightConfigError) {
      assertEqual(err.key, key, `${label} key`);
      return err;
    }
    throw err;
  }
  throw new Error(`Expected ${label} to throw InsightConfigError`);
}

function run(): void {
  // Bundled defaults
  const config = loadInsightConfig();
  assertEqual(config.qualityGate.minimumQualityThreshold, 0.85, 'threshold');
  assertEqual(config.qualityGate.maxRetryAttempts, 3, 'max attempts');
  assertEqual(config.qualityGate.totalTimeoutMs, 200, 'total budget');
  assertEqual(config.qualityGate.strategyOrder.join(','), 'enhanced,strict,pure', 'strategy order');
  assertEqual(config.evaluator.weights.actionability, 0.2, 'actionability weight');
  assertEqual(config.selector.rankingWeights.semanticSimilarity, 0.3, 'semantic weight');
  assertEqual(config.selector.timeoutMs, 40, 'selector deadline');
  assertEqual(config.composer.strategies.pure.framing, 'plain', 'pure framing');
  assertEqual(config.logging.level, 'info', 'log level');

  // Overrides merge into the file
  const tuned = loadInsightConfig({ overrides: { qualityGate: { maxRetryAttempts: 2 }, logging: { level: 'warn' } } });
  assertEqual(tuned.qualityGate.maxRetryAttempts, 2, 'overridden max attempts');
  assertEqual(tuned.qualityGate.attemptTimeoutMs, 100, 'untouched attempt budget');
  assertEqual(tuned.logging.level, 'warn', 'overridden log level');

  // Defects
  const late = expectConfigError(
    () => loadInsightConfig({ overrides: { selector: { timeoutMs: 100 } } }),
    'selector.timeoutMs',
    'selector deadline at the attempt budget'
  );
  assertEqual(
    late.message,
    'Insight config selector.timeoutMs: 100ms must be below qualityGate.attemptTimeoutMs (100ms)',
    'selector deadline message'
  );
  expectConfigError(
    () => loadInsightConfig({ overrides: { evaluator: { weights: { actionability: 0.3 } } } }),
    'evaluator.weights',
    'weights not summing to 1'
  );
  expectConfigError(
    () => loadInsightConfig({
      overrides: { evaluator: { weights: { relevance: 0.3, voice: 0.25, structure: 0.15, actionability: 0.1, safety: 0.2 } } },
    }),
    'evaluator.weights.actionability',
    'actionability weight too small to block directive-less passages'
  );
  expectConfigError(
    () => loadInsightConfig({ overrides: { qualityGate: { maxRetryAttempts: 4 } } }),
    'qualityGate.strategyOrder',
    'fewer strategies than attempts'
  );
  expectConfigError(
    () => loadInsightConfig({ overrides: { selector: { relevanceWeight: 0.8 } } }),
    'selector.relevanceWeight',
    'relevance + diversity not 1'
  );
  expectConfigError(
    () => loadInsightConfig({ overrides: { selector: { minCandidates: 7 } } }),
    'selector.minCandidates',
    'min candidates above max'
  );

  const raw: unknown = yaml.parse(readFileSync(DEFAULT_CONFIG_PATH, 'utf-8'));
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { qualityGate: { strategyOrder: ['enhanced', 'turbo', 'pure'] } })),
    'qualityGate.strategyOrder',
    'unknown strategy name'
  );
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { qualityGate: { strategyOrder: ['enhanced', 'enhanced', 'pure'] } })),
    'qualityGate.strategyOrder',
    'duplicate strategy name'
  );
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { composer: { strategies: { turbo: { verbatimRatio: 1 } } } })),
    'composer.strategies',
    'unknown composer strategy'
  );
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { composer: { strategies: { pure: { framing: 'boxed' } } } })),
    'composer.strategies.pure.framing',
    'unknown framing'
  );
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { logging: { level: 'verbose' } })),
    'logging.level',
    'unknown log level'
  );
  expectConfigError(() => parseInsightConfig(mergeOverrides(raw, { version: 2 })), 'version', 'unsupported version');
  expectConfigError(
    () => parseInsightConfig(mergeOverrides(raw, { qualityGate: { minimumQualityThreshold: 0 } })),
    'qualityGate.minimumQualityThreshold',
    'zero threshold'
  );

  const unreadable = expectConfigError(
    () => loadInsightConfig({ path: '/nonexistent/insight-gate.yaml' }),
    'file',
    'unreadable file'
  );
  assertEqual(unreadable.code, 'config_unreadable', 'unreadable file code');

  // Vocabulary defects are config errors too
  const lexicon: unknown = lexiconJson;
  const voices: Record<string, unknown> = { ...voicesJson.voices };
  delete voices.Philosopher;
  expectConfigError(
    () => Vocabulary.fromJson(lexicon, { version: 1, voices }),
    'personaVoices.voices.Philosopher',
    'persona without a voice'
  );
  expectConfigError(
    () => Vocabulary.fromJson(lexicon, { ...voicesJson, voices: { ...voicesJson.voices, Trickster: voicesJson.voices.Oracle } }),
    'personaVoices.voices.Trickster',
    'unknown persona voice'
  );
  expectConfigError(
    () => Vocabulary.fromJson(lexicon, {
      ...voicesJson,
      voices: { ...voicesJson.voices, Oracle: { ...voicesJson.voices.Oracle, emergency: { pair: [], single: [] } } },
    }),
    'personaVoices.voices.Oracle.emergency',
    'missing emergency templates'
  );
  expectConfigError(() => Vocabulary.fromJson({ version: 2 }, voicesJson), 'lexicon', 'malformed lexicon');

  console.log('Config test passed.');
}

run();
