#!/usr/bin/env node
/**
 * Context Boundary Test Harness
 *
 * Verifies that out-of-range numbers and unknown personas are rejected before
 * the pipeline, and that accepted input is normalized and frozen.
 */

import {
  contextNumbers,
  InvalidInsightContextError,
  numberPairKey,
  parseInsightContext,
  parsePersona,
  parseSituationalTag,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function expectInvalid(fn: () => unknown, field: string, label: string): void {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInsightContextError) {
      assertEqual(err.field, field, `${label} field`);
      assertEqual(err.code, 'invalid_context', `${label} code`);
      return;
    }
    throw err;
  }
  throw new Error(`Expected ${label} to throw InvalidInsightContextError`);
}

function run(): void {
  const context = parseInsightContext({ numberA: 3, numberB: 7, persona: 'Oracle', situationalTag: '  Career ' });
  assertEqual(context.numberA, 3, 'numberA');
  assertEqual(context.numberB, 7, 'numberB');
  assertEqual(context.persona, 'Oracle', 'persona');
  assertEqual(context.situationalTag, 'career', 'normalized tag');
  assertEqual(Object.isFrozen(context), true, 'context frozen');

  assertEqual(parsePersona('mindfulness coach'), 'MindfulnessCoach', 'spaced persona');
  assertEqual(parsePersona('numerology_scholar'), 'NumerologyScholar', 'snake persona');
  assertEqual(parsePersona('PSYCHOLOGIST'), 'Psychologist', 'upper-case persona');

  assertEqual(parseSituationalTag(undefined), null, 'missing tag');
  assertEqual(parseSituationalTag('   '), null, 'blank tag');
  expectInvalid(() => parseSituationalTag('x'.repeat(65)), 'situationalTag', 'overlong tag');
  expectInvalid(() => parseSituationalTag(42), 'situationalTag', 'numeric tag');

  expectInvalid(() => parseInsightContext({ numberA: 0, numberB: 7, persona: 'Oracle' }), 'numberA', 'numberA 0');
  expectInvalid(() => parseInsightContext({ numberA: 3, numberB: 10, persona: 'Oracle' }), 'numberB', 'numberB 10');
  expectInvalid(() => parseInsightContext({ numberA: 2.5, numberB: 7, persona: 'Oracle' }), 'numberA', 'fractional number');
  expectInvalid(() => parseInsightContext({ numberA: '3', numberB: 7, persona: 'Oracle' }), 'numberA', 'string number');
  expectInvalid(() => parseInsightContext({ numberA: 3, numberB: 7, persona: 'Trickster' }), 'persona', 'unknown persona');
  expectInvalid(() => parseInsightContext({ numberA: 3, numberB: 7, persona: null }), 'persona', 'null persona');

  assertEqual(contextNumbers(context).join(','), '3,7', 'pair numbers');
  const single = parseInsightContext({ numberA: 5, numberB: 5, persona: 'Philosopher' });
  assertEqual(contextNumbers(single).join(','), '5', 'repeated number collapses');
  assertEqual(single.situationalTag, null, 'absent tag');
  assertEqual(numberPairKey(3, 7), '3-7', 'pair key');
  assertEqual(numberPairKey(7, 3), '7-3', 'pair key is ordered');

  console.log('Context test passed.');
}

run();
