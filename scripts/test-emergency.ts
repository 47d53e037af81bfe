#!/usr/bin/env node
/**
 * Emergency Template Test Harness
 *
 * Every persona × number pair renders a passage that clears the gate, and a
 * template that would not is rejected when the tier is built.
 */

import lexiconJson from '../src/insight/lexicon.v1.json';
import voicesJson from '../src/insight/personaVoices.v1.json';
import {
  CORE_NUMBERS,
  defaultVocabulary,
  EmergencyTemplates,
  Evaluator,
  InsightConfigError,
  loadInsightConfig,
  parseInsightContext,
  PERSONA_IDS,
  Vocabulary,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function run(): void {
  const config = loadInsightConfig();
  const threshold = config.qualityGate.minimumQualityThreshold;
  const vocabulary = defaultVocabulary();
  const evaluator = new Evaluator({ config: config.evaluator, vocabulary });
  const emergency = new EmergencyTemplates({ vocabulary, evaluator, minimumQualityThreshold: threshold });

  assertEqual(emergency.minimumScore, 1, 'weakest template score');

  const pair = parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' });
  assertEqual(
    emergency.render(pair),
    'Your soul carries the sacred gift of leadership and initiative, and the cosmic current now turns it toward cooperation and harmony. ' +
      'Take one small step today that honors both.',
    'pair template'
  );

  const single = parseInsightContext({ numberA: 7, numberB: 7, persona: 'Philosopher' });
  assertEqual(
    emergency.render(single),
    'Consider how wisdom and introspection gives meaning to the life you are living right now. ' +
      'Ask yourself one honest question tonight and answer it in writing.',
    'single-number template'
  );

  const built = emergency.build(pair);
  assertEqual(built.passage.strategy, 'emergency', 'emergency strategy tag');
  assertEqual(built.passage.sourceFragmentIds.length, 0, 'no source fragments');
  assertEqual(built.score.overall, 1, 'verified score');

  let checked = 0;
  for (const persona of PERSONA_IDS) {
    for (const numberA of CORE_NUMBERS) {
      for (const numberB of CORE_NUMBERS) {
        const context = parseInsightContext({ numberA, numberB, persona });
        const { passage, score } = emergency.build(context);
        if (score.overall < threshold) throw new Error(`${persona} ${numberA}-${numberB} scored ${score.overall}`);
        if (!evaluator.hasDirectiveClause(passage.text)) throw new Error(`${persona} ${numberA}-${numberB} has no directive`);
        checked++;
      }
    }
  }
  assertEqual(checked, 405, 'combinations checked');

  // A template without a directive cannot clear the gate; the tier refuses to build
  const flatOracle = {
    ...voicesJson.voices.Oracle,
    emergency: {
      pair: ['Your soul carries {labelA} toward {labelB} under sacred stars.', 'The cosmic sky is quiet tonight.'],
      single: ['Your soul carries a double share of {labelA} under sacred stars.', 'The cosmic sky is quiet tonight.'],
    },
  };
  const flatVocabulary = Vocabulary.fromJson(lexiconJson, { ...voicesJson, voices: { ...voicesJson.voices, Oracle: flatOracle } });
  let key = '';
  try {
    new EmergencyTemplates({ vocabulary: flatVocabulary, evaluator: new Evaluator({ config: config.evaluator, vocabulary: flatVocabulary }), minimumQualityThreshold: threshold });
  } catch (err) {
    if (!(err instanceof InsightConfigError)) throw err;
    key = err.key;
  }
  assertEqual(key, 'personaVoices.voices.Oracle.emergency', 'rejected template key');

  console.log('Emergency template test passed.');
}

run();
