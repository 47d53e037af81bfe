#!/usr/bin/env node
/**
 * Evaluator Test Harness
 *
 * Exact subscores for hand-checked passages, the hard zero on actionability,
 * configured weights, idempotence and grade boundaries.
 */

import {
  defaultVocabulary,
  describeScore,
  Evaluator,
  gradeForScore,
  loadInsightConfig,
  parseInsightContext,
} from '../src/insight';

function assertEqual(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`Expected ${label} to be "${expected}", got "${actual}"`);
  }
}

function run(): void {
  const config = loadInsightConfig();
  const vocabulary = defaultVocabulary();
  const evaluator = new Evaluator({ config: config.evaluator, vocabulary });
  const context = parseInsightContext({ numberA: 1, numberB: 2, persona: 'Oracle' });

  // Clean, on-voice, actionable
  const clean =
    'Your soul carries the sacred gift of leadership and initiative, and the cosmic current now turns it toward cooperation and harmony. ' +
    'Take one small step today that honors both.';
  const cleanScore = evaluator.evaluate(clean, context);
  assertEqual(cleanScore.overall, 1, 'clean overall');
  assertEqual(cleanScore.subscores.relevance, 1, 'clean relevance');
  assertEqual(cleanScore.subscores.voice, 1, 'clean voice');
  assertEqual(cleanScore.subscores.structure, 1, 'clean structure');
  assertEqual(cleanScore.subscores.actionability, 1, 'clean actionability');
  assertEqual(cleanScore.subscores.safety, 1, 'clean safety');
  assertEqual(evaluator.explain(clean, context).structure.wordCount, 29, 'clean word count');

  // No directive: capped at 1 - actionability weight, below the gate
  const passive =
    'Your soul carries the sacred gift of leadership and initiative. The cosmic current turns it toward cooperation and harmony.';
  const passiveScore = evaluator.evaluate(passive, context);
  assertEqual(passiveScore.subscores.actionability, 0, 'passive actionability');
  assertEqual(passiveScore.overall, 0.8, 'passive overall');
  assertEqual(gradeForScore(passiveScore.overall), 'B+', 'passive grade');

  // Another persona's voice
  const offVoice =
    'Your pattern of leadership and initiative shapes your emotional habit of cooperation and harmony. ' +
    'Notice one trigger today and write down your response.';
  const offReport = evaluator.explain(offVoice, context);
  assertEqual(offReport.ownMarkers.length, 0, 'no own markers');
  assertEqual(offReport.foreignMarkers.join(','), 'pattern,emotional,habit,trigger', 'foreign markers');
  assertEqual(offReport.score.subscores.voice, 0, 'off-voice subscore');
  assertEqual(offReport.score.overall, 0.8, 'off-voice overall');

  const described = describeScore(offReport.score);
  assertEqual(described.grade, 'B+', 'described grade');
  assertEqual(described.strengths.length, 4, 'strength count');
  assertEqual(described.weaknesses.join('|'), 'Persona voice is thin or mixed', 'weaknesses');

  // Blocklisted claims
  const unsafe = 'Your soul is guaranteed a cure through leadership and initiative. Take one sacred step toward cooperation and harmony.';
  const unsafeReport = evaluator.explain(unsafe, context);
  assertEqual(unsafeReport.safetyHits.join(','), 'medical-cure,absolute-guarantee', 'safety hits');
  assertEqual(unsafeReport.score.subscores.safety, 0, 'unsafe subscore');
  assertEqual(unsafeReport.score.overall, 0.8, 'unsafe overall');

  // Structural defects
  const broken = 'and your soul seeks leadership and initiative, , then cooperation and harmony and';
  const brokenReport = evaluator.explain(broken, context);
  assertEqual(brokenReport.structure.malformations.join(','), 'unterminated,double_punctuation,fragment_start', 'malformations');
  assertEqual(brokenReport.structure.wordCount, 13, 'broken word count');
  assertEqual(brokenReport.structure.sentenceCount, 1, 'broken sentence count');
  assertEqual(brokenReport.score.subscores.structure, 0, 'broken structure');
  assertEqual(brokenReport.score.subscores.voice, 0.5, 'one marker is half voice credit');
  assertEqual(brokenReport.score.overall, 0.55, 'broken overall');
  assertEqual(gradeForScore(brokenReport.score.overall), 'F', 'broken grade');

  // Second-person directive and lead-ins
  const invited = 'Your soul holds leadership and initiative beside cooperation and harmony. Perhaps you could write one sacred intention tonight.';
  assertEqual(evaluator.evaluate(invited, context).overall, 1, 'second-person directive overall');
  assertEqual(evaluator.hasDirectiveClause('Tonight, write down one question.'), true, 'lead-in directive');
  assertEqual(evaluator.hasDirectiveClause('Writing helps some people.'), false, 'gerund is not a directive');

  // Idempotent, and a passage object scores like its text
  const again = evaluator.evaluate(clean, context);
  assertEqual(JSON.stringify(again), JSON.stringify(cleanScore), 'repeat evaluation');
  const asPassage = evaluator.evaluate({ text: offVoice, sourceFragmentIds: [], strategy: 'enhanced' }, context);
  assertEqual(asPassage.overall, offReport.score.overall, 'passage object');

  // Weights come from config
  const relevanceHeavy = new Evaluator({
    config: { ...config.evaluator, weights: { relevance: 0.4, voice: 0.1, structure: 0.1, actionability: 0.2, safety: 0.2 } },
    vocabulary,
  });
  assertEqual(relevanceHeavy.evaluate(offVoice, context).overall, 0.9, 'reweighted overall');

  // Grade boundaries
  assertEqual(gradeForScore(0.95), 'A+', 'A+ floor');
  assertEqual(gradeForScore(0.9499), 'A', 'below A+');
  assertEqual(gradeForScore(0.85), 'A-', 'gate threshold grade');
  assertEqual(gradeForScore(0.8499), 'B+', 'below gate');
  assertEqual(gradeForScore(0.6), 'C', 'C floor');
  assertEqual(gradeForScore(0.59), 'F', 'failing');

  console.log('Evaluator test passed.');
}

run();
