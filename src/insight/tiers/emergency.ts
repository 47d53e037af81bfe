/**
 * Emergency tier: fixed persona sentences parameterized only by each
 * number's label. Every persona × number pair is rendered and scored when the
 * tier is built; one scoring under the threshold is a startup error.
 */

import { InsightConfigError } from '../errors';
import type { PassageEvaluator } from '../stages/evaluator';
import { normalizePassageText } from '../text';
import {
  CORE_NUMBERS,
  PERSONA_IDS,
  type CandidatePassage,
  type InsightContext,
  type QualityScore,
} from '../types';
import type { Vocabulary } from '../vocabulary';

export type EmergencyPassage = {
  passage: CandidatePassage;
  score: QualityScore;
};

function contextKey(context: InsightContext): string {
  return `${context.persona}:${context.numberA}-${context.numberB}`;
}

export class EmergencyTemplates {
  private readonly vocabulary: Vocabulary;
  private readonly scores = new Map<string, QualityScore>();
  readonly minimumScore: number;

  constructor(options: { vocabulary: Vocabulary; evaluator: PassageEvaluator; minimumQualityThreshold: number }) {
    this.vocabulary = options.vocabulary;

    let minimum = 1;
    for (const persona of PERSONA_IDS) {
      for (const numberA of CORE_NUMBERS) {
        for (const numberB of CORE_NUMBERS) {
          const context: InsightContext = { numberA, numberB, persona, situationalTag: null };
          const text = this.render(context);
          const score = options.evaluator.evaluate(text, context);
          if (score.overall < options.minimumQualityThreshold) {
            throw new InsightConfigError(
              `personaVoices.voices.${persona}.emergency`,
              `template for ${numberA}-${numberB} scores ${score.overall}, below ${options.minimumQualityThreshold}`
            );
          }
          minimum = Math.min(minimum, score.overall);
          this.scores.set(contextKey(context), score);
        }
      }
    }
    this.minimumScore = minimum;
  }

  render(context: InsightContext): string {
    const voice = this.vocabulary.voice(context.persona);
    const sentences = context.numberA === context.numberB ? voice.emergency.single : voice.emergency.pair;
    const labelA = this.vocabulary.label(context.numberA);
    const labelB = this.vocabulary.label(context.numberB);
    return normalizePassageText(
      sentences.map(s => s.replaceAll('{labelA}', labelA).replaceAll('{labelB}', labelB)).join(' ')
    );
  }

  build(context: InsightContext): EmergencyPassage {
    const score = this.scores.get(contextKey(context));
    if (!score) throw new InsightConfigError('emergency', `no verified template for ${contextKey(context)}`);
    return {
      passage: { text: this.render(context), sourceFragmentIds: [], strategy: 'emergency' },
      score,
    };
  }
}
