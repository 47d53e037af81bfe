/**
 * Evaluator: deterministic five-axis quality score for a passage.
 *
 * relevance     keyword coverage of each distinct number's theme
 * voice         own persona markers present, other personas' markers absent
 * structure     word/sentence bounds and malformation checks
 * actionability 1 if a directive clause exists, else 0
 * safety        blocklisted claims (medical, financial, absolute, predictive)
 *
 * Overall is the configured weighted sum, rounded to 4 places.
 */

import type { InsightConfig } from '../config';
import { contextNumbers } from '../context';
import { analyzeStructure, type StructureReport } from '../text';
import {
  SUBSCORE_NAMES,
  type CandidatePassage,
  type InsightContext,
  type QualityGrade,
  type QualityScore,
  type SubscoreName,
  type Subscores,
} from '../types';
import { clamp01, roundScore } from '../utils';
import type { Vocabulary } from '../vocabulary';

export type EvaluationReport = {
  score: QualityScore;
  keywordHits: Record<number, string[]>;
  ownMarkers: string[];
  foreignMarkers: string[];
  structure: StructureReport;
  hasDirective: boolean;
  safetyHits: string[];
};

export interface PassageEvaluator {
  evaluate(passage: CandidatePassage | string, context: InsightContext): QualityScore;
}

export type EvaluatorOptions = {
  config: InsightConfig['evaluator'];
  vocabulary: Vocabulary;
};

export class Evaluator implements PassageEvaluator {
  private readonly config: InsightConfig['evaluator'];
  private readonly vocabulary: Vocabulary;

  constructor(options: EvaluatorOptions) {
    this.config = options.config;
    this.vocabulary = options.vocabulary;
  }

  evaluate(passage: CandidatePassage | string, context: InsightContext): QualityScore {
    return this.explain(typeof passage === 'string' ? passage : passage.text, context).score;
  }

  explain(text: string, context: InsightContext): EvaluationReport {
    const cfg = this.config;

    const keywordHits: Record<number, string[]> = {};
    const numbers = contextNumbers(context);
    let coverage = 0;
    for (const n of numbers) {
      const hits = this.vocabulary.keywordHits(text, n);
      keywordHits[n] = hits;
      coverage += Math.min(1, hits.length / cfg.relevanceTarget);
    }
    const relevance = coverage / numbers.length;

    const ownMarkers = this.vocabulary.markerHits(text, context.persona);
    const foreignMarkers = this.vocabulary.foreignMarkerHits(text, context.persona);
    const voice = clamp01(Math.min(1, ownMarkers.length / cfg.voiceTarget) - cfg.foreignMarkerPenalty * foreignMarkers.length);

    const structure = analyzeStructure(text, cfg.structure);
    const hasDirective = this.vocabulary.hasDirectiveClause(text);
    const safetyHits = this.vocabulary.safetyHits(text);

    const subscores: Subscores = {
      relevance: roundScore(relevance),
      voice: roundScore(voice),
      structure: roundScore(structure.score),
      actionability: hasDirective ? 1 : 0,
      safety: roundScore(clamp01(1 - cfg.safetyPenalty * safetyHits.length)),
    };

    let overall = 0;
    for (const name of SUBSCORE_NAMES) overall += cfg.weights[name] * subscores[name];

    return {
      score: { overall: roundScore(overall), subscores },
      keywordHits,
      ownMarkers,
      foreignMarkers,
      structure,
      hasDirective,
      safetyHits,
    };
  }

  hasDirectiveClause(text: string): boolean {
    return this.vocabulary.hasDirectiveClause(text);
  }
}

// ─────────────────────────────────────────────────────────────
// Grades
// ─────────────────────────────────────────────────────────────

const GRADE_FLOORS: ReadonlyArray<readonly [number, QualityGrade]> = [
  [0.95, 'A+'],
  [0.9, 'A'],
  [0.85, 'A-'],
  [0.8, 'B+'],
  [0.75, 'B'],
  [0.7, 'B-'],
  [0.65, 'C+'],
  [0.6, 'C'],
];

export function gradeForScore(score: number): QualityGrade {
  for (const [floor, grade] of GRADE_FLOORS) {
    if (score >= floor) return grade;
  }
  return 'F';
}

const STRENGTH_FLOOR = 0.8;
const WEAKNESS_CEILING = 0.6;

const AXIS_LABEL: Record<SubscoreName, { strong: string; weak: string }> = {
  relevance: { strong: 'Speaks directly to both numbers', weak: 'Misses the numbers’ themes' },
  voice: { strong: 'Consistent persona voice', weak: 'Persona voice is thin or mixed' },
  structure: { strong: 'Well-formed sentences within length bounds', weak: 'Structural problems or length out of bounds' },
  actionability: { strong: 'Gives the reader something to do', weak: 'No concrete directive' },
  safety: { strong: 'No unsafe claims', weak: 'Contains blocklisted claims' },
};

export function describeScore(score: QualityScore): { grade: QualityGrade; strengths: string[]; weaknesses: string[] } {
  const strengths: string[] = [];
  const weaknesses: string[] = [];
  for (const name of SUBSCORE_NAMES) {
    const value = score.subscores[name];
    if (value >= STRENGTH_FLOOR) strengths.push(AXIS_LABEL[name].strong);
    else if (value < WEAKNESS_CEILING) weaknesses.push(AXIS_LABEL[name].weak);
  }
  return { grade: gradeForScore(score.overall), strengths, weaknesses };
}
