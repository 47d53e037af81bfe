/**
 * Aggregate usage statistics across requests.
 *
 * `record` is synchronous, so updates from concurrent requests never
 * interleave. Snapshots are plain copies.
 */

import type {
  FailureReason,
  GenerationResult,
  PersonaId,
  QualityGrade,
  StrategyUsed,
  SuccessPath,
} from './types';

export type CombinationUsage = {
  key: string;
  count: number;
};

export type UsageStatisticsSnapshot = {
  totalRequests: number;
  generationSuccesses: number;
  fallbackUses: number;
  emergencyUses: number;
  successRate: number;
  fallbackRate: number;
  emergencyRate: number;
  averageQuality: number;
  averageDurationMs: number;
  averageAttempts: number;
  strategyCounts: Record<StrategyUsed, number>;
  failureReasonCounts: Partial<Record<FailureReason, number>>;
  gradeCounts: Partial<Record<QualityGrade, number>>;
  personaUsage: Record<PersonaId, number>;
  topCombinations: CombinationUsage[];
};

const TOP_COMBINATIONS = 10;

function emptyPersonaUsage(): Record<PersonaId, number> {
  return { Oracle: 0, Psychologist: 0, MindfulnessCoach: 0, NumerologyScholar: 0, Philosopher: 0 };
}

function countsOf<K extends string>(counts: ReadonlyMap<K, number>): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const [key, count] of counts) out[key] = count;
  return out;
}

export class UsageStatistics {
  private total = 0;
  private paths: Record<SuccessPath, number> = { generation: 0, fallback: 0, emergency: 0 };
  private qualitySum = 0;
  private durationSum = 0;
  private attemptsSum = 0;
  private strategies: Record<StrategyUsed, number> = { enhanced: 0, strict: 0, pure: 0, fallback: 0, emergency: 0 };
  private failures = new Map<FailureReason, number>();
  private grades = new Map<QualityGrade, number>();
  private personas = emptyPersonaUsage();
  private combinations = new Map<string, number>();

  record(result: GenerationResult): void {
    this.total++;
    this.paths[result.successPath]++;
    this.qualitySum += result.finalScore;
    this.durationSum += result.totalDurationMs;
    this.attemptsSum += result.attemptsUsed;
    this.strategies[result.strategyUsed]++;
    this.personas[result.persona]++;
    this.grades.set(result.grade, (this.grades.get(result.grade) ?? 0) + 1);
    for (const attempt of result.attempts) {
      if (attempt.failureReason) {
        this.failures.set(attempt.failureReason, (this.failures.get(attempt.failureReason) ?? 0) + 1);
      }
    }
    const combo = `${result.persona}:${result.numberA}-${result.numberB}`;
    this.combinations.set(combo, (this.combinations.get(combo) ?? 0) + 1);
  }

  snapshot(): UsageStatisticsSnapshot {
    const rate = (n: number): number => (this.total ? n / this.total : 0);
    return {
      totalRequests: this.total,
      generationSuccesses: this.paths.generation,
      fallbackUses: this.paths.fallback,
      emergencyUses: this.paths.emergency,
      successRate: rate(this.paths.generation),
      fallbackRate: rate(this.paths.fallback),
      emergencyRate: rate(this.paths.emergency),
      averageQuality: rate(this.qualitySum),
      averageDurationMs: rate(this.durationSum),
      averageAttempts: rate(this.attemptsSum),
      strategyCounts: { ...this.strategies },
      failureReasonCounts: countsOf(this.failures),
      gradeCounts: countsOf(this.grades),
      personaUsage: { ...this.personas },
      topCombinations: [...this.combinations]
        .map(([key, count]) => ({ key, count }))
        .sort((a, b) => (b.count - a.count) || a.key.localeCompare(b.key))
        .slice(0, TOP_COMBINATIONS),
    };
  }

  reset(): void {
    this.total = 0;
    this.paths = { generation: 0, fallback: 0, emergency: 0 };
    this.qualitySum = 0;
    this.durationSum = 0;
    this.attemptsSum = 0;
    this.strategies = { enhanced: 0, strict: 0, pure: 0, fallback: 0, emergency: 0 };
    this.failures.clear();
    this.grades.clear();
    this.personas = emptyPersonaUsage();
    this.combinations.clear();
  }
}
