/**
 * Quality gate: the retry loop over generation strategies, then the curated
 * fallback bank, then the emergency templates.
 *
 * Every returned passage scored at or above the threshold: generated passages
 * by the evaluator (and only at or above the minimum word count), fallback entries by their curated score, emergency
 * templates by the startup check. Each attempt runs under its own time budget
 * and the whole loop under a total one; cancellation ends the loop early but
 * still returns a safe passage.
 */

import type { InsightConfig } from './config';
import { linkedAbortController, raceWithDeadline } from './deadline';
import type { Logger } from './logger';
import type { PassageComposer } from './stages/composer';
import { gradeForScore, type PassageEvaluator } from './stages/evaluator';
import type { CandidateSelector } from './stages/selector';
import { countWords } from './text';
import type { EmergencyTemplates } from './tiers/emergency';
import type { FallbackBank } from './tiers/fallbackBank';
import {
  systemClock,
  type CandidatePassage,
  type Clock,
  type FailureReason,
  type FallbackSelection,
  type GenerationAttempt,
  type GenerationResult,
  type GenerationStrategy,
  type InsightContext,
  type QualityScore,
  type StrategyUsed,
  type SuccessPath,
} from './types';
import { facetSeed, makeRng, normalizeSeed, randomSeedString } from './utils';

export type QualityGateOptions = {
  config: InsightConfig['qualityGate'];
  selector: CandidateSelector;
  composer: PassageComposer;
  evaluator: PassageEvaluator;
  fallbackBank: FallbackBank;
  emergency: EmergencyTemplates;
  /** Generated passages shorter than this are rejected whatever their score. */
  minimumWords: number;
  logger: Logger;
  clock?: Clock;
};

export type RunOptions = {
  /** Same seed + same context + same candidates gives the same passage. Random when omitted. */
  seed?: string;
  signal?: AbortSignal;
};

type AttemptOutcome =
  | { kind: 'unavailable' }
  | { kind: 'scored'; passage: CandidatePassage; score: QualityScore };

type RunState = {
  context: InsightContext;
  seed: string;
  startedAt: number;
  attempts: GenerationAttempt[];
};

type Delivery = {
  text: string;
  finalScore: number;
  strategyUsed: StrategyUsed;
  successPath: SuccessPath;
  attemptsUsed: number;
  fallbackReason: FailureReason | null;
};

/** Strategy for a 1-based attempt number; attempts past the list reuse its last entry. */
export function strategyForAttempt(attemptNumber: number, order: readonly GenerationStrategy[]): GenerationStrategy {
  const index = Math.max(0, Math.min(order.length - 1, attemptNumber - 1));
  const strategy = order[index];
  if (strategy === undefined) throw new Error('strategyOrder is empty');
  return strategy;
}

export class QualityGate {
  private readonly config: InsightConfig['qualityGate'];
  private readonly selector: CandidateSelector;
  private readonly composer: PassageComposer;
  private readonly evaluator: PassageEvaluator;
  private readonly fallbackBank: FallbackBank;
  private readonly emergency: EmergencyTemplates;
  private readonly minimumWords: number;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(options: QualityGateOptions) {
    this.config = options.config;
    this.selector = options.selector;
    this.composer = options.composer;
    this.evaluator = options.evaluator;
    this.fallbackBank = options.fallbackBank;
    this.emergency = options.emergency;
    this.minimumWords = options.minimumWords;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  async run(context: InsightContext, options: RunOptions = {}): Promise<GenerationResult> {
    const cfg = this.config;
    const state: RunState = {
      context,
      seed: normalizeSeed(options.seed ?? randomSeedString()),
      startedAt: this.clock.now(),
      attempts: [],
    };
    const deadline = state.startedAt + cfg.totalTimeoutMs;
    let lastFailure: FailureReason | null = null;

    for (let n = 1; n <= cfg.maxRetryAttempts; n++) {
      const strategy = strategyForAttempt(n, cfg.strategyOrder);
      const attemptStart = this.clock.now();

      if (options.signal?.aborted) {
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'cancelled');
        break;
      }
      const remaining = deadline - attemptStart;
      if (remaining <= 0) {
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'timeout');
        break;
      }

      const { controller, dispose } = linkedAbortController(options.signal);
      const outcome = await raceWithDeadline(
        this.attempt(context, strategy, state.seed, controller.signal),
        Math.min(cfg.attemptTimeoutMs, remaining),
        options.signal
      );
      if (outcome.status !== 'done') controller.abort();
      dispose();

      if (outcome.status === 'aborted') {
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'cancelled');
        break;
      }
      if (outcome.status === 'timeout') {
        this.logger.debug(`Attempt ${n} (${strategy}) timed out`);
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'timeout');
        continue;
      }
      if (outcome.status === 'error') {
        const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
        this.logger.warn(`Attempt ${n} (${strategy}) failed: ${message}`);
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'attempt_error');
        continue;
      }

      const result = outcome.value;
      if (result.kind === 'unavailable') {
        // no content for this persona and pair; retrying cannot help
        this.logger.warn(`No content for ${context.persona} ${context.numberA}-${context.numberB}`);
        lastFailure = this.recordFailure(state, strategy, attemptStart, 'content_unavailable');
        break;
      }

      const words = countWords(result.passage.text);
      const accepted = result.score.overall >= cfg.minimumQualityThreshold && words >= this.minimumWords;
      state.attempts.push({
        attemptNumber: state.attempts.length + 1,
        strategy,
        passage: result.passage,
        score: result.score,
        durationMs: this.clock.now() - attemptStart,
        ...(accepted ? {} : { failureReason: 'quality_below_threshold' as const }),
      });
      if (accepted) {
        return this.deliver(state, {
          text: result.passage.text,
          finalScore: result.score.overall,
          strategyUsed: strategy,
          successPath: 'generation',
          attemptsUsed: n,
          fallbackReason: null,
        });
      }
      if (words < this.minimumWords) {
        this.logger.debug(`Attempt ${n} (${strategy}) has ${words} words, below ${this.minimumWords}`);
      } else {
        this.logger.debug(`Attempt ${n} (${strategy}) scored ${result.score.overall}, below ${cfg.minimumQualityThreshold}`);
      }
      lastFailure = 'quality_below_threshold';
    }

    return this.fallback(state, lastFailure);
  }

  // ─────────────────────────────────────────────────────────────
  // Generation attempt
  // ─────────────────────────────────────────────────────────────

  private async attempt(
    context: InsightContext,
    strategy: GenerationStrategy,
    seed: string,
    signal: AbortSignal
  ): Promise<AttemptOutcome> {
    const set = await this.selector.select(context, { signal });
    if (set.kind === 'content_unavailable') return { kind: 'unavailable' };
    const rng = makeRng(facetSeed(seed, `compose:${strategy}`));
    const passage = this.composer.compose(set, strategy, context, rng);
    const score = this.evaluator.evaluate(passage, context);
    return { kind: 'scored', passage, score };
  }

  private recordFailure(
    state: RunState,
    strategy: StrategyUsed,
    startedAt: number,
    reason: FailureReason
  ): FailureReason {
    state.attempts.push({
      attemptNumber: state.attempts.length + 1,
      strategy,
      passage: null,
      score: null,
      durationMs: this.clock.now() - startedAt,
      failureReason: reason,
    });
    return reason;
  }

  // ─────────────────────────────────────────────────────────────
  // Fallback tiers
  // ─────────────────────────────────────────────────────────────

  private async fallback(state: RunState, reason: FailureReason | null): Promise<GenerationResult> {
    const { context } = state;
    const attemptsUsed = this.config.maxRetryAttempts;
    const fallbackStart = this.clock.now();

    let selection: FallbackSelection | null = null;
    try {
      selection = await this.fallbackBank.claim(context);
    } catch (err) {
      this.logger.error(`Fallback rotation failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (selection) {
      state.attempts.push({
        attemptNumber: state.attempts.length + 1,
        strategy: 'fallback',
        passage: { text: selection.text, sourceFragmentIds: [selection.entry.id], strategy: 'fallback' },
        score: null,
        durationMs: this.clock.now() - fallbackStart,
      });
      return this.deliver(state, {
        text: selection.text,
        finalScore: selection.entry.qualityScore,
        strategyUsed: 'fallback',
        successPath: 'fallback',
        attemptsUsed,
        fallbackReason: reason,
      });
    }

    this.recordFailure(state, 'fallback', fallbackStart, 'fallback_exhausted');
    const emergencyStart = this.clock.now();
    const emergency = this.emergency.build(context);
    state.attempts.push({
      attemptNumber: state.attempts.length + 1,
      strategy: 'emergency',
      passage: emergency.passage,
      score: emergency.score,
      durationMs: this.clock.now() - emergencyStart,
    });
    this.logger.warn(`Emergency template used for ${context.persona} ${context.numberA}-${context.numberB}`);
    return this.deliver(state, {
      text: emergency.passage.text,
      finalScore: emergency.score.overall,
      strategyUsed: 'emergency',
      successPath: 'emergency',
      attemptsUsed,
      fallbackReason: reason,
    });
  }

  private deliver(state: RunState, delivery: Delivery): GenerationResult {
    const { context } = state;
    return Object.freeze({
      ...delivery,
      grade: gradeForScore(delivery.finalScore),
      totalDurationMs: this.clock.now() - state.startedAt,
      usedFallback: delivery.successPath !== 'generation',
      persona: context.persona,
      numberA: context.numberA,
      numberB: context.numberB,
      seed: state.seed,
      attempts: Object.freeze([...state.attempts]),
    });
  }
}
