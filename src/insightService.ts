/**
 * InsightService: the public entry point.
 *
 * `create` loads configuration, corpus, fallback bank and vocabulary once and
 * wires the pipeline; `generate` validates caller input, runs the quality
 * gate, records statistics and hands a summary to the telemetry sink.
 */

import { loadInsightConfig, type InsightConfig, type InsightConfigOverrides } from './insight/config';
import { loadContentStore, type ContentStore } from './insight/contentStore';
import { parseInsightContext } from './insight/context';
import { createLogger, type Logger } from './insight/logger';
import { QualityGate, type RunOptions } from './insight/qualityGate';
import { InMemoryRotationStore, type RotationStore } from './insight/rotationStore';
import type { SimilarityScorer } from './insight/similarity';
import { Composer } from './insight/stages/composer';
import { Evaluator } from './insight/stages/evaluator';
import { Selector } from './insight/stages/selector';
import { UsageStatistics, type UsageStatisticsSnapshot } from './insight/statistics';
import { LoggingTelemetrySink, dispatchTelemetry, summarizeResult, type TelemetrySink } from './insight/telemetry';
import { EmergencyTemplates } from './insight/tiers/emergency';
import { FallbackBank, loadFallbackBank } from './insight/tiers/fallbackBank';
import { systemClock, type Clock, type GenerationResult } from './insight/types';
import { defaultVocabulary, type Vocabulary } from './insight/vocabulary';

export type InsightServiceOptions = {
  configPath?: string;
  overrides?: InsightConfigOverrides;
  /** Defaults to the bundled corpus file. */
  contentStore?: ContentStore;
  corpusPath?: string;
  /** Inline fallback records; the bundled bank file is read when omitted. */
  fallbackRecords?: readonly unknown[];
  fallbackPath?: string;
  rotationStore?: RotationStore;
  telemetry?: TelemetrySink;
  similarity?: SimilarityScorer;
  vocabulary?: Vocabulary;
  logger?: Logger;
  clock?: Clock;
};

type ServiceParts = {
  config: InsightConfig;
  selector: Selector;
  evaluator: Evaluator;
  fallbackBank: FallbackBank;
  gate: QualityGate;
  telemetry: TelemetrySink;
  logger: Logger;
  clock: Clock;
};

export class InsightService {
  readonly config: InsightConfig;
  readonly selector: Selector;
  readonly evaluator: Evaluator;
  readonly fallbackBank: FallbackBank;
  private readonly gate: QualityGate;
  private readonly telemetry: TelemetrySink;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly stats = new UsageStatistics();

  private constructor(parts: ServiceParts) {
    this.config = parts.config;
    this.selector = parts.selector;
    this.evaluator = parts.evaluator;
    this.fallbackBank = parts.fallbackBank;
    this.gate = parts.gate;
    this.telemetry = parts.telemetry;
    this.logger = parts.logger;
    this.clock = parts.clock;
  }

  /** Every configuration defect throws `InsightConfigError` here, before any request. */
  static async create(options: InsightServiceOptions = {}): Promise<InsightService> {
    const config = loadInsightConfig({ path: options.configPath, overrides: options.overrides });
    const logger = options.logger ?? createLogger('insight', { level: config.logging.level });
    const clock = options.clock ?? systemClock;
    const vocabulary = options.vocabulary ?? defaultVocabulary();
    const threshold = config.qualityGate.minimumQualityThreshold;

    const store = options.contentStore
      ?? await loadContentStore({ path: options.corpusPath, logger: logger.child('content') });

    const evaluator = new Evaluator({ config: config.evaluator, vocabulary });
    const emergency = new EmergencyTemplates({ vocabulary, evaluator, minimumQualityThreshold: threshold });
    logger.debug(`Emergency templates verified, minimum score ${emergency.minimumScore}`);

    const bankOptions = {
      minimumQualityThreshold: threshold,
      structure: config.evaluator.structure,
      vocabulary,
      rotation: options.rotationStore ?? new InMemoryRotationStore(clock, config.fallback.rotationCapacity),
      logger: logger.child('fallback'),
    };
    const fallbackBank = options.fallbackRecords
      ? FallbackBank.fromRecords(options.fallbackRecords, bankOptions)
      : await loadFallbackBank({ ...bankOptions, path: options.fallbackPath });

    const selector = new Selector({
      config: config.selector,
      store,
      vocabulary,
      logger: logger.child('selector'),
      similarity: options.similarity,
      clock,
    });
    const composer = new Composer({ config: config.composer, vocabulary });
    const gate = new QualityGate({
      config: config.qualityGate,
      selector,
      composer,
      evaluator,
      fallbackBank,
      emergency,
      minimumWords: config.evaluator.structure.minWords,
      logger: logger.child('gate'),
      clock,
    });

    return new InsightService({
      config,
      selector,
      evaluator,
      fallbackBank,
      gate,
      telemetry: options.telemetry ?? new LoggingTelemetrySink(logger.child('telemetry')),
      logger,
      clock,
    });
  }

  /**
   * Numbers outside 1–9 and unknown personas throw `InvalidInsightContextError`
   * before the pipeline runs. Past that point the call always resolves.
   */
  async generate(
    numberA: unknown,
    numberB: unknown,
    persona: unknown,
    situationalTag?: string | null,
    options: RunOptions = {}
  ): Promise<GenerationResult> {
    const context = parseInsightContext({ numberA, numberB, persona, situationalTag });
    const result = await this.gate.run(context, options);

    this.stats.record(result);
    dispatchTelemetry(this.telemetry, summarizeResult(result, this.clock.now()), this.logger);
    this.logger.debug(
      `${result.persona} ${result.numberA}-${result.numberB}: ${result.strategyUsed} ` +
        `${result.finalScore.toFixed(3)} (${result.grade}) in ${result.totalDurationMs}ms`
    );
    return result;
  }

  statistics(): UsageStatisticsSnapshot {
    return this.stats.snapshot();
  }

  resetStatistics(): void {
    this.stats.reset();
  }
}
