/**
 * Telemetry sink for per-request summaries. Dispatch is fire-and-forget:
 * the request never waits on the sink, and sink failures are logged.
 */

import type { Logger } from './logger';
import type { CoreNumber, FailureReason, GenerationResult, PersonaId, StrategyUsed, SuccessPath } from './types';

export type InsightGeneratedEvent = {
  type: 'insight.generated';
  at: number;
  persona: PersonaId;
  numberA: CoreNumber;
  numberB: CoreNumber;
  strategyUsed: StrategyUsed;
  successPath: SuccessPath;
  finalScore: number;
  attemptsUsed: number;
  totalDurationMs: number;
  fallbackReason: FailureReason | null;
};

export interface TelemetrySink {
  emit(event: InsightGeneratedEvent): void | Promise<void>;
}

export function summarizeResult(result: GenerationResult, at: number): InsightGeneratedEvent {
  return {
    type: 'insight.generated',
    at,
    persona: result.persona,
    numberA: result.numberA,
    numberB: result.numberB,
    strategyUsed: result.strategyUsed,
    successPath: result.successPath,
    finalScore: result.finalScore,
    attemptsUsed: result.attemptsUsed,
    totalDurationMs: result.totalDurationMs,
    fallbackReason: result.fallbackReason,
  };
}

export function dispatchTelemetry(sink: TelemetrySink, event: InsightGeneratedEvent, logger: Logger): void {
  const report = (err: unknown): void => {
    logger.warn(`Telemetry sink failed: ${err instanceof Error ? err.message : String(err)}`);
  };
  try {
    const pending = sink.emit(event);
    if (pending instanceof Promise) pending.catch(report);
  } catch (err) {
    report(err);
  }
}

/** Default sink: one debug line per request. */
export class LoggingTelemetrySink implements TelemetrySink {
  constructor(private readonly logger: Logger) {}

  emit(event: InsightGeneratedEvent): void {
    this.logger.debug(
      `${event.persona} ${event.numberA}-${event.numberB} → ${event.strategyUsed} ` +
        `score=${event.finalScore.toFixed(3)} attempts=${event.attemptsUsed} ${event.totalDurationMs}ms`
    );
  }
}
