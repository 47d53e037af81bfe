/**
 * Error types thrown at the pipeline's edges.
 *
 * Failures inside a request are values (`FailureReason` on an attempt) and never
 * reach these classes; these cover startup configuration and caller input.
 */

export type InsightErrorCode =
  | 'config_invalid'
  | 'config_unreadable'
  | 'invalid_context'
  | 'content_store_unreadable';

export class InsightError extends Error {
  readonly code: InsightErrorCode;

  constructor(code: InsightErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InsightConfigError extends InsightError {
  /** Dotted path of the offending key, e.g. `evaluator.weights`. */
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown; code?: 'config_invalid' | 'config_unreadable' }) {
    super(options?.code ?? 'config_invalid', `Insight config ${key}: ${message}`, options);
    this.key = key;
  }
}

export class InvalidInsightContextError extends InsightError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('invalid_context', message);
    this.field = field;
  }
}

export class ContentStoreError extends InsightError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('content_store_unreadable', message, options);
  }
}
