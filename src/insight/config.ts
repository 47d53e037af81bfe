/**
 * Insight gate configuration: YAML file + programmatic overrides.
 *
 * Loaded once at startup. Every defect throws `InsightConfigError` naming the
 * offending key, so a bad file never reaches request handling.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import { InsightConfigError } from './errors';
import { isLogLevel, type LogLevel } from './logger';
import { GENERATION_STRATEGIES, SUBSCORE_NAMES, type GenerationStrategy, type SubscoreName } from './types';
import { isRecord } from './utils';

// ─────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────

export type StrategyFraming = 'framed' | 'plain';

export type ComposerStrategyConfig = {
  /** Probability that a body fragment is used word for word. */
  verbatimRatio: number;
  maxWords: number;
  bodyFragments: number;
  /** `framed` wraps the body in a persona opening and closing; `plain` adds a closing only when needed. */
  framing: StrategyFraming;
};

export type RankingWeights = {
  keywordMatch: number;
  depthIndicator: number;
  personaVoiceMatch: number;
  semanticSimilarity: number;
};

export type StructureBounds = {
  minWords: number;
  maxWords: number;
  minSentences: number;
  maxSentences: number;
  wordBoundsPenalty: number;
  sentenceBoundsPenalty: number;
  malformationPenalty: number;
};

export type InsightConfig = {
  version: 1;
  logging: { level: LogLevel };
  qualityGate: {
    minimumQualityThreshold: number;
    maxRetryAttempts: number;
    attemptTimeoutMs: number;
    totalTimeoutMs: number;
    strategyOrder: readonly GenerationStrategy[];
  };
  evaluator: {
    weights: Record<SubscoreName, number>;
    relevanceTarget: number;
    voiceTarget: number;
    foreignMarkerPenalty: number;
    safetyPenalty: number;
    structure: StructureBounds;
  };
  selector: {
    minCandidates: number;
    maxCandidates: number;
    timeoutMs: number;
    batchSize: number;
    diversityThreshold: number;
    relevanceWeight: number;
    diversityWeight: number;
    rankingWeights: RankingWeights;
    scoreCacheTtlMs: number;
  };
  composer: {
    strategies: Record<GenerationStrategy, ComposerStrategyConfig>;
  };
  fallback: {
    rotationCapacity: number;
  };
};

export type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type InsightConfigOverrides = DeepPartial<InsightConfig>;

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/insight-gate.yaml', import.meta.url));

const WEIGHT_SUM_TOLERANCE = 1e-6;

// ─────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────

export function loadInsightConfig(options: { path?: string; overrides?: InsightConfigOverrides } = {}): InsightConfig {
  const path = options.path ?? DEFAULT_CONFIG_PATH;
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new InsightConfigError('file', `cannot read ${path}`, { cause: err, code: 'config_unreadable' });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(text);
  } catch (err) {
    throw new InsightConfigError('file', `invalid YAML in ${path}`, { cause: err });
  }

  return parseInsightConfig(mergeOverrides(parsed, options.overrides));
}

/** Deep-merges plain objects; arrays and scalars in `overrides` replace the base value. */
export function mergeOverrides(base: unknown, overrides: unknown): unknown {
  if (overrides === undefined) return base;
  if (!isRecord(base) || !isRecord(overrides)) return overrides;
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    out[key] = mergeOverrides(base[key], value);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

type NumberRule = { min?: number; max?: number; integer?: boolean; exclusiveMin?: boolean };

function section(raw: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
  const value = raw[key];
  const fullKey = path ? `${path}.${key}` : key;
  if (!isRecord(value)) throw new InsightConfigError(fullKey, 'missing section');
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, path: string, rule: NumberRule = {}): number {
  const value = raw[key];
  const fullKey = `${path}.${key}`;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InsightConfigError(fullKey, `expected a number, got ${JSON.stringify(value)}`);
  }
  if (rule.integer && !Number.isInteger(value)) throw new InsightConfigError(fullKey, `expected an integer, got ${value}`);
  if (rule.min !== undefined) {
    const tooLow = rule.exclusiveMin ? value <= rule.min : value < rule.min;
    if (tooLow) throw new InsightConfigError(fullKey, `must be ${rule.exclusiveMin ? '>' : '>='} ${rule.min}, got ${value}`);
  }
  if (rule.max !== undefined && value > rule.max) {
    throw new InsightConfigError(fullKey, `must be <= ${rule.max}, got ${value}`);
  }
  return value;
}

function isGenerationStrategy(value: unknown): value is GenerationStrategy {
  return typeof value === 'string' && (GENERATION_STRATEGIES as readonly string[]).includes(value);
}

function readStrategyOrder(raw: Record<string, unknown>, path: string): GenerationStrategy[] {
  const value = raw.strategyOrder;
  const key = `${path}.strategyOrder`;
  if (!Array.isArray(value) || value.length === 0) throw new InsightConfigError(key, 'expected a non-empty list');
  const out: GenerationStrategy[] = [];
  for (const item of value) {
    if (!isGenerationStrategy(item)) throw new InsightConfigError(key, `unknown strategy "${String(item)}"`);
    if (out.includes(item)) throw new InsightConfigError(key, `strategy "${item}" listed twice`);
    out.push(item);
  }
  return out;
}

function assertSumsToOne(values: readonly number[], key: string): void {
  const sum = values.reduce((acc, v) => acc + v, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InsightConfigError(key, `weights must sum to 1.0, got ${sum.toFixed(4)}`);
  }
}

function readWeights(raw: Record<string, unknown>, path: string): Record<SubscoreName, number> {
  const weights = section(raw, 'weights', path);
  const key = `${path}.weights`;
  for (const name of Object.keys(weights)) {
    if (!(SUBSCORE_NAMES as readonly string[]).includes(name)) throw new InsightConfigError(key, `unknown subscore "${name}"`);
  }
  const out: Record<SubscoreName, number> = {
    relevance: readNumber(weights, 'relevance', key, { min: 0, max: 1 }),
    voice: readNumber(weights, 'voice', key, { min: 0, max: 1 }),
    structure: readNumber(weights, 'structure', key, { min: 0, max: 1 }),
    actionability: readNumber(weights, 'actionability', key, { min: 0, max: 1 }),
    safety: readNumber(weights, 'safety', key, { min: 0, max: 1 }),
  };
  assertSumsToOne(Object.values(out), key);
  return out;
}

function readStructure(raw: Record<string, unknown>, path: string): StructureBounds {
  const s = section(raw, 'structure', path);
  const key = `${path}.structure`;
  const bounds: StructureBounds = {
    minWords: readNumber(s, 'minWords', key, { min: 1, integer: true }),
    maxWords: readNumber(s, 'maxWords', key, { min: 1, integer: true }),
    minSentences: readNumber(s, 'minSentences', key, { min: 1, integer: true }),
    maxSentences: readNumber(s, 'maxSentences', key, { min: 1, integer: true }),
    wordBoundsPenalty: readNumber(s, 'wordBoundsPenalty', key, { min: 0, max: 1 }),
    sentenceBoundsPenalty: readNumber(s, 'sentenceBoundsPenalty', key, { min: 0, max: 1 }),
    malformationPenalty: readNumber(s, 'malformationPenalty', key, { min: 0, max: 1 }),
  };
  if (bounds.minWords > bounds.maxWords) throw new InsightConfigError(`${key}.minWords`, 'exceeds maxWords');
  if (bounds.minSentences > bounds.maxSentences) throw new InsightConfigError(`${key}.minSentences`, 'exceeds maxSentences');
  return bounds;
}

function readComposerStrategies(raw: Record<string, unknown>, path: string): Record<GenerationStrategy, ComposerStrategyConfig> {
  const strategies = section(raw, 'strategies', path);
  const key = `${path}.strategies`;
  for (const name of Object.keys(strategies)) {
    if (!isGenerationStrategy(name)) throw new InsightConfigError(key, `unknown strategy "${name}"`);
  }
  const read = (name: GenerationStrategy): ComposerStrategyConfig => {
    const s = section(strategies, name, key);
    const sKey = `${key}.${name}`;
    const framing = s.framing;
    if (framing !== 'framed' && framing !== 'plain') {
      throw new InsightConfigError(`${sKey}.framing`, `expected "framed" or "plain", got ${JSON.stringify(framing)}`);
    }
    return {
      verbatimRatio: readNumber(s, 'verbatimRatio', sKey, { min: 0, max: 1 }),
      maxWords: readNumber(s, 'maxWords', sKey, { min: 1, integer: true }),
      bodyFragments: readNumber(s, 'bodyFragments', sKey, { min: 1, integer: true }),
      framing,
    };
  };
  return { enhanced: read('enhanced'), strict: read('strict'), pure: read('pure') };
}

export function parseInsightConfig(raw: unknown): InsightConfig {
  if (!isRecord(raw)) throw new InsightConfigError('root', 'expected a mapping');
  if (raw.version !== 1) throw new InsightConfigError('version', `unsupported version ${JSON.stringify(raw.version)}`);

  const level = section(raw, 'logging', '').level;
  if (!isLogLevel(level)) throw new InsightConfigError('logging.level', `unknown level ${JSON.stringify(level)}`);

  const gate = section(raw, 'qualityGate', '');
  const qualityGate: InsightConfig['qualityGate'] = {
    minimumQualityThreshold: readNumber(gate, 'minimumQualityThreshold', 'qualityGate', { min: 0, max: 1, exclusiveMin: true }),
    maxRetryAttempts: readNumber(gate, 'maxRetryAttempts', 'qualityGate', { min: 1, integer: true }),
    attemptTimeoutMs: readNumber(gate, 'attemptTimeoutMs', 'qualityGate', { min: 0, exclusiveMin: true }),
    totalTimeoutMs: readNumber(gate, 'totalTimeoutMs', 'qualityGate', { min: 0, exclusiveMin: true }),
    strategyOrder: readStrategyOrder(gate, 'qualityGate'),
  };
  if (qualityGate.strategyOrder.length < qualityGate.maxRetryAttempts) {
    throw new InsightConfigError(
      'qualityGate.strategyOrder',
      `lists ${qualityGate.strategyOrder.length} strategies but maxRetryAttempts is ${qualityGate.maxRetryAttempts}`
    );
  }

  const ev = section(raw, 'evaluator', '');
  const evaluator: InsightConfig['evaluator'] = {
    weights: readWeights(ev, 'evaluator'),
    relevanceTarget: readNumber(ev, 'relevanceTarget', 'evaluator', { min: 1, integer: true }),
    voiceTarget: readNumber(ev, 'voiceTarget', 'evaluator', { min: 1, integer: true }),
    foreignMarkerPenalty: readNumber(ev, 'foreignMarkerPenalty', 'evaluator', { min: 0, max: 1 }),
    safetyPenalty: readNumber(ev, 'safetyPenalty', 'evaluator', { min: 0, max: 1 }),
    structure: readStructure(ev, 'evaluator'),
  };
  // A passage with no directive loses the whole actionability weight; it must not clear the gate.
  if (evaluator.weights.actionability <= 1 - qualityGate.minimumQualityThreshold) {
    throw new InsightConfigError(
      'evaluator.weights.actionability',
      `must exceed 1 - minimumQualityThreshold (${(1 - qualityGate.minimumQualityThreshold).toFixed(2)})`
    );
  }

  const sel = section(raw, 'selector', '');
  const ranking = section(sel, 'rankingWeights', 'selector');
  const selector: InsightConfig['selector'] = {
    minCandidates: readNumber(sel, 'minCandidates', 'selector', { min: 1, integer: true }),
    maxCandidates: readNumber(sel, 'maxCandidates', 'selector', { min: 1, integer: true }),
    timeoutMs: readNumber(sel, 'timeoutMs', 'selector', { min: 0, exclusiveMin: true }),
    batchSize: readNumber(sel, 'batchSize', 'selector', { min: 1, integer: true }),
    diversityThreshold: readNumber(sel, 'diversityThreshold', 'selector', { min: 0, max: 1 }),
    relevanceWeight: readNumber(sel, 'relevanceWeight', 'selector', { min: 0, max: 1 }),
    diversityWeight: readNumber(sel, 'diversityWeight', 'selector', { min: 0, max: 1 }),
    rankingWeights: {
      keywordMatch: readNumber(ranking, 'keywordMatch', 'selector.rankingWeights', { min: 0, max: 1 }),
      depthIndicator: readNumber(ranking, 'depthIndicator', 'selector.rankingWeights', { min: 0, max: 1 }),
      personaVoiceMatch: readNumber(ranking, 'personaVoiceMatch', 'selector.rankingWeights', { min: 0, max: 1 }),
      semanticSimilarity: readNumber(ranking, 'semanticSimilarity', 'selector.rankingWeights', { min: 0, max: 1 }),
    },
    scoreCacheTtlMs: readNumber(sel, 'scoreCacheTtlMs', 'selector', { min: 0 }),
  };
  if (selector.minCandidates > selector.maxCandidates) {
    throw new InsightConfigError('selector.minCandidates', 'exceeds maxCandidates');
  }
  assertSumsToOne([selector.relevanceWeight, selector.diversityWeight], 'selector.relevanceWeight');
  assertSumsToOne(Object.values(selector.rankingWeights), 'selector.rankingWeights');
  // a partial ranking is only useful if it lands before the attempt is abandoned
  if (selector.timeoutMs >= qualityGate.attemptTimeoutMs) {
    throw new InsightConfigError(
      'selector.timeoutMs',
      `${selector.timeoutMs}ms must be below qualityGate.attemptTimeoutMs (${qualityGate.attemptTimeoutMs}ms)`
    );
  }

  const comp = section(raw, 'composer', '');
  const composer: InsightConfig['composer'] = { strategies: readComposerStrategies(comp, 'composer') };

  const fb = section(raw, 'fallback', '');
  const fallback: InsightConfig['fallback'] = {
    rotationCapacity: readNumber(fb, 'rotationCapacity', 'fallback', { min: 1, integer: true }),
  };

  return {
    version: 1,
    logging: { level },
    qualityGate,
    evaluator,
    selector,
    composer,
    fallback,
  };
}
