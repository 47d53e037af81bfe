/**
 * Insight gate module exports
 *
 * Public API for the selection → fusion → quality gate → fallback pipeline.
 * The canonical source of truth for types is types.ts.
 */

// All type definitions (canonical source)
export * from './types';

// Utility functions
export {
  // RNG
  type Rng,
  makeRng,
  facetSeed,
  normalizeSeed,
  randomSeedString,
  fnv1a32,
  mulberry32,
  // Clamping
  clamp01,
  roundScore,
} from './utils';

// Errors and logging
export * from './errors';
export * from './logger';

// Configuration and vocabulary
export * from './config';
export {
  Vocabulary,
  defaultVocabulary,
  isLexiconV1,
  isPersonaVoicesV1,
  type LexiconV1,
  type PersonaVoicesV1,
  type NumberTheme,
  type PersonaVoice,
} from './vocabulary';

// Boundary validation
export * from './context';

// Text analysis
export * from './text';
export * from './similarity';

// Stages
export * from './contentStore';
export * from './scoreCache';
export * from './stages/selector';
export * from './stages/composer';
export * from './stages/evaluator';

// Tiers
export * from './rotationStore';
export * from './tiers/fallbackBank';
export * from './tiers/emergency';

// Orchestration
export * from './deadline';
export * from './qualityGate';
export * from './statistics';
export * from './telemetry';
