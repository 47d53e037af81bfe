/**
 * Insight Gate Types
 *
 * Shared types for the selection → fusion → quality gate → fallback pipeline.
 * Per-request values are frozen once built; only rotation state and
 * statistics outlive a request.
 */

// ============================================================================
// Context
// ============================================================================

export const CORE_NUMBERS = [1, 2, 3, 4, 5, 6, 7, 8, 9] as const;
export type CoreNumber = (typeof CORE_NUMBERS)[number];

export const PERSONA_IDS = [
  'Oracle',
  'Psychologist',
  'MindfulnessCoach',
  'NumerologyScholar',
  'Philosopher',
] as const;
export type PersonaId = (typeof PERSONA_IDS)[number];

export type InsightContext = Readonly<{
  numberA: CoreNumber;
  numberB: CoreNumber;
  persona: PersonaId;
  situationalTag: string | null;
}>;

// ============================================================================
// Content
// ============================================================================

export type ContentFragment = Readonly<{
  id: string;
  persona: PersonaId;
  associatedNumber: CoreNumber;
  category: string;
  text: string;
  /** 0..1, editorial weight of the fragment's tone. */
  intensity: number;
  tags: readonly string[];
}>;

export type RankedFragment = Readonly<{
  fragment: ContentFragment;
  rank: number;
}>;

/** Tag-independent ranking terms, each in [0,1] except the raw keyword count. */
export type ScoredFragment = Readonly<{
  fragment: ContentFragment;
  keywordHits: number;
  depthIndicator: number;
  personaVoiceMatch: number;
  semanticSimilarity: number;
}>;

export type CandidateSet =
  | Readonly<{
      kind: 'selected';
      candidates: readonly RankedFragment[];
      totalCandidates: number;
      timedOut: boolean;
      fromCache: boolean;
    }>
  | Readonly<{
      kind: 'content_unavailable';
      persona: PersonaId;
      numbers: readonly CoreNumber[];
    }>;

export type SelectedCandidates = Extract<CandidateSet, { kind: 'selected' }>;

// ============================================================================
// Generation
// ============================================================================

export const GENERATION_STRATEGIES = ['enhanced', 'strict', 'pure'] as const;
export type GenerationStrategy = (typeof GENERATION_STRATEGIES)[number];
export type TierStrategy = 'fallback' | 'emergency';
export type StrategyUsed = GenerationStrategy | TierStrategy;

export type CandidatePassage = Readonly<{
  text: string;
  sourceFragmentIds: readonly string[];
  strategy: StrategyUsed;
}>;

export const SUBSCORE_NAMES = ['relevance', 'voice', 'structure', 'actionability', 'safety'] as const;
export type SubscoreName = (typeof SUBSCORE_NAMES)[number];
export type Subscores = Readonly<Record<SubscoreName, number>>;

export type QualityScore = Readonly<{
  overall: number;
  subscores: Subscores;
}>;

export type FailureReason =
  | 'content_unavailable'
  | 'quality_below_threshold'
  | 'fallback_exhausted'
  | 'timeout'
  | 'cancelled'
  | 'attempt_error';

export type GenerationAttempt = Readonly<{
  attemptNumber: number;
  strategy: StrategyUsed;
  passage: CandidatePassage | null;
  score: QualityScore | null;
  durationMs: number;
  failureReason?: FailureReason;
}>;

export type SuccessPath = 'generation' | 'fallback' | 'emergency';

export type QualityGrade = 'A+' | 'A' | 'A-' | 'B+' | 'B' | 'B-' | 'C+' | 'C' | 'F';

export type GenerationResult = Readonly<{
  text: string;
  finalScore: number;
  grade: QualityGrade;
  strategyUsed: StrategyUsed;
  successPath: SuccessPath;
  attemptsUsed: number;
  totalDurationMs: number;
  usedFallback: boolean;
  fallbackReason: FailureReason | null;
  persona: PersonaId;
  numberA: CoreNumber;
  numberB: CoreNumber;
  seed: string;
  attempts: readonly GenerationAttempt[];
}>;

// ============================================================================
// Fallback bank
// ============================================================================

export type FallbackEntry = Readonly<{
  id: string;
  numberPairKey: string;
  baseText: string;
  personaVariants: Readonly<Partial<Record<PersonaId, string>>>;
  qualityScore: number;
  tags: readonly string[];
}>;

export type FallbackSelection = Readonly<{
  entry: FallbackEntry;
  text: string;
  usedVariant: boolean;
  lastUsedAt: number;
}>;

// ============================================================================
// Infrastructure
// ============================================================================

export type Clock = {
  now: () => number;
};

export const systemClock: Clock = { now: () => Date.now() };
