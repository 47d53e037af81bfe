/**
 * Composer: fuses a candidate set into one passage.
 *
 * Strategies differ only in their config (verbatim ratio, word cap, body size,
 * framing). Every random choice goes through the injected `Rng`, so the same
 * context, candidates and seed always give the same passage.
 */

import tracery from 'tracery-grammar';
import type { ComposerStrategyConfig, InsightConfig } from '../config';
import { contextNumbers } from '../context';
import { countWords, normalizePassageText } from '../text';
import type {
  CandidatePassage,
  ContentFragment,
  GenerationStrategy,
  InsightContext,
  SelectedCandidates,
} from '../types';
import { capitalizeFirst, escapeRegExp, type Rng } from '../utils';
import type { PersonaVoice, Vocabulary } from '../vocabulary';

// ─────────────────────────────────────────────────────────────
// Tracery RNG plumbing
// ─────────────────────────────────────────────────────────────

/** Runs `fn` with tracery drawing from `rng`, then puts Math.random back. */
function withTraceryRng<T>(rng: () => number, fn: () => T): T {
  tracery.setRng?.(rng);
  try {
    return fn();
  } finally {
    tracery.setRng?.(Math.random);
  }
}

// ─────────────────────────────────────────────────────────────
// Paraphrase
// ─────────────────────────────────────────────────────────────

/** Whole-word phrase swaps from the persona's phrase map; a capitalized source stays capitalized. */
export function paraphrase(text: string, phraseMap: ReadonlyMap<string, string>): string {
  let out = text;
  for (const [from, to] of phraseMap) {
    const re = new RegExp(`\\b${escapeRegExp(from)}\\b`, 'gi');
    out = out.replace(re, (match) => (/^[A-Z]/.test(match) ? capitalizeFirst(to) : to));
  }
  return normalizePassageText(out);
}

// ─────────────────────────────────────────────────────────────
// Composer
// ─────────────────────────────────────────────────────────────

export type Skeleton = {
  opening: string;
  closing: string;
};

export interface PassageComposer {
  compose(set: SelectedCandidates, strategy: GenerationStrategy, context: InsightContext, rng: Rng): CandidatePassage;
}

export type ComposerOptions = {
  config: InsightConfig['composer'];
  vocabulary: Vocabulary;
};

export class Composer implements PassageComposer {
  private readonly config: InsightConfig['composer'];
  private readonly vocabulary: Vocabulary;

  constructor(options: ComposerOptions) {
    this.config = options.config;
    this.vocabulary = options.vocabulary;
  }

  compose(set: SelectedCandidates, strategy: GenerationStrategy, context: InsightContext, rng: Rng): CandidatePassage {
    const params = this.config.strategies[strategy];
    const voice = this.vocabulary.voice(context.persona);

    const body = this.pickBody(set, strategy, params, context, rng);
    const bodyTexts = body.map(f => (rng.next01() < params.verbatimRatio ? f.text : paraphrase(f.text, voice.phraseMap)));
    const skeleton = this.renderSkeleton(voice, context, rng);

    const build = (kept: number): string => {
      const texts = bodyTexts.slice(0, kept);
      const opening = params.framing === 'framed' ? skeleton.opening : '';
      const needsClosing = params.framing === 'framed' || !texts.some(t => this.vocabulary.hasDirectiveClause(t));
      return normalizePassageText([opening, ...texts, needsClosing ? skeleton.closing : ''].filter(Boolean).join(' '));
    };

    // trim at sentence boundaries by dropping trailing body fragments
    const minBody = params.framing === 'plain' ? Math.min(1, bodyTexts.length) : 0;
    let kept = bodyTexts.length;
    let text = build(kept);
    while (countWords(text) > params.maxWords && kept > minBody) {
      kept--;
      text = build(kept);
    }

    return {
      text,
      sourceFragmentIds: body.slice(0, kept).map(f => f.id),
      strategy,
    };
  }

  /**
   * One anchor per number (picked from its two best fragments), then the rest
   * from the top of the pool. `strict` reorders the pool by persona-marker
   * density first.
   */
  private pickBody(
    set: SelectedCandidates,
    strategy: GenerationStrategy,
    params: ComposerStrategyConfig,
    context: InsightContext,
    rng: Rng
  ): ContentFragment[] {
    let pool = set.candidates.map(c => c.fragment);
    if (strategy === 'strict') {
      const density = new Map(pool.map(f => [f.id, this.vocabulary.markerHits(f.text, context.persona).length]));
      pool = [...pool].sort((a, b) => (density.get(b.id) ?? 0) - (density.get(a.id) ?? 0));
    }

    const chosen: ContentFragment[] = [];
    for (const n of contextNumbers(context)) {
      const options = pool.filter(f => f.associatedNumber === n && !chosen.includes(f)).slice(0, 2);
      if (options.length) chosen.push(rng.pick(options));
    }
    const rest = pool.filter(f => !chosen.includes(f)).slice(0, params.bodyFragments + 1);
    chosen.push(...rng.pickK(rest, params.bodyFragments - chosen.length));
    return chosen.slice(0, params.bodyFragments);
  }

  renderSkeleton(voice: PersonaVoice, context: InsightContext, rng: Rng): Skeleton {
    const single = context.numberA === context.numberB;
    const rules: Record<string, string[]> = {
      opening: [rng.pick(single ? voice.grammar.openingSingle : voice.grammar.openingPair)],
      closing: [rng.pick(voice.grammar.closing)],
      themeA: [this.vocabulary.label(context.numberA)],
      themeB: [this.vocabulary.label(context.numberB)],
    };

    return withTraceryRng(() => rng.next01(), () => {
      const grammar = tracery.createGrammar(rules);
      grammar.addModifiers(tracery.baseEngModifiers);
      return {
        opening: capitalizeFirst(normalizePassageText(grammar.flatten('#opening#'))),
        closing: capitalizeFirst(normalizePassageText(grammar.flatten('#closing#'))),
      };
    });
  }
}
