/**
 * Static vocabularies: number themes, persona voices and the safety blocklist.
 *
 * Both JSON files are versioned and checked by type guards at load. A voice
 * missing for any persona, or a number missing its theme, is a startup error.
 */

import lexiconJson from './lexicon.v1.json';
import voicesJson from './personaVoices.v1.json';
import { InsightConfigError } from './errors';
import { matchedTerms, splitSentences, termMatcher, type TermMatcher } from './text';
import { CORE_NUMBERS, PERSONA_IDS, type CoreNumber, type PersonaId } from './types';
import { escapeRegExp, isRecord } from './utils';

// ─────────────────────────────────────────────────────────────
// Raw file shapes
// ─────────────────────────────────────────────────────────────

type NumberThemeV1 = { label: string; keywords: string[] };
type SafetyRuleV1 = { id: string; pattern: string };

export type LexiconV1 = {
  version: 1;
  numbers: Record<string, NumberThemeV1>;
  depthIndicators: string[];
  directiveVerbs: string[];
  directiveLeadIns: string[];
  secondPersonModals: string[];
  safetyBlocklist: SafetyRuleV1[];
  stopwords: string[];
};

export type PersonaGrammarV1 = {
  openingPair: string[];
  openingSingle: string[];
  closing: string[];
};

export type PersonaVoiceV1 = {
  displayName: string;
  register: string;
  markers: string[];
  grammar: PersonaGrammarV1;
  phraseMap: Record<string, string>;
  emergency: { pair: string[]; single: string[] };
};

export type PersonaVoicesV1 = {
  version: 1;
  voices: Record<string, PersonaVoiceV1>;
};

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(x => typeof x === 'string' && x.trim().length > 0);
}

function isNonEmptyStringArray(v: unknown): v is string[] {
  return isStringArray(v) && v.length > 0;
}

function isNumberTheme(v: unknown): v is NumberThemeV1 {
  return isRecord(v) && typeof v.label === 'string' && isNonEmptyStringArray(v.keywords);
}

function isSafetyRule(v: unknown): v is SafetyRuleV1 {
  return isRecord(v) && typeof v.id === 'string' && typeof v.pattern === 'string';
}

export function isLexiconV1(v: unknown): v is LexiconV1 {
  if (!isRecord(v) || v.version !== 1) return false;
  const numbers = v.numbers;
  if (!isRecord(numbers) || !Object.values(numbers).every(isNumberTheme)) return false;
  return (
    isStringArray(v.depthIndicators) &&
    isNonEmptyStringArray(v.directiveVerbs) &&
    isStringArray(v.directiveLeadIns) &&
    isStringArray(v.secondPersonModals) &&
    Array.isArray(v.safetyBlocklist) &&
    v.safetyBlocklist.every(isSafetyRule) &&
    isStringArray(v.stopwords)
  );
}

function isPhraseMap(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every(x => typeof x === 'string');
}

function isPersonaVoice(v: unknown): v is PersonaVoiceV1 {
  if (!isRecord(v)) return false;
  const grammar = v.grammar;
  const emergency = v.emergency;
  return (
    typeof v.displayName === 'string' &&
    typeof v.register === 'string' &&
    isNonEmptyStringArray(v.markers) &&
    isRecord(grammar) &&
    isNonEmptyStringArray(grammar.openingPair) &&
    isNonEmptyStringArray(grammar.openingSingle) &&
    isNonEmptyStringArray(grammar.closing) &&
    isPhraseMap(v.phraseMap) &&
    isRecord(emergency) &&
    isStringArray(emergency.pair) &&
    isStringArray(emergency.single)
  );
}

export function isPersonaVoicesV1(v: unknown): v is PersonaVoicesV1 {
  if (!isRecord(v) || v.version !== 1) return false;
  const voices = v.voices;
  return isRecord(voices) && Object.values(voices).every(isPersonaVoice);
}

// ─────────────────────────────────────────────────────────────
// Compiled vocabulary
// ─────────────────────────────────────────────────────────────

export type NumberTheme = {
  label: string;
  keywords: readonly TermMatcher[];
};

export type PersonaVoice = {
  persona: PersonaId;
  displayName: string;
  register: string;
  markers: readonly TermMatcher[];
  grammar: PersonaGrammarV1;
  phraseMap: ReadonlyMap<string, string>;
  emergency: { pair: readonly string[]; single: readonly string[] };
};

export type SafetyRule = {
  id: string;
  regex: RegExp;
};

export class Vocabulary {
  private readonly themes: ReadonlyMap<CoreNumber, NumberTheme>;
  private readonly voices: ReadonlyMap<PersonaId, PersonaVoice>;
  private readonly depth: readonly TermMatcher[];
  private readonly verbs: ReadonlySet<string>;
  private readonly leadIn: RegExp;
  private readonly secondPerson: RegExp;
  private readonly safety: readonly SafetyRule[];
  readonly stopwords: ReadonlySet<string>;

  private constructor(lexicon: LexiconV1, voices: PersonaVoicesV1) {
    const themes = new Map<CoreNumber, NumberTheme>();
    for (const n of CORE_NUMBERS) {
      const raw = lexicon.numbers[String(n)];
      if (!raw) throw new InsightConfigError(`lexicon.numbers.${n}`, 'missing number theme');
      themes.set(n, { label: raw.label, keywords: raw.keywords.map(termMatcher) });
    }
    this.themes = themes;

    const compiled = new Map<PersonaId, PersonaVoice>();
    for (const persona of PERSONA_IDS) {
      const raw = voices.voices[persona];
      if (!raw) throw new InsightConfigError(`personaVoices.voices.${persona}`, 'persona has no voice');
      if (raw.emergency.pair.length === 0 || raw.emergency.single.length === 0) {
        throw new InsightConfigError(`personaVoices.voices.${persona}.emergency`, 'emergency templates missing');
      }
      compiled.set(persona, {
        persona,
        displayName: raw.displayName,
        register: raw.register,
        markers: raw.markers.map(termMatcher),
        grammar: raw.grammar,
        phraseMap: new Map(Object.entries(raw.phraseMap)),
        emergency: raw.emergency,
      });
    }
    for (const key of Object.keys(voices.voices)) {
      if (!(PERSONA_IDS as readonly string[]).includes(key)) {
        throw new InsightConfigError(`personaVoices.voices.${key}`, 'unknown persona');
      }
    }
    this.voices = compiled;

    this.depth = lexicon.depthIndicators.map(termMatcher);
    this.verbs = new Set(lexicon.directiveVerbs.map(v => v.toLowerCase()));
    const leadIns = lexicon.directiveLeadIns.map(x => escapeRegExp(x).replace(/\s+/g, '\\s+'));
    this.leadIn = leadIns.length ? new RegExp(`^(?:${leadIns.join('|')})\\b,?\\s+`, 'i') : /^(?!)/;
    const modals = lexicon.secondPersonModals.map(x => escapeRegExp(x).replace(/\s+/g, '\\s+'));
    this.secondPerson = new RegExp(`\\byou\\s+(?:${modals.join('|') || '(?!)'})\\s+([a-z']+)`, 'gi');

    this.safety = lexicon.safetyBlocklist.map(rule => {
      try {
        return { id: rule.id, regex: new RegExp(rule.pattern, 'i') };
      } catch (err) {
        throw new InsightConfigError(`lexicon.safetyBlocklist.${rule.id}`, 'invalid pattern', { cause: err });
      }
    });
    this.stopwords = new Set(lexicon.stopwords.map(w => w.toLowerCase()));
  }

  static fromJson(lexiconRaw: unknown, voicesRaw: unknown): Vocabulary {
    if (!isLexiconV1(lexiconRaw)) throw new InsightConfigError('lexicon', 'file does not match LexiconV1');
    if (!isPersonaVoicesV1(voicesRaw)) throw new InsightConfigError('personaVoices', 'file does not match PersonaVoicesV1');
    return new Vocabulary(lexiconRaw, voicesRaw);
  }

  theme(n: CoreNumber): NumberTheme {
    const theme = this.themes.get(n);
    if (!theme) throw new InsightConfigError(`lexicon.numbers.${n}`, 'missing number theme');
    return theme;
  }

  label(n: CoreNumber): string {
    return this.theme(n).label;
  }

  voice(persona: PersonaId): PersonaVoice {
    const voice = this.voices.get(persona);
    if (!voice) throw new InsightConfigError(`personaVoices.voices.${persona}`, 'persona has no voice');
    return voice;
  }

  keywordHits(text: string, n: CoreNumber): string[] {
    return matchedTerms(text, this.theme(n).keywords);
  }

  markerHits(text: string, persona: PersonaId): string[] {
    return matchedTerms(text, this.voice(persona).markers);
  }

  /** Markers of every other persona found in the text, minus any the persona shares. */
  foreignMarkerHits(text: string, persona: PersonaId): string[] {
    const own = new Set(this.voice(persona).markers.map(m => m.term));
    const found = new Set<string>();
    for (const other of PERSONA_IDS) {
      if (other === persona) continue;
      for (const term of matchedTerms(text, this.voice(other).markers)) {
        if (!own.has(term)) found.add(term);
      }
    }
    return [...found];
  }

  depthHits(text: string): string[] {
    return matchedTerms(text, this.depth);
  }

  safetyHits(text: string): string[] {
    return this.safety.filter(rule => rule.regex.test(text)).map(rule => rule.id);
  }

  isDirectiveVerb(word: string): boolean {
    return this.verbs.has(word.toLowerCase());
  }

  /**
   * True when some sentence opens with an imperative verb (after an optional
   * time lead-in such as "Today,") or the text holds "you can/should/... <verb>".
   */
  hasDirectiveClause(text: string): boolean {
    for (const sentence of splitSentences(text)) {
      const stripped = sentence.replace(this.leadIn, '');
      const first = /^[A-Za-z']+/.exec(stripped);
      if (first && this.isDirectiveVerb(first[0])) return true;
    }
    for (const match of text.matchAll(this.secondPerson)) {
      const verb = match[1];
      if (verb && this.isDirectiveVerb(verb)) return true;
    }
    return false;
  }
}

let defaultVocabularyCache: Vocabulary | null = null;

export function defaultVocabulary(): Vocabulary {
  if (defaultVocabularyCache) return defaultVocabularyCache;
  const lexiconUnknown: unknown = lexiconJson;
  const voicesUnknown: unknown = voicesJson;
  defaultVocabularyCache = Vocabulary.fromJson(lexiconUnknown, voicesUnknown);
  return defaultVocabularyCache;
}
