/**
 * Passage text helpers: word/sentence counting, term matching and the
 * structural checks shared by the evaluator and the content-store boundary.
 */

import type { StructureBounds } from './config';
import { escapeRegExp } from './utils';

// ─────────────────────────────────────────────────────────────
// Counting
// ─────────────────────────────────────────────────────────────

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(w => w.length > 0).length;
}

export function splitSentences(text: string): string[] {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map(s => s.trim())
    .filter(Boolean);
}

export function normalizePassageText(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.;:!?])/g, '$1')
    .trim();
}

// ─────────────────────────────────────────────────────────────
// Term matching
// ─────────────────────────────────────────────────────────────

export type TermMatcher = {
  term: string;
  regex: RegExp;
};

/** Whole-word, case-insensitive, tolerating a plural `s`/`es`; inner spaces match any whitespace. */
export function termMatcher(term: string): TermMatcher {
  const body = escapeRegExp(term.trim()).replace(/\s+/g, '\\s+');
  return { term, regex: new RegExp(`\\b${body}(?:s|es)?\\b`, 'i') };
}

export function matchedTerms(text: string, matchers: readonly TermMatcher[]): string[] {
  const out: string[] = [];
  for (const m of matchers) {
    if (m.regex.test(text)) out.push(m.term);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────
// Structure
// ─────────────────────────────────────────────────────────────

export type Malformation =
  | 'unterminated'
  | 'double_punctuation'
  | 'trailing_conjunction'
  | 'fragment_start'
  | 'double_space';

const TRAILING_CONJUNCTION = /\b(?:and|or|but|so|yet|because|with|to|the|a|an|of)\s*[.!?]$/i;
const FRAGMENT_START_WORD = /^(?:and|but|or|because|which)\b/i;

/** Each kind is reported at most once. */
export function findMalformations(text: string): Malformation[] {
  const trimmed = text.trim();
  const sentences = splitSentences(trimmed);
  const out: Malformation[] = [];
  if (!/[.!?]$/.test(trimmed)) out.push('unterminated');
  if (/[.,;:!?]\s*[.,;:!?]/.test(trimmed)) out.push('double_punctuation');
  if (sentences.some(s => TRAILING_CONJUNCTION.test(s))) out.push('trailing_conjunction');
  if (sentences.some(s => /^[a-z]/.test(s) || FRAGMENT_START_WORD.test(s))) out.push('fragment_start');
  if (/ {2}/.test(text)) out.push('double_space');
  return out;
}

export type StructureReport = {
  score: number;
  wordCount: number;
  sentenceCount: number;
  wordsInBounds: boolean;
  sentencesInBounds: boolean;
  malformations: Malformation[];
};

export function analyzeStructure(text: string, bounds: StructureBounds): StructureReport {
  const wordCount = countWords(text);
  const sentenceCount = splitSentences(text).length;
  const wordsInBounds = wordCount >= bounds.minWords && wordCount <= bounds.maxWords;
  const sentencesInBounds = sentenceCount >= bounds.minSentences && sentenceCount <= bounds.maxSentences;
  const malformations = findMalformations(text);

  let penalty = malformations.length * bounds.malformationPenalty;
  if (!wordsInBounds) penalty += bounds.wordBoundsPenalty;
  if (!sentencesInBounds) penalty += bounds.sentenceBoundsPenalty;

  return {
    score: Math.max(0, Math.min(1, 1 - penalty)),
    wordCount,
    sentenceCount,
    wordsInBounds,
    sentencesInBounds,
    malformations,
  };
}
