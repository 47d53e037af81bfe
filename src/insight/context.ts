/**
 * Boundary validation for request input. The core only ever sees a frozen
 * `InsightContext` with numbers already in [1, 9] and a known persona.
 */

import { InvalidInsightContextError } from './errors';
import { CORE_NUMBERS, PERSONA_IDS, type CoreNumber, type InsightContext, type PersonaId } from './types';

const MAX_TAG_LENGTH = 64;

export function isCoreNumber(value: unknown): value is CoreNumber {
  return typeof value === 'number' && (CORE_NUMBERS as readonly number[]).includes(value);
}

export function isPersonaId(value: unknown): value is PersonaId {
  return typeof value === 'string' && (PERSONA_IDS as readonly string[]).includes(value);
}

export function parseCoreNumber(value: unknown, field: string): CoreNumber {
  if (!isCoreNumber(value)) {
    throw new InvalidInsightContextError(field, `${field} must be an integer from 1 to 9, got ${JSON.stringify(value)}`);
  }
  return value;
}

/** Accepts the canonical id or a case/spacing variant ("mindfulness coach"). */
export function parsePersona(value: unknown): PersonaId {
  if (typeof value === 'string') {
    const squashed = value.replace(/[\s_-]+/g, '').toLowerCase();
    const found = PERSONA_IDS.find(p => p.toLowerCase() === squashed);
    if (found) return found;
  }
  throw new InvalidInsightContextError(
    'persona',
    `unknown persona ${JSON.stringify(value)}; expected one of ${PERSONA_IDS.join(', ')}`
  );
}

export function parseSituationalTag(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new InvalidInsightContextError('situationalTag', 'situationalTag must be a string when present');
  }
  const tag = value.trim().toLowerCase();
  if (!tag) return null;
  if (tag.length > MAX_TAG_LENGTH) {
    throw new InvalidInsightContextError('situationalTag', `situationalTag is longer than ${MAX_TAG_LENGTH} characters`);
  }
  return tag;
}

export function parseInsightContext(input: {
  numberA: unknown;
  numberB: unknown;
  persona: unknown;
  situationalTag?: unknown;
}): InsightContext {
  return Object.freeze({
    numberA: parseCoreNumber(input.numberA, 'numberA'),
    numberB: parseCoreNumber(input.numberB, 'numberB'),
    persona: parsePersona(input.persona),
    situationalTag: parseSituationalTag(input.situationalTag),
  });
}

/** Distinct numbers of the context, in order. */
export function contextNumbers(context: InsightContext): CoreNumber[] {
  return context.numberA === context.numberB ? [context.numberA] : [context.numberA, context.numberB];
}

export function numberPairKey(a: CoreNumber, b: CoreNumber): string {
  return `${a}-${b}`;
}
