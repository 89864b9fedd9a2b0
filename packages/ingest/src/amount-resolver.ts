import type { TransactionType } from '@ledgerline/types';
import { CREDIT_KEYWORDS } from './rules.js';
import { parseNumeric } from './parsers/numeric-parser.js';

/**
 * How the direction of an amount was decided: by which positional column
 * held the value, by a credit keyword in the description, or by default.
 */
export type DirectionSource = 'position' | 'keyword' | 'default';

export interface ResolvedAmount {
  amount: number;
  type: TransactionType;
  source: DirectionSource;
  /** Positional rule said debit while the description reads like a credit. */
  conflict: boolean;
}

export function typeForAmount(amount: number): TransactionType {
  return amount >= 0 ? 'Credit' : 'Debit';
}

export function hasCreditKeyword(description: string): boolean {
  const text = description.toLowerCase();
  return CREDIT_KEYWORDS.some((rule) => rule.pattern.test(text));
}

/**
 * Resolve an amount from positional tokens in statement order (typically
 * debit, credit, balance). Only the first two positions decide; placeholders
 * count as zero. Returns `null` when either of them is not a number.
 *
 * - value in position 1, zero in position 2: debit
 * - zero in position 1, value in position 2: credit
 * - otherwise position 1 is trusted as the magnitude and the description's
 *   credit keywords pick the direction, debit when none match
 */
export function resolvePositionalAmount(description: string, tokens: readonly string[]): ResolvedAmount | null {
  const first = parseNumeric(tokens[0]);
  const second = parseNumeric(tokens[1]);
  if (first.kind === 'missing' || second.kind === 'missing') return null;

  const debitSide = first.value;
  const creditSide = second.value;

  if (debitSide > 0 && creditSide === 0) {
    return finish(-debitSide, 'position', hasCreditKeyword(description));
  }
  if (creditSide > 0 && debitSide === 0) {
    return finish(creditSide, 'position', false);
  }

  const magnitude = Math.abs(debitSide);
  return hasCreditKeyword(description)
    ? finish(magnitude, 'keyword', false)
    : finish(-magnitude, 'default', false);
}

function finish(amount: number, source: DirectionSource, conflict: boolean): ResolvedAmount {
  const normalized = amount === 0 ? 0 : amount;
  return { amount: normalized, type: typeForAmount(normalized), source, conflict };
}

export function formatConflictWarning(count: number): string {
  return `${count} row(s) were assigned a direction by column position although their description suggests a credit.`;
}
