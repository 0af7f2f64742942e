/**
 * Credit Decision Engine - Money Helpers
 *
 * NO FLOATING POINT: every amount and rate flows through decimal.js.
 * Installments are quantized to cents with ROUND_HALF_UP.
 */

import Decimal from 'decimal.js';
import { CreditEngineError } from './errors';

export const CENT_PLACES = 2;

/**
 * Normalize a number, numeric string or Decimal into a finite Decimal.
 */
export function toDecimal(value: Decimal.Value, field: string): Decimal {
  let result: Decimal;
  try {
    result = new Decimal(value);
  } catch {
    throw new CreditEngineError('INVALID_ARGUMENT', `${field} is not a number: ${String(value)}`);
  }

  if (!result.isFinite()) {
    throw new CreditEngineError('INVALID_ARGUMENT', `${field} must be finite`);
  }
  return result;
}

export function roundToCents(value: Decimal): Decimal {
  return value.toDecimalPlaces(CENT_PLACES, Decimal.ROUND_HALF_UP);
}

/**
 * Fixed two-decimal wire format ("8791.59", "12.00").
 */
export function formatMoney(value: Decimal): string;
export function formatMoney(value: Decimal | null): string | null;
export function formatMoney(value: Decimal | null): string | null {
  return value === null ? null : value.toFixed(CENT_PLACES, Decimal.ROUND_HALF_UP);
}
