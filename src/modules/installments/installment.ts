/**
 * @file modules/installments/installment.ts
 * @description Fixed monthly installment (EMI) for an amortizing loan.
 *
 *   r   = annualRatePercent / 100 / 12
 *   EMI = P * r * (1 + r)^n / ((1 + r)^n - 1)
 *
 * A zero rate is straight-line: P / n.
 * The result is rounded half-up to cents. Installments feed the affordability
 * comparison, so a cent of drift can flip an approval.
 */

import Decimal from 'decimal.js';
import { CreditEngineError } from '../../shared/errors';
import { roundToCents, toDecimal } from '../../shared/money';

const MONTHS_PER_YEAR = 12;

export function computeInstallment(
  principal: Decimal.Value,
  annualRatePercent: Decimal.Value,
  tenureMonths: number
): Decimal {
  const amount = toDecimal(principal, 'principal');
  const rate = toDecimal(annualRatePercent, 'annualRatePercent');

  if (!Number.isInteger(tenureMonths) || tenureMonths <= 0) {
    throw new CreditEngineError('INVALID_ARGUMENT', `tenureMonths must be a positive integer, got ${tenureMonths}`);
  }
  if (amount.lt(0)) {
    throw new CreditEngineError('INVALID_ARGUMENT', 'principal must not be negative');
  }
  if (rate.lt(0)) {
    throw new CreditEngineError('INVALID_ARGUMENT', 'annualRatePercent must not be negative');
  }

  const monthlyRate = rate.div(100).div(MONTHS_PER_YEAR);
  if (monthlyRate.isZero()) {
    return roundToCents(amount.div(tenureMonths));
  }

  const growth = monthlyRate.plus(1).pow(tenureMonths);
  const denominator = growth.minus(1);
  if (denominator.isZero()) {
    return roundToCents(amount.div(tenureMonths));
  }

  return roundToCents(amount.times(monthlyRate).times(growth).div(denominator));
}
