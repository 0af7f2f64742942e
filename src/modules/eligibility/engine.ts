/**
 * @file modules/eligibility/engine.ts
 * @description Eligibility Engine
 *
 * Ordered rule gate for a loan request. The first failing rule wins:
 *   1. Affordability   - active EMIs + requested EMI (at the REQUESTED rate) <= 50% salary
 *   2. Repayment score - on-time EMIs / total tenure across all past loans sets a rate floor
 *   3. Debt limit      - current debt + requested principal <= approved limit
 *   4. Approve         - EMI recomputed at the final rate
 *
 * Pure and synchronous: no I/O, no clock unless the caller omits `asOf`.
 * Rejections are returned as decisions, never thrown.
 */

import Decimal from 'decimal.js';
import { computeInstallment } from '../installments';
import { CreditEngineError } from '../../shared/errors';
import { toDecimal } from '../../shared/money';
import { toIsoDate } from '../../shared/dates';
import {
  CustomerProfile,
  EligibilityDecision,
  LoanRecord,
  LoanRequest,
  RejectionCode,
} from './types';

// ============================================
// POLICY
// ============================================

const AFFORDABILITY_SHARE = new Decimal('0.5');
const APPROVED_LIMIT_SALARY_MULTIPLE = 36;

// Request bounds; the loans table stores tenure as INTEGER and rates as NUMERIC(5,2)
export const MAX_TENURE_MONTHS = 600;
export const MAX_INTEREST_RATE = new Decimal('999.99');
export const MAX_LOAN_AMOUNT = new Decimal('999999999999.99');

// Checked top-down against the repayment score (percent, exclusive lower bound).
// A null floor keeps the requested rate.
const RATE_TIERS: ReadonlyArray<{ scoreAbove: number; floorRate: Decimal | null }> = [
  { scoreAbove: 85, floorRate: null },
  { scoreAbove: 60, floorRate: new Decimal('12.00') },
  { scoreAbove: 40, floorRate: new Decimal('16.00') },
];

export const APPROVAL_MESSAGE = 'Loan approved';

export const REJECTION_MESSAGES: Record<RejectionCode, string> = {
  EMI_BURDEN_EXCEEDED: 'Loan rejected: total EMIs exceed 50% of monthly salary',
  POOR_REPAYMENT_HISTORY: 'Loan rejected: poor past loan repayment history (less than 40% EMIs on time)',
  APPROVED_LIMIT_EXCEEDED: 'Loan rejected: proposed loan amount plus current debt exceeds approved limit',
};

// ============================================
// HELPERS
// ============================================

/**
 * A loan is active when it was approved and its end date is on or after the
 * evaluation day. Loans without an end date are never active.
 */
export function isActiveLoan(
  loan: Pick<LoanRecord, 'loanApproved' | 'endDate'>,
  asOf: Date
): boolean {
  return loan.loanApproved && loan.endDate !== null && loan.endDate >= toIsoDate(asOf);
}

export function deriveApprovedLimit(monthlySalary: Decimal.Value): Decimal {
  return toDecimal(monthlySalary, 'monthlySalary').times(APPROVED_LIMIT_SALARY_MULTIPLE);
}

export interface RepaymentSummary {
  loanCount: number;
  emisPaidOnTime: number;
  totalTenure: number;
}

export function summarizeRepayments(history: readonly LoanRecord[]): RepaymentSummary {
  return history.reduce<RepaymentSummary>(
    (summary, loan) => ({
      loanCount: summary.loanCount + 1,
      emisPaidOnTime: summary.emisPaidOnTime + loan.emisPaidOnTime,
      totalTenure: summary.totalTenure + loan.tenure,
    }),
    { loanCount: 0, emisPaidOnTime: 0, totalTenure: 0 }
  );
}

// A history whose tenures sum to zero is scored against a denominator of 1.
function scoreDenominator(summary: RepaymentSummary): number {
  return summary.totalTenure > 0 ? summary.totalTenure : 1;
}

/**
 * Percentage of EMIs paid on time across the whole history, or null when
 * there is no history. For reporting; tiering compares exact integers.
 */
export function computeRepaymentScore(history: readonly LoanRecord[]): Decimal | null {
  const summary = summarizeRepayments(history);
  if (summary.loanCount === 0) return null;

  return new Decimal(summary.emisPaidOnTime).times(100).div(scoreDenominator(summary));
}

/**
 * Resolve the rate floor for a non-empty history. `undefined` means the
 * history is too poor to lend against.
 */
function resolveRateFloor(summary: RepaymentSummary): Decimal | null | undefined {
  const denominator = scoreDenominator(summary);
  // score > t  <=>  paid * 100 > t * tenure
  const tier = RATE_TIERS.find(t => summary.emisPaidOnTime * 100 > t.scoreAbove * denominator);
  return tier === undefined ? undefined : tier.floorRate;
}

// ============================================
// ELIGIBILITY ENGINE
// ============================================

export class EligibilityEngine {
  /**
   * Decide a loan request against a customer's profile and full loan history.
   *
   * @param asOf - evaluation day for the active-loan test
   */
  evaluate(
    customer: CustomerProfile,
    history: readonly LoanRecord[],
    request: LoanRequest,
    asOf: Date = new Date()
  ): EligibilityDecision {
    const { loanAmount, tenure, requestedRate } = this.validateRequest(request);
    const monthlySalary = toDecimal(customer.monthlySalary, 'monthlySalary');

    // Rule 1: affordability, always at the requested rate
    const requestedInstallment = computeInstallment(loanAmount, requestedRate, tenure);
    const activeInstallments = history
      .filter(loan => isActiveLoan(loan, asOf))
      .reduce((sum, loan) => sum.plus(toDecimal(loan.monthlyInstallment, 'monthlyInstallment')), new Decimal(0));

    if (activeInstallments.plus(requestedInstallment).gt(monthlySalary.times(AFFORDABILITY_SHARE))) {
      return this.reject('EMI_BURDEN_EXCEEDED', tenure);
    }

    // Rule 2: repayment history sets a rate floor; it never lowers the request
    let finalRate = requestedRate;
    if (history.length > 0) {
      const floorRate = resolveRateFloor(summarizeRepayments(history));
      if (floorRate === undefined) {
        return this.reject('POOR_REPAYMENT_HISTORY', tenure);
      }
      if (floorRate !== null) {
        finalRate = Decimal.max(requestedRate, floorRate);
      }
    }

    // Rule 3: raw principal against the approved limit
    const currentDebt = toDecimal(customer.currentDebt, 'currentDebt');
    const approvedLimit = toDecimal(customer.approvedLimit, 'approvedLimit');
    if (currentDebt.plus(loanAmount).gt(approvedLimit)) {
      return this.reject('APPROVED_LIMIT_EXCEEDED', tenure);
    }

    return {
      approved: true,
      interestRate: finalRate,
      monthlyInstallment: computeInstallment(loanAmount, finalRate, tenure),
      tenure,
      message: APPROVAL_MESSAGE,
      rejectionCode: null,
    };
  }

  private validateRequest(request: LoanRequest): { loanAmount: Decimal; tenure: number; requestedRate: Decimal } {
    const loanAmount = toDecimal(request.loanAmount, 'loanAmount');
    const requestedRate = toDecimal(request.interestRate, 'interestRate');

    if (!loanAmount.gt(0) || loanAmount.gt(MAX_LOAN_AMOUNT)) {
      throw new CreditEngineError('INVALID_ARGUMENT', `loanAmount must be positive and at most ${MAX_LOAN_AMOUNT.toFixed(2)}`);
    }
    if (!Number.isInteger(request.tenure) || request.tenure <= 0 || request.tenure > MAX_TENURE_MONTHS) {
      throw new CreditEngineError(
        'INVALID_ARGUMENT',
        `tenure must be a whole number of months from 1 to ${MAX_TENURE_MONTHS}, got ${request.tenure}`
      );
    }
    if (requestedRate.lt(0) || requestedRate.gt(MAX_INTEREST_RATE)) {
      throw new CreditEngineError('INVALID_ARGUMENT', `interestRate must be between 0 and ${MAX_INTEREST_RATE.toFixed(2)}`);
    }

    // -0 reads back as "-0.00"
    return { loanAmount, tenure: request.tenure, requestedRate: requestedRate.isZero() ? new Decimal(0) : requestedRate };
  }

  private reject(code: RejectionCode, tenure: number): EligibilityDecision {
    return {
      approved: false,
      interestRate: null,
      monthlyInstallment: null,
      tenure,
      message: REJECTION_MESSAGES[code],
      rejectionCode: code,
    };
  }
}

// Singleton
let engine: EligibilityEngine | null = null;

export function getEligibilityEngine(): EligibilityEngine {
  if (!engine) {
    engine = new EligibilityEngine();
  }
  return engine;
}
