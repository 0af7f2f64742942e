/**
 * @file modules/eligibility/engine.test.ts
 * @description Eligibility Engine Tests with Mock Data
 *
 * Covers each rule in isolation, the boundaries between rate tiers,
 * the active-loan predicate and the order in which rules short-circuit.
 */

import { describe, it, expect } from '@jest/globals';
import {
  computeRepaymentScore,
  deriveApprovedLimit,
  getEligibilityEngine,
  isActiveLoan,
  REJECTION_MESSAGES,
} from './engine';
import { CustomerProfile, EligibilityDecision, LoanRecord, LoanRequest, RejectionCode } from './types';
import { CreditEngineError } from '../../shared/errors';

const engine = getEligibilityEngine();

const AS_OF = new Date('2026-03-15T12:00:00Z');

// ============================================
// MOCK DATA GENERATORS
// ============================================

function createMockCustomer(overrides: Partial<CustomerProfile> = {}): CustomerProfile {
  return {
    monthlySalary: 20000,
    currentDebt: 0,
    approvedLimit: 720000,   // 36x salary
    ...overrides,
  };
}

// Defaults to a fully repaid loan that ended before AS_OF
function createMockLoan(overrides: Partial<LoanRecord> = {}): LoanRecord {
  return {
    loanAmount: 50000,
    tenure: 12,
    interestRate: 10,
    monthlyInstallment: '4395.79',
    emisPaidOnTime: 12,
    loanApproved: true,
    dateOfApproval: '2024-01-10',
    endDate: '2025-01-04',
    ...overrides,
  };
}

function createMockRequest(overrides: Partial<LoanRequest> = {}): LoanRequest {
  return {
    loanAmount: 100000,
    tenure: 12,
    interestRate: 10,
    ...overrides,
  };
}

// Two closed loans whose on-time EMIs add up to `paid` out of 20
function historyScoring(paid: number): LoanRecord[] {
  const first = Math.min(paid, 10);
  return [
    createMockLoan({ tenure: 10, emisPaidOnTime: first }),
    createMockLoan({ tenure: 10, emisPaidOnTime: paid - first }),
  ];
}

function evaluate(
  customer: CustomerProfile,
  history: LoanRecord[],
  request: LoanRequest
): EligibilityDecision {
  return engine.evaluate(customer, history, request, AS_OF);
}

function expectRejection(decision: EligibilityDecision, code: RejectionCode, tenure = 12): void {
  expect(decision).toEqual({
    approved: false,
    interestRate: null,
    monthlyInstallment: null,
    tenure,
    message: REJECTION_MESSAGES[code],
    rejectionCode: code,
  });
}

// ============================================
// SCENARIOS
// ============================================

describe('EligibilityEngine', () => {
  describe('scenarios', () => {
    it('approves a new customer at the requested rate', () => {
      const decision = evaluate(createMockCustomer(), [], createMockRequest());

      expect(decision.approved).toBe(true);
      expect(decision.interestRate?.toFixed(2)).toBe('10.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('8791.59');
      expect(decision.tenure).toBe(12);
      expect(decision.message).toBe('Loan approved');
      expect(decision.rejectionCode).toBeNull();
    });

    it('still applies the 50% rule to a customer without history', () => {
      // 8791.59 against half of 10000
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 10000, approvedLimit: 360000 }),
        [],
        createMockRequest()
      );

      expectRejection(decision, 'EMI_BURDEN_EXCEEDED');
    });

    it('rejects on the approved limit when affordability and history pass', () => {
      const customer = createMockCustomer({ monthlySalary: 10000, currentDebt: 90000, approvedLimit: 100000 });
      const request = createMockRequest({ loanAmount: 20000 });

      expectRejection(evaluate(customer, [], request), 'APPROVED_LIMIT_EXCEEDED');
      // Middling history raises the rate floor but the limit still decides
      expectRejection(evaluate(customer, historyScoring(10), request), 'APPROVED_LIMIT_EXCEEDED');
    });

    it('rejects a poor repayment history even when the other rules pass', () => {
      const history = [
        createMockLoan({ tenure: 12, emisPaidOnTime: 4 }),
        createMockLoan({ tenure: 12, emisPaidOnTime: 4 }),
      ];
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 10000, approvedLimit: 360000 }),
        history,
        createMockRequest({ loanAmount: 20000 })
      );

      expectRejection(decision, 'POOR_REPAYMENT_HISTORY');
    });

    it('keeps a low requested rate for an excellent history', () => {
      const decision = evaluate(createMockCustomer(), historyScoring(18), createMockRequest({ interestRate: 9 }));

      expect(decision.approved).toBe(true);
      expect(decision.interestRate?.toFixed(2)).toBe('9.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('8745.15');
    });

    it('raises the rate to the 12% floor for a good history', () => {
      const decision = evaluate(createMockCustomer(), historyScoring(13), createMockRequest({ interestRate: 8 }));

      expect(decision.approved).toBe(true);
      expect(decision.interestRate?.toFixed(2)).toBe('12.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('8884.88');
    });
  });

  // ============================================
  // RULE 1: AFFORDABILITY
  // ============================================

  describe('affordability', () => {
    it('passes when total EMIs equal exactly half the salary', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: '17583.18' }),
        [],
        createMockRequest()
      );

      expect(decision.approved).toBe(true);
    });

    it('fails one cent over half the salary', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: '17583.16' }),
        [],
        createMockRequest()
      );

      expectRejection(decision, 'EMI_BURDEN_EXCEEDED');
    });

    it('counts a loan that ends on the evaluation day', () => {
      const history = [createMockLoan({ monthlyInstallment: 2000, endDate: '2026-03-15' })];

      expectRejection(evaluate(createMockCustomer(), history, createMockRequest()), 'EMI_BURDEN_EXCEEDED');
    });

    it('ignores a loan that ended the day before', () => {
      const history = [createMockLoan({ monthlyInstallment: 2000, endDate: '2026-03-14' })];

      expect(evaluate(createMockCustomer(), history, createMockRequest()).approved).toBe(true);
    });

    it('ignores unapproved loans and loans without an end date', () => {
      const history = [
        createMockLoan({ monthlyInstallment: 2000, endDate: '2027-01-01', loanApproved: false }),
        createMockLoan({ monthlyInstallment: 2000, endDate: null }),
      ];

      expect(evaluate(createMockCustomer(), history, createMockRequest()).approved).toBe(true);
    });

    it('sums every active loan', () => {
      const oneActive = [createMockLoan({ monthlyInstallment: 1000, endDate: '2026-12-31' })];
      const twoActive = [...oneActive, createMockLoan({ monthlyInstallment: 1000, endDate: '2027-06-30' })];

      // 8791.59 + 1000 fits in 10000, + 2000 does not
      expect(evaluate(createMockCustomer(), oneActive, createMockRequest()).approved).toBe(true);
      expectRejection(evaluate(createMockCustomer(), twoActive, createMockRequest()), 'EMI_BURDEN_EXCEEDED');
    });

    it('uses the requested rate, not the adjusted one', () => {
      // Half of 17500 is 8750: the EMI at 8% (8698.84) fits, the EMI at 12% (8884.88) would not
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 17500, approvedLimit: 630000 }),
        historyScoring(13),
        createMockRequest({ interestRate: 8 })
      );

      expect(decision.approved).toBe(true);
      expect(decision.interestRate?.toFixed(2)).toBe('12.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('8884.88');
    });
  });

  // ============================================
  // RULE 2: REPAYMENT HISTORY
  // ============================================

  describe('repayment history', () => {
    it('keeps the requested rate just above 85', () => {
      const history = [createMockLoan({ tenure: 100, emisPaidOnTime: 86 })];
      const decision = evaluate(createMockCustomer(), history, createMockRequest());

      expect(decision.interestRate?.toFixed(2)).toBe('10.00');
    });

    it('puts a score of exactly 85 in the 12% tier', () => {
      const decision = evaluate(createMockCustomer(), historyScoring(17), createMockRequest());

      expect(decision.interestRate?.toFixed(2)).toBe('12.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('8884.88');
    });

    it('puts a score of exactly 60 in the 16% tier', () => {
      const decision = evaluate(createMockCustomer(), historyScoring(12), createMockRequest());

      expect(decision.interestRate?.toFixed(2)).toBe('16.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('9073.09');
    });

    it('puts a score of 41 in the 16% tier', () => {
      const history = [createMockLoan({ tenure: 100, emisPaidOnTime: 41 })];
      const decision = evaluate(createMockCustomer(), history, createMockRequest());

      expect(decision.interestRate?.toFixed(2)).toBe('16.00');
    });

    it('rejects a score of exactly 40', () => {
      expectRejection(evaluate(createMockCustomer(), historyScoring(8), createMockRequest()), 'POOR_REPAYMENT_HISTORY');
    });

    it('never lowers a requested rate above the floor', () => {
      const decision = evaluate(
        createMockCustomer(),
        historyScoring(13),
        createMockRequest({ loanAmount: 50000, interestRate: 18 })
      );

      expect(decision.interestRate?.toFixed(2)).toBe('18.00');
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('4584.00');
    });

    it('scores totals across loans, not a per-loan average', () => {
      // Per-loan ratios 2/2 and 1/10 average 55; the totals give 3/12 = 25
      const history = [
        createMockLoan({ tenure: 2, emisPaidOnTime: 2 }),
        createMockLoan({ tenure: 10, emisPaidOnTime: 1 }),
      ];

      expectRejection(evaluate(createMockCustomer(), history, createMockRequest()), 'POOR_REPAYMENT_HISTORY');
    });

    it('counts unapproved past loans towards the score', () => {
      const history = [
        createMockLoan({ tenure: 12, emisPaidOnTime: 12 }),
        createMockLoan({ tenure: 12, emisPaidOnTime: 0, loanApproved: false, endDate: null }),
      ];

      // 12 / 24 = 50
      expect(evaluate(createMockCustomer(), history, createMockRequest()).interestRate?.toFixed(2)).toBe('16.00');
    });

    it('treats a history with no tenure and no payments as poor', () => {
      const history = [createMockLoan({ tenure: 0, emisPaidOnTime: 0 })];

      expectRejection(evaluate(createMockCustomer(), history, createMockRequest()), 'POOR_REPAYMENT_HISTORY');
    });
  });

  // ============================================
  // RULE 3: DEBT LIMIT
  // ============================================

  describe('debt limit', () => {
    it('approves a loan that brings debt exactly to the limit', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 10000, currentDebt: 80000, approvedLimit: 100000 }),
        [],
        createMockRequest({ loanAmount: 20000 })
      );

      expect(decision.approved).toBe(true);
      expect(decision.monthlyInstallment?.toFixed(2)).toBe('1758.32');
    });

    it('rejects a customer already over the limit instead of failing', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 10000, currentDebt: 120000, approvedLimit: 100000 }),
        [],
        createMockRequest({ loanAmount: 1000 })
      );

      expectRejection(decision, 'APPROVED_LIMIT_EXCEEDED');
    });
  });

  // ============================================
  // RULE ORDER
  // ============================================

  describe('rule order', () => {
    const overLimit = { currentDebt: 90000, approvedLimit: 100000 };
    const poorHistory = historyScoring(4);

    it('reports affordability before the debt limit', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 1000, ...overLimit }),
        [],
        createMockRequest({ loanAmount: 20000 })
      );

      expectRejection(decision, 'EMI_BURDEN_EXCEEDED');
    });

    it('reports affordability before repayment history', () => {
      const decision = evaluate(createMockCustomer({ monthlySalary: 1000 }), poorHistory, createMockRequest());

      expectRejection(decision, 'EMI_BURDEN_EXCEEDED');
    });

    it('reports repayment history before the debt limit', () => {
      const decision = evaluate(
        createMockCustomer({ monthlySalary: 10000, ...overLimit }),
        poorHistory,
        createMockRequest({ loanAmount: 20000 })
      );

      expectRejection(decision, 'POOR_REPAYMENT_HISTORY');
    });
  });

  // ============================================
  // DETERMINISM & INPUT VALIDATION
  // ============================================

  it('returns identical decisions for identical inputs and leaves them untouched', () => {
    const customer = createMockCustomer({ monthlySalary: 17500, approvedLimit: 630000 });
    const history = historyScoring(13);
    const request = createMockRequest({ interestRate: 8 });
    const snapshot = JSON.stringify({ customer, history, request });

    const first = evaluate(customer, history, request);
    const second = evaluate(customer, history, request);

    expect(second).toEqual(first);
    expect(second.monthlyInstallment?.toString()).toBe(first.monthlyInstallment?.toString());
    expect(JSON.stringify({ customer, history, request })).toBe(snapshot);
  });

  it.each([
    ['zero amount', createMockRequest({ loanAmount: 0 })],
    ['negative amount', createMockRequest({ loanAmount: -5 })],
    ['zero tenure', createMockRequest({ tenure: 0 })],
    ['negative rate', createMockRequest({ interestRate: -1 })],
    ['tenure past 600 months', createMockRequest({ tenure: 601 })],
    ['tenure in the millions', createMockRequest({ tenure: 5000000 })],
    ['rate above 999.99', createMockRequest({ interestRate: '1000' })],
    ['amount past the stored range', createMockRequest({ loanAmount: '1000000000000' })],
  ])('fails fast on %s', (_name, request) => {
    expect(() => evaluate(createMockCustomer(), [], request)).toThrow(CreditEngineError);
  });

  it('accepts the upper bounds and a negative-zero rate', () => {
    const customer = createMockCustomer({ monthlySalary: 1000000, approvedLimit: 36000000 });

    expect(evaluate(customer, [], createMockRequest({ tenure: 600 })).approved).toBe(true);
    expect(evaluate(customer, [], createMockRequest({ interestRate: '999.99' })).approved).toBe(true);

    const zeroRate = evaluate(customer, [], createMockRequest({ interestRate: -0 }));
    expect(zeroRate.approved).toBe(true);
    expect(zeroRate.interestRate?.toFixed(2)).toBe('0.00');
    expect(zeroRate.monthlyInstallment?.toFixed(2)).toBe('8333.33');
  });
});

// ============================================
// HELPERS
// ============================================

describe('isActiveLoan', () => {
  it('requires approval and an end date on or after the evaluation day', () => {
    expect(isActiveLoan({ loanApproved: true, endDate: '2026-03-15' }, AS_OF)).toBe(true);
    expect(isActiveLoan({ loanApproved: true, endDate: '2026-03-16' }, AS_OF)).toBe(true);
    expect(isActiveLoan({ loanApproved: true, endDate: '2026-03-14' }, AS_OF)).toBe(false);
    expect(isActiveLoan({ loanApproved: false, endDate: '2026-12-31' }, AS_OF)).toBe(false);
    expect(isActiveLoan({ loanApproved: true, endDate: null }, AS_OF)).toBe(false);
  });
});

describe('computeRepaymentScore', () => {
  it('is null without history', () => {
    expect(computeRepaymentScore([])).toBeNull();
  });

  it('divides total on-time EMIs by total tenure', () => {
    const history = [
      createMockLoan({ tenure: 12, emisPaidOnTime: 4 }),
      createMockLoan({ tenure: 12, emisPaidOnTime: 4 }),
    ];

    expect(computeRepaymentScore(history)?.toFixed(2)).toBe('33.33');
    expect(computeRepaymentScore(historyScoring(13))?.toFixed(2)).toBe('65.00');
  });
});

describe('deriveApprovedLimit', () => {
  it('is 36 times the monthly salary', () => {
    expect(deriveApprovedLimit(10000).toFixed(2)).toBe('360000.00');
    expect(deriveApprovedLimit('2500.50').toFixed(2)).toBe('90018.00');
  });
});
