/**
 * Credit Decision Engine - Eligibility Types
 *
 * Inputs accept Decimal.Value (number | string | Decimal) so callers can pass
 * database rows, parsed JSON or literals. Outputs are always Decimal.
 */

import Decimal from 'decimal.js';

// ============================================================================
// INPUTS
// ============================================================================

export interface CustomerProfile {
  monthlySalary: Decimal.Value;
  currentDebt: Decimal.Value;      // Aggregate outstanding principal
  approvedLimit: Decimal.Value;    // 36x monthly salary at onboarding
}

export interface LoanRecord {
  loanAmount: Decimal.Value;
  tenure: number;                  // Months
  interestRate: Decimal.Value;     // Annual percent, e.g. 10.50
  monthlyInstallment: Decimal.Value;
  emisPaidOnTime: number;
  loanApproved: boolean;
  dateOfApproval: string | null;   // YYYY-MM-DD
  endDate: string | null;          // YYYY-MM-DD
}

export interface LoanRequest {
  loanAmount: Decimal.Value;
  tenure: number;
  interestRate: Decimal.Value;     // Requested annual percent
}

// ============================================================================
// OUTPUT
// ============================================================================

export type RejectionCode =
  | 'EMI_BURDEN_EXCEEDED'          // Rule 1: affordability
  | 'POOR_REPAYMENT_HISTORY'       // Rule 2: score <= 40
  | 'APPROVED_LIMIT_EXCEEDED';     // Rule 3: debt limit

export interface EligibilityDecision {
  approved: boolean;
  interestRate: Decimal | null;
  monthlyInstallment: Decimal | null;
  tenure: number;
  message: string;
  rejectionCode: RejectionCode | null;
}
