/**
 * Credit Decision Engine - Persisted Records
 *
 * Customers and loans as the repository stores them. Both narrow the
 * eligibility input types to Decimal, so a Customer is a CustomerProfile and a
 * Loan is a LoanRecord.
 */

import Decimal from 'decimal.js';
import { CustomerProfile, EligibilityDecision, LoanRecord } from '../eligibility';

// ============================================================================
// CUSTOMER
// ============================================================================

export interface Customer extends CustomerProfile {
  customerId: number;
  firstName: string;
  lastName: string;
  age: number;
  phoneNumber: string;
  monthlySalary: Decimal;
  approvedLimit: Decimal;
  currentDebt: Decimal;
}

export type CustomerSummary = Pick<Customer, 'customerId' | 'firstName' | 'lastName' | 'phoneNumber' | 'age'>;

// ============================================================================
// LOAN
// ============================================================================

export interface Loan extends LoanRecord {
  loanId: number;
  customerId: number;
  loanAmount: Decimal;
  interestRate: Decimal;
  monthlyInstallment: Decimal;
}

/**
 * A loan about to be written on approval. The repository assigns the id.
 */
export type NewLoan = Omit<Loan, 'loanId'>;

export interface LoanDetail extends Loan {
  customer: CustomerSummary;
  repaymentsLeft: number;
}

export interface CurrentLoan {
  loanId: number;
  loanAmount: Decimal;
  interestRate: Decimal;
  monthlyInstallment: Decimal;
  repaymentsLeft: number;
}

export function repaymentsLeft(loan: Pick<Loan, 'tenure' | 'emisPaidOnTime'>): number {
  return loan.tenure - loan.emisPaidOnTime;
}

// ============================================================================
// SERVICE CONTRACTS
// ============================================================================

export interface LoanApplication {
  customerId: number;
  loanAmount: Decimal.Value;
  tenure: number;
  interestRate: Decimal.Value;
}

export interface EligibilityCheckResult {
  customerId: number;
  approvedLimit: Decimal;
  decision: EligibilityDecision;
}

export interface LoanCreationResult {
  customerId: number;
  decision: EligibilityDecision;
  loan: Loan | null;            // Set only when approved
}
