/**
 * Credit Decision Engine - Origination Service
 *
 * Entry point for eligibility checks, loan creation and loan views.
 *
 * Check and create go through the same assess() and the same engine, so for
 * the same customer state they always reach the same decision. Only create
 * writes, and only on approval.
 */

import Decimal from 'decimal.js';
import { CreditRepository } from './loan.repository';
import {
  CurrentLoan,
  Customer,
  EligibilityCheckResult,
  Loan,
  LoanApplication,
  LoanCreationResult,
  LoanDetail,
  repaymentsLeft,
} from './loan-types';
import { EligibilityDecision, EligibilityEngine, getEligibilityEngine } from '../eligibility';
import { CreditEngineError } from '../../shared/errors';
import { addDays, toIsoDate } from '../../shared/dates';

// A loan runs 30 days per month of tenure
const DAYS_PER_TENURE_MONTH = 30;

export interface OriginationServiceOptions {
  now?: () => Date;
  engine?: EligibilityEngine;
}

// ============================================================================
// ORIGINATION SERVICE
// ============================================================================

export class OriginationService {
  private readonly now: () => Date;
  private readonly engine: EligibilityEngine;

  constructor(
    private readonly repository: CreditRepository,
    options: OriginationServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.engine = options.engine ?? getEligibilityEngine();
  }

  /**
   * Decide an application without recording anything.
   */
  async checkEligibility(application: LoanApplication): Promise<EligibilityCheckResult> {
    const customer = await this.repository.getCustomer(application.customerId);
    if (!customer) {
      throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${application.customerId} not found`);
    }

    const history = await this.repository.getLoansByCustomer(customer.customerId);
    const decision = this.assess(customer, history, application, this.now());

    console.log(
      `[Origination] Eligibility check customer=${customer.customerId} approved=${decision.approved}` +
      (decision.rejectionCode ? ` code=${decision.rejectionCode}` : '')
    );

    return {
      customerId: customer.customerId,
      approvedLimit: customer.approvedLimit,
      decision,
    };
  }

  /**
   * Decide an application and, if approved, record the loan and raise the
   * customer's debt by its principal. Runs under the customer lock so
   * concurrent approvals are decided one after the other.
   */
  async createLoan(application: LoanApplication): Promise<LoanCreationResult> {
    return this.repository.withCustomerLock(application.customerId, async (tx) => {
      const asOf = this.now();
      const history = await tx.getLoans();
      const decision = this.assess(tx.customer, history, application, asOf);

      if (!decision.approved || decision.interestRate === null || decision.monthlyInstallment === null) {
        console.log(
          `[Origination] Loan rejected customer=${tx.customer.customerId} code=${decision.rejectionCode ?? 'UNKNOWN'}`
        );
        return { customerId: tx.customer.customerId, decision, loan: null };
      }

      const loan = await tx.recordApprovedLoan({
        customerId: tx.customer.customerId,
        loanAmount: new Decimal(application.loanAmount),
        tenure: decision.tenure,
        interestRate: decision.interestRate,
        monthlyInstallment: decision.monthlyInstallment,
        emisPaidOnTime: 0,
        loanApproved: true,
        dateOfApproval: toIsoDate(asOf),
        endDate: toIsoDate(addDays(asOf, DAYS_PER_TENURE_MONTH * decision.tenure)),
      });

      console.log(
        `[Origination] Loan ${loan.loanId} approved customer=${loan.customerId} ` +
        `amount=${loan.loanAmount.toFixed(2)} rate=${loan.interestRate.toFixed(2)} emi=${loan.monthlyInstallment.toFixed(2)}`
      );

      return { customerId: tx.customer.customerId, decision, loan };
    });
  }

  async getLoan(loanId: number): Promise<LoanDetail> {
    const loan = await this.repository.getLoanById(loanId);
    if (!loan) {
      throw new CreditEngineError('LOAN_NOT_FOUND', `Loan ${loanId} not found`);
    }

    const customer = await this.repository.getCustomer(loan.customerId);
    if (!customer) {
      throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${loan.customerId} not found`);
    }

    return {
      ...loan,
      customer: {
        customerId: customer.customerId,
        firstName: customer.firstName,
        lastName: customer.lastName,
        phoneNumber: customer.phoneNumber,
        age: customer.age,
      },
      repaymentsLeft: repaymentsLeft(loan),
    };
  }

  /**
   * Approved loans with repayments outstanding, most recent approval first.
   */
  async getCurrentLoans(customerId: number): Promise<CurrentLoan[]> {
    const customer = await this.repository.getCustomer(customerId);
    if (!customer) {
      throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${customerId} not found`);
    }

    const loans = await this.repository.getLoansByCustomer(customerId);
    return loans
      .filter(loan => loan.loanApproved && repaymentsLeft(loan) > 0)
      .sort(byApprovalDateDesc)
      .map(loan => ({
        loanId: loan.loanId,
        loanAmount: loan.loanAmount,
        interestRate: loan.interestRate,
        monthlyInstallment: loan.monthlyInstallment,
        repaymentsLeft: repaymentsLeft(loan),
      }));
  }

  private assess(
    customer: Customer,
    history: readonly Loan[],
    application: LoanApplication,
    asOf: Date
  ): EligibilityDecision {
    return this.engine.evaluate(
      customer,
      history,
      {
        loanAmount: application.loanAmount,
        tenure: application.tenure,
        interestRate: application.interestRate,
      },
      asOf
    );
  }
}

// Undated loans sort last; ties keep the newer loan id first
function byApprovalDateDesc(a: Loan, b: Loan): number {
  const left = a.dateOfApproval ?? '';
  const right = b.dateOfApproval ?? '';
  if (left !== right) return left < right ? 1 : -1;
  return b.loanId - a.loanId;
}
