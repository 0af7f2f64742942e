/**
 * Credit Decision Engine - In-Memory Repository
 *
 * Backs the service when DATABASE_URL is not set (mock mode) and in tests.
 * Locking is a promise chain per customer; writes made under the lock are
 * staged and applied only when the work resolves. Reads hand out copies, so
 * stored debt only moves through recordApprovedLoan().
 */

import Decimal from 'decimal.js';
import { CreditRepository, CustomerTransaction } from './loan.repository';
import { Customer, Loan, NewLoan } from './loan-types';
import { deriveApprovedLimit } from '../eligibility';
import { CreditEngineError } from '../../shared/errors';
import { roundToCents, toDecimal } from '../../shared/money';

export interface CustomerSeed {
  customerId?: number;
  firstName: string;
  lastName: string;
  age: number;
  phoneNumber: string;
  monthlySalary: Decimal.Value;
  approvedLimit?: Decimal.Value;   // Defaults to 36 x salary
  currentDebt?: Decimal.Value;
}

export interface LoanSeed {
  loanId?: number;
  customerId: number;
  loanAmount: Decimal.Value;
  tenure: number;
  interestRate: Decimal.Value;
  monthlyInstallment: Decimal.Value;
  emisPaidOnTime: number;
  loanApproved?: boolean;
  dateOfApproval: string | null;
  endDate: string | null;
}

export class InMemoryCreditRepository implements CreditRepository {
  private customers = new Map<number, Customer>();
  private loans = new Map<number, Loan>();
  private locks = new Map<number, Promise<void>>();
  private nextCustomerId = 1;
  private nextLoanId = 1;

  // ==========================================================================
  // SEEDING
  // ==========================================================================

  addCustomer(seed: CustomerSeed): Customer {
    const customerId = seed.customerId ?? this.nextCustomerId;
    if (this.customers.has(customerId)) {
      throw new CreditEngineError('INVALID_ARGUMENT', `Customer ${customerId} already exists`);
    }

    const monthlySalary = toDecimal(seed.monthlySalary, 'monthlySalary');
    const customer: Customer = {
      customerId,
      firstName: seed.firstName,
      lastName: seed.lastName,
      age: seed.age,
      phoneNumber: seed.phoneNumber,
      monthlySalary,
      approvedLimit: seed.approvedLimit === undefined
        ? deriveApprovedLimit(monthlySalary)
        : toDecimal(seed.approvedLimit, 'approvedLimit'),
      currentDebt: toDecimal(seed.currentDebt ?? 0, 'currentDebt'),
    };

    this.customers.set(customerId, customer);
    this.nextCustomerId = Math.max(this.nextCustomerId, customerId + 1);
    return { ...customer };
  }

  addLoan(seed: LoanSeed): Loan {
    if (!this.customers.has(seed.customerId)) {
      throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${seed.customerId} not found`);
    }

    const loanId = seed.loanId ?? this.nextLoanId;
    if (this.loans.has(loanId)) {
      throw new CreditEngineError('INVALID_ARGUMENT', `Loan ${loanId} already exists`);
    }

    const loan: Loan = {
      loanId,
      customerId: seed.customerId,
      loanAmount: roundToCents(toDecimal(seed.loanAmount, 'loanAmount')),
      tenure: seed.tenure,
      interestRate: roundToCents(toDecimal(seed.interestRate, 'interestRate')),
      monthlyInstallment: roundToCents(toDecimal(seed.monthlyInstallment, 'monthlyInstallment')),
      emisPaidOnTime: seed.emisPaidOnTime,
      loanApproved: seed.loanApproved ?? true,
      dateOfApproval: seed.dateOfApproval,
      endDate: seed.endDate,
    };

    this.loans.set(loanId, loan);
    this.nextLoanId = Math.max(this.nextLoanId, loanId + 1);
    return { ...loan };
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  async getCustomer(customerId: number): Promise<Customer | null> {
    const customer = this.customers.get(customerId);
    return customer ? { ...customer } : null;
  }

  async getLoansByCustomer(customerId: number): Promise<Loan[]> {
    return this.loansOf(customerId);
  }

  async getLoanById(loanId: number): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    return loan ? { ...loan } : null;
  }

  // ==========================================================================
  // LOCKED WORK
  // ==========================================================================

  async withCustomerLock<T>(customerId: number, work: (tx: CustomerTransaction) => Promise<T>): Promise<T> {
    const previous = this.locks.get(customerId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>(resolve => {
      release = () => resolve();
    });
    const tail = previous.then(() => held);
    this.locks.set(customerId, tail);

    await previous;
    try {
      const customer = this.customers.get(customerId);
      if (!customer) {
        throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${customerId} not found`);
      }

      const staged: Loan[] = [];
      let currentDebt = customer.currentDebt;

      const tx: CustomerTransaction = {
        customer: { ...customer },
        getLoans: async () => [...this.loansOf(customerId), ...staged.map(loan => ({ ...loan }))],
        recordApprovedLoan: async (newLoan: NewLoan) => {
          const loan: Loan = { ...newLoan, loanId: this.nextLoanId++ };
          staged.push(loan);
          currentDebt = currentDebt.plus(newLoan.loanAmount);
          return { ...loan };
        },
      };

      const result = await work(tx);

      for (const loan of staged) {
        this.loans.set(loan.loanId, loan);
      }
      this.customers.set(customerId, { ...customer, currentDebt });
      return result;
    } finally {
      release();
      if (this.locks.get(customerId) === tail) {
        this.locks.delete(customerId);
      }
    }
  }

  private loansOf(customerId: number): Loan[] {
    return Array.from(this.loans.values())
      .filter(loan => loan.customerId === customerId)
      .sort((a, b) => a.loanId - b.loanId)
      .map(loan => ({ ...loan }));
  }
}
