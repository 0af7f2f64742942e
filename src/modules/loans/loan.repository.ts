/**
 * Credit Decision Engine - Loan Repository
 *
 * Database access for customers and loans.
 *
 * CONSISTENCY: customers.current_debt changes in exactly one place,
 * recordApprovedLoan(), inside the same transaction that inserts the loan and
 * while the customer row is locked. Two concurrent approvals for one customer
 * therefore run one after the other.
 */

import Decimal from 'decimal.js';
import { Pool } from 'pg';
import { z } from 'zod';
import { Customer, Loan, NewLoan } from './loan-types';
import { CreditEngineError } from '../../shared/errors';

// ============================================================================
// CONTRACT
// ============================================================================

/**
 * Work done while a customer is locked. `customer` is the row as read under
 * the lock.
 */
export interface CustomerTransaction {
  readonly customer: Customer;
  getLoans(): Promise<Loan[]>;
  /** Insert the approved loan and add its principal to the customer's debt. */
  recordApprovedLoan(loan: NewLoan): Promise<Loan>;
}

export interface CreditRepository {
  getCustomer(customerId: number): Promise<Customer | null>;
  getLoansByCustomer(customerId: number): Promise<Loan[]>;
  getLoanById(loanId: number): Promise<Loan | null>;
  /**
   * Run `work` holding an exclusive lock on the customer. Writes made through
   * the transaction commit together when `work` resolves and are discarded
   * when it throws.
   *
   * @throws CreditEngineError CUSTOMER_NOT_FOUND
   */
  withCustomerLock<T>(customerId: number, work: (tx: CustomerTransaction) => Promise<T>): Promise<T>;
}

// ============================================================================
// ROWS
// ============================================================================

// NUMERIC columns are selected as text, DATE columns too
const CustomerRowSchema = z.object({
  customer_id: z.number().int(),
  first_name: z.string(),
  last_name: z.string(),
  age: z.number().int(),
  phone_number: z.string(),
  monthly_salary: z.string(),
  approved_limit: z.string(),
  current_debt: z.string(),
});

const LoanRowSchema = z.object({
  loan_id: z.number().int(),
  customer_id: z.number().int(),
  loan_amount: z.string(),
  tenure: z.number().int(),
  interest_rate: z.string(),
  monthly_installment: z.string(),
  emis_paid_on_time: z.number().int(),
  loan_approved: z.boolean(),
  date_of_approval: z.string().nullable(),
  end_date: z.string().nullable(),
});

const CUSTOMER_COLUMNS = `
  customer_id, first_name, last_name, age, phone_number,
  monthly_salary::text AS monthly_salary,
  approved_limit::text AS approved_limit,
  current_debt::text AS current_debt
`;

// DATE columns are read as text so they stay calendar days, not local-time Dates
const LOAN_COLUMNS = `
  loan_id, customer_id,
  loan_amount::text AS loan_amount,
  tenure,
  interest_rate::text AS interest_rate,
  monthly_installment::text AS monthly_installment,
  emis_paid_on_time, loan_approved,
  date_of_approval::text AS date_of_approval,
  end_date::text AS end_date
`;

// ============================================================================
// CONNECTIONS
// ============================================================================

/**
 * The slice of a pg client the repository uses. Rows come back untyped and
 * are parsed on the way out.
 */
export interface QueryClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

export interface ConnectionSource {
  connect(): Promise<QueryClient>;
}

export function pgConnectionSource(pool: Pool): ConnectionSource {
  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
  };
}

// ============================================================================
// POSTGRES REPOSITORY
// ============================================================================

export class PgCreditRepository implements CreditRepository {
  constructor(private readonly connections: ConnectionSource) {}

  async getCustomer(customerId: number): Promise<Customer | null> {
    return this.withClient(client => this.findCustomer(client, customerId, false));
  }

  async getLoansByCustomer(customerId: number): Promise<Loan[]> {
    return this.withClient(client => this.findLoans(client, customerId));
  }

  async getLoanById(loanId: number): Promise<Loan | null> {
    return this.withClient(async (client) => {
      const result = await client.query(`SELECT ${LOAN_COLUMNS} FROM loans WHERE loan_id = $1`, [loanId]);

      if (result.rows.length === 0) return null;
      return this.mapLoanRow(result.rows[0]);
    });
  }

  async withCustomerLock<T>(customerId: number, work: (tx: CustomerTransaction) => Promise<T>): Promise<T> {
    const client = await this.connections.connect();

    try {
      await client.query('BEGIN');

      const customer = await this.findCustomer(client, customerId, true);
      if (!customer) {
        throw new CreditEngineError('CUSTOMER_NOT_FOUND', `Customer ${customerId} not found`);
      }

      const tx: CustomerTransaction = {
        customer,
        getLoans: () => this.findLoans(client, customerId),
        recordApprovedLoan: (loan) => this.insertApprovedLoan(client, loan),
      };

      const result = await work(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  private async withClient<T>(work: (client: QueryClient) => Promise<T>): Promise<T> {
    const client = await this.connections.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  private async findCustomer(client: QueryClient, customerId: number, forUpdate: boolean): Promise<Customer | null> {
    const result = await client.query(
      `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE customer_id = $1${forUpdate ? ' FOR UPDATE' : ''}`,
      [customerId]
    );

    if (result.rows.length === 0) return null;
    return this.mapCustomerRow(result.rows[0]);
  }

  private async findLoans(client: QueryClient, customerId: number): Promise<Loan[]> {
    const result = await client.query(
      `SELECT ${LOAN_COLUMNS} FROM loans WHERE customer_id = $1 ORDER BY loan_id`,
      [customerId]
    );
    return result.rows.map(row => this.mapLoanRow(row));
  }

  private async insertApprovedLoan(client: QueryClient, loan: NewLoan): Promise<Loan> {
    const inserted = await client.query(
      `INSERT INTO loans (
        customer_id, loan_amount, tenure, interest_rate, monthly_installment,
        emis_paid_on_time, loan_approved, date_of_approval, end_date
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${LOAN_COLUMNS}`,
      [
        loan.customerId,
        loan.loanAmount.toFixed(2),
        loan.tenure,
        loan.interestRate.toFixed(2),
        loan.monthlyInstallment.toFixed(2),
        loan.emisPaidOnTime,
        loan.loanApproved,
        loan.dateOfApproval,
        loan.endDate,
      ]
    );

    await client.query(
      'UPDATE customers SET current_debt = current_debt + $1 WHERE customer_id = $2',
      [loan.loanAmount.toFixed(2), loan.customerId]
    );

    return this.mapLoanRow(inserted.rows[0]);
  }

  // ==========================================================================
  // ROW MAPPERS
  // ==========================================================================

  private mapCustomerRow(raw: unknown): Customer {
    const row = CustomerRowSchema.parse(raw);
    return {
      customerId: row.customer_id,
      firstName: row.first_name,
      lastName: row.last_name,
      age: row.age,
      phoneNumber: row.phone_number,
      monthlySalary: new Decimal(row.monthly_salary),
      approvedLimit: new Decimal(row.approved_limit),
      currentDebt: new Decimal(row.current_debt),
    };
  }

  private mapLoanRow(raw: unknown): Loan {
    const row = LoanRowSchema.parse(raw);
    return {
      loanId: row.loan_id,
      customerId: row.customer_id,
      loanAmount: new Decimal(row.loan_amount),
      tenure: row.tenure,
      interestRate: new Decimal(row.interest_rate),
      monthlyInstallment: new Decimal(row.monthly_installment),
      emisPaidOnTime: row.emis_paid_on_time,
      loanApproved: row.loan_approved,
      dateOfApproval: row.date_of_approval,
      endDate: row.end_date,
    };
  }
}
