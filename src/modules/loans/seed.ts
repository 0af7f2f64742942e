/**
 * Credit Decision Engine - Mock Mode Seed
 *
 * Loads customers and loans from a JSON file into the in-memory repository,
 * so a server without DATABASE_URL has records to decide against.
 * The file uses the same snake_case names as the database columns.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { InMemoryCreditRepository } from './in-memory.repository';

const AmountSchema = z.union([z.number(), z.string()]);

const SeedCustomerSchema = z.object({
  customer_id: z.number().int().positive(),
  first_name: z.string(),
  last_name: z.string(),
  age: z.number().int().nonnegative(),
  phone_number: z.string(),
  monthly_salary: AmountSchema,
  approved_limit: AmountSchema.optional(),
  current_debt: AmountSchema.optional(),
});

const SeedLoanSchema = z.object({
  loan_id: z.number().int().positive(),
  customer_id: z.number().int().positive(),
  loan_amount: AmountSchema,
  tenure: z.number().int().positive(),
  interest_rate: AmountSchema,
  monthly_installment: AmountSchema,
  emis_paid_on_time: z.number().int().nonnegative(),
  loan_approved: z.boolean().default(true),
  date_of_approval: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
  end_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).nullable(),
});

export const SeedFileSchema = z.object({
  customers: z.array(SeedCustomerSchema),
  loans: z.array(SeedLoanSchema).default([]),
});

export interface SeedSummary {
  customers: number;
  loans: number;
}

export function applySeed(repository: InMemoryCreditRepository, data: unknown): SeedSummary {
  const seed = SeedFileSchema.parse(data);

  for (const customer of seed.customers) {
    repository.addCustomer({
      customerId: customer.customer_id,
      firstName: customer.first_name,
      lastName: customer.last_name,
      age: customer.age,
      phoneNumber: customer.phone_number,
      monthlySalary: customer.monthly_salary,
      approvedLimit: customer.approved_limit,
      currentDebt: customer.current_debt,
    });
  }

  for (const loan of seed.loans) {
    repository.addLoan({
      loanId: loan.loan_id,
      customerId: loan.customer_id,
      loanAmount: loan.loan_amount,
      tenure: loan.tenure,
      interestRate: loan.interest_rate,
      monthlyInstallment: loan.monthly_installment,
      emisPaidOnTime: loan.emis_paid_on_time,
      loanApproved: loan.loan_approved,
      dateOfApproval: loan.date_of_approval,
      endDate: loan.end_date,
    });
  }

  return { customers: seed.customers.length, loans: seed.loans.length };
}

export function loadSeedFile(repository: InMemoryCreditRepository, filePath: string): SeedSummary {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return applySeed(repository, data);
}
