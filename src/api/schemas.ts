/**
 * Credit Decision Engine - Request Schemas
 *
 * Wire format is snake_case. Money and rates arrive as JSON numbers or
 * numeric strings and leave validation as Decimal.
 */

import Decimal from 'decimal.js';
import { z } from 'zod';
import { LoanApplication } from '../modules/loans';
import { MAX_INTEREST_RATE, MAX_LOAN_AMOUNT, MAX_TENURE_MONTHS } from '../modules/eligibility';

export const DecimalSchema = z
  .union([
    z.number().finite(),
    z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'must be a number'),
  ])
  .transform(value => new Decimal(value));

export const MoneySchema = DecimalSchema.refine(
  value => value.decimalPlaces() <= 2,
  'must have at most 2 decimal places'
);

export const IdSchema = z.number().int('must be a whole number').positive('must be positive');

// Path parameters arrive as strings
export const IdParamSchema = z.coerce.number().int('must be a whole number').positive('must be positive');

export const LoanApplicationSchema = z.object({
  customer_id: IdSchema,
  loan_amount: MoneySchema
    .refine(value => value.gt(0), 'must be positive')
    .refine(value => value.lte(MAX_LOAN_AMOUNT), `must be at most ${MAX_LOAN_AMOUNT.toFixed(2)}`),
  tenure: z
    .number()
    .int('must be a whole number')
    .positive('must be positive')
    .max(MAX_TENURE_MONTHS, `must be at most ${MAX_TENURE_MONTHS}`),
  interest_rate: MoneySchema
    .refine(value => !value.lt(0), 'must not be negative')
    .refine(value => value.lte(MAX_INTEREST_RATE), `must be at most ${MAX_INTEREST_RATE.toFixed(2)}`),
});

export type LoanApplicationBody = z.infer<typeof LoanApplicationSchema>;

export function toLoanApplication(body: LoanApplicationBody): LoanApplication {
  return {
    customerId: body.customer_id,
    loanAmount: body.loan_amount,
    tenure: body.tenure,
    interestRate: body.interest_rate,
  };
}

export function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
