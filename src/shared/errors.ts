/**
 * Credit Decision Engine - Error Types
 *
 * Business rejections are NOT errors. They come back as a normal
 * EligibilityDecision with approved=false. This class only covers input the
 * engine cannot work with and records that do not exist.
 */

export type CreditErrorCode =
  | 'INVALID_ARGUMENT'      // Non-positive tenure, negative amount, bad number
  | 'CUSTOMER_NOT_FOUND'    // No customer with the given id
  | 'LOAN_NOT_FOUND';       // No loan with the given id

export class CreditEngineError extends Error {
  constructor(
    public readonly code: CreditErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'CreditEngineError';
  }
}

export function isCreditEngineError(error: unknown): error is CreditEngineError {
  return error instanceof CreditEngineError;
}
