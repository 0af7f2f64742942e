/**
 * Credit Decision Engine - Origination API Routes
 *
 * POST /api/v1/check-eligibility
 * POST /api/v1/create-loan
 * GET  /api/v1/view-loan/:loanId
 * GET  /api/v1/view-loans/:customerId
 *
 * Business rejections are normal responses. Only bad input and unknown
 * records map to 4xx.
 */

import { Router, Request, Response } from 'express';
import {
  CurrentLoan,
  EligibilityCheckResult,
  LoanCreationResult,
  LoanDetail,
  OriginationService,
} from '../modules/loans';
import { CreditErrorCode, isCreditEngineError } from '../shared/errors';
import { formatMoney } from '../shared/money';
import {
  formatValidationErrors,
  IdParamSchema,
  LoanApplicationSchema,
  toLoanApplication,
} from './schemas';

export interface OriginationRouteDependencies {
  originationService: OriginationService;
}

// ============================================================================
// RESPONSE SHAPES
// ============================================================================

export function presentEligibility(result: EligibilityCheckResult) {
  const { decision } = result;
  return {
    customer_id: result.customerId,
    approved: decision.approved,
    approved_limit: formatMoney(result.approvedLimit),
    interest_rate: formatMoney(decision.interestRate),
    monthly_installment: formatMoney(decision.monthlyInstallment),
    tenure: decision.tenure,
    message: decision.message,
    rejection_code: decision.rejectionCode,
  };
}

export function presentLoanCreation(result: LoanCreationResult) {
  return {
    loan_id: result.loan ? result.loan.loanId : null,
    customer_id: result.customerId,
    loan_approved: result.decision.approved,
    message: result.decision.message,
    monthly_installment: formatMoney(result.decision.monthlyInstallment),
  };
}

export function presentLoanDetail(loan: LoanDetail) {
  return {
    loan_id: loan.loanId,
    customer: {
      id: loan.customer.customerId,
      first_name: loan.customer.firstName,
      last_name: loan.customer.lastName,
      phone_number: loan.customer.phoneNumber,
      age: loan.customer.age,
    },
    loan_amount: formatMoney(loan.loanAmount),
    interest_rate: formatMoney(loan.interestRate),
    monthly_installment: formatMoney(loan.monthlyInstallment),
    tenure: loan.tenure,
    emis_paid_on_time: loan.emisPaidOnTime,
    repayments_left: loan.repaymentsLeft,
    date_of_approval: loan.dateOfApproval,
    end_date: loan.endDate,
  };
}

export function presentCurrentLoan(loan: CurrentLoan) {
  return {
    loan_id: loan.loanId,
    loan_amount: formatMoney(loan.loanAmount),
    interest_rate: formatMoney(loan.interestRate),
    monthly_installment: formatMoney(loan.monthlyInstallment),
    repayments_left: loan.repaymentsLeft,
  };
}

const ERROR_STATUS: Record<CreditErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  CUSTOMER_NOT_FOUND: 404,
  LOAN_NOT_FOUND: 404,
};

export function errorStatus(error: unknown): number {
  return isCreditEngineError(error) ? ERROR_STATUS[error.code] : 500;
}

function sendError(res: Response, error: unknown): void {
  const status = errorStatus(error);

  if (isCreditEngineError(error)) {
    res.status(status).json({ error: error.message, error_code: error.code });
    return;
  }

  console.error('[Origination API] Unhandled error:', error);
  res.status(status).json({ error: 'Internal server error' });
}

// ============================================================================
// ROUTER
// ============================================================================

export function createOriginationRoutes(deps: OriginationRouteDependencies): Router {
  const router = Router();
  const { originationService } = deps;

  /**
   * POST /check-eligibility
   *
   * Payload:
   * {
   *   "customer_id": 1,
   *   "loan_amount": 100000,
   *   "tenure": 12,
   *   "interest_rate": 10
   * }
   */
  router.post('/check-eligibility', async (req: Request, res: Response): Promise<void> => {
    const parsed = LoanApplicationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', validationErrors: formatValidationErrors(parsed.error) });
      return;
    }

    try {
      const result = await originationService.checkEligibility(toLoanApplication(parsed.data));
      res.status(200).json(presentEligibility(result));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /create-loan
   * Same payload as /check-eligibility. 201 when the loan is recorded.
   */
  router.post('/create-loan', async (req: Request, res: Response): Promise<void> => {
    const parsed = LoanApplicationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', validationErrors: formatValidationErrors(parsed.error) });
      return;
    }

    try {
      const result = await originationService.createLoan(toLoanApplication(parsed.data));
      res.status(result.loan ? 201 : 200).json(presentLoanCreation(result));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/view-loan/:loanId', async (req: Request, res: Response): Promise<void> => {
    const loanId = IdParamSchema.safeParse(req.params.loanId);
    if (!loanId.success) {
      res.status(400).json({ error: 'Invalid loan id', validationErrors: formatValidationErrors(loanId.error) });
      return;
    }

    try {
      const loan = await originationService.getLoan(loanId.data);
      res.json(presentLoanDetail(loan));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/view-loans/:customerId', async (req: Request, res: Response): Promise<void> => {
    const customerId = IdParamSchema.safeParse(req.params.customerId);
    if (!customerId.success) {
      res.status(400).json({ error: 'Invalid customer id', validationErrors: formatValidationErrors(customerId.error) });
      return;
    }

    try {
      const loans = await originationService.getCurrentLoans(customerId.data);
      res.json(loans.map(presentCurrentLoan));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
