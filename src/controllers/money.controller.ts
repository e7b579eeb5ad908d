import { Request, Response, NextFunction } from 'express';
import { ledgerService } from '@/config/dependencies';
import {
  dateRangeQuerySchema,
  recentPaymentsQuerySchema,
  recordPaymentSchema,
  recordPayoutSchema,
  refundSchema,
  creditSchema,
} from '@/validators/money.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Money Controller
 * Ledger dashboard, payments, refunds and credits
 */

/**
 * GET /api/v1/admin/money/accounts
 */
export async function getAccountBalances(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = dateRangeQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid date format', validationResult.error.flatten());
    }

    const accounts = await ledgerService.getAccountBalances(validationResult.data);
    res.json({ accounts });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/money/payments
 */
export async function listRecentPayments(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = recentPaymentsQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    const result = await ledgerService.listRecentPayments(validationResult.data);
    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/money/payments/:id
 */
export async function getPayment(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const result = await ledgerService.getPayment(routeParam(req, 'id'));
    res.json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/money/payments
 * Record a payment captured by Stripe
 */
export async function recordPayment(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = recordPaymentSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid payment data', validationResult.error.flatten());
    }

    const result = await ledgerService.processPayment(validationResult.data);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/money/payouts
 */
export async function recordPayout(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = recordPayoutSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid payout data', validationResult.error.flatten());
    }

    const result = await ledgerService.processPayout(validationResult.data);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/money/refunds
 */
export async function processRefund(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = refundSchema.safeParse(req.body);
    if (!validationResult.success) {
      logger.warn({ errors: validationResult.error.flatten() }, 'Refund validation failed');
      throw new ValidationError('Invalid refund', validationResult.error.flatten());
    }

    const result = await ledgerService.processRefund(validationResult.data, actingUser(req).id);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/money/credits
 */
export async function addCredit(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = creditSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid credit', validationResult.error.flatten());
    }

    const result = await ledgerService.addCredit(validationResult.data, actingUser(req).id);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}
