import { Request, Response, NextFunction } from 'express';
import { bankAccountService } from '@/config/dependencies';
import { bankAccountSchema } from '@/validators/bankAccount.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';

/**
 * GET /api/v1/bank-accounts
 * Safe view of the acting member's account, or null
 */
export async function getMine(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const bankAccount = await bankAccountService.getMine(actingUser(req).id);
    res.json({ bankAccount });
  } catch (error) {
    next(error);
  }
}

export async function upsertMine(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = bankAccountSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid bank account', validationResult.error.flatten());
    }

    res.json(await bankAccountService.upsertMine(actingUser(req).id, validationResult.data));
  } catch (error) {
    next(error);
  }
}

export async function deleteMine(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await bankAccountService.deleteMine(actingUser(req).id));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/bank-accounts/:id/details
 * Decrypted numbers for the treasurer; audit-logged
 */
export async function unseal(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await bankAccountService.unseal(routeParam(req, 'id'), actingUser(req)));
  } catch (error) {
    next(error);
  }
}
