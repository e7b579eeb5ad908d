import { Router } from 'express';
import * as bankAccountsController from '@/controllers/bankAccounts.controller';
import { authorize } from '@/middlewares/authenticate';
import { PERMISSIONS } from '@/config/permissions';

const router = Router();

router.get('/', bankAccountsController.getMine);

router.put('/', bankAccountsController.upsertMine);

router.delete('/', bankAccountsController.deleteMine);

export default router;

/**
 * GET /api/v1/admin/bank-accounts/:id/details
 * Treasurer only
 */
export const adminBankAccountsRouter = Router();

adminBankAccountsRouter.get(
  '/:id/details',
  authorize(PERMISSIONS.BANK_ACCOUNT_UNSEAL),
  bankAccountsController.unseal
);
