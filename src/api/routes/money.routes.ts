import { Router } from 'express';
import * as moneyController from '@/controllers/money.controller';
import { moneyMutationRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

router.get('/accounts', moneyController.getAccountBalances);

router.get('/payments', moneyController.listRecentPayments);

router.get('/payments/:id', moneyController.getPayment);

/**
 * Ledger mutations share a stricter rate limit
 */
router.post('/payments', moneyMutationRateLimiter, moneyController.recordPayment);

router.post('/payouts', moneyMutationRateLimiter, moneyController.recordPayout);

router.post('/refunds', moneyMutationRateLimiter, moneyController.processRefund);

router.post('/credits', moneyMutationRateLimiter, moneyController.addCredit);

export default router;
