import { Router } from 'express';
import usersRoutes from './users.routes';
import exportsRoutes from './exports.routes';
import moneyRoutes from './money.routes';
import postsRoutes from './posts.routes';
import mediaRoutes from './media.routes';
import expenseReportsRoutes, { adminExpenseReportsRouter } from './expenseReports.routes';
import bankAccountsRoutes, { adminBankAccountsRouter } from './bankAccounts.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';
import { authenticate, authorize } from '@/middlewares/authenticate';
import { PERMISSIONS } from '@/config/permissions';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioning Strategy: /api/v1/*
 * - Allows breaking changes in v2 without affecting v1 clients
 * - Health and metrics endpoints stay unversioned (infrastructure, not API)
 */

// Health check endpoint (unversioned - infrastructure endpoint)
router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'member-admin-api',
    version: 'v1',
  });
});

// Metrics endpoint (unversioned - infrastructure endpoint)
// Exposes Prometheus-format metrics for monitoring tools
router.get('/metrics', getMetrics);

// v1 API routes
const v1Router = Router();

// Every v1 route acts on behalf of the X-User-Id user
v1Router.use(authenticate);

// Admin console
v1Router.use('/admin/users', authorize(PERMISSIONS.ADMIN_USERS), usersRoutes);
v1Router.use('/admin/exports', authorize(PERMISSIONS.ADMIN_USERS), exportsRoutes);
v1Router.use('/admin/money', authorize(PERMISSIONS.ADMIN_MONEY), moneyRoutes);
v1Router.use('/admin/posts', authorize(PERMISSIONS.ADMIN_POSTS), postsRoutes);
v1Router.use('/admin/media', authorize(PERMISSIONS.ADMIN_MEDIA), mediaRoutes);
v1Router.use(
  '/admin/expense-reports',
  authorize(PERMISSIONS.ADMIN_EXPENSES),
  adminExpenseReportsRouter
);
v1Router.use('/admin/bank-accounts', adminBankAccountsRouter);

// Member self-service
v1Router.use(
  '/expense-reports',
  authorize(PERMISSIONS.EXPENSE_REPORT_OWN),
  expenseReportsRoutes
);
v1Router.use('/bank-accounts', authorize(PERMISSIONS.BANK_ACCOUNT_OWN), bankAccountsRoutes);

router.use('/v1', v1Router);

export default router;
