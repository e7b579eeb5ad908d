import { Router } from 'express';
import multer from 'multer';
import * as expenseReportsController from '@/controllers/expenseReports.controller';
import { uploadRateLimiter } from '@/middlewares/rateLimiter';
import { EXPENSE_RULES } from '@/config/businessRules';

/**
 * Receipts are buffered in memory and handed to the service, which checks
 * the type and writes them to the expense bucket
 */
const receiptUpload = multer({
  storage: multer.memoryStorage(),
  limits: { files: 1, fileSize: EXPENSE_RULES.MAX_RECEIPT_SIZE_BYTES },
});

const router = Router();

router.get('/', expenseReportsController.listMyReports);

router.post('/', expenseReportsController.createReport);

/**
 * POST /api/v1/expense-reports/receipts
 * multipart/form-data with a single "file" field
 */
router.post(
  '/receipts',
  uploadRateLimiter,
  receiptUpload.single('file'),
  expenseReportsController.uploadReceipt
);

router.get('/:id', expenseReportsController.getReport);

router.put('/:id', expenseReportsController.updateReport);

router.delete('/:id', expenseReportsController.deleteReport);

export default router;

/**
 * Board review: /api/v1/admin/expense-reports
 */
export const adminExpenseReportsRouter = Router();

adminExpenseReportsRouter.get('/', expenseReportsController.listForReview);

adminExpenseReportsRouter.get('/:id', expenseReportsController.getReportForReview);

adminExpenseReportsRouter.patch('/:id/status', expenseReportsController.changeStatus);
