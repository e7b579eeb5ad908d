import { Request, Response, NextFunction } from 'express';
import { expenseReportService } from '@/config/dependencies';
import {
  expenseReportSchema,
  reviewQuerySchema,
  statusChangeSchema,
} from '@/validators/expenseReport.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';

/**
 * Expense Reports Controller
 * Members manage their own reports; admins review them
 */

export async function listMyReports(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const reports = await expenseReportService.listMyReports(actingUser(req).id);
    res.json({ reports });
  } catch (error) {
    next(error);
  }
}

export async function getReport(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await expenseReportService.getReport(actingUser(req).id, routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

export async function createReport(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = expenseReportSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid expense report', validationResult.error.flatten());
    }

    const result = await expenseReportService.createReport(
      actingUser(req).id,
      validationResult.data
    );
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/expense-reports/:id
 * Replace a draft (items included)
 */
export async function updateReport(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = expenseReportSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid expense report', validationResult.error.flatten());
    }

    const result = await expenseReportService.updateReport(
      actingUser(req).id,
      routeParam(req, 'id'),
      validationResult.data
    );
    res.json(result);
  } catch (error) {
    next(error);
  }
}

export async function deleteReport(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    res.json(await expenseReportService.deleteReport(actingUser(req).id, routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/expense-reports/receipts
 * multipart/form-data, field "file"
 */
export async function uploadReceipt(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const file = req.file;
    if (!file) {
      throw new ValidationError('No file uploaded');
    }

    const result = await expenseReportService.uploadReceipt(actingUser(req).id, {
      originalName: file.originalname,
      mimeType: file.mimetype,
      size: file.size,
      buffer: file.buffer,
    });
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/expense-reports
 */
export async function listForReview(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = reviewQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    const reports = await expenseReportService.listForReview(validationResult.data.status);
    res.json({ reports });
  } catch (error) {
    next(error);
  }
}

export async function getReportForReview(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    res.json(await expenseReportService.getReportForReview(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/admin/expense-reports/:id/status
 */
export async function changeStatus(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = statusChangeSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid status change', validationResult.error.flatten());
    }

    const result = await expenseReportService.changeStatus(
      routeParam(req, 'id'),
      validationResult.data,
      actingUser(req).id
    );
    res.json(result);
  } catch (error) {
    next(error);
  }
}
