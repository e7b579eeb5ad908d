import { Request, Response, NextFunction } from 'express';
import { eventBus, userExportService } from '@/config/dependencies';
import { startExportSchema } from '@/validators/export.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';
import { streamTopic } from '@/api/helpers/sse';
import { exportTopic } from '@/services/userExport.service';

/**
 * POST /api/v1/admin/exports/users
 * Queue a member CSV export; progress is published on the returned topic
 */
export async function startExport(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = startExportSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid export request', validationResult.error.flatten());
    }

    const result = userExportService.startExport(actingUser(req).id, validationResult.data);
    res.status(202).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/exports/events
 * Server-Sent Events for the acting admin's exports
 */
export function streamExportEvents(req: Request, res: Response, next: NextFunction): void {
  try {
    streamTopic(req, res, eventBus, exportTopic(actingUser(req).id));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/exports/:jobId
 */
export function getExportStatus(req: Request, res: Response, next: NextFunction): void {
  try {
    const status = userExportService.getExportStatus(
      actingUser(req).id,
      routeParam(req, 'jobId')
    );
    res.json(status);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/exports/files/:file
 */
export async function downloadExport(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const fileName = routeParam(req, 'file');
    const filePath = await userExportService.resolveExportFile(fileName);

    res.type('text/csv');
    res.download(filePath, fileName, (error) => {
      if (error && !res.headersSent) {
        next(error);
      }
    });
  } catch (error) {
    next(error);
  }
}
