import { Router } from 'express';
import * as exportsController from '@/controllers/exports.controller';

const router = Router();

/**
 * POST /api/v1/admin/exports/users
 * Queue a member CSV export (202)
 */
router.post('/users', exportsController.startExport);

/**
 * GET /api/v1/admin/exports/events
 * Server-Sent Events: user_export:progress | complete | failed
 */
router.get('/events', exportsController.streamExportEvents);

router.get('/files/:file', exportsController.downloadExport);

router.get('/:jobId', exportsController.getExportStatus);

export default router;
