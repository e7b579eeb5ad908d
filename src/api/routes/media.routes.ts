import { Router } from 'express';
import * as mediaController from '@/controllers/media.controller';
import { uploadRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

router.get('/', mediaController.listImages);

router.get('/feed', mediaController.feedImages);

router.get('/count', mediaController.countImages);

router.post('/uploads', uploadRateLimiter, mediaController.presignUploads);

router.post('/', mediaController.registerUploads);

/**
 * GET /api/v1/admin/media/:id?version=optimized|thumbnail|raw
 */
router.get('/:id', mediaController.getImage);

router.patch('/:id', mediaController.updateImage);

router.delete('/:id', mediaController.deleteImage);

export default router;
