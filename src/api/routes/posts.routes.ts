import { Router } from 'express';
import * as postsController from '@/controllers/posts.controller';

const router = Router();

router.get('/', postsController.listPosts);

router.get('/authors', postsController.listAuthors);

router.get('/featured', postsController.getFeaturedPost);

router.post('/', postsController.createPost);

/**
 * GET /api/v1/admin/posts/:id
 * :id is a post id or url name
 */
router.get('/:id', postsController.getPost);

/**
 * PATCH /api/v1/admin/posts/:id
 * Debounced autosave (202); PUT saves immediately
 */
router.patch('/:id', postsController.autosavePost);

router.put('/:id', postsController.savePost);

router.get('/:id/events', postsController.streamPostEvents);

router.post('/:id/publish', postsController.publishPost);

router.post('/:id/restore', postsController.restorePost);

router.delete('/:id', postsController.deletePost);

export default router;
