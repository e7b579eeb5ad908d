import { Request, Response, NextFunction } from 'express';
import { eventBus, postService } from '@/config/dependencies';
import {
  listPostsQuerySchema,
  createPostSchema,
  postChangesSchema,
} from '@/validators/post.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';
import { streamTopic } from '@/api/helpers/sse';
import { postSavedTopic } from '@/services/post.service';

/**
 * Posts Controller
 * Blog post editor: listing, autosave and lifecycle transitions
 */

export async function listPosts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = listPostsQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    res.json(await postService.listPosts(validationResult.data));
  } catch (error) {
    next(error);
  }
}

export async function listAuthors(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const authors = await postService.listAuthors();
    res.json({ authors });
  } catch (error) {
    next(error);
  }
}

export async function getFeaturedPost(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    res.json(await postService.getFeaturedPost());
  } catch (error) {
    next(error);
  }
}

export async function createPost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = createPostSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid post data', validationResult.error.flatten());
    }

    const post = await postService.createPost(validationResult.data.title, actingUser(req).id);
    res.status(201).json(post);
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/posts/:id
 * By id or by url name
 */
export async function getPost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await postService.getPost(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

/**
 * PATCH /api/v1/admin/posts/:id
 * Debounced autosave; the result arrives on the post's event stream
 */
export async function autosavePost(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = postChangesSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid post data', validationResult.error.flatten());
    }

    const result = await postService.autosavePost(routeParam(req, 'id'), validationResult.data);
    res.status(202).json(result);
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/admin/posts/:id
 * Save now, flushing any pending autosave
 */
export async function savePost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = postChangesSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid post data', validationResult.error.flatten());
    }

    res.json(await postService.savePost(routeParam(req, 'id'), validationResult.data));
  } catch (error) {
    next(error);
  }
}

export function streamPostEvents(req: Request, res: Response, next: NextFunction): void {
  try {
    streamTopic(req, res, eventBus, postSavedTopic(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

export async function publishPost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await postService.publishPost(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

export async function restorePost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await postService.restorePost(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}

export async function deletePost(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await postService.deletePost(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}
