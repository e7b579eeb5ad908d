import { Request, Response, NextFunction } from 'express';
import { mediaService } from '@/config/dependencies';
import {
  listImagesQuerySchema,
  feedQuerySchema,
  presignUploadsSchema,
  registerUploadsSchema,
  imageQuerySchema,
  updateImageSchema,
} from '@/validators/media.validator';
import { ValidationError } from '@/errors';
import { actingUser } from '@/middlewares/authenticate';
import { routeParam } from '@/api/helpers/params';

/**
 * Media Controller
 * Gallery listing, direct-to-S3 uploads and image details
 */

export async function listImages(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = listImagesQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    res.json(await mediaService.listImages(validationResult.data));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/media/feed
 * Infinite scroll; pass the previous response's nextCursor
 */
export async function feedImages(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = feedQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    res.json(await mediaService.feedImages(validationResult.data));
  } catch (error) {
    next(error);
  }
}

export async function countImages(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const count = await mediaService.countImages();
    res.json({ count });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/media/uploads
 * Presigned POST targets for the browser to upload to
 */
export async function presignUploads(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = presignUploadsSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid upload request', validationResult.error.flatten());
    }

    const uploads = await mediaService.presignUploads(validationResult.data.files);
    res.json({ uploads });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/media
 * Register finished uploads and queue their processing
 */
export async function registerUploads(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = registerUploadsSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid upload data', validationResult.error.flatten());
    }

    const images = await mediaService.registerUploads(
      actingUser(req).id,
      validationResult.data.uploads
    );
    res.status(201).json({ images });
  } catch (error) {
    next(error);
  }
}

export async function getImage(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = imageQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      throw new ValidationError('Invalid query parameters', validationResult.error.flatten());
    }

    res.json(await mediaService.getImage(routeParam(req, 'id'), validationResult.data.version));
  } catch (error) {
    next(error);
  }
}

export async function updateImage(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const validationResult = updateImageSchema.safeParse(req.body);
    if (!validationResult.success) {
      throw new ValidationError('Invalid image data', validationResult.error.flatten());
    }

    res.json(await mediaService.updateImage(routeParam(req, 'id'), validationResult.data));
  } catch (error) {
    next(error);
  }
}

export async function deleteImage(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(await mediaService.deleteImage(routeParam(req, 'id')));
  } catch (error) {
    next(error);
  }
}
