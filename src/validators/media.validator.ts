import { z } from 'zod';
import { MEDIA_RULES, PAGINATION_LIMITS } from '@/config/businessRules';

export const listImagesQuerySchema = z.object({
  // pages below 1 come from paging backwards past the start
  page: z.coerce
    .number()
    .int()
    .default(1)
    .transform((page) => Math.max(page, 1)),
  perPage: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_MEDIA_PAGE_SIZE)
    .default(PAGINATION_LIMITS.MEDIA_PAGE_SIZE),
});

export const feedQuerySchema = z.object({
  cursor: z.string().min(1).optional(),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_MEDIA_PAGE_SIZE)
    .default(PAGINATION_LIMITS.MEDIA_PAGE_SIZE),
});

const uploadRequestSchema = z.object({
  clientName: z.string().trim().min(1).max(255),
  contentType: z.string().trim().min(1),
  size: z.number().int().nonnegative(),
});

/**
 * File count, type and size are checked by the service so every entry gets
 * its own message
 */
export const presignUploadsSchema = z.object({
  files: z.array(uploadRequestSchema).min(1, { message: 'Select at least one file' }),
});

export const registerUploadsSchema = z.object({
  uploads: z
    .array(uploadRequestSchema.extend({ key: z.string().min(1) }))
    .min(1)
    .max(MEDIA_RULES.MAX_UPLOAD_ENTRIES, { message: 'Too many files' }),
});

export const imageQuerySchema = z.object({
  version: z.string().optional(),
});

export const updateImageSchema = z
  .object({
    title: z.string().trim().max(200, { message: 'should be at most 200 character(s)' }).nullable(),
    altText: z.string().trim().max(500, { message: 'should be at most 500 character(s)' }).nullable(),
  })
  .partial()
  .strict();
