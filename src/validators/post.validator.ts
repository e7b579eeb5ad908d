import { z } from 'zod';
import { POST_RULES } from '@/config/businessRules';
import { POST_STATES } from '@/constants/posts';
import { pageSchema, pageSizeSchema } from './common';

export const listPostsQuerySchema = z.object({
  state: z.enum([POST_STATES.DRAFT, POST_STATES.PUBLISHED, POST_STATES.DELETED]).optional(),
  search: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  page: pageSchema,
  pageSize: pageSizeSchema,
});

export const createPostSchema = z.object({
  title: z
    .string({ required_error: "can't be blank" })
    .trim()
    .min(1, { message: "can't be blank" })
    .max(POST_RULES.MAX_TITLE_LENGTH, {
      message: `should be at most ${POST_RULES.MAX_TITLE_LENGTH} character(s)`,
    }),
});

/**
 * Editor change-set; every attribute is optional so autosave can send
 * only what changed
 */
export const postChangesSchema = z
  .object({
    title: z
      .string()
      .trim()
      .min(1, { message: "can't be blank" })
      .max(POST_RULES.MAX_TITLE_LENGTH, {
        message: `should be at most ${POST_RULES.MAX_TITLE_LENGTH} character(s)`,
      }),
    urlName: z.string().regex(/^[0-9a-z-]+$/, {
      message: 'may only contain lowercase letters, numbers and dashes',
    }),
    previewText: z
      .string()
      .max(POST_RULES.MAX_PREVIEW_TEXT_LENGTH, {
        message: `should be at most ${POST_RULES.MAX_PREVIEW_TEXT_LENGTH} character(s)`,
      })
      .nullable(),
    body: z.string().nullable(),
    rawBody: z.string().nullable(),
    imageId: z.string().min(1).nullable(),
    featuredPost: z.boolean(),
  })
  .partial()
  .strict();

export type PostChangesDTO = z.infer<typeof postChangesSchema>;
