import { z } from 'zod';
import { PAGINATION_LIMITS } from '@/config/businessRules';
import { parseIsoDate } from '@/utils/dates';

/**
 * Query string list: "active,suspended" → ['active', 'suspended']
 * Empty entries are dropped; an empty list means "no filter".
 */
export function commaSeparated<T extends [string, ...string[]]>(values: T) {
  return z
    .string()
    .optional()
    .transform((raw) =>
      raw
        ? raw
            .split(',')
            .map((value) => value.trim())
            .filter((value) => value !== '')
        : []
    )
    .pipe(z.array(z.enum(values)))
    .transform((list) => (list.length > 0 ? list : undefined));
}

export const pageSchema = z.coerce.number().int().min(1).default(1);

export const pageSizeSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(PAGINATION_LIMITS.MAX_PAGE_SIZE, {
    message: `Page size cannot exceed ${PAGINATION_LIMITS.MAX_PAGE_SIZE}`,
  })
  .default(PAGINATION_LIMITS.DEFAULT_PAGE_SIZE);

/**
 * Real calendar date in YYYY-MM-DD form (2024-02-30 is refused);
 * range checks happen in the services
 */
export const isoDateSchema = z
  .string()
  .trim()
  .refine((value) => parseIsoDate(value) !== null, { message: 'Invalid date format' });
