import { z } from 'zod';
import { EXPORT_FIELDS } from '@/jobs/jobs';

export const startExportSchema = z.object({
  fields: z
    .array(z.enum(EXPORT_FIELDS))
    .min(1, { message: 'Select at least one field to export' })
    .transform((fields) => Array.from(new Set(fields))),
  onlySubscribers: z.boolean().default(false),
});

export type StartExportDTO = z.infer<typeof startExportSchema>;
