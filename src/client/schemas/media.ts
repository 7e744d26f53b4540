import { z } from 'zod';
import { IdSchema } from './common.js';

export const MediaAttachmentSchema = z
  .object({
    id: IdSchema,
    type: z.string(),
    url: z.string(),
    preview_url: z.string().optional(),
    text_url: z.string().nullable().optional(),
  })
  .passthrough();

export type MediaAttachment = z.infer<typeof MediaAttachmentSchema>;
