/**
 * status.ts — Zod schemas for statuses and thread context.
 *
 * A reblog wraps the original status one level deep and never nests further,
 * so the inner status is declared without its own `reblog` field.
 *
 * `content` is the server-rendered HTML; see html-to-markdown.ts for display.
 */

import { z } from 'zod';
import { AccountSchema } from './account.js';
import { IdSchema } from './common.js';
import { MediaAttachmentSchema } from './media.js';

const BaseStatusSchema = z
  .object({
    id: IdSchema,
    uri: z.string().optional(),
    url: z.string().nullable().optional(),
    account: AccountSchema,
    content: z.string(),
    created_at: z.string(),
    in_reply_to_id: IdSchema.nullable().optional(),
    reblogs_count: z.number().optional(),
    favourites_count: z.number().optional(),
    reblogged: z.boolean().nullable().optional(),
    favourited: z.boolean().nullable().optional(),
    spoiler_text: z.string().optional(),
    visibility: z.string().optional(),
    media_attachments: z.array(MediaAttachmentSchema).default([]),
  })
  .passthrough();

export const StatusSchema = BaseStatusSchema.extend({
  reblog: BaseStatusSchema.nullable().optional(),
});

export type Status = z.infer<typeof StatusSchema>;

export const ContextSchema = z.object({
  ancestors: z.array(StatusSchema),
  descendants: z.array(StatusSchema),
});

export type Context = z.infer<typeof ContextSchema>;
