/**
 * account.ts — Zod schemas for accounts and relationships.
 *
 * Only the fields the client relies on are declared; passthrough() keeps the rest.
 */

import { z } from 'zod';
import { IdSchema } from './common.js';

export const AccountSchema = z
  .object({
    id: IdSchema,
    username: z.string(),
    acct: z.string(),
    display_name: z.string().default(''),
    note: z.string().default(''),
    url: z.string(),
    avatar: z.string().optional(),
    followers_count: z.number().optional(),
    following_count: z.number().optional(),
    statuses_count: z.number().optional(),
  })
  .passthrough();

export type Account = z.infer<typeof AccountSchema>;

export const RelationshipSchema = z
  .object({
    id: IdSchema,
    following: z.boolean(),
    followed_by: z.boolean(),
    blocking: z.boolean(),
    muting: z.boolean().optional(),
    requested: z.boolean().optional(),
  })
  .passthrough();

export type Relationship = z.infer<typeof RelationshipSchema>;
