import { z } from 'zod';

// POST /api/v1/apps
export const AppRegistrationSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
  })
  .passthrough();

export type AppRegistration = z.infer<typeof AppRegistrationSchema>;

// POST /oauth/token — scope is the space-separated list actually granted
export const TokenGrantSchema = z
  .object({
    access_token: z.string().min(1),
    scope: z.string(),
    token_type: z.string().optional(),
  })
  .passthrough();

export type TokenGrant = z.infer<typeof TokenGrantSchema>;
