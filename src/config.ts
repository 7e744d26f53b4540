/**
 * config.ts — Environment configuration for the stdio entry point.
 *
 * Library callers pass MastodonClientOptions directly; this only maps MASTODON_* variables
 * (usually from .env via dotenv) onto those options.
 */

import { z } from 'zod';
import type { MastodonClientOptions } from './client/MastodonClient.js';
import { RATELIMIT_METHODS } from './client/rate-limit.js';
import { IllegalArgumentError } from './client/types.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  MASTODON_CLIENT_ID: z.string().min(1),
  MASTODON_CLIENT_SECRET: z.string().min(1).optional(),
  MASTODON_ACCESS_TOKEN: z.string().min(1).optional(),
  MASTODON_API_BASE_URL: z.string().url().optional(),
  MASTODON_DEBUG_REQUESTS: flag.optional(),
  MASTODON_RATELIMIT_METHOD: z.enum(RATELIMIT_METHODS).optional(),
  MASTODON_RATELIMIT_PACEFACTOR: z.coerce.number().gt(0).lte(1).optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MastodonClientOptions {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new IllegalArgumentError(`Invalid configuration: ${problems}`, { cause: parsed.error });
  }
  const vars = parsed.data;
  return {
    clientId: vars.MASTODON_CLIENT_ID,
    clientSecret: vars.MASTODON_CLIENT_SECRET,
    accessToken: vars.MASTODON_ACCESS_TOKEN,
    apiBaseUrl: vars.MASTODON_API_BASE_URL,
    debugRequests: vars.MASTODON_DEBUG_REQUESTS,
    ratelimitMethod: vars.MASTODON_RATELIMIT_METHOD,
    ratelimitPacefactor: vars.MASTODON_RATELIMIT_PACEFACTOR,
  };
}
