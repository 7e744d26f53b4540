/**
 * Public API of the client library. The MCP server lives in mcp.ts.
 */

export {
  MastodonClient,
  SessionSettingsSchema,
  type MastodonClientOptions,
  type PageOptions,
  type SessionSettings,
  type StatusPostOptions,
  type TimelineName,
} from './client/MastodonClient.js';
export {
  AuthSession,
  DEFAULT_API_BASE_URL,
  DEFAULT_SCOPES,
  OUT_OF_BAND_REDIRECT,
  createApp,
  type AppCredentials,
  type CreateAppOptions,
  type LogInOptions,
  type RegisterAppOptions,
} from './auth/session.js';
export { resolveCredentials, type CredentialInput } from './client/credentials.js';
export { buildParams, toSearchParams, type ParamInput } from './client/params.js';
export {
  RateLimiter,
  computePaceDelay,
  createRateLimitState,
  type RateLimitState,
  type RatelimitMethod,
} from './client/rate-limit.js';
export { RequestExecutor, type RequestExecutorOptions } from './client/request.js';
export { htmlToMarkdown } from './client/html-to-markdown.js';
export * from './client/schemas/index.js';
export {
  ApiError,
  IllegalArgumentError,
  MastodonError,
  NetworkError,
  RatelimitError,
  type Credentials,
  type HttpMethod,
  type MastodonErrorCode,
  type RequestParams,
} from './client/types.js';
export { consoleLogger, type Logger } from './logger.js';
export { loadConfig } from './config.js';
export { createTools } from './tools/tools.js';
