import { z } from 'zod';
import { consoleLogger, type Logger } from '../logger.js';
import {
  AuthSession,
  DEFAULT_API_BASE_URL,
  createApp,
  type AppCredentials,
  type CreateAppOptions,
  type LogInOptions,
  type RegisterAppOptions,
} from '../auth/session.js';
import { resolveCredentials, type CredentialInput } from './credentials.js';
import { prepareUpload } from './media.js';
import { buildParams } from './params.js';
import {
  DEFAULT_PACE_FACTOR,
  RATELIMIT_METHODS,
  RateLimiter,
  createRateLimitState,
  type Clock,
  type RateLimitState,
  type Sleep,
} from './rate-limit.js';
import { RequestExecutor } from './request.js';
import {
  AccountSchema,
  ContextSchema,
  MediaAttachmentSchema,
  NotificationSchema,
  RelationshipSchema,
  StatusSchema,
  type Account,
  type Context,
  type Id,
  type MediaAttachment,
  type Notification,
  type Relationship,
  type Status,
} from './schemas/index.js';
import { ApiError, IllegalArgumentError, type Credentials, type RequestParams } from './types.js';

// The configuration surface a session is constructed with
export const SessionSettingsSchema = z.object({
  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  debugRequests: z.boolean().default(false),
  ratelimitMethod: z.enum(RATELIMIT_METHODS).default('wait'),
  ratelimitPacefactor: z.number().gt(0).lte(1).default(DEFAULT_PACE_FACTOR),
});

export type SessionSettings = z.input<typeof SessionSettingsSchema>;

export interface MastodonClientOptions extends CredentialInput, SessionSettings {
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

export type TimelineName = 'home' | 'mentions' | 'public' | `tag/${string}`;

// Cursor parameters passed straight through to the service
export interface PageOptions {
  maxId?: Id;
  sinceId?: Id;
  limit?: number;
}

export interface StatusPostOptions {
  inReplyToId?: Id;
  // Up to four ids returned by mediaPost()
  mediaIds?: readonly Id[];
}

const EmptySchema = z.object({}).passthrough();

function pageParams(options: PageOptions): RequestParams {
  return buildParams({
    max_id: options.maxId,
    since_id: options.sinceId,
    limit: options.limit,
  });
}

// Validates a decoded body; surfaces the server's own error string when it sent one
function decode<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return parsed.data;
  const serverError =
    typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string'
      ? data.error
      : undefined;
  throw new ApiError(serverError ?? `Unexpected ${what} response`, { cause: parsed.error });
}

/**
 * MastodonClient — one authenticated session against one server.
 *
 * Owns the session's credentials, rate-limit state, RequestExecutor and AuthSession.
 * Every endpoint method builds its parameters, runs them through execute() and
 * validates the JSON it gets back.
 *
 * Not safe for concurrent calls under "wait" or "pace": those policies share timing
 * state across calls. Use one client per concurrent caller.
 */
export class MastodonClient {
  private readonly credentials: Credentials;
  private readonly state: RateLimitState;
  private readonly executor: RequestExecutor;
  private readonly auth: AuthSession;

  constructor(options: MastodonClientOptions) {
    const parsed = SessionSettingsSchema.safeParse(options);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new IllegalArgumentError(
        `Invalid option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? parsed.error.message}`,
        { cause: parsed.error },
      );
    }
    const settings = parsed.data;
    const logger = options.logger ?? consoleLogger;
    const clock = options.clock ?? Date.now;

    this.credentials = resolveCredentials(options);
    this.state = createRateLimitState(clock(), settings.ratelimitPacefactor);
    this.executor = new RequestExecutor({
      apiBaseUrl: settings.apiBaseUrl,
      credentials: this.credentials,
      rateLimiter: new RateLimiter(settings.ratelimitMethod, this.state, clock, options.sleep),
      debugRequests: settings.debugRequests,
      logger,
    });
    this.auth = new AuthSession(this.executor, this.credentials, logger);
  }

  static createApp(clientName: string, options?: CreateAppOptions): Promise<AppCredentials> {
    return createApp(clientName, options);
  }

  get clientId(): string {
    return this.credentials.clientId;
  }

  get accessToken(): string | undefined {
    return this.credentials.accessToken;
  }

  get ratelimitState(): Readonly<RateLimitState> {
    return { ...this.state };
  }

  // ---------------------------------------------------------------------------
  // Authentication
  // ---------------------------------------------------------------------------

  registerApp(clientName: string, options?: RegisterAppOptions): Promise<AppCredentials> {
    return this.auth.registerApp(clientName, options);
  }

  /**
   * logIn — password-grant login; the user name is the account's e-mail address.
   *
   * Sets the session token used by every later call. Fails with IllegalArgumentError
   * when no token could be obtained, or ApiError when fewer/other scopes were granted.
   */
  logIn(username: string, password: string, options?: LogInOptions): Promise<string> {
    return this.auth.logIn(username, password, options);
  }

  // ---------------------------------------------------------------------------
  // Reading: timelines
  // ---------------------------------------------------------------------------

  async timeline(timeline: TimelineName = 'home', options: PageOptions = {}): Promise<Status[]> {
    const data = await this.executor.execute('GET', `/api/v1/timelines/${timeline}`, pageParams(options));
    return decode(z.array(StatusSchema), data, 'timeline');
  }

  // Followed accounts and the user's own statuses
  timelineHome(options?: PageOptions): Promise<Status[]> {
    return this.timeline('home', options);
  }

  timelineMentions(options?: PageOptions): Promise<Status[]> {
    return this.timeline('mentions', options);
  }

  timelinePublic(options?: PageOptions): Promise<Status[]> {
    return this.timeline('public', options);
  }

  timelineHashtag(hashtag: string, options?: PageOptions): Promise<Status[]> {
    return this.timeline(`tag/${hashtag}`, options);
  }

  // ---------------------------------------------------------------------------
  // Reading: statuses
  // ---------------------------------------------------------------------------

  async status(id: Id): Promise<Status> {
    const data = await this.executor.execute('GET', `/api/v1/statuses/${id}`);
    return decode(StatusSchema, data, 'status');
  }

  // Ancestors and descendants of a status
  async statusContext(id: Id): Promise<Context> {
    const data = await this.executor.execute('GET', `/api/v1/statuses/${id}/context`);
    return decode(ContextSchema, data, 'context');
  }

  async statusRebloggedBy(id: Id): Promise<Account[]> {
    const data = await this.executor.execute('GET', `/api/v1/statuses/${id}/reblogged_by`);
    return decode(z.array(AccountSchema), data, 'account list');
  }

  async statusFavouritedBy(id: Id): Promise<Account[]> {
    const data = await this.executor.execute('GET', `/api/v1/statuses/${id}/favourited_by`);
    return decode(z.array(AccountSchema), data, 'account list');
  }

  // ---------------------------------------------------------------------------
  // Reading: notifications
  // ---------------------------------------------------------------------------

  async notifications(): Promise<Notification[]> {
    const data = await this.executor.execute('GET', '/api/v1/notifications');
    return decode(z.array(NotificationSchema), data, 'notification list');
  }

  // ---------------------------------------------------------------------------
  // Reading: accounts
  // ---------------------------------------------------------------------------

  async account(id: Id): Promise<Account> {
    const data = await this.executor.execute('GET', `/api/v1/accounts/${id}`);
    return decode(AccountSchema, data, 'account');
  }

  // The authenticated user's own account
  async accountVerifyCredentials(): Promise<Account> {
    const data = await this.executor.execute('GET', '/api/v1/accounts/verify_credentials');
    return decode(AccountSchema, data, 'account');
  }

  async accountStatuses(id: Id, options: PageOptions = {}): Promise<Status[]> {
    const data = await this.executor.execute('GET', `/api/v1/accounts/${id}/statuses`, pageParams(options));
    return decode(z.array(StatusSchema), data, 'status list');
  }

  async accountFollowing(id: Id): Promise<Account[]> {
    const data = await this.executor.execute('GET', `/api/v1/accounts/${id}/following`);
    return decode(z.array(AccountSchema), data, 'account list');
  }

  async accountFollowers(id: Id): Promise<Account[]> {
    const data = await this.executor.execute('GET', `/api/v1/accounts/${id}/followers`);
    return decode(z.array(AccountSchema), data, 'account list');
  }

  /**
   * accountRelationships — following / followed_by / blocking between the
   * authenticated user and each given account. A list is sent as `id[]`.
   */
  async accountRelationships(id: Id | readonly Id[]): Promise<Relationship[]> {
    const data = await this.executor.execute(
      'GET',
      '/api/v1/accounts/relationships',
      buildParams({ id }),
    );
    return decode(z.array(RelationshipSchema), data, 'relationship list');
  }

  async accountSuggestions(): Promise<Account[]> {
    const data = await this.executor.execute('GET', '/api/v1/accounts/suggestions');
    return decode(z.array(AccountSchema), data, 'account list');
  }

  // A `user@domain` query makes the server resolve accounts it has not seen yet
  async accountSearch(q: string, options: { limit?: number } = {}): Promise<Account[]> {
    const data = await this.executor.execute(
      'GET',
      '/api/v1/accounts/search',
      buildParams({ q, limit: options.limit }),
    );
    return decode(z.array(AccountSchema), data, 'account list');
  }

  // ---------------------------------------------------------------------------
  // Writing: statuses
  // ---------------------------------------------------------------------------

  async statusPost(status: string, options: StatusPostOptions = {}): Promise<Status> {
    const data = await this.executor.execute(
      'POST',
      '/api/v1/statuses',
      buildParams({
        status,
        in_reply_to_id: options.inReplyToId,
        media_ids: options.mediaIds,
      }),
    );
    return decode(StatusSchema, data, 'status');
  }

  toot(status: string): Promise<Status> {
    return this.statusPost(status);
  }

  async statusDelete(id: Id): Promise<Record<string, unknown>> {
    const data = await this.executor.execute('DELETE', `/api/v1/statuses/${id}`);
    return decode(EmptySchema, data, 'delete');
  }

  // Returns a new status wrapping the reblogged one
  async statusReblog(id: Id): Promise<Status> {
    return this.statusAction(id, 'reblog');
  }

  async statusUnreblog(id: Id): Promise<Status> {
    return this.statusAction(id, 'unreblog');
  }

  async statusFavourite(id: Id): Promise<Status> {
    return this.statusAction(id, 'favourite');
  }

  async statusUnfavourite(id: Id): Promise<Status> {
    return this.statusAction(id, 'unfavourite');
  }

  // ---------------------------------------------------------------------------
  // Writing: accounts — each returns the updated relationship
  // ---------------------------------------------------------------------------

  async accountFollow(id: Id): Promise<Relationship> {
    return this.accountAction(id, 'follow');
  }

  async accountUnfollow(id: Id): Promise<Relationship> {
    return this.accountAction(id, 'unfollow');
  }

  async accountBlock(id: Id): Promise<Relationship> {
    return this.accountAction(id, 'block');
  }

  async accountUnblock(id: Id): Promise<Relationship> {
    return this.accountAction(id, 'unblock');
  }

  // ---------------------------------------------------------------------------
  // Writing: media
  // ---------------------------------------------------------------------------

  /**
   * mediaPost — uploads an image or video.
   *
   * Pass a file path (type guessed from the name) or raw bytes with their MIME type.
   * Attach the returned id to a status via statusPost({ mediaIds }).
   */
  async mediaPost(media: string | Uint8Array, mimeType?: string): Promise<MediaAttachment> {
    const file = prepareUpload(media, mimeType);
    const data = await this.executor.execute('POST', '/api/v1/media', {}, { file });
    return decode(MediaAttachmentSchema, data, 'media');
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async statusAction(
    id: Id,
    action: 'reblog' | 'unreblog' | 'favourite' | 'unfavourite',
  ): Promise<Status> {
    const data = await this.executor.execute('POST', `/api/v1/statuses/${id}/${action}`);
    return decode(StatusSchema, data, 'status');
  }

  private async accountAction(
    id: Id,
    action: 'follow' | 'unfollow' | 'block' | 'unblock',
  ): Promise<Relationship> {
    const data = await this.executor.execute('POST', `/api/v1/accounts/${id}/${action}`);
    return decode(RelationshipSchema, data, 'relationship');
  }
}
