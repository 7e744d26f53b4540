import { writeFileSync } from 'node:fs';
import { consoleLogger, describeError, type Logger } from '../logger.js';
import { buildParams } from '../client/params.js';
import {
  DEFAULT_PACE_FACTOR,
  RateLimiter,
  createRateLimitState,
  type Clock,
  type RatelimitMethod,
  type Sleep,
} from '../client/rate-limit.js';
import { RequestExecutor } from '../client/request.js';
import { AppRegistrationSchema, TokenGrantSchema, type TokenGrant } from '../client/schemas/index.js';
import { ApiError, IllegalArgumentError, type Credentials } from '../client/types.js';

export const DEFAULT_SCOPES: readonly string[] = ['read', 'write', 'follow'];

// Redirect target for apps that show the code to the user instead of redirecting
export const OUT_OF_BAND_REDIRECT = 'urn:ietf:wg:oauth:2.0:oob';

export const DEFAULT_API_BASE_URL = 'https://mastodon.social';

export interface AppCredentials {
  clientId: string;
  clientSecret: string;
}

export interface RegisterAppOptions {
  scopes?: readonly string[];
  redirectUris?: string;
  // Writes "client_id\nclient_secret\n", readable back as a clientId file
  toFile?: string;
}

export interface LogInOptions {
  scopes?: readonly string[];
  // Writes "access_token\n", readable back as an accessToken file
  toFile?: string;
}

function persistLines(path: string, lines: string[]): void {
  writeFileSync(path, lines.map((line) => `${line}\n`).join(''), { mode: 0o600 });
}

function normalizeScopes(scopes: readonly string[]): string {
  return [...scopes].sort().join(' ');
}

/**
 * AuthSession — app registration and password-grant login.
 *
 * Both calls go through the session's RequestExecutor, so they see the same
 * rate-limit policy as every other request.
 */
export class AuthSession {
  private readonly logger: Logger;

  constructor(
    private readonly executor: RequestExecutor,
    private readonly credentials: Credentials,
    logger?: Logger,
  ) {
    this.logger = logger ?? consoleLogger;
  }

  async registerApp(clientName: string, options: RegisterAppOptions = {}): Promise<AppCredentials> {
    return registerWith(this.executor, clientName, options);
  }

  /**
   * logIn — exchanges a user name (the account's e-mail) and password for an access token.
   *
   * Any failure to obtain a token is reported as IllegalArgumentError with a generic message;
   * the real cause stays on `error.cause` and in the warn log. A token whose granted scopes
   * differ from the requested ones is rejected and never stored.
   */
  async logIn(username: string, password: string, options: LogInOptions = {}): Promise<string> {
    const scopes = options.scopes ?? DEFAULT_SCOPES;
    const params = buildParams({
      username,
      password,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      grant_type: 'password',
      scope: scopes.join(' '),
    });

    let grant: TokenGrant;
    try {
      const response = await this.executor.execute('POST', '/oauth/token', params);
      grant = TokenGrantSchema.parse(response);
    } catch (error) {
      this.logger.warn('password login failed', describeError(error));
      throw new IllegalArgumentError('Invalid user name, password or scopes', { cause: error });
    }

    const requested = normalizeScopes(scopes);
    const received = normalizeScopes(grant.scope.split(/\s+/).filter(Boolean));
    if (requested !== received) {
      throw new ApiError(`Granted scopes "${received}" differ from requested scopes "${requested}"`);
    }

    this.credentials.accessToken = grant.access_token;
    if (options.toFile) {
      persistLines(options.toFile, [grant.access_token]);
    }
    return grant.access_token;
  }
}

async function registerWith(
  executor: RequestExecutor,
  clientName: string,
  options: RegisterAppOptions,
): Promise<AppCredentials> {
  const params = buildParams({
    client_name: clientName,
    scopes: (options.scopes ?? DEFAULT_SCOPES).join(' '),
    redirect_uris: options.redirectUris ?? OUT_OF_BAND_REDIRECT,
  });

  const response = await executor.execute('POST', '/api/v1/apps', params);
  const parsed = AppRegistrationSchema.safeParse(response);
  if (!parsed.success) {
    throw new ApiError('App registration response did not contain client credentials', {
      cause: parsed.error,
    });
  }

  const app = { clientId: parsed.data.client_id, clientSecret: parsed.data.client_secret };
  if (options.toFile) {
    persistLines(options.toFile, [app.clientId, app.clientSecret]);
  }
  return app;
}

export interface CreateAppOptions extends RegisterAppOptions {
  apiBaseUrl?: string;
  ratelimitMethod?: RatelimitMethod;
  debugRequests?: boolean;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * createApp — registers an app before any session exists.
 *
 * A session needs a client id to be constructed, so registration gets its own
 * unauthenticated executor with a fresh rate-limit window.
 */
export async function createApp(
  clientName: string,
  options: CreateAppOptions = {},
): Promise<AppCredentials> {
  const clock = options.clock ?? Date.now;
  const rateLimiter = new RateLimiter(
    options.ratelimitMethod ?? 'wait',
    createRateLimitState(clock(), DEFAULT_PACE_FACTOR),
    clock,
    options.sleep,
  );
  const executor = new RequestExecutor({
    apiBaseUrl: options.apiBaseUrl ?? DEFAULT_API_BASE_URL,
    credentials: {},
    rateLimiter,
    debugRequests: options.debugRequests,
    logger: options.logger,
  });
  return registerWith(executor, clientName, options);
}
