import got, { type Got, type Response } from 'got';
import { consoleLogger, type Logger } from '../logger.js';
import { toSearchParams } from './params.js';
import { isThrottled, type RateLimiter } from './rate-limit.js';
import {
  ApiError,
  NetworkError,
  type Credentials,
  type HttpMethod,
  type RequestFiles,
  type RequestParams,
} from './types.js';

export interface RequestExecutorOptions {
  apiBaseUrl: string;
  // Read on every call so a token obtained by logIn applies to the next request
  credentials: Pick<Credentials, 'accessToken'>;
  rateLimiter: RateLimiter;
  debugRequests?: boolean;
  logger?: Logger;
}

interface EncodedBody {
  body?: string | FormData;
  contentType?: string;
}

function encodeBody(params: RequestParams, files: RequestFiles | undefined): EncodedBody {
  if (files && Object.keys(files).length > 0) {
    const form = new FormData();
    for (const [key, value] of toSearchParams(params)) {
      form.append(key, value);
    }
    for (const [field, file] of Object.entries(files)) {
      form.append(field, new Blob([file.data], { type: file.mimeType }), file.fileName);
    }
    // got sets the multipart boundary header itself
    return { body: form };
  }
  if (Object.keys(params).length === 0) return {};
  return {
    body: toSearchParams(params).toString(),
    contentType: 'application/x-www-form-urlencoded',
  };
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  if (!headers['Authorization']) return headers;
  return { ...headers, Authorization: 'Bearer [redacted]' };
}

/**
 * RequestExecutor — the single path every API call takes.
 *
 * One logical call may be sent several times: while the policy is "wait" or "pace" and
 * the body says we were throttled, the same request is replayed after the window resets.
 * Every other failure ends the call with a typed error:
 *   - transport failure      → NetworkError
 *   - HTTP 404 / 500         → ApiError
 *   - body is not JSON       → ApiError
 *   - throttled under throw  → RatelimitError (from the RateLimiter)
 */
export class RequestExecutor {
  private readonly instance: Got;
  private readonly logger: Logger;

  constructor(private readonly options: RequestExecutorOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.instance = got.extend({
      headers: {
        'User-Agent': 'mastodon-client/0.1.0',
        'Accept': 'application/json',
      },
      timeout: { request: 30_000 },
      // Disable got's built-in retry — throttling is retried by execute(), nothing else is
      retry: { limit: 0 },
      // Status codes are classified below, not by got
      throwHttpErrors: false,
    });
  }

  get apiBaseUrl(): string {
    return this.options.apiBaseUrl;
  }

  async execute(
    method: HttpMethod,
    endpoint: string,
    params: RequestParams = {},
    files?: RequestFiles,
  ): Promise<unknown> {
    const { rateLimiter, debugRequests } = this.options;
    await rateLimiter.beforeRequest();

    const headers: Record<string, string> = {};
    const token = this.options.credentials.accessToken;
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    if (debugRequests) {
      this.logger.debug('request', {
        method,
        endpoint,
        params,
        headers: redactHeaders(headers),
        files: Object.fromEntries(
          Object.entries(files ?? {}).map(([field, file]) => [
            field,
            { fileName: file.fileName, mimeType: file.mimeType, size: file.data.byteLength },
          ]),
        ),
      });
    }

    while (true) {
      const response = await this.send(method, endpoint, params, files, headers);
      const windowRefreshed = rateLimiter.update(response.headers);

      if (debugRequests) {
        this.logger.debug('response', {
          endpoint,
          status: response.statusCode,
          headers: response.headers,
          body: response.body,
        });
      }

      if (response.statusCode === 404) {
        throw new ApiError('Endpoint not found', { statusCode: 404 });
      }
      if (response.statusCode === 500) {
        throw new ApiError('General API problem', { statusCode: 500 });
      }

      let body: unknown;
      try {
        body = JSON.parse(response.body);
      } catch (error) {
        throw new ApiError(
          `Could not parse response as JSON, status was ${response.statusCode}`,
          { cause: error, statusCode: response.statusCode },
        );
      }

      if (isThrottled(body)) {
        // Without a fresh reset time a replay would go out immediately
        if (!windowRefreshed) {
          throw new ApiError(
            `Missing rate limit headers, status was ${response.statusCode}`,
            { statusCode: response.statusCode },
          );
        }
        // Throws under "throw"; otherwise returns once the window has reset
        await rateLimiter.onThrottle();
        continue;
      }
      return body;
    }
  }

  private async send(
    method: HttpMethod,
    endpoint: string,
    params: RequestParams,
    files: RequestFiles | undefined,
    headers: Record<string, string>,
  ): Promise<Response<string>> {
    const url = `${this.options.apiBaseUrl}${endpoint}`;
    try {
      if (method === 'GET') {
        return await this.instance(url, {
          method,
          headers,
          searchParams: toSearchParams(params),
          responseType: 'text',
        });
      }
      // Rebuilt per attempt so a replay sends the same bytes again
      const { body, contentType } = encodeBody(params, files);
      return await this.instance(url, {
        method,
        headers: contentType ? { ...headers, 'Content-Type': contentType } : headers,
        body,
        responseType: 'text',
      });
    } catch (error) {
      throw new NetworkError('Could not complete request', { cause: error });
    }
  }
}
