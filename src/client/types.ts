export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export type ParamScalar = string | number | boolean;

// Wire-ready parameters: array values are sent as repeated `key[]` form fields
export type RequestParams = Record<string, ParamScalar | readonly ParamScalar[]>;

// One multipart file part
export interface UploadFile {
  fileName: string;
  mimeType: string;
  data: Uint8Array;
}

export type RequestFiles = Record<string, UploadFile>;

// Credentials resolved once per session — only accessToken changes afterwards (set by logIn)
export interface Credentials {
  clientId: string;
  clientSecret: string;
  accessToken?: string;
}

export type MastodonErrorCode = 'ILLEGAL_ARGUMENT' | 'NETWORK' | 'API' | 'RATE_LIMITED';

export abstract class MastodonError extends Error {
  abstract readonly code: MastodonErrorCode;
}

// Caller misuse: bad credential shape, unresolvable media type, failed login
export class IllegalArgumentError extends MastodonError {
  readonly code = 'ILLEGAL_ARGUMENT';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IllegalArgumentError';
  }
}

// The transport call itself did not complete (DNS, connection, timeout)
export class NetworkError extends MastodonError {
  readonly code = 'NETWORK';
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

// The server answered, but with an error or a body we cannot use
export class ApiError extends MastodonError {
  readonly code = 'API';
  readonly statusCode?: number;
  constructor(message: string, options?: ErrorOptions & { statusCode?: number }) {
    super(message, options);
    this.name = 'ApiError';
    this.statusCode = options?.statusCode;
  }
}

// Thrown only under the "throw" rate-limit policy
export class RatelimitError extends MastodonError {
  readonly code = 'RATE_LIMITED';
  readonly resetAt: number;
  constructor(resetAt: number) {
    super('Hit rate limit');
    this.name = 'RatelimitError';
    this.resetAt = resetAt;
  }
}
