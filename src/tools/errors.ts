/**
 * errors.ts — Typed MCP error responses for all tool handlers.
 *
 * MCP tool errors are returned as successful MCP responses (not thrown)
 * with isError: true and a structured content block, so agents can read
 * error_code and decide whether to retry.
 */

import { MastodonError, type MastodonErrorCode } from '../client/types.js';

export type ToolErrorCode =
  | 'RATE_LIMITED'
  | 'NETWORK_ERROR'
  | 'API_ERROR'
  | 'INVALID_INPUT';

export interface ToolErrorPayload {
  error_code: ToolErrorCode;
  message: string;
  retryable: boolean;
}

export function toolError(
  code: ToolErrorCode,
  message: string,
  retryable = false,
): { isError: true; content: Array<{ type: 'text'; text: string }> } {
  const payload: ToolErrorPayload = { error_code: code, message, retryable };
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify(payload) }],
  };
}

export function toolSuccess(
  data: unknown,
): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

const CODE_MAP: Record<MastodonErrorCode, { code: ToolErrorCode; retryable: boolean }> = {
  RATE_LIMITED: { code: 'RATE_LIMITED', retryable: true },
  NETWORK: { code: 'NETWORK_ERROR', retryable: true },
  API: { code: 'API_ERROR', retryable: false },
  ILLEGAL_ARGUMENT: { code: 'INVALID_INPUT', retryable: false },
};

/**
 * classifyError — maps client errors to ToolErrorCode.
 *
 * Called in every tool handler's catch block. Anything that is not a client
 * error is reported as API_ERROR.
 */
export function classifyError(error: unknown): ReturnType<typeof toolError> {
  if (error instanceof MastodonError) {
    const mapped = CODE_MAP[error.code];
    return toolError(mapped.code, error.message, mapped.retryable);
  }
  return toolError('API_ERROR', error instanceof Error ? error.message : String(error), false);
}
