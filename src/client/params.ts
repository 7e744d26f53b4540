import type { ParamScalar, RequestParams } from './types.js';

export type ParamInput = ParamScalar | readonly ParamScalar[] | null | undefined;

/**
 * buildParams — turns a named-argument object into wire parameters.
 *
 * Absent values (undefined / null) and names listed in `exclude` are dropped.
 * Array values are kept under `name[]`, the service's multi-value convention.
 */
export function buildParams(
  args: Record<string, ParamInput>,
  exclude: readonly string[] = [],
): RequestParams {
  const params: RequestParams = {};
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined || value === null || exclude.includes(key)) continue;
    if (isSequence(value)) {
      params[`${key}[]`] = value;
    } else {
      params[key] = value;
    }
  }
  return params;
}

function isSequence(value: ParamScalar | readonly ParamScalar[]): value is readonly ParamScalar[] {
  return Array.isArray(value);
}

// Expands `key[]` arrays into repeated fields, in order
export function toSearchParams(params: RequestParams): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (isSequence(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, String(value));
    }
  }
  return search;
}
