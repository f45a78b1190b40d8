/**
 * Request/response shapes exposed to callers of the client runtime
 */

import type { QueryParams } from "../services/transport/types.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
];

export interface RequestOptions {
  body?: unknown;
  params?: QueryParams;
  headers?: Record<string, string>;
  /** Per-call HTTP timeout; falls back to the runtime default */
  timeoutMs?: number;
  /** Cache successful GET responses for this many seconds */
  cacheTtlSeconds?: number;
  /** Cache key prefixes to invalidate after a successful write */
  invalidates?: string[];
}

/**
 * Normalized outcome of a successful call. Created fresh per call and frozen.
 */
export interface ApiResponse<T = unknown> {
  readonly success: boolean;
  readonly data: T | null;
  readonly error: string | null;
  readonly statusCode: number | null;
  readonly cached: boolean;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export function createApiResponse<T>(fields: {
  data: T | null;
  statusCode: number | null;
  timestamp: number;
  cached?: boolean;
}): ApiResponse<T> {
  return Object.freeze({
    success: true,
    data: fields.data,
    error: null,
    statusCode: fields.statusCode,
    cached: fields.cached ?? false,
    timestamp: fields.timestamp,
  });
}
