/**
 * Composable wrappers around a single-attempt call function.
 *
 * The orchestrator builds its pipeline as `withCache(withRetry(execute))`, so a
 * cache hit never touches the retry loop, the breaker or the rate limiter.
 */

import { logger } from "../../utils/logger.js";
import { retry, type RetryOptions } from "../../utils/retry.js";
import { createApiResponse, type ApiResponse, type HttpMethod, type RequestOptions } from "../../types/api.js";
import { isRecord, parseJson, systemClock, type Clock } from "../../types/common.js";
import type { CacheManager } from "../cache/cacheManager.js";
import type { MetricsManager } from "../monitoring/metricsManager.js";
import type { QueryParams } from "../transport/types.js";

export type CallFn = (
  method: HttpMethod,
  path: string,
  options: RequestOptions
) => Promise<ApiResponse<unknown>>;

// ============================================================================
// Retry
// ============================================================================

export type RetryMiddlewareOptions = Omit<RetryOptions, "operationName">;

/**
 * Retries server and rate-limit failures; every other error propagates on
 * first occurrence. After the last attempt the last error is rethrown as is.
 */
export function withRetry(call: CallFn, options: RetryMiddlewareOptions): CallFn {
  return (method, path, requestOptions) =>
    retry(() => call(method, path, requestOptions), {
      ...options,
      operationName: `${method} ${path}`,
    });
}

// ============================================================================
// Cache
// ============================================================================

export interface CacheMiddlewareOptions {
  cache: CacheManager;
  metrics: MetricsManager;
  /** Keeps keys of different upstreams apart in a shared cache */
  upstream: string;
  clock?: Clock;
}

interface CachedPayload {
  data: unknown;
  statusCode: number | null;
}

/**
 * Serves GETs that carry `cacheTtlSeconds` from the cache; stores successful
 * responses; after a successful write drops every key under `invalidates`.
 */
export function withCache(call: CallFn, options: CacheMiddlewareOptions): CallFn {
  const { cache, metrics, upstream } = options;
  const clock = options.clock ?? systemClock;

  return async (method, path, requestOptions) => {
    const ttl = requestOptions.cacheTtlSeconds;
    const cacheable = method === "GET" && ttl !== undefined && ttl > 0;
    const key = cacheable ? buildCacheKey(upstream, path, requestOptions.params) : null;

    if (key !== null) {
      const hit = await readCached(cache, key);
      if (hit) {
        metrics.record("cache_hits", 1, { upstream, path });
        return createApiResponse({
          data: hit.data,
          statusCode: hit.statusCode,
          cached: true,
          timestamp: clock.now(),
        });
      }
    }

    const response = await call(method, path, requestOptions);

    if (key !== null && ttl !== undefined) {
      const payload: CachedPayload = { data: response.data, statusCode: response.statusCode };
      await cache.set(key, JSON.stringify(payload), ttl);
    }

    if (method !== "GET" && requestOptions.invalidates) {
      for (const prefix of requestOptions.invalidates) {
        await cache.invalidatePattern(buildCacheKey(upstream, prefix));
      }
    }

    return response;
  };
}

/**
 * `<upstream>:<path>` plus sorted query params, so a path prefix selects every
 * cached variant of that path
 */
export function buildCacheKey(upstream: string, path: string, params?: QueryParams): string {
  const normalizedPath = `/${path.replace(/^\/+/, "")}`;
  const query = params
    ? Object.entries(params)
        .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([name, value]) => `${encodeURIComponent(name)}=${encodeURIComponent(String(value))}`)
        .join("&")
    : "";

  return query ? `${upstream}:${normalizedPath}?${query}` : `${upstream}:${normalizedPath}`;
}

async function readCached(cache: CacheManager, key: string): Promise<CachedPayload | null> {
  const raw = await cache.get(key);
  if (raw === null) return null;

  const parsed = parseJson(raw);
  if (!parsed.success || !isRecord(parsed.value) || !("data" in parsed.value)) {
    logger.warn("Discarding unreadable cache entry", { key });
    await cache.delete(key);
    return null;
  }

  const statusCode = parsed.value["statusCode"];
  return {
    data: parsed.value["data"],
    statusCode: typeof statusCode === "number" ? statusCode : null,
  };
}
