/**
 * RequestOrchestrator: one resilient HTTP call per request()
 *
 * Single attempt:
 *   CircuitCheck → RateCheck → Acquire → Execute → Classify
 *   → RecordTelemetry → UpdateBreaker → Release
 *
 * Wrapped as withCache(withRetry(attempt)). Short-circuits (open breaker, local
 * rate limit, pool exhaustion) happen before a session is in hand and do not
 * count against the breaker; everything after acquisition does.
 */

import { createChildLogger, type Logger } from "../../utils/logger.js";
import {
  ApiError,
  CircuitOpenError,
  RateLimitError,
  TransportError,
  toError,
} from "../../utils/errors.js";
import {
  observeApiRequest,
  recordApiError,
  recordRateLimitRejection,
} from "../../utils/metrics.js";
import { systemClock, type Clock, type Sleep } from "../../types/common.js";
import type { ApiResponse, HttpMethod, RequestOptions } from "../../types/api.js";
import type { CacheManager } from "../cache/cacheManager.js";
import type { CircuitBreaker } from "../shared/circuitBreaker.js";
import type { RateLimiter } from "../shared/rateLimiter.js";
import type { MetricsManager } from "../monitoring/metricsManager.js";
import type { Diagnostics } from "../monitoring/diagnostics.js";
import type { ConnectionPool } from "../transport/connectionPool.js";
import type { TransportSession } from "../transport/types.js";
import { classifyResponse, classifyTransportError } from "./classifier.js";
import { withCache, withRetry, type CallFn } from "./middleware.js";

export interface RetrySettings {
  /** Total attempts, first one included */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor?: number;
}

export interface RequestOrchestratorOptions {
  /** Upstream name; also the metric label and cache-key namespace */
  upstream: string;
  baseUrl: string;
  authToken?: string;
  timeoutMs: number;
  slowRequestThresholdMs: number;
  retry: RetrySettings;

  pool: ConnectionPool<TransportSession>;
  breaker: CircuitBreaker;
  rateLimiter: RateLimiter;
  metrics: MetricsManager;
  diagnostics: Diagnostics;
  /** Enables cacheTtlSeconds / invalidates; without it both are ignored */
  cache?: CacheManager;

  clock?: Clock;
  sleep?: Sleep;
}

export class RequestOrchestrator {
  private readonly call: CallFn;
  private readonly clock: Clock;
  private readonly baseUrl: string;
  private readonly host: string;
  private readonly log: Logger;

  constructor(private readonly options: RequestOrchestratorOptions) {
    this.clock = options.clock ?? systemClock;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.host = new URL(this.baseUrl).host;
    this.log = createChildLogger({ upstream: options.upstream });

    const attempt: CallFn = (method, path, requestOptions) =>
      this.executeOnce(method, path, requestOptions);

    const retrying = withRetry(attempt, {
      maxRetries: options.retry.maxRetries,
      baseDelayMs: options.retry.baseDelayMs,
      maxDelayMs: options.retry.maxDelayMs,
      jitterFactor: options.retry.jitterFactor ?? 0,
      sleep: options.sleep,
    });

    this.call = options.cache
      ? withCache(retrying, {
          cache: options.cache,
          metrics: options.metrics,
          upstream: options.upstream,
          clock: this.clock,
        })
      : retrying;
  }

  get upstream(): string {
    return this.options.upstream;
  }

  /**
   * @throws {ApiError} typed by kind; see classifier.ts for the status table
   */
  request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<ApiResponse<unknown>> {
    return this.call(method, path, options);
  }

  get(path: string, options: Omit<RequestOptions, "body"> = {}): Promise<ApiResponse<unknown>> {
    return this.request("GET", path, options);
  }

  post(path: string, body?: unknown, options: RequestOptions = {}): Promise<ApiResponse<unknown>> {
    return this.request("POST", path, { ...options, body });
  }

  put(path: string, body?: unknown, options: RequestOptions = {}): Promise<ApiResponse<unknown>> {
    return this.request("PUT", path, { ...options, body });
  }

  patch(path: string, body?: unknown, options: RequestOptions = {}): Promise<ApiResponse<unknown>> {
    return this.request("PATCH", path, { ...options, body });
  }

  delete(path: string, options: RequestOptions = {}): Promise<ApiResponse<unknown>> {
    return this.request("DELETE", path, options);
  }

  // ==========================================================================
  // Single attempt
  // ==========================================================================

  private async executeOnce(
    method: HttpMethod,
    path: string,
    requestOptions: RequestOptions
  ): Promise<ApiResponse<unknown>> {
    const { upstream, breaker, rateLimiter, pool, metrics, diagnostics } = this.options;
    const endpoint = `/${path.replace(/^\/+/, "")}`;
    const startTime = this.clock.now();

    // 1. CircuitCheck
    if (!breaker.allowRequest()) {
      throw new CircuitOpenError(upstream);
    }

    // 2. RateCheck
    const decision = rateLimiter.isAllowed(`${upstream}:${endpoint}`);
    if (!decision.allowed) {
      metrics.record("rate_limits", 1, { upstream, endpoint });
      recordRateLimitRejection(upstream);
      diagnostics.recordIssue("rate_limit", "warning", `Rate limit exceeded for ${endpoint}`, {
        upstream,
        endpoint,
        retryAfter: decision.retryAfterSeconds,
      });
      throw new RateLimitError("Rate limit exceeded", decision.retryAfterSeconds, 429, {
        message: "Too many requests",
      });
    }

    // 3. Acquire
    const session = await pool.acquire();
    let statusLabel = "error";

    try {
      const headers: Record<string, string> = { ...requestOptions.headers };
      if (this.options.authToken) {
        headers["Authorization"] = `Bearer ${this.options.authToken}`;
      }

      // 4. Execute
      const response = await session.send({
        method,
        url: `${this.baseUrl}${endpoint}`,
        headers,
        body: requestOptions.body,
        params: requestOptions.params,
        timeoutMs: requestOptions.timeoutMs ?? this.options.timeoutMs,
      });
      statusLabel = String(response.status);

      // 5. Classify
      const result = classifyResponse(response, this.clock.now());

      // 7. UpdateBreaker
      breaker.recordSuccess();
      return result;
    } catch (error) {
      const apiError = this.toApiError(error);
      if (apiError.httpStatus !== undefined) {
        statusLabel = String(apiError.httpStatus);
      }

      metrics.record("api_errors", 1, { upstream, endpoint, kind: apiError.kind });
      recordApiError(upstream, apiError.kind);
      breaker.recordFailure();

      diagnostics.recordIssue("api", "error", `API request failed: ${apiError.message}`, {
        upstream,
        endpoint,
        method,
        statusCode: apiError.httpStatus ?? null,
        errorType: apiError.name,
        error: apiError.message,
      });

      if (apiError.kind === "network") {
        diagnostics.recordConnectionIssue(this.host, apiError, { endpoint });
      }

      throw apiError;
    } finally {
      // 6. RecordTelemetry
      const durationMs = this.clock.now() - startTime;
      metrics.record("api_latency", durationMs, { method, endpoint, status: statusLabel });
      observeApiRequest(upstream, method, durationMs, statusLabel);

      if (durationMs > this.options.slowRequestThresholdMs) {
        diagnostics.recordSlowRequest(endpoint, durationMs, { method, status: statusLabel });
        this.log.debug("Slow upstream request", { method, endpoint, durationMs });
      }

      // 8. Release
      pool.release(session);
    }
  }

  private toApiError(error: unknown): ApiError {
    if (error instanceof ApiError) return error;
    if (error instanceof TransportError) return classifyTransportError(error);

    const cause = toError(error);
    return new ApiError(`Request failed: ${cause.message}`, "unknown", { cause });
  }
}
