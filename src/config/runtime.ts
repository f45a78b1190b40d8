/**
 * Typed runtime configuration
 *
 * Every option the client runtime recognizes, with its default. Callers pass a
 * partial object; resolveRuntimeConfig() fills in the rest and validates ranges.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";
import type { Env } from "./env.js";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().min(0);

/** `new URL("backend:8000")` parses with an empty host, so the scheme is checked too */
const httpUrl = z
  .string()
  .url()
  .refine(
    (url) => url.startsWith("http://") || url.startsWith("https://"),
    "Must be an http:// or https:// URL"
  );

const upstreamSchema = z.object({
  baseUrl: httpUrl,
  authToken: z.string().min(1).optional(),
});

export const runtimeConfigSchema = z.object({
  /** Backend API the `api` orchestrator talks to */
  baseUrl: httpUrl,
  authToken: z.string().min(1).optional(),
  userAgent: z.string().default("UpstreamClient/1.0"),

  /** Total attempts per logical request (first attempt included) */
  maxRetries: positiveInt.default(3),
  /** Default per-call HTTP timeout */
  timeoutMs: positiveInt.default(30_000),
  /** Requests slower than this are logged to diagnostics */
  slowRequestThresholdMs: positiveInt.default(1_000),

  rateLimit: z
    .object({
      maxRequests: positiveInt.default(100),
      windowMs: positiveInt.default(60_000),
    })
    .default({}),

  pool: z
    .object({
      maxSize: positiveInt.default(10),
      acquireTimeoutMs: nonNegativeInt.default(30_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: positiveInt.default(5),
      recoveryTimeoutMs: nonNegativeInt.default(60_000),
      halfOpenLimit: positiveInt.default(3),
    })
    .default({}),

  cache: z
    .object({
      defaultTtlSeconds: positiveInt.default(300),
      localTtlCapSeconds: positiveInt.default(60),
      maxLocalEntries: positiveInt.default(1_000),
      namespace: z.string().default("api-cache:"),
    })
    .default({}),

  retry: z
    .object({
      baseDelayMs: nonNegativeInt.default(1_000),
      maxDelayMs: nonNegativeInt.default(30_000),
      jitterFactor: z.number().min(0).max(1).default(0),
    })
    .default({}),

  monitoring: z
    .object({
      metricsCompactionIntervalMs: positiveInt.default(300_000),
      metricsRetentionMs: positiveInt.default(3_600_000),
      diagnosticsIntervalMs: positiveInt.default(300_000),
      systemSampleIntervalMs: positiveInt.default(60_000),
      healthCacheMs: nonNegativeInt.default(60_000),
    })
    .default({}),

  /** Optional control-panel upstream, guarded by its own `panel` breaker */
  panel: upstreamSchema.optional(),

  /** Shared cache; the runtime creates and owns the client when given a URL */
  redisUrl: z.string().optional(),
});

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

export function resolveRuntimeConfig(input: RuntimeConfigInput): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(input);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid runtime configuration: ${details}`);
  }

  return parsed.data;
}

/**
 * Map validated environment variables onto runtime options.
 * Unset tuning variables are left out so schema defaults apply.
 */
export function runtimeConfigFromEnv(env: Env): RuntimeConfigInput {
  return {
    baseUrl: env.API_BASE_URL,
    authToken: env.API_AUTH_TOKEN || undefined,
    maxRetries: env.API_MAX_RETRIES,
    timeoutMs: env.API_TIMEOUT_MS,
    rateLimit: {
      maxRequests: env.API_RATE_LIMIT_MAX_REQUESTS,
      windowMs: env.API_RATE_LIMIT_WINDOW_MS,
    },
    pool: {
      maxSize: env.POOL_MAX_SIZE,
      acquireTimeoutMs: env.POOL_ACQUIRE_TIMEOUT_MS,
    },
    circuitBreaker: {
      failureThreshold: env.BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: env.BREAKER_RECOVERY_TIMEOUT_MS,
      halfOpenLimit: env.BREAKER_HALF_OPEN_LIMIT,
    },
    cache: {
      defaultTtlSeconds: env.CACHE_DEFAULT_TTL_SECONDS,
      localTtlCapSeconds: env.CACHE_LOCAL_TTL_CAP_SECONDS,
    },
    panel: env.PANEL_URL ? { baseUrl: env.PANEL_URL } : undefined,
    redisUrl: env.REDIS_URL,
  };
}
