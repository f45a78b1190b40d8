/**
 * Environment Variable Validation
 *
 * Zod schema over process.env. Fail-fast on startup if configuration is invalid,
 * then expose a type-safe view to the rest of the process.
 */

import { z } from "zod";
import { logger } from "../utils/logger.js";
import { ConfigurationError } from "../utils/errors.js";

// ============================================================================
// Schema Definition
// ============================================================================

const optionalInt = (min: number) => z.coerce.number().int().min(min).optional();

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Node environment"),

  // Status server
  STATUS_PORT: z.coerce
    .number()
    .int()
    .min(1024, "STATUS_PORT must be >= 1024")
    .max(65535, "STATUS_PORT must be <= 65535")
    .default(9464)
    .describe("Port of the /health, /status and /metrics server"),

  ALLOWED_ORIGINS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    )
    .describe("Comma-separated browser origins allowed to read the status server"),

  // Backend API
  API_BASE_URL: z
    .string()
    .url("API_BASE_URL must be a valid URL")
    .refine(
      (url) => url.startsWith("http://") || url.startsWith("https://"),
      "API_BASE_URL must start with http:// or https://"
    )
    .default("http://backend:8000/api/v1")
    .describe("Base URL of the backend API"),

  API_AUTH_TOKEN: z
    .string()
    .optional()
    .describe("Bearer token attached to backend requests"),

  // Control panel
  PANEL_URL: z
    .string()
    .url("PANEL_URL must be a valid URL")
    .refine(
      (url) => url.startsWith("http://") || url.startsWith("https://"),
      "PANEL_URL must start with http:// or https://"
    )
    .optional()
    .describe("Base URL of the control-panel API"),

  // Shared cache
  REDIS_URL: z
    .string()
    .url("REDIS_URL must be a valid URL")
    .refine(
      (url) => url.startsWith("redis://") || url.startsWith("rediss://"),
      "REDIS_URL must start with redis:// or rediss://"
    )
    .default("redis://localhost:6379")
    .describe("Redis connection URL"),

  // Resilience tuning (unset values fall back to runtime defaults)
  API_MAX_RETRIES: optionalInt(1),
  API_TIMEOUT_MS: optionalInt(1),
  API_RATE_LIMIT_MAX_REQUESTS: optionalInt(1),
  API_RATE_LIMIT_WINDOW_MS: optionalInt(1),
  POOL_MAX_SIZE: optionalInt(1),
  POOL_ACQUIRE_TIMEOUT_MS: optionalInt(0),
  BREAKER_FAILURE_THRESHOLD: optionalInt(1),
  BREAKER_RECOVERY_TIMEOUT_MS: optionalInt(0),
  BREAKER_HALF_OPEN_LIMIT: optionalInt(1),
  CACHE_DEFAULT_TTL_SECONDS: optionalInt(1),
  CACHE_LOCAL_TTL_CAP_SECONDS: optionalInt(1),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Logging level"),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Env = z.infer<typeof envSchema>;

// ============================================================================
// Validation & Initialization
// ============================================================================

let validatedEnv: Env | null = null;

/**
 * Validate environment variables on startup
 *
 * @throws {ConfigurationError} If validation fails
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const errorMessages = parsed.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");

    logger.error("Environment validation failed:\n" + errorMessages);

    throw new ConfigurationError(
      `Environment validation failed:\n${errorMessages}\n\n` +
        `Please check your .env file and ensure all required variables are set correctly.`
    );
  }

  validateSecurityConstraints(parsed.data);

  validatedEnv = parsed.data;

  logger.info("Environment validation successful", {
    nodeEnv: parsed.data.NODE_ENV,
    apiBaseUrl: parsed.data.API_BASE_URL,
    panelConfigured: parsed.data.PANEL_URL !== undefined,
    logLevel: parsed.data.LOG_LEVEL,
  });

  return parsed.data;
}

function validateSecurityConstraints(env: Env): void {
  if (env.NODE_ENV !== "production") return;

  if (!env.API_BASE_URL.startsWith("https://") && env.API_AUTH_TOKEN) {
    logger.warn(
      "API_AUTH_TOKEN is sent over plain HTTP in production. Consider an https:// API_BASE_URL."
    );
  }

  if (env.API_AUTH_TOKEN !== undefined && env.API_AUTH_TOKEN.trim().length === 0) {
    throw new ConfigurationError("API_AUTH_TOKEN is set but empty");
  }
}

/**
 * Get validated environment configuration
 *
 * @throws {ConfigurationError} If env has not been validated yet
 */
export function getEnv(): Env {
  if (!validatedEnv) {
    throw new ConfigurationError(
      "Environment has not been validated yet. Call validateEnv() first."
    );
  }

  return validatedEnv;
}

export function isProduction(): boolean {
  return getEnv().NODE_ENV === "production";
}
