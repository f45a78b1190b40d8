/**
 * Custom error classes with operational error handling
 *
 * AppError is the root of every error the runtime raises. ApiError and its
 * subclasses form the tagged taxonomy callers branch on (`error.kind`).
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    if (cause?.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(this.cause
        ? {
            cause: {
              name: this.cause.name,
              message: this.cause.message,
            },
          }
        : {}),
    };
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", 500, false, cause);
  }
}

// ============================================================================
// Transport errors (raised by the HTTP transport, classified by the orchestrator)
// ============================================================================

export type TransportFailureReason = "timeout" | "network" | "unknown";

export class TransportError extends AppError {
  constructor(
    message: string,
    public readonly reason: TransportFailureReason,
    public readonly errorCode?: string,
    cause?: Error
  ) {
    super(message, "TRANSPORT_ERROR", 502, true, cause);
  }
}

// ============================================================================
// API error taxonomy
// ============================================================================

export type ApiErrorKind =
  | "unknown"
  | "network"
  | "timeout"
  | "auth"
  | "rate_limit"
  | "server"
  | "client"
  | "validation"
  | "not_found"
  | "cache";

const KIND_TO_CODE: Record<ApiErrorKind, string> = {
  unknown: "UNKNOWN_ERROR",
  network: "NETWORK_ERROR",
  timeout: "TIMEOUT_ERROR",
  auth: "AUTH_ERROR",
  rate_limit: "RATE_LIMIT",
  server: "SERVER_ERROR",
  client: "CLIENT_ERROR",
  validation: "VALIDATION_ERROR",
  not_found: "NOT_FOUND",
  cache: "CACHE_ERROR",
};

export interface ApiErrorOptions {
  statusCode?: number;
  /** Parsed upstream response body, when there was one */
  response?: unknown;
  cause?: Error;
  code?: string;
}

export class ApiError extends AppError {
  /** HTTP status returned by the upstream; undefined for transport-level failures */
  public readonly httpStatus: number | undefined;
  public readonly response: unknown;

  constructor(
    message: string,
    public readonly kind: ApiErrorKind = "unknown",
    options: ApiErrorOptions = {}
  ) {
    super(
      message,
      options.code ?? KIND_TO_CODE[kind],
      options.statusCode ?? 500,
      true,
      options.cause
    );
    this.httpStatus = options.statusCode;
    this.response = options.response;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      ...(this.response !== undefined ? { response: this.response } : {}),
    };
  }
}

export class NetworkError extends ApiError {
  constructor(message: string, cause?: Error) {
    super(message, "network", { cause });
  }
}

export class TimeoutError extends ApiError {
  constructor(message: string, cause?: Error) {
    super(message, "timeout", { cause });
  }
}

export class AuthenticationError extends ApiError {
  constructor(
    message: string = "Authentication failed",
    statusCode: number = 401,
    response?: unknown
  ) {
    super(message, "auth", { statusCode, response });
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = "Rate limit exceeded",
    /** Seconds the caller should wait before trying again */
    public readonly retryAfter?: number,
    statusCode: number = 429,
    response?: unknown
  ) {
    super(message, "rate_limit", { statusCode, response });
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), retryAfter: this.retryAfter };
  }
}

export class ServerError extends ApiError {
  constructor(
    message: string = "Server error occurred",
    statusCode: number = 500,
    response?: unknown,
    code?: string
  ) {
    super(message, "server", { statusCode, response, code });
  }
}

/**
 * Raised without contacting the upstream while its circuit breaker is open
 */
export class CircuitOpenError extends ServerError {
  constructor(public readonly service: string) {
    super(`Circuit breaker open for ${service}`, 503, { service }, "CIRCUIT_OPEN");
  }
}

export class ClientError extends ApiError {
  constructor(
    message: string = "Request failed",
    statusCode: number = 400,
    response?: unknown
  ) {
    super(message, "client", { statusCode, response });
  }
}

export type FieldErrors = Record<string, string[]>;

export class ValidationError extends ApiError {
  constructor(
    message: string,
    public readonly fieldErrors: FieldErrors = {},
    statusCode: number = 422
  ) {
    super(message, "validation", {
      statusCode,
      response: { errors: fieldErrors },
    });
  }
}

export class NotFoundError extends ApiError {
  constructor(
    message: string,
    public readonly resourceType: string = "unknown",
    public readonly resourceId: string | number | null = null
  ) {
    super(message, "not_found", {
      statusCode: 404,
      response: { resource_type: resourceType, resource_id: resourceId },
    });
  }
}

export class CacheError extends ApiError {
  constructor(message: string, cause?: Error) {
    super(message, "cache", { cause });
  }
}

/**
 * Raised by the connection pool when no session frees up within the acquire timeout
 */
export class ConnectionExhaustedError extends ApiError {
  constructor(maxSize: number, timeoutMs: number) {
    super(
      `Connection pool exhausted (max ${maxSize}, waited ${timeoutMs}ms)`,
      "network",
      { statusCode: 503, code: "CONNECTION_EXHAUSTED" }
    );
  }
}

// ============================================================================
// Guards & helpers
// ============================================================================

/**
 * Type guard to check if error is operational
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * Only server-side failures and rate limits are worth another attempt
 */
export function isRetryableApiError(error: unknown): error is ApiError {
  return (
    error instanceof ApiError &&
    (error.kind === "server" || error.kind === "rate_limit")
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Sanitize error for user display (no sensitive info)
 */
export function sanitizeError(error: unknown): {
  message: string;
  code?: string;
} {
  if (error instanceof AppError) {
    return {
      message: error.message,
      code: error.code,
    };
  }

  if (error instanceof Error) {
    return {
      message: "An unexpected error occurred",
      code: "INTERNAL_ERROR",
    };
  }

  return {
    message: "An unexpected error occurred",
    code: "UNKNOWN_ERROR",
  };
}
