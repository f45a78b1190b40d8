/**
 * Raw transport outcome → ApiResponse or typed ApiError
 *
 * | Status / condition     | Result                                   |
 * |------------------------|------------------------------------------|
 * | 2xx, empty body        | success, data = null                     |
 * | 2xx, JSON body         | success, parsed data                     |
 * | 2xx, non-JSON body     | ClientError("Invalid JSON response")     |
 * | 401                    | AuthenticationError                      |
 * | 429                    | RateLimitError (Retry-After, default 60) |
 * | 5xx                    | ServerError                              |
 * | 404                    | NotFoundError (body.resource type/id)    |
 * | 422                    | ValidationError (body.errors)            |
 * | other 4xx              | ClientError                              |
 * | anything else          | ApiError kind "unknown"                  |
 */

import {
  ApiError,
  AuthenticationError,
  ClientError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  TimeoutError,
  TransportError,
  ValidationError,
  type FieldErrors,
} from "../../utils/errors.js";
import { isRecord, parseJson } from "../../types/common.js";
import { createApiResponse, type ApiResponse } from "../../types/api.js";
import type { TransportResponse } from "../transport/types.js";

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

/**
 * @throws {ApiError} for every non-2xx status and for unparseable 2xx bodies
 */
export function classifyResponse(
  response: TransportResponse,
  now: number
): ApiResponse<unknown> {
  const { status } = response;

  if (status >= 200 && status < 300) {
    if (response.body.trim().length === 0) {
      return createApiResponse({ data: null, statusCode: status, timestamp: now });
    }

    const parsed = parseJson(response.body);
    if (!parsed.success) {
      throw new ClientError("Invalid JSON response", status, {
        message: response.body,
      });
    }
    return createApiResponse({ data: parsed.value, statusCode: status, timestamp: now });
  }

  throw classifyErrorStatus(response, now);
}

function classifyErrorStatus(response: TransportResponse, now: number): ApiError {
  const { status } = response;
  const errorBody = parseErrorBody(response.body);
  const message = stringField(errorBody, "message");

  if (status === 401) {
    return new AuthenticationError("Authentication failed", status, errorBody);
  }

  if (status === 429) {
    return new RateLimitError(
      "Rate limit exceeded",
      parseRetryAfter(response.headers["retry-after"], now),
      status,
      errorBody
    );
  }

  if (status >= 500) {
    return new ServerError("Server error occurred", status, errorBody);
  }

  if (status === 404) {
    const resource = errorBody["resource"];
    const resourceType = isRecord(resource) ? stringField(resource, "type") : undefined;
    const resourceId = isRecord(resource) ? resource["id"] : undefined;

    return new NotFoundError(
      message ?? "Resource not found",
      resourceType ?? "unknown",
      typeof resourceId === "string" || typeof resourceId === "number" ? resourceId : null
    );
  }

  if (status === 422) {
    return new ValidationError(
      message ?? "Validation failed",
      parseFieldErrors(errorBody["errors"]),
      status
    );
  }

  if (status >= 400) {
    return new ClientError(message ?? "Request failed", status, errorBody);
  }

  return new ApiError(`Unexpected response status ${status}`, "unknown", {
    statusCode: status,
    response: errorBody,
  });
}

/**
 * Map a transport failure onto the API taxonomy
 */
export function classifyTransportError(error: TransportError): ApiError {
  switch (error.reason) {
    case "timeout":
      return new TimeoutError(`Request timed out: ${error.message}`, error);
    case "network":
      return new NetworkError(`Network error: ${error.message}`, error);
    default:
      return new ApiError(`Request failed: ${error.message}`, "unknown", { cause: error });
  }
}

/**
 * Retry-After is either delta-seconds or an HTTP date
 */
export function parseRetryAfter(header: string | undefined, now: number): number {
  if (header === undefined || header.trim() === "") {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  return Math.max(0, Math.ceil((date - now) / 1000));
}

function parseErrorBody(body: string): Record<string, unknown> {
  const parsed = parseJson(body);
  if (parsed.success && isRecord(parsed.value)) {
    return parsed.value;
  }
  // Plain-text error pages
  return { message: body };
}

function parseFieldErrors(value: unknown): FieldErrors {
  const fieldErrors: FieldErrors = {};
  if (!isRecord(value)) {
    return fieldErrors;
  }

  for (const [field, messages] of Object.entries(value)) {
    if (Array.isArray(messages)) {
      fieldErrors[field] = messages.map(String);
    } else if (typeof messages === "string") {
      fieldErrors[field] = [messages];
    }
  }
  return fieldErrors;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}
