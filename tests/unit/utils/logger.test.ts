/**
 * Logger Sanitization Tests
 */

import { describe, test, expect } from "vitest";
import { sanitizeForLogging, createChildLogger } from "../../../src/utils/logger.js";

describe("sanitizeForLogging", () => {
  test("should redact credential-like keys at any depth", () => {
    expect(
      sanitizeForLogging({
        endpoint: "/servers",
        headers: { Authorization: "Bearer test-secret", Accept: "application/json" },
        panel: { authToken: "test-secret", baseUrl: "https://panel.example.test" },
        apiKey: "test-secret",
      })
    ).toEqual({
      endpoint: "/servers",
      headers: { Authorization: "[REDACTED]", Accept: "application/json" },
      panel: { authToken: "[REDACTED]", baseUrl: "https://panel.example.test" },
      apiKey: "[REDACTED]",
    });
  });

  test("should reduce errors to name and message", () => {
    expect(sanitizeForLogging({ error: new TypeError("bad input") })).toEqual({
      error: { name: "TypeError", message: "bad input" },
    });
  });

  test("should sanitize arrays element-wise", () => {
    expect(sanitizeForLogging([{ password: "x" }, 3])).toEqual([{ password: "[REDACTED]" }, 3]);
  });

  test("should pass primitives and null through", () => {
    expect(sanitizeForLogging("plain")).toBe("plain");
    expect(sanitizeForLogging(7)).toBe(7);
    expect(sanitizeForLogging(null)).toBeNull();
  });
});

describe("createChildLogger", () => {
  test("should expose every level", () => {
    const log = createChildLogger({ upstream: "api" });

    expect(() => {
      log.info("info", { endpoint: "/servers" });
      log.warn("warn");
      log.error("error", { error: new Error("boom") });
      log.debug("debug");
      log.trace("trace");
    }).not.toThrow();
  });
});
