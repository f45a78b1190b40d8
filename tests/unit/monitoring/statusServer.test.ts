/**
 * Status Server Tests
 *
 * Uses Fastify's inject(); no port is opened.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildStatusServer } from "../../../src/services/monitoring/statusServer.js";
import { ClientRuntime } from "../../../src/services/api/runtime.js";
import { HealthMonitor } from "../../../src/services/monitoring/healthMonitor.js";
import { recordApiError } from "../../../src/utils/metrics.js";
import { FakeTransport, ManualClock } from "../../helpers/testUtils.js";

describe("Status server", () => {
  let backendHealthy: boolean;
  let runtime: ClientRuntime;
  let app: FastifyInstance;

  beforeEach(async () => {
    backendHealthy = true;
    runtime = new ClientRuntime(
      { baseUrl: "https://api.example.test/v1" },
      {
        transport: new FakeTransport(),
        cacheBackend: null,
        sampler: {
          sample: async () => ({
            cpuPercent: 1,
            memoryPercent: 2,
            diskPercent: 3,
            rssBytes: 4,
            heapUsedBytes: 5,
            loadAvg: [0, 0, 0],
            uptimeSeconds: 6,
          }),
        },
        healthProbes: { backend: async () => backendHealthy },
        clock: new ManualClock(),
      }
    );
    app = await buildStatusServer(runtime, { allowedOrigins: ["https://dashboard.example.test"] });
  });

  afterEach(async () => {
    await app.close();
  });

  test("should report ok when every service is healthy", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    const body: unknown = response.json();
    expect(body).toMatchObject({ status: "ok", services: { backend: true } });
  });

  test("should report degraded when a service is unhealthy", async () => {
    backendHealthy = false;

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.json()).toMatchObject({ status: "degraded", services: { backend: false } });
  });

  test("should serve the runtime status report", async () => {
    const response = await app.inject({ method: "GET", url: "/status" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      health: { backend: true },
      connections: { active: 0, available: 0, inUse: 0, waiting: 0, maxSize: 10 },
      rateLimiter: { trackedKeys: 0, maxRequests: 100, windowMs: 60_000 },
      cache: { sharedConfigured: false },
    });
  });

  test("should expose Prometheus metrics", async () => {
    recordApiError("status-test", "timeout");

    const response = await app.inject({ method: "GET", url: "/metrics" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["content-type"]).toContain("text/plain");
    expect(response.body).toContain('api_errors_total{upstream="status-test",kind="timeout"} 1');
  });

  test("should allow a whitelisted dashboard origin", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/health",
      headers: { origin: "https://dashboard.example.test" },
    });

    expect(response.headers["access-control-allow-origin"]).toBe(
      "https://dashboard.example.test"
    );
  });

  test("should reject other browser origins", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/health",
      headers: { origin: "https://evil.example.test" },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      error: { message: "Origin not allowed", code: "CORS_ORIGIN_DENIED" },
    });
    expect(response.headers["access-control-allow-origin"]).toBeUndefined();
  });

  test("should hide the details of an unexpected failure", async () => {
    const failing = await buildStatusServer({
      getStatus: async () => {
        throw new TypeError("cannot read properties of undefined");
      },
      health: new HealthMonitor(),
    });

    try {
      const response = await failing.inject({ method: "GET", url: "/status" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: { message: "An unexpected error occurred", code: "INTERNAL_ERROR" },
      });
    } finally {
      await failing.close();
    }
  });
});
