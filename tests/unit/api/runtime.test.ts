/**
 * Client Runtime Tests
 *
 * Tests cover:
 * - Wiring of the api/panel orchestrators and their breakers
 * - Breaker transitions surfacing as diagnostics issues
 * - Start/stop lifecycle of background loops
 * - Monitoring pass and status report
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import {
  API_BREAKER,
  CACHE_BREAKER,
  ClientRuntime,
  PANEL_BREAKER,
  type ClientRuntimeDeps,
} from "../../../src/services/api/runtime.js";
import type {
  ResourceSampler,
  SystemSample,
} from "../../../src/services/monitoring/systemMonitor.js";
import type { RuntimeConfigInput } from "../../../src/config/runtime.js";
import { ConfigurationError } from "../../../src/utils/errors.js";
import { activeIntervalLabels } from "../../../src/utils/intervals.js";
import { MockRedis } from "../../mocks/redis.mock.js";
import {
  FakeTransport,
  ManualClock,
  clockSleep,
  jsonResponse,
} from "../../helpers/testUtils.js";

const SAMPLE: SystemSample = {
  cpuPercent: 12.5,
  memoryPercent: 40,
  diskPercent: 55,
  rssBytes: 80_000_000,
  heapUsedBytes: 30_000_000,
  loadAvg: [0.5, 0.4, 0.3],
  uptimeSeconds: 3_600,
};

const fixedSampler: ResourceSampler = {
  sample: async () => ({ ...SAMPLE }),
};

const BASE_CONFIG: RuntimeConfigInput = {
  baseUrl: "https://api.example.test/v1",
  authToken: "test-secret",
  maxRetries: 1,
  circuitBreaker: { failureThreshold: 2, recoveryTimeoutMs: 30_000, halfOpenLimit: 1 },
};

describe("ClientRuntime", () => {
  let clock: ManualClock;
  let transport: FakeTransport;
  let redis: MockRedis;
  let runtime: ClientRuntime;

  function createRuntime(
    config: RuntimeConfigInput = BASE_CONFIG,
    deps: ClientRuntimeDeps = {}
  ): ClientRuntime {
    return new ClientRuntime(config, {
      transport,
      cacheBackend: redis,
      sampler: fixedSampler,
      healthProbes: { backend: async () => true, "cache-backend": async () => true },
      clock,
      sleep: clockSleep(clock),
      ...deps,
    });
  }

  beforeEach(() => {
    clock = new ManualClock();
    transport = new FakeTransport();
    redis = new MockRedis(clock);
    runtime = createRuntime();
  });

  afterEach(async () => {
    await runtime.stop();
  });

  describe("construction", () => {
    test("should reject invalid configuration", () => {
      expect(() => createRuntime({ baseUrl: "not a url" })).toThrow(ConfigurationError);
      expect(() => createRuntime({ ...BASE_CONFIG, maxRetries: 0 })).toThrow(
        /Invalid runtime configuration: maxRetries/
      );
    });

    test("should create breakers for the cache backend and the api", () => {
      expect(runtime.breakers.names()).toEqual([CACHE_BREAKER, API_BREAKER]);
      expect(runtime.panel).toBeNull();
    });

    test("should skip the cache breaker when no shared backend is configured", () => {
      const localOnly = createRuntime(BASE_CONFIG, { cacheBackend: null });

      expect(localOnly.breakers.names()).toEqual([API_BREAKER]);
      expect(localOnly.cache.getStats().sharedConfigured).toBe(false);
    });

    test("should add a panel orchestrator with its own breaker", async () => {
      const withPanel = createRuntime({
        ...BASE_CONFIG,
        panel: { baseUrl: "https://panel.example.test", authToken: "panel-secret" },
      });

      await withPanel.panel?.get("/nodes");

      expect(withPanel.breakers.names()).toEqual([CACHE_BREAKER, API_BREAKER, PANEL_BREAKER]);
      expect(transport.requests[0]).toMatchObject({
        url: "https://panel.example.test/nodes",
        headers: { Authorization: "Bearer panel-secret" },
      });
    });
  });

  describe("requests", () => {
    test("should send api calls through the shared pool with default headers", async () => {
      transport.respondWith(() => jsonResponse(200, { servers: [] }));

      const response = await runtime.api.get("/servers");

      expect(response.data).toEqual({ servers: [] });
      expect(transport.requests[0]).toMatchObject({
        url: "https://api.example.test/v1/servers",
        headers: { Authorization: "Bearer test-secret" },
        defaultHeaders: {
          "Content-Type": "application/json",
          Accept: "application/json",
          "User-Agent": "UpstreamClient/1.0",
        },
        timeoutMs: 30_000,
      });
    });

    test("should cache through the shared backend", async () => {
      await runtime.api.get("/servers", { cacheTtlSeconds: 120 });

      expect(redis.keys()).toEqual(["api-cache:api:/servers"]);
    });

    test("should record breaker transitions as diagnostics issues", async () => {
      transport.respondWith(() => jsonResponse(500, {}));

      await runtime.api.get("/servers").catch(() => undefined);
      await runtime.api.get("/servers").catch(() => undefined);

      const transitions = runtime.diagnostics
        .getRecentIssues()
        .filter((issue) => issue.category === "circuit_breaker");
      expect(transitions).toHaveLength(1);
      expect(transitions[0]).toMatchObject({
        severity: "error",
        message: "Circuit breaker api CLOSED -> OPEN",
        context: { name: "api", from: "CLOSED", to: "OPEN", consecutiveFailures: 2 },
      });
    });

    test("should log recovery transitions at info level", async () => {
      transport.enqueue(() => jsonResponse(500, {}), () => jsonResponse(500, {}));
      await runtime.api.get("/servers").catch(() => undefined);
      await runtime.api.get("/servers").catch(() => undefined);
      clock.advance(30_000);

      await runtime.api.get("/servers");

      const severities = runtime.diagnostics
        .getRecentIssues()
        .filter((issue) => issue.category === "circuit_breaker")
        .map((issue) => `${issue.message}:${issue.severity}`);
      expect(severities).toEqual([
        "Circuit breaker api CLOSED -> OPEN:error",
        "Circuit breaker api OPEN -> HALF_OPEN:info",
        "Circuit breaker api HALF_OPEN -> CLOSED:info",
      ]);
    });
  });

  describe("lifecycle", () => {
    test("should register background loops on start and clear them on stop", async () => {
      await runtime.start();
      await runtime.start();

      expect(runtime.isRunning).toBe(true);
      expect(activeIntervalLabels().sort()).toEqual([
        "diagnostics-self-check",
        "metrics-compaction",
        "runtime-monitoring",
      ]);

      await runtime.stop();
      await runtime.stop();

      expect(runtime.isRunning).toBe(false);
      expect(activeIntervalLabels()).toEqual([]);
    });

    test("should drain the pool on stop", async () => {
      await runtime.start();
      await runtime.api.get("/servers");

      await runtime.stop();

      expect(transport.closedSessions).toEqual([1]);
      await expect(runtime.api.get("/servers")).rejects.toMatchObject({ code: "POOL_DRAINED" });
    });
  });

  describe("monitoring", () => {
    test("should record host samples on a monitoring pass", async () => {
      await runtime.runMonitoringPass();

      expect(runtime.metrics.getStats("system_cpu_percent").max).toBe(12.5);
      expect(runtime.metrics.getStats("system_memory_percent").max).toBe(40);
      expect(runtime.metrics.getStats("system_disk_percent").max).toBe(55);
      expect(runtime.metrics.getStats("system_load_avg_1m").max).toBe(0.5);
    });

    test("should skip the disk metric when disk usage is unknown", async () => {
      const noDisk = createRuntime(BASE_CONFIG, {
        sampler: { sample: async () => ({ ...SAMPLE, diskPercent: null }) },
      });

      await noDisk.runMonitoringPass();

      expect(noDisk.metrics.names()).not.toContain("system_disk_percent");
    });
  });

  describe("getStatus", () => {
    test("should report every component", async () => {
      transport.respondWith(() => jsonResponse(200, {}));
      await runtime.api.get("/servers");

      const status = await runtime.getStatus();

      expect(status.health).toEqual({ backend: true, "cache-backend": true });
      expect(Object.keys(status.metrics).slice(0, 4)).toEqual([
        "api_latency",
        "api_errors",
        "cache_hits",
        "rate_limits",
      ]);
      expect(status.metrics["api_latency"]?.count).toBe(1);
      expect(status.metrics["api_errors"]?.count).toBe(0);
      expect(status.circuitBreakers["api"]?.state).toBe("CLOSED");
      expect(status.connections).toEqual({
        active: 1,
        available: 1,
        inUse: 0,
        waiting: 0,
        maxSize: 10,
      });
      expect(status.rateLimiter).toEqual({ trackedKeys: 1, maxRequests: 100, windowMs: 60_000 });
      expect(status.cache.sharedConfigured).toBe(true);
    });

    test("should report an unhealthy service check", async () => {
      const degraded = createRuntime(BASE_CONFIG, {
        healthProbes: {
          backend: async () => {
            throw new Error("connect ECONNREFUSED");
          },
        },
      });

      await expect(degraded.getStatus()).resolves.toMatchObject({
        health: { backend: false },
      });
    });
  });
});
