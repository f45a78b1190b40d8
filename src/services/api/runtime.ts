/**
 * ClientRuntime: the one object a process builds to talk to its upstreams
 *
 * Owns the session pool, cache, rate limiter, breaker registry, metrics,
 * diagnostics and health monitor, and wires them into the `api` orchestrator
 * (plus `panel` when configured). Background loops run between start() and
 * stop(); nothing starts on import.
 */

import type { Redis } from "ioredis";
import { logger } from "../../utils/logger.js";
import {
  clearRegisteredInterval,
  registerInterval,
} from "../../utils/intervals.js";
import {
  closeRedis,
  createRedisCacheBackend,
  createRedisClient,
  type SharedCacheBackend,
} from "../../utils/redis.js";
import {
  resolveRuntimeConfig,
  type RuntimeConfig,
  type RuntimeConfigInput,
} from "../../config/runtime.js";
import { systemClock, type Clock, type Sleep } from "../../types/common.js";
import { CacheManager, type CacheStats } from "../cache/cacheManager.js";
import {
  CircuitBreakerRegistry,
  type CircuitBreakerMetrics,
} from "../shared/circuitBreaker.js";
import { RateLimiter } from "../shared/rateLimiter.js";
import { MetricsManager, type MetricStats } from "../monitoring/metricsManager.js";
import { Diagnostics, type DiagnosticsSnapshot } from "../monitoring/diagnostics.js";
import {
  HealthMonitor,
  redisProbe,
  tcpProbe,
  type HealthProbe,
} from "../monitoring/healthMonitor.js";
import { SystemMonitor, type ResourceSampler } from "../monitoring/systemMonitor.js";
import { AxiosTransport } from "../transport/axiosTransport.js";
import {
  createSessionPool,
  type ConnectionPool,
  type ConnectionPoolStats,
} from "../transport/connectionPool.js";
import type { HttpTransport, TransportSession } from "../transport/types.js";
import { RequestOrchestrator } from "./orchestrator.js";

export const API_BREAKER = "api";
export const CACHE_BREAKER = "cache-backend";
export const PANEL_BREAKER = "panel";

const STATUS_METRICS = ["api_latency", "api_errors", "cache_hits", "rate_limits"];

export interface ClientRuntimeDeps {
  transport?: HttpTransport;
  /** Shared cache to use instead of connecting to `redisUrl`; null disables it */
  cacheBackend?: SharedCacheBackend | null;
  sampler?: ResourceSampler;
  /** Replace the default probes (cache-backend, backend, panel) */
  healthProbes?: Record<string, HealthProbe>;
  clock?: Clock;
  sleep?: Sleep;
  isProduction?: boolean;
}

export interface RuntimeStatus {
  health: Record<string, boolean>;
  metrics: Record<string, MetricStats>;
  diagnostics: DiagnosticsSnapshot;
  circuitBreakers: Record<string, CircuitBreakerMetrics>;
  connections: ConnectionPoolStats;
  cache: CacheStats;
  rateLimiter: { trackedKeys: number; maxRequests: number; windowMs: number };
}

export class ClientRuntime {
  readonly config: RuntimeConfig;
  readonly api: RequestOrchestrator;
  readonly panel: RequestOrchestrator | null;

  readonly pool: ConnectionPool<TransportSession>;
  readonly cache: CacheManager;
  readonly rateLimiter: RateLimiter;
  readonly breakers: CircuitBreakerRegistry;
  readonly metrics: MetricsManager;
  readonly diagnostics: Diagnostics;
  readonly health: HealthMonitor;

  private readonly sampler: ResourceSampler;
  private readonly redisClient: Redis | null;
  private monitorHandle: NodeJS.Timeout | null = null;
  private running = false;

  constructor(input: RuntimeConfigInput, deps: ClientRuntimeDeps = {}) {
    const config = resolveRuntimeConfig(input);
    const clock = deps.clock ?? systemClock;
    this.config = config;

    // Shared cache: injected backend wins over redisUrl
    let backend: SharedCacheBackend | null = null;
    this.redisClient = null;
    if (deps.cacheBackend !== undefined) {
      backend = deps.cacheBackend;
    } else if (config.redisUrl) {
      this.redisClient = createRedisClient(config.redisUrl, deps.isProduction ?? false);
      backend = createRedisCacheBackend(this.redisClient);
    }

    this.sampler = deps.sampler ?? new SystemMonitor();
    this.metrics = new MetricsManager({
      retentionMs: config.monitoring.metricsRetentionMs,
      compactionIntervalMs: config.monitoring.metricsCompactionIntervalMs,
      clock,
    });
    this.diagnostics = new Diagnostics({
      clock,
      sampler: this.sampler,
      selfCheckIntervalMs: config.monitoring.diagnosticsIntervalMs,
    });

    this.breakers = new CircuitBreakerRegistry(config.circuitBreaker, clock);
    this.breakers.onTransition((transition) => {
      this.diagnostics.recordIssue(
        "circuit_breaker",
        transition.to === "OPEN" ? "error" : "info",
        `Circuit breaker ${transition.name} ${transition.from} -> ${transition.to}`,
        { ...transition }
      );
    });

    this.rateLimiter = new RateLimiter(config.rateLimit, clock);
    this.pool = createSessionPool(deps.transport ?? new AxiosTransport(), {
      ...config.pool,
      userAgent: config.userAgent,
    });
    this.cache = new CacheManager({
      backend,
      breaker: backend ? this.breakers.get(CACHE_BREAKER) : undefined,
      defaultTtlSeconds: config.cache.defaultTtlSeconds,
      localTtlCapSeconds: config.cache.localTtlCapSeconds,
      maxLocalEntries: config.cache.maxLocalEntries,
      namespace: config.cache.namespace,
      clock,
    });

    const shared = {
      timeoutMs: config.timeoutMs,
      slowRequestThresholdMs: config.slowRequestThresholdMs,
      retry: { maxRetries: config.maxRetries, ...config.retry },
      pool: this.pool,
      rateLimiter: this.rateLimiter,
      metrics: this.metrics,
      diagnostics: this.diagnostics,
      cache: this.cache,
      clock,
      sleep: deps.sleep,
    };

    this.api = new RequestOrchestrator({
      ...shared,
      upstream: API_BREAKER,
      baseUrl: config.baseUrl,
      authToken: config.authToken,
      breaker: this.breakers.get(API_BREAKER),
    });

    this.panel = config.panel
      ? new RequestOrchestrator({
          ...shared,
          upstream: PANEL_BREAKER,
          baseUrl: config.panel.baseUrl,
          authToken: config.panel.authToken,
          breaker: this.breakers.get(PANEL_BREAKER),
        })
      : null;

    this.health = new HealthMonitor({ cacheMs: config.monitoring.healthCacheMs, clock });
    const probes = deps.healthProbes ?? this.defaultProbes(backend);
    for (const [service, probe] of Object.entries(probes)) {
      this.health.register(service, probe);
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    if (this.redisClient && this.redisClient.status === "wait") {
      try {
        await this.redisClient.connect();
      } catch (error) {
        // The cache degrades to local-only until Redis reconnects
        logger.warn("Shared cache unavailable at startup", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.metrics.start();
    this.diagnostics.start();
    this.monitorHandle = registerInterval(
      () => this.runMonitoringPass(),
      this.config.monitoring.systemSampleIntervalMs,
      "runtime-monitoring"
    );

    logger.info("Client runtime started", {
      baseUrl: this.config.baseUrl,
      panel: this.panel !== null,
      sharedCache: this.cache.getStats().sharedConfigured,
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    this.metrics.stop();
    this.diagnostics.stop();
    if (this.monitorHandle) {
      clearRegisteredInterval(this.monitorHandle);
      this.monitorHandle = null;
    }

    await this.pool.drain();
    if (this.redisClient) {
      await closeRedis(this.redisClient);
    }

    logger.info("Client runtime stopped");
  }

  /**
   * Record host resource samples and refresh health results
   */
  async runMonitoringPass(): Promise<void> {
    const sample = await this.sampler.sample();

    this.metrics.record("system_cpu_percent", sample.cpuPercent);
    this.metrics.record("system_memory_percent", sample.memoryPercent);
    if (sample.diskPercent !== null) {
      this.metrics.record("system_disk_percent", sample.diskPercent);
    }
    this.metrics.record("system_rss_bytes", sample.rssBytes);
    this.metrics.record("system_heap_used_bytes", sample.heapUsedBytes);
    this.metrics.record("system_load_avg_1m", sample.loadAvg[0]);

    await this.health.checkAll();
  }

  async getStatus(): Promise<RuntimeStatus> {
    const metricNames = new Set([...STATUS_METRICS, ...this.metrics.names()]);
    const metrics: Record<string, MetricStats> = {};
    for (const name of metricNames) {
      metrics[name] = this.metrics.getStats(name);
    }

    const rateConfig = this.rateLimiter.getConfig();

    return {
      health: await this.health.checkAll(),
      metrics,
      diagnostics: this.diagnostics.getDiagnostics(),
      circuitBreakers: this.breakers.getAllMetrics(),
      connections: this.pool.getStats(),
      cache: this.cache.getStats(),
      rateLimiter: {
        trackedKeys: this.rateLimiter.trackedKeys().length,
        maxRequests: rateConfig.maxRequests,
        windowMs: rateConfig.windowMs,
      },
    };
  }

  private defaultProbes(backend: SharedCacheBackend | null): Record<string, HealthProbe> {
    const probes: Record<string, HealthProbe> = {
      backend: tcpProbe(this.config.baseUrl),
    };
    if (backend) {
      probes[CACHE_BREAKER] = redisProbe(backend);
    }
    if (this.config.panel) {
      probes[PANEL_BREAKER] = tcpProbe(this.config.panel.baseUrl);
    }
    return probes;
  }
}
