export { ClientRuntime, type ClientRuntimeDeps, type RuntimeStatus } from "./services/api/runtime.js";
export { RequestOrchestrator, type RequestOrchestratorOptions } from "./services/api/orchestrator.js";
export { withCache, withRetry, buildCacheKey, type CallFn } from "./services/api/middleware.js";
export { classifyResponse, classifyTransportError, parseRetryAfter } from "./services/api/classifier.js";

export { CacheManager, type CacheManagerOptions, type CacheStats } from "./services/cache/cacheManager.js";
export { RateLimiter, type RateLimiterConfig, type RateLimitDecision } from "./services/shared/rateLimiter.js";
export {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitBreakerState,
  type StateTransition,
} from "./services/shared/circuitBreaker.js";

export { MetricsManager, type Metric, type MetricStats } from "./services/monitoring/metricsManager.js";
export { Diagnostics, type Issue, type IssueSeverity, type DiagnosticsSnapshot } from "./services/monitoring/diagnostics.js";
export { HealthMonitor, redisProbe, tcpProbe, type HealthProbe } from "./services/monitoring/healthMonitor.js";
export { SystemMonitor, type ResourceSampler, type SystemSample } from "./services/monitoring/systemMonitor.js";
export { buildStatusServer, type StatusServerOptions } from "./services/monitoring/statusServer.js";

export { ConnectionPool, createSessionPool, type ConnectionPoolStats } from "./services/transport/connectionPool.js";
export { AxiosTransport } from "./services/transport/axiosTransport.js";
export type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
  TransportSession,
} from "./services/transport/types.js";

export {
  resolveRuntimeConfig,
  runtimeConfigFromEnv,
  runtimeConfigSchema,
  type RuntimeConfig,
  type RuntimeConfigInput,
} from "./config/runtime.js";
export { validateEnv, getEnv, type Env } from "./config/env.js";

export * from "./utils/errors.js";
export type { ApiResponse, HttpMethod, RequestOptions } from "./types/api.js";
export { systemClock, type Clock, type Result, type Sleep } from "./types/common.js";
export { retry, retryWithBackoff, apiRetryPolicy, transientRetryPolicy, type RetryOptions } from "./utils/retry.js";
