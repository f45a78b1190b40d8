import * as client from "prom-client";

const register = new client.Registry();

client.collectDefaultMetrics({
  register,
  prefix: "upstream_client_",
});

// ---------------------------------------------------------------------------
// Metric Definitions
// ---------------------------------------------------------------------------

const apiRequestDuration = new client.Histogram({
  name: "api_request_duration_ms",
  help: "Latency of upstream API requests",
  labelNames: ["upstream", "method", "status"],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000, 10000],
  registers: [register],
});

const apiErrorsTotal = new client.Counter({
  name: "api_errors_total",
  help: "Failed upstream API requests grouped by error kind",
  labelNames: ["upstream", "kind"],
  registers: [register],
});

const rateLimitRejectionsTotal = new client.Counter({
  name: "rate_limit_rejections_total",
  help: "Requests rejected by the local sliding-window limiter",
  labelNames: ["upstream"],
  registers: [register],
});

const cacheLookupsTotal = new client.Counter({
  name: "cache_lookups_total",
  help: "Cache lookups grouped by tier and result",
  labelNames: ["tier", "result"],
  registers: [register],
});

const cacheBackendErrorsTotal = new client.Counter({
  name: "cache_backend_errors_total",
  help: "Shared cache backend failures by operation",
  labelNames: ["operation"],
  registers: [register],
});

const circuitBreakerState = new client.Gauge({
  name: "circuit_breaker_state",
  help: "Circuit breaker state (0=CLOSED, 1=HALF_OPEN, 2=OPEN)",
  labelNames: ["name"],
  registers: [register],
});

const circuitBreakerTransitions = new client.Counter({
  name: "circuit_breaker_transitions_total",
  help: "Circuit breaker state transitions",
  labelNames: ["name", "from", "to"],
  registers: [register],
});

const circuitBreakerRejections = new client.Counter({
  name: "circuit_breaker_rejected_total",
  help: "Requests rejected because the circuit was OPEN",
  labelNames: ["name"],
  registers: [register],
});

const poolActiveSessions = new client.Gauge({
  name: "connection_pool_active_sessions",
  help: "Sessions created by the pool and not yet closed",
  registers: [register],
});

const poolIdleSessions = new client.Gauge({
  name: "connection_pool_idle_sessions",
  help: "Sessions waiting in the pool",
  registers: [register],
});

const poolExhaustedTotal = new client.Counter({
  name: "connection_pool_exhausted_total",
  help: "Acquire calls that timed out waiting for a session",
  registers: [register],
});

const retryAttemptsTotal = new client.Counter({
  name: "retry_attempts_total",
  help: "Total number of retry attempts",
  labelNames: ["operation", "attempt_number"],
  registers: [register],
});

const retrySuccessTotal = new client.Counter({
  name: "retry_success_total",
  help: "Total successful retries (success after >1 attempt)",
  labelNames: ["operation", "attempts"],
  registers: [register],
});

const retryExhaustedTotal = new client.Counter({
  name: "retry_exhausted_total",
  help: "Total retries exhausted (all attempts failed)",
  labelNames: ["operation"],
  registers: [register],
});

const retryDelayHistogram = new client.Histogram({
  name: "retry_delay_milliseconds",
  help: "Retry delay duration in milliseconds",
  labelNames: ["operation"],
  buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 60000],
  registers: [register],
});

const redisConnectionsGauge = new client.Gauge({
  name: "redis_connections",
  help: "Redis client connection status",
  registers: [register],
});

const redisCommandDuration = new client.Histogram({
  name: "redis_command_duration_ms",
  help: "Duration of Redis commands",
  labelNames: ["command"],
  buckets: [1, 5, 10, 25, 50, 100, 250, 500],
  registers: [register],
});

const upstreamHealthGauge = new client.Gauge({
  name: "upstream_health",
  help: "Health probe result per service (1=healthy, 0=unhealthy)",
  labelNames: ["service"],
  registers: [register],
});

const diagnosticIssuesTotal = new client.Counter({
  name: "diagnostic_issues_total",
  help: "Issues recorded by diagnostics",
  labelNames: ["category", "severity"],
  registers: [register],
});

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

export function observeApiRequest(
  upstream: string,
  method: string,
  durationMs: number,
  status: string
): void {
  apiRequestDuration.labels(upstream, method, status).observe(Math.max(durationMs, 0));
}

export function recordApiError(upstream: string, kind: string): void {
  apiErrorsTotal.labels(upstream, kind).inc();
}

export function recordRateLimitRejection(upstream: string): void {
  rateLimitRejectionsTotal.labels(upstream).inc();
}

export function recordCacheLookup(
  tier: "local" | "shared",
  result: "hit" | "miss"
): void {
  cacheLookupsTotal.labels(tier, result).inc();
}

export function recordCacheBackendError(operation: string): void {
  cacheBackendErrorsTotal.labels(operation).inc();
}

export function setCircuitBreakerState(
  name: string,
  state: "CLOSED" | "HALF_OPEN" | "OPEN"
): void {
  const stateValue = state === "CLOSED" ? 0 : state === "HALF_OPEN" ? 1 : 2;
  circuitBreakerState.labels(name).set(stateValue);
}

export function recordCircuitBreakerTransition(
  name: string,
  from: string,
  to: string
): void {
  circuitBreakerTransitions.labels(name, from, to).inc();
}

export function recordCircuitBreakerRejection(name: string): void {
  circuitBreakerRejections.labels(name).inc();
}

export function setPoolSessions(active: number, idle: number): void {
  poolActiveSessions.set(active);
  poolIdleSessions.set(idle);
}

export function recordPoolExhausted(): void {
  poolExhaustedTotal.inc();
}

export function recordRetryAttempt(operation: string, attemptNumber: number): void {
  retryAttemptsTotal.labels(operation, attemptNumber.toString()).inc();
}

export function recordRetrySuccess(operation: string, attempts: number): void {
  retrySuccessTotal.labels(operation, attempts.toString()).inc();
}

export function recordRetryExhausted(operation: string): void {
  retryExhaustedTotal.labels(operation).inc();
}

export function observeRetryDelay(operation: string, delayMs: number): void {
  retryDelayHistogram.labels(operation).observe(delayMs);
}

export function setRedisConnectionStatus(connected: boolean): void {
  redisConnectionsGauge.set(connected ? 1 : 0);
}

export function trackRedisCommand(command: string, durationMs: number): void {
  redisCommandDuration.labels(command).observe(durationMs);
}

export function setUpstreamHealth(service: string, healthy: boolean): void {
  upstreamHealthGauge.labels(service).set(healthy ? 1 : 0);
}

export function recordDiagnosticIssue(category: string, severity: string): void {
  diagnosticIssuesTotal.labels(category, severity).inc();
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export const metricsRegistry = register;
