/**
 * Metrics Test Suite
 *
 * Prometheus helpers write to the module registry; each test uses its own
 * label values so counters from other tests don't interfere.
 */

import { describe, test, expect } from "vitest";
import * as metrics from "../../../src/utils/metrics.js";

describe("Metrics - API", () => {
  test("should count errors by upstream and kind", async () => {
    metrics.recordApiError("metrics-api", "server");
    metrics.recordApiError("metrics-api", "server");
    metrics.recordApiError("metrics-api", "timeout");

    const output = await metrics.getMetrics();
    expect(output).toContain('api_errors_total{upstream="metrics-api",kind="server"} 2');
    expect(output).toContain('api_errors_total{upstream="metrics-api",kind="timeout"} 1');
  });

  test("should observe request durations", async () => {
    metrics.observeApiRequest("metrics-latency", "GET", 40, "200");

    const output = await metrics.getMetrics();
    expect(output).toContain(
      'api_request_duration_ms_count{upstream="metrics-latency",method="GET",status="200"} 1'
    );
    expect(output).toContain(
      'api_request_duration_ms_sum{upstream="metrics-latency",method="GET",status="200"} 40'
    );
  });

  test("should clamp negative durations to zero", async () => {
    metrics.observeApiRequest("metrics-latency", "GET", -5, "500");

    const output = await metrics.getMetrics();
    expect(output).toContain(
      'api_request_duration_ms_sum{upstream="metrics-latency",method="GET",status="500"} 0'
    );
  });
});

describe("Metrics - Circuit Breaker", () => {
  test("should encode breaker state as a gauge", async () => {
    metrics.setCircuitBreakerState("metrics-breaker", "OPEN");
    let output = await metrics.getMetrics();
    expect(output).toContain('circuit_breaker_state{name="metrics-breaker"} 2');

    metrics.setCircuitBreakerState("metrics-breaker", "HALF_OPEN");
    output = await metrics.getMetrics();
    expect(output).toContain('circuit_breaker_state{name="metrics-breaker"} 1');
  });

  test("should count transitions and rejections", async () => {
    metrics.recordCircuitBreakerTransition("metrics-breaker", "CLOSED", "OPEN");
    metrics.recordCircuitBreakerRejection("metrics-breaker");

    const output = await metrics.getMetrics();
    expect(output).toContain(
      'circuit_breaker_transitions_total{name="metrics-breaker",from="CLOSED",to="OPEN"} 1'
    );
    expect(output).toContain('circuit_breaker_rejected_total{name="metrics-breaker"} 1');
  });
});

describe("Metrics - Cache and Health", () => {
  test("should count lookups by tier and result", async () => {
    const before = await metrics.metricsRegistry.getSingleMetricAsString("cache_lookups_total");
    metrics.recordCacheLookup("shared", "hit");
    const after = await metrics.metricsRegistry.getSingleMetricAsString("cache_lookups_total");

    expect(before).not.toEqual(after);
    expect(after).toContain('cache_lookups_total{tier="shared",result="hit"}');
  });

  test("should expose per-service health", async () => {
    metrics.setUpstreamHealth("metrics-service", false);

    const output = await metrics.getMetrics();
    expect(output).toContain('upstream_health{service="metrics-service"} 0');
  });

  test("should count diagnostics issues", async () => {
    metrics.recordDiagnosticIssue("metrics-category", "warning");

    const output = await metrics.getMetrics();
    expect(output).toContain(
      'diagnostic_issues_total{category="metrics-category",severity="warning"} 1'
    );
  });
});

describe("Metrics - Registry", () => {
  test("should include default process metrics under the project prefix", async () => {
    const output = await metrics.getMetrics();
    expect(output).toContain("upstream_client_process_cpu_user_seconds_total");
  });

  test("should report the Prometheus content type", () => {
    expect(metrics.metricsRegistry.contentType).toContain("text/plain");
  });
});
