/**
 * Circuit Breaker Tests
 *
 * Tests cover:
 * - CLOSED -> OPEN after the failure threshold
 * - OPEN -> HALF_OPEN after the recovery timeout
 * - HALF_OPEN -> CLOSED after enough trial successes
 * - HALF_OPEN -> OPEN on any failure
 * - State history, metrics and listeners
 * - Registry sharing config and listeners
 */

import { describe, test, expect, beforeEach, vi } from "vitest";
import {
  CircuitBreaker,
  CircuitBreakerRegistry,
  type StateTransition,
} from "../../../src/services/shared/circuitBreaker.js";
import { CircuitOpenError } from "../../../src/utils/errors.js";
import { ManualClock } from "../../helpers/testUtils.js";

describe("CircuitBreaker", () => {
  let clock: ManualClock;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = new ManualClock();
    breaker = new CircuitBreaker(
      "api",
      { failureThreshold: 3, recoveryTimeoutMs: 30_000, halfOpenLimit: 2 },
      clock
    );
  });

  function openCircuit(): void {
    for (let i = 0; i < 3; i++) breaker.recordFailure();
  }

  describe("CLOSED state", () => {
    test("should start CLOSED and allow requests", () => {
      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.allowRequest()).toBe(true);
    });

    test("should stay CLOSED below the failure threshold", () => {
      breaker.recordFailure();
      breaker.recordFailure();

      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.allowRequest()).toBe(true);
    });

    test("should open after exactly failureThreshold consecutive failures", () => {
      openCircuit();

      expect(breaker.getState()).toBe("OPEN");
      expect(breaker.allowRequest()).toBe(false);
    });

    test("should only count a success in CLOSED toward the lifetime total", () => {
      breaker.recordFailure();
      breaker.recordFailure();
      breaker.recordSuccess();

      expect(breaker.getMetrics()).toMatchObject({
        state: "CLOSED",
        consecutiveFailures: 2,
        totalSuccesses: 1,
      });

      breaker.recordFailure();

      expect(breaker.getState()).toBe("OPEN");
    });

    test("should start the failure count over after a transition", () => {
      openCircuit();

      expect(breaker.getMetrics().consecutiveFailures).toBe(0);
      expect(breaker.getStateHistory()[0]).toMatchObject({ from: "CLOSED", to: "OPEN", consecutiveFailures: 3 });
    });
  });

  describe("OPEN state", () => {
    test("should reject until the recovery timeout elapses", () => {
      openCircuit();
      clock.advance(29_999);

      expect(breaker.allowRequest()).toBe(false);
      expect(breaker.getState()).toBe("OPEN");
    });

    test("should move to HALF_OPEN and allow a trial request once the timeout elapses", () => {
      openCircuit();
      clock.advance(30_000);

      expect(breaker.allowRequest()).toBe(true);
      expect(breaker.getState()).toBe("HALF_OPEN");
    });

    test("should report when the next trial request is allowed", () => {
      openCircuit();
      const openedAt = clock.now();

      expect(breaker.getMetrics().nextAttemptTime).toBe(openedAt + 30_000);
    });
  });

  describe("HALF_OPEN state", () => {
    beforeEach(() => {
      openCircuit();
      clock.advance(30_000);
      breaker.allowRequest();
    });

    test("should close after halfOpenLimit successes", () => {
      breaker.recordSuccess();
      expect(breaker.getState()).toBe("HALF_OPEN");

      breaker.recordSuccess();
      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.getMetrics().consecutiveFailures).toBe(0);
    });

    test("should reopen on a single failure", () => {
      breaker.recordSuccess();
      breaker.recordFailure();

      expect(breaker.getState()).toBe("OPEN");
      expect(breaker.allowRequest()).toBe(false);
    });

    test("should require a fresh run of successes after reopening", () => {
      breaker.recordSuccess();
      breaker.recordFailure();
      clock.advance(30_000);
      breaker.allowRequest();

      breaker.recordSuccess();
      expect(breaker.getState()).toBe("HALF_OPEN");
    });
  });

  describe("history and metrics", () => {
    test("should record every transition with timestamps", () => {
      const start = clock.now();
      openCircuit();
      clock.advance(30_000);
      breaker.allowRequest();
      breaker.recordSuccess();
      breaker.recordSuccess();

      const history = breaker.getStateHistory();
      expect(history.map((t) => `${t.from}->${t.to}`)).toEqual([
        "CLOSED->OPEN",
        "OPEN->HALF_OPEN",
        "HALF_OPEN->CLOSED",
      ]);
      expect(history[0]?.timestamp).toBe(start);
      expect(history[1]?.timestamp).toBe(start + 30_000);
    });

    test("should keep only the latest 100 transitions", () => {
      const fast = new CircuitBreaker(
        "flappy",
        { failureThreshold: 1, recoveryTimeoutMs: 0, halfOpenLimit: 1 },
        clock
      );

      // Each cycle: CLOSED->OPEN, OPEN->HALF_OPEN, HALF_OPEN->CLOSED
      for (let i = 0; i < 40; i++) {
        fast.recordFailure();
        fast.allowRequest();
        fast.recordSuccess();
      }

      const history = fast.getStateHistory();
      expect(history).toHaveLength(100);
      expect(fast.getMetrics().stateChanges24h).toBe(100);
    });

    test("should compute lifetime counters and failure rate", () => {
      breaker.recordSuccess();
      breaker.recordSuccess();
      breaker.recordSuccess();
      breaker.recordFailure();

      const metrics = breaker.getMetrics();
      expect(metrics.totalSuccesses).toBe(3);
      expect(metrics.totalFailures).toBe(1);
      expect(metrics.failureRate).toBe(0.25);
      expect(metrics.lastStateChange).toBeNull();
    });

    test("should notify listeners of transitions", () => {
      const seen: StateTransition[] = [];
      breaker.onTransition((t) => seen.push(t));

      openCircuit();

      expect(seen).toHaveLength(1);
      expect(seen[0]).toMatchObject({ name: "api", from: "CLOSED", to: "OPEN", consecutiveFailures: 3 });
    });

    test("should keep transitioning when a listener throws", () => {
      breaker.onTransition(() => {
        throw new Error("listener broke");
      });

      openCircuit();

      expect(breaker.getState()).toBe("OPEN");
    });

    test("should return to CLOSED on reset", () => {
      openCircuit();
      breaker.reset();

      expect(breaker.getState()).toBe("CLOSED");
      expect(breaker.allowRequest()).toBe(true);
      expect(breaker.getMetrics().consecutiveFailures).toBe(0);
    });
  });

  describe("execute", () => {
    test("should record the outcome of the wrapped call", async () => {
      await expect(breaker.execute(async () => "ok")).resolves.toBe("ok");
      await expect(
        breaker.execute(async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      const metrics = breaker.getMetrics();
      expect(metrics.totalSuccesses).toBe(1);
      expect(metrics.totalFailures).toBe(1);
    });

    test("should reject with CircuitOpenError without calling fn while OPEN", async () => {
      openCircuit();
      const fn = vi.fn(async () => "never");

      await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitOpenError);
      expect(fn).not.toHaveBeenCalled();
    });
  });
});

describe("CircuitBreakerRegistry", () => {
  test("should return the same breaker per name", () => {
    const registry = new CircuitBreakerRegistry({}, new ManualClock());

    expect(registry.get("api")).toBe(registry.get("api"));
    expect(registry.get("api")).not.toBe(registry.get("panel"));
    expect(registry.names()).toEqual(["api", "panel"]);
  });

  test("should attach registry listeners to existing and future breakers", () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1 }, new ManualClock());
    const existing = registry.get("api");
    const seen: string[] = [];
    registry.onTransition((t) => seen.push(`${t.name}:${t.to}`));
    const later = registry.get("cache-backend");

    existing.recordFailure();
    later.recordFailure();

    expect(seen).toEqual(["api:OPEN", "cache-backend:OPEN"]);
  });

  test("should expose metrics for every breaker", () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1 }, new ManualClock());
    registry.get("api").recordFailure();
    registry.get("panel");

    const all = registry.getAllMetrics();
    expect(Object.keys(all)).toEqual(["api", "panel"]);
    expect(all["api"]?.state).toBe("OPEN");
    expect(all["panel"]?.state).toBe("CLOSED");
  });
});
