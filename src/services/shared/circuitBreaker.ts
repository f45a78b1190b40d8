/**
 * Circuit Breaker Pattern Implementation
 *
 * Prevents cascade failures by failing fast when an upstream is unhealthy.
 * One breaker per upstream name (`api`, `cache-backend`, `panel`), held in a
 * CircuitBreakerRegistry owned by the client runtime.
 *
 * States:
 * - CLOSED: Normal operation, requests flow through
 * - OPEN: Too many failures, requests blocked (fail fast)
 * - HALF_OPEN: Testing recovery, probe requests allowed
 *
 * Transitions:
 * - CLOSED -> OPEN: After N failures since the last transition (successes in
 *   CLOSED only count toward the lifetime total)
 * - OPEN -> HALF_OPEN: First allowRequest() once the recovery timeout elapsed
 * - HALF_OPEN -> CLOSED: After M successful probes
 * - HALF_OPEN -> OPEN: On any failure
 *
 * Failure and probe-success counters start over on every transition.
 *
 * All state changes happen inside synchronous methods, so a transition is never
 * interleaved with another caller's check.
 */

import { logger } from "../../utils/logger.js";
import { CircuitOpenError } from "../../utils/errors.js";
import {
  recordCircuitBreakerRejection,
  recordCircuitBreakerTransition,
  setCircuitBreakerState,
} from "../../utils/metrics.js";
import { systemClock, type Clock } from "../../types/common.js";

// ============================================================================
// Types
// ============================================================================

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  failureThreshold: number; // Consecutive failures before opening (default: 5)
  recoveryTimeoutMs: number; // Time to wait before HALF_OPEN (default: 60000)
  halfOpenLimit: number; // Probe successes to close from HALF_OPEN (default: 3)
}

export interface StateTransition {
  name: string;
  from: CircuitBreakerState;
  to: CircuitBreakerState;
  timestamp: number;
  consecutiveFailures: number;
}

export type TransitionListener = (transition: StateTransition) => void;

export interface CircuitBreakerMetrics {
  state: CircuitBreakerState;
  consecutiveFailures: number;
  totalFailures: number;
  totalSuccesses: number;
  /** Lifetime failures / (failures + successes); 0 before any outcome */
  failureRate: number;
  lastFailureTime: number | null;
  lastStateChange: number | null;
  stateChanges24h: number;
  /** When an OPEN breaker lets the next probe through; null otherwise */
  nextAttemptTime: number | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5, // 5 failures -> OPEN
  recoveryTimeoutMs: 60_000, // 60s before trying HALF_OPEN
  halfOpenLimit: 3, // 3 successes -> CLOSED (from HALF_OPEN)
};

const MAX_STATE_HISTORY = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Circuit Breaker Class
// ============================================================================

export class CircuitBreaker {
  private state: CircuitBreakerState = "CLOSED";
  private consecutiveFailures = 0;
  private halfOpenSuccesses = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private lastFailureTime: number | null = null;
  private stateHistory: StateTransition[] = [];
  private readonly listeners: TransitionListener[] = [];
  private readonly config: CircuitBreakerConfig;

  constructor(
    public readonly name: string,
    config: Partial<CircuitBreakerConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    logger.debug("Circuit breaker initialized", {
      name: this.name,
      config: this.config,
    });

    setCircuitBreakerState(this.name, this.state);
  }

  /**
   * May a request go to the upstream now?
   * An OPEN breaker past its recovery timeout moves to HALF_OPEN and admits the probe.
   */
  allowRequest(): boolean {
    if (this.state === "CLOSED" || this.state === "HALF_OPEN") {
      return true;
    }

    if (this.shouldAttemptReset()) {
      this.transitionTo("HALF_OPEN");
      return true;
    }

    logger.debug("Circuit breaker OPEN, rejecting request", {
      name: this.name,
      timeRemainingMs: this.timeUntilRetry(),
    });
    recordCircuitBreakerRejection(this.name);
    return false;
  }

  recordSuccess(): void {
    this.totalSuccesses++;

    if (this.state === "HALF_OPEN") {
      this.halfOpenSuccesses++;

      logger.debug("Circuit breaker success in HALF_OPEN", {
        name: this.name,
        halfOpenSuccesses: this.halfOpenSuccesses,
        threshold: this.config.halfOpenLimit,
      });

      if (this.halfOpenSuccesses >= this.config.halfOpenLimit) {
        this.transitionTo("CLOSED");
      }
    }
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    this.totalFailures++;
    this.lastFailureTime = this.clock.now();

    logger.debug("Circuit breaker failure recorded", {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      threshold: this.config.failureThreshold,
    });

    if (this.state === "HALF_OPEN") {
      // Any failure in HALF_OPEN -> back to OPEN
      this.transitionTo("OPEN");
    } else if (
      this.state === "CLOSED" &&
      this.consecutiveFailures >= this.config.failureThreshold
    ) {
      this.transitionTo("OPEN");
    }
  }

  /**
   * Run fn under breaker protection; rejects with CircuitOpenError when OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.allowRequest()) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  getState(): CircuitBreakerState {
    return this.state;
  }

  getStateHistory(): StateTransition[] {
    return this.stateHistory.map((transition) => ({ ...transition }));
  }

  getMetrics(): CircuitBreakerMetrics {
    const now = this.clock.now();
    const outcomes = this.totalFailures + this.totalSuccesses;
    const lastTransition = this.stateHistory[this.stateHistory.length - 1];

    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      failureRate: outcomes === 0 ? 0 : this.totalFailures / outcomes,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: lastTransition ? lastTransition.timestamp : null,
      stateChanges24h: this.stateHistory.filter((t) => now - t.timestamp < DAY_MS)
        .length,
      nextAttemptTime:
        this.state === "OPEN" && this.lastFailureTime !== null
          ? this.lastFailureTime + this.config.recoveryTimeoutMs
          : null,
    };
  }

  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
  }

  /**
   * Reset circuit breaker to CLOSED state (for testing/admin)
   */
  reset(): void {
    logger.info("Circuit breaker manually reset", { name: this.name });
    this.lastFailureTime = null;
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;
    this.transitionTo("CLOSED");
  }

  // ==========================================================================
  // Private Methods - State Management
  // ==========================================================================

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === null) return true;
    return this.clock.now() - this.lastFailureTime >= this.config.recoveryTimeoutMs;
  }

  private timeUntilRetry(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(
      0,
      this.lastFailureTime + this.config.recoveryTimeoutMs - this.clock.now()
    );
  }

  private transitionTo(newState: CircuitBreakerState): void {
    const oldState = this.state;

    if (oldState === newState) {
      return;
    }

    const transition: StateTransition = {
      name: this.name,
      from: oldState,
      to: newState,
      timestamp: this.clock.now(),
      consecutiveFailures: this.consecutiveFailures,
    };

    // Counters start over in every state
    this.state = newState;
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;

    this.stateHistory.push(transition);
    if (this.stateHistory.length > MAX_STATE_HISTORY) {
      this.stateHistory = this.stateHistory.slice(-MAX_STATE_HISTORY);
    }

    logger.info("Circuit breaker state transition", {
      name: this.name,
      oldState,
      newState,
      consecutiveFailures: transition.consecutiveFailures,
    });

    recordCircuitBreakerTransition(this.name, oldState, newState);
    setCircuitBreakerState(this.name, newState);

    for (const listener of this.listeners) {
      try {
        listener({ ...transition });
      } catch (error) {
        logger.error("Circuit breaker transition listener failed", {
          name: this.name,
          error,
        });
      }
    }
  }
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Breakers keyed by upstream name. Breakers created through the registry share
 * its config, clock and transition listeners.
 */
export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly listeners: TransitionListener[] = [];

  constructor(
    private readonly config: Partial<CircuitBreakerConfig> = {},
    private readonly clock: Clock = systemClock
  ) {}

  get(name: string, overrides: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker(
      name,
      { ...this.config, ...overrides },
      this.clock
    );
    for (const listener of this.listeners) {
      breaker.onTransition(listener);
    }
    this.breakers.set(name, breaker);
    return breaker;
  }

  /**
   * Listen to transitions of every breaker, present and future
   */
  onTransition(listener: TransitionListener): void {
    this.listeners.push(listener);
    for (const breaker of this.breakers.values()) {
      breaker.onTransition(listener);
    }
  }

  names(): string[] {
    return Array.from(this.breakers.keys());
  }

  getAllMetrics(): Record<string, CircuitBreakerMetrics> {
    const result: Record<string, CircuitBreakerMetrics> = {};
    for (const [name, breaker] of this.breakers) {
      result[name] = breaker.getMetrics();
    }
    return result;
  }
}
