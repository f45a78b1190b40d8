/**
 * Two-tier response cache
 *
 * Tier 1: in-process LRU (fast, bounded, short-lived)
 * Tier 2: shared Redis store (authoritative, survives restarts)
 *
 * The local tier is a projection of the shared one: an entry is only written
 * locally after the shared write succeeded, and its TTL never exceeds the
 * shared TTL. Shared-tier failures are logged and read as "no cache"; they
 * never reach the caller. When a `cache-backend` breaker is supplied, shared
 * calls go through it and are skipped entirely while it is open.
 *
 * A read only repopulates the local tier when no delete or invalidation ran
 * while its shared GET/PTTL were in flight, and no concurrent write already
 * stored a fresher local entry.
 */

import { LRUCache } from "lru-cache";
import { logger } from "../../utils/logger.js";
import { CircuitOpenError } from "../../utils/errors.js";
import { escapeGlob, type SharedCacheBackend } from "../../utils/redis.js";
import { recordCacheBackendError, recordCacheLookup } from "../../utils/metrics.js";
import { systemClock, type Clock } from "../../types/common.js";
import type { CircuitBreaker } from "../shared/circuitBreaker.js";

// ============================================================================
// Types
// ============================================================================

export interface CacheManagerOptions {
  /** Shared tier; omit for a local-only cache */
  backend?: SharedCacheBackend | null;
  breaker?: CircuitBreaker;
  defaultTtlSeconds?: number;
  localTtlCapSeconds?: number;
  maxLocalEntries?: number;
  /** Prefix applied to shared-tier keys */
  namespace?: string;
  clock?: Clock;
}

export interface CacheStats {
  localSize: number;
  hits: number;
  localHits: number;
  sharedHits: number;
  misses: number;
  sharedConfigured: boolean;
}

interface LocalEntry {
  value: string;
  expiresAt: number;
}

/** Returned by PTTL when the key has no expiry */
const PTTL_NO_EXPIRY = -1;
/** Returned by PTTL when the key does not exist */
const PTTL_MISSING = -2;

// ============================================================================
// Cache Manager
// ============================================================================

export class CacheManager {
  private readonly local: LRUCache<string, LocalEntry>;
  private readonly backend: SharedCacheBackend | null;
  private readonly breaker: CircuitBreaker | undefined;
  private readonly defaultTtlSeconds: number;
  private readonly localTtlCapSeconds: number;
  private readonly namespace: string;
  private readonly clock: Clock;

  /** Bumped by delete and invalidatePattern */
  private invalidations = 0;

  private localHits = 0;
  private sharedHits = 0;
  private misses = 0;

  constructor(options: CacheManagerOptions = {}) {
    this.backend = options.backend ?? null;
    this.breaker = options.breaker;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300;
    this.localTtlCapSeconds = options.localTtlCapSeconds ?? 60;
    this.namespace = options.namespace ?? "api-cache:";
    this.clock = options.clock ?? systemClock;

    // Expiry is tracked on the entry against the injected clock
    this.local = new LRUCache<string, LocalEntry>({
      max: options.maxLocalEntries ?? 1_000,
    });
  }

  async get(key: string): Promise<string | null> {
    const localValue = this.getLocal(key);
    if (localValue !== null) {
      this.localHits++;
      recordCacheLookup("local", "hit");
      return localValue;
    }
    recordCacheLookup("local", "miss");

    const backend = this.backend;
    if (!backend) {
      this.misses++;
      return null;
    }

    const sharedKey = this.sharedKey(key);
    const generation = this.invalidations;
    const value = await this.guardShared("get", () => backend.get(sharedKey), null);

    if (value === null) {
      this.misses++;
      recordCacheLookup("shared", "miss");
      return null;
    }

    this.sharedHits++;
    recordCacheLookup("shared", "hit");

    const remainingMs = await this.guardShared(
      "pttl",
      () => backend.pttl(sharedKey),
      PTTL_MISSING
    );
    const capMs = this.localTtlCapSeconds * 1000;

    if (this.invalidations !== generation || this.local.has(key)) {
      return value;
    }

    if (remainingMs === PTTL_NO_EXPIRY) {
      this.setLocal(key, value, capMs);
    } else if (remainingMs > 0) {
      this.setLocal(key, value, Math.min(remainingMs, capMs));
    }

    return value;
  }

  /**
   * Write through both tiers. Resolves false (never rejects) when the shared write fails.
   */
  async set(
    key: string,
    value: string,
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<boolean> {
    const localTtlMs = Math.min(ttlSeconds, this.localTtlCapSeconds) * 1000;
    const backend = this.backend;

    if (!backend) {
      this.setLocal(key, value, localTtlMs);
      return true;
    }

    const stored = await this.guardShared(
      "setex",
      () => backend.setex(this.sharedKey(key), ttlSeconds, value),
      false
    );

    if (!stored) {
      return false;
    }

    this.setLocal(key, value, localTtlMs);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    this.invalidations++;
    const removedLocally = this.local.delete(key);
    const backend = this.backend;

    if (!backend) {
      return removedLocally;
    }

    const removed = await this.guardShared(
      "del",
      () => backend.del([this.sharedKey(key)]),
      -1
    );

    return removed >= 0 && (removed > 0 || removedLocally);
  }

  /**
   * Remove every entry whose key starts with `prefix` from both tiers
   */
  async invalidatePattern(prefix: string): Promise<boolean> {
    this.invalidations++;
    let removedLocally = 0;
    for (const key of Array.from(this.local.keys())) {
      if (key.startsWith(prefix)) {
        this.local.delete(key);
        removedLocally++;
      }
    }

    const backend = this.backend;
    if (!backend) {
      logger.debug("Cache prefix invalidated", { prefix, removedLocally });
      return true;
    }

    const pattern = `${escapeGlob(this.sharedKey(prefix))}*`;
    const removedShared = await this.guardShared(
      "invalidate",
      async () => {
        const keys = await backend.scanKeys(pattern);
        return keys.length === 0 ? 0 : backend.del(keys);
      },
      -1
    );

    logger.debug("Cache prefix invalidated", { prefix, removedLocally, removedShared });
    return removedShared >= 0;
  }

  getStats(): CacheStats {
    return {
      localSize: this.local.size,
      hits: this.localHits + this.sharedHits,
      localHits: this.localHits,
      sharedHits: this.sharedHits,
      misses: this.misses,
      sharedConfigured: this.backend !== null,
    };
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  private sharedKey(key: string): string {
    return `${this.namespace}${key}`;
  }

  private getLocal(key: string): string | null {
    const entry = this.local.get(key);
    if (!entry) return null;

    if (this.clock.now() >= entry.expiresAt) {
      this.local.delete(key);
      return null;
    }

    return entry.value;
  }

  private setLocal(key: string, value: string, ttlMs: number): void {
    if (ttlMs <= 0) return;
    this.local.set(key, { value, expiresAt: this.clock.now() + ttlMs });
  }

  /**
   * Run a shared-tier call; any failure (or an open breaker) yields `fallback`
   */
  private async guardShared<T>(
    operation: string,
    fn: () => Promise<T>,
    fallback: T
  ): Promise<T> {
    try {
      return this.breaker ? await this.breaker.execute(fn) : await fn();
    } catch (error) {
      if (error instanceof CircuitOpenError) {
        logger.debug("Shared cache skipped, breaker open", { operation });
        return fallback;
      }

      recordCacheBackendError(operation);
      logger.warn("Shared cache operation failed", {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
      return fallback;
    }
  }
}
