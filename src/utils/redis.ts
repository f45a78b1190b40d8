/**
 * Redis client factory and shared-cache adapter
 *
 * Features:
 * - Exponential backoff retry strategy
 * - TLS for rediss:// URLs in production
 * - Event handlers with structured, throttled logging
 * - Health check with latency monitoring
 * - Non-blocking SCAN-based key enumeration
 * - Graceful shutdown
 *
 * No module-level client: the runtime creates one and passes it where needed.
 */

import { Redis, type RedisOptions } from "ioredis";
import { logger } from "./logger.js";
import { setRedisConnectionStatus, trackRedisCommand } from "./metrics.js";

// ============================================================================
// Configuration
// ============================================================================

const CONNECTION_TIMEOUT_MS = 10_000;
const COMMAND_TIMEOUT_MS = 5_000;
const KEEP_ALIVE_MS = 30_000;

const MAX_RETRY_ATTEMPTS = 10;
const RETRY_BASE_DELAY_MS = 200;
const RETRY_MAX_DELAY_MS = 10_000;

const ERROR_THROTTLE_MS = 5_000;

function buildRedisOptions(url: string, isProduction: boolean): RedisOptions {
  return {
    connectTimeout: CONNECTION_TIMEOUT_MS,
    commandTimeout: COMMAND_TIMEOUT_MS,
    keepAlive: KEEP_ALIVE_MS,

    // Exponential backoff: 200ms, 400ms, 800ms, ..., max 10s
    retryStrategy(times: number): number | null {
      if (times > MAX_RETRY_ATTEMPTS) {
        logger.error("Redis max retry attempts reached", {
          attempts: times,
          maxAttempts: MAX_RETRY_ATTEMPTS,
        });
        return null;
      }

      return Math.min(
        RETRY_BASE_DELAY_MS * Math.pow(2, times - 1),
        RETRY_MAX_DELAY_MS
      );
    },

    reconnectOnError(err: Error): boolean {
      const targetErrors = ["READONLY", "ECONNRESET", "ETIMEDOUT"];
      return targetErrors.some((target) => err.message.includes(target));
    },

    ...(isProduction && url.startsWith("rediss://")
      ? {
          tls: {
            rejectUnauthorized: true,
            minVersion: "TLSv1.2" as const,
          },
        }
      : {}),

    // The cache is optional: the process starts even when Redis is down
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
  };
}

export function redactRedisUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ":***@");
}

// ============================================================================
// Client Factory
// ============================================================================

export function createRedisClient(url: string, isProduction = false): Redis {
  const client = new Redis(url, buildRedisOptions(url, isProduction));
  setRedisConnectionStatus(false);
  setupRedisEventHandlers(client, url);
  return client;
}

function setupRedisEventHandlers(client: Redis, url: string): void {
  let lastErrorLogTime = 0;
  let reconnectCount = 0;

  client.on("connect", () => {
    logger.info("Redis connection established", { url: redactRedisUrl(url) });
  });

  client.on("ready", () => {
    reconnectCount = 0;
    logger.info("Redis ready to accept commands");
    setRedisConnectionStatus(true);
  });

  client.on("reconnecting", (timeUntilReconnect: number) => {
    reconnectCount++;
    logger.warn("Redis reconnecting", {
      reconnectCount,
      timeUntilReconnectMs: timeUntilReconnect,
    });
  });

  client.on("close", () => {
    logger.warn("Redis connection closed");
    setRedisConnectionStatus(false);
  });

  client.on("end", () => {
    logger.warn("Redis connection ended", { reconnectCount });
    setRedisConnectionStatus(false);
  });

  client.on("error", (err: Error) => {
    const now = Date.now();
    if (now - lastErrorLogTime >= ERROR_THROTTLE_MS) {
      logger.error("Redis error occurred", {
        error: err.message,
        name: err.name,
        reconnectCount,
      });
      lastErrorLogTime = now;
    }
  });
}

// ============================================================================
// Shared Cache Backend
// ============================================================================

/**
 * The narrow surface the cache manager and health checks need from Redis
 */
export interface SharedCacheBackend {
  get(key: string): Promise<string | null>;
  setex(key: string, ttlSeconds: number, value: string): Promise<boolean>;
  del(keys: string[]): Promise<number>;
  /** Remaining TTL in ms; -1 when the key has no expiry, -2 when it is missing */
  pttl(key: string): Promise<number>;
  scanKeys(pattern: string): Promise<string[]>;
  ping(): Promise<boolean>;
}

async function timed<T>(command: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  try {
    return await fn();
  } finally {
    trackRedisCommand(command, Date.now() - start);
  }
}

export function createRedisCacheBackend(client: Redis): SharedCacheBackend {
  return {
    get: (key) => timed("get", () => client.get(key)),
    setex: (key, ttlSeconds, value) =>
      timed("setex", async () => (await client.setex(key, ttlSeconds, value)) === "OK"),
    del: (keys) =>
      keys.length === 0 ? Promise.resolve(0) : timed("del", () => client.del(...keys)),
    pttl: (key) => timed("pttl", () => client.pttl(key)),
    scanKeys: (pattern) => timed("scan", () => scanKeys(client, pattern)),
    ping: () => timed("ping", async () => (await client.ping()) === "PONG"),
  };
}

// ============================================================================
// Health Check
// ============================================================================

export interface RedisHealthStatus {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

export async function checkRedisHealth(
  backend: Pick<SharedCacheBackend, "ping">
): Promise<RedisHealthStatus> {
  try {
    const startTime = Date.now();
    const pong = await backend.ping();
    const latencyMs = Date.now() - startTime;

    if (!pong) {
      return { healthy: false, error: "Unexpected PING response" };
    }

    logger.debug("Redis health check passed", { latencyMs });
    return { healthy: true, latencyMs };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error("Redis health check failed", { error: errorMessage });
    return { healthy: false, error: errorMessage };
  }
}

// ============================================================================
// Non-Blocking Key Scanning (Production-Safe Alternative to KEYS)
// ============================================================================

/**
 * Scan keys matching pattern using cursor-based SCAN.
 * KEYS blocks the server for the whole keyspace walk; SCAN returns in batches.
 */
export interface ScanClient {
  scan(
    cursor: string,
    matchToken: "MATCH",
    pattern: string,
    countToken: "COUNT",
    count: number
  ): Promise<[cursor: string, elements: string[]]>;
}

export async function scanKeys(
  client: ScanClient,
  pattern: string,
  count: number = 100
): Promise<string[]> {
  const allKeys: string[] = [];
  let cursor = "0";

  do {
    const [nextCursor, keys] = await client.scan(
      cursor,
      "MATCH",
      pattern,
      "COUNT",
      count
    );
    cursor = nextCursor;
    allKeys.push(...keys);
  } while (cursor !== "0");

  return allKeys;
}

/**
 * Escape glob metacharacters so a literal prefix can be used in MATCH
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}

// ============================================================================
// Graceful Shutdown
// ============================================================================

/**
 * Close Redis connection gracefully, falling back to disconnect() on timeout
 */
export async function closeRedis(client: Redis): Promise<void> {
  const SHUTDOWN_TIMEOUT_MS = 5000;
  let timer: NodeJS.Timeout | undefined;

  if (client.status === "end" || client.status === "wait") {
    client.disconnect();
    return;
  }

  logger.info("Closing Redis connection...");

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error("Redis shutdown timeout"));
      }, SHUTDOWN_TIMEOUT_MS);
    });

    await Promise.race([client.quit(), timeoutPromise]);
    logger.info("Redis connection closed gracefully");
  } catch (error) {
    logger.warn("Redis graceful shutdown failed, forcing disconnect", {
      error: error instanceof Error ? error.message : String(error),
    });
    client.disconnect();
  } finally {
    if (timer) clearTimeout(timer);
  }
}
