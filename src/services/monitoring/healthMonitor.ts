/**
 * Service health probes with result caching
 *
 * Each service registers a probe; check() runs it at most once per cache
 * period and remembers the answer. A probe that throws counts as unhealthy.
 */

import net from "node:net";
import { logger } from "../../utils/logger.js";
import { setUpstreamHealth } from "../../utils/metrics.js";
import { checkRedisHealth, type SharedCacheBackend } from "../../utils/redis.js";
import { systemClock, type Clock } from "../../types/common.js";

export type HealthProbe = () => Promise<boolean>;

export interface HealthMonitorOptions {
  /** How long a probe result is reused (default: 60s) */
  cacheMs?: number;
  clock?: Clock;
}

interface CachedResult {
  healthy: boolean;
  checkedAt: number;
}

export class HealthMonitor {
  private readonly probes = new Map<string, HealthProbe>();
  private readonly results = new Map<string, CachedResult>();
  private readonly cacheMs: number;
  private readonly clock: Clock;

  constructor(options: HealthMonitorOptions = {}) {
    this.cacheMs = options.cacheMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
  }

  register(service: string, probe: HealthProbe): void {
    this.probes.set(service, probe);
    this.results.delete(service);
  }

  services(): string[] {
    return Array.from(this.probes.keys());
  }

  async check(service: string): Promise<boolean> {
    const probe = this.probes.get(service);
    if (!probe) {
      logger.warn("Health check requested for unknown service", { service });
      return false;
    }

    const now = this.clock.now();
    const cached = this.results.get(service);
    if (cached && now - cached.checkedAt < this.cacheMs) {
      return cached.healthy;
    }

    let healthy: boolean;
    try {
      healthy = await probe();
    } catch (error) {
      logger.warn("Health probe failed", {
        service,
        error: error instanceof Error ? error.message : String(error),
      });
      healthy = false;
    }

    this.results.set(service, { healthy, checkedAt: this.clock.now() });
    setUpstreamHealth(service, healthy);
    return healthy;
  }

  async checkAll(): Promise<Record<string, boolean>> {
    const entries = await Promise.all(
      this.services().map(async (service) => [service, await this.check(service)] as const)
    );
    return Object.fromEntries(entries);
  }
}

// ============================================================================
// Probes
// ============================================================================

export function redisProbe(backend: Pick<SharedCacheBackend, "ping">): HealthProbe {
  return async () => (await checkRedisHealth(backend)).healthy;
}

/**
 * TCP reachability of the host behind a base URL
 */
export function tcpProbe(baseUrl: string, timeoutMs = 5_000): HealthProbe {
  const url = new URL(baseUrl);
  const port = url.port
    ? Number.parseInt(url.port, 10)
    : url.protocol === "https:"
      ? 443
      : 80;

  return () =>
    new Promise<boolean>((resolve) => {
      const socket = net.createConnection({ host: url.hostname, port });
      const finish = (healthy: boolean) => {
        socket.destroy();
        resolve(healthy);
      };

      socket.setTimeout(timeoutMs);
      socket.once("connect", () => finish(true));
      socket.once("timeout", () => finish(false));
      socket.once("error", (error) => {
        logger.debug("TCP health probe failed", {
          host: url.hostname,
          port,
          error: error.message,
        });
        finish(false);
      });
    });
}
