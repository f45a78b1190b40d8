/**
 * Bounded session pool
 *
 * - Sessions are created lazily, never more than `maxSize` alive at once
 * - acquire() waits FIFO for a released session, up to the acquire timeout
 * - release() hands the session to the oldest waiter before idling it
 *
 * The pool knows nothing about retries; a failed acquire rejects with
 * ConnectionExhaustedError and the caller decides what to do.
 */

import { logger } from "../../utils/logger.js";
import { ApiError, ConnectionExhaustedError, toError } from "../../utils/errors.js";
import { recordPoolExhausted, setPoolSessions } from "../../utils/metrics.js";
import type { HttpTransport, TransportSession } from "./types.js";

export interface PooledSession {
  close(): Promise<void>;
}

export interface ConnectionPoolConfig {
  maxSize: number;
  /** Default wait for acquire() (ms) */
  acquireTimeoutMs: number;
}

export interface ConnectionPoolStats {
  active: number;
  available: number;
  inUse: number;
  waiting: number;
  maxSize: number;
}

interface Waiter<S> {
  resolve: (session: S) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

const DEFAULT_CONFIG: ConnectionPoolConfig = {
  maxSize: 10,
  acquireTimeoutMs: 30_000,
};

export class ConnectionPool<S extends PooledSession = TransportSession> {
  private readonly idle: S[] = [];
  private readonly checkedOut = new Set<S>();
  private readonly waiters: Waiter<S>[] = [];
  private readonly config: ConnectionPoolConfig;
  private active = 0;
  private draining = false;

  constructor(
    private readonly createSession: () => S,
    config: Partial<ConnectionPoolConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  acquire(timeoutMs: number = this.config.acquireTimeoutMs): Promise<S> {
    if (this.draining) {
      return Promise.reject(poolClosedError());
    }

    const idleSession = this.idle.pop();
    if (idleSession) {
      return Promise.resolve(this.checkOut(idleSession));
    }

    if (this.active < this.config.maxSize) {
      let session: S;
      try {
        session = this.createSession();
      } catch (error) {
        logger.error("Failed to create pooled session", { error });
        return Promise.reject(toError(error));
      }

      this.active++;
      logger.debug("Created pooled session", {
        active: this.active,
        maxSize: this.config.maxSize,
      });
      return Promise.resolve(this.checkOut(session));
    }

    if (timeoutMs <= 0) {
      recordPoolExhausted();
      return Promise.reject(new ConnectionExhaustedError(this.config.maxSize, timeoutMs));
    }

    return new Promise<S>((resolve, reject) => {
      const waiter: Waiter<S> = { resolve, reject, timer: null };

      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        recordPoolExhausted();
        logger.warn("Connection pool acquire timed out", {
          timeoutMs,
          maxSize: this.config.maxSize,
          waiting: this.waiters.length,
        });
        reject(new ConnectionExhaustedError(this.config.maxSize, timeoutMs));
      }, timeoutMs);

      this.waiters.push(waiter);
    });
  }

  release(session: S): void {
    if (!this.checkedOut.delete(session)) {
      logger.warn("Ignoring release of a session the pool did not issue");
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      this.checkedOut.add(session);
      this.updateGauges();
      waiter.resolve(session);
      return;
    }

    if (!this.draining && this.idle.length < this.config.maxSize) {
      this.idle.push(session);
      this.updateGauges();
      return;
    }

    this.active--;
    this.updateGauges();
    this.closeSession(session);
  }

  /**
   * Acquire, run fn, release, whatever fn does
   */
  async withConnection<T>(
    fn: (session: S) => Promise<T>,
    timeoutMs?: number
  ): Promise<T> {
    const session = await this.acquire(timeoutMs);
    try {
      return await fn(session);
    } finally {
      this.release(session);
    }
  }

  getStats(): ConnectionPoolStats {
    return {
      active: this.active,
      available: this.idle.length,
      inUse: this.checkedOut.size,
      waiting: this.waiters.length,
      maxSize: this.config.maxSize,
    };
  }

  /**
   * Close idle sessions and reject waiters. Sessions still checked out are
   * closed when released.
   */
  async drain(): Promise<void> {
    this.draining = true;

    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(poolClosedError());
    }

    const idleSessions = this.idle.splice(0);
    this.active -= idleSessions.length;
    this.updateGauges();

    await Promise.all(idleSessions.map((session) => this.closeSessionAsync(session)));

    logger.info("Connection pool drained", {
      closed: idleSessions.length,
      stillInUse: this.checkedOut.size,
    });
  }

  private checkOut(session: S): S {
    this.checkedOut.add(session);
    this.updateGauges();
    return session;
  }

  private updateGauges(): void {
    setPoolSessions(this.active, this.idle.length);
  }

  private closeSession(session: S): void {
    void this.closeSessionAsync(session);
  }

  private async closeSessionAsync(session: S): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      logger.warn("Failed to close pooled session", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function poolClosedError(): ApiError {
  return new ApiError("Connection pool is shutting down", "network", {
    statusCode: 503,
    code: "POOL_DRAINED",
  });
}

// ============================================================================
// HTTP session pool
// ============================================================================

export interface SessionPoolOptions extends Partial<ConnectionPoolConfig> {
  userAgent?: string;
}

export function defaultSessionHeaders(userAgent: string): Record<string, string> {
  return {
    "Content-Type": "application/json",
    Accept: "application/json",
    "User-Agent": userAgent,
  };
}

/**
 * Pool of transport sessions, each opened with the default JSON headers
 */
export function createSessionPool(
  transport: HttpTransport,
  options: SessionPoolOptions = {}
): ConnectionPool<TransportSession> {
  const { userAgent = "UpstreamClient/1.0", ...config } = options;
  const headers = defaultSessionHeaders(userAgent);
  return new ConnectionPool(() => transport.openSession(headers), config);
}
