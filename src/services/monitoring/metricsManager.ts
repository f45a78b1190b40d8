/**
 * In-process time series store
 *
 * Samples are appended per metric name and summarized over a trailing window.
 * A compaction loop drops samples older than the retention period. The
 * Prometheus registry in utils/metrics.ts is the exported view; this store
 * backs getStats() and the runtime status report.
 */

import { logger } from "../../utils/logger.js";
import {
  clearRegisteredInterval,
  registerInterval,
} from "../../utils/intervals.js";
import { systemClock, type Clock } from "../../types/common.js";

export interface Metric {
  readonly timestamp: number;
  readonly value: number;
  readonly labels: Readonly<Record<string, string>>;
}

export interface MetricStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
}

export interface MetricsManagerOptions {
  /** Samples older than this are dropped on compaction (default: 1 hour) */
  retentionMs?: number;
  /** How often compaction runs once started (default: 5 minutes) */
  compactionIntervalMs?: number;
  clock?: Clock;
}

export const DEFAULT_STATS_WINDOW_MS = 300_000;

const EMPTY_STATS: MetricStats = {
  count: 0,
  min: 0,
  max: 0,
  mean: 0,
  median: 0,
  p95: 0,
};

export class MetricsManager {
  private readonly series = new Map<string, Metric[]>();
  private readonly retentionMs: number;
  private readonly compactionIntervalMs: number;
  private readonly clock: Clock;
  private compactionHandle: NodeJS.Timeout | null = null;

  constructor(options: MetricsManagerOptions = {}) {
    this.retentionMs = options.retentionMs ?? 3_600_000;
    this.compactionIntervalMs = options.compactionIntervalMs ?? 300_000;
    this.clock = options.clock ?? systemClock;
  }

  record(name: string, value: number, labels: Record<string, string> = {}): void {
    const metric: Metric = Object.freeze({
      timestamp: this.clock.now(),
      value,
      labels: Object.freeze({ ...labels }),
    });

    const samples = this.series.get(name);
    if (samples) {
      samples.push(metric);
    } else {
      this.series.set(name, [metric]);
    }
  }

  /**
   * Summary of samples with `now - timestamp <= windowMs`.
   * p95 is the sorted value at index floor(0.95 * n).
   */
  getStats(name: string, windowMs: number = DEFAULT_STATS_WINDOW_MS): MetricStats {
    const now = this.clock.now();
    const values = (this.series.get(name) ?? [])
      .filter((m) => now - m.timestamp <= windowMs)
      .map((m) => m.value);

    if (values.length === 0) {
      return { ...EMPTY_STATS };
    }

    const sorted = [...values].sort((a, b) => a - b);
    const count = sorted.length;
    const sum = sorted.reduce((acc, v) => acc + v, 0);
    const mid = Math.floor(count / 2);
    const median =
      count % 2 === 0
        ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2
        : sorted[mid] ?? 0;
    const p95Index = Math.min(Math.floor(count * 0.95), count - 1);

    return {
      count,
      min: sorted[0] ?? 0,
      max: sorted[count - 1] ?? 0,
      mean: sum / count,
      median,
      p95: sorted[p95Index] ?? 0,
    };
  }

  names(): string[] {
    return Array.from(this.series.keys());
  }

  /**
   * Drop samples past the retention period; returns how many were removed
   */
  compact(): number {
    const now = this.clock.now();
    let removed = 0;

    for (const [name, samples] of this.series) {
      const kept = samples.filter((m) => now - m.timestamp <= this.retentionMs);
      removed += samples.length - kept.length;

      if (kept.length === 0) {
        this.series.delete(name);
      } else {
        this.series.set(name, kept);
      }
    }

    if (removed > 0) {
      logger.debug("Compacted metric samples", { removed });
    }

    return removed;
  }

  start(): void {
    if (this.compactionHandle) return;
    this.compactionHandle = registerInterval(
      () => {
        this.compact();
      },
      this.compactionIntervalMs,
      "metrics-compaction"
    );
  }

  stop(): void {
    if (!this.compactionHandle) return;
    clearRegisteredInterval(this.compactionHandle);
    this.compactionHandle = null;
  }
}
