/**
 * Diagnostics: issue log, slow-request and connection-problem tracking
 *
 * - Every issue goes into a ring of the latest 1000
 * - Warnings and errors also go into a recent list kept for 24 hours, capped
 *   at the same 1000
 * - Issues whose context carries `errorType` are tallied as error patterns
 * - Slow requests and connection issues are kept per key for 1 hour
 *
 * runSelfCheck() turns those signals (plus host resource usage) into warning
 * issues, then purges stale data and resets the pattern tallies. The runtime
 * runs it every 5 minutes.
 */

import { logger } from "../../utils/logger.js";
import { recordDiagnosticIssue } from "../../utils/metrics.js";
import {
  clearRegisteredInterval,
  registerInterval,
} from "../../utils/intervals.js";
import { systemClock, type Clock } from "../../types/common.js";
import type { ResourceSampler } from "./systemMonitor.js";

// ============================================================================
// Types
// ============================================================================

export type IssueSeverity = "info" | "warning" | "error";

export interface Issue {
  timestamp: number;
  category: string;
  severity: IssueSeverity;
  message: string;
  context: Record<string, unknown>;
  stackSnapshot: string;
}

interface SlowRequestEntry {
  timestamp: number;
  durationMs: number;
  context: Record<string, unknown>;
}

interface ConnectionIssueEntry {
  timestamp: number;
  error: string;
  errorType: string;
  context: Record<string, unknown>;
}

export interface DiagnosticsSnapshot {
  issues: {
    current: number;
    total: number;
    bySeverity: Record<IssueSeverity, number>;
    byCategory: Record<string, number>;
  };
  performance: {
    slowEndpoints: Record<string, { count: number; avgDurationMs: number }>;
  };
  connections: {
    issues: Record<string, { count: number; lastError: string | null }>;
  };
  errorPatterns: Record<string, number>;
}

export interface DiagnosticsOptions {
  clock?: Clock;
  /** Host resource source for the self-check; resource checks are skipped without one */
  sampler?: ResourceSampler;
  selfCheckIntervalMs?: number;
}

// ============================================================================
// Thresholds
// ============================================================================

const MAX_ISSUE_HISTORY = 1000;
const ISSUE_RETENTION_MS = 24 * 60 * 60 * 1000;
const SIGNAL_RETENTION_MS = 60 * 60 * 1000;

const RESOURCE_USAGE_THRESHOLD_PERCENT = 80;
const ERROR_PATTERN_THRESHOLD = 10;
const SLOW_ENDPOINT_THRESHOLD = 5;

const STACK_SNAPSHOT_FRAMES = 10;

// ============================================================================
// Diagnostics
// ============================================================================

export class Diagnostics {
  private issueHistory: Issue[] = [];
  private recentIssues: Issue[] = [];
  private readonly errorPatterns = new Map<string, number>();
  private readonly slowRequests = new Map<string, SlowRequestEntry[]>();
  private readonly connectionIssues = new Map<string, ConnectionIssueEntry[]>();

  private readonly clock: Clock;
  private readonly sampler: ResourceSampler | undefined;
  private readonly selfCheckIntervalMs: number;
  private selfCheckHandle: NodeJS.Timeout | null = null;

  constructor(options: DiagnosticsOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.sampler = options.sampler;
    this.selfCheckIntervalMs = options.selfCheckIntervalMs ?? 300_000;
  }

  recordIssue(
    category: string,
    severity: IssueSeverity,
    message: string,
    context: Record<string, unknown> = {}
  ): Issue {
    const issue: Issue = {
      timestamp: this.clock.now(),
      category,
      severity,
      message,
      context: { ...context },
      stackSnapshot: captureStack(),
    };

    this.issueHistory.push(issue);
    if (this.issueHistory.length > MAX_ISSUE_HISTORY) {
      this.issueHistory.splice(0, this.issueHistory.length - MAX_ISSUE_HISTORY);
    }

    if (severity !== "info") {
      this.recentIssues.push(issue);
      if (this.recentIssues.length > MAX_ISSUE_HISTORY) {
        this.recentIssues.splice(0, this.recentIssues.length - MAX_ISSUE_HISTORY);
      }
    }

    const errorType = context["errorType"];
    if (typeof errorType === "string") {
      this.errorPatterns.set(errorType, (this.errorPatterns.get(errorType) ?? 0) + 1);
    }

    recordDiagnosticIssue(category, severity);

    const logContext = { category, ...context };
    if (severity === "error") {
      logger.error(message, logContext);
    } else if (severity === "warning") {
      logger.warn(message, logContext);
    } else {
      logger.info(message, logContext);
    }

    return issue;
  }

  recordSlowRequest(
    endpoint: string,
    durationMs: number,
    context: Record<string, unknown> = {}
  ): void {
    const now = this.clock.now();
    const entries = (this.slowRequests.get(endpoint) ?? []).filter(
      (entry) => now - entry.timestamp <= SIGNAL_RETENTION_MS
    );
    entries.push({ timestamp: now, durationMs, context: { ...context } });
    this.slowRequests.set(endpoint, entries);
  }

  recordConnectionIssue(
    host: string,
    error: Error,
    context: Record<string, unknown> = {}
  ): void {
    const now = this.clock.now();
    const entries = (this.connectionIssues.get(host) ?? []).filter(
      (entry) => now - entry.timestamp <= SIGNAL_RETENTION_MS
    );
    entries.push({
      timestamp: now,
      error: error.message,
      errorType: error.name,
      context: { ...context },
    });
    this.connectionIssues.set(host, entries);
  }

  /**
   * One diagnostic pass; returns the issues it raised
   */
  async runSelfCheck(): Promise<Issue[]> {
    const raised: Issue[] = [];

    if (this.sampler) {
      raised.push(...(await this.checkSystemHealth(this.sampler)));
    }
    raised.push(...this.analyzeErrorPatterns());
    raised.push(...this.checkPerformance());
    this.cleanupOldData();

    logger.debug("Diagnostics self-check completed", { issuesRaised: raised.length });
    return raised;
  }

  getDiagnostics(): DiagnosticsSnapshot {
    const bySeverity: Record<IssueSeverity, number> = { info: 0, warning: 0, error: 0 };
    const byCategory: Record<string, number> = {};

    for (const issue of this.recentIssues) {
      bySeverity[issue.severity]++;
      byCategory[issue.category] = (byCategory[issue.category] ?? 0) + 1;
    }

    const slowEndpoints: DiagnosticsSnapshot["performance"]["slowEndpoints"] = {};
    for (const [endpoint, entries] of this.slowRequests) {
      if (entries.length === 0) continue;
      slowEndpoints[endpoint] = {
        count: entries.length,
        avgDurationMs: averageDuration(entries),
      };
    }

    const connectionSummary: DiagnosticsSnapshot["connections"]["issues"] = {};
    for (const [host, entries] of this.connectionIssues) {
      const last = entries[entries.length - 1];
      connectionSummary[host] = {
        count: entries.length,
        lastError: last ? last.error : null,
      };
    }

    return {
      issues: {
        current: this.recentIssues.length,
        total: this.issueHistory.length,
        bySeverity,
        byCategory,
      },
      performance: { slowEndpoints },
      connections: { issues: connectionSummary },
      errorPatterns: Object.fromEntries(this.errorPatterns),
    };
  }

  /**
   * Latest issues, newest last
   */
  getRecentIssues(limit = 50): Issue[] {
    return this.issueHistory
      .slice(-limit)
      .map((issue) => ({ ...issue, context: { ...issue.context } }));
  }

  start(): void {
    if (this.selfCheckHandle) return;
    this.selfCheckHandle = registerInterval(
      async () => {
        await this.runSelfCheck();
      },
      this.selfCheckIntervalMs,
      "diagnostics-self-check"
    );
  }

  stop(): void {
    if (!this.selfCheckHandle) return;
    clearRegisteredInterval(this.selfCheckHandle);
    this.selfCheckHandle = null;
  }

  // ==========================================================================
  // Self-check steps
  // ==========================================================================

  private async checkSystemHealth(sampler: ResourceSampler): Promise<Issue[]> {
    const sample = await sampler.sample();
    const raised: Issue[] = [];

    const readings: Array<[string, string, number | null]> = [
      ["CPU", "cpuPercent", sample.cpuPercent],
      ["memory", "memoryPercent", sample.memoryPercent],
      ["disk", "diskPercent", sample.diskPercent],
    ];

    for (const [label, key, value] of readings) {
      if (value !== null && value > RESOURCE_USAGE_THRESHOLD_PERCENT) {
        raised.push(
          this.recordIssue(
            "system",
            "warning",
            `High ${label} usage: ${value.toFixed(1)}%`,
            { [key]: value }
          )
        );
      }
    }

    return raised;
  }

  private analyzeErrorPatterns(): Issue[] {
    const raised: Issue[] = [];

    for (const [errorType, count] of Array.from(this.errorPatterns)) {
      if (count >= ERROR_PATTERN_THRESHOLD) {
        raised.push(
          this.recordIssue(
            "errors",
            "warning",
            `Frequent error pattern detected: ${errorType}`,
            { errorType, count }
          )
        );
      }
    }

    return raised;
  }

  private checkPerformance(): Issue[] {
    const raised: Issue[] = [];

    for (const [endpoint, entries] of this.slowRequests) {
      if (entries.length >= SLOW_ENDPOINT_THRESHOLD) {
        raised.push(
          this.recordIssue("performance", "warning", `Slow endpoint detected: ${endpoint}`, {
            endpoint,
            avgDurationMs: averageDuration(entries),
            requestCount: entries.length,
          })
        );
      }
    }

    return raised;
  }

  private cleanupOldData(): void {
    const now = this.clock.now();

    this.recentIssues = this.recentIssues.filter(
      (issue) => now - issue.timestamp <= ISSUE_RETENTION_MS
    );

    pruneSignals(this.slowRequests, now);
    pruneSignals(this.connectionIssues, now);

    this.errorPatterns.clear();
  }
}

function pruneSignals<T extends { timestamp: number }>(
  signals: Map<string, T[]>,
  now: number
): void {
  for (const [key, entries] of signals) {
    const kept = entries.filter((entry) => now - entry.timestamp <= SIGNAL_RETENTION_MS);
    if (kept.length === 0) {
      signals.delete(key);
    } else {
      signals.set(key, kept);
    }
  }
}

function averageDuration(entries: SlowRequestEntry[]): number {
  return entries.reduce((acc, entry) => acc + entry.durationMs, 0) / entries.length;
}

function captureStack(): string {
  const stack = new Error().stack ?? "";
  // Drop the "Error" header and the frames inside this module
  return stack.split("\n").slice(3, 3 + STACK_SNAPSHOT_FRAMES).join("\n");
}
