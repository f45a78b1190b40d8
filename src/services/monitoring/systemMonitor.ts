/**
 * Host resource sampling for diagnostics and the status report.
 *
 * CPU is the process's share since the previous sample (process.cpuUsage
 * delta); memory and disk are host-wide percentages.
 */

import * as os from "node:os";
import { statfs } from "node:fs/promises";
import { logger } from "../../utils/logger.js";

export interface SystemSample {
  cpuPercent: number;
  memoryPercent: number;
  /** null when the filesystem could not be queried */
  diskPercent: number | null;
  rssBytes: number;
  heapUsedBytes: number;
  loadAvg: [number, number, number];
  uptimeSeconds: number;
}

export interface ResourceSampler {
  sample(): Promise<SystemSample>;
}

export class SystemMonitor implements ResourceSampler {
  private lastCpuUsage = process.cpuUsage();
  private lastCpuTime = Date.now();

  constructor(private readonly diskPath: string = "/") {}

  async sample(): Promise<SystemSample> {
    const memoryUsage = process.memoryUsage();
    const totalMemory = os.totalmem();
    const [load1 = 0, load5 = 0, load15 = 0] = os.loadavg();

    return {
      cpuPercent: this.calculateCpuPercentage(),
      memoryPercent: ((totalMemory - os.freemem()) / totalMemory) * 100,
      diskPercent: await this.diskUsagePercent(),
      rssBytes: memoryUsage.rss,
      heapUsedBytes: memoryUsage.heapUsed,
      loadAvg: [load1, load5, load15],
      uptimeSeconds: process.uptime(),
    };
  }

  private calculateCpuPercentage(): number {
    const currentUsage = process.cpuUsage(this.lastCpuUsage);
    const currentTime = Date.now();
    const deltaTime = currentTime - this.lastCpuTime;

    this.lastCpuUsage = process.cpuUsage();
    this.lastCpuTime = currentTime;

    if (deltaTime <= 0) return 0;

    // cpuUsage() is in microseconds
    const cpuTimeMs = (currentUsage.user + currentUsage.system) / 1000;

    // Can exceed 100% on multi-core hosts
    return Math.min((cpuTimeMs / deltaTime) * 100, 100);
  }

  private async diskUsagePercent(): Promise<number | null> {
    try {
      const stats = await statfs(this.diskPath);
      if (stats.blocks === 0) return null;
      return ((stats.blocks - stats.bfree) / stats.blocks) * 100;
    } catch (error) {
      logger.warn("Failed to read disk usage", {
        path: this.diskPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
