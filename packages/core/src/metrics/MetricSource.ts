import { cpus, freemem, totalmem } from 'node:os';
import { statfs } from 'node:fs/promises';
import type { StatsFs } from 'node:fs';
import {
  DEFAULT_CPU_WINDOW,
  DEFAULT_DISK_PATH,
  MetricUnavailableError,
  parseDuration,
} from '@hostwatch/shared';

/**
 * Capability interface over the OS. Each call resolves to a percentage in
 * [0, 100] or rejects with MetricUnavailableError.
 */
export interface MetricSource {
  cpuPercent(): Promise<number>;
  ramPercent(): Promise<number>;
  diskPercent(): Promise<number>;
}

export interface OsMetricSourceOptions {
  /** Mount point whose usage is reported as disk%. */
  diskPath?: string;
  /** How long the first CPU sample measures for, in ms. */
  cpuWindow?: number;
}

interface CpuTimes {
  idle: number;
  total: number;
}

export class OsMetricSource implements MetricSource {
  private diskPath: string;
  private cpuWindow: number;
  private lastCpuTimes: CpuTimes[] | null = null;

  constructor(options: OsMetricSourceOptions = {}) {
    this.diskPath = options.diskPath ?? DEFAULT_DISK_PATH;
    this.cpuWindow = options.cpuWindow ?? parseDuration(DEFAULT_CPU_WINDOW);
  }

  async cpuPercent(): Promise<number> {
    let previous = this.lastCpuTimes;
    if (!previous) {
      previous = readCpuTimes();
      if (this.cpuWindow > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.cpuWindow));
      }
    }

    const current = readCpuTimes();
    this.lastCpuTimes = current;

    if (current.length === 0) {
      throw new MetricUnavailableError('CPU', 'no CPU information reported');
    }

    const usagePerCore = this.calculateCpuUsage(previous, current);
    if (usagePerCore.length === 0) {
      throw new MetricUnavailableError('CPU', 'no CPU time elapsed between samples');
    }
    return usagePerCore.reduce((a, b) => a + b, 0) / usagePerCore.length;
  }

  async ramPercent(): Promise<number> {
    const total = totalmem();
    if (total <= 0) {
      throw new MetricUnavailableError('RAM', 'total memory reported as zero');
    }
    return ((total - freemem()) / total) * 100;
  }

  async diskPercent(): Promise<number> {
    let stats: StatsFs;
    try {
      stats = await statfs(this.diskPath);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new MetricUnavailableError('DISK', msg, { cause: err });
    }

    const total = stats.blocks * stats.bsize;
    if (total <= 0) {
      throw new MetricUnavailableError('DISK', `no capacity reported for ${this.diskPath}`);
    }
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    return (used / total) * 100;
  }

  // Cores whose counters did not advance are left out of the average.
  private calculateCpuUsage(previous: CpuTimes[], current: CpuTimes[]): number[] {
    const usage: number[] = [];

    for (let i = 0; i < current.length; i++) {
      const last = previous[i];
      if (!last) continue;

      const totalDiff = current[i].total - last.total;
      const idleDiff = current[i].idle - last.idle;
      if (totalDiff > 0) {
        usage.push(((totalDiff - idleDiff) / totalDiff) * 100);
      }
    }

    return usage;
  }
}

function readCpuTimes(): CpuTimes[] {
  return cpus().map((cpu) => {
    const total = Object.values(cpu.times).reduce((a, b) => a + b, 0);
    return { idle: cpu.times.idle, total };
  });
}
