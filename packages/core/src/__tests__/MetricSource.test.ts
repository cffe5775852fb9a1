import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { cpus, freemem, totalmem } from 'node:os';
import type { CpuInfo } from 'node:os';
import { statfs } from 'node:fs/promises';
import type { StatsFs } from 'node:fs';
import { MetricUnavailableError } from '@hostwatch/shared';
import { OsMetricSource } from '../metrics/MetricSource.js';

// Mock the OS counters; everything else stays real
vi.mock('node:os', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:os')>();
  return { ...actual, cpus: vi.fn(), totalmem: vi.fn(), freemem: vi.fn() };
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, statfs: vi.fn() };
});

function core(user: number, idle: number): CpuInfo {
  return { model: 'test-cpu', speed: 2400, times: { user, nice: 0, sys: 0, idle, irq: 0 } };
}

function fsStats(blocks: number, bfree: number): StatsFs {
  return { type: 0, bsize: 4096, blocks, bfree, bavail: bfree, files: 100, ffree: 50 };
}

describe('OsMetricSource', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('cpuPercent', () => {
    it('should average the busy share of every core', async () => {
      vi.mocked(cpus)
        .mockReturnValueOnce([core(100, 900), core(200, 800)])
        .mockReturnValueOnce([core(150, 950), core(350, 850)]);
      const source = new OsMetricSource({ cpuWindow: 0 });

      // core 0: 50 of 100 busy, core 1: 150 of 200 busy
      await expect(source.cpuPercent()).resolves.toBe(62.5);
    });

    it('should measure later calls against the previous sample', async () => {
      vi.mocked(cpus)
        .mockReturnValueOnce([core(100, 900), core(200, 800)])
        .mockReturnValueOnce([core(150, 950), core(350, 850)])
        .mockReturnValueOnce([core(250, 1050), core(350, 950)]);
      const source = new OsMetricSource({ cpuWindow: 0 });

      await source.cpuPercent();
      const second = await source.cpuPercent();

      expect(second).toBe(25);
      expect(cpus).toHaveBeenCalledTimes(3);
    });

    it('should wait for the CPU window on the first call', async () => {
      vi.useFakeTimers();
      vi.mocked(cpus)
        .mockReturnValueOnce([core(100, 900)])
        .mockReturnValueOnce([core(200, 900)]);
      const source = new OsMetricSource({ cpuWindow: 1000 });

      const pending = source.cpuPercent();
      expect(cpus).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toBe(100);
      expect(cpus).toHaveBeenCalledTimes(2);
    });

    it('should leave out cores whose counters did not move', async () => {
      vi.mocked(cpus)
        .mockReturnValueOnce([core(100, 900), core(200, 800)])
        .mockReturnValueOnce([core(100, 900), core(250, 850)]);
      const source = new OsMetricSource({ cpuWindow: 0 });

      await expect(source.cpuPercent()).resolves.toBe(50);
    });

    it('should reject when no CPU time elapsed between samples', async () => {
      vi.mocked(cpus).mockReturnValue([core(100, 900)]);
      const source = new OsMetricSource({ cpuWindow: 0 });

      const error = await source.cpuPercent().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MetricUnavailableError);
      expect(error).toMatchObject({
        metric: 'CPU',
        message: 'Metric unavailable: CPU (no CPU time elapsed between samples)',
      });
    });

    it('should reject when the OS reports no CPUs', async () => {
      vi.mocked(cpus).mockReturnValue([]);
      const source = new OsMetricSource({ cpuWindow: 0 });

      await expect(source.cpuPercent()).rejects.toThrow(
        'Metric unavailable: CPU (no CPU information reported)',
      );
    });
  });

  describe('ramPercent', () => {
    it('should report used memory as a share of the total', async () => {
      vi.mocked(totalmem).mockReturnValue(16000);
      vi.mocked(freemem).mockReturnValue(4000);

      await expect(new OsMetricSource().ramPercent()).resolves.toBe(75);
    });

    it('should reject when total memory is zero', async () => {
      vi.mocked(totalmem).mockReturnValue(0);

      await expect(new OsMetricSource().ramPercent()).rejects.toBeInstanceOf(MetricUnavailableError);
    });
  });

  describe('diskPercent', () => {
    it('should report used blocks of the configured mount point', async () => {
      vi.mocked(statfs).mockResolvedValue(fsStats(1000, 250));
      const source = new OsMetricSource({ diskPath: '/data' });

      await expect(source.diskPercent()).resolves.toBe(75);
      expect(statfs).toHaveBeenCalledWith('/data');
    });

    it('should wrap a statfs failure as an unavailable disk metric', async () => {
      const cause = Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' });
      vi.mocked(statfs).mockRejectedValue(cause);

      const error = await new OsMetricSource({ diskPath: '/missing' })
        .diskPercent()
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MetricUnavailableError);
      expect(error).toMatchObject({
        metric: 'DISK',
        message: 'Metric unavailable: DISK (ENOENT: no such file or directory)',
        cause,
      });
    });

    it('should reject a file system that reports no capacity', async () => {
      vi.mocked(statfs).mockResolvedValue(fsStats(0, 0));

      await expect(new OsMetricSource({ diskPath: '/data' }).diskPercent()).rejects.toThrow(
        'Metric unavailable: DISK (no capacity reported for /data)',
      );
    });
  });
});
