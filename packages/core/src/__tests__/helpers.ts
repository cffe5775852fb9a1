import pino from 'pino';
import type { MetricSource } from '../metrics/MetricSource.js';

export const silentLogger = pino({ level: 'silent' });

export interface FakeValues {
  cpu?: number | Error;
  ram?: number | Error;
  disk?: number | Error;
}

/**
 * A MetricSource that reports fixed values, or rejects with a given error.
 * Values may be changed between samples through `set`.
 */
export class FakeMetricSource implements MetricSource {
  private values: Required<FakeValues>;

  constructor(values: FakeValues = {}) {
    this.values = { cpu: 10, ram: 20, disk: 30, ...values };
  }

  set(values: FakeValues): void {
    this.values = { ...this.values, ...values };
  }

  cpuPercent(): Promise<number> {
    return settle(this.values.cpu);
  }

  ramPercent(): Promise<number> {
    return settle(this.values.ram);
  }

  diskPercent(): Promise<number> {
    return settle(this.values.disk);
  }
}

function settle(value: number | Error): Promise<number> {
  return value instanceof Error ? Promise.reject(value) : Promise.resolve(value);
}
