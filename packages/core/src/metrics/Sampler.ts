import type pino from 'pino';
import type { MetricName, MetricValue, Reading } from '@hostwatch/shared';
import {
  DEFAULT_SAMPLER_TIMEOUT,
  MetricUnavailableError,
  getLogger,
  parseDuration,
} from '@hostwatch/shared';
import type { MetricSource } from './MetricSource.js';

export interface SamplerOptions {
  /** Per-metric deadline in ms; a query that takes longer yields the sentinel. */
  timeout?: number;
  now?: () => Date;
  logger?: pino.Logger;
  onUnavailable?: (error: MetricUnavailableError) => void;
}

/**
 * Produces one Reading per call. A metric that cannot be read is replaced by
 * the `null` sentinel so the other two are still recorded; `sample()` never
 * rejects.
 */
export class Sampler {
  private source: MetricSource;
  private timeout: number;
  private now: () => Date;
  private logger: pino.Logger;
  private onUnavailable?: (error: MetricUnavailableError) => void;

  constructor(source: MetricSource, options: SamplerOptions = {}) {
    this.source = source;
    this.timeout = options.timeout ?? parseDuration(DEFAULT_SAMPLER_TIMEOUT);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger();
    this.onUnavailable = options.onUnavailable;
  }

  async sample(): Promise<Reading> {
    const timestamp = this.now();

    const [cpu, ram, disk] = await Promise.all([
      this.read('CPU', () => this.source.cpuPercent()),
      this.read('RAM', () => this.source.ramPercent()),
      this.read('DISK', () => this.source.diskPercent()),
    ]);

    return Object.freeze({ timestamp, cpu, ram, disk });
  }

  private async read(metric: MetricName, query: () => Promise<number>): Promise<MetricValue> {
    let value: number;
    try {
      value = await this.withDeadline(metric, query);
    } catch (err) {
      this.reportUnavailable(
        err instanceof MetricUnavailableError
          ? err
          : new MetricUnavailableError(metric, err instanceof Error ? err.message : String(err), {
              cause: err,
            }),
      );
      return null;
    }

    if (!Number.isFinite(value)) {
      this.reportUnavailable(new MetricUnavailableError(metric, `non-numeric value ${value}`));
      return null;
    }

    const clamped = Math.min(100, Math.max(0, value));
    return Math.round(clamped * 100) / 100;
  }

  private withDeadline(metric: MetricName, query: () => Promise<number>): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new MetricUnavailableError(metric, `timed out after ${this.timeout}ms`));
      }, this.timeout);

      query().then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
    });
  }

  private reportUnavailable(error: MetricUnavailableError): void {
    this.logger.warn({ metric: error.metric, err: error }, 'Metric unavailable, recording as unknown');
    this.onUnavailable?.(error);
  }
}
