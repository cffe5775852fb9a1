import { max, mean, min } from 'simple-statistics';
import type { MetricName, MetricValue, Reading } from '@hostwatch/shared';
import { readingValue } from '@hostwatch/shared';

export interface MetricSummary {
  average: number | null;
  min: number | null;
  max: number | null;
  /** Readings that held a value for this metric. */
  samples: number;
}

export interface ReadingSummary {
  samples: number;
  from: Date | null;
  to: Date | null;
  metrics: Record<MetricName, MetricSummary>;
  /** Readings whose CPU was strictly above `threshold`. */
  aboveThreshold: number;
  threshold: number;
}

export interface HourlyRow {
  hour: Date;
  samples: number;
  cpu: MetricValue;
  ram: MetricValue;
  disk: MetricValue;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Average, minimum and maximum per metric over readings sorted oldest first.
 * Unknown values are left out of every figure.
 */
export function summarize(readings: Reading[], cpuThreshold: number): ReadingSummary {
  return {
    samples: readings.length,
    from: readings.length > 0 ? readings[0].timestamp : null,
    to: readings.length > 0 ? readings[readings.length - 1].timestamp : null,
    metrics: {
      CPU: summarizeValues(known(readings, 'CPU')),
      RAM: summarizeValues(known(readings, 'RAM')),
      DISK: summarizeValues(known(readings, 'DISK')),
    },
    aboveThreshold: readings.filter((r) => r.cpu !== null && r.cpu > cpuThreshold).length,
    threshold: cpuThreshold,
  };
}

/** Per-hour averages in UTC, oldest hour first. */
export function hourlyAverages(readings: Reading[]): HourlyRow[] {
  const buckets = new Map<number, Reading[]>();
  for (const reading of readings) {
    const hour = Math.floor(reading.timestamp.getTime() / HOUR_MS) * HOUR_MS;
    const bucket = buckets.get(hour);
    if (bucket) {
      bucket.push(reading);
    } else {
      buckets.set(hour, [reading]);
    }
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([hour, bucket]) => ({
      hour: new Date(hour),
      samples: bucket.length,
      cpu: averageOf(known(bucket, 'CPU')),
      ram: averageOf(known(bucket, 'RAM')),
      disk: averageOf(known(bucket, 'DISK')),
    }));
}

function summarizeValues(values: number[]): MetricSummary {
  if (values.length === 0) {
    return { average: null, min: null, max: null, samples: 0 };
  }
  return {
    average: round(mean(values)),
    min: min(values),
    max: max(values),
    samples: values.length,
  };
}

function averageOf(values: number[]): MetricValue {
  return values.length === 0 ? null : round(mean(values));
}

function known(readings: Reading[], metric: MetricName): number[] {
  const values: number[] = [];
  for (const reading of readings) {
    const value = readingValue(reading, metric);
    if (value !== null) values.push(value);
  }
  return values;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
