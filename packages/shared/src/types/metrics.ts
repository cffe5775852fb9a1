/**
 * A percentage in [0, 100], or `null` when the metric could not be read.
 * `null` is the "unknown" sentinel and is never equal to a real 0% reading.
 */
export type MetricValue = number | null;

export type MetricName = 'CPU' | 'RAM' | 'DISK';

export interface Reading {
  timestamp: Date;
  cpu: MetricValue;
  ram: MetricValue;
  disk: MetricValue;
}

export interface AlertEvent {
  timestamp: Date;
  metric: MetricName;
  value: number;
  threshold: number;
}

export interface AlertThresholds {
  cpu: number;
  ram?: number;
  disk?: number;
}

export type AlertMode = 'level' | 'edge';
