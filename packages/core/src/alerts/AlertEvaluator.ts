import type {
  AlertEvent,
  AlertMode,
  AlertThresholds,
  MetricName,
  Reading,
} from '@hostwatch/shared';
import { readingValue } from '@hostwatch/shared';

/**
 * Returns an alert when the reading's value for `metric` is strictly above
 * `threshold`. An unknown value never alerts.
 */
export function evaluate(
  reading: Reading,
  threshold: number,
  metric: MetricName = 'CPU',
): AlertEvent | null {
  const value = readingValue(reading, metric);
  if (value === null || value <= threshold) return null;

  return Object.freeze({ timestamp: reading.timestamp, metric, value, threshold });
}

/**
 * Evaluates every configured threshold, in CPU, RAM, DISK order.
 */
export function evaluateAll(reading: Reading, thresholds: AlertThresholds): AlertEvent[] {
  const alerts: AlertEvent[] = [];
  for (const [metric, threshold] of configuredThresholds(thresholds)) {
    const alert = evaluate(reading, threshold, metric);
    if (alert) alerts.push(alert);
  }
  return alerts;
}

function configuredThresholds(thresholds: AlertThresholds): Array<[MetricName, number]> {
  const pairs: Array<[MetricName, number]> = [['CPU', thresholds.cpu]];
  if (thresholds.ram !== undefined) pairs.push(['RAM', thresholds.ram]);
  if (thresholds.disk !== undefined) pairs.push(['DISK', thresholds.disk]);
  return pairs;
}

/**
 * In `level` mode every reading above threshold yields an alert, so a
 * sustained excursion alerts once per tick. In `edge` mode an alert is only
 * emitted when a metric crosses from at-or-below to above its threshold.
 */
export class AlertEvaluator {
  private thresholds: AlertThresholds;
  private mode: AlertMode;
  private above: Set<MetricName> = new Set();

  constructor(thresholds: AlertThresholds, mode: AlertMode = 'level') {
    this.thresholds = thresholds;
    this.mode = mode;
  }

  getMode(): AlertMode {
    return this.mode;
  }

  evaluate(reading: Reading): AlertEvent[] {
    if (this.mode === 'level') {
      return evaluateAll(reading, this.thresholds);
    }

    const alerts: AlertEvent[] = [];
    for (const [metric, threshold] of configuredThresholds(this.thresholds)) {
      // Unknown readings leave the edge state untouched.
      if (readingValue(reading, metric) === null) continue;

      const alert = evaluate(reading, threshold, metric);
      if (!alert) {
        this.above.delete(metric);
      } else if (!this.above.has(metric)) {
        this.above.add(metric);
        alerts.push(alert);
      }
    }
    return alerts;
  }

  reset(): void {
    this.above.clear();
  }
}
