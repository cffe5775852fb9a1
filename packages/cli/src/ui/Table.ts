import Table from 'cli-table3';
import chalk from 'chalk';
import type { AlertEvent, AlertThresholds, MetricName, Reading } from '@hostwatch/shared';
import type { HourlyRow, ReadingSummary } from '../utils/stats.js';
import {
  formatMetric,
  formatPercent,
  formatThreshold,
  formatTimestamp,
} from '../utils/format.js';

const TABLE_STYLE = { head: [], border: ['gray'] };

function thresholdFor(thresholds: AlertThresholds, metric: MetricName): number | undefined {
  switch (metric) {
    case 'CPU':
      return thresholds.cpu;
    case 'RAM':
      return thresholds.ram;
    case 'DISK':
      return thresholds.disk;
  }
}

export function renderReadingTable(reading: Reading, thresholds: AlertThresholds): string {
  const table = new Table({
    head: [chalk.bold('metric'), chalk.bold('usage'), chalk.bold('threshold')],
    style: TABLE_STYLE,
    colWidths: [10, 12, 12],
  });

  const rows: Array<[MetricName, Reading['cpu']]> = [
    ['CPU', reading.cpu],
    ['RAM', reading.ram],
    ['DISK', reading.disk],
  ];
  for (const [metric, value] of rows) {
    const threshold = thresholdFor(thresholds, metric);
    table.push([metric, formatMetric(value, threshold), formatThreshold(threshold)]);
  }

  return table.toString();
}

export function renderSummaryTable(summary: ReadingSummary): string {
  const table = new Table({
    head: [
      chalk.bold('metric'),
      chalk.bold('average'),
      chalk.bold('min'),
      chalk.bold('max'),
      chalk.bold('samples'),
    ],
    style: TABLE_STYLE,
  });

  for (const metric of ['CPU', 'RAM', 'DISK'] as const) {
    const m = summary.metrics[metric];
    table.push([
      metric,
      formatPercent(m.average),
      formatPercent(m.min),
      formatPercent(m.max),
      String(m.samples),
    ]);
  }

  return table.toString();
}

export function renderHistoryTable(rows: HourlyRow[]): string {
  const table = new Table({
    head: [
      chalk.bold('hour (UTC)'),
      chalk.bold('cpu'),
      chalk.bold('ram'),
      chalk.bold('disk'),
      chalk.bold('samples'),
    ],
    style: TABLE_STYLE,
  });

  for (const row of rows) {
    table.push([
      formatTimestamp(row.hour).slice(0, 16),
      formatPercent(row.cpu),
      formatPercent(row.ram),
      formatPercent(row.disk),
      String(row.samples),
    ]);
  }

  return table.toString();
}

export function renderAlertLine(alert: AlertEvent): string {
  return (
    `${chalk.gray(formatTimestamp(alert.timestamp))} ` +
    `${chalk.red(alert.metric.padEnd(4))} ` +
    `${formatPercent(alert.value)} > ${formatPercent(alert.threshold)}`
  );
}
