import { ALERT_MARKER, UNKNOWN_METRIC } from '../constants.js';
import type { AlertEvent, MetricName, MetricValue, Reading } from '../types/index.js';

const METRIC_NAMES: readonly MetricName[] = ['CPU', 'RAM', 'DISK'];

/**
 * Line codec for the two log streams.
 *
 *   metrics: <ISO-8601>,<cpu>,<ram>,<disk>
 *   alerts:  <ISO-8601>,ALERT,<CPU|RAM|DISK>,<value>,<threshold>
 *
 * Percentages are written with two decimals; an unreadable metric is
 * written as `unknown`. Lines carry no trailing newline here.
 */
export function formatReading(reading: Reading): string {
  return [
    reading.timestamp.toISOString(),
    formatValue(reading.cpu),
    formatValue(reading.ram),
    formatValue(reading.disk),
  ].join(',');
}

export function parseReadingLine(line: string): Reading | null {
  const parts = line.trim().split(',');
  if (parts.length !== 4) return null;

  const timestamp = parseTimestamp(parts[0]);
  if (!timestamp) return null;

  const values = parts.slice(1).map(parseValue);
  if (values.some((v) => v === undefined)) return null;

  const [cpu, ram, disk] = values;
  return {
    timestamp,
    cpu: cpu ?? null,
    ram: ram ?? null,
    disk: disk ?? null,
  };
}

export function formatAlert(alert: AlertEvent): string {
  return [
    alert.timestamp.toISOString(),
    ALERT_MARKER,
    alert.metric,
    alert.value.toFixed(2),
    alert.threshold.toFixed(2),
  ].join(',');
}

export function parseAlertLine(line: string): AlertEvent | null {
  const parts = line.trim().split(',');
  if (parts.length !== 5 || parts[1] !== ALERT_MARKER) return null;

  const timestamp = parseTimestamp(parts[0]);
  const metric = METRIC_NAMES.find((name) => name === parts[2]);
  const value = Number(parts[3]);
  const threshold = Number(parts[4]);

  if (!timestamp || !metric || !isNumeric(parts[3]) || !isNumeric(parts[4])) return null;

  return { timestamp, metric, value, threshold };
}

/** Returns the value a reading holds for the given metric. */
export function readingValue(reading: Reading, metric: MetricName): MetricValue {
  switch (metric) {
    case 'CPU':
      return reading.cpu;
    case 'RAM':
      return reading.ram;
    case 'DISK':
      return reading.disk;
  }
}

function formatValue(value: MetricValue): string {
  return value === null ? UNKNOWN_METRIC : value.toFixed(2);
}

// undefined = malformed field, null = the unknown sentinel
function parseValue(field: string): MetricValue | undefined {
  if (field === UNKNOWN_METRIC) return null;
  if (!isNumeric(field)) return undefined;
  return Number(field);
}

function isNumeric(field: string): boolean {
  return field.trim() !== '' && Number.isFinite(Number(field));
}

function parseTimestamp(field: string): Date | null {
  const date = new Date(field);
  return Number.isNaN(date.getTime()) ? null : date;
}
