import chalk from 'chalk';
import type { MetricValue, RotationOutcome } from '@hostwatch/shared';
import { formatBytes, formatPercent, formatUptime } from '@hostwatch/shared';

export { formatBytes, formatPercent, formatUptime };

/**
 * Colours a percentage against its alert threshold: red above it, yellow
 * above 50%, green otherwise. Unknown values are grey.
 */
export function formatMetric(value: MetricValue, threshold: number = 80): string {
  if (value === null) return chalk.gray('unknown');
  const str = formatPercent(value);
  if (value > threshold) return chalk.red(str);
  if (value > 50) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatThreshold(threshold: number | undefined): string {
  if (threshold === undefined) return chalk.gray('-');
  return `${threshold}%`;
}

/** `2026-10-19 13:21:00` in UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/** A null outcome is a rotation that failed. */
export function formatOutcome(outcome: RotationOutcome | null, reason?: string): string {
  if (outcome === null) return chalk.red(`failed: ${reason ?? 'see the diagnostics log'}`);
  if (outcome.status === 'not-needed') return chalk.gray('nothing to rotate');
  const suffix = outcome.recovered ? chalk.yellow(' (recovered)') : '';
  return chalk.green(`archived to ${outcome.archivePath}`) + suffix;
}

export function runningIcon(running: boolean): string {
  return running ? chalk.green('●') : chalk.gray('●');
}
