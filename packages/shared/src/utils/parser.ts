import msLib from 'ms';
import bytesLib from 'bytes';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '3d', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined || Number.isNaN(result)) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Parse a byte size string to number of bytes.
 * Supports: '512KB', '1MB', '1G', etc.
 */
export function parseBytes(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = bytesLib.parse(value);
  if (result === null || Number.isNaN(result)) {
    throw new Error(`Invalid byte size string: "${value}"`);
  }
  return result;
}

/**
 * Format bytes to a human-readable string.
 */
export function formatBytes(value: number): string {
  return bytesLib.format(value, { unitSeparator: ' ' }) ?? '0 B';
}

/**
 * Format a percentage for display. The unknown sentinel renders as "n/a".
 */
export function formatPercent(value: number | null): string {
  if (value === null) return 'n/a';
  return `${value.toFixed(1)}%`;
}

/**
 * Format an uptime in seconds, e.g. "2 days, 3 hours, 5 minutes".
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  const parts: string[] = [];
  if (days > 0) parts.push(`${days} day${days !== 1 ? 's' : ''}`);
  if (hours > 0) parts.push(`${hours} hour${hours !== 1 ? 's' : ''}`);
  if (minutes > 0) parts.push(`${minutes} minute${minutes !== 1 ? 's' : ''}`);

  return parts.length > 0 ? parts.join(', ') : 'Less than a minute';
}
