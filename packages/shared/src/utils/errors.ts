import type { LogStream, MetricName } from '../types/index.js';

export class HostwatchError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HostwatchError';
    this.code = code;
  }
}

export class MetricUnavailableError extends HostwatchError {
  public readonly metric: MetricName;

  constructor(metric: MetricName, reason: string, options?: { cause?: unknown }) {
    super(`Metric unavailable: ${metric} (${reason})`, 'METRIC_UNAVAILABLE', options);
    this.name = 'MetricUnavailableError';
    this.metric = metric;
  }
}

export class LogIoError extends HostwatchError {
  public readonly stream: LogStream;
  public readonly path: string;
  public readonly errno: string | undefined;

  constructor(stream: LogStream, path: string, action: string, cause?: unknown) {
    const errno = errnoOf(cause);
    super(
      `Failed to ${action} ${stream} log at ${path}${errno ? ` (${errno})` : ''}`,
      'LOG_IO_ERROR',
      { cause },
    );
    this.name = 'LogIoError';
    this.stream = stream;
    this.path = path;
    this.errno = errno;
  }
}

export class CompressionError extends HostwatchError {
  public readonly source: string;

  constructor(source: string, cause?: unknown) {
    super(`Failed to compress ${source}`, 'COMPRESSION_ERROR', { cause });
    this.name = 'CompressionError';
    this.source = source;
  }
}

export class ConfigError extends HostwatchError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export class MonitorAlreadyRunningError extends HostwatchError {
  constructor(pid: number) {
    super(`hostwatch is already running (PID: ${pid})`, 'MONITOR_ALREADY_RUNNING');
    this.name = 'MonitorAlreadyRunningError';
  }
}

export class MonitorNotRunningError extends HostwatchError {
  constructor() {
    super('hostwatch is not running. Start it with: hostwatch start', 'MONITOR_NOT_RUNNING');
    this.name = 'MonitorNotRunningError';
  }
}

function errnoOf(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
