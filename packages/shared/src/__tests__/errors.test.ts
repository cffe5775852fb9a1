import { describe, it, expect } from 'vitest';
import {
  HostwatchError,
  MetricUnavailableError,
  LogIoError,
  CompressionError,
  ConfigError,
  MonitorAlreadyRunningError,
  MonitorNotRunningError,
} from '../utils/errors.js';

describe('HostwatchError', () => {
  it('should create an error with message and code', () => {
    const error = new HostwatchError('something went wrong', 'GENERIC_ERROR');
    expect(error.message).toBe('something went wrong');
    expect(error.code).toBe('GENERIC_ERROR');
    expect(error.name).toBe('HostwatchError');
  });

  it('should be an instance of Error', () => {
    expect(new HostwatchError('test', 'TEST')).toBeInstanceOf(Error);
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new HostwatchError('wrapped', 'TEST', { cause });
    expect(error.cause).toBe(cause);
  });
});

describe('MetricUnavailableError', () => {
  it('should name the metric and the reason', () => {
    const error = new MetricUnavailableError('DISK', 'statfs failed');
    expect(error.message).toBe('Metric unavailable: DISK (statfs failed)');
    expect(error.code).toBe('METRIC_UNAVAILABLE');
    expect(error.metric).toBe('DISK');
    expect(error).toBeInstanceOf(HostwatchError);
  });
});

describe('LogIoError', () => {
  it('should include the errno code of the cause', () => {
    const cause = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    const error = new LogIoError('metrics', '/var/log/syslog.txt', 'append to', cause);

    expect(error.message).toBe('Failed to append to metrics log at /var/log/syslog.txt (EACCES)');
    expect(error.code).toBe('LOG_IO_ERROR');
    expect(error.stream).toBe('metrics');
    expect(error.path).toBe('/var/log/syslog.txt');
    expect(error.errno).toBe('EACCES');
    expect(error.cause).toBe(cause);
  });

  it('should omit the errno when the cause has none', () => {
    const error = new LogIoError('alerts', '/tmp/alerts.txt', 'rename', new Error('boom'));
    expect(error.message).toBe('Failed to rename alerts log at /tmp/alerts.txt');
    expect(error.errno).toBeUndefined();
  });
});

describe('CompressionError', () => {
  it('should name the source file', () => {
    const error = new CompressionError('/tmp/syslog.txt.20261019T120000.000Z');
    expect(error.message).toBe('Failed to compress /tmp/syslog.txt.20261019T120000.000Z');
    expect(error.code).toBe('COMPRESSION_ERROR');
    expect(error.source).toBe('/tmp/syslog.txt.20261019T120000.000Z');
  });
});

describe('ConfigError', () => {
  it('should list every validation error', () => {
    const error = new ConfigError(['interval: Required', 'thresholds.cpu: Too big']);
    expect(error.message).toBe(
      'Configuration validation failed:\ninterval: Required\nthresholds.cpu: Too big',
    );
    expect(error.errors).toEqual(['interval: Required', 'thresholds.cpu: Too big']);
    expect(error.code).toBe('CONFIG_ERROR');
  });
});

describe('monitor lifecycle errors', () => {
  it('should report the running pid', () => {
    const error = new MonitorAlreadyRunningError(4242);
    expect(error.message).toBe('hostwatch is already running (PID: 4242)');
    expect(error.code).toBe('MONITOR_ALREADY_RUNNING');
  });

  it('should suggest how to start the monitor', () => {
    const error = new MonitorNotRunningError();
    expect(error.message).toBe('hostwatch is not running. Start it with: hostwatch start');
    expect(error.code).toBe('MONITOR_NOT_RUNNING');
  });
});
