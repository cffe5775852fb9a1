import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir, open } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LogIoError } from '@hostwatch/shared';
import type { AlertEvent, Reading } from '@hostwatch/shared';
import { LogWriter } from '../logs/LogWriter.js';
import { silentLogger } from './helpers.js';

// Pass-through, so single tests can swap in a failing file handle
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, open: vi.fn(actual.open) };
});

const T = new Date('2026-10-19T13:21:00.000Z');

function reading(cpu: number | null, offsetMs = 0): Reading {
  return { timestamp: new Date(T.getTime() + offsetMs), cpu, ram: 50, disk: 25.5 };
}

describe('LogWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hostwatch-writer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createWriter(logDir = dir): LogWriter {
    return new LogWriter({ logDir, logger: silentLogger });
  }

  it('should resolve the default file names', () => {
    const writer = createWriter();
    expect(writer.pathFor('metrics')).toBe(join(dir, 'syslog.txt'));
    expect(writer.pathFor('alerts')).toBe(join(dir, 'alerts.txt'));
  });

  it('should create the active file and write one line per reading', async () => {
    const writer = createWriter();

    await writer.append('metrics', reading(85));

    const content = await readFile(join(dir, 'syslog.txt'), 'utf-8');
    expect(content).toBe('2026-10-19T13:21:00.000Z,85.00,50.00,25.50\n');
  });

  it('should write unknown metrics as the literal unknown', async () => {
    const writer = createWriter();

    await writer.append('metrics', reading(null));

    const content = await readFile(join(dir, 'syslog.txt'), 'utf-8');
    expect(content).toBe('2026-10-19T13:21:00.000Z,unknown,50.00,25.50\n');
  });

  it('should write alerts to the alerts file', async () => {
    const writer = createWriter();
    const alert: AlertEvent = { timestamp: T, metric: 'CPU', value: 85, threshold: 80 };

    await writer.append('alerts', alert);

    const content = await readFile(join(dir, 'alerts.txt'), 'utf-8');
    expect(content).toBe('2026-10-19T13:21:00.000Z,ALERT,CPU,85.00,80.00\n');
  });

  it('should append to an existing file without truncating it', async () => {
    await writeFile(join(dir, 'syslog.txt'), 'existing line\n');
    const writer = createWriter();

    await writer.append('metrics', reading(10));

    const content = await readFile(join(dir, 'syslog.txt'), 'utf-8');
    expect(content).toBe('existing line\n2026-10-19T13:21:00.000Z,10.00,50.00,25.50\n');
  });

  it('should create a missing log directory', async () => {
    const nested = join(dir, 'a', 'b');
    const writer = createWriter(nested);

    await writer.append('metrics', reading(10));

    const content = await readFile(join(nested, 'syslog.txt'), 'utf-8');
    expect(content.split('\n')).toHaveLength(2);
  });

  it('should keep concurrent appends whole and in call order', async () => {
    const writer = createWriter();

    await Promise.all(
      Array.from({ length: 20 }, (_, i) => writer.append('metrics', reading(i, i * 1000))),
    );

    const lines = (await readFile(join(dir, 'syslog.txt'), 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(20);
    expect(lines[0]).toBe('2026-10-19T13:21:00.000Z,0.00,50.00,25.50');
    expect(lines[19]).toBe('2026-10-19T13:21:19.000Z,19.00,50.00,25.50');
  });

  it('should reject with LogIoError when the path cannot be written', async () => {
    // A directory where the active file should be
    await mkdir(join(dir, 'syslog.txt'));
    const writer = createWriter();

    const error = await writer.append('metrics', reading(10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LogIoError);
    expect(error).toMatchObject({
      code: 'LOG_IO_ERROR',
      stream: 'metrics',
      path: join(dir, 'syslog.txt'),
      errno: 'EISDIR',
    });
  });

  it('should keep accepting appends after a failure', async () => {
    await mkdir(join(dir, 'syslog.txt'));
    const writer = createWriter();

    await expect(writer.append('metrics', reading(10))).rejects.toBeInstanceOf(LogIoError);
    await rm(join(dir, 'syslog.txt'), { recursive: true });
    await writer.append('metrics', reading(20));

    const content = await readFile(join(dir, 'syslog.txt'), 'utf-8');
    expect(content).toBe('2026-10-19T13:21:00.000Z,20.00,50.00,25.50\n');
  });

  it('should reject with LogIoError when closing the file fails', async () => {
    const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    vi.mocked(open).mockImplementationOnce(async (path, flags) => {
      const handle = await actual.open(path, flags);
      const close = handle.close.bind(handle);
      vi.spyOn(handle, 'close').mockImplementationOnce(async () => {
        await close();
        throw Object.assign(new Error('i/o error'), { code: 'EIO' });
      });
      return handle;
    });
    const writer = createWriter();

    const error = await writer.append('metrics', reading(10)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LogIoError);
    expect(error).toMatchObject({
      message: `Failed to close metrics log at ${join(dir, 'syslog.txt')} (EIO)`,
      errno: 'EIO',
    });
    const content = await readFile(join(dir, 'syslog.txt'), 'utf-8');
    expect(content).toBe('2026-10-19T13:21:00.000Z,10.00,50.00,25.50\n');
  });
});
