import { mkdir, open, stat, writeFile, type FileHandle } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type pino from 'pino';
import type { AlertEvent, LogStream, Reading } from '@hostwatch/shared';
import {
  DEFAULT_ALERTS_FILE,
  DEFAULT_METRICS_FILE,
  LogIoError,
  formatAlert,
  formatReading,
  getLogger,
} from '@hostwatch/shared';
import { isErrno } from './naming.js';

export interface LogFiles {
  metrics: string;
  alerts: string;
}

export interface LogWriterOptions {
  logDir: string;
  files?: Partial<LogFiles>;
  logger?: pino.Logger;
}

/**
 * Appends one record per call to a stream's active file. Every append opens
 * the file, writes a single newline-terminated line, fsyncs and closes it, so
 * no descriptor outlives the call and the rotator may rename the file between
 * appends. Appends to the same stream run one at a time.
 */
export class LogWriter {
  private logDir: string;
  private files: LogFiles;
  private logger: pino.Logger;
  private queues: Map<LogStream, Promise<void>> = new Map();

  constructor(options: LogWriterOptions) {
    this.logDir = resolve(options.logDir);
    this.files = {
      metrics: options.files?.metrics ?? DEFAULT_METRICS_FILE,
      alerts: options.files?.alerts ?? DEFAULT_ALERTS_FILE,
    };
    this.logger = options.logger ?? getLogger();
  }

  pathFor(stream: LogStream): string {
    return join(this.logDir, this.files[stream]);
  }

  append(stream: 'metrics', record: Reading): Promise<void>;
  append(stream: 'alerts', record: AlertEvent): Promise<void>;
  append(stream: LogStream, record: Reading | AlertEvent): Promise<void> {
    const line = 'metric' in record ? formatAlert(record) : formatReading(record);
    return this.enqueue(stream, () => this.writeLine(stream, line));
  }

  private enqueue(stream: LogStream, task: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(stream) ?? Promise.resolve();
    const next = previous.then(task);
    // The caller sees the failure through `next`; the chain itself must keep going.
    this.queues.set(stream, next.catch(() => undefined));
    return next;
  }

  private async writeLine(stream: LogStream, line: string): Promise<void> {
    const path = this.pathFor(stream);
    await this.ensureActiveFile(stream, path);

    let handle: FileHandle;
    try {
      handle = await open(path, 'a');
    } catch (err) {
      throw new LogIoError(stream, path, 'open', err);
    }

    let failure: LogIoError | null = null;
    try {
      await handle.appendFile(`${line}\n`, 'utf-8');
      await handle.sync();
    } catch (err) {
      failure = new LogIoError(stream, path, 'append to', err);
    }

    try {
      await handle.close();
    } catch (err) {
      failure ??= new LogIoError(stream, path, 'close', err);
    }

    if (failure) throw failure;
  }

  private async ensureActiveFile(stream: LogStream, path: string): Promise<void> {
    try {
      await mkdir(this.logDir, { recursive: true });
    } catch (err) {
      throw new LogIoError(stream, path, 'create the directory of', err);
    }

    let exists: boolean;
    try {
      exists = await fileExists(path);
    } catch (err) {
      throw new LogIoError(stream, path, 'stat', err);
    }
    if (exists) return;

    try {
      await writeFile(path, '', { flag: 'wx' });
      this.logger.debug({ stream, path }, 'Created active log file');
    } catch (err) {
      // Another writer created it first.
      if (!isErrno(err, 'EEXIST')) {
        throw new LogIoError(stream, path, 'create', err);
      }
    }
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return false;
    throw err;
  }
}
