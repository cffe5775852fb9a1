import { readFile, stat } from 'node:fs/promises';
import { gunzip } from 'node:zlib';
import { promisify } from 'node:util';
import { join, resolve } from 'node:path';
import type pino from 'pino';
import type { AlertEvent, LogStream, Reading } from '@hostwatch/shared';
import {
  DEFAULT_ALERTS_FILE,
  DEFAULT_METRICS_FILE,
  getLogger,
  parseAlertLine,
  parseReadingLine,
} from '@hostwatch/shared';
import type { LogFiles } from './LogWriter.js';
import { isErrno, lineagePattern, listSiblings } from './naming.js';

const gunzipAsync = promisify(gunzip);

export interface LogReaderOptions {
  logDir: string;
  files?: Partial<LogFiles>;
  logger?: pino.Logger;
}

export interface ReadOptions {
  /** Only records at or after this instant are returned. */
  since?: Date;
}

export interface ReadResult<T> {
  records: T[];
  /** Lines that could not be parsed. */
  skipped: number;
}

/**
 * Reads a stream back from its active file, every archive and any file left
 * uncompressed by a failed rotation, oldest record first. Used by the
 * reporting commands.
 */
export class LogReader {
  private logDir: string;
  private files: LogFiles;
  private logger: pino.Logger;

  constructor(options: LogReaderOptions) {
    this.logDir = resolve(options.logDir);
    this.files = {
      metrics: options.files?.metrics ?? DEFAULT_METRICS_FILE,
      alerts: options.files?.alerts ?? DEFAULT_ALERTS_FILE,
    };
    this.logger = options.logger ?? getLogger();
  }

  readReadings(options: ReadOptions = {}): Promise<ReadResult<Reading>> {
    return this.readStream('metrics', parseReadingLine, options);
  }

  readAlerts(options: ReadOptions = {}): Promise<ReadResult<AlertEvent>> {
    return this.readStream('alerts', parseAlertLine, options);
  }

  private async readStream<T extends { timestamp: Date }>(
    stream: LogStream,
    parse: (line: string) => T | null,
    options: ReadOptions,
  ): Promise<ReadResult<T>> {
    const activePath = join(this.logDir, this.files[stream]);
    const rotated = await listSiblings(activePath, lineagePattern(activePath));
    // A file still under its intermediate name is read as is, unless its archive already exists.
    const archives = new Set(rotated.filter((path) => path.endsWith('.gz')));
    const sources = rotated.filter((path) => !archives.has(`${path}.gz`));
    const since = options.since?.getTime() ?? Number.NEGATIVE_INFINITY;

    const records: T[] = [];
    let skipped = 0;

    for (const path of [...sources, activePath]) {
      const content = await this.readContent(path, since);
      if (content === null) continue;

      for (const line of content.split('\n')) {
        if (line.trim() === '') continue;

        const record = parse(line);
        if (!record) {
          skipped++;
          continue;
        }
        if (record.timestamp.getTime() >= since) {
          records.push(record);
        }
      }
    }

    if (skipped > 0) {
      this.logger.debug({ stream, skipped }, 'Skipped malformed log lines');
    }

    records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    return { records, skipped };
  }

  // Archives last modified before `since` only hold older records and are skipped.
  private async readContent(path: string, since: number): Promise<string | null> {
    try {
      if (!path.endsWith('.gz')) {
        return await readFile(path, 'utf-8');
      }

      const stats = await stat(path);
      if (stats.mtime.getTime() < since) return null;

      const buffer = await gunzipAsync(await readFile(path));
      return buffer.toString('utf-8');
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return null;
      throw err;
    }
  }
}
