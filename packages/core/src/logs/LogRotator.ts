import { rename, rm, stat, unlink } from 'node:fs/promises';
import { createReadStream, createWriteStream } from 'node:fs';
import { createGzip } from 'node:zlib';
import { pipeline } from 'node:stream/promises';
import { join, resolve } from 'node:path';
import type pino from 'pino';
import type {
  LogFileState,
  LogStream,
  RotationOutcome,
  RotationPolicy,
  RotationState,
} from '@hostwatch/shared';
import {
  CompressionError,
  DEFAULT_ALERTS_FILE,
  DEFAULT_METRICS_FILE,
  LogIoError,
  getLogger,
} from '@hostwatch/shared';
import type { LogFiles } from './LogWriter.js';
import {
  archivePattern,
  archiveStamp,
  intermediatePattern,
  isErrno,
  listSiblings,
} from './naming.js';

export type CompressFn = (source: string, destination: string) => Promise<void>;

export interface LogRotatorOptions {
  logDir: string;
  files?: Partial<LogFiles>;
  policy: RotationPolicy;
  now?: () => Date;
  compress?: CompressFn;
  logger?: pino.Logger;
}

const NOT_NEEDED: RotationOutcome = Object.freeze({ status: 'not-needed' });

/**
 * Retires a stream's active file into `<active>.<stamp>.gz` once it is older
 * than `policy.maxAge` or larger than `policy.maxSize`.
 *
 * The active file is first renamed to `<active>.<stamp>` so nothing can
 * append to it, then gzipped. The uncompressed file is only removed once the
 * archive has been written; if compression fails it stays under its
 * intermediate name and the next check compresses it again.
 */
export class LogRotator {
  private logDir: string;
  private files: LogFiles;
  private policy: RotationPolicy;
  private now: () => Date;
  private compress: CompressFn;
  private logger: pino.Logger;

  constructor(options: LogRotatorOptions) {
    this.logDir = resolve(options.logDir);
    this.files = {
      metrics: options.files?.metrics ?? DEFAULT_METRICS_FILE,
      alerts: options.files?.alerts ?? DEFAULT_ALERTS_FILE,
    };
    this.policy = options.policy;
    this.now = options.now ?? (() => new Date());
    this.compress = options.compress ?? gzipFile;
    this.logger = options.logger ?? getLogger();
  }

  pathFor(stream: LogStream): string {
    return join(this.logDir, this.files[stream]);
  }

  /**
   * Rotates the stream when the policy says so. A file left behind by a
   * failed compression is finished first, and counts as this call's rotation.
   */
  async maybeRotate(stream: LogStream): Promise<RotationOutcome> {
    const recovered = await this.recoverPending(stream);
    if (recovered) return recovered;

    const state = await this.inspect(stream);
    if (!state || state.sizeBytes === 0 || !this.needsRotation(state)) {
      return NOT_NEEDED;
    }

    return this.rotateActive(stream, state.path);
  }

  /**
   * Rotates the active file regardless of the policy. An empty or missing
   * active file is left alone.
   */
  async rotate(stream: LogStream): Promise<RotationOutcome> {
    const recovered = await this.recoverPending(stream);

    const state = await this.inspect(stream);
    if (!state || state.sizeBytes === 0) {
      return recovered ?? NOT_NEEDED;
    }

    return this.rotateActive(stream, state.path);
  }

  /** Size and age are checked together, so a file over both limits rotates once. */
  needsRotation(state: Pick<LogFileState, 'sizeBytes' | 'lastModified'>): boolean {
    const age = this.now().getTime() - state.lastModified.getTime();
    return age > this.policy.maxAge || state.sizeBytes > this.policy.maxSize;
  }

  /** Returns the active file's metadata, or null when there is none yet. */
  async inspect(stream: LogStream): Promise<LogFileState | null> {
    return this.describe(stream, this.pathFor(stream), 'active');
  }

  /**
   * Every file in the stream's lineage: the active file, files still being
   * rotated, then archives oldest first.
   */
  async inspectAll(stream: LogStream): Promise<LogFileState[]> {
    const activePath = this.pathFor(stream);
    const [pending, archives] = await Promise.all([
      listSiblings(activePath, intermediatePattern(activePath)),
      listSiblings(activePath, archivePattern(activePath)),
    ]);

    const states = await Promise.all([
      this.describe(stream, activePath, 'active'),
      ...pending.map((path) => this.describe(stream, path, 'rotating')),
      ...archives.map((path) => this.describe(stream, path, 'archived')),
    ]);

    return states.filter((state): state is LogFileState => state !== null);
  }

  async listArchives(stream: LogStream): Promise<string[]> {
    const activePath = this.pathFor(stream);
    return listSiblings(activePath, archivePattern(activePath));
  }

  private async recoverPending(stream: LogStream): Promise<RotationOutcome | null> {
    const activePath = this.pathFor(stream);
    const pending = await listSiblings(activePath, intermediatePattern(activePath));
    if (pending.length === 0) return null;

    let archivePath = '';
    for (const intermediate of pending) {
      this.logger.info({ stream, path: intermediate }, 'Retrying compression of rotated log');
      archivePath = await this.compressIntermediate(stream, intermediate);
    }
    return { status: 'rotated', archivePath, recovered: true };
  }

  private async rotateActive(stream: LogStream, activePath: string): Promise<RotationOutcome> {
    const intermediate = await this.nextIntermediatePath(activePath);

    try {
      await rename(activePath, intermediate);
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return NOT_NEEDED;
      throw new LogIoError(stream, activePath, 'rename', err);
    }

    const archivePath = await this.compressIntermediate(stream, intermediate);
    this.logger.info({ stream, archivePath }, 'Log rotated');
    return { status: 'rotated', archivePath, recovered: false };
  }

  private async compressIntermediate(stream: LogStream, intermediate: string): Promise<string> {
    const archivePath = `${intermediate}.gz`;

    try {
      await this.compress(intermediate, archivePath);
    } catch (err) {
      await rm(archivePath, { force: true }).catch((rmErr: unknown) => {
        this.logger.warn({ err: rmErr, path: archivePath }, 'Failed to remove partial archive');
      });
      throw new CompressionError(intermediate, err);
    }

    try {
      await unlink(intermediate);
    } catch (err) {
      // The archive is complete. A leftover intermediate is compressed again next check.
      throw new LogIoError(stream, intermediate, 'remove', err);
    }

    return archivePath;
  }

  private async nextIntermediatePath(activePath: string): Promise<string> {
    const base = `${activePath}.${archiveStamp(this.now())}`;
    let candidate = base;
    for (let n = 1; (await pathExists(candidate)) || (await pathExists(`${candidate}.gz`)); n++) {
      candidate = `${base}-${n}`;
    }
    return candidate;
  }

  private async describe(
    stream: LogStream,
    path: string,
    rotationState: RotationState,
  ): Promise<LogFileState | null> {
    try {
      const stats = await stat(path);
      return {
        stream,
        path,
        sizeBytes: stats.size,
        lastModified: stats.mtime,
        rotationState,
      };
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return null;
      throw new LogIoError(stream, path, 'stat', err);
    }
  }
}

/** gzip `source` into `destination`. */
export async function gzipFile(source: string, destination: string): Promise<void> {
  await pipeline(createReadStream(source), createGzip(), createWriteStream(destination));
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
