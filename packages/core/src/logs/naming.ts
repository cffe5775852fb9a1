import { readdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

const STAMP = '\\d{8}T\\d{6}\\.\\d{3}Z(?:-\\d+)?';

/**
 * ISO-8601 basic format in UTC with milliseconds, e.g. `20261019T132100.123Z`.
 */
export function archiveStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '');
}

/** `<active>.<stamp>`: the uncompressed file while it is being rotated. */
export function intermediatePattern(activePath: string): RegExp {
  return new RegExp(`^${escapeRegExp(basename(activePath))}\\.${STAMP}$`);
}

/** `<active>.<stamp>.gz` */
export function archivePattern(activePath: string): RegExp {
  return new RegExp(`^${escapeRegExp(basename(activePath))}\\.${STAMP}\\.gz$`);
}

/** Either of the above: every rotated file of the stream. */
export function lineagePattern(activePath: string): RegExp {
  return new RegExp(`^${escapeRegExp(basename(activePath))}\\.${STAMP}(?:\\.gz)?$`);
}

/**
 * Lists files beside `activePath` whose names match `pattern`, oldest stamp
 * first; names sharing a stamp are ordered by their `-n` suffix.
 */
export async function listSiblings(activePath: string, pattern: RegExp): Promise<string[]> {
  const dir = dirname(activePath);
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return [];
    throw err;
  }

  return entries
    .filter((name) => pattern.test(name))
    .sort(compareLineage)
    .map((name) => join(dir, name));
}

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function compareLineage(a: string, b: string): number {
  const [stampA, seqA] = lineageKey(a);
  const [stampB, seqB] = lineageKey(b);
  if (stampA !== stampB) return stampA < stampB ? -1 : 1;
  return seqA - seqB;
}

function lineageKey(name: string): [string, number] {
  const match = /^(.*Z)(?:-(\d+))?(?:\.gz)?$/.exec(name);
  if (!match) return [name, 0];
  return [match[1], match[2] === undefined ? 0 : Number(match[2])];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
