import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { MonitorConfig, MonitorConfigInput } from '@hostwatch/shared';
import { ConfigError, HOSTWATCH_CONFIG_FILES, monitorConfigSchema } from '@hostwatch/shared';

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, usually from CLI flags. */
  overrides?: MonitorConfigInput;
}

export interface LoadedConfig {
  config: MonitorConfig;
  /** The file the config was read from, or null when only defaults applied. */
  source: string | null;
}

type PlainObject = Record<string, unknown>;

/**
 * Environment variables and the config path they set. Values are kept as
 * strings except thresholds, which the schema expects as numbers.
 */
const ENV_KEYS: ReadonlyArray<{ name: string; path: readonly string[]; numeric?: boolean }> = [
  { name: 'HOSTWATCH_INTERVAL', path: ['interval'] },
  { name: 'HOSTWATCH_CPU_THRESHOLD', path: ['thresholds', 'cpu'], numeric: true },
  { name: 'HOSTWATCH_RAM_THRESHOLD', path: ['thresholds', 'ram'], numeric: true },
  { name: 'HOSTWATCH_DISK_THRESHOLD', path: ['thresholds', 'disk'], numeric: true },
  { name: 'HOSTWATCH_LOG_DIR', path: ['logDir'] },
  { name: 'HOSTWATCH_MAX_AGE', path: ['rotation', 'maxAge'] },
  { name: 'HOSTWATCH_MAX_SIZE', path: ['rotation', 'maxSize'] },
  { name: 'HOSTWATCH_LOG_LEVEL', path: ['diagnostics', 'level'] },
];

/**
 * Builds the monitor config from, lowest precedence first: schema defaults,
 * the config file, `HOSTWATCH_*` environment variables and `overrides`.
 * Throws ConfigError listing every invalid field.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const source = options.configPath ? resolve(cwd, options.configPath) : findConfigFile(cwd);
  const fromFile = source ? await readConfigFile(source) : {};

  const merged = deepMerge(deepMerge(fromFile, envConfig(env)), toPlainObject(options.overrides));
  const result = monitorConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    );
  }

  const config = result.data;
  return {
    config: {
      ...config,
      logDir: resolve(cwd, config.logDir),
      diagnostics: {
        ...config.diagnostics,
        ...(config.diagnostics.file ? { file: resolve(cwd, config.diagnostics.file) } : {}),
      },
    },
    source,
  };
}

export function findConfigFile(cwd: string): string | null {
  for (const name of HOSTWATCH_CONFIG_FILES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) return fullPath;
  }
  return null;
}

async function readConfigFile(path: string): Promise<PlainObject> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`Cannot read config file ${path}: ${reason}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`Invalid JSON in ${path}: ${reason}`]);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError([`Config file ${path} must contain a JSON object`]);
  }
  return parsed;
}

function envConfig(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};
  for (const { name, path, numeric } of ENV_KEYS) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    setPath(config, path, numeric ? Number(raw) : raw);
  }
  return config;
}

function setPath(target: PlainObject, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const child = node[key];
    if (isPlainObject(child)) {
      node = child;
    } else {
      const created: PlainObject = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function toPlainObject(value: unknown): PlainObject {
  return isPlainObject(value) ? value : {};
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
