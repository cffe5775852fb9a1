import { homedir } from 'node:os';
import { join } from 'node:path';

export const HOSTWATCH_HOME = process.env.HOSTWATCH_HOME || join(homedir(), '.hostwatch');
export const HOSTWATCH_PID_FILE = join(HOSTWATCH_HOME, 'hostwatch.pid');

export const HOSTWATCH_CONFIG_FILES = ['hostwatch.config.json', '.hostwatchrc.json'];

export const DEFAULT_SAMPLE_INTERVAL = '60s';
export const DEFAULT_CPU_THRESHOLD = 80;
export const DEFAULT_METRICS_FILE = 'syslog.txt';
export const DEFAULT_ALERTS_FILE = 'alerts.txt';
export const DEFAULT_ROTATION_MAX_AGE = '3d';
export const DEFAULT_ROTATION_MAX_SIZE = '1MB';
export const DEFAULT_ROTATION_CHECK_EVERY = 10;
export const DEFAULT_DISK_PATH = '/';
export const DEFAULT_SAMPLER_TIMEOUT = '5s';
export const DEFAULT_CPU_WINDOW = '1s';

/** Longest delay a Node.js timer honours, in ms. */
export const MAX_TIMER_DELAY = 2_147_483_647;

export const UNKNOWN_METRIC = 'unknown';
export const ALERT_MARKER = 'ALERT';

export const HOSTWATCH_VERSION = '1.0.0';
