// Types
export type {
  MetricValue,
  MetricName,
  Reading,
  AlertEvent,
  AlertThresholds,
  AlertMode,
  LogStream,
  RotationState,
  LogFileState,
  RotationPolicy,
  RotationOutcome,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  HOSTWATCH_HOME,
  HOSTWATCH_PID_FILE,
  HOSTWATCH_CONFIG_FILES,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_METRICS_FILE,
  DEFAULT_ALERTS_FILE,
  DEFAULT_ROTATION_MAX_AGE,
  DEFAULT_ROTATION_MAX_SIZE,
  DEFAULT_ROTATION_CHECK_EVERY,
  DEFAULT_DISK_PATH,
  DEFAULT_SAMPLER_TIMEOUT,
  DEFAULT_CPU_WINDOW,
  MAX_TIMER_DELAY,
  UNKNOWN_METRIC,
  ALERT_MARKER,
  HOSTWATCH_VERSION,
} from './constants.js';

// Schemas
export {
  monitorConfigSchema,
  thresholdsSchema,
  alertsConfigSchema,
  filesConfigSchema,
  rotationConfigSchema,
  samplerConfigSchema,
  diagnosticsConfigSchema,
} from './schemas/config.schema.js';

export type {
  MonitorConfig,
  MonitorConfigInput,
  RotationConfig,
  SamplerConfig,
} from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  parseBytes,
  formatBytes,
  formatPercent,
  formatUptime,
} from './utils/parser.js';

export {
  formatReading,
  parseReadingLine,
  formatAlert,
  parseAlertLine,
  readingValue,
} from './utils/records.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  HostwatchError,
  MetricUnavailableError,
  LogIoError,
  CompressionError,
  ConfigError,
  MonitorAlreadyRunningError,
  MonitorNotRunningError,
} from './utils/errors.js';
