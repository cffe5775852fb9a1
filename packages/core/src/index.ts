// Metrics
export { OsMetricSource } from './metrics/MetricSource.js';
export type { MetricSource, OsMetricSourceOptions } from './metrics/MetricSource.js';
export { Sampler } from './metrics/Sampler.js';
export type { SamplerOptions } from './metrics/Sampler.js';

// Alerts
export { AlertEvaluator, evaluate, evaluateAll } from './alerts/AlertEvaluator.js';

// Logs
export { LogWriter } from './logs/LogWriter.js';
export type { LogFiles, LogWriterOptions } from './logs/LogWriter.js';
export { LogRotator, gzipFile } from './logs/LogRotator.js';
export type { CompressFn, LogRotatorOptions } from './logs/LogRotator.js';
export { LogReader } from './logs/LogReader.js';
export type { LogReaderOptions, ReadOptions, ReadResult } from './logs/LogReader.js';
export { archiveStamp } from './logs/naming.js';

// Events
export { EventBus } from './events/EventBus.js';
export type { EnginePhase, EventName } from './events/EventBus.js';

// Engine
export { MonitorEngine } from './engine/MonitorEngine.js';
export type { EngineState, MonitorEngineDeps, TickResult } from './engine/MonitorEngine.js';
export {
  readPidFile,
  getMonitorPid,
  isMonitorRunning,
  writePidFile,
  removePidFile,
  stopMonitor,
} from './engine/pidfile.js';

// Config
export { loadConfig, findConfigFile } from './config/ConfigLoader.js';
export type { LoadConfigOptions, LoadedConfig } from './config/ConfigLoader.js';
