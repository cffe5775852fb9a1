export type {
  MetricValue,
  MetricName,
  Reading,
  AlertEvent,
  AlertThresholds,
  AlertMode,
} from './metrics.js';

export type {
  LogStream,
  RotationState,
  LogFileState,
  RotationPolicy,
  RotationOutcome,
} from './logs.js';

export type { EventBusMessage } from './events.js';
