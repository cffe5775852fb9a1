import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type {
  AlertEvent,
  EventBusMessage,
  LogStream,
  Reading,
  RotationOutcome,
} from '@hostwatch/shared';
import type { EngineState } from '../engine/MonitorEngine.js';

export type EnginePhase = 'sample' | 'write' | 'rotate' | 'tick';

type EventMap = {
  'engine:start': undefined;
  'engine:stop': undefined;
  'engine:state': EngineState;
  reading: Reading;
  alert: AlertEvent;
  rotation: { stream: LogStream; outcome: RotationOutcome };
  error: { phase: EnginePhase; stream?: LogStream; error: Error };
};

export type EventName = keyof EventMap;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    // 'error' is a regular event here; EventEmitter would throw it without a listener.
    if (event !== 'error' || this.emitter.listenerCount('error') > 0) {
      this.emitter.emit(event, data);
    }
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: 'engine',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler as (...args: unknown[]) => void);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler as (...args: unknown[]) => void);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler as (...args: unknown[]) => void);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
