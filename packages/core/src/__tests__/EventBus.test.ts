import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventBus } from '../events/EventBus.js';
import type { AlertEvent, EventBusMessage, Reading } from '@hostwatch/shared';

// Mock nanoid to return deterministic IDs
vi.mock('nanoid', () => ({
  nanoid: () => 'test-id-123',
}));

const reading: Reading = {
  timestamp: new Date('2026-10-19T13:21:00.000Z'),
  cpu: 85,
  ram: 40.5,
  disk: null,
};

const alert: AlertEvent = {
  timestamp: new Date('2026-10-19T13:21:00.000Z'),
  metric: 'CPU',
  value: 85,
  threshold: 80,
};

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('emit and on', () => {
    it('should emit an event and call the listener with correct data', () => {
      const handler = vi.fn();

      eventBus.on('reading', handler);
      eventBus.emit('reading', reading);

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith(reading);
    });

    it('should not call listeners for different events', () => {
      const readingHandler = vi.fn();
      const alertHandler = vi.fn();

      eventBus.on('reading', readingHandler);
      eventBus.on('alert', alertHandler);

      eventBus.emit('alert', alert);

      expect(alertHandler).toHaveBeenCalledWith(alert);
      expect(readingHandler).not.toHaveBeenCalled();
    });

    it('should deliver rotation outcomes', () => {
      const handler = vi.fn();
      eventBus.on('rotation', handler);

      const outcome = {
        status: 'rotated' as const,
        archivePath: '/logs/syslog.txt.20261019T132100.000Z.gz',
        recovered: false,
      };
      eventBus.emit('rotation', { stream: 'metrics', outcome });

      expect(handler).toHaveBeenCalledWith({ stream: 'metrics', outcome });
    });
  });

  describe('once', () => {
    it('should call the handler only once', () => {
      const handler = vi.fn();

      eventBus.once('engine:state', handler);
      eventBus.emit('engine:state', 'sampling');
      eventBus.emit('engine:state', 'idle');

      expect(handler).toHaveBeenCalledOnce();
      expect(handler).toHaveBeenCalledWith('sampling');
    });
  });

  describe('off', () => {
    it('should only remove the specified listener', () => {
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      eventBus.on('alert', handler1);
      eventBus.on('alert', handler2);
      eventBus.off('alert', handler1);
      eventBus.emit('alert', alert);

      expect(handler1).not.toHaveBeenCalled();
      expect(handler2).toHaveBeenCalledOnce();
    });
  });

  describe('error events', () => {
    it('should not throw when an error is emitted without a listener', () => {
      expect(() => {
        eventBus.emit('error', { phase: 'write', stream: 'metrics', error: new Error('disk full') });
      }).not.toThrow();
    });

    it('should deliver errors to a listener', () => {
      const handler = vi.fn();
      const error = new Error('disk full');
      eventBus.on('error', handler);

      eventBus.emit('error', { phase: 'write', stream: 'alerts', error });

      expect(handler).toHaveBeenCalledWith({ phase: 'write', stream: 'alerts', error });
    });
  });

  describe('wildcard events (onAny / offAny)', () => {
    it('should receive all events via onAny', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);

      eventBus.emit('reading', reading);
      eventBus.emit('engine:stop', undefined);

      expect(anyHandler).toHaveBeenCalledTimes(2);

      const firstCall = anyHandler.mock.calls[0][0] as EventBusMessage;
      expect(firstCall.id).toBe('test-id-123');
      expect(firstCall.type).toBe('reading');
      expect(firstCall.source).toBe('engine');
      expect(firstCall.timestamp).toBeInstanceOf(Date);
      expect(firstCall.data).toEqual(reading);

      const secondCall = anyHandler.mock.calls[1][0] as EventBusMessage;
      expect(secondCall.type).toBe('engine:stop');
    });

    it('should forward unheard errors to wildcard listeners', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);

      eventBus.emit('error', { phase: 'rotate', error: new Error('gzip failed') });

      expect(anyHandler).toHaveBeenCalledOnce();
      expect((anyHandler.mock.calls[0][0] as EventBusMessage).type).toBe('error');
    });

    it('should stop receiving events after offAny', () => {
      const anyHandler = vi.fn();
      eventBus.onAny(anyHandler);
      eventBus.emit('alert', alert);
      eventBus.offAny(anyHandler);
      eventBus.emit('alert', alert);

      expect(anyHandler).toHaveBeenCalledOnce();
    });
  });

  describe('removeAllListeners', () => {
    it('should remove all listeners for all events', () => {
      const readingHandler = vi.fn();
      const anyHandler = vi.fn();
      eventBus.on('reading', readingHandler);
      eventBus.onAny(anyHandler);

      eventBus.removeAllListeners();
      eventBus.emit('reading', reading);

      expect(readingHandler).not.toHaveBeenCalled();
      expect(anyHandler).not.toHaveBeenCalled();
    });
  });
});
