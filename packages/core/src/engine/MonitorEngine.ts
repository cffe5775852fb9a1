import type pino from 'pino';
import type {
  AlertEvent,
  LogStream,
  MonitorConfig,
  Reading,
  RotationOutcome,
} from '@hostwatch/shared';
import { getLogger } from '@hostwatch/shared';
import { AlertEvaluator } from '../alerts/AlertEvaluator.js';
import { EventBus, type EnginePhase } from '../events/EventBus.js';
import { LogRotator } from '../logs/LogRotator.js';
import { LogWriter } from '../logs/LogWriter.js';
import { OsMetricSource, type MetricSource } from '../metrics/MetricSource.js';
import { Sampler } from '../metrics/Sampler.js';

export type EngineState =
  | 'idle'
  | 'sampling'
  | 'evaluating'
  | 'writing'
  | 'rotation-check'
  | 'stopped';

export interface TickResult {
  reading: Reading;
  alerts: AlertEvent[];
  /** False when any append of this tick failed. */
  persisted: boolean;
  /** Present only on ticks that ran the rotation check. */
  rotations?: Record<LogStream, RotationOutcome | null>;
}

export interface MonitorEngineDeps {
  source?: MetricSource;
  sampler?: Sampler;
  evaluator?: AlertEvaluator;
  writer?: LogWriter;
  rotator?: LogRotator;
  eventBus?: EventBus;
  logger?: pino.Logger;
  now?: () => Date;
}

/**
 * Drives sample → evaluate → write → (rotation check) on a fixed interval.
 *
 * Ticks never overlap: the next interval is only awaited once a tick has
 * finished, and `tick()`, `rotateNow()` and the loop share one queue. A stop
 * request is honoured between ticks, never during a write. No per-tick
 * failure ends the loop; failures are logged and emitted as `error` events.
 */
export class MonitorEngine {
  private config: MonitorConfig;
  private sampler: Sampler;
  private evaluator: AlertEvaluator;
  private writer: LogWriter;
  private rotator: LogRotator;
  private eventBus: EventBus;
  private logger: pino.Logger;

  private state: EngineState = 'idle';
  private latest: Reading | null = null;
  private tickCount: number = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private loop: Promise<void> | null = null;
  private stopRequested: boolean = false;
  private wake: (() => void) | null = null;

  constructor(config: MonitorConfig, deps: MonitorEngineDeps = {}) {
    this.config = config;
    this.logger = deps.logger ?? getLogger();
    this.eventBus = deps.eventBus ?? new EventBus();

    const files = config.files;
    const now = deps.now ?? (() => new Date());

    this.sampler =
      deps.sampler ??
      new Sampler(
        deps.source ??
          new OsMetricSource({
            diskPath: config.sampler.diskPath,
            cpuWindow: config.sampler.cpuWindow,
          }),
        { timeout: config.sampler.timeout, now, logger: this.logger },
      );
    this.evaluator = deps.evaluator ?? new AlertEvaluator(config.thresholds, config.alerts.mode);
    this.writer = deps.writer ?? new LogWriter({ logDir: config.logDir, files, logger: this.logger });
    this.rotator =
      deps.rotator ??
      new LogRotator({
        logDir: config.logDir,
        files,
        policy: { maxAge: config.rotation.maxAge, maxSize: config.rotation.maxSize },
        now,
        logger: this.logger,
      });
  }

  getState(): EngineState {
    return this.state;
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Starts the loop. The first tick runs immediately; the returned promise
   * resolves once the loop is scheduled, not when it ends (see `waitForStop`).
   */
  async start(): Promise<void> {
    if (this.loop) {
      this.logger.warn('Monitor is already running');
      return;
    }

    this.stopRequested = false;
    this.setState('idle');
    this.loop = this.run();
    this.eventBus.emit('engine:start', undefined);
    this.logger.info(
      {
        interval: this.config.interval,
        thresholds: this.config.thresholds,
        logDir: this.config.logDir,
      },
      'Monitor started',
    );
  }

  /** Resolves after the in-flight tick, if any, has finished. */
  async stop(): Promise<void> {
    if (!this.loop) return;

    this.stopRequested = true;
    this.wake?.();
    await this.loop;
  }

  /** Resolves when the loop has ended. */
  async waitForStop(): Promise<void> {
    await this.loop;
  }

  /** Runs one full cycle outside of the timer. */
  tick(): Promise<TickResult> {
    return this.exclusive(() => this.runTick());
  }

  /**
   * Rotates both streams now, whatever their age and size. A stream whose
   * rotation fails is reported as an `error` event and comes back as null;
   * the other stream is still rotated.
   */
  rotateNow(): Promise<Record<LogStream, RotationOutcome | null>> {
    return this.exclusive(async () => ({
      metrics: await this.forceRotation('metrics'),
      alerts: await this.forceRotation('alerts'),
    }));
  }

  /**
   * The most recent reading, without waiting for the next tick. An engine
   * that has not sampled yet takes one reading now.
   */
  async status(): Promise<Reading> {
    if (this.latest) return this.latest;
    const reading = await this.sampler.sample();
    this.latest = reading;
    return reading;
  }

  private async run(): Promise<void> {
    try {
      while (!this.stopRequested) {
        try {
          await this.tick();
        } catch (err) {
          this.reportError('tick', err);
        }

        if (this.stopRequested) break;
        await this.sleep(this.config.interval);
      }
    } finally {
      this.loop = null;
      this.setState('stopped');
      this.eventBus.emit('engine:stop', undefined);
      this.logger.info({ ticks: this.tickCount }, 'Monitor stopped');
    }
  }

  private async runTick(): Promise<TickResult> {
    this.tickCount++;

    this.setState('sampling');
    const reading = await this.sampler.sample();
    this.latest = reading;
    this.eventBus.emit('reading', reading);

    this.setState('evaluating');
    const alerts = this.evaluator.evaluate(reading);

    this.setState('writing');
    let persisted = await this.persist('metrics', () => this.writer.append('metrics', reading));
    for (const alert of alerts) {
      this.logger.warn(
        { metric: alert.metric, value: alert.value, threshold: alert.threshold },
        `High ${alert.metric} usage`,
      );
      this.eventBus.emit('alert', alert);
      persisted = (await this.persist('alerts', () => this.writer.append('alerts', alert))) && persisted;
    }

    const result: TickResult = { reading, alerts, persisted };

    if ((this.tickCount - 1) % this.config.rotation.checkEvery === 0) {
      this.setState('rotation-check');
      result.rotations = {
        metrics: await this.checkRotation('metrics'),
        alerts: await this.checkRotation('alerts'),
      };
    }

    this.setState('idle');
    return result;
  }

  private async persist(stream: LogStream, write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (err) {
      this.reportError('write', err, stream);
      return false;
    }
  }

  // null when the check itself failed; it is retried on the next check.
  private checkRotation(stream: LogStream): Promise<RotationOutcome | null> {
    return this.attemptRotation(stream, () => this.rotator.maybeRotate(stream));
  }

  private forceRotation(stream: LogStream): Promise<RotationOutcome | null> {
    return this.attemptRotation(stream, () => this.rotator.rotate(stream));
  }

  private async attemptRotation(
    stream: LogStream,
    rotate: () => Promise<RotationOutcome>,
  ): Promise<RotationOutcome | null> {
    try {
      const outcome = await rotate();
      if (outcome.status === 'rotated') {
        this.eventBus.emit('rotation', { stream, outcome });
      }
      return outcome;
    } catch (err) {
      this.reportError('rotate', err, stream);
      return null;
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private setState(state: EngineState): void {
    if (this.state === state) return;
    this.state = state;
    this.eventBus.emit('engine:state', state);
  }

  private reportError(phase: EnginePhase, err: unknown, stream?: LogStream): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.logger.error({ err: error, phase, stream }, `Monitor ${phase} failed`);
    this.eventBus.emit('error', { phase, stream, error });
  }
}
