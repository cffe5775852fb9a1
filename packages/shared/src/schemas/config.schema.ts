import { z } from 'zod';
import {
  DEFAULT_ALERTS_FILE,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_CPU_WINDOW,
  DEFAULT_DISK_PATH,
  DEFAULT_METRICS_FILE,
  DEFAULT_ROTATION_CHECK_EVERY,
  DEFAULT_ROTATION_MAX_AGE,
  DEFAULT_ROTATION_MAX_SIZE,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_SAMPLER_TIMEOUT,
  MAX_TIMER_DELAY,
} from '../constants.js';
import { parseBytes, parseDuration } from '../utils/parser.js';

interface DurationOptions {
  allowZero?: boolean;
  /** The value is handed to setTimeout, so it must fit a timer delay. */
  timer?: boolean;
}

function durationField(defaultValue: string, options: DurationOptions = {}) {
  return z
    .union([z.string(), z.number()])
    .default(defaultValue)
    .transform((value, ctx) => {
      let ms: number;
      try {
        ms = parseDuration(value);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err instanceof Error ? err.message : String(err),
        });
        return z.NEVER;
      }
      if (!Number.isFinite(ms) || ms < 0 || (ms === 0 && !options.allowZero)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duration must be ${options.allowZero ? 'zero or positive' : 'positive'}: "${value}"`,
        });
        return z.NEVER;
      }
      if (options.timer && ms > MAX_TIMER_DELAY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duration must not exceed ${MAX_TIMER_DELAY}ms: "${value}"`,
        });
        return z.NEVER;
      }
      return ms;
    });
}

function sizeField(defaultValue: string) {
  return z
    .union([z.string(), z.number()])
    .default(defaultValue)
    .transform((value, ctx) => {
      let size: number;
      try {
        size = parseBytes(value);
      } catch (err) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err instanceof Error ? err.message : String(err),
        });
        return z.NEVER;
      }
      if (!Number.isFinite(size) || size <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Size must be positive: "${value}"` });
        return z.NEVER;
      }
      return size;
    });
}

const percentSchema = z.number().min(0).max(100);

export const thresholdsSchema = z.object({
  cpu: percentSchema.default(DEFAULT_CPU_THRESHOLD),
  ram: percentSchema.optional(),
  disk: percentSchema.optional(),
});

export const alertsConfigSchema = z.object({
  mode: z.enum(['level', 'edge']).default('level'),
});

export const filesConfigSchema = z
  .object({
    metrics: z.string().min(1).default(DEFAULT_METRICS_FILE),
    alerts: z.string().min(1).default(DEFAULT_ALERTS_FILE),
  })
  .refine((files) => files.metrics !== files.alerts, {
    message: 'metrics and alerts must be written to different files',
  });

export const rotationConfigSchema = z.object({
  maxAge: durationField(DEFAULT_ROTATION_MAX_AGE),
  maxSize: sizeField(DEFAULT_ROTATION_MAX_SIZE),
  checkEvery: z.number().int().positive().default(DEFAULT_ROTATION_CHECK_EVERY),
});

export const samplerConfigSchema = z.object({
  diskPath: z.string().min(1).default(DEFAULT_DISK_PATH),
  timeout: durationField(DEFAULT_SAMPLER_TIMEOUT, { timer: true }),
  cpuWindow: durationField(DEFAULT_CPU_WINDOW, { allowZero: true, timer: true }),
});

export const diagnosticsConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  file: z.string().min(1).optional(),
  pretty: z.boolean().default(false),
});

export const monitorConfigSchema = z
  .object({
    interval: durationField(DEFAULT_SAMPLE_INTERVAL, { timer: true }),
    logDir: z.string().min(1).default('.'),
    files: filesConfigSchema.default({}),
    thresholds: thresholdsSchema.default({}),
    alerts: alertsConfigSchema.default({}),
    rotation: rotationConfigSchema.default({}),
    sampler: samplerConfigSchema.default({}),
    diagnostics: diagnosticsConfigSchema.default({}),
  })
  .strict();

export type MonitorConfigInput = z.input<typeof monitorConfigSchema>;
export type MonitorConfig = z.output<typeof monitorConfigSchema>;
export type RotationConfig = MonitorConfig['rotation'];
export type SamplerConfig = MonitorConfig['sampler'];
