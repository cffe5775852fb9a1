import { Command } from 'commander';
import chalk from 'chalk';
import type { MonitorConfigInput } from '@hostwatch/shared';
import { createLogger, setDefaultLogger } from '@hostwatch/shared';
import { MonitorEngine, removePidFile, writePidFile } from '@hostwatch/core';
import { loadCommandConfig, printError } from '../utils/config.js';
import { formatMetric, formatPercent, formatTimestamp } from '../utils/format.js';

interface StartOptions {
  config?: string;
  interval?: string;
  threshold?: string;
  logDir?: string;
  quiet?: boolean;
}

/**
 * Flags override the config file and environment. Only flags that were
 * given are passed on.
 */
export function startOverrides(options: StartOptions): MonitorConfigInput {
  const overrides: MonitorConfigInput = {};
  if (options.interval !== undefined) overrides.interval = options.interval;
  if (options.threshold !== undefined) overrides.thresholds = { cpu: Number(options.threshold) };
  if (options.logDir !== undefined) overrides.logDir = options.logDir;
  return overrides;
}

export const startCommand = new Command('start')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('-i, --interval <duration>', 'Sampling interval (e.g., 30s, 5m)')
  .option('-t, --threshold <percent>', 'CPU alert threshold')
  .option('-d, --log-dir <dir>', 'Directory for the metrics and alert logs')
  .option('-q, --quiet', 'Only print alerts')
  .description('Start monitoring in the foreground (Ctrl+C to stop)')
  .action(async (options: StartOptions) => {
    let engine: MonitorEngine;
    try {
      engine = await createEngine(options);
      await engine.start();
    } catch (err) {
      printError(err);
      return;
    }

    const onSignal = (): void => {
      engine.stop().catch(printError);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    try {
      await engine.waitForStop();
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      removePidFile();
      console.log(chalk.gray('\n  hostwatch stopped\n'));
    }
  });

async function createEngine(options: StartOptions): Promise<MonitorEngine> {
  const config = await loadCommandConfig(options, startOverrides(options));
  const logger = createLogger({
    level: config.diagnostics.level,
    pretty: config.diagnostics.pretty,
    destination: config.diagnostics.file,
  });
  setDefaultLogger(logger);

  writePidFile();
  const engine = new MonitorEngine(config, { logger });
  const bus = engine.getEventBus();

  if (!options.quiet) {
    bus.on('reading', (reading) => {
      console.log(
        `${chalk.gray(formatTimestamp(reading.timestamp))}  ` +
          `CPU ${formatMetric(reading.cpu, config.thresholds.cpu)}  ` +
          `RAM ${formatMetric(reading.ram, config.thresholds.ram)}  ` +
          `DISK ${formatMetric(reading.disk, config.thresholds.disk)}`,
      );
    });
  }
  bus.on('alert', (alert) => {
    console.log(
      chalk.red.bold(
        `  ALERT ${alert.metric} ${formatPercent(alert.value)} > ${formatPercent(alert.threshold)}`,
      ),
    );
  });
  bus.on('rotation', ({ stream, outcome }) => {
    if (outcome.status === 'rotated') {
      console.log(chalk.cyan(`  Rotated ${stream} log to ${outcome.archivePath}`));
    }
  });

  console.log(chalk.bold('\n  hostwatch') + chalk.gray(` writing to ${config.logDir}`));
  console.log(chalk.gray('  Press Ctrl+C to stop\n'));
  return engine;
}
