import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { LogStream } from '@hostwatch/shared';
import { MonitorEngine, getMonitorPid } from '@hostwatch/core';
import { describeError, loadCommandConfig } from '../utils/config.js';
import { formatOutcome } from '../utils/format.js';

interface RotateOptions {
  config?: string;
}

export const rotateCommand = new Command('rotate')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .description('Archive the metrics and alert logs now')
  .action(async (options: RotateOptions) => {
    // Rotation here is not coordinated with a monitor in another process.
    const pid = getMonitorPid();
    if (pid !== null) {
      console.log(
        chalk.yellow(`Note: hostwatch is running (PID: ${pid}); its next append may race this rotation`),
      );
    }

    const spinner = ora('Rotating logs...').start();

    try {
      const config = await loadCommandConfig(options);
      const engine = new MonitorEngine(config);
      const failures = new Map<LogStream, string>();
      engine.getEventBus().on('error', ({ stream, error }) => {
        if (stream) failures.set(stream, error.message);
      });

      const outcomes = await engine.rotateNow();
      if (outcomes.metrics && outcomes.alerts) {
        spinner.succeed(chalk.green('Rotation complete'));
      } else {
        spinner.warn(chalk.yellow('Rotation incomplete'));
        process.exitCode = 1;
      }
      console.log(`  metrics: ${formatOutcome(outcomes.metrics, failures.get('metrics'))}`);
      console.log(`  alerts:  ${formatOutcome(outcomes.alerts, failures.get('alerts'))}`);
    } catch (err) {
      spinner.fail(chalk.red(`Failed to rotate: ${describeError(err)}`));
      process.exitCode = 1;
    }
  });
