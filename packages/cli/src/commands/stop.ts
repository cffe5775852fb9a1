import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { stopMonitor } from '@hostwatch/core';
import { describeError } from '../utils/config.js';

export const stopCommand = new Command('stop')
  .description('Stop a running monitor')
  .action(async () => {
    const spinner = ora('Stopping hostwatch...').start();

    try {
      const pid = stopMonitor();
      spinner.succeed(chalk.green(`Sent SIGTERM to hostwatch (PID: ${pid})`));
    } catch (err) {
      spinner.fail(chalk.red(`Failed to stop: ${describeError(err)}`));
      process.exitCode = 1;
    }
  });
