#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTWATCH_VERSION } from '@hostwatch/shared';
import { startCommand } from './commands/start.js';
import { stopCommand } from './commands/stop.js';
import { statusCommand } from './commands/status.js';
import { rotateCommand } from './commands/rotate.js';
import { summaryCommand } from './commands/summary.js';
import { historyCommand } from './commands/history.js';
import { alertsCommand } from './commands/alerts.js';
import { infoCommand } from './commands/info.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('hostwatch')
  .version(HOSTWATCH_VERSION, '-v, --version')
  .description(chalk.bold('hostwatch') + ' - CPU, memory and disk monitor with rotating logs')
  .addCommand(startCommand)
  .addCommand(stopCommand)
  .addCommand(statusCommand)
  .addCommand(rotateCommand)
  .addCommand(summaryCommand)
  .addCommand(historyCommand)
  .addCommand(alertsCommand)
  .addCommand(infoCommand)
  .addCommand(initCommand);

// Default to 'status' when no command given
program.action(async () => {
  await statusCommand.parseAsync([], { from: 'user' });
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
