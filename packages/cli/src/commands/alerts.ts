import { Command } from 'commander';
import chalk from 'chalk';
import { LogReader } from '@hostwatch/core';
import { loadCommandConfig, printError } from '../utils/config.js';
import { renderAlertLine } from '../ui/Table.js';

interface AlertsOptions {
  config?: string;
  lines: string;
  json?: boolean;
}

export const alertsCommand = new Command('alerts')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('-l, --lines <n>', 'Number of alerts to show', '20')
  .option('--json', 'Output as JSON')
  .description('Show the most recent alerts')
  .action(async (options: AlertsOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const reader = new LogReader({ logDir: config.logDir, files: config.files });
      const { records } = await reader.readAlerts();
      const lines = Math.max(0, parseInt(options.lines, 10) || 0);
      const recent = lines > 0 ? records.slice(-lines) : [];

      if (options.json) {
        console.log(JSON.stringify(recent, null, 2));
        return;
      }

      if (recent.length === 0) {
        console.log(chalk.gray('\n  No alerts recorded.\n'));
        return;
      }

      for (const alert of recent) {
        console.log(renderAlertLine(alert));
      }
    } catch (err) {
      printError(err);
    }
  });
