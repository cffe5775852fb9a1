import { Command } from 'commander';
import chalk from 'chalk';
import { LogReader } from '@hostwatch/core';
import { loadCommandConfig, printError } from '../utils/config.js';
import { hourlyAverages } from '../utils/stats.js';
import { renderHistoryTable } from '../ui/Table.js';
import { sinceDays } from './summary.js';

interface HistoryOptions {
  config?: string;
  days: string;
  json?: boolean;
}

export const historyCommand = new Command('history')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('--days <n>', 'How many days back to include', '1')
  .option('--json', 'Output as JSON')
  .description('Hourly average usage from the metrics log')
  .action(async (options: HistoryOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const reader = new LogReader({ logDir: config.logDir, files: config.files });
      const { records } = await reader.readReadings({ since: sinceDays(options.days) });
      const rows = hourlyAverages(records);

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      if (rows.length === 0) {
        console.log(chalk.gray(`\n  No readings in the last ${options.days} day(s).\n`));
        return;
      }

      console.log(renderHistoryTable(rows));
    } catch (err) {
      printError(err);
    }
  });
