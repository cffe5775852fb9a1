import { Command } from 'commander';
import chalk from 'chalk';
import { LogReader } from '@hostwatch/core';
import { loadCommandConfig, printError } from '../utils/config.js';
import { formatTimestamp } from '../utils/format.js';
import { summarize } from '../utils/stats.js';
import { renderSummaryTable } from '../ui/Table.js';

interface SummaryOptions {
  config?: string;
  days: string;
  json?: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** The start of a `--days` window ending now. */
export function sinceDays(days: string, now: Date = new Date()): Date {
  const n = Number(days);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`--days must be a positive number, got "${days}"`);
  }
  return new Date(now.getTime() - n * DAY_MS);
}

export const summaryCommand = new Command('summary')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('--days <n>', 'How many days back to include', '1')
  .option('--json', 'Output as JSON')
  .description('Average, minimum and maximum usage from the metrics log')
  .action(async (options: SummaryOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const reader = new LogReader({ logDir: config.logDir, files: config.files });
      const { records, skipped } = await reader.readReadings({ since: sinceDays(options.days) });
      const summary = summarize(records, config.thresholds.cpu);

      if (options.json) {
        console.log(JSON.stringify({ ...summary, skipped }, null, 2));
        return;
      }

      if (summary.samples === 0) {
        console.log(chalk.gray(`\n  No readings in the last ${options.days} day(s).\n`));
        return;
      }

      console.log(
        chalk.bold(`\n  ${summary.samples} readings`) +
          chalk.gray(
            summary.from && summary.to
              ? ` from ${formatTimestamp(summary.from)} to ${formatTimestamp(summary.to)} UTC`
              : '',
          ),
      );
      console.log(renderSummaryTable(summary));
      const above = `  CPU above ${summary.threshold}%: ${summary.aboveThreshold} reading(s)`;
      console.log(summary.aboveThreshold > 0 ? chalk.red(above) : chalk.green(above));
      if (skipped > 0) {
        console.log(chalk.yellow(`  Skipped ${skipped} malformed line(s)`));
      }
      console.log('');
    } catch (err) {
      printError(err);
    }
  });
