import { Command } from 'commander';
import chalk from 'chalk';
import { MonitorEngine, getMonitorPid } from '@hostwatch/core';
import { loadCommandConfig, printError } from '../utils/config.js';
import { runningIcon } from '../utils/format.js';
import { renderReadingTable } from '../ui/Table.js';

interface StatusOptions {
  config?: string;
  json?: boolean;
}

export const statusCommand = new Command('status')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('--json', 'Output as JSON')
  .description('Show current CPU, RAM and disk usage')
  .action(async (options: StatusOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const pid = getMonitorPid();
      const reading = await new MonitorEngine(config).status();

      if (options.json) {
        console.log(
          JSON.stringify({ running: pid !== null, pid, reading, thresholds: config.thresholds }, null, 2),
        );
        return;
      }

      const monitor = pid !== null ? `running (PID: ${pid})` : 'not running';
      console.log(`\n  ${runningIcon(pid !== null)} Monitor ${monitor}`);
      console.log(chalk.gray(`  Logs: ${config.logDir}\n`));
      console.log(renderReadingTable(reading, config.thresholds));
    } catch (err) {
      printError(err);
    }
  });
