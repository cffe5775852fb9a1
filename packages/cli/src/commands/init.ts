import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  DEFAULT_ALERTS_FILE,
  DEFAULT_CPU_THRESHOLD,
  DEFAULT_METRICS_FILE,
  DEFAULT_ROTATION_CHECK_EVERY,
  DEFAULT_ROTATION_MAX_AGE,
  DEFAULT_ROTATION_MAX_SIZE,
  DEFAULT_SAMPLE_INTERVAL,
  HOSTWATCH_CONFIG_FILES,
} from '@hostwatch/shared';

interface InitOptions {
  template: string;
  force?: boolean;
}

export const initCommand = new Command('init')
  .option('--template <template>', 'Config template (basic, full)', 'basic')
  .option('-f, --force', 'Overwrite an existing config file')
  .description(`Generate a ${HOSTWATCH_CONFIG_FILES[0]} file`)
  .action(async (options: InitOptions) => {
    const configPath = resolve(HOSTWATCH_CONFIG_FILES[0]);

    if (existsSync(configPath) && !options.force) {
      console.log(chalk.yellow(`\n  Config file already exists: ${configPath}\n`));
      return;
    }

    const template = options.template === 'full' ? fullTemplate() : basicTemplate();
    writeFileSync(configPath, `${JSON.stringify(template, null, 2)}\n`);

    console.log(chalk.green(`\n  Created ${configPath}`));
    console.log(chalk.gray(`  Edit it and run: hostwatch start\n`));
  });

export function basicTemplate(): Record<string, unknown> {
  return {
    interval: DEFAULT_SAMPLE_INTERVAL,
    logDir: './logs',
    thresholds: { cpu: DEFAULT_CPU_THRESHOLD },
  };
}

export function fullTemplate(): Record<string, unknown> {
  return {
    interval: DEFAULT_SAMPLE_INTERVAL,
    logDir: './logs',
    files: { metrics: DEFAULT_METRICS_FILE, alerts: DEFAULT_ALERTS_FILE },
    thresholds: { cpu: DEFAULT_CPU_THRESHOLD, ram: 90, disk: 90 },
    alerts: { mode: 'level' },
    rotation: {
      maxAge: DEFAULT_ROTATION_MAX_AGE,
      maxSize: DEFAULT_ROTATION_MAX_SIZE,
      checkEvery: DEFAULT_ROTATION_CHECK_EVERY,
    },
    sampler: { diskPath: '/', timeout: '5s', cpuWindow: '1s' },
    diagnostics: { level: 'info', pretty: false },
  };
}
