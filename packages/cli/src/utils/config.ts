import chalk from 'chalk';
import type { MonitorConfig, MonitorConfigInput } from '@hostwatch/shared';
import { ConfigError } from '@hostwatch/shared';
import { loadConfig } from '@hostwatch/core';

export interface ConfigOptions {
  config?: string;
}

/**
 * Loads the monitor config for a command, applying `overrides` from its flags.
 */
export async function loadCommandConfig(
  options: ConfigOptions,
  overrides?: MonitorConfigInput,
): Promise<MonitorConfig> {
  const { config } = await loadConfig({ configPath: options.config, overrides });
  return config;
}

/** The message to show for a failed command, one line per config problem. */
export function describeError(err: unknown): string {
  if (err instanceof ConfigError) {
    return ['Invalid configuration:', ...err.errors.map((e) => `  - ${e}`)].join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

export function printError(err: unknown): void {
  console.error(chalk.red(`Error: ${describeError(err)}`));
  process.exitCode = 1;
}
