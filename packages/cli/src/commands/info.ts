import { Command } from 'commander';
import chalk from 'chalk';
import { arch, cpus, freemem, hostname, platform, totalmem, uptime } from 'node:os';
import { statfs } from 'node:fs/promises';
import { loadCommandConfig, printError } from '../utils/config.js';
import { formatBytes, formatUptime } from '../utils/format.js';

interface InfoOptions {
  config?: string;
  json?: boolean;
}

export interface HostInfo {
  hostname: string;
  platform: string;
  cores: number;
  cpuModel: string | null;
  memoryTotal: number;
  memoryFree: number;
  diskPath: string;
  diskTotal: number | null;
  diskFree: number | null;
  uptime: number;
}

export async function collectHostInfo(diskPath: string): Promise<HostInfo> {
  const cores = cpus();
  let diskTotal: number | null = null;
  let diskFree: number | null = null;
  try {
    const stats = await statfs(diskPath);
    diskTotal = stats.blocks * stats.bsize;
    diskFree = stats.bavail * stats.bsize;
  } catch {
    // Reported as unknown
  }

  return {
    hostname: hostname(),
    platform: `${platform()} ${arch()}`,
    cores: cores.length,
    cpuModel: cores.length > 0 ? cores[0].model : null,
    memoryTotal: totalmem(),
    memoryFree: freemem(),
    diskPath,
    diskTotal,
    diskFree,
    uptime: uptime(),
  };
}

export const infoCommand = new Command('info')
  .option('-c, --config <path>', 'Config file (default: hostwatch.config.json)')
  .option('--json', 'Output as JSON')
  .description('Show host hardware and uptime')
  .action(async (options: InfoOptions) => {
    try {
      const config = await loadCommandConfig(options);
      const info = await collectHostInfo(config.sampler.diskPath);

      if (options.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      const disk =
        info.diskTotal !== null && info.diskFree !== null
          ? `${formatBytes(info.diskFree)} free of ${formatBytes(info.diskTotal)}`
          : chalk.gray('unknown');

      console.log(chalk.bold(`\n  ${info.hostname}`));
      console.log(`  Platform:  ${info.platform}`);
      console.log(`  CPU:       ${info.cores} core(s)${info.cpuModel ? `, ${info.cpuModel}` : ''}`);
      console.log(
        `  Memory:    ${formatBytes(info.memoryFree)} free of ${formatBytes(info.memoryTotal)}`,
      );
      console.log(`  Disk (${info.diskPath}): ${disk}`);
      console.log(`  Uptime:    ${formatUptime(info.uptime)}\n`);
    } catch (err) {
      printError(err);
    }
  });
