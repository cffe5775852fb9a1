import { writeFileSync, readFileSync, existsSync, unlinkSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import {
  HOSTWATCH_PID_FILE,
  MonitorAlreadyRunningError,
  MonitorNotRunningError,
} from '@hostwatch/shared';

/**
 * Read the PID recorded in the PID file, whether or not that process is alive.
 */
export function readPidFile(pidFile: string = HOSTWATCH_PID_FILE): number | null {
  if (!existsSync(pidFile)) return null;

  const pid = parseInt(readFileSync(pidFile, 'utf-8').trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Get the PID of a running monitor. A stale PID file is removed.
 */
export function getMonitorPid(pidFile: string = HOSTWATCH_PID_FILE): number | null {
  const pid = readPidFile(pidFile);
  if (pid === null) return null;

  if (isProcessAlive(pid)) return pid;

  removePidFile(pidFile);
  return null;
}

export function isMonitorRunning(pidFile: string = HOSTWATCH_PID_FILE): boolean {
  return getMonitorPid(pidFile) !== null;
}

/**
 * Record the current process as the running monitor.
 */
export function writePidFile(pidFile: string = HOSTWATCH_PID_FILE): void {
  const running = getMonitorPid(pidFile);
  if (running !== null && running !== process.pid) {
    throw new MonitorAlreadyRunningError(running);
  }

  mkdirSync(dirname(pidFile), { recursive: true });
  writeFileSync(pidFile, String(process.pid));
}

export function removePidFile(pidFile: string = HOSTWATCH_PID_FILE): void {
  try {
    unlinkSync(pidFile);
  } catch {
    // Already gone
  }
}

/**
 * Ask the running monitor to stop. Returns the PID that was signalled.
 */
export function stopMonitor(pidFile: string = HOSTWATCH_PID_FILE): number {
  const pid = getMonitorPid(pidFile);
  if (pid === null) {
    throw new MonitorNotRunningError();
  }

  process.kill(pid, 'SIGTERM');
  return pid;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}
