/**
 * Process Detection
 *
 * Cross-platform liveness checks, termination and command lookup for
 * the processes hostwarden spawns. Supports macOS, Linux, and Windows.
 *
 * @module connection/process-detection
 */

import { exec as execCb } from 'child_process';
import { promisify } from 'util';
import { platform } from 'process';
import { getErrorMessage } from '@hostwarden/core';
import { PROCESS_CHECK_TIMEOUT_MS } from './constants.js';

const execAsync = promisify(execCb);

const isWindows = platform === 'win32';

export interface KillOutcome {
  success: boolean;
  error?: string;
}

function isValidPid(pid: number): boolean {
  return Number.isInteger(pid) && pid > 0;
}

/**
 * Check if a process is still running.
 *
 * Uses `kill -0` on Unix (checks existence without sending a signal)
 * and PowerShell on Windows. Any failure means "assume dead".
 */
export async function isProcessRunning(pid: number): Promise<boolean> {
  if (!isValidPid(pid)) return false;

  try {
    if (isWindows) {
      await execAsync(`powershell.exe -NoProfile -Command "Get-Process -Id ${pid} -ErrorAction Stop"`, { timeout: PROCESS_CHECK_TIMEOUT_MS });
    } else {
      await execAsync(`kill -0 ${pid} 2>/dev/null`);
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Ask a process to terminate: SIGTERM on Unix, `taskkill /F` on Windows.
 */
export async function killProcess(pid: number): Promise<KillOutcome> {
  if (!isValidPid(pid)) {
    return { success: false, error: `Invalid PID: ${pid}` };
  }

  try {
    if (isWindows) {
      await execAsync(`taskkill /F /PID ${pid}`, { timeout: PROCESS_CHECK_TIMEOUT_MS });
    } else {
      await execAsync(`kill -TERM ${pid}`);
    }
    return { success: true };
  } catch (err) {
    return { success: false, error: getErrorMessage(err).trim() };
  }
}

/**
 * Check if a command is available on the system PATH.
 */
export async function isCommandOnPath(cmd: string): Promise<boolean> {
  try {
    const which = isWindows ? 'where' : 'which';
    await execAsync(`${which} ${cmd}`);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether any running process matches a name pattern.
 * `pgrep -f` on Unix (exit code 1 when nothing matches), `tasklist` on Windows.
 */
export async function isProcessNamed(pattern: string): Promise<boolean> {
  try {
    if (isWindows) {
      const { stdout } = await execAsync(`tasklist /FI "IMAGENAME eq ${pattern}*" /NH`, { timeout: PROCESS_CHECK_TIMEOUT_MS });
      return stdout.toLowerCase().includes(pattern.toLowerCase());
    }
    const { stdout } = await execAsync(`pgrep -f ${pattern}`);
    return stdout.trim().length > 0;
  } catch {
    return false;
  }
}
