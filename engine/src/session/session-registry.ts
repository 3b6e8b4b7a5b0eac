/**
 * Session Registry
 *
 * Tracks SSH sessions spawned in their own terminal window by PID.
 * Liveness is checked by polling (reconcile); nothing is notified when a
 * window is closed.
 */

import type { ActiveSession, Logger } from '@hostwarden/core';
import { createLogger } from '@hostwarden/core';
import { isProcessRunning, killProcess } from '../connection/process-detection.js';

export interface KillResult {
  pid: number;
  success: boolean;
  error?: string;
}

export interface KillAllSummary {
  killed: number;
  failed: number;
  failures: KillResult[];
}

export interface SessionRegistryOptions {
  logger?: Logger;
}

/** "Killed 3 SSH sessions" or "Killed 2 sessions / 1 failed". */
export function formatKillSummary(summary: KillAllSummary): string {
  if (summary.failed === 0) {
    return `Killed ${summary.killed} SSH session${summary.killed === 1 ? '' : 's'}`;
  }
  return `Killed ${summary.killed} session${summary.killed === 1 ? '' : 's'} / ${summary.failed} failed`;
}

export class SessionRegistry {
  private sessions = new Map<number, ActiveSession>();
  private logger: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Record a spawned session.
   * @returns null when the PID is invalid or already tracked
   */
  add(targetId: string, pid: number, label: string, startedAt = Date.now()): ActiveSession | null {
    if (!Number.isInteger(pid) || pid <= 0) {
      this.warn(`[Sessions] Refusing invalid PID ${pid} for target ${targetId}`);
      return null;
    }
    if (this.sessions.has(pid)) {
      this.warn(`[Sessions] PID ${pid} is already tracked`);
      return null;
    }

    const session: ActiveSession = { pid, targetId, label, startedAt };
    this.sessions.set(pid, session);
    this.log(`[Sessions] Tracking PID ${pid} (${label})`);
    return session;
  }

  /** All sessions, newest first. */
  list(): ActiveSession[] {
    return Array.from(this.sessions.values()).sort((a, b) => b.startedAt - a.startedAt);
  }

  forTarget(targetId: string): ActiveSession[] {
    return this.list().filter((s) => s.targetId === targetId);
  }

  findByPid(pid: number): ActiveSession | undefined {
    return this.sessions.get(pid);
  }

  /**
   * Stop tracking a target's sessions without signalling them.
   */
  removeTarget(targetId: string): ActiveSession[] {
    const removed = this.forTarget(targetId);
    for (const session of removed) {
      this.sessions.delete(session.pid);
    }
    return removed;
  }

  /**
   * Drop every session whose process is no longer alive.
   * Sessions added while the checks run are left alone.
   * @returns The sessions that were removed
   */
  async reconcile(): Promise<ActiveSession[]> {
    const snapshot = Array.from(this.sessions.values());
    const dead: ActiveSession[] = [];

    for (const session of snapshot) {
      if (!(await isProcessRunning(session.pid))) {
        dead.push(session);
      }
    }

    for (const session of dead) {
      // Only remove the exact entry we checked
      if (this.sessions.get(session.pid) === session) {
        this.sessions.delete(session.pid);
        this.log(`[Sessions] Process ${session.pid} no longer running (${session.label})`);
      }
    }

    return dead;
  }

  /**
   * Terminate one tracked session. Unknown PIDs are not signalled.
   */
  async kill(pid: number): Promise<KillResult> {
    if (!this.sessions.has(pid)) {
      return { pid, success: false, error: `No tracked session with PID ${pid}` };
    }

    const outcome = await killProcess(pid);
    if (!outcome.success) {
      this.warn(`[Sessions] Failed to kill PID ${pid}: ${outcome.error}`);
      return { pid, success: false, error: outcome.error };
    }

    this.sessions.delete(pid);
    this.log(`[Sessions] Killed PID ${pid}`);
    return { pid, success: true };
  }

  /**
   * Attempt every tracked session; one failure never stops the rest.
   */
  async killAll(): Promise<KillAllSummary> {
    const summary: KillAllSummary = { killed: 0, failed: 0, failures: [] };

    for (const pid of Array.from(this.sessions.keys())) {
      const result = await this.kill(pid);
      if (result.success) {
        summary.killed++;
      } else {
        summary.failed++;
        summary.failures.push(result);
      }
    }

    return summary;
  }
}
