/**
 * Orchestrator
 *
 * Single owner of the target registry. Applies health updates from the
 * monitor, reconciles spawned sessions and services user requests, one
 * tick at a time. Every failure surfaces as a notification; nothing
 * thrown here reaches the caller.
 */

import { EventEmitter } from 'events';
import { TargetRegistry, createLogger, getErrorMessage } from '@hostwarden/core';
import type {
  ActiveSession,
  ConnectionHistoryEntry,
  ConnectionMode,
  ConnectionOutcome,
  Logger,
  ProbeResult,
  Target,
  TargetSpec,
} from '@hostwarden/core';
import { DEFAULT_TICK_INTERVAL_MS, SESSION_LABEL_PREFIX } from './connection/constants.js';
import { HealthMonitor } from './health/health-monitor.js';
import { ConnectionHistory } from './history/connection-history.js';
import { computeAnalytics } from './history/analytics.js';
import type { GlobalAnalytics } from './history/analytics.js';
import { ConnectionLauncher } from './launcher/connection-launcher.js';
import type { LaunchResult } from './launcher/connection-launcher.js';
import type { TerminalSuspender } from './launcher/terminal-suspender.js';
import { SessionRegistry, formatKillSummary } from './session/session-registry.js';
import type { KillAllSummary, KillResult } from './session/session-registry.js';
import { findTerminal } from './terminals/terminal-catalog.js';

export type NotificationLevel = 'info' | 'success' | 'warning' | 'error';

export interface Notification {
  id: string;
  level: NotificationLevel;
  message: string;
  targetId?: string;
  timestamp: number;
}

/** Requests queued by the UI and serviced on the next tick. */
export type UserRequest =
  | { type: 'connect'; targetId: string; mode?: ConnectionMode }
  | { type: 'probe'; targetId: string }
  | { type: 'refresh' }
  | { type: 'kill'; pid: number }
  | { type: 'kill-all' }
  | { type: 'reconcile' };

export type OrchestratorEvents = {
  notification: [Notification];
  change: [];
};

export interface OrchestratorSnapshot {
  targets: Target[];
  sessions: ActiveSession[];
  /** Finished connection attempts, newest first */
  history: ConnectionHistoryEntry[];
  monitorRunning: boolean;
  mode: ConnectionMode;
}

/** The launcher surface the orchestrator depends on. */
export type Launcher = Pick<ConnectionLauncher, 'decideAndLaunch' | 'setSuspender'>;

export interface OrchestratorOptions {
  targets?: TargetRegistry | TargetSpec[];
  /** Connection mode for the lifetime of the process (default auto) */
  mode?: ConnectionMode;
  monitor?: HealthMonitor;
  sessions?: SessionRegistry;
  history?: ConnectionHistory;
  launcher?: Launcher;
  /** Background check interval when no monitor is supplied */
  checkIntervalMs?: number;
  logger?: Logger;
}

type SettledHealth = 'online' | 'offline';

export class Orchestrator {
  private registry: TargetRegistry;
  private monitor: HealthMonitor;
  private sessions: SessionRegistry;
  private history: ConnectionHistory;
  private launcher: Launcher;
  private readonly mode: ConnectionMode;
  private logger: Logger;
  private events = new EventEmitter();

  private settled = new Map<string, SettledHealth>();
  private pendingRequests: UserRequest[] = [];
  private tickInterval: NodeJS.Timeout | null = null;
  private ticking = false;
  private notificationSeq = 0;

  constructor(options: OrchestratorOptions = {}) {
    this.logger = options.logger ?? createLogger({ silent: true });
    this.registry = options.targets instanceof TargetRegistry
      ? options.targets
      : new TargetRegistry(options.targets ?? []);
    this.mode = options.mode ?? 'auto';
    this.monitor = options.monitor ?? new HealthMonitor({ intervalMs: options.checkIntervalMs, logger: this.logger });
    this.sessions = options.sessions ?? new SessionRegistry({ logger: this.logger });
    this.history = options.history ?? new ConnectionHistory();
    this.launcher = options.launcher ?? new ConnectionLauncher({ logger: this.logger });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get error() { return this.logger.error.bind(this.logger); }

  // ─── Events ─────────────────────────────────────────────────

  on<K extends keyof OrchestratorEvents>(event: K, listener: (...args: OrchestratorEvents[K]) => void): () => void {
    this.events.on(event, listener);
    return () => {
      this.events.removeListener(event, listener);
    };
  }

  private emitChange(): void {
    this.events.emit('change');
  }

  private notify(level: NotificationLevel, message: string, targetId?: string): void {
    const notification: Notification = {
      id: `n${++this.notificationSeq}`,
      level,
      message,
      targetId,
      timestamp: Date.now(),
    };
    this.log(`[Orchestrator] ${level}: ${message}`);
    this.events.emit('notification', notification);
  }

  // ─── State ──────────────────────────────────────────────────

  get targets(): TargetRegistry {
    return this.registry;
  }

  get connectionMode(): ConnectionMode {
    return this.mode;
  }

  snapshot(): OrchestratorSnapshot {
    return {
      targets: this.registry.list(),
      sessions: this.sessions.list(),
      history: this.history.list(),
      monitorRunning: this.monitor.isRunning,
      mode: this.mode,
    };
  }

  analytics(): GlobalAnalytics {
    return computeAnalytics(this.registry.list(), this.history.list(), this.sessions.size);
  }

  addTarget(spec: TargetSpec): Target | null {
    const target = this.registry.add(spec);
    if (target) {
      this.emitChange();
    }
    return target;
  }

  removeTarget(targetId: string): Target | null {
    const target = this.registry.remove(targetId);
    if (!target) return null;
    this.settled.delete(targetId);
    this.sessions.removeTarget(targetId);
    this.emitChange();
    return target;
  }

  setTerminalSuspender(suspender: TerminalSuspender): void {
    this.launcher.setSuspender(suspender);
  }

  // ─── Health ─────────────────────────────────────────────────

  /**
   * Apply a probe result and announce online/offline flips.
   * The first settled result for a target never notifies.
   */
  private applyResult(targetId: string, result: ProbeResult): boolean {
    const target = this.registry.get(targetId);
    if (!target) return false;

    this.registry.applyProbeResult(targetId, result);

    if (result.health === 'online' || result.health === 'offline') {
      const previous = this.settled.get(targetId);
      this.settled.set(targetId, result.health);
      if (previous && previous !== result.health) {
        if (result.health === 'offline') {
          const cause = result.error ? `: ${result.error}` : '';
          this.notify('warning', `${target.name} went offline${cause}`, targetId);
        } else {
          this.notify('success', `${target.name} is back online`, targetId);
        }
      }
    }
    return true;
  }

  /**
   * On-demand probe of a single target with the quick timeout.
   */
  async probeNow(targetId: string): Promise<ProbeResult | null> {
    const target = this.registry.get(targetId);
    if (!target) {
      this.notify('error', `Unknown target: ${targetId}`);
      return null;
    }

    this.registry.setHealth(targetId, 'connecting');
    this.emitChange();

    const result = await this.monitor.checkNow(target);
    this.applyResult(targetId, result);
    this.emitChange();
    return result;
  }

  /**
   * Probe every target now, concurrently, and apply results in order.
   */
  async refreshAll(): Promise<void> {
    const targets = this.registry.list();
    if (targets.length === 0) {
      this.notify('info', 'No targets configured');
      return;
    }

    for (const target of targets) {
      this.registry.setHealth(target.id, 'connecting');
    }
    this.emitChange();

    const results = await Promise.all(targets.map((t) => this.monitor.checkNow(t)));
    targets.forEach((target, i) => this.applyResult(target.id, results[i]));

    this.notify('info', `Refreshed ${targets.length} target(s): ${this.registry.countOnline()} online`);
    this.emitChange();
  }

  startMonitor(): boolean {
    const started = this.monitor.start(() => this.registry.list());
    if (started) {
      this.log(`[Orchestrator] Monitoring ${this.registry.size} target(s)`);
      this.emitChange();
    }
    return started;
  }

  async stopMonitor(): Promise<void> {
    this.monitor.stop();
    await this.monitor.join();
    this.emitChange();
  }

  // ─── Connections ────────────────────────────────────────────

  /**
   * Verify and open a session. The result is also reported as a
   * notification; null when the target is unknown or the launch threw.
   */
  async connect(targetId: string, mode: ConnectionMode = this.mode): Promise<LaunchResult | null> {
    const target = this.registry.get(targetId);
    if (!target) {
      this.notify('error', `Unknown target: ${targetId}`);
      return null;
    }

    this.registry.setHealth(targetId, 'connecting');
    this.emitChange();

    let result: LaunchResult;
    try {
      result = await this.launcher.decideAndLaunch(target, mode);
    } catch (err) {
      // an overlapping connect may have left 'connecting' behind; fall back to what was last observed
      if (this.registry.get(targetId)) {
        this.registry.setHealth(targetId, this.settled.get(targetId) ?? 'unknown');
      }
      this.recordAttempt(target, mode, 'failed', getErrorMessage(err));
      this.notify('error', `Failed to connect to ${target.name}: ${getErrorMessage(err)}`, targetId);
      this.emitChange();
      return null;
    }

    if (result.probe) {
      this.applyResult(targetId, result.probe);
    }

    if (!result.success) {
      if (result.error.kind === 'unreachable' && this.registry.get(targetId)?.health !== 'offline') {
        this.registry.setHealth(targetId, 'offline');
      }
      this.recordAttempt(target, mode, 'failed', result.error.message);
      this.notify('error', result.error.message, targetId);
    } else if (result.method === 'new-window') {
      this.recordSession(target, result.pid);
      const terminalName = findTerminal(result.terminal)?.name ?? result.terminal;
      this.recordAttempt(target, mode, 'opened', `${terminalName} (PID ${result.pid})`);
      this.notify('success', `Opened ${target.name} in ${terminalName} (PID ${result.pid})`, targetId);
    } else {
      const exit = result.exitCode === null ? 'terminated' : `exit code ${result.exitCode}`;
      this.recordAttempt(target, mode, 'completed', exit);
      this.notify('info', `Disconnected from ${target.name} (${exit})`, targetId);
    }

    this.emitChange();
    return result;
  }

  private recordAttempt(target: Target, mode: ConnectionMode, outcome: ConnectionOutcome, detail: string): void {
    this.history.record({
      targetId: target.id,
      targetName: target.name,
      mode,
      outcome,
      detail,
      at: Date.now(),
    });
  }

  private recordSession(target: Target, pid: number): void {
    if (!this.registry.get(target.id)) {
      this.log(`[Orchestrator] ${target.name} was removed during launch, not tracking PID ${pid}`);
      return;
    }
    this.sessions.add(target.id, pid, `${SESSION_LABEL_PREFIX} ${target.name}`);
  }

  async killSession(pid: number): Promise<KillResult> {
    const session = this.sessions.findByPid(pid);
    const result = await this.sessions.kill(pid);

    if (result.success) {
      this.notify('success', `Killed ${session?.label ?? 'session'} (PID ${pid})`, session?.targetId);
      this.emitChange();
    } else {
      this.notify('error', `Failed to kill PID ${pid}: ${result.error ?? 'unknown error'}`, session?.targetId);
    }
    return result;
  }

  async killAllSessions(): Promise<KillAllSummary> {
    if (this.sessions.size === 0) {
      this.notify('info', 'No active sessions');
      return { killed: 0, failed: 0, failures: [] };
    }

    const summary = await this.sessions.killAll();
    this.notify(summary.failed === 0 ? 'success' : 'error', formatKillSummary(summary));
    this.emitChange();
    return summary;
  }

  async reconcileSessions(): Promise<ActiveSession[]> {
    const removed = await this.sessions.reconcile();
    if (removed.length > 0) {
      const label = removed.length === 1 ? `${removed[0].label} ended` : `${removed.length} sessions ended`;
      this.notify('info', label, removed.length === 1 ? removed[0].targetId : undefined);
      this.emitChange();
    }
    return removed;
  }

  // ─── Tick loop ──────────────────────────────────────────────

  /** Queue a request for the next tick. */
  request(request: UserRequest): void {
    this.pendingRequests.push(request);
  }

  /**
   * One pass of the control loop:
   * (a) apply queued health updates, (b) reconcile sessions,
   * (c) service user requests raised since the last tick.
   * Overlapping calls return immediately.
   */
  async tick(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;

    try {
      let changed = false;
      for (const update of this.monitor.drainUpdates()) {
        changed = this.applyResult(update.targetId, update.result) || changed;
      }
      if (changed) {
        this.emitChange();
      }

      await this.reconcileSessions();

      const requests = this.pendingRequests;
      this.pendingRequests = [];
      for (const request of requests) {
        await this.service(request);
      }
    } catch (err) {
      this.error(`[Orchestrator] Tick failed: ${getErrorMessage(err)}`);
    } finally {
      this.ticking = false;
    }
  }

  private async service(request: UserRequest): Promise<void> {
    switch (request.type) {
      case 'connect':
        await this.connect(request.targetId, request.mode);
        return;
      case 'probe':
        await this.probeNow(request.targetId);
        return;
      case 'refresh':
        await this.refreshAll();
        return;
      case 'kill':
        await this.killSession(request.pid);
        return;
      case 'kill-all':
        await this.killAllSessions();
        return;
      case 'reconcile': {
        const removed = await this.reconcileSessions();
        if (removed.length === 0) {
          this.notify('info', `${this.sessions.size} session(s) active`);
        }
        return;
      }
    }
  }

  /**
   * Start the monitor and tick on an interval.
   */
  start(tickIntervalMs = DEFAULT_TICK_INTERVAL_MS): void {
    if (this.tickInterval) return;
    this.startMonitor();
    this.tickInterval = setInterval(() => {
      this.tick().catch((err) => this.error(`[Orchestrator] Tick failed: ${getErrorMessage(err)}`));
    }, tickIntervalMs);
  }

  async stop(): Promise<void> {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = null;
    }
    await this.stopMonitor();
  }
}
