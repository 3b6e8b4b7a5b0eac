/**
 * Health Monitor
 *
 * Background loop that probes every target once per interval and queues
 * the results for the orchestrator. Probes within a tick run concurrently;
 * results are queued in target order once the whole tick has finished.
 */

import type { HealthUpdateMessage, Logger, ProbeResult, Target } from '@hostwarden/core';
import { createLogger, getErrorMessage } from '@hostwarden/core';
import { DEFAULT_CHECK_INTERVAL_MS, QUICK_PROBE_TIMEOUT_MS } from '../connection/constants.js';
import { probeTarget } from './prober.js';
import type { ProbeFn } from './prober.js';
import { UpdateQueue } from './update-queue.js';

/**
 * Targets to monitor: a fixed snapshot, or a provider read at every tick.
 */
export type TargetSource = readonly Target[] | (() => readonly Target[]);

export interface HealthMonitorOptions {
  /** Interval between ticks (default 30s) */
  intervalMs?: number;
  /** Per-probe timeout (default 5s) */
  timeoutMs?: number;
  /** Probe implementation, replaceable for tests */
  probe?: ProbeFn;
  logger?: Logger;
}

export class HealthMonitor {
  private running = false;
  private generation = 0;
  private task: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private queue = new UpdateQueue<HealthUpdateMessage>();
  private intervalMs: number;
  private timeoutMs: number;
  private probe: ProbeFn;
  private logger: Logger;

  constructor(options: HealthMonitorOptions = {}) {
    this.intervalMs = options.intervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? QUICK_PROBE_TIMEOUT_MS;
    this.probe = options.probe ?? probeTarget;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  get isRunning(): boolean {
    return this.running;
  }

  get checkIntervalMs(): number {
    return this.intervalMs;
  }

  /**
   * Start the background loop. The first tick runs immediately.
   * @returns false if already running or the receiving end is closed
   */
  start(source: TargetSource): boolean {
    if (this.running) {
      this.warn('[Monitor] Already running, ignoring start');
      return false;
    }
    if (this.queue.isClosed) {
      this.warn('[Monitor] Update queue closed, cannot start');
      return false;
    }

    let read: () => readonly Target[];
    if (typeof source === 'function') {
      read = source;
    } else {
      const snapshot = [...source];
      read = () => snapshot;
    }

    this.running = true;
    const generation = ++this.generation;
    this.task = this.run(generation, read);
    return true;
  }

  /**
   * Ask the loop to stop. It exits at the next check of the flag; results
   * of a tick still in flight are discarded.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.wake?.();
  }

  /** Resolves once the background loop has exited. */
  async join(): Promise<void> {
    const task = this.task;
    if (task) {
      await task;
    }
  }

  /**
   * Forceful stop: late results are dropped and callers need not wait
   * for in-flight probes.
   */
  abort(): void {
    this.running = false;
    this.generation++;
    this.wake?.();
    this.task = null;
  }

  /** Pop one queued update without waiting. */
  tryRecvUpdate(): HealthUpdateMessage | null {
    return this.queue.tryShift();
  }

  /** Pop every queued update. */
  drainUpdates(): HealthUpdateMessage[] {
    return this.queue.drain();
  }

  /** Close the receiving end; a running loop exits on its next send. */
  close(): void {
    this.queue.close();
  }

  /** Out-of-band probe with the quick timeout. Never rejects. */
  checkNow(target: Target): Promise<ProbeResult> {
    return this.safeProbe(target);
  }

  private isCurrent(generation: number): boolean {
    return this.running && this.generation === generation;
  }

  private async run(generation: number, read: () => readonly Target[]): Promise<void> {
    this.log(`[Monitor] Started (interval ${this.intervalMs}ms)`);

    while (this.isCurrent(generation)) {
      let targets: readonly Target[] = [];
      try {
        targets = read();
      } catch (err) {
        this.warn(`[Monitor] Could not read targets: ${getErrorMessage(err)}`);
      }

      const messages = await Promise.all(
        targets.map(async (target): Promise<HealthUpdateMessage> => ({
          targetId: target.id,
          result: await this.safeProbe(target),
        })),
      );

      if (!this.isCurrent(generation)) break;

      for (const message of messages) {
        if (!this.queue.push(message)) {
          this.log('[Monitor] Receiver closed, exiting');
          this.running = false;
          return;
        }
      }

      await this.sleep(this.intervalMs);
    }

    this.log('[Monitor] Stopped');
  }

  private async safeProbe(target: Target): Promise<ProbeResult> {
    try {
      return await this.probe(target, this.timeoutMs);
    } catch (err) {
      return {
        health: 'unknown',
        security: 'unknown',
        latencyMs: null,
        error: `Health check error: ${getErrorMessage(err)}`,
      };
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
