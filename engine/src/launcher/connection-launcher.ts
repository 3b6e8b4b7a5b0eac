/**
 * Connection Launcher
 *
 * Verifies a target is reachable, then opens an SSH session either in a
 * new terminal window (detached, tracked by PID) or by taking over the
 * current terminal until ssh exits.
 *
 * Mode resolution:
 * - auto: new window when a terminal is detected, otherwise take over
 * - new-window: new window only, error when no terminal is available
 * - direct: always take over
 */

import { spawn, spawnSync } from 'child_process';
import type { ConnectionMode, Logger, ProbeResult, Target } from '@hostwarden/core';
import { createLogger, getErrorMessage } from '@hostwarden/core';
import { SPAWN_SETTLE_MS, VERIFY_PROBE_TIMEOUT_MS } from '../connection/constants.js';
import { buildSshArgs, buildSshArgv, describeAuth, SSH_BINARY } from '../connection/ssh-command.js';
import { probeTarget } from '../health/prober.js';
import type { ProbeFn } from '../health/prober.js';
import { TerminalDetector } from '../terminals/terminal-detector.js';
import type { TerminalDescriptor, TerminalId } from '../terminals/terminal-catalog.js';
import { noopSuspender, withSuspendedTerminal } from './terminal-suspender.js';
import type { TerminalSuspender } from './terminal-suspender.js';

export type LaunchErrorKind = 'unreachable' | 'no-terminal' | 'spawn-failed';

export interface LaunchError {
  kind: LaunchErrorKind;
  message: string;
}

export type LaunchResult =
  | { success: true; method: 'new-window'; terminal: TerminalId; pid: number; probe: ProbeResult }
  | { success: true; method: 'direct'; exitCode: number | null; probe: ProbeResult }
  | { success: false; error: LaunchError; probe: ProbeResult | null };

type SpawnOutcome =
  | { success: true; pid: number }
  | { success: false; error: string };

export interface ConnectionLauncherOptions {
  detector?: TerminalDetector;
  probe?: ProbeFn;
  /** Timeout of the verification probe (default 10s) */
  verifyTimeoutMs?: number;
  suspender?: TerminalSuspender;
  /** Where the take-over banner is written (default stdout) */
  output?: NodeJS.WritableStream;
  logger?: Logger;
}

/**
 * Spawn a detached process and handle ENOENT/errors.
 * The spawn() call emits 'error' asynchronously for ENOENT, so we
 * wait briefly for the error event before declaring success.
 */
export function spawnDetached(cmd: string, args: string[]): Promise<SpawnOutcome> {
  return new Promise((resolve) => {
    try {
      const proc = spawn(cmd, args, {
        detached: true,
        stdio: 'ignore',
      });

      let resolved = false;

      proc.on('error', (err) => {
        if (!resolved) {
          resolved = true;
          resolve({ success: false, error: getErrorMessage(err) });
        }
      });

      proc.unref();

      setTimeout(() => {
        if (resolved) return;
        resolved = true;
        if (proc.pid === undefined) {
          resolve({ success: false, error: `No PID reported for ${cmd}` });
        } else {
          resolve({ success: true, pid: proc.pid });
        }
      }, SPAWN_SETTLE_MS);
    } catch (err) {
      resolve({ success: false, error: getErrorMessage(err) });
    }
  });
}

export class ConnectionLauncher {
  private detector: TerminalDetector;
  private probe: ProbeFn;
  private verifyTimeoutMs: number;
  private suspender: TerminalSuspender;
  private output: NodeJS.WritableStream;
  private logger: Logger;

  constructor(options: ConnectionLauncherOptions = {}) {
    this.logger = options.logger ?? createLogger({ silent: true });
    this.detector = options.detector ?? new TerminalDetector({ logger: this.logger });
    this.probe = options.probe ?? probeTarget;
    this.verifyTimeoutMs = options.verifyTimeoutMs ?? VERIFY_PROBE_TIMEOUT_MS;
    this.suspender = options.suspender ?? noopSuspender;
    this.output = options.output ?? process.stdout;
  }

  private get log() { return this.logger.log.bind(this.logger); }

  /** Replace the suspender, e.g. once the dashboard owns the terminal. */
  setSuspender(suspender: TerminalSuspender): void {
    this.suspender = suspender;
  }

  get terminalDetector(): TerminalDetector {
    return this.detector;
  }

  /**
   * Verify reachability, resolve the mode and launch.
   * Nothing is spawned when the verification probe fails.
   */
  async decideAndLaunch(target: Target, mode: ConnectionMode): Promise<LaunchResult> {
    const probe = await this.probe(target, this.verifyTimeoutMs);
    if (probe.health !== 'online') {
      return {
        success: false,
        error: { kind: 'unreachable', message: `Cannot connect: ${probe.error ?? 'host unreachable'}` },
        probe,
      };
    }

    if (mode === 'direct') {
      return this.launchDirect(target, probe);
    }

    const terminal = await this.detector.detect();
    if (terminal) {
      return this.launchNewWindow(target, terminal, probe);
    }

    if (mode === 'new-window') {
      return {
        success: false,
        error: {
          kind: 'no-terminal',
          message: `No terminal emulator available for new window mode. Supported terminals: ${this.detector.supportedTerminalNames().join(', ')}`,
        },
        probe,
      };
    }

    this.log(`[Launcher] No terminal available, taking over current terminal for ${target.name}`);
    return this.launchDirect(target, probe);
  }

  private async launchNewWindow(
    target: Target,
    terminal: TerminalDescriptor,
    probe: ProbeResult,
  ): Promise<LaunchResult> {
    const built = terminal.buildCommand(buildSshArgv(target));
    if (!built) {
      return {
        success: false,
        error: { kind: 'no-terminal', message: `${terminal.name} cannot open new windows` },
        probe,
      };
    }

    this.log(`[Launcher] ${built.command} ${built.args.join(' ')}`);
    const spawned = await spawnDetached(built.command, built.args);
    if (!spawned.success) {
      return {
        success: false,
        error: { kind: 'spawn-failed', message: `Failed to launch ${terminal.name}: ${spawned.error}` },
        probe,
      };
    }

    return { success: true, method: 'new-window', terminal: terminal.id, pid: spawned.pid, probe };
  }

  private launchDirect(target: Target, probe: ProbeResult): LaunchResult {
    const args = buildSshArgs(target);

    const outcome = withSuspendedTerminal(this.suspender, () => {
      this.output.write(
        `\nConnecting to ${target.name} (${target.user}@${target.host}:${target.port})\n` +
        `Auth: ${describeAuth(target.auth)}\n\n`,
      );
      const result = spawnSync(SSH_BINARY, args, { stdio: 'inherit' });
      if (!result.error) {
        const how = result.signal ? `signal ${result.signal}` : `exit code ${result.status ?? 'unknown'}`;
        this.output.write(`\nSSH session to ${target.name} ended (${how})\n`);
      }
      return result;
    });

    if (outcome.error) {
      return {
        success: false,
        error: { kind: 'spawn-failed', message: `Failed to run ssh: ${getErrorMessage(outcome.error)}` },
        probe,
      };
    }

    return { success: true, method: 'direct', exitCode: outcome.status, probe };
  }
}
