/**
 * @hostwarden/engine
 *
 * Health monitoring, terminal detection, connection launching and
 * session tracking, tied together by the orchestrator.
 */

import { createLogger, getConfigPath, loadConfig } from '@hostwarden/core';
import type { ConnectionMode, HostwardenConfig, Logger } from '@hostwarden/core';
import { HealthMonitor } from './health/health-monitor.js';
import { ConnectionLauncher } from './launcher/connection-launcher.js';
import { Orchestrator } from './orchestrator.js';
import { SessionRegistry } from './session/session-registry.js';
import { TerminalDetector } from './terminals/terminal-detector.js';

export * from './connection/constants.js';
export { isProcessRunning, killProcess, isCommandOnPath, isProcessNamed } from './connection/process-detection.js';
export type { KillOutcome } from './connection/process-detection.js';
export { buildSshArgs, buildSshArgv, toShellCommand, describeAuth, expandHome, SSH_BINARY } from './connection/ssh-command.js';

export { probeTarget, describeProbeError } from './health/prober.js';
export type { ProbeFn } from './health/prober.js';
export { HealthMonitor } from './health/health-monitor.js';
export type { HealthMonitorOptions, TargetSource } from './health/health-monitor.js';

export { TERMINAL_CATALOG, findTerminal } from './terminals/terminal-catalog.js';
export type { TerminalDescriptor, TerminalId } from './terminals/terminal-catalog.js';
export { TerminalDetector } from './terminals/terminal-detector.js';
export type { TerminalAvailability, TerminalDetectorOptions } from './terminals/terminal-detector.js';

export { ConnectionLauncher } from './launcher/connection-launcher.js';
export type { LaunchError, LaunchErrorKind, LaunchResult } from './launcher/connection-launcher.js';
export { noopSuspender, withSuspendedTerminal } from './launcher/terminal-suspender.js';
export type { TerminalSuspender } from './launcher/terminal-suspender.js';

export { ConnectionHistory } from './history/connection-history.js';
export { computeAnalytics } from './history/analytics.js';
export type { GlobalAnalytics, TargetUsage } from './history/analytics.js';
export { SessionRegistry, formatKillSummary } from './session/session-registry.js';
export type { KillAllSummary, KillResult } from './session/session-registry.js';

export { Orchestrator } from './orchestrator.js';
export type {
  Launcher,
  Notification,
  NotificationLevel,
  OrchestratorEvents,
  OrchestratorOptions,
  OrchestratorSnapshot,
  UserRequest,
} from './orchestrator.js';

export interface EngineOptions {
  /** Suppress console output */
  silent?: boolean;
  /** Config file (default: ~/.hostwarden/config.json) */
  configPath?: string;
  /** Already-loaded config; `configPath` is not read when given */
  config?: HostwardenConfig;
  /** Overrides the configured connection mode */
  mode?: ConnectionMode;
  /** Overrides the configured check interval */
  checkIntervalMs?: number;
}

export interface Engine {
  orchestrator: Orchestrator;
  config: HostwardenConfig;
  logger: Logger;
  detector: TerminalDetector;
}

/**
 * Load the config and wire an orchestrator over it. Nothing is started;
 * call `orchestrator.start()` for the background loop.
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const { silent = true, configPath = getConfigPath() } = options;

  const logger = createLogger({ silent, prefix: 'Engine' });
  const config = options.config ?? loadConfig(configPath, logger);
  const checkIntervalMs = options.checkIntervalMs ?? config.settings.refreshIntervalSeconds * 1000;

  const detector = new TerminalDetector({ logger });
  const orchestrator = new Orchestrator({
    targets: config.targets,
    mode: options.mode ?? config.settings.connectionMode,
    monitor: new HealthMonitor({ intervalMs: checkIntervalMs, logger }),
    sessions: new SessionRegistry({ logger }),
    launcher: new ConnectionLauncher({ detector, logger }),
    logger,
  });

  return { orchestrator, config, logger, detector };
}
