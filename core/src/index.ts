/**
 * @hostwarden/core
 *
 * Target model, security policy, target registry, config store and logging.
 */

export type {
  AuthMethod,
  AuthMethodType,
  HealthState,
  SecurityAssessment,
  ProbeResult,
  HealthUpdateMessage,
  ConnectionStats,
  TargetSpec,
  Target,
  ActiveSession,
  ConnectionHistoryEntry,
  ConnectionOutcome,
  ConnectionMode,
} from "./types.js";
export { CONNECTION_MODES } from "./types.js";

export { assessSecurity, isValidPort, DEFAULT_SSH_PORT } from "./security/assess-security.js";

export type { TargetFilter } from "./targets/target-registry.js";
export {
  TargetRegistry,
  createTarget,
  createEmptyStats,
  LATENCY_HISTORY_LIMIT,
} from "./targets/target-registry.js";

export type { HostwardenConfig, HostwardenSettings } from "./config/config-store.js";
export {
  CONFIG_VERSION,
  getConfigDir,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  saveConfig,
  parseTargetSpec,
  parseConnectionMode,
} from "./config/config-store.js";

export type { Logger, LoggerOptions } from "./logging/index.js";
export {
  createLogger,
  silentLogger,
  getErrorCode,
  getErrorMessage,
} from "./logging/index.js";
