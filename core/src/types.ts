/**
 * Core types for hostwarden
 *
 * Shared by the engine (probing, launching, session tracking) and the CLI.
 */

// ============================================================
// Authentication & Assessment
// ============================================================

/** How the SSH client authenticates against a target. */
export type AuthMethod =
  | { type: "key"; keyPath: string }
  | { type: "agent" }
  | { type: "password" }
  | { type: "interactive" };

export type AuthMethodType = AuthMethod["type"];

/**
 * Reachability of a target as last observed.
 * `warning` is part of the model but nothing currently produces it.
 */
export type HealthState =
  | "online"
  | "offline"
  | "connecting"
  | "warning"
  | "unknown";

/**
 * Heuristic security posture derived from auth method and port.
 * `compromised` is part of the model but nothing currently produces it.
 */
export type SecurityAssessment =
  | "secure"
  | "vulnerable"
  | "compromised"
  | "unknown";

// ============================================================
// Probing
// ============================================================

/** Outcome of a single reachability probe. */
export interface ProbeResult {
  readonly health: HealthState;
  readonly security: SecurityAssessment;
  /** Wall-clock time of the attempt, recorded on failure too */
  readonly latencyMs: number | null;
  readonly error: string | null;
}

/** Message carried from the health monitor to the orchestrator. */
export interface HealthUpdateMessage {
  targetId: string;
  result: ProbeResult;
}

export interface ConnectionStats {
  successCount: number;
  failureCount: number;
  /** Latency of the most recent probe */
  latencyMs: number | null;
  /** Most recent successful latencies, oldest first */
  latencyHistory: number[];
  lastConnectedAt: number | null;
  lastCheckedAt: number | null;
  uptimePercentage: number;
}

// ============================================================
// Targets
// ============================================================

/** The persisted description of a target. */
export interface TargetSpec {
  id: string;
  name: string;
  host: string;
  port: number;
  user: string;
  auth: AuthMethod;
  description: string | null;
  tags: string[];
  createdAt: number;
  updatedAt: number;
}

/** A target with its runtime status. */
export interface Target extends TargetSpec {
  health: HealthState;
  security: SecurityAssessment;
  lastError: string | null;
  stats: ConnectionStats;
}

/** An SSH session spawned in its own terminal window. */
export interface ActiveSession {
  pid: number;
  targetId: string;
  label: string;
  startedAt: number;
}

/** How a connection attempt ended. */
export type ConnectionOutcome = "opened" | "completed" | "failed";

/** One finished connection attempt, kept in the bounded history. */
export interface ConnectionHistoryEntry {
  targetId: string;
  targetName: string;
  mode: ConnectionMode;
  outcome: ConnectionOutcome;
  /** Terminal name, exit status or error text */
  detail: string;
  at: number;
}

// ============================================================
// Connection mode
// ============================================================

/**
 * How a connection request is satisfied.
 * - auto: new window when a terminal is available, otherwise take over
 * - new-window: only a new window; fails when no terminal is available
 * - direct: always take over the current terminal
 */
export type ConnectionMode = "auto" | "new-window" | "direct";

export const CONNECTION_MODES: readonly ConnectionMode[] = ["auto", "new-window", "direct"];
