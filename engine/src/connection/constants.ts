/**
 * Engine Constants
 *
 * Timing thresholds for probing, monitoring and launching, and the
 * SSH client options every launch passes.
 */

// ============================================================================
// Probing
// ============================================================================

/** Timeout for background and on-demand refresh probes */
export const QUICK_PROBE_TIMEOUT_MS = 5_000; // 5 seconds

/** Timeout for the verification probe run before every launch */
export const VERIFY_PROBE_TIMEOUT_MS = 10_000; // 10 seconds

// ============================================================================
// Monitoring
// ============================================================================

/** Default interval between background health checks */
export const DEFAULT_CHECK_INTERVAL_MS = 30_000; // 30 seconds

/** Default interval between orchestrator ticks */
export const DEFAULT_TICK_INTERVAL_MS = 250;

/** Timeout for liveness checks that shell out (PowerShell is slow to start) */
export const PROCESS_CHECK_TIMEOUT_MS = 3_000;

// ============================================================================
// Launching
// ============================================================================

/**
 * Window after spawn() during which an asynchronous 'error' (ENOENT)
 * still counts as a launch failure.
 */
export const SPAWN_SETTLE_MS = 100;

/** Options appended to every ssh invocation */
export const SSH_CLIENT_OPTIONS: readonly string[] = [
  '-o', 'ServerAliveInterval=60',
  '-o', 'ServerAliveCountMax=3',
  '-o', 'ConnectTimeout=10',
  '-o', 'BatchMode=no',
];

/** Label prefix for sessions spawned in their own window */
export const SESSION_LABEL_PREFIX = 'SSH:';

/** Connection history entries kept, newest first */
export const CONNECTION_HISTORY_LIMIT = 50;
