/**
 * Analytics
 *
 * Aggregate view over every target's stats, the connection history and
 * the live session count.
 */

import type { ConnectionHistoryEntry, HealthState, Target } from '@hostwarden/core';

const MOST_USED_LIMIT = 5;

export interface TargetUsage {
  targetId: string;
  name: string;
  /** Connections that opened a window or ran to completion */
  connections: number;
}

export interface GlobalAnalytics {
  targetCount: number;
  onlineCount: number;
  activeSessions: number;
  /** Probe checks across all targets, background and verification alike */
  totalChecks: number;
  /** Percentage of successful checks; null before the first check */
  checkSuccessRate: number | null;
  /** Mean of each target's most recent latency; null when none is known */
  averageLatencyMs: number | null;
  health: Record<HealthState, number>;
  connectAttempts: number;
  connectFailures: number;
  mostUsed: TargetUsage[];
}

export function computeAnalytics(
  targets: readonly Target[],
  history: readonly ConnectionHistoryEntry[],
  activeSessions: number,
): GlobalAnalytics {
  const health: Record<HealthState, number> = {
    online: 0,
    offline: 0,
    connecting: 0,
    warning: 0,
    unknown: 0,
  };
  let successes = 0;
  let failures = 0;
  const latencies: number[] = [];

  for (const target of targets) {
    health[target.health] += 1;
    successes += target.stats.successCount;
    failures += target.stats.failureCount;
    if (target.stats.latencyMs !== null) {
      latencies.push(target.stats.latencyMs);
    }
  }

  const totalChecks = successes + failures;

  const usage = new Map<string, TargetUsage>();
  for (const entry of history) {
    if (entry.outcome === 'failed') continue;
    const current = usage.get(entry.targetId);
    if (current) {
      current.connections += 1;
    } else {
      usage.set(entry.targetId, { targetId: entry.targetId, name: entry.targetName, connections: 1 });
    }
  }
  const mostUsed = [...usage.values()]
    .sort((a, b) => b.connections - a.connections || a.name.localeCompare(b.name))
    .slice(0, MOST_USED_LIMIT);

  return {
    targetCount: targets.length,
    onlineCount: health.online,
    activeSessions,
    totalChecks,
    checkSuccessRate: totalChecks === 0 ? null : (successes / totalChecks) * 100,
    averageLatencyMs: latencies.length === 0
      ? null
      : latencies.reduce((sum, ms) => sum + ms, 0) / latencies.length,
    health,
    connectAttempts: history.length,
    connectFailures: history.filter((entry) => entry.outcome === 'failed').length,
    mostUsed,
  };
}
