/**
 * History and analytics text for the dashboard views.
 */

import type { ConnectionHistoryEntry, ConnectionOutcome } from "@hostwarden/core";
import type { GlobalAnalytics } from "@hostwarden/engine";
import { ACCENT_COLOR, ERROR_COLOR, SUCCESS_COLOR } from "../components/layout/theme.js";
import { formatLatency, formatRelativeTime } from "./format.js";
import type { Indicator } from "./target-display.js";

export const OUTCOME_INDICATORS: Record<ConnectionOutcome, Indicator> = {
  opened: { icon: "✓", label: "opened", color: SUCCESS_COLOR },
  completed: { icon: "●", label: "closed", color: ACCENT_COLOR },
  failed: { icon: "✗", label: "failed", color: ERROR_COLOR },
};

/**
 * Text after the outcome icon: "web  new-window  Kitty (PID 4321)  2m ago"
 */
export function formatHistoryEntry(entry: ConnectionHistoryEntry, nameWidth: number, now = Date.now()): string {
  return [
    entry.targetName.padEnd(nameWidth),
    entry.mode.padEnd(10),
    entry.detail,
    formatRelativeTime(entry.at, now),
  ].join("  ");
}

/** Label/value rows of the analytics overview. */
export function buildAnalyticsRows(analytics: GlobalAnalytics): Array<[label: string, value: string]> {
  const checks = analytics.checkSuccessRate === null
    ? "none yet"
    : `${analytics.totalChecks} (${Math.round(analytics.checkSuccessRate)}% ok)`;
  const connections = analytics.connectFailures > 0
    ? `${analytics.connectAttempts} (${analytics.connectFailures} failed)`
    : String(analytics.connectAttempts);
  const { health } = analytics;

  return [
    ["Targets", `${analytics.onlineCount}/${analytics.targetCount} online`],
    ["Sessions", `${analytics.activeSessions} active`],
    ["Checks", checks],
    ["Avg latency", formatLatency(analytics.averageLatencyMs)],
    ["Connections", connections],
    ["Health", `${health.online} up, ${health.offline} down, ${health.connecting + health.warning + health.unknown} other`],
  ];
}
