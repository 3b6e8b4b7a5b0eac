/**
 * Target Display Utilities
 *
 * Icons, colors and one-line summaries shared by the dashboard views
 * and the one-shot commands.
 */

import type { HealthState, SecurityAssessment, Target } from "@hostwarden/core";
import {
  ACCENT_COLOR,
  ERROR_COLOR,
  MUTED_TEXT,
  SUCCESS_COLOR,
  WARNING_COLOR,
} from "../components/layout/theme.js";
import { formatLatency, formatUptime } from "./format.js";

export interface Indicator {
  icon: string;
  label: string;
  color: string;
}

export const HEALTH_INDICATORS: Record<HealthState, Indicator> = {
  online: { icon: "●", label: "online", color: SUCCESS_COLOR },
  offline: { icon: "●", label: "offline", color: ERROR_COLOR },
  connecting: { icon: "◌", label: "connecting", color: ACCENT_COLOR },
  warning: { icon: "▲", label: "warning", color: WARNING_COLOR },
  unknown: { icon: "○", label: "unknown", color: MUTED_TEXT },
};

export const SECURITY_INDICATORS: Record<SecurityAssessment, Indicator> = {
  secure: { icon: "✓", label: "secure", color: SUCCESS_COLOR },
  vulnerable: { icon: "!", label: "vulnerable", color: WARNING_COLOR },
  compromised: { icon: "✗", label: "compromised", color: ERROR_COLOR },
  unknown: { icon: "?", label: "unverified", color: MUTED_TEXT },
};

export function formatEndpoint(target: Pick<Target, "user" | "host" | "port">): string {
  return `${target.user}@${target.host}:${target.port}`;
}

/**
 * One plain-text line per target, used by `status`:
 * "● web         deploy@web.internal:22  online   12ms  100%"
 */
export function formatStatusLine(target: Target, nameWidth: number): string {
  const health = HEALTH_INDICATORS[target.health];
  const checks = target.stats.successCount + target.stats.failureCount;
  const parts = [
    `${health.icon} ${target.name.padEnd(nameWidth)}`,
    formatEndpoint(target),
    health.label.padEnd(7),
    formatLatency(target.stats.latencyMs).padStart(6),
    formatUptime(target.stats.uptimePercentage, checks).padStart(4),
  ];
  const line = parts.join("  ");
  return target.lastError ? `${line}\n    ${target.lastError}` : line;
}

/** Column width that fits every target name. */
export function nameColumnWidth(targets: Pick<Target, "name">[], min = 4): number {
  return targets.reduce((width, t) => Math.max(width, t.name.length), min);
}
