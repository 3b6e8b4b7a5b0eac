/**
 * Shared formatting utilities for the CLI TUI and one-shot commands.
 */

/**
 * Format a latency in milliseconds: "12ms", "1.5s", or "—" when unknown.
 */
export function formatLatency(ms: number | null): string {
  if (ms === null) return "—";
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Format an uptime percentage; "—" until the target has been checked.
 */
export function formatUptime(percentage: number, checks: number): string {
  if (checks === 0) return "—";
  return `${Math.round(percentage)}%`;
}

/**
 * Format elapsed seconds as "Xs", "Xm Ys" or "Xh Ym".
 */
export function formatElapsedTime(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  const mins = Math.floor(seconds / 60);
  if (mins < 60) return `${mins}m ${seconds % 60}s`;
  return `${Math.floor(mins / 60)}h ${mins % 60}m`;
}

/**
 * "just now", "12s ago", "3m ago", "2h ago", "4d ago", or "never".
 */
export function formatRelativeTime(timestamp: number | null, now = Date.now()): string {
  if (timestamp === null) return "never";
  const seconds = Math.max(0, Math.floor((now - timestamp) / 1000));
  if (seconds < 5) return "just now";
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, Math.max(0, maxLength - 3)) + "...";
}
