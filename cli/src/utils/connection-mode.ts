/**
 * Connection mode resolution for command-line flags.
 */

import { CONNECTION_MODES, parseConnectionMode } from "@hostwarden/core";
import type { ConnectionMode } from "@hostwarden/core";

export interface ConnectionModeFlags {
  connectionMode?: string;
  newWindow?: boolean;
  direct?: boolean;
}

export type ConnectionModeResolution =
  | { mode: ConnectionMode }
  | { error: string };

/**
 * `--connection-mode`, `--new-window` and `--direct` are mutually exclusive.
 * Without any of them the configured mode applies.
 */
export function resolveConnectionMode(
  flags: ConnectionModeFlags,
  fallback: ConnectionMode,
): ConnectionModeResolution {
  const given = [flags.connectionMode !== undefined, flags.newWindow === true, flags.direct === true]
    .filter(Boolean).length;
  if (given > 1) {
    return { error: "Options --connection-mode, --new-window and --direct cannot be combined" };
  }

  if (flags.connectionMode !== undefined) {
    const mode = parseConnectionMode(flags.connectionMode);
    if (!mode) {
      return {
        error: `Invalid connection mode: ${flags.connectionMode} (expected ${CONNECTION_MODES.join(", ")})`,
      };
    }
    return { mode };
  }
  if (flags.newWindow) return { mode: "new-window" };
  if (flags.direct) return { mode: "direct" };
  return { mode: fallback };
}
