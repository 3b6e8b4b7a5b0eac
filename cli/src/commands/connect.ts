/**
 * Connect command — verify a target and open an SSH session to it
 * without starting the dashboard.
 */

import { createEngine } from "@hostwarden/engine";
import { resolveConnectionMode } from "../utils/connection-mode.js";

export interface ConnectOptions {
  mode?: string;
  verbose?: boolean;
}

export async function connectTarget(nameOrId: string, options: ConnectOptions = {}): Promise<void> {
  const { orchestrator, config } = createEngine({ silent: !options.verbose });

  const resolved = resolveConnectionMode({ connectionMode: options.mode }, config.settings.connectionMode);
  if ("error" in resolved) {
    console.error(resolved.error);
    process.exitCode = 1;
    return;
  }

  const target = orchestrator.targets.findByName(nameOrId);
  if (!target) {
    console.error(`Unknown target: ${nameOrId}`);
    process.exitCode = 1;
    return;
  }

  const unsubscribe = orchestrator.on("notification", (notification) => {
    const line = notification.level === "error" || notification.level === "warning"
      ? `✗ ${notification.message}`
      : notification.message;
    console.log(line);
  });

  if (resolved.mode !== "direct") {
    console.log(`Checking ${target.name}...`);
  }

  try {
    const result = await orchestrator.connect(target.id, resolved.mode);
    if (!result || !result.success) {
      process.exitCode = 1;
    } else if (result.method === "direct" && result.exitCode !== null && result.exitCode !== 0) {
      process.exitCode = result.exitCode;
    }
  } finally {
    unsubscribe();
  }
}
