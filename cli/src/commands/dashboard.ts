/**
 * Dashboard command — starts the interactive TUI.
 */

import React from "react";
import { render } from "ink";
import { createLogger, getErrorMessage, loadConfig } from "@hostwarden/core";
import { createEngine } from "@hostwarden/engine";
import type { Orchestrator } from "@hostwarden/engine";
import { App } from "../components/App.js";
import { resolveConnectionMode } from "../utils/connection-mode.js";
import type { ConnectionModeFlags } from "../utils/connection-mode.js";
import { CLEAR_SCREEN, ENTER_ALT_SCREEN, EXIT_ALT_SCREEN, createInkSuspender } from "../utils/ink-suspender.js";

export interface DashboardOptions extends ConnectionModeFlags {
  /** Seconds between background health checks */
  interval?: string;
  verbose?: boolean;
}

const CLEANUP_TIMEOUT_MS = 5000;

let running: Orchestrator | null = null;

function parseInterval(value: string | undefined): number | undefined | null {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) return null;
  return seconds * 1000;
}

/**
 * Start the interactive dashboard using Ink
 */
export async function startDashboard(options: DashboardOptions = {}): Promise<void> {
  const isTTY = process.stdin.isTTY && process.stdout.isTTY;
  if (!isTTY) {
    console.log("hostwarden dashboard requires an interactive terminal.");
    console.log('Use "hostwarden status" for a quick snapshot, or run in a TTY.');
    process.exit(1);
  }

  const checkIntervalMs = parseInterval(options.interval);
  if (checkIntervalMs === null) {
    console.error(`Invalid interval: ${options.interval} (expected a positive number of seconds)`);
    process.exit(1);
  }

  const config = loadConfig(undefined, createLogger({ silent: false }));
  const resolved = resolveConnectionMode(options, config.settings.connectionMode);
  if ("error" in resolved) {
    console.error(resolved.error);
    process.exit(1);
  }

  const { orchestrator } = createEngine({
    config,
    silent: !options.verbose,
    mode: resolved.mode,
    checkIntervalMs,
  });
  running = orchestrator;

  orchestrator.setTerminalSuspender(createInkSuspender());
  orchestrator.start();

  const cleanup = async () => {
    if (running) {
      try {
        await running.stop();
      } finally {
        running = null;
      }
    }
  };

  const exitOnSignal = () => {
    process.stdout.write(EXIT_ALT_SCREEN);
    cleanup()
      .catch((err: unknown) => console.error(`Cleanup failed: ${getErrorMessage(err)}`))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", exitOnSignal);
  process.on("SIGTERM", exitOnSignal);

  // Enter alternate screen buffer to prevent scrolling and ghosting
  process.stdout.write(ENTER_ALT_SCREEN + CLEAR_SCREEN);

  const { waitUntilExit } = render(
    React.createElement(App, { orchestrator, showOnlyOnline: config.settings.showOnlyOnline }),
    { patchConsole: true },
  );

  try {
    await waitUntilExit();
  } finally {
    process.stdout.write(EXIT_ALT_SCREEN);

    // Cleanup with timeout to prevent hanging
    const timeoutPromise = new Promise<void>((resolve) => {
      setTimeout(() => {
        console.error("\nCleanup timeout - forcing exit");
        resolve();
      }, CLEANUP_TIMEOUT_MS).unref();
    });

    await Promise.race([
      cleanup().catch((err: unknown) => {
        console.error(`Cleanup failed: ${getErrorMessage(err)}`);
      }),
      timeoutPromise,
    ]);

    console.log("\nhostwarden closed.");

    process.exit(0);
  }
}
