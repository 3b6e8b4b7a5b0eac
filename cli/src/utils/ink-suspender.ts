/**
 * Terminal suspender for the Ink dashboard.
 *
 * While ssh owns the terminal the dashboard leaves the alternate screen
 * and raw mode; both are restored afterwards and the screen is cleared
 * so the next render paints from scratch.
 */

import type { TerminalSuspender } from "@hostwarden/engine";

export const ENTER_ALT_SCREEN = "\x1b[?1049h";
export const EXIT_ALT_SCREEN = "\x1b[?1049l";
export const CLEAR_SCREEN = "\x1b[2J\x1b[H";
export const SHOW_CURSOR = "\x1b[?25h";

export interface SuspendableInput {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
}

export interface SuspendableOutput {
  write(chunk: string): unknown;
}

export function createInkSuspender(
  stdin: SuspendableInput = process.stdin,
  stdout: SuspendableOutput = process.stdout,
): TerminalSuspender {
  const setRawMode = (mode: boolean) => {
    if (stdin.isTTY && stdin.setRawMode) {
      stdin.setRawMode(mode);
    }
  };

  return {
    suspend() {
      setRawMode(false);
      stdout.write(EXIT_ALT_SCREEN + SHOW_CURSOR);
    },
    resume() {
      stdout.write(ENTER_ALT_SCREEN + CLEAR_SCREEN);
      setRawMode(true);
    },
  };
}
