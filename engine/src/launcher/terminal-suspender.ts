/**
 * Terminal Suspender
 *
 * Hands the controlling terminal over to a child process and takes it
 * back afterwards. The dashboard supplies an implementation that turns
 * off raw mode and leaves the alternate screen.
 */

export interface TerminalSuspender {
  /** Release the terminal (cooked mode, main screen) */
  suspend(): void;
  /** Reclaim the terminal (raw mode, alternate screen, full repaint) */
  resume(): void;
}

/** Used when nothing owns the terminal, e.g. one-shot CLI commands. */
export const noopSuspender: TerminalSuspender = {
  suspend: () => {},
  resume: () => {},
};

/**
 * Run `fn` with the terminal suspended. The terminal is reclaimed on
 * every exit path, including a thrown error.
 */
export function withSuspendedTerminal<T>(suspender: TerminalSuspender, fn: () => T): T {
  suspender.suspend();
  try {
    return fn();
  } finally {
    suspender.resume();
  }
}
