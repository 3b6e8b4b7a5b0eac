/**
 * Logger
 *
 * Lightweight logger interface shared by core, engine and CLI.
 * Silent by default — callers opt into output by injecting a non-silent logger.
 * The dashboard keeps it silent so console writes never tear the Ink frame.
 */

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** A logger that does nothing (default for every engine component). */
export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};

export interface LoggerOptions {
  /** If true (default), all output is suppressed. */
  silent?: boolean;
  /** Prepended to every message, e.g. "[Monitor]". */
  prefix?: string;
}

function prefixArgs(prefix: string | undefined, args: unknown[]): unknown[] {
  if (!prefix) return args;
  if (args.length > 0 && typeof args[0] === "string") {
    return [`${prefix} ${args[0]}`, ...args.slice(1)];
  }
  return [prefix, ...args];
}

/**
 * Create a console-backed logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { silent = true, prefix } = options;

  if (silent) {
    return silentLogger;
  }

  return {
    log: (...args) => console.log(...prefixArgs(prefix, args)),
    warn: (...args) => console.warn(...prefixArgs(prefix, args)),
    error: (...args) => console.error(...prefixArgs(prefix, args)),
  };
}

