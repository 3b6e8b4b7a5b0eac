/**
 * Error Utilities
 *
 * Safe error classification and message extraction for values caught
 * from fs, net and child_process calls.
 */

/**
 * Extract a Node.js error code (ENOENT, ECONNREFUSED, ...) from an unknown value.
 */
export function getErrorCode(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}
