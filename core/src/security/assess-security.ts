/**
 * Security Assessment
 *
 * Pure policy table mapping (auth method, port) to a posture.
 */

import type { AuthMethod, SecurityAssessment } from "../types.js";

/** Conventional SSH port */
export const DEFAULT_SSH_PORT = 22;

/**
 * Classify a target's security posture.
 * Only password auth on the standard port is flagged vulnerable.
 */
export function assessSecurity(auth: AuthMethod, port: number): SecurityAssessment {
  switch (auth.type) {
    case "key":
    case "agent":
      return "secure";
    case "password":
      return port === DEFAULT_SSH_PORT ? "vulnerable" : "secure";
    case "interactive":
      return "unknown";
  }
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
