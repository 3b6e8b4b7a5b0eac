/**
 * Probe command — verification probe of a single target.
 */

import { VERIFY_PROBE_TIMEOUT_MS, probeTarget } from "@hostwarden/engine";
import { loadTargets, requireTarget } from "./target-helper.js";
import { formatLatency } from "../utils/format.js";
import { HEALTH_INDICATORS, SECURITY_INDICATORS, formatEndpoint } from "../utils/target-display.js";

export async function probeOne(nameOrId: string): Promise<void> {
  const { registry } = loadTargets();
  const target = requireTarget(registry, nameOrId);
  if (!target) return;

  const result = await probeTarget(target, VERIFY_PROBE_TIMEOUT_MS);

  console.log(`${target.name} (${formatEndpoint(target)})`);
  console.log(`  Health:   ${HEALTH_INDICATORS[result.health].label}`);
  console.log(`  Latency:  ${formatLatency(result.latencyMs)}`);
  console.log(`  Security: ${SECURITY_INDICATORS[result.security].label}`);
  if (result.error) {
    console.log(`  Error:    ${result.error}`);
  }

  if (result.health !== "online") {
    process.exitCode = 1;
  }
}
