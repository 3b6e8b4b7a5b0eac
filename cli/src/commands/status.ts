/**
 * Status command — one-shot quick probe of every target.
 */

import { QUICK_PROBE_TIMEOUT_MS, probeTarget } from "@hostwarden/engine";
import { loadTargets } from "./target-helper.js";
import { formatStatusLine, nameColumnWidth } from "../utils/target-display.js";

export async function showStatus(): Promise<void> {
  const { registry } = loadTargets();
  const targets = registry.list();

  if (targets.length === 0) {
    console.log("No targets configured");
    return;
  }

  await Promise.all(
    targets.map(async (target) => {
      const result = await probeTarget(target, QUICK_PROBE_TIMEOUT_MS);
      registry.applyProbeResult(target.id, result);
    }),
  );

  const nameWidth = nameColumnWidth(targets);
  console.log("");
  for (const target of registry.filter()) {
    console.log(formatStatusLine(target, nameWidth));
  }
  console.log(`\n${registry.countOnline()}/${registry.size} online`);
}
