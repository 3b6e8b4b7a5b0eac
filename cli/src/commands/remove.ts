/**
 * Remove command — delete a target from the config file.
 */

import { saveConfig } from "@hostwarden/core";
import { loadTargets, requireTarget } from "./target-helper.js";

export async function removeTarget(nameOrId: string): Promise<void> {
  const { config, configPath, registry } = loadTargets();
  const target = requireTarget(registry, nameOrId);
  if (!target) return;

  config.targets = config.targets.filter((t) => t.id !== target.id);
  if (!saveConfig(config, configPath)) {
    console.error(`Cannot remove target: failed to write ${configPath}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Removed ${target.name}`);
}
