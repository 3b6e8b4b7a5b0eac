/**
 * Shared helper for CLI commands that read or change the target list.
 */

import { TargetRegistry, createLogger, getConfigPath, loadConfig } from "@hostwarden/core";
import type { HostwardenConfig, Logger, Target } from "@hostwarden/core";

export interface LoadedTargets {
  config: HostwardenConfig;
  configPath: string;
  registry: TargetRegistry;
  logger: Logger;
}

/**
 * Load the config file and build a registry over its targets.
 * Malformed entries are reported on stderr and skipped.
 */
export function loadTargets(configPath = getConfigPath()): LoadedTargets {
  const logger = createLogger({ silent: false });
  const config = loadConfig(configPath, logger);
  return { config, configPath, registry: new TargetRegistry(config.targets), logger };
}

/**
 * Look a target up by id or name; prints an error and sets the exit code
 * when nothing matches.
 */
export function requireTarget(registry: TargetRegistry, nameOrId: string): Target | null {
  const target = registry.findByName(nameOrId);
  if (!target) {
    console.error(`Unknown target: ${nameOrId}`);
    if (registry.size > 0) {
      console.error(`Known targets: ${registry.list().map((t) => t.name).join(", ")}`);
    }
    process.exitCode = 1;
    return null;
  }
  return target;
}
