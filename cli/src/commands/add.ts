/**
 * Add command — append a target to the config file.
 */

import { userInfo } from "os";
import { assessSecurity, parseTargetSpec, saveConfig } from "@hostwarden/core";
import type { TargetSpec } from "@hostwarden/core";
import { loadTargets } from "./target-helper.js";
import { formatEndpoint } from "../utils/target-display.js";

export interface AddTargetOptions {
  port?: string;
  user?: string;
  key?: string;
  agent?: boolean;
  password?: boolean;
  interactive?: boolean;
  tag?: string[];
  description?: string;
}

function defaultUser(): string {
  try {
    return userInfo().username;
  } catch {
    return "root";
  }
}

/**
 * Turn command-line options into a validated target spec.
 * @returns The spec, or the reason it was rejected
 */
export function buildTargetSpec(
  name: string,
  host: string,
  options: AddTargetOptions,
  now = Date.now(),
): TargetSpec | string {
  const authFlags = [options.key !== undefined, options.agent, options.password, options.interactive]
    .filter(Boolean).length;
  if (authFlags > 1) {
    return "Choose only one of --key, --agent, --password and --interactive";
  }

  const auth = options.key !== undefined
    ? { type: "key", keyPath: options.key }
    : options.password
      ? { type: "password" }
      : options.interactive
        ? { type: "interactive" }
        : { type: "agent" };

  const port = options.port === undefined ? undefined : Number(options.port);

  return parseTargetSpec(
    {
      name,
      host,
      port,
      user: options.user ?? defaultUser(),
      auth,
      description: options.description,
      tags: options.tag ?? [],
      createdAt: now,
      updatedAt: now,
    },
    now,
  );
}

export async function addTarget(name: string, host: string, options: AddTargetOptions): Promise<void> {
  const { config, configPath, registry } = loadTargets();

  const spec = buildTargetSpec(name, host, options);
  if (typeof spec === "string") {
    console.error(`Cannot add target: ${spec}`);
    process.exitCode = 1;
    return;
  }

  if (registry.findByName(spec.name)) {
    console.error(`Cannot add target: ${spec.name} already exists`);
    process.exitCode = 1;
    return;
  }

  config.targets.push(spec);
  if (!saveConfig(config, configPath)) {
    console.error(`Cannot add target: failed to write ${configPath}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Added ${spec.name} (${formatEndpoint(spec)})`);
  if (assessSecurity(spec.auth, spec.port) === "vulnerable") {
    console.log("Warning: password authentication on the default SSH port is rated vulnerable");
  }
}
