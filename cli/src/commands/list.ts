/**
 * List command — configured targets, as text or JSON.
 */

import { describeAuth } from "@hostwarden/engine";
import { loadTargets } from "./target-helper.js";
import { formatEndpoint, nameColumnWidth } from "../utils/target-display.js";

export interface ListOptions {
  json?: boolean;
  filter?: string;
}

export async function listTargets(options: ListOptions = {}): Promise<void> {
  const { registry } = loadTargets();
  const targets = registry.filter({ query: options.filter });

  if (options.json) {
    const ids = new Set(targets.map((t) => t.id));
    console.log(JSON.stringify(registry.toSpecs().filter((s) => ids.has(s.id)), null, 2));
    return;
  }

  if (targets.length === 0) {
    console.log(options.filter ? `No targets match "${options.filter}"` : "No targets configured");
    if (!options.filter) {
      console.log("Add one with: hostwarden add <name> <host>");
    }
    return;
  }

  const nameWidth = nameColumnWidth(targets);
  for (const target of targets) {
    const tags = target.tags.length > 0 ? `  #${target.tags.join(" #")}` : "";
    console.log(`${target.name.padEnd(nameWidth)}  ${formatEndpoint(target)}  ${describeAuth(target.auth)}${tags}`);
    if (target.description) {
      console.log(`${" ".repeat(nameWidth)}  ${target.description}`);
    }
  }
}
