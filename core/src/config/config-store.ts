/**
 * hostwarden configuration read/write
 *
 * Settings and the target list live in ~/.hostwarden/config.json
 * (directory overridable through HOSTWARDEN_HOME).
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { v4 as uuidv4 } from "uuid";
import type { AuthMethod, ConnectionMode, TargetSpec } from "../types.js";
import { CONNECTION_MODES } from "../types.js";
import { isValidPort, DEFAULT_SSH_PORT } from "../security/assess-security.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { getErrorMessage } from "../logging/error-utils.js";

export const CONFIG_VERSION = "1.0.0";

export interface HostwardenSettings {
  /** Seconds between background health checks */
  refreshIntervalSeconds: number;
  connectionMode: ConnectionMode;
  showOnlyOnline: boolean;
}

export interface HostwardenConfig {
  version: string;
  settings: HostwardenSettings;
  targets: TargetSpec[];
}

export function getConfigDir(): string {
  return process.env.HOSTWARDEN_HOME || join(homedir(), ".hostwarden");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export function getDefaultConfig(): HostwardenConfig {
  return {
    version: CONFIG_VERSION,
    settings: {
      refreshIntervalSeconds: 30,
      connectionMode: "auto",
      showOnlyOnline: false,
    },
    targets: [],
  };
}

export function parseConnectionMode(value: string): ConnectionMode | null {
  return CONNECTION_MODES.find((mode) => mode === value) ?? null;
}

// ─── Validation ───────────────────────────────────────────────

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === "string" && value.trim() !== "" ? value : null;
}

function parseAuth(value: unknown): AuthMethod | null {
  if (!isObject(value)) return null;
  switch (value.type) {
    case "key": {
      const keyPath = readString(value, "keyPath");
      return keyPath ? { type: "key", keyPath } : null;
    }
    case "agent":
      return { type: "agent" };
    case "password":
      return { type: "password" };
    case "interactive":
      return { type: "interactive" };
    default:
      return null;
  }
}

/**
 * Validate one persisted target entry.
 * @returns The target spec, or a reason the entry was rejected
 */
export function parseTargetSpec(value: unknown, now = Date.now()): TargetSpec | string {
  if (!isObject(value)) return "entry is not an object";

  const name = readString(value, "name");
  if (!name) return "missing name";
  const host = readString(value, "host");
  if (!host) return `${name}: missing host`;
  const user = readString(value, "user");
  if (!user) return `${name}: missing user`;
  // ssh would read these as options
  if (host.startsWith("-")) return `${name}: host must not start with "-"`;
  if (user.startsWith("-")) return `${name}: user must not start with "-"`;

  const port = value.port === undefined ? DEFAULT_SSH_PORT : value.port;
  if (typeof port !== "number" || !isValidPort(port)) {
    return `${name}: invalid port ${String(value.port)}`;
  }

  const auth = parseAuth(value.auth);
  if (!auth) return `${name}: invalid auth method`;

  const tags = Array.isArray(value.tags)
    ? value.tags.filter((tag): tag is string => typeof tag === "string")
    : [];
  const createdAt = typeof value.createdAt === "number" ? value.createdAt : now;
  const updatedAt = typeof value.updatedAt === "number" ? value.updatedAt : createdAt;

  return {
    id: readString(value, "id") ?? uuidv4(),
    name,
    host,
    port,
    user,
    auth,
    description: readString(value, "description"),
    tags,
    createdAt,
    updatedAt,
  };
}

function parseSettings(value: unknown): HostwardenSettings {
  const defaults = getDefaultConfig().settings;
  if (!isObject(value)) return defaults;

  const interval = value.refreshIntervalSeconds;
  const mode = typeof value.connectionMode === "string" ? parseConnectionMode(value.connectionMode) : null;

  return {
    refreshIntervalSeconds:
      typeof interval === "number" && Number.isFinite(interval) && interval > 0
        ? interval
        : defaults.refreshIntervalSeconds,
    connectionMode: mode ?? defaults.connectionMode,
    showOnlyOnline: typeof value.showOnlyOnline === "boolean" ? value.showOnlyOnline : defaults.showOnlyOnline,
  };
}

// ─── Read / Write ─────────────────────────────────────────────

/**
 * Load the config file. A missing or unreadable file yields the defaults;
 * malformed target entries are skipped with a warning.
 */
export function loadConfig(configPath = getConfigPath(), logger: Logger = silentLogger): HostwardenConfig {
  if (!existsSync(configPath)) {
    return getDefaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    logger.warn(`[Config] Could not read ${configPath}: ${getErrorMessage(err)}`);
    return getDefaultConfig();
  }

  if (!isObject(parsed)) {
    logger.warn(`[Config] Ignoring ${configPath}: expected a JSON object`);
    return getDefaultConfig();
  }

  const targets: TargetSpec[] = [];
  const seenIds = new Set<string>();
  const entries = Array.isArray(parsed.targets) ? parsed.targets : [];
  for (const entry of entries) {
    const spec = parseTargetSpec(entry);
    if (typeof spec === "string") {
      logger.warn(`[Config] Skipping target: ${spec}`);
      continue;
    }
    if (seenIds.has(spec.id)) {
      logger.warn(`[Config] Skipping target ${spec.name}: duplicate id ${spec.id}`);
      continue;
    }
    seenIds.add(spec.id);
    targets.push(spec);
  }

  return {
    version: typeof parsed.version === "string" ? parsed.version : CONFIG_VERSION,
    settings: parseSettings(parsed.settings),
    targets,
  };
}

export function saveConfig(config: HostwardenConfig, configPath = getConfigPath()): boolean {
  try {
    const dir = dirname(configPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
    return true;
  } catch {
    return false;
  }
}
