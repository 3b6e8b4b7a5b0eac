/**
 * Target Registry
 *
 * In-memory store of SSH targets and their runtime status, keyed by id
 * and kept in insertion order. Only the orchestrator mutates it.
 */

import type {
  ConnectionStats,
  HealthState,
  ProbeResult,
  Target,
  TargetSpec,
} from "../types.js";

/** Number of successful latencies kept per target */
export const LATENCY_HISTORY_LIMIT = 10;

export interface TargetFilter {
  /** Case-insensitive substring matched against name, host, user and tags */
  query?: string;
  /** Keep only targets currently reachable */
  onlyOnline?: boolean;
}

export function createEmptyStats(): ConnectionStats {
  return {
    successCount: 0,
    failureCount: 0,
    latencyMs: null,
    latencyHistory: [],
    lastConnectedAt: null,
    lastCheckedAt: null,
    uptimePercentage: 0,
  };
}

/** Build a runtime target from its persisted description. */
export function createTarget(spec: TargetSpec): Target {
  return {
    ...spec,
    tags: [...spec.tags],
    health: "unknown",
    security: "unknown",
    lastError: null,
    stats: createEmptyStats(),
  };
}

function computeUptime(stats: ConnectionStats): number {
  const total = stats.successCount + stats.failureCount;
  return total === 0 ? 0 : (stats.successCount / total) * 100;
}

export class TargetRegistry {
  private targets = new Map<string, Target>();

  constructor(specs: TargetSpec[] = []) {
    for (const spec of specs) {
      this.add(spec);
    }
  }

  get size(): number {
    return this.targets.size;
  }

  /**
   * Add a target. Returns null when the id is already taken.
   */
  add(spec: TargetSpec): Target | null {
    if (this.targets.has(spec.id)) {
      return null;
    }
    const target = createTarget(spec);
    this.targets.set(spec.id, target);
    return target;
  }

  remove(id: string): Target | null {
    const target = this.targets.get(id);
    if (!target) return null;
    this.targets.delete(id);
    return target;
  }

  get(id: string): Target | undefined {
    return this.targets.get(id);
  }

  list(): Target[] {
    return Array.from(this.targets.values());
  }

  /**
   * Resolve a target by exact id, then by case-insensitive name.
   */
  findByName(nameOrId: string): Target | undefined {
    const byId = this.targets.get(nameOrId);
    if (byId) return byId;
    const wanted = nameOrId.toLowerCase();
    return this.list().find((t) => t.name.toLowerCase() === wanted);
  }

  setHealth(id: string, health: HealthState): boolean {
    const target = this.targets.get(id);
    if (!target) return false;
    target.health = health;
    return true;
  }

  /**
   * Apply a probe result to a target's status and rolling stats.
   * @returns The health the target had before, or null for an unknown id
   */
  applyProbeResult(id: string, result: ProbeResult, now = Date.now()): HealthState | null {
    const target = this.targets.get(id);
    if (!target) return null;

    const previous = target.health;
    target.health = result.health;
    target.security = result.security;
    target.lastError = result.error;

    const stats = target.stats;
    stats.latencyMs = result.latencyMs;
    stats.lastCheckedAt = now;

    if (result.health === "online") {
      stats.successCount++;
      stats.lastConnectedAt = now;
      if (result.latencyMs !== null) {
        stats.latencyHistory = [...stats.latencyHistory, result.latencyMs].slice(-LATENCY_HISTORY_LIMIT);
      }
    } else if (result.health === "offline") {
      stats.failureCount++;
    }
    stats.uptimePercentage = computeUptime(stats);

    return previous;
  }

  /**
   * Filter and sort targets for display (sorted by name).
   */
  filter(filter: TargetFilter = {}): Target[] {
    const query = filter.query?.trim().toLowerCase() ?? "";

    return this.list()
      .filter((t) => {
        if (filter.onlyOnline && t.health !== "online" && t.health !== "warning") {
          return false;
        }
        if (!query) return true;
        return (
          t.name.toLowerCase().includes(query) ||
          t.host.toLowerCase().includes(query) ||
          t.user.toLowerCase().includes(query) ||
          t.tags.some((tag) => tag.toLowerCase().includes(query))
        );
      })
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  countOnline(): number {
    return this.list().filter((t) => t.health === "online").length;
  }

  /** Persisted view of every target, in insertion order. */
  toSpecs(): TargetSpec[] {
    return this.list().map((t) => ({
      id: t.id,
      name: t.name,
      host: t.host,
      port: t.port,
      user: t.user,
      auth: t.auth,
      description: t.description,
      tags: [...t.tags],
      createdAt: t.createdAt,
      updatedAt: t.updatedAt,
    }));
  }
}
