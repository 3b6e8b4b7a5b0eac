/**
 * Target Display Utility Tests
 */

import { describe, it, expect } from "@jest/globals";
import { createTarget } from "@hostwarden/core";
import type { Target } from "@hostwarden/core";
import {
  HEALTH_INDICATORS,
  formatEndpoint,
  formatStatusLine,
  nameColumnWidth,
} from "./target-display.js";
import { SUCCESS_COLOR, ERROR_COLOR } from "../components/layout/theme.js";

function makeTarget(overrides: Partial<Target> = {}): Target {
  return {
    ...createTarget({
      id: "t1",
      name: "web",
      host: "web.internal",
      port: 22,
      user: "deploy",
      auth: { type: "agent" },
      description: null,
      tags: [],
      createdAt: 0,
      updatedAt: 0,
    }),
    ...overrides,
  };
}

describe("HEALTH_INDICATORS", () => {
  it("colors online and offline", () => {
    expect(HEALTH_INDICATORS.online.color).toBe(SUCCESS_COLOR);
    expect(HEALTH_INDICATORS.offline.color).toBe(ERROR_COLOR);
  });
});

describe("formatEndpoint", () => {
  it("joins user, host and port", () => {
    expect(formatEndpoint({ user: "deploy", host: "10.0.0.5", port: 2222 })).toBe("deploy@10.0.0.5:2222");
  });
});

describe("formatStatusLine", () => {
  it("shows an unchecked target", () => {
    expect(formatStatusLine(makeTarget(), 6)).toBe(
      "○ web     deploy@web.internal:22  unknown       —     —",
    );
  });

  it("shows latency, uptime and the last error", () => {
    const target = makeTarget({
      health: "offline",
      lastError: "SSH port closed/refused (web.internal:22)",
      stats: {
        successCount: 1,
        failureCount: 1,
        latencyMs: 12,
        latencyHistory: [12],
        lastConnectedAt: 5,
        lastCheckedAt: 10,
        uptimePercentage: 50,
      },
    });

    expect(formatStatusLine(target, 3)).toBe(
      "● web  deploy@web.internal:22  offline    12ms   50%\n" +
      "    SSH port closed/refused (web.internal:22)",
    );
  });
});

describe("nameColumnWidth", () => {
  it("fits the longest name with a minimum", () => {
    expect(nameColumnWidth([{ name: "db" }, { name: "backup-01" }])).toBe(9);
    expect(nameColumnWidth([{ name: "db" }])).toBe(4);
    expect(nameColumnWidth([])).toBe(4);
  });
});
