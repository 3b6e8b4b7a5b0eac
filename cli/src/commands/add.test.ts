/**
 * Add Command Tests
 *
 * Covers option parsing only; nothing is written to disk.
 */

import { describe, it, expect } from "@jest/globals";
import { buildTargetSpec } from "./add.js";

describe("buildTargetSpec", () => {
  it("builds an agent target on the default port", () => {
    const spec = buildTargetSpec("web", "web.internal", { user: "deploy" }, 1_000);

    expect(spec).toMatchObject({
      name: "web",
      host: "web.internal",
      port: 22,
      user: "deploy",
      auth: { type: "agent" },
      description: null,
      tags: [],
      createdAt: 1_000,
      updatedAt: 1_000,
    });
    expect(typeof spec === "string" ? spec : spec.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("maps the auth flags", () => {
    expect(buildTargetSpec("a", "h", { user: "u", key: "~/.ssh/id_ed25519" })).toMatchObject({
      auth: { type: "key", keyPath: "~/.ssh/id_ed25519" },
    });
    expect(buildTargetSpec("a", "h", { user: "u", password: true })).toMatchObject({ auth: { type: "password" } });
    expect(buildTargetSpec("a", "h", { user: "u", interactive: true })).toMatchObject({ auth: { type: "interactive" } });
  });

  it("keeps tags, description and a custom port", () => {
    expect(buildTargetSpec("db", "10.0.0.5", {
      user: "admin",
      port: "2222",
      tag: ["prod", "eu"],
      description: "primary database",
    })).toMatchObject({ port: 2222, tags: ["prod", "eu"], description: "primary database" });
  });

  it("rejects an invalid port", () => {
    expect(buildTargetSpec("db", "10.0.0.5", { user: "admin", port: "70000" })).toBe("db: invalid port 70000");
    expect(buildTargetSpec("db", "10.0.0.5", { user: "admin", port: "ssh" })).toBe("db: invalid port NaN");
  });

  it("rejects more than one auth flag", () => {
    expect(buildTargetSpec("db", "h", { user: "u", agent: true, password: true })).toBe(
      "Choose only one of --key, --agent, --password and --interactive",
    );
  });

  it("rejects an empty key path", () => {
    expect(buildTargetSpec("db", "h", { user: "u", key: "" })).toBe("db: invalid auth method");
  });
});
