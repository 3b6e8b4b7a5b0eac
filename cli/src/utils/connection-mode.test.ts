/**
 * Connection Mode Resolution Tests
 */

import { describe, it, expect } from "@jest/globals";
import { resolveConnectionMode } from "./connection-mode.js";

describe("resolveConnectionMode", () => {
  it("falls back to the configured mode", () => {
    expect(resolveConnectionMode({}, "direct")).toEqual({ mode: "direct" });
  });

  it("maps the shorthand flags", () => {
    expect(resolveConnectionMode({ newWindow: true }, "auto")).toEqual({ mode: "new-window" });
    expect(resolveConnectionMode({ direct: true }, "auto")).toEqual({ mode: "direct" });
  });

  it("accepts an explicit mode", () => {
    expect(resolveConnectionMode({ connectionMode: "new-window" }, "auto")).toEqual({ mode: "new-window" });
  });

  it("rejects unknown modes", () => {
    expect(resolveConnectionMode({ connectionMode: "tab" }, "auto")).toEqual({
      error: "Invalid connection mode: tab (expected auto, new-window, direct)",
    });
  });

  it("rejects combined flags", () => {
    expect(resolveConnectionMode({ connectionMode: "auto", direct: true }, "auto")).toEqual({
      error: "Options --connection-mode, --new-window and --direct cannot be combined",
    });
    expect(resolveConnectionMode({ newWindow: true, direct: true }, "auto")).toHaveProperty("error");
  });

  it("ignores shorthand flags explicitly set to false", () => {
    expect(resolveConnectionMode({ connectionMode: "direct", newWindow: false }, "auto")).toEqual({ mode: "direct" });
  });
});
