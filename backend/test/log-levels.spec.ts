import { describe, expect, it } from "vitest";

import { resolveLogLevels } from "../src/logging/log-levels";

describe("resolveLogLevels", () => {
  it("maps aliases onto Nest log levels", () => {
    expect(resolveLogLevels("WARNING")).toEqual({levels: ["fatal", "error", "warn"], normalized: "warn", fallbackUsed: false});
    expect(resolveLogLevels("log").normalized).toBe("info");
    expect(resolveLogLevels("verbose").levels).toContain("verbose");
  });

  it("enables every level up to the requested threshold", () => {
    expect(resolveLogLevels(" Debug ")).toEqual({
      levels: ["fatal", "error", "warn", "log", "debug"],
      normalized: "debug",
      fallbackUsed: false,
    });
    expect(resolveLogLevels("fatal").levels).toEqual(["fatal"]);
  });

  it("falls back to info for unknown values", () => {
    expect(resolveLogLevels("chatty")).toEqual({levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: true});
    expect(resolveLogLevels(42).fallbackUsed).toBe(false);
  });
});
