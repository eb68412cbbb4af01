import { describe, expect, it } from "vitest";

import { getChildLogger, getLogger, normalizeLogLevel, setLogLevel } from "./logging.js";

describe("normalizeLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(normalizeLogLevel(" DEBUG ")).toBe("debug");
    expect(normalizeLogLevel("warn")).toBe("warn");
  });

  it("rejects unknown levels", () => {
    expect(normalizeLogLevel("verbose")).toBeUndefined();
    expect(normalizeLogLevel(undefined)).toBeUndefined();
  });
});

describe("getChildLogger", () => {
  it("takes the level set on the root logger", () => {
    setLogLevel("warn");
    expect(getLogger().level).toBe("warn");
    expect(getChildLogger({ module: "greeter" }).level).toBe("warn");
  });
});
