import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, resolveLogger, silentLogger } from "./logger.js";
import type { PolicyAdapterLogger } from "./types.js";

describe("resolveLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefers an injected logger", () => {
    const injected: PolicyAdapterLogger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    expect(resolveLogger(injected, true)).toBe(injected);
  });

  it("is silent unless verbose", () => {
    expect(resolveLogger(undefined, false)).toBe(silentLogger);
  });

  it("prints prefixed lines to the console when verbose", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    resolveLogger(undefined, true).info("Loaded 3 policy rules");
    expect(info).toHaveBeenCalledWith("[policy-adapter] Loaded 3 policy rules");
  });

  it("accepts a custom prefix", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createConsoleLogger("[rbac]").warn("slow scan");
    expect(warn).toHaveBeenCalledWith("[rbac] slow scan");
  });
});
