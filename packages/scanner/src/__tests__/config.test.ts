import { availableParallelism } from "node:os";
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { resolveConfig } from "../config/config.js";
import { createLogger, defaultLogger } from "../logging/logger.js";

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig({}, {});
    expect(config.lookaround).toBe(2);
    expect(config.blockWindow).toBe(8);
    expect(config.maxExcerptLength).toBe(200);
    expect(config.logLevel).toBe("warn");
    expect(config.concurrency).toBe(availableParallelism());
    expect(config.fixtureSegments).toContain("fixtures");
    expect(config.testSegments).toContain("tests");
  });

  it("reads environment overrides", () => {
    const config = resolveConfig({}, { CODEGUARD_CONCURRENCY: "3", CODEGUARD_LOG_LEVEL: "debug" });
    expect(config.concurrency).toBe(3);
    expect(config.logLevel).toBe("debug");
  });

  it("lets explicit overrides win over the environment", () => {
    const config = resolveConfig({ concurrency: 5 }, { CODEGUARD_CONCURRENCY: "3" });
    expect(config.concurrency).toBe(5);
  });

  it("rejects invalid values", () => {
    expect(() => resolveConfig({}, { CODEGUARD_CONCURRENCY: "zero" })).toThrow(ZodError);
    expect(() => resolveConfig({ lookaround: -1 }, {})).toThrow(ZodError);
    expect(() => resolveConfig({}, { CODEGUARD_LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});

describe("loggers", () => {
  it("reuses one default logger per level", () => {
    expect(defaultLogger("error")).toBe(defaultLogger("error"));
    expect(defaultLogger("error")).not.toBe(defaultLogger("fatal"));
    expect(defaultLogger("fatal").level).toBe("fatal");
  });

  it("creates loggers at the requested level", () => {
    expect(createLogger().level).toBe("warn");
    expect(createLogger({ level: "debug" }).level).toBe("debug");
  });
});
