import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createChildLogger, createRootLogger, resolveLogConfig } from "./logger.js";
import type { PersistedConfig } from "./persisted-config.js";

describe("resolveLogConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.POCKET_AGENT_LOG;
    delete process.env.POCKET_AGENT_LOG_FORMAT;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no config or env vars", () => {
    expect(resolveLogConfig(undefined)).toEqual({ level: "info", format: "pretty" });
  });

  it("uses config.json values over defaults", () => {
    const config: PersistedConfig = {
      log: {
        level: "debug",
        format: "json",
      },
    };
    expect(resolveLogConfig(config)).toEqual({ level: "debug", format: "json" });
  });

  it("uses env POCKET_AGENT_LOG over config.json level", () => {
    process.env.POCKET_AGENT_LOG = "warn";
    const config: PersistedConfig = {
      log: {
        level: "debug",
        format: "json",
      },
    };
    expect(resolveLogConfig(config)).toEqual({ level: "warn", format: "json" });
  });

  it("normalizes env values before matching", () => {
    process.env.POCKET_AGENT_LOG = " ERROR ";
    process.env.POCKET_AGENT_LOG_FORMAT = "Json";
    expect(resolveLogConfig(undefined)).toEqual({ level: "error", format: "json" });
  });

  it("ignores unrecognised env values", () => {
    process.env.POCKET_AGENT_LOG = "verbose";
    process.env.POCKET_AGENT_LOG_FORMAT = "xml";
    const config: PersistedConfig = {
      log: {
        level: "trace",
      },
    };
    expect(resolveLogConfig(config)).toEqual({ level: "trace", format: "pretty" });
  });

  it("reads an explicit env object", () => {
    expect(resolveLogConfig(undefined, { POCKET_AGENT_LOG: "fatal" })).toEqual({
      level: "fatal",
      format: "pretty",
    });
  });
});

describe("createRootLogger", () => {
  it("applies the resolved level", () => {
    const logger = createRootLogger({ log: { level: "warn", format: "json" } }, {});
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("creates named children at the parent level", () => {
    const root = createRootLogger({ log: { level: "debug", format: "json" } }, {});
    const child = createChildLogger(root, "client");
    expect(child.level).toBe("debug");
    expect(child.bindings()).toEqual({ name: "client" });
  });
});
