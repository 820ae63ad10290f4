import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  getConfigPath,
  loadPersistedConfig,
  resolveConfigHome,
  savePersistedConfig,
} from "./persisted-config.js";

describe("resolveConfigHome", () => {
  it("uses POCKET_AGENT_HOME without creating it", () => {
    const home = path.join(os.tmpdir(), "pocket-agent-unused", "home");
    expect(resolveConfigHome({ POCKET_AGENT_HOME: ` ${home} ` })).toBe(home);
    expect(existsSync(home)).toBe(false);
  });

  it("expands a leading tilde and falls back to ~/.pocket-agent", () => {
    expect(resolveConfigHome({ POCKET_AGENT_HOME: "~/agents" })).toBe(
      path.join(os.homedir(), "agents")
    );
    expect(resolveConfigHome({ POCKET_AGENT_HOME: "  " })).toBe(
      path.join(os.homedir(), ".pocket-agent")
    );
    expect(resolveConfigHome({})).toBe(path.join(os.homedir(), ".pocket-agent"));
  });
});

describe("persisted config", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(path.join(os.tmpdir(), "pocket-agent-config-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("writes the default file on first load", () => {
    const config = loadPersistedConfig(home);

    expect(config).toEqual({ version: 1, appServer: { reconnect: { enabled: true } } });
    expect(readFileSync(getConfigPath(home), "utf-8")).toBe(
      JSON.stringify({ version: 1, appServer: { reconnect: { enabled: true } } }, null, 2) + "\n"
    );
  });

  it("creates a missing home directory when it first writes the file", () => {
    const nested = path.join(home, "nested", "home");
    expect(existsSync(nested)).toBe(false);

    loadPersistedConfig(nested);

    expect(existsSync(getConfigPath(nested))).toBe(true);
  });

  it("round-trips saved values", () => {
    savePersistedConfig(home, {
      version: 1,
      log: { level: "debug", format: "json" },
      appServer: { url: "ws://10.0.0.5:4500", pingIntervalMs: 15_000 },
    });

    expect(loadPersistedConfig(home)).toEqual({
      version: 1,
      log: { level: "debug", format: "json" },
      appServer: { url: "ws://10.0.0.5:4500", pingIntervalMs: 15_000 },
    });
  });

  it("reports malformed JSON with the file path", () => {
    const configPath = getConfigPath(home);
    writeFileSync(configPath, "{ not json");

    expect(() => loadPersistedConfig(home)).toThrow(`[Config] Invalid JSON in ${configPath}:`);
  });

  it("lists every schema issue", () => {
    const configPath = getConfigPath(home);
    writeFileSync(
      configPath,
      JSON.stringify({ appServer: { reconnect: { maxAttempts: -1 } }, extra: true })
    );

    let message = "";
    try {
      loadPersistedConfig(home);
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    const lines = message.split("\n");
    expect(lines[0]).toBe(`[Config] Invalid config in ${configPath}:`);
    expect(lines.some((line) => line.startsWith("  - appServer.reconnect.maxAttempts: "))).toBe(true);
    expect(lines).toHaveLength(3);
  });

  it("refuses to save an invalid config", () => {
    expect(() =>
      savePersistedConfig(home, { appServer: { requestTimeoutMs: 0 } })
    ).toThrow("[Config] Invalid config to save:");
  });
});
