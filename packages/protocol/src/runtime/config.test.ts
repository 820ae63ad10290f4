import { describe, expect, it } from "vitest";
import { resolveClientConfig } from "./config.js";

describe("resolveClientConfig", () => {
  it("falls back to built-in defaults", () => {
    expect(resolveClientConfig(undefined, {})).toEqual({
      url: undefined,
      clientInfo: { name: "pocket-agent", version: "0.1.0" },
      minimumCliVersion: "0.101.0",
      requestTimeoutMs: 30_000,
      pingIntervalMs: 20_000,
      reconnect: { enabled: true, maxAttempts: 3, baseDelayMs: 1_000 },
    });
  });

  it("reads config.json values", () => {
    const resolved = resolveClientConfig(
      {
        appServer: {
          url: " ws://10.0.0.5:4500 ",
          requestTimeoutMs: 5_000,
          reconnect: { enabled: false, maxAttempts: 0 },
        },
        clientInfo: { name: "pocket-agent-ci" },
      },
      {}
    );

    expect(resolved.url).toBe("ws://10.0.0.5:4500");
    expect(resolved.requestTimeoutMs).toBe(5_000);
    expect(resolved.reconnect).toEqual({ enabled: false, maxAttempts: 0, baseDelayMs: 1_000 });
    expect(resolved.clientInfo).toEqual({ name: "pocket-agent-ci", version: "0.1.0" });
  });

  it("lets POCKET_AGENT_URL win over the file", () => {
    const persisted = { appServer: { url: "ws://10.0.0.5:4500" } };
    expect(resolveClientConfig(persisted, { POCKET_AGENT_URL: "wss://agent.example.test" }).url).toBe(
      "wss://agent.example.test"
    );
    expect(resolveClientConfig(persisted, { POCKET_AGENT_URL: "   " }).url).toBe("ws://10.0.0.5:4500");
  });
});
