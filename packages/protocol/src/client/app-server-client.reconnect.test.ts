import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { HANDSHAKE_FAILURE_MESSAGE } from "../shared/app-server-errors.js";
import { AppServerClient } from "./app-server-client.js";
import { FakeAppServer, connectionError } from "./test-utils/fake-app-server.js";

const ENDPOINT = "ws://10.0.0.5:4500";

describe("AppServerClient reconnection", () => {
  let server: FakeAppServer;
  let client: AppServerClient;

  beforeEach(() => {
    vi.useFakeTimers();
    server = new FakeAppServer();
    client = new AppServerClient({ sessionFactory: server.factory });
  });

  afterEach(async () => {
    await client.disconnect();
    vi.useRealTimers();
  });

  function occurrences(message: string): number {
    return client.eventLog.filter((entry) => entry === message).length;
  }

  test("backs off 1s, 2s, 4s and then stops", async () => {
    await client.connect(ENDPOINT);
    server.failConnects(connectionError("ECONNREFUSED"));

    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(0);

    expect(client.connectionState).toBe("disconnected");
    expect(client.lastError).toBe("[Connection] WebSocket closed (code 1006)");
    expect(client.eventLog).toContain("Reconnect in 1s...");
    expect(server.openAttempts).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(server.openAttempts).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(server.openAttempts).toHaveLength(2);
    expect(client.lastError).toBe("[Connection] connect ECONNREFUSED");
    expect(client.eventLog).toContain("Reconnect in 2s...");

    await vi.advanceTimersByTimeAsync(2_000);
    expect(server.openAttempts).toHaveLength(3);
    expect(client.eventLog).toContain("Reconnect in 4s...");

    await vi.advanceTimersByTimeAsync(4_000);
    expect(server.openAttempts).toHaveLength(4);
    expect(client.eventLog[client.eventLog.length - 1]).toBe("Reconnect attempts exhausted.");

    await vi.advanceTimersByTimeAsync(60_000);
    expect(server.openAttempts).toHaveLength(4);
    expect(client.connectionState).toBe("disconnected");
  });

  test("reconnects after a drop once the server is reachable", async () => {
    await client.connect(ENDPOINT);
    server.lastSession.drop();

    await vi.advanceTimersByTimeAsync(1_000);

    expect(client.connectionState).toBe("connected");
    expect(server.sessions).toHaveLength(2);
    expect(occurrences("Connected: ws://10.0.0.5:4500/")).toBe(2);
    expect(client.lastError).toBeNull();
  });

  test("does not retry a connection lost before the first frame", async () => {
    server.handle("initialize", (_params, { session, sessionIndex }) => {
      if (sessionIndex === 0) {
        return { result: { serverInfo: { version: "0.101.0" } } };
      }
      session.drop();
      return { noReply: true };
    });
    await client.connect(ENDPOINT);

    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(1_000);

    expect(server.openAttempts).toHaveLength(2);
    expect(client.connectionState).toBe("disconnected");
    expect(client.lastError).toBe(HANDSHAKE_FAILURE_MESSAGE);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(server.openAttempts).toHaveLength(2);
    expect(client.eventLog).not.toContain("Reconnect in 2s...");
  });

  test("does not retry an incompatible server", async () => {
    await client.connect(ENDPOINT);
    server.cliVersion = "0.99.0";

    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(server.openAttempts).toHaveLength(2);
    expect(client.lastError).toBe(
      "[Compatibility] App-server CLI version 0.99.0 is not supported. Required: 0.101.0+"
    );

    await vi.advanceTimersByTimeAsync(60_000);
    expect(server.openAttempts).toHaveLength(2);
  });

  test("leaves a failed explicit connect to the caller", async () => {
    server.failNextConnect(connectionError("ECONNREFUSED"));

    await expect(client.connect(ENDPOINT)).rejects.toThrow("connect ECONNREFUSED");
    await vi.advanceTimersByTimeAsync(60_000);

    expect(server.openAttempts).toHaveLength(1);
    expect(client.lastError).toBe("[Connection] connect ECONNREFUSED");
  });

  test("rejects an unroutable host without opening a session", async () => {
    await expect(client.connect("ws://0.0.0.0:8080")).rejects.toMatchObject({
      kind: { type: "invalid_endpoint_host", host: "0.0.0.0" },
    });
    expect(server.openAttempts).toEqual([]);
  });

  test("disconnect cancels a scheduled reconnect", async () => {
    await client.connect(ENDPOINT);
    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(0);
    expect(client.eventLog).toContain("Reconnect in 1s...");

    await client.disconnect();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(server.openAttempts).toHaveLength(1);
    expect(client.connectionState).toBe("disconnected");
  });

  test("an explicit connect restores the full retry budget", async () => {
    await client.connect(ENDPOINT);
    server.failConnects(connectionError("ECONNREFUSED"));
    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(7_000);
    expect(client.eventLog[client.eventLog.length - 1]).toBe("Reconnect attempts exhausted.");

    server.failConnects(null);
    await client.connect(ENDPOINT);
    server.failConnects(connectionError("ECONNREFUSED"));
    server.lastSession.drop();
    await vi.advanceTimersByTimeAsync(0);

    expect(occurrences("Reconnect in 1s...")).toBe(2);
  });
});
