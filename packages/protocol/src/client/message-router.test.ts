import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AppServerError } from "../shared/app-server-errors.js";
import { MessageRouter } from "./message-router.js";

describe("MessageRouter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allocates increasing ids from 1", () => {
    const router = new MessageRouter();
    expect([router.nextRequestId(), router.nextRequestId(), router.nextRequestId()]).toEqual([
      1, 2, 3,
    ]);
  });

  it("resolves a registered request once", async () => {
    const router = new MessageRouter();
    const pending = router.register(1, "thread/list", 30_000);
    expect(router.size).toBe(1);
    expect(router.methodFor(1)).toBe("thread/list");

    expect(router.resolve(1, { ok: true, result: { data: [] } })).toBe(true);
    await expect(pending).resolves.toEqual({ data: [] });

    expect(router.resolve(1, { ok: true, result: null })).toBe(false);
    expect(router.size).toBe(0);
  });

  it("matches numeric-string response ids", async () => {
    const router = new MessageRouter();
    const pending = router.register(4, "thread/read", null);
    expect(router.resolve("4", { ok: true, result: "ok" })).toBe(true);
    await expect(pending).resolves.toBe("ok");
  });

  it("ignores response ids that only resemble a pending id", async () => {
    const router = new MessageRouter();
    const pending = router.register(2, "thread/fork", null);
    const seven = router.register(7, "thread/read", null);

    expect(router.resolve(2.5, { ok: true, result: "stray" })).toBe(false);
    expect(router.resolve("007", { ok: true, result: "stray" })).toBe(false);
    expect(router.resolve(" 7 ", { ok: true, result: "stray" })).toBe(false);
    expect(router.size).toBe(2);

    expect(router.resolve(2, { ok: true, result: "fork" })).toBe(true);
    expect(router.resolve("7", { ok: true, result: "read" })).toBe(true);
    await expect(pending).resolves.toBe("fork");
    await expect(seven).resolves.toBe("read");
  });

  it("routes concurrent responses that arrive out of order", async () => {
    const router = new MessageRouter();
    const ids = [router.nextRequestId(), router.nextRequestId(), router.nextRequestId()];
    const requests = ids.map((id) => router.register(id, "thread/read", 30_000));

    for (const id of [3, 1, 2]) {
      router.resolve(id, { ok: true, result: `reply-${id}` });
    }

    await expect(Promise.all(requests)).resolves.toEqual(["reply-1", "reply-2", "reply-3"]);
    expect(router.size).toBe(0);
  });

  it("rejects remote errors with their code, message and data", async () => {
    const router = new MessageRouter();
    const pending = router.register(2, "turn/start", 30_000);
    router.resolve(2, {
      ok: false,
      error: { code: -32602, message: "Invalid params", data: { field: "effort" } },
    });
    await expect(pending).rejects.toMatchObject({
      kind: { type: "remote", code: -32602, message: "Invalid params", data: { field: "effort" } },
    });
  });

  it("times out and ignores a late response", async () => {
    const router = new MessageRouter();
    const pending = router.register(1, "thread/list", 30_000);
    const outcome = pending.catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(29_999);
    expect(router.has(1)).toBe(true);
    await vi.advanceTimersByTimeAsync(1);

    const error = await outcome;
    expect(error).toBeInstanceOf(AppServerError);
    expect(error).toMatchObject({ kind: { type: "timeout", method: "thread/list" } });
    expect(router.resolve(1, { ok: true, result: null })).toBe(false);
  });

  it("fails a single request with a send error", async () => {
    const router = new MessageRouter();
    const pending = router.register(3, "thread/start", 30_000);
    expect(router.fail(3, new Error("socket write failed"))).toBe(true);
    await expect(pending).rejects.toThrow("socket write failed");
    expect(router.fail(3, new Error("again"))).toBe(false);
  });

  it("fails everything on close and rejects later registrations", async () => {
    const router = new MessageRouter();
    const first = router.register(1, "a", 30_000);
    const second = router.register(2, "b", null);
    const closed = new AppServerError({ type: "not_connected" });

    router.failAll(closed);

    await expect(first).rejects.toBe(closed);
    await expect(second).rejects.toBe(closed);
    await expect(router.register(3, "c", 30_000)).rejects.toBe(closed);
    expect(router.isClosed).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});
