import { AppServerError } from "../shared/app-server-errors.js";
import type { JsonValue } from "../shared/json-value.js";
import { rpcIdKey, type RpcId, type RpcOutcome } from "../shared/jsonrpc.js";

type PendingRequest = {
  method: string;
  resolve: (result: JsonValue) => void;
  reject: (error: unknown) => void;
  timer: ReturnType<typeof setTimeout> | null;
};

/**
 * Correlates outbound request ids with their responses. One router lives for
 * exactly one connection attempt. Every mutation runs synchronously on the
 * event loop and an entry is removed before its promise settles, so each
 * request settles exactly once.
 */
export class MessageRouter {
  private readonly pending = new Map<string, PendingRequest>();
  private nextId = 1;
  private closedError: unknown = null;

  nextRequestId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  get size(): number {
    return this.pending.size;
  }

  get isClosed(): boolean {
    return this.closedError !== null;
  }

  has(id: RpcId): boolean {
    return this.pending.has(rpcIdKey(id));
  }

  methodFor(id: RpcId): string | undefined {
    return this.pending.get(rpcIdKey(id))?.method;
  }

  register(id: RpcId, method: string, timeoutMs: number | null): Promise<JsonValue> {
    if (this.closedError !== null) {
      return Promise.reject(this.closedError);
    }
    const key = rpcIdKey(id);
    if (this.pending.has(key)) {
      return Promise.reject(new Error(`Request id ${key} is already pending`));
    }

    return new Promise<JsonValue>((resolve, reject) => {
      const entry: PendingRequest = { method, resolve, reject, timer: null };
      if (timeoutMs !== null) {
        entry.timer = setTimeout(() => {
          if (this.pending.get(key) !== entry) {
            return;
          }
          this.pending.delete(key);
          reject(new AppServerError({ type: "timeout", method }));
        }, timeoutMs);
      }
      this.pending.set(key, entry);
    });
  }

  /** Settles the matching request. Unknown, late and duplicate ids return false. */
  resolve(id: RpcId, outcome: RpcOutcome): boolean {
    const entry = this.take(id);
    if (!entry) {
      return false;
    }
    if (outcome.ok) {
      entry.resolve(outcome.result);
    } else {
      const { code, message, data } = outcome.error;
      entry.reject(
        new AppServerError(
          data === undefined
            ? { type: "remote", code, message }
            : { type: "remote", code, message, data }
        )
      );
    }
    return true;
  }

  fail(id: RpcId, error: unknown): boolean {
    const entry = this.take(id);
    if (!entry) {
      return false;
    }
    entry.reject(error);
    return true;
  }

  /** Rejects everything still pending; later registrations reject with the same error. */
  failAll(error: unknown): void {
    if (this.closedError === null) {
      this.closedError = error;
    }
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) {
      if (entry.timer) {
        clearTimeout(entry.timer);
      }
      entry.reject(error);
    }
  }

  private take(id: RpcId): PendingRequest | undefined {
    const key = rpcIdKey(id);
    const entry = this.pending.get(key);
    if (!entry) {
      return undefined;
    }
    this.pending.delete(key);
    if (entry.timer) {
      clearTimeout(entry.timer);
    }
    return entry;
  }
}
