import { describe, expect, it } from "vitest";
import { EnvelopeDecodeError } from "./app-server-errors.js";
import {
  classifyEnvelope,
  decodeEnvelope,
  encodeEnvelope,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeResult,
  rpcIdKey,
  type RpcEnvelope,
} from "./jsonrpc.js";

function decodeFailure(frame: string): EnvelopeDecodeError {
  try {
    decodeEnvelope(frame);
  } catch (error) {
    if (error instanceof EnvelopeDecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected decode to fail");
}

describe("encoding", () => {
  it("always writes the protocol version and omits absent members", () => {
    expect(encodeRequest(1, "thread/list", { limit: 100 })).toBe(
      '{"jsonrpc":"2.0","id":1,"method":"thread/list","params":{"limit":100}}'
    );
    expect(encodeNotification("initialized")).toBe('{"jsonrpc":"2.0","method":"initialized"}');
  });

  it("echoes the peer id in results and errors", () => {
    expect(encodeResult("req-7", { decision: "accept" })).toBe(
      '{"jsonrpc":"2.0","id":"req-7","result":{"decision":"accept"}}'
    );
    expect(encodeError(3, { code: -32601, message: "nope" })).toBe(
      '{"jsonrpc":"2.0","id":3,"error":{"code":-32601,"message":"nope"}}'
    );
  });
});

describe("decoding and classification", () => {
  it("classifies requests, notifications and responses", () => {
    expect(
      classifyEnvelope(decodeEnvelope('{"id":5,"method":"item/tool/requestUserInput","params":{}}'))
    ).toEqual({ kind: "request", id: 5, method: "item/tool/requestUserInput", params: {} });

    expect(classifyEnvelope(decodeEnvelope('{"method":"turn/started"}'))).toEqual({
      kind: "notification",
      method: "turn/started",
      params: undefined,
    });

    expect(classifyEnvelope(decodeEnvelope('{"jsonrpc":"2.0","id":1,"result":{"ok":true}}'))).toEqual(
      { kind: "response", id: 1, outcome: { ok: true, result: { ok: true } } }
    );
  });

  it("reads error responses with data and prefers error over result", () => {
    const envelope = decodeEnvelope(
      '{"id":2,"result":{},"error":{"code":-32001,"message":"busy","data":{"retry":true}}}'
    );
    expect(classifyEnvelope(envelope)).toEqual({
      kind: "response",
      id: 2,
      outcome: { ok: false, error: { code: -32001, message: "busy", data: { retry: true } } },
    });
  });

  it("accepts a null result and treats a null error as absent", () => {
    expect(classifyEnvelope(decodeEnvelope('{"id":4,"result":null,"error":null}'))).toEqual({
      kind: "response",
      id: 4,
      outcome: { ok: true, result: null },
    });
  });

  it("marks an id without result or error as malformed", () => {
    expect(classifyEnvelope(decodeEnvelope('{"id":9}'))).toEqual({ kind: "malformed", id: 9 });
    expect(classifyEnvelope(decodeEnvelope("{}"))).toEqual({ kind: "malformed", id: undefined });
  });

  it("decodes binary frames as UTF-8", () => {
    const bytes = new TextEncoder().encode('{"method":"thread/started"}');
    expect(decodeEnvelope(bytes)).toEqual({ method: "thread/started" });
  });

  it("keeps the id when a member has the wrong type", () => {
    const error = decodeFailure('{"id":12,"error":{"code":"bad"}}');
    expect(error.rpcId).toBe(12);
    expect(error.kind).toEqual({ type: "malformed_response" });
  });

  it("has no id for frames that are not JSON objects", () => {
    expect(decodeFailure("not json").rpcId).toBeUndefined();
    expect(decodeFailure("[1,2]").rpcId).toBeUndefined();
  });
});

describe("round trip", () => {
  const cases: Array<{ name: string; envelope: Omit<RpcEnvelope, "jsonrpc"> }> = [
    {
      name: "request",
      envelope: {
        id: 3,
        method: "turn/start",
        params: { threadId: "t1", input: [{ type: "text", text: "hi" }] },
      },
    },
    {
      name: "notification",
      envelope: { method: "item/agentMessage/delta", params: { delta: "Hel" } },
    },
    {
      name: "response",
      envelope: { id: "srv-1", result: { decision: "accept", extra: [1, null, true] } },
    },
    {
      name: "error response",
      envelope: {
        id: 8,
        error: { code: -32001, message: "Server overloaded", data: { retryAfter: 2 } },
      },
    },
  ];

  it.each(cases)("decodes an encoded $name back to the same envelope", ({ envelope }) => {
    expect(decodeEnvelope(encodeEnvelope(envelope))).toEqual({ jsonrpc: "2.0", ...envelope });
  });
});

describe("rpcIdKey", () => {
  it("shares one key between an integer and its plain decimal string", () => {
    expect(rpcIdKey(7)).toBe("7");
    expect(rpcIdKey("7")).toBe("7");
    expect(rpcIdKey(-3)).toBe(rpcIdKey("-3"));
  });

  it("keeps fractional numbers and other strings apart from integer keys", () => {
    expect(rpcIdKey(2.5)).not.toBe(rpcIdKey(2));
    expect(rpcIdKey(2.5)).not.toBe(rpcIdKey("2.5"));
    expect(rpcIdKey("007")).not.toBe(rpcIdKey(7));
    expect(rpcIdKey(" 7 ")).not.toBe(rpcIdKey(7));
    expect(rpcIdKey("-0")).not.toBe(rpcIdKey(0));
    expect(rpcIdKey("abc")).toBe(rpcIdKey("abc"));
  });
});
