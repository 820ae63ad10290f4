import { z } from "zod";
import { EnvelopeDecodeError } from "./app-server-errors.js";
import { JsonValueSchema, type JsonValue } from "./json-value.js";

export const JSONRPC_VERSION = "2.0";

export type RpcId = number | string;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface RpcEnvelope {
  jsonrpc?: string;
  id?: RpcId;
  method?: string;
  params?: JsonValue;
  result?: JsonValue;
  error?: RpcErrorObject;
}

export type RpcOutcome =
  | { ok: true; result: JsonValue }
  | { ok: false; error: RpcErrorObject };

export type ClassifiedEnvelope =
  | { kind: "request"; id: RpcId; method: string; params: JsonValue | undefined }
  | { kind: "notification"; method: string; params: JsonValue | undefined }
  | { kind: "response"; id: RpcId; outcome: RpcOutcome }
  | { kind: "malformed"; id: RpcId | undefined };

const RpcIdSchema = z.union([z.number(), z.string()]);

const RpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string().default(""),
  data: JsonValueSchema.optional(),
});

// Unknown top-level members are stripped; a missing `jsonrpc` is tolerated.
const RpcEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: RpcIdSchema.nullable().optional(),
  method: z.string().optional(),
  params: JsonValueSchema.optional(),
  result: JsonValueSchema.optional(),
  error: RpcErrorObjectSchema.nullable().optional(),
});

// ============================================================================
// Encoding
// ============================================================================

export function encodeEnvelope(envelope: Omit<RpcEnvelope, "jsonrpc">): string {
  const wire: { [key: string]: JsonValue } = { jsonrpc: JSONRPC_VERSION };
  if (envelope.id !== undefined) wire.id = envelope.id;
  if (envelope.method !== undefined) wire.method = envelope.method;
  if (envelope.params !== undefined) wire.params = envelope.params;
  if (envelope.result !== undefined) wire.result = envelope.result;
  if (envelope.error !== undefined) {
    const error: { [key: string]: JsonValue } = {
      code: envelope.error.code,
      message: envelope.error.message,
    };
    if (envelope.error.data !== undefined) error.data = envelope.error.data;
    wire.error = error;
  }
  return JSON.stringify(wire);
}

export function encodeRequest(id: RpcId, method: string, params?: JsonValue): string {
  return encodeEnvelope({ id, method, params });
}

export function encodeNotification(method: string, params?: JsonValue): string {
  return encodeEnvelope({ method, params });
}

export function encodeResult(id: RpcId, result: JsonValue): string {
  return encodeEnvelope({ id, result });
}

export function encodeError(id: RpcId, error: RpcErrorObject): string {
  return encodeEnvelope({ id, error });
}

// ============================================================================
// Decoding
// ============================================================================

export type FrameData = string | Uint8Array | ArrayBuffer;

export function frameToText(data: FrameData): string {
  if (typeof data === "string") {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
}

function readableId(parsed: unknown): RpcId | undefined {
  if (typeof parsed !== "object" || parsed === null || !("id" in parsed)) {
    return undefined;
  }
  const result = RpcIdSchema.safeParse(parsed.id);
  return result.success ? result.data : undefined;
}

/**
 * Decodes one frame into an envelope. Throws {@link EnvelopeDecodeError} when
 * the text is not JSON, the top level is not an object, or a member has the
 * wrong type; the error keeps the id when one could still be read.
 */
export function decodeEnvelope(data: FrameData): RpcEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frameToText(data));
  } catch (error) {
    throw new EnvelopeDecodeError(undefined, { cause: error });
  }

  const result = RpcEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    throw new EnvelopeDecodeError(readableId(parsed), { cause: result.error });
  }

  const { id, ...rest } = result.data;
  const envelope: RpcEnvelope = {};
  if (rest.jsonrpc !== undefined) envelope.jsonrpc = rest.jsonrpc;
  if (id !== undefined && id !== null) envelope.id = id;
  if (rest.method !== undefined) envelope.method = rest.method;
  if (rest.params !== undefined) envelope.params = rest.params;
  if (rest.result !== undefined) envelope.result = rest.result;
  if (rest.error !== undefined && rest.error !== null) {
    envelope.error = { code: rest.error.code, message: rest.error.message };
    if (rest.error.data !== undefined) envelope.error.data = rest.error.data;
  }
  return envelope;
}

export function classifyEnvelope(envelope: RpcEnvelope): ClassifiedEnvelope {
  const { id, method } = envelope;
  if (method !== undefined) {
    return id === undefined
      ? { kind: "notification", method, params: envelope.params }
      : { kind: "request", id, method, params: envelope.params };
  }
  if (id !== undefined) {
    if (envelope.error !== undefined) {
      return { kind: "response", id, outcome: { ok: false, error: envelope.error } };
    }
    if (envelope.result !== undefined) {
      return { kind: "response", id, outcome: { ok: true, result: envelope.result } };
    }
  }
  return { kind: "malformed", id };
}

const DECIMAL_INTEGER = /^(?:0|-?[1-9]\d*)$/;

/**
 * Router key. An integer id and its plain decimal string share a key; any other
 * number or string is kept in its own space so it can never match a pending request.
 */
export function rpcIdKey(id: RpcId): string {
  if (typeof id === "number") {
    return Number.isInteger(id) ? String(id) : `#${String(id)}`;
  }
  return DECIMAL_INTEGER.test(id) ? id : `$${id}`;
}
