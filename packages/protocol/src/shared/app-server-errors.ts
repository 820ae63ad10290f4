import type { JsonValue } from "./json-value.js";
import type { RpcId } from "./jsonrpc.js";

export type AppServerErrorKind =
  | { type: "invalid_url" }
  | { type: "invalid_endpoint_host"; host: string }
  | { type: "not_connected" }
  | { type: "timeout"; method: string }
  | { type: "remote"; code: number; message: string; data?: JsonValue }
  | { type: "incompatible_version"; current: string; minimum: string }
  | { type: "malformed_response" }
  | { type: "unsupported_message" };

export type AppServerErrorType = AppServerErrorKind["type"];

export type ErrorCategory =
  | "authentication"
  | "connection"
  | "permission"
  | "compatibility"
  | "protocol"
  | "unknown";

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_SERVER_OVERLOADED = -32001;

const SOCKET_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ETIMEDOUT",
  "EAI_AGAIN",
]);

const CONNECTION_LOST_SOCKET_CODES = new Set(["ECONNRESET", "EPIPE"]);

export function describeAppServerErrorKind(kind: AppServerErrorKind): string {
  switch (kind.type) {
    case "invalid_url":
      return "Invalid app-server URL. Use ws:// or wss://.";
    case "invalid_endpoint_host":
      return `Invalid app-server host (${kind.host}). Use a reachable host or LAN/VPN IP, not 0.0.0.0/localhost.`;
    case "not_connected":
      return "Not connected to app-server.";
    case "timeout":
      return `Request timed out: ${kind.method}`;
    case "remote":
      return `Remote error [${kind.code}]: ${kind.message}`;
    case "incompatible_version":
      return `App-server CLI version ${kind.current || "unknown"} is not supported. Required: ${kind.minimum}+`;
    case "malformed_response":
      return "Malformed response from app-server.";
    case "unsupported_message":
      return "Unsupported message from app-server.";
    default: {
      const exhaustive: never = kind;
      return exhaustive;
    }
  }
}

export class AppServerError extends Error {
  readonly kind: AppServerErrorKind;

  constructor(kind: AppServerErrorKind, options?: { cause?: unknown }) {
    super(describeAppServerErrorKind(kind), options);
    this.name = "AppServerError";
    this.kind = kind;
  }
}

/** A frame that could not be decoded. Carries the request id when one was readable. */
export class EnvelopeDecodeError extends AppServerError {
  readonly rpcId: RpcId | undefined;

  constructor(rpcId: RpcId | undefined, options?: { cause?: unknown }) {
    super({ type: "malformed_response" }, options);
    this.name = "EnvelopeDecodeError";
    this.rpcId = rpcId;
  }
}

export class TransportClosedError extends Error {
  readonly code: number;
  readonly reason: string;
  /** Abnormal closure (1006) or a reset socket, as opposed to an orderly close. */
  readonly connectionLost: boolean;

  constructor(params: {
    code: number;
    reason?: string;
    connectionLost?: boolean;
    cause?: unknown;
  }) {
    const reason = params.reason?.trim() ?? "";
    super(
      reason
        ? `WebSocket closed (code ${params.code}): ${reason}`
        : `WebSocket closed (code ${params.code})`,
      { cause: params.cause }
    );
    this.name = "TransportClosedError";
    this.code = params.code;
    this.reason = reason;
    this.connectionLost = params.connectionLost ?? params.code === 1006;
  }
}

export function isAppServerError<T extends AppServerErrorType>(
  error: unknown,
  type: T
): error is AppServerError & { kind: Extract<AppServerErrorKind, { type: T }> } {
  return error instanceof AppServerError && error.kind.type === type;
}

export function socketErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function isConnectionLostSocketError(error: unknown): boolean {
  const code = socketErrorCode(error);
  return code !== undefined && CONNECTION_LOST_SOCKET_CODES.has(code);
}

export function isConnectionLost(error: unknown): boolean {
  if (error instanceof TransportClosedError) {
    return error.connectionLost;
  }
  return isConnectionLostSocketError(error);
}

// ============================================================================
// Classification
// ============================================================================

/** The pre-defined JSON-RPC range, parse error through internal error. */
export function isReservedJsonRpcCode(code: number): boolean {
  return code >= RPC_PARSE_ERROR && code <= RPC_INTERNAL_ERROR;
}

export function errorCategoryFromRemote(code: number, message: string): ErrorCategory {
  if (isReservedJsonRpcCode(code)) {
    return "protocol";
  }
  const lowered = message.toLowerCase();
  if (
    code === 401 ||
    code === 403 ||
    lowered.includes("auth") ||
    lowered.includes("token") ||
    lowered.includes("login")
  ) {
    return "authentication";
  }
  if (
    lowered.includes("permission") ||
    lowered.includes("denied") ||
    lowered.includes("forbidden")
  ) {
    return "permission";
  }
  if (lowered.includes("version") || lowered.includes("unsupported")) {
    return "compatibility";
  }
  return "unknown";
}

export function errorCategory(error: unknown): ErrorCategory {
  if (error instanceof AppServerError) {
    const { kind } = error;
    switch (kind.type) {
      case "incompatible_version":
        return "compatibility";
      case "invalid_url":
      case "invalid_endpoint_host":
      case "not_connected":
      case "timeout":
        return "connection";
      case "malformed_response":
      case "unsupported_message":
        return "protocol";
      case "remote":
        return errorCategoryFromRemote(kind.code, kind.message);
      default: {
        const exhaustive: never = kind;
        return exhaustive;
      }
    }
  }

  if (error instanceof TransportClosedError) {
    return "connection";
  }
  const socketCode = socketErrorCode(error);
  if (socketCode !== undefined && SOCKET_ERROR_CODES.has(socketCode)) {
    return "connection";
  }

  const message = describeError(error).toLowerCase();
  if (message.includes("auth") || message.includes("token") || message.includes("login")) {
    return "authentication";
  }
  if (
    message.includes("forbidden") ||
    message.includes("permission") ||
    message.includes("denied")
  ) {
    return "permission";
  }
  if (message.includes("version") || message.includes("unsupported")) {
    return "compatibility";
  }
  if (
    message.includes("timeout") ||
    message.includes("timed out") ||
    message.includes("network") ||
    message.includes("connection")
  ) {
    return "connection";
  }
  return "unknown";
}

const CATEGORY_TITLES: Record<ErrorCategory, string> = {
  authentication: "Authentication",
  connection: "Connection",
  permission: "Permission",
  compatibility: "Compatibility",
  protocol: "Protocol",
  unknown: "Unknown",
};

export function errorCategoryTitle(category: ErrorCategory): string {
  return CATEGORY_TITLES[category];
}

export const HANDSHAKE_FAILURE_MESSAGE =
  "[Connection] WebSocket handshake failed before app-server initialization. " +
  "The app-server may reject WebSocket extension negotiation (Sec-WebSocket-Extensions). " +
  "Connect through a proxy that strips the header, or check the server logs.";

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Renders `[Category] message`. A connection lost before the first frame
 * usually means the upgrade was rejected after the socket opened, which gets
 * its own explanation.
 */
export function formatErrorMessage(
  error: unknown,
  context: { hasReceivedFrame?: boolean } = {}
): string {
  if (context.hasReceivedFrame === false && isConnectionLost(error)) {
    return HANDSHAKE_FAILURE_MESSAGE;
  }
  return `[${errorCategoryTitle(errorCategory(error))}] ${describeError(error)}`;
}

// ============================================================================
// Retry predicates
// ============================================================================

function remoteKind(
  error: unknown
): Extract<AppServerErrorKind, { type: "remote" }> | undefined {
  return isAppServerError(error, "remote") ? error.kind : undefined;
}

function rejectsParams(error: unknown, keywords: readonly string[]): boolean {
  const remote = remoteKind(error);
  if (!remote) {
    return false;
  }
  if (remote.code === RPC_INVALID_PARAMS) {
    return true;
  }
  const lowered = remote.message.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

export function shouldRetryWithoutEffort(error: unknown): boolean {
  return rejectsParams(error, ["invalid params", "reasoning", "effort", "unknown field"]);
}

export function shouldRetryWithoutModel(error: unknown): boolean {
  return rejectsParams(error, ["invalid params", "model", "unknown field"]);
}

export function shouldRetryWithoutCollaborationMode(error: unknown): boolean {
  return rejectsParams(error, [
    "invalid params",
    "unknown field",
    "collaborationmode",
    "collaboration mode",
  ]);
}

export function shouldRetryReviewTarget(error: unknown): boolean {
  return rejectsParams(error, ["invalid params", "unknown field"]);
}

export function isServerOverloaded(error: unknown): boolean {
  return remoteKind(error)?.code === RPC_SERVER_OVERLOADED;
}

export function isMethodNotFound(error: unknown): boolean {
  return remoteKind(error)?.code === RPC_METHOD_NOT_FOUND;
}
