import { v4 as uuidv4 } from "uuid";
import {
  asArray,
  asObject,
  asString,
  findInt,
  findString,
  isJsonObject,
  type JsonObject,
  type JsonPath,
  type JsonValue,
} from "../shared/json-value.js";
import type { RpcId } from "../shared/jsonrpc.js";

// ============================================================================
// Initialize metadata
// ============================================================================

export interface InitializeProbes {
  cliVersion: readonly JsonPath[];
  authStatus: readonly JsonPath[];
  currentModel: readonly JsonPath[];
}

export const DEFAULT_INITIALIZE_PROBES: InitializeProbes = {
  cliVersion: [["serverInfo", "version"], ["server", "version"], ["cli", "version"], ["version"]],
  authStatus: [["authStatus"], ["auth", "status"], ["session", "authStatus"], ["login", "status"]],
  currentModel: [["currentModel"], ["model"], ["session", "model"], ["defaults", "model"]],
};

export interface InitializeMetadata {
  cliVersion?: string;
  authStatus?: string;
  currentModel?: string;
}

export function probeInitializeMetadata(
  result: JsonValue,
  probes: InitializeProbes = DEFAULT_INITIALIZE_PROBES
): InitializeMetadata {
  const metadata: InitializeMetadata = {};
  const cliVersion = findString(result, probes.cliVersion);
  const authStatus = findString(result, probes.authStatus);
  const currentModel = findString(result, probes.currentModel);
  if (cliVersion) metadata.cliVersion = cliVersion;
  if (authStatus) metadata.authStatus = authStatus;
  if (currentModel) metadata.currentModel = currentModel;
  return metadata;
}

function versionComponents(raw: string): number[] {
  return (raw.match(/\d+/g) ?? []).map((part) => Number.parseInt(part, 10));
}

/**
 * Compares digit runs left to right; missing components count as zero and a
 * tie satisfies the minimum. `v0.102.0-beta.1` reads as `0.102.0.1`.
 */
export function isVersionAtLeast(version: string, minimum: string): boolean {
  const left = versionComponents(version);
  const right = versionComponents(minimum);
  const count = Math.max(left.length, right.length);
  for (let index = 0; index < count; index += 1) {
    const lhs = left[index] ?? 0;
    const rhs = right[index] ?? 0;
    if (lhs !== rhs) {
      return lhs > rhs;
    }
  }
  return true;
}

// ============================================================================
// Server-initiated requests
// ============================================================================

export const COMMAND_APPROVAL_METHOD = "item/commandExecution/requestApproval";
export const FILE_CHANGE_APPROVAL_METHOD = "item/fileChange/requestApproval";
export const USER_INPUT_METHOD = "item/tool/requestUserInput";
export const LEGACY_USER_INPUT_METHOD = "tool/requestUserInput";

export type ApprovalDecision = "accept" | "acceptForSession" | "decline" | "cancel";

export interface UserInputOption {
  label: string;
  description: string;
}

export interface UserInputQuestion {
  id: string;
  prompt: string;
  options: UserInputOption[];
}

export type PendingServerRequestKind =
  | { type: "command_approval"; command: string; cwd?: string; reason?: string }
  | { type: "file_change_approval"; reason?: string }
  | { type: "user_input"; questions: UserInputQuestion[] }
  | { type: "unknown" };

export interface PendingServerRequest {
  /** Local identity, independent of the peer's id. */
  id: string;
  /** The peer's id, echoed back in the response. */
  rpcId: RpcId;
  method: string;
  threadId: string;
  turnId: string;
  itemId: string;
  kind: PendingServerRequestKind;
}

function parseUserInputQuestions(params: JsonObject): UserInputQuestion[] {
  const questions: UserInputQuestion[] = [];
  for (const raw of asArray(params.questions) ?? []) {
    const question = asObject(raw);
    const id = asString(question?.id);
    if (!question || id === undefined) {
      continue;
    }
    const options: UserInputOption[] = [];
    for (const rawOption of asArray(question.options) ?? []) {
      const option = asObject(rawOption);
      const label = asString(option?.label);
      if (!option || label === undefined) {
        continue;
      }
      options.push({ label, description: asString(option.description) ?? "" });
    }
    questions.push({
      id,
      prompt: asString(question.question) ?? asString(question.header) ?? "Input required",
      options,
    });
  }
  return questions;
}

export function parsePendingServerRequest(
  rpcId: RpcId,
  method: string,
  params: JsonValue | undefined
): PendingServerRequest {
  const object = asObject(params) ?? {};
  let kind: PendingServerRequestKind;

  switch (method) {
    case COMMAND_APPROVAL_METHOD: {
      const cwd = asString(object.cwd);
      const reason = asString(object.reason);
      kind = {
        type: "command_approval",
        command: asString(object.command) ?? "",
        ...(cwd !== undefined ? { cwd } : {}),
        ...(reason !== undefined ? { reason } : {}),
      };
      break;
    }
    case FILE_CHANGE_APPROVAL_METHOD: {
      const reason = asString(object.reason);
      kind = { type: "file_change_approval", ...(reason !== undefined ? { reason } : {}) };
      break;
    }
    case USER_INPUT_METHOD:
    case LEGACY_USER_INPUT_METHOD:
      kind = { type: "user_input", questions: parseUserInputQuestions(object) };
      break;
    default:
      kind = { type: "unknown" };
  }

  return {
    id: uuidv4(),
    rpcId,
    method,
    threadId: asString(object.threadId) ?? "",
    turnId: asString(object.turnId) ?? "",
    itemId: asString(object.itemId) ?? "",
    kind,
  };
}

export function pendingRequestTitle(request: PendingServerRequest): string {
  switch (request.kind.type) {
    case "command_approval":
      return "Command Approval";
    case "file_change_approval":
      return "File Change Approval";
    case "user_input":
      return "User Input Required";
    case "unknown":
      return "Server Request";
  }
}

export function buildUserInputResult(answers: Record<string, readonly string[]>): JsonValue {
  const payload: JsonObject = {};
  for (const [questionId, values] of Object.entries(answers)) {
    payload[questionId] = { answers: [...values] };
  }
  return { answers: payload };
}

// ============================================================================
// Context usage
// ============================================================================

export interface ContextUsageSummary {
  usedTokens?: number;
  maxTokens?: number;
  remainingTokens?: number;
  updatedAt: Date;
}

export function parseContextUsage(
  params: JsonObject,
  now: Date = new Date()
): ContextUsageSummary {
  const usage: JsonValue = isJsonObject(params.tokenUsage) ? params.tokenUsage : params;
  const summary: ContextUsageSummary = { updatedAt: now };
  const usedTokens = findInt(usage, [
    ["inputTokens"],
    ["usedTokens"],
    ["usedInputTokens"],
    ["usage", "used"],
  ]);
  const maxTokens = findInt(usage, [
    ["maxInputTokens"],
    ["contextWindow", "maxTokens"],
    ["limit"],
    ["maxTokens"],
    ["usage", "limit"],
  ]);
  const remainingTokens = findInt(usage, [
    ["remainingInputTokens"],
    ["contextWindow", "remainingTokens"],
    ["remainingTokens"],
    ["remaining"],
    ["usage", "remaining"],
  ]);
  if (usedTokens !== undefined) summary.usedTokens = usedTokens;
  if (maxTokens !== undefined) summary.maxTokens = maxTokens;
  if (remainingTokens !== undefined) summary.remainingTokens = remainingTokens;
  return summary;
}

// ============================================================================
// Turn completion
// ============================================================================

const SNIPPET_MAX_LENGTH = 200;

/** Text streamed since the turn started, trimmed and capped for notifications. */
export function completionSnippet(before: string, after: string): string {
  const delta = after.startsWith(before) ? after.slice(before.length) : after;
  const trimmed = delta.trim();
  if (trimmed.length <= SNIPPET_MAX_LENGTH) {
    return trimmed;
  }
  return `${trimmed.slice(0, SNIPPET_MAX_LENGTH)}…`;
}

/** `turn/failed` → `failed` when the payload carries no status of its own. */
export function turnStatusFromNotification(method: string, params: JsonObject): string {
  const status = findString(params, [["turn", "status"], ["status"]]);
  if (status) {
    return status;
  }
  const segments = method.split("/");
  return segments[segments.length - 1] ?? method;
}
