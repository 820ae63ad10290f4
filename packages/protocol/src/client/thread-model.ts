import { z } from "zod";
import { AppServerError } from "../shared/app-server-errors.js";
import {
  asArray,
  asBool,
  asObject,
  asString,
  findString,
  nonEmpty,
  JsonValueSchema,
  type JsonObject,
  type JsonValue,
} from "../shared/json-value.js";

// ============================================================================
// Domain types
// ============================================================================

export interface RemoteThreadRecord {
  id: string;
  preview: string;
  updatedAt: Date;
  archived: boolean;
  cwd: string;
  model?: string;
  reasoningEffort?: string;
}

export type TurnItem =
  | { type: "user_message"; id: string; text: string }
  | { type: "agent_message"; id: string; text: string }
  | { type: "plan"; id: string; text: string }
  | { type: "reasoning"; id: string; text: string }
  | { type: "command_execution"; id: string; command: string; status: string; output?: string }
  | { type: "file_change"; id: string; status: string; changedFiles: number }
  | { type: "other"; id: string; itemType: string };

export interface ThreadTurn {
  id: string;
  status: string;
  items: TurnItem[];
  model?: string;
  reasoningEffort?: string;
}

export interface ThreadDetail {
  threadId: string;
  turns: ThreadTurn[];
  model?: string;
  reasoningEffort?: string;
}

export interface ReasoningEffortOption {
  value: string;
  description?: string;
}

export interface ModelDescriptor {
  model: string;
  displayName: string;
  reasoningEffortOptions: ReasoningEffortOption[];
  defaultReasoningEffort?: string;
  isDefault: boolean;
}

// ============================================================================
// Payload schemas
// ============================================================================

const optionalText = z.string().nullish();

const EffortFieldsSchema = z.object({
  reasoningEffort: optionalText,
  reasoning_effort: optionalText,
  effort: optionalText,
});

type EffortFields = z.infer<typeof EffortFieldsSchema>;

const ThreadListEntrySchema = EffortFieldsSchema.extend({
  id: z.string(),
  preview: z.string().default(""),
  updatedAt: z.number(),
  cwd: optionalText,
  model: optionalText,
});

const ThreadListResponseSchema = z.object({
  data: z.array(ThreadListEntrySchema).default([]),
});

const UserInputContentSchema = z.object({
  type: z.string(),
  text: optionalText,
  path: optionalText,
  name: optionalText,
});

const ThreadItemSchema = z.object({
  id: z.string(),
  type: z.string(),
  text: optionalText,
  status: optionalText,
  command: optionalText,
  aggregatedOutput: optionalText,
  changes: z.array(JsonValueSchema).nullish(),
  content: z.array(UserInputContentSchema).nullish(),
  summary: z.array(JsonValueSchema).nullish(),
});

const ThreadTurnSchema = EffortFieldsSchema.extend({
  id: z.string(),
  status: z.string().default("unknown"),
  items: z.array(ThreadItemSchema).default([]),
  model: optionalText,
});

const ThreadPayloadSchema = EffortFieldsSchema.extend({
  id: z.string(),
  turns: z.array(ThreadTurnSchema).default([]),
  model: optionalText,
});

const ThreadReadResponseSchema = EffortFieldsSchema.extend({
  thread: ThreadPayloadSchema,
  model: optionalText,
});

type ThreadItemPayload = z.infer<typeof ThreadItemSchema>;

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: JsonValue): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new AppServerError({ type: "malformed_response" }, { cause: result.error });
  }
  return result.data;
}

export function normalizeReasoningEffort(raw: string | null | undefined): string | undefined {
  return nonEmpty(raw)?.toLowerCase();
}

function effortOf(fields: EffortFields): string | undefined {
  return normalizeReasoningEffort(fields.reasoningEffort ?? fields.reasoning_effort ?? fields.effort);
}

// ============================================================================
// Threads
// ============================================================================

export function parseThreadList(result: JsonValue, archived: boolean): RemoteThreadRecord[] {
  const payload = parsePayload(ThreadListResponseSchema, result);
  return payload.data.map((entry) => {
    const record: RemoteThreadRecord = {
      id: entry.id,
      preview: entry.preview,
      updatedAt: new Date(entry.updatedAt * 1000),
      archived,
      cwd: entry.cwd ?? "",
    };
    const model = nonEmpty(entry.model);
    const reasoningEffort = effortOf(entry);
    if (model) record.model = model;
    if (reasoningEffort) record.reasoningEffort = reasoningEffort;
    return record;
  });
}

function userMessageText(item: ThreadItemPayload): string {
  const parts: string[] = [];
  for (const input of item.content ?? []) {
    switch (input.type) {
      case "text":
        if (input.text != null) parts.push(input.text);
        break;
      case "image":
        parts.push("[image]");
        break;
      case "localImage":
        parts.push(`[localImage] ${input.path ?? ""}`);
        break;
      case "skill":
      case "mention":
        parts.push(`[${input.type}] ${input.name ?? input.path ?? ""}`);
        break;
      default:
        break;
    }
  }
  return parts.join("\n");
}

function reasoningSummaryText(summary: JsonValue[] | null | undefined): string {
  const parts: string[] = [];
  for (const part of summary ?? []) {
    const text = asString(asObject(part)?.text) ?? asString(part);
    if (text !== undefined) {
      parts.push(text);
    }
  }
  return parts.join("\n");
}

function convertItem(item: ThreadItemPayload): TurnItem {
  switch (item.type) {
    case "userMessage":
      return { type: "user_message", id: item.id, text: userMessageText(item) };
    case "agentMessage":
      return { type: "agent_message", id: item.id, text: item.text ?? "" };
    case "plan":
      return { type: "plan", id: item.id, text: item.text ?? "" };
    case "reasoning":
      return { type: "reasoning", id: item.id, text: reasoningSummaryText(item.summary) };
    case "commandExecution":
      return {
        type: "command_execution",
        id: item.id,
        command: item.command ?? "",
        status: item.status ?? "unknown",
        ...(item.aggregatedOutput != null ? { output: item.aggregatedOutput } : {}),
      };
    case "fileChange":
      return {
        type: "file_change",
        id: item.id,
        status: item.status ?? "unknown",
        changedFiles: item.changes?.length ?? 0,
      };
    default:
      return { type: "other", id: item.id, itemType: item.type };
  }
}

/** Accepts `thread/read` and `thread/resume` results; top-level model and effort win over the thread's. */
export function parseThreadDetail(result: JsonValue): ThreadDetail {
  const payload = parsePayload(ThreadReadResponseSchema, result);
  const { thread } = payload;

  const turns = thread.turns.map((turn) => {
    const converted: ThreadTurn = {
      id: turn.id,
      status: turn.status,
      items: turn.items.map(convertItem),
    };
    const model = nonEmpty(turn.model);
    const reasoningEffort = effortOf(turn);
    if (model) converted.model = model;
    if (reasoningEffort) converted.reasoningEffort = reasoningEffort;
    return converted;
  });

  const detail: ThreadDetail = { threadId: thread.id, turns };
  const model = nonEmpty(payload.model) ?? nonEmpty(thread.model);
  const reasoningEffort = effortOf(payload) ?? effortOf(thread);
  if (model) detail.model = model;
  if (reasoningEffort) detail.reasoningEffort = reasoningEffort;
  return detail;
}

export function renderThread(detail: ThreadDetail): string {
  const lines: string[] = [];
  for (const turn of detail.turns) {
    lines.push(`=== Turn ${turn.id} [${turn.status}] ===`);
    for (const item of turn.items) {
      switch (item.type) {
        case "user_message":
          lines.push(`User: ${item.text}`);
          break;
        case "agent_message":
          lines.push(`Assistant: ${item.text}`);
          break;
        case "plan":
          lines.push(`Plan: ${item.text}`);
          break;
        case "reasoning":
          if (item.text) {
            lines.push(`Reasoning: ${item.text}`);
          }
          break;
        case "command_execution":
          lines.push(`$ ${item.command} [${item.status}]`);
          if (item.output) {
            lines.push(item.output);
          }
          break;
        case "file_change":
          lines.push(`File change [${item.status}] files=${item.changedFiles}`);
          break;
        case "other":
          lines.push(`Item: ${item.itemType}`);
          break;
      }
    }
    lines.push("");
  }
  return lines.join("\n");
}

// ============================================================================
// Model catalog
// ============================================================================

export interface ModelListPage {
  entries: JsonObject[];
  nextCursor?: string;
}

export function parseModelListPage(result: JsonValue): ModelListPage {
  const object = asObject(result);
  if (!object) {
    throw new AppServerError({ type: "malformed_response" });
  }
  const entries: JsonObject[] = [];
  for (const entry of asArray(object.data) ?? []) {
    const entryObject = asObject(entry);
    if (entryObject) {
      entries.push(entryObject);
    }
  }
  const page: ModelListPage = { entries };
  const nextCursor = findString(object, [["nextCursor"], ["next_cursor"]]);
  if (nextCursor) page.nextCursor = nextCursor;
  return page;
}

const EFFORT_OPTION_KEYS = ["effort", "reasoningEffort", "reasoning_effort", "id", "value", "name"];
const EFFORT_LIST_KEYS = [
  "reasoningEffort",
  "reasoning_effort",
  "supportedReasoningEfforts",
  "supported_reasoning_efforts",
];

function effortOptions(entry: JsonObject): ReasoningEffortOption[] {
  const raw = EFFORT_LIST_KEYS.map((key) => asArray(entry[key])).find(
    (list) => list !== undefined
  );
  const options: ReasoningEffortOption[] = [];
  for (const item of raw ?? []) {
    const object = asObject(item);
    const value = object
      ? normalizeReasoningEffort(findString(object, EFFORT_OPTION_KEYS.map((key) => [key])))
      : normalizeReasoningEffort(asString(item));
    if (!value) {
      continue;
    }
    const option: ReasoningEffortOption = { value };
    const description = nonEmpty(asString(object?.description));
    if (description) option.description = description;
    options.push(option);
  }
  return options;
}

export function buildModelCatalog(entries: readonly JsonObject[]): ModelDescriptor[] {
  const models: ModelDescriptor[] = [];
  const seenModels = new Set<string>();

  for (const entry of entries) {
    const model = nonEmpty(asString(entry.model)) ?? nonEmpty(asString(entry.id));
    if (!model || seenModels.has(model)) {
      continue;
    }
    seenModels.add(model);

    const defaultReasoningEffort = normalizeReasoningEffort(
      asString(entry.defaultReasoningEffort) ?? asString(entry.default_reasoning_effort)
    );
    const reasoningEffortOptions: ReasoningEffortOption[] = [];
    const seenEfforts = new Set<string>();
    for (const option of effortOptions(entry)) {
      if (seenEfforts.has(option.value)) {
        continue;
      }
      seenEfforts.add(option.value);
      reasoningEffortOptions.push(option);
    }
    if (defaultReasoningEffort && !seenEfforts.has(defaultReasoningEffort)) {
      reasoningEffortOptions.push({ value: defaultReasoningEffort });
    }

    const descriptor: ModelDescriptor = {
      model,
      displayName:
        nonEmpty(asString(entry.displayName)) ?? nonEmpty(asString(entry.name)) ?? model,
      reasoningEffortOptions,
      isDefault: asBool(entry.isDefault) ?? false,
    };
    if (defaultReasoningEffort) descriptor.defaultReasoningEffort = defaultReasoningEffort;
    models.push(descriptor);
  }
  return models;
}
