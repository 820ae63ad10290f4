import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type JsonPath = readonly string[];

/**
 * Wire values are matched in a fixed order: null, boolean, integer,
 * floating number, string, object, array. The first branch that accepts the
 * input wins, so `1` is read as an integer and never as a float.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().int(),
    z.number(),
    z.string(),
    z.record(z.string(), JsonValueSchema),
    z.array(JsonValueSchema),
  ])
);

// ============================================================================
// Accessors
// ============================================================================

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asObject(value: JsonValue | undefined): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asArray(value: JsonValue | undefined): JsonValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

/** Strings pass through; numbers and booleans are rendered as text. */
export function asString(value: JsonValue | undefined): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return undefined;
}

export function asInt(value: JsonValue | undefined): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return /^[-+]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
  }
  return undefined;
}

export function asNumber(value: JsonValue | undefined): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return undefined;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function asBool(value: JsonValue | undefined): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
  }
  return undefined;
}

// ============================================================================
// Key-path probing
// ============================================================================

export function valueAtPath(
  root: JsonValue | undefined,
  path: JsonPath
): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const key of path) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/** First non-empty trimmed string found along `paths`, in order. */
export function findString(
  root: JsonValue | undefined,
  paths: readonly JsonPath[]
): string | undefined {
  for (const path of paths) {
    const value = asString(valueAtPath(root, path))?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/** Like {@link findString} but keeps surrounding whitespace (stream deltas). */
export function findRawString(
  root: JsonValue | undefined,
  paths: readonly JsonPath[]
): string | undefined {
  for (const path of paths) {
    const value = asString(valueAtPath(root, path));
    if (value !== undefined && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

export function findInt(
  root: JsonValue | undefined,
  paths: readonly JsonPath[]
): number | undefined {
  for (const path of paths) {
    const value = asInt(valueAtPath(root, path));
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function findNumber(
  root: JsonValue | undefined,
  paths: readonly JsonPath[]
): number | undefined {
  for (const path of paths) {
    const value = asNumber(valueAtPath(root, path));
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export function findBool(
  root: JsonValue | undefined,
  paths: readonly JsonPath[]
): boolean | undefined {
  for (const path of paths) {
    const value = valueAtPath(root, path);
    if (typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number") {
      return value !== 0;
    }
    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (normalized === "true" || normalized === "1" || normalized === "yes") {
        return true;
      }
      if (normalized === "false" || normalized === "0" || normalized === "no") {
        return false;
      }
    }
  }
  return undefined;
}

export function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
