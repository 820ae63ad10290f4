import { describe, expect, it } from "vitest";
import {
  JsonValueSchema,
  asBool,
  asInt,
  asString,
  findBool,
  findInt,
  findRawString,
  findString,
  nonEmpty,
  valueAtPath,
  type JsonValue,
} from "./json-value.js";

describe("JsonValueSchema", () => {
  it("accepts nested wire values", () => {
    const value = { a: [1, 2.5, "x", null, true, { b: [] }] };
    expect(JsonValueSchema.parse(value)).toEqual(value);
  });

  it("rejects values JSON cannot carry", () => {
    expect(JsonValueSchema.safeParse(undefined).success).toBe(false);
    expect(JsonValueSchema.safeParse({ fn: () => 1 }).success).toBe(false);
  });
});

describe("accessors", () => {
  it("renders scalars as strings", () => {
    expect(asString("abc")).toBe("abc");
    expect(asString(42)).toBe("42");
    expect(asString(false)).toBe("false");
    expect(asString(null)).toBeUndefined();
    expect(asString({})).toBeUndefined();
  });

  it("reads integers from numbers and digit strings", () => {
    expect(asInt(7.9)).toBe(7);
    expect(asInt(" 12 ")).toBe(12);
    expect(asInt("-3")).toBe(-3);
    expect(asInt("1.5")).toBeUndefined();
    expect(asInt(true)).toBeUndefined();
  });

  it("reads booleans from literals and their string forms", () => {
    expect(asBool(true)).toBe(true);
    expect(asBool("FALSE")).toBe(false);
    expect(asBool("yes")).toBeUndefined();
  });
});

describe("key-path probing", () => {
  const root: JsonValue = {
    serverInfo: { version: " 0.102.0 " },
    blank: "   ",
    delta: "  spaced ",
    count: "41",
    flags: { on: "yes", off: 0 },
  };

  it("walks nested objects", () => {
    expect(valueAtPath(root, ["serverInfo", "version"])).toBe(" 0.102.0 ");
    expect(valueAtPath(root, ["serverInfo", "version", "deeper"])).toBeUndefined();
    expect(valueAtPath(root, ["missing"])).toBeUndefined();
  });

  it("returns the first non-empty trimmed string in path order", () => {
    expect(findString(root, [["blank"], ["serverInfo", "version"]])).toBe("0.102.0");
    expect(findString(root, [["blank"]])).toBeUndefined();
  });

  it("keeps whitespace for raw strings", () => {
    expect(findRawString(root, [["delta"]])).toBe("  spaced ");
    expect(findRawString(root, [["missing"], ["blank"]])).toBe("   ");
  });

  it("probes integers and booleans", () => {
    expect(findInt(root, [["missing"], ["count"]])).toBe(41);
    expect(findBool(root, [["flags", "on"]])).toBe(true);
    expect(findBool(root, [["flags", "off"]])).toBe(false);
  });

  it("treats blank strings as absent", () => {
    expect(nonEmpty("  x ")).toBe("x");
    expect(nonEmpty("   ")).toBeUndefined();
    expect(nonEmpty(null)).toBeUndefined();
  });
});
