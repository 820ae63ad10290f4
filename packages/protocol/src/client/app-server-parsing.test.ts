import { describe, expect, it } from "vitest";
import {
  buildUserInputResult,
  completionSnippet,
  isVersionAtLeast,
  parseContextUsage,
  parsePendingServerRequest,
  pendingRequestTitle,
  probeInitializeMetadata,
  turnStatusFromNotification,
} from "./app-server-parsing.js";

describe("probeInitializeMetadata", () => {
  it("reads the first matching path for each field", () => {
    expect(
      probeInitializeMetadata({
        serverInfo: { name: "app-server", version: "0.102.0" },
        auth: { status: "chatgpt" },
        defaults: { model: "gpt-5" },
      })
    ).toEqual({ cliVersion: "0.102.0", authStatus: "chatgpt", currentModel: "gpt-5" });
  });

  it("omits fields it cannot find", () => {
    expect(probeInitializeMetadata({ userAgent: "x" })).toEqual({});
    expect(probeInitializeMetadata(null)).toEqual({});
  });

  it("follows custom probe paths", () => {
    expect(
      probeInitializeMetadata(
        { meta: { cli: "1.2.3" } },
        { cliVersion: [["meta", "cli"]], authStatus: [], currentModel: [] }
      )
    ).toEqual({ cliVersion: "1.2.3" });
  });
});

describe("isVersionAtLeast", () => {
  it("compares numeric components", () => {
    expect(isVersionAtLeast("0.101.0", "0.101.0")).toBe(true);
    expect(isVersionAtLeast("0.100.9", "0.101.0")).toBe(false);
    expect(isVersionAtLeast("0.101", "0.101.0")).toBe(true);
    expect(isVersionAtLeast("1.0.0", "0.101.0")).toBe(true);
    expect(isVersionAtLeast("v0.102.0-beta.1", "0.101.0")).toBe(true);
  });
});

describe("parsePendingServerRequest", () => {
  it("parses command approvals", () => {
    const request = parsePendingServerRequest(7, "item/commandExecution/requestApproval", {
      threadId: "t1",
      turnId: "u1",
      itemId: "i1",
      command: "ls -la",
      cwd: "/repo",
      reason: "needs listing",
    });
    expect(request).toMatchObject({
      rpcId: 7,
      method: "item/commandExecution/requestApproval",
      threadId: "t1",
      turnId: "u1",
      itemId: "i1",
      kind: { type: "command_approval", command: "ls -la", cwd: "/repo", reason: "needs listing" },
    });
    expect(request.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(pendingRequestTitle(request)).toBe("Command Approval");
  });

  it("gives every request its own local id", () => {
    const first = parsePendingServerRequest("a", "item/fileChange/requestApproval", {});
    const second = parsePendingServerRequest("a", "item/fileChange/requestApproval", {});
    expect(first.id).not.toBe(second.id);
    expect(first.kind).toEqual({ type: "file_change_approval" });
  });

  it("parses user input questions and skips ones without ids", () => {
    const request = parsePendingServerRequest(3, "item/tool/requestUserInput", {
      threadId: "t1",
      questions: [
        {
          id: "q1",
          question: "Pick a branch",
          options: [{ label: "main", description: "default" }, { label: "dev" }, { nope: 1 }],
        },
        { question: "no id" },
        { id: "q2", header: "Confirm" },
      ],
    });
    expect(request.kind).toEqual({
      type: "user_input",
      questions: [
        {
          id: "q1",
          prompt: "Pick a branch",
          options: [
            { label: "main", description: "default" },
            { label: "dev", description: "" },
          ],
        },
        { id: "q2", prompt: "Confirm", options: [] },
      ],
    });
    expect(pendingRequestTitle(request)).toBe("User Input Required");
  });

  it("keeps unknown methods with empty identifiers", () => {
    const request = parsePendingServerRequest(9, "custom/thing", undefined);
    expect(request).toMatchObject({
      method: "custom/thing",
      threadId: "",
      turnId: "",
      itemId: "",
      kind: { type: "unknown" },
    });
    expect(pendingRequestTitle(request)).toBe("Server Request");
  });
});

describe("buildUserInputResult", () => {
  it("wraps each answer list", () => {
    expect(buildUserInputResult({ q1: ["main"], q2: [] })).toEqual({
      answers: { q1: { answers: ["main"] }, q2: { answers: [] } },
    });
  });
});

describe("parseContextUsage", () => {
  const now = new Date("2026-01-02T03:04:05Z");

  it("reads a nested tokenUsage object", () => {
    expect(
      parseContextUsage(
        { threadId: "t1", tokenUsage: { inputTokens: 1200, maxInputTokens: 8000 } },
        now
      )
    ).toEqual({ usedTokens: 1200, maxTokens: 8000, updatedAt: now });
  });

  it("falls back to the params object and numeric strings", () => {
    expect(parseContextUsage({ usage: { used: "50", limit: 100, remaining: 50 } }, now)).toEqual({
      usedTokens: 50,
      maxTokens: 100,
      remainingTokens: 50,
      updatedAt: now,
    });
  });
});

describe("completionSnippet", () => {
  it("returns the trimmed text added since the snapshot", () => {
    expect(completionSnippet("Hello", "Hello world \n")).toBe("world");
  });

  it("caps long snippets", () => {
    expect(completionSnippet("", "x".repeat(250))).toBe(`${"x".repeat(200)}…`);
  });

  it("uses the whole transcript when it was replaced", () => {
    expect(completionSnippet("old text", "new")).toBe("new");
  });
});

describe("turnStatusFromNotification", () => {
  it("prefers the payload status", () => {
    expect(turnStatusFromNotification("turn/completed", { turn: { status: "interrupted" } })).toBe(
      "interrupted"
    );
  });

  it("derives the status from the method", () => {
    expect(turnStatusFromNotification("turn/failed", {})).toBe("failed");
    expect(turnStatusFromNotification("turn/cancelled", { status: "  " })).toBe("cancelled");
  });
});
