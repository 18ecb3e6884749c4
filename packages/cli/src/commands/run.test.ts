import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, Logger, mergeConfig } from "@toolgate/core";
import type { ToolEvent } from "@toolgate/shared";
import {
  applyRunOptions,
  executeBatch,
  formatEventLine,
  parseBatch,
  readBatchFile,
  resolveApprovalHandler,
} from "./run.js";

const quiet = new Logger("test", "silent");
const fastConfig = mergeConfig(DEFAULT_CONFIG, { retry: { initialDelayMs: 1, maxDelayMs: 1 } });

describe("parseBatch", () => {
  it("accepts a bare array of calls", () => {
    const batch = parseBatch([{ id: "c1", name: "echo", arguments: { text: "hi" } }]);
    expect(batch).toEqual({ conversationId: undefined, calls: [{ id: "c1", name: "echo", arguments: { text: "hi" } }] });
  });

  it("accepts an object with a conversation id and fills in missing ids and arguments", () => {
    const batch = parseBatch({ conversationId: "conv-1", calls: [{ name: "echo" }] });
    expect(batch.conversationId).toBe("conv-1");
    expect(batch.calls[0]!.id).toMatch(/^call_[0-9a-f]{24}$/);
    expect(batch.calls[0]!.arguments).toEqual({});
  });

  it("rejects malformed input with the offending path", () => {
    expect(() => parseBatch("nope")).toThrow(
      "Invalid batch file: expected an array of calls or an object with a calls array",
    );
    expect(() => parseBatch([{ name: "" }])).toThrow("Invalid batch file: calls[0].name must be a non-empty string");
    expect(() => parseBatch([{ name: "echo" }, 3])).toThrow("Invalid batch file: calls[1] must be an object");
    expect(() => parseBatch([{ name: "echo", id: 7 }])).toThrow("Invalid batch file: calls[0].id must be a string");
    expect(() => parseBatch([{ name: "echo", arguments: [] }])).toThrow(
      "Invalid batch file: calls[0].arguments must be an object",
    );
    expect(() => parseBatch({ conversationId: 1, calls: [] })).toThrow(
      "Invalid batch file: conversationId must be a string",
    );
  });
});

describe("readBatchFile", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it("reads calls from a JSON file", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "toolgate-run-test-"));
    const file = path.join(tmpDir, "batch.json");
    fs.writeFileSync(file, JSON.stringify([{ id: "c1", name: "echo" }]));
    expect(readBatchFile(file).calls.map((c) => c.id)).toEqual(["c1"]);
  });

  it("reports unreadable files", () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "toolgate-run-test-"));
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, "{");
    expect(() => readBatchFile(file)).toThrow(`Cannot read batch file at ${file}:`);
  });
});

describe("applyRunOptions", () => {
  it("layers flags over the loaded configuration", () => {
    const config = applyRunOptions(DEFAULT_CONFIG, {
      parallel: true,
      maxConcurrent: "8",
      timeout: "250",
      requireApproval: "fail, sleep ,",
    });
    expect(config.execution).toMatchObject({ parallel: true, maxConcurrent: 8, toolTimeoutMs: 250 });
    expect(config.approval.tools).toEqual(["fail", "sleep"]);
    expect(DEFAULT_CONFIG.execution.parallel).toBe(false);
  });

  it("rejects values the configuration would not accept", () => {
    expect(() => applyRunOptions(DEFAULT_CONFIG, { maxConcurrent: "two" })).toThrow(
      '--max-concurrent must be an integer, got "two"',
    );
    expect(() => applyRunOptions(DEFAULT_CONFIG, { maxConcurrent: "0" })).toThrow(
      "Invalid value for execution.maxConcurrent: execution.maxConcurrent must be an integer >= 1",
    );
  });
});

describe("resolveApprovalHandler", () => {
  const signal = new AbortController().signal;
  const request = { toolName: "fail", arguments: {}, description: "", conversationId: "c", callId: "c1" };

  it("returns no handler by default so gated calls are denied", () => {
    expect(resolveApprovalHandler({})).toBeUndefined();
  });

  it("approves or denies everything on request", async () => {
    const approveAll = resolveApprovalHandler({ approveAll: true });
    const denyAll = resolveApprovalHandler({ deny: true });
    expect(await approveAll?.(request, signal)).toBe(true);
    expect(await denyAll?.(request, signal)).toBe(false);
  });

  it("refuses conflicting flags", () => {
    expect(() => resolveApprovalHandler({ approveAll: true, deny: true })).toThrow(
      "Choose only one of --approve-all, --deny or --interactive",
    );
  });
});

describe("formatEventLine", () => {
  it("adds the details each event type carries", () => {
    const failed: ToolEvent = {
      seq: 4,
      type: "TOOL_FAILED",
      data: { toolName: "fail", callId: "c2", error: "boom", cause: "error" },
      timestamp: "2026-01-01T00:00:00.000Z",
    };
    const started: ToolEvent = {
      seq: 1,
      type: "TOOL_STARTED",
      data: { toolName: "echo", callId: "c1" },
      timestamp: "2026-01-01T00:00:00.000Z",
    };
    expect(formatEventLine(failed)).toBe("#4 TOOL_FAILED fail (c2) cause=error error=boom");
    expect(formatEventLine(started)).toBe("#1 TOOL_STARTED echo (c1)");
  });
});

describe("executeBatch", () => {
  it("prints events as they happen and the messages in request order", async () => {
    const lines: string[] = [];
    const result = await executeBatch(
      {
        calls: [
          { id: "c1", name: "echo", arguments: { text: "hi" } },
          { id: "c2", name: "missing", arguments: {} },
        ],
      },
      {},
      { config: fastConfig, logger: quiet, print: (line) => lines.push(line) },
    );

    expect(result.outcomes.map((o) => o.status)).toEqual(["succeeded", "not-found"]);
    expect(lines[0]).toBe("#1 TOOL_STARTED echo (c1)");
    expect(lines[1]).toMatch(/^#2 TOOL_SUCCEEDED echo \(c1\) \d+ms$/);
    expect(lines.slice(2)).toEqual([
      "#3 TOOL_NOT_FOUND missing (c2)",
      "",
      "c1 echo: hi",
      "c2 missing: Error: Tool 'missing' not found",
    ]);
  });

  it("denies gated calls unless an approval flag is given", async () => {
    const config = applyRunOptions(fastConfig, { requireApproval: "echo" });
    const batch = { calls: [{ id: "c1", name: "echo", arguments: { text: "hi" } }] };

    const denied = await executeBatch(batch, {}, { config, logger: quiet, print: () => undefined });
    expect(denied.messages[0]!.content).toBe("Approval timeout or error: no approval handler configured");

    const approved = await executeBatch(batch, { approveAll: true }, { config, logger: quiet, print: () => undefined });
    expect(approved.messages[0]!.content).toBe("hi");
  });

  it("emits JSON lines in json mode", async () => {
    const lines: string[] = [];
    await executeBatch(
      { calls: [{ id: "c1", name: "fail", arguments: { message: "nope" } }] },
      { json: true },
      { config: mergeConfig(fastConfig, { retry: { maxAttempts: 1 } }), logger: quiet, print: (l) => lines.push(l) },
    );

    const parsed: unknown[] = lines.map((line) => JSON.parse(line));
    expect(parsed[1]).toMatchObject({ seq: 2, type: "TOOL_FAILED", data: { cause: "error", error: "nope" } });
    expect(parsed[2]).toEqual({
      messages: [{ role: "tool", content: "Error executing tool: nope", toolCallId: "c1", name: "fail" }],
    });
  });
});
