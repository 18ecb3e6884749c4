import { Command } from "commander";
import fs from "node:fs";
import { generateCallId, isJsonObject } from "@toolgate/shared";
import type { ToolCall, ToolEvent } from "@toolgate/shared";
import {
  createDispatcher,
  createLogger,
  errorMessage,
  formatToolResult,
  loadConfig,
  outputForFormat,
  setConfigValue,
} from "@toolgate/core";
import type { ApprovalHandler, BatchResult, Logger, ToolRegistry, ToolgateConfig } from "@toolgate/core";
import { createDemoRegistry } from "../demo-tools.js";
import { createPromptApproval } from "../approval-prompt.js";
import { parseLogLevel } from "../preaction.js";

export type RunOptions = {
  parallel?: boolean;
  maxConcurrent?: string;
  timeout?: string;
  requireApproval?: string;
  approveAll?: boolean;
  deny?: boolean;
  interactive?: boolean;
  json?: boolean;
};

export type BatchFile = {
  conversationId?: string;
  calls: ToolCall[];
};

export type RunDeps = {
  config: ToolgateConfig;
  logger: Logger;
  registry?: ToolRegistry;
  print?: (line: string) => void;
  approvalHandler?: ApprovalHandler;
};

/** Accepts either a bare array of calls or `{ conversationId?, calls }`. */
export function parseBatch(raw: unknown): BatchFile {
  const root = Array.isArray(raw) ? { calls: raw } : raw;
  const entries = isJsonObject(root) ? root.calls : undefined;
  if (!isJsonObject(root) || !Array.isArray(entries)) {
    throw new Error("Invalid batch file: expected an array of calls or an object with a calls array");
  }
  const conversationId = optionalString(root.conversationId, "conversationId");

  const calls = entries.map((entry: unknown, index: number): ToolCall => {
    if (!isJsonObject(entry)) {
      throw new Error(`Invalid batch file: calls[${index}] must be an object`);
    }
    const name = entry.name;
    if (typeof name !== "string" || !name.trim()) {
      throw new Error(`Invalid batch file: calls[${index}].name must be a non-empty string`);
    }
    const id = optionalString(entry.id, `calls[${index}].id`) ?? generateCallId();
    const args = entry.arguments ?? {};
    if (!isJsonObject(args)) {
      throw new Error(`Invalid batch file: calls[${index}].arguments must be an object`);
    }
    return { id, name, arguments: args };
  });

  return { conversationId, calls };
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid batch file: ${label} must be a string`);
  }
  return value;
}

export function readBatchFile(filePath: string): BatchFile {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new Error(`Cannot read batch file at ${filePath}: ${errorMessage(err)}`);
  }
  return parseBatch(raw);
}

function parseIntegerOption(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${flag} must be an integer, got "${raw}"`);
  }
  return value;
}

/** Layers command-line flags over the loaded configuration. */
export function applyRunOptions(base: ToolgateConfig, opts: RunOptions): ToolgateConfig {
  let config = base;
  if (opts.parallel) {
    config = setConfigValue(config, "execution.parallel", true);
  }
  if (opts.maxConcurrent !== undefined) {
    config = setConfigValue(config, "execution.maxConcurrent", parseIntegerOption("--max-concurrent", opts.maxConcurrent));
  }
  if (opts.timeout !== undefined) {
    config = setConfigValue(config, "execution.toolTimeoutMs", parseIntegerOption("--timeout", opts.timeout));
  }
  if (opts.requireApproval !== undefined) {
    const tools = opts.requireApproval
      .split(",")
      .map((name) => name.trim())
      .filter(Boolean);
    config = setConfigValue(config, "approval.tools", tools);
  }
  return config;
}

export function resolveApprovalHandler(opts: RunOptions): ApprovalHandler | undefined {
  const chosen = [opts.approveAll, opts.deny, opts.interactive].filter(Boolean).length;
  if (chosen > 1) {
    throw new Error("Choose only one of --approve-all, --deny or --interactive");
  }
  if (opts.approveAll) return () => true;
  if (opts.deny) return () => false;
  if (opts.interactive) return createPromptApproval();
  return undefined;
}

export function formatEventLine(event: ToolEvent): string {
  const head = `#${event.seq} ${event.type} ${event.data.toolName} (${event.data.callId})`;
  switch (event.type) {
    case "APPROVAL_DENIED":
      return `${head} reason=${event.data.reason}`;
    case "TOOL_RETRYING":
      return `${head} attempt=${event.data.attempt} delay=${event.data.delayMs}ms error=${event.data.error}`;
    case "TOOL_FAILED":
      return `${head} cause=${event.data.cause} error=${event.data.error}`;
    case "TOOL_SUCCEEDED":
      return `${head} ${event.data.durationMs}ms`;
    default:
      return head;
  }
}

export async function executeBatch(batch: BatchFile, opts: RunOptions, deps: RunDeps): Promise<BatchResult> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const dispatcher = createDispatcher(deps.config, {
    registry: deps.registry ?? createDemoRegistry(),
    approvalHandler: deps.approvalHandler ?? resolveApprovalHandler(opts),
    logger: deps.logger,
  });

  const detach = dispatcher.events.onAll((event) => {
    print(opts.json ? formatToolResult(event) : formatEventLine(event));
  });

  try {
    const result = await dispatcher.executeWithOutcomes(batch.calls, { conversationId: batch.conversationId });
    if (opts.json) {
      print(JSON.stringify({ messages: result.messages }));
    } else {
      print("");
      for (const message of result.messages) {
        print(`${message.toolCallId} ${message.name}: ${message.content}`);
      }
    }
    return result;
  } finally {
    detach();
  }
}

export function runCommand(): Command {
  const cmd = new Command("run")
    .description("Execute a batch of tool calls against the demo tools")
    .argument("<batch>", "JSON file holding the calls")
    .option("--parallel", "Run calls concurrently", false)
    .option("--max-concurrent <n>", "Upper bound on concurrent calls")
    .option("--timeout <ms>", "Per-call timeout in milliseconds (0 disables)")
    .option("--require-approval <tools>", "Comma-separated tools that need approval")
    .option("--approve-all", "Approve every gated call", false)
    .option("--deny", "Deny every gated call", false)
    .option("--interactive", "Ask on the terminal for each gated call", false)
    .option("--json", "Print events and results as JSON lines", false);

  cmd.action(async (file: string, opts: RunOptions) => {
    const loaded = loadConfig(process.cwd());
    const level = parseLogLevel(cmd.optsWithGlobals().logLevel) ?? loaded.config.logging.level;
    const logger = createLogger("toolgate", level, outputForFormat(loaded.config.logging.format));
    if (loaded.errors.length > 0) {
      logger.warn("ignored invalid configuration", { errors: loaded.errors });
    }

    try {
      const config = applyRunOptions(loaded.config, opts);
      const result = await executeBatch(readBatchFile(file), opts, { config, logger });
      if (result.outcomes.some((outcome) => outcome.status !== "succeeded")) {
        process.exitCode = 1;
      }
    } catch (err) {
      console.error(errorMessage(err));
      process.exitCode = 1;
    }
  });

  return cmd;
}
