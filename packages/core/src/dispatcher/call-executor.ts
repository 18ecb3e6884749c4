import { elapsedMs } from "@toolgate/shared";
import type { FailureCause, JsonObject, ResultMessage, ToolCall } from "@toolgate/shared";
import type { ApprovalGate, ApprovalRequest } from "../approval/approval-gate.js";
import { ToolCancelledError, ToolTimeoutError, errorMessage } from "../errors/errors.js";
import type { EventStream } from "../events/event-stream.js";
import { encodeArguments } from "../execution/arguments.js";
import { withRetry } from "../execution/retry.js";
import { withCallScope } from "../execution/timeout.js";
import { formatToolResult } from "../format/result-formatter.js";
import type { Logger } from "../logging/logger.js";
import { describeToolCall } from "../tools/define-tool.js";
import type { Tool } from "../tools/types.js";
import { runHook } from "./hooks.js";
import type { ToolCallInfo, ToolLifecycleHooks } from "./hooks.js";
import type { CallResult, DispatcherSettings } from "./types.js";

export type CallContext = {
  conversationId: string;
  signal: AbortSignal;
  settings: DispatcherSettings;
  approval: ApprovalGate;
  events: EventStream;
  hooks: ToolLifecycleHooks;
  logger: Logger;
};

export const REJECTED_MESSAGE = "Tool execution rejected by user";

export function notFoundMessage(name: string): string {
  return `Error: Tool '${name}' not found`;
}

export function toolMessage(call: ToolCall, content: string): ResultMessage {
  return { role: "tool", content, toolCallId: call.id, name: call.name };
}

export function failureCause(err: unknown): FailureCause {
  if (err instanceof ToolTimeoutError) return "timeout";
  if (err instanceof ToolCancelledError) return "cancelled";
  return "error";
}

/**
 * Runs one call through lookup, cancellation check, argument encoding,
 * approval and the timed retry loop. Every path ends in exactly one message
 * and one terminal event.
 */
export async function executeCall(call: ToolCall, tool: Tool | undefined, ctx: CallContext): Promise<CallResult> {
  const log = ctx.logger.with({ toolName: call.name, callId: call.id });

  if (!tool) {
    ctx.events.publish({ type: "TOOL_NOT_FOUND", data: { toolName: call.name, callId: call.id } });
    log.warn("tool not found");
    return {
      message: toolMessage(call, notFoundMessage(call.name)),
      outcome: { status: "not-found", callId: call.id, toolName: call.name },
    };
  }

  if (ctx.signal.aborted) {
    return failCall(call, ctx, log, new ToolCancelledError(call.name, ctx.signal.reason), 0, 0);
  }

  let args: JsonObject;
  try {
    args = encodeArguments(call.arguments);
  } catch (err) {
    return failCall(call, ctx, log, err, 0, 0, "encoding");
  }

  if (ctx.approval.requiresApproval(call.name)) {
    const denial = await requestApproval(call, tool, args, ctx, log);
    if (denial) return denial;
  }

  return runTool(call, tool, args, ctx, log);
}

async function requestApproval(
  call: ToolCall,
  tool: Tool,
  args: JsonObject,
  ctx: CallContext,
  log: Logger,
): Promise<CallResult | undefined> {
  const request: ApprovalRequest = {
    toolName: call.name,
    arguments: structuredClone(args),
    description: describeToolCall(tool, call.name, args),
    conversationId: ctx.conversationId,
    callId: call.id,
  };
  ctx.events.publish({ type: "APPROVAL_REQUESTED", data: { ...request } });
  log.debug("approval requested");

  const decision = await ctx.approval.evaluate(request, ctx.signal);
  if (decision.approved) {
    ctx.events.publish({ type: "APPROVAL_GRANTED", data: { toolName: call.name, callId: call.id } });
    log.info("approval granted");
    return undefined;
  }

  ctx.events.publish({
    type: "APPROVAL_DENIED",
    data: { toolName: call.name, callId: call.id, reason: decision.reason },
  });
  log.info("approval denied", { reason: decision.reason, kind: decision.kind });
  const content = decision.kind === "rejected" ? REJECTED_MESSAGE : `Approval timeout or error: ${decision.reason}`;
  return {
    message: toolMessage(call, content),
    outcome: {
      status: "denied",
      callId: call.id,
      toolName: call.name,
      reason: decision.reason,
      kind: decision.kind,
    },
  };
}

async function runTool(
  call: ToolCall,
  tool: Tool,
  args: JsonObject,
  ctx: CallContext,
  log: Logger,
): Promise<CallResult> {
  const { settings, events, hooks, conversationId } = ctx;
  const info: ToolCallInfo = { callId: call.id, toolName: call.name, conversationId, arguments: args };

  await runHook(log, "onToolStart", info, () => hooks.onToolStart?.(info));
  events.publish({ type: "TOOL_STARTED", data: { toolName: call.name, callId: call.id } });
  log.debug("tool started");

  const startedAt = Date.now();
  let attempts = 0;
  let result: CallResult;

  try {
    const value = await withCallScope(ctx.signal, call.name, settings.toolTimeoutMs, (signal) =>
      withRetry(
        signal,
        settings.retry,
        async (attempt) => {
          attempts = attempt;
          return tool.handler(structuredClone(args), { signal, callId: call.id, conversationId, attempt });
        },
        {
          onRetry: ({ attempt, delayMs, error }) => {
            const message = errorMessage(error);
            events.publish({
              type: "TOOL_RETRYING",
              data: { toolName: call.name, callId: call.id, attempt, delayMs, error: message },
            });
            log.warn("retrying tool", { attempt, delayMs, error: message });
          },
        },
      ),
    );

    const durationMs = elapsedMs(startedAt);
    events.publish({
      type: "TOOL_SUCCEEDED",
      data: { toolName: call.name, callId: call.id, result: value, durationMs },
    });
    log.debug("tool succeeded", { attempts, durationMs });
    result = {
      message: toolMessage(call, formatToolResult(value)),
      outcome: { status: "succeeded", callId: call.id, toolName: call.name, result: value, attempts, durationMs },
    };
  } catch (err) {
    result = failCall(call, ctx, log, err, attempts, elapsedMs(startedAt));
  }

  await runHook(log, "onToolComplete", info, () => hooks.onToolComplete?.(info, result.outcome));
  return result;
}

/** Publishes TOOL_FAILED and builds the failure message for `err`. */
export function failCall(
  call: ToolCall,
  ctx: Pick<CallContext, "events">,
  log: Logger,
  err: unknown,
  attempts: number,
  durationMs: number,
  cause: FailureCause = failureCause(err),
): CallResult {
  const message = errorMessage(err);
  ctx.events.publish({
    type: "TOOL_FAILED",
    data: { toolName: call.name, callId: call.id, error: message, cause },
  });
  log.error("tool failed", { cause, attempts, error: message });

  const content = cause === "encoding" ? `Error encoding arguments: ${message}` : `Error executing tool: ${message}`;
  return {
    message: toolMessage(call, content),
    outcome: {
      status: "failed",
      callId: call.id,
      toolName: call.name,
      cause,
      error: err,
      attempts,
      durationMs,
    },
  };
}
