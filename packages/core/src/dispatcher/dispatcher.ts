import { clampTimerDelay } from "@toolgate/shared";
import type { ResultMessage, ToolCall } from "@toolgate/shared";
import { ApprovalGate } from "../approval/approval-gate.js";
import { errorMessage } from "../errors/errors.js";
import { EventStream } from "../events/event-stream.js";
import { neverAborted } from "../execution/abort.js";
import { DEFAULT_RETRY_POLICY } from "../execution/retry.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { Tool } from "../tools/types.js";
import { executeCall, failCall } from "./call-executor.js";
import type { CallContext } from "./call-executor.js";
import type { ToolLifecycleHooks } from "./hooks.js";
import { Semaphore } from "./semaphore.js";
import type { BatchResult, CallResult, DispatcherOptions, DispatcherSettings, ExecuteOptions } from "./types.js";

export const DEFAULT_CONVERSATION_ID = "default";

/**
 * Turns the tool calls of one model turn into one result message per call, in
 * request order, publishing lifecycle events to a single shared stream.
 */
export class ToolDispatcher {
  readonly settings: DispatcherSettings;
  readonly events: EventStream;
  readonly approval: ApprovalGate;
  private readonly registry: ToolRegistry;
  private readonly hooks: ToolLifecycleHooks;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? silentLogger();
    this.events = options.events ?? new EventStream({ logger: this.logger });
    this.approval =
      options.approval instanceof ApprovalGate ? options.approval : new ApprovalGate(options.approval ?? {});
    this.hooks = { ...options.hooks };
    this.settings = freezeSettings(options);
  }

  /** True when batches fan out; pessimistic mode or a concurrency of one keeps them sequential. */
  get runsInParallel(): boolean {
    const { enabled, maxConcurrent, safetyMode } = this.settings.parallel;
    return enabled && maxConcurrent > 1 && safetyMode !== "pessimistic";
  }

  async execute(calls: readonly ToolCall[], opts: ExecuteOptions = {}): Promise<ResultMessage[]> {
    const { messages } = await this.executeWithOutcomes(calls, opts);
    return messages;
  }

  async executeWithOutcomes(calls: readonly ToolCall[], opts: ExecuteOptions = {}): Promise<BatchResult> {
    if (calls.length === 0) return { messages: [], outcomes: [] };

    const release = this.registry.beginBatch();
    const ctx: CallContext = {
      conversationId: opts.conversationId ?? DEFAULT_CONVERSATION_ID,
      signal: opts.signal ?? neverAborted(),
      settings: this.settings,
      approval: this.approval,
      events: this.events,
      hooks: this.hooks,
      logger: this.logger,
    };
    const parallel = this.runsInParallel;
    this.logger.debug("batch started", { calls: calls.length, parallel });

    try {
      const results = parallel ? await this.runParallel(calls, ctx) : await this.runSequential(calls, ctx);
      return {
        messages: results.map((r) => r.message),
        outcomes: results.map((r) => r.outcome),
      };
    } finally {
      release();
    }
  }

  private async runSequential(calls: readonly ToolCall[], ctx: CallContext): Promise<CallResult[]> {
    const results: CallResult[] = [];
    for (const call of calls) {
      results.push(await this.runGuarded(call, ctx, this.registry.lookup(call.name)));
    }
    return results;
  }

  /**
   * Admits calls in request order through the semaphore. A serial tool waits
   * for everything in flight, runs alone, and only then lets admission resume.
   */
  private async runParallel(calls: readonly ToolCall[], ctx: CallContext): Promise<CallResult[]> {
    const semaphore = new Semaphore(this.settings.parallel.maxConcurrent);
    const slots = new Array<CallResult | undefined>(calls.length);
    const inFlight = new Set<Promise<void>>();

    for (const [index, call] of calls.entries()) {
      const tool = this.registry.lookup(call.name);

      if (tool?.concurrency === "serial") {
        await Promise.all(inFlight);
        slots[index] = await this.runGuarded(call, ctx, tool);
        continue;
      }

      await semaphore.acquire();
      const task: Promise<void> = this.runGuarded(call, ctx, tool)
        .then((result) => {
          slots[index] = result;
        })
        .finally(() => {
          semaphore.release();
          inFlight.delete(task);
        });
      inFlight.add(task);
    }

    await Promise.all(inFlight);

    // runGuarded never rejects, so every slot is filled; the fallback still answers every call.
    return calls.map(
      (call, index) => slots[index] ?? failCall(call, ctx, this.logger, new Error("call produced no result"), 0, 0),
    );
  }

  /** Any throw escaping the per-call pipeline becomes a failure for that call alone. */
  private async runGuarded(call: ToolCall, ctx: CallContext, tool: Tool | undefined): Promise<CallResult> {
    try {
      return await executeCall(call, tool, ctx);
    } catch (err) {
      this.logger.error("unexpected error while dispatching call", {
        toolName: call.name,
        callId: call.id,
        error: errorMessage(err),
      });
      return failCall(call, ctx, this.logger, err, 0, 0, "error");
    }
  }
}

function freezeSettings(options: DispatcherOptions): DispatcherSettings {
  const timeout = options.toolTimeoutMs;
  const retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  return Object.freeze({
    retry: Object.freeze({
      ...retry,
      initialDelayMs: clampTimerDelay(retry.initialDelayMs),
      maxDelayMs: clampTimerDelay(retry.maxDelayMs),
    }),
    toolTimeoutMs: timeout !== undefined && timeout > 0 ? clampTimerDelay(timeout) : undefined,
    parallel: Object.freeze({
      enabled: options.parallel?.enabled ?? false,
      maxConcurrent: Math.max(1, Math.floor(options.parallel?.maxConcurrent ?? 1)),
      safetyMode: options.parallel?.safetyMode ?? "optimistic",
    }),
  });
}
