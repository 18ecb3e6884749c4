import type { FailureCause, ResultMessage } from "@toolgate/shared";
import type { ApprovalGate, ApprovalPolicy } from "../approval/approval-gate.js";
import type { SafetyMode } from "../config/types.js";
import type { EventStream } from "../events/event-stream.js";
import type { RetryPolicy } from "../execution/retry.js";
import type { Logger } from "../logging/logger.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolLifecycleHooks } from "./hooks.js";

export type SucceededOutcome = {
  status: "succeeded";
  callId: string;
  toolName: string;
  result: unknown;
  attempts: number;
  durationMs: number;
};

export type FailedOutcome = {
  status: "failed";
  callId: string;
  toolName: string;
  cause: FailureCause;
  /** The typed error: ToolTimeoutError, ToolCancelledError, ArgumentEncodingError or the handler's own. */
  error: unknown;
  attempts: number;
  durationMs: number;
};

export type DeniedOutcome = {
  status: "denied";
  callId: string;
  toolName: string;
  reason: string;
  kind: "rejected" | "error";
};

export type NotFoundOutcome = {
  status: "not-found";
  callId: string;
  toolName: string;
};

export type CallOutcome = SucceededOutcome | FailedOutcome | DeniedOutcome | NotFoundOutcome;

export type CallResult = {
  message: ResultMessage;
  outcome: CallOutcome;
};

export type BatchResult = {
  messages: ResultMessage[];
  outcomes: CallOutcome[];
};

export type ParallelSettings = {
  enabled: boolean;
  maxConcurrent: number;
  safetyMode: SafetyMode;
};

export type DispatcherOptions = {
  registry: ToolRegistry;
  approval?: ApprovalGate | ApprovalPolicy;
  retry?: Partial<RetryPolicy>;
  /** Per-call bound on execution time, approval excluded. 0 or undefined disables it. */
  toolTimeoutMs?: number;
  parallel?: Partial<ParallelSettings>;
  events?: EventStream;
  hooks?: ToolLifecycleHooks;
  logger?: Logger;
};

export type DispatcherSettings = Readonly<{
  retry: Readonly<RetryPolicy>;
  toolTimeoutMs: number | undefined;
  parallel: Readonly<ParallelSettings>;
}>;

export type ExecuteOptions = {
  signal?: AbortSignal;
  conversationId?: string;
};
