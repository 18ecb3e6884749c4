import type { JsonObject } from "./values.js";

export const TOOL_EVENT_TYPES = [
  "TOOL_NOT_FOUND",
  "APPROVAL_REQUESTED",
  "APPROVAL_GRANTED",
  "APPROVAL_DENIED",
  "TOOL_STARTED",
  "TOOL_RETRYING",
  "TOOL_FAILED",
  "TOOL_SUCCEEDED",
] as const;

export type ToolEventType = (typeof TOOL_EVENT_TYPES)[number];

export type FailureCause = "error" | "timeout" | "cancelled" | "encoding";

export type ToolEventData = {
  TOOL_NOT_FOUND: { toolName: string; callId: string };
  APPROVAL_REQUESTED: {
    toolName: string;
    arguments: JsonObject;
    description: string;
    conversationId: string;
    callId: string;
  };
  APPROVAL_GRANTED: { toolName: string; callId: string };
  APPROVAL_DENIED: { toolName: string; callId: string; reason: string };
  TOOL_STARTED: { toolName: string; callId: string };
  TOOL_RETRYING: {
    toolName: string;
    callId: string;
    attempt: number;
    delayMs: number;
    error: string;
  };
  TOOL_FAILED: { toolName: string; callId: string; error: string; cause: FailureCause };
  TOOL_SUCCEEDED: { toolName: string; callId: string; result: unknown; durationMs: number };
};

export type ToolEventOf<T extends ToolEventType> = {
  readonly seq: number;
  readonly type: T;
  readonly data: Readonly<ToolEventData[T]>;
  readonly timestamp: string;
};

export type ToolEvent = { [T in ToolEventType]: ToolEventOf<T> }[ToolEventType];
