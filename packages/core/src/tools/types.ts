import type { JsonObject } from "@toolgate/shared";

export type ConcurrencyMode = "parallel" | "serial";

export type ToolContext = {
  /** Aborts on timeout or run cancellation; handlers are expected to honour it. */
  signal: AbortSignal;
  callId: string;
  conversationId: string;
  /** 1-based attempt number within the retry loop. */
  attempt: number;
};

export type ToolHandler = (args: JsonObject, ctx: ToolContext) => Promise<unknown> | unknown;

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly concurrency: ConcurrencyMode;
  readonly handler: ToolHandler;
}

export type ToolDefinitionInput = {
  name: string;
  description?: string;
  concurrency?: ConcurrencyMode;
  handler: ToolHandler;
};
