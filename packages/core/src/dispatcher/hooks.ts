import type { JsonObject } from "@toolgate/shared";
import { errorMessage } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import type { CallOutcome } from "./types.js";

export type ToolCallInfo = {
  callId: string;
  toolName: string;
  conversationId: string;
  arguments: JsonObject;
};

/** Observers around each executed call. Failures are logged and never reach the call. */
export type ToolLifecycleHooks = {
  onToolStart?: (info: ToolCallInfo) => void | Promise<void>;
  onToolComplete?: (info: ToolCallInfo, outcome: CallOutcome) => void | Promise<void>;
};

export async function runHook(
  logger: Logger,
  hook: keyof ToolLifecycleHooks,
  info: ToolCallInfo,
  invoke: () => void | Promise<void>,
): Promise<void> {
  try {
    await invoke();
  } catch (err) {
    logger.warn("lifecycle hook threw", {
      hook,
      toolName: info.toolName,
      callId: info.callId,
      error: errorMessage(err),
    });
  }
}
