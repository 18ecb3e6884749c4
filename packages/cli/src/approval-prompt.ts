import { confirm, isCancel } from "@clack/prompts";
import type { ApprovalHandler } from "@toolgate/core";

/** Asks on the terminal before each gated call. Cancelling the prompt denies. */
export function createPromptApproval(): ApprovalHandler {
  return async (request) => {
    const answer = await confirm({
      message: `Allow ${request.toolName}? ${request.description}`,
      initialValue: false,
    });
    if (isCancel(answer)) return false;
    return answer;
  };
}
