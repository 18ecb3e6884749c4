import type { JsonObject } from "@toolgate/shared";
import { errorMessage } from "../errors/errors.js";
import { raceAbort } from "../execution/abort.js";

export type ApprovalRequest = {
  toolName: string;
  arguments: JsonObject;
  description: string;
  conversationId: string;
  callId: string;
};

/** Returns true to let the call run. Anything else, including a throw, denies it. */
export type ApprovalHandler = (request: ApprovalRequest, signal: AbortSignal) => Promise<boolean> | boolean;

export type ApprovalPolicy = {
  tools?: Iterable<string>;
  /** Gate every tool regardless of `tools`. */
  allTools?: boolean;
  handler?: ApprovalHandler;
};

export type ApprovalDecision =
  | { approved: true }
  | { approved: false; reason: string; kind: "rejected" | "error"; error?: unknown };

export const NO_APPROVAL_HANDLER = "no approval handler configured";
export const REJECTED_BY_USER = "rejected by user";

export class ApprovalGate {
  private readonly tools: ReadonlySet<string>;
  private readonly allTools: boolean;
  private readonly handler?: ApprovalHandler;

  constructor(policy: ApprovalPolicy = {}) {
    this.tools = new Set(policy.tools ?? []);
    this.allTools = policy.allTools ?? false;
    this.handler = policy.handler;
  }

  requiresApproval(toolName: string): boolean {
    return this.allTools || this.tools.has(toolName);
  }

  get gatesAllTools(): boolean {
    return this.allTools;
  }

  get hasHandler(): boolean {
    return this.handler !== undefined;
  }

  /**
   * Asks the handler for a verdict. Missing handlers, thrown errors and
   * cancellation while waiting all come back as denials.
   */
  async evaluate(request: ApprovalRequest, signal: AbortSignal): Promise<ApprovalDecision> {
    const handler = this.handler;
    if (!handler) {
      return { approved: false, reason: NO_APPROVAL_HANDLER, kind: "error" };
    }
    if (signal.aborted) {
      return { approved: false, reason: errorMessage(signal.reason), kind: "error", error: signal.reason };
    }

    try {
      const verdict = await raceAbort(
        Promise.resolve().then(() => handler(request, signal)),
        signal,
      );
      if (verdict === true) return { approved: true };
      return { approved: false, reason: REJECTED_BY_USER, kind: "rejected" };
    } catch (err) {
      return { approved: false, reason: errorMessage(err), kind: "error", error: err };
    }
  }
}
