import { generateId, nowISO } from "@toolgate/shared";
import type { JsonObject, JsonValue } from "@toolgate/shared";
import { errorMessage } from "../errors/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { ApprovalHandler, ApprovalRequest } from "./approval-gate.js";

export type ApprovalStatus = "pending" | "approved" | "rejected" | "expired" | "cancelled";

export type PendingApproval = {
  id: string;
  callId: string;
  conversationId: string;
  toolName: string;
  args: JsonObject;
  description: string;
  createdAt: string;
  status: ApprovalStatus;
  resolvedAt?: string;
  resolvedBy?: string;
};

export type ApprovalQueueOptions = {
  /** How long a request may stay pending before it is rejected. */
  timeoutMs?: number;
  /** Settled records kept for `get`; the oldest are pruned past this count. */
  maxSettled?: number;
  onPending?: (approval: PendingApproval) => void;
  logger?: Logger;
};

export const DEFAULT_APPROVAL_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_SETTLED = 100;

const MAX_ARG_PREVIEW = 500;

type Resolver = (status: ApprovalStatus) => void;

/**
 * Parks approval requests until someone answers them. Use `handler` as the
 * gate's decision function and `resolve` from whatever surface the human uses.
 */
export class ApprovalQueue {
  private approvals = new Map<string, PendingApproval>();
  private resolvers = new Map<string, Resolver>();
  private readonly timeoutMs: number;
  private readonly maxSettled: number;
  private onPendingCallback?: (approval: PendingApproval) => void;
  private readonly logger: Logger;

  readonly handler: ApprovalHandler = (request, signal) => this.enqueue(request, signal);

  constructor(opts: ApprovalQueueOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_APPROVAL_TIMEOUT_MS;
    this.maxSettled = Math.max(0, opts.maxSettled ?? DEFAULT_MAX_SETTLED);
    this.onPendingCallback = opts.onPending;
    this.logger = opts.logger ?? silentLogger();
  }

  onPending(callback: (approval: PendingApproval) => void): void {
    this.onPendingCallback = callback;
  }

  enqueue(request: ApprovalRequest, signal?: AbortSignal): Promise<boolean> {
    const approval: PendingApproval = {
      id: generateId(),
      callId: request.callId,
      conversationId: request.conversationId,
      toolName: request.toolName,
      args: summarizeArgs(request.arguments),
      description: request.description,
      createdAt: nowISO(),
      status: "pending",
    };

    if (signal?.aborted) {
      this.approvals.set(approval.id, { ...approval, status: "cancelled", resolvedAt: nowISO() });
      this.pruneSettled();
      return Promise.resolve(false);
    }

    this.approvals.set(approval.id, approval);

    return new Promise<boolean>((resolve) => {
      const settle: Resolver = (status) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.resolvers.delete(approval.id);
        approval.status = status;
        approval.resolvedAt = nowISO();
        this.pruneSettled();
        resolve(status === "approved");
      };
      const onAbort = () => settle("cancelled");
      const timer = setTimeout(() => {
        this.logger.warn("approval expired", { id: approval.id, toolName: approval.toolName });
        settle("expired");
      }, this.timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.resolvers.set(approval.id, settle);
      this.notify(approval);
    });
  }

  resolve(approvalId: string, approved: boolean, resolvedBy?: string): boolean {
    const settle = this.resolvers.get(approvalId);
    const approval = this.approvals.get(approvalId);
    if (!settle || !approval) return false;
    if (resolvedBy) approval.resolvedBy = resolvedBy;
    settle(approved ? "approved" : "rejected");
    return true;
  }

  listPending(): PendingApproval[] {
    return [...this.approvals.values()].filter((a) => a.status === "pending");
  }

  get(id: string): PendingApproval | undefined {
    return this.approvals.get(id);
  }

  clearResolved(): void {
    for (const [id, approval] of this.approvals) {
      if (approval.status !== "pending") this.approvals.delete(id);
    }
  }

  private pruneSettled(): void {
    let excess = 0;
    for (const approval of this.approvals.values()) {
      if (approval.status !== "pending") excess++;
    }
    excess -= this.maxSettled;
    for (const [id, approval] of this.approvals) {
      if (excess <= 0) break;
      if (approval.status !== "pending") {
        this.approvals.delete(id);
        excess--;
      }
    }
  }

  private notify(approval: PendingApproval): void {
    try {
      this.onPendingCallback?.(approval);
    } catch (err) {
      this.logger.warn("onPending callback threw", {
        id: approval.id,
        error: errorMessage(err),
      });
    }
  }
}

function summarizeArgs(args: JsonObject): JsonObject {
  const summary: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === "string" && value.length > MAX_ARG_PREVIEW) {
      summary[key] = value.slice(0, MAX_ARG_PREVIEW) + "...";
    } else {
      summary[key] = value;
    }
  }
  return summary;
}
