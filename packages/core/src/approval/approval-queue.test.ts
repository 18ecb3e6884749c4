import { describe, it, expect, beforeEach, vi } from "vitest";
import { ApprovalQueue } from "./approval-queue.js";
import type { PendingApproval } from "./approval-queue.js";
import { ApprovalGate } from "./approval-gate.js";
import type { ApprovalRequest } from "./approval-gate.js";
import { neverAborted } from "../execution/abort.js";

function request(overrides: Partial<ApprovalRequest> = {}): ApprovalRequest {
  return {
    toolName: "write_file",
    arguments: { path: "/tmp/a.txt" },
    description: "Write File(path)",
    conversationId: "conv-1",
    callId: "call_1",
    ...overrides,
  };
}

describe("ApprovalQueue", () => {
  let queue: ApprovalQueue;

  beforeEach(() => {
    queue = new ApprovalQueue();
  });

  it("parks a request until it is approved", async () => {
    const decision = queue.enqueue(request());

    const pending = queue.listPending();
    expect(pending.length).toBe(1);
    expect(pending[0]!.toolName).toBe("write_file");
    expect(pending[0]!.callId).toBe("call_1");

    expect(queue.resolve(pending[0]!.id, true, "reviewer")).toBe(true);
    await expect(decision).resolves.toBe(true);

    const stored = queue.get(pending[0]!.id);
    expect(stored?.status).toBe("approved");
    expect(stored?.resolvedBy).toBe("reviewer");
    expect(queue.listPending()).toEqual([]);
  });

  it("resolves false when rejected", async () => {
    const decision = queue.enqueue(request());
    queue.resolve(queue.listPending()[0]!.id, false);
    await expect(decision).resolves.toBe(false);
  });

  it("ignores unknown or already resolved ids", async () => {
    expect(queue.resolve("missing", true)).toBe(false);
    const decision = queue.enqueue(request());
    const id = queue.listPending()[0]!.id;
    queue.resolve(id, true);
    await decision;
    expect(queue.resolve(id, false)).toBe(false);
    expect(queue.get(id)?.status).toBe("approved");
  });

  it("expires requests after the timeout", async () => {
    const short = new ApprovalQueue({ timeoutMs: 10 });
    const decision = short.enqueue(request());
    const id = short.listPending()[0]!.id;
    await expect(decision).resolves.toBe(false);
    expect(short.get(id)?.status).toBe("expired");
  });

  it("cancels a pending request when the signal aborts", async () => {
    const controller = new AbortController();
    const decision = queue.enqueue(request(), controller.signal);
    const id = queue.listPending()[0]!.id;
    controller.abort();
    await expect(decision).resolves.toBe(false);
    expect(queue.get(id)?.status).toBe("cancelled");
  });

  it("records an already cancelled request without parking it", async () => {
    const controller = new AbortController();
    controller.abort();
    const onPending = vi.fn();
    queue.onPending(onPending);
    await expect(queue.enqueue(request(), controller.signal)).resolves.toBe(false);
    expect(queue.listPending()).toEqual([]);
    expect(onPending).not.toHaveBeenCalled();
  });

  it("notifies onPending listeners", async () => {
    const seen: PendingApproval[] = [];
    const notifying = new ApprovalQueue({ onPending: (a) => seen.push(a) });
    const decision = notifying.enqueue(request({ toolName: "exec" }));
    expect(seen.map((a) => a.toolName)).toEqual(["exec"]);
    notifying.resolve(seen[0]!.id, true);
    await decision;
  });

  it("keeps the request alive when onPending throws", async () => {
    queue.onPending(() => {
      throw new Error("listener broke");
    });
    const decision = queue.enqueue(request());
    queue.resolve(queue.listPending()[0]!.id, true);
    await expect(decision).resolves.toBe(true);
  });

  it("truncates long string arguments in the stored record", async () => {
    const decision = queue.enqueue(request({ arguments: { content: "x".repeat(600), mode: "w" } }));
    const pending = queue.listPending()[0]!;
    expect(pending.args.content).toBe("x".repeat(500) + "...");
    expect(pending.args.mode).toBe("w");
    queue.resolve(pending.id, false);
    await decision;
  });

  it("clears resolved approvals but keeps pending ones", async () => {
    const first = queue.enqueue(request({ callId: "call_1" }));
    const second = queue.enqueue(request({ callId: "call_2" }));
    const [a, b] = queue.listPending();
    queue.resolve(a!.id, true);
    await first;

    queue.clearResolved();
    expect(queue.get(a!.id)).toBeUndefined();
    expect(queue.listPending().map((p) => p.callId)).toEqual(["call_2"]);

    queue.resolve(b!.id, false);
    await second;
  });

  it("keeps only the most recent settled approvals", async () => {
    const bounded = new ApprovalQueue({ maxSettled: 2 });
    const ids: string[] = [];
    for (const callId of ["call_1", "call_2", "call_3"]) {
      const decision = bounded.enqueue(request({ callId }));
      const id = bounded.listPending()[0]!.id;
      ids.push(id);
      bounded.resolve(id, true);
      await decision;
    }
    const waiting = bounded.enqueue(request({ callId: "call_4" }));

    expect(bounded.get(ids[0]!)).toBeUndefined();
    expect(bounded.get(ids[1]!)?.status).toBe("approved");
    expect(bounded.get(ids[2]!)?.status).toBe("approved");
    expect(bounded.listPending().map((p) => p.callId)).toEqual(["call_4"]);

    bounded.resolve(bounded.listPending()[0]!.id, false);
    await waiting;
    expect(bounded.get(ids[1]!)).toBeUndefined();
  });

  it("serves as an approval gate's decision function", async () => {
    const gate = new ApprovalGate({ allTools: true, handler: queue.handler });
    const decision = gate.evaluate(request(), neverAborted());
    await vi.waitFor(() => expect(queue.listPending().length).toBe(1));
    queue.resolve(queue.listPending()[0]!.id, true);
    await expect(decision).resolves.toEqual({ approved: true });
  });
});
