import { describe, it, expect, vi, beforeEach } from "vitest";
import { confirm } from "@clack/prompts";
import { createPromptApproval } from "./approval-prompt.js";
import type { ApprovalRequest } from "@toolgate/core";

vi.mock("@clack/prompts", () => ({
  confirm: vi.fn(),
  isCancel: (value: unknown) => typeof value === "symbol",
}));

const request: ApprovalRequest = {
  toolName: "fail",
  arguments: {},
  description: "Always throws `message`",
  conversationId: "default",
  callId: "c1",
};

describe("createPromptApproval", () => {
  beforeEach(() => {
    vi.mocked(confirm).mockReset();
  });

  it("asks with the tool name and description", async () => {
    vi.mocked(confirm).mockResolvedValueOnce(true);
    const approve = createPromptApproval();

    await expect(approve(request, new AbortController().signal)).resolves.toBe(true);
    expect(confirm).toHaveBeenCalledWith({ message: "Allow fail? Always throws `message`", initialValue: false });
  });

  it("denies when the user answers no", async () => {
    vi.mocked(confirm).mockResolvedValueOnce(false);
    await expect(createPromptApproval()(request, new AbortController().signal)).resolves.toBe(false);
  });

  it("denies when the prompt is cancelled", async () => {
    vi.mocked(confirm).mockResolvedValueOnce(Symbol("clack:cancel"));
    await expect(createPromptApproval()(request, new AbortController().signal)).resolves.toBe(false);
  });
});
