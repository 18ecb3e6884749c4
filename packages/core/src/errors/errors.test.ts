import { describe, it, expect } from "vitest";
import {
  ToolTimeoutError,
  ToolCancelledError,
  RegistryLockedError,
  errorMessage,
  isCancellation,
} from "./errors.js";

describe("errors", () => {
  it("timeout error carries the bound", () => {
    const err = new ToolTimeoutError("fetch", 50);
    expect(err.message).toBe('Tool "fetch" timed out after 50ms');
    expect(err.timeoutMs).toBe(50);
    expect(err.name).toBe("ToolTimeoutError");
  });

  it("cancelled error includes the upstream reason", () => {
    expect(new ToolCancelledError("fetch", new Error("user hit ctrl-c")).message).toBe(
      'Tool "fetch" was cancelled: user hit ctrl-c',
    );
    expect(new ToolCancelledError("fetch").message).toBe('Tool "fetch" was cancelled');
  });

  it("classifies cancellations", () => {
    expect(isCancellation(new ToolTimeoutError("a", 1))).toBe(true);
    expect(isCancellation(new ToolCancelledError("a"))).toBe(true);
    expect(isCancellation(new Error("boom"))).toBe(false);
  });

  it("registry locked error names the operation", () => {
    expect(new RegistryLockedError("register", "echo").message).toBe(
      'Cannot register tool "echo" while a batch is in flight',
    );
  });

  it("errorMessage handles non-errors", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });

  it("errorMessage survives values that cannot be converted to a string", () => {
    expect(errorMessage(Object.create(null))).toBe("[object Object]");
  });
});
