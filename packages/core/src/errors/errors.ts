export class ToolTimeoutError extends Error {
  readonly toolName: string;
  readonly timeoutMs: number;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

export class ToolCancelledError extends Error {
  readonly toolName: string;

  constructor(toolName: string, reason?: unknown) {
    super(`Tool "${toolName}" was cancelled${reason instanceof Error ? `: ${reason.message}` : ""}`);
    this.name = "ToolCancelledError";
    this.toolName = toolName;
  }
}

export class ArgumentEncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentEncodingError";
  }
}

export class ToolAlreadyRegisteredError extends Error {
  constructor(name: string) {
    super(`Tool "${name}" already registered`);
    this.name = "ToolAlreadyRegisteredError";
  }
}

export class RegistryLockedError extends Error {
  constructor(operation: string, name: string) {
    super(`Cannot ${operation} tool "${name}" while a batch is in flight`);
    this.name = "RegistryLockedError";
  }
}

export function isCancellation(err: unknown): err is ToolTimeoutError | ToolCancelledError {
  return err instanceof ToolTimeoutError || err instanceof ToolCancelledError;
}

/** Message for any thrown value, including ones whose string conversion throws. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  try {
    return String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}
