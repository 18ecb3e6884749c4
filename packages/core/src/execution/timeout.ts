import { clampTimerDelay } from "@toolgate/shared";
import { ToolCancelledError, ToolTimeoutError } from "../errors/errors.js";

export type CallScope = {
  readonly signal: AbortSignal;
  /** Clears the timer and detaches from the parent. Idempotent. */
  release(): void;
};

/**
 * Derives a per-call cancellation scope from the run signal. The scope aborts
 * with `ToolCancelledError` when the parent aborts and with `ToolTimeoutError`
 * once `timeoutMs` elapses, whichever comes first. A missing or zero timeout
 * leaves the scope bounded by the parent alone. Bounds past the timer range
 * are clamped to it.
 */
export function createCallScope(parent: AbortSignal, toolName: string, timeoutMs?: number): CallScope {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => {
    controller.abort(new ToolCancelledError(toolName, parent.reason));
  };

  const release = () => {
    if (timer) clearTimeout(timer);
    timer = undefined;
    parent.removeEventListener("abort", onParentAbort);
  };

  if (parent.aborted) {
    onParentAbort();
    return { signal: controller.signal, release };
  }

  parent.addEventListener("abort", onParentAbort, { once: true });
  if (timeoutMs !== undefined && timeoutMs > 0) {
    const bound = clampTimerDelay(timeoutMs);
    timer = setTimeout(() => {
      controller.abort(new ToolTimeoutError(toolName, bound));
    }, bound);
  }

  return { signal: controller.signal, release };
}

export async function withCallScope<T>(
  parent: AbortSignal,
  toolName: string,
  timeoutMs: number | undefined,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const scope = createCallScope(parent, toolName, timeoutMs);
  try {
    return await run(scope.signal);
  } finally {
    scope.release();
  }
}
