/** Largest delay a Node timer honours; longer delays fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS);
}

export function nowISO(): string {
  return new Date().toISOString();
}

export function elapsedMs(startMs: number): number {
  return Date.now() - startMs;
}

/**
 * Resolves after `ms`, or rejects with the signal's reason as soon as the
 * signal aborts. The timer and the abort listener are always released.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(signal.reason);
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, clampTimerDelay(ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
