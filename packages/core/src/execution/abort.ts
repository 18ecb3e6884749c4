/**
 * Settles with `work`, or rejects with `signal.reason` as soon as the signal
 * aborts. An abandoned `work` promise keeps running; its outcome is observed
 * so a late rejection is never reported as unhandled.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    work.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/** A signal that never aborts, for callers that pass none. */
export function neverAborted(): AbortSignal {
  return new AbortController().signal;
}
