import { describe, it, expect } from "vitest";
import { nowISO, elapsedMs, sleep, clampTimerDelay, MAX_TIMER_DELAY_MS } from "./time.js";

describe("nowISO", () => {
  it("returns a valid ISO 8601 string", () => {
    const ts = nowISO();
    expect(new Date(ts).toISOString()).toBe(ts);
  });
});

describe("elapsedMs", () => {
  it("returns positive elapsed time", () => {
    const start = Date.now() - 100;
    const elapsed = elapsedMs(start);
    expect(elapsed).toBeGreaterThanOrEqual(100);
    expect(elapsed).toBeLessThan(200);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    const start = Date.now();
    await sleep(20);
    expect(Date.now() - start).toBeGreaterThanOrEqual(15);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("gone"));
    await expect(sleep(1000, controller.signal)).rejects.toThrow("gone");
  });

  it("rejects with the abort reason while waiting", async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    setTimeout(() => controller.abort(new Error("stop")), 10);
    const start = Date.now();
    await expect(pending).rejects.toThrow("stop");
    expect(Date.now() - start).toBeLessThan(500);
  });
});

describe("clampTimerDelay", () => {
  it("keeps delays inside the timer range", () => {
    expect(clampTimerDelay(-5)).toBe(0);
    expect(clampTimerDelay(250)).toBe(250);
    expect(clampTimerDelay(3_000_000_000)).toBe(MAX_TIMER_DELAY_MS);
  });
});

describe("sleep beyond the timer range", () => {
  it("keeps waiting instead of firing at once", async () => {
    const controller = new AbortController();
    let settled = false;
    const pending = sleep(3_000_000_000, controller.signal).then(
      () => (settled = true),
      () => undefined,
    );
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(settled).toBe(false);
    controller.abort(new Error("done"));
    await pending;
  });
});
