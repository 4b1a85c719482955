import { describe, expect, it, vi } from "vitest";
import { type Clock, defaultClock, isAbortError, sleep } from "../../clock.js";

describe("defaultClock", () => {
  it("should report wall-clock time", () => {
    const before = Date.now();
    const now = defaultClock.now();
    expect(now).toBeGreaterThanOrEqual(before);
  });

  it("should schedule and cancel timers", async () => {
    const fn = vi.fn();
    const id = defaultClock.setTimeout(fn, 5);
    defaultClock.clearTimeout(id);
    await new Promise((resolve) => globalThis.setTimeout(resolve, 20));
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  it("should resolve through the given clock", async () => {
    const timers: Array<{ fn: () => void; ms: number }> = [];
    const clock: Clock = {
      now: () => 0,
      setTimeout: (fn, ms) => {
        timers.push({ fn, ms });
        return timers.length;
      },
      clearTimeout: () => {},
    };

    const done = sleep(250, clock);
    expect(timers).toHaveLength(1);
    expect(timers[0]?.ms).toBe(250);
    timers[0]?.fn();
    await expect(done).resolves.toBeUndefined();
  });

  it("should reject immediately when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const error = await sleep(1_000, defaultClock, controller.signal).catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
  });

  it("should reject and clear the timer when aborted mid-wait", async () => {
    const cleared: unknown[] = [];
    const clock: Clock = {
      now: () => 0,
      setTimeout: () => 7,
      clearTimeout: (id) => {
        cleared.push(id);
      },
    };
    const controller = new AbortController();
    const pending = sleep(1_000, clock, controller.signal);
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(isAbortError(error)).toBe(true);
    expect(cleared).toEqual([7]);
  });
});

describe("isAbortError", () => {
  it("should reject ordinary errors", () => {
    expect(isAbortError(new Error("boom"))).toBe(false);
    expect(isAbortError("AbortError")).toBe(false);
  });
});
