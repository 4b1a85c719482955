/**
 * Manually advanced clock. Timers fire only from `advance()` or `runNext()`.
 */

import type { Clock, TimerHandle } from "@droidprobe/core";

export interface ScheduledTimer {
  readonly fn: () => void;
  readonly dueAt: number;
  readonly ms: number;
  readonly id: number;
}

export interface TestClock extends Clock {
  readonly pending: ScheduledTimer[];
  readonly currentTime: number;
  /** Move time forward and fire every timer that has come due, in order. */
  advance(ms: number): void;
  /** Fire the earliest pending timer, moving time to its due point. */
  runNext(): boolean;
}

export function createTestClock(start = 1_000): TestClock {
  let time = start;
  let nextId = 1;
  const pending: ScheduledTimer[] = [];

  const take = (timer: ScheduledTimer): void => {
    const idx = pending.indexOf(timer);
    if (idx !== -1) pending.splice(idx, 1);
  };

  const earliest = (): ScheduledTimer | undefined =>
    pending.reduce<ScheduledTimer | undefined>(
      (best, t) => (best === undefined || t.dueAt < best.dueAt ? t : best),
      undefined,
    );

  return {
    get currentTime() {
      return time;
    },
    pending,
    now: () => time,
    setTimeout: (fn: () => void, ms: number): TimerHandle => {
      const id = nextId++;
      pending.push({ fn, ms, dueAt: time + ms, id });
      return id;
    },
    clearTimeout: (id: TimerHandle) => {
      const idx = pending.findIndex((t) => t.id === id);
      if (idx !== -1) pending.splice(idx, 1);
    },
    advance: (ms: number) => {
      const target = time + ms;
      for (;;) {
        const next = earliest();
        if (next === undefined || next.dueAt > target) break;
        take(next);
        time = Math.max(time, next.dueAt);
        next.fn();
      }
      time = target;
    },
    runNext: () => {
      const next = earliest();
      if (next === undefined) return false;
      take(next);
      time = Math.max(time, next.dueAt);
      next.fn();
      return true;
    },
  };
}
