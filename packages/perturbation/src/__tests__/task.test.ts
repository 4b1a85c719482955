import type { EventKind } from "@droidprobe/core";
import { eventRecord } from "@droidprobe/test-utils";
import { describe, expect, it } from "vitest";
import { PerturbationTask } from "../task.js";
import type { ActionContext, PerturbationAction } from "../types.js";
import { steppedClock } from "./helpers.js";

type Behaviour = "succeed" | "fail" | "hang";

class ScriptedAction implements PerturbationAction {
  readonly name = "scripted";
  readonly triggers: ReadonlySet<EventKind> = new Set<EventKind>(["touch", "key"]);
  readonly runs: number[] = [];
  behaviour: Behaviour = "succeed";

  constructor(
    readonly minIntervalMs: number,
    readonly maxAttempts?: number,
  ) {}

  async run({ signal, attempt }: ActionContext): Promise<void> {
    this.runs.push(attempt);
    if (this.behaviour === "fail") throw new Error("device offline");
    if (this.behaviour === "hang") {
      await new Promise<void>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("killed")), { once: true });
      });
    }
  }
}

describe("PerturbationTask", () => {
  it("should run on trigger kinds only", async () => {
    const task = new PerturbationTask(new ScriptedAction(0));

    await expect(task.offer(eventRecord("scroll"))).resolves.toEqual({
      status: "skipped",
      reason: "not_a_trigger",
    });
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "ran" });
    expect(task.stats()).toEqual({ state: "running", attempts: 1, succeeded: 1, failed: 0 });
  });

  it("should rate-limit from the start of the previous attempt", async () => {
    const time = steppedClock();
    const task = new PerturbationTask(new ScriptedAction(5_000), { clock: time.clock });

    await task.offer(eventRecord("touch"));
    time.advance(4_999);
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "skipped", reason: "too_soon" });
    time.advance(1);
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "ran" });
  });

  it("should count failed attempts toward the cap", async () => {
    const action = new ScriptedAction(0, 2);
    action.behaviour = "fail";
    const task = new PerturbationTask(action);

    const first = await task.offer(eventRecord("key"));
    await task.offer(eventRecord("key"));
    const third = await task.offer(eventRecord("key"));

    expect(first).toMatchObject({ status: "failed", error: { message: "device offline" } });
    expect(third).toEqual({ status: "skipped", reason: "cap_reached" });
    expect(action.runs).toEqual([1, 2]);
    expect(task.stats()).toMatchObject({ attempts: 2, failed: 2 });
  });

  it("should refuse offers while a run is in flight", async () => {
    const action = new ScriptedAction(0);
    action.behaviour = "hang";
    const task = new PerturbationTask(action);

    const running = task.offer(eventRecord("touch"));
    expect(task.busy).toBe(true);
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "skipped", reason: "busy" });

    await task.stop();
    await expect(running).resolves.toEqual({ status: "aborted" });
  });

  it("should abort the in-flight run on pause and accept offers after resume", async () => {
    const action = new ScriptedAction(0);
    action.behaviour = "hang";
    const task = new PerturbationTask(action);

    const running = task.offer(eventRecord("touch"));
    await task.pause();

    await expect(running).resolves.toEqual({ status: "aborted" });
    expect(task.state).toBe("paused");
    expect(task.busy).toBe(false);
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "skipped", reason: "not_running" });

    action.behaviour = "succeed";
    task.resume();
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "ran" });
  });

  it("should stay stopped", async () => {
    const task = new PerturbationTask(new ScriptedAction(0));

    await task.stop();
    task.resume();
    await task.pause();

    expect(task.state).toBe("stopped");
    await expect(task.offer(eventRecord("touch"))).resolves.toEqual({ status: "skipped", reason: "not_running" });
  });
});
