import { decodePng } from "@droidprobe/vision";
import { describe, expect, it, vi } from "vitest";
import { createTestClock } from "../clock.js";
import { encodePng, screenWithBlock } from "../images.js";
import { FakeTransport, hangUntilAborted } from "../transport.js";

describe("FakeTransport", () => {
  it("should answer unmatched commands with an empty success", async () => {
    const transport = new FakeTransport();
    const result = await transport.execute(["shell", "echo"], { timeoutMs: 100 });
    expect(result.ok).toBe(true);
    expect(result.exitCode).toBe(0);
    expect(result.stdout.length).toBe(0);
    expect(transport.commands()).toEqual(["shell echo"]);
  });

  it("should match by prefix and honour times", async () => {
    const transport = new FakeTransport()
      .on("exec-out screencap", { exitCode: 1, stderr: "denied" }, 1)
      .on("exec-out screencap", { stdout: "png" });

    const first = await transport.execute(["exec-out", "screencap", "-p"], { timeoutMs: 100 });
    const second = await transport.execute(["exec-out", "screencap", "-p"], { timeoutMs: 100 });

    expect(first.ok).toBe(false);
    expect(first.stderr).toBe("denied");
    expect(second.stdout.toString()).toBe("png");
  });

  it("should settle hanging commands on abort", async () => {
    const transport = new FakeTransport().on("shell input", hangUntilAborted());
    const controller = new AbortController();
    const pending = transport.execute(["shell", "input", "keyevent", "KEYCODE_HOME"], {
      timeoutMs: 100,
      signal: controller.signal,
    });
    controller.abort();
    await expect(pending).resolves.toMatchObject({ ok: false, exitCode: null, error: "aborted" });
  });
});

describe("createTestClock", () => {
  it("should fire timers in due order when advanced", () => {
    const clock = createTestClock();
    const order: string[] = [];
    clock.setTimeout(() => order.push("late"), 200);
    clock.setTimeout(() => order.push("early"), 100);

    clock.advance(150);
    expect(order).toEqual(["early"]);
    expect(clock.now()).toBe(1_150);

    clock.advance(50);
    expect(order).toEqual(["early", "late"]);
  });

  it("should drop cleared timers", () => {
    const clock = createTestClock();
    const fn = vi.fn();
    const id = clock.setTimeout(fn, 10);
    clock.clearTimeout(id);
    expect(clock.runNext()).toBe(false);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe("image fixtures", () => {
  it("should encode decodable PNGs", () => {
    const image = screenWithBlock(10, 10, { left: 0, top: 0, right: 0.5, bottom: 0.5 });
    const decoded = decodePng(encodePng(image));
    expect(decoded.width).toBe(10);
    expect(decoded.data[0]).toBe(255);
    expect(decoded.data[(9 * 10 + 9) * 4]).toBe(0);
  });
});
