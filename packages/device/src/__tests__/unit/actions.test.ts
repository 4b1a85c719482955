import { DeviceCommandError } from "@droidprobe/errors";
import { FakeTransport } from "@droidprobe/test-utils";
import { describe, expect, it } from "vitest";
import { DeviceActions } from "../../actions.js";

describe("DeviceActions", () => {
  it("should issue input and activity commands", async () => {
    const transport = new FakeTransport();
    const actions = new DeviceActions(transport);

    await actions.pressKey("KEYCODE_HOME");
    await actions.unlockSwipe();
    await actions.startActivity("com.example.notes", ".MainActivity");
    await actions.rotate("landscape");

    expect(transport.commands()).toEqual([
      "shell input keyevent KEYCODE_HOME",
      "shell input swipe 500 1500 500 500 300",
      "shell am start -n com.example.notes/.MainActivity",
      "emu rotate landscape",
    ]);
  });

  it("should pass the command timeout to the transport", async () => {
    const transport = new FakeTransport();
    await new DeviceActions(transport, { commandTimeoutMs: 1_234 }).pressKey("KEYCODE_POWER");
    expect(transport.calls[0]?.timeoutMs).toBe(1_234);
  });

  it("should throw DeviceCommandError when a required command fails", async () => {
    const transport = new FakeTransport().on("shell am start", {
      exitCode: 1,
      error: "Activity not found",
    });
    const actions = new DeviceActions(transport);

    await expect(actions.startActivity("com.example.notes", ".Missing")).rejects.toBeInstanceOf(
      DeviceCommandError,
    );
  });

  it("should return null activity when dumpsys fails", async () => {
    const transport = new FakeTransport().on("shell dumpsys", { exitCode: 1, error: "offline" });
    await expect(new DeviceActions(transport).foregroundActivity()).resolves.toBeNull();
  });

  it("should extract the hierarchy from a view dump", async () => {
    const transport = new FakeTransport().on("exec-out uiautomator dump", {
      stdout: "<?xml version='1.0'?><hierarchy rotation=\"0\"><node/></hierarchy>UI hierchary dumped to: /dev/tty",
    });
    await expect(new DeviceActions(transport).dumpViewTree()).resolves.toBe(
      "<?xml version='1.0'?><hierarchy rotation=\"0\"><node/></hierarchy>",
    );
  });

  it("should return null for a view dump without a hierarchy", async () => {
    const transport = new FakeTransport().on("exec-out uiautomator dump", { stdout: "ERROR: null root node" });
    await expect(new DeviceActions(transport).dumpViewTree()).resolves.toBeNull();
  });
});
