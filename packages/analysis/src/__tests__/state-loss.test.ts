import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { NotFoundError } from "@droidprobe/errors";
import { createTempDir, type TempDir, writeEventFile, writePng } from "@droidprobe/test-utils";
import type { RgbaImage } from "@droidprobe/vision";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { analyzeStateLoss, saveStateLossReport } from "../state-loss.js";
import { FORM, LAUNCHER } from "./fixtures.js";

const NOTE_FIELD = { resource_id: "note", class: "android.widget.EditText" };
const CONFIRM_DIALOG = { resource_id: "confirm", class: "android.app.AlertDialog" };

describe("analyzeStateLoss", () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await createTempDir("state-loss-test-");
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  async function writeSession(): Promise<void> {
    const states = join(tmp.path, "states");
    const events = join(tmp.path, "events");
    await mkdir(states);
    await mkdir(events);

    const screens: RgbaImage[] = [LAUNCHER, LAUNCHER, FORM, FORM, FORM, FORM];
    for (const [i, image] of screens.entries()) {
      await writePng(join(states, `screen_2024-01-01_00000${i}.png`), image);
    }
    await writeEventFile(events, "event_0.json", "touch");
    await writeEventFile(events, "event_1.json", "touch", { ...NOTE_FIELD, text: "draft" });
    await writeEventFile(events, "event_2.json", "set_text", { ...NOTE_FIELD, text: "" });
    await writeEventFile(events, "event_3.json", "touch", { ...CONFIRM_DIALOG, visible: true });
    await writeEventFile(events, "event_4.json", "key", { ...CONFIRM_DIALOG, visible: false });
  }

  it("should report hash jumps, cleared text and vanished dialogs", async () => {
    await writeSession();

    const report = await analyzeStateLoss(tmp.path);

    expect(report.statistics).toEqual({
      totalEventStatePairs: 5,
      stateTransitionsAnalyzed: 4,
      stateHashMismatches: 1,
    });
    expect(report.issues.stateHashMismatches).toEqual([
      {
        event: "touch",
        previousState: "screen_2024-01-01_000001.png",
        currentState: "screen_2024-01-01_000002.png",
        hashDifference: 32,
        timestamp: "2024-01-01_000002",
      },
    ]);
    expect(report.issues.edittextValueChanges).toEqual([
      { view: "note", previousText: "draft", currentText: "", timestamp: "2024-01-01_000003" },
    ]);
    expect(report.issues.disappearedDialogs).toEqual([
      { view: "confirm", event: "key", timestamp: "2024-01-01_000005" },
    ]);
  });

  it("should honour a looser hash threshold", async () => {
    await writeSession();
    const report = await analyzeStateLoss(tmp.path, { hashThreshold: 32 });
    expect(report.issues.stateHashMismatches).toEqual([]);
  });

  it("should throw NotFoundError when driver directories are missing", async () => {
    const error = await analyzeStateLoss(tmp.path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ code: "ANALYSIS_DIRECTORY_NOT_FOUND" });
  });

  it("should save state_loss_analysis.json", async () => {
    await writeSession();
    const report = await analyzeStateLoss(tmp.path);
    const path = await saveStateLossReport(report, tmp.path);
    expect(JSON.parse(await readFile(path, "utf-8"))).toMatchObject({
      statistics: { totalEventStatePairs: 5 },
    });
  });
});
