import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, type TempDir, writePng } from "@droidprobe/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { analyzeHomeProbeLoss, saveHomeProbeLossReport } from "../home-probe-loss.js";
import { FORM, LAUNCHER, LIST } from "./fixtures.js";

describe("analyzeHomeProbeLoss", () => {
  let tmp: TempDir;
  let shots: string;

  beforeEach(async () => {
    tmp = await createTempDir("home-probe-test-");
    shots = join(tmp.path, "home_button_screenshots");
    await mkdir(shots);
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it("should pair before and after images in probe order", async () => {
    await writePng(join(shots, "before_1.png"), FORM);
    await writePng(join(shots, "after_1.png"), FORM);
    await writePng(join(shots, "before_2.png"), LAUNCHER);
    await writePng(join(shots, "after_2.png"), LIST);
    await writePng(join(shots, "before_3.png"), FORM);
    await writePng(join(shots, "before_10.png"), LIST);
    await writePng(join(shots, "after_10.png"), LIST);

    const report = await analyzeHomeProbeLoss(tmp.path);

    expect(report.actions.map((a) => [a.actionIndex, a.hashDifference, a.isPotentialDataLoss])).toEqual([
      [1, 0, false],
      [2, 64, true],
      [10, 0, false],
    ]);
    expect(report.statistics).toEqual({
      totalActionsAnalyzed: 3,
      potentialDataLoss: 1,
      dataLossRate: 0.3333,
    });
    expect(report.metadata.similarityThreshold).toBe(10);
  });

  it("should use the threshold as an exclusive bound", async () => {
    await writePng(join(shots, "before_1.png"), LAUNCHER);
    await writePng(join(shots, "after_1.png"), FORM);

    const atBound = await analyzeHomeProbeLoss(tmp.path, { similarityThreshold: 32 });
    const below = await analyzeHomeProbeLoss(tmp.path, { similarityThreshold: 31 });

    expect(atBound.statistics.potentialDataLoss).toBe(0);
    expect(below.statistics.potentialDataLoss).toBe(1);
  });

  it("should return an empty report without probes", async () => {
    const report = await analyzeHomeProbeLoss(join(tmp.path, "elsewhere"));
    expect(report.statistics).toEqual({ totalActionsAnalyzed: 0, potentialDataLoss: 0, dataLossRate: 0 });
  });

  it("should save home_button_data_loss.json", async () => {
    const report = await analyzeHomeProbeLoss(tmp.path);
    const path = await saveHomeProbeLossReport(report, tmp.path);
    expect(path).toBe(join(tmp.path, "home_button_data_loss.json"));
    expect(JSON.parse(await readFile(path, "utf-8"))).toMatchObject({ actions: [] });
  });
});
