import { join } from "node:path";
import { createTempDir } from "@droidprobe/test-utils";
import { describe, expect, it } from "vitest";
import { directoryExists, listFiles, rate } from "../files.js";

describe("rate", () => {
  it("should round to four decimals by default", () => {
    expect(rate(1, 3)).toBe(0.3333);
    expect(rate(2, 3)).toBe(0.6667);
  });

  it("should return 0 for an empty whole", () => {
    expect(rate(0, 0)).toBe(0);
  });
});

describe("listFiles", () => {
  it("should return an empty list for a missing directory", async () => {
    const tmp = await createTempDir();
    try {
      await expect(listFiles(join(tmp.path, "missing"), () => true)).resolves.toEqual([]);
      await expect(directoryExists(join(tmp.path, "missing"))).resolves.toBe(false);
      await expect(directoryExists(tmp.path)).resolves.toBe(true);
    } finally {
      await tmp.cleanup();
    }
  });
});
