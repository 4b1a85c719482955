/**
 * Screen capture strategies, tried in priority order by the sampler.
 *
 * A strategy succeeds only when it produced bytes carrying the PNG signature.
 */

import { randomUUID } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import type { DeviceTransport } from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import { hasPngSignature } from "@droidprobe/vision";
import { REMOTE_SCREENSHOT_PATH } from "./constants.js";

export interface CaptureContext {
  readonly transport: DeviceTransport;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal | undefined;
  /** Host directory for intermediate files. */
  readonly scratchDir: string;
}

export type StrategyOutcome =
  | { readonly ok: true; readonly bytes: Buffer }
  | { readonly ok: false; readonly error: string };

export interface CaptureStrategy {
  readonly name: string;
  capture(context: CaptureContext): Promise<StrategyOutcome>;
}

function checkPng(bytes: Buffer): StrategyOutcome {
  if (!hasPngSignature(bytes)) {
    return { ok: false, error: `output is not a PNG (${bytes.length} bytes)` };
  }
  return { ok: true, bytes };
}

async function readHostFile(path: string): Promise<StrategyOutcome> {
  try {
    return checkPng(await readFile(path));
  } catch (error) {
    return { ok: false, error: `cannot read ${path}: ${getErrorMessage(error)}` };
  } finally {
    await rm(path, { force: true });
  }
}

/** `adb exec-out screencap -p`: PNG bytes on stdout. */
export const execOutScreencap: CaptureStrategy = {
  name: "exec-out-screencap",
  async capture({ transport, timeoutMs, signal }) {
    const result = await transport.execute(["exec-out", "screencap", "-p"], { timeoutMs, signal });
    if (!result.ok) return { ok: false, error: result.error ?? "screencap failed" };
    return checkPng(result.stdout);
  },
};

/** `screencap` to device storage, then `adb pull` to the host. */
export function shellScreencapPull(remotePath: string = REMOTE_SCREENSHOT_PATH): CaptureStrategy {
  return {
    name: "shell-screencap-pull",
    async capture({ transport, timeoutMs, signal, scratchDir }) {
      const shot = await transport.execute(["shell", "screencap", "-p", remotePath], {
        timeoutMs,
        signal,
      });
      if (!shot.ok) return { ok: false, error: shot.error ?? "screencap failed" };

      const local = join(scratchDir, `pull_${randomUUID()}.png`);
      const pulled = await transport.execute(["pull", remotePath, local], { timeoutMs, signal });
      if (!pulled.ok) {
        await rm(local, { force: true });
        return { ok: false, error: pulled.error ?? "pull failed" };
      }
      const outcome = await readHostFile(local);
      await transport.execute(["shell", "rm", "-f", remotePath], { timeoutMs, signal });
      return outcome;
    },
  };
}

/** Emulator console screenshot written straight to the host. */
export const emulatorConsole: CaptureStrategy = {
  name: "emulator-console",
  async capture({ transport, timeoutMs, signal, scratchDir }) {
    const local = join(scratchDir, `emu_${randomUUID()}.png`);
    const result = await transport.execute(["emu", "screenrecord", "screenshot", local], {
      timeoutMs,
      signal,
    });
    if (!result.ok) {
      await rm(local, { force: true });
      return { ok: false, error: result.error ?? "emulator screenshot failed" };
    }
    return readHostFile(local);
  },
};

export const DEFAULT_STRATEGIES: readonly CaptureStrategy[] = [
  execOutScreencap,
  shellScreencapPull(),
  emulatorConsole,
];
