/**
 * EventStreamReader: incremental reader over the driver's `events/`
 * directory.
 *
 * Each file is returned at most once per reader. Files that fail to parse
 * are still marked seen and never retried. Components that need their own
 * view of the stream each construct a reader.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import {
  type Clock,
  defaultClock,
  type EventRecord,
  type Logger,
  silentLogger,
  sleep,
} from "@droidprobe/core";
import { getErrorMessage } from "@droidprobe/errors";
import { parseEventFile } from "./parse.js";

const DEFAULT_DIRECTORY_POLL_MS = 1_000;

export interface EventStreamReaderOptions {
  readonly directory: string;
  readonly logger?: Logger;
  readonly clock?: Clock;
  /** Interval between existence checks in {@link EventStreamReader.waitForDirectory}. */
  readonly directoryPollMs?: number;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class EventStreamReader {
  readonly directory: string;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly directoryPollMs: number;
  private readonly seen = new Set<string>();
  private missingReported = false;

  constructor(options: EventStreamReaderOptions) {
    this.directory = options.directory;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? defaultClock;
    this.directoryPollMs = options.directoryPollMs ?? DEFAULT_DIRECTORY_POLL_MS;
  }

  get seenCount(): number {
    return this.seen.size;
  }

  /**
   * Events whose files appeared since the previous poll, in filename order.
   */
  async poll(): Promise<EventRecord[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (!isMissing(error)) throw error;
      if (!this.missingReported) {
        this.missingReported = true;
        this.logger.warn(`events directory ${this.directory} does not exist yet`);
      }
      return [];
    }

    const fresh = names.filter((name) => name.endsWith(".json") && !this.seen.has(name)).sort();
    const events: EventRecord[] = [];
    for (const name of fresh) {
      this.seen.add(name);
      try {
        const text = await readFile(join(this.directory, name), "utf-8");
        events.push(parseEventFile(text, name));
      } catch (error) {
        this.logger.warn(`skipping event file ${name}: ${getErrorMessage(error)}`);
      }
    }
    return events;
  }

  /**
   * Resolve true once the directory exists, false after `timeoutMs`.
   */
  async waitForDirectory(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = this.clock.now() + timeoutMs;
    for (;;) {
      if (await this.exists()) return true;
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) return false;
      await sleep(Math.min(this.directoryPollMs, remaining), this.clock, signal);
    }
  }

  private async exists(): Promise<boolean> {
    try {
      return (await stat(this.directory)).isDirectory();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
