import { toEventKind } from "@droidprobe/core";
import { eventType } from "@droidprobe/events";
import pc from "picocolors";
import type { SessionResult } from "../orchestrator.js";
import type { SessionEndReason } from "../types.js";

type Colors = ReturnType<typeof pc.createColors>;

const END_REASONS: Record<SessionEndReason, string> = {
  timeout: "session timeout reached",
  driver_exit: "driver exited",
  aborted: "interrupted",
  fatal: "fatal error",
};

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function row(c: Colors, label: string, value: string): string {
  return `  ${c.dim(`${label}:`.padEnd(13))} ${value}`;
}

export interface TerminalReporterOptions {
  /** Defaults to picocolors' own terminal detection. */
  readonly colors?: boolean;
}

/**
 * Renders the end-of-session summary for the terminal.
 */
export class TerminalReporter {
  private readonly c: Colors;

  constructor(options: TerminalReporterOptions = {}) {
    this.c = options.colors === undefined ? pc : pc.createColors(options.colors);
  }

  report(result: SessionResult): string {
    const { c } = this;
    const { metadata, app, statistics, homeProbes } = result.report;
    const lines: string[] = [];

    lines.push("");
    lines.push(c.bold("droidprobe session summary"));
    lines.push("─".repeat(50));
    lines.push(
      row(c, "App", app.packageName === null ? "unknown" : `${app.packageName}/${app.mainActivity ?? "?"}`),
    );
    lines.push(row(c, "APK", metadata.apk));
    lines.push(row(c, "Output", metadata.outputDirectory));
    lines.push(row(c, "Device", metadata.deviceSerial ?? "default"));
    lines.push(
      row(c, "Ended", `${END_REASONS[metadata.endReason]} after ${(metadata.durationMs / 1000).toFixed(1)}s`),
    );

    const { coverage } = app;
    if (coverage.ratio !== null) {
      const covered = Math.round(coverage.ratio * coverage.declared);
      lines.push(row(c, "Activities", `${covered}/${coverage.declared} visited (${percent(coverage.ratio)})`));
    } else if (coverage.visited.length > 0) {
      lines.push(row(c, "Activities", `${coverage.visited.length} visited`));
    }

    lines.push(row(c, "Checks", String(statistics.checksPerformed)));
    const incidents = `${statistics.incidents} (${percent(statistics.incidentRate)} of checks)`;
    lines.push(row(c, "Incidents", statistics.incidents > 0 ? c.yellow(incidents) : c.green(incidents)));
    const crashes = `${statistics.crashes} (${percent(statistics.crashRate)} of states)`;
    lines.push(row(c, "Crashes", statistics.crashes > 0 ? c.red(crashes) : c.green(crashes)));
    lines.push(
      row(c, "Home probes", `${homeProbes.analyzed} analyzed, ${homeProbes.potentialDataLoss} potential data loss`),
    );

    for (const crash of result.crashReport.crashes) {
      const after = crash.event === null ? "" : ` after ${toEventKind(eventType(crash.event))}`;
      lines.push(`    ${c.red("✗")} state ${crash.index} ${c.dim(crash.sourceFile)}${after}`);
    }
    for (const incident of result.dataLossReport.incidents) {
      lines.push(`    ${c.yellow("!")} ${incident.id} ${c.dim(incident.reason)}`);
    }

    lines.push("");
    return lines.join("\n");
  }
}
