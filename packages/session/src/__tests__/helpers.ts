import type { Logger } from "@droidprobe/core";

export interface RecordingLogger extends Logger {
  readonly lines: { readonly level: string; readonly message: string }[];
  messages(level: string): string[];
}

/** Logger that keeps every line, children included. */
export function recordingLogger(): RecordingLogger {
  const lines: { level: string; message: string }[] = [];
  const logger: RecordingLogger = {
    lines,
    messages: (level) => lines.filter((line) => line.level === level).map((line) => line.message),
    debug: (message) => {
      lines.push({ level: "debug", message });
    },
    info: (message) => {
      lines.push({ level: "info", message });
    },
    warn: (message) => {
      lines.push({ level: "warn", message });
    },
    error: (message) => {
      lines.push({ level: "error", message });
    },
    child: () => logger,
  };
  return logger;
}
