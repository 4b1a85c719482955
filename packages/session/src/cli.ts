#!/usr/bin/env node

import { createConsoleLogger } from "@droidprobe/core";
import { isExpectedError } from "@droidprobe/errors";
import { applyCliOverrides, HELP, parseArgv } from "./args.js";
import { readSessionConfigDocument, resolveSessionConfig } from "./config.js";
import { SessionOrchestrator } from "./orchestrator.js";
import { TerminalReporter } from "./reporters/terminal-reporter.js";

async function main(): Promise<void> {
  const args = parseArgv(process.argv.slice(2));
  if (args.flags["help"] === true) {
    console.log(HELP);
    process.exit(0);
  }

  const configPath = args.flags["config"];
  const document =
    typeof configPath === "string" ? await readSessionConfigDocument(configPath, { env: process.env }) : {};
  const config = resolveSessionConfig(
    applyCliOverrides(document, args),
    typeof configPath === "string" ? configPath : "command line",
  );

  const logger = createConsoleLogger("droidprobe", { level: config.logLevel });
  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals): void => {
    logger.warn(`${signal} received, stopping the session`);
    controller.abort();
  };
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  logger.info(`exploring ${config.apk}, output in ${config.outputDir}`);
  const orchestrator = new SessionOrchestrator(config, { logger, signal: controller.signal });
  const result = await orchestrator.run();

  console.log(new TerminalReporter().report(result));
  process.exit(0);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  // Bad flags or configuration exit with 2, everything else with 1.
  const expected = isExpectedError(err);
  console.error(expected ? message : `Fatal: ${message}`);
  process.exit(expected ? 2 : 1);
});
