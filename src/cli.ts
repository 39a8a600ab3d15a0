#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { LogLevel } from "@slack/logger";
import { connectPlatform } from "./connect.js";
import { exitCodeFor, formatReport } from "./core/aggregate.js";
import { DEFAULT_SETTINGS_PATH, loadSettings } from "./core/config.js";
import { runBulkReplace } from "./core/engine.js";
import { ConfigurationError, errorMessage, isFatalError } from "./core/errors.js";
import { createLogger, parseLogLevel } from "./logger.js";

interface RunCommandOptions {
  config: string;
  dryRun?: boolean;
  apply?: boolean;
  json?: boolean;
  verbose?: boolean;
}

async function runCommand(options: RunCommandOptions): Promise<number> {
  if (options.dryRun && options.apply) {
    throw new ConfigurationError("--dry-run and --apply cannot be combined.");
  }

  // Info lines go to stdout; keep them out of the way of the JSON report.
  const level = options.verbose
    ? LogLevel.DEBUG
    : (parseLogLevel(process.env.LOG_LEVEL) ?? (options.json ? LogLevel.WARN : LogLevel.INFO));
  const logger = createLogger({ level });

  const loaded = await loadSettings(options.config);
  const dryRun = options.apply ? false : options.dryRun ? true : loaded.dryRun;
  const config = { ...loaded, dryRun };
  const client = await connectPlatform(config);

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn("Interrupted; finishing in-flight repositories. Press Ctrl+C again to quit immediately.");
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const report = await runBulkReplace({ client, config, logger, signal: controller.signal });
    process.stdout.write(options.json ? `${JSON.stringify(report, null, 2)}\n` : `${formatReport(report)}\n`);
    return exitCodeFor(report);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

const program = new Command("repo-sweep")
  .description("Bulk literal string replacement across hosted repositories")
  .version("0.1.0");

program
  .command("run")
  .description("Scan the configured scope and apply (or preview) the replacements")
  .option("-c, --config <path>", "settings file", DEFAULT_SETTINGS_PATH)
  .option("--dry-run", "report what would change without pushing anything")
  .option("--apply", "push changes even when the settings file says dry_run: true")
  .option("--json", "print the run report as JSON")
  .option("-v, --verbose", "debug logging")
  .addHelpText(
    "after",
    `
Exit codes:
  0  every repository succeeded (or had nothing to change)
  1  at least one repository failed
  2  the run was aborted (bad settings, unknown scope, rejected credentials)`
  )
  .action(async (options: RunCommandOptions) => {
    process.exitCode = await runCommand(options);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`repo-sweep: ${errorMessage(err)}\n`);
  process.exitCode = isFatalError(err) ? 2 : 1;
});
