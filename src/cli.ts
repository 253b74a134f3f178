// CHANGE: Expose sync and validate commands around the pipeline.
// WHY: Exit code 1 is reserved for configuration and option failures; per-project failures are only logged.

import { Command, Option } from "commander";
import { z } from "zod";
import { CLI } from "./config.js";
import { loadConfig } from "./config-file.js";
import { ConfigError, describeError } from "./errors.js";
import { LOG_DESTINATIONS, LOG_LEVELS, configureLogger, error as logError, info } from "./logger.js";
import { syncAll } from "./sync.js";
import type { ProjectOutcome } from "./types.js";

const LoggingOptionsSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).optional(),
  logDestination: z.enum(LOG_DESTINATIONS).default("stderr"),
  logFile: z.string().min(1).optional()
});

/**
 * Apply global logging flags; invalid combinations are reported as configuration errors.
 */
export function applyLoggingOptions(raw: unknown): void {
  const parsed = LoggingOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid logging options: ${parsed.error.issues.map(issue => issue.message).join("; ")}`);
  }
  try {
    configureLogger({
      level: parsed.data.logLevel,
      destination: parsed.data.logDestination,
      filePath: parsed.data.logFile
    });
  } catch (cause) {
    throw new ConfigError(describeError(cause), undefined, { cause });
  }
}

/**
 * Sync mode entry point: load configuration and sweep every project.
 *
 * @returns Per-project outcomes; failures among them do not change the exit code.
 */
export async function syncAction(configPath: string): Promise<ProjectOutcome[]> {
  const config = await loadConfig(configPath);
  const outcomes = await syncAll(config);
  for (const outcome of outcomes.filter(item => item.state === "FAILED")) {
    info(`Failed: ${outcome.project} at ${outcome.failedAt ?? "unknown stage"} (${outcome.error ?? "no details"})`);
  }
  return outcomes;
}

/**
 * Validate mode entry point: load and check configuration without touching any repository.
 */
export async function validateAction(configPath: string): Promise<void> {
  const config = await loadConfig(configPath);
  info(`Configuration ${configPath} is valid: ${config.projects.length} project(s) under ${config.basePath}.`);
}

/**
 * Construct commander program with configured commands.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("rpm-release-sync")
    .description("Mirror the latest upstream release packages into local RPM repositories")
    .version("1.0.0")
    .addOption(new Option("--log-level <level>", "minimum log level").choices(LOG_LEVELS))
    .addOption(new Option("--log-destination <destination>", "where log lines go").choices(LOG_DESTINATIONS).default("stderr"))
    .option("--log-file <path>", "log file used with --log-destination file")
    .hook("preAction", thisCommand => {
      applyLoggingOptions(thisCommand.opts());
    });

  program
    .command("sync")
    .description("Download new release assets, apply retention and refresh repository metadata")
    .option("-c, --config <path>", "configuration file", CLI.DEFAULT_CONFIG_PATH)
    .action(async (options: { readonly config: string }) => {
      await syncAction(options.config);
    });

  program
    .command("validate")
    .description("Check the configuration file and exit")
    .option("-c, --config <path>", "configuration file", CLI.DEFAULT_CONFIG_PATH)
    .action(async (options: { readonly config: string }) => validateAction(options.config));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (cause) {
    logError(`CLI failed: ${describeError(cause)}`);
    process.exitCode = 1;
  }
}
