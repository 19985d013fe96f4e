import { Command } from "commander";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { loadConfig } from "../lib/config.js";
import { normalizeMonths, validateYear } from "../lib/file-plan.js";
import { createLogger } from "../lib/logger.js";
import { reportOutcome } from "../lib/outcome.js";
import { readSecret } from "../lib/session.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { runSync } from "../lib/sync.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { systemClock } from "../lib/adapters/index.js";
import type { Clock } from "../lib/ports/clock.js";

export interface SyncCommandOptions {
  year: string;
  month?: string[];
  user: string;
  debug?: boolean;
  json?: boolean;
  quiet?: boolean;
  config?: string;
}

export interface SyncCommandDeps {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  clock?: Clock;
}

export function registerSyncCommand(program: Command, deps: SyncCommandDeps = {}): void {
  program
    .command("sync", { isDefault: true })
    .description("Download or update one year of CMORPH files from RDA")
    .requiredOption("-y, --year <year>", "Year to process")
    .option("-m, --month <months...>", "Months to process (default: all)")
    .requiredOption("-u, --user <email>", "Username (email) of the rda.ucar.edu account")
    .option("-d, --debug", "Log debug information", false)
    .option("--json", "Print the summary as JSON", false)
    .option("-q, --quiet", "Hide the progress display", false)
    .option("-c, --config <path>", "Config file to use instead of the system/user files")
    .addHelpText(
      "after",
      "\nThe account password is read from RDAPSWD. AUSREFDIR overrides the data root."
    )
    .action(async (options: SyncCommandOptions) => {
      await syncAction(options, deps);
    });
}

export async function syncAction(
  options: SyncCommandOptions,
  { env = process.env, fetchImpl, clock = systemClock }: SyncCommandDeps = {}
): Promise<void> {
  const json = options.json ?? false;
  let spinner: Spinner | undefined;

  try {
    const year = validateYear(options.year);
    const months = normalizeMonths(options.month);
    const password = readSecret(env);
    const { config, sources } = loadConfig({ debug: options.debug }, options.config, env);

    mkdirSync(dirname(config.logFile), { recursive: true });
    const logger = createLogger({
      level: config.logLevel,
      json: config.logJson,
      filePath: config.logFile,
      console: Boolean(options.debug) && !json,
    });
    logger.debug("Configuration loaded", { sources, dataDir: config.dataDir });

    spinner = createSpinner(Boolean(options.quiet) || json, "Logging in to RDA").start();

    const outcomes = await runSync(
      {
        year,
        months,
        credentials: { username: options.user, password },
        dataDir: config.dataDir,
        baseUrl: config.baseUrl,
        loginUrl: config.loginUrl,
        operator: env.USER,
      },
      { logger, clock, progress: spinner, fetchImpl }
    );

    if (outcomes.error.length > 0) {
      spinner.warn(`${outcomes.error.length} file(s) incomplete`);
    } else {
      spinner.succeed("Sync finished");
    }

    reportOutcome(outcomes, { logger, json });
  } catch (error) {
    spinner?.fail("Sync failed");
    renderUnknownError(error, json ? "json" : "static");
    process.exitCode = 1;
  }
}
