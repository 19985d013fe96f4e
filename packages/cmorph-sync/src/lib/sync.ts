import { existsSync } from "fs";
import { buildFilePlan } from "./file-plan.js";
import { fetchTarget } from "./fetcher.js";
import { OutcomeSet } from "./outcome.js";
import { authenticate, type Credentials } from "./session.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { ProgressReporter } from "./ports/progress.js";

export interface SyncOptions {
  year: string;
  months: readonly string[];
  credentials: Credentials;
  dataDir: string;
  baseUrl: string;
  loginUrl: string;
  /** Operating user, recorded in the log for attribution. */
  operator?: string;
}

export interface SyncDeps {
  logger: Logger;
  clock: Clock;
  progress: ProgressReporter;
  fetchImpl?: typeof fetch;
}

export function formatDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Run one synchronisation: authenticate, plan, then resolve every target
 * in order. Errors (bad login, network, filesystem) are thrown to the
 * caller; nothing here exits the process.
 */
export async function runSync(options: SyncOptions, deps: SyncDeps): Promise<OutcomeSet> {
  const { logger, clock, progress, fetchImpl } = deps;

  logger.info(`Updated on ${formatDay(clock.now())} by ${options.operator ?? "unknown"}`);

  const session = await authenticate(options.credentials, {
    loginUrl: options.loginUrl,
    logger,
    fetchImpl,
  });

  const plan = buildFilePlan({
    year: options.year,
    months: options.months,
    dataDir: options.dataDir,
    baseUrl: options.baseUrl,
  });
  logger.debug("File plan ready", { year: options.year, months: options.months, files: plan.length });

  const outcomes = new OutcomeSet();
  for (const target of plan) {
    const update = existsSync(target.localPath);
    const status = await fetchTarget(target, update, { session, logger, progress, fetchImpl });
    outcomes.record(target, status, update);
  }

  return outcomes;
}
