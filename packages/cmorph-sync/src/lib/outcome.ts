import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { DownloadTarget } from "./file-plan.js";
import type { FetchStatus } from "./fetcher.js";
import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OutcomeBucket = "updated" | "new" | "error";

export interface SyncSummaryJson {
  success: true;
  data: {
    updated: string[];
    new: string[];
    error: string[];
    summary: {
      updated: number;
      new: number;
      error: number;
    };
  };
}

const LABELS: Record<OutcomeBucket, string> = {
  updated: "Updated",
  new: "New",
  error: "Incomplete",
};

// ---------------------------------------------------------------------------
// Outcome set
// ---------------------------------------------------------------------------

/**
 * Per-run classification of targets. Buckets only grow; skipped targets are
 * not recorded anywhere.
 */
export class OutcomeSet {
  private readonly buckets: Record<OutcomeBucket, string[]> = {
    updated: [],
    new: [],
    error: [],
  };

  record(target: DownloadTarget, status: FetchStatus, update: boolean): OutcomeBucket | undefined {
    const bucket = classify(status, update);
    if (bucket) {
      this.buckets[bucket].push(target.relativePath);
    }
    return bucket;
  }

  get updated(): readonly string[] {
    return this.buckets.updated;
  }

  get new(): readonly string[] {
    return this.buckets.new;
  }

  get error(): readonly string[] {
    return this.buckets.error;
  }

  toJSON(): SyncSummaryJson {
    return {
      success: true,
      data: {
        updated: [...this.updated],
        new: [...this.new],
        error: [...this.error],
        summary: {
          updated: this.updated.length,
          new: this.new.length,
          error: this.error.length,
        },
      },
    };
  }
}

export function classify(status: FetchStatus, update: boolean): OutcomeBucket | undefined {
  switch (status) {
    case "complete":
      return update ? "updated" : "new";
    case "incomplete":
      return "error";
    case "skip":
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

/**
 * Write the run summary to the log, one record per bucket.
 */
export function logOutcome(outcomes: OutcomeSet, logger: Logger): void {
  for (const bucket of ["updated", "new", "error"] as const) {
    const files = outcomes[bucket];
    const message = `${LABELS[bucket]} files: ${files.length}`;
    if (files.length === 0) {
      logger.info(message);
    } else if (bucket === "error") {
      logger.warn(message, { files });
    } else {
      logger.info(message, { files });
    }
  }
}

/**
 * Render the summary for the terminal.
 */
export function formatOutcome(outcomes: OutcomeSet): string {
  const table = new CliTable3({
    head: [chalk.cyan("Result"), chalk.cyan("Files")],
  });
  table.push(
    [LABELS.updated, String(outcomes.updated.length)],
    [LABELS.new, String(outcomes.new.length)],
    [LABELS.error, String(outcomes.error.length)]
  );

  const lines = [chalk.bold("\nSync summary:"), table.toString()];

  for (const bucket of ["updated", "new", "error"] as const) {
    const files = outcomes[bucket];
    if (files.length === 0) continue;
    const color = bucket === "error" ? chalk.red : chalk.green;
    lines.push(chalk.bold(`\n${LABELS[bucket]}:`));
    for (const file of files) {
      lines.push(`  ${color(file)}`);
    }
  }

  return lines.join("\n");
}

export interface ReportOptions {
  logger: Logger;
  json?: boolean;
  /** Where the terminal summary goes. */
  write?: (text: string) => void;
}

/**
 * Log the summary and print it, as a table or as JSON.
 */
export function reportOutcome(
  outcomes: OutcomeSet,
  { logger, json = false, write = (text) => console.log(text) }: ReportOptions
): void {
  logOutcome(outcomes, logger);
  write(json ? JSON.stringify(outcomes.toJSON(), null, 2) : formatOutcome(outcomes));
}
