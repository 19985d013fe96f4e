import { mkdirSync } from "fs";
import { invalidOption } from "./errors/catalog.js";

/** Directory layout shared by the archive and the local mirror. */
export const DATASET_PATH = "v1.0/30min/8km";
/** Prefix the archive puts in front of the dataset path. */
export const REMOTE_PREFIX = "cmorph_";

export const ALL_MONTHS = Array.from({ length: 12 }, (_, i) =>
  String(i + 1).padStart(2, "0")
);

/**
 * One remote/local file pair for a single calendar day.
 */
export interface DownloadTarget {
  readonly remoteUrl: string;
  readonly localPath: string;
  /** Path below the data directory; also the identifier used in summaries. */
  readonly relativePath: string;
  readonly year: string;
  readonly month: string;
  readonly day: string;
}

export interface FilePlanOptions {
  year: string;
  /** Two-digit months, in the order they should be processed. */
  months?: readonly string[];
  /** Local `{dataRoot}/cmorph/data` directory. */
  dataDir: string;
  /** Archive base URL, ending in `/`. */
  baseUrl: string;
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
}

/** Proleptic Gregorian; `Date` would shift years 0-99 into the 1900s. */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_LENGTHS[month - 1];
}

export function fileName(year: string, month: string, day: string): string {
  return `CMORPH_V1.0_ADJ_8km-30min_${year}${month}${day}00.nc`;
}

export function validateYear(year: string): string {
  if (!/^\d{4}$/.test(year)) {
    throw invalidOption("year", `"${year}" is not a four-digit year`);
  }
  return year;
}

/**
 * Turn month tokens into two-digit strings. Order is kept and repeats are
 * dropped; an empty list means every month.
 */
export function normalizeMonths(tokens: readonly string[] = []): string[] {
  if (tokens.length === 0) return [...ALL_MONTHS];

  const months: string[] = [];
  for (const token of tokens) {
    const value = /^\d{1,2}$/.test(token) ? Number(token) : NaN;
    if (!(value >= 1 && value <= 12)) {
      throw invalidOption("month", `"${token}" is not a month`, ALL_MONTHS);
    }
    const month = String(value).padStart(2, "0");
    if (!months.includes(month)) months.push(month);
  }
  return months;
}

/**
 * Enumerate one target per day of each requested month. The local month
 * directory is created before its targets are returned; mkdir failures
 * propagate.
 */
export function buildFilePlan({
  year,
  months = ALL_MONTHS,
  dataDir,
  baseUrl,
}: FilePlanOptions): DownloadTarget[] {
  const targets: DownloadTarget[] = [];

  for (const month of months) {
    const monthPath = `${DATASET_PATH}/${year}/${month}`;
    mkdirSync(`${dataDir}/${monthPath}`, { recursive: true });

    const lastDay = daysInMonth(Number(year), Number(month));
    for (let d = 1; d <= lastDay; d++) {
      const day = String(d).padStart(2, "0");
      const relativePath = `${monthPath}/${fileName(year, month, day)}`;
      targets.push(
        Object.freeze({
          remoteUrl: `${baseUrl}${REMOTE_PREFIX}${relativePath}`,
          localPath: `${dataDir}/${relativePath}`,
          relativePath,
          year,
          month,
          day,
        })
      );
    }
  }

  return targets;
}
