import { open, stat } from "fs/promises";
import { basename } from "path";
import type { DownloadTarget } from "./file-plan.js";
import type { Logger } from "./logger.js";
import type { ProgressReporter } from "./ports/progress.js";
import type { Session } from "./session.js";

/** 1 MiB */
export const CHUNK_SIZE = 1_048_576;

/**
 * Final state of one target:
 * planned → (skip | fetching → {complete, incomplete})
 */
export type FetchStatus = "skip" | "complete" | "incomplete";

export interface FetchOptions {
  session: Session;
  logger: Logger;
  progress: ProgressReporter;
  fetchImpl?: typeof fetch;
  chunkSize?: number;
}

type ResponseBody = NonNullable<Response["body"]>;

export function formatPercent(size: number, total: number): string {
  const percent = total === 0 ? 100 : (size / total) * 100;
  return `${percent.toFixed(3)} % Completed`;
}

export function parseContentLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

/**
 * Whether the archive copy is newer than the local file. A missing or
 * unparseable Last-Modified counts as newer.
 */
export async function isRemoteNewer(
  lastModified: string | null,
  localPath: string,
  logger: Logger
): Promise<boolean> {
  const remoteTime = lastModified ? Date.parse(lastModified) : NaN;
  if (Number.isNaN(remoteTime)) {
    logger.debug("No usable Last-Modified header, refetching", { lastModified });
    return true;
  }
  const local = await stat(localPath);
  logger.debug("Comparing modification times", {
    remote: new Date(remoteTime).toISOString(),
    local: local.mtime.toISOString(),
  });
  return remoteTime > local.mtimeMs;
}

/**
 * Re-slice a byte stream into fixed-size chunks; the last one may be short.
 */
export async function* chunksOf(
  body: ResponseBody,
  size: number
): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let pending: Buffer[] = [];
  let length = 0;
  let drained = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        break;
      }
      pending.push(Buffer.from(value.buffer, value.byteOffset, value.byteLength));
      length += value.byteLength;

      while (length >= size) {
        const joined = Buffer.concat(pending, length);
        yield joined.subarray(0, size);
        const rest = joined.subarray(size);
        pending = rest.byteLength > 0 ? [rest] : [];
        length = rest.byteLength;
      }
    }
    if (length > 0) {
      yield Buffer.concat(pending, length);
    }
  } finally {
    // A consumer that stops early must not leave the connection open.
    try {
      if (!drained) await reader.cancel();
    } finally {
      reader.releaseLock();
    }
  }
}

/**
 * Resolve one target. `update` is true when a local file already exists;
 * only then is the remote modification time consulted.
 *
 * Completeness is judged by size alone: the file on disk must match the
 * declared Content-Length. Network errors propagate.
 */
export async function fetchTarget(
  target: DownloadTarget,
  update: boolean,
  {
    session,
    logger,
    progress,
    fetchImpl = globalThis.fetch,
    chunkSize = CHUNK_SIZE,
  }: FetchOptions
): Promise<FetchStatus> {
  const log = logger.child({ target: target.relativePath });
  const name = basename(target.localPath);

  const response = await fetchImpl(target.remoteUrl, {
    headers: { Cookie: session.cookieHeader() },
    redirect: "follow",
  });

  if (!response.ok) {
    await response.body?.cancel();
    log.warn("Archive refused the file", { status: response.status });
    return "incomplete";
  }

  const total = parseContentLength(response.headers.get("content-length"));
  if (total === undefined) {
    await response.body?.cancel();
    log.warn("Response has no Content-Length, cannot verify the file");
    return "incomplete";
  }

  if (update) {
    const newer = await isRemoteNewer(response.headers.get("last-modified"), target.localPath, log);
    if (!newer) {
      await response.body?.cancel();
      log.debug("Local copy is current, skipping");
      return "skip";
    }
  }

  log.debug(update ? "Updating" : "Downloading", { bytes: total });
  progress.update(`${name} ${formatPercent(0, total)}`);

  const handle = await open(target.localPath, "w");
  try {
    if (response.body) {
      for await (const chunk of chunksOf(response.body, chunkSize)) {
        await handle.write(chunk);
        if (chunkSize < total) {
          const { size } = await handle.stat();
          progress.update(`${name} ${formatPercent(size, total)}`);
        }
      }
    }
  } finally {
    await handle.close();
  }

  const { size } = await stat(target.localPath);
  progress.update(`${name} ${formatPercent(size, total)}`);

  if (size === total) {
    log.debug("Transfer complete", { bytes: size });
    return "complete";
  }

  log.warn("Size mismatch after transfer", { expected: total, actual: size });
  return "incomplete";
}
