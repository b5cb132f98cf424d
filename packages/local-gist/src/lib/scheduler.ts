import { join, resolve } from "path";
import type { GistSummary } from "./gist.js";
import type { GitHubClient } from "./github-client.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { createQueue, type QueueTask } from "./queue.js";
import { targetPath } from "./target-path.js";
import type { FileStore } from "./ports/file-store.js";
import { notifyObserver, type GistObserver } from "./ports/observer.js";
import { fsFileStore } from "./adapters/fs-file-store.js";
import {
  ApiRequestError,
  SchedulerError,
  describeFailure,
  type DownloadFailureCause,
} from "./errors/core.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DownloadOutcome =
  | { status: "success"; gistId: string; filesWritten: number }
  | {
      status: "failure";
      gistId: string;
      /** Files already on disk when the failure happened; they are left in place */
      filesWritten: number;
      cause: DownloadFailureCause;
    };

export type DownloadFailure = Extract<DownloadOutcome, { status: "failure" }>;

export interface DownloadReport {
  downloadedCount: number;
  failedIds: ReadonlySet<string>;
  failures: DownloadFailure[];
  /** Files written across all gists, including those of failed gists */
  filesWritten: number;
  /** Most gists that were downloading at the same moment */
  peakConcurrency: number;
  durationMs: number;
}

export interface DownloadOptions {
  concurrency: number;
  destination: string;
  client: Pick<GitHubClient, "getRaw">;
  store?: FileStore;
  observer?: GistObserver;
  logger?: Logger;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function validateConcurrency(value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new SchedulerError({ kind: "invalid-concurrency", value });
  }
  return value;
}

async function downloadGist(
  gist: GistSummary,
  destination: string,
  client: Pick<GitHubClient, "getRaw">,
  store: FileStore,
  logger: Logger
): Promise<DownloadOutcome> {
  let filesWritten = 0;
  const paths = new Set<string>();

  // Files of one gist go one after another, in listed order
  for (const file of gist.files) {
    const path = join(destination, targetPath(gist.id, file.name));
    if (paths.has(path)) {
      return {
        status: "failure",
        gistId: gist.id,
        filesWritten,
        cause: { kind: "io", path, message: `"${file.name}" maps to a path already written for this gist` },
      };
    }
    paths.add(path);

    let bytes: Uint8Array;
    try {
      bytes = await client.getRaw(file.rawUrl);
    } catch (error) {
      const cause: DownloadFailureCause =
        error instanceof ApiRequestError
          ? error.failure
          : {
              kind: "transport",
              url: file.rawUrl,
              message: error instanceof Error ? error.message : String(error),
              timedOut: false,
            };
      return { status: "failure", gistId: gist.id, filesWritten, cause };
    }

    try {
      await store.write(path, bytes);
    } catch (error) {
      return {
        status: "failure",
        gistId: gist.id,
        filesWritten,
        cause: {
          kind: "io",
          path,
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }

    filesWritten++;
    logger.debug("Wrote file", { gistId: gist.id, path, bytes: bytes.byteLength });
  }

  return { status: "success", gistId: gist.id, filesWritten };
}

/**
 * Download every gist from `gists` into `destination`, at most `concurrency`
 * at a time.
 *
 * Rejects only for an invalid concurrency (before any work starts) or when an
 * async `gists` source throws. Per-gist failures are collected into the report
 * and never stop sibling downloads.
 */
export async function downloadAll(
  gists: Iterable<GistSummary> | AsyncIterable<GistSummary>,
  options: DownloadOptions
): Promise<DownloadReport> {
  const concurrency = validateConcurrency(options.concurrency);
  const destination = resolve(options.destination);
  const store = options.store ?? fsFileStore;
  const logger = options.logger ?? createNoopLogger();
  const now = options.now ?? Date.now;
  const startedAt = now();

  let downloadedCount = 0;
  let filesWritten = 0;
  const failedIds = new Set<string>();
  const failures: DownloadFailure[] = [];

  function record(outcome: DownloadOutcome): void {
    filesWritten += outcome.filesWritten;
    if (outcome.status === "success") {
      downloadedCount++;
    } else {
      failedIds.add(outcome.gistId);
      failures.push(outcome);
    }
    notifyObserver(logger, "onRecordResult", () => options.observer?.onRecordResult?.(outcome));
  }

  const queue = createQueue<DownloadOutcome>({
    concurrency,
    logger: logger.child({ component: "queue" }),
    onComplete: (_task, outcome) => record(outcome),
    onError: (task, error) =>
      record({
        status: "failure",
        gistId: task.id,
        filesWritten: 0,
        cause: {
          kind: "io",
          path: join(destination, task.id),
          message: error instanceof Error ? error.message : String(error),
        },
      }),
  });

  const seen = new Set<string>();
  try {
    for await (const gist of gists) {
      if (seen.has(gist.id)) {
        logger.warn("Skipping duplicate gist", { gistId: gist.id });
        continue;
      }
      seen.add(gist.id);

      const task: QueueTask<DownloadOutcome> = {
        id: gist.id,
        execute: () => downloadGist(gist, destination, options.client, store, logger),
      };
      await queue.enqueue(task);
    }
  } finally {
    // A failing source still lets the downloads already started finish
    await queue.drain();
  }

  const stats = queue.getStats();
  const report: DownloadReport = {
    downloadedCount,
    failedIds,
    failures,
    filesWritten,
    peakConcurrency: stats.peakActive,
    durationMs: now() - startedAt,
  };

  logger.info("Download finished", {
    downloaded: downloadedCount,
    failed: failedIds.size,
    filesWritten,
    peakConcurrency: report.peakConcurrency,
    durationMs: report.durationMs,
  });
  for (const failure of failures) {
    logger.debug("Failure detail", {
      gistId: failure.gistId,
      error: describeFailure(failure.cause),
    });
  }

  return report;
}
