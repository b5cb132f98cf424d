import type { Logger } from "../logger.js";
import type { GistObserver } from "../ports/observer.js";
import { describeFailure } from "../errors/core.js";

/**
 * Observer that turns listing and download progress into log lines.
 */
export function createLoggingObserver(logger: Logger): GistObserver {
  return {
    onPageFetched(event) {
      logger.info("Fetched gist page", {
        username: event.username,
        page: event.page,
        count: event.count,
        accumulated: event.accumulated,
        hasNextPage: event.hasNextPage,
        rateLimit: event.rateLimit.limit,
        rateRemaining: event.rateLimit.remaining,
      });
      if (event.rateLimit.remaining === 0) {
        logger.warn("API rate limit exhausted; further requests will fail until it resets", {
          page: event.page,
        });
      }
    },

    onRecordResult(outcome) {
      if (outcome.status === "success") {
        logger.info("Downloaded gist", {
          gistId: outcome.gistId,
          filesWritten: outcome.filesWritten,
        });
      } else {
        logger.error("Failed to download gist", {
          gistId: outcome.gistId,
          filesWritten: outcome.filesWritten,
          cause: outcome.cause.kind,
          error: describeFailure(outcome.cause),
        });
      }
    },
  };
}

/**
 * Fan one event stream out to several observers.
 */
export function combineObservers(...observers: GistObserver[]): GistObserver {
  return {
    onPageFetched(event) {
      for (const observer of observers) observer.onPageFetched?.(event);
    },
    onRecordResult(outcome) {
      for (const observer of observers) observer.onRecordResult?.(outcome);
    },
  };
}
