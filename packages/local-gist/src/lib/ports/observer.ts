import type { DownloadOutcome } from "../scheduler.js";
import type { RateLimitSnapshot } from "../pagination.js";
import type { Logger } from "../logger.js";

export interface PageFetchedEvent {
  username: string;
  page: number;
  /** Records on this page */
  count: number;
  /** Records kept so far, after truncation to the limit */
  accumulated: number;
  hasNextPage: boolean;
  rateLimit: RateLimitSnapshot;
}

/**
 * Progress hooks for listing and downloading.
 * Passed in explicitly so the core never reaches for a global logger.
 */
export interface GistObserver {
  onPageFetched?(event: PageFetchedEvent): void;
  onRecordResult?(outcome: DownloadOutcome): void;
}

/**
 * Call an observer hook. A hook that throws is logged and does not affect
 * listing or downloading.
 */
export function notifyObserver(logger: Logger, hook: keyof GistObserver, call: () => void): void {
  try {
    call();
  } catch (error) {
    logger.warn("Observer hook failed", {
      hook,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
