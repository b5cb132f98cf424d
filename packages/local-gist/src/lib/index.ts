export { listGists, iterateGistPages, iterateGists, resolvePageSize } from "./lister.js";
export type { ListOptions, GistPage } from "./lister.js";
export { downloadAll, validateConcurrency } from "./scheduler.js";
export type { DownloadOptions, DownloadOutcome, DownloadFailure, DownloadReport } from "./scheduler.js";
export { createGitHubClient, DEFAULT_BASE_URL } from "./github-client.js";
export type { GitHubClient, GitHubClientOptions, FetchLike, FetchResponseLike } from "./github-client.js";
export { targetPath, safeFileName } from "./target-path.js";
export { parseLinkHeader, parseRateLimit, clampPageSize, MAX_PAGE_SIZE } from "./pagination.js";
export type { RateLimitSnapshot } from "./pagination.js";
export { decodeGistPage, formatGistLine } from "./gist.js";
export type { GistSummary, GistFileMeta } from "./gist.js";
export { createLogger, createNoopLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export {
  ApiRequestError,
  ListError,
  SchedulerError,
  describeFailure,
  isListError,
  isSchedulerError,
} from "./errors/core.js";
export type {
  RequestFailure,
  DownloadFailureCause,
  ListErrorDetail,
  SchedulerErrorDetail,
} from "./errors/core.js";
export type { GistObserver, PageFetchedEvent, FileStore } from "./ports/index.js";
export { fsFileStore, createLoggingObserver, combineObservers } from "./adapters/index.js";
