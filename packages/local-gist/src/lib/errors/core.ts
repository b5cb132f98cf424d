import type { RateLimitSnapshot } from "../pagination.js";

/**
 * Failure of a single HTTP call, as classified by the GitHub client.
 */
export type RequestFailure =
  | {
      kind: "http";
      status: number;
      statusText: string;
      url: string;
      rateLimit: RateLimitSnapshot;
    }
  | { kind: "decode"; url: string; message: string }
  | { kind: "transport"; url: string; message: string; timedOut: boolean };

/**
 * Why a single gist could not be written to disk.
 */
export type DownloadFailureCause =
  | RequestFailure
  | { kind: "io"; path: string; message: string };

export type ListErrorDetail =
  | { kind: "http"; page: number; status: number; rateLimit: RateLimitSnapshot }
  | { kind: "decode"; page: number }
  | { kind: "transport"; page: number; timedOut: boolean };

export type SchedulerErrorDetail = { kind: "invalid-concurrency"; value: number };

export class ApiRequestError extends Error {
  readonly failure: RequestFailure;

  constructor(failure: RequestFailure, options?: { cause?: unknown }) {
    super(describeFailure(failure), options);
    this.name = "ApiRequestError";
    this.failure = failure;
  }
}

/**
 * Listing aborted. Records gathered from earlier pages are not kept.
 */
export class ListError extends Error {
  readonly detail: ListErrorDetail;

  constructor(detail: ListErrorDetail, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ListError";
    this.detail = detail;
  }

  static fromRequestFailure(page: number, error: ApiRequestError): ListError {
    const { failure } = error;
    switch (failure.kind) {
      case "http":
        return new ListError(
          { kind: "http", page, status: failure.status, rateLimit: failure.rateLimit },
          `Listing page ${page} failed with HTTP ${failure.status}`,
          { cause: error }
        );
      case "decode":
        return new ListError(
          { kind: "decode", page },
          `Listing page ${page} returned a malformed body: ${failure.message}`,
          { cause: error }
        );
      case "transport":
        return new ListError(
          { kind: "transport", page, timedOut: failure.timedOut },
          `Listing page ${page} failed: ${failure.message}`,
          { cause: error }
        );
    }
  }
}

export class SchedulerError extends Error {
  readonly detail: SchedulerErrorDetail;

  constructor(detail: SchedulerErrorDetail) {
    super(`Concurrency must be a whole number of at least 1 (got ${detail.value})`);
    this.name = "SchedulerError";
    this.detail = detail;
  }
}

export function isListError(error: unknown): error is ListError {
  return error instanceof ListError;
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}

/**
 * One-line description of a failure cause, for logs and summaries.
 */
export function describeFailure(cause: DownloadFailureCause): string {
  switch (cause.kind) {
    case "http":
      return `HTTP ${cause.status}${cause.statusText ? ` ${cause.statusText}` : ""} from ${cause.url}`;
    case "decode":
      return `Malformed response from ${cause.url}: ${cause.message}`;
    case "transport":
      return cause.timedOut
        ? `Request to ${cause.url} timed out`
        : `Request to ${cause.url} failed: ${cause.message}`;
    case "io":
      return `Cannot write ${cause.path}: ${cause.message}`;
  }
}
