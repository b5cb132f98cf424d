/**
 * JSON output utilities for machine-readable CLI output.
 */

import { isJsonMode } from "./cli-context.js";
import { CLIError } from "./errors/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: {
    code: string;
    message: string;
    suggestion?: string;
    details?: string;
  };
}

export type JsonResult<T> = JsonSuccess<T> | JsonError;

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface GistJson {
  id: string;
  description: string | null;
  public: boolean;
  createdAt: string;
  updatedAt: string;
  url: string | null;
  files: Array<{ name: string; size: number; language: string | null }>;
}

export interface ListResultJson {
  username: string;
  count: number;
  gists: GistJson[];
}

export interface DownloadResultJson {
  username: string;
  destination: string;
  summary: {
    listed: number;
    downloaded: number;
    failed: number;
    filesWritten: number;
  };
  failures: Array<{
    id: string;
    cause: string;
    message: string;
    filesWritten: number;
  }>;
}

export interface RateLimitJson {
  limit: number;
  remaining: number;
  used: number;
  resetAt: string;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta ? { meta } : {}),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: CLIError | Error): void {
  const cliError = error instanceof CLIError ? error : undefined;
  const result: JsonError = {
    success: false,
    error: {
      code: cliError?.code ?? "UNKNOWN_ERROR",
      message: error.message,
      ...(cliError?.suggestion ? { suggestion: cliError.suggestion } : {}),
      ...(cliError?.details ? { details: cliError.details } : {}),
    },
  };
  console.error(JSON.stringify(result, null, 2));
}

/**
 * Output JSON and return true in JSON mode; return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
