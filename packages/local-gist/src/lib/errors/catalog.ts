import { CLIError } from "./types.js";
import { ListError, SchedulerError, ApiRequestError, type RequestFailure } from "./core.js";
import { ConfigError } from "../config.js";
import type { RateLimitSnapshot } from "../pagination.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Authentication Errors
// ============================================================================

export function invalidToken(): CLIError {
  return new CLIError("AUTH_INVALID_TOKEN", "GitHub rejected your token", {
    suggestion: "Store a new personal access token, or unset GITHUB_TOKEN",
    example: "local-gist auth login",
  });
}

export function tokenRequired(): CLIError {
  return new CLIError("AUTH_TOKEN_REQUIRED", "No GitHub token is configured", {
    suggestion: "Store a personal access token or set GITHUB_TOKEN",
    example: "local-gist auth login",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string, command: string): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
    example: `local-gist ${command} --help`,
  });
}

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`);
}

export function invalidConcurrency(value: number): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --concurrency: ${value}`, {
    suggestion: "Use a whole number of at least 1",
    example: "local-gist download -u octocat -c 4",
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file has errors: ${path}`, {
    suggestion: "Fix the issues below and try again",
    example: "local-gist config validate",
    details,
  });
}

// ============================================================================
// API Errors
// ============================================================================

export function rateLimited(rateLimit?: RateLimitSnapshot): CLIError {
  const quota = rateLimit?.limit != null ? ` (${rateLimit.limit} requests per hour)` : "";
  return new CLIError("API_RATE_LIMITED", `GitHub API rate limit exhausted${quota}`, {
    suggestion: "Wait for the limit to reset, or authenticate to get a higher limit",
    example: "local-gist rate-limit",
  });
}

export function forbidden(details?: string): CLIError {
  return new CLIError("API_FORBIDDEN", "GitHub refused the request", {
    suggestion: "Check that your token has access to this resource",
    details,
  });
}

export function accountNotFound(username: string): CLIError {
  return new CLIError("API_NOT_FOUND", `No GitHub account named "${username}"`, {
    suggestion: "Check the spelling of the username",
  });
}

export function serverError(details?: string): CLIError {
  return new CLIError("API_SERVER_ERROR", "GitHub had a problem answering", {
    suggestion: "This is usually temporary. Try again in a few minutes",
    details,
  });
}

export function badResponse(details?: string): CLIError {
  return new CLIError("API_BAD_RESPONSE", "GitHub sent a response we could not read", {
    suggestion: "Check --config github.baseUrl points at the GitHub REST API",
    details,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(details?: string): CLIError {
  return new CLIError("NETWORK_OFFLINE", "Can't reach GitHub", {
    suggestion: "Check your internet connection and try again",
    details,
  });
}

export function networkTimeout(): CLIError {
  return new CLIError("NETWORK_TIMEOUT", "Request timed out", {
    suggestion: "Try again, or raise the limit with --timeout <ms>",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}

// ============================================================================
// Core Error Mapping
// ============================================================================

/**
 * Convert an HTTP status from GitHub to a CLIError.
 */
export function fromHttpStatus(
  status: number,
  rateLimit: RateLimitSnapshot,
  resource?: string
): CLIError {
  switch (status) {
    case 401:
      return invalidToken();
    case 403:
    case 429:
      // GitHub reports an exhausted quota as 403 with remaining = 0
      if (status === 429 || rateLimit.remaining === 0) {
        return rateLimited(rateLimit);
      }
      return forbidden(resource);
    case 404:
      return new CLIError("API_NOT_FOUND", resource ? `Not found: ${resource}` : "Resource not found");
    default:
      if (status >= 500) {
        return serverError(`HTTP ${status}`);
      }
      return new CLIError("API_REQUEST_FAILED", `Request failed with HTTP ${status}`, {
        details: resource,
      });
  }
}

function fromRequestFailure(failure: RequestFailure): CLIError {
  switch (failure.kind) {
    case "http":
      return fromHttpStatus(failure.status, failure.rateLimit, failure.url);
    case "decode":
      return badResponse(failure.message);
    case "transport":
      return failure.timedOut ? networkTimeout() : networkOffline(failure.message);
  }
}

function fromListError(error: ListError, username?: string): CLIError {
  const { detail } = error;
  switch (detail.kind) {
    case "http":
      if (detail.status === 404 && username) return accountNotFound(username);
      return fromHttpStatus(detail.status, detail.rateLimit, `page ${detail.page}`);
    case "decode":
      return badResponse(error.message);
    case "transport":
      return detail.timedOut ? networkTimeout() : networkOffline(error.message);
  }
}

/**
 * Map any error raised by the core or config layer to a CLIError.
 */
export function toCLIError(error: unknown, context: { username?: string } = {}): CLIError {
  if (error instanceof CLIError) return error;
  if (error instanceof ListError) return fromListError(error, context.username);
  if (error instanceof SchedulerError) return invalidConcurrency(error.detail.value);
  if (error instanceof ApiRequestError) return fromRequestFailure(error.failure);
  if (error instanceof ConfigError) {
    return invalidConfig(error.path, error.issues.length > 0 ? error.issues : [error.message]);
  }
  return unknownError(error);
}
