/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Authentication errors
  | "AUTH_INVALID_TOKEN"
  | "AUTH_TOKEN_REQUIRED"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // API errors
  | "API_RATE_LIMITED"
  | "API_FORBIDDEN"
  | "API_NOT_FOUND"
  | "API_SERVER_ERROR"
  | "API_BAD_RESPONSE"
  | "API_REQUEST_FAILED"
  // Network errors
  | "NETWORK_OFFLINE"
  | "NETWORK_TIMEOUT"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
