/**
 * Global CLI context for shared options and state.
 * Filled from argv and the environment before commander runs.
 */

import { isLogLevel, type LogLevel } from "./logger.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Per-request timeout in milliseconds, when overridden */
  timeout?: number;
  /** Explicit config file (--config) */
  configPath?: string;
  /** Log level override (--log-level / --verbose) */
  logLevel?: LogLevel;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function flagValue(argv: string[], ...names: string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    for (const name of names) {
      if (arg === name && i + 1 < argv.length) return argv[i + 1];
      if (arg.startsWith(`${name}=`)) return arg.slice(name.length + 1);
    }
  }
  return undefined;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthy(env.LOCAL_GIST_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthy(env.LOCAL_GIST_QUIET)) {
    currentContext.quiet = true;
  }

  currentContext.timeout =
    parsePositiveInt(flagValue(argv, "--timeout")) ?? parsePositiveInt(env.LOCAL_GIST_TIMEOUT);

  currentContext.configPath = flagValue(argv, "--config");

  const level = flagValue(argv, "--log-level");
  if (level !== undefined && isLogLevel(level)) {
    currentContext.logLevel = level;
  } else if (argv.includes("--verbose") || argv.includes("-v")) {
    currentContext.logLevel = "debug";
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
