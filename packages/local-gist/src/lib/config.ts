import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./github-client.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/local-gist/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "local-gist",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  baseUrl: DEFAULT_BASE_URL,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  limit: 10,
  folder: "gists",
  concurrency: 4,
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const GitHubSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().min(1000).max(600000).optional(),
});

const ListSchema = z.object({
  // null lifts the limit entirely
  limit: z.number().int().min(0).nullable().optional(),
  pageSize: z.number().int().min(1).optional(),
});

const DownloadSchema = z.object({
  folder: z.string().min(1).optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  github: GitHubSchema.optional(),
  list: ListSchema.optional(),
  download: DownloadSchema.optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  baseUrl: string;
  timeoutMs: number;
  /** undefined means "no limit" */
  limit: number | undefined;
  /** undefined means "derive from the limit" */
  pageSize: number | undefined;
  folder: string;
  concurrency: number;
  logLevel: LogLevel;
  logJson: boolean;
}

export class ConfigError extends Error {
  readonly path: string;
  readonly issues: string[];

  constructor(path: string, message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.path = path;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws `ConfigError` if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(
      path,
      `Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      path,
      `Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(
      path,
      `Config validation failed for ${path}:\n${issues.map((i) => `  - ${i}`).join("\n")}`,
      issues
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.github?.baseUrl !== undefined) {
    target.baseUrl = source.github.baseUrl;
  }
  if (source.github?.timeoutMs !== undefined) {
    target.timeoutMs = source.github.timeoutMs;
  }
  if (source.list?.limit !== undefined) {
    target.limit = source.list.limit ?? undefined;
  }
  if (source.list?.pageSize !== undefined) {
    target.pageSize = source.list.pageSize;
  }
  if (source.download?.folder !== undefined) {
    target.folder = source.download.folder;
  }
  if (source.download?.concurrency !== undefined) {
    target.concurrency = source.download.concurrency;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(obj) as Array<keyof T>) {
    if (obj[key] !== undefined) result[key] = obj[key];
  }
  return result;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = {
    baseUrl: CONFIG_DEFAULTS.baseUrl,
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    limit: CONFIG_DEFAULTS.limit,
    pageSize: undefined,
    folder: CONFIG_DEFAULTS.folder,
    concurrency: CONFIG_DEFAULTS.concurrency,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  // Apply system config (lowest precedence after defaults)
  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  // Apply user config (higher precedence)
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  // Apply CLI options (highest precedence)
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw new ConfigError(explicitPath, `Config file not found: ${explicitPath}`);
    }
    sources.push(explicitPath);
  } else {
    // Normal precedence: system, then user
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
