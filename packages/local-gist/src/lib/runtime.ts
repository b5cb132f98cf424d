import { createGitHubClient, type FetchLike, type GitHubClient } from "./github-client.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { resolveToken, type TokenSource, type TokenStore } from "./token-store.js";
import type { CLIContext } from "./cli-context.js";

/**
 * Everything a command needs, built once per invocation.
 */
export interface Runtime {
  config: ResolvedConfig;
  configSources: string[];
  logger: Logger;
  client: GitHubClient;
  tokenSource: TokenSource;
}

export type RuntimeFactory = () => Runtime;

export interface RuntimeDeps {
  tokenStore: Pick<TokenStore, "getCredentials">;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
}

export function createRuntime(context: CLIContext, deps: RuntimeDeps): Runtime {
  const { config, sources } = loadConfig(context.configPath, {
    timeoutMs: context.timeout,
    logLevel: context.logLevel,
  });

  const logger = createLogger({ level: config.logLevel, json: config.logJson });
  const { token, source } = resolveToken(deps.tokenStore, deps.env);

  logger.debug("Configuration loaded", {
    sources,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    tokenSource: source,
  });

  const client = createGitHubClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    token,
    fetchImpl: deps.fetchImpl,
  });

  return { config, configSources: sources, logger, client, tokenSource: source };
}
