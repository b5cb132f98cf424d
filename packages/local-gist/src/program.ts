import { Command, Option } from "commander";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { LOG_LEVEL_NAMES } from "./lib/logger.js";
import { integerOption } from "./lib/cli-options.js";
import type { RuntimeFactory } from "./lib/runtime.js";
import type { TokenStore } from "./lib/token-store.js";
import type { FileStore } from "./lib/ports/file-store.js";
import { registerListCommand } from "./modules/list.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerRateLimitCommand } from "./modules/rate-limit.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export interface ProgramDeps {
  tokenStore: TokenStore;
  fileStore?: FileStore;
}

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(fileURLToPath(new URL("../package.json", import.meta.url)), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

/**
 * Build the command tree. Global flags are also read by `initContext`
 * before parsing; declaring them here keeps commander from rejecting them.
 * Parse errors throw `CommanderError` instead of exiting.
 */
export function createProgram(runtime: RuntimeFactory, deps: ProgramDeps): Command {
  const program = new Command()
    .name("local-gist")
    .description("List and download the public gists of a GitHub account")
    .version(readVersion())
    .option("--json", "Machine-readable JSON output on stdout")
    .option("-q, --quiet", "No spinners or progress output")
    .option("--config <path>", "Use this config file instead of the default locations")
    .addOption(new Option("--log-level <level>", "Log verbosity on stderr").choices(LOG_LEVEL_NAMES))
    .option("-v, --verbose", "Same as --log-level debug")
    .option("--timeout <ms>", "Per-request timeout in milliseconds", integerOption(1))
    .exitOverride();

  registerListCommand(program, runtime);
  registerDownloadCommand(program, runtime, deps.fileStore);
  registerRateLimitCommand(program, runtime);
  registerAuthCommands(program, deps.tokenStore, runtime);
  registerConfigCommands(program);

  return program;
}
