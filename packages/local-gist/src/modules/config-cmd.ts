import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { getContext } from "../lib/cli-context.js";
import { maybeOutputJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# local-gist configuration
# Place at ~/.config/local-gist/config.yaml (user) or /etc/local-gist/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/local-gist/config.yaml)
# 3. System config (/etc/local-gist/config.yaml)
# 4. Built-in defaults

github:
  # REST API root; change for GitHub Enterprise Server
  baseUrl: "https://api.github.com"

  # Per-request timeout (ms)
  timeoutMs: 30000

list:
  # Maximum number of gists to list or download; null for no limit
  limit: 10

  # Gists per API request (1-100). Defaults to the limit.
  # pageSize: 100

download:
  # Destination directory; each gist lands in <folder>/<gist id>/
  folder: "gists"

  # Gists downloaded at the same time (1-64)
  concurrency: 4

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON logs on stderr
  json: false
`;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage local-gist configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/local-gist/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate [path]")
    .description("Validate configuration file(s)")
    .action((path: string | undefined) => {
      const explicit = path ?? getContext().configPath;
      const pathsToCheck = explicit ? [explicit] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const candidate of pathsToCheck) {
        if (!existsSync(candidate)) {
          if (explicit) {
            console.error(chalk.red(`File not found: ${candidate}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${candidate}...`));

        try {
          loadConfigFile(candidate);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${errorMessage(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !explicit) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'local-gist config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig(getContext().configPath);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${errorMessage(error)}`));
        process.exitCode = 1;
        return;
      }

      const { config: resolved, sources } = loaded;
      if (maybeOutputJson({ config: resolved, sources })) return;

      console.log(chalk.cyan("Effective Configuration:"));
      console.log(chalk.gray("─".repeat(40)));

      if (sources.length > 0) {
        console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
      } else {
        console.log(chalk.gray("Sources: (defaults only)"));
      }

      console.log();
      console.log(chalk.bold("GitHub:"));
      console.log(`  baseUrl:        ${resolved.baseUrl}`);
      console.log(`  timeoutMs:      ${resolved.timeoutMs}`);

      console.log();
      console.log(chalk.bold("List:"));
      console.log(`  limit:          ${resolved.limit ?? "none"}`);
      console.log(`  pageSize:       ${resolved.pageSize ?? "auto"}`);

      console.log();
      console.log(chalk.bold("Download:"));
      console.log(`  folder:         ${resolved.folder}`);
      console.log(`  concurrency:    ${resolved.concurrency}`);

      console.log();
      console.log(chalk.bold("Logging:"));
      console.log(`  level:          ${resolved.logLevel}`);
      console.log(`  json:           ${resolved.logJson}`);
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
