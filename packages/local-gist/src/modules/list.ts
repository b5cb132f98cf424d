import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { RuntimeFactory } from "../lib/runtime.js";
import { listGists } from "../lib/lister.js";
import { createLoggingObserver } from "../lib/adapters/logging-observer.js";
import { formatGistLine, type GistSummary } from "../lib/gist.js";
import { createSpinner } from "../lib/spinner.js";
import { integerOption, effectiveLimit } from "../lib/cli-options.js";
import { maybeOutputJson, type GistJson, type ListResultJson } from "../lib/json-output.js";
import { toCLIError } from "../lib/errors/catalog.js";

export interface ListCommandOptions {
  username: string;
  limit?: number;
  all?: boolean;
  pageSize?: number;
  plain?: boolean;
}

export function registerListCommand(program: Command, runtime: RuntimeFactory): void {
  program
    .command("list")
    .description("List the gists of a GitHub account")
    .requiredOption("-u, --username <username>", "GitHub username")
    .option("-l, --limit <n>", "Maximum number of gists to list", integerOption(0))
    .option("-a, --all", "List every gist, ignoring the configured limit")
    .option("--page-size <n>", "Gists per API request (1-100)", integerOption(1))
    .option("--plain", "One line per gist instead of a table")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  local-gist list -u octocat              ${chalk.gray("First 10 gists as a table")}
  local-gist list -u octocat --all        ${chalk.gray("Every gist")}
  local-gist list -u octocat --json       ${chalk.gray("Machine-readable output")}
`
    )
    .action((options: ListCommandOptions) => runList(runtime, options));
}

export function toGistJson(gist: GistSummary): GistJson {
  return {
    id: gist.id,
    description: gist.description,
    public: gist.public,
    createdAt: gist.createdAt,
    updatedAt: gist.updatedAt,
    url: gist.htmlUrl,
    files: gist.files.map((f) => ({ name: f.name, size: f.size, language: f.language })),
  };
}

function renderTable(gists: GistSummary[]): string {
  const table = new CliTable3({
    head: ["ID", "Description", "Files", "Updated"],
    style: { head: [], border: [] },
    wordWrap: true,
    colWidths: [36, 40, 30, 12],
  });

  for (const gist of gists) {
    table.push([
      gist.id,
      gist.description || chalk.gray("<no description>"),
      gist.files.map((f) => f.name).join(", "),
      gist.updatedAt.slice(0, 10),
    ]);
  }

  return table.toString();
}

export async function runList(runtime: RuntimeFactory, options: ListCommandOptions): Promise<void> {
  const { config, client, logger } = runtime();
  const limit = effectiveLimit(options, config.limit);
  const spinner = createSpinner(`Listing gists of ${options.username}`).start();

  let gists: GistSummary[];
  try {
    gists = await listGists(client, {
      username: options.username,
      limit,
      pageSize: options.pageSize ?? config.pageSize,
      observer: createLoggingObserver(logger.child({ component: "lister" })),
      logger,
    });
  } catch (error) {
    spinner.fail("Listing failed");
    throw toCLIError(error, { username: options.username });
  }
  spinner.stop();

  const payload: ListResultJson = {
    username: options.username,
    count: gists.length,
    gists: gists.map(toGistJson),
  };
  if (maybeOutputJson(payload)) return;

  if (gists.length === 0) {
    console.log(chalk.yellow(`${options.username} has no public gists.`));
    return;
  }

  if (options.plain) {
    for (const gist of gists) console.log(formatGistLine(gist));
  } else {
    console.log(renderTable(gists));
  }
  console.log(chalk.gray(`${gists.length} gist${gists.length === 1 ? "" : "s"}`));
}
