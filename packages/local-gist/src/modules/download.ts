import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import type { RuntimeFactory } from "../lib/runtime.js";
import { listGists } from "../lib/lister.js";
import { downloadAll, validateConcurrency, type DownloadReport } from "../lib/scheduler.js";
import { countFiles, type GistSummary } from "../lib/gist.js";
import { combineObservers, createLoggingObserver } from "../lib/adapters/logging-observer.js";
import type { FileStore } from "../lib/ports/file-store.js";
import { createSpinner, progressText } from "../lib/spinner.js";
import { integerOption, effectiveLimit } from "../lib/cli-options.js";
import { describeFailure } from "../lib/errors/core.js";
import { maybeOutputJson, type DownloadResultJson } from "../lib/json-output.js";
import { toCLIError } from "../lib/errors/catalog.js";

export interface DownloadCommandOptions {
  username: string;
  folder?: string;
  concurrency?: number;
  limit?: number;
  all?: boolean;
  pageSize?: number;
}

export function registerDownloadCommand(
  program: Command,
  runtime: RuntimeFactory,
  store?: FileStore
): void {
  program
    .command("download")
    .description("Download the gists of a GitHub account into a folder")
    .requiredOption("-u, --username <username>", "GitHub username")
    .option("-f, --folder <dir>", "Directory to save gists (default: gists)")
    // Range checked by validateConcurrency, same as the configured value
    .option("-c, --concurrency <n>", "Gists downloaded at the same time (default: 4)", integerOption())
    .option("-l, --limit <n>", "Maximum number of gists to download (default: 10)", integerOption(0))
    .option("-a, --all", "Download every gist, ignoring the configured limit")
    .option("--page-size <n>", "Gists per listing request (1-100)", integerOption(1))
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Layout:")}
  <folder>/<gist id>/<file name>   ${chalk.gray("existing files are overwritten")}

${chalk.bold.cyan("Examples:")}
  local-gist download -u octocat                  ${chalk.gray("First 10 gists into ./gists")}
  local-gist download -u octocat --all -c 8       ${chalk.gray("Everything, 8 at a time")}
`
    )
    .action((options: DownloadCommandOptions) => runDownload(runtime, options, store));
}

function printSummary(report: DownloadReport, listed: number, destination: string): void {
  const downloaded = chalk.green(`${report.downloadedCount} of ${listed} gists`);
  console.log(`Downloaded ${downloaded} (${report.filesWritten} files) to ${destination}`);

  if (report.failures.length > 0) {
    console.log();
    console.log(chalk.red(`Failed (${report.failures.length}):`));
    for (const failure of report.failures) {
      console.log(`  ${chalk.red("✗")} ${failure.gistId}  ${chalk.gray(describeFailure(failure.cause))}`);
    }
  }
}

export async function runDownload(
  runtime: RuntimeFactory,
  options: DownloadCommandOptions,
  store?: FileStore
): Promise<void> {
  const { config, client, logger } = runtime();

  let concurrency: number;
  try {
    concurrency = validateConcurrency(options.concurrency ?? config.concurrency);
  } catch (error) {
    throw toCLIError(error);
  }

  const destination = resolve(options.folder ?? config.folder);
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

  logger.info("Found gists", { count: gists.length, files: countFiles(gists) });

  let done = 0;
  spinner.text = progressText("Downloading gists", done, gists.length);
  const progress = {
    onRecordResult() {
      done++;
      spinner.text = progressText("Downloading gists", done, gists.length);
    },
  };

  const report = await downloadAll(gists, {
    concurrency,
    destination,
    client,
    store,
    observer: combineObservers(createLoggingObserver(logger.child({ component: "scheduler" })), progress),
    logger,
  });

  if (report.failedIds.size > 0) {
    spinner.warn(`Downloaded ${report.downloadedCount} of ${gists.length} gists`);
    process.exitCode = 1;
  } else {
    spinner.succeed(`Downloaded ${report.downloadedCount} gists`);
  }

  const payload: DownloadResultJson = {
    username: options.username,
    destination,
    summary: {
      listed: gists.length,
      downloaded: report.downloadedCount,
      failed: report.failedIds.size,
      filesWritten: report.filesWritten,
    },
    failures: report.failures.map((f) => ({
      id: f.gistId,
      cause: f.cause.kind,
      message: describeFailure(f.cause),
      filesWritten: f.filesWritten,
    })),
  };
  if (maybeOutputJson(payload, { duration: report.durationMs })) return;

  printSummary(report, gists.length, destination);
}
