import { Command } from "commander";
import chalk from "chalk";
import { z } from "zod";
import type { RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, type RateLimitJson } from "../lib/json-output.js";
import { badResponse, toCLIError } from "../lib/errors/catalog.js";

const RateLimitResponseSchema = z.object({
  resources: z.object({
    core: z.object({
      limit: z.number().int(),
      remaining: z.number().int(),
      used: z.number().int(),
      /** Epoch seconds */
      reset: z.number().int(),
    }),
  }),
});

export function registerRateLimitCommand(program: Command, runtime: RuntimeFactory): void {
  program
    .command("rate-limit")
    .description("Show how many GitHub API requests are left this hour")
    .action(() => runRateLimit(runtime));
}

export async function runRateLimit(runtime: RuntimeFactory): Promise<void> {
  const { client, tokenSource } = runtime();
  const spinner = createSpinner("Checking rate limit").start();

  let data: unknown;
  try {
    ({ data } = await client.getJson("/rate_limit"));
  } catch (error) {
    spinner.fail("Unable to read the rate limit");
    throw toCLIError(error);
  }
  spinner.stop();

  const parsed = RateLimitResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw badResponse(parsed.error.issues[0]?.message);
  }

  const core = parsed.data.resources.core;
  const payload: RateLimitJson = {
    limit: core.limit,
    remaining: core.remaining,
    used: core.used,
    resetAt: new Date(core.reset * 1000).toISOString(),
  };
  if (maybeOutputJson(payload)) return;

  const color = core.remaining === 0 ? chalk.red : core.remaining < core.limit / 10 ? chalk.yellow : chalk.green;
  console.log(`Remaining: ${color(`${core.remaining} / ${core.limit}`)}`);
  console.log(`Resets at: ${payload.resetAt}`);
  console.log(
    chalk.gray(tokenSource === "none" ? "Unauthenticated (run `local-gist auth login` for a higher limit)" : `Authenticated via ${tokenSource === "env" ? "GITHUB_TOKEN" : "stored token"}`)
  );
}
