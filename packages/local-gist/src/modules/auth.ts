import { Command } from "commander";
import prompts from "prompts";
import chalk from "chalk";
import { z } from "zod";
import type { RuntimeFactory } from "../lib/runtime.js";
import type { TokenStore } from "../lib/token-store.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { missingArgument, toCLIError, tokenRequired } from "../lib/errors/catalog.js";

export interface LoginOptions {
  token?: string;
  nonInteractive?: boolean;
}

export interface AuthStatusJson {
  source: "env" | "store" | "none";
  savedAt: string | null;
  login: string | null;
}

const UserSchema = z.object({ login: z.string() });

export function registerAuthCommands(
  program: Command,
  store: TokenStore,
  runtime: RuntimeFactory
): void {
  const auth = program.command("auth").description("Manage the GitHub token used for requests");

  auth
    .command("login")
    .description("Store a personal access token for future requests")
    .option("-t, --token <token>", "Personal access token")
    .option("--non-interactive", "Fail instead of prompting for input", false)
    .action(async (options: LoginOptions) => {
      const token = await resolveToken(options);
      store.setToken(token);
      if (maybeOutputJson({ stored: true })) return;
      console.log(chalk.green("Token saved locally."));
    });

  auth
    .command("logout")
    .description("Remove the locally stored token")
    .action(() => {
      store.clear();
      if (maybeOutputJson({ stored: false })) return;
      console.log(chalk.green("Signed out locally."));
    });

  auth
    .command("status")
    .description("Show which token is used and the account it belongs to")
    .option("--offline", "Do not ask GitHub who the token belongs to")
    .action((options: { offline?: boolean }) => runStatus(store, runtime, options));
}

export async function resolveToken(options: LoginOptions): Promise<string> {
  if (options.token) return options.token;
  if (options.nonInteractive) {
    throw tokenRequired();
  }

  const { token } = await prompts({
    type: "password",
    name: "token",
    message: "Paste your GitHub personal access token",
  });

  if (typeof token !== "string" || !token.trim()) {
    throw missingArgument("a token", "auth login");
  }

  return token;
}

export async function runStatus(
  store: TokenStore,
  runtime: RuntimeFactory,
  options: { offline?: boolean }
): Promise<void> {
  const { client, tokenSource } = runtime();
  const { savedAt } = store.getCredentials();

  let login: string | null = null;
  if (tokenSource !== "none" && !options.offline) {
    const spinner = createSpinner("Checking token").start();
    try {
      const { data } = await client.getJson("/user");
      const parsed = UserSchema.safeParse(data);
      login = parsed.success ? parsed.data.login : null;
      spinner.stop();
    } catch (error) {
      spinner.fail("Token check failed");
      throw toCLIError(error);
    }
  }

  const payload: AuthStatusJson = {
    source: tokenSource,
    savedAt: tokenSource === "store" ? savedAt ?? null : null,
    login,
  };
  if (maybeOutputJson(payload)) return;

  if (tokenSource === "none") {
    console.log(chalk.yellow("No token configured. Requests are unauthenticated."));
    return;
  }

  const origin = tokenSource === "env" ? "GITHUB_TOKEN" : "stored token";
  console.log(`Using ${chalk.cyan(origin)}${payload.savedAt ? chalk.gray(` (saved ${payload.savedAt})`) : ""}`);
  if (login) console.log(`Signed in as ${chalk.cyan(login)}`);
}
