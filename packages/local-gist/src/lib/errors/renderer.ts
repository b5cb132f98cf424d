import chalk from "chalk";
import { CLIError } from "./types.js";
import { toCLIError } from "./catalog.js";
import { isJsonMode } from "../cli-context.js";
import { outputError } from "../json-output.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Build the lines of an error in static mode.
 */
export function formatStaticError(error: CLIError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion || error.example) {
    output.push("");
    if (error.suggestion) {
      output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
    }
    if (error.example) {
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
    }
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr, as JSON in JSON mode.
 */
export function renderError(error: CLIError, json: boolean = isJsonMode()): void {
  if (json) {
    outputError(error);
    return;
  }
  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(
  error: unknown,
  context: { username?: string } = {},
  json: boolean = isJsonMode()
): void {
  renderError(toCLIError(error, context), json);
}
