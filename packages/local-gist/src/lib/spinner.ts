/**
 * Spinner that respects quiet/JSON mode.
 */

import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  text: string;
}

function createSilentSpinner(): Spinner {
  const spinner: Spinner = {
    text: "",
    start: () => spinner,
    stop: () => spinner,
    succeed: () => spinner,
    fail: () => spinner,
    warn: () => spinner,
  };
  return spinner;
}

/**
 * Create a spinner on stderr, or a silent one in quiet/JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return createSilentSpinner();
  }
  return ora({ text, stream: process.stderr });
}

/**
 * Progress text for a batch, e.g. `Downloading gists 3/10`.
 */
export function progressText(label: string, done: number, total: number): string {
  return `${label} ${done}/${total}`;
}
