#!/usr/bin/env node
import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import { initContext } from "./lib/cli-context.js";
import { createRuntime, type Runtime } from "./lib/runtime.js";
import { ConfTokenStore } from "./lib/token-store.js";
import { renderUnknownError } from "./lib/errors/renderer.js";

export async function main(argv = process.argv): Promise<void> {
  const context = initContext(argv);
  const tokenStore = new ConfTokenStore();

  // Config and token are only read by commands that talk to GitHub
  let runtime: Runtime | undefined;
  const runtimeFactory = (): Runtime => {
    runtime ??= createRuntime(context, { tokenStore });
    return runtime;
  };

  const program = createProgram(runtimeFactory, { tokenStore });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed usage or help
      process.exitCode = error.exitCode;
      return;
    }
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
