#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { BRIDGE_EXIT_CODES } from "./core/errors.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

// Subcommands copy these settings when created, so apply them to each one too.
function configureCliErrorHandling(program: Command): void {
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      outputError: (_message: string, _write: (chunk: string) => void) => undefined,
    });
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(program: Command): boolean {
  return program.opts<{ debug?: boolean }>().debug ?? false;
}

function resolveExitCode(error: unknown): number {
  // Usage errors (unknown option, missing argument) share the invalid-arguments status.
  if (error instanceof CommanderError && !isHelpOrVersionExit(error)) {
    return BRIDGE_EXIT_CODES.InvalidArguments;
  }

  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[], program: Command = buildCli()): Promise<void> {
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

// npm installs the bin as a symlink, so compare against the resolved path.
function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}
