/*
Purpose: shared plumbing for bridge commands (worktree discovery, context, lock).
Assumptions: every command except init and clone runs inside an existing worktree.
Usage: await withWorktreeContext(env, globals, "switch", (ctx) => runSwitch(ctx, opts)).
*/

import { InvalidArgumentError } from "commander";

import {
  closeBridgeContext,
  createBridgeContext,
  type BridgeContext,
} from "../app/orchestrator/context.js";
import type { PortsFactory } from "../app/orchestrator/ports.js";
import { createPortsFactory } from "../app/orchestrator/vcs/bridge-ports.js";
import { BridgeError } from "../core/errors.js";
import { withBridgeLock } from "../core/lock.js";
import type { BridgeSettingsOverrides } from "../core/settings.js";
import { resolveRepositoryRoot } from "../git/git.js";

import { renderCliWarning } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliEnvironment = {
  cwd: string;
  factory: PortsFactory;
  findWorktree: (cwd: string) => Promise<string | null>;
};

export type GlobalCliOptions = {
  configBranch?: string;
  debug?: boolean;
};

// =============================================================================
// ENVIRONMENT
// =============================================================================

export function defaultCliEnvironment(cwd: string = process.cwd()): CliEnvironment {
  return {
    cwd,
    factory: createPortsFactory(cwd),
    findWorktree: resolveRepositoryRoot,
  };
}

export function settingsOverridesFromGlobals(globals: GlobalCliOptions): BridgeSettingsOverrides {
  return { config_branch: globals.configBranch };
}

export async function requireWorktree(env: CliEnvironment): Promise<string> {
  const worktree = await env.findWorktree(env.cwd);
  if (worktree === null) {
    throw new BridgeError("NotInRepository", `${env.cwd} is not inside a git worktree.`);
  }
  return worktree;
}

/**
 * Build a context for the enclosing worktree and run `fn` with it. A non-null
 * `operation` takes the bridge lock for the duration.
 */
export async function withWorktreeContext<T>(
  env: CliEnvironment,
  globals: GlobalCliOptions,
  operation: string | null,
  fn: (ctx: BridgeContext) => Promise<T>,
): Promise<T> {
  const worktree = await requireWorktree(env);
  const ctx = createBridgeContext({
    worktree,
    ports: env.factory.forWorktree(worktree),
    overrides: settingsOverridesFromGlobals(globals),
  });

  try {
    if (operation === null) return await fn(ctx);
    return await withBridgeLock(ctx.paths, operation, () => fn(ctx));
  } finally {
    closeBridgeContext(ctx);
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

export function printWarnings(warnings: string[]): void {
  for (const warning of warnings) {
    console.warn(renderCliWarning(warning));
  }
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parseRevisionArg(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative Subversion revision number.");
  }
  return Number.parseInt(value, 10);
}

export function parseRemapArg(value: string): string {
  if (!/^[^:]*:[^:]*$/.test(value)) {
    throw new InvalidArgumentError('Expected "<from>:<to>", e.g. "git-svn/:".');
  }
  return value;
}
