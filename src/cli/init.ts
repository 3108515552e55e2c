import path from "node:path";

import { runInit } from "../app/orchestrator/init-orchestrator.js";

import {
  printWarnings,
  settingsOverridesFromGlobals,
  type CliEnvironment,
  type GlobalCliOptions,
} from "./environment.js";

type InitCommandOptions = {
  url: string;
  mappings: string[];
  directory?: string;
  revision?: number;
};

export async function initCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
  opts: InitCommandOptions,
): Promise<void> {
  const worktree = path.resolve(env.cwd, opts.directory ?? ".");

  const result = await runInit({
    worktree,
    ports: env.factory.forWorktree(worktree),
    url: opts.url,
    mappings: opts.mappings,
    startRevision: opts.revision,
    overrides: settingsOverridesFromGlobals(globals),
  });

  console.log(
    result.configChanged
      ? `Wrote svnlink configuration (${result.configCommit.slice(0, 12)}).`
      : "svnlink configuration unchanged.",
  );
  const { marker } = result.switch;
  console.log(`Checked out ${result.switch.reference} at ${marker.url}@${marker.revision}.`);
  printWarnings(result.switch.warnings);
}
