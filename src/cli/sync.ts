import { configure } from "../app/orchestrator/configure.js";
import { sync } from "../app/orchestrator/sync-engine.js";

import { withWorktreeContext, type CliEnvironment, type GlobalCliOptions } from "./environment.js";

export async function syncCommand(env: CliEnvironment, globals: GlobalCliOptions): Promise<void> {
  const result = await withWorktreeContext(env, globals, "sync", (ctx) => sync(ctx));

  if (result.fetched.length === 0) {
    console.log("Every mapped branch is already fetched.");
    return;
  }
  for (const remote of result.remotes) {
    console.log(`Fetched ${remote.remote}: ${remote.missing.join(", ")}`);
  }
}

export async function configureCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
): Promise<void> {
  const result = await withWorktreeContext(env, globals, "configure", (ctx) => configure(ctx));
  console.log(`Configured svn-remote ${result.remotes.join(", ")}.`);
  if (result.excludeUpdated) {
    console.log("Added .svn to .git/info/exclude.");
  }
}
