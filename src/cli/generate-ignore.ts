import { generateIgnore } from "../app/orchestrator/ignore.js";

import { withWorktreeContext, type CliEnvironment, type GlobalCliOptions } from "./environment.js";

// Printed to stdout so it can be redirected into .gitignore.
export async function generateIgnoreCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
): Promise<void> {
  const patterns = await withWorktreeContext(env, globals, null, (ctx) => generateIgnore(ctx));
  for (const pattern of patterns) {
    console.log(pattern);
  }
}
