import { runPush } from "../app/orchestrator/push.js";

import { withWorktreeContext, type CliEnvironment, type GlobalCliOptions } from "./environment.js";

export async function pushCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
  opts: { remote: string; force: boolean },
): Promise<void> {
  const result = await withWorktreeContext(env, globals, "push", (ctx) => runPush(ctx, opts));
  console.log(`Pushed ${result.refspecs.join(" ")} to ${result.remote}.`);
}
