import { collectStatus, formatStatus } from "../app/orchestrator/status.js";

import { withWorktreeContext, type CliEnvironment, type GlobalCliOptions } from "./environment.js";

export async function statusCommand(env: CliEnvironment, globals: GlobalCliOptions): Promise<void> {
  const report = await withWorktreeContext(env, globals, null, (ctx) => collectStatus(ctx));
  for (const line of formatStatus(report)) {
    console.log(line);
  }
}
