import {
  resyncHead,
  runSwitch,
  type SwitchResult,
} from "../app/orchestrator/switch-orchestrator.js";

import {
  printWarnings,
  withWorktreeContext,
  type CliEnvironment,
  type GlobalCliOptions,
} from "./environment.js";

export async function switchCommand(
  env: CliEnvironment,
  globals: GlobalCliOptions,
  opts: { reference: string; force: boolean },
): Promise<void> {
  const result = await withWorktreeContext(env, globals, "switch", (ctx) =>
    runSwitch(ctx, { reference: opts.reference, force: opts.force }),
  );
  report(`Switched to ${opts.reference}`, result);
}

export async function updateCommand(env: CliEnvironment, globals: GlobalCliOptions): Promise<void> {
  const result = await withWorktreeContext(env, globals, "update", (ctx) => resyncHead(ctx));
  report("Relinked .svn for HEAD", result);
}

function report(headline: string, result: SwitchResult): void {
  if (result.repaired) {
    console.log("Repaired .svn left behind by an interrupted switch.");
  }
  console.log(`${headline} (${result.marker.url}@${result.marker.revision}).`);
  printWarnings(result.warnings);
}
