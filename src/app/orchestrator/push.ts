import { parseRemap } from "../../core/settings.js";
import { logBridgeEvent } from "../../core/logger.js";

import { resolveConfigBranch } from "./configuration.js";
import type { BridgeContext } from "./context.js";

export type PushOptions = {
  remote: string;
  force?: boolean;
};

export type PushResult = {
  remote: string;
  refspecs: string[];
};

/**
 * Publish the config branch and every git-svn tracking ref so `svnlink clone`
 * can restore them. Tracking refs are renamed through the `remap` setting.
 */
export async function runPush(ctx: BridgeContext, opts: PushOptions): Promise<PushResult> {
  const { git } = ctx.ports;
  const configRef = await resolveConfigBranch(git, ctx.settings.config_branch);
  const { from, to } = parseRemap(ctx.settings.remap);

  const refspecs = [
    `${configRef}:refs/heads/${ctx.settings.config_branch}`,
    `refs/remotes/${from}*:refs/heads/${to}*`,
  ];
  await git.push(opts.remote, refspecs, { force: opts.force ?? false });

  logBridgeEvent(ctx.logger, "push.completed", {
    payload: { remote: opts.remote, refspecs, force: opts.force ?? false },
  });

  return { remote: opts.remote, refspecs };
}
