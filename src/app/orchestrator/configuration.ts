import {
  CONFIG_FILE_NAME,
  parseConfiguration,
  type Configuration,
} from "../../bridge/config-store.js";
import { BridgeError } from "../../core/errors.js";

import type { DistributedVcs } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedConfiguration = {
  ref: string;
  configuration: Configuration;
};

// =============================================================================
// CONFIG BRANCH
// =============================================================================

/**
 * Local branch first, then a single remote-tracking branch of the same name
 * (a fresh clone only has origin/<branch>).
 */
export async function resolveConfigBranch(
  git: DistributedVcs,
  configBranch: string,
): Promise<string> {
  const local = `refs/heads/${configBranch}`;
  if ((await git.resolveCommit(local)) !== null) return local;

  const remotes = (await git.listRefs("refs/remotes")).filter((ref) =>
    ref.endsWith(`/${configBranch}`),
  );
  if (remotes.length === 1) return remotes[0];
  if (remotes.length > 1) {
    throw new BridgeError(
      "AmbiguousReference",
      `Config branch ${configBranch} exists on several remotes: ${remotes.join(", ")}.`,
    );
  }

  throw new BridgeError(
    "NotABridgeRepository",
    `No ${configBranch} branch in ${git.worktree}; run svnlink init or svnlink clone first.`,
  );
}

export async function loadConfiguration(
  git: DistributedVcs,
  configBranch: string,
): Promise<LoadedConfiguration> {
  const ref = await resolveConfigBranch(git, configBranch);
  const text = await git.readBranchFile(ref, CONFIG_FILE_NAME);
  if (text === null) {
    throw new BridgeError(
      "MalformedConfig",
      `Malformed bridge configuration: ${ref} has no ${CONFIG_FILE_NAME} file`,
    );
  }

  return { ref, configuration: parseConfiguration(text) };
}
