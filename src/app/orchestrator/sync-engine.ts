/**
 * Sync engine.
 * Purpose: make sure every mapped branch has git-svn fetch configuration and history.
 * Assumptions: a mapping whose tracking ref exists is already configured and fetched.
 * Usage: await sync(ctx) after someone adds a mapping to the config branch.
 */

import { listRemotes, type BridgeRemote, type FetchMapping } from "../../bridge/config-store.js";
import { logBridgeEvent } from "../../core/logger.js";

import { loadConfiguration } from "./configuration.js";
import type { BridgeContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncRemoteResult = {
  remote: string;
  missing: string[];
  configChanges: number;
};

export type SyncResult = {
  remotes: SyncRemoteResult[];
  configChanges: number;
  fetched: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function sync(ctx: BridgeContext): Promise<SyncResult> {
  const { git } = ctx.ports;
  const { configuration } = await loadConfiguration(git, ctx.settings.config_branch);

  const remotes: SyncRemoteResult[] = [];
  const fetched: string[] = [];

  for (const remote of listRemotes(configuration)) {
    const missing = await missingMappings(ctx, remote);
    if (missing.length === 0) continue;

    const configChanges = await ensureFetchConfig(ctx, remote, missing);
    logBridgeEvent(ctx.logger, "sync.configure", {
      payload: {
        remote: remote.name,
        missing: missing.map((mapping) => mapping.branchRef),
        config_changes: configChanges,
      },
    });

    await git.svnFetch({ remote: remote.name });
    logBridgeEvent(ctx.logger, "sync.fetch", { payload: { remote: remote.name } });

    fetched.push(remote.name);
    remotes.push({
      remote: remote.name,
      missing: missing.map((mapping) => mapping.branchRef),
      configChanges,
    });
  }

  return {
    remotes,
    configChanges: remotes.reduce((total, entry) => total + entry.configChanges, 0),
    fetched,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function missingMappings(ctx: BridgeContext, remote: BridgeRemote): Promise<FetchMapping[]> {
  const missing: FetchMapping[] = [];
  for (const mapping of remote.fetchMappings) {
    if ((await ctx.ports.git.resolveCommit(mapping.branchRef)) === null) {
      missing.push(mapping);
    }
  }
  return missing;
}

// Adds only the values git config lacks; a second run with the same configuration
// changes nothing.
async function ensureFetchConfig(
  ctx: BridgeContext,
  remote: BridgeRemote,
  missing: FetchMapping[],
): Promise<number> {
  const { git } = ctx.ports;
  const prefix = `svn-remote.${remote.name}`;
  let changes = 0;

  const urls = await git.getConfigAll(`${prefix}.url`);
  if (!urls.includes(remote.baseUrl)) {
    if (urls.length > 0) {
      await git.unsetConfigAll(`${prefix}.url`);
    }
    await git.addConfig(`${prefix}.url`, remote.baseUrl);
    changes += 1;
  }

  const fetches = await git.getConfigAll(`${prefix}.fetch`);
  for (const mapping of missing) {
    const value = `${mapping.centralizedPath}:${mapping.branchRef}`;
    if (fetches.includes(value)) continue;
    await git.addConfig(`${prefix}.fetch`, value);
    changes += 1;
  }

  return changes;
}
