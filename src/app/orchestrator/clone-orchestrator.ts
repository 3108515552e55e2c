/**
 * Clone orchestrator.
 * Purpose: clone a bridged repository, restore its git-svn tracking refs and link .svn.
 * Assumptions: published git-svn branches live on origin under the remapped names that
 * `svnlink push` writes.
 * Usage: await runClone({ repository, cwd, factory }).
 */

import path from "node:path";

import { listRemotes } from "../../bridge/config-store.js";
import { findMarker } from "../../bridge/log-scanner.js";
import { BridgeError } from "../../core/errors.js";
import { logBridgeEvent, type EventLog } from "../../core/logger.js";
import { withBridgeLock } from "../../core/lock.js";
import {
  applySettingsOverrides,
  DEFAULT_SETTINGS,
  parseRemap,
  type BridgeSettingsOverrides,
} from "../../core/settings.js";
import { pathExists } from "../../core/utils.js";

import { loadConfiguration } from "./configuration.js";
import { configure } from "./configure.js";
import { closeBridgeContext, createBridgeContext, type BridgeContext } from "./context.js";
import type { PortsFactory } from "./ports.js";
import { resyncHead, runSwitch, type SwitchResult } from "./switch-orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type CloneOptions = {
  repository: string;
  destination?: string;
  cwd: string;
  factory: PortsFactory;
  fetchPublished?: boolean;
  overrides?: BridgeSettingsOverrides;
  logger?: EventLog;
  opId?: string;
};

export type PublishedBranch = {
  published: string;
  tracking: string;
};

export type CloneResult = {
  destination: string;
  fetched: PublishedBranch[];
  missing: PublishedBranch[];
  switch: SwitchResult;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function defaultCloneDestination(repository: string): string {
  const trimmed = repository.replace(/[\\/]+$/, "");
  const base = trimmed.split(/[\\/:]/).pop() ?? "";
  const name = base.replace(/\.git$/, "");
  if (name.length === 0) {
    throw new BridgeError(
      "InvalidArguments",
      `Cannot derive a directory name from ${repository}; pass one explicitly.`,
    );
  }
  return name;
}

/**
 * Published name of a tracking ref: `refs/remotes/git-svn/svn/trunk` with remap
 * `git-svn/:` is published as `refs/heads/svn/trunk`.
 */
export function publishedBranchFor(trackingRef: string, remap: string): PublishedBranch {
  const local = trackingRef.replace(/^refs\/remotes\//, "");
  const { from, to } = parseRemap(remap);
  const published = from.length > 0 && local.startsWith(from) ? `${to}${local.slice(from.length)}` : local;
  return { published: `refs/heads/${published}`, tracking: `refs/remotes/${local}` };
}

export async function runClone(opts: CloneOptions): Promise<CloneResult> {
  const preSettings = applySettingsOverrides(DEFAULT_SETTINGS, opts.overrides ?? {});
  const configRef = `refs/heads/${preSettings.config_branch}`;

  if (!(await opts.factory.remote.remoteHasRef(opts.repository, configRef))) {
    throw new BridgeError(
      "NotABridgeRepository",
      `${opts.repository} has no ${preSettings.config_branch} branch; pick another --config-branch or run init first.`,
    );
  }

  const destination = path.resolve(
    opts.cwd,
    opts.destination ?? defaultCloneDestination(opts.repository),
  );
  if (await pathExists(destination)) {
    throw new BridgeError("DestinationExists", `Destination ${destination} already exists.`);
  }

  await opts.factory.remote.clone(opts.repository, destination);

  const ctx = createBridgeContext({
    worktree: destination,
    ports: opts.factory.forWorktree(destination),
    overrides: opts.overrides,
    logger: opts.logger,
    opId: opts.opId,
  });
  logBridgeEvent(ctx.logger, "clone.cloned", {
    payload: { repository: opts.repository, destination },
  });

  try {
    return await withBridgeLock(ctx.paths, "clone", async () => {
      const { configuration } = await loadConfiguration(ctx.ports.git, ctx.settings.config_branch);
      await configure(ctx, configuration);

      const fetched: PublishedBranch[] = [];
      const missing: PublishedBranch[] = [];
      if (opts.fetchPublished ?? true) {
        for (const remote of listRemotes(configuration)) {
          for (const mapping of remote.fetchMappings) {
            const branch = publishedBranchFor(mapping.branchRef, ctx.settings.remap);
            if (await opts.factory.remote.remoteHasRef(opts.repository, branch.published)) {
              fetched.push(branch);
            } else {
              missing.push(branch);
            }
          }
        }
        if (fetched.length > 0) {
          await ctx.ports.git.fetch(
            "origin",
            fetched.map((branch) => `${branch.published}:${branch.tracking}`),
          );
        }
        logBridgeEvent(ctx.logger, "clone.fetched", {
          payload: {
            fetched: fetched.map((branch) => branch.tracking),
            missing: missing.map((branch) => branch.tracking),
          },
        });
      }

      const fallbackRef =
        listRemotes(configuration).flatMap((remote) => remote.fetchMappings)[0]?.branchRef ?? null;
      const switched = await switchAfterClone(ctx, fallbackRef);

      return { destination, fetched, missing, switch: switched };
    });
  } finally {
    if (!opts.logger) {
      closeBridgeContext(ctx);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function switchAfterClone(
  ctx: BridgeContext,
  fallbackRef: string | null,
): Promise<SwitchResult> {
  const head = await ctx.ports.git.headCommit();
  if (head !== null) {
    const marker = await findMarker(ctx.ports.git, head, ctx.settings.marker_search_limit);
    if (marker !== null) {
      return resyncHead(ctx);
    }
  }

  if (fallbackRef === null) {
    throw new BridgeError(
      "MalformedConfig",
      `Malformed bridge configuration: ${ctx.settings.config_branch} declares no fetch mappings ` +
        "and the cloned HEAD carries no git-svn-id marker to link against.",
    );
  }
  return runSwitch(ctx, { reference: fallbackRef });
}
