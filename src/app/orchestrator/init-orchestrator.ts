/**
 * Init orchestrator.
 * Purpose: turn a directory into a bridged worktree from a Subversion URL and mappings.
 * Assumptions: git-svn is installed; the directory may or may not be a git repository yet.
 * Usage: await runInit({ worktree, ports, url, mappings: ["trunk/rtos:trunk"] }).
 */

import {
  buildConfiguration,
  CONFIG_FILE_NAME,
  listRemotes,
  serializeConfiguration,
} from "../../bridge/config-store.js";
import { BridgeError } from "../../core/errors.js";
import { logBridgeEvent, type EventLog } from "../../core/logger.js";
import { withBridgeLock } from "../../core/lock.js";
import { loadBridgeSettings } from "../../core/settings-loader.js";
import {
  applySettingsOverrides,
  type BridgeSettingsOverrides,
} from "../../core/settings.js";
import { createBridgePaths, settingsPath } from "../../core/paths.js";
import { ensureDir } from "../../core/utils.js";

import { configure } from "./configure.js";
import { closeBridgeContext, createBridgeContext } from "./context.js";
import type { BridgePorts } from "./ports.js";
import { runSwitch, type SwitchResult } from "./switch-orchestrator.js";

// =============================================================================
// TYPES
// =============================================================================

export type InitOptions = {
  worktree: string;
  ports: BridgePorts;
  url: string;
  mappings: string[];
  startRevision?: number;
  overrides?: BridgeSettingsOverrides;
  logger?: EventLog;
  opId?: string;
};

export type InitResult = {
  configCommit: string;
  configChanged: boolean;
  createdRepository: boolean;
  switch: SwitchResult;
};

export const INIT_COMMIT_MESSAGE = "Update svnlink configuration";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runInit(opts: InitOptions): Promise<InitResult> {
  if (opts.mappings.length === 0) {
    throw new BridgeError("InvalidArguments", "init needs at least one <svn-path>:<branch> mapping.");
  }
  if (opts.startRevision !== undefined && (!Number.isInteger(opts.startRevision) || opts.startRevision < 0)) {
    throw new BridgeError("InvalidArguments", `Start revision must be a non-negative integer, got ${opts.startRevision}.`);
  }

  // Settings are needed before the context exists to pick remote_base.
  const settings = applySettingsOverrides(
    loadBridgeSettings(settingsPath(createBridgePaths(opts.worktree))),
    opts.overrides ?? {},
  );
  const configuration = buildConfiguration({
    url: opts.url,
    mappings: opts.mappings,
    remoteBase: settings.remote_base,
  });
  const [remote] = listRemotes(configuration);
  const firstRef = remote.fetchMappings[0].branchRef;

  const { git } = opts.ports;
  await ensureDir(opts.worktree);

  if (!(await git.hasGitSvn())) {
    throw new BridgeError("MissingGitSvn", "git-svn is not installed; install it before running init.");
  }

  let createdRepository = false;
  if (!(await git.isRepository())) {
    await git.init();
    createdRepository = true;
  }
  if (await git.hasStagedChanges()) {
    throw new BridgeError(
      "CheckoutBlocked",
      `${opts.worktree} has staged changes; commit or unstage them before init.`,
    );
  }

  const ctx = createBridgeContext({
    worktree: opts.worktree,
    ports: opts.ports,
    overrides: opts.overrides,
    logger: opts.logger,
    opId: opts.opId,
  });

  try {
    return await withBridgeLock(ctx.paths, "init", async () => {
      const written = await git.writeBranchFile({
        branch: ctx.settings.config_branch,
        path: CONFIG_FILE_NAME,
        content: serializeConfiguration(configuration),
        message: INIT_COMMIT_MESSAGE,
      });
      logBridgeEvent(ctx.logger, "init.config_written", {
        payload: {
          branch: ctx.settings.config_branch,
          commit: written.commit,
          changed: written.changed,
        },
      });

      await configure(ctx, configuration);

      await git.svnFetch({
        remote: remote.name,
        revisionRange:
          opts.startRevision === undefined ? undefined : `${opts.startRevision}:HEAD`,
      });
      logBridgeEvent(ctx.logger, "init.fetched", {
        payload: { remote: remote.name, start_revision: opts.startRevision ?? null },
      });

      const switched = await runSwitch(ctx, { reference: firstRef });

      return {
        configCommit: written.commit,
        configChanged: written.changed,
        createdRepository,
        switch: switched,
      };
    });
  } finally {
    if (!opts.logger) {
      closeBridgeContext(ctx);
    }
  }
}
