import path from "node:path";

import fse from "fs-extra";

import { listRemotes, type Configuration } from "../../bridge/config-store.js";
import { logBridgeEvent } from "../../core/logger.js";
import { gitExcludePath, LIVE_METADATA_DIR, storageRootDir } from "../../core/paths.js";

import { loadConfiguration } from "./configuration.js";
import type { BridgeContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigureResult = {
  remotes: string[];
  excludeUpdated: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Materialize the configuration into .git/config so plain `git svn` commands see it,
 * hide .svn from git, and make sure the storage area exists.
 */
export async function configure(
  ctx: BridgeContext,
  configuration?: Configuration,
): Promise<ConfigureResult> {
  const { git } = ctx.ports;
  const resolved =
    configuration ?? (await loadConfiguration(git, ctx.settings.config_branch)).configuration;

  const remotes: string[] = [];
  for (const remote of listRemotes(resolved)) {
    const prefix = `svn-remote.${remote.name}`;
    await git.unsetConfigAll(`${prefix}.url`);
    await git.unsetConfigAll(`${prefix}.fetch`);
    await git.addConfig(`${prefix}.url`, remote.baseUrl);
    for (const mapping of remote.fetchMappings) {
      await git.addConfig(`${prefix}.fetch`, `${mapping.centralizedPath}:${mapping.branchRef}`);
    }
    remotes.push(remote.name);
  }

  const excludeUpdated = await ensureMetadataExcluded(gitExcludePath(ctx.paths));
  await fse.ensureDir(storageRootDir(ctx.paths));

  logBridgeEvent(ctx.logger, "configure.applied", {
    payload: { remotes, exclude_updated: excludeUpdated },
  });

  return { remotes, excludeUpdated };
}

// =============================================================================
// INTERNALS
// =============================================================================

export async function ensureMetadataExcluded(excludePath: string): Promise<boolean> {
  const pattern = LIVE_METADATA_DIR;
  const existing = (await fse.pathExists(excludePath))
    ? await fse.readFile(excludePath, "utf8")
    : "";

  const existingLines = existing
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (existingLines.includes(pattern) || existingLines.includes(`/${pattern}`)) return false;

  const pieces: string[] = [existing.trimEnd()];
  if (!existing.includes("svnlink working-copy metadata")) {
    pieces.push("# svnlink working-copy metadata");
  }
  pieces.push(pattern);

  const next = pieces.filter((part) => part.length > 0).join("\n") + "\n";
  await fse.ensureDir(path.dirname(excludePath));
  await fse.writeFile(excludePath, next, "utf8");
  return true;
}
