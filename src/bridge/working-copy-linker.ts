/**
 * Working-copy linker.
 * Purpose: keep one Subversion metadata slot per mapped branch and point the live
 * `<worktree>/.svn` link at the one matching the checked-out branch.
 * Assumptions: slots live under .git/svnlink/svn and are never deleted automatically;
 * the live link is only ever replaced by a single rename.
 * Usage: const linker = new WorkingCopyLinker(paths, svn); await linker.activate(key).
 */

import { randomUUID } from "node:crypto";
import type { Stats } from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { CentralizedVcs } from "../app/orchestrator/ports.js";
import { BridgeError } from "../core/errors.js";
import {
  backupsDir,
  liveMetadataPath,
  LIVE_METADATA_DIR,
  slotIndexPath,
  storageRootDir,
  type BridgePaths,
} from "../core/paths.js";
import { isoNow, toPosixPath } from "../core/utils.js";

import { findSlotByDir, getSlot, loadSlotIndex, saveSlotIndex, upsertSlot } from "./slot-index.js";

// =============================================================================
// TYPES
// =============================================================================

export type StorageSlot = {
  slotKey: string;
  dir: string;
  created: boolean;
};

export type ActivateResult = {
  slot: StorageSlot;
  backup: string | null;
};

export type UpdateResult = {
  slotKey: string;
  seeded: boolean;
  switched: boolean;
};

// =============================================================================
// LINKER
// =============================================================================

export class WorkingCopyLinker {
  constructor(
    private readonly paths: BridgePaths,
    private readonly svn: CentralizedVcs,
  ) {}

  async storageDirFor(slotKey: string): Promise<StorageSlot> {
    const indexFile = slotIndexPath(this.paths);
    const index = await loadSlotIndex(indexFile);
    const existing = getSlot(index, slotKey);
    const known = existing !== null;
    const record = existing ?? upsertSlot(index, slotKey);

    const dir = path.join(storageRootDir(this.paths), record.dir);
    const existed = await fse.pathExists(dir);
    await fse.ensureDir(dir);
    if (!known) {
      await saveSlotIndex(indexFile, index);
    }

    return { slotKey, dir, created: !existed };
  }

  async activate(slotKey: string): Promise<ActivateResult> {
    let slot: StorageSlot;
    try {
      slot = await this.storageDirFor(slotKey);
    } catch (err) {
      throw new BridgeError("LinkError", `Could not prepare storage for ${slotKey}.`, err);
    }

    const live = liveMetadataPath(this.paths);
    const linkTarget = path.relative(this.paths.worktree, slot.dir);
    const tempLink = `${live}.${randomUUID().slice(0, 8)}.tmp`;

    let backup: string | null = null;
    try {
      await fse.symlink(linkTarget, tempLink, "dir");
      backup = await this.moveAsideRealMetadata(live);
      await fse.rename(tempLink, live);
    } catch (err) {
      await fse.remove(tempLink);
      if (backup !== null && (await lstatOrNull(live)) === null) {
        await fse.move(backup, live);
      }
      throw new BridgeError(
        "LinkError",
        `Could not point ${LIVE_METADATA_DIR} at ${toPosixPath(linkTarget)}.`,
        err,
      );
    }

    return { slot, backup };
  }

  async liveSlotKey(): Promise<string | null> {
    const live = liveMetadataPath(this.paths);
    const target = await readLinkTarget(live);
    if (target === null) return null;

    const resolved = path.resolve(this.paths.worktree, target);
    if (path.dirname(resolved) !== storageRootDir(this.paths)) return null;

    const index = await loadSlotIndex(slotIndexPath(this.paths));
    return findSlotByDir(index, path.basename(resolved));
  }

  async updateToRevision(url: string, revision: number): Promise<UpdateResult> {
    const slotKey = await this.liveSlotKey();
    if (slotKey === null) {
      throw new BridgeError(
        "LinkError",
        `${LIVE_METADATA_DIR} does not point at a storage slot; activate one before updating.`,
      );
    }

    const { worktree } = this.paths;
    let seeded = false;
    let switched = false;

    try {
      const slot = await this.storageDirFor(slotKey);
      if (await isEmptyDir(slot.dir)) {
        await this.seedSlot(slot.dir, url, revision);
        seeded = true;
      }

      await this.svn.cleanup(worktree);
      const info = await this.svn.info(worktree);
      if (info !== null && trimSlashes(info.url) !== trimSlashes(url)) {
        await this.svn.switchUrl(worktree, url, revision);
        switched = true;
      }
      await this.svn.update(worktree, revision);
      await this.svn.revert(worktree);
    } catch (err) {
      throw new BridgeError(
        "RevisionUnavailable",
        `Subversion could not bring the working copy to ${url}@${revision}.`,
        err,
      );
    }

    const indexFile = slotIndexPath(this.paths);
    const index = await loadSlotIndex(indexFile);
    upsertSlot(index, slotKey, { url, revision });
    await saveSlotIndex(indexFile, index);

    return { slotKey, seeded, switched };
  }

  async findStrayMetadata(ignore: string[] = []): Promise<string[]> {
    const entries = await fg(`**/${LIVE_METADATA_DIR}`, {
      cwd: this.paths.worktree,
      dot: true,
      onlyFiles: false,
      followSymbolicLinks: false,
      ignore: [".git/**", ...ignore],
    });

    return entries
      .filter((entry) => {
        const segments = entry.split("/");
        // Skip the live link and anything nested inside another metadata dir.
        return segments.length > 1 && !segments.slice(0, -1).includes(LIVE_METADATA_DIR);
      })
      .sort();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async moveAsideRealMetadata(live: string): Promise<string | null> {
    const stat = await lstatOrNull(live);
    if (stat === null || stat.isSymbolicLink()) return null;

    const stamp = isoNow().replace(/[:.]/g, "-");
    const destination = path.join(backupsDir(this.paths), stamp, LIVE_METADATA_DIR);
    await fse.ensureDir(path.dirname(destination));
    await fse.move(live, destination);
    return destination;
  }

  private async seedSlot(slotDir: string, url: string, revision: number): Promise<void> {
    const scratch = path.join(this.paths.area, `seed-${randomUUID().slice(0, 8)}`);
    try {
      await this.svn.checkoutEmpty(url, scratch, revision);
      await fse.copy(path.join(scratch, LIVE_METADATA_DIR), slotDir);
    } finally {
      await fse.remove(scratch);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

async function lstatOrNull(p: string): Promise<Stats | null> {
  try {
    return await fse.lstat(p);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

async function readLinkTarget(p: string): Promise<string | null> {
  const stat = await lstatOrNull(p);
  if (stat === null || !stat.isSymbolicLink()) return null;
  return fse.readlink(p);
}

async function isEmptyDir(dir: string): Promise<boolean> {
  const entries = await fse.readdir(dir);
  return entries.length === 0;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}
