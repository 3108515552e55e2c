import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

// Everything svnlink owns lives under <repo>/.git/svnlink so git never tracks it.
export type BridgePaths = {
  worktree: string;
  dotGit: string;
  area: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const BRIDGE_AREA_DIR = "svnlink";
export const LIVE_METADATA_DIR = ".svn";

// =============================================================================
// CONTEXT
// =============================================================================

export function createBridgePaths(worktree: string, dotGit?: string): BridgePaths {
  const resolvedWorktree = path.resolve(worktree);
  const resolvedDotGit = path.resolve(resolvedWorktree, dotGit ?? ".git");
  return {
    worktree: resolvedWorktree,
    dotGit: resolvedDotGit,
    area: path.join(resolvedDotGit, BRIDGE_AREA_DIR),
  };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function liveMetadataPath(paths: BridgePaths): string {
  return path.join(paths.worktree, LIVE_METADATA_DIR);
}

export function storageRootDir(paths: BridgePaths): string {
  return path.join(paths.area, "svn");
}

export function slotIndexPath(paths: BridgePaths): string {
  return path.join(storageRootDir(paths), "index.json");
}

export function backupsDir(paths: BridgePaths): string {
  return path.join(paths.area, "backups");
}

export function logsDir(paths: BridgePaths): string {
  return path.join(paths.area, "logs");
}

export function eventsLogPath(paths: BridgePaths): string {
  return path.join(logsDir(paths), "events.jsonl");
}

export function settingsPath(paths: BridgePaths): string {
  return path.join(paths.area, "settings.yaml");
}

export function lockPath(paths: BridgePaths): string {
  return path.join(paths.area, "lock");
}

export function gitExcludePath(paths: BridgePaths): string {
  return path.join(paths.dotGit, "info", "exclude");
}
