/**
 * Git-backed VCS adapter.
 * Purpose: map DistributedVcs calls to the git helpers, bound to one worktree.
 * Assumptions: git (and git-svn where used) is on PATH.
 * Usage: createGitVcs("/work/rtos") and inject into BridgePorts.
 */

import {
  addConfig,
  checkout,
  cloneRepository,
  fetchRefspecs,
  getConfigAll,
  hasGitSvn,
  hasStagedChanges,
  hasTrackedChanges,
  headCommit,
  initRepository,
  isRepository,
  listRefs,
  pushRefspecs,
  readBranchFile,
  readLog,
  remoteHasRef,
  resolveCommit,
  restoreTracked,
  svnFetch,
  svnShowIgnore,
  unsetConfigAll,
  writeBranchFile,
} from "../../../git/git.js";
import type { DistributedVcs, RemoteGit } from "../ports.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(worktree: string): DistributedVcs {
  return {
    worktree,
    log: (ref, limit) => readLog(worktree, ref, limit),
    isRepository: () => isRepository(worktree),
    init: () => initRepository(worktree),
    resolveCommit: (ref) => resolveCommit(worktree, ref),
    headCommit: () => headCommit(worktree),
    listRefs: (prefix) => listRefs(worktree, prefix),
    hasTrackedChanges: () => hasTrackedChanges(worktree),
    hasStagedChanges: () => hasStagedChanges(worktree),
    checkout: (ref, opts) => checkout(worktree, ref, opts),
    restoreTracked: (ref) => restoreTracked(worktree, ref),
    readBranchFile: (branch, filePath) => readBranchFile(worktree, branch, filePath),
    writeBranchFile: (input) => writeBranchFile(worktree, input),
    getConfigAll: (key) => getConfigAll(worktree, key),
    addConfig: (key, value) => addConfig(worktree, key, value),
    unsetConfigAll: (key) => unsetConfigAll(worktree, key),
    fetch: (remote, refspecs) => fetchRefspecs(worktree, remote, refspecs),
    push: (remote, refspecs, opts) => pushRefspecs(worktree, remote, refspecs, opts),
    hasGitSvn: () => hasGitSvn(worktree),
    svnFetch: (opts) => svnFetch(worktree, opts),
    svnShowIgnore: () => svnShowIgnore(worktree),
  };
}

// ls-remote and clone run before a worktree exists, from the caller's directory.
export function createRemoteGit(cwd: string): RemoteGit {
  return {
    remoteHasRef: (repository, ref) => remoteHasRef(cwd, repository, ref),
    clone: (repository, destination) => cloneRepository(cwd, repository, destination),
  };
}
