/**
 * Orchestrator ports define the boundary between bridge operations and the external tools.
 * Purpose: make git, git-svn and svn replaceable so orchestrators run against fakes in tests.
 * Assumptions: a DistributedVcs is bound to one worktree; a CentralizedVcs takes the
 * working-copy path on every call because seeding happens outside the worktree.
 * Usage: createBridgePorts(worktree) in production, fakes from src/__tests__/helpers in tests.
 */

import type { HistoryReader } from "../../bridge/log-scanner.js";

// =============================================================================
// TYPES
// =============================================================================

export type WriteBranchFileInput = {
  branch: string;
  path: string;
  content: string;
  message: string;
};

export type WriteBranchFileResult = {
  commit: string;
  changed: boolean;
};

export type CentralizedInfo = {
  url: string;
  revision: number;
  repositoryRoot?: string;
  repositoryUuid?: string;
};

// =============================================================================
// PORTS
// =============================================================================

export interface DistributedVcs extends HistoryReader {
  readonly worktree: string;

  isRepository(): Promise<boolean>;
  init(): Promise<void>;
  resolveCommit(ref: string): Promise<string | null>;
  headCommit(): Promise<string | null>;
  listRefs(pattern: string): Promise<string[]>;
  hasTrackedChanges(): Promise<boolean>;
  hasStagedChanges(): Promise<boolean>;
  checkout(ref: string, opts?: { force?: boolean }): Promise<void>;
  restoreTracked(ref: string): Promise<void>;

  readBranchFile(branch: string, filePath: string): Promise<string | null>;
  writeBranchFile(input: WriteBranchFileInput): Promise<WriteBranchFileResult>;

  getConfigAll(key: string): Promise<string[]>;
  addConfig(key: string, value: string): Promise<void>;
  unsetConfigAll(key: string): Promise<void>;

  fetch(remote: string, refspecs: string[]): Promise<void>;
  push(remote: string, refspecs: string[], opts?: { force?: boolean }): Promise<void>;

  hasGitSvn(): Promise<boolean>;
  svnFetch(opts?: { remote?: string; revisionRange?: string }): Promise<void>;
  svnShowIgnore(): Promise<string>;
}

export interface RemoteGit {
  remoteHasRef(repository: string, ref: string): Promise<boolean>;
  clone(repository: string, destination: string): Promise<void>;
}

export interface CentralizedVcs {
  checkoutEmpty(url: string, destination: string, revision?: number): Promise<void>;
  info(workingCopy: string): Promise<CentralizedInfo | null>;
  cleanup(workingCopy: string): Promise<void>;
  switchUrl(workingCopy: string, url: string, revision: number): Promise<void>;
  update(workingCopy: string, revision: number): Promise<void>;
  revert(workingCopy: string): Promise<void>;
  externals(workingCopy: string): Promise<string[]>;
}

export type BridgePorts = {
  git: DistributedVcs;
  svn: CentralizedVcs;
};

export type PortsFactory = {
  forWorktree(worktree: string): BridgePorts;
  remote: RemoteGit;
};
