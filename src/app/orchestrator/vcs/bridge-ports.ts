import type { PortsFactory } from "../ports.js";

import { createGitVcs, createRemoteGit } from "./git-vcs.js";
import { createSvnVcs } from "./svn-vcs.js";

export function createPortsFactory(cwd: string = process.cwd()): PortsFactory {
  const svn = createSvnVcs();
  return {
    forWorktree: (worktree) => ({ git: createGitVcs(worktree), svn }),
    remote: createRemoteGit(cwd),
  };
}
