import { execa, type Options } from "execa";

import type { LogEntry } from "../bridge/log-scanner.js";
import { GitError } from "../core/errors.js";
import { outputText, resolveExecaErrorOutput } from "../core/exec-output.js";

export type GitResult = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputText(res.stdout),
      stderr: outputText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const { stdout, stderr, message } = resolveExecaErrorOutput(err);
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr || message}`, {
      stdout,
      stderr,
    });
  }
}

// Same as git() but hands back non-zero exits instead of throwing.
export async function gitAllowFailure(cwd: string, args: string[]): Promise<GitResult> {
  return git(cwd, args, { reject: false });
}

// =============================================================================
// REPOSITORY
// =============================================================================

export async function resolveRepositoryRoot(cwd: string): Promise<string | null> {
  const res = await gitAllowFailure(cwd, ["rev-parse", "--show-toplevel"]);
  if (res.exitCode !== 0) return null;
  const root = res.stdout.trim();
  return root.length > 0 ? root : null;
}

export async function isRepository(cwd: string): Promise<boolean> {
  const res = await gitAllowFailure(cwd, ["rev-parse", "--git-dir"]);
  return res.exitCode === 0;
}

export async function initRepository(cwd: string): Promise<void> {
  await git(cwd, ["init"]);
}

// =============================================================================
// REFS AND HISTORY
// =============================================================================

export async function resolveCommit(cwd: string, ref: string): Promise<string | null> {
  const res = await gitAllowFailure(cwd, ["rev-parse", "--verify", "--quiet", `${ref}^{commit}`]);
  if (res.exitCode !== 0) return null;
  const sha = res.stdout.trim();
  return sha.length > 0 ? sha : null;
}

export async function headCommit(cwd: string): Promise<string | null> {
  return resolveCommit(cwd, "HEAD");
}

export async function listRefs(cwd: string, prefix: string): Promise<string[]> {
  const res = await git(cwd, ["for-each-ref", "--format=%(refname)", prefix]);
  return res.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

const LOG_FORMAT = "%H%x00%B%x1e";

export async function readLog(cwd: string, ref: string, limit: number): Promise<LogEntry[]> {
  const res = await git(cwd, [
    "log",
    "--first-parent",
    `--max-count=${limit}`,
    `--format=${LOG_FORMAT}`,
    ref,
    "--",
  ]);
  return parseLogOutput(res.stdout);
}

export function parseLogOutput(stdout: string): LogEntry[] {
  const entries: LogEntry[] = [];
  for (const record of stdout.split("\x1e")) {
    const trimmed = record.replace(/^\n+/, "");
    if (trimmed.length === 0) continue;

    const separator = trimmed.indexOf("\x00");
    if (separator < 0) continue;
    entries.push({
      commit: trimmed.slice(0, separator),
      message: trimmed.slice(separator + 1),
    });
  }
  return entries;
}

// =============================================================================
// WORKING TREE
// =============================================================================

export async function hasTrackedChanges(cwd: string): Promise<boolean> {
  // Untracked files (including the .svn link) never block a switch.
  const res = await git(cwd, ["status", "--porcelain", "--untracked-files=no"]);
  return res.stdout.trim().length > 0;
}

export async function hasStagedChanges(cwd: string): Promise<boolean> {
  const res = await gitAllowFailure(cwd, ["diff", "--cached", "--quiet"]);
  if (res.exitCode === 0) return false;
  if (res.exitCode === 1) return true;
  throw new GitError(`git diff --cached --quiet failed (cwd=${cwd}): ${res.stderr}`, {
    stdout: res.stdout,
    stderr: res.stderr,
  });
}

export async function checkout(
  cwd: string,
  ref: string,
  opts: { force?: boolean } = {},
): Promise<void> {
  const args = ["checkout"];
  if (opts.force) args.push("--force");
  args.push(ref);
  await git(cwd, args);
}

export async function restoreTracked(cwd: string, ref: string): Promise<void> {
  await git(cwd, ["checkout", ref, "--", ":/"]);
}

// =============================================================================
// BRANCH FILES (PLUMBING)
// =============================================================================

export async function readBranchFile(
  cwd: string,
  ref: string,
  filePath: string,
): Promise<string | null> {
  const res = await git(cwd, ["show", `${ref}:${filePath}`], {
    reject: false,
    stripFinalNewline: false,
  });
  return res.exitCode === 0 ? res.stdout : null;
}

export async function writeBranchFile(
  cwd: string,
  input: { branch: string; path: string; content: string; message: string },
): Promise<{ commit: string; changed: boolean }> {
  const ref = `refs/heads/${input.branch}`;
  const parent = await resolveCommit(cwd, ref);

  if (parent !== null) {
    const existing = await readBranchFile(cwd, parent, input.path);
    if (existing === input.content) {
      return { commit: parent, changed: false };
    }
  }

  const blob = await git(cwd, ["hash-object", "-w", "--stdin"], { input: input.content });
  const tree = await git(cwd, ["mktree"], {
    input: `100644 blob ${blob.stdout.trim()}\t${input.path}\n`,
  });

  const commitArgs = ["commit-tree", tree.stdout.trim(), "-m", input.message];
  if (parent !== null) commitArgs.push("-p", parent);
  const commit = (await git(cwd, commitArgs)).stdout.trim();

  const updateArgs = ["update-ref", ref, commit];
  if (parent !== null) updateArgs.push(parent);
  await git(cwd, updateArgs);

  return { commit, changed: true };
}

// =============================================================================
// CONFIG
// =============================================================================

export async function getConfigAll(cwd: string, key: string): Promise<string[]> {
  const res = await gitAllowFailure(cwd, ["config", "--get-all", key]);
  // Exit 1 means the key is unset.
  if (res.exitCode === 1) return [];
  if (res.exitCode !== 0) {
    throw new GitError(`git config --get-all ${key} failed (cwd=${cwd}): ${res.stderr}`, {
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }
  return res.stdout.split("\n").filter((line) => line.length > 0);
}

export async function addConfig(cwd: string, key: string, value: string): Promise<void> {
  await git(cwd, ["config", "--add", key, value]);
}

export async function unsetConfigAll(cwd: string, key: string): Promise<void> {
  const res = await gitAllowFailure(cwd, ["config", "--unset-all", key]);
  // Exit 5 means there was nothing to unset.
  if (res.exitCode !== 0 && res.exitCode !== 5) {
    throw new GitError(`git config --unset-all ${key} failed (cwd=${cwd}): ${res.stderr}`, {
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }
}

// =============================================================================
// REMOTES
// =============================================================================

export async function fetchRefspecs(cwd: string, remote: string, refspecs: string[]): Promise<void> {
  await git(cwd, ["fetch", remote, ...refspecs]);
}

export async function pushRefspecs(
  cwd: string,
  remote: string,
  refspecs: string[],
  opts: { force?: boolean } = {},
): Promise<void> {
  const args = ["push"];
  if (opts.force) args.push("--force");
  args.push(remote, ...refspecs);
  await git(cwd, args);
}

export async function remoteHasRef(cwd: string, repository: string, ref: string): Promise<boolean> {
  const res = await gitAllowFailure(cwd, ["ls-remote", "--exit-code", repository, ref]);
  if (res.exitCode === 0) return true;
  // ls-remote --exit-code exits 2 when nothing matched.
  if (res.exitCode === 2) return false;
  throw new GitError(`git ls-remote ${repository} ${ref} failed (cwd=${cwd}): ${res.stderr}`, {
    stdout: res.stdout,
    stderr: res.stderr,
  });
}

export async function cloneRepository(
  cwd: string,
  repository: string,
  destination: string,
): Promise<void> {
  await git(cwd, ["clone", repository, destination]);
}

// =============================================================================
// GIT-SVN
// =============================================================================

export async function hasGitSvn(cwd: string): Promise<boolean> {
  const res = await gitAllowFailure(cwd, ["svn", "--version"]);
  return res.exitCode === 0;
}

export async function svnFetch(
  cwd: string,
  opts: { remote?: string; revisionRange?: string } = {},
): Promise<void> {
  const args = ["svn", "fetch"];
  if (opts.remote) args.push("--svn-remote", opts.remote);
  if (opts.revisionRange) args.push("-r", opts.revisionRange);
  await git(cwd, args);
}

export async function svnShowIgnore(cwd: string): Promise<string> {
  const res = await git(cwd, ["svn", "show-ignore"]);
  return res.stdout;
}
