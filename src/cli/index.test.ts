import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  APTRUNK_REF,
  APTRUNK_URL,
  configText,
  TRUNK_REF,
  TRUNK_URL,
} from "../__tests__/helpers/bridge-fixture.js";
import { FakePortsFactory, type FakeGit } from "../__tests__/helpers/fake-vcs.js";
import { createTempWorktree, type TempWorktree } from "../__tests__/helpers/temp-worktree.js";
import { main } from "../index.js";

import type { CliEnvironment } from "./environment.js";
import { buildCli } from "./index.js";

// =============================================================================
// HELPERS
// =============================================================================

let temp: TempWorktree;
let factory: FakePortsFactory;
let git: FakeGit;
let env: CliEnvironment;
let logLines: string[];
let errorOutput: string[];

beforeEach(async () => {
  temp = await createTempWorktree();
  factory = new FakePortsFactory();
  git = factory.gitFor(temp.worktree);
  await git.writeBranchFile({
    branch: "svnlink-config",
    path: "config",
    content: configText(),
    message: "Add svnlink configuration",
  });
  git.svnCommitOn(TRUNK_REF, TRUNK_URL, 11);
  git.svnCommitOn(APTRUNK_REF, APTRUNK_URL, 12);

  env = { cwd: temp.worktree, factory, findWorktree: async () => temp.worktree };

  process.env.NO_COLOR = "1";
  process.exitCode = undefined;
  logLines = [];
  errorOutput = [];
  vi.spyOn(console, "log").mockImplementation((line: string) => {
    logLines.push(line);
  });
  vi.spyOn(console, "error").mockImplementation((text: string) => {
    errorOutput.push(text);
  });
});

afterEach(async () => {
  process.exitCode = undefined;
  await temp.cleanup();
});

async function run(...args: string[]): Promise<void> {
  await main(["node", "svnlink", ...args], buildCli(env));
}

// =============================================================================
// TESTS
// =============================================================================

describe("svnlink CLI", () => {
  it("switches to a mapped branch and releases the lock", async () => {
    await run("switch", "aptrunk");

    expect(process.exitCode).toBeUndefined();
    expect(logLines).toEqual([`Switched to aptrunk (${APTRUNK_URL}@12).`]);
    expect(await fse.pathExists(path.join(temp.worktree, ".git", "svnlink", "lock"))).toBe(false);
  });

  it("exits with the failure kind's status and reports the state reached", async () => {
    await run("switch", "nope");

    expect(process.exitCode).toBe(6);
    expect(errorOutput).toHaveLength(1);
    const lines = errorOutput[0].split("\n");
    expect(lines[0]).toBe("Error: Switch to nope failed.");
    expect(lines[1]).toBe("nope is neither a git reference nor a mapped branch.");
    expect(lines[2]).toBe("State: RESOLVING");
  });

  it("adds the error name and cause with --debug", async () => {
    await run("--debug", "switch", "nope");

    expect(process.exitCode).toBe(6);
    const lines = errorOutput[0].split("\n");
    expect(lines.slice(3, 7)).toEqual([
      "Hint: Run `svnlink sync` if the branch is mapped but not fetched yet.",
      "Code: UNKNOWN_REFERENCE",
      "Name: SwitchFailedError",
      "Cause: nope is neither a git reference nor a mapped branch.",
    ]);
    expect(lines[7]).toBe("Stack:");
  });

  it("treats usage errors as invalid arguments", async () => {
    await run("switch", "--bogus");

    expect(process.exitCode).toBe(8);
  });

  it("rejects a non-numeric start revision", async () => {
    await run("init", "file:///srv/svn", "trunk/rtos:trunk", "--revision", "abc");

    expect(process.exitCode).toBe(8);
    expect(git.initCalls).toBe(0);
  });

  it("fails outside a worktree", async () => {
    env = { ...env, findWorktree: async () => null };

    await run("status");

    expect(process.exitCode).toBe(2);
  });

  it("prints status lines", async () => {
    await run("status");

    expect(logLines[0]).toBe("Config branch: refs/heads/svnlink-config");
    expect(logLines[1]).toBe("HEAD: (no commits)");
  });

  it("prints generated ignore patterns one per line", async () => {
    factory.svn.externalsOutput = ["vendor/libfoo"];
    git.showIgnoreOutput = "# /\n/build\n";

    await run("generate-ignore");

    expect(logLines).toEqual(["/build", "vendor/libfoo"]);
  });

  it("pushes with force", async () => {
    await run("push", "--force", "origin");

    expect(git.pushCalls).toEqual([
      {
        remote: "origin",
        refspecs: [
          "refs/heads/svnlink-config:refs/heads/svnlink-config",
          "refs/remotes/git-svn/*:refs/heads/*",
        ],
        force: true,
      },
    ]);
  });

  it("honours --config-branch", async () => {
    await run("--config-branch", "other-config", "status");

    expect(process.exitCode).toBe(1);
    expect(errorOutput[0].split("\n")[0]).toBe("Error: NotABridgeRepository.");
  });
});
