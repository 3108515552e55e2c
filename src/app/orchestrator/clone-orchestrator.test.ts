import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  APTRUNK_REF,
  APTRUNK_URL,
  configText,
  RecordingEventLog,
  TRUNK_REF,
  TRUNK_URL,
} from "../../__tests__/helpers/bridge-fixture.js";
import { FakePortsFactory, type FakeGit } from "../../__tests__/helpers/fake-vcs.js";
import { createTempWorktree, type TempWorktree } from "../../__tests__/helpers/temp-worktree.js";
import { BridgeError } from "../../core/errors.js";

import {
  defaultCloneDestination,
  publishedBranchFor,
  runClone,
  type CloneOptions,
} from "./clone-orchestrator.js";

// =============================================================================
// HELPERS
// =============================================================================

const REPOSITORY = "file:///srv/git/rtos.git";

let temp: TempWorktree;
let factory: FakePortsFactory;
let events: RecordingEventLog;
let cloned: FakeGit;

beforeEach(async () => {
  temp = await createTempWorktree();
  factory = new FakePortsFactory();
  events = new RecordingEventLog();

  factory.remote.addRemoteRef(REPOSITORY, "refs/heads/svnlink-config");
  factory.remote.addRemoteRef(REPOSITORY, "refs/heads/svn/trunk");
  factory.remote.addRemoteRef(REPOSITORY, "refs/heads/svn/aptrunk");

  // What the clone brings along: origin's config branch.
  cloned = factory.gitFor(path.join(temp.root, "rtos"));
  await cloned.writeBranchFile({
    branch: "svnlink-config",
    path: "config",
    content: configText(),
    message: "Add svnlink configuration",
  });
  const configSha = cloned.refs.get("refs/heads/svnlink-config") ?? "";
  cloned.refs.delete("refs/heads/svnlink-config");
  cloned.refs.set("refs/remotes/origin/svnlink-config", configSha);

  cloned.onFetch = (_remote, refspecs) => {
    for (const refspec of refspecs) {
      const tracking = refspec.split(":")[1];
      if (tracking === TRUNK_REF) cloned.svnCommitOn(TRUNK_REF, TRUNK_URL, 11);
      if (tracking === APTRUNK_REF) cloned.svnCommitOn(APTRUNK_REF, APTRUNK_URL, 12);
    }
  };
});

afterEach(async () => {
  await temp.cleanup();
});

function cloneOptions(overrides: Partial<CloneOptions> = {}): CloneOptions {
  return {
    repository: REPOSITORY,
    cwd: temp.root,
    factory,
    logger: events,
    opId: "op-test",
    ...overrides,
  };
}

async function catchBridgeError(promise: Promise<unknown>): Promise<BridgeError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof BridgeError) return err;
    throw err;
  }
  throw new Error("expected a BridgeError");
}

// =============================================================================
// TESTS
// =============================================================================

describe("defaultCloneDestination", () => {
  it("uses the repository basename without .git", () => {
    expect(defaultCloneDestination("file:///srv/git/rtos.git/")).toBe("rtos");
    expect(defaultCloneDestination("git@example.com:team/rtos.git")).toBe("rtos");
    expect(defaultCloneDestination("../mirrors/rtos")).toBe("rtos");
  });

  it("rejects locations without a usable name", () => {
    expect(() => defaultCloneDestination("/")).toThrow(BridgeError);
  });
});

describe("publishedBranchFor", () => {
  it("strips the remap prefix", () => {
    expect(publishedBranchFor(TRUNK_REF, "git-svn/:")).toEqual({
      published: "refs/heads/svn/trunk",
      tracking: TRUNK_REF,
    });
  });

  it("keeps names that do not carry the prefix", () => {
    expect(publishedBranchFor("refs/remotes/mirror/trunk", "git-svn/:")).toEqual({
      published: "refs/heads/mirror/trunk",
      tracking: "refs/remotes/mirror/trunk",
    });
  });
});

describe("runClone", () => {
  it("clones, restores tracking refs and switches to the first mapping", async () => {
    const result = await runClone(cloneOptions());

    expect(result.destination).toBe(path.join(temp.root, "rtos"));
    expect(factory.remote.cloneCalls).toEqual([
      { repository: REPOSITORY, destination: path.join(temp.root, "rtos") },
    ]);
    expect(cloned.fetchCalls).toEqual([
      {
        remote: "origin",
        refspecs: [
          `refs/heads/svn/trunk:${TRUNK_REF}`,
          `refs/heads/svn/aptrunk:${APTRUNK_REF}`,
        ],
      },
    ]);
    expect(cloned.configValues("svn-remote.svn.url")).toEqual(["file:///srv/svn"]);
    expect(result.switch.slotKey).toBe(TRUNK_REF);
    expect(cloned.checkoutCalls).toEqual([{ ref: TRUNK_REF, force: false }]);
    expect(await factory.svn.readState(result.destination)).toEqual({ url: TRUNK_URL, revision: 11 });
    expect(events.types()).toContain("clone.fetched");
  });

  it("relinks for the cloned HEAD when it carries a marker", async () => {
    cloned.svnCommitOn("refs/heads/main", APTRUNK_URL, 12);
    cloned.commitOn("refs/heads/main", "local fix\n");
    cloned.setHead("refs/heads/main");

    const result = await runClone(cloneOptions());

    expect(result.switch.slotKey).toBe(APTRUNK_REF);
    expect(result.switch.reference).toBe("HEAD");
    expect(cloned.checkoutCalls).toEqual([]);
  });

  it("reports published branches missing from origin", async () => {
    factory.remote.remoteRefs.get(REPOSITORY)?.delete("refs/heads/svn/aptrunk");

    const result = await runClone(cloneOptions());

    expect(result.missing).toEqual([
      { published: "refs/heads/svn/aptrunk", tracking: APTRUNK_REF },
    ]);
    expect(cloned.fetchCalls[0].refspecs).toEqual([`refs/heads/svn/trunk:${TRUNK_REF}`]);
  });

  it("fails with MalformedConfig when the config maps nothing and HEAD has no marker", async () => {
    await cloned.writeBranchFile({
      branch: "svnlink-config",
      path: "config",
      content: '[svn-remote "svn"]\n\turl = file:///srv/svn\n',
      message: "Drop fetch lines",
    });
    const configSha = cloned.refs.get("refs/heads/svnlink-config") ?? "";
    cloned.refs.delete("refs/heads/svnlink-config");
    cloned.refs.set("refs/remotes/origin/svnlink-config", configSha);

    const error = await catchBridgeError(runClone(cloneOptions()));

    expect(error.kind).toBe("MalformedConfig");
    expect(error.exitCode).toBe(12);
    expect(cloned.checkoutCalls).toEqual([]);
  });

  it("relinks by marker URL when the config maps nothing", async () => {
    await cloned.writeBranchFile({
      branch: "svnlink-config",
      path: "config",
      content: '[svn-remote "svn"]\n\turl = file:///srv/svn\n',
      message: "Drop fetch lines",
    });
    const configSha = cloned.refs.get("refs/heads/svnlink-config") ?? "";
    cloned.refs.delete("refs/heads/svnlink-config");
    cloned.refs.set("refs/remotes/origin/svnlink-config", configSha);
    cloned.svnCommitOn("refs/heads/main", APTRUNK_URL, 12);
    cloned.setHead("refs/heads/main");

    const result = await runClone(cloneOptions());

    expect(result.switch.slotKey).toBe(APTRUNK_URL);
    expect(result.fetched).toEqual([]);
    expect(cloned.checkoutCalls).toEqual([]);
  });

  it("fails with NotABridgeRepository when the config branch is absent", async () => {
    factory.remote.remoteRefs.get(REPOSITORY)?.delete("refs/heads/svnlink-config");

    const error = await catchBridgeError(runClone(cloneOptions()));

    expect(error.kind).toBe("NotABridgeRepository");
    expect(error.exitCode).toBe(1);
    expect(factory.remote.cloneCalls).toEqual([]);
  });

  it("refuses an existing destination", async () => {
    const error = await catchBridgeError(runClone(cloneOptions({ destination: "repo" })));

    expect(error.kind).toBe("DestinationExists");
    expect(error.exitCode).toBe(3);
    expect(factory.remote.cloneCalls).toEqual([]);
  });
});
