import { describe, expect, it } from "vitest";

import { parseExternals, parseInfoOutput } from "./svn.js";

describe("parseInfoOutput", () => {
  it("reads url, revision and repository fields", () => {
    const stdout = [
      "Path: .",
      "Working Copy Root Path: /work/rtos",
      "URL: file:///srv/svn/branches/ap/trunk/rtos",
      "Relative URL: ^/branches/ap/trunk/rtos",
      "Repository Root: file:///srv/svn",
      "Repository UUID: 0b2cbd6a-1111-2222-3333-444455556666",
      "Revision: 42",
      "Node Kind: directory",
      "",
    ].join("\n");

    expect(parseInfoOutput(stdout)).toEqual({
      url: "file:///srv/svn/branches/ap/trunk/rtos",
      revision: 42,
      repositoryRoot: "file:///srv/svn",
      repositoryUuid: "0b2cbd6a-1111-2222-3333-444455556666",
    });
  });

  it("returns null when the revision is missing", () => {
    expect(parseInfoOutput("URL: file:///srv/svn\n")).toBeNull();
  });
});

describe("parseExternals", () => {
  it("keeps only external entries", () => {
    const stdout = [
      "X       vendor/libfoo",
      "?       scratch.txt",
      "M       src/main.c",
      "",
      "Performing status on external item at 'vendor/libfoo':",
      "X       tools/bar",
    ].join("\n");

    expect(parseExternals(stdout)).toEqual(["vendor/libfoo", "tools/bar"]);
  });
});
