import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createBridgeFixture, type BridgeFixture } from "../../__tests__/helpers/bridge-fixture.js";

import { generateIgnore } from "./ignore.js";

let fx: BridgeFixture;

beforeEach(async () => {
  fx = await createBridgeFixture();
});

afterEach(async () => {
  await fx.temp.cleanup();
});

describe("generateIgnore", () => {
  it("merges externals with svn:ignore patterns", async () => {
    fx.svn.externalsOutput = ["vendor/libfoo", "tools/bar"];
    fx.git.showIgnoreOutput = [
      "",
      "# /build/",
      "/build/*.o",
      "",
      "# /",
      "/tools/bar",
      "/*.tmp",
      "",
    ].join("\n");

    expect(await generateIgnore(fx.ctx)).toEqual([
      "/*.tmp",
      "/build/*.o",
      "/tools/bar",
      "tools/bar",
      "vendor/libfoo",
    ]);
  });

  it("returns nothing for a working copy without externals or ignores", async () => {
    expect(await generateIgnore(fx.ctx)).toEqual([]);
  });
});
