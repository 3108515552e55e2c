import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { UserFacingError } from "./errors.js";
import { loadBridgeSettings } from "./settings-loader.js";
import { applySettingsOverrides, DEFAULT_SETTINGS, parseRemap } from "./settings.js";

const ENV_KEY = "SVNLINK_TEST_BRANCH";

afterEach(() => {
  delete process.env[ENV_KEY];
});

function writeSettings(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "svnlink-settings-"));
  const file = path.join(dir, "settings.yaml");
  fs.writeFileSync(file, content, "utf8");
  return file;
}

describe("loadBridgeSettings", () => {
  it("returns defaults when the file is missing", () => {
    const settings = loadBridgeSettings(path.join(os.tmpdir(), "svnlink-missing", "settings.yaml"));

    expect(settings).toEqual({
      config_branch: "svnlink-config",
      remote_base: "refs/remotes/git-svn/svn",
      remap: "git-svn/:",
      marker_search_limit: 1000,
      partial_switch: "warn",
      ignore_nested: [],
    });
  });

  it("treats an empty file as defaults", () => {
    expect(loadBridgeSettings(writeSettings(""))).toEqual(DEFAULT_SETTINGS);
  });

  it("reads values and expands environment variables", () => {
    process.env[ENV_KEY] = "team-config";
    const file = writeSettings(
      [
        "config_branch: ${SVNLINK_TEST_BRANCH}",
        "marker_search_limit: 25",
        "partial_switch: error",
        "ignore_nested:",
        "  - vendor/**",
        "",
      ].join("\n"),
    );

    const settings = loadBridgeSettings(file);

    expect(settings.config_branch).toBe("team-config");
    expect(settings.marker_search_limit).toBe(25);
    expect(settings.partial_switch).toBe("error");
    expect(settings.ignore_nested).toEqual(["vendor/**"]);
  });

  it("reports schema problems as a user-facing config error", () => {
    const file = writeSettings("partial_switch: ignore\n");

    let caught: unknown;
    try {
      loadBridgeSettings(file);
    } catch (err) {
      caught = err;
    }

    if (!(caught instanceof UserFacingError)) {
      throw new Error("expected a UserFacingError");
    }
    expect(caught.code).toBe("CONFIG_ERROR");
    expect(caught.details).toEqual([
      'partial_switch: Expected one of "warn", "error", received "ignore"',
    ]);
  });

  it("rejects unknown keys", () => {
    const file = writeSettings("colour: blue\n");

    expect(() => loadBridgeSettings(file)).toThrow(/Settings at .* are invalid/);
  });

  it("fails when a referenced environment variable is unset", () => {
    const file = writeSettings("config_branch: ${SVNLINK_TEST_BRANCH}\n");

    expect(() => loadBridgeSettings(file)).toThrow(UserFacingError);
  });
});

describe("applySettingsOverrides", () => {
  it("ignores undefined overrides", () => {
    const settings = applySettingsOverrides(DEFAULT_SETTINGS, {
      config_branch: undefined,
      marker_search_limit: 5,
    });

    expect(settings.config_branch).toBe("svnlink-config");
    expect(settings.marker_search_limit).toBe(5);
  });
});

describe("parseRemap", () => {
  it("splits on the first colon", () => {
    expect(parseRemap("git-svn/:")).toEqual({ from: "git-svn/", to: "" });
    expect(parseRemap("mirror/:svn/")).toEqual({ from: "mirror/", to: "svn/" });
  });
});
