import { describe, expect, it } from "vitest";

import { BridgeError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError, renderCliWarning } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.noBridgeMarker,
    title: "Switch failed.",
    message: "No git-svn-id marker found in the last 50 commits of feature.",
    details: ["State: RESOLVING"],
    hint: "Edit cherry-picked commit messages that carry another branch's marker.",
    next: "svnlink switch <branch>",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode with the error code", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Switch failed.",
        "No git-svn-id marker found in the last 50 commits of feature.",
        "State: RESOLVING",
        "Hint: Edit cherry-picked commit messages that carry another branch's marker.",
        "Next: svnlink switch <branch>",
        "Code: NO_BRIDGE_MARKER",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.linkError,
      title: "Switch failed.",
      message: "Unable to replace .svn",
      cause: new Error("EACCES"),
    });
    error.stack = "UserFacingError: Unable to replace .svn\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Switch failed.",
        "Unable to replace .svn",
        "Code: LINK_ERROR",
        "Name: UserFacingError",
        "Cause: EACCES",
        "Stack:",
        "  UserFacingError: Unable to replace .svn",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("names the kind of bare bridge errors", () => {
    const error = new BridgeError("MalformedConfig", "fetch value 'trunk' has no ':'");

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      ["Error: MalformedConfig.", "fetch value 'trunk' has no ':'", "Code: MALFORMED_CONFIG"].join(
        "\n",
      ),
    );
  });

  it("renders a failed switch with its state and hint", () => {
    const output = renderCliError(
      new UserFacingError({
        code: USER_FACING_ERROR_CODES.revisionUnavailable,
        title: "Switch to aptrunk failed.",
        message: "Subversion could not bring the working copy to file:///srv/svn/ap@12.",
        details: ["State: RELINKED"],
        hint: "Check that the Subversion server is reachable, then run `svnlink update`.",
        exitCode: 10,
      }),
      { stream: nonTtyStream },
    );

    expect(output.split("\n")).toEqual([
      "Error: Switch to aptrunk failed.",
      "Subversion could not bring the working copy to file:///srv/svn/ap@12.",
      "State: RELINKED",
      "Hint: Check that the Subversion server is reachable, then run `svnlink update`.",
      "Code: REVISION_UNAVAILABLE",
    ]);
  });

  it("colors labels on a terminal", () => {
    const output = renderCliError(new BridgeError("Locked", "held by switch"), {
      stream: { isTTY: true },
    });

    expect(output.split("\n")[0]).toBe(
      "\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mLocked.\x1b[22m",
    );
  });
});

describe("renderCliWarning", () => {
  it("prefixes warnings without color on non-TTY streams", () => {
    expect(renderCliWarning("nested .svn at vendor/lib", nonTtyStream)).toBe(
      "Warning: nested .svn at vendor/lib",
    );
  });
});
