import { afterEach, beforeEach } from "vitest";

// =============================================================================
// ENV ISOLATION
// =============================================================================

// Tests set SVNLINK_* variables and NO_COLOR freely; restore the original
// environment after each one so ordering never matters.
let snapshot: NodeJS.ProcessEnv = {};

beforeEach(() => {
  snapshot = { ...process.env };
  delete process.env.NO_COLOR;
});

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in snapshot)) {
      delete process.env[key];
    }
  }
  Object.assign(process.env, snapshot);
});
