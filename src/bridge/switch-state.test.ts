import { afterEach, describe, expect, it, vi } from "vitest";

import { advanceSwitch, createSwitchState, failSwitch, isTerminal } from "./switch-state.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("switch state transitions", () => {
  it("walks the happy path in order", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-02T03:04:05Z"));

    const state = createSwitchState("aptrunk");
    advanceSwitch(state, "RESOLVING");
    advanceSwitch(state, "CHECKED_OUT");
    advanceSwitch(state, "RELINKED");
    advanceSwitch(state, "SYNCED");

    expect(state.status).toBe("SYNCED");
    expect(state.history.map((entry) => entry.status)).toEqual([
      "IDLE",
      "RESOLVING",
      "CHECKED_OUT",
      "RELINKED",
      "SYNCED",
    ]);
    expect(state.history[4].at).toBe("2024-01-02T03:04:05.000Z");
    expect(isTerminal(state.status)).toBe(true);
  });

  it("refuses to skip a state", () => {
    const state = createSwitchState("trunk");
    advanceSwitch(state, "RESOLVING");

    expect(() => advanceSwitch(state, "RELINKED")).toThrow(
      "Cannot move switch from RESOLVING to RELINKED",
    );
    expect(state.status).toBe("RESOLVING");
  });

  it("records the kind and the state reached on failure", () => {
    const state = createSwitchState("trunk");
    advanceSwitch(state, "RESOLVING");
    advanceSwitch(state, "CHECKED_OUT");

    failSwitch(state, "LinkError", "rename failed");

    expect(state.status).toBe("FAILED");
    expect(state.failure).toEqual({
      kind: "LinkError",
      reachedState: "CHECKED_OUT",
      message: "rename failed",
    });
  });

  it("does not fail a finished switch", () => {
    const state = createSwitchState("trunk");
    failSwitch(state, "NoBridgeMarker", "none");

    expect(() => failSwitch(state, "LinkError", "again")).toThrow(/already finished as FAILED/);
    expect(() => advanceSwitch(state, "RESOLVING")).toThrow();
  });
});
