import { z } from "zod";

import type { BridgeErrorKind } from "../core/errors.js";
import { isoNow } from "../core/utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const SwitchStatusSchema = z.enum([
  "IDLE",
  "RESOLVING",
  "CHECKED_OUT",
  "RELINKED",
  "SYNCED",
  "FAILED",
]);
export type SwitchStatus = z.infer<typeof SwitchStatusSchema>;

export type SwitchHistoryEntry = {
  status: SwitchStatus;
  at: string;
};

export type SwitchState = {
  status: SwitchStatus;
  reference: string;
  history: SwitchHistoryEntry[];
  failure?: {
    kind: BridgeErrorKind;
    reachedState: SwitchStatus;
    message: string;
  };
};

const NEXT_STATUS: Record<SwitchStatus, SwitchStatus | null> = {
  IDLE: "RESOLVING",
  RESOLVING: "CHECKED_OUT",
  CHECKED_OUT: "RELINKED",
  RELINKED: "SYNCED",
  SYNCED: null,
  FAILED: null,
};

// =============================================================================
// MUTATIONS
// =============================================================================

export function createSwitchState(reference: string, now: string = isoNow()): SwitchState {
  return { status: "IDLE", reference, history: [{ status: "IDLE", at: now }] };
}

export function isTerminal(status: SwitchStatus): boolean {
  return status === "SYNCED" || status === "FAILED";
}

export function advanceSwitch(
  state: SwitchState,
  to: SwitchStatus,
  now: string = isoNow(),
): void {
  const expected = NEXT_STATUS[state.status];
  if (expected !== to) {
    throw new Error(`Cannot move switch from ${state.status} to ${to}`);
  }

  state.status = to;
  state.history.push({ status: to, at: now });
}

export function failSwitch(
  state: SwitchState,
  kind: BridgeErrorKind,
  message: string,
  now: string = isoNow(),
): void {
  if (isTerminal(state.status)) {
    throw new Error(`Cannot fail a switch that already finished as ${state.status}`);
  }

  state.failure = { kind, reachedState: state.status, message };
  state.status = "FAILED";
  state.history.push({ status: "FAILED", at: now });
}
