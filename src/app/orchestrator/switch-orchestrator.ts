/**
 * Switch orchestrator.
 * Purpose: move the worktree to another git reference and bring the Subversion
 * metadata along (IDLE -> RESOLVING -> CHECKED_OUT -> RELINKED -> SYNCED).
 * Assumptions: configuration and markers are re-read on every run; nothing is cached.
 * Usage: await runSwitch(ctx, { reference: "aptrunk" }); await resyncHead(ctx).
 */

import {
  findMappingsByName,
  slotKeyForMarker,
  type Configuration,
} from "../../bridge/config-store.js";
import { findMarker, type BridgeMarker } from "../../bridge/log-scanner.js";
import {
  advanceSwitch,
  createSwitchState,
  failSwitch,
  type SwitchState,
  type SwitchStatus,
} from "../../bridge/switch-state.js";
import {
  BridgeError,
  isBridgeError,
  userFacingCodeForKind,
  UserFacingError,
  type BridgeErrorKind,
} from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logBridgeEvent } from "../../core/logger.js";

import { loadConfiguration } from "./configuration.js";
import type { BridgeContext } from "./context.js";

// =============================================================================
// TYPES
// =============================================================================

export type SwitchOptions = {
  reference: string;
  force?: boolean;
};

export type SwitchResult = {
  reference: string;
  commit: string;
  marker: BridgeMarker;
  slotKey: string;
  repaired: boolean;
  seeded: boolean;
  warnings: string[];
  state: SwitchState;
};

type ResolvedTarget = {
  checkoutRef: string;
  commit: string;
};

// =============================================================================
// ERRORS
// =============================================================================

const KIND_HINTS: Partial<Record<BridgeErrorKind, string>> = {
  CheckoutBlocked: "Commit or stash your changes, or pass --force to discard them.",
  NoBridgeMarker:
    "The branch has no git-svn history within marker_search_limit commits; raise the limit or pick a mirrored branch.",
  LinkError: "Run `svnlink update` to relink .svn for the current HEAD.",
  RevisionUnavailable: "Check that the Subversion server is reachable, then run `svnlink update`.",
  PartialSwitch: "Remove the nested .svn directories or list them under ignore_nested.",
  UnknownReference: "Run `svnlink sync` if the branch is mapped but not fetched yet.",
};

export class SwitchFailedError extends UserFacingError {
  readonly kind: BridgeErrorKind;
  readonly reachedState: SwitchStatus;

  constructor(reference: string, reachedState: SwitchStatus, error: BridgeError) {
    super({
      code: userFacingCodeForKind(error.kind),
      title: `Switch to ${reference} failed.`,
      message: error.message,
      details: [`State: ${reachedState}`],
      hint: KIND_HINTS[error.kind],
      cause: error,
      exitCode: error.exitCode,
    });
    this.name = "SwitchFailedError";
    this.kind = error.kind;
    this.reachedState = reachedState;
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runSwitch(ctx: BridgeContext, opts: SwitchOptions): Promise<SwitchResult> {
  return runStateMachine(ctx, { reference: opts.reference, force: opts.force ?? false, checkout: true });
}

// Re-derive everything for HEAD and relink without touching git; the repair path
// after an interrupted switch.
export async function resyncHead(ctx: BridgeContext): Promise<SwitchResult> {
  return runStateMachine(ctx, { reference: "HEAD", force: true, checkout: false });
}

// =============================================================================
// STATE MACHINE
// =============================================================================

async function runStateMachine(
  ctx: BridgeContext,
  opts: { reference: string; force: boolean; checkout: boolean },
): Promise<SwitchResult> {
  const { git } = ctx.ports;
  const state = createSwitchState(opts.reference);
  const transition = (to: SwitchStatus): void => {
    const from = state.status;
    advanceSwitch(state, to);
    logBridgeEvent(ctx.logger, "switch.transition", {
      ref: opts.reference,
      payload: { from, to },
    });
  };

  try {
    // RESOLVING
    transition("RESOLVING");
    const { configuration } = await loadConfiguration(git, ctx.settings.config_branch);
    const target = await resolveTarget(ctx, configuration, opts.reference);

    if (opts.checkout && !opts.force && (await git.hasTrackedChanges())) {
      throw new BridgeError(
        "CheckoutBlocked",
        `${git.worktree} has uncommitted changes to tracked files.`,
      );
    }

    const marker = await findMarker(git, target.commit, ctx.settings.marker_search_limit);
    if (marker === null) {
      throw new BridgeError(
        "NoBridgeMarker",
        `No git-svn-id marker found in the last ${ctx.settings.marker_search_limit} commits of ${opts.reference}.`,
      );
    }
    const slotKey = slotKeyForMarker(configuration, marker);
    const repaired = await detectInterruptedSwitch(ctx, configuration);

    // CHECKED_OUT
    if (opts.checkout) {
      try {
        await git.checkout(target.checkoutRef, { force: opts.force });
      } catch (err) {
        throw new BridgeError(
          "CheckoutBlocked",
          `git could not check out ${opts.reference}: ${formatErrorMessage(err)}`,
          err,
        );
      }
    }
    transition("CHECKED_OUT");

    // RELINKED
    await ctx.linker.activate(slotKey);
    transition("RELINKED");

    // SYNCED
    const update = await ctx.linker.updateToRevision(marker.url, marker.revision);
    const warnings: string[] = [];
    try {
      // svn update may have rewritten tracked files; git's view wins.
      await git.restoreTracked(target.commit);
    } catch (err) {
      // .svn is already linked and updated; only the git side needs another pass.
      warnings.push(
        `Subversion is at ${marker.url}@${marker.revision} but git could not restore tracked files ` +
          `(${formatErrorMessage(err)}); run \`git checkout -- :/\` before committing.`,
      );
      logBridgeEvent(ctx.logger, "switch.restore_failed", {
        ref: opts.reference,
        payload: { commit: target.commit, message: formatErrorMessage(err) },
      });
    }

    warnings.push(...(await checkStrayMetadata(ctx, opts.reference)));
    transition("SYNCED");

    return {
      reference: opts.reference,
      commit: target.commit,
      marker,
      slotKey,
      repaired,
      seeded: update.seeded,
      warnings,
      state,
    };
  } catch (err) {
    const reachedState = state.status;
    const failure = isBridgeError(err)
      ? err
      : new BridgeError(kindForState(reachedState), formatErrorMessage(err), err);
    failSwitch(state, failure.kind, failure.message);
    logBridgeEvent(ctx.logger, "switch.failed", {
      ref: opts.reference,
      payload: { state: reachedState, kind: failure.kind, message: failure.message },
    });
    throw new SwitchFailedError(opts.reference, reachedState, failure);
  }
}

// Unclassified failures take the kind of the step that was running: nothing is
// mutated before checkout, the link is next, then the Subversion update.
function kindForState(reached: SwitchStatus): BridgeErrorKind {
  switch (reached) {
    case "CHECKED_OUT":
      return "LinkError";
    case "RELINKED":
      return "RevisionUnavailable";
    default:
      return "CheckoutBlocked";
  }
}

// =============================================================================
// RESOLVING HELPERS
// =============================================================================

async function resolveTarget(
  ctx: BridgeContext,
  configuration: Configuration,
  reference: string,
): Promise<ResolvedTarget> {
  const { git } = ctx.ports;

  const direct = await git.resolveCommit(reference);
  if (direct !== null) {
    return { checkoutRef: reference, commit: direct };
  }

  const matches = findMappingsByName(configuration, reference);
  if (matches.length > 1) {
    const refs = matches.map((match) => match.mapping.branchRef).join(", ");
    throw new BridgeError(
      "AmbiguousReference",
      `${reference} matches several mapped branches: ${refs}.`,
    );
  }
  if (matches.length === 1) {
    const { branchRef } = matches[0].mapping;
    const commit = await git.resolveCommit(branchRef);
    if (commit !== null) {
      return { checkoutRef: branchRef, commit };
    }
    throw new BridgeError(
      "UnknownReference",
      `${reference} is mapped to ${branchRef}, which has not been fetched yet.`,
    );
  }

  throw new BridgeError("UnknownReference", `${reference} is neither a git reference nor a mapped branch.`);
}

async function detectInterruptedSwitch(
  ctx: BridgeContext,
  configuration: Configuration,
): Promise<boolean> {
  const liveSlot = await ctx.linker.liveSlotKey();
  if (liveSlot === null) return false;

  const head = await ctx.ports.git.headCommit();
  if (head === null) return false;

  const headMarker = await findMarker(ctx.ports.git, head, ctx.settings.marker_search_limit);
  if (headMarker === null) return false;

  const expected = slotKeyForMarker(configuration, headMarker);
  if (expected === liveSlot) return false;

  logBridgeEvent(ctx.logger, "switch.inconsistent", {
    payload: { live_slot: liveSlot, head_slot: expected, head },
  });
  return true;
}

// =============================================================================
// SYNCED HELPERS
// =============================================================================

async function checkStrayMetadata(ctx: BridgeContext, reference: string): Promise<string[]> {
  const stray = await ctx.linker.findStrayMetadata(ctx.settings.ignore_nested);
  if (stray.length === 0) return [];

  logBridgeEvent(ctx.logger, "switch.stray_metadata", {
    ref: reference,
    payload: { paths: stray, policy: ctx.settings.partial_switch },
  });

  if (ctx.settings.partial_switch === "error") {
    throw new BridgeError(
      "PartialSwitch",
      `Nested Subversion metadata was left behind: ${stray.join(", ")}.`,
    );
  }

  return stray.map(
    (entry) => `${entry} is a separate Subversion working copy and was not switched.`,
  );
}
