/**
 * Status report.
 * Purpose: show which branch HEAD represents and whether .svn matches it.
 * Usage: const report = await collectStatus(ctx); formatStatus(report).
 */

import { slotKeyForMarker } from "../../bridge/config-store.js";
import { findMarker, type BridgeMarker } from "../../bridge/log-scanner.js";
import { loadSlotIndex } from "../../bridge/slot-index.js";
import { slotIndexPath } from "../../core/paths.js";

import { loadConfiguration } from "./configuration.js";
import type { BridgeContext } from "./context.js";
import type { CentralizedInfo } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type SlotSummary = {
  key: string;
  dir: string;
  url?: string;
  revision?: number;
  live: boolean;
};

export type StatusReport = {
  configRef: string;
  head: string | null;
  marker: BridgeMarker | null;
  expectedSlot: string | null;
  liveSlot: string | null;
  live: CentralizedInfo | null;
  // .svn points at the slot HEAD's marker maps to.
  linked: boolean;
  // ...and that slot sits at the marker's url and revision.
  upToDate: boolean;
  slots: SlotSummary[];
  stray: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function collectStatus(ctx: BridgeContext): Promise<StatusReport> {
  const { git, svn } = ctx.ports;
  const { ref: configRef, configuration } = await loadConfiguration(
    git,
    ctx.settings.config_branch,
  );

  const head = await git.headCommit();
  const marker =
    head === null ? null : await findMarker(git, head, ctx.settings.marker_search_limit);
  const expectedSlot = marker === null ? null : slotKeyForMarker(configuration, marker);

  const liveSlot = await ctx.linker.liveSlotKey();
  const live = liveSlot === null ? null : await svn.info(ctx.paths.worktree);

  const linked = expectedSlot !== null && liveSlot === expectedSlot;
  const upToDate =
    linked &&
    marker !== null &&
    live !== null &&
    live.url === marker.url &&
    live.revision === marker.revision;

  const index = await loadSlotIndex(slotIndexPath(ctx.paths));
  const slots = Object.entries(index.slots)
    .map(([key, record]) => ({
      key,
      dir: record.dir,
      url: record.url,
      revision: record.revision,
      live: key === liveSlot,
    }))
    .sort((a, b) => a.key.localeCompare(b.key));

  const stray = await ctx.linker.findStrayMetadata(ctx.settings.ignore_nested);

  return { configRef, head, marker, expectedSlot, liveSlot, live, linked, upToDate, slots, stray };
}

export function formatStatus(report: StatusReport): string[] {
  const lines: string[] = [];
  lines.push(`Config branch: ${report.configRef}`);
  lines.push(`HEAD: ${report.head ?? "(no commits)"}`);
  lines.push(
    report.marker
      ? `Subversion: ${report.marker.url}@${report.marker.revision}`
      : "Subversion: no git-svn-id marker in HEAD's history",
  );
  lines.push(`Live slot: ${report.liveSlot ?? "(none)"}`);

  if (report.expectedSlot !== null && !report.linked) {
    lines.push(`.svn should point at ${report.expectedSlot}; run \`svnlink update\`.`);
  } else if (report.linked && !report.upToDate) {
    lines.push(".svn is linked but not at HEAD's revision; run `svnlink update`.");
  } else if (report.upToDate) {
    lines.push(".svn matches HEAD.");
  }

  if (report.slots.length > 0) {
    lines.push("Slots:");
    for (const slot of report.slots) {
      const at = slot.url ? ` ${slot.url}@${slot.revision ?? "?"}` : "";
      lines.push(`  ${slot.live ? "*" : " "} ${slot.key}${at}`);
    }
  }

  for (const entry of report.stray) {
    lines.push(`Nested working copy: ${entry}`);
  }

  return lines;
}
