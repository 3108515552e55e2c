/**
 * BridgeContext bundles what every bridge operation needs for one worktree.
 * Purpose: resolve paths + settings once and pass ports/logger explicitly instead of globals.
 * Assumptions: the worktree already exists (clone/init create it before building a context).
 * Usage: const ctx = createBridgeContext({ worktree, ports }); await runSwitch(ctx, {...}).
 */

import { JsonlLogger, type EventLog } from "../../core/logger.js";
import {
  createBridgePaths,
  eventsLogPath,
  settingsPath,
  type BridgePaths,
} from "../../core/paths.js";
import { loadBridgeSettings } from "../../core/settings-loader.js";
import {
  applySettingsOverrides,
  type BridgeSettings,
  type BridgeSettingsOverrides,
} from "../../core/settings.js";
import { defaultOperationId } from "../../core/utils.js";
import { WorkingCopyLinker } from "../../bridge/working-copy-linker.js";

import type { BridgePorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type BridgeContext = {
  opId: string;
  paths: BridgePaths;
  settings: BridgeSettings;
  ports: BridgePorts;
  linker: WorkingCopyLinker;
  logger: EventLog;
};

export type CreateBridgeContextInput = {
  worktree: string;
  ports: BridgePorts;
  overrides?: BridgeSettingsOverrides;
  logger?: EventLog;
  opId?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createBridgeContext(input: CreateBridgeContextInput): BridgeContext {
  const paths = createBridgePaths(input.worktree);
  const loaded = loadBridgeSettings(settingsPath(paths));
  const settings = applySettingsOverrides(loaded, input.overrides ?? {});
  const opId = input.opId ?? defaultOperationId();
  const logger = input.logger ?? new JsonlLogger(eventsLogPath(paths), { opId });

  return {
    opId,
    paths,
    settings,
    ports: input.ports,
    linker: new WorkingCopyLinker(paths, input.ports.svn),
    logger,
  };
}

export function closeBridgeContext(ctx: BridgeContext): void {
  ctx.logger.close();
}
