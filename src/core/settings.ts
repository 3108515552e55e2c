import { z } from "zod";

// Local, per-repository tool settings. The bridge configuration itself (remotes and
// fetch mappings) lives on the config branch; see bridge/config-store.ts.

export const PartialSwitchPolicySchema = z.enum(["warn", "error"]);
export type PartialSwitchPolicy = z.infer<typeof PartialSwitchPolicySchema>;

export const BridgeSettingsSchema = z
  .object({
    config_branch: z.string().min(1).default("svnlink-config"),
    remote_base: z.string().min(1).default("refs/remotes/git-svn/svn"),

    // "<from>:<to>" prefix rewrite between local tracking refs and published branches.
    remap: z
      .string()
      .regex(/^[^:]*:[^:]*$/, 'Expected "<from>:<to>"')
      .default("git-svn/:"),

    marker_search_limit: z.number().int().positive().default(1000),

    partial_switch: PartialSwitchPolicySchema.default("warn"),
    // Globs (relative to the worktree) excluded from the nested .svn scan.
    ignore_nested: z.array(z.string().min(1)).default([]),
  })
  .strict();

export type BridgeSettings = z.infer<typeof BridgeSettingsSchema>;

export type BridgeSettingsOverrides = Partial<BridgeSettings>;

export const DEFAULT_SETTINGS: BridgeSettings = BridgeSettingsSchema.parse({});

export function applySettingsOverrides(
  settings: BridgeSettings,
  overrides: BridgeSettingsOverrides = {},
): BridgeSettings {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return BridgeSettingsSchema.parse({ ...settings, ...defined });
}

export function parseRemap(remap: string): { from: string; to: string } {
  const separator = remap.indexOf(":");
  return { from: remap.slice(0, separator), to: remap.slice(separator + 1) };
}
