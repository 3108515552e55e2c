import { z } from "zod";

import { ConfigError } from "../core/errors.js";
import { isoNow, pathExists, readJsonFile, shortHash, slugify, writeJsonFileAtomic } from "../core/utils.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const SlotRecordSchema = z
  .object({
    dir: z.string().min(1),
    url: z.string().optional(),
    revision: z.number().int().nonnegative().optional(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .strict();
export type SlotRecord = z.infer<typeof SlotRecordSchema>;

export const SlotIndexSchema = z
  .object({
    version: z.literal(1),
    slots: z.record(SlotRecordSchema),
  })
  .strict();
export type SlotIndex = z.infer<typeof SlotIndexSchema>;

export function emptySlotIndex(): SlotIndex {
  return { version: 1, slots: {} };
}

// =============================================================================
// NAMING
// =============================================================================

// refs/remotes/git-svn/svn/aptrunk -> refs-remotes-git-svn-svn-aptrunk-1a2b3c4d
export function slotDirName(slotKey: string): string {
  const slug = slugify(slotKey) || "slot";
  return `${slug}-${shortHash(slotKey)}`;
}

// =============================================================================
// IO
// =============================================================================

export async function loadSlotIndex(file: string): Promise<SlotIndex> {
  if (!(await pathExists(file))) {
    return emptySlotIndex();
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(file);
  } catch (err) {
    throw new ConfigError(`Failed to read slot index at ${file}`, err);
  }

  const parsed = SlotIndexSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Slot index at ${file} is invalid: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export async function saveSlotIndex(file: string, index: SlotIndex): Promise<void> {
  await writeJsonFileAtomic(file, index);
}

// =============================================================================
// MUTATIONS
// =============================================================================

// Own keys only; slot keys are ref names and may collide with Object.prototype members.
export function getSlot(index: SlotIndex, slotKey: string): SlotRecord | null {
  return Object.hasOwn(index.slots, slotKey) ? index.slots[slotKey] : null;
}

export function upsertSlot(
  index: SlotIndex,
  slotKey: string,
  patch: Partial<Pick<SlotRecord, "url" | "revision">> = {},
  now: string = isoNow(),
): SlotRecord {
  const existing = getSlot(index, slotKey);
  const record: SlotRecord = existing
    ? { ...existing, ...dropUndefined(patch), updated_at: now }
    : { dir: slotDirName(slotKey), ...dropUndefined(patch), created_at: now, updated_at: now };

  Object.defineProperty(index.slots, slotKey, {
    value: record,
    enumerable: true,
    writable: true,
    configurable: true,
  });
  return record;
}

export function findSlotByDir(index: SlotIndex, dir: string): string | null {
  for (const [key, record] of Object.entries(index.slots)) {
    if (record.dir === dir) return key;
  }
  return null;
}

function dropUndefined(
  patch: Partial<Pick<SlotRecord, "url" | "revision">>,
): Partial<Pick<SlotRecord, "url" | "revision">> {
  const out: Partial<Pick<SlotRecord, "url" | "revision">> = {};
  if (patch.url !== undefined) out.url = patch.url;
  if (patch.revision !== undefined) out.revision = patch.revision;
  return out;
}
