import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { BridgeError } from "./errors.js";
import { lockPath, type BridgePaths } from "./paths.js";
import { isoNow } from "./utils.js";

// =============================================================================
// ADVISORY LOCK
// =============================================================================

export async function withBridgeLock<T>(
  paths: BridgePaths,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const file = lockPath(paths);
  await fse.ensureDir(path.dirname(file));

  try {
    await fse.writeFile(
      file,
      `${JSON.stringify({ pid: process.pid, operation, started_at: isoNow() })}\n`,
      { flag: "wx" },
    );
  } catch (err) {
    if (isAlreadyExists(err)) {
      const holder = await readHolder(file);
      throw new BridgeError(
        "Locked",
        `Another svnlink command is running in ${paths.worktree}${holder}. ` +
          `Remove ${file} if that process is gone.`,
        err,
      );
    }
    throw err;
  }

  try {
    return await fn();
  } finally {
    await fse.remove(file);
  }
}

const LockHolderSchema = z.object({ pid: z.number().int(), operation: z.string() });

// The holder is only context for the message; an unreadable lock file still means locked.
async function readHolder(file: string): Promise<string> {
  if (!(await fse.pathExists(file))) return "";
  const raw = await fse.readFile(file, "utf8");
  const parsed = LockHolderSchema.safeParse(parseJsonOrNull(raw));
  return parsed.success ? ` (${parsed.data.operation}, pid ${parsed.data.pid})` : "";
}

function parseJsonOrNull(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isAlreadyExists(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "EEXIST";
}
