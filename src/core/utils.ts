import { createHash, randomUUID } from "node:crypto";
import path from "node:path";

import fse from "fs-extra";

export function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function shortHash(input: string, length = 8): string {
  return createHash("sha256").update(input).digest("hex").slice(0, length);
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultOperationId(): string {
  // YYYYMMDD-HHMMSS-xxxx
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}-${randomUUID().slice(0, 4)}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

// Write to a sibling temp file, then rename over the target.
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  await fse.writeFile(tempPath, JSON.stringify(data, null, 2) + "\n", "utf8");
  await fse.rename(tempPath, filePath);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fse.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}
