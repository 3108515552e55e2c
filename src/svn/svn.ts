import path from "node:path";

import { execa, type Options } from "execa";
import fse from "fs-extra";

import { SvnError } from "../core/errors.js";
import { outputText, resolveExecaErrorOutput } from "../core/exec-output.js";

export type SvnResult = { stdout: string; stderr: string; exitCode: number };

export type SvnInfo = {
  url: string;
  revision: number;
  repositoryRoot?: string;
  repositoryUuid?: string;
};

export async function svn(cwd: string, args: string[], opts: Options = {}): Promise<SvnResult> {
  const fullArgs = ["--non-interactive", ...args];
  try {
    const res = await execa("svn", fullArgs, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: outputText(res.stdout),
      stderr: outputText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const { stdout, stderr, message } = resolveExecaErrorOutput(err);
    throw new SvnError(`svn ${args.join(" ")} failed (cwd=${cwd}): ${stderr || message}`, {
      stdout,
      stderr,
    });
  }
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function checkoutEmpty(
  url: string,
  destination: string,
  revision?: number,
): Promise<void> {
  const parent = path.dirname(destination);
  await fse.ensureDir(parent);

  const args = ["checkout", "--depth=empty"];
  if (revision !== undefined) args.push("-r", String(revision));
  args.push(url, destination);
  await svn(parent, args);
}

export async function info(workingCopy: string): Promise<SvnInfo | null> {
  const res = await svn(workingCopy, ["info"], { reject: false });
  if (res.exitCode !== 0) return null;
  return parseInfoOutput(res.stdout);
}

export async function cleanup(workingCopy: string): Promise<void> {
  await svn(workingCopy, ["cleanup"]);
}

export async function switchUrl(workingCopy: string, url: string, revision: number): Promise<void> {
  await svn(workingCopy, [
    "switch",
    "--ignore-ancestry",
    "--force",
    "--accept",
    "working",
    "-r",
    String(revision),
    `${url}@${revision}`,
    ".",
  ]);
}

export async function update(workingCopy: string, revision: number): Promise<void> {
  await svn(workingCopy, [
    "update",
    "--force",
    "--accept",
    "working",
    "--set-depth=infinity",
    "-r",
    String(revision),
  ]);
}

export async function revert(workingCopy: string): Promise<void> {
  await svn(workingCopy, ["revert", "-R", "."]);
}

export async function externals(workingCopy: string): Promise<string[]> {
  const res = await svn(workingCopy, ["status"]);
  return parseExternals(res.stdout);
}

// =============================================================================
// PARSING
// =============================================================================

export function parseInfoOutput(stdout: string): SvnInfo | null {
  const fields = new Map<string, string>();
  for (const line of stdout.split(/\r?\n/)) {
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    fields.set(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }

  const url = fields.get("URL");
  const revision = Number.parseInt(fields.get("Revision") ?? "", 10);
  if (!url || Number.isNaN(revision)) return null;

  const result: SvnInfo = { url, revision };
  const root = fields.get("Repository Root");
  const uuid = fields.get("Repository UUID");
  if (root) result.repositoryRoot = root;
  if (uuid) result.repositoryUuid = uuid;
  return result;
}

// `svn status` lists externals as "X       path/to/external".
const EXTERNAL_RE = /^\s*X\s*(.*)$/;

export function parseExternals(stdout: string): string[] {
  const found: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = EXTERNAL_RE.exec(line);
    if (!match) continue;
    const entry = match[1].trim();
    if (entry.length > 0) found.push(entry);
  }
  return found;
}
