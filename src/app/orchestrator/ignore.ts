import type { BridgeContext } from "./context.js";

/**
 * Ignore patterns for a .gitignore: Subversion externals (git does not track
 * them) plus the svn:ignore patterns git-svn reports. Sorted and de-duplicated.
 */
export async function generateIgnore(ctx: BridgeContext): Promise<string[]> {
  const externals = await ctx.ports.svn.externals(ctx.paths.worktree);
  const ignores = (await ctx.ports.git.svnShowIgnore())
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));

  return Array.from(new Set([...externals, ...ignores])).sort();
}
