/**
 * Recover the Subversion coordinates a git reference represents.
 * Purpose: scan first-parent history for the newest git-svn marker line.
 * Assumptions: markers are written by git-svn on fetch/dcommit, never by svnlink.
 * Usage: await findMarker(git, "origin/svn/aptrunk", 1000).
 */

// =============================================================================
// TYPES
// =============================================================================

export type BridgeMarker = {
  url: string;
  revision: number;
  repositoryUuid?: string;
  commit?: string;
};

export type LogEntry = {
  commit: string;
  message: string;
};

export interface HistoryReader {
  log(ref: string, limit: number): Promise<LogEntry[]>;
}

// =============================================================================
// MARKER PATTERN
// =============================================================================

// git-svn-id: http://svn.example.com/repo/trunk@274190 d5d84855-3516-0410-9f1e-893281b4b339
const MARKER_RE = /^\s*git-svn-id:\s+(\S+)@(\d+)(?:\s+([0-9A-Za-z-]+))?\s*$/;

export function parseMarkerLine(line: string): BridgeMarker | null {
  const match = MARKER_RE.exec(line);
  if (!match) return null;

  const [, url, rev, uuid] = match;
  const marker: BridgeMarker = { url, revision: Number.parseInt(rev, 10) };
  if (uuid) marker.repositoryUuid = uuid;
  return marker;
}

export function extractMarker(message: string): BridgeMarker | null {
  // git-svn appends the marker last, so read from the bottom up.
  const lines = message.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const marker = parseMarkerLine(lines[i]);
    if (marker) return marker;
  }
  return null;
}

export function formatMarker(marker: BridgeMarker): string {
  const uuid = marker.repositoryUuid ? ` ${marker.repositoryUuid}` : "";
  return `git-svn-id: ${marker.url}@${marker.revision}${uuid}`;
}

// =============================================================================
// SCANNING
// =============================================================================

export async function findMarker(
  history: HistoryReader,
  reference: string,
  searchLimit: number,
): Promise<BridgeMarker | null> {
  if (!Number.isInteger(searchLimit) || searchLimit <= 0) {
    throw new RangeError(`searchLimit must be a positive integer (got ${searchLimit})`);
  }

  const entries = await history.log(reference, searchLimit);
  return scanEntries(entries.slice(0, searchLimit));
}

export function scanEntries(entries: LogEntry[]): BridgeMarker | null {
  for (const entry of entries) {
    const marker = extractMarker(entry.message);
    if (marker) {
      return { ...marker, commit: entry.commit };
    }
  }
  return null;
}
