/**
 * Bridge configuration store.
 * Purpose: read and write the git-config formatted file kept on the config branch.
 * Assumptions: the file may carry sections owned by git itself; only `svn-remote`
 * sections are interpreted, everything else is skipped.
 * Usage: parseConfiguration(text), serializeConfiguration(config).
 */

import { BridgeError } from "../core/errors.js";

import type { BridgeMarker } from "./log-scanner.js";

// =============================================================================
// TYPES
// =============================================================================

export type FetchMapping = {
  centralizedPath: string;
  branchRef: string;
};

export type BridgeRemote = {
  name: string;
  baseUrl: string;
  fetchMappings: FetchMapping[];
};

export type Configuration = {
  remotes: Map<string, BridgeRemote>;
};

export type ConfigEntry = {
  key: string;
  value: string;
  line: number;
};

export type ConfigSection = {
  kind: string;
  name: string | null;
  entries: ConfigEntry[];
  line: number;
};

export const REMOTE_SECTION_KIND = "svn-remote";
export const CONFIG_FILE_NAME = "config";
export const DEFAULT_REMOTE_NAME = "svn";

// =============================================================================
// DOCUMENT PARSING
// =============================================================================

const HEADER_RE = /^\[\s*([A-Za-z0-9.-]+)(?:\s+"((?:[^"\\]|\\.)*)")?\s*\]$/;
const ENTRY_RE = /^([A-Za-z][A-Za-z0-9-]*)\s*(?:=\s*(.*))?$/;

export function parseConfigDocument(text: string): ConfigSection[] {
  const sections: ConfigSection[] = [];
  let current: ConfigSection | null = null;

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const lineNumber = index + 1;
    const line = lines[index].trim();
    if (line.length === 0 || line.startsWith("#") || line.startsWith(";")) continue;

    if (line.startsWith("[")) {
      current = parseHeader(line, lineNumber);
      sections.push(current);
      continue;
    }

    const match = ENTRY_RE.exec(line);
    if (!match) {
      throw malformed(`line ${lineNumber}: cannot read "${line}" as "key = value"`);
    }
    if (!current) {
      throw malformed(`line ${lineNumber}: "${line}" appears before any [section] header`);
    }

    const key = match[1].toLowerCase();
    const value = match[2] === undefined ? "true" : parseValue(match[2], lineNumber);
    current.entries.push({ key, value, line: lineNumber });
  }

  return sections;
}

export function sectionsOfKind(sections: ConfigSection[], kind: string): ConfigSection[] {
  const wanted = kind.toLowerCase();
  return sections.filter((section) => section.kind === wanted);
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export function parseConfiguration(text: string): Configuration {
  const sections = sectionsOfKind(parseConfigDocument(text), REMOTE_SECTION_KIND);
  const remotes = new Map<string, BridgeRemote>();

  // git merges repeated headers for the same remote; do the same.
  const grouped = new Map<string, ConfigEntry[]>();
  for (const section of sections) {
    if (section.name === null) {
      throw malformed(`line ${section.line}: [${REMOTE_SECTION_KIND}] needs a remote name`);
    }
    const entries = grouped.get(section.name) ?? [];
    entries.push(...section.entries);
    grouped.set(section.name, entries);
  }

  for (const [name, entries] of grouped) {
    remotes.set(name, buildRemote(name, entries));
  }

  return { remotes };
}

export function serializeConfiguration(config: Configuration): string {
  const blocks: string[] = [];

  for (const remote of config.remotes.values()) {
    assertRemoteValid(remote);
    const lines = [`[${REMOTE_SECTION_KIND} "${escapeSubsection(remote.name)}"]`];
    lines.push(`\turl = ${formatValue(remote.baseUrl)}`);
    for (const mapping of remote.fetchMappings) {
      lines.push(`\tfetch = ${formatValue(`${mapping.centralizedPath}:${mapping.branchRef}`)}`);
    }
    blocks.push(lines.join("\n"));
  }

  return blocks.length > 0 ? `${blocks.join("\n")}\n` : "";
}

export function listRemotes(config: Configuration): BridgeRemote[] {
  return Array.from(config.remotes.values());
}

// =============================================================================
// BUILDERS
// =============================================================================

export function parseMappingArgument(arg: string): { centralizedPath: string; name: string } {
  const match = /^([^:]*):([^:]+)$/.exec(arg.trim());
  if (!match) {
    throw new BridgeError(
      "InvalidArguments",
      `Mapping "${arg}" must look like <svn-path>:<branch-name>, e.g. branches/ap/trunk:aptrunk.`,
    );
  }
  return { centralizedPath: match[1], name: match[2] };
}

export function buildConfiguration(args: {
  url: string;
  mappings: string[];
  remoteBase: string;
  remoteName?: string;
}): Configuration {
  const fetchMappings = args.mappings.map((arg) => {
    const { centralizedPath, name } = parseMappingArgument(arg);
    const branchRef = name.startsWith("refs/") ? name : joinRef(args.remoteBase, name);
    return { centralizedPath, branchRef };
  });

  const remote: BridgeRemote = {
    name: args.remoteName ?? DEFAULT_REMOTE_NAME,
    baseUrl: args.url.trim(),
    fetchMappings,
  };
  assertRemoteValid(remote);

  return { remotes: new Map([[remote.name, remote]]) };
}

// =============================================================================
// LOOKUPS
// =============================================================================

export function mappingUrl(remote: BridgeRemote, mapping: FetchMapping): string {
  return joinUrl(remote.baseUrl, mapping.centralizedPath);
}

/**
 * Resolve the storage slot key for a marker: the branchRef of the mapping whose
 * URL matches, or the marker URL itself when no declared mapping covers it.
 */
export function slotKeyForMarker(config: Configuration | null, marker: BridgeMarker): string {
  const url = trimSlashes(marker.url);
  if (config) {
    for (const remote of config.remotes.values()) {
      for (const mapping of remote.fetchMappings) {
        if (trimSlashes(mappingUrl(remote, mapping)) === url) {
          return mapping.branchRef;
        }
      }
    }
  }
  return url;
}

/** Find mappings whose branchRef ends with `/<name>` (or equals it). */
export function findMappingsByName(
  config: Configuration,
  name: string,
): Array<{ remote: BridgeRemote; mapping: FetchMapping }> {
  const matches: Array<{ remote: BridgeRemote; mapping: FetchMapping }> = [];
  for (const remote of config.remotes.values()) {
    for (const mapping of remote.fetchMappings) {
      if (mapping.branchRef === name || mapping.branchRef.endsWith(`/${name}`)) {
        matches.push({ remote, mapping });
      }
    }
  }
  return matches;
}

export function joinRef(base: string, name: string): string {
  return `${base.replace(/\/+$/, "")}/${name.replace(/^\/+/, "")}`;
}

export function joinUrl(base: string, relative: string): string {
  const trimmedRelative = relative.replace(/^\/+/, "");
  if (trimmedRelative.length === 0) return base.replace(/\/+$/, "");
  return `${base.replace(/\/+$/, "")}/${trimmedRelative}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function buildRemote(name: string, entries: ConfigEntry[]): BridgeRemote {
  const urls = entries.filter((entry) => entry.key === "url");
  if (urls.length === 0) {
    throw malformed(`remote "${name}" has no url`);
  }
  if (urls.length > 1) {
    throw malformed(`remote "${name}" declares url ${urls.length} times (line ${urls[1].line})`);
  }

  const baseUrl = urls[0].value.trim();
  if (baseUrl.length === 0) {
    throw malformed(`remote "${name}" has an empty url (line ${urls[0].line})`);
  }

  const fetchMappings = entries
    .filter((entry) => entry.key === "fetch")
    .map((entry) => parseFetchValue(name, entry));

  const remote: BridgeRemote = { name, baseUrl, fetchMappings };
  assertRemoteValid(remote);
  return remote;
}

function parseFetchValue(remoteName: string, entry: ConfigEntry): FetchMapping {
  // An empty path maps the repository root, e.g. `fetch = :refs/remotes/git-svn`.
  const parts = entry.value.split(":");
  if (parts.length !== 2 || parts[1].trim().length === 0) {
    throw malformed(
      `remote "${remoteName}" line ${entry.line}: fetch "${entry.value}" must be <svn-path>:<branch-ref>`,
    );
  }
  return { centralizedPath: parts[0].trim(), branchRef: parts[1].trim() };
}

function assertRemoteValid(remote: BridgeRemote): void {
  if (remote.baseUrl.trim().length === 0) {
    throw malformed(`remote "${remote.name}" has an empty url`);
  }

  const seen = new Set<string>();
  for (const mapping of remote.fetchMappings) {
    if (mapping.branchRef.trim().length === 0) {
      throw malformed(`remote "${remote.name}" has a fetch mapping without a branch ref`);
    }
    if (mapping.centralizedPath.includes(":") || mapping.branchRef.includes(":")) {
      throw malformed(`remote "${remote.name}": fetch paths and refs cannot contain ":"`);
    }
    if (seen.has(mapping.branchRef)) {
      throw malformed(`remote "${remote.name}" maps ${mapping.branchRef} more than once`);
    }
    seen.add(mapping.branchRef);
  }
}

function parseHeader(line: string, lineNumber: number): ConfigSection {
  const match = HEADER_RE.exec(line);
  if (!match) {
    throw malformed(`line ${lineNumber}: cannot read section header "${line}"`);
  }

  const [, rawKind, quotedName] = match;
  if (quotedName !== undefined) {
    return {
      kind: rawKind.toLowerCase(),
      name: quotedName.replace(/\\(.)/g, "$1"),
      entries: [],
      line: lineNumber,
    };
  }

  // Legacy form: [svn-remote.svn]
  const dot = rawKind.indexOf(".");
  if (dot > 0) {
    return {
      kind: rawKind.slice(0, dot).toLowerCase(),
      name: rawKind.slice(dot + 1),
      entries: [],
      line: lineNumber,
    };
  }

  return { kind: rawKind.toLowerCase(), name: null, entries: [], line: lineNumber };
}

function parseValue(raw: string, lineNumber: number): string {
  let out = "";
  let quoted = false;
  let pendingSpace = "";

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];

    if (ch === "\\") {
      const next = raw[i + 1];
      if (next === undefined) {
        throw malformed(`line ${lineNumber}: value ends with a dangling backslash`);
      }
      out += pendingSpace + unescapeChar(next);
      pendingSpace = "";
      i += 1;
      continue;
    }
    if (ch === '"') {
      out += pendingSpace;
      pendingSpace = "";
      quoted = !quoted;
      continue;
    }
    if (!quoted && (ch === "#" || ch === ";")) {
      break;
    }
    if (!quoted && (ch === " " || ch === "\t")) {
      pendingSpace += ch;
      continue;
    }

    out += pendingSpace + ch;
    pendingSpace = "";
  }

  if (quoted) {
    throw malformed(`line ${lineNumber}: unterminated quoted value`);
  }

  return out;
}

function unescapeChar(ch: string): string {
  switch (ch) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    default:
      return ch;
  }
}

function formatValue(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t");
  const needsQuotes = /^\s|\s$|[#;]/.test(value);
  return needsQuotes ? `"${escaped}"` : escaped;
}

function escapeSubsection(name: string): string {
  return name.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

function malformed(message: string): BridgeError {
  return new BridgeError("MalformedConfig", `Malformed bridge configuration: ${message}`);
}
