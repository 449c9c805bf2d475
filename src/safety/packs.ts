/**
 * Capability packs and the method allowlist.
 *
 * A pack is a named group of glob patterns. The effective allowlist is the
 * base list (`B24_METHOD_ALLOWLIST`) followed by the patterns of every
 * selected pack, lowercased and de-duplicated in order.
 */

import { minimatch } from "minimatch";
import { workflowError } from "../client/errors.js";

export const PACK_METHOD_ALLOWLIST = {
  core: [
    "batch",
    "user.*",
    "department.*",
    "crm.*",
    "tasks.task.*",
    "task.*",
    "event.*",
  ],
  comms: [
    "im.*",
    "imbot.*",
    "imopenlines.*",
    "imconnector.*",
    "messageservice.*",
    "mailservice.*",
    "telephony.*",
  ],
  automation: ["bizproc.*", "crm.automation.*", "lists.*"],
  collab: ["sonet_group.*", "socialnetwork.*", "log.*", "calendar.*", "vote.*"],
  content: ["disk.*", "file.*", "files.*", "documentgenerator.*"],
  boards: ["tasks.api.scrum.*", "tasks.scrum.*"],
  commerce: ["sale.*", "catalog.*"],
  services: ["booking.*", "calendar.*", "timeman.*"],
  platform: ["entity.*", "biconnector.*", "ai.*"],
  sites: ["landing.*"],
  compliance: ["userconsent.*", "sign.*"],
  diagnostics: [
    "method.get",
    "methods",
    "events",
    "feature.get",
    "scope",
    "server.time",
  ],
} as const satisfies Record<string, readonly string[]>;

export type PackName = keyof typeof PACK_METHOD_ALLOWLIST;

export const DEFAULT_PACKS: readonly PackName[] = ["core"];
export const DEFAULT_METHOD_ALLOWLIST: readonly string[] = ["batch"];

export function isPackName(name: string): name is PackName {
  return Object.prototype.hasOwnProperty.call(PACK_METHOD_ALLOWLIST, name);
}

export function availablePacks(): PackName[] {
  return Object.keys(PACK_METHOD_ALLOWLIST).filter(isPackName).sort();
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
}

export function parseMethodAllowlist(raw: string | undefined): string[] {
  if (!raw) return [...DEFAULT_METHOD_ALLOWLIST];
  const patterns = splitList(raw);
  return patterns.length > 0 ? patterns : [...DEFAULT_METHOD_ALLOWLIST];
}

/**
 * Parse a comma separated pack list. Empty input selects the default packs,
 * `none` selects nothing, and an unknown name is a configuration error.
 */
export function parsePackList(raw: string | undefined): PackName[] {
  if (raw === undefined || !raw.trim()) return [...DEFAULT_PACKS];
  const names = splitList(raw);
  if (names.length === 1 && names[0] === "none") return [];

  const selected: PackName[] = [];
  for (const name of names) {
    if (!isPackName(name)) {
      throw workflowError(
        "UNKNOWN_PACK",
        `unknown pack '${name}', available packs: ${availablePacks().join(", ")}`,
      );
    }
    if (!selected.includes(name)) selected.push(name);
  }
  return selected;
}

export function expandAllowlist(
  basePatterns: readonly string[],
  packs: readonly PackName[],
): string[] {
  const merged: string[] = [];
  const seen = new Set<string>();
  const add = (pattern: string) => {
    const key = pattern.toLowerCase();
    if (seen.has(key)) return;
    seen.add(key);
    merged.push(key);
  };
  for (const pattern of basePatterns) add(pattern);
  for (const pack of packs) {
    for (const pattern of PACK_METHOD_ALLOWLIST[pack]) add(pattern);
  }
  return merged;
}

/** Case-insensitive glob match; `*` also crosses dots. */
export function isAllowed(method: string, patterns: readonly string[]): boolean {
  const candidate = method.toLowerCase();
  return patterns.some((pattern) =>
    minimatch(candidate, pattern, { dot: true, nocomment: true, nonegate: true }),
  );
}
