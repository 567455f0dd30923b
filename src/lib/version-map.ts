import picomatch from "picomatch";
import type { ProjectVersionMap, VersionMapEntry } from "../types";
import {
  InvalidVersionMapEntryError,
  fail,
  ok,
  type ValidationResult,
} from "./errors";
import { parseVersionSpec } from "./version";

/** Either an object of project -> version, or entries in declaration order. */
export type VersionMapInput = Record<string, unknown> | readonly VersionMapEntry[];

function isEntryList(input: VersionMapInput): input is readonly VersionMapEntry[] {
  return Array.isArray(input);
}

function toPairs(input: VersionMapInput): Array<[string, unknown]> {
  if (isEntryList(input)) {
    return input.map((entry): [string, unknown] => [entry.key, entry.version]);
  }
  return Object.entries(input);
}

function asText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

/**
 * Validate a project -> version map. Keys and values are trimmed and both
 * must be non-empty; every value must be an exact version or an X-pattern.
 * Declaration order is kept for wildcard matching.
 */
export function parseVersionMap(
  input: VersionMapInput,
): ValidationResult<ProjectVersionMap> {
  const entries: VersionMapEntry[] = [];
  for (const [rawKey, rawVersion] of toPairs(input)) {
    const key = rawKey.trim();
    const version = asText(rawVersion);
    if (!key || !version) {
      return fail(
        new InvalidVersionMapEntryError(
          "ExpectedVersionMap entries must include both project name and version.",
        ),
      );
    }
    const spec = parseVersionSpec(version);
    if (!spec.ok) {
      return fail(
        new InvalidVersionMapEntryError(
          `ExpectedVersionMap entry '${key}' has an invalid version: ${spec.error.message}`,
        ),
      );
    }
    entries.push({ key, version });
  }
  return ok(entries);
}

/**
 * Parse "Name=Version" pairs as given on the command line.
 */
export function parseVersionMapArgs(
  pairs: readonly string[],
): ValidationResult<ProjectVersionMap> {
  const entries: VersionMapEntry[] = [];
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    entries.push(
      separator < 0
        ? { key: pair, version: "" }
        : { key: pair.slice(0, separator), version: pair.slice(separator + 1) },
    );
  }
  return parseVersionMap(entries);
}

export function hasWildcard(key: string): boolean {
  return key.includes("*") || key.includes("?");
}

/** Only `*` and `?` are wildcards; other glob syntax matches literally. */
export function matchesWildcard(pattern: string, name: string): boolean {
  const escaped = pattern.replace(/[\\[\]{}()!+@]/g, "\\$&");
  return picomatch.isMatch(name, escaped, { nocase: true, dot: true });
}

export interface MatchOptions {
  useWildcards?: boolean;
}

/**
 * Find the map entry for a project: an exact case-insensitive key wins,
 * otherwise (with wildcards) the first glob key in declaration order.
 */
export function matchVersionMapEntry(
  map: ProjectVersionMap,
  projectName: string,
  options: MatchOptions = {},
): VersionMapEntry | undefined {
  const lower = projectName.toLowerCase();
  const exact = map.find((entry) => entry.key.toLowerCase() === lower);
  if (exact) return exact;
  if (!options.useWildcards) return undefined;
  return map.find(
    (entry) => hasWildcard(entry.key) && matchesWildcard(entry.key, projectName),
  );
}
