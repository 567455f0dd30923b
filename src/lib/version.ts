import semver, { type ReleaseType } from "semver";
import type { BumpKind } from "../types";
import {
  InvalidArgumentError,
  InvalidVersionPatternError,
  fail,
  ok,
  type ValidationResult,
} from "./errors";

const EXACT_VERSION_REGEX = /^\d+\.\d+\.\d+(\.\d+)?$/;
const DOTTED_NUMERIC_REGEX = /^\d+(\.\d+){0,3}$/;

/** True for a 3 or 4 part dotted numeric version such as 1.2.3 or 1.2.3.4 */
export function isExactVersion(text: string): boolean {
  return EXACT_VERSION_REGEX.test(text.trim());
}

/**
 * Parse a dotted numeric version (1 to 4 segments) into its segments.
 * Returns undefined for anything else, including prerelease labels.
 */
export function parseVersionSegments(text: string): number[] | undefined {
  const trimmed = text.trim();
  if (!DOTTED_NUMERIC_REGEX.test(trimmed)) return undefined;
  return trimmed.split(".").map((segment) => Number.parseInt(segment, 10));
}

/** Compare two dotted numeric versions; missing trailing segments count as 0. */
export function compareVersions(a: string, b: string): number {
  const left = parseVersionSegments(a) ?? [];
  const right = parseVersionSegments(b) ?? [];
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/** Highest of the given dotted numeric versions. */
export function maxVersion(versions: Iterable<string>): string | undefined {
  let best: string | undefined;
  for (const version of versions) {
    if (!parseVersionSegments(version)) continue;
    if (best === undefined || compareVersions(version, best) > 0) {
      best = version;
    }
  }
  return best;
}

/** A version label after a "-" marks a prerelease (1.2.3-beta). */
export function isPrereleaseVersion(version: string): boolean {
  const parsed = semver.parse(version.trim(), { loose: true });
  if (parsed) return parsed.prerelease.length > 0;
  return version.includes("-");
}

/**
 * Normalize a published version for comparison: strip build metadata, then
 * either drop prereleases or strip their label.
 * E.g., "1.2.3-beta.1" -> "1.2.3" when prereleases are included.
 */
export function normalizePublishedVersion(
  version: string,
  includePrerelease: boolean,
): string | undefined {
  let text = version.trim();
  const plus = text.indexOf("+");
  if (plus >= 0) text = text.slice(0, plus);
  const dash = text.indexOf("-");
  if (dash >= 0) {
    if (!includePrerelease) return undefined;
    text = text.slice(0, dash);
  }
  return parseVersionSegments(text) ? text : undefined;
}

export interface VersionPattern {
  /** Original text, e.g. "1.2.X" */
  text: string;
  /** Segments before the X placeholder */
  fixed: number[];
}

export type VersionSpec =
  | { kind: "exact"; version: string }
  | { kind: "pattern"; pattern: VersionPattern };

/** Classify an expected version as an exact version or an X-pattern. */
export function parseVersionSpec(text: string): ValidationResult<VersionSpec> {
  const trimmed = text.trim();
  if (isExactVersion(trimmed)) {
    return ok({ kind: "exact", version: trimmed });
  }
  if (!/x/i.test(trimmed)) {
    return fail(
      new InvalidVersionPatternError(
        `Expected version '${text}' is neither an exact version nor an X-pattern.`,
      ),
    );
  }
  const pattern = parseVersionPattern(trimmed);
  return pattern.ok ? ok({ kind: "pattern", pattern: pattern.value }) : pattern;
}

/**
 * Accept 2 to 4 dot-separated segments where the last one, and only the last
 * one, is X (either case) and the rest are non-negative integers.
 */
export function parseVersionPattern(
  text: string,
): ValidationResult<VersionPattern> {
  const trimmed = text.trim();
  const segments = trimmed.split(".");
  if (segments.length < 2 || segments.length > 4) {
    return fail(
      new InvalidVersionPatternError(
        `Version pattern '${text}' must have between 2 and 4 segments.`,
      ),
    );
  }

  const placeholders = segments.filter((s) => s === "X" || s === "x").length;
  const last = segments[segments.length - 1];
  if (placeholders !== 1 || (last !== "X" && last !== "x")) {
    return fail(
      new InvalidVersionPatternError(
        `Version pattern '${text}' must contain exactly one X as its last segment.`,
      ),
    );
  }

  const fixed: number[] = [];
  for (const segment of segments.slice(0, -1)) {
    if (!/^\d+$/.test(segment)) {
      return fail(
        new InvalidVersionPatternError(
          `Version pattern '${text}' has a non-numeric segment '${segment}'.`,
        ),
      );
    }
    fixed.push(Number.parseInt(segment, 10));
  }

  return ok({ text: trimmed, fixed });
}

export interface StepOptions {
  includePrerelease?: boolean;
}

/**
 * Compute the next version for a pattern: the fixed prefix followed by one
 * more than the highest published value in the X position among versions that
 * share the prefix, or 0 when none do.
 *
 * E.g., "1.2.X" with 1.2.3, 1.2.4, 1.2.7, 1.3.0 published -> "1.2.8"
 */
export function stepVersionPattern(
  pattern: VersionPattern,
  publishedVersions: Iterable<string>,
  options: StepOptions = {},
): string {
  const xIndex = pattern.fixed.length;
  let highest: number | undefined;

  for (const published of publishedVersions) {
    const normalized = normalizePublishedVersion(
      published,
      options.includePrerelease ?? false,
    );
    if (!normalized) continue;
    const segments = parseVersionSegments(normalized);
    if (!segments) continue;

    const sharesPrefix = pattern.fixed.every(
      (value, index) => (segments[index] ?? 0) === value,
    );
    if (!sharesPrefix) continue;

    const value = segments[xIndex] ?? 0;
    if (highest === undefined || value > highest) highest = value;
  }

  const next = highest === undefined ? 0 : highest + 1;
  return [...pattern.fixed, next].join(".");
}

const SEMVER_BUMP: Record<Exclude<BumpKind, "revision">, ReleaseType> = {
  major: "major",
  minor: "minor",
  build: "patch",
};

/**
 * Bump one segment of a dotted version and reset the ones after it.
 * A 3-part version stays 3-part unless a revision is bumped, which appends
 * a fourth segment.
 */
export function bumpVersion(current: string, kind: BumpKind): string {
  const segments = parseVersionSegments(current);
  if (!segments) {
    throw new InvalidArgumentError(
      `Cannot bump non-numeric version '${current}'`,
    );
  }

  if (segments.length <= 3 && kind !== "revision") {
    const padded = [...segments, 0, 0].slice(0, 3).join(".");
    const bumped = semver.inc(padded, SEMVER_BUMP[kind]);
    if (!bumped) {
      throw new InvalidArgumentError(`Failed to bump ${kind} on version ${current}`);
    }
    return bumped;
  }

  const parts = [...segments];
  while (parts.length < 4) parts.push(0);
  switch (kind) {
    case "major":
      return [parts[0] + 1, 0, 0, 0].join(".");
    case "minor":
      return [parts[0], parts[1] + 1, 0, 0].join(".");
    case "build":
      return [parts[0], parts[1], parts[2] + 1, 0].join(".");
    case "revision":
      return [parts[0], parts[1], parts[2], parts[3] + 1].join(".");
  }
}
