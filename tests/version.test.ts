import { describe, it, expect } from "vitest";
import {
  bumpVersion,
  compareVersions,
  isExactVersion,
  isPrereleaseVersion,
  maxVersion,
  normalizePublishedVersion,
  parseVersionPattern,
  parseVersionSpec,
  stepVersionPattern,
  unwrap,
  type VersionPattern,
} from "../src/index";

function pattern(text: string): VersionPattern {
  return unwrap(parseVersionPattern(text));
}

describe("isExactVersion", () => {
  it.each([
    ["1.2.3", true],
    ["1.2.3.4", true],
    [" 1.0.0 ", true],
    ["1.2", false],
    ["1.2.3-beta", false],
    ["1.2.X", false],
  ])("isExactVersion(%s) is %s", (text, expected) => {
    expect(isExactVersion(text)).toBe(expected);
  });
});

describe("parseVersionSpec", () => {
  it("classifies exact versions", () => {
    expect(unwrap(parseVersionSpec("2.0.1"))).toEqual({
      kind: "exact",
      version: "2.0.1",
    });
  });

  it("classifies X-patterns in either case", () => {
    expect(unwrap(parseVersionSpec("1.2.x"))).toEqual({
      kind: "pattern",
      pattern: { text: "1.2.x", fixed: [1, 2] },
    });
  });

  it("rejects text that is neither", () => {
    const result = parseVersionSpec("1.2");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "Expected version '1.2' is neither an exact version nor an X-pattern.",
      );
      expect(result.error.code).toBe("INVALID_VERSION_PATTERN");
    }
  });
});

describe("parseVersionPattern", () => {
  it.each([
    ["X", "Version pattern 'X' must have between 2 and 4 segments."],
    ["1.2.3.4.X", "Version pattern '1.2.3.4.X' must have between 2 and 4 segments."],
    ["1.X.3", "Version pattern '1.X.3' must contain exactly one X as its last segment."],
    ["X.X", "Version pattern 'X.X' must contain exactly one X as its last segment."],
    ["1.a.X", "Version pattern '1.a.X' has a non-numeric segment 'a'."],
  ])("rejects %s", (text, message) => {
    const result = parseVersionPattern(text);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe(message);
  });

  it("accepts 2 to 4 segments", () => {
    expect(pattern("1.X").fixed).toEqual([1]);
    expect(pattern("1.2.3.X").fixed).toEqual([1, 2, 3]);
  });
});

describe("stepVersionPattern", () => {
  const published = ["1.2.3", "1.2.4", "1.2.7", "1.3.0"];

  it("steps past the highest version sharing the prefix", () => {
    expect(stepVersionPattern(pattern("1.2.X"), published)).toBe("1.2.8");
  });

  it("starts at 0 when nothing shares the prefix", () => {
    expect(stepVersionPattern(pattern("1.4.X"), published)).toBe("1.4.0");
    expect(stepVersionPattern(pattern("1.2.X"), [])).toBe("1.2.0");
  });

  it("steps the minor segment for a two-segment pattern", () => {
    expect(stepVersionPattern(pattern("1.X"), published)).toBe("1.4");
  });

  it("ignores prereleases unless asked to include them", () => {
    const versions = ["1.2.3", "1.2.9-beta.1"];
    expect(stepVersionPattern(pattern("1.2.X"), versions)).toBe("1.2.4");
    expect(
      stepVersionPattern(pattern("1.2.X"), versions, { includePrerelease: true }),
    ).toBe("1.2.10");
  });

  it("ignores build metadata", () => {
    expect(stepVersionPattern(pattern("2.0.X"), ["2.0.5+sha.abc"])).toBe("2.0.6");
  });
});

describe("normalizePublishedVersion", () => {
  it.each([
    ["1.2.3", false, "1.2.3"],
    ["1.2.3+build", false, "1.2.3"],
    ["1.2.3-rc.1", false, undefined],
    ["1.2.3-rc.1", true, "1.2.3"],
    ["not-a-version", true, undefined],
  ])("normalizes %s (prerelease %s) to %s", (version, include, expected) => {
    expect(normalizePublishedVersion(version, include)).toBe(expected);
  });
});

describe("compareVersions", () => {
  it("treats missing segments as zero", () => {
    expect(compareVersions("1.2", "1.2.0")).toBe(0);
    expect(compareVersions("1.2.0.1", "1.2")).toBe(1);
    expect(compareVersions("1.9.0", "1.10.0")).toBe(-1);
  });

  it("picks the highest version", () => {
    expect(maxVersion(["1.9.0", "1.10.0", "1.2.0"])).toBe("1.10.0");
    expect(maxVersion([])).toBeUndefined();
  });
});

describe("isPrereleaseVersion", () => {
  it("detects prerelease labels", () => {
    expect(isPrereleaseVersion("1.0.0-beta")).toBe(true);
    expect(isPrereleaseVersion("1.0.0")).toBe(false);
  });
});

describe("bumpVersion", () => {
  it.each([
    ["1.2.3", "major", "2.0.0"],
    ["1.2.3", "minor", "1.3.0"],
    ["1.2.3", "build", "1.2.4"],
    ["1.2.3", "revision", "1.2.3.1"],
    ["1.2", "revision", "1.2.0.1"],
    ["1.2.3.4", "major", "2.0.0.0"],
    ["1.2.3.4", "minor", "1.3.0.0"],
    ["1.2.3.4", "build", "1.2.4.0"],
    ["1.2.3.4", "revision", "1.2.3.5"],
  ] as const)("bumps %s (%s) to %s", (current, kind, expected) => {
    expect(bumpVersion(current, kind)).toBe(expected);
  });

  it("throws on non-numeric versions", () => {
    expect(() => bumpVersion("1.0.0-beta", "major")).toThrow(
      "Cannot bump non-numeric version '1.0.0-beta'",
    );
  });
});
