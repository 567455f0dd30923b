import { stepVersionPattern, type VersionSpec } from "./version";

/** Anything that can list the published versions of a package id. */
export interface VersionLookup {
  listPublishedVersions(packageId: string): Promise<string[]>;
}

export interface ResolvedVersion {
  version: string;
  /** Set when an X-pattern found nothing published and started from 0 */
  warning?: string;
}

export interface ResolveOptions {
  includePrerelease?: boolean;
}

/**
 * Turn an expected version into a concrete one. Exact versions are returned
 * as they are. An X-pattern is stepped past every version published under any
 * of the package ids, so one call yields a single version shared by all of
 * them.
 */
export async function resolveExpectedVersion(
  spec: VersionSpec,
  packageIds: readonly string[],
  lookup: VersionLookup,
  options: ResolveOptions = {},
): Promise<ResolvedVersion> {
  if (spec.kind === "exact") return { version: spec.version };

  const published: string[] = [];
  for (const id of packageIds) {
    published.push(...(await lookup.listPublishedVersions(id)));
  }
  const version = stepVersionPattern(spec.pattern, published, {
    includePrerelease: options.includePrerelease,
  });
  return {
    version,
    warning:
      published.length === 0
        ? `No published version found; using 0 baseline for '${spec.pattern.text}'.`
        : undefined,
  };
}
