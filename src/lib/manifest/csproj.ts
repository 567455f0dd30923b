import path from "node:path";

/** Elements rewritten when a project's version changes. */
export const CSPROJ_VERSION_TAGS = [
  "Version",
  "VersionPrefix",
  "PackageVersion",
  "AssemblyVersion",
  "FileVersion",
  "InformationalVersion",
] as const;

/** Elements consulted, in order, for a project's current version. */
const CSPROJ_READ_TAGS = ["Version", "VersionPrefix", "PackageVersion"] as const;

function tagRegex(tag: string, flags = "i"): RegExp {
  return new RegExp(`<(${tag})>([\\d.]+)</(${tag})>`, flags);
}

export function readCsprojVersionFromContent(content: string): string | undefined {
  for (const tag of CSPROJ_READ_TAGS) {
    const match = content.match(tagRegex(tag));
    if (match) return match[2];
  }
  return undefined;
}

/**
 * Replace the dotted numeric body of every version element. Missing elements
 * are not added; element casing and values already at the target are kept.
 */
export function applyCsprojVersion(content: string, version: string): string {
  let updated = content;
  for (const tag of CSPROJ_VERSION_TAGS) {
    updated = updated.replace(
      tagRegex(tag, "gi"),
      (whole: string, open: string, current: string, close: string) =>
        current === version ? whole : `<${open}>${version}</${close}>`,
    );
  }
  return updated;
}

const IS_PACKABLE_REGEX = /<IsPackable>\s*([^<]*?)\s*<\/IsPackable>/i;

/** A project is packable unless it says <IsPackable>false</IsPackable>. */
export function isPackableContent(content: string): boolean {
  const match = content.match(IS_PACKABLE_REGEX);
  return !match || match[1].toLowerCase() !== "false";
}

const PROJECT_REFERENCE_REGEX = /<ProjectReference\b[^>]*\bInclude\s*=\s*"([^"]+)"/gi;

/**
 * Absolute paths of the projects referenced through <ProjectReference>.
 * Windows separators in Include attributes are normalized.
 */
export function readProjectReferences(csprojPath: string, content: string): string[] {
  const dir = path.dirname(csprojPath);
  const references: string[] = [];
  for (const match of content.matchAll(PROJECT_REFERENCE_REGEX)) {
    const include = match[1].trim().replace(/\\/g, "/");
    if (!include) continue;
    references.push(path.resolve(dir, include));
  }
  return references;
}
