import fs from "node:fs";
import path from "node:path";
import { SourceKind, type DiscoveredFile } from "../types";
import { looksLikeBuildScript, readVersionFromContent } from "./manifest";

export const DEFAULT_EXCLUDE_DIRECTORIES = [
  ".git",
  ".vs",
  "bin",
  "obj",
  "node_modules",
] as const;

/** Lower-cased directory names never descended into. */
export function buildExcludeDirectories(
  extra: readonly string[] = [],
): Set<string> {
  const names = new Set<string>(DEFAULT_EXCLUDE_DIRECTORIES);
  for (const name of extra) {
    const trimmed = name.trim().replace(/^"|"$/g, "");
    if (trimmed) names.add(trimmed.toLowerCase());
  }
  return names;
}

function classify(fileName: string): SourceKind | undefined {
  const ext = path.extname(fileName).toLowerCase();
  if (ext === ".csproj") return SourceKind.Csproj;
  if (ext === ".psd1") return SourceKind.PowerShellModule;
  if (ext === ".ps1") return SourceKind.BuildScript;
  return undefined;
}

/** Ordinal, case-insensitive comparison of full paths. */
export function comparePaths(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function readText(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch {
    return undefined;
  }
}

/**
 * Walk the tree below rootPath and return every project, module manifest and
 * build script found, with the version each declares. Excluded directory
 * names are matched case-insensitively and pruned before descending.
 */
export function discover(
  rootPath: string,
  excludeDirectoryNames: ReadonlySet<string> = buildExcludeDirectories(),
): DiscoveredFile[] {
  const excluded = new Set(
    [...excludeDirectoryNames].map((name) => name.toLowerCase()),
  );
  const files: DiscoveredFile[] = [];
  const pending = [path.resolve(rootPath)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!excluded.has(entry.name.toLowerCase())) pending.push(full);
        continue;
      }
      if (!entry.isFile()) continue;

      const kind = classify(entry.name);
      if (!kind) continue;
      const content = readText(full);
      if (content === undefined) continue;
      if (kind === SourceKind.BuildScript && !looksLikeBuildScript(content)) {
        continue;
      }
      files.push({
        path: full,
        kind,
        currentVersion: readVersionFromContent(content, kind),
      });
    }
  }

  return files.sort((a, b) => comparePaths(a.path, b.path));
}

const KIND_PRIORITY: readonly SourceKind[] = [
  SourceKind.Csproj,
  SourceKind.PowerShellModule,
  SourceKind.BuildScript,
];

/** First declared version: projects first, then module manifests, then build scripts. */
export function findCurrentVersion(
  files: readonly DiscoveredFile[],
): string | undefined {
  for (const kind of KIND_PRIORITY) {
    const found = files.find(
      (file) => file.kind === kind && file.currentVersion !== undefined,
    );
    if (found?.currentVersion) return found.currentVersion;
  }
  return undefined;
}

/**
 * Keep the files whose base name matches the module name. Build scripts are
 * never filtered out.
 */
export function filterByModuleName(
  files: readonly DiscoveredFile[],
  moduleName: string | undefined,
): DiscoveredFile[] {
  const wanted = moduleName?.trim().toLowerCase();
  if (!wanted) return [...files];
  return files.filter((file) => {
    if (file.kind === SourceKind.BuildScript) return true;
    const base = path.basename(file.path, path.extname(file.path));
    return base.toLowerCase() === wanted;
  });
}
