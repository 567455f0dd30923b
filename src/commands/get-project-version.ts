import path from "node:path";
import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import { getProjectVersions } from "../lib/version-writer";

export interface ProjectVersionRow {
  version: string;
  source: string;
  type: string;
}

export function getProjectVersion(
  repoRoot: string,
  moduleName?: string,
  excludeFolders: string[] = [],
): ProjectVersionRow[] {
  return getProjectVersions(repoRoot, {
    moduleName,
    excludeDirectories: excludeFolders,
  }).map((info) => ({
    version: info.currentVersion,
    source: path.relative(repoRoot, info.path),
    type: info.type,
  }));
}

export const command = "get-project-version";
export const describe =
  "List the versions declared by projects, module manifests and build scripts";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("moduleName", {
      type: "string",
      describe: "Only files whose base name matches (build scripts always match)",
    })
    .option("excludeFolders", {
      type: "string",
      array: true,
      describe: "Extra directory names to skip",
    });
}

export function handler(
  argv: ArgumentsCamelCase<
    GlobalArgs & { moduleName?: string; excludeFolders?: string[] }
  >,
) {
  const rows = getProjectVersion(argv.repoRoot, argv.moduleName, argv.excludeFolders);
  console.log(JSON.stringify(rows, null, 2));
}
