import type { ArgumentsCamelCase, Argv } from "yargs";
import { BUMP_KINDS, type BumpKind, type GlobalArgs, type ShouldProcess } from "../types";
import { createConsoleLogger } from "../lib/logger";
import {
  setProjectVersion as setVersions,
  type SetProjectVersionResult,
} from "../lib/version-writer";

export interface SetProjectVersionArgs {
  newVersion?: string;
  type?: BumpKind;
  moduleName?: string;
  excludeFolders?: string[];
  whatIf?: boolean;
  verbose?: boolean;
}

export function setProjectVersion(
  repoRoot: string,
  args: SetProjectVersionArgs,
): SetProjectVersionResult {
  const logger = createConsoleLogger(args.verbose);
  const shouldProcess: ShouldProcess = (target, action) => {
    if (!args.whatIf) return true;
    logger.info(`What if: ${action} on ${target}`);
    return false;
  };
  return setVersions({
    rootPath: repoRoot,
    newVersion: args.newVersion,
    bump: args.type,
    moduleName: args.moduleName,
    excludeDirectories: args.excludeFolders,
    shouldProcess,
    logger,
  });
}

export const command = "set-project-version";
export const describe =
  "Set or bump the version in every project, module manifest and build script";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("newVersion", {
      type: "string",
      describe: "Exact version to write (e.g. 1.4.0)",
    })
    .option("type", {
      type: "string",
      choices: BUMP_KINDS,
      describe: "Version segment to bump",
    })
    .option("moduleName", {
      type: "string",
      describe: "Only files whose base name matches (build scripts always match)",
    })
    .option("excludeFolders", {
      type: "string",
      array: true,
      describe: "Extra directory names to skip",
    })
    .option("whatIf", {
      type: "boolean",
      default: false,
      describe: "Report what would change without writing",
    })
    .check((argv) => {
      if (!argv.newVersion && !argv.type) {
        throw new Error("Specify --newVersion or --type");
      }
      return true;
    });
}

export function handler(
  argv: ArgumentsCamelCase<
    GlobalArgs & {
      newVersion?: string;
      type?: BumpKind;
      moduleName?: string;
      excludeFolders?: string[];
      whatIf: boolean;
    }
  >,
) {
  const result = setProjectVersion(argv.repoRoot, argv);
  console.log(JSON.stringify(result, null, 2));
}
