#!/usr/bin/env tsx
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import * as getProjectVersion from "./commands/get-project-version";
import * as setProjectVersion from "./commands/set-project-version";
import * as resolveVersion from "./commands/resolve-version";
import * as repositoryRelease from "./commands/repository-release";
import * as githubRelease from "./commands/github-release";
import { getRepoRoot } from "./lib/git";

await yargs(hideBin(process.argv))
  .scriptName("dotnet-release-tools")
  .option("repoRoot", {
    type: "string",
    default: getRepoRoot(),
    describe: "Repository root directory",
  })
  .option("verbose", {
    type: "boolean",
    default: false,
    describe: "Print detailed progress",
  })
  .command(getProjectVersion)
  .command(setProjectVersion)
  .command(resolveVersion)
  .command(repositoryRelease)
  .command(githubRelease)
  .demandCommand(1, "You must specify a command")
  .version(false)
  .strict()
  .help()
  .parseAsync();
