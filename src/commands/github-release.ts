import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import {
  GitHubReleasePublisher,
  createOctokit,
  createOctokitReleaseApi,
  type GitHubReleaseApi,
  type GitHubReleaseRequest,
  type GitHubReleaseResult,
} from "../lib/github";
import { InvalidArgumentError } from "../lib/errors";
import { createConsoleLogger, nullLogger, type Logger } from "../lib/logger";
import { resolveSecret } from "../lib/secrets";

export async function githubRelease(
  request: GitHubReleaseRequest,
  api: GitHubReleaseApi,
  logger: Logger = nullLogger,
): Promise<GitHubReleaseResult> {
  return new GitHubReleasePublisher(api, logger).publish(request);
}

export const command = "github-release";
export const describe = "Create (or reuse) a GitHub release and upload assets to it";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("owner", {
      type: "string",
      demandOption: true,
      describe: "Repository owner",
    })
    .option("repo", {
      type: "string",
      demandOption: true,
      describe: "Repository name",
    })
    .option("tagName", {
      type: "string",
      demandOption: true,
      describe: "Release tag",
    })
    .option("releaseName", {
      type: "string",
      describe: "Release title (defaults to the tag)",
    })
    .option("releaseNotes", {
      type: "string",
      describe: "Release body",
    })
    .option("generateReleaseNotes", {
      type: "boolean",
      default: false,
      describe: "Let GitHub write the release notes",
    })
    .option("commitish", {
      type: "string",
      describe: "Branch or commit the tag is created from",
    })
    .option("draft", {
      type: "boolean",
      default: false,
      describe: "Create a draft release",
    })
    .option("prerelease", {
      type: "boolean",
      default: false,
      describe: "Mark the release as a prerelease",
    })
    .option("reuseExistingRelease", {
      type: "boolean",
      default: true,
      describe: "Reuse the release when the tag already exists",
    })
    .option("asset", {
      type: "string",
      array: true,
      describe: "Files to upload",
    })
    .option("token", {
      type: "string",
      describe: "GitHub token",
    })
    .option("tokenFile", {
      type: "string",
      describe: "File holding the GitHub token",
    })
    .option("tokenEnv", {
      type: "string",
      default: "GITHUB_TOKEN",
      describe: "Environment variable holding the GitHub token",
    });
}

export async function handler(
  argv: ArgumentsCamelCase<
    GlobalArgs & {
      owner: string;
      repo: string;
      tagName: string;
      releaseName?: string;
      releaseNotes?: string;
      generateReleaseNotes: boolean;
      commitish?: string;
      draft: boolean;
      prerelease: boolean;
      reuseExistingRelease: boolean;
      asset?: string[];
      token?: string;
      tokenFile?: string;
      tokenEnv: string;
    }
  >,
) {
  const logger = createConsoleLogger(argv.verbose);
  const token = resolveSecret(
    { inline: argv.token, filePath: argv.tokenFile, envName: argv.tokenEnv },
    process.env,
    logger,
  );
  if (!token) {
    throw new InvalidArgumentError("A GitHub token is required");
  }
  const result = await githubRelease(
    {
      owner: argv.owner,
      repo: argv.repo,
      tagName: argv.tagName,
      releaseName: argv.releaseName,
      releaseNotes: argv.releaseNotes,
      generateReleaseNotes: argv.generateReleaseNotes,
      commitish: argv.commitish,
      isDraft: argv.draft,
      isPreRelease: argv.prerelease,
      reuseExistingReleaseOnConflict: argv.reuseExistingRelease,
      assetFilePaths: argv.asset,
    },
    createOctokitReleaseApi(createOctokit(token)),
    logger,
  );
  console.log(JSON.stringify(result, null, 2));
  if (!result.succeeded) process.exitCode = 1;
}
