import type { ArgumentsCamelCase, Argv } from "yargs";
import {
  BUILD_CONFIGURATIONS,
  type BuildConfiguration,
  type GlobalArgs,
  type ProjectVersionMap,
  type ReleaseSpec,
  type RepositoryReleaseResult,
} from "../types";
import { InvalidVersionMapEntryError, fail, unwrap, type ValidationResult } from "../lib/errors";
import { createConsoleLogger, type Logger } from "../lib/logger";
import { RepositoryReleaseService, type RepositoryReleaseServiceOptions } from "../lib/release";
import { resolveSecret } from "../lib/secrets";
import { parseVersionMap, parseVersionMapArgs } from "../lib/version-map";

/**
 * Accepts the version map either as "Name=Version" strings from the command
 * line or as an object from a JSON config file.
 */
export function parseVersionMapOption(
  raw: unknown,
): ValidationResult<ProjectVersionMap> {
  if (raw === undefined || raw === null) return parseVersionMap([]);
  if (Array.isArray(raw)) {
    const pairs: unknown[] = raw;
    return parseVersionMapArgs(pairs.map((pair) => String(pair)));
  }
  if (typeof raw === "string") return parseVersionMapArgs([raw]);
  if (typeof raw === "object") {
    const entries: Array<[string, unknown]> = Object.entries(raw);
    return parseVersionMap(Object.fromEntries(entries));
  }
  return fail(
    new InvalidVersionMapEntryError(
      "ExpectedVersionMap must be a list of Name=Version pairs or an object.",
    ),
  );
}

export interface RepositoryReleaseOutput {
  plan: RepositoryReleaseResult;
  /** Absent in what-if mode or when the plan failed */
  result?: RepositoryReleaseResult;
}

/**
 * Plan the release, then run it with the same inputs unless whatIf is set
 * or the plan already failed.
 */
export async function repositoryRelease(
  spec: Omit<ReleaseSpec, "dryRun">,
  whatIf: boolean,
  options: RepositoryReleaseServiceOptions = {},
): Promise<RepositoryReleaseOutput> {
  const service = new RepositoryReleaseService(options);
  const plan = await service.execute({ ...spec, dryRun: true });
  if (whatIf || !plan.success) return { plan };
  const result = await service.execute({ ...spec, dryRun: false });
  return { plan, result };
}

export const command = "repository-release";
export const describe =
  "Resolve versions, pack, sign and publish every .NET project in a repository";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .config("config", "JSON file with release options")
    .option("expectedVersion", {
      type: "string",
      describe: "Exact version or X-pattern applied to every project (e.g. 1.2.X)",
    })
    .option("expectedVersionMap", {
      type: "string",
      array: true,
      describe: "Per-project versions as Name=Version (wildcard names allowed)",
    })
    .option("expectedVersionMapAsInclude", {
      type: "boolean",
      default: false,
      describe: "Only release projects named in the version map",
    })
    .option("expectedVersionMapUseWildcards", {
      type: "boolean",
      default: false,
      describe: "Match version map names with * and ?",
    })
    .option("includeProject", {
      type: "string",
      array: true,
      describe: "Project names to include",
    })
    .option("excludeProject", {
      type: "string",
      array: true,
      describe: "Project names to exclude",
    })
    .option("excludeDirectories", {
      type: "string",
      array: true,
      describe: "Extra directory names to skip during discovery",
    })
    .option("versionSource", {
      type: "string",
      array: true,
      describe: "Package sources used to resolve X-patterns",
    })
    .option("versionSourceUser", {
      type: "string",
      describe: "User name for the version sources",
    })
    .option("versionSourceSecret", {
      type: "string",
      describe: "Secret for the version sources",
    })
    .option("versionSourceSecretFile", {
      type: "string",
      describe: "File holding the version source secret",
    })
    .option("versionSourceSecretEnv", {
      type: "string",
      describe: "Environment variable holding the version source secret",
    })
    .option("includePrerelease", {
      type: "boolean",
      default: false,
      describe: "Count prerelease versions when stepping X-patterns",
    })
    .option("configuration", {
      type: "string",
      choices: BUILD_CONFIGURATIONS,
      describe: "Build configuration (default Release)",
    })
    .option("outputPath", {
      type: "string",
      describe: "Folder for packed packages",
    })
    .option("skipPack", {
      type: "boolean",
      default: false,
      describe: "Use packages already on disk",
    })
    .option("packDependencies", {
      type: "boolean",
      default: false,
      describe: "Also release projects referenced by the selected ones",
    })
    .option("certificateThumbprint", {
      type: "string",
      describe: "Signing certificate thumbprint (Windows store)",
    })
    .option("certificateStore", {
      type: "string",
      choices: ["CurrentUser", "LocalMachine"] as const,
      describe: "Certificate store location",
    })
    .option("pfxPath", {
      type: "string",
      describe: "Signing certificate (PFX file)",
    })
    .option("pfxBase64Env", {
      type: "string",
      describe: "Environment variable holding a Base64 PFX",
    })
    .option("pfxPasswordEnv", {
      type: "string",
      describe: "Environment variable holding the PFX password",
    })
    .option("timeStampServer", {
      type: "string",
      describe: "Timestamp server for signing",
    })
    .option("publish", {
      type: "boolean",
      default: false,
      describe: "Push packages after packing",
    })
    .option("publishSource", {
      type: "string",
      describe: "Feed to push to",
    })
    .option("publishApiKey", {
      type: "string",
      describe: "API key for the feed",
    })
    .option("publishApiKeyFile", {
      type: "string",
      describe: "File holding the API key",
    })
    .option("publishApiKeyEnv", {
      type: "string",
      describe: "Environment variable holding the API key",
    })
    .option("skipDuplicate", {
      type: "boolean",
      default: false,
      describe: "Allow versions that are already published",
    })
    .option("publishFailFast", {
      type: "boolean",
      default: false,
      describe: "Stop at the first publish-stage failure",
    })
    .option("githubOwner", {
      type: "string",
      describe: "Create GitHub releases in this owner's repository",
    })
    .option("githubRepo", {
      type: "string",
      describe: "GitHub repository name",
    })
    .option("githubToken", {
      type: "string",
      describe: "GitHub token",
    })
    .option("githubTokenFile", {
      type: "string",
      describe: "File holding the GitHub token",
    })
    .option("githubTokenEnv", {
      type: "string",
      default: "GITHUB_TOKEN",
      describe: "Environment variable holding the GitHub token",
    })
    .option("githubTagTemplate", {
      type: "string",
      describe: "Release tag template ({Project}, {Version})",
    })
    .option("githubGenerateReleaseNotes", {
      type: "boolean",
      default: false,
      describe: "Let GitHub write the release notes",
    })
    .option("githubDraft", {
      type: "boolean",
      default: false,
      describe: "Create draft releases",
    })
    .option("whatIf", {
      type: "boolean",
      default: false,
      describe: "Only print the plan",
    });
}

export type RepositoryReleaseArgs = GlobalArgs & {
  expectedVersion?: string;
  expectedVersionMap?: string[];
  expectedVersionMapAsInclude: boolean;
  expectedVersionMapUseWildcards: boolean;
  includeProject?: string[];
  excludeProject?: string[];
  excludeDirectories?: string[];
  versionSource?: string[];
  versionSourceUser?: string;
  versionSourceSecret?: string;
  versionSourceSecretFile?: string;
  versionSourceSecretEnv?: string;
  includePrerelease: boolean;
  configuration?: BuildConfiguration;
  outputPath?: string;
  skipPack: boolean;
  packDependencies: boolean;
  certificateThumbprint?: string;
  certificateStore?: "CurrentUser" | "LocalMachine";
  pfxPath?: string;
  pfxBase64Env?: string;
  pfxPasswordEnv?: string;
  timeStampServer?: string;
  publish: boolean;
  publishSource?: string;
  publishApiKey?: string;
  publishApiKeyFile?: string;
  publishApiKeyEnv?: string;
  skipDuplicate: boolean;
  publishFailFast: boolean;
  githubOwner?: string;
  githubRepo?: string;
  githubToken?: string;
  githubTokenFile?: string;
  githubTokenEnv: string;
  githubTagTemplate?: string;
  githubGenerateReleaseNotes: boolean;
  githubDraft: boolean;
  whatIf: boolean;
};

/** Build the release inputs from parsed arguments, resolving secrets. */
export function buildReleaseSpec(
  argv: RepositoryReleaseArgs,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): Omit<ReleaseSpec, "dryRun"> {
  const rawMap: unknown = argv.expectedVersionMap;
  const map = unwrap(parseVersionMapOption(rawMap));
  const envValue = (name: string | undefined) =>
    name ? resolveSecret({ envName: name }, env, logger) : undefined;

  let githubRelease: ReleaseSpec["githubRelease"];
  if (argv.githubOwner && argv.githubRepo) {
    const token = resolveSecret(
      { inline: argv.githubToken, filePath: argv.githubTokenFile, envName: argv.githubTokenEnv },
      env,
      logger,
    );
    if (!token) {
      throw new Error("A GitHub token is required to create GitHub releases");
    }
    githubRelease = {
      owner: argv.githubOwner,
      repo: argv.githubRepo,
      token,
      tagTemplate: argv.githubTagTemplate,
      generateReleaseNotes: argv.githubGenerateReleaseNotes,
      draft: argv.githubDraft,
    };
  }

  const signingRequested =
    argv.certificateThumbprint || argv.pfxPath || argv.pfxBase64Env;

  return {
    rootPath: argv.repoRoot,
    expectedVersion: argv.expectedVersion,
    expectedVersionMap: map,
    expectedVersionMapAsInclude: argv.expectedVersionMapAsInclude,
    expectedVersionMapUseWildcards: argv.expectedVersionMapUseWildcards,
    includeProjects: argv.includeProject,
    excludeProjects: argv.excludeProject,
    excludeDirectories: argv.excludeDirectories,
    versionSources: argv.versionSource,
    versionSourceCredential: {
      userName: argv.versionSourceUser,
      secret: resolveSecret(
        {
          inline: argv.versionSourceSecret,
          filePath: argv.versionSourceSecretFile,
          envName: argv.versionSourceSecretEnv,
        },
        env,
        logger,
      ),
    },
    includePrerelease: argv.includePrerelease,
    configuration: argv.configuration ?? "Release",
    outputPath: argv.outputPath,
    signing: signingRequested
      ? {
          certificateThumbprint: argv.certificateThumbprint,
          certificateStore: argv.certificateStore,
          pfxPath: argv.pfxPath,
          pfxBase64: envValue(argv.pfxBase64Env),
          pfxPassword: envValue(argv.pfxPasswordEnv),
          timeStampServer: argv.timeStampServer,
        }
      : undefined,
    skipPack: argv.skipPack,
    packDependencies: argv.packDependencies,
    publish: argv.publish,
    publishSource: argv.publishSource,
    publishApiKey: resolveSecret(
      {
        inline: argv.publishApiKey,
        filePath: argv.publishApiKeyFile,
        envName: argv.publishApiKeyEnv,
      },
      env,
      logger,
    ),
    skipDuplicate: argv.skipDuplicate,
    publishFailFast: argv.publishFailFast,
    githubRelease,
  };
}

export async function handler(argv: ArgumentsCamelCase<RepositoryReleaseArgs>) {
  const logger = createConsoleLogger(argv.verbose);
  const spec = buildReleaseSpec(argv, process.env, logger);
  const output = await repositoryRelease(spec, argv.whatIf, { logger });
  const final = output.result ?? output.plan;
  console.log(JSON.stringify(final, null, 2));
  if (!final.success) {
    if (final.errorMessage) logger.warn(final.errorMessage);
    process.exitCode = 1;
  }
}
