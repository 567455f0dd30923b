import type { ArgumentsCamelCase, Argv } from "yargs";
import type { GlobalArgs } from "../types";
import { unwrap } from "../lib/errors";
import { createConsoleLogger, type Logger } from "../lib/logger";
import { resolveExpectedVersion } from "../lib/resolver";
import { resolveSecret } from "../lib/secrets";
import { parseVersionSpec } from "../lib/version";
import { PackageRegistry, type FetchLike } from "../lib/version-sources";

export interface ResolveVersionOptions {
  sources?: string[];
  sourceUser?: string;
  sourceSecret?: string;
  includePrerelease?: boolean;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Resolve an exact version or X-pattern for one or more package ids against
 * the configured package sources.
 */
export async function resolveVersion(
  packageIds: string[],
  expectedVersion: string,
  options: ResolveVersionOptions = {},
): Promise<string> {
  const spec = unwrap(parseVersionSpec(expectedVersion));
  const registry = new PackageRegistry({
    sources: options.sources,
    credential: { userName: options.sourceUser, secret: options.sourceSecret },
    fetch: options.fetch,
    logger: options.logger,
  });
  const resolved = await resolveExpectedVersion(spec, packageIds, registry, {
    includePrerelease: options.includePrerelease,
  });
  if (resolved.warning) options.logger?.warn(resolved.warning);
  return resolved.version;
}

export const command = "resolve-version";
export const describe =
  "Resolve an exact version or X-pattern (e.g. 1.2.X) against package sources";

export function builder(yargs: Argv<GlobalArgs>) {
  return yargs
    .option("packageId", {
      type: "string",
      array: true,
      demandOption: true,
      describe: "Package id(s); an X-pattern steps past all of them",
    })
    .option("expectedVersion", {
      type: "string",
      demandOption: true,
      describe: "Exact version or X-pattern",
    })
    .option("source", {
      type: "string",
      array: true,
      describe: "Package sources (v3 index URL, feed URL or local folder)",
    })
    .option("sourceUser", {
      type: "string",
      describe: "User name for the package sources",
    })
    .option("sourceSecret", {
      type: "string",
      describe: "Secret for the package sources",
    })
    .option("sourceSecretFile", {
      type: "string",
      describe: "File containing the secret for the package sources",
    })
    .option("sourceSecretEnv", {
      type: "string",
      describe: "Environment variable containing the secret for the package sources",
    })
    .option("includePrerelease", {
      type: "boolean",
      default: false,
      describe: "Count prerelease versions (label stripped)",
    });
}

export async function handler(
  argv: ArgumentsCamelCase<
    GlobalArgs & {
      packageId: string[];
      expectedVersion: string;
      source?: string[];
      sourceUser?: string;
      sourceSecret?: string;
      sourceSecretFile?: string;
      sourceSecretEnv?: string;
      includePrerelease: boolean;
    }
  >,
) {
  const logger = createConsoleLogger(argv.verbose);
  const version = await resolveVersion(argv.packageId, argv.expectedVersion, {
    sources: argv.source,
    sourceUser: argv.sourceUser,
    sourceSecret: resolveSecret(
      {
        inline: argv.sourceSecret,
        filePath: argv.sourceSecretFile,
        envName: argv.sourceSecretEnv,
      },
      process.env,
      logger,
    ),
    includePrerelease: argv.includePrerelease,
    logger,
  });
  console.log(version);
}
