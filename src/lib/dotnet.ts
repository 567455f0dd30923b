import fs from "node:fs";
import path from "node:path";
import {
  formatCommand,
  spawnRunner,
  type CommandResult,
  type CommandRunner,
} from "./exec";
import { errorMessage } from "./errors";
import { nullLogger, type Logger } from "./logger";
import { findPackageFiles } from "./version-sources";

export const DEFAULT_TIMESTAMP_SERVER = "http://timestamp.digicert.com";

/** Certificate arguments for `dotnet nuget sign`. */
export type SigningCertificate =
  | { kind: "store"; fingerprint: string; storeLocation: "CurrentUser" | "LocalMachine" }
  | { kind: "file"; path: string; password?: string };

export interface DotnetOutcome {
  ok: boolean;
  /** Set when ok is false */
  error?: string;
  /** The dotnet executable could not be started */
  notInstalled?: boolean;
}

export interface PackOptions {
  configuration: string;
  /** Absolute output folder; dotnet's default (bin/<configuration>) when unset */
  outputPath?: string;
}

function outputText(result: CommandResult): string {
  return [result.stderr, result.stdout]
    .map((text) => text.trim())
    .filter(Boolean)
    .join("\n");
}

/** Thin wrapper over the dotnet CLI for pack, sign and push. */
export class DotnetCli {
  constructor(
    private readonly runner: CommandRunner = spawnRunner,
    private readonly logger: Logger = nullLogger,
  ) {}

  pack(projectName: string, csprojPath: string, options: PackOptions): DotnetOutcome {
    const args = ["pack", csprojPath, "--configuration", options.configuration];
    if (options.outputPath) {
      try {
        fs.mkdirSync(options.outputPath, { recursive: true });
      } catch (err) {
        return {
          ok: false,
          error: `Could not create output directory ${options.outputPath}: ${errorMessage(err)}`,
        };
      }
      args.push("-o", options.outputPath);
    }
    const result = this.invoke(args, path.dirname(csprojPath));
    if (result.exitCode === 0) return { ok: true };
    return {
      ok: false,
      notInstalled: result.errorCode === "ENOENT",
      error: `dotnet pack failed for ${projectName} (exit ${result.exitCode ?? result.errorCode ?? "unknown"}). ${result.stderr.trim()}`.trim(),
    };
  }

  sign(
    packagePath: string,
    certificate: SigningCertificate,
    timeStampServer = DEFAULT_TIMESTAMP_SERVER,
  ): DotnetOutcome {
    const args = ["nuget", "sign", packagePath];
    if (certificate.kind === "store") {
      args.push(
        "--certificate-fingerprint",
        certificate.fingerprint,
        "--certificate-store-location",
        certificate.storeLocation,
        "--certificate-store-name",
        "My",
      );
    } else {
      args.push("--certificate-path", certificate.path);
      if (certificate.password) {
        args.push("--certificate-password", certificate.password);
      }
    }
    args.push("--timestamper", timeStampServer, "--overwrite");

    const secret = certificate.kind === "file" ? certificate.password : undefined;
    const result = this.invoke(args, path.dirname(packagePath), secret);
    if (result.exitCode === 0) return { ok: true };
    return {
      ok: false,
      notInstalled: result.errorCode === "ENOENT",
      error: `Signing failed for ${path.basename(packagePath)}. ${outputText(result)}`.trim(),
    };
  }

  push(
    packagePath: string,
    apiKey: string,
    source: string,
    skipDuplicate: boolean,
  ): DotnetOutcome {
    const args = ["nuget", "push", packagePath, "--api-key", apiKey, "--source", source];
    if (skipDuplicate) args.push("--skip-duplicate");
    const result = this.invoke(args, path.dirname(packagePath), apiKey);
    if (result.exitCode === 0) return { ok: true };
    return {
      ok: false,
      notInstalled: result.errorCode === "ENOENT",
      error: `dotnet nuget push failed for ${path.basename(packagePath)} (exit ${result.exitCode ?? result.errorCode ?? "unknown"}). ${outputText(result)}`.trim(),
    };
  }

  private invoke(args: string[], cwd: string, secret?: string): CommandResult {
    const shown = secret ? args.map((a) => (a === secret ? "***" : a)) : args;
    this.logger.verbose(`Running ${formatCommand("dotnet", shown)}`);
    return this.runner.run("dotnet", args, { cwd });
  }
}

/** Package file name dotnet pack produces for a project version. */
export function packageFileName(projectName: string, version: string): string {
  return `${projectName}.${version}.nupkg`;
}

/**
 * Packages produced for one project version, ignoring symbol packages and
 * packages of other versions left in the same folder.
 */
export function collectPackages(
  packageRoot: string,
  projectName: string,
  version: string,
): string[] {
  if (!fs.statSync(packageRoot, { throwIfNoEntry: false })?.isDirectory()) return [];
  const expected = packageFileName(projectName, version).toLowerCase();
  return findPackageFiles(packageRoot).filter((file) => {
    const name = path.basename(file).toLowerCase();
    return !name.endsWith(".symbols.nupkg") && name === expected;
  });
}
