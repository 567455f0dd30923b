import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  GitHubHttpError,
  readCsprojVersionFromContent,
  type CommandResult,
  type CommandRunner,
  type CreateReleaseParams,
  type GitHubRelease,
  type GitHubReleaseApi,
  type UploadAssetParams,
  type VersionLookup,
} from "../src/index";

export function makeTmpDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `release-tools-${label}-`));
}

export function writeFile(root: string, relativePath: string, content: string): string {
  const full = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

export interface CsprojOptions {
  version?: string;
  isPackable?: boolean;
  references?: string[];
}

export function csproj(options: CsprojOptions = {}): string {
  const lines = ['<Project Sdk="Microsoft.NET.Sdk">', "  <PropertyGroup>"];
  lines.push("    <TargetFramework>net8.0</TargetFramework>");
  if (options.version) lines.push(`    <Version>${options.version}</Version>`);
  if (options.isPackable === false) lines.push("    <IsPackable>false</IsPackable>");
  lines.push("  </PropertyGroup>");
  if (options.references?.length) {
    lines.push("  <ItemGroup>");
    for (const reference of options.references) {
      lines.push(`    <ProjectReference Include="${reference}" />`);
    }
    lines.push("  </ItemGroup>");
  }
  lines.push("</Project>", "");
  return lines.join("\n");
}

export function alreadyExists(field: string): GitHubHttpError {
  return new GitHubHttpError(
    "Validation Failed",
    "validation",
    422,
    '{"message":"Validation Failed"}',
    [{ resource: "Release", code: "already_exists", field }],
  );
}

/** In-memory stand-in for the GitHub release endpoints. */
export class FakeReleaseApi implements GitHubReleaseApi {
  readonly releases = new Map<string, GitHubRelease>();
  readonly assets = new Map<string, Set<string>>();
  readonly calls: string[] = [];
  readonly failingAssets = new Set<string>();
  createError?: Error;

  async createRelease(params: CreateReleaseParams): Promise<GitHubRelease> {
    this.calls.push(`create ${params.tagName}`);
    if (this.createError) throw this.createError;
    if (this.releases.has(params.tagName)) throw alreadyExists("tag_name");
    const id = this.releases.size + 1;
    const release = {
      id,
      tagName: params.tagName,
      htmlUrl: `https://github.example.test/${params.owner}/${params.repo}/releases/tag/${params.tagName}`,
      uploadUrl: `https://uploads.example.test/releases/${id}/assets{?name,label}`,
    };
    this.releases.set(params.tagName, release);
    return release;
  }

  async getReleaseByTag(_owner: string, _repo: string, tag: string): Promise<GitHubRelease> {
    this.calls.push(`get ${tag}`);
    const release = this.releases.get(tag);
    if (!release) {
      throw new GitHubHttpError("Not Found", "http", 404, '{"message":"Not Found"}');
    }
    return release;
  }

  async uploadAsset(params: UploadAssetParams): Promise<void> {
    this.calls.push(`upload ${params.name}`);
    if (this.failingAssets.has(params.name)) {
      throw new GitHubHttpError("Server Error", "http", 500, "upstream failed");
    }
    const names = this.assets.get(params.uploadUrl) ?? new Set<string>();
    if (names.has(params.name)) throw alreadyExists("name");
    names.add(params.name);
    this.assets.set(params.uploadUrl, names);
  }
}

const succeeded: CommandResult = { exitCode: 0, stdout: "", stderr: "" };

/**
 * Stands in for the dotnet CLI. `pack` writes <name>.<version>.nupkg using
 * the version currently in the project file.
 */
export class FakeDotnetRunner implements CommandRunner {
  readonly calls: string[][] = [];
  readonly failingPacks = new Set<string>();
  readonly failingPushes = new Set<string>();

  run(_command: string, args: string[]): CommandResult {
    this.calls.push(args);
    if (args[0] === "pack") return this.pack(args);
    if (args[0] === "nuget" && args[1] === "push") {
      const name = path.basename(args[2]);
      if (this.failingPushes.has(name)) {
        return { exitCode: 1, stdout: "", stderr: "409 conflict" };
      }
    }
    return succeeded;
  }

  /** Package file names passed to `dotnet nuget push`, in order. */
  pushed(): string[] {
    return this.calls
      .filter((args) => args[0] === "nuget" && args[1] === "push")
      .map((args) => path.basename(args[2]));
  }

  private pack(args: string[]): CommandResult {
    const csprojPath = args[1];
    const name = path.basename(csprojPath, ".csproj");
    if (this.failingPacks.has(name)) {
      return { exitCode: 1, stdout: "", stderr: "compile error" };
    }
    const version = readCsprojVersionFromContent(fs.readFileSync(csprojPath, "utf-8"));
    const outIndex = args.indexOf("-o");
    const outDir =
      outIndex >= 0 ? args[outIndex + 1] : path.join(path.dirname(csprojPath), "bin", args[3]);
    writeFile(outDir, `${name}.${version}.nupkg`, "package");
    return succeeded;
  }
}

/** Published versions keyed by package id. */
export class FakeVersionLookup implements VersionLookup {
  readonly requested: string[] = [];

  constructor(
    private readonly versions: Record<string, string[]> = {},
    private readonly error?: Error,
  ) {}

  async listPublishedVersions(packageId: string): Promise<string[]> {
    this.requested.push(packageId);
    if (this.error) throw this.error;
    return this.versions[packageId] ?? [];
  }
}
