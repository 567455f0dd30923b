export enum SourceKind {
  Csproj = "Csproj",
  PowerShellModule = "PowerShellModule",
  BuildScript = "BuildScript",
}

export enum VersionUpdateStatus {
  Updated = "Updated",
  NoChange = "NoChange",
  Skipped = "Skipped",
  Error = "Error",
}

export interface DiscoveredFile {
  /** Absolute path of the file */
  path: string;
  kind: SourceKind;
  /** Version declared in the file, when one could be detected */
  currentVersion?: string;
}

export interface VersionUpdateResult {
  source: string;
  kind: SourceKind;
  oldVersion?: string;
  newVersion: string;
  status: VersionUpdateStatus;
  error?: string;
}

export type BumpKind = "major" | "minor" | "build" | "revision";

/** Valid bump kinds for CLI commands */
export const BUMP_KINDS = ["major", "minor", "build", "revision"] as const;

export type BuildConfiguration = "Release" | "Debug";

export const BUILD_CONFIGURATIONS = ["Release", "Debug"] as const;

/** Per-project expected version, kept in declaration order. */
export interface VersionMapEntry {
  key: string;
  version: string;
}

export type ProjectVersionMap = readonly VersionMapEntry[];

export interface RepositoryCredential {
  userName?: string;
  secret?: string;
}

/**
 * Certificate used to sign packages. A thumbprint refers to the Windows
 * certificate store; a PFX may be given as a path or as Base64 content.
 */
export interface SigningOptions {
  certificateThumbprint?: string;
  certificateStore?: "CurrentUser" | "LocalMachine";
  pfxPath?: string;
  pfxBase64?: string;
  pfxPassword?: string;
  timeStampServer?: string;
}

export interface GitHubReleaseTarget {
  owner: string;
  repo: string;
  token: string;
  /** Supports {Project} and {Version}; defaults to "{Project}-v{Version}" */
  tagTemplate?: string;
  draft?: boolean;
  /** Defaults to whether the version carries a prerelease label */
  prerelease?: boolean;
  generateReleaseNotes?: boolean;
}

export interface ReleaseSpec {
  rootPath: string;
  /** Repository-wide exact version or X-pattern */
  expectedVersion?: string;
  expectedVersionMap?: ProjectVersionMap;
  expectedVersionMapAsInclude?: boolean;
  expectedVersionMapUseWildcards?: boolean;
  includeProjects?: string[];
  excludeProjects?: string[];
  excludeDirectories?: string[];
  /** Package sources (v3 index URLs, flat-container URLs or local folders) */
  versionSources?: string[];
  versionSourceCredential?: RepositoryCredential;
  includePrerelease?: boolean;
  configuration?: BuildConfiguration;
  outputPath?: string;
  signing?: SigningOptions;
  skipPack?: boolean;
  packDependencies?: boolean;
  publish?: boolean;
  publishSource?: string;
  publishApiKey?: string;
  skipDuplicate?: boolean;
  publishFailFast?: boolean;
  githubRelease?: GitHubReleaseTarget;
  /** Plan mode: resolve everything, mutate nothing */
  dryRun: boolean;
}

export type ProjectReleaseStatus = "planned" | "succeeded" | "skipped" | "error";

export interface ProjectReleaseOutcome {
  projectName: string;
  csprojPath: string;
  isPackable: boolean;
  oldVersion?: string;
  newVersion?: string;
  /** Where the expected version came from */
  versionSource?: "global" | "per-project" | "csproj";
  packages: string[];
  dependencies: string[];
  versionUpdates: VersionUpdateResult[];
  releaseUrl?: string;
  warnings: string[];
  status: ProjectReleaseStatus;
  error?: string;
}

export interface RepositoryReleaseResult {
  dryRun: boolean;
  projects: ProjectReleaseOutcome[];
  resolvedVersion?: string;
  resolvedVersionsByProject: Record<string, string>;
  publishedPackages: string[];
  /** Run-level warnings, such as version map keys that matched nothing */
  warnings: string[];
  success: boolean;
  errorMessage?: string;
}

/** Confirmation gate consulted before every on-disk mutation. */
export type ShouldProcess = (target: string, action: string) => boolean;

/** Shape of the global CLI options (defined in cli.ts) */
export interface GlobalArgs {
  repoRoot: string;
  verbose: boolean;
}
