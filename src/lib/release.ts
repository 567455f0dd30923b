import fs from "node:fs";
import path from "node:path";
import {
  SourceKind,
  VersionUpdateStatus,
  type GitHubReleaseTarget,
  type ProjectReleaseOutcome,
  type ProjectVersionMap,
  type ReleaseSpec,
  type RepositoryReleaseResult,
  type ShouldProcess,
} from "../types";
import { DotnetCli, collectPackages, packageFileName } from "./dotnet";
import { errorMessage } from "./errors";
import {
  GitHubReleasePublisher,
  buildReleaseTag,
  createOctokit,
  createOctokitReleaseApi,
  defaultPrerelease,
} from "./github";
import { nullLogger, type Logger } from "./logger";
import {
  dependencyClosure,
  directDependencies,
  loadProject,
  orderByDependencies,
  type DotnetProject,
} from "./projects";
import { resolveExpectedVersion, type VersionLookup } from "./resolver";
import { buildExcludeDirectories, discover } from "./scanner";
import { prepareSigning } from "./signing";
import {
  compareVersions,
  maxVersion,
  normalizePublishedVersion,
  parseVersionSpec,
  type VersionSpec,
} from "./version";
import { matchVersionMapEntry, parseVersionMap } from "./version-map";
import {
  DEFAULT_PACKAGE_SOURCE,
  PackageRegistry,
  type FetchLike,
} from "./version-sources";
import { updateVersionFile } from "./version-writer";

export interface RepositoryReleaseServiceOptions {
  /** Used instead of a registry built from ReleaseSpec.versionSources */
  registry?: VersionLookup;
  dotnet?: DotnetCli;
  /** Builds the publisher for a GitHub target; an Octokit-backed one by default */
  createPublisher?: (target: GitHubReleaseTarget) => GitHubReleasePublisher;
  shouldProcess?: ShouldProcess;
  logger?: Logger;
  platform?: NodeJS.Platform;
  fetch?: FetchLike;
}

interface ProjectState {
  project: DotnetProject;
  outcome: ProjectReleaseOutcome;
}

const NOT_PROCESSED = "Not processed: the run stopped after an earlier failure.";
const NOT_PUBLISHED = "Not published: publishing stopped after an earlier failure.";

function emptyResult(dryRun: boolean): RepositoryReleaseResult {
  return {
    dryRun,
    projects: [],
    resolvedVersionsByProject: {},
    publishedPackages: [],
    warnings: [],
    success: false,
  };
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Resolves, versions, packs, signs and publishes every selected project in a
 * repository. In plan mode (dryRun) everything is resolved and nothing is
 * written, built or pushed.
 */
export class RepositoryReleaseService {
  private readonly logger: Logger;
  private readonly dotnet: DotnetCli;

  constructor(private readonly options: RepositoryReleaseServiceOptions = {}) {
    this.logger = options.logger ?? nullLogger;
    this.dotnet = options.dotnet ?? new DotnetCli(undefined, this.logger);
  }

  async execute(spec: ReleaseSpec): Promise<RepositoryReleaseResult> {
    const result = emptyResult(spec.dryRun);
    const fail = (message: string): RepositoryReleaseResult => {
      result.success = false;
      result.errorMessage = message;
      return result;
    };

    // 1. Global validation
    const rootPath = path.resolve(spec.rootPath);
    if (!fs.existsSync(rootPath) || !fs.statSync(rootPath).isDirectory()) {
      return fail(`Root path not found: ${rootPath}`);
    }
    const map = parseVersionMap(spec.expectedVersionMap ?? []);
    if (!map.ok) return fail(map.error.message);
    let globalSpec: VersionSpec | undefined;
    if (spec.expectedVersion?.trim()) {
      const parsed = parseVersionSpec(spec.expectedVersion);
      if (!parsed.ok) return fail(parsed.error.message);
      globalSpec = parsed.value;
    }
    if (spec.expectedVersionMapAsInclude && map.value.length === 0) {
      return fail("ExpectedVersionMapAsInclude is set but ExpectedVersionMap is empty.");
    }
    if (spec.publish && !spec.publishApiKey?.trim()) {
      return fail("PublishApiKey is required when Publish is enabled.");
    }

    // 2. Discovery and selection
    const discovered = this.loadProjects(rootPath, spec.excludeDirectories);
    const selected = this.select(discovered, spec, map.value, result.warnings);
    if (selected.length === 0) {
      return fail("No .csproj files matched the selection criteria.");
    }

    const states = selected.map((project): ProjectState => ({
      project,
      outcome: {
        projectName: project.name,
        csprojPath: project.csprojPath,
        isPackable: project.isPackable,
        oldVersion: project.currentVersion,
        packages: [],
        dependencies: directDependencies(project, discovered),
        versionUpdates: [],
        warnings: [],
        status: "planned",
      },
    }));
    result.projects = states.map((s) => s.outcome);

    this.markDuplicates(states);

    // 3. Packable detection
    for (const { project, outcome } of states) {
      if (!project.isPackable && outcome.status !== "error") {
        outcome.status = "skipped";
        this.logger.verbose(`${project.name}: IsPackable=false, skipping.`);
      }
    }
    const packable = states.filter((s) => s.outcome.status === "planned");
    if (packable.length === 0 && !states.some((s) => s.outcome.status === "error")) {
      return fail("No packable projects were found (IsPackable=false).");
    }

    // 4. Version resolution
    const registry =
      this.options.registry ??
      new PackageRegistry({
        sources: spec.versionSources,
        credential: spec.versionSourceCredential,
        fetch: this.options.fetch,
        logger: this.logger,
      });
    await this.resolveVersions(packable, spec, map.value, globalSpec, registry);

    // 5. Version write, pack and sign
    const stopped = spec.dryRun
      ? this.plan(packable, spec, rootPath)
      : this.build(packable, spec, rootPath);

    // 6. Publish
    if (spec.publish && !stopped) {
      const publishError = await this.publish(packable, spec, registry, result);
      if (publishError) return this.aggregate(result, publishError);
    }

    // 7. GitHub releases
    if (spec.githubRelease && !spec.dryRun && !stopped) {
      await this.createGitHubReleases(packable, spec.githubRelease);
    }

    return this.aggregate(result);
  }

  private loadProjects(
    rootPath: string,
    excludeDirectories: readonly string[] | undefined,
  ): DotnetProject[] {
    const projects: DotnetProject[] = [];
    for (const file of discover(rootPath, buildExcludeDirectories(excludeDirectories))) {
      if (file.kind !== SourceKind.Csproj) continue;
      try {
        projects.push(loadProject(file.path));
      } catch (err) {
        this.logger.warn(`Could not read ${file.path}: ${errorMessage(err)}`);
      }
    }
    return projects;
  }

  private select(
    discovered: readonly DotnetProject[],
    spec: ReleaseSpec,
    map: ProjectVersionMap,
    warnings: string[],
  ): DotnetProject[] {
    const include = (spec.includeProjects ?? []).map((n) => n.trim()).filter(Boolean);
    const exclude = (spec.excludeProjects ?? []).map((n) => n.trim()).filter(Boolean);
    const useWildcards = spec.expectedVersionMapUseWildcards ?? false;

    let selected = discovered.filter(
      (p) =>
        (include.length === 0 || include.some((n) => sameName(n, p.name))) &&
        !exclude.some((n) => sameName(n, p.name)),
    );

    if (spec.expectedVersionMapAsInclude) {
      const used = new Set<string>();
      selected = selected.filter((p) => {
        const entry = matchVersionMapEntry(map, p.name, { useWildcards });
        if (entry) used.add(entry.key);
        return entry !== undefined;
      });
      for (const entry of map) {
        if (!used.has(entry.key)) {
          const warning = `ExpectedVersionMap entry '${entry.key}' did not match any project.`;
          warnings.push(warning);
          this.logger.warn(warning);
        }
      }
    }

    if (spec.packDependencies) {
      selected = dependencyClosure(selected, discovered);
    }
    return selected;
  }

  private markDuplicates(states: readonly ProjectState[]): void {
    const byName = new Map<string, ProjectState[]>();
    for (const state of states) {
      const key = state.project.name.toLowerCase();
      byName.set(key, [...(byName.get(key) ?? []), state]);
    }
    for (const group of byName.values()) {
      if (group.length < 2) continue;
      const paths = group.map((s) => s.project.csprojPath).join("; ");
      for (const { outcome } of group) {
        outcome.status = "error";
        outcome.error = `Duplicate project name '${outcome.projectName}' found at: ${paths}`;
      }
    }
  }

  private async resolveVersions(
    states: readonly ProjectState[],
    spec: ReleaseSpec,
    map: ProjectVersionMap,
    globalSpec: VersionSpec | undefined,
    registry: VersionLookup,
  ): Promise<void> {
    const useWildcards = spec.expectedVersionMapUseWildcards ?? false;
    const options = { includePrerelease: spec.includePrerelease ?? false };
    const usesGlobal: ProjectState[] = [];

    for (const state of states) {
      const { project, outcome } = state;
      const entry = matchVersionMapEntry(map, project.name, { useWildcards });
      if (entry) {
        outcome.versionSource = "per-project";
        const parsed = parseVersionSpec(entry.version);
        if (!parsed.ok) {
          this.setError(outcome, parsed.error.message);
          continue;
        }
        try {
          const resolved = await resolveExpectedVersion(
            parsed.value,
            [project.name],
            registry,
            options,
          );
          outcome.newVersion = resolved.version;
          if (resolved.warning) outcome.warnings.push(resolved.warning);
        } catch (err) {
          this.setError(outcome, errorMessage(err));
        }
      } else if (globalSpec) {
        outcome.versionSource = "global";
        usesGlobal.push(state);
      } else if (project.currentVersion) {
        outcome.versionSource = "csproj";
        outcome.newVersion = project.currentVersion;
      } else {
        this.setError(
          outcome,
          "No version found in project and no expected version was provided.",
        );
      }
    }

    if (!globalSpec || usesGlobal.length === 0) return;

    // One repository-wide version, stepped past every project's published versions
    try {
      const resolved = await resolveExpectedVersion(
        globalSpec,
        usesGlobal.map((s) => s.project.name),
        registry,
        options,
      );
      for (const { outcome } of usesGlobal) {
        outcome.newVersion = resolved.version;
        if (resolved.warning) outcome.warnings.push(resolved.warning);
      }
    } catch (err) {
      for (const { outcome } of usesGlobal) this.setError(outcome, errorMessage(err));
    }
  }

  private packageRoot(spec: ReleaseSpec, rootPath: string, project: DotnetProject): string {
    if (spec.outputPath?.trim()) return path.resolve(rootPath, spec.outputPath.trim());
    return path.join(path.dirname(project.csprojPath), "bin", spec.configuration ?? "Release");
  }

  /** Plan mode: compute would-be package paths and touch nothing. */
  private plan(states: readonly ProjectState[], spec: ReleaseSpec, rootPath: string): boolean {
    for (const { project, outcome } of states) {
      if (outcome.status === "error" || !outcome.newVersion) continue;
      outcome.packages.push(
        path.join(
          this.packageRoot(spec, rootPath, project),
          packageFileName(project.name, outcome.newVersion),
        ),
      );
      if (outcome.oldVersion !== outcome.newVersion) {
        this.logger.info(
          `${project.name}: would update ${outcome.oldVersion ?? "(none)"} -> ${outcome.newVersion}`,
        );
      }
    }
    return false;
  }

  /**
   * Write versions, pack and sign each project. Returns true when a failure
   * stopped the run early.
   */
  private build(states: readonly ProjectState[], spec: ReleaseSpec, rootPath: string): boolean {
    const signing = prepareSigning(spec.signing, this.options.platform);
    if (signing.error) {
      for (const { outcome } of states) {
        if (outcome.status === "error" || !outcome.newVersion) continue;
        this.setError(outcome, signing.error);
      }
      return true;
    }
    let signingUnavailable = signing.warning;
    const outputPath = spec.outputPath?.trim()
      ? path.resolve(rootPath, spec.outputPath.trim())
      : undefined;

    try {
      for (let i = 0; i < states.length; i++) {
        const { project, outcome } = states[i];
        if (outcome.status === "error" || !outcome.newVersion) continue;
        const version = outcome.newVersion;

        const update = updateVersionFile(
          project.csprojPath,
          SourceKind.Csproj,
          version,
          project.currentVersion,
          { shouldProcess: this.options.shouldProcess, logger: this.logger },
        );
        outcome.versionUpdates.push(update);
        if (update.status === VersionUpdateStatus.Error) {
          this.setError(outcome, update.error ?? "Version update failed.");
          continue;
        }
        if (update.status === VersionUpdateStatus.Skipped) {
          outcome.status = "skipped";
          outcome.warnings.push("Version update declined; project not packed.");
          continue;
        }
        if (update.status === VersionUpdateStatus.Updated) {
          this.logger.success(`${project.name}: ${project.currentVersion ?? "(none)"} -> ${version}`);
        }

        if (!spec.skipPack) {
          this.logger.info(`Packing ${project.name}...`);
          const packed = this.dotnet.pack(project.name, project.csprojPath, {
            configuration: spec.configuration ?? "Release",
            outputPath,
          });
          if (!packed.ok) {
            this.setError(outcome, packed.error ?? "dotnet pack failed.");
            continue;
          }
        }

        const packages = collectPackages(
          this.packageRoot(spec, rootPath, project),
          project.name,
          version,
        );
        if (packages.length === 0) {
          this.setError(outcome, `No packages found for version ${version}.`);
          if (spec.publishFailFast) return this.stop(states, i);
          continue;
        }
        outcome.packages.push(...packages);
        this.logger.success(`${project.name}: packed ${packages.length} package(s).`);

        if (signingUnavailable) {
          outcome.warnings.push(signingUnavailable);
        } else if (signing.certificate) {
          for (const pkg of packages) {
            const signed = this.dotnet.sign(
              pkg,
              signing.certificate,
              spec.signing?.timeStampServer?.trim() || undefined,
            );
            if (signed.ok) continue;
            if (signed.notInstalled) {
              signingUnavailable = "dotnet is not available to sign packages; packages were not signed.";
              outcome.warnings.push(signingUnavailable);
              this.logger.warn(signingUnavailable);
            } else {
              this.setError(outcome, signed.error ?? "Signing failed.");
            }
            break;
          }
          if (outcome.status === "error" && spec.publishFailFast) return this.stop(states, i);
        }

        if (outcome.status !== "error") outcome.status = "succeeded";
      }
    } finally {
      signing.dispose();
    }
    return false;
  }

  private stop(states: readonly ProjectState[], failedIndex: number): boolean {
    for (const { outcome } of states.slice(failedIndex + 1)) {
      if (outcome.status === "planned") {
        outcome.status = "skipped";
        outcome.warnings.push(NOT_PROCESSED);
      }
    }
    return true;
  }

  /** Returns a run-level error when publishing could not start. */
  private async publish(
    states: readonly ProjectState[],
    spec: ReleaseSpec,
    registry: VersionLookup,
    result: RepositoryReleaseResult,
  ): Promise<string | undefined> {
    const preflightError = await this.preflight(states, spec, registry);
    if (preflightError) return preflightError;

    const apiKey = spec.publishApiKey?.trim() ?? "";
    const source = spec.publishSource?.trim() || DEFAULT_PACKAGE_SOURCE;
    const order = orderByDependencies(
      states,
      (s) => s.project.name,
      (s) => s.outcome.dependencies,
    );
    if (order.hasCycle) {
      const warning = "Project references form a cycle; publishing in name order.";
      result.warnings.push(warning);
      this.logger.warn(warning);
    }

    for (let i = 0; i < order.ordered.length; i++) {
      const { outcome } = order.ordered[i];
      for (const pkg of outcome.packages) {
        if (result.publishedPackages.includes(pkg)) continue;
        if (spec.dryRun) {
          result.publishedPackages.push(pkg);
          continue;
        }
        this.logger.info(`Publishing ${path.basename(pkg)}...`);
        const pushed = this.dotnet.push(pkg, apiKey, source, spec.skipDuplicate ?? false);
        if (pushed.ok) {
          result.publishedPackages.push(pkg);
          this.logger.success(`Published ${path.basename(pkg)}.`);
          continue;
        }
        this.setError(outcome, pushed.error ?? "dotnet nuget push failed.");
        if (spec.publishFailFast) {
          for (const later of order.ordered.slice(i + 1)) {
            later.outcome.warnings.push(NOT_PUBLISHED);
          }
          return undefined;
        }
      }
    }
    return undefined;
  }

  private async preflight(
    states: readonly ProjectState[],
    spec: ReleaseSpec,
    registry: VersionLookup,
  ): Promise<string | undefined> {
    for (const { project, outcome } of states) {
      if (outcome.status === "error") {
        return `Publish preflight failed: ${project.name} has errors: ${outcome.error ?? ""}`.trim();
      }
      if (outcome.status === "skipped") continue;
      const version = outcome.newVersion;
      if (!version) {
        return `Publish preflight failed: ${project.name} has no resolved version.`;
      }
      if (outcome.packages.length === 0) {
        return `Publish preflight failed: ${project.name} has no packages to publish.`;
      }
      if (!spec.dryRun) {
        const missing = outcome.packages.find((pkg) => !fs.existsSync(pkg));
        if (missing) return `Publish preflight failed: package not found: ${missing}`;
      }

      let latest: string | undefined;
      try {
        const published = await registry.listPublishedVersions(project.name);
        latest = maxVersion(
          published
            .map((v) => normalizePublishedVersion(v, spec.includePrerelease ?? false))
            .filter((v): v is string => v !== undefined),
        );
      } catch (err) {
        this.logger.warn(
          `${project.name}: could not check published versions: ${errorMessage(err)}`,
        );
      }
      if (latest && compareVersions(latest, version) >= 0 && !spec.skipDuplicate) {
        return `Publish preflight failed: ${project.name} version ${version} already exists (latest ${latest}). Use skipDuplicate to allow.`;
      }
    }
    return undefined;
  }

  private async createGitHubReleases(
    states: readonly ProjectState[],
    target: GitHubReleaseTarget,
  ): Promise<void> {
    const publisher = this.options.createPublisher
      ? this.options.createPublisher(target)
      : new GitHubReleasePublisher(
          createOctokitReleaseApi(createOctokit(target.token)),
          this.logger,
        );

    for (const { project, outcome } of states) {
      if (outcome.status !== "succeeded" || !outcome.newVersion) continue;
      const tagName = buildReleaseTag(target.tagTemplate, project.name, outcome.newVersion);
      try {
        const release = await publisher.publish({
          owner: target.owner,
          repo: target.repo,
          tagName,
          generateReleaseNotes: target.generateReleaseNotes ?? false,
          isDraft: target.draft ?? false,
          isPreRelease: defaultPrerelease(outcome.newVersion, target.prerelease),
          assetFilePaths: outcome.packages,
        });
        outcome.releaseUrl = release.releaseUrl;
        if (!release.succeeded) {
          this.setError(outcome, release.errorMessage ?? "GitHub release failed.");
        }
      } catch (err) {
        this.setError(outcome, errorMessage(err));
      }
    }
  }

  private setError(outcome: ProjectReleaseOutcome, message: string): void {
    outcome.status = "error";
    outcome.error = message;
    this.logger.warn(`${outcome.projectName}: ${message}`);
  }

  private aggregate(
    result: RepositoryReleaseResult,
    runError?: string,
  ): RepositoryReleaseResult {
    for (const outcome of result.projects) {
      if (outcome.newVersion && outcome.status !== "error") {
        result.resolvedVersionsByProject[outcome.projectName] = outcome.newVersion;
      }
    }
    const versions = new Set(Object.values(result.resolvedVersionsByProject));
    result.resolvedVersion = versions.size === 1 ? [...versions][0] : undefined;

    const failed = result.projects.filter((p) => p.status === "error");
    result.success = !runError && failed.length === 0;
    if (runError) {
      result.errorMessage = runError;
    } else if (failed.length > 0) {
      result.errorMessage = `One or more projects failed: ${failed
        .map((p) => `${p.projectName}: ${p.error ?? "unknown error"}`)
        .join("; ")}`;
    }
    return result;
  }
}
