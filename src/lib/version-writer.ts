import fs from "node:fs";
import path from "node:path";
import {
  SourceKind,
  VersionUpdateStatus,
  type BumpKind,
  type DiscoveredFile,
  type ShouldProcess,
  type VersionUpdateResult,
} from "../types";
import { InvalidArgumentError, errorMessage } from "./errors";
import { nullLogger, type Logger } from "./logger";
import { applyVersion } from "./manifest";
import {
  buildExcludeDirectories,
  discover,
  filterByModuleName,
  findCurrentVersion,
} from "./scanner";
import { bumpVersion, isExactVersion } from "./version";

export interface UpdateFileOptions {
  shouldProcess?: ShouldProcess;
  logger?: Logger;
}

const allow: ShouldProcess = () => true;

/** Write through a sibling temp file so the target is replaced whole or not at all. */
export function writeFileAtomic(filePath: string, content: string): void {
  const tmpPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    fs.writeFileSync(tmpPath, content);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    if (fs.lstatSync(tmpPath, { throwIfNoEntry: false })?.isFile()) {
      fs.rmSync(tmpPath, { force: true });
    }
    throw err;
  }
}

/**
 * Rewrite the version declared in one file. Never throws: problems are
 * reported through the result status.
 */
export function updateVersionFile(
  filePath: string,
  kind: SourceKind,
  newVersion: string,
  oldVersion: string | undefined,
  options: UpdateFileOptions = {},
): VersionUpdateResult {
  const logger = options.logger ?? nullLogger;
  const shouldProcess = options.shouldProcess ?? allow;
  const result = (
    status: VersionUpdateStatus,
    error?: string,
  ): VersionUpdateResult => ({
    source: filePath,
    kind,
    oldVersion,
    newVersion,
    status,
    error,
  });

  if (!fs.existsSync(filePath)) {
    return result(VersionUpdateStatus.Error, "File not found.");
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return result(VersionUpdateStatus.Error, errorMessage(err));
  }

  const updated = applyVersion(content, kind, newVersion);
  if (updated === content) {
    logger.verbose(`No version change needed for ${filePath}`);
    return result(VersionUpdateStatus.NoChange);
  }

  const action = `Update version from '${oldVersion ?? ""}' to '${newVersion}'`;
  if (!shouldProcess(filePath, action)) {
    return result(VersionUpdateStatus.Skipped);
  }

  try {
    writeFileAtomic(filePath, updated);
  } catch (err) {
    return result(VersionUpdateStatus.Error, errorMessage(err));
  }
  logger.verbose(`Updated version in ${filePath} to ${newVersion}`);
  return result(VersionUpdateStatus.Updated);
}

export interface SetProjectVersionOptions {
  rootPath: string;
  newVersion?: string;
  bump?: BumpKind;
  moduleName?: string;
  excludeDirectories?: readonly string[];
  shouldProcess?: ShouldProcess;
  logger?: Logger;
}

export interface SetProjectVersionResult {
  currentVersion: string;
  newVersion: string;
  results: VersionUpdateResult[];
}

/**
 * Discover every versioned file below the root and move all of them to one
 * new version, given explicitly or bumped from the current version.
 */
export function setProjectVersion(
  options: SetProjectVersionOptions,
): SetProjectVersionResult {
  const explicit = options.newVersion?.trim();
  if (!explicit && !options.bump) {
    throw new InvalidArgumentError("Specify a new version or a version bump type.");
  }
  if (explicit && !isExactVersion(explicit)) {
    throw new InvalidArgumentError(
      `New version '${explicit}' is not a dotted numeric version.`,
    );
  }
  if (!fs.existsSync(options.rootPath)) {
    throw new InvalidArgumentError(`Path not found: ${options.rootPath}`);
  }

  const files = filterByModuleName(
    discover(options.rootPath, buildExcludeDirectories(options.excludeDirectories)),
    options.moduleName,
  );
  const currentVersion = findCurrentVersion(files);
  if (!currentVersion) {
    throw new InvalidArgumentError(
      `Could not determine current version under ${options.rootPath}`,
    );
  }

  let newVersion: string;
  if (explicit) {
    newVersion = explicit;
  } else if (options.bump) {
    newVersion = bumpVersion(currentVersion, options.bump);
  } else {
    throw new InvalidArgumentError("Specify a new version or a version bump type.");
  }

  const results = files.map((file) =>
    updateVersionFile(file.path, file.kind, newVersion, file.currentVersion, {
      shouldProcess: options.shouldProcess,
      logger: options.logger,
    }),
  );
  return { currentVersion, newVersion, results };
}

export const SOURCE_KIND_LABELS: Record<SourceKind, string> = {
  [SourceKind.Csproj]: "C# Project",
  [SourceKind.PowerShellModule]: "PowerShell Module",
  [SourceKind.BuildScript]: "Build Script",
};

export interface ProjectVersionInfo extends DiscoveredFile {
  currentVersion: string;
  type: string;
}

export interface GetProjectVersionsOptions {
  moduleName?: string;
  excludeDirectories?: readonly string[];
}

/** Versioned files below the root, labelled by kind. Files with no version are left out. */
export function getProjectVersions(
  rootPath: string,
  options: GetProjectVersionsOptions = {},
): ProjectVersionInfo[] {
  const files = filterByModuleName(
    discover(rootPath, buildExcludeDirectories(options.excludeDirectories)),
    options.moduleName,
  );
  const found: ProjectVersionInfo[] = [];
  for (const file of files) {
    if (file.currentVersion === undefined) continue;
    found.push({
      ...file,
      currentVersion: file.currentVersion,
      type: SOURCE_KIND_LABELS[file.kind],
    });
  }
  return found;
}
