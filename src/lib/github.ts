import fs from "node:fs";
import path from "node:path";
import { Octokit } from "@octokit/rest";
import {
  AssetNotFoundError,
  AssetUploadFailedError,
  InvalidArgumentError,
  ReleaseCreationFailedError,
  errorMessage,
  trimForMessage,
  type HttpFailureKind,
} from "./errors";
import { nullLogger, type Logger } from "./logger";
import { isPrereleaseVersion } from "./version";

export const GITHUB_API_VERSION = "2022-11-28";
export const DEFAULT_GITHUB_TIMEOUT_MS = 100_000;
export const DEFAULT_TAG_TEMPLATE = "{Project}-v{Version}";

export interface GitHubRelease {
  id: number;
  tagName: string;
  htmlUrl: string;
  uploadUrl: string;
}

export interface CreateReleaseParams {
  owner: string;
  repo: string;
  tagName: string;
  targetCommitish?: string;
  name: string;
  body?: string;
  generateReleaseNotes: boolean;
  draft: boolean;
  prerelease: boolean;
}

export interface UploadAssetParams {
  uploadUrl: string;
  name: string;
  data: Buffer;
}

/** The few release endpoints the publisher needs. */
export interface GitHubReleaseApi {
  createRelease(params: CreateReleaseParams): Promise<GitHubRelease>;
  getReleaseByTag(owner: string, repo: string, tag: string): Promise<GitHubRelease>;
  uploadAsset(params: UploadAssetParams): Promise<void>;
}

export interface GitHubValidationError {
  resource?: string;
  code?: string;
  field?: string;
}

/** A failed call to the GitHub API, classified by how it failed. */
export class GitHubHttpError extends Error {
  constructor(
    message: string,
    public readonly kind: HttpFailureKind,
    public readonly status?: number,
    public readonly body?: string,
    public readonly validationErrors: GitHubValidationError[] = [],
  ) {
    super(message);
    this.name = "GitHubHttpError";
  }

  isAlreadyExists(field: string): boolean {
    return (
      this.status === 422 &&
      this.validationErrors.some(
        (e) =>
          e.code?.toLowerCase() === "already_exists" &&
          e.field?.toLowerCase() === field,
      )
    );
  }
}

export function failureKindForStatus(status: number): HttpFailureKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 422) return "validation";
  return "http";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 */
export function isOctokitRequestError(
  error: unknown,
): error is Error & { status: number; response?: { data?: unknown } } {
  return error instanceof Error && "status" in error && typeof error.status === "number";
}

function isTimeout(error: unknown): boolean {
  for (let current = error, depth = 0; isRecord(current) && depth < 5; depth++) {
    if (current.name === "TimeoutError" || current.name === "AbortError") return true;
    current = current.cause;
  }
  return false;
}

function parseValidationErrors(data: unknown): GitHubValidationError[] {
  if (!isRecord(data) || !Array.isArray(data.errors)) return [];
  const errors: unknown[] = data.errors;
  return errors.filter(isRecord).map((e) => ({
    resource: typeof e.resource === "string" ? e.resource : undefined,
    code: typeof e.code === "string" ? e.code : undefined,
    field: typeof e.field === "string" ? e.field : undefined,
  }));
}

/** Maps Octokit (and unknown) errors to GitHubHttpError. */
export function toGitHubHttpError(error: unknown): GitHubHttpError {
  if (error instanceof GitHubHttpError) return error;
  if (isTimeout(error)) {
    return new GitHubHttpError(`Request timed out: ${errorMessage(error)}`, "timeout");
  }
  if (isOctokitRequestError(error) && error.response) {
    const data = error.response.data;
    const body = typeof data === "string" ? data : JSON.stringify(data ?? "");
    return new GitHubHttpError(
      error.message,
      failureKindForStatus(error.status),
      error.status,
      body,
      parseValidationErrors(data),
    );
  }
  return new GitHubHttpError(`Network error: ${errorMessage(error)}`, "network");
}

/** Strip the RFC 6570 template suffix GitHub appends to upload URLs. */
export function stripUploadTemplate(uploadUrl: string): string {
  const brace = uploadUrl.indexOf("{");
  return brace >= 0 ? uploadUrl.slice(0, brace) : uploadUrl;
}

export interface OctokitReleaseApiOptions {
  timeoutMs?: number;
}

/**
 * GitHubReleaseApi backed by an Octokit instance (token, base URL and user
 * agent are configured on the instance).
 */
export function createOctokitReleaseApi(
  octokit: Octokit,
  options: OctokitReleaseApiOptions = {},
): GitHubReleaseApi {
  const timeoutMs = options.timeoutMs ?? DEFAULT_GITHUB_TIMEOUT_MS;
  const requestOptions = () => ({ signal: AbortSignal.timeout(timeoutMs) });
  const headers = { "x-github-api-version": GITHUB_API_VERSION };

  return {
    async createRelease(params) {
      try {
        const { data } = await octokit.rest.repos.createRelease({
          owner: params.owner,
          repo: params.repo,
          tag_name: params.tagName,
          target_commitish: params.targetCommitish,
          name: params.name,
          body: params.body,
          generate_release_notes: params.generateReleaseNotes,
          draft: params.draft,
          prerelease: params.prerelease,
          headers,
          request: requestOptions(),
        });
        return {
          id: data.id,
          tagName: data.tag_name,
          htmlUrl: data.html_url,
          uploadUrl: data.upload_url,
        };
      } catch (err) {
        throw toGitHubHttpError(err);
      }
    },

    async getReleaseByTag(owner, repo, tag) {
      try {
        const { data } = await octokit.rest.repos.getReleaseByTag({
          owner,
          repo,
          tag,
          headers,
          request: requestOptions(),
        });
        return {
          id: data.id,
          tagName: data.tag_name,
          htmlUrl: data.html_url,
          uploadUrl: data.upload_url,
        };
      } catch (err) {
        throw toGitHubHttpError(err);
      }
    },

    async uploadAsset(params) {
      try {
        await octokit.request(`POST ${stripUploadTemplate(params.uploadUrl)}{?name}`, {
          name: params.name,
          data: params.data,
          headers: {
            ...headers,
            "content-type": "application/octet-stream",
            "content-length": params.data.length,
          },
          request: requestOptions(),
        });
      } catch (err) {
        throw toGitHubHttpError(err);
      }
    },
  };
}

export function createOctokit(token: string): Octokit {
  return new Octokit({ auth: token, userAgent: "dotnet-release-tools" });
}

export interface GitHubReleaseRequest {
  owner: string;
  repo: string;
  tagName: string;
  /** Defaults to the tag name */
  releaseName?: string;
  releaseNotes?: string;
  generateReleaseNotes?: boolean;
  commitish?: string;
  isDraft?: boolean;
  isPreRelease?: boolean;
  /** Reuse the release when its tag already exists; defaults to true */
  reuseExistingReleaseOnConflict?: boolean;
  assetFilePaths?: string[];
}

export type AssetUploadStatus = "uploaded" | "skipped" | "failed" | "not-attempted";

export interface AssetUploadOutcome {
  name: string;
  path: string;
  status: AssetUploadStatus;
  error?: string;
}

export interface GitHubReleaseResult {
  succeeded: boolean;
  releaseCreationSucceeded: boolean;
  /** null when no assets were requested */
  allAssetUploadsSucceeded: boolean | null;
  releaseUrl?: string;
  reusedExistingRelease: boolean;
  assets: AssetUploadOutcome[];
  errorMessage?: string;
}

function describeFailure(error: GitHubHttpError): string {
  switch (error.kind) {
    case "timeout":
      return "timed out";
    case "network":
      return error.message;
    default:
      return `status ${error.status ?? "unknown"}`;
  }
}

/**
 * Creates (or reuses) a release for a tag and uploads files to it.
 * Tags this instance has already created or reused are looked up directly
 * instead of being created again.
 */
export class GitHubReleasePublisher {
  private readonly knownTags = new Set<string>();

  constructor(
    private readonly api: GitHubReleaseApi,
    private readonly logger: Logger = nullLogger,
  ) {}

  async publish(request: GitHubReleaseRequest): Promise<GitHubReleaseResult> {
    const assets = this.validate(request);

    let release: GitHubRelease;
    let reused: boolean;
    try {
      ({ release, reused } = await this.createOrReuseRelease(request));
    } catch (err) {
      return {
        succeeded: false,
        releaseCreationSucceeded: false,
        allAssetUploadsSucceeded: assets.length > 0 ? false : null,
        reusedExistingRelease: false,
        assets: assets.map((file) => ({
          name: path.basename(file),
          path: file,
          status: "not-attempted",
        })),
        errorMessage: errorMessage(err),
      };
    }

    const uploads = await this.uploadAssets(release.uploadUrl, assets);
    const failed = uploads.find((u) => u.status === "failed");
    const allAssetUploadsSucceeded = assets.length > 0 ? !failed : null;
    return {
      succeeded: !failed,
      releaseCreationSucceeded: true,
      allAssetUploadsSucceeded,
      releaseUrl: release.htmlUrl,
      reusedExistingRelease: reused,
      assets: uploads,
      errorMessage: failed?.error,
    };
  }

  private validate(request: GitHubReleaseRequest): string[] {
    for (const [field, value] of [
      ["owner", request.owner],
      ["repo", request.repo],
      ["tagName", request.tagName],
    ] as const) {
      if (!value?.trim()) {
        throw new InvalidArgumentError(`GitHub release ${field} is required.`);
      }
    }
    if (request.releaseNotes?.trim() && request.generateReleaseNotes) {
      throw new InvalidArgumentError(
        "Release notes cannot be combined with generated release notes.",
      );
    }
    const assets = (request.assetFilePaths ?? []).map((file) => path.resolve(file));
    for (const file of assets) {
      if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
        throw new AssetNotFoundError(file);
      }
    }
    return assets;
  }

  private tagKey(owner: string, repo: string, tag: string): string {
    return `${owner}/${repo}@${tag}`.toLowerCase();
  }

  async createOrReuseRelease(
    request: GitHubReleaseRequest,
  ): Promise<{ release: GitHubRelease; reused: boolean }> {
    const { owner, repo, tagName } = request;
    const key = this.tagKey(owner, repo, tagName);

    if (this.knownTags.has(key)) {
      try {
        const release = await this.api.getReleaseByTag(owner, repo, tagName);
        this.logger.verbose(`Reusing release ${tagName} (${release.htmlUrl})`);
        return { release, reused: true };
      } catch (err) {
        const error = toGitHubHttpError(err);
        if (error.status !== 404) throw this.creationFailed(error);
        this.knownTags.delete(key);
      }
    }

    const generateReleaseNotes = request.generateReleaseNotes ?? false;
    try {
      const release = await this.api.createRelease({
        owner,
        repo,
        tagName,
        targetCommitish: request.commitish?.trim() || undefined,
        name: request.releaseName?.trim() || tagName,
        body: generateReleaseNotes ? undefined : request.releaseNotes,
        generateReleaseNotes,
        draft: request.isDraft ?? false,
        prerelease: request.isPreRelease ?? false,
      });
      this.knownTags.add(key);
      this.logger.success(`Created release ${tagName} (${release.htmlUrl})`);
      return { release, reused: false };
    } catch (err) {
      const error = toGitHubHttpError(err);
      const reuse = request.reuseExistingReleaseOnConflict ?? true;
      if (!reuse || !error.isAlreadyExists("tag_name")) {
        throw this.creationFailed(error);
      }
      this.logger.warn(
        `Release tag ${tagName} already exists in ${owner}/${repo}; reusing the existing release.`,
      );
      try {
        const release = await this.api.getReleaseByTag(owner, repo, tagName);
        this.knownTags.add(key);
        return { release, reused: true };
      } catch (lookupErr) {
        throw this.creationFailed(toGitHubHttpError(lookupErr));
      }
    }
  }

  /**
   * Upload files in order. An asset that already exists is skipped; the
   * first failure stops the remaining uploads.
   */
  async uploadAssets(
    uploadUrl: string,
    files: readonly string[],
  ): Promise<AssetUploadOutcome[]> {
    const outcomes: AssetUploadOutcome[] = [];
    let stopped = false;
    for (const file of files) {
      const name = path.basename(file);
      if (stopped) {
        outcomes.push({ name, path: file, status: "not-attempted" });
        continue;
      }
      try {
        const uploaded = await this.uploadAsset(uploadUrl, file);
        outcomes.push({ name, path: file, status: uploaded ? "uploaded" : "skipped" });
      } catch (err) {
        stopped = true;
        outcomes.push({ name, path: file, status: "failed", error: errorMessage(err) });
      }
    }
    return outcomes;
  }

  /** Returns false when an asset with the same name is already attached. */
  async uploadAsset(uploadUrl: string, file: string): Promise<boolean> {
    const name = path.basename(file);
    let data: Buffer;
    try {
      data = fs.readFileSync(file);
    } catch (err) {
      throw new AssetUploadFailedError(
        `Reading asset ${name} failed: ${errorMessage(err)}`,
        name,
        "http",
      );
    }

    try {
      await this.api.uploadAsset({ uploadUrl: stripUploadTemplate(uploadUrl), name, data });
      this.logger.success(`Uploaded ${name}`);
      return true;
    } catch (err) {
      const error = toGitHubHttpError(err);
      if (error.isAlreadyExists("name")) {
        this.logger.warn(`Asset ${name} already exists on the release; skipping.`);
        return false;
      }
      throw new AssetUploadFailedError(
        `GitHub asset upload failed for ${name} (${describeFailure(error)}). ${trimForMessage(error.body)}`.trim(),
        name,
        error.kind,
        error.status,
        error.body,
      );
    }
  }

  private creationFailed(error: GitHubHttpError): ReleaseCreationFailedError {
    return new ReleaseCreationFailedError(
      `GitHub release creation failed (${describeFailure(error)}). ${trimForMessage(error.body)}`.trim(),
      error.kind,
      error.status,
      error.body,
    );
  }
}

/** Expand {Project} and {Version} in a tag template. */
export function buildReleaseTag(
  template: string | undefined,
  project: string,
  version: string,
): string {
  const pattern = template?.trim() || DEFAULT_TAG_TEMPLATE;
  return pattern
    .replace(/\{Project\}/gi, project)
    .replace(/\{Version\}/gi, version);
}

export function defaultPrerelease(version: string, explicit?: boolean): boolean {
  return explicit ?? isPrereleaseVersion(version);
}
