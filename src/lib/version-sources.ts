import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { RepositoryCredential } from "../types";
import { VersionSourceUnavailableError, errorMessage } from "./errors";
import { nullLogger, type Logger } from "./logger";

export const DEFAULT_PACKAGE_SOURCE = "https://api.nuget.org/v3/index.json";
export const DEFAULT_HTTP_TIMEOUT_MS = 100_000;

/** A place that knows which versions of a package have been published. */
export interface VersionSource {
  readonly location: string;
  /**
   * Versions published for the package id. An unknown package yields an
   * empty list; an unreachable source throws.
   */
  listVersions(packageId: string): Promise<string[]>;
}

export type FetchLike = (
  input: string,
  init?: RequestInit,
) => Promise<Response>;

export interface PackageRegistryOptions {
  sources?: readonly string[];
  credential?: RepositoryCredential;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export function isLocalSource(source: string): boolean {
  if (/^file:/i.test(source)) return true;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(source)) return false;
  return path.isAbsolute(source) || source.startsWith(".");
}

/** Package files in a folder tree named <id>.<version>.nupkg */
export class LocalFolderSource implements VersionSource {
  readonly location: string;

  constructor(location: string) {
    this.location = /^file:/i.test(location)
      ? fileURLToPath(location)
      : path.resolve(location.replace(/^"|"$/g, ""));
  }

  async listVersions(packageId: string): Promise<string[]> {
    if (!fs.existsSync(this.location)) {
      throw new Error(`Local package folder not found: ${this.location}`);
    }
    const prefix = `${packageId.toLowerCase()}.`;
    const versions: string[] = [];
    for (const file of findPackageFiles(this.location)) {
      const name = path.basename(file, path.extname(file));
      if (!name.toLowerCase().startsWith(prefix)) continue;
      let versionText = name.slice(prefix.length);
      if (versionText.toLowerCase().endsWith(".symbols")) {
        versionText = versionText.slice(0, -".symbols".length);
      }
      // Another package whose id extends this one (Foo.Core vs Foo)
      if (!/^\d/.test(versionText)) continue;
      versions.push(versionText);
    }
    return versions;
  }
}

/** Recursively list *.nupkg files below a folder. */
export function findPackageFiles(root: string): string[] {
  const found: string[] = [];
  const pending = [root];
  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      continue;
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(full);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".nupkg")) {
        found.push(full);
      }
    }
  }
  return found.sort();
}

interface ServiceIndexResource {
  "@id"?: unknown;
  "@type"?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function resourceTypes(resource: ServiceIndexResource): string[] {
  const type = resource["@type"];
  if (typeof type === "string") return [type];
  if (Array.isArray(type)) {
    return type.filter((t): t is string => typeof t === "string");
  }
  return [];
}

/**
 * A v3 feed. A service index URL (ending in index.json) is resolved to its
 * PackageBaseAddress resource; any other URL is used as that base directly.
 */
export class HttpFeedSource implements VersionSource {
  private baseAddress: Promise<string> | undefined;

  constructor(
    readonly location: string,
    private readonly options: {
      credential?: RepositoryCredential;
      timeoutMs: number;
      fetch: FetchLike;
    },
  ) {}

  async listVersions(packageId: string): Promise<string[]> {
    const base = await this.resolveBaseAddress();
    const url = `${base.replace(/\/+$/, "")}/${packageId.toLowerCase()}/index.json`;
    const response = await this.get(url);
    if (response.status === 404) return [];
    if (!response.ok) {
      throw new Error(`GET ${url} returned ${response.status}`);
    }
    const body: unknown = await response.json();
    if (!isRecord(body) || !Array.isArray(body.versions)) return [];
    const versions: unknown[] = body.versions;
    return versions.filter((v): v is string => typeof v === "string");
  }

  private async resolveBaseAddress(): Promise<string> {
    if (!this.baseAddress) {
      this.baseAddress = this.fetchBaseAddress();
    }
    try {
      return await this.baseAddress;
    } catch (err) {
      // retried on the next lookup
      this.baseAddress = undefined;
      throw err;
    }
  }

  private async fetchBaseAddress(): Promise<string> {
    if (!this.location.toLowerCase().endsWith("index.json")) {
      return this.location.replace(/\/+$/, "");
    }
    const response = await this.get(this.location);
    if (!response.ok) {
      throw new Error(
        `Service index ${this.location} returned ${response.status}`,
      );
    }
    const body: unknown = await response.json();
    const resources: unknown[] =
      isRecord(body) && Array.isArray(body.resources) ? body.resources : [];
    for (const resource of resources) {
      if (!isRecord(resource)) continue;
      const id = resource["@id"];
      const isBase = resourceTypes(resource).some((t) =>
        t.toLowerCase().includes("packagebaseaddress"),
      );
      if (isBase && typeof id === "string" && id.trim()) {
        return id.trim();
      }
    }
    throw new Error(
      `Service index ${this.location} has no PackageBaseAddress resource`,
    );
  }

  private get(url: string): Promise<Response> {
    return this.options.fetch(url, {
      method: "GET",
      headers: credentialHeaders(this.options.credential),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });
  }
}

export function credentialHeaders(
  credential: RepositoryCredential | undefined,
): Record<string, string> {
  const headers: Record<string, string> = { Accept: "application/json" };
  const secret = credential?.secret?.trim();
  if (!secret) return headers;
  const userName = credential?.userName?.trim();
  if (userName) {
    const token = Buffer.from(`${userName}:${secret}`).toString("base64");
    headers.Authorization = `Basic ${token}`;
  } else {
    headers["X-NuGet-ApiKey"] = secret;
  }
  return headers;
}

export function createVersionSource(
  source: string,
  options: { credential?: RepositoryCredential; timeoutMs: number; fetch: FetchLike },
): VersionSource {
  return isLocalSource(source)
    ? new LocalFolderSource(source)
    : new HttpFeedSource(source, options);
}

/**
 * Looks up published versions across every configured source and returns
 * their union. Sources are queried in order; an unreachable source is
 * skipped unless none can be reached.
 */
export class PackageRegistry {
  readonly sources: VersionSource[];
  private readonly logger: Logger;
  private readonly cache = new Map<string, Promise<string[]>>();

  constructor(options: PackageRegistryOptions = {}) {
    const locations = [
      ...new Set(
        (options.sources ?? []).map((s) => s.trim()).filter(Boolean),
      ),
    ];
    if (locations.length === 0) locations.push(DEFAULT_PACKAGE_SOURCE);
    const sourceOptions = {
      credential: options.credential,
      timeoutMs: options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
      fetch: options.fetch ?? fetch,
    };
    this.sources = locations.map((l) => createVersionSource(l, sourceOptions));
    this.logger = options.logger ?? nullLogger;
  }

  async listPublishedVersions(packageId: string): Promise<string[]> {
    const key = packageId.toLowerCase();
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.queryAll(packageId);
      this.cache.set(key, pending);
    }
    try {
      return await pending;
    } catch (err) {
      this.cache.delete(key);
      throw err;
    }
  }

  private async queryAll(packageId: string): Promise<string[]> {
    const versions = new Set<string>();
    let reachable = 0;
    for (const source of this.sources) {
      try {
        const found = await source.listVersions(packageId);
        reachable++;
        this.logger.verbose(
          `${packageId}: ${found.length} version(s) in ${source.location}`,
        );
        for (const version of found) versions.add(version);
      } catch (err) {
        this.logger.verbose(
          `${packageId}: source ${source.location} unavailable: ${errorMessage(err)}`,
        );
      }
    }
    if (reachable === 0) {
      throw new VersionSourceUnavailableError(
        packageId,
        this.sources.map((s) => s.location),
      );
    }
    return [...versions];
  }
}
