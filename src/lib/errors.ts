export type ReleaseToolsErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_VERSION_MAP_ENTRY"
  | "INVALID_VERSION_PATTERN"
  | "VERSION_SOURCE_UNAVAILABLE"
  | "RELEASE_CREATION_FAILED"
  | "ASSET_UPLOAD_FAILED"
  | "ASSET_NOT_FOUND";

export class ReleaseToolsError extends Error {
  constructor(
    message: string,
    public readonly code: ReleaseToolsErrorCode,
  ) {
    super(message);
    this.name = "ReleaseToolsError";
  }
}

export class InvalidArgumentError extends ReleaseToolsError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class InvalidVersionMapEntryError extends ReleaseToolsError {
  constructor(message: string) {
    super(message, "INVALID_VERSION_MAP_ENTRY");
    this.name = "InvalidVersionMapEntryError";
  }
}

export class InvalidVersionPatternError extends ReleaseToolsError {
  constructor(message: string) {
    super(message, "INVALID_VERSION_PATTERN");
    this.name = "InvalidVersionPatternError";
  }
}

export class VersionSourceUnavailableError extends ReleaseToolsError {
  constructor(
    packageId: string,
    public readonly sources: string[],
  ) {
    super(
      `No package source was reachable while resolving versions for ${packageId} (${sources.join(", ")})`,
      "VERSION_SOURCE_UNAVAILABLE",
    );
    this.name = "VersionSourceUnavailableError";
  }
}

/** How an HTTP call failed; timeouts and network errors are transient. */
export type HttpFailureKind = "timeout" | "network" | "auth" | "validation" | "http";

export class ReleaseCreationFailedError extends ReleaseToolsError {
  constructor(
    message: string,
    public readonly kind: HttpFailureKind,
    public readonly status?: number,
    public readonly responseBody?: string,
  ) {
    super(message, "RELEASE_CREATION_FAILED");
    this.name = "ReleaseCreationFailedError";
  }
}

export class AssetUploadFailedError extends ReleaseToolsError {
  constructor(
    message: string,
    public readonly assetName: string,
    public readonly kind: HttpFailureKind,
    public readonly status?: number,
    public readonly responseBody?: string,
  ) {
    super(message, "ASSET_UPLOAD_FAILED");
    this.name = "AssetUploadFailedError";
  }
}

export class AssetNotFoundError extends ReleaseToolsError {
  constructor(public readonly assetPath: string) {
    super(`There is no file at the specified path, '${assetPath}'.`, "ASSET_NOT_FOUND");
    this.name = "AssetNotFoundError";
  }
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReleaseToolsError };

export function ok<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: ReleaseToolsError): ValidationResult<T> {
  return { ok: false, error };
}

/** Unwrap a validation result at a boundary where failure must terminate. */
export function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Trim an HTTP response body for inclusion in an error message. */
export function trimForMessage(text: string | undefined, max = 4000): string {
  if (!text) return "";
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}
