import { SourceKind } from "../../types";
import { applyCsprojVersion, readCsprojVersionFromContent } from "./csproj";
import {
  applyModuleVersion,
  readBuildScriptVersionFromContent,
  readModuleManifestVersionFromContent,
} from "./powershell";

export {
  CSPROJ_VERSION_TAGS,
  readCsprojVersionFromContent,
  applyCsprojVersion,
  isPackableContent,
  readProjectReferences,
} from "./csproj";
export {
  readModuleManifestVersionFromContent,
  readBuildScriptVersionFromContent,
  looksLikeBuildScript,
  applyModuleVersion,
} from "./powershell";

/** Rewrite the version declared in a file's content. Pure. */
export function applyVersion(
  content: string,
  kind: SourceKind,
  targetVersion: string,
): string {
  switch (kind) {
    case SourceKind.Csproj:
      return applyCsprojVersion(content, targetVersion);
    case SourceKind.PowerShellModule:
    case SourceKind.BuildScript:
      return applyModuleVersion(content, targetVersion);
  }
}

export function readVersionFromContent(
  content: string,
  kind: SourceKind,
): string | undefined {
  switch (kind) {
    case SourceKind.Csproj:
      return readCsprojVersionFromContent(content);
    case SourceKind.PowerShellModule:
      return readModuleManifestVersionFromContent(content);
    case SourceKind.BuildScript:
      return readBuildScriptVersionFromContent(content);
  }
}
