const MODULE_VERSION_READ_REGEX = /ModuleVersion\s*=\s*['"]([\d.]+)['"]/i;
const MODULE_VERSION_WRITE_REGEX = /ModuleVersion\s*=\s*(['"])([\d.]+)(['"])/gi;
const BUILD_SCRIPT_VERSION_REGEX = /ModuleVersion\s*=\s*['"]?([\d.]+)['"]?/i;
const BUILD_MARKERS = ["invoke-modulebuild", "build-module"];

/** Module manifests (.psd1) declare ModuleVersion = '1.2.3' */
export function readModuleManifestVersionFromContent(
  content: string,
): string | undefined {
  return content.match(MODULE_VERSION_READ_REGEX)?.[1];
}

/** Build scripts may leave the ModuleVersion value unquoted. */
export function readBuildScriptVersionFromContent(
  content: string,
): string | undefined {
  return content.match(BUILD_SCRIPT_VERSION_REGEX)?.[1];
}

/** A .ps1 counts as a build script when it assigns ModuleVersion or calls the module builder. */
export function looksLikeBuildScript(content: string): boolean {
  if (BUILD_SCRIPT_VERSION_REGEX.test(content)) return true;
  const lower = content.toLowerCase();
  return BUILD_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Rewrite every quoted ModuleVersion assignment. Assignments already at the
 * target version are left as they are.
 */
export function applyModuleVersion(content: string, version: string): string {
  return content.replace(
    MODULE_VERSION_WRITE_REGEX,
    (whole: string, _open: string, current: string) =>
      current === version ? whole : `ModuleVersion        = '${version}'`,
  );
}
