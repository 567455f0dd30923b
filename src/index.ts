export * from "./types";
export * from "./lib/errors";
export * from "./lib/version";
export * from "./lib/version-map";
export * from "./lib/version-sources";
export * from "./lib/resolver";
export * from "./lib/manifest";
export * from "./lib/scanner";
export * from "./lib/version-writer";
export * from "./lib/projects";
export * from "./lib/dotnet";
export * from "./lib/signing";
export * from "./lib/exec";
export * from "./lib/github";
export * from "./lib/release";
export { createConsoleLogger, nullLogger, type Logger } from "./lib/logger";
export { getProjectVersion } from "./commands/get-project-version";
export { setProjectVersion as setProjectVersionCommand } from "./commands/set-project-version";
export { resolveVersion } from "./commands/resolve-version";
export { repositoryRelease } from "./commands/repository-release";
export { githubRelease } from "./commands/github-release";
