import fs from "node:fs";
import { errorMessage } from "./errors";
import { nullLogger, type Logger } from "./logger";

export interface SecretSources {
  inline?: string;
  /** Path to a file holding the secret */
  filePath?: string;
  /** Name of an environment variable holding the secret */
  envName?: string;
}

/**
 * Resolve a secret from a file, then an environment variable, then an inline
 * value. The first non-empty (trimmed) value wins.
 */
export function resolveSecret(
  sources: SecretSources,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = nullLogger,
): string | undefined {
  if (sources.filePath?.trim()) {
    try {
      const fromFile = fs.readFileSync(sources.filePath.trim(), "utf-8").trim();
      if (fromFile) return fromFile;
    } catch (err) {
      logger.verbose(
        `Could not read secret file ${sources.filePath}: ${errorMessage(err)}`,
      );
    }
  }

  if (sources.envName?.trim()) {
    const fromEnv = env[sources.envName.trim()]?.trim();
    if (fromEnv) return fromEnv;
  }

  const inline = sources.inline?.trim();
  return inline ? inline : undefined;
}
