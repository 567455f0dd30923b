import { execSync, spawnSync } from "node:child_process";

/** Run a shell command and return its stdout (trimmed). */
export function exec(cmd: string, cwd: string): string {
  return execSync(cmd, { cwd, encoding: "utf-8", stdio: "pipe" }).trim();
}

export interface CommandResult {
  /** null when the process could not be started or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn error code such as ENOENT */
  errorCode?: string;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
}

/** Runs an external executable; the release pipeline only talks to dotnet through this. */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): CommandResult;
}

function spawnErrorCode(error: Error | undefined): string | undefined {
  if (!error) return undefined;
  return "code" in error && typeof error.code === "string"
    ? error.code
    : error.name;
}

export const spawnRunner: CommandRunner = {
  run(command, args, options = {}) {
    const result = spawnSync(command, args, {
      cwd: options.cwd,
      encoding: "utf-8",
      stdio: "pipe",
      timeout: options.timeoutMs,
      windowsHide: true,
    });
    return {
      exitCode: result.status,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      errorCode: spawnErrorCode(result.error),
    };
  },
};

/** Format a command line for logs and error messages. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(" ");
}
