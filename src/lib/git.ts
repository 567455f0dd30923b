import { exec } from "./exec";

export function getRepoRoot(cwd?: string): string {
  try {
    return exec("git rev-parse --show-toplevel", cwd ?? process.cwd());
  } catch {
    return process.cwd();
  }
}
