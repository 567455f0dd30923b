import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { resolveSecret } from "../src/lib/secrets";
import { makeTmpDir, writeFile } from "./helpers";

describe("resolveSecret", () => {
  let tmpDir: string;
  let secretFile: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("secrets");
    secretFile = writeFile(tmpDir, "api-key.txt", "  from-file-secret \n");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  const env = { RELEASE_API_KEY: " from-env-secret ", EMPTY_KEY: "   " };

  it("prefers the file, then the environment, then the inline value", () => {
    const all = { inline: "inline-secret", filePath: secretFile, envName: "RELEASE_API_KEY" };
    expect(resolveSecret(all, env)).toBe("from-file-secret");
    expect(resolveSecret({ ...all, filePath: undefined }, env)).toBe("from-env-secret");
    expect(resolveSecret({ inline: " inline-secret " }, env)).toBe("inline-secret");
  });

  it("falls through empty and unreadable sources", () => {
    const empty = writeFile(tmpDir, "empty.txt", "\n");
    expect(
      resolveSecret(
        { filePath: empty, envName: "EMPTY_KEY", inline: "test-secret" },
        env,
      ),
    ).toBe("test-secret");
    expect(
      resolveSecret(
        { filePath: path.join(tmpDir, "missing.txt"), envName: "RELEASE_API_KEY" },
        env,
      ),
    ).toBe("from-env-secret");
  });

  it("returns undefined when nothing is set", () => {
    expect(resolveSecret({ envName: "UNSET_KEY" }, env)).toBeUndefined();
  });
});
