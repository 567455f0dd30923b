import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import { resolveVersion } from "../../src/commands/resolve-version";
import { InvalidVersionPatternError } from "../../src/lib/errors";
import { makeTmpDir, writeFile } from "../helpers";

describe("resolveVersion", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("resolve");
    writeFile(tmpDir, "Contoso.Core.1.4.2.nupkg", "");
    writeFile(tmpDir, "Contoso.Core.1.4.5.nupkg", "");
    writeFile(tmpDir, "Contoso.Web.1.4.9.nupkg", "");
    writeFile(tmpDir, "Contoso.Web.1.5.0.nupkg", "");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it("steps an X-pattern past a local package folder", async () => {
    expect(await resolveVersion(["Contoso.Core"], "1.4.X", { sources: [tmpDir] })).toBe(
      "1.4.6",
    );
  });

  it("steps past every package id together", async () => {
    expect(
      await resolveVersion(["Contoso.Core", "Contoso.Web"], "1.4.X", { sources: [tmpDir] }),
    ).toBe("1.4.10");
  });

  it("returns exact versions without consulting sources", async () => {
    const fetch = vi.fn(async (): Promise<Response> => new Response("", { status: 500 }));
    expect(await resolveVersion(["Contoso.Core"], "3.0.0", { fetch })).toBe("3.0.0");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("warns when nothing is published", async () => {
    const warnings: string[] = [];
    const logger = {
      info: () => {},
      success: () => {},
      verbose: () => {},
      warn: (message: string) => warnings.push(message),
    };
    expect(
      await resolveVersion(["Contoso.Data"], "2.X", { sources: [tmpDir], logger }),
    ).toBe("2.0");
    expect(warnings).toEqual(["No published version found; using 0 baseline for '2.X'."]);
  });

  it("rejects malformed patterns", async () => {
    await expect(resolveVersion(["Contoso.Core"], "1.X.0")).rejects.toBeInstanceOf(
      InvalidVersionPatternError,
    );
  });
});
