import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  SourceKind,
  VersionUpdateStatus,
  getProjectVersions,
  setProjectVersion,
  updateVersionFile,
} from "../src/index";
import { csproj, makeTmpDir, writeFile } from "./helpers";

describe("updateVersionFile", () => {
  let tmpDir: string;
  let csprojPath: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("writer");
    csprojPath = writeFile(tmpDir, "Contoso.Core.csproj", csproj({ version: "1.0.0" }));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it("writes the new version", () => {
    const result = updateVersionFile(csprojPath, SourceKind.Csproj, "1.1.0", "1.0.0");
    expect(result).toEqual({
      source: csprojPath,
      kind: SourceKind.Csproj,
      oldVersion: "1.0.0",
      newVersion: "1.1.0",
      status: VersionUpdateStatus.Updated,
      error: undefined,
    });
    expect(fs.readFileSync(csprojPath, "utf-8")).toBe(csproj({ version: "1.1.0" }));
  });

  it("leaves no temp files behind", () => {
    updateVersionFile(csprojPath, SourceKind.Csproj, "1.1.0", "1.0.0");
    expect(fs.readdirSync(tmpDir)).toEqual(["Contoso.Core.csproj"]);
  });

  it("reports NoChange and does not write when the version is already set", () => {
    const before = fs.statSync(csprojPath).mtimeMs;
    const result = updateVersionFile(csprojPath, SourceKind.Csproj, "1.0.0", "1.0.0");
    expect(result.status).toBe(VersionUpdateStatus.NoChange);
    expect(fs.statSync(csprojPath).mtimeMs).toBe(before);
  });

  it("reports Skipped when the change is declined", () => {
    const asked: string[] = [];
    const result = updateVersionFile(csprojPath, SourceKind.Csproj, "2.0.0", "1.0.0", {
      shouldProcess: (target, action) => {
        asked.push(`${action} on ${target}`);
        return false;
      },
    });
    expect(result.status).toBe(VersionUpdateStatus.Skipped);
    expect(asked).toEqual([`Update version from '1.0.0' to '2.0.0' on ${csprojPath}`]);
    expect(fs.readFileSync(csprojPath, "utf-8")).toBe(csproj({ version: "1.0.0" }));
  });

  it("reports an error for a missing file", () => {
    const result = updateVersionFile(
      path.join(tmpDir, "Missing.csproj"),
      SourceKind.Csproj,
      "1.0.0",
      undefined,
    );
    expect(result.status).toBe(VersionUpdateStatus.Error);
    expect(result.error).toBe("File not found.");
  });

  it("reports an error when the path is a directory", () => {
    const dirPath = path.join(tmpDir, "Folder.csproj");
    fs.mkdirSync(dirPath);
    const result = updateVersionFile(dirPath, SourceKind.Csproj, "1.1.0", "1.0.0");
    expect(result.status).toBe(VersionUpdateStatus.Error);
    expect(result.error).toContain("EISDIR");
  });

  it("reports an error and keeps the file when the write fails", () => {
    const blocker = path.join(tmpDir, `.Contoso.Core.csproj.${process.pid}.tmp`);
    fs.mkdirSync(blocker);
    const result = updateVersionFile(csprojPath, SourceKind.Csproj, "1.1.0", "1.0.0");
    expect(result.status).toBe(VersionUpdateStatus.Error);
    expect(result.error).toContain("EISDIR");
    expect(fs.readFileSync(csprojPath, "utf-8")).toBe(csproj({ version: "1.0.0" }));
    expect(fs.statSync(blocker).isDirectory()).toBe(true);
  });

  it("reports NoChange for a build script with an unquoted version", () => {
    const scriptPath = writeFile(tmpDir, "build.ps1", "$ModuleVersion = 1.0.0\n");
    const result = updateVersionFile(scriptPath, SourceKind.BuildScript, "2.0.0", "1.0.0");
    expect(result.status).toBe(VersionUpdateStatus.NoChange);
    expect(fs.readFileSync(scriptPath, "utf-8")).toBe("$ModuleVersion = 1.0.0\n");
  });
});

describe("setProjectVersion", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("set-version");
    writeFile(tmpDir, "src/Contoso.Tools.csproj", csproj({ version: "1.2.3" }));
    writeFile(tmpDir, "Contoso.Tools.psd1", "@{\n    ModuleVersion = '1.2.3'\n}\n");
    writeFile(tmpDir, "build.ps1", "$ModuleVersion = '1.2.3'\nBuild-Module\n");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it("bumps every discovered file from the current version", () => {
    const result = setProjectVersion({ rootPath: tmpDir, bump: "minor" });
    expect(result.currentVersion).toBe("1.2.3");
    expect(result.newVersion).toBe("1.3.0");
    expect(result.results.map((r) => [path.basename(r.source), r.status])).toEqual([
      ["build.ps1", VersionUpdateStatus.Updated],
      ["Contoso.Tools.psd1", VersionUpdateStatus.Updated],
      ["Contoso.Tools.csproj", VersionUpdateStatus.Updated],
    ]);
    expect(fs.readFileSync(path.join(tmpDir, "Contoso.Tools.psd1"), "utf-8")).toBe(
      "@{\n    ModuleVersion        = '1.3.0'\n}\n",
    );
    expect(fs.readFileSync(path.join(tmpDir, "build.ps1"), "utf-8")).toBe(
      "$ModuleVersion        = '1.3.0'\nBuild-Module\n",
    );
  });

  it("is a no-op when every file already has the version", () => {
    const result = setProjectVersion({ rootPath: tmpDir, newVersion: "1.2.3" });
    expect(result.results.every((r) => r.status === VersionUpdateStatus.NoChange)).toBe(
      true,
    );
  });

  it("requires a version or a bump kind", () => {
    expect(() => setProjectVersion({ rootPath: tmpDir })).toThrow(
      "Specify a new version or a version bump type.",
    );
  });

  it("rejects versions that are not dotted numeric", () => {
    expect(() => setProjectVersion({ rootPath: tmpDir, newVersion: "1.2" })).toThrow(
      "New version '1.2' is not a dotted numeric version.",
    );
  });

  it("fails when no current version can be found", () => {
    const empty = makeTmpDir("set-version-empty");
    try {
      expect(() => setProjectVersion({ rootPath: empty, bump: "build" })).toThrow(
        `Could not determine current version under ${empty}`,
      );
    } finally {
      fs.rmSync(empty, { recursive: true });
    }
  });
});

describe("getProjectVersions", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir("get-version");
    writeFile(tmpDir, "Contoso.Tools.csproj", csproj({ version: "2.0.0" }));
    writeFile(tmpDir, "NoVersion.csproj", csproj());
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it("labels versioned files and leaves out files without a version", () => {
    expect(
      getProjectVersions(tmpDir).map((info) => [info.currentVersion, info.type]),
    ).toEqual([["2.0.0", "C# Project"]]);
  });
});
