import { describe, it, expect } from "vitest";
import path from "node:path";
import {
  applyCsprojVersion,
  isPackableContent,
  readCsprojVersionFromContent,
  readProjectReferences,
} from "../../src/lib/manifest";

const SAMPLE_CSPROJ = `<Project Sdk="Microsoft.NET.Sdk">
  <PropertyGroup>
    <TargetFramework>net8.0</TargetFramework>
    <Version>1.2.3</Version>
    <AssemblyVersion>1.2.3.0</AssemblyVersion>
    <FileVersion>1.2.3.0</FileVersion>
  </PropertyGroup>
</Project>
`;

describe("csproj manifest", () => {
  const projectDir = path.resolve("/repo/src/Contoso.Core");
  const csprojPath = path.join(projectDir, "Contoso.Core.csproj");

  it("reads the version from a csproj", () => {
    expect(readCsprojVersionFromContent(SAMPLE_CSPROJ)).toBe("1.2.3");
  });

  it("falls back to VersionPrefix and PackageVersion", () => {
    expect(
      readCsprojVersionFromContent("<VersionPrefix>2.0.1</VersionPrefix>"),
    ).toBe("2.0.1");
    expect(
      readCsprojVersionFromContent("<PackageVersion>3.1.0</PackageVersion>"),
    ).toBe("3.1.0");
  });

  it("prefers Version over VersionPrefix", () => {
    const content =
      "<VersionPrefix>1.0.0</VersionPrefix>\n<Version>2.0.0</Version>";
    expect(readCsprojVersionFromContent(content)).toBe("2.0.0");
  });

  it("returns undefined when no version element exists", () => {
    expect(
      readCsprojVersionFromContent("<TargetFramework>net8.0</TargetFramework>"),
    ).toBeUndefined();
  });

  it("rewrites every version element", () => {
    const content = applyCsprojVersion(SAMPLE_CSPROJ, "2.0.0");
    expect(content).toContain("<Version>2.0.0</Version>");
    expect(content).toContain("<AssemblyVersion>2.0.0</AssemblyVersion>");
    expect(content).toContain("<FileVersion>2.0.0</FileVersion>");
    expect(content).toContain("<TargetFramework>net8.0</TargetFramework>");
  });

  it("keeps element casing", () => {
    expect(applyCsprojVersion("<version>1.0.0</version>", "1.1.0")).toBe(
      "<version>1.1.0</version>",
    );
  });

  it("returns identical content when the version is already set", () => {
    const content = "<Version>1.2.3</Version>";
    expect(applyCsprojVersion(content, "1.2.3")).toBe(content);
  });

  it("does not add missing elements", () => {
    const content = "<TargetFramework>net8.0</TargetFramework>";
    expect(applyCsprojVersion(content, "1.0.0")).toBe(content);
  });

  it.each([
    ["<IsPackable>false</IsPackable>", false],
    ["<IsPackable> False </IsPackable>", false],
    ["<IsPackable>true</IsPackable>", true],
    ["<Project></Project>", true],
  ])("isPackableContent(%s) is %s", (content, expected) => {
    expect(isPackableContent(content)).toBe(expected);
  });

  it("resolves project references relative to the csproj", () => {
    const content = `<ItemGroup>
    <ProjectReference Include="..\\Shared\\Shared.csproj" />
    <ProjectReference Include="../Util/Util.csproj" />
  </ItemGroup>`;
    expect(readProjectReferences(csprojPath, content)).toEqual([
      path.resolve(projectDir, "../Shared/Shared.csproj"),
      path.resolve(projectDir, "../Util/Util.csproj"),
    ]);
  });
});
