import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import {
  dependencyClosure,
  directDependencies,
  loadProject,
  orderByDependencies,
  type DotnetProject,
} from "../src/index";
import { csproj, makeTmpDir, writeFile } from "./helpers";

describe("projects", () => {
  let tmpDir: string;
  let core: DotnetProject;
  let data: DotnetProject;
  let web: DotnetProject;
  let tests: DotnetProject;

  beforeEach(() => {
    tmpDir = makeTmpDir("projects");
    core = loadProject(
      writeFile(tmpDir, "Core/Core.csproj", csproj({ version: "1.0.0" })),
    );
    data = loadProject(
      writeFile(
        tmpDir,
        "Data/Data.csproj",
        csproj({ version: "1.0.0", references: ["..\\Core\\Core.csproj"] }),
      ),
    );
    web = loadProject(
      writeFile(
        tmpDir,
        "Web/Web.csproj",
        csproj({
          version: "1.0.0",
          references: ["../Data/Data.csproj", "../Core/Core.csproj"],
        }),
      ),
    );
    tests = loadProject(
      writeFile(
        tmpDir,
        "Tests/Tests.csproj",
        csproj({ isPackable: false, references: ["../Web/Web.csproj"] }),
      ),
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true });
  });

  it("loads name, version and packability", () => {
    expect(web.name).toBe("Web");
    expect(web.currentVersion).toBe("1.0.0");
    expect(web.isPackable).toBe(true);
    expect(tests.isPackable).toBe(false);
    expect(tests.currentVersion).toBeUndefined();
  });

  it("lists direct dependencies by name", () => {
    const all = [core, data, web, tests];
    expect(directDependencies(web, all)).toEqual(["Core", "Data"]);
    expect(directDependencies(data, all)).toEqual(["Core"]);
    expect(directDependencies(core, all)).toEqual([]);
  });

  it("ignores references outside the candidates", () => {
    expect(directDependencies(web, [web, data])).toEqual(["Data"]);
  });

  it("adds transitive references in discovery order", () => {
    const all = [core, data, tests, web];
    expect(dependencyClosure([web], all).map((p) => p.name)).toEqual([
      "Core",
      "Data",
      "Web",
    ]);
  });

  it("orders dependencies first", () => {
    const items = [
      { name: "Web", deps: ["Data", "Core"] },
      { name: "Data", deps: ["Core"] },
      { name: "Core", deps: [] },
      { name: "Alpha", deps: [] },
    ];
    const order = orderByDependencies(items, (i) => i.name, (i) => i.deps);
    expect(order.hasCycle).toBe(false);
    expect(order.ordered.map((i) => i.name)).toEqual(["Alpha", "Core", "Data", "Web"]);
  });

  it("falls back to name order on a cycle", () => {
    const items = [
      { name: "B", deps: ["A"] },
      { name: "A", deps: ["B"] },
      { name: "C", deps: [] },
    ];
    const order = orderByDependencies(items, (i) => i.name, (i) => i.deps);
    expect(order.hasCycle).toBe(true);
    expect(order.ordered.map((i) => i.name)).toEqual(["A", "B", "C"]);
  });
});
