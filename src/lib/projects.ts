import fs from "node:fs";
import path from "node:path";
import {
  isPackableContent,
  readCsprojVersionFromContent,
  readProjectReferences,
} from "./manifest";
import { comparePaths } from "./scanner";

export interface DotnetProject {
  /** File base name of the .csproj */
  name: string;
  csprojPath: string;
  isPackable: boolean;
  currentVersion?: string;
  /** Absolute paths of referenced .csproj files */
  references: string[];
}

export function loadProject(csprojPath: string): DotnetProject {
  const content = fs.readFileSync(csprojPath, "utf-8");
  return {
    name: path.basename(csprojPath, path.extname(csprojPath)),
    csprojPath,
    isPackable: isPackableContent(content),
    currentVersion: readCsprojVersionFromContent(content),
    references: readProjectReferences(csprojPath, content),
  };
}

function pathKey(filePath: string): string {
  return path.resolve(filePath).toLowerCase();
}

export function compareNames(a: string, b: string): number {
  return comparePaths(a, b);
}

/**
 * Names of the projects among `candidates` that `project` references
 * directly, sorted by name.
 */
export function directDependencies(
  project: DotnetProject,
  candidates: readonly DotnetProject[],
): string[] {
  const byPath = new Map(candidates.map((c) => [pathKey(c.csprojPath), c]));
  const names = new Set<string>();
  for (const reference of project.references) {
    const target = byPath.get(pathKey(reference));
    if (target && target !== project) names.add(target.name);
  }
  return [...names].sort(compareNames);
}

/**
 * Every project reachable through references from the selected ones,
 * including the selection itself, in discovery order.
 */
export function dependencyClosure(
  selected: readonly DotnetProject[],
  all: readonly DotnetProject[],
): DotnetProject[] {
  const byPath = new Map(all.map((p) => [pathKey(p.csprojPath), p]));
  const reached = new Set<DotnetProject>(selected);
  const pending = [...selected];
  while (pending.length > 0) {
    const current = pending.pop();
    if (!current) break;
    for (const reference of current.references) {
      const target = byPath.get(pathKey(reference));
      if (target && !reached.has(target)) {
        reached.add(target);
        pending.push(target);
      }
    }
  }
  return all.filter((p) => reached.has(p));
}

export interface DependencyOrder<T> {
  ordered: T[];
  /** True when a reference cycle forced a fallback to name order */
  hasCycle: boolean;
}

/**
 * Order items so that every item follows the items it depends on (Kahn's
 * algorithm, ties broken by name). A cycle falls back to plain name order.
 */
export function orderByDependencies<T>(
  items: readonly T[],
  nameOf: (item: T) => string,
  dependenciesOf: (item: T) => readonly string[],
): DependencyOrder<T> {
  const byName = new Map<string, T>();
  for (const item of items) byName.set(nameOf(item).toLowerCase(), item);

  const remaining = new Map<T, number>();
  const dependents = new Map<T, T[]>();
  for (const item of items) {
    const deps = dependenciesOf(item)
      .map((d) => byName.get(d.toLowerCase()))
      .filter((d): d is T => d !== undefined && d !== item);
    remaining.set(item, new Set(deps).size);
    for (const dep of new Set(deps)) {
      const list = dependents.get(dep) ?? [];
      list.push(item);
      dependents.set(dep, list);
    }
  }

  const byItemName = (a: T, b: T) => compareNames(nameOf(a), nameOf(b));
  const ready = items.filter((item) => remaining.get(item) === 0).sort(byItemName);
  const ordered: T[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (next === undefined) break;
    ordered.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) {
        ready.push(dependent);
        ready.sort(byItemName);
      }
    }
  }

  if (ordered.length !== items.length) {
    return { ordered: [...items].sort(byItemName), hasCycle: true };
  }
  return { ordered, hasCycle: false };
}
