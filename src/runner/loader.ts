import { readdirSync, statSync } from "fs";
import { join } from "path";
import { pathToFileURL } from "url";
import { isFrameworkBase } from "../spec/classifier.js";
import { Specification } from "../spec/specification.js";
import type { SpecificationClass } from "../spec/types.js";

export interface SpecificationEntry {
  name: string;
  type: SpecificationClass;
  filePath: string;
}

/**
 * Recursively find spec modules under `dir` whose names end in one of `suffixes`.
 */
export function findSpecFiles(dir: string, suffixes: readonly string[]): string[] {
  const results: string[] = [];

  let entries: string[];
  try {
    entries = readdirSync(dir);
  } catch {
    return results;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry);
    const stat = statSync(fullPath);

    if (stat.isDirectory()) {
      results.push(...findSpecFiles(fullPath, suffixes));
    } else if (suffixes.some((suffix) => entry.endsWith(suffix))) {
      results.push(fullPath);
    }
  }

  return results.sort();
}

export function isSpecificationClass(value: unknown): value is SpecificationClass {
  return (
    typeof value === "function" &&
    value.prototype instanceof Specification &&
    !isFrameworkBase(value)
  );
}

/**
 * Pick the specification classes out of a module's exports.
 */
export function collectSpecifications(
  moduleExports: unknown,
  filePath: string
): SpecificationEntry[] {
  if (typeof moduleExports !== "object" || moduleExports === null) return [];

  const classes = new Set(Object.values(moduleExports).filter(isSpecificationClass));
  return [...classes].map((type) => ({ name: type.name, type, filePath }));
}

/**
 * Drop classes that another collected class extends: they are shared
 * bases and only run through their subclasses.
 */
export function withoutBases(entries: readonly SpecificationEntry[]): SpecificationEntry[] {
  const bases = new Set<unknown>(entries.map((e) => Object.getPrototypeOf(e.type)));
  return entries.filter((e) => !bases.has(e.type));
}

export async function loadSpecifications(
  dir: string,
  suffixes: readonly string[]
): Promise<SpecificationEntry[]> {
  const entries: SpecificationEntry[] = [];

  for (const file of findSpecFiles(dir, suffixes)) {
    const mod: unknown = await import(pathToFileURL(file).href);
    entries.push(...collectSpecifications(mod, file));
  }

  return withoutBases(entries);
}
