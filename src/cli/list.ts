import { resolve, relative } from "path";
import { loadConfig } from "../config/loader.js";
import { loadSpecifications } from "../runner/loader.js";
import { filterSpecifications } from "../runner/spec-runner.js";
import { classify, normalize } from "../spec/classifier.js";
import type { Classification, DiscoveredMethod } from "../spec/types.js";
import { log } from "../utils/logger.js";

/**
 * Print what the engine would run for each specification, without
 * running any of it.
 */
export async function listCommand(options: { filter?: string }): Promise<void> {
  const cwd = process.cwd();

  try {
    const config = await loadConfig(cwd);
    const specsDir = resolve(cwd, config.specsDir);
    let entries = await loadSpecifications(specsDir, config.suffixes);

    const filter = options.filter ?? config.filter;
    if (filter) {
      entries = filterSpecifications(entries, filter, specsDir);
    }

    if (entries.length === 0) {
      log.warn(`No specifications found in ${config.specsDir}/`);
      return;
    }

    for (const entry of entries) {
      const classification = classify(entry.type);
      log.heading(describeHeader(classification));
      log.dim(`  ${relative(cwd, entry.filePath)}`);
      for (const line of describeRoles(classification)) {
        console.log(line);
      }
    }
  } catch (error) {
    log.fail(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

export function describeHeader(classification: Classification): string {
  const name = normalize(classification.type.name, classification.separator);
  return classification.skipped ? `${name} (skipped)` : name;
}

export function describeRoles(classification: Classification): string[] {
  const lines: string[] = [];
  const section = (label: string, methods: readonly DiscoveredMethod[]) => {
    if (methods.length === 0) return;
    lines.push(`  ${label}:`);
    for (const method of methods) {
      const tag = classification.tags.get(method.name);
      const marks = [
        method.declaringType.skip === true ? "skipped" : undefined,
        tag !== undefined ? `tag${tag ? `: ${tag}` : ""}` : undefined,
      ].filter((m): m is string => m !== undefined);
      lines.push(`    ${method.name}${marks.length ? ` [${marks.join(", ")}]` : ""}`);
    }
  };

  section("arrange", classification.arrange);
  section("act", classification.act);
  section("examples", classification.examples);
  section("teardown", classification.teardown);
  return lines;
}
