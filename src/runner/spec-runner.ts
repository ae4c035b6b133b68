import { resolve, relative } from "path";
import { loadSpecifications, type SpecificationEntry } from "./loader.js";
import { cleanException, consoleSink } from "../spec/verbalizer.js";
import { describeThrown } from "../spec/errors.js";
import { log, spinner } from "../utils/logger.js";
import type { ConditionStatus, SpecificationReport, TranscriptSink } from "../spec/types.js";
import type { ResolvedConfig } from "../config/schema.js";

export interface RunnerOptions {
  filter?: string;
  /** Suppress per-specification status lines. */
  quiet?: boolean;
  sink?: TranscriptSink;
}

export interface SpecificationResult {
  entry: SpecificationEntry;
  passed: boolean;
  report?: SpecificationReport;
  /** Set when the specification could not run: structural or action errors. */
  error?: string;
  duration: number;
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  conditions: Record<ConditionStatus, number>;
  results: SpecificationResult[];
  duration: number;
}

/**
 * Discover every specification under the configured directory and run it.
 */
export async function runAllSpecifications(
  config: ResolvedConfig,
  options: RunnerOptions = {},
  cwd: string = process.cwd()
): Promise<RunSummary> {
  const specsDir = resolve(cwd, config.specsDir);

  const s = spinner(`Loading specifications from ${config.specsDir}/...`);
  let entries: SpecificationEntry[];
  try {
    entries = await loadSpecifications(specsDir, config.suffixes);
    s.succeed(`Found ${entries.length} specifications`);
  } catch (error) {
    s.fail("Could not load specifications");
    throw error;
  }

  if (entries.length === 0) {
    throw new Error(
      `No specifications found in ${config.specsDir}/ (looked for ${config.suffixes.join(", ")}).`
    );
  }

  const filter = options.filter ?? config.filter;
  if (filter) {
    entries = filterSpecifications(entries, filter, specsDir);
    if (entries.length === 0) {
      throw new Error(`No specifications match filter "${filter}"`);
    }
  }

  return runSpecifications(entries, options);
}

export function filterSpecifications(
  entries: readonly SpecificationEntry[],
  filter: string,
  specsDir: string
): SpecificationEntry[] {
  const pattern = new RegExp(filter, "i");
  return entries.filter(
    (e) => pattern.test(e.name) || pattern.test(relative(specsDir, e.filePath))
  );
}

/**
 * Run each specification once, in order. A specification that throws is
 * recorded as failed and the run goes on.
 */
export async function runSpecifications(
  entries: readonly SpecificationEntry[],
  options: RunnerOptions = {}
): Promise<RunSummary> {
  const start = Date.now();
  const sink = options.sink ?? consoleSink;
  const results: SpecificationResult[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const prefix = `[${i + 1}/${entries.length}]`;
    const began = Date.now();

    try {
      const spec = new entry.type();
      // failures are read from the report, not signalled through the hook
      const report = await spec.run({ sink, onFailure: () => {} });
      const passed = report.failures.length === 0;

      results.push({ entry, passed, report, duration: Date.now() - began });
      if (!options.quiet) log.specification(`${prefix} ${report.name}`, passed);
    } catch (error) {
      const errorMsg = describeThrown(error);
      results.push({ entry, passed: false, error: errorMsg, duration: Date.now() - began });

      if (!options.quiet) {
        log.specification(`${prefix} ${entry.name}`, false);
        log.dim(`      ${errorMsg.slice(0, 160)}`);
      }
    }
  }

  const conditions: Record<ConditionStatus, number> = {
    passed: 0,
    failed: 0,
    pending: 0,
    skipped: 0,
  };
  for (const result of results) {
    for (const condition of result.report?.results ?? []) {
      conditions[condition.status]++;
    }
  }

  return {
    total: results.length,
    passed: results.filter((r) => r.passed).length,
    failed: results.filter((r) => !r.passed).length,
    conditions,
    results,
    duration: Date.now() - start,
  };
}

/**
 * Format a run summary for terminal display.
 */
export function printSummary(summary: RunSummary): void {
  const { total, failed, conditions, duration } = summary;

  log.heading("Results");

  if (failed === 0) {
    log.success(`All ${total} specifications passing`);
  } else {
    log.fail(`${failed}/${total} specifications failed`);

    log.heading("Failures:");
    for (const result of summary.results.filter((r) => !r.passed)) {
      console.log("");
      log.fail(result.report?.name ?? result.entry.name);
      if (result.error) {
        log.dim(`  ${result.error.slice(0, 200)}`);
      }
      for (const failure of result.report?.failures ?? []) {
        const detail = cleanException(failure.error)[0];
        log.dim(`  ${failure.condition}${detail ? `: ${detail.slice(0, 200)}` : ""}`);
      }
    }
  }

  log.dim(
    `\nConditions: ${conditions.passed} passed, ${conditions.failed} failed, ` +
      `${conditions.pending} pending, ${conditions.skipped} skipped`
  );
  log.dim(`Duration: ${(duration / 1000).toFixed(1)}s`);
}

/**
 * Format failures into a markdown report.
 */
export function formatFailureReport(summary: RunSummary): string {
  const lines: string[] = [];
  lines.push(
    `## Specification Results: ${summary.passed}/${summary.total} passing\n`
  );

  const failures = summary.results.filter((r) => !r.passed);
  if (failures.length === 0) return lines.join("\n");

  lines.push(`### ${failures.length} Failing Specifications\n`);

  for (const result of failures) {
    lines.push(`#### ${result.entry.filePath}`);
    lines.push(`**Specification:** ${result.report?.name ?? result.entry.name}`);

    if (result.error) {
      lines.push(`**Error:** ${result.error}`);
    }

    for (const failure of result.report?.failures ?? []) {
      lines.push(`**Failed:** ${failure.example} → ${failure.condition}`);
      const detail = cleanException(failure.error);
      if (detail.length > 0) {
        lines.push("```");
        lines.push(...detail);
        lines.push("```");
      }
    }

    lines.push("");
  }

  return lines.join("\n");
}
