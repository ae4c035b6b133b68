import { mkdirSync, writeFileSync } from "fs";
import { join, resolve } from "path";
import { loadConfig } from "../config/loader.js";
import {
  runAllSpecifications,
  printSummary,
  formatFailureReport,
} from "../runner/spec-runner.js";
import { log } from "../utils/logger.js";

export async function runCommand(options: {
  filter?: string;
  report?: boolean;
}): Promise<void> {
  const cwd = process.cwd();

  try {
    const config = await loadConfig(cwd);
    const summary = await runAllSpecifications(config, { filter: options.filter }, cwd);

    printSummary(summary);

    if (options.report) {
      const reportDir = resolve(cwd, config.reportDir);
      mkdirSync(reportDir, { recursive: true });
      const reportPath = join(reportDir, "report.md");
      writeFileSync(reportPath, formatFailureReport(summary), "utf-8");
      log.dim(`Report written to ${reportPath}`);
    }

    if (summary.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    log.fail(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
