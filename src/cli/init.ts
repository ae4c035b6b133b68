import { existsSync, mkdirSync, writeFileSync } from "fs";
import { resolve, join } from "path";
import { log } from "../utils/logger.js";

const CONFIG_TEMPLATE = `import { defineConfig } from "behaves";

export default defineConfig({
  // Where specification modules live
  specsDir: "specs",

  // File name endings that mark a specification module
  suffixes: [".spec.js", ".spec.mjs"],

  // Optional: only run specifications whose name or path matches
  // filter: "calculator",
});
`;

const EXAMPLE_SPEC = `import assert from "node:assert/strict";
import { Specification } from "behaves";

export class calculator_specs extends Specification {
  value = 0;

  when_adding_two_positive_numbers() {
    this.establish = () => {
      this.value = 0;
    };

    this.because = () => {
      this.value = 1 + 2;
    };

    this.it("returns their sum", () => {
      assert.equal(this.value, 3);
    });
  }

  it_starts_from_zero() {
    this.verify = () => {
      assert.equal(new calculator_specs().value, 0);
    };
  }
}
`;

export async function initCommand(): Promise<void> {
  const cwd = process.cwd();

  log.heading("Initializing behaves...");

  const configPath = resolve(cwd, "behaves.config.mjs");
  if (existsSync(configPath)) {
    log.warn("behaves.config.mjs already exists, skipping");
  } else {
    writeFileSync(configPath, CONFIG_TEMPLATE);
    log.success("Created behaves.config.mjs");
  }

  const specsDir = resolve(cwd, "specs");
  mkdirSync(specsDir, { recursive: true });
  log.success("Created specs/");

  const examplePath = join(specsDir, "calculator.spec.mjs");
  if (!existsSync(examplePath)) {
    writeFileSync(examplePath, EXAMPLE_SPEC);
    log.success("Created example specification: specs/calculator.spec.mjs");
  }

  log.heading("Done! Next steps:");
  log.info("1. Write specification classes in specs/*.spec.mjs");
  log.info("2. Run `behaves list` to see how their methods are classified");
  log.info("3. Run `behaves run` to execute them");
}
