import type { BehavesConfig } from "./config/schema.js";

export type { BehavesConfig, ResolvedConfig } from "./config/schema.js";
export * from "./spec/index.js";
export { NodeAssertSpecification } from "./adapters/node-assert.js";
export {
  runSpecifications,
  loadSpecifications,
  type RunSummary,
  type SpecificationResult,
  type SpecificationEntry,
} from "./runner/index.js";

/**
 * Helper for defining a behaves config with type checking.
 */
export function defineConfig(config: BehavesConfig): BehavesConfig {
  return config;
}
