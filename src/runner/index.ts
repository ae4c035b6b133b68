export {
  findSpecFiles,
  collectSpecifications,
  withoutBases,
  loadSpecifications,
  isSpecificationClass,
  type SpecificationEntry,
} from "./loader.js";
export {
  runAllSpecifications,
  runSpecifications,
  filterSpecifications,
  printSummary,
  formatFailureReport,
  type RunnerOptions,
  type RunSummary,
  type SpecificationResult,
} from "./spec-runner.js";
