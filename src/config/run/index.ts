/**
 * Suite and run configuration module.
 *
 * Usage:
 *   import { loadSuiteConfigFile, createRunConfig } from "./config/run/index.js";
 *
 *   const suite = loadSuiteConfigFile("suites/crab/steering.json");
 *   const reference = createRunConfig(suite, "reference", "suites/crab");
 */

export { RunKind, RUN_KINDS, INPUT_EXTENSIONS, type InputField } from "./enums.js";

export type { SuiteConfig, SuiteConfigInput, EnergyCut, Toolchain } from "./schema.js";
export { SuiteConfigSchema, EnergyCutSchema, ToolchainSchema } from "./schema.js";

export {
  loadSuiteConfig,
  loadSuiteConfigFile,
  RunConfigError,
  type ConfigValidationIssue,
  type LoadSuiteOptions,
} from "./loader.js";

export { createRunConfig, runDirName, type RunConfig } from "./run-config.js";

export {
  DEFAULT_ENERGY_CUT,
  DEFAULT_MAX_EVENTS,
  DEFAULT_SIGMA_TOLERANCE,
  DEFAULT_TOOLCHAIN,
} from "./defaults.js";
