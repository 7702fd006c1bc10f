/**
 * Public API: run a simulation toolchain twice and compare the spectra.
 *
 * Command-line entry points live in src/cli/.
 */

export * from "./types/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./histogram/index.js";
export * from "./comparison/index.js";
export * from "./pipeline/index.js";
export * from "./coordinator/index.js";
