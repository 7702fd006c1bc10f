/**
 * Per-run configuration.
 *
 * A RunConfig is what one pipeline orchestrator owns: the suite inputs,
 * the toolchain of its run kind, and the directories it writes into.
 */

import { join, resolve } from "node:path";
import type { RunKind } from "./enums.js";
import type { EnergyCut, SuiteConfig, Toolchain } from "./schema.js";

export interface RunConfig {
  readonly kind: RunKind;
  readonly simulationInput: string;
  readonly geometry: string;
  readonly reconstructionConfig: string;
  readonly analysisConfig: string;
  readonly energyCut: Readonly<EnergyCut>;
  readonly maxEvents: number;
  readonly toolchain: Readonly<Toolchain>;
  /** Working directory of every tool of this run */
  readonly runDir: string;
  /** Where results and organized byproducts end up */
  readonly resultsDir: string;
  /** Bounded wait per subprocess; undefined waits indefinitely */
  readonly stageTimeoutMs?: number;
}

/** Directory name of a run inside the suite work directory. */
export function runDirName(kind: RunKind): string {
  return `run_${kind}`;
}

/**
 * Derive the frozen RunConfig for one run kind.
 *
 * @param suite - Loaded suite configuration
 * @param kind - Which toolchain to use
 * @param workDir - Suite work directory; runs go to `<workDir>/run_<kind>`
 */
export function createRunConfig(
  suite: Readonly<SuiteConfig>,
  kind: RunKind,
  workDir: string
): Readonly<RunConfig> {
  const runDir = join(resolve(workDir), runDirName(kind));
  const toolchain = suite.toolchains[kind];

  return Object.freeze({
    kind,
    simulationInput: suite.simulationInput,
    geometry: suite.geometry,
    reconstructionConfig: suite.reconstructionConfig,
    analysisConfig: suite.analysisConfig,
    energyCut: Object.freeze({ ...suite.energyCut }),
    maxEvents: suite.maxEvents,
    toolchain: Object.freeze({ ...toolchain, env: Object.freeze({ ...toolchain.env }) }),
    runDir,
    resultsDir: join(runDir, "results"),
    stageTimeoutMs: suite.stageTimeoutMs,
  });
}
