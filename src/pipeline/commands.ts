/**
 * Argument lists for the three external stages.
 *
 * Arguments are built only from the RunConfig and artifact paths, so a
 * given configuration always produces the same command lines.
 */

import type { RunConfig } from "../config/run/index.js";
import { ArtifactKind, StageName } from "../types/index.js";
import { artifactPath } from "./artifacts.js";
import type { ToolInvocation } from "./tool-runner.js";

export type ToolStage = Exclude<StageName, StageName.Histogram>;

/**
 * Integers print without a fractional part ("2000"); other values use their
 * shortest round-trip form ("10.5"). Both switch to exponent form below 1e-6
 * or from 1e21.
 */
export function formatNumberArg(value: number): string {
  return Number.isInteger(value) ? value.toFixed(0) : String(value);
}

function buildArgs(config: RunConfig, stage: ToolStage): string[] {
  switch (stage) {
    case StageName.Simulation:
      return [config.simulationInput];
    case StageName.Reconstruction:
      return [
        "-c", config.reconstructionConfig,
        "-g", config.geometry,
        "-f", artifactPath(config, ArtifactKind.Simulation),
        "-a",
        "-n",
      ];
    case StageName.Spectrum:
      return [
        "-c", config.analysisConfig,
        "-g", config.geometry,
        "-f", artifactPath(config, ArtifactKind.Reconstruction),
        "-s",
        "-o", artifactPath(config, ArtifactKind.SpectrumMacro),
        "-C", `EventSelections.FirstTotalEnergy.Min=${formatNumberArg(config.energyCut.lower)}`,
        "-C", `EventSelections.FirstTotalEnergy.Max=${formatNumberArg(config.energyCut.upper)}`,
        "-C", `EventSelections.MaxNumberOfEvents=${formatNumberArg(config.maxEvents)}`,
      ];
  }
}

function commandFor(config: RunConfig, stage: ToolStage): string {
  switch (stage) {
    case StageName.Simulation:
      return config.toolchain.simulator;
    case StageName.Reconstruction:
      return config.toolchain.reconstructor;
    case StageName.Spectrum:
      return config.toolchain.analyzer;
  }
}

/**
 * Build the invocation of one external stage.
 */
export function buildStageInvocation(config: RunConfig, stage: ToolStage): ToolInvocation {
  return {
    stage,
    command: commandFor(config, stage),
    args: buildArgs(config, stage),
    cwd: config.runDir,
    env: config.toolchain.env,
    timeoutMs: config.stageTimeoutMs,
  };
}
