/**
 * Artifact naming.
 *
 * Every stage file is named `<base><suffix>`, where base is the simulation
 * input's file name without its `.source` extension. Producers and
 * consumers both go through `artifactPath`, so the names cannot drift
 * apart between stages.
 */

import { basename, join } from "node:path";
import { INPUT_EXTENSIONS, type RunConfig } from "../config/run/index.js";
import { ArtifactKind, StageName, type PipelineArtifact } from "../types/index.js";

export const ARTIFACT_SUFFIXES: Readonly<Record<ArtifactKind, string>> = {
  [ArtifactKind.Simulation]: ".inc1.id1.sim.gz",
  [ArtifactKind.Reconstruction]: ".inc1.id1.tra.gz",
  [ArtifactKind.SpectrumMacro]: ".spectrum.C",
  [ArtifactKind.Histogram]: ".spectrum.json",
};

export const ARTIFACT_PRODUCERS: Readonly<Record<ArtifactKind, StageName>> = {
  [ArtifactKind.Simulation]: StageName.Simulation,
  [ArtifactKind.Reconstruction]: StageName.Reconstruction,
  [ArtifactKind.SpectrumMacro]: StageName.Spectrum,
  [ArtifactKind.Histogram]: StageName.Histogram,
};

/** Tool byproducts swept into the results directory after a run. */
export const BYPRODUCT_EXTENSIONS: readonly string[] = [
  ".sim.gz",
  ".tra.gz",
  ".root",
  ".C",
  ".txt",
  ".dat",
];

/**
 * Base name shared by all artifacts of a run.
 */
export function artifactBaseName(simulationInput: string): string {
  return basename(simulationInput, INPUT_EXTENSIONS.simulationInput);
}

/**
 * Deterministic location of an artifact. Tool outputs land in the run
 * directory; the spectrum macro and histogram record go to results.
 */
export function artifactPath(config: RunConfig, kind: ArtifactKind): string {
  const directory =
    kind === ArtifactKind.SpectrumMacro || kind === ArtifactKind.Histogram
      ? config.resultsDir
      : config.runDir;
  return join(directory, artifactBaseName(config.simulationInput) + ARTIFACT_SUFFIXES[kind]);
}

export function describeArtifact(config: RunConfig, kind: ArtifactKind): PipelineArtifact {
  return { kind, stage: ARTIFACT_PRODUCERS[kind], path: artifactPath(config, kind) };
}

/**
 * Whether a file in the run directory is a byproduct of this run.
 * Inputs and unrelated files never match.
 */
export function isRunByproduct(fileName: string, baseName: string): boolean {
  return (
    fileName.startsWith(baseName) &&
    BYPRODUCT_EXTENSIONS.some((extension) => fileName.endsWith(extension))
  );
}
