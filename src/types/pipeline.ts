/**
 * Pipeline state, stage and artifact definitions.
 * One pipeline runs the fixed stage sequence for a single run kind.
 */

export enum PipelineStatus {
  Idle = "idle",
  Simulating = "simulating",
  Reconstructing = "reconstructing",
  SpectrumGeneration = "spectrumGeneration",
  HistogramExtraction = "histogramExtraction",
  Done = "done",
  Failed = "failed",
}

export enum StageName {
  Simulation = "simulation",
  Reconstruction = "reconstruction",
  Spectrum = "spectrum",
  Histogram = "histogram",
}

/** Label of a failure raised while organizing byproducts after the last stage. */
export const ORGANIZE_STEP = "organize";

export type FailureStage = StageName | typeof ORGANIZE_STEP;

export enum ArtifactKind {
  Simulation = "simulation",
  Reconstruction = "reconstruction",
  SpectrumMacro = "spectrumMacro",
  Histogram = "histogram",
}

export interface PipelineArtifact {
  readonly kind: ArtifactKind;
  readonly stage: StageName;
  readonly path: string;
}

export type PipelineState =
  | { readonly status: Exclude<PipelineStatus, PipelineStatus.Failed> }
  | {
      readonly status: PipelineStatus.Failed;
      readonly stage: FailureStage;
      readonly cause: string;
    };

export interface StageTransition {
  readonly from: PipelineStatus;
  readonly to: PipelineStatus;
  /** ISO timestamp */
  readonly at: string;
}
