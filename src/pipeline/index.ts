/**
 * Per-run pipeline: stage sequencing, tool invocation and artifact naming.
 */

export {
  PipelineOrchestrator,
  type OrchestratorOptions,
  type PipelineResult,
} from "./orchestrator.js";
export { StageFailure, PipelineStateError, type StageFailureDetails } from "./errors.js";
export {
  SpawnToolRunner,
  formatCommandLine,
  type ToolRunner,
  type ToolInvocation,
  type ToolResult,
  type OutputListener,
} from "./tool-runner.js";
export { buildStageInvocation, formatNumberArg, type ToolStage } from "./commands.js";
export {
  artifactPath,
  artifactBaseName,
  describeArtifact,
  isRunByproduct,
  ARTIFACT_SUFFIXES,
  ARTIFACT_PRODUCERS,
  BYPRODUCT_EXTENSIONS,
} from "./artifacts.js";
export { organizeResults, type MovedFile } from "./organize.js";
