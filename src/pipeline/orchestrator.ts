/**
 * Pipeline orchestrator.
 *
 * Runs the fixed stage sequence for one run:
 *
 *   idle → simulating → reconstructing → spectrumGeneration
 *        → histogramExtraction → done
 *
 * Any stage can end the run in `failed`, which is final. A stage starts only
 * after the artifact it consumes has been confirmed on disk, and it succeeds
 * only when its tool exits with code 0 AND its own artifact exists. Failed
 * stages are never retried: the tools are deterministic.
 */

import { existsSync, mkdirSync } from "node:fs";
import type { RunConfig } from "../config/run/index.js";
import {
  extractHistogramFromFile,
  ParseError,
  saveHistogram,
  type ExtractOptions,
  type ExtractionStats,
  type Histogram,
} from "../histogram/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  ArtifactKind,
  ORGANIZE_STEP,
  PipelineStatus,
  StageName,
  type FailureStage,
  type PipelineArtifact,
  type PipelineState,
  type StageTransition,
} from "../types/index.js";
import { describeArtifact } from "./artifacts.js";
import { buildStageInvocation, type ToolStage } from "./commands.js";
import { PipelineStateError, StageFailure } from "./errors.js";
import { organizeResults } from "./organize.js";
import {
  formatCommandLine,
  SpawnToolRunner,
  type ToolRunner,
} from "./tool-runner.js";

interface StageDefinition {
  readonly stage: StageName;
  readonly status: Exclude<PipelineStatus, PipelineStatus.Failed>;
  readonly consumes?: ArtifactKind;
  readonly produces: ArtifactKind;
}

const STAGES: readonly StageDefinition[] = [
  {
    stage: StageName.Simulation,
    status: PipelineStatus.Simulating,
    produces: ArtifactKind.Simulation,
  },
  {
    stage: StageName.Reconstruction,
    status: PipelineStatus.Reconstructing,
    consumes: ArtifactKind.Simulation,
    produces: ArtifactKind.Reconstruction,
  },
  {
    stage: StageName.Spectrum,
    status: PipelineStatus.SpectrumGeneration,
    consumes: ArtifactKind.Reconstruction,
    produces: ArtifactKind.SpectrumMacro,
  },
  {
    stage: StageName.Histogram,
    status: PipelineStatus.HistogramExtraction,
    consumes: ArtifactKind.SpectrumMacro,
    produces: ArtifactKind.Histogram,
  },
];

/** Lines of tool output kept for failure reports. */
const OUTPUT_TAIL_LINES = 20;

export interface OrchestratorOptions {
  /** Defaults to spawning real subprocesses */
  runner?: ToolRunner;
  logger?: Logger;
  /** Matcher toggles for the histogram extraction stage */
  extract?: Omit<ExtractOptions, "source">;
  /** Called on every state change */
  onTransition?: (transition: StageTransition) => void;
  /** Called with every line a tool prints */
  onOutput?: (stage: StageName, line: string) => void;
}

export interface PipelineResult {
  readonly config: RunConfig;
  /** Artifacts at their final location, keyed by kind */
  readonly artifacts: ReadonlyMap<ArtifactKind, PipelineArtifact>;
  readonly histogram: Histogram;
  readonly extraction: ExtractionStats;
  readonly history: readonly StageTransition[];
}

function isToolStage(stage: StageName): stage is ToolStage {
  return stage !== StageName.Histogram;
}

export class PipelineOrchestrator {
  private readonly config: RunConfig;
  private readonly runner: ToolRunner;
  private readonly logger: Logger;
  private readonly options: OrchestratorOptions;
  private current: PipelineState = { status: PipelineStatus.Idle };
  private readonly transitions: StageTransition[] = [];
  private readonly artifacts = new Map<ArtifactKind, PipelineArtifact>();
  private extraction: { histogram: Histogram; stats: ExtractionStats } | undefined;

  constructor(config: RunConfig, options: OrchestratorOptions = {}) {
    this.config = config;
    this.options = options;
    this.runner = options.runner ?? new SpawnToolRunner();
    this.logger = (options.logger ?? createSilentLogger()).child(`pipeline:${config.kind}`);
  }

  get state(): PipelineState {
    return this.current;
  }

  get history(): readonly StageTransition[] {
    return [...this.transitions];
  }

  /**
   * Execute every stage in order.
   *
   * @throws StageFailure when a stage breaks its contract (state → failed)
   * @throws ParseError when the spectrum macro has no usable axis (state → failed)
   * @throws PipelineStateError when called a second time
   */
  async run(): Promise<PipelineResult> {
    if (this.current.status !== PipelineStatus.Idle) {
      throw new PipelineStateError(
        `Pipeline for ${this.config.kind} run already ${this.current.status}; create a new orchestrator`
      );
    }

    mkdirSync(this.config.resultsDir, { recursive: true });
    this.logger.info("Starting pipeline", {
      runDir: this.config.runDir,
      input: this.config.simulationInput,
    });

    for (const definition of STAGES) {
      this.transition({ status: definition.status });
      try {
        await this.runStage(definition);
      } catch (err) {
        throw this.fail(definition.stage, err);
      }
    }

    try {
      this.relocateByproducts();
    } catch (err) {
      throw this.fail(ORGANIZE_STEP, err);
    }

    const extraction = this.extraction;
    if (extraction === undefined) {
      throw this.fail(StageName.Histogram, new Error("Histogram stage produced no histogram"));
    }

    this.transition({ status: PipelineStatus.Done });
    this.logger.info("Pipeline complete", {
      histogram: this.artifacts.get(ArtifactKind.Histogram)?.path,
    });

    return {
      config: this.config,
      artifacts: new Map(this.artifacts),
      histogram: extraction.histogram,
      extraction: extraction.stats,
      history: this.history,
    };
  }

  private async runStage(definition: StageDefinition): Promise<void> {
    if (definition.consumes !== undefined) {
      this.requireArtifact(definition.stage, definition.consumes, "input");
    }

    if (isToolStage(definition.stage)) {
      await this.invokeTool(definition.stage);
    } else {
      this.extractHistogram();
    }

    const produced = this.requireArtifact(definition.stage, definition.produces, "output");
    this.artifacts.set(produced.kind, produced);
    this.logger.info(`Stage ${definition.stage} complete`, { artifact: produced.path });
  }

  private requireArtifact(
    stage: StageName,
    kind: ArtifactKind,
    role: "input" | "output"
  ): PipelineArtifact {
    const artifact = this.artifacts.get(kind) ?? describeArtifact(this.config, kind);
    if (!existsSync(artifact.path)) {
      throw new StageFailure({
        kind: this.config.kind,
        stage,
        reason:
          role === "output"
            ? `stage finished but its ${kind} artifact is missing`
            : `required ${kind} artifact is missing`,
        artifactPath: artifact.path,
      });
    }
    return artifact;
  }

  private async invokeTool(stage: ToolStage): Promise<void> {
    const invocation = buildStageInvocation(this.config, stage);
    const tail: string[] = [];
    const output = this.logger.child(stage);

    this.logger.info(`>>> ${formatCommandLine(invocation)}`, { cwd: invocation.cwd });

    const result = await this.runner.run(invocation, (line) => {
      tail.push(line);
      if (tail.length > OUTPUT_TAIL_LINES) tail.shift();
      output.debug(line);
      this.options.onOutput?.(stage, line);
    });

    const failure = (reason: string): StageFailure =>
      new StageFailure({
        kind: this.config.kind,
        stage,
        reason,
        exitCode: result.exitCode,
        outputTail: tail,
      });

    if (result.spawnError !== undefined) {
      throw failure(`could not start '${invocation.command}': ${result.spawnError}`);
    }
    if (result.timedOut) {
      throw failure(`timed out after ${invocation.timeoutMs ?? 0} ms`);
    }
    if (result.exitCode !== 0) {
      throw failure(
        result.exitCode === null
          ? `terminated by signal ${result.signal ?? "unknown"}`
          : `exited with code ${result.exitCode}`
      );
    }
  }

  private extractHistogram(): void {
    const macro = this.requireArtifact(StageName.Histogram, ArtifactKind.SpectrumMacro, "input");
    const { histogram, stats } = extractHistogramFromFile(macro.path, this.options.extract);

    if (stats.skippedLines > 0) {
      this.logger.warn("Skipped malformed bin assignments", { skipped: stats.skippedLines });
    }

    const target = describeArtifact(this.config, ArtifactKind.Histogram);
    saveHistogram(histogram, target.path);
    this.extraction = { histogram, stats };
    this.logger.info("Histogram extracted", {
      bins: histogram.counts.length,
      assigned: stats.assignedLines,
      axis: stats.edgeMatcher,
    });
  }

  private relocateByproducts(): void {
    const moved = organizeResults(this.config);
    for (const { from, to } of moved) {
      for (const artifact of this.artifacts.values()) {
        if (artifact.path === from) {
          this.artifacts.set(artifact.kind, { ...artifact, path: to });
        }
      }
    }
    if (moved.length > 0) {
      this.logger.info("Organized run byproducts", {
        moved: moved.length,
        into: this.config.resultsDir,
      });
    }
  }

  private transition(next: PipelineState): void {
    const entry: StageTransition = {
      from: this.current.status,
      to: next.status,
      at: new Date().toISOString(),
    };
    this.current = next;
    this.transitions.push(entry);
    this.logger.debug(`State ${entry.from} -> ${entry.to}`);
    this.options.onTransition?.(entry);
  }

  /**
   * Move to `failed` and return the error to throw. Stage failures and parse
   * errors keep their type; anything else is wrapped in a StageFailure.
   */
  private fail(stage: FailureStage, err: unknown): StageFailure | ParseError {
    const failure =
      err instanceof StageFailure || err instanceof ParseError
        ? err
        : new StageFailure({
            kind: this.config.kind,
            stage,
            reason: err instanceof Error ? err.message : String(err),
            cause: err,
          });

    const cause = failure instanceof StageFailure ? failure.reason : failure.message;
    this.transition({ status: PipelineStatus.Failed, stage, cause });
    this.logger.error(failure.message);
    return failure;
  }
}
