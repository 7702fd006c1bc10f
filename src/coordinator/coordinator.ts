/**
 * Run coordinator.
 *
 * Drives one pipeline per run kind over the same suite, then compares the
 * two spectra. The runs share nothing but the read-only suite inputs and
 * write to disjoint directories, so they may run concurrently. If either
 * run fails, no comparison record is written.
 */

import {
  createRunConfig,
  RUN_KINDS,
  type RunConfig,
  type RunKind,
  type SuiteConfig,
} from "../config/run/index.js";
import {
  compareHistograms,
  comparisonRecordPath,
  saveComparison,
  type ComparisonResult,
} from "../comparison/index.js";
import { loadHistogram, type ExtractOptions, type Histogram } from "../histogram/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import {
  PipelineOrchestrator,
  type PipelineResult,
  type ToolRunner,
} from "../pipeline/index.js";
import { ArtifactKind, type StageTransition } from "../types/index.js";
import type { Reporter } from "./reporter.js";

export interface CoordinatorOptions {
  /** Suite work directory; holds run_reference/, run_test/ and comparison/ */
  workDir: string;
  /** Tool runner shared by both runs (default: real subprocesses) */
  runner?: ToolRunner;
  logger?: Logger;
  reporter?: Reporter;
  /** Run both pipelines at the same time (default: one after the other) */
  parallel?: boolean;
  /** Overrides the suite's sigma tolerance */
  sigmaTolerance?: number;
  extract?: Omit<ExtractOptions, "source">;
  onTransition?: (kind: RunKind, transition: StageTransition) => void;
}

export interface ValidationOutcome {
  readonly result: ComparisonResult;
  /** Where the comparison record was written */
  readonly recordPath: string;
  readonly runs: Readonly<Record<RunKind, PipelineResult>>;
}

export class RunCoordinator {
  private readonly suite: Readonly<SuiteConfig>;
  private readonly options: CoordinatorOptions;
  private readonly logger: Logger;

  constructor(suite: Readonly<SuiteConfig>, options: CoordinatorOptions) {
    this.suite = suite;
    this.options = options;
    this.logger = options.logger ?? createSilentLogger();
  }

  runConfig(kind: RunKind): Readonly<RunConfig> {
    return createRunConfig(this.suite, kind, this.options.workDir);
  }

  /**
   * Run both pipelines, compare, persist and report.
   *
   * @throws StageFailure or ParseError from the first failing run
   */
  async run(): Promise<ValidationOutcome> {
    const [reference, test] = this.options.parallel
      ? await this.runConcurrently()
      : [await this.runPipeline("reference"), await this.runPipeline("test")];

    const sigmaTolerance = this.options.sigmaTolerance ?? this.suite.sigmaTolerance;
    const result = compareHistograms(
      this.loadRunHistogram(reference),
      this.loadRunHistogram(test),
      { sigmaTolerance }
    );

    for (const warning of result.warnings) {
      this.logger.warn(warning);
    }

    const recordPath = saveComparison(result, comparisonRecordPath(this.options.workDir));
    this.logger.info(`Comparison ${result.pass ? "PASSED" : "FAILED"}`, {
      record: recordPath,
      ksPValue: result.ksPValue,
      relativeSignificance: result.relativeSignificance,
    });

    if (this.options.reporter) {
      await this.options.reporter.report(result, {});
    }

    return { result, recordPath, runs: { reference, test } };
  }

  private runPipeline(kind: RunKind): Promise<PipelineResult> {
    const orchestrator = new PipelineOrchestrator(this.runConfig(kind), {
      runner: this.options.runner,
      logger: this.logger,
      extract: this.options.extract,
      onTransition: (transition) => this.options.onTransition?.(kind, transition),
    });
    return orchestrator.run();
  }

  private async runConcurrently(): Promise<[PipelineResult, PipelineResult]> {
    const settled = await Promise.allSettled(RUN_KINDS.map((kind) => this.runPipeline(kind)));
    const results: PipelineResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
    const [reference, test] = results;
    if (reference === undefined || test === undefined) {
      throw new Error("Expected one pipeline result per run kind");
    }
    return [reference, test];
  }

  /** Re-read the persisted record so the comparison uses exactly what was saved. */
  private loadRunHistogram(run: PipelineResult): Histogram {
    const artifact = run.artifacts.get(ArtifactKind.Histogram);
    return artifact ? loadHistogram(artifact.path) : run.histogram;
  }
}
