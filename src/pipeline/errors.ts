/**
 * Pipeline errors.
 */

import type { RunKind } from "../config/run/index.js";
import type { FailureStage } from "../types/index.js";

export interface StageFailureDetails {
  kind: RunKind;
  stage: FailureStage;
  /** Short description of what went wrong */
  reason: string;
  /** Artifact the stage was expected to produce or consume */
  artifactPath?: string;
  exitCode?: number | null;
  /** Last lines of tool output, oldest first */
  outputTail?: readonly string[];
  cause?: unknown;
}

/**
 * A stage did not meet its contract: the tool failed, timed out, could not
 * start, or exited cleanly without producing its artifact. Fatal to the run
 * and never retried.
 */
export class StageFailure extends Error {
  public readonly kind: RunKind;
  public readonly stage: FailureStage;
  public readonly reason: string;
  public readonly artifactPath?: string;
  public readonly exitCode?: number | null;
  public readonly outputTail: readonly string[];

  constructor(details: StageFailureDetails) {
    const where = details.artifactPath ? ` [${details.artifactPath}]` : "";
    super(`${details.kind} run failed at stage '${details.stage}': ${details.reason}${where}`, {
      cause: details.cause,
    });
    this.name = "StageFailure";
    this.kind = details.kind;
    this.stage = details.stage;
    this.reason = details.reason;
    this.artifactPath = details.artifactPath;
    this.exitCode = details.exitCode;
    this.outputTail = details.outputTail ?? [];
  }

  /**
   * Format the failure with the tool output tail for display.
   */
  format(): string {
    const lines = [this.message];
    if (this.outputTail.length > 0) {
      lines.push("  Last tool output:");
      for (const line of this.outputTail) {
        lines.push(`    | ${line}`);
      }
    }
    return lines.join("\n");
  }
}

/**
 * `run()` was called on an orchestrator that already ran.
 */
export class PipelineStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineStateError";
  }
}
