/**
 * Human-readable summary of a comparison, for logs and the console reporter.
 */

import type { ComparisonResult } from "./engine.js";

export interface SummaryOptions {
  /** Include the warning list (default: true) */
  includeWarnings?: boolean;
}

function num(value: number): string {
  return String(Number(value.toPrecision(6)));
}

export function summarizeComparison(
  result: ComparisonResult,
  options: SummaryOptions = {}
): string {
  const lines: string[] = [
    "=== Spectrum Comparison ===",
    `Verdict: ${result.pass ? "PASS" : "FAIL"}`,
    `Reason: ${result.reason}`,
    "",
    "--- Moments ---",
    `Reference: mean ${num(result.referenceMean)}, sigma ${num(result.referenceSigma)}`,
    `Test:      mean ${num(result.testMean)}, sigma ${num(result.testSigma)}`,
    `Mean difference: ${num(result.meanDifference)}`,
    `Sigma difference: ${num(result.sigmaDifference)} (relative ${num(result.relativeSignificance)})`,
    `Max count difference: ${num(result.maxCountDifference)}`,
    "",
    "--- Kolmogorov-Smirnov ---",
    `Statistic: ${num(result.ksStatistic)}`,
    `p-value: ${num(result.ksPValue)}`,
  ];

  if ((options.includeWarnings ?? true) && result.warnings.length > 0) {
    lines.push("");
    lines.push("--- Warnings ---");
    for (const warning of result.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  return lines.join("\n");
}
