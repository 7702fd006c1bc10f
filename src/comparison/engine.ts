/**
 * Reference-vs-test spectrum comparison.
 *
 * Verdict policy: the comparison passes when the KS p-value exceeds the
 * significance level AND the relative sigma difference stays below the
 * tolerance. Empty spectra never pass.
 *
 * The engine holds no state; independent pairs can be compared concurrently.
 */

import { sameBinning, type Histogram } from "../histogram/index.js";
import { DEFAULT_SIGMA_TOLERANCE } from "../config/run/defaults.js";
import { computeMoments, weightedSamples } from "./moments.js";
import { ksWeighted } from "./ks.js";

/** KS p-values at or below this level count as a significant difference. */
export const KS_SIGNIFICANCE = 0.05;

/** Relative sigma difference reported when the reference sigma is zero. */
export const SIGMA_RATIO_SENTINEL = 1e9;

export interface ComparisonResult {
  readonly referenceMean: number;
  readonly referenceSigma: number;
  readonly testMean: number;
  readonly testSigma: number;
  /** |mean_ref - mean_test| */
  readonly meanDifference: number;
  /** |sigma_ref - sigma_test| */
  readonly sigmaDifference: number;
  /** sigmaDifference / sigma_ref, or the sentinel when sigma_ref is 0 */
  readonly relativeSignificance: number;
  /** |max(count_ref) - max(count_test)| */
  readonly maxCountDifference: number;
  readonly ksStatistic: number;
  readonly ksPValue: number;
  readonly pass: boolean;
  readonly reason: string;
  readonly warnings: readonly string[];
}

export interface CompareOptions {
  /** Maximum relative sigma difference (default 3.0) */
  sigmaTolerance?: number;
  /** KS significance level (default 0.05) */
  significance?: number;
}

/** Four significant digits without trailing zeros: 0.05, 0.1235, 1000000000. */
function fmt(value: number): string {
  return String(Number(value.toPrecision(4)));
}

function maxCount(histogram: Histogram): number {
  return histogram.counts.reduce((max, count) => Math.max(max, count), 0);
}

/**
 * Compare a reference and a test histogram.
 *
 * @throws RangeError if the tolerance or significance is not a positive number
 */
export function compareHistograms(
  reference: Histogram,
  test: Histogram,
  options: CompareOptions = {}
): ComparisonResult {
  const sigmaTolerance = options.sigmaTolerance ?? DEFAULT_SIGMA_TOLERANCE;
  const significance = options.significance ?? KS_SIGNIFICANCE;
  if (!(sigmaTolerance > 0) || !Number.isFinite(sigmaTolerance)) {
    throw new RangeError(`sigmaTolerance must be a positive number, got ${sigmaTolerance}`);
  }
  if (!(significance > 0 && significance < 1)) {
    throw new RangeError(`significance must lie in (0, 1), got ${significance}`);
  }

  const warnings: string[] = [];
  const ref = computeMoments(reference);
  const tst = computeMoments(test);

  if (ref.degenerate) {
    warnings.push("DegenerateDataWarning: reference histogram has zero total counts");
  }
  if (tst.degenerate) {
    warnings.push("DegenerateDataWarning: test histogram has zero total counts");
  }
  if (!sameBinning(reference, test)) {
    warnings.push("Reference and test histograms use different binning");
  }

  const sigmaDifference = Math.abs(ref.sigma - tst.sigma);
  const relativeSignificance =
    ref.sigma === 0 ? SIGMA_RATIO_SENTINEL : sigmaDifference / ref.sigma;

  const base = {
    referenceMean: ref.mean,
    referenceSigma: ref.sigma,
    testMean: tst.mean,
    testSigma: tst.sigma,
    meanDifference: Math.abs(ref.mean - tst.mean),
    sigmaDifference,
    relativeSignificance,
    maxCountDifference: Math.abs(maxCount(reference) - maxCount(test)),
  };

  const refSamples = weightedSamples(reference);
  const testSamples = weightedSamples(test);

  if (refSamples.length === 0 || testSamples.length === 0) {
    const empty = [
      refSamples.length === 0 ? "reference" : undefined,
      testSamples.length === 0 ? "test" : undefined,
    ].filter((side): side is string => side !== undefined);
    const reason = `ComparisonInconclusive: ${empty.join(" and ")} spectrum holds no whole counts`;
    return Object.freeze({
      ...base,
      ksStatistic: 0,
      ksPValue: 0,
      pass: false,
      reason,
      warnings: Object.freeze([...warnings, reason]),
    });
  }

  const ks = ksWeighted(refSamples, testSamples);
  const ksPass = ks.pValue > significance;
  const sigmaPass = relativeSignificance < sigmaTolerance;
  const pass = ksPass && sigmaPass;

  const failures: string[] = [];
  if (!ksPass) {
    failures.push(`KS p-value ${fmt(ks.pValue)} <= ${fmt(significance)}`);
  }
  if (!sigmaPass) {
    failures.push(
      `relative sigma difference ${fmt(relativeSignificance)} >= ${fmt(sigmaTolerance)}`
    );
  }

  const reason = pass
    ? `Spectra consistent: KS p-value ${fmt(ks.pValue)} > ${fmt(significance)}, relative sigma difference ${fmt(relativeSignificance)} < ${fmt(sigmaTolerance)}`
    : `Significant difference detected: ${failures.join("; ")}`;

  return Object.freeze({
    ...base,
    ksStatistic: ks.statistic,
    ksPValue: ks.pValue,
    pass,
    reason,
    warnings: Object.freeze(warnings),
  });
}
