/**
 * Statistical comparison of reference and test spectra.
 */

export { computeMoments, weightedSamples, type Moments } from "./moments.js";
export {
  ksTwoSample,
  ksWeighted,
  kolmogorovSurvival,
  type KsResult,
  type WeightedValue,
} from "./ks.js";
export {
  compareHistograms,
  KS_SIGNIFICANCE,
  SIGMA_RATIO_SENTINEL,
  type ComparisonResult,
  type CompareOptions,
} from "./engine.js";
export {
  serializeComparison,
  deserializeComparison,
  saveComparison,
  loadComparison,
  comparisonRecordPath,
  ComparisonRecordError,
  ComparisonRecordSchema,
  COMPARISON_DIR,
  COMPARISON_FILENAME,
} from "./record.js";
export { summarizeComparison, type SummaryOptions } from "./summary.js";
