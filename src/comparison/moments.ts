/**
 * Count-weighted moments of a histogram and its observations as weighted bin centers.
 */

import { binCenters, totalCount, type Histogram } from "../histogram/index.js";
import type { WeightedValue } from "./ks.js";

export interface Moments {
  /** Count-weighted mean of the bin centers */
  readonly mean: number;
  /** Count-weighted standard deviation (population form) */
  readonly sigma: number;
  /** Sum of all counts */
  readonly total: number;
  /** True when the histogram holds no counts; mean and sigma are then 0 */
  readonly degenerate: boolean;
}

export function computeMoments(histogram: Histogram): Moments {
  const total = totalCount(histogram);
  if (total === 0) {
    return { mean: 0, sigma: 0, total: 0, degenerate: true };
  }

  const centers = binCenters(histogram);
  let weighted = 0;
  histogram.counts.forEach((count, i) => {
    weighted += count * (centers[i] ?? 0);
  });
  const mean = weighted / total;

  let squared = 0;
  histogram.counts.forEach((count, i) => {
    const deviation = (centers[i] ?? 0) - mean;
    squared += count * deviation * deviation;
  });

  return { mean, sigma: Math.sqrt(squared / total), total, degenerate: false };
}

/**
 * Observations of a histogram as bin centers weighted by their truncated
 * count. Bins without a whole count are left out.
 */
export function weightedSamples(histogram: Histogram): WeightedValue[] {
  const centers = binCenters(histogram);
  const samples: WeightedValue[] = [];
  histogram.counts.forEach((count, i) => {
    const weight = Math.trunc(count);
    if (weight > 0) {
      samples.push({ value: centers[i] ?? 0, weight });
    }
  });
  return samples;
}
