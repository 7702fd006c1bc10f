/**
 * Canonical binned histogram.
 *
 * A Histogram is constructed once (by the macro extractor or from a saved
 * record) and is read-only afterwards. Derived quantities such as mean and
 * sigma are computed on demand by the comparison module.
 */

export interface Histogram {
  /** Bin counts, `counts[i]` covers `[edges[i], edges[i + 1])` */
  readonly counts: readonly number[];
  /** Strictly increasing bin edges, one more than there are counts */
  readonly edges: readonly number[];
}

export class HistogramError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistogramError";
  }
}

/**
 * Check the histogram invariants and return a list of violations.
 * An empty list means the input is a valid histogram.
 */
export function validateHistogram(
  counts: readonly number[],
  edges: readonly number[]
): string[] {
  const problems: string[] = [];

  if (counts.length < 1) {
    problems.push("a histogram needs at least one bin");
  }
  if (edges.length !== counts.length + 1) {
    problems.push(
      `expected ${counts.length + 1} edges for ${counts.length} bins, got ${edges.length}`
    );
  }

  counts.forEach((count, i) => {
    if (!Number.isFinite(count) || count < 0) {
      problems.push(`count at bin ${i} must be a finite non-negative number, got ${count}`);
    }
  });

  edges.forEach((edge, i) => {
    if (!Number.isFinite(edge)) {
      problems.push(`edge ${i} must be finite, got ${edge}`);
      return;
    }
    const previous = i > 0 ? edges[i - 1] : undefined;
    if (previous !== undefined && !(edge > previous)) {
      problems.push(`edges must be strictly increasing (edge ${i}: ${previous} -> ${edge})`);
    }
  });

  return problems;
}

/**
 * Build a frozen histogram, copying the inputs.
 *
 * @throws HistogramError if an invariant is violated
 */
export function createHistogram(
  counts: readonly number[],
  edges: readonly number[]
): Histogram {
  const problems = validateHistogram(counts, edges);
  if (problems.length > 0) {
    throw new HistogramError(`Invalid histogram: ${problems.join("; ")}`);
  }

  return Object.freeze({
    counts: Object.freeze([...counts]),
    edges: Object.freeze([...edges]),
  });
}

export function binCount(histogram: Histogram): number {
  return histogram.counts.length;
}

/**
 * Midpoint of every bin.
 */
export function binCenters(histogram: Histogram): number[] {
  return histogram.counts.map((_, i) => {
    const low = histogram.edges[i] ?? 0;
    const high = histogram.edges[i + 1] ?? low;
    return (low + high) / 2;
  });
}

export function totalCount(histogram: Histogram): number {
  return histogram.counts.reduce((sum, count) => sum + count, 0);
}

/**
 * Whether two histograms share the exact same binning.
 */
export function sameBinning(a: Histogram, b: Histogram): boolean {
  return (
    a.edges.length === b.edges.length &&
    a.edges.every((edge, i) => edge === b.edges[i])
  );
}
