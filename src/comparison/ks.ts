/**
 * Two-sample Kolmogorov–Smirnov test.
 *
 * The statistic is the largest vertical distance between the two empirical
 * CDFs. The p-value uses the asymptotic Kolmogorov distribution with the
 * Stephens effective-size correction, which is accurate once both samples
 * hold more than a handful of observations.
 */

export interface KsResult {
  /** Largest CDF distance, in [0, 1] */
  readonly statistic: number;
  /** Probability of a distance at least this large under H0, in [0, 1] */
  readonly pValue: number;
}

const SERIES_TERMS = 100;
const SERIES_RELATIVE_EPS = 0.001;
const SERIES_ABSOLUTE_EPS = 1e-8;

/**
 * Survival function of the Kolmogorov distribution, Q_KS(lambda).
 */
export function kolmogorovSurvival(lambda: number): number {
  if (!(lambda > 0)) {
    return 1;
  }

  const a2 = -2 * lambda * lambda;
  let fac = 2;
  let sum = 0;
  let previous = 0;

  for (let j = 1; j <= SERIES_TERMS; j++) {
    const term = fac * Math.exp(a2 * j * j);
    sum += term;
    if (
      Math.abs(term) <= SERIES_RELATIVE_EPS * previous ||
      Math.abs(term) <= SERIES_ABSOLUTE_EPS * sum
    ) {
      return Math.min(1, Math.max(0, sum));
    }
    fac = -fac;
    previous = Math.abs(term);
  }

  // Series did not converge: lambda is tiny and the distributions agree.
  return 1;
}

/** An observed value standing for `weight` identical observations. */
export interface WeightedValue {
  readonly value: number;
  readonly weight: number;
}

function totalWeight(sample: readonly WeightedValue[]): number {
  return sample.reduce((sum, entry) => sum + entry.weight, 0);
}

/**
 * Largest distance between the empirical CDFs of two weighted samples,
 * each sorted by value.
 */
function maxCdfDistance(
  a: readonly WeightedValue[],
  b: readonly WeightedValue[],
  n1: number,
  n2: number
): number {
  let i = 0;
  let j = 0;
  let ca = 0;
  let cb = 0;
  let distance = 0;

  while (i < a.length && j < b.length) {
    const x = Math.min(a[i]?.value ?? Infinity, b[j]?.value ?? Infinity);
    while (i < a.length && (a[i]?.value ?? Infinity) <= x) {
      ca += a[i]?.weight ?? 0;
      i++;
    }
    while (j < b.length && (b[j]?.value ?? Infinity) <= x) {
      cb += b[j]?.weight ?? 0;
      j++;
    }
    distance = Math.max(distance, Math.abs(ca / n1 - cb / n2));
  }

  return distance;
}

/**
 * Run the two-sample KS test on weighted samples. The total weight of each
 * side is its sample size, so a binned spectrum is tested without
 * materializing one entry per count.
 *
 * @throws RangeError if either sample has no weight
 */
export function ksWeighted(
  a: readonly WeightedValue[],
  b: readonly WeightedValue[]
): KsResult {
  const n1 = totalWeight(a);
  const n2 = totalWeight(b);
  if (!(n1 > 0) || !(n2 > 0)) {
    throw new RangeError("Kolmogorov-Smirnov test needs two non-empty samples");
  }

  const byValue = (x: WeightedValue, y: WeightedValue): number => x.value - y.value;
  const statistic = maxCdfDistance([...a].sort(byValue), [...b].sort(byValue), n1, n2);

  if (statistic === 0) {
    return { statistic: 0, pValue: 1 };
  }

  const effective = Math.sqrt((n1 * n2) / (n1 + n2));
  const lambda = (effective + 0.12 + 0.11 / effective) * statistic;

  return { statistic, pValue: kolmogorovSurvival(lambda) };
}

/**
 * Run the two-sample KS test on plain observations.
 *
 * @throws RangeError if either sample is empty
 */
export function ksTwoSample(a: readonly number[], b: readonly number[]): KsResult {
  const unit = (value: number): WeightedValue => ({ value, weight: 1 });
  return ksWeighted(a.map(unit), b.map(unit));
}
