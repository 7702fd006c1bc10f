/**
 * Default suite settings.
 *
 * The sigma tolerance default is loose (300%); suites that gate releases
 * set a tighter value.
 */

export const DEFAULT_ENERGY_CUT = { lower: 10, upper: 2000 } as const;

export const DEFAULT_MAX_EVENTS = 100_000;

export const DEFAULT_SIGMA_TOLERANCE = 3.0;

/** Binaries used when a toolchain entry leaves them out. */
export const DEFAULT_TOOLCHAIN = {
  simulator: "cosima",
  reconstructor: "revan",
  analyzer: "mimrec",
} as const;
