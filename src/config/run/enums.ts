/**
 * Domain enumerations for validation runs.
 */

import { z } from "zod";

/**
 * Which side of the comparison a run belongs to.
 *
 * Every component that names outputs receives the kind explicitly; it is
 * never derived from directory names.
 */
export const RunKind = z.enum(["reference", "test"]);
export type RunKind = z.infer<typeof RunKind>;

/** Both kinds, in execution order. */
export const RUN_KINDS: readonly RunKind[] = RunKind.options;

/**
 * Required file extensions of the toolchain inputs.
 */
export const INPUT_EXTENSIONS = {
  simulationInput: ".source",
  geometry: ".geo.setup",
  reconstructionConfig: ".revan.cfg",
  analysisConfig: ".mimrec.cfg",
} as const;

export type InputField = keyof typeof INPUT_EXTENSIONS;
