/**
 * Suite configuration schema ("steering file").
 *
 * A suite describes one dataset and the two toolchains it is pushed
 * through. It is validated once, frozen, and then split into one RunConfig
 * per run kind.
 */

import { z } from "zod";
import { INPUT_EXTENSIONS } from "./enums.js";
import {
  DEFAULT_ENERGY_CUT,
  DEFAULT_MAX_EVENTS,
  DEFAULT_SIGMA_TOLERANCE,
  DEFAULT_TOOLCHAIN,
} from "./defaults.js";

function inputPath(extension: string) {
  return z
    .string()
    .min(1)
    .refine((value) => value.endsWith(extension), {
      message: `Must be a path ending in '${extension}'`,
    });
}

/**
 * Energy window in keV. Accepts `{ lower, upper }` or a `[lower, upper]` pair.
 */
export const EnergyCutSchema = z
  .union([
    z.object({ lower: z.number().finite(), upper: z.number().finite() }).strict(),
    z.tuple([z.number().finite(), z.number().finite()]),
  ])
  .transform((value) =>
    Array.isArray(value) ? { lower: value[0], upper: value[1] } : value
  )
  .refine((cut) => cut.lower <= cut.upper, {
    message: "Lower energy bound must not exceed the upper bound",
  });

export type EnergyCut = z.infer<typeof EnergyCutSchema>;

/**
 * Binaries (names on PATH or absolute paths) for one toolchain version.
 */
export const ToolchainSchema = z
  .object({
    simulator: z.string().min(1).default(DEFAULT_TOOLCHAIN.simulator),
    reconstructor: z.string().min(1).default(DEFAULT_TOOLCHAIN.reconstructor),
    analyzer: z.string().min(1).default(DEFAULT_TOOLCHAIN.analyzer),
    /** Extra environment for every tool of this version, e.g. an install prefix */
    env: z.record(z.string()).default({}),
  })
  .strict();

export type Toolchain = z.infer<typeof ToolchainSchema>;

export const SuiteConfigSchema = z
  .object({
    simulationInput: inputPath(INPUT_EXTENSIONS.simulationInput).describe(
      "Simulation source file"
    ),
    geometry: inputPath(INPUT_EXTENSIONS.geometry).describe("Geometry setup file"),
    reconstructionConfig: inputPath(INPUT_EXTENSIONS.reconstructionConfig).describe(
      "Event reconstruction configuration"
    ),
    analysisConfig: inputPath(INPUT_EXTENSIONS.analysisConfig).describe(
      "Spectrum analysis configuration"
    ),
    energyCut: EnergyCutSchema.default({ ...DEFAULT_ENERGY_CUT }),
    maxEvents: z.number().int().positive().default(DEFAULT_MAX_EVENTS),
    toolchains: z
      .object({
        reference: ToolchainSchema.default({}),
        test: ToolchainSchema.default({}),
      })
      .strict()
      .default({}),
    sigmaTolerance: z.number().positive().default(DEFAULT_SIGMA_TOLERANCE),
    stageTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type SuiteConfig = z.infer<typeof SuiteConfigSchema>;
export type SuiteConfigInput = z.input<typeof SuiteConfigSchema>;
