/**
 * Comparison record persisted for the reporting step.
 *
 * FILE NAMING CONVENTION:
 * Records are saved as <workDir>/comparison/comparison_results.json so a
 * reporter can find them next to the two run folders.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { ComparisonResult } from "./engine.js";

export const COMPARISON_DIR = "comparison";
export const COMPARISON_FILENAME = "comparison_results.json";

export class ComparisonRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ComparisonRecordError";
  }
}

export const ComparisonRecordSchema = z
  .object({
    referenceMean: z.number(),
    referenceSigma: z.number().min(0),
    testMean: z.number(),
    testSigma: z.number().min(0),
    meanDifference: z.number().min(0),
    sigmaDifference: z.number().min(0),
    relativeSignificance: z.number().min(0),
    maxCountDifference: z.number().min(0),
    ksStatistic: z.number().min(0).max(1),
    ksPValue: z.number().min(0).max(1),
    pass: z.boolean(),
    reason: z.string(),
    warnings: z.array(z.string()),
  })
  .strict();

export function comparisonRecordPath(workDir: string): string {
  return join(workDir, COMPARISON_DIR, COMPARISON_FILENAME);
}

export function serializeComparison(result: ComparisonResult, pretty = true): string {
  return JSON.stringify(result, null, pretty ? 2 : undefined);
}

/**
 * Parse and validate a comparison record.
 *
 * @throws ComparisonRecordError if the JSON is malformed or fields are missing
 */
export function deserializeComparison(json: string): ComparisonResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new ComparisonRecordError(
      `Failed to parse comparison JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = ComparisonRecordSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ComparisonRecordError(`Invalid comparison record: ${errors}`);
  }

  return Object.freeze({ ...result.data, warnings: Object.freeze(result.data.warnings) });
}

/**
 * Save a comparison record, creating the directory if needed.
 *
 * @returns The path written
 */
export function saveComparison(result: ComparisonResult, filePath: string): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, serializeComparison(result), "utf-8");
  return filePath;
}

export function loadComparison(filePath: string): ComparisonResult {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ComparisonRecordError(
      `Failed to read comparison file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deserializeComparison(json);
}
