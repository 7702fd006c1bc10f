/**
 * Histogram interchange record.
 *
 * On disk a histogram is a flat JSON object with exactly two fields:
 *
 *   { "bins": [0, 10, 10, 0], "edges": [0, 1, 2, 3, 4] }
 *
 * `bins` holds the ordered counts and `edges` the ordered bin edges. Numbers
 * are written with JSON's shortest round-trip representation, so a save and
 * load cycle reproduces every value bit for bit.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { createHistogram, HistogramError, type Histogram } from "./histogram.js";

/** Keys every histogram record must carry. */
export const HISTOGRAM_RECORD_KEYS = ["bins", "edges"] as const;

/**
 * Raised when a histogram record lacks one of its required keys.
 */
export class HistogramKeyError extends HistogramError {
  public readonly key: string;

  constructor(key: string, source?: string) {
    super(
      `Histogram record${source ? ` ${source}` : ""} is missing required key '${key}'`
    );
    this.name = "HistogramKeyError";
    this.key = key;
  }
}

export const HistogramRecordSchema = z.object({
  bins: z.array(z.number()),
  edges: z.array(z.number()),
});

export type HistogramRecord = z.infer<typeof HistogramRecordSchema>;

export function toRecord(histogram: Histogram): HistogramRecord {
  return { bins: [...histogram.counts], edges: [...histogram.edges] };
}

/**
 * Serialize a histogram to its JSON record.
 */
export function serializeHistogram(histogram: Histogram, pretty = true): string {
  return JSON.stringify(toRecord(histogram), null, pretty ? 2 : undefined);
}

/**
 * Build a histogram from an already-parsed record.
 *
 * @param source - File path or label used in error messages
 * @throws HistogramKeyError if `bins` or `edges` is absent
 * @throws HistogramError if the record is malformed or violates an invariant
 */
export function fromRecord(value: unknown, source?: string): Histogram {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new HistogramError(
      `Histogram record${source ? ` ${source}` : ""} must be a JSON object`
    );
  }

  for (const key of HISTOGRAM_RECORD_KEYS) {
    if (!(key in value)) {
      throw new HistogramKeyError(key, source);
    }
  }

  const result = HistogramRecordSchema.safeParse(value);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new HistogramError(
      `Invalid histogram record${source ? ` ${source}` : ""}: ${errors}`
    );
  }

  return createHistogram(result.data.bins, result.data.edges);
}

/**
 * Deserialize a histogram from its JSON text.
 */
export function deserializeHistogram(json: string, source?: string): Histogram {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new HistogramError(
      `Failed to parse histogram JSON${source ? ` ${source}` : ""}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return fromRecord(parsed, source);
}

/**
 * Save a histogram record, creating the parent directory if needed.
 *
 * @returns The path written
 */
export function saveHistogram(histogram: Histogram, filePath: string): string {
  const directory = dirname(filePath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }
  writeFileSync(filePath, serializeHistogram(histogram), "utf-8");
  return filePath;
}

/**
 * Load a histogram record from disk.
 */
export function loadHistogram(filePath: string): Histogram {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new HistogramError(
      `Failed to read histogram file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deserializeHistogram(json, filePath);
}
