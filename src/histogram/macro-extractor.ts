/**
 * Spectrum macro extractor.
 *
 * The analysis tool writes its spectrum as a plotting macro: an axis
 * declaration followed by one "set bin content" call per filled bin, e.g.
 *
 *   Double_t xAxis1[5] = {0, 1, 2, 3, 4};
 *   TH1D *Spectrum = new TH1D("Spectrum", "Energy", 4, xAxis1);
 *   Spectrum->SetBinContent(2, 10);
 *   Spectrum->SetBinContent(3, 10);
 *
 * Different tool versions emit different dialects, so every line is run
 * through an ordered list of matchers. Each matcher recognizes one shape and
 * returns a tagged match; matchers can be switched off individually.
 *
 * Individual malformed lines are skipped. Only a macro without any usable
 * axis is an error.
 */

import { readFileSync } from "node:fs";
import { createHistogram, validateHistogram, type Histogram } from "./histogram.js";

export class ParseError extends Error {
  public readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "ParseError";
    this.source = source;
  }
}

export type MatcherName = "edgeList" | "uniformAxis" | "setBinContent";

export type LineMatch =
  | { readonly kind: "edges"; readonly matcher: MatcherName; readonly values: number[] }
  | {
      readonly kind: "assignment";
      readonly matcher: MatcherName;
      /** 1-based bin index; NaN when the token is not a number */
      readonly index: number;
      /** NaN when the token is not a number */
      readonly value: number;
    }
  | { readonly kind: "none" };

export interface LineMatcher {
  readonly name: MatcherName;
  match(line: string): LineMatch;
}

const NO_MATCH: LineMatch = { kind: "none" };

const NUMBER_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse one numeric literal, returning NaN for anything else.
 * Accepts a trailing C-style float suffix ("2.5f").
 */
export function parseNumberToken(token: string): number {
  const cleaned = token.trim().replace(/[fF]$/, "");
  return NUMBER_TOKEN.test(cleaned) ? Number(cleaned) : Number.NaN;
}

const EDGE_LIST =
  /\b(?:Double_t|Float_t|double|float)\s+\w+\s*\[\s*\d*\s*\]\s*=\s*\{([^}]*)\}/;

const UNIFORM_AXIS =
  /\bnew\s+TH1[DF]\s*\(\s*"[^"]*"\s*,\s*"[^"]*"\s*,\s*([^,()]+?)\s*,\s*([^,()]+?)\s*,\s*([^,()]+?)\s*\)/;

const SET_BIN_CONTENT = /SetBinContent\s*\(\s*([^,()]*?)\s*,\s*([^,()]*?)\s*\)/;

/** `Double_t xAxis1[5] = {0, 1, 2, 3, 4};` */
const edgeListMatcher: LineMatcher = {
  name: "edgeList",
  match(line) {
    const m = EDGE_LIST.exec(line);
    if (!m) return NO_MATCH;
    const values = (m[1] ?? "")
      .split(/[\s,]+/)
      .filter((token) => token.length > 0)
      .map(parseNumberToken)
      .filter((value) => !Number.isNaN(value));
    return { kind: "edges", matcher: "edgeList", values };
  },
};

/** `new TH1D("Spectrum", "Energy", 40, 0, 2000)` */
const uniformAxisMatcher: LineMatcher = {
  name: "uniformAxis",
  match(line) {
    const m = UNIFORM_AXIS.exec(line);
    if (!m) return NO_MATCH;
    const bins = parseNumberToken(m[1] ?? "");
    const low = parseNumberToken(m[2] ?? "");
    const high = parseNumberToken(m[3] ?? "");
    if (!Number.isInteger(bins) || bins < 1 || !(high > low)) {
      return { kind: "edges", matcher: "uniformAxis", values: [] };
    }
    const width = (high - low) / bins;
    const values = Array.from({ length: bins + 1 }, (_, i) =>
      i === bins ? high : low + i * width
    );
    return { kind: "edges", matcher: "uniformAxis", values };
  },
};

/** `Spectrum->SetBinContent(3, 12.5);` */
const setBinContentMatcher: LineMatcher = {
  name: "setBinContent",
  match(line) {
    const m = SET_BIN_CONTENT.exec(line);
    if (!m) return NO_MATCH;
    return {
      kind: "assignment",
      matcher: "setBinContent",
      index: parseNumberToken(m[1] ?? ""),
      value: parseNumberToken(m[2] ?? ""),
    };
  },
};

/** Matchers in priority order. */
export const DEFAULT_MATCHERS: readonly LineMatcher[] = [
  edgeListMatcher,
  uniformAxisMatcher,
  setBinContentMatcher,
];

export interface ExtractOptions {
  /** Switch individual matchers off, e.g. `{ uniformAxis: false }` */
  matchers?: Partial<Record<MatcherName, boolean>>;
  /** File path or label used in error messages */
  source?: string;
}

export interface ExtractionStats {
  /** Matcher that supplied the axis */
  edgeMatcher: MatcherName;
  /** Assignment lines that set a bin */
  assignedLines: number;
  /** Assignment lines addressing the underflow or overflow bin */
  flowLines: number;
  /** Assignment lines with a bad index or value */
  skippedLines: number;
}

export interface ExtractionResult {
  histogram: Histogram;
  stats: ExtractionStats;
}

/**
 * Classify one line with the first enabled matcher that recognizes it.
 */
export function matchLine(
  line: string,
  matchers: readonly LineMatcher[] = DEFAULT_MATCHERS
): LineMatch {
  for (const matcher of matchers) {
    const result = matcher.match(line);
    if (result.kind !== "none") {
      return result;
    }
  }
  return NO_MATCH;
}

function enabledMatchers(options: ExtractOptions): LineMatcher[] {
  const toggles = options.matchers ?? {};
  return DEFAULT_MATCHERS.filter((matcher) => toggles[matcher.name] !== false);
}

/**
 * Extract a histogram from spectrum macro text.
 *
 * @throws ParseError if no declaration yields at least two strictly
 *   increasing edges
 */
export function extractHistogram(
  text: string,
  options: ExtractOptions = {}
): ExtractionResult {
  const matchers = enabledMatchers(options);
  let edges: number[] | undefined;
  let edgeMatcher: MatcherName | undefined;
  const assignments: Array<{ index: number; value: number }> = [];

  for (const line of text.split(/\r?\n/)) {
    const result = matchLine(line, matchers);
    switch (result.kind) {
      case "edges":
        if (
          edges === undefined &&
          result.values.length >= 2 &&
          validateHistogram(new Array<number>(result.values.length - 1).fill(0), result.values)
            .length === 0
        ) {
          edges = result.values;
          edgeMatcher = result.matcher;
        }
        break;
      case "assignment":
        assignments.push({ index: result.index, value: result.value });
        break;
      case "none":
        break;
    }
  }

  if (edges === undefined || edgeMatcher === undefined) {
    throw new ParseError(
      "No bin-edge declaration with at least two increasing values found",
      options.source
    );
  }

  const bins = edges.length - 1;
  const counts = new Array<number>(bins).fill(0);
  const stats: ExtractionStats = {
    edgeMatcher,
    assignedLines: 0,
    flowLines: 0,
    skippedLines: 0,
  };

  for (const { index, value } of assignments) {
    if (!Number.isInteger(index) || !Number.isFinite(value) || value < 0) {
      stats.skippedLines++;
    } else if (index === 0 || index === bins + 1) {
      stats.flowLines++;
    } else if (index < 0 || index > bins + 1) {
      stats.skippedLines++;
    } else {
      counts[index - 1] = value;
      stats.assignedLines++;
    }
  }

  return { histogram: createHistogram(counts, edges), stats };
}

/**
 * Read a macro file and extract its histogram.
 *
 * @throws ParseError if the file cannot be read or holds no usable axis
 */
export function extractHistogramFromFile(
  filePath: string,
  options: Omit<ExtractOptions, "source"> = {}
): ExtractionResult {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ParseError(
      `Failed to read spectrum macro: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }
  return extractHistogram(text, { ...options, source: filePath });
}
