/**
 * Histogram model, interchange record and spectrum macro extraction.
 */

export {
  createHistogram,
  validateHistogram,
  binCount,
  binCenters,
  totalCount,
  sameBinning,
  HistogramError,
  type Histogram,
} from "./histogram.js";

export {
  serializeHistogram,
  deserializeHistogram,
  saveHistogram,
  loadHistogram,
  toRecord,
  fromRecord,
  HistogramKeyError,
  HistogramRecordSchema,
  HISTOGRAM_RECORD_KEYS,
  type HistogramRecord,
} from "./serialization.js";

export {
  extractHistogram,
  extractHistogramFromFile,
  matchLine,
  parseNumberToken,
  ParseError,
  DEFAULT_MATCHERS,
  type LineMatch,
  type LineMatcher,
  type MatcherName,
  type ExtractOptions,
  type ExtractionResult,
  type ExtractionStats,
} from "./macro-extractor.js";
