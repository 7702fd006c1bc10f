#!/usr/bin/env node
/**
 * Compare two existing spectra without running any toolchain.
 *
 * Each input is either a spectrum macro (`.C`, parsed with the macro
 * extractor) or a histogram record (`.json`).
 *
 * Usage:
 *   npx tsx src/cli/compare-spectra.ts --reference <file> --test <file> [options]
 *
 * Options:
 *   --reference <file>       Reference spectrum (.C macro or .json record)
 *   --test <file>            Test spectrum (.C macro or .json record)
 *   --sigma-tolerance <n>    Maximum relative sigma difference (default 3.0)
 *   --out <file>             Also write the comparison record to this path
 *   --json                   Print the comparison record as JSON
 *   -h, --help               Show help
 *
 * Exit codes:
 *   0 - Spectra consistent
 *   1 - Significant difference
 *   2 - Invalid arguments or unreadable spectra
 */

import { extname, resolve } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError } from "../config/index.js";
import {
  compareHistograms,
  saveComparison,
  summarizeComparison,
  type CompareOptions,
  type ComparisonResult,
} from "../comparison/index.js";
import {
  extractHistogramFromFile,
  loadHistogram,
  type Histogram,
} from "../histogram/index.js";
import {
  c,
  describeError,
  EXIT_CODES,
  isEntryPoint,
  parsePositiveNumber,
  printVerdict,
} from "./common.js";

/**
 * Load a spectrum from a histogram record or a macro file.
 */
export function loadSpectrum(filePath: string): Histogram {
  return extname(filePath).toLowerCase() === ".json"
    ? loadHistogram(filePath)
    : extractHistogramFromFile(filePath).histogram;
}

export function compareSpectrumFiles(
  referencePath: string,
  testPath: string,
  options: CompareOptions = {}
): ComparisonResult {
  return compareHistograms(loadSpectrum(referencePath), loadSpectrum(testPath), options);
}

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      reference: { type: "string" },
      test: { type: "string" },
      "sigma-tolerance": { type: "string" },
      out: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: compare-spectra --reference <file> --test <file> [options]

Options:
  --reference <file>       Reference spectrum (.C macro or .json record)
  --test <file>            Test spectrum (.C macro or .json record)
  --sigma-tolerance <n>    Maximum relative sigma difference (default 3.0)
  --out <file>             Also write the comparison record to this path
  --json                   Print the comparison record as JSON
  -h, --help               Show this help message
`);
    process.exit(EXIT_CODES.pass);
  }

  if (!values.reference || !values.test) {
    throw new ConfigError("Both --reference and --test are required");
  }

  return {
    reference: resolve(values.reference),
    test: resolve(values.test),
    sigmaTolerance: parsePositiveNumber("sigma-tolerance", values["sigma-tolerance"]),
    out: values.out ? resolve(values.out) : undefined,
    json: values.json === true,
  };
}

function main(): void {
  const args = parseCliArgs();
  const result = compareSpectrumFiles(args.reference, args.test, {
    sigmaTolerance: args.sigmaTolerance,
  });

  if (args.out) {
    saveComparison(result, args.out);
  }

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(summarizeComparison(result));
    if (args.out) {
      console.log(c("dim", `\nRecord written to ${args.out}`));
    }
    printVerdict(result.pass, result.reason);
  }

  process.exit(result.pass ? EXIT_CODES.pass : EXIT_CODES.fail);
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(import.meta.url)) {
  try {
    main();
  } catch (err) {
    console.error(c("red", describeError(err)));
    process.exit(EXIT_CODES.error);
  }
}
