#!/usr/bin/env node
/**
 * Run the reference and test toolchains over one suite and compare the
 * resulting energy spectra.
 *
 * Usage:
 *   npx tsx src/cli/validate-toolchain.ts --config <steering.json> [options]
 *   npm run validate-toolchain -- --config suites/crab/steering.json
 *
 * Options:
 *   --config <path>          Suite steering file (required)
 *   --work-dir <path>        Where run_reference/, run_test/ and comparison/
 *                            are created (default: the steering file's directory)
 *   --parallel               Run both toolchains at the same time
 *   --sigma-tolerance <n>    Override the suite's sigma tolerance
 *   --verbose                Log every line the tools print
 *   --json                   Print the comparison record as JSON
 *   -h, --help               Show help
 *
 * Exit codes:
 *   0 - Spectra consistent
 *   1 - Significant difference
 *   2 - Configuration error, failed stage or unparseable spectrum
 */

import { dirname, resolve } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError, loadSuiteConfigFile, validateConfig } from "../config/index.js";
import { LogReporter, RunCoordinator } from "../coordinator/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { c, describeError, EXIT_CODES, parsePositiveNumber, printVerdict } from "./common.js";

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      "work-dir": { type: "string" },
      parallel: { type: "boolean", default: false },
      "sigma-tolerance": { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-toolchain --config <steering.json> [options]

Options:
  --config <path>          Suite steering file (required)
  --work-dir <path>        Output location (default: the steering file's directory)
  --parallel               Run both toolchains at the same time
  --sigma-tolerance <n>    Override the suite's sigma tolerance
  --verbose                Log every line the tools print
  --json                   Print the comparison record as JSON
  -h, --help               Show this help message
`);
    process.exit(EXIT_CODES.pass);
  }

  if (!values.config) {
    throw new ConfigError("--config <steering.json> is required");
  }

  const configPath = resolve(values.config);
  return {
    configPath,
    workDir: resolve(values["work-dir"] ?? dirname(configPath)),
    parallel: values.parallel === true,
    sigmaTolerance: parsePositiveNumber("sigma-tolerance", values["sigma-tolerance"]),
    verbose: values.verbose === true,
    json: values.json === true,
  };
}

async function main(): Promise<void> {
  const runId = initRunId();
  const args = parseCliArgs();
  const config = validateConfig();

  const logger = createLogger({
    level: args.verbose ? "debug" : config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
    // Keep stdout clean for the JSON record
    console: !args.json,
  });

  const loaded = loadSuiteConfigFile(args.configPath);
  const suite =
    loaded.stageTimeoutMs === undefined && config.stageTimeoutMs > 0
      ? { ...loaded, stageTimeoutMs: config.stageTimeoutMs }
      : loaded;

  logger.info("Validation starting", {
    runId,
    suite: args.configPath,
    workDir: args.workDir,
    parallel: args.parallel,
  });

  const coordinator = new RunCoordinator(suite, {
    workDir: args.workDir,
    logger,
    parallel: args.parallel,
    sigmaTolerance: args.sigmaTolerance,
    reporter: args.json ? undefined : new LogReporter(logger),
  });

  const { result, recordPath } = await coordinator.run();

  if (args.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(c("dim", `Comparison record: ${recordPath}`));
    printVerdict(result.pass, result.reason);
  }

  process.exit(result.pass ? EXIT_CODES.pass : EXIT_CODES.fail);
}

main().catch((err: unknown) => {
  console.error(c("red", describeError(err)));
  process.exit(EXIT_CODES.error);
});
