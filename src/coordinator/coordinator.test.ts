/**
 * Run Coordinator Tests
 *
 * Run with: node --import tsx src/coordinator/coordinator.test.ts
 *
 * Both toolchains are replaced by an in-process ToolRunner; each run kind
 * gets its own spectrum macro so the comparison outcome is controlled.
 *
 * Tests cover:
 *   1. End-to-end validation writes the comparison record
 *   2. Failing runs abort without a record
 *   3. Parallel mode and tolerance overrides
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { tmpdir } from "node:os";

import {
  loadSuiteConfig,
  runDirName,
  type RunKind,
  type SuiteConfigInput,
} from "../config/run/index.js";
import {
  comparisonRecordPath,
  loadComparison,
  type ComparisonResult,
} from "../comparison/index.js";
import {
  StageFailure,
  type OutputListener,
  type ToolInvocation,
  type ToolResult,
  type ToolRunner,
} from "../pipeline/index.js";
import { PipelineStatus, StageName } from "../types/index.js";
import { RunCoordinator } from "./coordinator.js";
import type { ReportImages, Reporter } from "./reporter.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected the promise to reject");
}

const TMP_DIR = join(tmpdir(), `coordinator-test-${Date.now()}`);
mkdirSync(TMP_DIR, { recursive: true });

function macro(counts: number[]): string {
  return [
    "Double_t xAxis1[5] = {0, 1, 2, 3, 4};",
    ...counts.map((count, i) => `Spectrum->SetBinContent(${i + 1},${count});`),
  ].join("\n");
}

const PEAKED = macro([0, 10, 10, 0]);

interface FakeSetup {
  macros: Record<RunKind, string>;
  failing?: { kind: RunKind; stage: StageName };
}

/**
 * Writes every stage artifact in-process; the run kind is read from the
 * tool's working directory.
 */
class FakeToolRunner implements ToolRunner {
  readonly calls: ToolInvocation[] = [];
  private readonly setup: FakeSetup;

  constructor(setup: FakeSetup) {
    this.setup = setup;
  }

  async run(invocation: ToolInvocation, onLine: OutputListener): Promise<ToolResult> {
    this.calls.push(invocation);
    const kind: RunKind =
      basename(invocation.cwd) === runDirName("reference") ? "reference" : "test";
    onLine(`${invocation.command} (${kind})`);

    const failing = this.setup.failing;
    if (failing && failing.kind === kind && failing.stage === invocation.stage) {
      return { exitCode: 1, signal: null, timedOut: false };
    }

    const argAfter = (flag: string): string =>
      invocation.args[invocation.args.indexOf(flag) + 1] ?? "";

    switch (invocation.stage) {
      case StageName.Simulation:
        writeFileSync(
          join(invocation.cwd, `${basename(invocation.args[0] ?? "", ".source")}.inc1.id1.sim.gz`),
          "sim"
        );
        break;
      case StageName.Reconstruction:
        writeFileSync(argAfter("-f").replace(/\.sim\.gz$/, ".tra.gz"), "tra");
        break;
      case StageName.Spectrum:
        writeFileSync(argAfter("-o"), this.setup.macros[kind]);
        break;
      case StageName.Histogram:
        break;
    }
    return { exitCode: 0, signal: null, timedOut: false };
  }
}

class RecordingReporter implements Reporter {
  readonly reports: Array<{ result: ComparisonResult; images: ReportImages }> = [];

  async report(result: ComparisonResult, images: ReportImages): Promise<void> {
    this.reports.push({ result, images });
  }
}

let workCounter = 0;

function setupSuite(overrides: Partial<SuiteConfigInput> = {}) {
  const workDir = join(TMP_DIR, `suite-${++workCounter}`);
  const suite = loadSuiteConfig(
    {
      simulationInput: "/data/crab.source",
      geometry: "/data/mass-model.geo.setup",
      reconstructionConfig: "/data/standard.revan.cfg",
      analysisConfig: "/data/spectrum.mimrec.cfg",
      toolchains: { test: { analyzer: "mimrec-next" } },
      ...overrides,
    },
    { baseDir: TMP_DIR, checkFiles: false }
  );
  return { suite, workDir };
}

// ═══════════════════════════════════════════════════════════════════════════
// END TO END
// ═══════════════════════════════════════════════════════════════════════════

section("End to end");

await test("matching toolchains pass and write the record", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({ macros: { reference: PEAKED, test: PEAKED } });
  const reporter = new RecordingReporter();

  const outcome = await new RunCoordinator(suite, { workDir, runner, reporter }).run();

  assert.equal(outcome.result.pass, true);
  assert.equal(outcome.recordPath, comparisonRecordPath(workDir));
  assert.deepEqual(loadComparison(outcome.recordPath), outcome.result);
  assert.equal(reporter.reports.length, 1);
  assert.deepEqual(reporter.reports[0]?.images, {});
  assert.equal(outcome.runs.reference.histogram.counts[1], 10);
});

await test("each run uses its own toolchain and directory", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({ macros: { reference: PEAKED, test: PEAKED } });

  await new RunCoordinator(suite, { workDir, runner }).run();

  assert.deepEqual(
    runner.calls.map((call) => `${basename(call.cwd)}:${call.command}`),
    [
      "run_reference:cosima",
      "run_reference:revan",
      "run_reference:mimrec",
      "run_test:cosima",
      "run_test:revan",
      "run_test:mimrec-next",
    ]
  );
  assert.equal(existsSync(join(workDir, "run_reference", "results", "crab.spectrum.json")), true);
  assert.equal(existsSync(join(workDir, "run_test", "results", "crab.spectrum.json")), true);
});

await test("diverging spectra fail but still write the record", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({
    macros: { reference: macro([100, 0, 0, 0]), test: macro([0, 0, 0, 100]) },
  });

  const outcome = await new RunCoordinator(suite, { workDir, runner }).run();

  assert.equal(outcome.result.pass, false);
  assert.equal(outcome.result.ksStatistic, 1);
  assert.equal(existsSync(comparisonRecordPath(workDir)), true);
});

await test("transitions are tagged with their run kind", async () => {
  const { suite, workDir } = setupSuite();
  const seen: string[] = [];
  await new RunCoordinator(suite, {
    workDir,
    runner: new FakeToolRunner({ macros: { reference: PEAKED, test: PEAKED } }),
    onTransition: (kind, transition) => {
      if (transition.to === PipelineStatus.Done) seen.push(kind);
    },
  }).run();
  assert.deepEqual(seen, ["reference", "test"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// FAILURES
// ═══════════════════════════════════════════════════════════════════════════

section("Failures");

await test("failing test run aborts without a record", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({
    macros: { reference: PEAKED, test: PEAKED },
    failing: { kind: "test", stage: StageName.Reconstruction },
  });
  const reporter = new RecordingReporter();

  const err = await captureRejection(
    new RunCoordinator(suite, { workDir, runner, reporter }).run()
  );

  assert.ok(err instanceof StageFailure);
  assert.equal(err.kind, "test");
  assert.equal(err.stage, StageName.Reconstruction);
  assert.equal(existsSync(comparisonRecordPath(workDir)), false);
  assert.equal(reporter.reports.length, 0);
});

await test("failing reference run stops before the test run", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({
    macros: { reference: PEAKED, test: PEAKED },
    failing: { kind: "reference", stage: StageName.Simulation },
  });

  const err = await captureRejection(new RunCoordinator(suite, { workDir, runner }).run());

  assert.ok(err instanceof StageFailure);
  assert.equal(err.kind, "reference");
  assert.equal(runner.calls.length, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Options");

await test("parallel runs produce the same verdict", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({ macros: { reference: PEAKED, test: PEAKED } });

  const outcome = await new RunCoordinator(suite, { workDir, runner, parallel: true }).run();

  assert.equal(outcome.result.pass, true);
  assert.equal(runner.calls.length, 6);
});

await test("parallel mode reports a failing run without a record", async () => {
  const { suite, workDir } = setupSuite();
  const runner = new FakeToolRunner({
    macros: { reference: PEAKED, test: PEAKED },
    failing: { kind: "test", stage: StageName.Spectrum },
  });

  const err = await captureRejection(
    new RunCoordinator(suite, { workDir, runner, parallel: true }).run()
  );

  assert.ok(err instanceof StageFailure);
  assert.equal(err.kind, "test");
  assert.equal(existsSync(comparisonRecordPath(workDir)), false);
});

await test("tolerance option overrides the suite value", async () => {
  const macros = { reference: macro([5, 10, 10, 5]), test: macro([10, 5, 5, 10]) };

  const loose = setupSuite();
  const fromSuite = await new RunCoordinator(loose.suite, {
    workDir: loose.workDir,
    runner: new FakeToolRunner({ macros }),
  }).run();
  assert.equal(fromSuite.result.pass, true);

  const tight = setupSuite({ sigmaTolerance: 0.3 });
  const fromSuiteTight = await new RunCoordinator(tight.suite, {
    workDir: tight.workDir,
    runner: new FakeToolRunner({ macros }),
  }).run();
  assert.equal(fromSuiteTight.result.pass, false);

  const overridden = setupSuite({ sigmaTolerance: 0.3 });
  const fromOption = await new RunCoordinator(overridden.suite, {
    workDir: overridden.workDir,
    runner: new FakeToolRunner({ macros }),
    sigmaTolerance: 3,
  }).run();
  assert.equal(fromOption.result.pass, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TMP_DIR, { recursive: true, force: true });

console.log("\n───────────────────────────────────────────────────────────────");
console.log(`Results: ${passed} passed, ${failed} failed`);
console.log("───────────────────────────────────────────────────────────────\n");

if (failed > 0) {
  process.exit(1);
}
