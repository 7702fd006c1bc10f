/**
 * Spectrum Macro Extractor Tests
 *
 * Run with: node --import tsx src/histogram/macro-extractor.test.ts
 *
 * Tests cover:
 *   1. Line classification by each matcher
 *   2. Axis dialects (explicit edge list, fixed-width constructor)
 *   3. Bin assignment rules (1-based, flow bins, malformed lines)
 *   4. Fatal parse errors and matcher toggles
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  extractHistogram,
  extractHistogramFromFile,
  matchLine,
  ParseError,
  parseNumberToken,
} from "./macro-extractor.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
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

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** Macro as written by the analysis tool, variable-width axis. */
const SPECTRUM_MACRO = `{
//=========Macro generated from canvas: Spectrum/Energy spectrum
   TCanvas *Spectrum = new TCanvas("Spectrum", "Energy spectrum",0,0,700,500);
   Double_t xAxis1[5] = {0, 100, 200, 400, 800};
   TH1D *EnergySpectrum = new TH1D("EnergySpectrum","Energy spectrum",4, xAxis1);
   EnergySpectrum->SetBinContent(1,12);
   EnergySpectrum->SetBinContent(2,40.5);
   EnergySpectrum->SetBinContent(3,7);
   EnergySpectrum->SetEntries(59.5);
   EnergySpectrum->Draw("");
   Spectrum->Modified();
}
`;

/** Older dialect: fixed-width axis from the constructor. */
const UNIFORM_MACRO = `
   TH1F *h = new TH1F("h", "Energy", 4, 0, 2000);
   h->SetBinContent(1, 3);
   h->SetBinContent(4, 1e2);
`;

// ═══════════════════════════════════════════════════════════════════════════
// LINE MATCHERS
// ═══════════════════════════════════════════════════════════════════════════

section("Line matchers");

test("edge list declaration is tagged as edges", () => {
  const match = matchLine("   Double_t xAxis1[4] = {0, 1.5, 3, 4.5};");
  assert.deepEqual(match, { kind: "edges", matcher: "edgeList", values: [0, 1.5, 3, 4.5] });
});

test("float arrays with unsized brackets are recognized", () => {
  const match = matchLine("float edges[] = {1.0f, 2.0f, 4.0f};");
  assert.deepEqual(match, { kind: "edges", matcher: "edgeList", values: [1, 2, 4] });
});

test("fixed-width constructor expands to edges", () => {
  const match = matchLine('TH1D *h = new TH1D("h", "t", 4, 0, 2);');
  assert.deepEqual(match, { kind: "edges", matcher: "uniformAxis", values: [0, 0.5, 1, 1.5, 2] });
});

test("variable-width constructor is not a fixed-width axis", () => {
  assert.deepEqual(matchLine('TH1D *h = new TH1D("h","t",4, xAxis1);'), { kind: "none" });
});

test("SetBinContent is tagged as an assignment", () => {
  assert.deepEqual(matchLine("h->SetBinContent(3, 12.5);"), {
    kind: "assignment",
    matcher: "setBinContent",
    index: 3,
    value: 12.5,
  });
});

test("other lines do not match", () => {
  assert.deepEqual(matchLine("h->SetBinError(3, 0.5);"), { kind: "none" });
  assert.deepEqual(matchLine("   Spectrum->Modified();"), { kind: "none" });
});

test("number tokens are parsed strictly", () => {
  assert.equal(parseNumberToken(" 1.5e3 "), 1500);
  assert.equal(parseNumberToken("-.25"), -0.25);
  assert.equal(parseNumberToken("2.5f"), 2.5);
  assert.ok(Number.isNaN(parseNumberToken("")));
  assert.ok(Number.isNaN(parseNumberToken("x12")));
  assert.ok(Number.isNaN(parseNumberToken("0x10")));
});

// ═══════════════════════════════════════════════════════════════════════════
// EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

section("Extraction");

test("generated macro yields its histogram", () => {
  const { histogram, stats } = extractHistogram(SPECTRUM_MACRO);
  assert.deepEqual(histogram.edges, [0, 100, 200, 400, 800]);
  assert.deepEqual(histogram.counts, [12, 40.5, 7, 0]);
  assert.equal(stats.edgeMatcher, "edgeList");
  assert.equal(stats.assignedLines, 3);
  assert.equal(stats.skippedLines, 0);
});

test("fixed-width dialect yields its histogram", () => {
  const { histogram, stats } = extractHistogram(UNIFORM_MACRO);
  assert.deepEqual(histogram.edges, [0, 500, 1000, 1500, 2000]);
  assert.deepEqual(histogram.counts, [3, 0, 0, 100]);
  assert.equal(stats.edgeMatcher, "uniformAxis");
});

test("SetBinContent(1, 5.0) after a 3-edge declaration sets the first bin", () => {
  const { histogram } = extractHistogram(
    "Double_t xAxis1[3] = {0, 1, 2};\nh->SetBinContent(1, 5.0);"
  );
  assert.equal(histogram.counts[0], 5);
  assert.deepEqual(histogram.counts, [5, 0]);
});

test("underflow and overflow indices are ignored", () => {
  const { histogram, stats } = extractHistogram(
    [
      "Double_t xAxis1[3] = {0, 1, 2};",
      "h->SetBinContent(0, 9);",
      "h->SetBinContent(3, 9);",
      "h->SetBinContent(2, 4);",
    ].join("\n")
  );
  assert.deepEqual(histogram.counts, [0, 4]);
  assert.equal(stats.flowLines, 2);
  assert.equal(stats.assignedLines, 1);
});

test("out-of-range and malformed assignments are skipped", () => {
  const { histogram, stats } = extractHistogram(
    [
      "Double_t xAxis1[3] = {0, 1, 2};",
      "h->SetBinContent(7, 9);",
      "h->SetBinContent(-1, 9);",
      "h->SetBinContent(1.5, 9);",
      "h->SetBinContent(i, 9);",
      "h->SetBinContent(1, nan);",
      "h->SetBinContent(2, -3);",
      "h->SetBinContent(1, 2);",
    ].join("\n")
  );
  assert.deepEqual(histogram.counts, [2, 0]);
  assert.equal(stats.skippedLines, 6);
  assert.equal(stats.assignedLines, 1);
});

test("later assignment to the same bin wins", () => {
  const { histogram } = extractHistogram(
    "Double_t a[2] = {0, 1};\nh->SetBinContent(1, 3);\nh->SetBinContent(1, 8);"
  );
  assert.deepEqual(histogram.counts, [8]);
});

test("assignments before the axis still apply", () => {
  const { histogram } = extractHistogram(
    "h->SetBinContent(2, 6);\nDouble_t a[3] = {0, 1, 2};"
  );
  assert.deepEqual(histogram.counts, [0, 6]);
});

test("non-numeric edge tokens are skipped", () => {
  const { histogram } = extractHistogram("Double_t a[4] = {0, oops, 1, 2};");
  assert.deepEqual(histogram.edges, [0, 1, 2]);
});

test("first usable declaration wins", () => {
  const { histogram } = extractHistogram(
    [
      "Double_t bad[2] = {5};",
      "Double_t unsorted[3] = {3, 2, 1};",
      "Double_t good[3] = {10, 20, 30};",
      "Double_t later[3] = {0, 1, 2};",
    ].join("\n")
  );
  assert.deepEqual(histogram.edges, [10, 20, 30]);
});

test("CRLF line endings are handled", () => {
  const { histogram } = extractHistogram(
    "Double_t a[3] = {0, 1, 2};\r\nh->SetBinContent(2, 1);\r\n"
  );
  assert.deepEqual(histogram.counts, [0, 1]);
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS AND TOGGLES
// ═══════════════════════════════════════════════════════════════════════════

section("Errors and toggles");

test("macro without an axis is a ParseError", () => {
  assert.throws(
    () => extractHistogram("h->SetBinContent(1, 5);", { source: "run_test/spectrum.C" }),
    (err: unknown) =>
      err instanceof ParseError &&
      err.source === "run_test/spectrum.C" &&
      err.message ===
        "No bin-edge declaration with at least two increasing values found (run_test/spectrum.C)"
  );
});

test("single edge value is a ParseError", () => {
  assert.throws(() => extractHistogram("Double_t a[1] = {5};"), ParseError);
});

test("disabled matcher is not consulted", () => {
  assert.throws(
    () => extractHistogram(UNIFORM_MACRO, { matchers: { uniformAxis: false } }),
    ParseError
  );
});

test("disabling assignments leaves all bins empty", () => {
  const { histogram } = extractHistogram(SPECTRUM_MACRO, { matchers: { setBinContent: false } });
  assert.deepEqual(histogram.counts, [0, 0, 0, 0]);
});

test("file extraction reports the path on failure", () => {
  const dir = join(tmpdir(), `macro-test-${Date.now()}`);
  mkdirSync(dir, { recursive: true });
  const good = join(dir, "crab.spectrum.C");
  const empty = join(dir, "empty.C");
  writeFileSync(good, SPECTRUM_MACRO);
  writeFileSync(empty, "{\n}\n");
  try {
    assert.deepEqual(extractHistogramFromFile(good).histogram.counts, [12, 40.5, 7, 0]);
    assert.throws(
      () => extractHistogramFromFile(empty),
      (err: unknown) => err instanceof ParseError && err.source === empty
    );
    assert.throws(
      () => extractHistogramFromFile(join(dir, "missing.C")),
      /Failed to read spectrum macro/
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

console.log("\n───────────────────────────────────────────────────────────────");
console.log(`Results: ${passed} passed, ${failed} failed`);
console.log("───────────────────────────────────────────────────────────────\n");

if (failed > 0) {
  process.exit(1);
}
