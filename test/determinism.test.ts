// ─────────────────────────────────────────────────────────────
// Determinism — Repeated-run stability of the form pipeline
//
// Same lines in → same spec out, every round, and no state
// carried from one conversion into the next.
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import crypto from "crypto";
import fs from "fs";
import path from "path";
import { convertLines } from "../parser/formPipeline";
import { ConversionResult } from "../schema/formSchema";

// ── Test Constants ───────────────────────────────────────────

const ROUNDS = 200;

// ── Test Fixtures ────────────────────────────────────────────

const FORM_LINES = fs.readFileSync(path.join(__dirname, "fixtures", "new-patient-form.txt"), "utf-8").split("\n");

/** Lines that exercise duplicate suffixing and consent buffering */
const MIXED_LINES = [
  "Initials ____",
  "I consent to the release of my records to my insurance carrier.",
  "Initials ____",
  "City ________",
  "Work Address",
  "City ________",
  "Are you a smoker? Yes/No",
  "Signature ________________ Date ________",
];

function specHash(result: ConversionResult): string {
  return crypto.createHash("sha256").update(JSON.stringify(result)).digest("hex");
}

function stabilityRun(lines: readonly string[], rounds: number): Set<string> {
  const hashes = new Set<string>();
  for (let i = 0; i < rounds; i++) {
    hashes.add(specHash(convertLines(lines)));
  }
  return hashes;
}

// ── Test Runner ──────────────────────────────────────────────

interface TestResult {
  name: string;
  passed: boolean;
  duration: number;
  details: string;
}

const results: TestResult[] = [];

function test(name: string, fn: () => void): void {
  const start = Date.now();
  try {
    fn();
    const duration = Date.now() - start;
    results.push({ name, passed: true, duration, details: "OK" });
    console.log(`  ✓ ${name} (${duration}ms)`);
  } catch (err: unknown) {
    const duration = Date.now() - start;
    const message = err instanceof Error ? err.message : String(err);
    results.push({ name, passed: false, duration, details: message });
    console.log(`  ✗ ${name} (${duration}ms)`);
    console.log(`    → ${message}`);
  }
}

// ── Tests ────────────────────────────────────────────────────

console.log("");
console.log("═══════════════════════════════════════════════════════");
console.log(`  DETERMINISM — ${ROUNDS}-ROUND STABILITY TEST`);
console.log("═══════════════════════════════════════════════════════");
console.log("");

test(`New patient form: ${ROUNDS} rounds, one hash`, () => {
  const hashes = stabilityRun(FORM_LINES, ROUNDS);
  assert.equal(hashes.size, 1, `Expected 1 unique hash, got ${hashes.size}`);
});

test(`Mixed lines: ${ROUNDS} rounds, one hash`, () => {
  const hashes = stabilityRun(MIXED_LINES, ROUNDS);
  assert.equal(hashes.size, 1, `Expected 1 unique hash, got ${hashes.size}`);
});

test("Empty document: stable synthetic signature fields", () => {
  const hashes = stabilityRun([], ROUNDS);
  assert.equal(hashes.size, 1);
});

test("Interleaved runs do not share keys", () => {
  const first = convertLines(MIXED_LINES);
  convertLines(FORM_LINES);
  const again = convertLines(MIXED_LINES);
  assert.deepEqual(again.spec, first.spec);
  assert.deepEqual(again.warnings, first.warnings);
});

test("String and structured lines convert alike", () => {
  const structured = MIXED_LINES.map((text, index) => ({ text, index, fromTable: false }));
  assert.equal(specHash(convertLines(structured)), specHash(convertLines(MIXED_LINES)));
});

test("Input array is not mutated", () => {
  const lines = [...MIXED_LINES];
  convertLines(lines);
  assert.deepEqual(lines, MIXED_LINES);
});

// ── Summary ──────────────────────────────────────────────────

console.log("");
console.log("───────────────────────────────────────────────────────");
const passed = results.filter((r) => r.passed).length;
const failed = results.filter((r) => !r.passed).length;
const totalTime = results.reduce((sum, r) => sum + r.duration, 0);

console.log(`  Results: ${passed} passed, ${failed} failed (${totalTime}ms)`);
console.log(`  Rounds per stability test: ${ROUNDS}`);
console.log("───────────────────────────────────────────────────────");

if (failed > 0) {
  console.log("");
  console.log("  DETERMINISM: ✗ FAILED");
  for (const r of results.filter((r) => !r.passed)) {
    console.log(`  FAIL: ${r.name}`);
    console.log(`    → ${r.details}`);
  }
  console.log("");
  process.exit(1);
} else {
  console.log("");
  console.log("  DETERMINISM: ✓ ALL TESTS PASSED");
  console.log("");
}
