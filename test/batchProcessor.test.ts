// ─────────────────────────────────────────────────────────────
// Batch Processor Tests
// ─────────────────────────────────────────────────────────────

import { after, describe, it } from "node:test";
import { strict as assert } from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import {
  discoverDocuments,
  DocumentOutcome,
  processBatch,
  summarizeBatch,
  SUMMARY_FILENAME,
  writeBatchSummary,
} from "../batch/batchProcessor";

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "form-batch-"));

for (const name of ["b-intake.txt", "a-consent.docx", "~$a-consent.docx", "notes.png", "nested/c-history.md"]) {
  const file = path.join(tmpDir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, "Occupation ________\n", "utf-8");
}

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const relative = (files: string[]) => files.map((f) => path.relative(tmpDir, f));

describe("discoverDocuments", () => {
  it("finds supported files and skips lock files", () => {
    assert.deepEqual(relative(discoverDocuments(tmpDir)), ["a-consent.docx", "b-intake.txt"]);
  });

  it("walks subdirectories when recursive", () => {
    assert.deepEqual(relative(discoverDocuments(tmpDir, true)), [
      "a-consent.docx",
      "b-intake.txt",
      path.join("nested", "c-history.md"),
    ]);
  });

  it("rejects a missing directory", () => {
    assert.throws(() => discoverDocuments(path.join(tmpDir, "absent")), /Directory not found/);
  });
});

describe("processBatch", () => {
  const convert = async (file: string): Promise<DocumentOutcome> => {
    if (file.endsWith(".docx")) throw new Error("unreadable document");
    return { fieldCount: 3, sectionCount: 2, valid: true, outputPath: "out/b-intake.modento.json" };
  };

  it("records failures and carries on when asked", async () => {
    const result = await processBatch(tmpDir, convert, { continueOnError: true });
    assert.equal(result.total, 2);
    assert.equal(result.succeeded, 1);
    assert.equal(result.failed, 1);
    assert.deepEqual(summarizeBatch(result), [
      { file: "a-consent.docx", success: false, fields: 0, sections: 0, valid: false, output: null, error: "unreadable document" },
      {
        file: "b-intake.txt",
        success: true,
        fields: 3,
        sections: 2,
        valid: true,
        output: "out/b-intake.modento.json",
        error: null,
      },
    ]);
  });

  it("writes the summary file into the output directory", async () => {
    const result = await processBatch(tmpDir, convert, { continueOnError: true });
    const outDir = path.join(tmpDir, "out");
    const summaryPath = writeBatchSummary(result, outDir);
    assert.equal(summaryPath, path.join(outDir, SUMMARY_FILENAME));
    const written: unknown = JSON.parse(fs.readFileSync(summaryPath, "utf-8"));
    assert.deepEqual(written, summarizeBatch(result));
  });

  it("aborts at the first failure by default", async () => {
    await assert.rejects(processBatch(tmpDir, convert), /Batch aborted at a-consent\.docx: unreadable document/);
  });
});
