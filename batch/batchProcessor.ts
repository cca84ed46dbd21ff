// ─────────────────────────────────────────────────────────────
// Batch Processor — Convert every form document in a directory
// ─────────────────────────────────────────────────────────────
//
// Documents are converted one at a time in sorted path order.
// Each outcome is recorded; the run stops at the first failure
// unless continueOnError is set. writeBatchSummary() leaves a
// conversion-summary.json beside the converted specs.
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { isSupportedDocument } from "../ingest";

/** What one document's conversion reports back to the batch */
export interface DocumentOutcome {
  fieldCount: number;
  sectionCount: number;
  valid: boolean;
  outputPath: string;
}

export type BatchEntry =
  | ({ file: string; status: "success"; duration: number } & DocumentOutcome)
  | { file: string; status: "failed"; duration: number; error: string };

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  results: BatchEntry[];
}

export interface BatchOptions {
  recursive?: boolean;
  continueOnError?: boolean;
}

/** One row of conversion-summary.json */
export interface SummaryRecord {
  file: string;
  success: boolean;
  fields: number;
  sections: number;
  valid: boolean;
  output: string | null;
  error: string | null;
}

export const SUMMARY_FILENAME = "conversion-summary.json";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Supported documents under a directory, sorted. Office lock files
 * are skipped; subdirectories only when recursive.
 */
export function discoverDocuments(dir: string, recursive = false): string[] {
  if (!fs.existsSync(dir)) {
    throw new Error(`Directory not found: ${dir}`);
  }

  const found: string[] = [];
  const pending = [dir];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (recursive) pending.push(fullPath);
      } else if (entry.isFile() && isSupportedDocument(fullPath)) {
        found.push(fullPath);
      }
    }
  }
  return found.sort();
}

/**
 * Run a conversion function over every discovered document.
 * Throws `Batch aborted at <file>: <reason>` on the first failure
 * unless continueOnError is set.
 */
export async function processBatch(
  inputDir: string,
  convert: (filePath: string) => Promise<DocumentOutcome>,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const files = discoverDocuments(inputDir, options.recursive);
  const result: BatchResult = { total: files.length, succeeded: 0, failed: 0, results: [] };

  if (files.length === 0) {
    console.log(`[BATCH] No supported documents found in ${inputDir}`);
    return result;
  }
  console.log(`[BATCH] ${files.length} document(s) queued from ${inputDir}`);

  for (const [position, filePath] of files.entries()) {
    const file = path.relative(inputDir, filePath);
    const started = Date.now();
    console.log(`[BATCH] (${position + 1}/${files.length}) ${file}`);

    try {
      const outcome = await convert(filePath);
      const duration = Date.now() - started;
      result.succeeded++;
      result.results.push({ file, status: "success", duration, ...outcome });
      const note = outcome.valid ? "" : " (validation errors)";
      console.log(`[BATCH] ✓ ${file}: ${outcome.fieldCount} fields, ${outcome.sectionCount} section(s)${note}`);
    } catch (err: unknown) {
      const error = errorMessage(err);
      result.failed++;
      result.results.push({ file, status: "failed", duration: Date.now() - started, error });
      console.error(`[BATCH] ✗ ${file}: ${error}`);

      if (!options.continueOnError) {
        throw new Error(`Batch aborted at ${file}: ${error}`);
      }
    }
  }

  return result;
}

/** Flatten batch entries into summary rows */
export function summarizeBatch(result: BatchResult): SummaryRecord[] {
  return result.results.map((entry) =>
    entry.status === "success"
      ? {
          file: entry.file,
          success: true,
          fields: entry.fieldCount,
          sections: entry.sectionCount,
          valid: entry.valid,
          output: entry.outputPath,
          error: null,
        }
      : { file: entry.file, success: false, fields: 0, sections: 0, valid: false, output: null, error: entry.error }
  );
}

/** Write conversion-summary.json into the output directory */
export function writeBatchSummary(result: BatchResult, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const summaryPath = path.join(outputDir, SUMMARY_FILENAME);
  fs.writeFileSync(summaryPath, JSON.stringify(summarizeBatch(result), null, 2) + "\n", "utf-8");
  console.log(`[EXPORT] Batch summary → ${summaryPath}`);
  return summaryPath;
}

/**
 * Print a summary table of batch results.
 */
export function printBatchSummary(result: BatchResult): void {
  console.log("");
  console.log("═══════════════════════════════════════════════════════");
  console.log("  BATCH SUMMARY");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Documents: ${result.total}  converted: ${result.succeeded}  failed: ${result.failed}`);
  console.log("");

  for (const row of summarizeBatch(result)) {
    const status = row.success ? (row.valid ? "ok     " : "invalid") : "failed ";
    const detail = row.success ? `${row.fields} fields / ${row.sections} sections` : row.error;
    console.log(`  ${status}  ${row.file.padEnd(36).substring(0, 36)}  ${detail}`);
  }

  const seconds = result.results.reduce((sum, r) => sum + r.duration, 0) / 1000;
  console.log("");
  console.log(`  Total time: ${seconds.toFixed(1)}s`);
  console.log("");
}
