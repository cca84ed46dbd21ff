#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Modento Form Converter — Main Application Controller
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx app.ts <file> [options]
//   npx tsx app.ts --batch ./forms [options]
//   npx tsx app.ts --validate ./output/intake.modento.json
//
// Examples:
//   npx tsx app.ts ./forms/new-patient.pdf
//   npx tsx app.ts ./forms/extraction-consent.docx --output ./specs --report
//   npx tsx app.ts --batch ./forms --recursive --continue-on-error
//   npx tsx app.ts ./forms/intake.txt --template-threshold 0.6 --strict
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { ConversionResult } from "./schema/formSchema";
import { PipelineConfig, resolveConfig } from "./config/pipelineConfig";
import { ingestDocument } from "./ingest";
import { convertLines } from "./parser/formPipeline";
import { validateSpec } from "./parser/schemaValidator";
import { exportSpec, ExportPaths } from "./export/jsonExport";
import { DocumentOutcome, processBatch, printBatchSummary, writeBatchSummary } from "./batch/batchProcessor";

// ── CLI Argument Parsing ─────────────────────────────────────

interface CLIOptions {
  filePath: string;
  batch: string | null;
  validate: string | null;
  outputDir: string;
  recursive: boolean;
  continueOnError: boolean;
  report: boolean;
  strict: boolean;
  config: PipelineConfig;
}

const EXIT_FAILURE = 1;
const EXIT_VALIDATION = 2;

function parseNumberFlag(flag: string, value: string | null, parse: (v: string) => number): number | undefined {
  if (value === null) return undefined;
  const parsed = parse(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`${flag} expects a number (got "${value}")`);
  }
  return parsed;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  // Determine the file path: skip flags and their values
  let filePath = "";
  const flagsWithValues = new Set([
    "--batch", "--validate", "--output", "--template-threshold", "--context-window",
  ]);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (flagsWithValues.has(arg)) i++; // skip the value too
      continue;
    }
    filePath = arg;
    break;
  }

  const overrides: Partial<PipelineConfig> = {};
  const threshold = parseNumberFlag("--template-threshold", getFlag("--template-threshold"), parseFloat);
  if (threshold !== undefined) overrides.templateOverlapThreshold = threshold;
  const contextWindow = parseNumberFlag("--context-window", getFlag("--context-window"), (v) => parseInt(v, 10));
  if (contextWindow !== undefined) overrides.contextWindow = contextWindow;
  if (args.includes("--no-strip-headers")) overrides.stripHeadersFooters = false;

  return {
    filePath,
    batch: getFlag("--batch"),
    validate: getFlag("--validate"),
    outputDir: getFlag("--output") || "./output",
    recursive: args.includes("--recursive"),
    continueOnError: args.includes("--continue-on-error"),
    report: args.includes("--report"),
    strict: args.includes("--strict"),
    config: resolveConfig(overrides),
  };
}

function printHelp(): void {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║         MODENTO FORM CONVERTER v1.0.0                        ║
║         PDF / DOCX intake & consent forms → Modento JSON     ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx app.ts <file> [options]
  npx tsx app.ts --batch <dir> [options]
  npx tsx app.ts --validate <spec.json> [options]

INPUT FORMATS:
  .pdf, .docx, .html, .txt, .md

OPTIONS:
  --output <dir>               Output directory (default: ./output)
  --report                     Also write <name>.report.json
  --strict                     Exit with code 2 when the spec has validation errors
  --batch <dir>                Convert every supported document in a directory
  --recursive                  Include subdirectories in batch mode
  --continue-on-error          Keep going after a failed document in batch mode
                               (batch mode also writes conversion-summary.json)
  --validate <spec.json>       Validate and normalize an existing spec
  --template-threshold <0-1>   Key overlap needed for template ordering (default: 0.5)
  --context-window <n>         Lines on each side used by section rules (default: 10)
  --no-strip-headers           Keep practice header/footer lines
  --help, -h                   Show this help

EXAMPLES:
  npx tsx app.ts ./forms/new-patient.pdf
  npx tsx app.ts ./forms/extraction-consent.docx --output ./specs --report
  npx tsx app.ts --batch ./forms --recursive --continue-on-error
  npx tsx app.ts --validate ./output/new-patient.modento.json --strict
  `);
}

// ── Conversion ───────────────────────────────────────────────

/** Ingest, convert and export one document */
async function convertFile(
  filePath: string,
  options: CLIOptions
): Promise<{ result: ConversionResult; paths: ExportPaths }> {
  const absolutePath = path.resolve(filePath);
  const ingested = await ingestDocument(absolutePath);
  console.log(`[INGEST] ${ingested.lines.length} line(s), ${ingested.pageCount} page(s)`);

  const result = convertLines(ingested.lines, options.config);
  console.log(
    `[CONVERT] ${result.fieldCount} fields in ${result.sectionCount} section(s), ` +
      `${result.orderingMode} order${result.template ? ` (${result.template})` : ""}`
  );
  for (const warning of result.warnings) {
    console.log(`[CONVERT] ⚠ ${warning}`);
  }
  for (const error of result.errors) {
    console.error(`[VALIDATE] ✗ ${error}`);
  }

  const paths = exportSpec(result, options.outputDir, {
    filename: path.basename(absolutePath, path.extname(absolutePath)),
    report: options.report,
    sourceFile: absolutePath,
  });
  return { result, paths };
}

function printResultSummary(filePath: string, result: ConversionResult): void {
  console.log("");
  console.log("═══════════════════════════════════════════════════════");
  console.log("  CONVERSION COMPLETE");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Source:   ${path.basename(filePath)}`);
  console.log(`  Fields:   ${result.fieldCount}`);
  console.log(`  Sections: ${result.sectionCount}`);
  console.log(`  Order:    ${result.orderingMode}${result.template ? ` (${result.template})` : ""}`);
  console.log(`  Valid:    ${result.valid ? "yes" : `no (${result.errors.length} error(s))`}`);
  console.log(`  Warnings: ${result.warnings.length}`);
  console.log("");
}

/** Validate an existing spec file and write the normalized copy */
function runValidate(specPath: string, options: CLIOptions): boolean {
  if (!fs.existsSync(specPath)) {
    throw new Error(`Spec file not found: ${specPath}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(specPath, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Spec file must contain a JSON array: ${specPath}`);
  }

  const validation = validateSpec(parsed);
  console.log(`[VALIDATE] ${path.basename(specPath)}: ${validation.spec.length} field(s)`);
  for (const error of validation.errors) {
    console.error(`[VALIDATE] ✗ ${error}`);
  }
  console.log(`[VALIDATE] ${validation.valid ? "✓ Spec is valid" : `${validation.errors.length} problem(s) found`}`);

  const baseName = path.basename(specPath).replace(/(\.modento)?\.json$/i, "");
  const outputPath = path.join(options.outputDir, `${baseName}.normalized.json`);
  fs.mkdirSync(options.outputDir, { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(validation.spec, null, 2) + "\n", "utf-8");
  console.log(`[EXPORT] Normalized spec → ${outputPath}`);

  return validation.valid;
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs();

  if (options.validate) {
    const valid = runValidate(options.validate, options);
    if (!valid && options.strict) process.exit(EXIT_VALIDATION);
    return;
  }

  if (options.batch) {
    const batch = await processBatch(
      options.batch,
      async (file): Promise<DocumentOutcome> => {
        const { result, paths } = await convertFile(file, options);
        return {
          fieldCount: result.fieldCount,
          sectionCount: result.sectionCount,
          valid: result.valid,
          outputPath: paths.specPath,
        };
      },
      { recursive: options.recursive, continueOnError: options.continueOnError }
    );
    printBatchSummary(batch);
    writeBatchSummary(batch, options.outputDir);
    if (batch.failed > 0) process.exit(EXIT_FAILURE);
    if (options.strict && batch.results.some((r) => r.status === "success" && !r.valid)) {
      process.exit(EXIT_VALIDATION);
    }
    return;
  }

  if (!options.filePath) {
    throw new Error("No input file given. Run with --help for usage.");
  }

  const { result } = await convertFile(options.filePath, options);
  printResultSummary(options.filePath, result);
  if (options.strict && !result.valid) process.exit(EXIT_VALIDATION);
}

// ── Run ──────────────────────────────────────────────────────

main().catch((err: unknown) => {
  console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : String(err));
  process.exit(EXIT_FAILURE);
});
