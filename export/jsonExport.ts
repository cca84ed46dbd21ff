// ─────────────────────────────────────────────────────────────
// JSON Export — Modento spec & conversion report output
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { ConversionResult } from "../schema/formSchema";

export interface ExportOptions {
  filename?: string;
  /** Also write a `<name>.report.json` with errors, warnings and counts */
  report?: boolean;
  sourceFile?: string;
}

export interface ExportPaths {
  specPath: string;
  reportPath: string | null;
}

/**
 * Write the spec array as `<name>.modento.json` (pretty, UTF-8,
 * non-ASCII characters kept as-is).
 */
export function exportSpec(result: ConversionResult, outputDir: string, options: ExportOptions = {}): ExportPaths {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const baseName = sanitizeFilename(options.filename || "form");
  const specPath = path.join(outputDir, `${baseName}.modento.json`);
  fs.writeFileSync(specPath, JSON.stringify(result.spec, null, 2) + "\n", "utf-8");
  console.log(`[EXPORT] Spec → ${specPath}`);

  let reportPath: string | null = null;
  if (options.report) {
    reportPath = path.join(outputDir, `${baseName}.report.json`);
    fs.writeFileSync(reportPath, JSON.stringify(buildReport(result, options.sourceFile), null, 2) + "\n", "utf-8");
    console.log(`[EXPORT] Report → ${reportPath}`);
  }

  return { specPath, reportPath };
}

/** Summary written beside the spec */
export function buildReport(result: ConversionResult, sourceFile?: string) {
  return {
    sourceFile: sourceFile ?? null,
    valid: result.valid,
    formType: result.formType,
    fieldCount: result.fieldCount,
    sectionCount: result.sectionCount,
    orderingMode: result.orderingMode,
    template: result.template,
    errors: result.errors,
    warnings: result.warnings,
  };
}

/** Sanitize filename */
export function sanitizeFilename(name: string): string {
  return (
    name
      .replace(/[^a-zA-Z0-9\s\-_]/g, "")
      .trim()
      .replace(/\s+/g, "-")
      .toLowerCase()
      .substring(0, 80) || "form"
  );
}
