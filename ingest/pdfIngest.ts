// ─────────────────────────────────────────────────────────────
// PDF Ingest — Extract form lines from PDF files
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { IngestResult, TextLine } from "../schema/formSchema";
import { hasFieldMarker } from "../parser/headerFooterFilter";
import { textToLines } from "./htmlIngest";

// pdf-parse v2 exports a class-based API
const { PDFParse } = require("pdf-parse") as {
  PDFParse: new (opts: { data: Buffer | Uint8Array; verbosity?: number }) => {
    getText(opts?: Record<string, unknown>): Promise<{ text: string; total: number; pages: { text: string; num: number }[] }>;
    getInfo(opts?: Record<string, unknown>): Promise<{ total: number; info?: { Title?: string } }>;
    destroy(): Promise<void>;
  };
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Lines printed on every page of a multi-page PDF (running headers and
 * footers). Lines carrying blanks or checkboxes are never counted.
 */
export function repeatedPageLines(pages: readonly string[]): Set<string> {
  if (pages.length < 2) return new Set();
  const [first, ...rest] = pages.map((page) => new Set(textToLines(page).map((l) => l.text)));
  return new Set([...first].filter((line) => !hasFieldMarker(line) && rest.every((page) => page.has(line))));
}

/** Join per-page text into one line list without the running headers */
export function linesFromPages(pages: readonly string[]): TextLine[] {
  const repeated = repeatedPageLines(pages);
  return pages
    .flatMap((page) => textToLines(page))
    .filter((line) => !repeated.has(line.text))
    .map((line, index) => ({ text: line.text, index, fromTable: false }));
}

/**
 * Ingest a PDF file. A PDF without a text layer yields no lines.
 */
export async function ingestPDF(filePath: string): Promise<IngestResult> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`PDF file not found: ${filePath}`);
  }

  const buffer = fs.readFileSync(filePath);
  const parser = new PDFParse({ data: buffer });

  let pages: string[] = [];
  let pageCount = 1;
  let title = "";

  try {
    const textResult = await parser.getText();
    pages = textResult.pages.length > 0 ? textResult.pages.map((p) => p.text) : [textResult.text];
    pageCount = textResult.total;

    try {
      const infoResult = await parser.getInfo();
      title = infoResult.info?.Title || "";
    } catch (err: unknown) {
      console.warn(`[INGEST] PDF info unavailable: ${errorMessage(err)}`);
    }
  } finally {
    await parser.destroy().catch((err: unknown) => {
      console.warn(`[INGEST] PDF parser cleanup failed: ${errorMessage(err)}`);
    });
  }

  const lines = linesFromPages(pages);

  return {
    lines,
    format: "pdf",
    pageCount,
    metadata: {
      title: title || lines[0]?.text.substring(0, 100) || path.basename(filePath, ".pdf"),
      sourceFile: filePath,
      ingestedAt: new Date().toISOString(),
    },
  };
}
