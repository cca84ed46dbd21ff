// ─────────────────────────────────────────────────────────────
// Ingest Index — Route a form document to its line reader
// ─────────────────────────────────────────────────────────────

import path from "path";
import { IngestResult, InputFormat } from "../schema/formSchema";
import { ingestPDF } from "./pdfIngest";
import { ingestDOCX } from "./docxIngest";
import { ingestTextBased } from "./htmlIngest";

/** Map file extensions to input formats */
export const EXT_MAP: Readonly<Record<string, InputFormat>> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".html": "html",
  ".htm": "html",
  ".txt": "txt",
  ".md": "md",
  ".markdown": "md",
};

type LineReader = (filePath: string) => Promise<IngestResult>;

const READERS: Record<InputFormat, LineReader> = {
  pdf: ingestPDF,
  docx: ingestDOCX,
  html: ingestTextBased,
  txt: ingestTextBased,
  md: ingestTextBased,
};

/** Input format for a path, or null when the extension is not supported */
export function detectFormat(filePath: string): InputFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  return Object.prototype.hasOwnProperty.call(EXT_MAP, ext) ? EXT_MAP[ext] : null;
}

/** Supported document that is not an Office lock file (`~$name.docx`) */
export function isSupportedDocument(filePath: string): boolean {
  return detectFormat(filePath) !== null && !path.basename(filePath).startsWith("~$");
}

/**
 * Read any supported document into text lines.
 * The extension picks the reader; unknown extensions throw.
 */
export async function ingestDocument(filePath: string): Promise<IngestResult> {
  const format = detectFormat(filePath);
  if (!format) {
    const ext = path.extname(filePath).toLowerCase();
    throw new Error(
      `Unsupported file format: ${ext || "(none)"}\nSupported: ${Object.keys(EXT_MAP).join(", ")}`
    );
  }

  console.log(`[INGEST] Processing ${path.basename(filePath)} as ${format.toUpperCase()}...`);
  const result = await READERS[format](filePath);
  if (result.lines.length === 0) {
    console.warn(`[INGEST] ${path.basename(filePath)}: no text extracted`);
  }
  return result;
}

export { ingestPDF, ingestDOCX, ingestTextBased };
