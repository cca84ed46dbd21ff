// ─────────────────────────────────────────────────────────────
// DOCX Ingest — Extract form lines from Word documents
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import mammoth from "mammoth";
import { IngestResult } from "../schema/formSchema";
import { htmlToLines } from "./htmlIngest";

/**
 * Ingest a DOCX file. mammoth renders it to HTML so headings, lists
 * and table rows survive as line structure.
 */
export async function ingestDOCX(filePath: string): Promise<IngestResult> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`DOCX file not found: ${filePath}`);
  }

  const buffer = fs.readFileSync(filePath);
  const htmlResult = await mammoth.convertToHtml({ buffer });
  for (const message of htmlResult.messages) {
    if (message.type === "error") {
      console.warn(`[INGEST] ${path.basename(filePath)}: ${message.message}`);
    }
  }

  const lines = htmlToLines(htmlResult.value);
  const heading = lines.find((l) => l.text.startsWith("#"));

  return {
    lines,
    format: "docx",
    pageCount: estimatePageCount(lines.map((l) => l.text).join(" ")),
    metadata: {
      title: heading ? heading.text.replace(/^#+\s*/, "") : path.basename(filePath, path.extname(filePath)),
      sourceFile: filePath,
      ingestedAt: new Date().toISOString(),
    },
  };
}

/** Estimate pages from word count (~250 words/page) */
function estimatePageCount(text: string): number {
  const wordCount = text.split(/\s+/).filter((w) => w.length > 0).length;
  return Math.max(1, Math.ceil(wordCount / 250));
}
