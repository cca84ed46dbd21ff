// ─────────────────────────────────────────────────────────────
// HTML / TXT / Markdown Ingest — Plain text & markup ingestion
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import * as cheerio from "cheerio";
import { IngestResult, InputFormat, TextLine } from "../schema/formSchema";

/** Split raw text into trimmed, non-empty lines */
export function textToLines(text: string): TextLine[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .map((line, index) => ({ text: line, index, fromTable: false }));
}

/**
 * Flatten HTML into lines: headings become markdown headings, list
 * items become bullet lines, each table row becomes one table line.
 */
export function htmlToLines(html: string): TextLine[] {
  const $ = cheerio.load(html);
  const lines: TextLine[] = [];
  const push = (text: string, fromTable = false) => {
    const clean = text.replace(/\s+/g, " ").trim();
    if (clean) lines.push({ text: clean, index: lines.length, fromTable });
  };

  $("body")
    .children()
    .each((_, el) => {
      const $el = $(el);
      const tagName = el.tagName.toLowerCase();

      if (/^h[1-6]$/.test(tagName)) {
        push(`${"#".repeat(Number(tagName[1]))} ${$el.text()}`);
      } else if (tagName === "ul" || tagName === "ol") {
        $el.find("li").each((__, li) => push(`• ${$(li).text()}`));
      } else if (tagName === "table") {
        $el.find("tr").each((__, tr) => {
          const cells = $(tr)
            .find("td, th")
            .map((___, cell) => $(cell).text().trim())
            .get()
            .filter((cell) => cell.length > 0);
          push(cells.join(" "), true);
        });
      } else {
        $el.find("br").replaceWith("\n");
        $el
          .text()
          .split("\n")
          .forEach((line) => push(line));
      }
    });

  return lines;
}

/** First heading in markup, else the first line */
function extractTitle(lines: TextLine[], fallback: string): string {
  const heading = lines.find((l) => l.text.startsWith("#"));
  const first = heading ?? lines[0];
  return first ? first.text.replace(/^#+\s*/, "").substring(0, 100) : fallback;
}

/**
 * Ingest a TXT, Markdown or HTML file.
 */
export async function ingestTextBased(filePath: string): Promise<IngestResult> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  const content = fs.readFileSync(filePath, "utf-8");
  const format: InputFormat = ext === ".html" || ext === ".htm" ? "html" : ext === ".txt" ? "txt" : "md";
  const lines = format === "html" ? htmlToLines(content) : textToLines(content);

  return {
    lines,
    format,
    pageCount: 1,
    metadata: {
      title: extractTitle(lines, path.basename(filePath, ext)),
      sourceFile: filePath,
      ingestedAt: new Date().toISOString(),
    },
  };
}
