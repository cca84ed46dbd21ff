// ─────────────────────────────────────────────────────────────
// Consent Blocks — Buffer prose lines into `text` fields
// ─────────────────────────────────────────────────────────────

import { TextThresholds, isConsentText } from "./fieldTypeClassifier";
import { normalizeQuotes } from "./keyNormalizer";

/** Blank → template token substitutions, applied in order */
export const PLACEHOLDER_RULES: readonly { pattern: RegExp; replacement: string }[] = [
  { pattern: /\bDr\.?\s*_{2,}/gi, replacement: "Dr. {{provider}}" },
  { pattern: /\bI,?\s*_{2,}\s*(\(\s*print\s+name\s*\))?/gi, replacement: "I, {{patient_name}}" },
  { pattern: /\bPatient(?:'s)?\s+Name\s*:?\s*_{2,}/gi, replacement: "Patient Name: {{patient_name}}" },
  { pattern: /\bDOB\s*:?\s*_{2,}/gi, replacement: "DOB: {{patient_dob}}" },
  { pattern: /\bDate\s+of\s+Birth\s*:?\s*_{2,}/gi, replacement: "Date of Birth: {{patient_dob}}" },
  { pattern: /\bTooth\s*(?:Number|No\.?|#)\s*:?\s*_{2,}/gi, replacement: "Tooth Number: {{tooth_or_site}}" },
  { pattern: /\bPlanned\s+Procedure\s*:?\s*_{2,}/gi, replacement: "Planned Procedure: {{planned_procedure}}" },
  { pattern: /\bDiagnosis\s*:?\s*_{2,}/gi, replacement: "Diagnosis: {{diagnosis}}" },
  { pattern: /\bAlternative\s+Treatment\s*:?\s*_{2,}/gi, replacement: "Alternative Treatment: {{alternative_treatment}}" },
  { pattern: /\bToday'?s\s+Date\s*:?\s*_{2,}/gi, replacement: "Today's Date: {{today_date}}" },
];

/** Blank-fill labels that belong inside consent prose rather than the field list */
export const PLACEHOLDER_LABEL = /^(dr\.?|i,?|tooth\s*(number|no\.?|#)|planned\s+procedure|diagnosis|alternative\s+treatment)$/i;

const BULLET = /^\s*[•\-*▪]\s+/;
const SENTENCE_END = /[.!?:]["')]?$/;
const WITNESS = /\bwitness/i;

export interface TextBlock {
  html: string;
  text: string;
}

export function applyPlaceholders(line: string): string {
  return PLACEHOLDER_RULES.reduce((text, rule) => text.replace(rule.pattern, rule.replacement), normalizeQuotes(line));
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Drop sentences that refer to a witness or a second signer */
export function removeExcludedSentences(text: string, excludedPhrases: readonly string[]): string {
  return text
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => {
      const lowered = sentence.toLowerCase();
      return !WITNESS.test(sentence) && !excludedPhrases.some((p) => lowered.includes(p));
    })
    .join(" ")
    .trim();
}

/**
 * Format buffered prose lines as HTML paragraphs and lists.
 * Returns null when nothing survives sentence exclusion.
 */
export function buildTextBlock(lines: readonly string[], excludedPhrases: readonly string[]): TextBlock | null {
  const html: string[] = [];
  const plain: string[] = [];
  let paragraph: string[] = [];
  let items: string[] = [];

  const flushParagraph = () => {
    const text = removeExcludedSentences(paragraph.join(" "), excludedPhrases);
    if (text) {
      html.push(`<p>${escapeHtml(text)}</p>`);
      plain.push(text);
    }
    paragraph = [];
  };
  const flushList = () => {
    if (items.length > 0) {
      html.push(`<ul>${items.map((item) => `<li>${escapeHtml(item)}</li>`).join("")}</ul>`);
      plain.push(...items);
    }
    items = [];
  };

  for (const raw of lines) {
    const line = applyPlaceholders(raw.trim());
    if (!line) continue;

    if (BULLET.test(line)) {
      flushParagraph();
      const item = removeExcludedSentences(line.replace(BULLET, ""), excludedPhrases);
      if (item) items.push(item);
      continue;
    }

    flushList();
    paragraph.push(line);
    if (SENTENCE_END.test(line)) flushParagraph();
  }
  flushParagraph();
  flushList();

  if (html.length === 0) return null;
  return { html: html.join(""), text: plain.join(" ") };
}

/** Accumulates contiguous prose lines until a field line or heading closes the block */
export class ProseBuffer {
  private lines: string[] = [];
  private start = -1;

  constructor(private readonly thresholds: TextThresholds, private readonly excludedPhrases: readonly string[]) {}

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /** Line index of the first buffered line */
  get startIndex(): number {
    return this.start;
  }

  push(text: string, lineIndex: number): void {
    if (this.lines.length === 0) this.start = lineIndex;
    this.lines.push(text);
  }

  /**
   * Close the block. Returns the formatted block when it reads as
   * consent text, null when it is too slight to keep.
   */
  flush(): (TextBlock & { lineIndex: number }) | null {
    const lines = this.lines;
    const lineIndex = this.start;
    this.lines = [];
    this.start = -1;
    if (lines.length === 0) return null;

    const block = buildTextBlock(lines, this.excludedPhrases);
    if (!block || !isConsentText(block.text, this.thresholds)) return null;
    return { ...block, lineIndex };
  }
}
