// ─────────────────────────────────────────────────────────────
// Header/Footer Filter — Strip practice boilerplate lines
// ─────────────────────────────────────────────────────────────

import { TextLine } from "../schema/formSchema";

/** Boilerplate that shows up in letterheads and page footers */
const BOILERPLATE_PATTERNS: { name: string; pattern: RegExp; maxLength?: number }[] = [
  { name: "phone", pattern: /\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]\d{4}\b/ },
  { name: "email", pattern: /\S+@\S+\.(com|org|net|edu|us)\b/i },
  { name: "website", pattern: /\bwww\.|https?:\/\//i },
  {
    name: "street-address",
    pattern: /\b\d+\s+[A-Za-z][A-Za-z.\s]*\b(street|st|avenue|ave|road|rd|drive|dr|lane|ln|blvd|boulevard|suite|ste)\b/i,
    maxLength: 80,
  },
  { name: "city-state-zip", pattern: /\b[A-Za-z][A-Za-z.\s]*,\s*[A-Z]{2}\s+\d{5}(-\d{4})?\b/, maxLength: 80 },
  { name: "page-number", pattern: /^page\s+\d+(\s+of\s+\d+)?$|\bpage\s+\d+\s+of\s+\d+\b/i },
  { name: "copyright", pattern: /©|\bcopyright\b|\ball\s+rights\s+reserved\b/i },
  { name: "revision", pattern: /\brev(ised|ision|\.)?\s*:?\s*\d{1,2}[/.-]\d{2,4}\b|\bform\s*(id|number|version|#)\s*:?\s*\S*\d/i },
  { name: "version", pattern: /^(version|v)\s*\d+(\.\d+)*$|^confidential$/i },
  {
    name: "practice-name",
    pattern:
      /^(?!.*\b(consent|treatment|history|patient)\b).*\b(dental\s+(office|group|care|associates|center|clinic)|(family|cosmetic|implant|general)\s+dentistry|orthodontics|endodontics|periodontics|oral\s+surgery)\b/i,
    maxLength: 60,
  },
];

/** Letterhead patterns that can share a line with the form's title */
const CONTACT_PATTERNS = new Set(["phone", "email", "website"]);

const CONSENT_TITLE = /\binformed\s+consent\b.*$/i;

/** Fill-in blanks and checkbox glyphs mark a line as form content */
const FIELD_MARKER = /_{3,}|[□☐■☑☒❑❏○●◉◯]|\[\s?\]/;

/** Blank or checkbox glyph on the line */
export function hasFieldMarker(text: string): boolean {
  return FIELD_MARKER.test(text);
}

/**
 * Return the name of the boilerplate pattern a line matches, or null
 * when the line is form content.
 */
export function matchBoilerplate(text: string): string | null {
  const line = text.trim();
  if (line.length === 0) return "empty";
  if (hasFieldMarker(line)) return null;
  if (!/[A-Za-z]/.test(line)) return "no-letters";

  for (const { name, pattern, maxLength } of BOILERPLATE_PATTERNS) {
    if (maxLength !== undefined && line.length > maxLength) continue;
    if (pattern.test(line)) return name;
  }
  return null;
}

/**
 * The part of a line worth keeping: the whole line, the consent title
 * that follows a website or phone number, or null for boilerplate.
 */
export function keepPart(text: string): string | null {
  const line = text.trim();
  const match = matchBoilerplate(line);
  if (match === null) return line;
  if (!CONTACT_PATTERNS.has(match)) return null;

  const title = CONSENT_TITLE.exec(line);
  return title && title.index > 0 ? title[0].trim() : null;
}

/** Drop practice headers, footers and empty lines */
export function removeHeadersFooters(lines: string[]): string[] {
  return lines.flatMap((line) => {
    const kept = keepPart(line);
    return kept === null ? [] : [kept];
  });
}

/**
 * Filter extracted lines and renumber the survivors so indices stay
 * dense and monotonic.
 */
export function filterTextLines(lines: readonly TextLine[]): TextLine[] {
  const survivors: TextLine[] = [];
  for (const line of lines) {
    const kept = keepPart(line.text);
    if (kept !== null) survivors.push({ text: kept, index: survivors.length, fromTable: line.fromTable });
  }
  return survivors;
}
