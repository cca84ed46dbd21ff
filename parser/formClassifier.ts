// ─────────────────────────────────────────────────────────────
// Form Classifier — Tell intake, release and consent forms apart
// ─────────────────────────────────────────────────────────────

import { FormType } from "../schema/formSchema";

export interface FormTypeRule {
  name: string;
  type: FormType;
  /** Receives the whole document, lowercased and joined by spaces */
  matches(text: string): boolean;
}

export interface FormClassification {
  type: FormType;
  rule: string;
}

// ── Vocabulary ───────────────────────────────────────────────

const PATIENT_INFO_INDICATORS = [
  "patient name",
  "first name",
  "last name",
  "date of birth",
  "address",
  "phone",
  "insurance",
  "dental plan",
  "emergency contact",
  "marital status",
  "occupation",
  "e-mail",
  "drivers license",
];

const NEW_PATIENT_INDICATORS = [
  "preferred method of contact",
  "marital status",
  "employed by",
  "in case of emergency",
  "is the patient a minor",
];

const RECORDS_RELEASE = [
  /release\s*of\s*(patient\s*)?records/,
  /(medical|dental|patient)\s*records?\s*release/,
  /authorization\s*to\s*release/,
  /consent\s*for\s*release/,
  /select\s*information\s*to\s*be\s*released/,
];
const RECORDS_KEYWORDS = ["release", "authorization", "medical records", "dental records"];

const STRUCTURED_CONSENT = [/informed\s*consent/, /treatment\s*consent/, /procedure\s*consent/];
const CONSENT_KEYWORDS = ["consent", "procedure", "treatment", "risks", "benefits"];

const NARRATIVE_CONSENT = [/risks?\s*and\s*benefits?/, /complications/, /side\s*effects?/];

function countIncluded(text: string, phrases: readonly string[]): number {
  return phrases.filter((p) => text.includes(p)).length;
}

function anyMatch(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some((p) => p.test(text));
}

// ── Rule Table ───────────────────────────────────────────────

/** Ordered form-type rules; first match wins */
export const FORM_TYPE_RULES: readonly FormTypeRule[] = [
  {
    name: "patient-info-vocabulary",
    type: "patient_info",
    matches: (t) => countIncluded(t, PATIENT_INFO_INDICATORS) >= 3,
  },
  {
    name: "records-release",
    type: "records_release",
    matches: (t) => anyMatch(t, RECORDS_RELEASE) && countIncluded(t, RECORDS_KEYWORDS) >= 2,
  },
  {
    name: "structured-consent",
    type: "structured_consent",
    matches: (t) => anyMatch(t, STRUCTURED_CONSENT) && countIncluded(t, CONSENT_KEYWORDS) >= 2,
  },
  {
    name: "narrative-consent",
    type: "narrative_consent",
    matches: (t) => anyMatch(t, NARRATIVE_CONSENT),
  },
  {
    name: "new-patient-vocabulary",
    type: "patient_info",
    matches: (t) => countIncluded(t, NEW_PATIENT_INDICATORS) >= 2,
  },
];

/**
 * Classify a document from its lines. Falls back to `general`
 * when no rule fires.
 */
export function classifyForm(lines: readonly string[], rules: readonly FormTypeRule[] = FORM_TYPE_RULES): FormClassification {
  const text = lines.join(" ").replace(/\s+/g, " ").toLowerCase();
  const hit = rules.find((r) => r.matches(text));
  return hit ? { type: hit.type, rule: hit.name } : { type: "general", rule: "none" };
}

export function isConsentForm(type: FormType): boolean {
  return type === "structured_consent" || type === "narrative_consent";
}

// ── Consent Title ────────────────────────────────────────────

const CONSENT_TITLE_PATTERNS = [/\binformed\s+consent\s+for\s+[^.:]+/i, /\bconsent\s+for\s+[^.:]+/i, /[^.]*\bconsent\b[^.:]*/i];

/**
 * Title of a consent form, e.g. "Informed Consent for Tooth Extraction".
 * Only short lines without blanks are read as titles; the more
 * specific pattern wins over an earlier line.
 */
export function detectConsentTitle(lines: readonly string[], maxWords = 12): string | null {
  const candidates = lines
    .map((line) => line.replace(/^#{1,6}\s+/, "").replace(/[*]+/g, "").trim())
    .filter((line) => line.length > 0 && !/_{2,}/.test(line) && line.split(/\s+/).length <= maxWords);

  for (const pattern of CONSENT_TITLE_PATTERNS) {
    for (const line of candidates) {
      const match = line.match(pattern);
      if (!match) continue;
      const title = match[0].replace(/\s+/g, " ").replace(/[\s:;,-]+$/, "").trim();
      if (title) return title;
    }
  }
  return null;
}
