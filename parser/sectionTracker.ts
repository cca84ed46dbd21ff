// ─────────────────────────────────────────────────────────────
// Section Tracker — Assign a section label to every line
// ─────────────────────────────────────────────────────────────

import { SectionAssignment, SectionTransition, SIGNATURE_SECTION, TextLine } from "../schema/formSchema";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipelineConfig";

export const PATIENT_SECTION = "Patient Information Form";
export const MINORS_SECTION = "FOR CHILDREN/MINORS ONLY";
export const PRIMARY_PLAN_SECTION = "Primary Dental Plan";
export const SECONDARY_PLAN_SECTION = "Secondary Dental Plan";
export const MEDICAL_HISTORY_SECTION = "Medical History";

/** What a section rule may look at for one line */
export interface SectionContext {
  /** The line, lowercased and trimmed */
  line: string;
  /** Preceding lines within the context window, lowercased */
  before: string;
  /** Preceding and following lines within the context window, lowercased */
  window: string;
  current: string;
}

export interface SectionRule {
  name: string;
  section: string;
  matches(ctx: SectionContext): boolean;
}

export interface SectionTrackerOptions {
  defaultSection?: string;
  contextWindow?: number;
  rules?: readonly SectionRule[];
}

// ── Vocabulary ───────────────────────────────────────────────

const INSURANCE_VOCAB = /\binsurance\b|\bdental\s+plan\b|\bgroup\s+number\b|\bplan\/group\b|\bid\s+number\b|\bname\s+of\s+insured\b|\brelationship\s+to\s+insured\b/;
const MINORS_VOCAB = /\bminors?\b|\bguardian\b|\bcustody\b|\bprimary\s+residence\b|\bname\s+of\s+school\b/;
const SIGNATURE_VOCAB = /\bsignature\b|\bconsent\b|\bpatient\s+responsibilities\b|\bpayment\b|\bscheduling\b|\bauthoriz|\bi\s+agree\b/;

/** Short, question-free lines are the only ones read as explicit headings */
function isHeadingLike(line: string): boolean {
  return line.length > 0 && line.length <= 60 && !line.includes("?") && line.split(/\s+/).length <= 6;
}

function inSignature(ctx: SectionContext): boolean {
  return ctx.current === SIGNATURE_SECTION;
}

// ── Rule Table ───────────────────────────────────────────────

/**
 * Ordered section rules. First match wins: both plan headings come
 * before either insurance vocabulary rule, and the secondary rule sits
 * above the generic one. Inside the primary plan only a line that
 * itself says "secondary" moves to the secondary plan.
 * Vocabulary rules do not fire once the terminal Signature section
 * is reached; explicit headings always do.
 */
export const DEFAULT_SECTION_RULES: readonly SectionRule[] = [
  {
    name: "secondary-plan-heading",
    section: SECONDARY_PLAN_SECTION,
    matches: (p) => isHeadingLike(p.line) && /\bsecondary\s+(dental|insurance)\b|\badditional\s+insurance\b/.test(p.line),
  },
  {
    name: "primary-plan-heading",
    section: PRIMARY_PLAN_SECTION,
    matches: (p) =>
      isHeadingLike(p.line) &&
      /\bprimary\s+(dental|insurance)\b|\bdental\s+benefit\s+plan\b|\binsurance\s+information\b/.test(p.line),
  },
  {
    name: "secondary-plan-vocabulary",
    section: SECONDARY_PLAN_SECTION,
    matches: (p) =>
      !inSignature(p) &&
      INSURANCE_VOCAB.test(p.line) &&
      (/\bsecondary\b/.test(p.line) ||
        (p.current !== PRIMARY_PLAN_SECTION && /\bsecondary\b/.test(p.before)) ||
        p.current === SECONDARY_PLAN_SECTION),
  },
  {
    name: "primary-plan-vocabulary",
    section: PRIMARY_PLAN_SECTION,
    matches: (p) => !inSignature(p) && INSURANCE_VOCAB.test(p.line),
  },
  {
    name: "minors-heading",
    section: MINORS_SECTION,
    matches: (p) =>
      isHeadingLike(p.line) && /children\s*\/\s*minors|\bminors\s+only\b|\bchildren\s+only\b|\bresponsible\s+party\b/.test(p.line),
  },
  {
    name: "minors-vocabulary",
    section: MINORS_SECTION,
    matches: (p) =>
      !inSignature(p) &&
      !/\bsignature\b/.test(p.line) &&
      (MINORS_VOCAB.test(p.line) || (/\bparents?\b/.test(p.line) && /\bminor|\bchildren\b/.test(p.window))),
  },
  {
    name: "medical-history-heading",
    section: MEDICAL_HISTORY_SECTION,
    matches: (p) => isHeadingLike(p.line) && /\b(medical|health|dental)\s+history\b/.test(p.line),
  },
  {
    name: "patient-information-heading",
    section: PATIENT_SECTION,
    matches: (p) => isHeadingLike(p.line) && /^(new\s+)?patient\s+(information|info|demographics)\b/.test(p.line),
  },
  {
    name: "signature",
    section: SIGNATURE_SECTION,
    matches: (p) =>
      SIGNATURE_VOCAB.test(p.line) || (/\binitials?\b/.test(p.line) && !/\b(middle|mi)\s+initial\b/.test(p.line)),
  },
];

const MARKDOWN_HEADING = /^#{1,6}\s+(.+)$/;

/** Text of a markdown heading line, or null */
export function markdownHeading(text: string): string | null {
  const match = text.trim().match(MARKDOWN_HEADING);
  if (!match) return null;
  const heading = match[1].replace(/[*_#]+/g, "").replace(/:\s*$/, "").trim();
  return heading.length > 0 ? heading : null;
}

/**
 * Scan lines in order and assign a section to each.
 * A line never receives a section triggered by a later line.
 */
export function assignSections(lines: readonly TextLine[], options: SectionTrackerOptions = {}): SectionAssignment {
  const rules = options.rules ?? DEFAULT_SECTION_RULES;
  const contextWindow = options.contextWindow ?? DEFAULT_PIPELINE_CONFIG.contextWindow;
  let current = options.defaultSection ?? DEFAULT_PIPELINE_CONFIG.defaultSection;

  const lowered = lines.map((l) => l.text.trim().toLowerCase());
  const sections: string[] = [];
  const transitions: SectionTransition[] = [];

  for (let i = 0; i < lines.length; i++) {
    let next = current;
    let rule = "";

    const heading = markdownHeading(lines[i].text);
    if (heading !== null) {
      next = heading;
      rule = "heading";
    } else {
      const ctx: SectionContext = {
        line: lowered[i],
        before: lowered.slice(Math.max(0, i - contextWindow), i).join(" "),
        window: [
          ...lowered.slice(Math.max(0, i - contextWindow), i),
          ...lowered.slice(i + 1, i + 1 + contextWindow),
        ].join(" "),
        current,
      };
      const hit = rules.find((r) => r.matches(ctx));
      if (hit) {
        next = hit.section;
        rule = hit.name;
      }
    }

    if (next !== current) {
      transitions.push({ lineIndex: i, section: next, rule });
      current = next;
    }
    sections.push(current);
  }

  return { sections, transitions };
}
