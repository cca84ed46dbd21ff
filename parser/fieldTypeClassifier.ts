// ─────────────────────────────────────────────────────────────
// Field Type Classifier — Ordered rules from label to field type
// ─────────────────────────────────────────────────────────────

import { DateInputType, FieldOption, FieldType, InputType } from "../schema/formSchema";
import { DEFAULT_PIPELINE_CONFIG } from "../config/pipelineConfig";

export interface ClassifierInput {
  label: string;
  options?: readonly FieldOption[];
  /** The label was followed by an underscore blank */
  hasBlank?: boolean;
  /** The label came from a checkbox/radio glyph run */
  hasGlyph?: boolean;
}

export interface Classification {
  type: FieldType;
  inputType?: InputType;
  dateType?: DateInputType;
  /** Name of the rule that fired */
  rule: string;
}

export interface TypeRule {
  name: string;
  test(input: ClassifierInput): boolean;
  result(input: ClassifierInput): Omit<Classification, "rule">;
}

export interface TextThresholds {
  textLengthThreshold: number;
  consentKeywordMinimum: number;
}

// ── Vocabulary ───────────────────────────────────────────────

const CONSENT_KEYWORDS = [
  "consent", "understand", "acknowledge", "agree", "authorize", "hereby", "risks",
  "complications", "treatment", "procedure", "responsible", "release", "alternatives",
  "benefits", "voluntarily", "informed",
];

const INPUT_KEYWORDS =
  /\bname\b|\baddress\b|\bstreet\b|\bcity\b|\bzip\b|phone|\bmobile\b|\bcell\b|e-?mail|\bssn\b|social\s+security|occupation|employer|employed|insurance|insured|license|\bid\b|\bplan\b|\bgroup\b|relationship|emergency|nickname|\bschool\b|\bapt\b|\bsuite\b/;

const SECTION_VOCAB = /information|history|details|questionnaire|contact|responsible\s+party|minors|children|patient/;

const YES_NO = /^(yes|no)$/i;

function lower(input: ClassifierInput): string {
  return input.label.toLowerCase();
}

function optionCount(input: ClassifierInput): number {
  return input.options?.length ?? 0;
}

/** True when every option is a plain Yes or No */
export function isYesNoOptions(options: readonly FieldOption[] | undefined): boolean {
  return options !== undefined && options.length === 2 && options.every((o) => YES_NO.test(o.name.trim()));
}

/** Distinct consent-paragraph keywords found in the text */
export function countConsentKeywords(text: string): number {
  const lowered = text.toLowerCase();
  return CONSENT_KEYWORDS.filter((kw) => new RegExp(`\\b${kw}`).test(lowered)).length;
}

/** Long prose or a cluster of consent keywords */
export function isConsentText(text: string, thresholds: TextThresholds): boolean {
  return (
    text.trim().length > thresholds.textLengthThreshold ||
    countConsentKeywords(text) >= thresholds.consentKeywordMinimum
  );
}

// ── Subtypes ─────────────────────────────────────────────────

/** Input subtype by keyword, checked in priority order */
export function detectInputType(label: string): InputType {
  const l = label.toLowerCase().trim();
  if (/e-?mail/.test(l)) return "email";
  if (/phone|\bmobile\b|\bcell\b|\bfax\b|^(home|work)$/.test(l)) return "phone";
  if (/\bssn\b|social\s+security|\bss#/.test(l)) return "ssn";
  if (/\bzip\b|postal\s+code/.test(l)) return "zip";
  if (/\binitials?\b|^m\.?i\.?$/.test(l)) return "initials";
  if (/#|\bnumber\b|\bno\.|\bid\b|\blicense\b|\bpolicy\b|\bage\b/.test(l)) return "number";
  return "name";
}

/** Date subtype: past for birth/signing dates, future for expirations */
export function detectDateType(label: string): DateInputType {
  const l = label.toLowerCase();
  if (/birth|\bdob\b|\bborn\b|\bsigned\b/.test(l)) return "past";
  if (/expir|\bnext\b|\bfuture\b|\bappointment\b/.test(l)) return "future";
  return "any";
}

// ── Rule Table ───────────────────────────────────────────────

/** Build the default rule list for the given text thresholds */
export function createTypeRules(thresholds: TextThresholds): readonly TypeRule[] {
  return [
    {
      name: "signature",
      test: (i) => /\bsignature\b/.test(lower(i)) && !/\bdate\b/.test(lower(i)),
      result: () => ({ type: "signature" }),
    },
    {
      name: "date",
      test: (i) => /\bdate\b|\bbirth|\bdob\b|\btoday\b|\bexpiration\b/.test(lower(i)),
      result: (i) => ({ type: "date", dateType: detectDateType(i.label) }),
    },
    {
      name: "initials",
      test: (i) => /\binitials?\b/.test(lower(i)) && !/\b(middle|mi)\s+initial\b/.test(lower(i)),
      result: () => ({ type: "initials" }),
    },
    {
      name: "radio",
      test: (i) =>
        isYesNoOptions(i.options) ||
        /\byes\s*\/\s*no\b|\bmale\s*\/\s*female\b|\b(check|circle|select|choose)\s+one\b/.test(lower(i)) ||
        (i.label.trim().endsWith("?") && optionCount(i) >= 2),
      result: () => ({ type: "radio" }),
    },
    {
      name: "checkbox",
      test: (i) => i.hasGlyph === true || /\b(check|select)\s+all\b|\ball\s+that\s+apply\b/.test(lower(i)),
      result: () => ({ type: "checkbox" }),
    },
    {
      name: "states",
      test: (i) => lower(i).replace(/[^a-z]/g, "") === "state",
      result: () => ({ type: "states" }),
    },
    {
      name: "input-keyword",
      test: (i) => INPUT_KEYWORDS.test(lower(i)),
      result: (i) => ({ type: "input", inputType: detectInputType(i.label) }),
    },
    {
      name: "consent-text",
      test: (i) => isConsentText(i.label, thresholds),
      result: () => ({ type: "text" }),
    },
    {
      name: "header",
      test: (i) =>
        i.hasBlank !== true &&
        i.label.trim().endsWith(":") &&
        i.label.trim().split(/\s+/).length <= 5 &&
        SECTION_VOCAB.test(lower(i)),
      result: () => ({ type: "header" }),
    },
    {
      name: "blank-or-colon",
      test: (i) => i.hasBlank === true || i.label.includes(":"),
      result: (i) => ({ type: "input", inputType: detectInputType(i.label) }),
    },
    {
      name: "fallback-text",
      test: () => true,
      result: () => ({ type: "text" }),
    },
  ];
}

export const DEFAULT_TYPE_RULES: readonly TypeRule[] = createTypeRules(DEFAULT_PIPELINE_CONFIG);

/** Classify a label; the first rule whose test passes wins */
export function classifyField(input: ClassifierInput, rules: readonly TypeRule[] = DEFAULT_TYPE_RULES): Classification {
  for (const rule of rules) {
    if (rule.test(input)) {
      return { ...rule.result(input), rule: rule.name };
    }
  }
  return { type: "text", rule: "none" };
}
