// ─────────────────────────────────────────────────────────────
// Schema Validator — Final output contract for field records
// ─────────────────────────────────────────────────────────────

import {
  FieldRecord,
  isDateInputType,
  isFieldType,
  isInputType,
  SIGNATURE_SECTION,
  ValidationResult,
} from "../schema/formSchema";

const PRIVATE_USE = /[\uE000-\uF8FF]/g;
const OPTION_TYPES = new Set(["radio", "checkbox", "dropdown"]);
const TEXT_CONTROL_KEYS = ["html_text", "temporary_html_text", "text", "hint"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Remove private-use glyphs and replace typographic quotes with ASCII */
export function cleanText(text: string): string {
  return text
    .replace(PRIVATE_USE, "")
    .replace(/[‘’‚‛]/g, "'")
    .replace(/[“”„‟]/g, '"');
}

function cleanOptions(value: unknown, label: string, errors: string[]): { name: string; value: string | boolean }[] {
  if (!Array.isArray(value)) {
    errors.push(`${label}: control.options must be an array`);
    return [];
  }
  const options: { name: string; value: string | boolean }[] = [];
  value.forEach((option: unknown, i) => {
    if (!isRecord(option) || typeof option.name !== "string") {
      errors.push(`${label}: option ${i} has no name`);
      return;
    }
    const optionValue = option.value;
    if (typeof optionValue !== "string" && typeof optionValue !== "boolean") {
      errors.push(`${label}: option "${option.name}" has an invalid value`);
      return;
    }
    options.push({ name: cleanText(option.name), value: optionValue });
  });
  return options;
}

function normalizeControl(type: string, raw: Record<string, unknown>, label: string, errors: string[]): Record<string, unknown> {
  if (type === "signature" || type === "states") return {};

  const control: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (v === null || v === undefined) continue;
    control[k] = typeof v === "string" && TEXT_CONTROL_KEYS.includes(k) ? cleanText(v) : v;
  }

  if (type === "input" && !isInputType(control.input_type)) {
    errors.push(`${label}: invalid input_type ${JSON.stringify(control.input_type ?? null)}, coerced to "name"`);
    control.input_type = "name";
  }

  if (type === "date" && control.input_type !== undefined && !isDateInputType(control.input_type)) {
    errors.push(`${label}: invalid date input_type ${JSON.stringify(control.input_type)}, removed`);
    delete control.input_type;
  }

  if (OPTION_TYPES.has(type)) {
    control.options = cleanOptions(control.options, label, errors);
  }

  return control;
}

/**
 * Validate and normalize a list of field records. Problems are reported
 * in `errors`; fields are kept (unknown types included) with safe defaults
 * filled in. The input is not mutated.
 */
export function validateSpec(records: readonly unknown[]): ValidationResult {
  const errors: string[] = [];
  const spec: FieldRecord[] = [];
  const seenKeys = new Set<string>();
  let signatures = 0;

  records.forEach((raw, i) => {
    if (!isRecord(raw)) {
      errors.push(`Field ${i}: not an object, skipped`);
      return;
    }

    let key = raw.key;
    if (typeof key !== "string" || key.length === 0) {
      errors.push(`Field ${i}: missing key`);
      key = `field_${i + 1}`;
    }
    const label = `Field "${key}"`;

    let type = raw.type;
    if (typeof type !== "string") {
      errors.push(`${label}: missing type`);
      type = "";
    }
    if (!isFieldType(type)) {
      errors.push(`${label}: unknown type ${JSON.stringify(type)}`);
    }

    let title = raw.title;
    if (typeof title !== "string") {
      errors.push(`${label}: missing title`);
      title = "";
    }

    let section = raw.section;
    if (typeof section !== "string") {
      errors.push(`${label}: missing section`);
      section = SIGNATURE_SECTION;
    }

    let optional = raw.optional;
    if (typeof optional !== "boolean") {
      errors.push(`${label}: missing optional flag`);
      optional = false;
    }

    let rawControl = raw.control;
    if (!isRecord(rawControl)) {
      errors.push(`${label}: missing control`);
      rawControl = {};
    }

    if (seenKeys.has(key)) errors.push(`${label}: duplicate key`);
    seenKeys.add(key);
    if (type === "signature") signatures++;

    spec.push({
      key,
      title: cleanText(title),
      section,
      optional,
      type,
      control: normalizeControl(type, isRecord(rawControl) ? rawControl : {}, label, errors),
    });
  });

  if (signatures !== 1) {
    errors.push(`Expected exactly one signature field, found ${signatures}`);
  }

  return { valid: errors.length === 0, errors, spec };
}
