// ─────────────────────────────────────────────────────────────
// Form Pipeline — Text lines in, validated field spec out
// ─────────────────────────────────────────────────────────────
//
// Stages: header/footer filter → sections and form type → pattern matching,
// classification and key normalization (with duplicate
// filtering) → ordering → signature / date-signed rules →
// key uniqueness → wire records → schema validation.
//
// Data-quality problems are returned as errors/warnings; the
// only throw is for an invalid configuration.
//
// ─────────────────────────────────────────────────────────────

import { ConversionResult, FieldCandidate, FormField, TextLine, toRecord } from "../schema/formSchema";
import { PipelineConfig, resolveConfig } from "../config/pipelineConfig";
import { getLookupTables, LookupTables } from "../config/lookupTables";
import { filterTextLines } from "./headerFooterFilter";
import { assignSections } from "./sectionTracker";
import { FieldPatternMatcher } from "./fieldPatternMatcher";
import { detectDateType, detectInputType } from "./fieldTypeClassifier";
import { ensureUniqueKeys, KeyNormalizer, KeyRegistry } from "./keyNormalizer";
import { escapeHtml, ProseBuffer } from "./consentBlocks";
import { ensureDateSigned, ensureSignature, orderFields } from "./fieldOrdering";
import { validateSpec } from "./schemaValidator";
import { classifyForm, detectConsentTitle, isConsentForm } from "./formClassifier";

/** One per form: repeats are dropped, never suffixed */
const SIGNER_KEYS: ReadonlySet<string> = new Set(["signature", "date_signed"]);

/** Accept raw strings or already-structured lines */
export function toTextLines(input: readonly (TextLine | string)[]): TextLine[] {
  return input.map((line, index) =>
    typeof line === "string"
      ? { text: line.trim(), index, fromTable: false }
      : { text: line.text.trim(), index, fromTable: line.fromTable }
  );
}

/** Turn a normalized candidate into a typed field */
export function buildField(candidate: FieldCandidate, key: string, title: string): FormField {
  const base = {
    key,
    title,
    section: candidate.section,
    optional: candidate.optional ?? /\boptional\b|\bif\s+any\b/i.test(candidate.label),
    lineIndex: candidate.lineIndex,
  };
  const hint = candidate.hint !== undefined ? { hint: candidate.hint } : {};

  switch (candidate.type) {
    case "date":
      return { ...base, type: "date", control: { input_type: candidate.dateType ?? detectDateType(candidate.label), ...hint } };
    case "radio":
    case "checkbox":
    case "dropdown":
      if (candidate.options && candidate.options.length > 0) {
        return { ...base, type: candidate.type, control: { options: candidate.options, ...hint } };
      }
      return { ...base, type: "input", control: { input_type: detectInputType(candidate.label), ...hint } };
    case "states":
      return { ...base, type: "states", control: {} };
    case "signature":
      return { ...base, type: "signature", control: {} };
    case "header":
      return { ...base, type: "header", control: {} };
    case "initials":
      return { ...base, type: "initials", control: { ...hint } };
    case "text": {
      const html = candidate.htmlText ?? `<p>${escapeHtml(candidate.label)}</p>`;
      return { ...base, type: "text", control: { html_text: html, temporary_html_text: html, text: candidate.label } };
    }
    case "input":
      return {
        ...base,
        type: "input",
        control: { input_type: candidate.inputType ?? detectInputType(candidate.label), ...hint },
      };
  }
}

/**
 * Convert one document's lines into a Modento Forms spec.
 * Holds no state between calls.
 */
export function convertLines(
  input: readonly (TextLine | string)[],
  overrides: Partial<PipelineConfig> = {},
  tables: LookupTables = getLookupTables()
): ConversionResult {
  const config = resolveConfig(overrides);
  const warnings: string[] = [];

  const structured = toTextLines(input);
  const lines = config.stripHeadersFooters
    ? filterTextLines(structured)
    : toTextLines(structured.filter((l) => l.text.length > 0));

  const assignment = assignSections(lines, {
    defaultSection: config.defaultSection,
    contextWindow: config.contextWindow,
  });
  const transitionLines = new Set(assignment.transitions.map((t) => t.lineIndex));

  const texts = lines.map((l) => l.text);
  const form = classifyForm(texts);
  // Consent forms file their prose under the form's own title
  const consentSection = isConsentForm(form.type) ? detectConsentTitle(texts) : null;

  const matcher = new FieldPatternMatcher(tables, config);
  const normalizer = new KeyNormalizer(tables);
  const accepted = new KeyRegistry();
  const prose = new ProseBuffer(config, tables.excludedSignatures);
  const fields: FormField[] = [];

  const lookback = (index: number): string =>
    lines
      .slice(Math.max(0, index - config.duplicateContextWindow), index + 1)
      .map((l) => l.text.toLowerCase())
      .join(" ");

  const accept = (candidate: FieldCandidate) => {
    const title = candidate.title ?? normalizer.normalizeTitle(candidate.label);
    const context = lookback(candidate.lineIndex);
    const baseKey = candidate.key ?? normalizer.baseKey(title);
    let key = normalizer.qualifyKey(baseKey, candidate.section, context);

    if (accepted.has(key)) {
      const allowed =
        !SIGNER_KEYS.has(baseKey) &&
        (candidate.allowRepeat === true ||
          tables.repeatableKeys.has(baseKey) ||
          tables.duplicateAllowanceContexts.some((c) => context.includes(c)));
      if (!allowed) {
        warnings.push(`Line ${candidate.lineIndex + 1}: duplicate field "${key}" skipped`);
        return;
      }
      key = accepted.claim(key);
    } else {
      accepted.reserve(key);
    }

    fields.push(buildField(candidate, key, title));
  };

  const flushProse = () => {
    const block = prose.flush();
    if (!block) return;
    accept({
      label: block.text,
      type: "text",
      section: consentSection ?? assignment.sections[block.lineIndex] ?? config.defaultSection,
      lineIndex: block.lineIndex,
      family: "text-block",
      key: "text",
      title: "",
      htmlText: block.html,
    });
  };

  let i = 0;
  while (i < lines.length) {
    const result = matcher.match(lines, i, assignment);
    const consumed = Math.max(1, result.consumed);
    // A short line that moved the section is its heading, not content
    const shortLine = lines[i].text.split(/\s+/).length < config.proseMinWords;
    const headingOnly =
      transitionLines.has(i) &&
      ((shortLine && (result.disposition === "prose" || result.disposition === "none")) ||
        (result.candidates.length > 0 && result.candidates.every((c) => c.family === "colon-label")));

    if (result.disposition === "excluded") {
      warnings.push(`Line ${i + 1}: excluded "${lines[i].text}"`);
    } else if (headingOnly) {
      flushProse();
    } else if (result.disposition === "prose") {
      prose.push(lines[i].text, i);
    } else if (result.disposition === "fields") {
      flushProse();
      result.candidates.forEach(accept);
    }
    i += consumed;
  }
  flushProse();

  const ordered = orderFields(fields, tables.orderingTemplates, config.templateOverlapThreshold);
  if (!ordered.fields.some((f) => f.type === "signature")) {
    warnings.push("No signature line found; added a signature field");
  }
  const signed = ensureSignature(ordered.fields);
  if (!signed.some((f) => f.key === "date_signed")) {
    warnings.push("No date-signed field found; added one after the signature");
  }
  const unique = ensureUniqueKeys(ensureDateSigned(signed), new KeyRegistry());

  const validation = validateSpec(unique.map(toRecord));
  return {
    spec: validation.spec,
    valid: validation.valid,
    errors: validation.errors,
    warnings,
    orderingMode: ordered.mode,
    template: ordered.template,
    formType: form.type,
    fieldCount: validation.spec.length,
    sectionCount: new Set(validation.spec.map((r) => r.section)).size,
  };
}
