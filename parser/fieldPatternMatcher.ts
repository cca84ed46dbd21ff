// ─────────────────────────────────────────────────────────────
// Field Pattern Matcher — Detect field candidates on a line
// ─────────────────────────────────────────────────────────────

import {
  FieldCandidate,
  FieldOption,
  PatternFamily,
  SectionAssignment,
  TextLine,
} from "../schema/formSchema";
import { LookupTables } from "../config/lookupTables";
import { PipelineConfig } from "../config/pipelineConfig";
import { Classification, classifyField, createTypeRules, TypeRule } from "./fieldTypeClassifier";
import { cleanLabel, slugify } from "./keyNormalizer";
import { applyPlaceholders, escapeHtml, PLACEHOLDER_LABEL } from "./consentBlocks";
import { MEDICAL_HISTORY_SECTION } from "./sectionTracker";

/** How the pipeline should treat the line(s) just matched */
export type LineDisposition = "fields" | "excluded" | "prose" | "none";

export interface MatchResult {
  candidates: FieldCandidate[];
  /** Lines used, counting the current one */
  consumed: number;
  disposition: LineDisposition;
}

// ── Line Vocabulary ──────────────────────────────────────────

export const GLYPH = /[□☐■☑☒❑❏○●◉◯]|\[\s*[xX✓]?\s*\]/;
const GLYPH_GLOBAL = /[□☐■☑☒❑❏○●◉◯]|\[\s*[xX✓]?\s*\]/g;
const BLANK = /_{3,}/;
const BARE_BLANK = /^_{3,}$/;
const BLANK_FILL = /([A-Za-z][^_:]*?)(?:\s*:\s*_{2,}|\s*_{3,})/g;
const INTERROGATIVE = /^(do|does|are|is|have|has|were|was|did|will|would|can|please\s+(check|indicate|mark|list))\b|\b(which|what|how|when|who)\b/i;
const INLINE_CHOICE = /^(.*?)[\s:,-]+([A-Za-z][A-Za-z-]*(?:\s*\/\s*[A-Za-z][A-Za-z-]*)+)\s*(\(\s*check\s+one\s*\))?\s*$/i;
const YES_NO_CHECK_ONE = /^(.*?)[\s:,-]+(yes)\s+(no)\s*\(\s*check\s+one\s*\)\s*$/i;
const INITIALS_AFTER = /^(.+?)\s*_{2,}\s*\(?\s*initials?\s*\)?\s*:?\s*$/i;
const INITIALS_BEFORE = /^_{2,}\s*\(?\s*initials?\s*\)?\s*:?\s+(.+)$/i;
/** Signers other than the patient, in either phrase order ("Signature of Dentist", "Doctor's ...") */
const OTHER_SIGNER =
  /\bsignature\s+of\s+(the\s+)?(treating\s+)?(doctor|dentist|dr\b|physician|provider|clinician|practitioner|witness)|\bdoctor['’]s\b/;

function wordCount(text: string): number {
  const words = text.replace(/_+/g, " ").trim().split(/\s+/);
  return words[0] === "" ? 0 : words.length;
}

function hasGlyph(text: string): boolean {
  return GLYPH.test(text);
}

function startsWithGlyph(text: string): boolean {
  const trimmed = text.trim();
  const match = trimmed.match(GLYPH);
  return match !== null && match.index === 0;
}

/** A line that reads as a question introducing a run of options */
export function isQuestionLike(text: string): boolean {
  const t = text.trim();
  if (!t || BLANK.test(t) || hasGlyph(t)) return false;
  return t.endsWith("?") || t.endsWith(":") || INTERROGATIVE.test(t);
}

/** Plain prose: no blanks, no glyphs, at least a few words */
export function isProseLine(text: string): boolean {
  const t = text.trim();
  return t.length > 0 && !BLANK.test(t) && !hasGlyph(t) && /[A-Za-z]/.test(t);
}

/** Option value: booleans for Yes/No, a slug otherwise */
export function optionValue(name: string): string | boolean {
  const lowered = name.trim().toLowerCase();
  if (lowered === "yes") return true;
  if (lowered === "no") return false;
  return slugify(name);
}

export function toOptions(names: readonly string[]): FieldOption[] {
  const seen = new Set<string>();
  const options: FieldOption[] = [];
  for (const raw of names) {
    const name = cleanLabel(raw).replace(/[.,;]+$/, "").trim();
    if (!name || seen.has(name.toLowerCase())) continue;
    seen.add(name.toLowerCase());
    options.push({ name, value: optionValue(name) });
  }
  return options;
}

/** Split a glyph line into the text before the first glyph and one token per glyph */
export function splitGlyphTokens(text: string): { before: string; tokens: string[] } {
  const parts = text.split(GLYPH_GLOBAL);
  return {
    before: parts[0].trim(),
    tokens: parts.slice(1).map((p) => p.trim()).filter((p) => p.length > 0),
  };
}

// ── Matcher ──────────────────────────────────────────────────

/**
 * Recognizes field patterns one line at a time. Pattern families
 * are tried in priority order; the first that produces wins.
 */
export class FieldPatternMatcher {
  private readonly typeRules: readonly TypeRule[];

  constructor(
    private readonly tables: LookupTables,
    private readonly config: PipelineConfig,
    typeRules?: readonly TypeRule[]
  ) {
    this.typeRules = typeRules ?? createTypeRules(config);
  }

  match(lines: readonly TextLine[], index: number, assignment: SectionAssignment): MatchResult {
    const text = lines[index].text.trim();
    const section = assignment.sections[index] ?? this.config.defaultSection;
    const none: MatchResult = { candidates: [], consumed: 1, disposition: "none" };
    if (!text) return none;

    if (this.isExcludedLine(text)) {
      return { candidates: [], consumed: 1, disposition: "excluded" };
    }

    const families: (() => MatchResult | null)[] = [
      () => this.matchCompound(text, index, section),
      () => this.matchSignatureLine(text, index, section),
      () => this.matchCanonicalQuestion(lines, index, section),
      () => this.matchStandaloneLabel(text, index, section),
      () => this.matchInitialsLine(text, index, section),
      () => this.matchCheckboxRun(lines, index, assignment),
      () => this.matchInlineChoice(text, index, section),
      () => this.matchBlankFill(text, index, section),
      () => this.matchColonLabel(lines, index, section),
    ];

    for (const family of families) {
      const result = family();
      if (result) {
        return {
          ...result,
          candidates: result.candidates.filter((c) => !this.isRejectedCandidate(c)),
        };
      }
    }

    return isProseLine(text) ? { candidates: [], consumed: 1, disposition: "prose" } : none;
  }

  // ── Filters ────────────────────────────────────────────────

  /** Witness, provider and second-signer lines that look like fields */
  isExcludedLine(text: string): boolean {
    const lowered = text.toLowerCase();
    const fieldLike = BLANK.test(text) || text.trim().endsWith(":") || wordCount(text) <= 8;
    if (!fieldLike) return false;
    return this.isOtherSigner(lowered);
  }

  /** Witness and provider wording, matched against lowercased text */
  private isOtherSigner(lowered: string): boolean {
    return (
      /\bwitness/.test(lowered) ||
      OTHER_SIGNER.test(lowered) ||
      this.tables.excludedSignatures.some((p) => lowered.includes(p))
    );
  }

  /** Label-level filters applied to every candidate */
  isRejectedCandidate(candidate: FieldCandidate): boolean {
    if (candidate.type === "text" && candidate.family === "initials-line") return false;

    const label = cleanLabel(candidate.label).toLowerCase();
    const compact = label.replace(/\s+/g, "");
    if (this.tables.stopWords.has(label)) return true;
    if (compact.length > 0 && /^(.)\1*$/.test(compact)) return true;
    if ((label.match(/[a-z]/g) ?? []).length < 2) return true;
    if (this.isOtherSigner(label)) return true;
    if (candidate.family === "colon-label" && this.tables.labelOnlyHeadings.has(label)) return true;
    return false;
  }

  // ── Families ───────────────────────────────────────────────

  private candidate(
    family: PatternFamily,
    label: string,
    lineIndex: number,
    section: string,
    classification: Omit<Classification, "rule">,
    extra: Partial<FieldCandidate> = {}
  ): FieldCandidate {
    return {
      label,
      type: classification.type,
      section,
      lineIndex,
      family,
      inputType: classification.inputType,
      dateType: classification.dateType,
      ...extra,
    };
  }

  private fields(candidates: FieldCandidate[], consumed = 1): MatchResult {
    return { candidates, consumed, disposition: "fields" };
  }

  private matchCompound(text: string, index: number, section: string): MatchResult | null {
    const template = this.tables.compoundTemplates.find((t) => t.pattern.test(text));
    if (!template) return null;
    return this.fields(
      template.fields.map((f) =>
        this.candidate("compound-template", f.title, index, section, { type: f.type, inputType: f.inputType }, {
          key: f.key,
          title: f.title,
        })
      )
    );
  }

  private matchSignatureLine(text: string, index: number, section: string): MatchResult | null {
    const lowered = text.toLowerCase();
    if (!/\bsignature\b/.test(lowered)) return null;
    const fieldLike = BLANK.test(text) || lowered.endsWith(":") || wordCount(text) <= 6;
    if (!fieldLike) return null;

    const signature = this.candidate("signature-line", "Signature", index, section, { type: "signature" }, {
      key: "signature",
      title: "Signature",
    });
    const candidates = [signature];

    const after = lowered.slice(lowered.indexOf("signature") + "signature".length);
    if (/\bdate\b/.test(after)) {
      candidates.push(
        this.candidate("signature-line", "Date Signed", index, section, { type: "date", dateType: "past" }, {
          key: "date_signed",
          title: "Date Signed",
        })
      );
    }
    return this.fields(candidates);
  }

  private matchCanonicalQuestion(lines: readonly TextLine[], index: number, section: string): MatchResult | null {
    const text = lines[index].text.trim();
    const { before } = splitGlyphTokens(text);
    const lead = before.toLowerCase();
    if (!lead) return null;

    const question = this.tables.canonicalQuestions.find((q) => q.patterns.some((p) => p.test(lead)));
    if (!question) return null;

    let consumed = 1;
    while (index + consumed < lines.length && startsWithGlyph(lines[index + consumed].text)) {
      consumed++;
    }

    // Long lines only count as the question when options are marked nearby
    if (wordCount(text) > this.config.proseMinWords) {
      const marked = hasGlyph(text) || consumed > 1 || /\byes\b.*\bno\b/i.test(text.slice(lead.length));
      if (!marked) return null;
    }

    return this.fields(
      [
        this.candidate("canonical-question", question.title, index, section, { type: question.type }, {
          key: question.key,
          title: question.title,
          options: toOptions(question.options),
        }),
      ],
      consumed
    );
  }

  private matchStandaloneLabel(text: string, index: number, section: string): MatchResult | null {
    const match = text.match(/^([^_:]+?)\s*:?\s*(_{2,})?\s*$/);
    if (!match) return null;
    const entry = this.tables.standaloneLabels.get(cleanLabel(match[1]).toLowerCase());
    if (!entry) return null;
    return this.fields([
      this.candidate("standalone-label", entry.title, index, section, entry, {
        key: entry.key,
        title: entry.title,
        allowRepeat: entry.allowRepeat,
      }),
    ]);
  }

  private matchInitialsLine(text: string, index: number, section: string): MatchResult | null {
    const match = text.match(INITIALS_AFTER) ?? text.match(INITIALS_BEFORE);
    if (!match) return null;
    const prose = match[1].trim();
    const initials = this.candidate("initials-line", "Initial", index, section, { type: "initials" }, {
      key: "initials",
      title: "Initial",
    });
    if (wordCount(prose) < 3) return this.fields([initials]);

    const withTokens = applyPlaceholders(prose);
    const block = this.candidate("initials-line", withTokens, index, section, { type: "text" }, {
      key: "text",
      title: "",
      htmlText: `<p>${escapeHtml(withTokens)}</p>`,
    });
    return this.fields([block, initials]);
  }

  private matchCheckboxRun(lines: readonly TextLine[], index: number, assignment: SectionAssignment): MatchResult | null {
    const text = lines[index].text.trim();
    let start = index;
    let question = "";

    if (!hasGlyph(text)) {
      // A question line directly above a run owns that run
      const next = lines[index + 1];
      if (!isQuestionLike(text) || !next || !startsWithGlyph(next.text)) return null;
      question = text;
      start = index + 1;
    }

    const names: string[] = [];
    let end = start;
    while (end < lines.length && hasGlyph(lines[end].text)) {
      const { before, tokens } = splitGlyphTokens(lines[end].text);
      if (end === start && before && !question) question = before;
      else if (end > start && before) break;
      names.push(...tokens);
      end++;
    }
    if (end === start) return null;

    if (!question) question = this.findQuestionAbove(lines, start);

    const section = assignment.sections[index] ?? this.config.defaultSection;
    const options = toOptions(names);
    const consumed = end - index;
    if (options.length === 0) return this.fields([], consumed);

    if (!question && section === MEDICAL_HISTORY_SECTION && options.length >= 4) {
      return this.fields(
        [
          this.candidate("checkbox-run", "Medical History", index, section, { type: "checkbox" }, {
            key: "medical_history",
            title: "Medical History",
            options,
            optional: true,
          }),
        ],
        consumed
      );
    }

    const label = question || "Checklist";
    const classified = classifyField({ label, options, hasGlyph: true }, this.typeRules);
    const type = classified.type === "radio" ? "radio" : "checkbox";
    return this.fields([this.candidate("checkbox-run", label, index, section, { type }, { options })], consumed);
  }

  /** Nearest question-like line within the lookback window */
  private findQuestionAbove(lines: readonly TextLine[], start: number): string {
    const limit = Math.max(0, start - this.config.duplicateContextWindow);
    for (let i = start - 1; i >= limit; i--) {
      if (isQuestionLike(lines[i].text)) return lines[i].text.trim();
    }
    return "";
  }

  private matchInlineChoice(text: string, index: number, section: string): MatchResult | null {
    if (BLANK.test(text) || hasGlyph(text) || wordCount(text) > 20) return null;

    const checkOne = text.match(YES_NO_CHECK_ONE);
    if (checkOne && checkOne[1].trim()) {
      const label = checkOne[1].trim();
      return this.fields([
        this.candidate("inline-choice", label, index, section, { type: "radio" }, { options: toOptions(["Yes", "No"]) }),
      ]);
    }

    const inline = text.match(INLINE_CHOICE);
    if (!inline) return null;
    const label = inline[1].trim();
    const names = inline[2].split("/").map((n) => n.trim());
    if (!label || names.length > 6 || names.some((n) => n.length > 20)) return null;

    return this.fields([
      this.candidate("inline-choice", label, index, section, { type: "radio" }, { options: toOptions(names) }),
    ]);
  }

  private matchBlankFill(text: string, index: number, section: string): MatchResult | null {
    const matches = [...text.matchAll(BLANK_FILL)];
    if (matches.length === 0) return null;

    const labels = matches.map((m) => m[1].trim()).filter((l) => l.length > 0);
    const lastMatch = matches[matches.length - 1];
    const tail = text.slice((lastMatch.index ?? 0) + lastMatch[0].length).trim();
    const hint = /^\(.+\)$/.test(tail) ? tail.slice(1, -1).trim() : undefined;

    // Blanks inside a running sentence belong to consent prose
    const minWords = this.config.proseMinWords;
    const inSentence = wordCount(tail.replace(/\([^)]*\)/g, " ")) >= 2;
    if (
      labels.length === 0 ||
      labels.some((l) => wordCount(l) > minWords) ||
      (wordCount(text) > minWords && inSentence) ||
      labels.every((l) => PLACEHOLDER_LABEL.test(l))
    ) {
      return { candidates: [], consumed: 1, disposition: "prose" };
    }

    return this.fields(
      labels.map((label, i) => {
        const classified = classifyField({ label, hasBlank: true }, this.typeRules);
        const isLast = i === labels.length - 1;
        return this.candidate("blank-fill", label, index, section, classified, isLast && hint ? { hint } : {});
      })
    );
  }

  private matchColonLabel(lines: readonly TextLine[], index: number, section: string): MatchResult | null {
    const text = lines[index].text.trim();
    const next = lines[index + 1];

    let label: string | null = null;
    let consumed = 1;
    const colon = text.match(/^([^_:]{2,60}):$/);
    if (colon) {
      label = colon[1].trim();
      if (next && BARE_BLANK.test(next.text.trim())) consumed = 2;
    } else if (!hasGlyph(text) && !BLANK.test(text) && next && BARE_BLANK.test(next.text.trim()) && wordCount(text) <= 8) {
      label = text;
      consumed = 2;
    }
    if (label === null) return null;

    const classified = classifyField({ label: `${label}:`, hasBlank: consumed === 2 }, this.typeRules);
    const type = classified.type === "text" ? "input" : classified.type;
    const inputType = type === "input" ? classified.inputType ?? "name" : classified.inputType;
    return this.fields(
      [this.candidate("colon-label", label, index, section, { type, inputType, dateType: classified.dateType })],
      consumed
    );
  }
}
