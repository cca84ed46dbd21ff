// ─────────────────────────────────────────────────────────────
// Lookup Tables — Read-only data tables for the form pipeline
// ─────────────────────────────────────────────────────────────
//
// Tables live in data/*.json. They are loaded once, checked by
// hand-written guards, frozen, and handed to each component's
// constructor. Tests build their own with createLookupTables().
//
// ─────────────────────────────────────────────────────────────

import {
  DateInputType,
  FieldType,
  InputType,
  isDateInputType,
  isFieldType,
  isInputType,
} from "../schema/formSchema";
import titleSynonymsData from "../data/titleSynonyms.json";
import canonicalKeysData from "../data/canonicalKeys.json";
import keyNumberingData from "../data/keyNumbering.json";
import canonicalQuestionsData from "../data/canonicalQuestions.json";
import standaloneLabelsData from "../data/standaloneLabels.json";
import compoundTemplatesData from "../data/compoundTemplates.json";
import stopWordsData from "../data/stopWords.json";
import newPatientTemplateData from "../data/templates/new-patient-form.json";

// ── Table Types ──────────────────────────────────────────────

/** Section/context-qualified key renumbering (e.g. city → city_2 under a work address) */
export interface KeyNumberingRule {
  section?: string;
  context?: string;
  keys: Readonly<Record<string, string>>;
}

/** A known question with a fixed title, key and option set */
export interface CanonicalQuestion {
  key: string;
  title: string;
  type: "radio" | "checkbox";
  patterns: readonly RegExp[];
  options: readonly string[];
}

/** A label whose whole text maps to a fixed field */
export interface StandaloneLabel {
  label: string;
  key: string;
  title: string;
  type: FieldType;
  inputType?: InputType;
  dateType?: DateInputType;
  /** Repeats get a numeric suffix instead of being rejected as duplicates */
  allowRepeat: boolean;
}

export interface TemplateField {
  key: string;
  title: string;
  type: FieldType;
  inputType?: InputType;
}

/** A multi-field physical line layout matched as a whole */
export interface CompoundTemplate {
  name: string;
  pattern: RegExp;
  fields: readonly TemplateField[];
}

/** A canonical key order for a previously seen form */
export interface OrderingTemplate {
  name: string;
  order: readonly string[];
}

export interface LookupTables {
  titleSynonyms: ReadonlyMap<string, string>;
  canonicalKeys: ReadonlyMap<string, string>;
  keyNumbering: readonly KeyNumberingRule[];
  canonicalQuestions: readonly CanonicalQuestion[];
  standaloneLabels: ReadonlyMap<string, StandaloneLabel>;
  compoundTemplates: readonly CompoundTemplate[];
  stopWords: ReadonlySet<string>;
  labelOnlyHeadings: ReadonlySet<string>;
  excludedSignatures: readonly string[];
  duplicateAllowanceContexts: readonly string[];
  repeatableKeys: ReadonlySet<string>;
  orderingTemplates: readonly OrderingTemplate[];
}

/** Raw (JSON-shaped) input for createLookupTables */
export interface LookupTablesSource {
  titleSynonyms: unknown;
  canonicalKeys: unknown;
  keyNumbering: unknown;
  canonicalQuestions: unknown;
  standaloneLabels: unknown;
  compoundTemplates: unknown;
  stopWords: unknown;
  orderingTemplates: unknown;
}

// ── Guards ───────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === "string");
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function fail(table: string, index: number | string, reason: string): never {
  throw new Error(`Invalid lookup table "${table}" at ${index}: ${reason}`);
}

function compile(table: string, index: number, source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(table, index, `bad pattern ${JSON.stringify(source)} (${message})`);
  }
}

function lowerKeyedMap(table: string, value: unknown): Map<string, string> {
  if (!isStringRecord(value)) fail(table, "root", "expected an object of strings");
  return new Map(Object.entries(value).map(([k, v]) => [k.toLowerCase(), v]));
}

function parseKeyNumbering(value: unknown): KeyNumberingRule[] {
  if (!Array.isArray(value)) fail("keyNumbering", "root", "expected an array");
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) fail("keyNumbering", i, "expected an object");
    const { section, context, keys } = entry;
    if (!optionalString(section) || !optionalString(context)) {
      fail("keyNumbering", i, "section/context must be strings");
    }
    if (!isStringRecord(keys)) fail("keyNumbering", i, "keys must map strings to strings");
    return Object.freeze({ section, context, keys: Object.freeze({ ...keys }) });
  });
}

function parseCanonicalQuestions(value: unknown): CanonicalQuestion[] {
  if (!Array.isArray(value)) fail("canonicalQuestions", "root", "expected an array");
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) fail("canonicalQuestions", i, "expected an object");
    const { key, title, type, patterns, options } = entry;
    if (typeof key !== "string" || typeof title !== "string") {
      fail("canonicalQuestions", i, "key and title are required");
    }
    if (type !== "radio" && type !== "checkbox") fail("canonicalQuestions", i, `bad type ${String(type)}`);
    if (!isStringArray(patterns) || patterns.length === 0) fail("canonicalQuestions", i, "patterns required");
    if (!isStringArray(options) || options.length < 2) fail("canonicalQuestions", i, "at least two options required");
    return Object.freeze({
      key,
      title,
      type,
      patterns: Object.freeze(patterns.map((p) => compile("canonicalQuestions", i, p))),
      options: Object.freeze([...options]),
    });
  });
}

function parseStandaloneLabels(value: unknown): Map<string, StandaloneLabel> {
  if (!Array.isArray(value)) fail("standaloneLabels", "root", "expected an array");
  const map = new Map<string, StandaloneLabel>();
  value.forEach((entry: unknown, i) => {
    if (!isRecord(entry)) fail("standaloneLabels", i, "expected an object");
    const { label, key, title, type, inputType, dateType, allowRepeat } = entry;
    if (typeof label !== "string" || typeof key !== "string" || typeof title !== "string") {
      fail("standaloneLabels", i, "label, key and title are required");
    }
    if (!isFieldType(type)) fail("standaloneLabels", i, `bad type ${String(type)}`);
    if (inputType !== undefined && !isInputType(inputType)) fail("standaloneLabels", i, "bad inputType");
    if (dateType !== undefined && !isDateInputType(dateType)) fail("standaloneLabels", i, "bad dateType");
    if (allowRepeat !== undefined && typeof allowRepeat !== "boolean") fail("standaloneLabels", i, "allowRepeat must be boolean");
    map.set(
      label.toLowerCase(),
      Object.freeze({ label, key, title, type, inputType, dateType, allowRepeat: allowRepeat === true })
    );
  });
  return map;
}

function parseCompoundTemplates(value: unknown): CompoundTemplate[] {
  if (!Array.isArray(value)) fail("compoundTemplates", "root", "expected an array");
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) fail("compoundTemplates", i, "expected an object");
    const { name, pattern, fields } = entry;
    if (typeof name !== "string" || typeof pattern !== "string") {
      fail("compoundTemplates", i, "name and pattern are required");
    }
    if (!Array.isArray(fields) || fields.length === 0) fail("compoundTemplates", i, "fields required");
    const parsed = fields.map((field: unknown): TemplateField => {
      if (!isRecord(field)) fail("compoundTemplates", i, "field must be an object");
      const { key, title, type, inputType } = field;
      if (typeof key !== "string" || typeof title !== "string" || !isFieldType(type)) {
        fail("compoundTemplates", i, "field needs key, title and a known type");
      }
      if (inputType !== undefined && !isInputType(inputType)) fail("compoundTemplates", i, "bad inputType");
      return Object.freeze({ key, title, type, inputType });
    });
    return Object.freeze({
      name,
      pattern: compile("compoundTemplates", i, pattern),
      fields: Object.freeze(parsed),
    });
  });
}

function parseOrderingTemplates(value: unknown): OrderingTemplate[] {
  if (!Array.isArray(value)) fail("orderingTemplates", "root", "expected an array");
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) fail("orderingTemplates", i, "expected an object");
    const { name, order } = entry;
    if (typeof name !== "string" || !isStringArray(order)) {
      fail("orderingTemplates", i, "name and order are required");
    }
    return Object.freeze({ name, order: Object.freeze([...order]) });
  });
}

function lowerSet(table: string, value: unknown): Set<string> {
  if (!isStringArray(value)) fail("stopWords", table, "expected an array of strings");
  return new Set(value.map((v) => v.toLowerCase()));
}

// ── Construction ─────────────────────────────────────────────

/**
 * Validate raw table data and build a frozen LookupTables.
 * Throws when any table is malformed.
 */
export function createLookupTables(source: LookupTablesSource): LookupTables {
  const stop = source.stopWords;
  if (!isRecord(stop)) fail("stopWords", "root", "expected an object");
  const excluded = stop.excludedSignatures;
  const contexts = stop.duplicateAllowanceContexts;
  if (!isStringArray(excluded)) fail("stopWords", "excludedSignatures", "expected an array of strings");
  if (!isStringArray(contexts)) fail("stopWords", "duplicateAllowanceContexts", "expected an array of strings");

  return Object.freeze({
    titleSynonyms: lowerKeyedMap("titleSynonyms", source.titleSynonyms),
    canonicalKeys: lowerKeyedMap("canonicalKeys", source.canonicalKeys),
    keyNumbering: Object.freeze(parseKeyNumbering(source.keyNumbering)),
    canonicalQuestions: Object.freeze(parseCanonicalQuestions(source.canonicalQuestions)),
    standaloneLabels: parseStandaloneLabels(source.standaloneLabels),
    compoundTemplates: Object.freeze(parseCompoundTemplates(source.compoundTemplates)),
    stopWords: lowerSet("stopWords", stop.stopWords),
    labelOnlyHeadings: lowerSet("labelOnlyHeadings", stop.labelOnlyHeadings),
    excludedSignatures: Object.freeze(excluded.map((s) => s.toLowerCase())),
    duplicateAllowanceContexts: Object.freeze(contexts.map((s) => s.toLowerCase())),
    repeatableKeys: lowerSet("repeatableKeys", stop.repeatableKeys),
    orderingTemplates: Object.freeze(parseOrderingTemplates(source.orderingTemplates)),
  });
}

/** The tables shipped in data/ */
export const DEFAULT_TABLE_SOURCE: LookupTablesSource = {
  titleSynonyms: titleSynonymsData,
  canonicalKeys: canonicalKeysData,
  keyNumbering: keyNumberingData,
  canonicalQuestions: canonicalQuestionsData,
  standaloneLabels: standaloneLabelsData,
  compoundTemplates: compoundTemplatesData,
  stopWords: stopWordsData,
  orderingTemplates: [newPatientTemplateData],
};

let defaultTables: LookupTables | null = null;

/** Get the shipped tables, loading and validating them on first use */
export function getLookupTables(): LookupTables {
  if (!defaultTables) {
    defaultTables = createLookupTables(DEFAULT_TABLE_SOURCE);
  }
  return defaultTables;
}
