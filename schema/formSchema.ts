// ─────────────────────────────────────────────────────────────
// Modento Form Schema — Core type definitions
// ─────────────────────────────────────────────────────────────

/** Supported input file types */
export type InputFormat = "pdf" | "docx" | "html" | "txt" | "md";

/** Field types accepted by the Modento Forms schema */
export const FIELD_TYPES = [
  "input",
  "radio",
  "checkbox",
  "dropdown",
  "states",
  "date",
  "signature",
  "initials",
  "text",
  "header",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Subtypes of an `input` field */
export const INPUT_TYPES = ["name", "email", "phone", "number", "ssn", "zip", "initials"] as const;

export type InputType = (typeof INPUT_TYPES)[number];

/** Subtypes of a `date` field */
export const DATE_INPUT_TYPES = ["past", "future", "any"] as const;

export type DateInputType = (typeof DATE_INPUT_TYPES)[number];

export function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((t) => t === value);
}

export function isInputType(value: unknown): value is InputType {
  return INPUT_TYPES.some((t) => t === value);
}

export function isDateInputType(value: unknown): value is DateInputType {
  return DATE_INPUT_TYPES.some((t) => t === value);
}

/** Document kinds told apart before conversion */
export const FORM_TYPES = ["patient_info", "records_release", "structured_consent", "narrative_consent", "general"] as const;

export type FormType = (typeof FORM_TYPES)[number];

/** Section used for signature, date-signed and trailing consent fields */
export const SIGNATURE_SECTION = "Signature";

/** One line of extracted document text */
export interface TextLine {
  readonly text: string;
  readonly index: number;     // position, monotonic within a document
  readonly fromTable: boolean; // line came from a table row / cell
}

/** A change of the current section while scanning lines */
export interface SectionTransition {
  lineIndex: number;
  section: string;
  rule: string;               // "heading" or the name of the section rule that fired
}

/** Section label for every line index */
export interface SectionAssignment {
  sections: string[];
  transitions: SectionTransition[];
}

/** A selectable option of a radio / checkbox / dropdown field */
export interface FieldOption {
  name: string;
  value: string | boolean;
}

// ── Controls ─────────────────────────────────────────────────

export interface InputControl {
  input_type: InputType;
  hint?: string;
}

export interface DateControl {
  input_type?: DateInputType;
  hint?: string;
}

export interface OptionsControl {
  options: FieldOption[];
  hint?: string;
}

export interface InitialsControl {
  hint?: string;
}

export interface TextControl {
  html_text: string;
  temporary_html_text: string;
  text: string;
}

/** Control of `states`, `signature` and `header` fields */
export type EmptyControl = Record<string, never>;

// ── Fields ───────────────────────────────────────────────────

interface FieldBase {
  key: string;
  title: string;
  section: string;
  optional: boolean;
  lineIndex: number;          // source position, used for ordering only
}

export type InputField = FieldBase & { type: "input"; control: InputControl };
export type DateField = FieldBase & { type: "date"; control: DateControl };
export type RadioField = FieldBase & { type: "radio"; control: OptionsControl };
export type CheckboxField = FieldBase & { type: "checkbox"; control: OptionsControl };
export type DropdownField = FieldBase & { type: "dropdown"; control: OptionsControl };
export type StatesField = FieldBase & { type: "states"; control: EmptyControl };
export type SignatureField = FieldBase & { type: "signature"; control: EmptyControl };
export type InitialsField = FieldBase & { type: "initials"; control: InitialsControl };
export type TextField = FieldBase & { type: "text"; control: TextControl };
export type HeaderField = FieldBase & { type: "header"; control: EmptyControl };

/** A normalized form field — one variant per field type */
export type FormField =
  | InputField
  | DateField
  | RadioField
  | CheckboxField
  | DropdownField
  | StatesField
  | SignatureField
  | InitialsField
  | TextField
  | HeaderField;

/** Wire-format record, exactly as written to the output JSON */
export interface FieldRecord {
  key: string;
  title: string;
  section: string;
  optional: boolean;
  type: string;
  control: Record<string, unknown>;
}

/** Flatten a field into its wire record (drops the ordering position) */
export function toRecord(field: FormField): FieldRecord {
  return {
    key: field.key,
    title: field.title,
    section: field.section,
    optional: field.optional,
    type: field.type,
    control: { ...field.control },
  };
}

// ── Candidates ───────────────────────────────────────────────

/** Pattern family that produced a candidate */
export type PatternFamily =
  | "compound-template"
  | "signature-line"
  | "canonical-question"
  | "standalone-label"
  | "initials-line"
  | "checkbox-run"
  | "inline-choice"
  | "blank-fill"
  | "colon-label"
  | "text-block";

/** A provisional field detected by pattern matching */
export interface FieldCandidate {
  label: string;
  type: FieldType;
  section: string;
  lineIndex: number;
  family: PatternFamily;
  key?: string;               // preset canonical key (known layouts)
  title?: string;             // preset canonical title
  inputType?: InputType;
  dateType?: DateInputType;
  options?: FieldOption[];
  htmlText?: string;
  hint?: string;
  optional?: boolean;
  allowRepeat?: boolean;      // repeats get a suffix instead of being rejected
}

// ── Results ──────────────────────────────────────────────────

export type OrderingMode = "template" | "document";

/** Output of the schema validator */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  spec: FieldRecord[];
}

/** Output of one conversion run */
export interface ConversionResult {
  spec: FieldRecord[];
  valid: boolean;
  errors: string[];
  warnings: string[];
  orderingMode: OrderingMode;
  template: string | null;
  formType: FormType;
  fieldCount: number;
  sectionCount: number;
}

/** Result of an ingest operation */
export interface IngestResult {
  lines: TextLine[];
  format: InputFormat;
  pageCount: number;
  metadata: {
    title: string;
    sourceFile: string;
    ingestedAt: string;       // ISO timestamp
  };
}
