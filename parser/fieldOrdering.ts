// ─────────────────────────────────────────────────────────────
// Field Ordering — Template/document order and signature rules
// ─────────────────────────────────────────────────────────────

import { DateField, FormField, OrderingMode, SignatureField, SIGNATURE_SECTION } from "../schema/formSchema";
import { OrderingTemplate } from "../config/lookupTables";

export interface OrderingResult {
  fields: FormField[];
  mode: OrderingMode;
  template: string | null;
}

/** Fields about the signer that follow the signature in document order */
export const SIGNER_DETAIL_KEYS: ReadonlySet<string> = new Set(["printed_name_if_signed_on_behalf"]);

/** Position given to fields that no source line produced */
export const SYNTHETIC_LINE_INDEX = Number.MAX_SAFE_INTEGER;

function byLineIndex(a: FormField, b: FormField): number {
  return a.lineIndex - b.lineIndex;
}

/** Share of the field keys that a template knows */
export function templateOverlap(fields: readonly FormField[], template: OrderingTemplate): number {
  const keys = new Set(fields.map((f) => f.key));
  if (keys.size === 0) return 0;
  const known = new Set(template.order);
  let hits = 0;
  keys.forEach((k) => {
    if (known.has(k)) hits++;
  });
  return hits / keys.size;
}

/**
 * Order fields once. The first template whose key overlap exceeds the
 * threshold fixes the order; otherwise document order is kept with
 * signature fields, then signer details, moved last.
 */
export function orderFields(
  fields: readonly FormField[],
  templates: readonly OrderingTemplate[],
  threshold: number
): OrderingResult {
  const template = templates.find((t) => templateOverlap(fields, t) > threshold);

  if (template) {
    const position = new Map(template.order.map((key, i) => [key, i]));
    const known = fields.filter((f) => position.has(f.key));
    const unknown = fields.filter((f) => !position.has(f.key)).sort(byLineIndex);
    known.sort((a, b) => (position.get(a.key) ?? 0) - (position.get(b.key) ?? 0) || byLineIndex(a, b));
    return { fields: [...known, ...unknown], mode: "template", template: template.name };
  }

  const sorted = [...fields].sort(byLineIndex);
  const trailing = (f: FormField) => f.type === "signature" || SIGNER_DETAIL_KEYS.has(f.key);
  return {
    fields: [
      ...sorted.filter((f) => !trailing(f)),
      ...sorted.filter((f) => f.type === "signature"),
      ...sorted.filter((f) => f.type !== "signature" && trailing(f)),
    ],
    mode: "document",
    template: null,
  };
}

/** Keep only the first signature, keyed `signature`; add one if none exists */
export function ensureSignature(fields: readonly FormField[]): FormField[] {
  const first = fields.find((f) => f.type === "signature");
  if (!first) {
    const synthetic: SignatureField = {
      key: "signature",
      title: "Signature",
      section: SIGNATURE_SECTION,
      optional: false,
      type: "signature",
      control: {},
      lineIndex: SYNTHETIC_LINE_INDEX,
    };
    return [...fields, synthetic];
  }
  return fields
    .filter((f) => f.type !== "signature" || f === first)
    .map((f) => (f === first ? { ...first, key: "signature" } : f));
}

/** Place `date_signed` directly after the signature, creating it when missing */
export function ensureDateSigned(fields: readonly FormField[]): FormField[] {
  const signatureIndex = fields.findIndex((f) => f.type === "signature");
  if (signatureIndex < 0) return [...fields];

  const existing = fields.find((f) => f.key === "date_signed");
  const synthetic: DateField = {
    key: "date_signed",
    title: "Date Signed",
    section: SIGNATURE_SECTION,
    optional: false,
    type: "date",
    control: { input_type: "past" },
    lineIndex: fields[signatureIndex].lineIndex,
  };
  const dateSigned: FormField = existing ?? synthetic;

  const rest = fields.filter((f) => f !== existing);
  const at = rest.findIndex((f) => f.type === "signature");
  return [...rest.slice(0, at + 1), dateSigned, ...rest.slice(at + 1)];
}
