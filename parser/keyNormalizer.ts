// ─────────────────────────────────────────────────────────────
// Key Normalizer — Canonical titles and unique machine keys
// ─────────────────────────────────────────────────────────────

import { FormField } from "../schema/formSchema";
import { KeyNumberingRule, LookupTables } from "../config/lookupTables";

/** Replace typographic quotes with their ASCII forms */
export function normalizeQuotes(text: string): string {
  return text.replace(/[‘’‚‛′]/g, "'").replace(/[“”„‟″]/g, '"');
}

/**
 * Slug a human-readable string into a lowercase snake-case key.
 * Applying it to its own output returns the same value.
 */
export function slugify(text: string, fallback = "field"): string {
  const slug = text
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug || fallback;
}

function titleCaseWord(word: string): string {
  if (word.length === 0) return word;
  const rest = word.length > 3 && word === word.toUpperCase() ? word.slice(1).toLowerCase() : word.slice(1);
  return word[0].toUpperCase() + rest;
}

/** Strip blanks, trailing colons and doubled spaces from a raw label */
export function cleanLabel(raw: string): string {
  return normalizeQuotes(raw)
    .replace(/_+/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[:\s]+$/, "")
    .trim();
}

// ── Registry ─────────────────────────────────────────────────

/** Keys handed out during one conversion run */
export class KeyRegistry {
  private taken = new Set<string>();

  has(key: string): boolean {
    return this.taken.has(key);
  }

  /** Mark a key as taken without suffixing */
  reserve(key: string): void {
    this.taken.add(key);
  }

  /** Take `key`, or the first free `key_2`, `key_3`, ... */
  claim(key: string): string {
    let candidate = key;
    for (let n = 2; this.taken.has(candidate); n++) {
      candidate = `${key}_${n}`;
    }
    this.taken.add(candidate);
    return candidate;
  }
}

// ── Normalizer ───────────────────────────────────────────────

export class KeyNormalizer {
  constructor(private readonly tables: Pick<LookupTables, "titleSynonyms" | "canonicalKeys" | "keyNumbering">) {}

  /** Map a raw label to its display title */
  normalizeTitle(raw: string): string {
    const cleaned = cleanLabel(raw);
    const synonym = this.tables.titleSynonyms.get(cleaned.toLowerCase());
    if (synonym !== undefined) return synonym;

    const stripped = cleaned
      .replace(/[^\p{L}\p{N}\s'/#?&().,-]/gu, " ")
      .replace(/\s+/g, " ")
      .trim();
    if (!stripped) return cleaned;
    return stripped.split(" ").map(titleCaseWord).join(" ");
  }

  /** Key for a title: canonical table first, slug otherwise, then section numbering */
  generateKey(title: string, section: string, context = ""): string {
    return this.qualifyKey(this.baseKey(title), section, context);
  }

  /** Unqualified key for a title */
  baseKey(title: string): string {
    return this.tables.canonicalKeys.get(normalizeQuotes(title).trim().toLowerCase()) ?? slugify(title);
  }

  /**
   * Apply section/context numbering conventions to a base key,
   * e.g. `name_of_insured` inside the secondary plan.
   */
  qualifyKey(baseKey: string, section: string, context = ""): string {
    const loweredContext = context.toLowerCase();
    const rule = this.tables.keyNumbering.find(
      (r: KeyNumberingRule) =>
        (r.section === undefined || r.section === section) &&
        (r.context === undefined || loweredContext.includes(r.context.toLowerCase())) &&
        Object.prototype.hasOwnProperty.call(r.keys, baseKey)
    );
    return rule ? rule.keys[baseKey] : baseKey;
  }
}

/**
 * Final uniqueness pass. The first signature keeps `signature`;
 * every later collision gets the next free numeric suffix.
 */
export function ensureUniqueKeys(fields: readonly FormField[], registry: KeyRegistry): FormField[] {
  const signature = fields.find((f) => f.type === "signature");
  if (signature) registry.reserve("signature");

  return fields.map((field) => {
    if (field === signature) return { ...field, key: "signature" };
    return { ...field, key: registry.claim(field.key) };
  });
}
