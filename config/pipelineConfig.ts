// ─────────────────────────────────────────────────────────────
// Pipeline Config — Tunable thresholds for form conversion
// ─────────────────────────────────────────────────────────────

/** Tunable settings for one conversion run */
export interface PipelineConfig {
  /** Section assigned before any heading or section rule fires */
  defaultSection: string;
  /** Lines on each side of a line that section rules may inspect */
  contextWindow: number;
  /** Preceding lines searched for a duplicate-allowance context */
  duplicateContextWindow: number;
  /** Key overlap above which a canonical template dictates order */
  templateOverlapThreshold: number;
  /** Consent keywords needed before a block reads as `text` */
  consentKeywordMinimum: number;
  /** Character length above which a block reads as `text` */
  textLengthThreshold: number;
  /** Word count above which a line with blanks is prose, not blank-fill */
  proseMinWords: number;
  /** Run the header/footer pre-filter before section tracking */
  stripHeadersFooters: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  defaultSection: "Patient Information Form",
  contextWindow: 10,
  duplicateContextWindow: 3,
  templateOverlapThreshold: 0.5,
  consentKeywordMinimum: 2,
  textLengthThreshold: 100,
  proseMinWords: 10,
  stripHeadersFooters: true,
});

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on values no run could use.
 */
export function resolveConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...overrides };

  if (config.defaultSection.trim().length === 0) {
    throw new Error("Invalid config: defaultSection must not be empty");
  }
  assertWholeNumber("contextWindow", config.contextWindow, 0);
  assertWholeNumber("duplicateContextWindow", config.duplicateContextWindow, 0);
  assertWholeNumber("consentKeywordMinimum", config.consentKeywordMinimum, 1);
  assertWholeNumber("textLengthThreshold", config.textLengthThreshold, 1);
  assertWholeNumber("proseMinWords", config.proseMinWords, 1);

  const threshold = config.templateOverlapThreshold;
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new Error(`Invalid config: templateOverlapThreshold must be between 0 and 1 (got ${threshold})`);
  }

  return config;
}

function assertWholeNumber(name: keyof PipelineConfig, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid config: ${name} must be an integer >= ${min} (got ${value})`);
  }
}
