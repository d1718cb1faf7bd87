/**
 * Record types exchanged between the mapping stages
 */

/** A scalar value held by a canonical field */
export type FieldValue = string | number;

/**
 * One lab sample, progressively enriched by the pipeline.
 * An absent key and an explicit empty string are different states.
 */
export type SampleRecord = {
  [field: string]: FieldValue;
};

/** A row as read from the lab's spreadsheet or JSON, keyed by its original header */
export type RawRecord = {
  [header: string]: unknown;
};

/** A single field-level violation reported by schema validation */
export interface SchemaViolation {
  /** Canonical (or target) field name the violation concerns */
  field: string;
  /** Human-readable message */
  message: string;
  /** JSON Schema keyword that failed (required, type, format, ...) */
  keyword: string;
  /** Offending value, when the field was present */
  value?: unknown;
}

/** Read-only lookup table for enrichment joins */
export interface ReferenceTable {
  /** Dataset identifier (usually the file name) */
  readonly id: string;
  readonly size: number;
  get(key: string): Readonly<SampleRecord> | undefined;
  has(key: string): boolean;
  keys(): Iterable<string>;
}
