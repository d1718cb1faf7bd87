/**
 * Processing Report Types
 *
 * Per-record issues and the batch report assembled after a run.
 */

import type { SampleRecord, SchemaViolation, TargetSchema } from '@relecov-mapper/core';

export type IssueSeverity = 'info' | 'warning' | 'error';

/** No source header matched a canonical field; the field stays absent */
export interface FieldMappingMiss {
  kind: 'field-mapping-miss';
  severity: 'info';
  field: string;
  reason: 'no-header' | 'unusable-value';
  /** Header that matched but held a non-scalar value */
  header?: string;
}

/** A raw header that no rename entry accepts */
export interface UnrecognizedHeader {
  kind: 'unrecognized-header';
  severity: 'warning';
  header: string;
  /** Closest accepted header, when one is near */
  suggestion?: string;
}

/** Join key not found (or join field absent) for one enrichment */
export interface EnrichmentMiss {
  kind: 'enrichment-miss';
  severity: 'warning';
  spec: string;
  dataset: string;
  joinField: string;
  reason: 'join-field-absent' | 'key-not-found';
  key?: string;
  /** Defaults written in place of the join */
  defaultsApplied: boolean;
}

/** The enrichment's reference dataset failed to load */
export interface ReferenceUnavailable {
  kind: 'reference-unavailable';
  severity: 'warning';
  spec: string;
  dataset: string;
}

/** A pipeline metric or version entry is missing for the sample */
export interface BioinfoFieldMissing {
  kind: 'bioinfo-field-missing';
  severity: 'warning';
  field: string;
  source: string;
  detail: string;
}

export interface MissingRequiredFileIssue {
  kind: 'missing-required-file';
  severity: 'error';
  file: string;
  message: string;
}

export interface SchemaValidationIssue {
  kind: 'schema-validation';
  severity: 'error';
  target: TargetSchema;
  violations: readonly SchemaViolation[];
}

/** Unexpected per-record failure */
export interface ProcessingFailure {
  kind: 'processing-error';
  severity: 'error';
  code: string;
  message: string;
}

export type ProcessingIssue =
  | FieldMappingMiss
  | UnrecognizedHeader
  | EnrichmentMiss
  | ReferenceUnavailable
  | BioinfoFieldMissing
  | MissingRequiredFileIssue
  | SchemaValidationIssue
  | ProcessingFailure;

export type IssueKind = ProcessingIssue['kind'];

/** A record projected onto a target schema that passed validation */
export interface ValidatedRecord {
  target: TargetSchema;
  /** Values in the target's column order */
  values: SampleRecord;
}

export interface RecordOutcome {
  /** Position in the input batch */
  index: number;
  sampleId?: string;
  status: 'ok' | 'failed';
  /** Final canonical record */
  record: SampleRecord;
  issues: ProcessingIssue[];
  emitted: Partial<Record<TargetSchema, ValidatedRecord>>;
}

export interface ReferenceErrorSummary {
  dataset: string;
  code: string;
  message: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  issuesByKind: Partial<Record<IssueKind, number>>;
  /** Records accepted per target */
  emittedByTarget: Partial<Record<TargetSchema, number>>;
  processingTimeMs: number;
}

export interface BatchReport {
  id: string;
  timestamp: Date;
  targets: readonly TargetSchema[];
  summary: BatchSummary;
  /** One outcome per input record, in input order */
  outcomes: RecordOutcome[];
  /** Reference datasets that failed to load for the whole run */
  referenceErrors: ReferenceErrorSummary[];
}
