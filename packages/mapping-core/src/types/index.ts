export type {
  IssueSeverity,
  FieldMappingMiss,
  UnrecognizedHeader,
  EnrichmentMiss,
  ReferenceUnavailable,
  BioinfoFieldMissing,
  MissingRequiredFileIssue,
  SchemaValidationIssue,
  ProcessingFailure,
  ProcessingIssue,
  IssueKind,
  ValidatedRecord,
  RecordOutcome,
  ReferenceErrorSummary,
  BatchSummary,
  BatchReport,
} from './report.js';
