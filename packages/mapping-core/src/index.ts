/**
 * @relecov-mapper/mapping-core
 *
 * Field mapping, derivation rules, enrichment joins, bioinformatics result
 * merging and target schema emission
 */

export * from './types/index.js';

export { FieldMapper, acceptedHeaders, resolveRenameTable } from './mapping/field-mapper.js';
export type { FieldMappingResult } from './mapping/field-mapper.js';

export { RuleEngine } from './rules/rule-engine.js';
export type { FieldUpdate, RuleTrace } from './rules/rule-engine.js';

export { EnrichmentJoiner } from './enrichment/enrichment-joiner.js';
export type { EnrichmentResult, EnrichAllResult } from './enrichment/enrichment-joiner.js';

export { BioinfoResultMapper } from './bioinfo/bioinfo-mapper.js';
export type { BioinfoMappingResult } from './bioinfo/bioinfo-mapper.js';

export { SchemaValidator, extractFieldSet } from './validation/schema-validator.js';

export { SchemaEmitter, enaFieldNames } from './emit/schema-emitter.js';
export type { EmitResult } from './emit/schema-emitter.js';
export {
  buildRelecovDocument,
  buildEnaSubmissionTables,
  serializeGisaidCsv,
} from './emit/serializers.js';
export type { EnaRow, EnaSubmissionTables } from './emit/serializers.js';

export { Semaphore } from './pipeline/semaphore.js';
export { RecordPipeline } from './pipeline/record-pipeline.js';
export type { RecordPipelineOptions, ProcessRecordOptions } from './pipeline/record-pipeline.js';
export { BatchProcessor, DEFAULT_CONCURRENCY, summarizeOutcomes } from './pipeline/batch-processor.js';
export type { BatchOptions } from './pipeline/batch-processor.js';

export { formatBatchReport, formatIssue } from './formatters/report-formatter.js';
