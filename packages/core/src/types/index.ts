/**
 * Type exports
 */

export type {
  FieldValue,
  SampleRecord,
  RawRecord,
  SchemaViolation,
  ReferenceTable,
} from './record.js';

export { TARGET_SCHEMAS, isTargetSchema } from './schema.js';
export type {
  TargetSchema,
  SchemaFieldSet,
  JsonSchemaDocument,
  TargetSchemaDocuments,
} from './schema.js';

export { CONSENSUS_FIELDS } from './mapping-config.js';
export type {
  ConsensusField,
  FieldRenameEntry,
  FieldRenameTable,
  ExactMatchRule,
  SubstringMatchRule,
  CopyRule,
  DerivationRule,
  FieldImport,
  EnrichmentSpec,
  WorkbookLayout,
  LabMetadataConfig,
  SoftwareVersionMapping,
  BioinfoConfig,
  EnaConfig,
  GisaidConfig,
  MappingConfiguration,
} from './mapping-config.js';

export type {
  KeyedRows,
  VersionManifest,
  ConsensusSummary,
  PipelineOutputs,
} from './pipeline-outputs.js';
