/**
 * Mapping Configuration Types
 *
 * Compiled, immutable form of configuration.json. Components receive this
 * value by injection; nothing reads it from module state.
 */

import type { FieldValue } from './record.js';
import type { TargetSchema } from './schema.js';

/** Accepted source headers for one canonical field, in priority order */
export interface FieldRenameEntry {
  canonical: string;
  variants: readonly string[];
}

export type FieldRenameTable = readonly FieldRenameEntry[];

/** Sets `outputField` when the trigger field equals `triggerValue` */
export interface ExactMatchRule {
  kind: 'exact';
  triggerField: string;
  triggerValue: string;
  outputField: string;
  outputValue: FieldValue;
}

/** Sets `outputField` when the trigger field contains `triggerValue` */
export interface SubstringMatchRule {
  kind: 'substring';
  triggerField: string;
  triggerValue: string;
  outputField: string;
  outputValue: FieldValue;
}

/** `outputField := sourceField`, skipped when the source is absent */
export interface CopyRule {
  kind: 'copy';
  sourceField: string;
  outputField: string;
}

export type DerivationRule = ExactMatchRule | SubstringMatchRule | CopyRule;

export type FieldImport =
  | { kind: 'all' }
  | { kind: 'subset'; fields: readonly string[] };

export interface EnrichmentSpec {
  /** Name of the spec in lab_metadata_req_json */
  name: string;
  /** Reference dataset identifier (file name) */
  dataset: string;
  /** Record field whose value is the join key */
  joinField: string;
  fieldImport: FieldImport;
  /** Values written on a miss; without them a miss leaves fields absent */
  defaults?: Readonly<{ [field: string]: FieldValue }>;
}

export interface WorkbookLayout {
  sheet?: string;
  /** 1-indexed row holding the headers */
  headerRow: number;
}

export interface LabMetadataConfig {
  fixedFields: Readonly<{ [field: string]: FieldValue }>;
  renameTable: FieldRenameTable;
  enrichments: readonly EnrichmentSpec[];
  rules: readonly DerivationRule[];
  workbook: WorkbookLayout;
}

/** Fields the consensus FASTA summary can fill */
export const CONSENSUS_FIELDS = [
  'consensus_genome_length',
  'consensus_sequence_name',
  'consensus_sequence_filename',
  'consensus_sequence_filepath',
  'consensus_sequence_md5',
  'number_of_base_pairs_sequenced',
] as const;

export type ConsensusField = (typeof CONSENSUS_FIELDS)[number];

/** Tool version lookup: versions[process][software] */
export interface SoftwareVersionMapping {
  process: string;
  software: string;
}

export interface BioinfoConfig {
  /** Record field identifying the sample in pipeline outputs */
  sampleIdField: string;
  fixedValues: Readonly<{ [field: string]: FieldValue }>;
  /** File key -> file name, every one must exist in the pipeline folder */
  requiredFiles: Readonly<{ [key: string]: string }>;
  /** File key -> 0-indexed column holding the sample id */
  sampleColumns: Readonly<{ [key: string]: number }>;
  /** canonical field -> raw column */
  mappingStats: Readonly<{ [field: string]: string }>;
  mappingVariantMetrics: Readonly<{ [field: string]: string }>;
  mappingPangolin: Readonly<{ [field: string]: string }>;
  mappingConsensus: readonly ConsensusField[];
  mappingVersion: Readonly<{ [field: string]: SoftwareVersionMapping }>;
}

export interface EnaConfig {
  fixedFields: Readonly<{ [field: string]: FieldValue }>;
  studyFields: readonly string[];
  sampleFields: readonly string[];
  experimentFields: readonly string[];
  runFields: readonly string[];
}

export interface GisaidConfig {
  headers: readonly string[];
  /** GISAID header -> canonical field */
  fieldMap: Readonly<{ [header: string]: string }>;
  fixedFields: Readonly<{ [header: string]: string }>;
}

export interface MappingConfiguration {
  labMetadata: LabMetadataConfig;
  bioinfo: BioinfoConfig;
  ena: EnaConfig;
  gisaid: GisaidConfig;
  /** Target -> schema file name */
  jsonSchemas: Readonly<{ [K in TargetSchema]: string }>;
  /** Institution -> file of extra header variants */
  institutionMappingFiles: Readonly<{ [institution: string]: string }>;
  /** Institution -> extra variants, filled in by the configuration loader */
  institutionRenameOverrides: Readonly<{ [institution: string]: FieldRenameTable }>;
}
