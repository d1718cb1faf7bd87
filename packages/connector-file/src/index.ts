/**
 * @relecov-mapper/connector-file
 *
 * File readers for lab metadata, reference datasets, pipeline outputs and configuration
 */

export { BaseFileReader } from './base-file-reader.js';
export type { FileReaderConfig, ReadFailure } from './base-file-reader.js';

export { CsvReader, castCell, inferDelimiter, keyRowsBy, readKeyedTable } from './csv-reader.js';
export type { CsvReaderConfig, ParsedTable } from './csv-reader.js';

export { JsonRecordsReader, createJsonRecordsReader } from './json-records-reader.js';
export type { JsonRecordsReaderConfig } from './json-records-reader.js';

export { LabWorkbookReader, createLabWorkbookReader } from './lab-workbook-reader.js';
export type { LabWorkbookReaderConfig } from './lab-workbook-reader.js';

export { ReferenceDatasetReader, ReferenceTableLoader } from './reference-table-loader.js';
export type {
  ReferenceDatasetConfig,
  ReferenceTableLoaderOptions,
  LoadedReferenceTables,
} from './reference-table-loader.js';

export { VersionManifestReader } from './version-manifest-reader.js';
export { ConsensusFastaReader } from './consensus-fasta-reader.js';

export { collectPipelineOutputs } from './pipeline-output-collector.js';
export type { CollectPipelineOutputsOptions } from './pipeline-output-collector.js';

export {
  ConfigDocumentReader,
  loadMappingConfiguration,
  loadTargetSchemas,
} from './configuration-loader.js';
export type { LoadConfigurationOptions } from './configuration-loader.js';
