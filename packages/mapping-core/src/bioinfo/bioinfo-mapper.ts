/**
 * Bioinformatics Result Mapper
 *
 * Merges per-sample pipeline results (mapping stats, variant metrics,
 * software versions, lineage, consensus) into a sample record.
 */

import type {
  BioinfoConfig,
  ConsensusField,
  ConsensusSummary,
  FieldValue,
  Logger,
  PipelineOutputs,
  RawRecord,
  SampleRecord,
} from '@relecov-mapper/core';
import {
  BIOINFO_FILE_KEYS,
  MissingRequiredFileError,
  fieldValueToString,
  getField,
  silentLogger,
  toFieldValue,
  toSampleFileName,
} from '@relecov-mapper/core';
import type { BioinfoFieldMissing } from '../types/index.js';

export interface BioinfoMappingResult {
  record: SampleRecord;
  issues: BioinfoFieldMissing[];
}

type ConsensusValue = (summary: ConsensusSummary, record: Readonly<SampleRecord>) => FieldValue | undefined;

function basePairsSequenced(summary: ConsensusSummary, record: Readonly<SampleRecord>): FieldValue | undefined {
  const readLength = getField(record, 'read_length');
  if (readLength === undefined || readLength === '') return undefined;
  const length = Number(readLength);
  if (!Number.isFinite(length)) return undefined;

  const layout = getField(record, 'library_layout');
  const factor = layout !== undefined && fieldValueToString(layout).toUpperCase() === 'PAIRED' ? 2 : 1;
  return length * summary.genomeLength * factor;
}

const CONSENSUS_VALUES: Record<ConsensusField, ConsensusValue> = {
  consensus_genome_length: (s) => s.genomeLength,
  consensus_sequence_name: (s) => s.sequenceName,
  consensus_sequence_filename: (s) => s.fileName,
  consensus_sequence_filepath: (s) => s.filePath,
  consensus_sequence_md5: (s) => s.md5,
  number_of_base_pairs_sequenced: basePairsSequenced,
};

export class BioinfoResultMapper {
  private readonly logger: Logger;

  constructor(
    private readonly config: BioinfoConfig,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * Merge pipeline results for the record's sample.
   * Throws MissingRequiredFileError when a required file is missing or a
   * required table has no row for the sample.
   */
  map(record: Readonly<SampleRecord>, outputs: PipelineOutputs): BioinfoMappingResult {
    const idValue = getField(record, this.config.sampleIdField);
    if (idValue === undefined || idValue === '') {
      throw new MissingRequiredFileError(
        '(unknown)',
        this.config.sampleIdField,
        `Record has no ${this.config.sampleIdField}; pipeline outputs cannot be matched`
      );
    }
    const sampleId = fieldValueToString(idValue);

    for (const [fileKey, fileName] of Object.entries(this.config.requiredFiles)) {
      if (!outputs.presentFiles.has(fileKey)) {
        throw new MissingRequiredFileError(sampleId, fileName);
      }
    }

    const next: SampleRecord = { ...record, ...this.config.fixedValues };
    const issues: BioinfoFieldMissing[] = [];

    this.mapTableColumns(next, issues, sampleId, BIOINFO_FILE_KEYS.mappingStats, this.config.mappingStats, outputs);
    this.mapVersions(next, issues, outputs);
    this.mapTableColumns(
      next,
      issues,
      sampleId,
      BIOINFO_FILE_KEYS.variantMetrics,
      this.config.mappingVariantMetrics,
      outputs
    );
    this.mapPangolin(next, issues, sampleId, outputs);
    this.mapConsensus(next, issues, sampleId, outputs);
    next.long_table_path = outputs.longTablePath ?? '';

    return { record: next, issues };
  }

  private mapTableColumns(
    target: SampleRecord,
    issues: BioinfoFieldMissing[],
    sampleId: string,
    fileKey: string,
    columns: Readonly<{ [field: string]: string }>,
    outputs: PipelineOutputs
  ): void {
    if (Object.keys(columns).length === 0) return;

    const fileName = this.config.requiredFiles[fileKey] ?? fileKey;
    const row = outputs.tables[fileKey]?.get(sampleId);
    if (!row) {
      throw new MissingRequiredFileError(
        sampleId,
        fileName,
        `No row for sample ${sampleId} in ${fileName}`
      );
    }
    this.copyColumns(target, issues, row, columns, fileName);
  }

  private copyColumns(
    target: SampleRecord,
    issues: BioinfoFieldMissing[],
    row: Readonly<RawRecord>,
    columns: Readonly<{ [field: string]: string }>,
    source: string
  ): void {
    for (const [field, column] of Object.entries(columns)) {
      const value = Object.prototype.hasOwnProperty.call(row, column)
        ? toFieldValue(row[column])
        : undefined;
      if (value === undefined) {
        issues.push({
          kind: 'bioinfo-field-missing',
          severity: 'warning',
          field,
          source,
          detail: `column "${column}" not found`,
        });
        continue;
      }
      target[field] = value;
    }
  }

  private mapVersions(target: SampleRecord, issues: BioinfoFieldMissing[], outputs: PipelineOutputs): void {
    const source = this.config.requiredFiles[BIOINFO_FILE_KEYS.versions] ?? BIOINFO_FILE_KEYS.versions;

    for (const [field, { process, software }] of Object.entries(this.config.mappingVersion)) {
      const version = outputs.versions?.[process]?.[software];
      if (version === undefined) {
        issues.push({
          kind: 'bioinfo-field-missing',
          severity: 'warning',
          field,
          source,
          detail: `no version for ${process}/${software}`,
        });
        continue;
      }
      target[field] = version;
    }
  }

  private mapPangolin(
    target: SampleRecord,
    issues: BioinfoFieldMissing[],
    sampleId: string,
    outputs: PipelineOutputs
  ): void {
    const fields = Object.keys(this.config.mappingPangolin);
    if (fields.length === 0) return;

    const fileSample = toSampleFileName(sampleId);
    const byDate = outputs.pangolin.get(fileSample);
    const analysisDate = getField(target, 'analysis_date');
    let row: Readonly<RawRecord> | undefined;
    if (byDate) {
      row =
        analysisDate !== undefined && analysisDate !== ''
          ? byDate.get(fieldValueToString(analysisDate))
          : [...byDate.values()].pop();
    }

    const source = `${fileSample}.pangolin.${analysisDate ?? '*'}.csv`;
    if (!row) {
      this.logger.warn('No pangolin report for sample', { sampleId, source });
      for (const field of fields) target[field] = '';
      issues.push({
        kind: 'bioinfo-field-missing',
        severity: 'warning',
        field: fields.join(', '),
        source,
        detail: 'pangolin report not found, fields set to empty',
      });
      return;
    }

    this.copyColumns(target, issues, row, this.config.mappingPangolin, source);
  }

  private mapConsensus(
    target: SampleRecord,
    issues: BioinfoFieldMissing[],
    sampleId: string,
    outputs: PipelineOutputs
  ): void {
    const fields = this.config.mappingConsensus;
    if (fields.length === 0) return;

    const fileSample = toSampleFileName(sampleId);
    const summary = outputs.consensus.get(fileSample);
    if (!summary) {
      this.logger.warn('No consensus sequence for sample', { sampleId });
      for (const field of fields) target[field] = '';
      issues.push({
        kind: 'bioinfo-field-missing',
        severity: 'warning',
        field: fields.join(', '),
        source: `${fileSample}.consensus.fa`,
        detail: 'consensus file not found, fields set to empty',
      });
      return;
    }

    for (const field of fields) {
      const value = CONSENSUS_VALUES[field](summary, target);
      if (value === undefined) {
        issues.push({
          kind: 'bioinfo-field-missing',
          severity: 'warning',
          field,
          source: summary.fileName,
          detail: 'read_length is not numeric',
        });
        continue;
      }
      target[field] = value;
    }
  }
}
