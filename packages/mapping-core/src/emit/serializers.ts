/**
 * Submission serializers: RELECOV JSON document, ENA tables, GISAID CSV
 */

import { stringify } from 'csv-stringify/sync';
import type { EnaConfig, FieldValue, SampleRecord } from '@relecov-mapper/core';
import { getField } from '@relecov-mapper/core';
import type { ValidatedRecord } from '../types/index.js';

export type EnaRow = { [field: string]: FieldValue };

export interface EnaSubmissionTables {
  study: EnaRow[];
  sample: EnaRow[];
  experiment: EnaRow[];
  run: EnaRow[];
}

function rowFor(values: Readonly<SampleRecord>, fields: readonly string[], fixed: Readonly<SampleRecord>): EnaRow {
  const row: EnaRow = {};
  for (const field of fields) {
    row[field] = getField(values, field) ?? getField(fixed, field) ?? '';
  }
  return row;
}

/**
 * RELECOV submission document: validated records in input order
 */
export function buildRelecovDocument(validated: readonly ValidatedRecord[]): SampleRecord[] {
  return validated.filter((record) => record.target === 'relecov').map((record) => ({ ...record.values }));
}

/**
 * Split validated ENA records into the study, sample, experiment and run
 * tables. Samples of one study share a study row, so study rows are
 * de-duplicated.
 */
export function buildEnaSubmissionTables(
  validated: readonly ValidatedRecord[],
  ena: EnaConfig
): EnaSubmissionTables {
  const tables: EnaSubmissionTables = { study: [], sample: [], experiment: [], run: [] };
  const studyKeys = new Set<string>();

  for (const record of validated) {
    if (record.target !== 'ena') continue;

    const study = rowFor(record.values, ena.studyFields, ena.fixedFields);
    const studyKey = JSON.stringify(study);
    if (!studyKeys.has(studyKey)) {
      studyKeys.add(studyKey);
      tables.study.push(study);
    }
    tables.sample.push(rowFor(record.values, ena.sampleFields, ena.fixedFields));
    tables.experiment.push(rowFor(record.values, ena.experimentFields, ena.fixedFields));
    tables.run.push(rowFor(record.values, ena.runFields, ena.fixedFields));
  }

  return tables;
}

/**
 * GISAID upload CSV. Columns follow `headers` exactly; fields a record does
 * not set are written as empty cells.
 */
export function serializeGisaidCsv(
  validated: readonly ValidatedRecord[],
  headers: readonly string[]
): string {
  const rows = validated
    .filter((record) => record.target === 'gisaid')
    .map((record) => headers.map((header) => String(getField(record.values, header) ?? '')));

  return stringify([[...headers], ...rows]);
}
