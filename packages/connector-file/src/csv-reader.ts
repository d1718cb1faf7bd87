/**
 * CSV Reader
 * Reads delimited pipeline outputs (CSV, TAB/TSV) into header-keyed rows
 */

import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import type { KeyedRows, RawRecord } from '@relecov-mapper/core';
import { MappingError, isSafeFieldName } from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig } from './base-file-reader.js';

export interface CsvReaderConfig extends FileReaderConfig {
  /** Delimiter (default: tab for .tab/.tsv, comma otherwise) */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
}

export interface ParsedTable {
  headers: string[];
  rows: RawRecord[];
}

export function inferDelimiter(filePath: string): string {
  const ext = extname(filePath).toLowerCase();
  return ext === '.tab' || ext === '.tsv' ? '\t' : ',';
}

/**
 * Cast a cell to a number only when the number prints back as the same text,
 * so sample ids like "0123" or "1E5" and values like "0.10" stay strings.
 */
export function castCell(value: string): string | number {
  if (value === '') return value;
  const n = Number(value);
  return Number.isFinite(n) && String(n) === value ? n : value;
}

export class CsvReader extends BaseFileReader<CsvReaderConfig, ParsedTable> {
  protected async parseContent(content: string): Promise<ParsedTable> {
    const rows: unknown[][] = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: this.config.delimiter ?? inferDelimiter(this.config.filePath),
      quote: this.config.quote ?? '"',
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
      cast: castCell,
      cast_date: false,
    });
    if (rows.length === 0) return { headers: [], rows: [] };

    const [headerRow = [], ...dataRows] = rows;
    const headers = headerRow.map((h) => String(h ?? ''));

    for (const header of headers) {
      if (header && !isSafeFieldName(header)) {
        throw new MappingError({
          code: 'READ_FAILED',
          message: `Unsafe column name "${header}" in ${this.config.filePath}`,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    return {
      headers,
      rows: dataRows.map((row) => {
        const record: RawRecord = {};
        headers.forEach((header, i) => {
          if (header) record[header] = row[i];
        });
        return record;
      }),
    };
  }
}

/**
 * Index rows by the value of one column (by position or header name).
 * Rows without a key are skipped; the first row wins on repeated keys.
 */
export function keyRowsBy(table: ParsedTable, column: number | string): Map<string, RawRecord> {
  const header = typeof column === 'number' ? table.headers[column] : column;
  const keyed = new Map<string, RawRecord>();
  if (header === undefined) return keyed;

  for (const row of table.rows) {
    const key = row[header];
    if (key === undefined || key === null || key === '') continue;
    const keyString = String(key);
    if (!keyed.has(keyString)) keyed.set(keyString, row);
  }
  return keyed;
}

/**
 * Read a delimited file and key it by sample column in one step
 */
export async function readKeyedTable(
  config: CsvReaderConfig,
  sampleColumn: number | string = 0
): Promise<KeyedRows> {
  const table = await new CsvReader(config).read();
  return keyRowsBy(table, sampleColumn);
}
