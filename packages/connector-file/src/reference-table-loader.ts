/**
 * Reference Table Loader
 *
 * Loads auxiliary lookup datasets (laboratory addresses, city coordinates,
 * specimen-source breakdowns) into read-only keyed tables. Each dataset is
 * read once per loader and shared by every record of the run.
 */

import { resolve } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type { EnrichmentSpec, FieldValue, Logger, ReferenceTable } from '@relecov-mapper/core';
import {
  ReferenceLoadError,
  createReferenceTable,
  isSafeFieldName,
  silentLogger,
  type MappingError,
} from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig, type ReadFailure } from './base-file-reader.js';

export interface ReferenceDatasetConfig extends FileReaderConfig {
  /** Key field for datasets stored as an array of rows */
  keyField?: string;
}

type FlatRow = { [field: string]: FieldValue };

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const FAILURE_CODES = {
  'not-found': 'REFERENCE_NOT_FOUND',
  'permission-denied': 'REFERENCE_NOT_FOUND',
  malformed: 'REFERENCE_MALFORMED',
} as const;

export class ReferenceDatasetReader extends BaseFileReader<ReferenceDatasetConfig, ReferenceTable> {
  protected async parseContent(content: string): Promise<ReferenceTable> {
    let parsed: unknown;
    try {
      // Parsed as YAML (a JSON superset) so duplicate object keys raise instead of shadowing
      parsed = parseYaml(content, { uniqueKeys: true });
    } catch (error) {
      if (error instanceof YAMLParseError && error.code === 'DUPLICATE_KEY') {
        throw this.referenceError(
          'REFERENCE_DUPLICATE_KEY',
          `Duplicate join key in ${this.config.id}: ${error.message.split('\n')[0] ?? ''}`
        );
      }
      throw error;
    }

    if (Array.isArray(parsed)) {
      return this.fromRows(parsed);
    }
    if (isPlainObject(parsed)) {
      return createReferenceTable(
        this.config.id,
        Object.entries(parsed).map(([key, row]) => [key, this.flattenRow(key, row)])
      );
    }
    throw this.referenceError(
      'REFERENCE_MALFORMED',
      `Reference dataset ${this.config.id} must be an object of rows or an array of rows`
    );
  }

  protected override createError(failure: ReadFailure, message: string, cause: unknown): MappingError {
    return new ReferenceLoadError(this.config.id, {
      code: FAILURE_CODES[failure],
      message,
      suggestion:
        failure === 'malformed'
          ? 'Fix the dataset so it is a JSON object of flat rows.'
          : 'Check the reference directory and the file name in lab_metadata_req_json.',
      cause: cause instanceof Error ? cause : undefined,
    });
  }

  private fromRows(rows: unknown[]): ReferenceTable {
    const keyField = this.config.keyField;
    if (!keyField) {
      throw this.referenceError(
        'REFERENCE_MALFORMED',
        `Reference dataset ${this.config.id} is an array but no key field was given`
      );
    }

    const entries = new Map<string, FlatRow>();
    rows.forEach((row, index) => {
      const flat = this.flattenRow(`#${index}`, row);
      const key = flat[keyField];
      if (key === undefined || key === '') {
        throw this.referenceError(
          'REFERENCE_MALFORMED',
          `Row ${index} of ${this.config.id} has no "${keyField}" value`
        );
      }
      const keyString = String(key);
      if (entries.has(keyString)) {
        throw this.referenceError(
          'REFERENCE_DUPLICATE_KEY',
          `Duplicate join key "${keyString}" in ${this.config.id}`
        );
      }
      entries.set(keyString, flat);
    });
    return createReferenceTable(this.config.id, entries);
  }

  private flattenRow(key: string, row: unknown): FlatRow {
    if (!isPlainObject(row)) {
      throw this.referenceError(
        'REFERENCE_MALFORMED',
        `Entry "${key}" of ${this.config.id} is not an object`
      );
    }

    const flat: FlatRow = {};
    for (const [field, value] of Object.entries(row)) {
      if (!isSafeFieldName(field)) {
        throw this.referenceError('REFERENCE_MALFORMED', `Unsafe field name "${field}" in ${this.config.id}`);
      }
      if (value === null) continue;
      if (typeof value === 'string' || typeof value === 'number') {
        flat[field] = value;
      } else if (typeof value === 'boolean') {
        flat[field] = String(value);
      } else {
        throw this.referenceError(
          'REFERENCE_MALFORMED',
          `Field "${field}" of entry "${key}" in ${this.config.id} is not a scalar`
        );
      }
    }
    return flat;
  }

  private referenceError(
    code: 'REFERENCE_MALFORMED' | 'REFERENCE_DUPLICATE_KEY',
    message: string
  ): ReferenceLoadError {
    return new ReferenceLoadError(this.config.id, {
      code,
      message,
      suggestion:
        code === 'REFERENCE_DUPLICATE_KEY'
          ? 'Remove or merge the duplicated entries; duplicates are never resolved automatically.'
          : 'Fix the dataset so it is a JSON object of flat rows.',
    });
  }
}

export interface ReferenceTableLoaderOptions {
  /** Directory holding the reference datasets */
  baseDir: string;
  encoding?: BufferEncoding;
  logger?: Logger;
}

export interface LoadedReferenceTables {
  /** Dataset id -> table, for every dataset that loaded */
  tables: Map<string, ReferenceTable>;
  /** One error per dataset that failed */
  errors: ReferenceLoadError[];
}

export class ReferenceTableLoader {
  private readonly cache = new Map<string, Promise<ReferenceTable>>();
  private readonly logger: Logger;

  constructor(private readonly options: ReferenceTableLoaderOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load a dataset, reusing the cached table (or the in-flight load).
   * Throws ReferenceLoadError when the dataset is missing, malformed or has
   * duplicate join keys.
   */
  load(datasetId: string, options: { keyField?: string } = {}): Promise<ReferenceTable> {
    const cached = this.cache.get(datasetId);
    if (cached) return cached;

    const reader = new ReferenceDatasetReader({
      id: datasetId,
      filePath: resolve(this.options.baseDir, datasetId),
      encoding: this.options.encoding,
      keyField: options.keyField,
    });

    const pending = reader.read().then(
      (table) => {
        this.logger.debug('Loaded reference dataset', { dataset: datasetId, rows: table.size });
        return table;
      },
      (error: unknown) => {
        this.cache.delete(datasetId);
        throw error;
      }
    );
    this.cache.set(datasetId, pending);
    return pending;
  }

  /**
   * Load every dataset the enrichment specs need. Failures are collected,
   * not thrown, so enrichments with healthy datasets can still run.
   */
  async loadAll(specs: readonly EnrichmentSpec[]): Promise<LoadedReferenceTables> {
    const datasets = [...new Set(specs.map((spec) => spec.dataset))];
    const tables = new Map<string, ReferenceTable>();
    const errors: ReferenceLoadError[] = [];

    const results = await Promise.allSettled(datasets.map((dataset) => this.load(dataset)));
    results.forEach((result, i) => {
      const dataset = datasets[i];
      if (dataset === undefined) return;
      if (result.status === 'fulfilled') {
        tables.set(dataset, result.value);
        return;
      }
      const error =
        result.reason instanceof ReferenceLoadError
          ? result.reason
          : new ReferenceLoadError(dataset, {
              code: 'REFERENCE_MALFORMED',
              message: result.reason instanceof Error ? result.reason.message : String(result.reason),
            });
      this.logger.error('Reference dataset unavailable', { dataset, error });
      errors.push(error);
    });

    return { tables, errors };
  }
}
