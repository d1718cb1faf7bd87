/**
 * JSON Records Reader
 * Reads lab metadata delivered as a JSON array of objects
 */

import type { RawRecord } from '@relecov-mapper/core';
import { MappingError } from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig } from './base-file-reader.js';

export type JsonRecordsReaderConfig = FileReaderConfig;

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The sample list: the root array, or the `records` array of an export envelope */
function sampleList(parsed: unknown): unknown[] | undefined {
  if (Array.isArray(parsed)) return parsed;
  if (isRawRecord(parsed) && Array.isArray(parsed.records)) return parsed.records;
  return undefined;
}

export class JsonRecordsReader extends BaseFileReader<JsonRecordsReaderConfig, RawRecord[]> {
  protected async parseContent(content: string): Promise<RawRecord[]> {
    const records = sampleList(JSON.parse(content));

    if (!records) {
      throw new MappingError({
        code: 'READ_FAILED',
        message: `${this.config.filePath} holds neither a sample array nor a "records" array`,
        context: { id: this.config.id },
        suggestion: 'Provide an array of sample objects, or { "records": [...] }.',
      });
    }

    const invalid = records.findIndex((r) => !isRawRecord(r));
    if (invalid !== -1) {
      throw new MappingError({
        code: 'READ_FAILED',
        message: `Entry ${invalid} of ${this.config.filePath} is not an object`,
        context: { id: this.config.id },
      });
    }

    return records.filter(isRawRecord);
  }
}

export function createJsonRecordsReader(config: JsonRecordsReaderConfig): JsonRecordsReader {
  return new JsonRecordsReader(config);
}
