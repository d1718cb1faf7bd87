/**
 * Lab Workbook Reader
 * Reads the lab metadata sheet of an .xlsx template into raw records
 */

import ExcelJS from 'exceljs';
import type { RawRecord } from '@relecov-mapper/core';
import { MappingError, isSafeFieldName } from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig } from './base-file-reader.js';

export interface LabWorkbookReaderConfig extends FileReaderConfig {
  /** Sheet name (default: first sheet) */
  sheet?: string;
  /** 1-indexed row holding the headers (default: 1) */
  headerRow?: number;
}

export class LabWorkbookReader extends BaseFileReader<LabWorkbookReaderConfig, RawRecord[]> {
  override async read(): Promise<RawRecord[]> {
    if (!(await this.exists())) {
      throw this.createError('not-found', `File not found: ${this.config.filePath}`, undefined);
    }

    const workbook = new ExcelJS.Workbook();
    try {
      // ExcelJS needs to read from the file directly
      await workbook.xlsx.readFile(this.config.filePath);
    } catch (error) {
      throw this.createError(
        'malformed',
        `Cannot open workbook ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    return this.readSheet(workbook);
  }

  protected async parseContent(_content: string): Promise<RawRecord[]> {
    throw new MappingError({
      code: 'UNKNOWN',
      message: 'Workbooks are read from the file, not from decoded text',
    });
  }

  private readSheet(workbook: ExcelJS.Workbook): RawRecord[] {
    const sheet = this.config.sheet
      ? workbook.getWorksheet(this.config.sheet)
      : workbook.worksheets[0];
    if (!sheet) {
      throw new MappingError({
        code: 'READ_FAILED',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        context: { id: this.config.id, filePath: this.config.filePath },
        suggestion: 'Check the workbook sheet name in lab_metadata.workbook.',
      });
    }

    const headerRowNumber = this.config.headerRow ?? 1;
    const headers: string[] = [];
    sheet.getRow(headerRowNumber).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      const header = String(this.getCellValue(cell) ?? '').trim();
      if (!header) return;
      if (!isSafeFieldName(header)) {
        throw new MappingError({
          code: 'READ_FAILED',
          message: `Unsafe header name: ${header}`,
          context: { id: this.config.id },
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
      headers[colNumber] = header;
    });

    const records: RawRecord[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber <= headerRowNumber) return;

      const record: RawRecord = {};
      let hasData = false;

      headers.forEach((header, colNumber) => {
        const value = this.getCellValue(row.getCell(colNumber));
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      });

      // Template sheets carry formatted but empty rows
      if (hasData) {
        records.push(record);
      }
    });

    return records;
  }

  private getCellValue(cell: ExcelJS.Cell): unknown {
    const value = cell.value;

    if (value === null || value === undefined) {
      return null;
    }

    if (value instanceof Date) {
      return value;
    }

    if (typeof value === 'object') {
      // Formula results
      if ('result' in value) {
        return value.result ?? null;
      }
      // Rich text
      if ('richText' in value) {
        return value.richText.map((rt) => rt.text).join('');
      }
      // Hyperlinks
      if ('hyperlink' in value) {
        return value.text;
      }
      if ('error' in value) {
        return null;
      }
    }

    return typeof value === 'string' ? value.trim() : value;
  }
}

export function createLabWorkbookReader(config: LabWorkbookReaderConfig): LabWorkbookReader {
  return new LabWorkbookReader(config);
}
