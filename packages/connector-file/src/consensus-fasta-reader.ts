/**
 * Consensus FASTA Reader
 * Summarizes a single-sequence consensus file: header, length and MD5
 */

import { createHash } from 'node:crypto';
import { basename, dirname } from 'node:path';
import type { ConsensusSummary } from '@relecov-mapper/core';
import { MappingError } from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig } from './base-file-reader.js';

export class ConsensusFastaReader extends BaseFileReader<FileReaderConfig, ConsensusSummary> {
  protected async parseContent(content: string, raw: Buffer): Promise<ConsensusSummary> {
    const lines = content.split(/\r?\n/);
    const headerIndex = lines.findIndex((line) => line.startsWith('>'));
    if (headerIndex === -1) {
      throw new MappingError({
        code: 'READ_FAILED',
        message: `No FASTA header found in ${this.config.filePath}`,
        context: { id: this.config.id },
      });
    }

    let genomeLength = 0;
    for (const line of lines.slice(headerIndex + 1)) {
      // Only the first record counts
      if (line.startsWith('>')) break;
      genomeLength += line.trim().length;
    }

    return {
      sequenceName: (lines[headerIndex] ?? '').slice(1).trim(),
      genomeLength,
      fileName: basename(this.config.filePath),
      filePath: dirname(this.config.filePath),
      md5: createHash('md5').update(raw).digest('hex'),
    };
  }
}
