/**
 * Version Manifest Reader
 * Reads software_versions.yml ({ PROCESS: { software: version } })
 */

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { VersionManifest } from '@relecov-mapper/core';
import { MappingError, formatZodError } from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig } from './base-file-reader.js';

const versionManifestSchema = z.record(z.string(), z.record(z.string(), z.string()));

export class VersionManifestReader extends BaseFileReader<FileReaderConfig, VersionManifest> {
  protected async parseContent(content: string): Promise<VersionManifest> {
    // Failsafe keeps every scalar a string: "1.10" must not become 1.1
    const result = versionManifestSchema.safeParse(parseYaml(content, { schema: 'failsafe' }));
    if (!result.success) {
      throw new MappingError({
        code: 'READ_FAILED',
        message: formatZodError(result.error, this.config.filePath),
        suggestion: 'Expected one mapping per process: PROCESS: { software: version }.',
        context: { id: this.config.id },
      });
    }
    return result.data;
  }
}
