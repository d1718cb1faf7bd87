/**
 * Configuration Loader
 *
 * Reads the mapping configuration, its per-institution header files and the
 * target JSON Schemas. Every failure here is a ConfigurationError: nothing can
 * be mapped without them.
 */

import { dirname, resolve } from 'node:path';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type {
  FieldVariantsDocument,
  JsonSchemaDocument,
  MappingConfiguration,
  TargetSchemaDocuments,
} from '@relecov-mapper/core';
import {
  ConfigurationError,
  TARGET_SCHEMAS,
  compileMappingConfiguration,
  fieldVariantsSchema,
  formatZodError,
  mappingConfigurationDocumentSchema,
  type MappingError,
} from '@relecov-mapper/core';
import { BaseFileReader, type FileReaderConfig, type ReadFailure } from './base-file-reader.js';

/**
 * Reads a JSON (or YAML) document, rejecting duplicate keys
 */
export class ConfigDocumentReader extends BaseFileReader<FileReaderConfig, unknown> {
  protected async parseContent(content: string): Promise<unknown> {
    try {
      return parseYaml(content, { uniqueKeys: true });
    } catch (error) {
      if (error instanceof YAMLParseError && error.code === 'DUPLICATE_KEY') {
        throw new ConfigurationError({
          message: `Duplicate key in ${this.config.filePath}: ${error.message.split('\n')[0] ?? ''}`,
          suggestion: 'Each key may appear once; merge or rename the repeated entry.',
          context: { id: this.config.id },
        });
      }
      throw error;
    }
  }

  protected override createError(failure: ReadFailure, message: string, cause: unknown): MappingError {
    return new ConfigurationError({
      message,
      suggestion:
        failure === 'malformed'
          ? 'Check the document syntax.'
          : 'Check the configuration path (run config "configurationPath" or the default conf/ folder).',
      context: { id: this.config.id, filePath: this.config.filePath },
      cause: cause instanceof Error ? cause : undefined,
    });
  }
}

export interface LoadConfigurationOptions {
  /** Folder of institution_mapping_file entries (default: the configuration's folder) */
  institutionDir?: string;
}

export async function loadMappingConfiguration(
  configPath: string,
  options: LoadConfigurationOptions = {}
): Promise<MappingConfiguration> {
  const raw = await new ConfigDocumentReader({ id: 'configuration', filePath: configPath }).read();

  const result = mappingConfigurationDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError({
      message: formatZodError(result.error, configPath),
      suggestion: 'Fix the listed entries of the mapping configuration and run again.',
    });
  }

  const institutionDir = options.institutionDir ?? dirname(configPath);
  const institutionVariants: Record<string, FieldVariantsDocument> = {};
  for (const [institution, fileName] of Object.entries(result.data.institution_mapping_file)) {
    const filePath = resolve(institutionDir, fileName);
    const doc = await new ConfigDocumentReader({ id: institution, filePath }).read();
    const parsed = fieldVariantsSchema.safeParse(doc);
    if (!parsed.success) {
      throw new ConfigurationError({
        message: formatZodError(parsed.error, filePath),
        suggestion: 'Institution files map canonical fields to lists of header variants.',
      });
    }
    institutionVariants[institution] = parsed.data;
  }

  return compileMappingConfiguration(result.data, institutionVariants);
}

function isSchemaDocument(value: unknown): value is JsonSchemaDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the relecov/ena/gisaid JSON Schemas named in json_schemas
 */
export async function loadTargetSchemas(
  schemaDir: string,
  jsonSchemas: MappingConfiguration['jsonSchemas']
): Promise<TargetSchemaDocuments> {
  const loaded = await Promise.all(
    TARGET_SCHEMAS.map(async (target) => {
      const filePath = resolve(schemaDir, jsonSchemas[target]);
      const doc = await new ConfigDocumentReader({ id: `${target}_schema`, filePath }).read();
      if (!isSchemaDocument(doc)) {
        throw new ConfigurationError({
          message: `${filePath} is not a JSON Schema object`,
          context: { target },
        });
      }
      return doc;
    })
  );

  const [relecov, ena, gisaid] = loaded;
  if (!relecov || !ena || !gisaid) {
    throw new ConfigurationError({ message: 'Target schemas could not be loaded' });
  }
  return { relecov, ena, gisaid };
}
