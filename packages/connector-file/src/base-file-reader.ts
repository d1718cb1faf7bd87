/**
 * Base class for file-based readers
 * Handles common functionality: existence checks, decoding and error mapping
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { MappingError } from '@relecov-mapper/core';

export interface FileReaderConfig {
  /** Identifier used in error messages (dataset name, file key, ...) */
  id: string;
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

export type ReadFailure = 'not-found' | 'permission-denied' | 'malformed';

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Abstract base class for file readers
 */
export abstract class BaseFileReader<TConfig extends FileReaderConfig, TOutput> {
  readonly config: TConfig;

  constructor(config: TConfig) {
    this.config = config;
  }

  async read(): Promise<TOutput> {
    let raw: Buffer;

    try {
      await access(this.config.filePath, constants.R_OK);
      raw = await readFile(this.config.filePath);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw this.createError('not-found', `File not found: ${this.config.filePath}`, error);
      }
      if (code === 'EACCES') {
        throw this.createError('permission-denied', `Cannot read file: ${this.config.filePath}`, error);
      }
      throw new MappingError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        context: { id: this.config.id, filePath: this.config.filePath },
        cause: error instanceof Error ? error : undefined,
      });
    }

    const content = raw.toString(this.config.encoding ?? 'utf-8');
    try {
      // Handle UTF-8 BOM (common on Windows exports)
      return await this.parseContent(content.replace(/^\uFEFF/, ''), raw);
    } catch (error) {
      if (error instanceof MappingError) throw error;
      throw this.createError(
        'malformed',
        `Cannot parse ${this.config.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Build the error thrown for a failed read; readers override this to raise
   * their own error type.
   */
  protected createError(failure: ReadFailure, message: string, cause: unknown): MappingError {
    const suggestion =
      failure === 'not-found'
        ? 'Check that the file path is correct and the file exists.'
        : failure === 'permission-denied'
          ? 'Check file permissions.'
          : 'Check the file contents and format.';

    return new MappingError({
      code: 'READ_FAILED',
      message,
      suggestion,
      context: { id: this.config.id, filePath: this.config.filePath, failure },
      cause: cause instanceof Error ? cause : undefined,
    });
  }

  /**
   * Parse file content (implemented by subclasses). `raw` holds the bytes as
   * read from disk, before decoding and BOM removal.
   */
  protected abstract parseContent(content: string, raw: Buffer): Promise<TOutput>;
}
