/**
 * Error types for the mapping engine
 * Every thrown error carries a code and, where possible, a suggested fix.
 */

import type { SchemaViolation } from '../types/index.js';

export type MappingErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'REFERENCE_NOT_FOUND'
  | 'REFERENCE_MALFORMED'
  | 'REFERENCE_DUPLICATE_KEY'
  | 'MISSING_REQUIRED_FILE'
  | 'SCHEMA_VALIDATION'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'UNKNOWN';

export interface MappingErrorDetails {
  /** Error code for programmatic handling */
  code: MappingErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class MappingError extends Error {
  readonly code: MappingErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MappingErrorDetails) {
    super(details.message);
    this.name = 'MappingError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for the batch report and terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/** Malformed or missing mapping tables. Fatal for the run. */
export class ConfigurationError extends MappingError {
  constructor(details: Omit<MappingErrorDetails, 'code'>) {
    super({ ...details, code: 'CONFIGURATION_ERROR' });
    this.name = 'ConfigurationError';
  }
}

/** A reference dataset could not be loaded. Fatal for the enrichments using it. */
export class ReferenceLoadError extends MappingError {
  readonly dataset: string;

  constructor(
    dataset: string,
    details: Omit<MappingErrorDetails, 'code'> & {
      code: Extract<MappingErrorCode, `REFERENCE_${string}`>;
    }
  ) {
    super({ ...details, context: { ...details.context, dataset } });
    this.name = 'ReferenceLoadError';
    this.dataset = dataset;
  }
}

/** A bioinformatics file or metric set is absent for one sample */
export class MissingRequiredFileError extends MappingError {
  readonly sampleId: string;
  readonly file: string;

  constructor(sampleId: string, file: string, message?: string) {
    super({
      code: 'MISSING_REQUIRED_FILE',
      message: message ?? `Required file ${file} is missing for sample ${sampleId}`,
      suggestion: 'Check that the pipeline finished for this sample and its outputs were copied.',
      context: { sampleId, file },
    });
    this.name = 'MissingRequiredFileError';
    this.sampleId = sampleId;
    this.file = file;
  }
}

/** Every field-level violation of one record against one target schema */
export class SchemaValidationError extends MappingError {
  readonly target: string;
  readonly violations: readonly SchemaViolation[];

  constructor(target: string, violations: readonly SchemaViolation[]) {
    const fields = violations.map((v) => v.field).join(', ');
    super({
      code: 'SCHEMA_VALIDATION',
      message: `Record does not satisfy the ${target} schema (${violations.length} violation${violations.length === 1 ? '' : 's'}: ${fields})`,
      context: { target },
    });
    this.name = 'SchemaValidationError';
    this.target = target;
    this.violations = violations;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), violations: this.violations };
  }
}

/**
 * Helper to wrap unknown errors as MappingError
 */
export function wrapError(
  error: unknown,
  defaultCode: MappingErrorCode = 'UNKNOWN'
): MappingError {
  if (error instanceof MappingError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new MappingError({
    code: defaultCode,
    message,
    cause,
  });
}
