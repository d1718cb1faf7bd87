/**
 * Schema Validator
 *
 * Compiles each target's JSON Schema with ajv and reports every
 * field-level violation of a record, not just the first.
 */

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { z } from 'zod';
import type {
  JsonSchemaDocument,
  SampleRecord,
  SchemaFieldSet,
  SchemaViolation,
  TargetSchema,
  TargetSchemaDocuments,
} from '@relecov-mapper/core';
import { ConfigurationError, TARGET_SCHEMAS, formatZodError, hasField } from '@relecov-mapper/core';

// ajv and ajv-formats are CommonJS; under NodeNext the default import is module.exports
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const fieldSetDocumentSchema = z
  .object({
    properties: z.record(z.unknown()),
    required: z.array(z.string()).default([]),
  })
  .passthrough();

/** Ordered properties and required list of a target schema */
export function extractFieldSet(target: TargetSchema, schema: JsonSchemaDocument): SchemaFieldSet {
  const parsed = fieldSetDocumentSchema.safeParse(schema);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: formatZodError(parsed.error, `${target} schema`),
      suggestion: 'Target schemas must be JSON Schema objects with top-level "properties".',
    });
  }
  return {
    target,
    fields: Object.keys(parsed.data.properties),
    required: parsed.data.required,
  };
}

function decodePointerSegment(segment: string): string {
  return segment.replace(/~1/g, '/').replace(/~0/g, '~');
}

function violationField(error: ErrorObject): string {
  const { missingProperty, additionalProperty } = error.params;
  if (error.keyword === 'required' && typeof missingProperty === 'string') {
    return missingProperty;
  }
  if (error.keyword === 'additionalProperties' && typeof additionalProperty === 'string') {
    return additionalProperty;
  }
  const [, first] = error.instancePath.split('/');
  return first ? decodePointerSegment(first) : '(record)';
}

export class SchemaValidator {
  private readonly validators = new Map<TargetSchema, ValidateFunction>();
  private readonly fieldSets = new Map<TargetSchema, SchemaFieldSet>();

  constructor(schemas: TargetSchemaDocuments) {
    for (const target of TARGET_SCHEMAS) {
      const schema = schemas[target];
      this.fieldSets.set(target, extractFieldSet(target, schema));

      const ajv = new Ajv({ allErrors: true, strict: false });
      addFormats(ajv);
      try {
        this.validators.set(target, ajv.compile(schema));
      } catch (error) {
        throw new ConfigurationError({
          message: `Invalid ${target} JSON Schema: ${error instanceof Error ? error.message : String(error)}`,
          suggestion: 'Fix the schema file named in json_schemas.',
          cause: error instanceof Error ? error : undefined,
        });
      }
    }
  }

  fieldSet(target: TargetSchema): SchemaFieldSet {
    const fieldSet = this.fieldSets.get(target);
    if (!fieldSet) {
      throw new ConfigurationError({ message: `No schema loaded for target ${target}` });
    }
    return fieldSet;
  }

  /** Union of every target's fields */
  fieldUnion(): ReadonlySet<string> {
    const union = new Set<string>();
    for (const fieldSet of this.fieldSets.values()) {
      fieldSet.fields.forEach((field) => union.add(field));
    }
    return union;
  }

  /**
   * Every violation of `values` against the target schema; empty when valid
   */
  validate(target: TargetSchema, values: Readonly<SampleRecord>): SchemaViolation[] {
    const validate = this.validators.get(target);
    if (!validate) {
      throw new ConfigurationError({ message: `No schema loaded for target ${target}` });
    }
    const data: unknown = values;
    if (validate(data)) return [];

    const seen = new Set<string>();
    const violations: SchemaViolation[] = [];
    for (const error of validate.errors ?? []) {
      const field = violationField(error);
      const message = error.message ?? error.keyword;
      const id = `${field}\u0000${error.keyword}\u0000${message}`;
      if (seen.has(id)) continue;
      seen.add(id);

      violations.push({
        field,
        message,
        keyword: error.keyword,
        ...(hasField(values, field) ? { value: values[field] } : {}),
      });
    }
    return violations;
  }
}
