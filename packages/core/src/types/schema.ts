/**
 * Target submission schemas
 */

export const TARGET_SCHEMAS = ['relecov', 'ena', 'gisaid'] as const;

export type TargetSchema = (typeof TARGET_SCHEMAS)[number];

/**
 * Ordered field names of a target schema.
 * Order drives column ordering, `required` drives presence checks.
 */
export interface SchemaFieldSet {
  target: TargetSchema;
  fields: readonly string[];
  required: readonly string[];
}

/** A target JSON Schema document, treated as an opaque validator input */
export type JsonSchemaDocument = { [key: string]: unknown };

export type TargetSchemaDocuments = { readonly [K in TargetSchema]: JsonSchemaDocument };

export function isTargetSchema(value: string): value is TargetSchema {
  return (TARGET_SCHEMAS as readonly string[]).includes(value);
}
