/**
 * Schema Emitter
 *
 * Projects a canonical record onto one target schema and validates it.
 * Only validated records are handed to the serializers.
 */

import type { MappingConfiguration, SampleRecord, TargetSchema } from '@relecov-mapper/core';
import {
  SchemaValidationError,
  fieldValueToString,
  getField,
  pickFields,
} from '@relecov-mapper/core';
import type { ValidatedRecord } from '../types/index.js';
import type { SchemaValidator } from '../validation/schema-validator.js';

export type EmitResult =
  | { ok: true; value: ValidatedRecord }
  | { ok: false; error: SchemaValidationError };

/** Every ENA group field, plus the ENA fixed fields, in declaration order */
export function enaFieldNames(config: MappingConfiguration['ena']): string[] {
  return [
    ...new Set([
      ...Object.keys(config.fixedFields),
      ...config.studyFields,
      ...config.sampleFields,
      ...config.experimentFields,
      ...config.runFields,
    ]),
  ];
}

export class SchemaEmitter {
  constructor(
    private readonly config: MappingConfiguration,
    private readonly validator: SchemaValidator
  ) {}

  /**
   * The record as the target sees it, in the target's column order
   */
  project(record: Readonly<SampleRecord>, target: TargetSchema): SampleRecord {
    switch (target) {
      case 'relecov':
        return pickFields(record, this.validator.fieldSet('relecov').fields);

      case 'ena': {
        const groupFields = enaFieldNames(this.config.ena);
        const schemaFields = this.validator.fieldSet('ena').fields;
        const inGroups = new Set(groupFields);
        const ordered = [
          ...schemaFields.filter((field) => inGroups.has(field)),
          ...groupFields.filter((field) => !schemaFields.includes(field)),
        ];
        return pickFields({ ...record, ...this.config.ena.fixedFields }, ordered);
      }

      case 'gisaid': {
        const { headers, fieldMap, fixedFields } = this.config.gisaid;
        const projected: SampleRecord = {};
        for (const header of headers) {
          const fixed = fixedFields[header];
          if (fixed !== undefined) {
            projected[header] = fixed;
            continue;
          }
          const canonical = fieldMap[header];
          const value = canonical === undefined ? undefined : getField(record, canonical);
          if (value !== undefined) {
            projected[header] = fieldValueToString(value);
          }
        }
        return projected;
      }
    }
  }

  /**
   * Project and validate. On failure every violation is returned.
   */
  validateAndEmit(record: Readonly<SampleRecord>, target: TargetSchema): EmitResult {
    const values = this.project(record, target);
    const violations = this.validator.validate(target, values);
    if (violations.length > 0) {
      return { ok: false, error: new SchemaValidationError(target, violations) };
    }
    return { ok: true, value: { target, values } };
  }
}
