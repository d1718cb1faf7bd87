/**
 * Validation exports
 */

export {
  mappingConfigurationDocumentSchema,
  fieldVariantsSchema,
  fieldValueSchema,
  parseRuleOutput,
  formatZodError,
  ALL_FIELDS_SENTINEL,
  BIOINFO_FILE_KEYS,
} from './configuration-schema.js';
export type {
  MappingConfigurationDocument,
  FieldVariantsDocument,
} from './configuration-schema.js';

export {
  compileMappingConfiguration,
  parseMappingConfiguration,
  toRenameTable,
} from './compile-configuration.js';
