/**
 * Error exports
 */

export {
  MappingError,
  ConfigurationError,
  ReferenceLoadError,
  MissingRequiredFileError,
  SchemaValidationError,
  wrapError,
} from './mapping-error.js';
export type { MappingErrorCode, MappingErrorDetails } from './mapping-error.js';
