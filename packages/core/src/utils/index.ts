export {
  fieldValueToString,
  getField,
  hasField,
  isSafeFieldName,
  pickFields,
  toFieldValue,
  toSampleFileName,
} from './records.js';
export { deepFreeze } from './freeze.js';
export { createReferenceTable } from './reference-table.js';
