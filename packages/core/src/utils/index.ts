export { extractFieldNames, hasField, isPlainObject } from './records.js';
