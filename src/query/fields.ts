import { QueryOptionsError } from '../errors.js';
import type { FieldName } from './types.js';

/**
 * Resolves a field given as a string or a symbol to its column name.
 * `'age'` and `Symbol('age')` resolve to the same column.
 */
export function normalizeField(field: FieldName): string {
  const name = typeof field === 'symbol' ? field.description : field;
  if (name === undefined || name.trim() === '') {
    throw new QueryOptionsError(`Invalid field reference: ${String(field)}`);
  }
  return name;
}
