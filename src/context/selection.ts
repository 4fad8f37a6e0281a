import { QueryOptionsError } from '../errors.js';

export const CRUD_FUNCTIONS = ['get', 'list', 'count', 'search', 'filter', 'create', 'update', 'delete'] as const;

export type CrudFunction = (typeof CRUD_FUNCTIONS)[number];

export interface FunctionSelection {
  /** When non-empty, only these functions are exposed. */
  only?: readonly CrudFunction[];
  /** When non-empty, these functions are not exposed. */
  except?: readonly CrudFunction[];
}

/** Returns a predicate telling whether a function is exposed. `only` and `except` are exclusive. */
export function selectFunctions(selection: FunctionSelection = {}): (fn: CrudFunction) => boolean {
  const only = selection.only ?? [];
  const except = selection.except ?? [];
  if (only.length > 0 && except.length > 0) {
    throw new QueryOptionsError('Only one of `only` and `except` may be given');
  }
  if (only.length > 0) return (fn) => only.includes(fn);
  return (fn) => !except.includes(fn);
}
