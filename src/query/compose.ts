import { QueryOptionsError } from '../errors.js';
import { normalizeField } from './fields.js';
import { normalizeOrderBy, parseListOptions } from './options.js';
import type {
  FieldName,
  FilterMap,
  ListOptionsInput,
  Predicate,
  QueryDescriptor,
  Queryable,
} from './types.js';

/** Returns a descriptor for a table name; descriptors are returned unchanged. */
export function from(source: Queryable): QueryDescriptor {
  if (typeof source !== 'string') return source;
  if (source.trim() === '') {
    throw new QueryOptionsError('from: source must be a non-empty table name');
  }
  return { source, where: [], orderBy: [], limit: null, offset: null };
}

/** Wraps a descriptor as a sub-query so later restrictions apply to its result. */
function materialize(query: QueryDescriptor): QueryDescriptor {
  return { source: query, where: [], orderBy: [], limit: null, offset: null };
}

function isPaginated(query: QueryDescriptor): boolean {
  return query.limit !== null || query.offset !== null;
}

function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

function filterEntries(filters: FilterMap): Array<[string, unknown]> {
  if (isMap(filters)) {
    const entries: Array<[string, unknown]> = [];
    for (const [key, value] of filters) {
      if (typeof key !== 'string' && typeof key !== 'symbol') {
        throw new QueryOptionsError(`Invalid filter field: ${String(key)}`);
      }
      entries.push([normalizeField(key), value]);
    }
    return entries;
  }
  return Reflect.ownKeys(filters)
    .filter((key) => Object.prototype.propertyIsEnumerable.call(filters, key))
    .map((key): [string, unknown] => [normalizeField(key), Reflect.get(filters, key)]);
}

/**
 * Restricts the query by each entry of `filters`: a scalar value means
 * equality, an array means membership. Fields combine with AND.
 *
 * @example
 * filter('users', { id: 5, name: 'John' })
 * filter('users', { name: ['John', 'Doe'] })
 */
export function filter(queryable: Queryable, filters: FilterMap): QueryDescriptor {
  const query = from(queryable);
  const entries = filterEntries(filters);
  if (entries.length === 0) return query;

  const target = isPaginated(query) ? materialize(query) : query;
  const predicates = entries.map(([field, value]): Predicate =>
    Array.isArray(value)
      ? { kind: 'in', field, values: [...value] }
      : { kind: 'eq', field, value },
  );
  return { ...target, where: [...target.where, ...predicates] };
}

/**
 * Case-insensitive substring search of `term` across `fields`, applied on top
 * of the incoming query as a sub-query so earlier restrictions stay intact.
 * A null, undefined or empty term returns the input unchanged.
 *
 * @example
 * search('users', 'John', ['name', 'email'])
 */
export function search(
  queryable: Queryable,
  term: string | null | undefined,
  fields: readonly FieldName[],
): QueryDescriptor {
  const query = from(queryable);
  if (term === null || term === undefined || term === '') return query;
  if (fields.length === 0) {
    throw new QueryOptionsError('search: at least one field is required');
  }

  const predicate: Predicate = {
    kind: 'or',
    predicates: fields.map((field): Predicate => ({ kind: 'search', field: normalizeField(field), term })),
  };
  return { ...materialize(query), where: [predicate] };
}

/**
 * Applies `customQuery`, then limit, offset and ordering.
 *
 * Options: `limit` (unbounded when absent), `offset` (0), `sortingOrder`
 * ('asc'), `orderBy` (no ordering when absent), `customQuery`.
 *
 * @example
 * list('users', { limit: 10 })
 * list('users', [['limit', 10], ['orderBy', [['asc', 'age'], ['desc', 'name']]]])
 */
export function list(queryable: Queryable, input: ListOptionsInput = {}): QueryDescriptor {
  const options = parseListOptions(input);
  let query = from(queryable);
  if (options.customQuery !== undefined) {
    query = options.customQuery(query);
  }

  const ordering = normalizeOrderBy(options.orderBy, options.sortingOrder ?? 'asc');
  const hasLimit = options.limit !== undefined;
  const hasOffset = options.offset !== undefined;
  if (!hasLimit && !hasOffset && ordering.length === 0) return query;

  const target = isPaginated(query) ? materialize(query) : query;
  const offset = options.offset ?? 0;
  return {
    ...target,
    limit: hasLimit ? options.limit ?? null : target.limit,
    offset: hasOffset ? (offset === 0 ? null : offset) : target.offset,
    orderBy: [...target.orderBy, ...ordering],
  };
}
