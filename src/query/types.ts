export type Direction = 'asc' | 'desc';

/** A field given as a string or as a symbol; both resolve to the same column. */
export type FieldName = string | symbol;

export type Predicate =
  | { kind: 'eq'; field: string; value: unknown }
  | { kind: 'in'; field: string; values: readonly unknown[] }
  | { kind: 'search'; field: string; term: string }
  | { kind: 'and'; predicates: readonly Predicate[] }
  | { kind: 'or'; predicates: readonly Predicate[] };

export interface OrderClause {
  direction: Direction;
  field: string;
}

/**
 * Immutable description of a query. A nested `source` is a materialized
 * sub-query: its own restrictions, ordering and pagination apply first.
 * Build through from/filter/search/list rather than by hand.
 */
export interface QueryDescriptor {
  readonly source: string | QueryDescriptor;
  readonly where: readonly Predicate[];
  readonly orderBy: readonly OrderClause[];
  readonly limit: number | null;
  readonly offset: number | null;
}

/** Anything the composer accepts as its input: a table name or a descriptor. */
export type Queryable = string | QueryDescriptor;

export type CustomQuery = (query: QueryDescriptor) => QueryDescriptor;

export type OrderByEntry =
  | FieldName
  | readonly [Direction, FieldName]
  | { field: FieldName; order?: Direction };

export type OrderBy = FieldName | readonly OrderByEntry[];

export interface ListOptions {
  limit?: number | null;
  offset?: number;
  sortingOrder?: Direction;
  orderBy?: OrderBy;
  customQuery?: CustomQuery;
}

/** The options bag of `list`, as a record, a Map, or a list of `[key, value]` entries. */
export type ListOptionsInput =
  | ListOptions
  | ReadonlyMap<string, unknown>
  | ReadonlyArray<readonly [string, unknown]>;

export type FilterValue = unknown;

/** Keys may be strings or symbols in either shape. */
export type FilterMap =
  | Readonly<Record<string, FilterValue>>
  | Readonly<Record<symbol, FilterValue>>
  | ReadonlyMap<FieldName, FilterValue>;
