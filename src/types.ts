import type { Queryable } from './query/types.js';

export type Row = Record<string, unknown>;

/** Scalar identifier of a stored record. */
export type RecordId = string | number | bigint;

/**
 * A validation message before translation. `params` feed `%{name}` placeholders
 * and carry validation metadata (e.g. `validation: 'length'`).
 */
export interface ValidationMessage {
  readonly message: string;
  readonly params?: Readonly<Record<string, unknown>>;
}

/**
 * Errors of one field. An association may also carry messages about the
 * association as a whole (e.g. too few items) next to its children's errors.
 */
export type FieldErrors =
  | { readonly kind: 'messages'; readonly messages: readonly ValidationMessage[] }
  | {
    readonly kind: 'association';
    readonly cardinality: 'one';
    readonly child: ValidationTree;
    readonly messages?: readonly ValidationMessage[];
  }
  | {
    readonly kind: 'association';
    readonly cardinality: 'many';
    readonly children: readonly ValidationTree[];
    readonly messages?: readonly ValidationMessage[];
  };

/** Field name → errors for that field. Valid children of a to-many association are empty trees. */
export type ValidationTree = Readonly<Record<string, FieldErrors>>;

export interface Repository {
  all(query: Queryable): Promise<Row[]>;
  count(query: Queryable, field: string): Promise<number>;
  get(table: string, primaryKey: string, id: RecordId): Promise<Row | null>;
  /** Throws MultipleResultsError when more than one row matches. */
  getBy(table: string, clauses: Readonly<Record<string, unknown>>): Promise<Row | null>;
  insert(table: string, values: Row): Promise<Row>;
  /** Throws StaleRecordError when the row no longer exists. */
  update(table: string, primaryKey: string, id: RecordId, changes: Row): Promise<Row>;
  /** Throws StaleRecordError when the row no longer exists. */
  delete(table: string, primaryKey: string, id: RecordId): Promise<Row>;
  /** Runs `fn` against a repository bound to a single transaction. */
  transaction<R>(fn: (tx: Repository) => Promise<R>): Promise<R>;
  close(): Promise<void>;
}
