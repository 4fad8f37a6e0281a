import { RepositoryError } from '../errors.js';
import type { Row } from '../types.js';
import { from } from './compose.js';
import type { OrderClause, Predicate, QueryDescriptor, Queryable } from './types.js';

export type Tables = Readonly<Record<string, readonly Row[]>>;

function readField(row: Row, field: string): unknown {
  if (!Object.hasOwn(row, field)) {
    throw new RepositoryError(`column "${field}" does not exist`);
  }
  return row[field];
}

const TRUE_TEXT = new Set(['t', 'true', 'y', 'yes', 'on', '1']);
const FALSE_TEXT = new Set(['f', 'false', 'n', 'no', 'off', '0']);

/**
 * A text parameter compared with a typed column is read as the column's type,
 * the way PostgreSQL reads an untyped parameter. Unreadable text matches nothing.
 */
function fromText(cell: unknown, text: string): unknown {
  const trimmed = text.trim();
  if (typeof cell === 'number') return trimmed === '' ? undefined : Number(trimmed);
  if (typeof cell === 'bigint') return /^[+-]?\d+$/.test(trimmed) ? BigInt(trimmed) : undefined;
  if (typeof cell === 'boolean') {
    const lower = trimmed.toLowerCase();
    return TRUE_TEXT.has(lower) ? true : FALSE_TEXT.has(lower) ? false : undefined;
  }
  if (cell instanceof Date) return new Date(trimmed);
  return text;
}

function sameValue(cell: unknown, value: unknown): boolean {
  const param = typeof value === 'string' ? fromText(cell, value) : value;
  if (cell instanceof Date && param instanceof Date) return cell.getTime() === param.getTime();
  return cell === param;
}

function textOf(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

function matches(row: Row, predicate: Predicate): boolean {
  switch (predicate.kind) {
    case 'eq': {
      const cell = readField(row, predicate.field);
      if (predicate.value === null || predicate.value === undefined) return cell === null || cell === undefined;
      return sameValue(cell, predicate.value);
    }
    case 'in': {
      const cell = readField(row, predicate.field);
      if (cell === null || cell === undefined) return false;
      return predicate.values.some((value) => sameValue(cell, value));
    }
    case 'search': {
      const cell = readField(row, predicate.field);
      if (cell === null || cell === undefined) return false;
      return textOf(cell).toLowerCase().includes(predicate.term.toLowerCase());
    }
    case 'and':
      return predicate.predicates.every((p) => matches(row, p));
    case 'or':
      return predicate.predicates.some((p) => matches(row, p));
  }
}

/** Orders non-null values; strings compare by code unit. */
function compareValues(a: unknown, b: unknown): number {
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = textOf(a);
  const right = textOf(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

// Nulls sort last ascending and first descending, like PostgreSQL.
function compareRows(a: Row, b: Row, orderBy: readonly OrderClause[]): number {
  for (const { field, direction } of orderBy) {
    const left = readField(a, field);
    const right = readField(b, field);
    const leftNull = left === null || left === undefined;
    const rightNull = right === null || right === undefined;
    let result: number;
    if (leftNull || rightNull) {
      result = leftNull === rightNull ? 0 : leftNull ? 1 : -1;
    } else {
      result = compareValues(left, right);
    }
    if (result !== 0) return direction === 'asc' ? result : -result;
  }
  return 0;
}

function run(query: QueryDescriptor, tables: Tables): Row[] {
  let rows: Row[];
  if (typeof query.source === 'string') {
    const table = tables[query.source];
    if (table === undefined) {
      throw new RepositoryError(`relation "${query.source}" does not exist`);
    }
    rows = [...table];
  } else {
    rows = run(query.source, tables);
  }

  if (query.where.length > 0) {
    rows = rows.filter((row) => query.where.every((predicate) => matches(row, predicate)));
  }
  if (query.orderBy.length > 0) {
    // Array.prototype.sort is stable, so equal keys keep their incoming order.
    rows.sort((a, b) => compareRows(a, b, query.orderBy));
  }
  const start = query.offset ?? 0;
  const end = query.limit === null ? undefined : start + query.limit;
  return rows.slice(start, end);
}

/**
 * Executes a descriptor against in-memory tables with the same semantics the
 * compiled SQL has. Returned rows are copies.
 */
export function evaluate(queryable: Queryable, tables: Tables): Row[] {
  return run(from(queryable), tables).map((row) => ({ ...row }));
}
