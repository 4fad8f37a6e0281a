import { from } from './compose.js';
import type { Predicate, QueryDescriptor, Queryable } from './types.js';
import type { RecordId, Row } from '../types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Escapes LIKE wildcards so the term matches literally (backslash is the default escape). */
export function escapeLikeTerm(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Compiles a Predicate into a SQL fragment and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
function compilePredicate(
  predicate: Predicate,
  alias: string,
  params: unknown[],
  counter: { n: number },
): string {
  switch (predicate.kind) {
    case 'eq': {
      const column = `${alias}.${quoteIdentifier(predicate.field)}`;
      if (predicate.value === null || predicate.value === undefined) {
        return `${column} IS NULL`;
      }
      params.push(predicate.value);
      counter.n += 1;
      return `${column} = $${counter.n}`;
    }
    case 'in': {
      if (predicate.values.length === 0) return 'FALSE';
      params.push([...predicate.values]);
      counter.n += 1;
      return `${alias}.${quoteIdentifier(predicate.field)} = ANY($${counter.n})`;
    }
    case 'search': {
      params.push(`%${escapeLikeTerm(predicate.term)}%`);
      counter.n += 1;
      return `CAST(${alias}.${quoteIdentifier(predicate.field)} AS varchar) ILIKE $${counter.n}`;
    }
    case 'and': {
      const parts = predicate.predicates.map((p) => compilePredicate(p, alias, params, counter));
      return `(${parts.join(' AND ')})`;
    }
    case 'or': {
      const parts = predicate.predicates.map((p) => compilePredicate(p, alias, params, counter));
      return `(${parts.join(' OR ')})`;
    }
  }
}

/**
 * Compiles one descriptor level. Nested sources become sub-queries aliased
 * q0, q1, ... from the outside in; parameters are numbered in textual order.
 */
function compileSelect(
  query: QueryDescriptor,
  depth: number,
  params: unknown[],
  counter: { n: number },
): string {
  const alias = `q${depth}`;
  const fromClause = typeof query.source === 'string'
    ? `FROM ${quoteIdentifier(query.source)} AS ${alias}`
    : `FROM (\n${compileSelect(query.source, depth + 1, params, counter)}\n) AS ${alias}`;

  const lines = [`SELECT ${alias}.*`, fromClause];

  if (query.where.length > 0) {
    const parts = query.where.map((p) => compilePredicate(p, alias, params, counter));
    lines.push(`WHERE ${parts.join(' AND ')}`);
  }

  if (query.orderBy.length > 0) {
    const parts = query.orderBy.map(
      ({ field, direction }) => `${alias}.${quoteIdentifier(field)} ${direction.toUpperCase()}`,
    );
    lines.push(`ORDER BY ${parts.join(', ')}`);
  }

  if (query.limit !== null) {
    params.push(query.limit);
    counter.n += 1;
    lines.push(`LIMIT $${counter.n}`);
  }

  if (query.offset !== null) {
    params.push(query.offset);
    counter.n += 1;
    lines.push(`OFFSET $${counter.n}`);
  }

  return lines.join('\n');
}

export function compileSelectQuery(queryable: Queryable): CompiledQuery {
  const params: unknown[] = [];
  const sql = compileSelect(from(queryable), 0, params, { n: 0 });
  return { sql, params };
}

/** Counts the non-null values of `field` over the rows the descriptor yields. */
export function compileCountQuery(queryable: Queryable, field: string): CompiledQuery {
  const params: unknown[] = [];
  const inner = compileSelect(from(queryable), 1, params, { n: 0 });
  const sql = [
    `SELECT count(q0.${quoteIdentifier(field)}) AS count`,
    `FROM (\n${inner}\n) AS q0`,
  ].join('\n');
  return { sql, params };
}

export function compileInsertQuery(table: string, values: Row): CompiledQuery {
  const columns = Object.keys(values);
  if (columns.length === 0) {
    return { sql: `INSERT INTO ${quoteIdentifier(table)} DEFAULT VALUES\nRETURNING *`, params: [] };
  }
  const params = columns.map((column) => values[column]);
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  const sql = [
    `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')})`,
    `VALUES (${placeholders.join(', ')})`,
    'RETURNING *',
  ].join('\n');
  return { sql, params };
}

export function compileUpdateQuery(table: string, primaryKey: string, id: RecordId, changes: Row): CompiledQuery {
  const columns = Object.keys(changes);
  const params: unknown[] = columns.map((column) => changes[column]);
  const assignments = columns.map((column, i) => `${quoteIdentifier(column)} = $${i + 1}`);
  params.push(id);
  const sql = [
    `UPDATE ${quoteIdentifier(table)}`,
    `SET ${assignments.join(', ')}`,
    `WHERE ${quoteIdentifier(primaryKey)} = $${params.length}`,
    'RETURNING *',
  ].join('\n');
  return { sql, params };
}

export function compileDeleteQuery(table: string, primaryKey: string, id: RecordId): CompiledQuery {
  const sql = [
    `DELETE FROM ${quoteIdentifier(table)}`,
    `WHERE ${quoteIdentifier(primaryKey)} = $1`,
    'RETURNING *',
  ].join('\n');
  return { sql, params: [id] };
}
