import { ChangesetError, MultipleResultsError, RepositoryError, StaleRecordError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { BaseLogger } from '../logger.js';
import { filter } from '../query/compose.js';
import { evaluate } from '../query/evaluate.js';
import type { Queryable } from '../query/types.js';
import type { RecordId, Repository, Row } from '../types.js';

export interface ForeignKey {
  table: string;
  column: string;
  references: { table: string; column: string };
}

export interface MemoryRepositoryOptions {
  /** Initial rows per table. Tables not listed here do not exist. */
  tables?: Readonly<Record<string, readonly Row[]>>;
  /** Primary key column per table; `id` when absent. Numeric keys are assigned on insert. */
  primaryKeys?: Readonly<Record<string, string>>;
  /** Columns whose values must be unique, per table. */
  unique?: Readonly<Record<string, readonly string[]>>;
  foreignKeys?: readonly ForeignKey[];
  logger?: BaseLogger;
}

interface State {
  tables: Map<string, Row[]>;
  sequences: Map<string, number>;
}

function copyState(state: State): State {
  return {
    tables: new Map([...state.tables].map(([name, rows]) => [name, rows.map((row) => ({ ...row }))])),
    sequences: new Map(state.sequences),
  };
}

/**
 * In-process repository with the semantics of the PostgreSQL one: same query
 * evaluation, same constraint errors, snapshot transactions.
 */
export class MemoryRepository implements Repository {
  private state: State;
  private readonly primaryKeys: Readonly<Record<string, string>>;
  private readonly unique: Readonly<Record<string, readonly string[]>>;
  private readonly foreignKeys: readonly ForeignKey[];
  private readonly logger: BaseLogger;

  constructor(options: MemoryRepositoryOptions = {}) {
    this.primaryKeys = options.primaryKeys ?? {};
    this.unique = options.unique ?? {};
    this.foreignKeys = options.foreignKeys ?? [];
    this.logger = options.logger ?? defaultLogger;
    this.state = { tables: new Map(), sequences: new Map() };
    for (const [name, rows] of Object.entries(options.tables ?? {})) {
      this.state.tables.set(name, rows.map((row) => ({ ...row })));
      const pk = this.primaryKeyOf(name);
      const maxId = rows.reduce((max, row) => {
        const id = row[pk];
        return typeof id === 'number' && id > max ? id : max;
      }, 0);
      this.state.sequences.set(name, maxId);
    }
  }

  /** Current rows of `table`, as copies. */
  rows(table: string): Row[] {
    return this.table(table).map((row) => ({ ...row }));
  }

  private primaryKeyOf(table: string): string {
    return Object.hasOwn(this.primaryKeys, table) ? this.primaryKeys[table] ?? 'id' : 'id';
  }

  private table(name: string): Row[] {
    const rows = this.state.tables.get(name);
    if (rows === undefined) throw new RepositoryError(`relation "${name}" does not exist`);
    return rows;
  }

  private tablesView(): Record<string, Row[]> {
    return Object.fromEntries(this.state.tables);
  }

  async all(query: Queryable): Promise<Row[]> {
    return evaluate(query, this.tablesView());
  }

  async count(query: Queryable, field: string): Promise<number> {
    return evaluate(query, this.tablesView()).filter((row) => {
      if (!Object.hasOwn(row, field)) throw new RepositoryError(`column "${field}" does not exist`);
      return row[field] !== null && row[field] !== undefined;
    }).length;
  }

  async get(table: string, primaryKey: string, id: RecordId): Promise<Row | null> {
    const [row] = await this.all(filter(table, { [primaryKey]: id }));
    return row ?? null;
  }

  async getBy(table: string, clauses: Readonly<Record<string, unknown>>): Promise<Row | null> {
    const rows = await this.all(filter(table, clauses));
    if (rows.length > 1) throw new MultipleResultsError(table, rows.length);
    return rows[0] ?? null;
  }

  private checkUnique(table: string, candidate: Row, ignore?: Row): void {
    const rows = this.table(table);
    for (const column of this.unique[table] ?? []) {
      const value = candidate[column];
      if (value === null || value === undefined) continue;
      if (rows.some((row) => row !== ignore && row[column] === value)) {
        throw ChangesetError.forField(table, column, {
          message: 'has already been taken',
          params: { validation: 'unsafe_unique' },
        });
      }
    }
  }

  private checkReferences(table: string, candidate: Row): void {
    for (const fk of this.foreignKeys) {
      if (fk.table !== table) continue;
      const value = candidate[fk.column];
      if (value === null || value === undefined) continue;
      if (!this.table(fk.references.table).some((row) => row[fk.references.column] === value)) {
        throw ChangesetError.forField(table, fk.column, {
          message: 'does not exist',
          params: { validation: 'assoc' },
        });
      }
    }
  }

  async insert(table: string, values: Row): Promise<Row> {
    const rows = this.table(table);
    const pk = this.primaryKeyOf(table);
    const row: Row = { ...values };
    if (row[pk] === undefined || row[pk] === null) {
      const next = (this.state.sequences.get(table) ?? 0) + 1;
      this.state.sequences.set(table, next);
      row[pk] = next;
    }
    if (rows.some((existing) => existing[pk] === row[pk])) {
      throw ChangesetError.forField(table, pk, {
        message: 'has already been taken',
        params: { validation: 'unsafe_unique' },
      });
    }
    this.checkUnique(table, row);
    this.checkReferences(table, row);
    this.logger.debug({ table, row }, 'insert');
    rows.push(row);
    return { ...row };
  }

  async update(table: string, primaryKey: string, id: RecordId, changes: Row): Promise<Row> {
    const current = this.table(table).find((row) => row[primaryKey] === id);
    if (current === undefined) throw new StaleRecordError(table, id);
    const next: Row = { ...current, ...changes };
    this.checkUnique(table, next, current);
    this.checkReferences(table, next);
    this.logger.debug({ table, id, changes }, 'update');
    Object.assign(current, changes);
    return { ...current };
  }

  async delete(table: string, primaryKey: string, id: RecordId): Promise<Row> {
    const rows = this.table(table);
    const index = rows.findIndex((row) => row[primaryKey] === id);
    const current = rows[index];
    if (current === undefined) throw new StaleRecordError(table, id);

    for (const fk of this.foreignKeys) {
      if (fk.references.table !== table) continue;
      const referenced = current[fk.references.column];
      if (this.table(fk.table).some((row) => row[fk.column] === referenced)) {
        throw ChangesetError.forField(table, fk.table, {
          message: 'are still associated with this entry',
          params: { validation: 'no_assoc' },
        });
      }
    }

    this.logger.debug({ table, id }, 'delete');
    rows.splice(index, 1);
    return { ...current };
  }

  /** Runs `fn` against this repository; every change is undone when it rejects. */
  async transaction<R>(fn: (tx: Repository) => Promise<R>): Promise<R> {
    const snapshot = copyState(this.state);
    try {
      return await fn(this);
    } catch (err) {
      this.logger.debug({ err }, 'transaction rolled back');
      this.state = snapshot;
      throw err;
    }
  }

  async close(): Promise<void> {
    this.state = { tables: new Map(), sequences: new Map() };
  }
}
