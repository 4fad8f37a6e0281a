import pg from 'pg';
import { ConfigurationError, MultipleResultsError, RepositoryError, StaleRecordError } from '../errors.js';
import { resolveConfig } from '../config.js';
import type { CrudforgeConfigInput } from '../config.js';
import { logger as defaultLogger } from '../logger.js';
import type { BaseLogger } from '../logger.js';
import { filter } from '../query/compose.js';
import {
  compileCountQuery,
  compileDeleteQuery,
  compileInsertQuery,
  compileSelectQuery,
  compileUpdateQuery,
} from '../query/compiler.js';
import type { CompiledQuery } from '../query/compiler.js';
import type { Queryable } from '../query/types.js';
import type { RecordId, Repository, Row } from '../types.js';
import { constraintError } from './constraint-errors.js';
import type { WriteOperation } from './constraint-errors.js';

type Execute = (sql: string, params: unknown[]) => Promise<pg.QueryResult<Row>>;

export interface PostgresRepositoryConfig {
  pool: pg.Pool;
  logger?: BaseLogger;
}

/** Shared query logic of the pool-backed and the transaction-bound repository. */
abstract class SqlRepository implements Repository {
  protected constructor(
    private readonly execute: Execute,
    protected readonly logger: BaseLogger,
  ) {}

  private async run(compiled: CompiledQuery, action: string, table?: string, operation?: WriteOperation): Promise<Row[]> {
    this.logger.debug({ sql: compiled.sql, params: compiled.params }, action);
    try {
      const result = await this.execute(compiled.sql, compiled.params);
      return result.rows;
    } catch (err) {
      if (table !== undefined && operation !== undefined) {
        const changesetError = constraintError(err, table, operation);
        if (changesetError !== undefined) throw changesetError;
      }
      throw new RepositoryError(`Failed to ${action}: ${String(err)}`, err);
    }
  }

  async all(query: Queryable): Promise<Row[]> {
    return this.run(compileSelectQuery(query), 'select rows');
  }

  async count(query: Queryable, field: string): Promise<number> {
    const [row] = await this.run(compileCountQuery(query, field), 'count rows');
    // count() is a bigint, which pg hands back as a string
    return Number(row?.['count'] ?? 0);
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

  async insert(table: string, values: Row): Promise<Row> {
    const [row] = await this.run(compileInsertQuery(table, values), `insert into ${table}`, table, 'insert');
    if (row === undefined) throw new RepositoryError(`Insert into ${table} returned no row`);
    return row;
  }

  async update(table: string, primaryKey: string, id: RecordId, changes: Row): Promise<Row> {
    if (Object.keys(changes).length === 0) {
      const current = await this.get(table, primaryKey, id);
      if (current === null) throw new StaleRecordError(table, id);
      return current;
    }
    const [row] = await this.run(compileUpdateQuery(table, primaryKey, id, changes), `update ${table}`, table, 'update');
    if (row === undefined) throw new StaleRecordError(table, id);
    return row;
  }

  async delete(table: string, primaryKey: string, id: RecordId): Promise<Row> {
    const [row] = await this.run(compileDeleteQuery(table, primaryKey, id), `delete from ${table}`, table, 'delete');
    if (row === undefined) throw new StaleRecordError(table, id);
    return row;
  }

  abstract transaction<R>(fn: (tx: Repository) => Promise<R>): Promise<R>;
  abstract close(): Promise<void>;
}

class PostgresTransaction extends SqlRepository {
  constructor(client: pg.PoolClient, logger: BaseLogger) {
    super((sql, params) => client.query<Row>(sql, params), logger);
  }

  // Nested transactions join the outer one.
  async transaction<R>(fn: (tx: Repository) => Promise<R>): Promise<R> {
    return fn(this);
  }

  async close(): Promise<void> {
    throw new RepositoryError('A transaction-bound repository cannot be closed');
  }
}

/** Repository over a pg pool. Each transaction borrows one client and always releases it. */
export class PostgresRepository extends SqlRepository {
  private readonly pool: pg.Pool;

  constructor(config: PostgresRepositoryConfig) {
    super((sql, params) => config.pool.query<Row>(sql, params), config.logger ?? defaultLogger);
    this.pool = config.pool;
  }

  async transaction<R>(fn: (tx: Repository) => Promise<R>): Promise<R> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new RepositoryError(`Failed to acquire a connection: ${String(err)}`, err);
    }
    try {
      await this.control(client, 'BEGIN');
      let result: R;
      try {
        result = await fn(new PostgresTransaction(client, this.logger));
      } catch (err) {
        await this.rollback(client);
        throw err;
      }
      await this.control(client, 'COMMIT');
      return result;
    } finally {
      client.release();
    }
  }

  private async control(client: pg.PoolClient, statement: 'BEGIN' | 'COMMIT'): Promise<void> {
    this.logger.debug({ sql: statement }, 'transaction');
    try {
      await client.query(statement);
    } catch (err) {
      throw new RepositoryError(`${statement} failed: ${String(err)}`, err);
    }
  }

  private async rollback(client: pg.PoolClient): Promise<void> {
    this.logger.debug({ sql: 'ROLLBACK' }, 'transaction');
    try {
      await client.query('ROLLBACK');
    } catch (err) {
      this.logger.error({ err }, 'rollback failed');
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/** Creates a repository on a new pool for `databaseUrl` (or DATABASE_URL). */
export function createPostgresRepository(
  overrides: Pick<CrudforgeConfigInput, 'databaseUrl'> & { logger?: BaseLogger } = {},
): PostgresRepository {
  const { databaseUrl } = resolveConfig(
    overrides.databaseUrl !== undefined ? { databaseUrl: overrides.databaseUrl } : {},
  );
  if (databaseUrl === undefined) {
    throw new ConfigurationError('A database URL is required (set DATABASE_URL)');
  }
  const pool = new pg.Pool({ connectionString: databaseUrl });
  return new PostgresRepository({ pool, ...(overrides.logger !== undefined ? { logger: overrides.logger } : {}) });
}
