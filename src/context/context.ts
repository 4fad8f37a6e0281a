import { ChangesetError, NotFoundError, QueryOptionsError, StaleRecordError } from '../errors.js';
import { logger as defaultLogger } from '../logger.js';
import type { BaseLogger } from '../logger.js';
import { filter as filterQuery, list as listQuery, search as searchQuery } from '../query/compose.js';
import type { FilterMap, ListOptionsInput } from '../query/types.js';
import { getAssociation } from '../schema/define.js';
import type { ChangesetFn, SchemaDefinition } from '../schema/define.js';
import type { FieldErrors, RecordId, Repository, Row, ValidationTree } from '../types.js';
import { preload } from './preload.js';

export type Attrs = Readonly<Record<string, unknown>>;

export interface ContextOptions {
  /** To-many associations that must be empty before a record can be deleted. */
  checkConstraintsOnDelete?: readonly string[];
  /** Field that carries the error when update or delete hits a vanished record. */
  staleErrorField?: string;
  staleErrorMessage?: string;
  /** Overrides the schema's create changeset. */
  createChangeset?: ChangesetFn;
  /** Overrides the schema's update changeset. */
  updateChangeset?: ChangesetFn;
  logger?: BaseLogger;
}

export interface CrudContext {
  readonly schema: SchemaDefinition;
  get(id: RecordId): Promise<Row | null>;
  getBy(clauses: Attrs): Promise<Row | null>;
  getWithAssocs(id: RecordId, assocs: readonly string[]): Promise<Row | null>;
  getByWithAssocs(clauses: Attrs, assocs: readonly string[]): Promise<Row | null>;
  /** Throws NotFoundError when there is no such record. */
  getOrFail(id: RecordId): Promise<Row>;
  getByOrFail(clauses: Attrs): Promise<Row>;
  list(options?: ListOptionsInput): Promise<Row[]>;
  listWithAssocs(assocs: readonly string[], options?: ListOptionsInput): Promise<Row[]>;
  /** Counts non-null values of `field`, the primary key by default. */
  count(field?: string): Promise<number>;
  /** Searches every field of the schema. */
  search(term: string | null | undefined): Promise<Row[]>;
  filter(filters: FilterMap): Promise<Row[]>;
  /** Inserts the record and any nested associated records in one transaction. Throws ChangesetError. */
  create(attrs: Attrs): Promise<Row>;
  update(record: Row, attrs: Attrs): Promise<Row>;
  /**
   * Preloads `assocs` and applies nested changes to them in one transaction:
   * children matched by primary key are updated, new ones inserted, missing
   * ones deleted. Nested changes to associations not listed are rejected.
   */
  updateWithAssocs(record: Row, attrs: Attrs, assocs: readonly string[]): Promise<Row>;
  updateById(id: RecordId, attrs: Attrs): Promise<Row>;
  delete(record: Row): Promise<Row>;
  deleteById(id: RecordId): Promise<Row>;
}

export type ContextFactory = (schema: SchemaDefinition, repo: Repository, options?: ContextOptions) => CrudContext;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecordId(value: unknown): value is RecordId {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint';
}

/** Splits validated changes into column values and nested association values. */
function splitChanges(schema: SchemaDefinition, changes: Row): { columns: Row; nested: Array<[string, unknown]> } {
  const columns: Row = {};
  const nested: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(changes)) {
    if (schema.fields.includes(key)) columns[key] = value;
    else if (Object.hasOwn(schema.associations, key)) nested.push([key, value]);
  }
  return { columns, nested };
}

/** Places a child's changeset error under the association field, at the child's position. */
function nestChildError(
  schema: SchemaDefinition,
  name: string,
  cardinality: 'one' | 'many',
  index: number,
  count: number,
  err: unknown,
): unknown {
  if (!(err instanceof ChangesetError)) return err;
  const tree = err.errors;
  const errors: FieldErrors = cardinality === 'one'
    ? { kind: 'association', cardinality: 'one', child: tree }
    : {
      kind: 'association',
      cardinality: 'many',
      children: Array.from({ length: count }, (_, i): ValidationTree => (i === index ? tree : {})),
    };
  return new ChangesetError(schema.name, { [name]: errors });
}

function invalidAssociation(schema: SchemaDefinition, name: string): ChangesetError {
  return ChangesetError.forField(schema.name, name, { message: 'is invalid', params: { validation: 'assoc' } });
}

async function insertGraph(tx: Repository, schema: SchemaDefinition, changes: Row): Promise<Row> {
  const { columns, nested } = splitChanges(schema, changes);
  const row = await tx.insert(schema.table, columns);
  const parentId = row[schema.primaryKey];

  for (const [name, value] of nested) {
    if (value === null || value === undefined) continue;
    const association = getAssociation(schema, name);
    const target = association.schema();
    const items: unknown[] = association.cardinality === 'many' && Array.isArray(value) ? value : [value];
    const inserted: Row[] = [];
    for (const [index, item] of items.entries()) {
      if (!isRecord(item)) throw invalidAssociation(schema, name);
      try {
        inserted.push(await insertGraph(tx, target, { ...item, [association.foreignKey]: parentId }));
      } catch (err) {
        throw nestChildError(schema, name, association.cardinality, index, items.length, err);
      }
    }
    row[name] = association.cardinality === 'many' ? inserted : inserted[0] ?? null;
  }
  return row;
}

function withoutKey(row: Row, key: string): Row {
  const copy = { ...row };
  delete copy[key];
  return copy;
}

/**
 * Updates `record` and replaces the preloaded associations named in
 * `changes`. `record` must carry those associations.
 */
async function updateGraph(tx: Repository, schema: SchemaDefinition, id: RecordId, record: Row, changes: Row): Promise<Row> {
  const { columns, nested } = splitChanges(schema, changes);
  const row: Row = { ...record, ...(await tx.update(schema.table, schema.primaryKey, id, columns)) };

  for (const [name, value] of nested) {
    if (!Object.hasOwn(record, name)) {
      throw new QueryOptionsError(`${schema.name}.${name} must be preloaded before it can be changed`);
    }
    const association = getAssociation(schema, name);
    const target = association.schema();
    const pk = target.primaryKey;
    const current = record[name];
    const existing = (Array.isArray(current) ? current : [current]).filter(isRecord);

    let items: unknown[];
    if (association.cardinality === 'many') {
      if (!Array.isArray(value)) throw invalidAssociation(schema, name);
      items = value;
    } else {
      items = value === null || value === undefined ? [] : [value];
    }

    const kept = new Set(items.map((item) => (isRecord(item) ? item[pk] : undefined)).filter(isRecordId));
    for (const child of existing) {
      const childId = child[pk];
      if (isRecordId(childId) && !kept.has(childId)) await tx.delete(target.table, pk, childId);
    }

    const results: Row[] = [];
    for (const [index, item] of items.entries()) {
      if (!isRecord(item)) throw invalidAssociation(schema, name);
      const childId = item[pk];
      const match = existing.find((child) => isRecordId(childId) && child[pk] === childId);
      const attrs = { ...withoutKey(item, pk), [association.foreignKey]: id };
      try {
        results.push(match !== undefined && isRecordId(childId)
          ? await tx.update(target.table, pk, childId, splitChanges(target, attrs).columns)
          : await insertGraph(tx, target, attrs));
      } catch (err) {
        throw nestChildError(schema, name, association.cardinality, index, items.length, err);
      }
    }
    row[name] = association.cardinality === 'many' ? results : results[0] ?? null;
  }
  return row;
}

/**
 * Builds the CRUD functions of one schema over a repository.
 *
 * @example
 * const users = createContext(User, repo, { checkConstraintsOnDelete: ['posts'] });
 * const user = await users.create({ username: 'Chuck Norris' });
 * await users.list({ limit: 10, orderBy: 'username' });
 */
export function createContext(schema: SchemaDefinition, repo: Repository, options: ContextOptions = {}): CrudContext {
  const log = options.logger ?? defaultLogger;
  const createChangeset = options.createChangeset ?? schema.createChangeset;
  const updateChangeset = options.updateChangeset ?? schema.updateChangeset;
  const staleErrorField = options.staleErrorField ?? 'id';
  const staleErrorMessage = options.staleErrorMessage ?? 'not found';
  const constrained = (options.checkConstraintsOnDelete ?? []).map((name) => {
    const association = getAssociation(schema, name);
    if (association.cardinality !== 'many') {
      throw new QueryOptionsError(`${schema.name}.${name}: only to-many associations can be checked on delete`);
    }
    return [name, association] as const;
  });

  const staleError = (id: RecordId): ChangesetError => {
    log.debug({ schema: schema.name, id }, 'stale record');
    return ChangesetError.forField(schema.name, staleErrorField, {
      message: staleErrorMessage,
      params: { stale: true },
    });
  };

  // Repository errors name the table; callers see the schema.
  const rethrow = (err: unknown, id?: RecordId): never => {
    if (err instanceof StaleRecordError) throw staleError(id ?? err.id);
    if (err instanceof ChangesetError && err.schema !== schema.name) {
      throw new ChangesetError(schema.name, err.errors);
    }
    throw err;
  };

  const idOf = (record: Row): RecordId => {
    const id = record[schema.primaryKey];
    if (!isRecordId(id)) {
      throw ChangesetError.forField(schema.name, schema.primaryKey, { message: 'is invalid', params: { validation: 'cast' } });
    }
    return id;
  };

  const get = (id: RecordId): Promise<Row | null> => repo.get(schema.table, schema.primaryKey, id);
  const getBy = (clauses: Attrs): Promise<Row | null> => repo.getBy(schema.table, clauses);

  const withAssocs = async (row: Row | null, assocs: readonly string[]): Promise<Row | null> => {
    if (row === null) return null;
    const [loaded] = await preload(repo, schema, [row], assocs);
    return loaded ?? null;
  };

  const orFail = (row: Row | null): Row => {
    if (row === null) throw new NotFoundError(schema.name);
    return row;
  };

  const update = async (record: Row, attrs: Attrs): Promise<Row> => {
    const id = idOf(record);
    const changeset = updateChangeset(attrs, record);
    if (!changeset.valid) throw new ChangesetError(schema.name, changeset.errors);
    const { columns, nested } = splitChanges(schema, changeset.changes);
    if (nested.length > 0) {
      log.warn(
        { schema: schema.name, associations: nested.map(([name]) => name) },
        'nested changes are ignored on update; use updateWithAssocs',
      );
    }
    try {
      return await repo.update(schema.table, schema.primaryKey, id, columns);
    } catch (err) {
      return rethrow(err, id);
    }
  };

  const updateWithAssocs = async (record: Row, attrs: Attrs, assocs: readonly string[]): Promise<Row> => {
    const id = idOf(record);
    const changeset = updateChangeset(attrs, record);
    if (!changeset.valid) throw new ChangesetError(schema.name, changeset.errors);
    try {
      return await repo.transaction(async (tx) => {
        const [loaded = record] = await preload(tx, schema, [record], assocs);
        return updateGraph(tx, schema, id, loaded, changeset.changes);
      });
    } catch (err) {
      return rethrow(err, id);
    }
  };

  const remove = async (record: Row): Promise<Row> => {
    const id = idOf(record);
    for (const [name, association] of constrained) {
      const target = association.schema();
      const children = await repo.count(filterQuery(target.table, { [association.foreignKey]: id }), target.primaryKey);
      if (children > 0) {
        throw ChangesetError.forField(schema.name, name, {
          message: 'are still associated with this entry',
          params: { validation: 'no_assoc' },
        });
      }
    }
    try {
      return await repo.delete(schema.table, schema.primaryKey, id);
    } catch (err) {
      return rethrow(err, id);
    }
  };

  return {
    schema,
    get,
    getBy,
    getWithAssocs: async (id, assocs) => withAssocs(await get(id), assocs),
    getByWithAssocs: async (clauses, assocs) => withAssocs(await getBy(clauses), assocs),
    getOrFail: async (id) => orFail(await get(id)),
    getByOrFail: async (clauses) => orFail(await getBy(clauses)),
    list: (listOptions) => repo.all(listQuery(schema.table, listOptions)),
    listWithAssocs: async (assocs, listOptions) =>
      preload(repo, schema, await repo.all(listQuery(schema.table, listOptions)), assocs),
    count: (field = schema.primaryKey) => repo.count(schema.table, field),
    search: (term) => repo.all(searchQuery(schema.table, term, schema.fields)),
    filter: (filters) => repo.all(filterQuery(schema.table, filters)),
    create: async (attrs) => {
      const changeset = createChangeset(attrs, null);
      if (!changeset.valid) throw new ChangesetError(schema.name, changeset.errors);
      try {
        return await repo.transaction((tx) => insertGraph(tx, schema, changeset.changes));
      } catch (err) {
        return rethrow(err);
      }
    },
    update,
    updateWithAssocs,
    updateById: async (id, attrs) => {
      const record = await get(id);
      if (record === null) throw staleError(id);
      return update(record, attrs);
    },
    delete: remove,
    deleteById: async (id) => {
      const record = await get(id);
      if (record === null) throw staleError(id);
      return remove(record);
    },
  };
}

/**
 * Returns a context factory whose options default to `defaults`; options given
 * at creation win.
 */
export function defineContextDefaults(defaults: ContextOptions): ContextFactory {
  return (schema, repo, options = {}) => createContext(schema, repo, { ...defaults, ...options });
}
