import { selectFunctions } from '../context/selection.js';
import type { FunctionSelection } from '../context/selection.js';
import type { Attrs, CrudContext } from '../context/context.js';
import { ChangesetError, NotFoundError } from '../errors.js';
import type { ListOptionsInput } from '../query/types.js';
import type { RecordId, Row } from '../types.js';
import type { Resolver, ResolverResult } from './types.js';

export interface CrudResolvers {
  get: Resolver<{ id: RecordId }, Row>;
  list: Resolver<{ options?: ListOptionsInput }, Row[]>;
  create: Resolver<{ input: Attrs }, Row>;
  update: Resolver<{ id: RecordId; input: Attrs }, Row>;
  delete: Resolver<{ id: RecordId }, Row>;
}

/** `CamelizedSchemaName` → `Camelized_schema_name` */
export function displayName(schemaName: string): string {
  const snake = schemaName.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
  return snake.charAt(0).toUpperCase() + snake.slice(1);
}

function ok<T>(value: T): ResolverResult<T> {
  return { ok: true, value };
}

function failure(error: unknown): Extract<ResolverResult<never>, { ok: false }> {
  return { ok: false, errors: [error] };
}

// Expected failures become results; anything else propagates.
async function attempt<T>(run: () => Promise<T>): Promise<ResolverResult<T>> {
  try {
    return ok(await run());
  } catch (err) {
    if (err instanceof ChangesetError || err instanceof NotFoundError) return failure(err);
    throw err;
  }
}

/**
 * Resolver functions over a context. A missing record resolves to the error
 * `"<Name> not found."`.
 *
 * @example
 * const resolvers = createResolvers(users, { except: ['delete'] });
 * await resolvers.get?.({ id: 1 }, {});
 */
export function createResolvers(context: CrudContext, selection: FunctionSelection = {}): Partial<CrudResolvers> {
  const exposed = selectFunctions(selection);
  const notFound = `${displayName(context.schema.name)} not found.`;
  const resolvers: Partial<CrudResolvers> = {};

  if (exposed('get')) {
    resolvers.get = async ({ id }) => {
      const record = await context.get(id);
      return record === null ? failure(notFound) : ok(record);
    };
  }
  if (exposed('list')) {
    resolvers.list = async ({ options }) => attempt(() => context.list(options));
  }
  if (exposed('create')) {
    resolvers.create = async ({ input }) => attempt(() => context.create(input));
  }
  if (exposed('update')) {
    resolvers.update = async ({ id, input }) => {
      const record = await context.get(id);
      if (record === null) return failure(notFound);
      return attempt(() => context.update(record, input));
    };
  }
  if (exposed('delete')) {
    resolvers.delete = async ({ id }) => {
      const record = await context.get(id);
      if (record === null) return failure(notFound);
      return attempt(() => context.delete(record));
    };
  }
  return resolvers;
}
