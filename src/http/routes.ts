import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod/v4';
import type { CrudContext } from '../context/context.js';
import { selectFunctions } from '../context/selection.js';
import type { FunctionSelection } from '../context/selection.js';
import { QueryOptionsError } from '../errors.js';
import { filter, search } from '../query/compose.js';
import type { ListOptions, OrderByEntry } from '../query/types.js';
import type { RecordId } from '../types.js';

export interface CrudRoutesOptions extends FunctionSelection {
  context: CrudContext;
  /** Turns the `:id` path segment into a key. Digits become numbers by default. */
  parseId?: (raw: string) => RecordId;
}

const RESERVED = new Set(['limit', 'offset', 'sortingOrder', 'orderBy', 'search']);

const queryValue = z.union([z.string(), z.array(z.string())]);
const querystringSchema = z.record(z.string(), queryValue);
const idParamsSchema = z.object({ id: z.string().min(1) });
const bodySchema = z.record(z.string(), z.unknown());

const listParamsSchema = z.object({
  limit: z.coerce.number().int().nonnegative().optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
  sortingOrder: z.enum(['asc', 'desc']).optional(),
  orderBy: queryValue.optional(),
  search: z.string().optional(),
});

function defaultParseId(raw: string): RecordId {
  return /^\d+$/.test(raw) ? Number(raw) : raw;
}

function parse<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || what}: ${issue.message}`)
      .join('; ');
    throw new QueryOptionsError(`Invalid ${what}: ${details}`);
  }
  return result.data;
}

/** `orderBy=age&orderBy=name:desc` → `['age', ['desc', 'name']]` */
export function parseOrderBy(values: string | readonly string[]): OrderByEntry[] {
  const list = typeof values === 'string' ? [values] : values;
  return list.flatMap((value) => value.split(',')).filter((value) => value !== '').map((value): OrderByEntry => {
    const [field = '', direction] = value.split(':');
    if (direction === undefined) return field;
    if (direction !== 'asc' && direction !== 'desc') {
      throw new QueryOptionsError(`Invalid orderBy direction "${direction}"`);
    }
    return [direction, field];
  });
}

/**
 * REST routes over a context: `GET /`, `GET /count`, `GET /:id`, `POST /`,
 * `PUT /:id` and `DELETE /:id`. `GET /` takes `limit`, `offset`,
 * `sortingOrder`, `orderBy`, `search`; any other parameter filters by field.
 *
 * @example
 * app.register(errorHandler);
 * app.register(crudRoutes, { prefix: '/users', context: users, except: ['delete'] });
 */
export const crudRoutes: FastifyPluginAsync<CrudRoutesOptions> = async (app, options) => {
  const { context } = options;
  const exposed = selectFunctions(options);
  const parseId = options.parseId ?? defaultParseId;
  const idOf = (params: unknown): RecordId => parseId(parse(idParamsSchema, params, 'path').id);

  if (exposed('list')) {
    app.get('/', async (request) => {
      const query = parse(querystringSchema, request.query, 'query');
      const params = parse(listParamsSchema, query, 'query');

      const filters: Record<string, string | string[]> = {};
      for (const [key, value] of Object.entries(query)) {
        if (!RESERVED.has(key)) filters[key] = value;
      }
      if (Object.keys(filters).length > 0 && !exposed('filter')) {
        throw new QueryOptionsError('Filtering is not available');
      }
      if (params.search !== undefined && !exposed('search')) {
        throw new QueryOptionsError('Search is not available');
      }

      const listOptions: ListOptions = {
        customQuery: (q) => search(filter(q, filters), params.search, context.schema.fields),
        ...(params.limit !== undefined ? { limit: params.limit } : {}),
        ...(params.offset !== undefined ? { offset: params.offset } : {}),
        ...(params.sortingOrder !== undefined ? { sortingOrder: params.sortingOrder } : {}),
        ...(params.orderBy !== undefined ? { orderBy: parseOrderBy(params.orderBy) } : {}),
      };
      return context.list(listOptions);
    });
  }

  if (exposed('count')) {
    app.get('/count', async () => ({ count: await context.count() }));
  }

  if (exposed('get')) {
    app.get('/:id', async (request) => context.getOrFail(idOf(request.params)));
  }

  if (exposed('create')) {
    app.post('/', async (request, reply) => {
      const created = await context.create(parse(bodySchema, request.body, 'body'));
      return reply.status(201).send(created);
    });
  }

  if (exposed('update')) {
    app.put('/:id', async (request) =>
      context.updateById(idOf(request.params), parse(bodySchema, request.body, 'body')));
  }

  if (exposed('delete')) {
    app.delete('/:id', async (request) => context.deleteById(idOf(request.params)));
  }
};
