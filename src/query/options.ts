import { z } from 'zod/v4';
import { QueryOptionsError } from '../errors.js';
import { normalizeField } from './fields.js';
import type { CustomQuery, Direction, ListOptions, ListOptionsInput, OrderBy, OrderClause } from './types.js';

const fieldName = z.union([z.string().min(1), z.symbol()]);
const direction = z.enum(['asc', 'desc']);

const orderByEntry = z.union([
  fieldName,
  z.tuple([direction, fieldName]),
  z.strictObject({ field: fieldName, order: direction.optional() }),
]);

const listOptionsSchema = z.strictObject({
  limit: z.number().int().nonnegative().nullable().optional(),
  offset: z.number().int().nonnegative().optional(),
  sortingOrder: direction.optional(),
  orderBy: z.union([fieldName, z.array(orderByEntry)]).optional(),
  customQuery: z.custom<CustomQuery>((value) => typeof value === 'function', 'must be a function').optional(),
});

/** Keyword-list semantics: the first occurrence of a key wins. */
function entriesToRecord(entries: Iterable<unknown>): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== 'string') {
      throw new QueryOptionsError(`Invalid list option entry: ${String(entry)}`);
    }
    const [key, value] = entry;
    if (!Object.hasOwn(record, key)) {
      record[key] = value;
    }
  }
  return record;
}

/**
 * Accepts list options as a record, a Map or a sequence of `[key, value]`
 * entries and validates them. Throws QueryOptionsError on anything else.
 */
export function parseListOptions(input: ListOptionsInput): ListOptions {
  const raw: unknown = input;
  let record: unknown = raw;
  if (raw instanceof Map) {
    record = entriesToRecord(raw.entries());
  } else if (Array.isArray(raw)) {
    record = entriesToRecord(raw);
  }

  const result = listOptionsSchema.safeParse(record);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(options)'}: ${issue.message}`)
      .join('; ');
    throw new QueryOptionsError(`Invalid list options: ${details}`);
  }
  return result.data;
}

/**
 * Normalizes every accepted `orderBy` shape into ordered (direction, field)
 * pairs. Entries without an explicit direction take `defaultDirection`.
 */
export function normalizeOrderBy(orderBy: OrderBy | undefined, defaultDirection: Direction): OrderClause[] {
  if (orderBy === undefined) return [];
  if (typeof orderBy === 'string' || typeof orderBy === 'symbol') {
    return [{ direction: defaultDirection, field: normalizeField(orderBy) }];
  }

  return orderBy.map((entry): OrderClause => {
    if (typeof entry === 'string' || typeof entry === 'symbol') {
      return { direction: defaultDirection, field: normalizeField(entry) };
    }
    if ('field' in entry) {
      return { direction: entry.order ?? defaultDirection, field: normalizeField(entry.field) };
    }
    const [entryDirection, field] = entry;
    return { direction: entryDirection, field: normalizeField(field) };
  });
}
