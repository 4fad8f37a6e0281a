import { ChangesetError } from '../errors.js';

export const UNIQUE_VIOLATION = '23505';
export const FOREIGN_KEY_VIOLATION = '23503';

export type WriteOperation = 'insert' | 'update' | 'delete';

interface PgErrorFields {
  code: string;
  detail?: string;
  table?: string;
}

function isPgError(err: unknown): err is PgErrorFields {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/** `Key (user_id)=(99) is not present in table "users".` → `user_id` */
export function parseKeyColumn(detail: string | undefined): string | undefined {
  const match = detail === undefined ? null : /^Key \(([^)]+)\)=/.exec(detail);
  return match?.[1]?.split(',')[0]?.trim().replace(/^"(.*)"$/, '$1');
}

/** `... is still referenced from table "posts".` → `posts` */
export function parseReferencingTable(detail: string | undefined): string | undefined {
  const match = detail === undefined ? null : /referenced from table "?([^".]+)"?/.exec(detail);
  return match?.[1];
}

/**
 * Translates a PostgreSQL unique or foreign-key violation into a ChangesetError
 * on the offending column. Returns undefined for any other failure.
 */
export function constraintError(err: unknown, table: string, operation: WriteOperation): ChangesetError | undefined {
  if (!isPgError(err)) return undefined;

  if (err.code === UNIQUE_VIOLATION) {
    const field = parseKeyColumn(err.detail) ?? 'base';
    return ChangesetError.forField(table, field, {
      message: 'has already been taken',
      params: { validation: 'unsafe_unique' },
    });
  }

  if (err.code === FOREIGN_KEY_VIOLATION) {
    if (operation === 'delete') {
      const association = parseReferencingTable(err.detail) ?? 'base';
      return ChangesetError.forField(table, association, {
        message: 'are still associated with this entry',
        params: { validation: 'no_assoc' },
      });
    }
    const field = parseKeyColumn(err.detail) ?? 'base';
    return ChangesetError.forField(table, field, {
      message: 'does not exist',
      params: { validation: 'assoc' },
    });
  }

  return undefined;
}
