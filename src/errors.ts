import type { RecordId, ValidationMessage, ValidationTree } from './types.js';

export class QueryOptionsError extends Error {
  override readonly name = 'QueryOptionsError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RepositoryError extends Error {
  override readonly name = 'RepositoryError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An update or delete targeted a row that no longer exists. */
export class StaleRecordError extends Error {
  override readonly name = 'StaleRecordError';

  constructor(
    readonly table: string,
    readonly id: RecordId,
    message?: string,
  ) {
    super(message ?? `Attempted to change a stale record: ${table} ${String(id)} no longer exists`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised by the `*OrFail` lookups. `schema` and `message` render as a not-found error node. */
export class NotFoundError extends Error {
  override readonly name = 'NotFoundError';

  constructor(
    readonly schema: string,
    readonly reason: string = 'not found',
  ) {
    super(`${schema} ${reason}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MultipleResultsError extends Error {
  override readonly name = 'MultipleResultsError';

  constructor(
    readonly table: string,
    readonly count: number,
  ) {
    super(`Expected at most one result from ${table} but got ${count}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A write was rejected by validation or by a database constraint. */
export class ChangesetError extends Error {
  override readonly name = 'ChangesetError';

  constructor(
    readonly schema: string,
    readonly errors: ValidationTree,
    message?: string,
  ) {
    super(message ?? `Invalid ${schema}: ${Object.keys(errors).join(', ')}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Builds an error carrying a single message on a single field. */
  static forField(schema: string, field: string, message: ValidationMessage): ChangesetError {
    return new ChangesetError(schema, { [field]: { kind: 'messages', messages: [message] } });
  }
}

export class SchemaDefinitionError extends Error {
  override readonly name = 'SchemaDefinitionError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
