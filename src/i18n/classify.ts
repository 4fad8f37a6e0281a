import { ChangesetError, NotFoundError } from '../errors.js';
import type { ErrorNode } from './types.js';

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifies a value raised or returned by a resolver. Plain objects carrying
 * string `message` and `schema` are not-found errors; other objects are opaque.
 */
export function toErrorNode(value: unknown): ErrorNode {
  if (value instanceof ChangesetError) return { kind: 'validation', tree: value.errors };
  if (value instanceof NotFoundError) {
    return { kind: 'not-found', message: value.reason, schema: value.schema };
  }
  if (typeof value === 'string') return { kind: 'message', message: value };
  if (value instanceof Error) return { kind: 'message', message: value.message };
  if (isRecord(value) && typeof value['message'] === 'string' && typeof value['schema'] === 'string') {
    return { kind: 'not-found', message: value['message'], schema: value['schema'] };
  }
  return { kind: 'opaque', value };
}

export function toErrorNodes(values: readonly unknown[]): ErrorNode[] {
  return values.map(toErrorNode);
}
