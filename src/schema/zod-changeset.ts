import type { z, ZodObject, ZodRawShape } from 'zod/v4';
import type { FieldErrors, Row, ValidationMessage, ValidationTree } from '../types.js';
import type { ChangesetFn } from './define.js';

type Issue = z.core.$ZodIssue;

/** Field that collects issues raised on the record as a whole. */
export const BASE_FIELD = 'base';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(attrs: unknown, path: readonly PropertyKey[]): unknown {
  let current: unknown = attrs;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (isRecord(current) && typeof segment === 'string') {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function boundMessage(issue: Extract<Issue, { code: 'too_small' | 'too_big' }>): ValidationMessage {
  const min = issue.code === 'too_small';
  const bound = min ? issue.minimum : issue.maximum;
  const kind = min ? 'min' : 'max';
  switch (issue.origin) {
    case 'string':
      return {
        message: min ? 'should be at least %{count} character(s)' : 'should be at most %{count} character(s)',
        params: { count: bound, validation: 'length', kind },
      };
    case 'array':
    case 'set':
      return {
        message: min ? 'should have at least %{count} item(s)' : 'should have at most %{count} item(s)',
        params: { count: bound, validation: 'length', kind },
      };
    case 'number':
    case 'int':
    case 'bigint': {
      const relation = min ? 'greater than' : 'less than';
      const message = issue.inclusive === true
        ? `must be ${relation} or equal to %{number}`
        : `must be ${relation} %{number}`;
      return { message, params: { number: bound, validation: 'number', kind } };
    }
    default:
      return { message: issue.message };
  }
}

/** Maps a zod issue onto the message templates the catalogs translate. */
export function issueToMessage(issue: Issue, attrs: unknown): ValidationMessage {
  if (isBlank(valueAt(attrs, issue.path))) {
    return { message: "can't be blank", params: { validation: 'required' } };
  }
  switch (issue.code) {
    case 'too_small':
    case 'too_big':
      return boundMessage(issue);
    case 'invalid_type':
      return { message: 'is invalid', params: { validation: 'cast', type: issue.expected } };
    case 'invalid_format':
      return { message: 'has invalid format', params: { validation: 'format' } };
    case 'invalid_value':
    case 'invalid_union':
    case 'invalid_key':
    case 'invalid_element':
      return { message: 'is invalid', params: { validation: 'inclusion' } };
    default:
      return { message: issue.message };
  }
}

interface NodeBuilder {
  messages: ValidationMessage[];
  one?: TreeBuilder;
  many?: Map<number, TreeBuilder>;
}

type TreeBuilder = Map<string, NodeBuilder>;

function nodeFor(tree: TreeBuilder, field: string): NodeBuilder {
  let node = tree.get(field);
  if (node === undefined) {
    node = { messages: [] };
    tree.set(field, node);
  }
  return node;
}

function insert(tree: TreeBuilder, path: readonly PropertyKey[], message: ValidationMessage): void {
  const [head, next, ...rest] = path;
  const node = nodeFor(tree, typeof head === 'string' ? head : BASE_FIELD);
  if (next === undefined) {
    node.messages.push(message);
  } else if (typeof next === 'number') {
    if (rest.length === 0) {
      // An element of a list of scalars: the message belongs to the list.
      node.messages.push(message);
      return;
    }
    node.many ??= new Map();
    let child = node.many.get(next);
    if (child === undefined) {
      child = new Map();
      node.many.set(next, child);
    }
    insert(child, rest, message);
  } else {
    node.one ??= new Map();
    insert(node.one, [next, ...rest], message);
  }
}

function build(tree: TreeBuilder, attrs: unknown): ValidationTree {
  const out: Record<string, FieldErrors> = {};
  for (const [field, node] of tree) {
    const fieldValue = isRecord(attrs) ? attrs[field] : undefined;
    const messages = node.messages.length > 0 ? { messages: node.messages } : {};
    if (node.many !== undefined) {
      const items: unknown[] = Array.isArray(fieldValue) ? fieldValue : [];
      const length = Math.max(items.length, ...[...node.many.keys()].map((index) => index + 1));
      const children = Array.from({ length }, (_, index): ValidationTree => {
        const child = node.many?.get(index);
        return child === undefined ? {} : build(child, items[index]);
      });
      out[field] = { kind: 'association', cardinality: 'many', children, ...messages };
    } else if (node.one !== undefined) {
      out[field] = { kind: 'association', cardinality: 'one', child: build(node.one, fieldValue), ...messages };
    } else {
      out[field] = { kind: 'messages', messages: node.messages };
    }
  }
  return out;
}

/** Converts zod issues into a validation tree. Numeric path segments become to-many associations. */
export function issuesToTree(issues: readonly Issue[], attrs: unknown): ValidationTree {
  const tree: TreeBuilder = new Map();
  for (const issue of issues) {
    insert(tree, issue.path, issueToMessage(issue, attrs));
  }
  return build(tree, attrs);
}

/**
 * Builds a changeset from a zod object schema. On update (`existing` given)
 * only the keys present in `attrs` are validated.
 *
 * @example
 * const changeset = zodChangeset(z.object({ username: z.string().min(2), age: z.number().positive().optional() }));
 * changeset({ username: 'a' }, null);
 * // => { valid: false, errors: { username: { kind: 'messages', messages: [...] } } }
 */
export function zodChangeset<S extends ZodRawShape>(schema: ZodObject<S>): ChangesetFn {
  const partial = schema.partial();
  return (attrs, existing) => {
    const result = existing === null ? schema.safeParse(attrs) : partial.safeParse(attrs);
    if (!result.success) {
      return { valid: false, errors: issuesToTree(result.error.issues, attrs) };
    }
    const data: unknown = result.data;
    const changes: Row = isRecord(data) ? data : {};
    return { valid: true, changes };
  };
}
