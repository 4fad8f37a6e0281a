import { describe, it, expect } from 'vitest';
import { z } from 'zod/v4';
import { zodChangeset } from '../../src/schema/zod-changeset.js';
import type { Changeset } from '../../src/schema/define.js';
import { flattenValidationTree } from '../../src/i18n/flatten.js';
import type { ValidationTree } from '../../src/types.js';

const post = z.object({ title: z.string(), user_id: z.number() });
const user = zodChangeset(z.object({
  username: z.string().min(2),
  age: z.number().positive().optional(),
  posts: z.array(post).optional(),
}));

const required = { message: "can't be blank", params: { validation: 'required' } };

function errorsOf(changeset: Changeset): ValidationTree {
  if (changeset.valid) throw new Error('expected an invalid changeset');
  return changeset.errors;
}

describe('zodChangeset', () => {
  it('returns the parsed changes of a valid record', () => {
    expect(user({ username: 'Chuck', age: 3, extra: true }, null)).toEqual({
      valid: true,
      changes: { username: 'Chuck', age: 3 },
    });
  });

  it('reports a missing field as blank', () => {
    expect(errorsOf(user({}, null))).toEqual({ username: { kind: 'messages', messages: [required] } });
  });

  it('reports a whitespace string as blank', () => {
    expect(errorsOf(user({ username: ' ' }, null))).toEqual({ username: { kind: 'messages', messages: [required] } });
  });

  it('maps string length bounds', () => {
    expect(errorsOf(user({ username: 'a' }, null))).toEqual({
      username: {
        kind: 'messages',
        messages: [{ message: 'should be at least %{count} character(s)', params: { count: 2, validation: 'length', kind: 'min' } }],
      },
    });
  });

  it('maps exclusive number bounds', () => {
    expect(flattenValidationTree(errorsOf(user({ username: 'name', age: -5 }, null)))).toEqual([
      'age must be greater than 0',
    ]);
  });

  it('maps inclusive number and array bounds', () => {
    const changeset = zodChangeset(z.object({ stock: z.number().max(10), tags: z.array(z.string()).min(1) }));
    expect(flattenValidationTree(errorsOf(changeset({ stock: 11, tags: [] }, null)))).toEqual([
      'stock must be less than or equal to 10',
      'tags should have at least 1 item(s)',
    ]);
  });

  it('maps type and format issues', () => {
    const changeset = zodChangeset(z.object({ name: z.string(), email: z.email() }));
    expect(flattenValidationTree(errorsOf(changeset({ name: 42, email: 'nope' }, null)))).toEqual([
      'email has invalid format',
      'name is invalid',
    ]);
  });

  it('nests errors of list items as a to-many association', () => {
    const errors = errorsOf(user({ username: 'ab', posts: [{ title: 'x', user_id: 1 }, {}] }, null));
    expect(errors).toEqual({
      posts: {
        kind: 'association',
        cardinality: 'many',
        children: [
          {},
          {
            title: { kind: 'messages', messages: [required] },
            user_id: { kind: 'messages', messages: [required] },
          },
        ],
      },
    });
  });

  it('nests errors of an object field as a to-one association', () => {
    const changeset = zodChangeset(z.object({ title: z.string(), comment: z.object({ content: z.string() }) }));
    expect(errorsOf(changeset({ title: 't', comment: {} }, null))).toEqual({
      comment: { kind: 'association', cardinality: 'one', child: { content: { kind: 'messages', messages: [required] } } },
    });
  });

  it('renders nested errors the way the flattener expects', () => {
    expect(flattenValidationTree(errorsOf(user({ posts: [{}] }, null)))).toEqual([
      "posts: title can't be blank",
      "posts: user_id can't be blank",
      "username can't be blank",
    ]);
  });

  it('validates only the given keys on update', () => {
    const existing = { id: 1, username: 'Chuck' };
    expect(user({ age: 4 }, existing)).toEqual({ valid: true, changes: { age: 4 } });
    expect(errorsOf(user({ username: '' }, existing))).toEqual({ username: { kind: 'messages', messages: [required] } });
  });
});
