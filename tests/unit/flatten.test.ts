import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { flattenErrors, flattenValidationTree } from '../../src/i18n/flatten.js';
import type { ErrorNode, TranslateFn } from '../../src/i18n/types.js';
import type { FieldErrors, ValidationTree } from '../../src/types.js';

const blank: FieldErrors = { kind: 'messages', messages: [{ message: "can't be blank", params: { validation: 'required' } }] };

function many(...children: ValidationTree[]): FieldErrors {
  return { kind: 'association', cardinality: 'many', children };
}

function one(child: ValidationTree): FieldErrors {
  return { kind: 'association', cardinality: 'one', child };
}

function validation(tree: ValidationTree): ErrorNode {
  return { kind: 'validation', tree };
}

const portuguese: TranslateFn = (domain, msgid) => {
  if (domain === 'schemas' && msgid === 'user') return 'usuário';
  if (domain === 'errors' && msgid === 'not found') return 'não encontrado';
  return msgid;
};

describe('flattenErrors', () => {
  it('renders a single required error', () => {
    expect(flattenErrors([validation({ username: blank })])).toEqual(["username can't be blank"]);
  });

  it('renders several fields in ascending name order', () => {
    expect(flattenErrors([validation({ user_id: blank, title: blank })])).toEqual([
      "title can't be blank",
      "user_id can't be blank",
    ]);
  });

  it('interpolates message parameters', () => {
    const tree: ValidationTree = {
      username: {
        kind: 'messages',
        messages: [{ message: 'should be at least %{count} character(s)', params: { count: 2, validation: 'length' } }],
      },
    };
    expect(flattenErrors([validation(tree)])).toEqual(['username should be at least 2 character(s)']);
  });

  it('prefixes errors of a to-many association with its name', () => {
    const tree: ValidationTree = { posts: many({ title: blank, user_id: blank }), username: blank };
    expect(flattenErrors([validation(tree)])).toEqual([
      "posts: title can't be blank",
      "posts: user_id can't be blank",
      "username can't be blank",
    ]);
  });

  it('prefixes errors of a to-one association with its name', () => {
    const tree: ValidationTree = { comment: one({ content: blank, post_id: blank }), title: blank, user_id: blank };
    expect(flattenErrors([validation(tree)])).toEqual([
      "comment: content can't be blank",
      "comment: post_id can't be blank",
      "title can't be blank",
      "user_id can't be blank",
    ]);
  });

  it('collapses deeply nested to-many errors to the innermost prefix', () => {
    const tree: ValidationTree = {
      posts: many({ likes: many({ post_id: blank, user_id: blank }), title: blank, user_id: blank }),
      username: blank,
    };
    expect(flattenErrors([validation(tree)])).toEqual([
      "likes: post_id can't be blank",
      "likes: user_id can't be blank",
      "posts: title can't be blank",
      "posts: user_id can't be blank",
      "username can't be blank",
    ]);
  });

  it('collapses a to-one association nested in a to-many one', () => {
    const tree: ValidationTree = {
      posts: many({ comment: one({ content: blank, post_id: blank }), title: blank, user_id: blank }),
      username: blank,
    };
    expect(flattenErrors([validation(tree)])).toEqual([
      "comment: content can't be blank",
      "comment: post_id can't be blank",
      "posts: title can't be blank",
      "posts: user_id can't be blank",
      "username can't be blank",
    ]);
  });

  it('renders sibling associations and skips valid children', () => {
    const tree: ValidationTree = {
      username: blank,
      posts: many({ title: blank, user_id: blank }),
      likes: many({}, {}),
    };
    expect(flattenErrors([validation(tree)])).toEqual([
      "posts: title can't be blank",
      "posts: user_id can't be blank",
      "username can't be blank",
    ]);
  });

  it('renders messages about an association as a whole before its children', () => {
    const tree: ValidationTree = {
      posts: {
        kind: 'association',
        cardinality: 'many',
        children: [{ title: blank }],
        messages: [{ message: 'should have at most %{count} item(s)', params: { count: 0 } }],
      },
    };
    expect(flattenErrors([validation(tree)])).toEqual([
      'posts should have at most 0 item(s)',
      "posts: title can't be blank",
    ]);
  });

  it('renders a not-found error as schema and message', () => {
    const node: ErrorNode = { kind: 'not-found', message: 'not found', schema: 'user' };
    expect(flattenErrors([node])).toEqual(['user not found']);
    expect(flattenErrors([node], { translate: portuguese })).toEqual(['usuário não encontrado']);
  });

  it('translates plain messages and keeps an empty one', () => {
    const translate: TranslateFn = (_domain, msgid) => (msgid === 'Not logged in' ? 'Não está logado' : msgid);
    expect(flattenErrors([{ kind: 'message', message: 'Not logged in' }], { translate })).toEqual(['Não está logado']);
    expect(flattenErrors([{ kind: 'message', message: '' }], { translate })).toEqual(['']);
  });

  it('passes opaque values through untouched', () => {
    const value = { message: 'random message' };
    const result = flattenErrors([{ kind: 'opaque', value: 2 }, { kind: 'opaque', value }]);
    expect(result).toEqual([2, { message: 'random message' }]);
    expect(result[1]).toBe(value);
  });

  it('concatenates results in input order', () => {
    expect(flattenErrors([
      { kind: 'message', message: 'first' },
      validation({ username: blank }),
      { kind: 'opaque', value: 3 },
    ])).toEqual(['first', "username can't be blank", 3]);
  });

  it('routes field names and messages through separate domains', () => {
    const calls: string[] = [];
    const translate: TranslateFn = (domain, msgid) => {
      calls.push(`${domain}:${msgid}`);
      return domain === 'fields' ? msgid.toUpperCase() : msgid;
    };
    const result = flattenErrors([validation({ username: blank })], { translate, domains: { schemas: 'fields' } });
    expect(result).toEqual(["USERNAME can't be blank"]);
    expect(calls).toEqual(['fields:username', "errors:can't be blank"]);
  });

  it('interpolates after translating', () => {
    const translate: TranslateFn = (domain, msgid) =>
      domain === 'errors' ? msgid.replace('should be at least', 'deve ter pelo menos') : msgid;
    const tree: ValidationTree = {
      name: { kind: 'messages', messages: [{ message: 'should be at least %{count} character(s)', params: { count: 3 } }] },
    };
    expect(flattenErrors([validation(tree)], { translate })).toEqual(['name deve ter pelo menos 3 character(s)']);
  });

  it('falls back to the message id when the translator throws', () => {
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const translate: TranslateFn = () => {
      throw new Error('catalog unavailable');
    };
    expect(flattenErrors([validation({ username: blank })], { translate, logger })).toEqual(["username can't be blank"]);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe('flattenValidationTree', () => {
  it('renders a tree without wrapping it in a node', () => {
    expect(flattenValidationTree({ age: blank })).toEqual(["age can't be blank"]);
  });
});
