import { describe, it, expect } from 'vitest';
import { createContext } from '../../src/context/context.js';
import { createResolvers, displayName } from '../../src/resolver/resolvers.js';
import { translateErrors, withMiddleware } from '../../src/resolver/middleware.js';
import { createCatalogTranslator } from '../../src/i18n/catalog.js';
import { QueryOptionsError } from '../../src/errors.js';
import type { Resolver } from '../../src/resolver/types.js';
import type { FunctionSelection } from '../../src/context/selection.js';
import { createRepository, people, User } from '../support/schemas.js';

function resolversFor(selection: FunctionSelection = {}) {
  return createResolvers(createContext(User, createRepository({ users: people })), selection);
}

describe('displayName', () => {
  it('capitalizes the underscored schema name', () => {
    expect(displayName('User')).toBe('User');
    expect(displayName('CamelizedSchemaName')).toBe('Camelized_schema_name');
  });
});

describe('createResolvers', () => {
  it('resolves get, list, create, update and delete', async () => {
    const { get, list, create, update, delete: remove } = resolversFor();
    expect(await get?.({ id: 1 }, {})).toEqual({ ok: true, value: { id: 1, username: 'Chuck Norris', age: 60 } });
    expect(await list?.({ options: { limit: 1, orderBy: [['desc', 'id']] } }, {})).toEqual({
      ok: true,
      value: [{ id: 3, username: 'Aa', age: null }],
    });
    expect(await create?.({ input: { username: 'Zz' } }, {})).toEqual({ ok: true, value: { id: 4, username: 'Zz' } });
    expect(await update?.({ id: 4, input: { age: 9 } }, {})).toEqual({ ok: true, value: { id: 4, username: 'Zz', age: 9 } });
    expect(await remove?.({ id: 4 }, {})).toEqual({ ok: true, value: { id: 4, username: 'Zz', age: 9 } });
  });

  it('reports missing records by name', async () => {
    const { get, update, delete: remove } = resolversFor();
    const notFound = { ok: false, errors: ['User not found.'] };
    expect(await get?.({ id: 99 }, {})).toEqual(notFound);
    expect(await update?.({ id: 99, input: { age: 1 } }, {})).toEqual(notFound);
    expect(await remove?.({ id: 99 }, {})).toEqual(notFound);
  });

  it('returns changeset errors as results', async () => {
    const result = await resolversFor().create?.({ input: {} }, {});
    expect(result?.ok).toBe(false);
  });

  it('exposes only the selected resolvers', () => {
    expect(Object.keys(resolversFor({ only: ['create', 'list'] }))).toEqual(['list', 'create']);
    expect(Object.keys(resolversFor({ except: ['get', 'list', 'delete'] }))).toEqual(['create', 'update']);
  });

  it('rejects only and except together', () => {
    expect(() => resolversFor({ only: ['get'], except: ['list'] })).toThrow(QueryOptionsError);
  });
});

describe('translateErrors', () => {
  const failing = (...errors: unknown[]): Resolver<Record<string, never>, never> =>
    async () => ({ ok: false, errors });

  it('flattens changeset errors from a resolver', async () => {
    const create = resolversFor().create;
    if (create === undefined) throw new Error('create resolver missing');
    const resolver = withMiddleware(create, translateErrors);
    expect(await resolver({ input: { username: 'a' } }, {})).toEqual({
      ok: false,
      errors: ['username should be at least 2 character(s)'],
    });
  });

  it('translates with the locale of the resolution context', async () => {
    const resolver = withMiddleware(failing('Not logged in', { message: 'not found', schema: 'user' }), translateErrors);
    expect(await resolver({}, { locale: 'pt_BR' })).toEqual({
      ok: false,
      errors: ['Não está logado', 'usuário não encontrado'],
    });
  });

  it('uses the translator of the resolution context', async () => {
    const translator = createCatalogTranslator({
      catalogs: { de: { errors: { 'Not logged in': 'Nicht angemeldet' } } },
      defaultLocale: 'de',
    });
    const resolver = withMiddleware(failing('Not logged in'), translateErrors);
    expect(await resolver({}, { translator })).toEqual({ ok: false, errors: ['Nicht angemeldet'] });
  });

  it('passes unknown values through and leaves successes alone', async () => {
    const resolver = withMiddleware(failing(2, { message: 'random message' }), translateErrors);
    expect(await resolver({}, {})).toEqual({ ok: false, errors: [2, { message: 'random message' }] });

    const fine: Resolver<unknown, string> = async () => ({ ok: true, value: 'fine' });
    const succeeding = withMiddleware(fine, translateErrors);
    expect(await succeeding({}, {})).toEqual({ ok: true, value: 'fine' });
  });
});
