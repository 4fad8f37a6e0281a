import { afterEach, describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { createContext } from '../../src/context/context.js';
import type { FunctionSelection } from '../../src/context/selection.js';
import { crudRoutes, parseOrderBy } from '../../src/http/routes.js';
import { errorHandler, localeFromHeader } from '../../src/http/error-handler.js';
import { MemoryRepository } from '../../src/store/memory-repository.js';
import type { Repository } from '../../src/types.js';
import { createRepository, people, User } from '../support/schemas.js';

let app: FastifyInstance | undefined;

async function build(selection: FunctionSelection = {}, repo: Repository = createRepository({ users: people })) {
  app = Fastify({ logger: false });
  await app.register(errorHandler);
  await app.register(crudRoutes, { prefix: '/users', context: createContext(User, repo), ...selection });
  await app.ready();
  return app;
}

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('localeFromHeader', () => {
  it('takes the first language tag', () => {
    expect(localeFromHeader('pt-BR,pt;q=0.9,en;q=0.8')).toBe('pt_BR');
    expect(localeFromHeader('en')).toBe('en');
    expect(localeFromHeader('*')).toBeUndefined();
    expect(localeFromHeader(undefined)).toBeUndefined();
  });
});

describe('parseOrderBy', () => {
  it('reads comma separated and repeated fields with optional directions', () => {
    expect(parseOrderBy('age,username:desc')).toEqual(['age', ['desc', 'username']]);
    expect(parseOrderBy(['id:asc', 'age'])).toEqual([['asc', 'id'], 'age']);
    expect(parseOrderBy('')).toEqual([]);
  });

  it('rejects unknown directions', () => {
    expect(() => parseOrderBy('id:up')).toThrow('Invalid orderBy direction "up"');
  });
});

describe('crudRoutes', () => {
  it('lists with ordering and pagination', async () => {
    const server = await build();
    const res = await server.inject({ method: 'GET', url: '/users?orderBy=id:desc&limit=2' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([
      { id: 3, username: 'Aa', age: null },
      { id: 2, username: 'Will Smith', age: 60 },
    ]);
  });

  it('filters by repeated parameters and searches', async () => {
    const server = await build();
    const filtered = await server.inject({ method: 'GET', url: '/users?username=Aa&username=Will%20Smith&orderBy=id' });
    expect(filtered.json().map((user: { id: number }) => user.id)).toEqual([2, 3]);

    const byAge = await server.inject({ method: 'GET', url: '/users?age=60&orderBy=id' });
    expect(byAge.json().map((user: { id: number }) => user.id)).toEqual([1, 2]);

    const searched = await server.inject({ method: 'GET', url: '/users?search=smith' });
    expect(searched.json()).toEqual([{ id: 2, username: 'Will Smith', age: 60 }]);
  });

  it('counts records', async () => {
    const server = await build();
    const res = await server.inject({ method: 'GET', url: '/users/count' });
    expect(res.json()).toEqual({ count: 3 });
  });

  it('gets one record or answers 404 with a translated message', async () => {
    const server = await build();
    expect((await server.inject({ method: 'GET', url: '/users/2' })).json()).toEqual({ id: 2, username: 'Will Smith', age: 60 });

    const missing = await server.inject({ method: 'GET', url: '/users/99' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ errors: ['User not found'] });

    const localized = await server.inject({ method: 'GET', url: '/users/99', headers: { 'accept-language': 'pt-BR' } });
    expect(localized.json()).toEqual({ errors: ['Usuário não encontrado'] });
  });

  it('creates a record', async () => {
    const server = await build();
    const res = await server.inject({ method: 'POST', url: '/users', payload: { username: 'Zz', age: 66 } });
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({ id: 4, username: 'Zz', age: 66 });
  });

  it('answers 422 with flattened validation errors', async () => {
    const server = await build();
    const res = await server.inject({ method: 'POST', url: '/users', payload: { username: 'a' } });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({ errors: ['username should be at least 2 character(s)'] });

    const localized = await server.inject({
      method: 'POST',
      url: '/users',
      payload: { username: 'a' },
      headers: { 'accept-language': 'pt-BR,pt;q=0.9' },
    });
    expect(localized.json()).toEqual({ errors: ['nome de usuário deve ter pelo menos 2 caractere(s)'] });
  });

  it('updates and deletes by id', async () => {
    const server = await build();
    const updated = await server.inject({ method: 'PUT', url: '/users/1', payload: { age: 61 } });
    expect(updated.json()).toEqual({ id: 1, username: 'Chuck Norris', age: 61 });

    const deleted = await server.inject({ method: 'DELETE', url: '/users/3' });
    expect(deleted.json()).toEqual({ id: 3, username: 'Aa', age: null });

    const gone = await server.inject({ method: 'DELETE', url: '/users/3' });
    expect(gone.statusCode).toBe(422);
    expect(gone.json()).toEqual({ errors: ['id not found'] });
  });

  it('answers 400 for malformed parameters and bodies', async () => {
    const server = await build();
    expect((await server.inject({ method: 'GET', url: '/users?limit=abc' })).statusCode).toBe(400);
    expect((await server.inject({ method: 'GET', url: '/users?orderBy=id:up' })).statusCode).toBe(400);
    expect((await server.inject({ method: 'POST', url: '/users', payload: [1, 2] })).statusCode).toBe(400);
  });

  it('registers only the selected routes', async () => {
    const server = await build({ only: ['list'] });
    expect((await server.inject({ method: 'GET', url: '/users' })).statusCode).toBe(200);
    expect((await server.inject({ method: 'DELETE', url: '/users/1' })).statusCode).toBe(404);
    expect((await server.inject({ method: 'GET', url: '/users?username=Aa' })).statusCode).toBe(400);
  });

  it('hides unexpected failures behind a 500', async () => {
    const server = await build({}, new MemoryRepository());
    const res = await server.inject({ method: 'GET', url: '/users' });
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ errors: ['Internal server error'] });
  });
});
