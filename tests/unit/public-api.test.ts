import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the query composers', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.from).toBe('function');
    expect(typeof api.filter).toBe('function');
    expect(typeof api.search).toBe('function');
    expect(typeof api.list).toBe('function');
  });

  it('exports the error flattener', async () => {
    const { flattenErrors, toErrorNode } = await import('../../src/index.js');
    expect(flattenErrors([toErrorNode('Not logged in')])).toEqual(['Not logged in']);
  });

  it('exports the repositories as classes', async () => {
    const { MemoryRepository, PostgresRepository } = await import('../../src/index.js');
    expect(typeof PostgresRepository).toBe('function');
    expect(new MemoryRepository()).toBeInstanceOf(MemoryRepository);
  });

  it('exports ChangesetError as a class usable with instanceof', async () => {
    const { ChangesetError } = await import('../../src/index.js');
    const err = ChangesetError.forField('User', 'username', { message: "can't be blank" });
    expect(err).toBeInstanceOf(ChangesetError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ChangesetError');
  });

  it('lists every CRUD function that can be selected', async () => {
    const { CRUD_FUNCTIONS } = await import('../../src/index.js');
    expect(CRUD_FUNCTIONS).toEqual(['get', 'list', 'count', 'search', 'filter', 'create', 'update', 'delete']);
  });

  it.each(['compilePredicate', 'splitChanges', 'insertGraph', 'constraintError', 'SqlRepository'])(
    'does not export %s (internal)',
    async (name) => {
      const api = await import('../../src/index.js');
      expect((api as Record<string, unknown>)[name]).toBeUndefined();
    },
  );
});
