import { describe, expect, it } from 'vitest';
import { resolveForeignKeys } from '../src/resolve.js';
import type { GenerationStore, Row } from '../src/types.js';
import { fk } from './fixtures.js';

const childFks = [
  fk('child', 'parent1', [
    ['a', 'a'],
    ['b', 'b']
  ]),
  fk('child', 'parent2', [
    ['b', 'b'],
    ['c', 'c']
  ])
];

function parents(): GenerationStore {
  const range = (from: number, to: number) => Array.from({ length: to - from }, (_, i) => from + i);
  return new Map<string, Row[]>([
    ['parent1', range(0, 10).map((i) => ({ a: `a${i}`, b: `b${i}` }))],
    ['parent2', range(5, 10).map((i) => ({ b: `b${i}`, c: `c${i}` }))]
  ]);
}

describe('resolveForeignKeys', () => {
  it('joins constraints on their shared columns', () => {
    const resolution = resolveForeignKeys(childFks, parents());

    expect([...resolution.columns]).toEqual(['a', 'b', 'c']);
    expect(resolution.truncated).toBe(false);
    expect(resolution.strategy?.options).toEqual([
      { a: 'a5', b: 'b5', c: 'c5' },
      { a: 'a6', b: 'b6', c: 'c6' },
      { a: 'a7', b: 'b7', c: 'c7' },
      { a: 'a8', b: 'b8', c: 'c8' },
      { a: 'a9', b: 'b9', c: 'c9' }
    ]);
  });

  it('fails for every local column when a referenced table is empty', () => {
    const store = parents();
    store.set('parent1', []);

    const resolution = resolveForeignKeys(childFks, store);
    expect([...resolution.columns]).toEqual(['a', 'b', 'c']);
    expect(resolution.strategy).toBeUndefined();
  });

  it('treats a missing referenced table as empty', () => {
    const resolution = resolveForeignKeys([fk('child', 'ghost', [['ghost_id', 'id']])], new Map());
    expect([...resolution.columns]).toEqual(['ghost_id']);
    expect(resolution.strategy).toBeUndefined();
  });

  it('drops referents with a null in a referenced column', () => {
    const store: GenerationStore = new Map([['parent', [{ id: 1, name: 'x' }, { id: null, name: 'y' }, { id: 3, name: 'z' }]]]);

    const resolution = resolveForeignKeys([fk('child', 'parent', [['owner_id', 'id']])], store);
    expect(resolution.strategy?.options).toEqual([{ owner_id: 1 }, { owner_id: 3 }]);
  });

  it('fails when only null referents exist', () => {
    const store: GenerationStore = new Map([['parent1', [{ a: null, b: 'b0' }]], ['parent2', [{ b: 'b0', c: 'c0' }]]]);

    const resolution = resolveForeignKeys(childFks, store);
    expect(resolution.strategy).toBeUndefined();
    expect([...resolution.columns]).toEqual(['a', 'b', 'c']);
  });

  it('crosses constraints without shared columns', () => {
    const store: GenerationStore = new Map([
      ['p1', [{ id: 1 }, { id: 2 }]],
      ['p2', [{ id: 10 }, { id: 20 }, { id: 30 }]]
    ]);

    const resolution = resolveForeignKeys([fk('c', 'p1', [['x', 'id']]), fk('c', 'p2', [['y', 'id']])], store);
    expect(resolution.strategy?.options).toEqual([
      { x: 1, y: 10 },
      { x: 1, y: 20 },
      { x: 1, y: 30 },
      { x: 2, y: 10 },
      { x: 2, y: 20 },
      { x: 2, y: 30 }
    ]);
  });

  it('caps the candidates and reports truncation', () => {
    const store: GenerationStore = new Map([
      ['p1', [{ id: 1 }, { id: 2 }, { id: 3 }]],
      ['p2', [{ id: 10 }, { id: 20 }, { id: 30 }]]
    ]);
    const fks = [fk('c', 'p1', [['x', 'id']]), fk('c', 'p2', [['y', 'id']])];

    const capped = resolveForeignKeys(fks, store, 4);
    expect(capped.truncated).toBe(true);
    expect(capped.strategy?.options).toHaveLength(4);

    const exact = resolveForeignKeys(fks, store, 9);
    expect(exact.truncated).toBe(false);
    expect(exact.strategy?.options).toHaveLength(9);
  });

  it('compares join values strictly', () => {
    const store: GenerationStore = new Map<string, Row[]>([
      ['parent1', [{ a: 'a0', b: 1 }]],
      ['parent2', [{ b: '1', c: 'c0' }]]
    ]);

    const resolution = resolveForeignKeys(childFks, store);
    expect(resolution.strategy).toBeUndefined();
  });

  it('matches dates by time', () => {
    const store: GenerationStore = new Map<string, Row[]>([
      ['parent1', [{ a: 'a0', b: new Date('2024-01-01T00:00:00Z') }]],
      ['parent2', [{ b: new Date('2024-01-01T00:00:00Z'), c: 'c0' }]]
    ]);

    const resolution = resolveForeignKeys(childFks, store);
    expect(resolution.strategy?.options).toEqual([{ a: 'a0', b: new Date('2024-01-01T00:00:00Z'), c: 'c0' }]);
  });

  it('returns nothing to resolve for no constraints', () => {
    const resolution = resolveForeignKeys([], new Map());
    expect(resolution.columns.size).toBe(0);
    expect(resolution.strategy).toBeUndefined();
  });
});
