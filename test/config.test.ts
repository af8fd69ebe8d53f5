import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_SCHEMA,
  DEFAULT_SEED,
  buildOverrides,
  buildTextMappings,
  loadConfigFile,
  parseConfigFile,
  resolveConfig,
  rowCountFor
} from '../src/config.js';
import { DEFAULT_TEXT_MAPPINGS } from '../src/generate.js';
import { column, table, testContext } from './fixtures.js';

describe('parseConfigFile', () => {
  it('accepts a complete file', () => {
    const config = parseConfigFile(
      JSON.stringify({
        schema: 'app',
        seed: 7,
        rows: 20,
        rowCounts: { users: 5 },
        excludeTables: ['audit_log'],
        overrides: { 'users.email': { faker: 'internet.email' }, status: { values: ['active', null] } },
        textMappings: [{ words: ['sku'], faker: 'string.alphanumeric' }]
      })
    );

    expect(config.schema).toBe('app');
    expect(config.overrides?.status).toEqual({ values: ['active', null] });
    expect(config.textMappings).toEqual([{ words: ['sku'], faker: 'string.alphanumeric' }]);
  });

  it('reports invalid JSON with its source', () => {
    expect(() => parseConfigFile('{ rows: 1', 'seed.json')).toThrowError(/^Invalid JSON in seed\.json: /);
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfigFile('{"rowz": 1}')).toThrowError(/^Invalid config:/);
  });

  it('rejects overrides without a source', () => {
    expect(() => parseConfigFile('{"overrides": {"email": {}}}')).toThrowError(
      'Invalid config:\n  overrides.email: override needs "faker" or "values"'
    );
  });

  it('rejects negative row counts', () => {
    expect(() => parseConfigFile('{"rows": -1}')).toThrowError(/^Invalid config:\n {2}rows: /);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fkseed-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and validates a file', () => {
    const file = path.join(dir, 'fkseed.config.json');
    fs.writeFileSync(file, '{"rows": 3, "dryRun": true}');
    expect(loadConfigFile(file)).toEqual({ rows: 3, dryRun: true });
  });
});

describe('resolveConfig', () => {
  it('fills defaults', () => {
    expect(resolveConfig({})).toEqual({ schemas: [DEFAULT_SCHEMA], seed: DEFAULT_SEED });
  });

  it('lets later sources win', () => {
    expect(resolveConfig({ rows: 5, seed: 1 }, { rows: 9 })).toEqual({ rows: 9, seed: 1, schemas: ['public'] });
  });

  it('folds a single schema into the list', () => {
    expect(resolveConfig({ schema: 'app' }).schemas).toEqual(['app']);
    expect(resolveConfig({ schema: 'app', schemas: ['a', 'b'] }).schemas).toEqual(['a', 'b']);
  });
});

describe('buildOverrides', () => {
  const users = table('app.users', [column('id', 'int4'), column('email', 'text'), column('status', 'text')]);

  it('prefers the most specific key', () => {
    const ctx = testContext();
    const config = resolveConfig({
      overrides: {
        'app.users.status': { values: ['qualified'] },
        'users.status': { values: ['bare'] },
        status: { values: ['column'] },
        'users.email': { values: ['bare@example.test'] },
        id: { values: [1] }
      }
    });

    const overrides = buildOverrides(config, users, ctx.faker);
    expect(Object.keys(overrides)).toEqual(['id', 'email', 'status']);
    expect(overrides.status.sample(ctx)).toBe('qualified');
    expect(overrides.email.sample(ctx)).toBe('bare@example.test');
    expect(overrides.id.sample(ctx)).toBe(1);
  });

  it('calls faker methods by path', () => {
    const ctx = testContext();
    const overrides = buildOverrides(resolveConfig({ overrides: { email: { faker: 'internet.email' } } }), users, ctx.faker);
    expect(overrides.email.sample(ctx)).toMatch(/@/);
  });

  it('rejects unknown faker paths', () => {
    const ctx = testContext();
    const config = resolveConfig({ overrides: { email: { faker: 'internet.nothing' } } });
    expect(() => buildOverrides(config, users, ctx.faker)).toThrowError('Invalid faker override: internet.nothing');
  });
});

describe('buildTextMappings', () => {
  it('puts configured mappings before the defaults', () => {
    const ctx = testContext();
    const mappings = buildTextMappings(resolveConfig({ textMappings: [{ words: ['email'], values: ['x'] }] }), ctx.faker);

    expect(mappings).toHaveLength(DEFAULT_TEXT_MAPPINGS.length + 1);
    expect(mappings[0].words).toEqual(['email']);
    expect(mappings[0].strategy.sample(ctx)).toBe('x');
    expect(mappings.slice(1)).toEqual(DEFAULT_TEXT_MAPPINGS);
  });
});

describe('rowCountFor', () => {
  it('looks up qualified names, then bare names, then the default', () => {
    const config = resolveConfig({ rows: 7, rowCounts: { 'app.users': 1, orders: 2 } });
    expect(rowCountFor(config, 'app.users')).toBe(1);
    expect(rowCountFor(config, 'app.orders')).toBe(2);
    expect(rowCountFor(config, 'app.items')).toBe(7);
    expect(rowCountFor(resolveConfig({}), 'app.items')).toBeUndefined();
  });
});

describe('lookups by inherited names', () => {
  it('finds no override or row count for object member names', () => {
    const ctx = testContext();
    const meta = table('app.constructor', [column('toString', 'text'), column('valueOf', 'text')]);
    const config = resolveConfig({ overrides: { other: { values: ['x'] } } });

    expect(buildOverrides(config, meta, ctx.faker)).toEqual({});
    expect(rowCountFor(resolveConfig({ rowCounts: {} }), 'app.constructor')).toBeUndefined();
  });

  it('uses overrides keyed by object member names', () => {
    const ctx = testContext();
    const meta = table('app.meta', [column('constructor', 'text')]);
    const overrides = buildOverrides(resolveConfig({ overrides: { constructor: { values: ['c'] } } }), meta, ctx.faker);

    expect(Object.keys(overrides)).toEqual(['constructor']);
    expect(Object.values(overrides)[0].sample(ctx)).toBe('c');
  });
});
