import fs from 'node:fs';
import type { Faker } from '@faker-js/faker';
import { z } from 'zod';
import { DEFAULT_TEXT_MAPPINGS, fakerStrategy, type TextMapping } from './generate.js';
import type { ColumnOverrides } from './row.js';
import { custom, type Strategy } from './strategy.js';
import type { Config, OverrideSpec, RowValue, TableSchema } from './types.js';
import { ownValue } from './utils.js';

export const DEFAULT_SCHEMA = 'public';
export const DEFAULT_SEED = 1337;

const overrideSchema = z.object({
  faker: z.string().min(1).optional(),
  values: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).min(1).optional()
});

const withSource = <T extends OverrideSpec>(spec: T) => spec.faker !== undefined || spec.values !== undefined;

export const configFileSchema = z
  .object({
    connectionString: z.string().optional(),
    connection: z
      .object({
        host: z.string(),
        port: z.number().int().positive(),
        user: z.string(),
        password: z.string(),
        database: z.string()
      })
      .partial()
      .optional(),
    schema: z.string().optional(),
    schemas: z.array(z.string()).min(1).optional(),
    seed: z.number().int().optional(),
    rows: z.number().int().nonnegative().optional(),
    rowCounts: z.record(z.number().int().nonnegative()).optional(),
    includeTables: z.array(z.string()).optional(),
    excludeTables: z.array(z.string()).optional(),
    dryRun: z.boolean().optional(),
    overrides: z
      .record(overrideSchema.refine(withSource, { message: 'override needs "faker" or "values"' }))
      .optional(),
    textMappings: z
      .array(
        overrideSchema
          .extend({ words: z.array(z.string().min(1)).min(1) })
          .refine(withSource, { message: 'text mapping needs "faker" or "values"' })
      )
      .optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function parseConfigFile(raw: string, source = 'config'): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${source}: ${reason}`);
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid ${source}:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}

export function loadConfigFile(filePath: string): ConfigFile {
  return parseConfigFile(fs.readFileSync(filePath, 'utf8'), filePath);
}

/** Later sources win; `schema` is folded into `schemas`. */
export function resolveConfig(...sources: ConfigFile[]): Config {
  const merged = sources.reduce<ConfigFile>((acc, source) => ({ ...acc, ...source }), {});
  const { schema, ...rest } = merged;
  return {
    ...rest,
    schemas: merged.schemas ?? [schema ?? DEFAULT_SCHEMA],
    seed: merged.seed ?? DEFAULT_SEED
  };
}

export function specStrategy(spec: OverrideSpec, probe: Faker): Strategy<RowValue> {
  const values = spec.values;
  if (values && values.length) {
    return custom('values', ({ faker }) => faker.helpers.arrayElement(values));
  }
  if (spec.faker) {
    return fakerStrategy(spec.faker, probe);
  }
  throw new Error('Override needs "faker" or "values"');
}

function resolveOverride(
  overrides: Config['overrides'],
  table: string,
  column: string
): OverrideSpec | undefined {
  if (!overrides) return undefined;
  const bareTable = table.slice(table.indexOf('.') + 1);
  return (
    ownValue(overrides, `${table}.${column}`) ??
    ownValue(overrides, `${bareTable}.${column}`) ??
    ownValue(overrides, column)
  );
}

/** Column strategies for `table` from keys `schema.table.column`, `table.column` or `column`. */
export function buildOverrides(config: Config, table: TableSchema, probe: Faker): ColumnOverrides {
  const result: ColumnOverrides = {};
  for (const column of Object.keys(table.columns)) {
    const spec = resolveOverride(config.overrides, table.name, column);
    if (spec) result[column] = specStrategy(spec, probe);
  }
  return result;
}

/** Configured mappings are consulted before the defaults. */
export function buildTextMappings(config: Config, probe: Faker): TextMapping[] {
  const configured = (config.textMappings ?? []).map(({ words, ...spec }) => ({
    words,
    strategy: specStrategy(spec, probe)
  }));
  return [...configured, ...DEFAULT_TEXT_MAPPINGS];
}

export function rowCountFor(config: Config, table: string): number | undefined {
  const bareTable = table.slice(table.indexOf('.') + 1);
  return ownValue(config.rowCounts, table) ?? ownValue(config.rowCounts, bareTable) ?? config.rows;
}
