import { buildOverrides, buildTextMappings, rowCountFor } from "./config.js";
import { createContext, type GenerationContext } from "./context.js";
import type { Diagnostic, Logger } from "./diagnostics.js";
import { insertStore } from "./insert.js";
import { introspectSchema, loadEnums } from "./introspect.js";
import type { ColumnOverrides } from "./row.js";
import { validateSchema } from "./schema.js";
import { generateTable } from "./table.js";
import type { Config, GenerationStore, Queryable, TableSchema } from "./types.js";
import { orderTables, ownValue } from "./utils.js";

export { createContext, type GenerationContext } from "./context.js";
export { Diagnostics, formatDiagnostic, type Diagnostic, type Logger } from "./diagnostics.js";
export { CycleDetectedError, InvalidSchemaError, UnsupportedColumnTypeError } from "./errors.js";
export { DEFAULT_TEXT_MAPPINGS, columnStrategy, type TextMapping } from "./generate.js";
export { resolveForeignKeys } from "./resolve.js";
export { rowStrategy, type ColumnOverrides } from "./row.js";
export * from "./strategy.js";
export { generateTable } from "./table.js";
export * from "./types.js";
export { orderTables } from "./utils.js";

export type DatabaseOptions = {
  rowCounts?: Record<string, number>;
  overrides?: Record<string, ColumnOverrides>;
  maxAttempts?: number;
  maxCandidates?: number;
};

/**
 * Generates rows for every table, parents before children. The returned
 * store iterates in that order, so it can be inserted table by table.
 */
export function generateDatabase(
  tables: TableSchema[],
  ctx: GenerationContext,
  options: DatabaseOptions = {},
): GenerationStore {
  validateSchema(tables);
  const byName = new Map(tables.map((table) => [table.name, table]));
  const order = orderTables(tables);
  const store: GenerationStore = new Map();

  for (const name of order) {
    const table = byName.get(name);
    if (!table) {
      ctx.logger.info(`skipping ${name}: referenced but not in schema`);
      continue;
    }
    ctx.logger.info(`generating table ${name}`);
    const rows = generateTable(table, store, ctx, {
      rowCount: ownValue(options.rowCounts, name),
      overrides: ownValue(options.overrides, name),
      maxAttempts: options.maxAttempts,
      maxCandidates: options.maxCandidates,
    });
    store.set(name, rows);
    ctx.logger.info(`generated ${rows.length} rows for ${name}`);
  }

  return store;
}

export type SeedSummary = {
  table: string;
  generated: number;
  inserted: number;
};

export type SeedResult = {
  summary: SeedSummary[];
  diagnostics: Diagnostic[];
};

export async function runSeeder(
  client: Queryable,
  config: Config,
  logger: Logger = console,
): Promise<SeedResult> {
  const base = createContext({ seed: config.seed, logger });
  const ctx: GenerationContext = {
    ...base,
    textMappings: buildTextMappings(config, base.faker),
  };

  const include = config.includeTables?.length
    ? new Set(config.includeTables)
    : null;
  const exclude = config.excludeTables?.length
    ? new Set(config.excludeTables)
    : null;

  const enums = await loadEnums(client);
  const tables: TableSchema[] = [];
  for (const schema of config.schemas) {
    const found = await introspectSchema(client, schema, enums);
    tables.push(
      ...found.filter((table) => {
        if (include && !matchesTableFilter(include, table.name)) return false;
        if (exclude && matchesTableFilter(exclude, table.name)) return false;
        return true;
      }),
    );
  }

  const rowCounts: Record<string, number> = {};
  const overrides: Record<string, ColumnOverrides> = {};
  for (const table of tables) {
    const count = rowCountFor(config, table.name);
    if (count !== undefined) rowCounts[table.name] = count;
    overrides[table.name] = buildOverrides(config, table, base.faker);
  }

  const store = generateDatabase(tables, ctx, { rowCounts, overrides });
  const inserted = config.dryRun
    ? new Map<string, number>()
    : await insertStore(client, store, { tables });

  const summary = [...store.entries()].map(([table, rows]) => ({
    table,
    generated: rows.length,
    inserted: inserted.get(table) ?? 0,
  }));
  return { summary, diagnostics: ctx.diagnostics.entries };
}

function matchesTableFilter(filter: Set<string>, qualified: string): boolean {
  if (filter.has(qualified)) return true;
  const dot = qualified.indexOf(".");
  return dot >= 0 && filter.has(qualified.slice(dot + 1));
}
