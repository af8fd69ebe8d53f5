import type { GenerationStore, Queryable, TableSchema } from './types.js';
import { ownValue, quoteIdent, quoteTable } from './utils.js';

const DEFAULT_BATCH_SIZE = 100;

export type InsertOptions = {
  batchSize?: number;
  /** Schemas of the stored tables; needed to insert into `GENERATED ALWAYS` identity columns. */
  tables?: readonly TableSchema[];
};

function overridesIdentity(table: TableSchema | undefined, columns: string[]): boolean {
  return columns.some((column) => ownValue(table?.columns, column)?.identity === 'ALWAYS');
}

/**
 * Inserts every table of `store` in iteration order with multi-row
 * parameterised statements. Returns the inserted count per table.
 */
export async function insertStore(
  client: Queryable,
  store: GenerationStore,
  options: InsertOptions = {}
): Promise<Map<string, number>> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const schemas = new Map((options.tables ?? []).map((table) => [table.name, table]));
  const counts = new Map<string, number>();

  for (const [table, rows] of store) {
    counts.set(table, 0);
    if (rows.length === 0) continue;

    const columns = Object.keys(rows[0]);
    if (columns.length === 0) {
      for (let i = 0; i < rows.length; i += 1) {
        await client.query(`insert into ${quoteTable(table)} default values`);
      }
      counts.set(table, rows.length);
      continue;
    }
    const columnsSql = columns.map(quoteIdent).join(', ');
    // Generated keys are referenced by child rows, so they are written as drawn.
    const overriding = overridesIdentity(schemas.get(table), columns) ? ' overriding system value' : '';
    for (let i = 0; i < rows.length; i += batchSize) {
      const batch = rows.slice(i, i + batchSize);
      const values: unknown[] = [];
      const rowsPlaceholders: string[] = [];
      for (const row of batch) {
        const placeholders: string[] = [];
        for (const column of columns) {
          values.push(row[column]);
          placeholders.push(`$${values.length}`);
        }
        rowsPlaceholders.push(`(${placeholders.join(', ')})`);
      }
      const sql = `insert into ${quoteTable(table)} (${columnsSql})${overriding} values ${rowsPlaceholders.join(', ')}`;
      await client.query(sql, values);
      counts.set(table, (counts.get(table) ?? 0) + batch.length);
    }
  }

  return counts;
}
