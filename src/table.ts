import type { GenerationContext } from './context.js';
import { rowStrategy, type ColumnOverrides } from './row.js';
import { DEFAULT_MAX_ATTEMPTS, custom, list, type UniqueKey } from './strategy.js';
import type { GenerationStore, Row, TableSchema, UniqueConstraint } from './types.js';
import { valueToKey } from './utils.js';

export const MIN_ROWS = 10;
export const MAX_ROWS = 1000;

export type TableOptions = {
  /** Exact number of rows; a random count in [MIN_ROWS, MAX_ROWS] otherwise. */
  rowCount?: number;
  overrides?: ColumnOverrides;
  maxAttempts?: number;
  maxCandidates?: number;
};

export function uniqueKey(constraint: UniqueConstraint): UniqueKey<Row> {
  return (row) => {
    const keys: string[] = [];
    for (const column of constraint) {
      const key = valueToKey(row[column]);
      // NULL is distinct from every value, so the constraint does not apply.
      if (key === null) return null;
      keys.push(key);
    }
    return JSON.stringify(keys);
  };
}

export function generateTable(
  table: TableSchema,
  store: GenerationStore,
  ctx: GenerationContext,
  options: TableOptions = {}
): Row[] {
  const rows = rowStrategy(table, store, ctx, {
    overrides: options.overrides,
    maxCandidates: options.maxCandidates
  });

  const trial = rows.sample(ctx);
  if (!trial.ok) {
    ctx.diagnostics.record({ kind: 'fk-unsatisfiable', table: table.name, columns: trial.error.columns });
    return [];
  }

  const accepted = custom<Row | undefined>('acceptedRow', (sampleCtx) => {
    const result = rows.sample(sampleCtx);
    return result.ok ? result.value : undefined;
  });

  return list(accepted, {
    minLength: options.rowCount ?? MIN_ROWS,
    maxLength: options.rowCount ?? MAX_ROWS,
    uniqueBy: table.uniqueConstraints.map(uniqueKey),
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    label: table.name
  }).sample(ctx);
}
