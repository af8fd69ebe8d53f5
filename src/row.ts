import type { GenerationContext } from './context.js';
import { columnStrategy } from './generate.js';
import { DEFAULT_MAX_CANDIDATES, resolveForeignKeys } from './resolve.js';
import { validateSchema } from './schema.js';
import { custom, dict, fixed, type Strategy } from './strategy.js';
import type { FkUnsatisfiable, GenerationStore, Result, Row, RowValue, TableSchema } from './types.js';
import { ownValue } from './utils.js';

export type ColumnOverrides = Record<string, Strategy<RowValue>>;

export type RowStrategyOptions = {
  overrides?: ColumnOverrides;
  maxCandidates?: number;
};

export type RowResult = Result<Row, FkUnsatisfiable>;

export interface RowStrategy extends Strategy<RowResult> {
  readonly kind: 'row';
  readonly table: string;
}

type ForeignKeyPlan =
  | { ok: true; columns: Set<string>; strategy?: Strategy<Row> }
  | { ok: false; columns: string[] };

/**
 * Builds the per-row procedure for `table`. Column strategies are mapped up
 * front, so an unsupported type fails here rather than mid-table.
 *
 * Each sample first decides which foreign key columns are null. A constraint
 * with a null column is not enforced (MATCH SIMPLE); the remaining ones are
 * resolved jointly against `store`.
 */
export function rowStrategy(
  table: TableSchema,
  store: GenerationStore,
  ctx: GenerationContext,
  options: RowStrategyOptions = {}
): RowStrategy {
  validateSchema([table]);
  const overrides = options.overrides ?? {};
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;

  const unknown = Object.keys(overrides).filter((column) => !Object.hasOwn(table.columns, column));
  if (unknown.length) {
    ctx.diagnostics.record({ kind: 'unknown-override', table: table.name, columns: unknown });
  }

  const strategies = new Map<string, Strategy<RowValue>>();
  for (const [name, column] of Object.entries(table.columns)) {
    strategies.set(name, ownValue(overrides, name) ?? columnStrategy(column, ctx.textMappings));
  }
  const strategyFor = (column: string): Strategy<RowValue> => {
    const strategy = strategies.get(column);
    if (!strategy) throw new Error(`No strategy for ${table.name}.${column}`);
    return strategy;
  };

  const fkColumns = [...new Set(table.fks.flatMap((fk) => fk.columns.map(([local]) => local)))];
  const plans = new Map<string, ForeignKeyPlan>();
  const reportedOverrides = new Set<string>();

  const planFor = (nullColumns: Set<string>, sampleCtx: GenerationContext): ForeignKeyPlan => {
    const enforceable = table.fks.filter((fk) => fk.columns.every(([local]) => !nullColumns.has(local)));
    const key = enforceable.map((fk) => table.fks.indexOf(fk)).join(',');
    const cached = plans.get(key);
    if (cached) return cached;

    const resolution = resolveForeignKeys(enforceable, store, maxCandidates);
    const columns = [...resolution.columns];
    if (resolution.truncated) {
      sampleCtx.diagnostics.record({
        kind: 'fk-candidates-truncated',
        table: table.name,
        columns,
        limit: maxCandidates
      });
    }

    let plan: ForeignKeyPlan;
    const candidates = resolution.strategy;
    if (candidates) {
      plan = {
        ok: true,
        columns: resolution.columns,
        strategy: custom<Row>('foreignKeys', (c) => candidates.sample(c) ?? {})
      };
    } else if (columns.length === 0) {
      plan = { ok: true, columns: resolution.columns };
    } else if (columns.every((column) => table.columns[column].isNullable)) {
      sampleCtx.diagnostics.record({ kind: 'fk-nulled', table: table.name, columns });
      plan = {
        ok: true,
        columns: resolution.columns,
        strategy: fixed(Object.fromEntries(columns.map((column): [string, RowValue] => [column, null])))
      };
    } else {
      plan = { ok: false, columns };
    }
    plans.set(key, plan);
    return plan;
  };

  return {
    kind: 'row',
    table: table.name,
    sample(sampleCtx) {
      const decided = new Map<string, RowValue>();
      const nullFixed: Row = {};
      const nullColumns = new Set<string>();
      for (const column of fkColumns) {
        const value = strategyFor(column).sample(sampleCtx);
        decided.set(column, value);
        if (value === null) {
          nullFixed[column] = null;
          nullColumns.add(column);
        }
      }

      const plan = planFor(nullColumns, sampleCtx);
      if (!plan.ok) {
        return { ok: false, error: { table: table.name, columns: plan.columns } };
      }

      for (const column of plan.columns) {
        if (Object.hasOwn(overrides, column) && !reportedOverrides.has(column)) {
          reportedOverrides.add(column);
          sampleCtx.diagnostics.record({ kind: 'override-ignored', table: table.name, columns: [column] });
        }
      }

      const fields: Record<string, Strategy<RowValue>> = {};
      for (const column of Object.keys(table.columns)) {
        if (nullColumns.has(column) || plan.columns.has(column)) continue;
        // Foreign key columns outside every enforced constraint keep the value drawn above.
        const value = decided.get(column);
        fields[column] = value !== undefined ? fixed(value) : strategyFor(column);
      }

      const groups: Array<Strategy<Row>> = plan.strategy ? [plan.strategy, fixed(nullFixed)] : [fixed(nullFixed)];
      return { ok: true, value: dict(fields, groups).sample(sampleCtx) };
    }
  };
}
