import { oneOf, type OneOfStrategy } from './strategy.js';
import type { ForeignKeyConstraint, GenerationStore, Row } from './types.js';
import { sameValue } from './utils.js';

export const DEFAULT_MAX_CANDIDATES = 1000;

export type ForeignKeyResolution = {
  /** Local columns spanned by the resolved constraints. */
  columns: Set<string>;
  /** Absent when no referentially valid combination exists. */
  strategy?: OneOfStrategy<Row>;
  truncated: boolean;
};

function project(row: Row, columns: string[]): Row | undefined {
  const result: Row = {};
  for (const column of columns) {
    const value = row[column];
    // NULL never satisfies equality, so such a row cannot be referenced.
    if (value === null || value === undefined) return undefined;
    result[column] = value;
  }
  return result;
}

function rename(row: Row, mapping: Map<string, string>): Row {
  const result: Row = {};
  for (const [column, value] of Object.entries(row)) {
    result[mapping.get(column) ?? column] = value;
  }
  return result;
}

function* innerJoin(left: Iterable<Row>, right: Row[], on: string[]): Generator<Row> {
  for (const a of left) {
    for (const b of right) {
      if (on.every((column) => sameValue(a[column], b[column]))) {
        yield { ...a, ...b };
      }
    }
  }
}

function* crossJoin(left: Iterable<Row>, right: Row[]): Generator<Row> {
  for (const a of left) {
    for (const b of right) {
      yield { ...a, ...b };
    }
  }
}

/**
 * Joins the already generated rows of every referenced table into the set of
 * local column assignments that satisfy all `fks` at once. Constraints that
 * share local columns are inner-joined on them; unrelated ones are crossed.
 */
export function resolveForeignKeys(
  fks: ForeignKeyConstraint[],
  store: GenerationStore,
  maxCandidates = DEFAULT_MAX_CANDIDATES
): ForeignKeyResolution {
  const seen = new Set<string>();
  let candidates: Iterable<Row> = [];
  let first = true;

  for (const fk of fks) {
    const foreignColumns = fk.columns.map(([, foreign]) => foreign);
    const toLocal = new Map(fk.columns.map(([local, foreign]) => [foreign, local]));
    const rows: Row[] = [];
    for (const row of store.get(fk.foreignTable) ?? []) {
      const projected = project(row, foreignColumns);
      if (projected) rows.push(rename(projected, toLocal));
    }

    if (rows.length === 0) {
      const columns = new Set(fks.flatMap((constraint) => constraint.columns.map(([local]) => local)));
      return { columns, truncated: false };
    }

    const localColumns = fk.columns.map(([local]) => local);
    const overlap = localColumns.filter((column) => seen.has(column));
    if (first) {
      candidates = rows;
      first = false;
    } else if (overlap.length) {
      candidates = innerJoin(candidates, rows, overlap);
    } else {
      candidates = crossJoin(candidates, rows);
    }
    for (const column of localColumns) {
      seen.add(column);
    }
  }

  const sampled: Row[] = [];
  let truncated = false;
  for (const row of candidates) {
    if (sampled.length >= maxCandidates) {
      truncated = true;
      break;
    }
    sampled.push(row);
  }

  if (sampled.length === 0) {
    return { columns: seen, truncated };
  }
  return { columns: seen, strategy: oneOf(sampled), truncated };
}
