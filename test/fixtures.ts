import { createContext, type GenerationContext } from '../src/context.js';
import type { Logger } from '../src/diagnostics.js';
import type { TextMapping } from '../src/generate.js';
import type { ColumnInfo, ForeignKeyConstraint, Queryable, TableSchema, UniqueConstraint } from '../src/types.js';

export const silent: Logger = {
  info: () => undefined,
  warn: () => undefined
};

export function testContext(seed = 42, textMappings?: readonly TextMapping[]): GenerationContext {
  return createContext({ seed, logger: silent, textMappings });
}

export function column(name: string, type: string, extra: Partial<ColumnInfo> = {}): ColumnInfo {
  return {
    name,
    type,
    isNullable: false,
    maxLength: null,
    numericPrecision: null,
    numericScale: null,
    enumValues: null,
    ...extra
  };
}

export function fk(localTable: string, foreignTable: string, columns: Array<[string, string]>): ForeignKeyConstraint {
  return { localTable, foreignTable, columns };
}

export function table(
  name: string,
  columns: ColumnInfo[],
  constraints: { unique?: UniqueConstraint[]; fks?: ForeignKeyConstraint[] } = {}
): TableSchema {
  return {
    name,
    columns: Object.fromEntries(columns.map((info) => [info.name, info])),
    uniqueConstraints: constraints.unique ?? [],
    fks: constraints.fks ?? []
  };
}

/** In-process stand-in for a pg client: answers by SQL fragment and records every call. */
export class FakeClient implements Queryable {
  readonly calls: Array<{ text: string; values?: unknown[] }> = [];

  constructor(private readonly responders: Array<[fragment: string, rows: Array<Record<string, unknown>>]> = []) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.calls.push({ text, values });
    const match = this.responders.find(([fragment]) => text.includes(fragment));
    return { rows: match ? match[1] : [] };
  }

  inserts(): Array<{ text: string; values?: unknown[] }> {
    return this.calls.filter((call) => call.text.startsWith('insert into'));
  }
}
