import fs from 'node:fs';
import path from 'node:path';
import { CycleDetectedError } from './errors.js';
import type { RowValue, TableSchema } from './types.js';

export const CONFIG_FILE_NAME = 'fkseed.config.json';

export function parseList(value?: string): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
}

export function quoteIdent(value: string): string {
  return '"' + value.replace(/"/g, '""') + '"';
}

/** Own-property lookup, so names such as `constructor` never hit `Object.prototype`. */
export function ownValue<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  return record !== undefined && Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Quotes `schema.table` as two identifiers. */
export function quoteTable(name: string): string {
  return name.split('.').map(quoteIdent).join('.');
}

export function configFileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function resolveConfigPath(inputPath?: string): string {
  if (!inputPath) {
    return path.resolve(process.cwd(), CONFIG_FILE_NAME);
  }
  return path.resolve(process.cwd(), inputPath);
}

/** Stable key for a value; null for SQL NULL, which never equals anything. */
export function valueToKey(value: RowValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return `d:${value.toISOString()}`;
  if (Buffer.isBuffer(value)) return `b:${value.toString('hex')}`;
  return `${typeof value}:${String(value)}`;
}

export function sameValue(a: RowValue | undefined, b: RowValue | undefined): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) return a.equals(b);
  return a === b;
}

export function topologicalSort(nodes: string[], edges: Map<string, Set<string>>): string[] {
  const inDegree = new Map<string, number>();
  for (const node of nodes) {
    inDegree.set(node, 0);
  }
  for (const [from, tos] of edges.entries()) {
    if (!inDegree.has(from)) continue;
    for (const to of tos) {
      if (!inDegree.has(to)) continue;
      inDegree.set(to, (inDegree.get(to) ?? 0) + 1);
    }
  }

  const queue: string[] = [];
  for (const [node, degree] of inDegree.entries()) {
    if (degree === 0) queue.push(node);
  }

  const result: string[] = [];
  while (queue.length) {
    const node = queue.shift();
    if (!node) break;
    result.push(node);
    const tos = edges.get(node);
    if (!tos) continue;
    for (const to of tos) {
      if (!inDegree.has(to)) continue;
      const next = (inDegree.get(to) ?? 0) - 1;
      inDegree.set(to, next);
      if (next === 0) queue.push(to);
    }
  }

  if (result.length !== nodes.length) {
    const remaining = nodes.filter((node) => !result.includes(node));
    throw new CycleDetectedError(remaining);
  }

  return result;
}

/**
 * Orders tables so that every table follows the tables it references.
 * Tables without any foreign key edge are appended in schema order.
 */
export function orderTables(tables: TableSchema[]): string[] {
  const edges = new Map<string, Set<string>>();
  const linked = new Set<string>();
  for (const table of tables) {
    for (const fk of table.fks) {
      const set = edges.get(fk.foreignTable) ?? new Set<string>();
      set.add(fk.localTable);
      edges.set(fk.foreignTable, set);
      linked.add(fk.foreignTable);
      linked.add(fk.localTable);
    }
  }

  const sorted = topologicalSort([...linked], edges);
  const isolated = tables.map((table) => table.name).filter((name) => !linked.has(name));
  return [...sorted, ...isolated];
}
