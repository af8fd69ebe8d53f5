import { InvalidSchemaError } from './errors.js';
import type { TableSchema } from './types.js';

export function validateTable(table: TableSchema): void {
  const missing = (column: string) => !Object.hasOwn(table.columns, column);

  for (const unique of table.uniqueConstraints) {
    const unknown = unique.filter(missing);
    if (unique.length === 0 || unknown.length) {
      throw new InvalidSchemaError(
        `Unique constraint (${unique.join(', ')}) on ${table.name} references unknown columns: ${unknown.join(', ')}`
      );
    }
  }

  for (const fk of table.fks) {
    if (fk.localTable !== table.name) {
      throw new InvalidSchemaError(`Foreign key to ${fk.foreignTable} listed on ${table.name} but owned by ${fk.localTable}`);
    }
    const unknown = fk.columns.map(([local]) => local).filter(missing);
    if (fk.columns.length === 0 || unknown.length) {
      throw new InvalidSchemaError(
        `Foreign key ${table.name} -> ${fk.foreignTable} references unknown columns: ${unknown.join(', ')}`
      );
    }
  }
}

export function validateSchema(tables: TableSchema[]): void {
  const names = new Set<string>();
  for (const table of tables) {
    if (names.has(table.name)) {
      throw new InvalidSchemaError(`Table ${table.name} is listed more than once`);
    }
    names.add(table.name);
    validateTable(table);
  }
}
