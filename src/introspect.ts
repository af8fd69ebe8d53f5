import type { ColumnInfo, ForeignKeyConstraint, Queryable, TableSchema, UniqueConstraint } from './types.js';

const SYSTEM_SCHEMAS = new Set(['pg_catalog', 'information_schema']);

export type EnumMap = Map<string, string[]>;

function text(value: unknown): string {
  return String(value);
}

function numberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function identityOf(row: Record<string, unknown>): Pick<ColumnInfo, 'identity'> {
  if (row.is_identity !== 'YES') return {};
  return { identity: row.identity_generation === 'ALWAYS' ? 'ALWAYS' : 'BY DEFAULT' };
}

/** Enum labels in declaration order, keyed by `schema.type`. */
export async function loadEnums(client: Queryable): Promise<EnumMap> {
  const result = await client.query(
    `
    select n.nspname as schema,
           t.typname as name,
           e.enumlabel as label
    from pg_type t
      join pg_enum e on t.oid = e.enumtypid
      join pg_namespace n on n.oid = t.typnamespace
    where n.nspname not in ('pg_catalog', 'information_schema')
    order by n.nspname, t.typname, e.enumsortorder;
  `
  );

  const map: EnumMap = new Map();
  for (const row of result.rows) {
    const key = `${text(row.schema)}.${text(row.name)}`;
    const values = map.get(key) ?? [];
    values.push(text(row.label));
    map.set(key, values);
  }
  return map;
}

/**
 * Reads tables, columns, unique keys (primary keys included) and foreign keys
 * of one schema. Table names come back qualified as `schema.table`.
 * Generated columns are skipped, together with constraints that use them.
 */
export async function introspectSchema(
  client: Queryable,
  schema: string,
  enums: EnumMap = new Map()
): Promise<TableSchema[]> {
  if (SYSTEM_SCHEMAS.has(schema)) {
    throw new Error(`Refusing to introspect system schema: ${schema}`);
  }

  const tablesResult = await client.query(
    `
    select table_name
    from information_schema.tables
    where table_type = 'BASE TABLE'
      and table_schema = $1
    order by table_name;
  `,
    [schema]
  );

  const tableNames = tablesResult.rows.map((row) => text(row.table_name));
  if (!tableNames.length) return [];

  const columnsResult = await client.query(
    `
    select table_name,
           column_name,
           udt_schema,
           udt_name,
           is_nullable,
           is_generated,
           is_identity,
           identity_generation,
           character_maximum_length,
           numeric_precision,
           numeric_scale
    from information_schema.columns
    where table_schema = $1
    order by table_name, ordinal_position;
  `,
    [schema]
  );

  const uniqueResult = await client.query(
    `
    select tc.table_name as table_name,
           tc.constraint_name as constraint_name,
           kcu.column_name as column_name
    from information_schema.table_constraints tc
      join information_schema.key_column_usage kcu
        on tc.constraint_name = kcu.constraint_name
       and tc.table_schema = kcu.table_schema
       and tc.table_name = kcu.table_name
    where tc.constraint_type in ('UNIQUE', 'PRIMARY KEY')
      and tc.table_schema = $1
    order by tc.table_name, tc.constraint_name, kcu.ordinal_position;
  `,
    [schema]
  );

  const fkResult = await client.query(
    `
    select cl.relname as table_name,
           fnsp.nspname as foreign_table_schema,
           fcl.relname as foreign_table_name,
           con.conname as constraint_name,
           local_col.attname as column_name,
           foreign_col.attname as foreign_column_name
    from pg_constraint con
      join pg_class cl on cl.oid = con.conrelid
      join pg_namespace nsp on nsp.oid = cl.relnamespace
      join pg_class fcl on fcl.oid = con.confrelid
      join pg_namespace fnsp on fnsp.oid = fcl.relnamespace
      join lateral unnest(con.conkey) with ordinality as src_local(colnum, ord) on true
      join pg_attribute local_col
        on local_col.attrelid = con.conrelid
       and local_col.attnum = src_local.colnum
      join lateral unnest(con.confkey) with ordinality as src_foreign(colnum, ord)
        on src_foreign.ord = src_local.ord
      join pg_attribute foreign_col
        on foreign_col.attrelid = con.confrelid
       and foreign_col.attnum = src_foreign.colnum
    where con.contype = 'f'
      and nsp.nspname = $1
    order by cl.relname, con.conname, src_local.ord;
  `,
    [schema]
  );

  const columnsByTable = new Map<string, Record<string, ColumnInfo>>();
  for (const row of columnsResult.rows) {
    if (row.is_generated === 'ALWAYS') continue;
    const tableName = text(row.table_name);
    const name = text(row.column_name);
    const column: ColumnInfo = {
      name,
      type: text(row.udt_name),
      isNullable: row.is_nullable === 'YES',
      maxLength: numberOrNull(row.character_maximum_length),
      numericPrecision: numberOrNull(row.numeric_precision),
      numericScale: numberOrNull(row.numeric_scale),
      enumValues: enums.get(`${text(row.udt_schema)}.${text(row.udt_name)}`) ?? null,
      ...identityOf(row)
    };
    const columns = columnsByTable.get(tableName) ?? {};
    columns[name] = column;
    columnsByTable.set(tableName, columns);
  }

  const uniqueByTable = new Map<string, Map<string, UniqueConstraint>>();
  for (const row of uniqueResult.rows) {
    const tableName = text(row.table_name);
    const constraints = uniqueByTable.get(tableName) ?? new Map<string, UniqueConstraint>();
    const columns = constraints.get(text(row.constraint_name)) ?? [];
    columns.push(text(row.column_name));
    constraints.set(text(row.constraint_name), columns);
    uniqueByTable.set(tableName, constraints);
  }

  const fkByTable = new Map<string, Map<string, ForeignKeyConstraint>>();
  for (const row of fkResult.rows) {
    const tableName = text(row.table_name);
    const constraints = fkByTable.get(tableName) ?? new Map<string, ForeignKeyConstraint>();
    const constraintName = text(row.constraint_name);
    let fk = constraints.get(constraintName);
    if (!fk) {
      fk = {
        localTable: `${schema}.${tableName}`,
        foreignTable: `${text(row.foreign_table_schema)}.${text(row.foreign_table_name)}`,
        columns: []
      };
      constraints.set(constraintName, fk);
    }
    fk.columns.push([text(row.column_name), text(row.foreign_column_name)]);
    fkByTable.set(tableName, constraints);
  }

  return tableNames.map((name) => {
    const columns = columnsByTable.get(name) ?? {};
    const known = (column: string) => Object.hasOwn(columns, column);
    return {
      name: `${schema}.${name}`,
      columns,
      uniqueConstraints: [...(uniqueByTable.get(name)?.values() ?? [])].filter((unique) => unique.every(known)),
      fks: [...(fkByTable.get(name)?.values() ?? [])].filter((fk) => fk.columns.every(([local]) => known(local)))
    };
  });
}
