export type ColumnInfo = {
  name: string;
  type: string;
  isNullable: boolean;
  maxLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
  enumValues: string[] | null;
  /** Set for identity columns; `ALWAYS` ones need `OVERRIDING SYSTEM VALUE` on insert. */
  identity?: 'ALWAYS' | 'BY DEFAULT';
};

export type ForeignKeyConstraint = {
  localTable: string;
  foreignTable: string;
  /** Ordered local column -> referenced column pairs. */
  columns: Array<[local: string, foreign: string]>;
};

export type UniqueConstraint = string[];

export type TableSchema = {
  name: string;
  columns: Record<string, ColumnInfo>;
  uniqueConstraints: UniqueConstraint[];
  fks: ForeignKeyConstraint[];
};

export type RowValue = null | boolean | number | bigint | string | Date | Buffer;

export type Row = Record<string, RowValue>;

export type GenerationStore = Map<string, Row[]>;

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type FkUnsatisfiable = {
  table: string;
  columns: string[];
};

export type OverrideSpec = {
  faker?: string;
  values?: Array<string | number | boolean | null>;
};

export type TextMappingSpec = OverrideSpec & {
  words: string[];
};

export type Config = {
  connectionString?: string;
  connection?: {
    host?: string;
    port?: number;
    user?: string;
    password?: string;
    database?: string;
  };
  schemas: string[];
  seed: number;
  rows?: number;
  rowCounts?: Record<string, number>;
  includeTables?: string[];
  excludeTables?: string[];
  dryRun?: boolean;
  overrides?: Record<string, OverrideSpec>;
  textMappings?: TextMappingSpec[];
};

/** The slice of a pg `Client` or `Pool` used for introspection and inserts. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}
