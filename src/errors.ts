export class UnsupportedColumnTypeError extends Error {
  readonly type: string;
  readonly column: string;

  constructor(type: string, column: string) {
    super(`Unsupported column type "${type}" for column ${column}`);
    this.name = 'UnsupportedColumnTypeError';
    this.type = type;
    this.column = column;
  }
}

export class CycleDetectedError extends Error {
  readonly tables: string[];

  constructor(tables: string[]) {
    super(`Cycle detected in table dependencies. Cyclic tables: ${tables.join(', ')}`);
    this.name = 'CycleDetectedError';
    this.tables = tables;
  }
}

export class InvalidSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSchemaError';
  }
}
