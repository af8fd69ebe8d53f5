export type Logger = Pick<Console, 'info' | 'warn'>;

export type Diagnostic =
  | { kind: 'fk-unsatisfiable'; table: string; columns: string[] }
  | { kind: 'fk-nulled'; table: string; columns: string[] }
  | { kind: 'fk-candidates-truncated'; table: string; columns: string[]; limit: number }
  | { kind: 'override-ignored'; table: string; columns: string[] }
  | { kind: 'unknown-override'; table: string; columns: string[] }
  | { kind: 'key-collision'; columns: string[] }
  | { kind: 'short-list'; label: string; expected: number; actual: number };

export function formatDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case 'fk-unsatisfiable':
      return `No rows generated for ${diagnostic.table}: foreign keys on ${diagnostic.columns.join(', ')} cannot be satisfied`;
    case 'fk-nulled':
      return `Foreign keys on ${diagnostic.table} (${diagnostic.columns.join(', ')}) have no referents, using null`;
    case 'fk-candidates-truncated':
      return `Foreign key candidates for ${diagnostic.table} (${diagnostic.columns.join(', ')}) truncated at ${diagnostic.limit}`;
    case 'override-ignored':
      return `Override for foreign key columns of ${diagnostic.table} ignored: ${diagnostic.columns.join(', ')}`;
    case 'unknown-override':
      return `Override for unknown columns of ${diagnostic.table} ignored: ${diagnostic.columns.join(', ')}`;
    case 'key-collision':
      return `Key overlap while merging row fields: ${diagnostic.columns.join(', ')}`;
    case 'short-list':
      return `Generated ${diagnostic.actual} of at least ${diagnostic.expected} items for ${diagnostic.label}`;
  }
}

export class Diagnostics {
  readonly entries: Diagnostic[] = [];

  constructor(private readonly logger: Logger) {}

  record(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    this.logger.warn(formatDiagnostic(diagnostic));
  }

  ofKind<K extends Diagnostic['kind']>(kind: K): Array<Extract<Diagnostic, { kind: K }>> {
    return this.entries.filter(
      (entry): entry is Extract<Diagnostic, { kind: K }> => entry.kind === kind
    );
  }
}
