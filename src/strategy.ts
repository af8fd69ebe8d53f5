import type { GenerationContext } from './context.js';
import type { Row, RowValue } from './types.js';

export interface Strategy<T> {
  readonly kind: string;
  sample(ctx: GenerationContext): T;
}

export interface FixedStrategy<T> extends Strategy<T> {
  readonly kind: 'fixed';
  readonly value: T;
}

export interface NullableStrategy<T> extends Strategy<T | null> {
  readonly kind: 'nullable';
  readonly inner: Strategy<T>;
  readonly probNull: number;
}

export interface OneOfStrategy<T> extends Strategy<T | undefined> {
  readonly kind: 'oneOf';
  readonly options: readonly T[];
}

export interface CustomStrategy<T> extends Strategy<T> {
  readonly kind: 'custom';
  readonly describe: string;
}

export interface DictStrategy extends Strategy<Row> {
  readonly kind: 'dict';
  readonly fields: Record<string, Strategy<RowValue>>;
  readonly extras: ReadonlyArray<Strategy<Row>>;
}

export type UniqueKey<T> = (item: T) => string | null;

export type ListOptions<T> = {
  minLength: number;
  maxLength: number;
  uniqueBy?: ReadonlyArray<UniqueKey<T>>;
  maxAttempts?: number;
  label?: string;
};

export interface ListStrategy<T> extends Strategy<T[]> {
  readonly kind: 'list';
  readonly item: Strategy<T | undefined>;
  readonly options: ListOptions<T>;
}

export const DEFAULT_MAX_ATTEMPTS = 10000;

export function fixed<T>(value: T): FixedStrategy<T> {
  return {
    kind: 'fixed',
    value,
    sample: () => value
  };
}

export function nullable<T>(inner: Strategy<T>, probNull = 0.1): NullableStrategy<T> {
  return {
    kind: 'nullable',
    inner,
    probNull,
    sample(ctx) {
      if (ctx.faker.datatype.boolean({ probability: probNull })) return null;
      return inner.sample(ctx);
    }
  };
}

export function oneOf<T>(options: readonly T[]): OneOfStrategy<T> {
  return {
    kind: 'oneOf',
    options,
    sample(ctx) {
      if (options.length === 0) return undefined;
      return options[ctx.faker.number.int({ min: 0, max: options.length - 1 })];
    }
  };
}

export function custom<T>(describe: string, produce: (ctx: GenerationContext) => T): CustomStrategy<T> {
  return {
    kind: 'custom',
    describe,
    sample: produce
  };
}

/**
 * Samples every field, then merges the rows produced by `extras` in order.
 * Later groups overwrite earlier keys; each overlap is recorded.
 */
export function dict(
  fields: Record<string, Strategy<RowValue>>,
  extras: ReadonlyArray<Strategy<Row>> = []
): DictStrategy {
  return {
    kind: 'dict',
    fields,
    extras,
    sample(ctx) {
      const result: Row = {};
      for (const [key, strategy] of Object.entries(fields)) {
        result[key] = strategy.sample(ctx);
      }
      for (const extra of extras) {
        const group = extra.sample(ctx);
        const overlap = Object.keys(group).filter((key) => Object.hasOwn(result, key));
        if (overlap.length) {
          ctx.diagnostics.record({ kind: 'key-collision', columns: overlap });
        }
        Object.assign(result, group);
      }
      return result;
    }
  };
}

/**
 * Draws candidates until a random target length is reached or the attempt
 * budget runs out. An `undefined` candidate is discarded. A candidate is
 * rejected when any of its non-null keys was already taken.
 */
export function list<T>(item: Strategy<T | undefined>, options: ListOptions<T>): ListStrategy<T> {
  return {
    kind: 'list',
    item,
    options,
    sample(ctx) {
      const { minLength, maxLength } = options;
      const uniqueBy = options.uniqueBy ?? [];
      const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
      const seen = uniqueBy.map(() => new Set<string>());
      const target = ctx.faker.number.int({ min: minLength, max: maxLength });
      const items: T[] = [];

      for (let attempt = 0; attempt < maxAttempts && items.length < target; attempt += 1) {
        const candidate = item.sample(ctx);
        if (candidate === undefined) continue;
        const keys = uniqueBy.map((key) => key(candidate));
        const taken = keys.some((key, index) => key !== null && seen[index].has(key));
        if (taken) continue;
        keys.forEach((key, index) => {
          if (key !== null) seen[index].add(key);
        });
        items.push(candidate);
      }

      if (items.length < minLength) {
        ctx.diagnostics.record({
          kind: 'short-list',
          label: options.label ?? 'list',
          expected: minLength,
          actual: items.length
        });
      }
      return items;
    }
  };
}
