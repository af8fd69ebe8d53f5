import type { Faker } from '@faker-js/faker';
import { UnsupportedColumnTypeError } from './errors.js';
import { custom, nullable, type Strategy } from './strategy.js';
import type { ColumnInfo, RowValue } from './types.js';

export type TextMapping = {
  /** Every word must appear in the lower-cased column name. */
  words: string[];
  strategy: Strategy<RowValue>;
};

const DEFAULT_TEXT_LENGTH = 20;
const DEFAULT_VARBIT_LENGTH = 64;
const DEFAULT_NUMERIC_PRECISION = 53;
const DEFAULT_INT_BITS = 32;
const COMPANY_SUFFIXES = ['LLC', 'Ltd', 'Inc', 'Group', 'GmbH'];

const counterpartyName = custom('counterpartyName', ({ faker }) =>
  faker.helpers.arrayElement([
    faker.company.name(),
    `${faker.person.fullName()} ${faker.helpers.arrayElement(COMPANY_SUFFIXES)}`
  ])
);

// Specific rules come before the general ones they would otherwise lose to.
export const DEFAULT_TEXT_MAPPINGS: readonly TextMapping[] = [
  { words: ['company', 'name'], strategy: custom('company.name', ({ faker }) => faker.company.name()) },
  { words: ['counterparty', 'name'], strategy: counterpartyName },
  { words: ['customer', 'name'], strategy: counterpartyName },
  { words: ['supplier', 'name'], strategy: counterpartyName },
  { words: ['first', 'name'], strategy: custom('person.firstName', ({ faker }) => faker.person.firstName()) },
  { words: ['last', 'name'], strategy: custom('person.lastName', ({ faker }) => faker.person.lastName()) },
  { words: ['user', 'name'], strategy: custom('internet.username', ({ faker }) => faker.internet.username()) },
  { words: ['email'], strategy: custom('internet.email', ({ faker }) => faker.internet.email()) },
  { words: ['name'], strategy: custom('person.fullName', ({ faker }) => faker.person.fullName()) },
  { words: ['phone'], strategy: custom('phone.number', ({ faker }) => faker.phone.number()) },
  { words: ['telephone'], strategy: custom('phone.number', ({ faker }) => faker.phone.number()) },
  { words: ['street'], strategy: custom('location.streetAddress', ({ faker }) => faker.location.streetAddress()) },
  {
    words: ['address'],
    strategy: custom('location.streetAddress', ({ faker }) => faker.location.streetAddress({ useFullAddress: true }))
  },
  { words: ['city'], strategy: custom('location.city', ({ faker }) => faker.location.city()) },
  { words: ['country'], strategy: custom('location.country', ({ faker }) => faker.location.country()) },
  { words: ['zip'], strategy: custom('location.zipCode', ({ faker }) => faker.location.zipCode()) },
  { words: ['postal'], strategy: custom('location.zipCode', ({ faker }) => faker.location.zipCode()) },
  { words: ['currency'], strategy: custom('finance.currencyCode', ({ faker }) => faker.finance.currencyCode()) },
  { words: ['url'], strategy: custom('internet.url', ({ faker }) => faker.internet.url()) },
  { words: ['website'], strategy: custom('internet.url', ({ faker }) => faker.internet.url()) },
  {
    words: ['slug'],
    strategy: custom('slug', ({ faker }) => faker.helpers.slugify(faker.lorem.words(3)).toLowerCase())
  },
  { words: ['title'], strategy: custom('lorem.sentence', ({ faker }) => faker.lorem.sentence({ min: 3, max: 6 })) },
  { words: ['description'], strategy: custom('lorem.paragraph', ({ faker }) => faker.lorem.paragraph()) },
  { words: ['notes'], strategy: custom('lorem.paragraph', ({ faker }) => faker.lorem.paragraph()) }
];

export function uuidStrategy(): Strategy<string> {
  return custom('uuid', ({ faker }) => faker.string.uuid());
}

export function dateStrategy(): Strategy<string> {
  return custom('date', ({ faker }) => faker.date.past({ years: 5 }).toISOString().slice(0, 10));
}

export function timestampStrategy(): Strategy<Date> {
  return custom('timestamp', ({ faker }) => faker.date.past({ years: 5 }));
}

export function timeStrategy(): Strategy<string> {
  return custom('time', ({ faker }) => formatTime(faker.date.recent()));
}

export function textStrategy(maxLength: number | null): Strategy<string> {
  const max = maxLength ?? DEFAULT_TEXT_LENGTH;
  return custom('text', ({ faker }) => faker.string.alpha({ length: { min: 1, max } }));
}

/**
 * Decimal rendered as text so that wide precisions survive. The integer part
 * has at most `precision - scale` digits, the fraction exactly `scale`, of
 * which no more than `precision` are significant.
 */
export function decimalStrategy(precision: number, scale: number): Strategy<string> {
  const integerDigits = precision - scale;
  return custom('decimal', ({ faker }) => {
    const sign = faker.datatype.boolean() ? '-' : '';
    const integer =
      integerDigits > 0
        ? faker.string.numeric({
            length: faker.number.int({ min: 1, max: integerDigits }),
            allowLeadingZeros: false
          })
        : '0';
    // With scale above precision the leading fractional digits must stay zero.
    const zeros = '0'.repeat(Math.max(0, -integerDigits));
    const digits = Math.min(scale, precision);
    const fraction = scale > 0 ? `.${zeros}${faker.string.numeric({ length: digits, allowLeadingZeros: true })}` : '';
    return `${sign}${integer}${fraction}`;
  });
}

export function booleanStrategy(): Strategy<boolean> {
  return custom('boolean', ({ faker }) => faker.datatype.boolean());
}

export function intStrategy(bits: number): Strategy<number | bigint> {
  if (bits <= DEFAULT_INT_BITS) {
    const max = 2 ** (bits - 1) - 1;
    return custom('int', ({ faker }) => faker.number.int({ min: -max - 1, max }));
  }
  const max = 2n ** BigInt(bits - 1) - 1n;
  return custom('bigint', ({ faker }) => faker.number.bigInt({ min: -max - 1n, max }));
}

export function jsonStrategy(): Strategy<string> {
  return custom('json', ({ faker }) =>
    JSON.stringify({
      id: faker.string.uuid(),
      label: faker.lorem.word(),
      createdAt: faker.date.recent().toISOString()
    })
  );
}

export function bitStrategy(length: number | null, varying: boolean): Strategy<string> {
  return custom('bit', ({ faker }) => {
    const size = varying
      ? faker.number.int({ min: 1, max: length ?? DEFAULT_VARBIT_LENGTH })
      : length ?? 1;
    return faker.string.binary({ length: size, prefix: '' });
  });
}

export function xmlStrategy(): Strategy<string> {
  return custom('xml', ({ faker }) => {
    const items = faker.lorem
      .words({ min: 1, max: 4 })
      .split(' ')
      .map((word) => `<item>${word}</item>`)
      .join('');
    return `<?xml version="1.0" encoding="UTF-8"?><root>${items}</root>`;
  });
}

export function bytesStrategy(): Strategy<Buffer> {
  return custom('bytes', ({ faker }) => Buffer.from(faker.string.alphanumeric(16)));
}

export function matchTextMapping(
  columnName: string,
  mappings: readonly TextMapping[]
): Strategy<RowValue> | undefined {
  const normalized = columnName.toLowerCase();
  return mappings.find((mapping) => mapping.words.every((word) => normalized.includes(word.toLowerCase())))
    ?.strategy;
}

function baseStrategy(column: ColumnInfo, mappings: readonly TextMapping[]): Strategy<RowValue> {
  if (column.enumValues && column.enumValues.length) {
    const labels = column.enumValues;
    return custom('enum', ({ faker }) => faker.helpers.arrayElement(labels));
  }

  switch (column.type) {
    case 'uuid':
      return uuidStrategy();
    case 'date':
      return dateStrategy();
    case 'timestamp':
    case 'timestamptz':
      return timestampStrategy();
    case 'time':
    case 'timetz':
      return timeStrategy();
    case 'varchar':
    case 'text':
    case 'bpchar':
      if (column.maxLength === null) {
        return matchTextMapping(column.name, mappings) ?? textStrategy(null);
      }
      return textStrategy(column.maxLength);
    case 'numeric':
    case 'money':
    case 'float4':
    case 'float8':
      return decimalStrategy(column.numericPrecision ?? DEFAULT_NUMERIC_PRECISION, column.numericScale ?? 0);
    case 'bool':
      return booleanStrategy();
    case 'int2':
    case 'int4':
    case 'int8':
      return intStrategy(column.numericPrecision ?? DEFAULT_INT_BITS);
    case 'json':
    case 'jsonb':
      return jsonStrategy();
    case 'bit':
      return bitStrategy(column.maxLength, false);
    case 'varbit':
      return bitStrategy(column.maxLength, true);
    case 'xml':
      return xmlStrategy();
    case 'bytea':
      return bytesStrategy();
    default:
      throw new UnsupportedColumnTypeError(column.type, column.name);
  }
}

export function columnStrategy(column: ColumnInfo, mappings: readonly TextMapping[]): Strategy<RowValue> {
  const strategy = baseStrategy(column, mappings);
  return column.isNullable ? nullable(strategy) : strategy;
}

/** Strategy calling `faker.<path>()`, e.g. `internet.email`. */
export function fakerStrategy(path: string, probe: Faker): Strategy<RowValue> {
  if (!resolveFakerCall(probe, path)) {
    throw new Error(`Invalid faker override: ${path}`);
  }
  return custom(path, ({ faker }) => {
    const call = resolveFakerCall(faker, path);
    if (!call) throw new Error(`Invalid faker override: ${path}`);
    return toRowValue(call());
  });
}

export function toRowValue(value: unknown): RowValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  ) {
    return value;
  }
  if (value instanceof Date || Buffer.isBuffer(value)) return value;
  return JSON.stringify(value);
}

function resolveFakerCall(faker: Faker, path: string): (() => unknown) | undefined {
  const segments = path.split('.').filter(Boolean);
  let owner: unknown = faker;
  let current: unknown = faker;
  for (const segment of segments) {
    if (!current || typeof current !== 'object' || !(segment in current)) {
      return undefined;
    }
    owner = current;
    current = Reflect.get(current, segment);
  }
  if (typeof current !== 'function') return undefined;
  const fn = current;
  return () => Reflect.apply(fn, owner, []);
}

function formatTime(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  const ss = String(date.getSeconds()).padStart(2, '0');
  return `${hh}:${mm}:${ss}`;
}
