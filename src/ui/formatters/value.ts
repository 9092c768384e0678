/**
 * Renders kdb+ values for the terminal.
 *
 * `formatValue` prints q notation (`1 2 3i`, `` `a`b!1 2 ``, `2024.03.01`);
 * `toJson` projects a value onto plain JSON for `--json` output.
 */

import {
  DAYS_BETWEEN_1970_2000,
  INT_NULL,
  LONG_NULL,
  MILLIS_IN_DAY,
  NANOS_IN_DAY,
  NULL_GUID,
  SHORT_NULL,
  k,
  splitNanos,
} from '@/model/index.js';
import type { AtomKind, AtomValues, KAtomOf, KValue, KVectorOf, VectorKind } from '@/model/index.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

// ============================================================================
// Temporal text
// ============================================================================

const pad = (n: string | number | bigint, width = 2): string => String(n).padStart(width, '0');

function formatDays(days: number): string {
  const date = new Date((days + DAYS_BETWEEN_1970_2000) * MILLIS_IN_DAY);
  return `${date.getUTCFullYear()}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCDate())}`;
}

function formatClock(millis: number, withMillis: boolean): string {
  const sign = millis < 0 ? '-' : '';
  const abs = Math.abs(millis);
  const hours = Math.floor(abs / 3_600_000);
  const minutes = Math.floor(abs / 60_000) % 60;
  const seconds = Math.floor(abs / 1000) % 60;
  const clock = `${sign}${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  return withMillis ? `${clock}.${pad(abs % 1000, 3)}` : clock;
}

function formatNanoClock(nanos: bigint): string {
  const seconds = nanos / 1_000_000_000n;
  return `${pad(seconds / 3600n)}:${pad((seconds / 60n) % 60n)}:${pad(seconds % 60n)}.${pad(nanos % 1_000_000_000n, 9)}`;
}

function formatTimestamp(nanos: bigint): string {
  const { days, remainder } = splitNanos(nanos);
  return `${formatDays(Number(days))}D${formatNanoClock(remainder)}`;
}

function formatTimespan(nanos: bigint): string {
  const sign = nanos < 0n ? '-' : '';
  const abs = nanos < 0n ? -nanos : nanos;
  return `${sign}${abs / NANOS_IN_DAY}D${formatNanoClock(abs % NANOS_IN_DAY)}`;
}

function formatMonth(months: number): string {
  const year = 2000 + Math.floor(months / 12);
  const month = (((months % 12) + 12) % 12) + 1;
  return `${year}.${pad(month)}`;
}

function formatDatetime(days: number): string {
  const millis = Math.round(days * MILLIS_IN_DAY);
  const wholeDays = Math.floor(millis / MILLIS_IN_DAY);
  return `${formatDays(wholeDays)}T${formatClock(millis - wholeDays * MILLIS_IN_DAY, true)}`;
}

function formatMinute(minutes: number): string {
  const sign = minutes < 0 ? '-' : '';
  const abs = Math.abs(minutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

function formatNumber(x: number): string {
  if (x === Number.POSITIVE_INFINITY) return '0w';
  if (x === Number.NEGATIVE_INFINITY) return '-0w';
  return String(x);
}

// ============================================================================
// Elements
// ============================================================================

/**
 * Element text inside a vector, without the type suffix.
 */
type ElementFormatters = { [K in AtomKind]: (x: AtomValues[K]) => string };

const ELEMENT: ElementFormatters = {
  boolean: (x) => (x ? '1' : '0'),
  guid: (x) => x,
  byte: (x) => pad(x.toString(16)),
  short: (x) => (x === SHORT_NULL ? '0N' : String(x)),
  int: (x) => (x === INT_NULL ? '0N' : String(x)),
  long: (x) => (x === LONG_NULL ? '0N' : String(x)),
  real: (x) => (Number.isNaN(x) ? '0N' : formatNumber(x)),
  float: (x) => (Number.isNaN(x) ? '0n' : formatNumber(x)),
  char: (x) => x,
  symbol: (x) => `\`${x}`,
  timestamp: (x) => (x === LONG_NULL ? '0Np' : formatTimestamp(x)),
  month: (x) => (x === INT_NULL ? '0N' : formatMonth(x)),
  date: (x) => (x === INT_NULL ? '0Nd' : formatDays(x)),
  datetime: (x) => (Number.isNaN(x) ? '0Nz' : formatDatetime(x)),
  timespan: (x) => (x === LONG_NULL ? '0Nn' : formatTimespan(x)),
  minute: (x) => (x === INT_NULL ? '0Nu' : formatMinute(x)),
  second: (x) => (x === INT_NULL ? '0Nv' : formatClock(x * 1000, false)),
  time: (x) => (x === INT_NULL ? '0Nt' : formatClock(x, true)),
};

/** Type suffix written once after a vector or atom */
const SUFFIX: Readonly<Partial<Record<AtomKind, string>>> = {
  boolean: 'b',
  short: 'h',
  int: 'i',
  real: 'e',
  month: 'm',
};

/** Cast used to print empty vectors, e.g. `` `int$() `` */
const EMPTY_NAME: Readonly<Record<VectorKind, string>> = {
  boolean: 'boolean',
  guid: 'guid',
  byte: 'byte',
  short: 'short',
  int: 'int',
  long: 'long',
  real: 'real',
  float: 'float',
  symbol: 'symbol',
  timestamp: 'timestamp',
  month: 'month',
  date: 'date',
  datetime: 'datetime',
  timespan: 'timespan',
  minute: 'minute',
  second: 'second',
  time: 'time',
};

function formatAtom<K extends AtomKind>(atom: KAtomOf<K>): string {
  const format: (x: AtomValues[K]) => string = ELEMENT[atom.kind];
  const text = format(atom.value);

  switch (atom.kind) {
    case 'byte':
      return `0x${text}`;
    case 'char':
      return JSON.stringify(text);
    case 'guid':
      return atom.value === NULL_GUID ? '0Ng' : text;
    case 'float':
      return Number.isInteger(atom.value) ? `${text}f` : text;
    default:
      return `${text}${SUFFIX[atom.kind] ?? ''}`;
  }
}

function formatVector<K extends VectorKind>(vector: KVectorOf<K>): string {
  const { of, values } = vector;
  if (values.length === 0) {
    return `\`${EMPTY_NAME[of]}$()`;
  }

  const format: (x: AtomValues[K]) => string = ELEMENT[of];
  const items = values.map(format);
  const prefix = values.length === 1 ? 'enlist ' : '';

  switch (of) {
    case 'boolean':
      return `${prefix}${items.join('')}b`;
    case 'byte':
      return `${prefix}0x${items.join('')}`;
    case 'symbol':
      return `${prefix}${items.join('')}`;
    case 'float': {
      const integral = vector.values.every((x) => typeof x === 'number' && Number.isInteger(x));
      return `${prefix}${items.join(' ')}${integral ? 'f' : ''}`;
    }
    default:
      return `${prefix}${items.join(' ')}${SUFFIX[of] ?? ''}`;
  }
}

// ============================================================================
// Values
// ============================================================================

/**
 * Render a value in q notation.
 *
 * @example
 * ```typescript
 * formatValue(k.vector('int', [1, 2, 3])); // '1 2 3i'
 * formatValue(k.dict(k.vector('symbol', ['a', 'b']), k.vector('long', [1n, 2n]))); // '`a`b!1 2'
 * ```
 */
export function formatValue(value: KValue): string {
  switch (value.kind) {
    case 'vector':
      return formatVector(value);
    case 'chars':
      return value.value.length === 1 ? `enlist ${JSON.stringify(value.value)}` : JSON.stringify(value.value);
    case 'list':
      if (value.items.length === 1) {
        return `enlist ${formatValue(value.items[0] ?? k.nil())}`;
      }
      return `(${value.items.map(formatValue).join(';')})`;
    case 'dict':
      return `${formatNested(value.keys)}!${formatNested(value.values)}`;
    case 'table':
      return `+${formatNested(k.vector('symbol', value.columns))}!${formatNested(k.list(...value.data))}`;
    case 'null':
      return '::';
    case 'function':
      return `<function ${value.type}>`;
    default:
      return formatAtom(value);
  }
}

/**
 * Operands of `!` need parentheses unless they are atoms or simple vectors.
 */
function formatNested(value: KValue): string {
  const text = formatValue(value);
  return value.kind === 'dict' || value.kind === 'table' || text.startsWith('enlist ') ? `(${text})` : text;
}

// ============================================================================
// JSON projection
// ============================================================================

type JsonConverters = { [K in AtomKind]: (x: AtomValues[K]) => JsonValue };

const temporal =
  <T>(isNullValue: (x: T) => boolean, format: (x: T) => string) =>
  (x: T): JsonValue =>
    isNullValue(x) ? null : format(x);

const JSON_ELEMENT: JsonConverters = {
  boolean: (x) => x,
  guid: (x) => x,
  byte: (x) => x,
  short: (x) => (x === SHORT_NULL ? null : x),
  int: (x) => (x === INT_NULL ? null : x),
  long: (x) => (x === LONG_NULL ? null : String(x)),
  real: (x) => (Number.isFinite(x) ? x : null),
  float: (x) => (Number.isFinite(x) ? x : null),
  char: (x) => x,
  symbol: (x) => x,
  timestamp: temporal((x: bigint) => x === LONG_NULL, formatTimestamp),
  month: temporal((x: number) => x === INT_NULL, formatMonth),
  date: temporal((x: number) => x === INT_NULL, formatDays),
  datetime: temporal((x: number) => Number.isNaN(x), formatDatetime),
  timespan: temporal((x: bigint) => x === LONG_NULL, formatTimespan),
  minute: temporal((x: number) => x === INT_NULL, formatMinute),
  second: temporal((x: number) => x === INT_NULL, (x) => formatClock(x * 1000, false)),
  time: temporal((x: number) => x === INT_NULL, (x) => formatClock(x, true)),
};

function atomToJson<K extends AtomKind>(atom: KAtomOf<K>): JsonValue {
  const convert: (x: AtomValues[K]) => JsonValue = JSON_ELEMENT[atom.kind];
  return convert(atom.value);
}

function vectorToJson<K extends VectorKind>(vector: KVectorOf<K>): JsonValue[] {
  const convert: (x: AtomValues[K]) => JsonValue = JSON_ELEMENT[vector.of];
  return vector.values.map(convert);
}

/**
 * Cells of a table column or dictionary value side, projected.
 */
function columnCells(column: KValue): JsonValue[] {
  switch (column.kind) {
    case 'vector':
      return vectorToJson(column);
    case 'chars':
      return Array.from(column.value);
    case 'list':
      return column.items.map(toJson);
    default:
      return [toJson(column)];
  }
}

function tableRows(columns: readonly string[], data: readonly KValue[]): JsonValue[] {
  const cells = data.map(columnCells);
  const rowCount = cells[0]?.length ?? 0;
  const rows: JsonValue[] = [];
  for (let i = 0; i < rowCount; i++) {
    const row: { [key: string]: JsonValue } = {};
    columns.forEach((name, c) => {
      row[name] = cells[c]?.[i] ?? null;
    });
    rows.push(row);
  }
  return rows;
}

/**
 * Project a value onto JSON.
 *
 * Longs, timestamps and timespans become strings; nulls become `null`;
 * tables become arrays of row objects; dictionaries keyed by symbols
 * become objects.
 */
export function toJson(value: KValue): JsonValue {
  switch (value.kind) {
    case 'vector':
      return vectorToJson(value);
    case 'chars':
      return value.value;
    case 'list':
      return value.items.map(toJson);
    case 'dict': {
      const { keys, values } = value;
      if (keys.kind === 'table' && values.kind === 'table') {
        return tableRows([...keys.columns, ...values.columns], [...keys.data, ...values.data]);
      }
      const cells = columnCells(values);
      if (keys.kind === 'vector' && keys.of === 'symbol' && cells.length === keys.values.length) {
        const object: { [key: string]: JsonValue } = {};
        keys.values.forEach((key, i) => {
          object[key] = cells[i] ?? null;
        });
        return object;
      }
      return { keys: toJson(keys), values: toJson(values) };
    }
    case 'table':
      return tableRows(value.columns, value.data);
    case 'null':
      return null;
    case 'function':
      return formatValue(value);
    default:
      return atomToJson(value);
  }
}
