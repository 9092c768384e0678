import { KdbArgumentError } from '@/connection/errors.js';

import { k } from './factories.js';
import type { KDict, KTable, KValue } from './types.js';

/**
 * Flatten a keyed table into a plain table.
 *
 * A keyed table is a dictionary from a table of key columns to a table of
 * value columns. The result carries the key columns first, then the value
 * columns, each in their original order. A plain table is returned as is.
 *
 * @throws KdbArgumentError if the value is neither a table nor a keyed table
 */
export function unkey(value: KTable | KDict): KTable {
  if (value.kind === 'table') {
    return value;
  }

  const { keys, values } = value;
  if (keys.kind !== 'table' || values.kind !== 'table') {
    throw new KdbArgumentError('Dictionary is not a keyed table');
  }

  return k.table([...keys.columns, ...values.columns], [...keys.data, ...values.data]);
}

/**
 * Column data of a table by name.
 *
 * @throws KdbArgumentError if the table has no such column
 */
export function column(table: KTable, name: string): KValue {
  const index = table.columns.indexOf(name);
  const data = index === -1 ? undefined : table.data[index];
  if (data === undefined) {
    throw new KdbArgumentError(`No column '${name}' in table`);
  }
  return data;
}

/**
 * Number of items in a vector, char vector or list; number of rows in a
 * table; number of keys in a dictionary. Atoms count as 1.
 */
export function count(value: KValue): number {
  switch (value.kind) {
    case 'vector':
      return value.values.length;
    case 'chars':
      return value.value.length;
    case 'list':
      return value.items.length;
    case 'dict':
      return count(value.keys);
    case 'table': {
      const [first] = value.data;
      return first === undefined ? 0 : count(first);
    }
    default:
      return 1;
  }
}
