import { LazyQueryError } from '../errors.js';
import type { ColumnType } from '../expr/types.js';
import { Plan } from './builder.js';
import type { ColumnSchema, TableRef } from './types.js';

export interface TableOptions {
  schema?: string;
  /**
   * Declared columns, as names or as a name-to-type map. Without them the
   * table's scope is open and any column name resolves against it.
   */
  columns?: readonly string[] | Readonly<Record<string, ColumnType>>;
}

function toSchema(columns: NonNullable<TableOptions['columns']>): ColumnSchema[] {
  const list: ColumnSchema[] = isNameList(columns)
    ? columns.map((name) => ({ name, type: 'unknown' }))
    : Object.entries(columns).map(([name, type]) => ({ name, type }));
  const seen = new Set<string>();
  for (const c of list) {
    if (seen.has(c.name)) {
      throw new LazyQueryError(`Column "${c.name}" is declared twice`);
    }
    seen.add(c.name);
  }
  return list;
}

function isNameList(columns: NonNullable<TableOptions['columns']>): columns is readonly string[] {
  return Array.isArray(columns);
}

/**
 * Entry point of the builder API: a lazy reference to a base table.
 *
 * @example
 * table('flights', { columns: { dest: 'string', dep_delay: 'integer' } })
 *   .filter(gt(col('dep_delay'), 60))
 *   .render()
 */
export function table(name: string, options: TableOptions = {}): Plan {
  if (name.length === 0) {
    throw new LazyQueryError('table() expects a non-empty table name');
  }
  const ref: TableRef = {
    kind: 'table',
    name,
    ...(options.schema !== undefined ? { schema: options.schema } : {}),
    ...(options.columns !== undefined ? { columns: toSchema(options.columns) } : {}),
  };
  return new Plan(ref);
}
