import type { QueryRows, ResultTable, Row } from './types.js';

/** Copies a driver row, keeping only the result columns, in result order. */
export function mapRow(row: Row, columns: readonly string[]): Row {
  const out: Row = {};
  for (const name of columns) {
    out[name] = name in row ? row[name] : null;
  }
  return out;
}

/**
 * Column order comes from the driver when it reports fields, otherwise
 * from the plan, otherwise from the first row.
 */
export function toResultTable(
  result: QueryRows,
  sql: string,
  expected?: readonly string[],
): ResultTable {
  const first = result.rows[0];
  const columns = [...(result.fields ?? expected ?? (first !== undefined ? Object.keys(first) : []))];
  return {
    columns,
    rows: result.rows.map((r) => mapRow(r, columns)),
    sql,
  };
}

/** Values of one column, top to bottom. */
export function columnValues(table: ResultTable, name: string): unknown[] {
  if (!table.columns.includes(name)) {
    throw new RangeError(`Result has no column "${name}"; columns: ${table.columns.join(', ')}`);
  }
  return table.rows.map((r) => r[name]);
}
