export type Row = Record<string, unknown>;

/** What an executor hands back for one statement. */
export interface QueryRows {
  /** Column names in result order, when the driver reports them. */
  fields?: readonly string[];
  rows: readonly Row[];
}

/**
 * The database collaborator. Implementations own connections, transport
 * and retries; a failure is reported by rejecting.
 */
export interface QueryExecutor {
  execute(sql: string): Promise<QueryRows>;
}

/** Materialized result of collect(). */
export interface ResultTable {
  columns: string[];
  rows: Row[];
  /** The statement that produced the rows. */
  sql: string;
}
