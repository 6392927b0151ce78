import pg from 'pg';
import { ExecutionError } from '../errors.js';
import type { QueryExecutor, QueryRows, Row } from './types.js';

export interface PostgresExecutorConfig {
  pool: pg.Pool;
  /** Called with every statement before it is sent. */
  onQuery?: (sql: string) => void;
  /** Called when a statement fails. Defaults to console.error. */
  onError?: (sql: string, error: unknown) => void;
}

export class PostgresExecutor implements QueryExecutor {
  private readonly pool: pg.Pool;
  private readonly onQuery: ((sql: string) => void) | undefined;
  private readonly onError: (sql: string, error: unknown) => void;

  constructor(config: PostgresExecutorConfig) {
    this.pool = config.pool;
    this.onQuery = config.onQuery;
    this.onError =
      config.onError ??
      ((sql, err) => {
        console.error(`[lazyql] query failed:\n${sql}\n`, err);
      });
  }

  async execute(sql: string): Promise<QueryRows> {
    this.onQuery?.(sql);
    let result: pg.QueryResult<Row>;
    try {
      result = await this.pool.query<Row>(sql);
    } catch (err) {
      try {
        this.onError(sql, err);
      } catch {
        // a failing hook must not replace the query error
      }
      throw new ExecutionError(`Failed to execute query: ${String(err)}`, sql, err);
    }
    return { fields: result.fields.map((f) => f.name), rows: result.rows };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
