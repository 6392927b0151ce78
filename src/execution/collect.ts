import type { ResolvedDialect } from '../dialect/types.js';
import { ExecutionError, LazyQueryError } from '../errors.js';
import { columns, renderQuery } from '../query/compiler.js';
import type { QueryDefinition } from '../query/types.js';
import { toResultTable } from './row-mapper.js';
import type { QueryExecutor, QueryRows, ResultTable } from './types.js';

export interface CollectOptions {
  executor: QueryExecutor;
  /** Registered name or resolved dialect; defaults to postgres. */
  dialect?: string | ResolvedDialect;
  /** Rejects with ExecutionError when the executor takes longer. Compilation is not timed. */
  timeoutMs?: number;
}

async function withTimeout(
  pending: Promise<QueryRows>,
  timeoutMs: number | undefined,
  sql: string,
): Promise<QueryRows> {
  if (timeoutMs === undefined) return pending;
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      pending,
      new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          reject(new ExecutionError(`Query timed out after ${timeoutMs}ms`, sql));
        }, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Renders the plan, runs it through the executor and materializes the rows.
 * Compilation errors are thrown as they are; executor failures arrive as
 * ExecutionError and are never retried.
 */
export async function collect(query: QueryDefinition, options: CollectOptions): Promise<ResultTable> {
  const { timeoutMs } = options;
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new LazyQueryError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
  const { sql } = renderQuery(query, options.dialect);
  const expected = columns(query, options.dialect);

  let result: QueryRows;
  try {
    result = await withTimeout(options.executor.execute(sql), timeoutMs, sql);
  } catch (err) {
    if (err instanceof ExecutionError) throw err;
    throw new ExecutionError(`Failed to execute query: ${String(err)}`, sql, err);
  }
  return toResultTable(result, sql, expected);
}
