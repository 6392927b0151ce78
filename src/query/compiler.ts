import { resolveDialect } from '../dialect/registry.js';
import type { ResolvedDialect } from '../dialect/types.js';
import { planQuery, visibleScope } from './planner.js';
import { renderClauseSet } from './renderer.js';
import type { QueryDefinition, TableRef } from './types.js';

export interface RenderedQuery {
  sql: string;
  /** Base tables the statement reads, in order of first reference. */
  tables: TableRef[];
}

/**
 * Compiles a plan into one SQL statement. Every scoping and dialect error
 * is raised here, before any text is produced.
 *
 * @param dialect - a registered dialect name or a resolved dialect; defaults to postgres.
 */
export function renderQuery(
  query: QueryDefinition,
  dialect?: string | ResolvedDialect,
): RenderedQuery {
  const resolved = resolveDialect(dialect);
  return renderClauseSet(planQuery(query, resolved), resolved);
}

export function render(query: QueryDefinition, dialect?: string | ResolvedDialect): string {
  return renderQuery(query, dialect).sql;
}

/**
 * Output column names of a plan, or undefined while any part of the
 * output comes from a table whose columns were never declared.
 */
export function columns(
  query: QueryDefinition,
  dialect?: string | ResolvedDialect,
): string[] | undefined {
  const resolved = resolveDialect(dialect);
  const scope = visibleScope(planQuery(query, resolved), { dialect: resolved, counter: { n: 0 } });
  return scope.open ? undefined : scope.columns.map((c) => c.name);
}
