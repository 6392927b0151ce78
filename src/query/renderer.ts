import type { ResolvedDialect } from '../dialect/types.js';
import { quoteIdentifier, translate } from '../expr/translator.js';
import type { Expr } from '../expr/types.js';
import { exprEquals, mapColumns } from '../expr/walk.js';
import type { ClauseSet, JoinSide, SelectItem, Source } from './clause-set.js';
import { isExprItem } from './clause-set.js';
import { scopeTypes } from './scope.js';
import type { JoinKind, SortKey, TableRef } from './types.js';

interface RenderContext {
  readonly dialect: ResolvedDialect;
  /** Subquery aliases are numbered in the order they are reached, outermost first. */
  readonly aliases: { n: number };
  readonly tables: TableRef[];
}

const JOIN_KEYWORDS: Readonly<Record<JoinKind, string>> = {
  inner: 'INNER JOIN',
  left: 'LEFT JOIN',
  right: 'RIGHT JOIN',
  full: 'FULL JOIN',
};

const INDENT = '  ';

function indent(sql: string): string {
  return sql
    .split('\n')
    .map((line) => INDENT + line)
    .join('\n');
}

function nextAlias(ctx: RenderContext): string {
  ctx.aliases.n += 1;
  return `q${String(ctx.aliases.n).padStart(2, '0')}`;
}

function isLogicalGroup(expr: Expr): boolean {
  return expr.type === 'binary' && (expr.op === 'and' || expr.op === 'or');
}

/** Wraps a predicate in parentheses unless it already renders as a group. */
function grouped(expr: Expr, sql: string): string {
  return isLogicalGroup(expr) ? sql : `(${sql})`;
}

function recordTable(table: TableRef, ctx: RenderContext): void {
  const seen = ctx.tables.some((t) => t.name === table.name && t.schema === table.schema);
  if (!seen) ctx.tables.push(table);
}

function tableName(table: TableRef, dialect: ResolvedDialect): string {
  const name = quoteIdentifier(table.name, dialect);
  return table.schema === undefined ? name : `${quoteIdentifier(table.schema, dialect)}.${name}`;
}

function renderTable(table: TableRef, alias: string | undefined, ctx: RenderContext): string {
  recordTable(table, ctx);
  const name = tableName(table, ctx.dialect);
  return alias === undefined || alias === table.name
    ? name
    : `${name} AS ${quoteIdentifier(alias, ctx.dialect)}`;
}

function renderSubquery(set: ClauseSet, alias: string, ctx: RenderContext): string {
  const quoted = quoteIdentifier(alias, ctx.dialect);
  return `(\n${indent(renderSet(set, ctx))}\n) AS ${quoted}`;
}

function renderJoinSide(side: JoinSide, ctx: RenderContext): string {
  return side.source.kind === 'table'
    ? renderTable(side.source.table, side.alias, ctx)
    : renderSubquery(side.source.query, side.alias, ctx);
}

interface RenderedSource {
  sql: string;
  /** Qualifier for the columns of a single source; joins qualify per side. */
  qualifier?: string;
}

function renderSource(source: Source, set: ClauseSet, ctx: RenderContext): RenderedSource {
  switch (source.kind) {
    case 'table':
      return {
        sql: renderTable(source.table, source.alias, ctx),
        qualifier: source.alias ?? source.table.name,
      };
    case 'subquery': {
      const alias = nextAlias(ctx);
      return { sql: renderSubquery(source.query, alias, ctx), qualifier: alias };
    }
    case 'join': {
      const left = renderJoinSide(source.left, ctx);
      const right = renderJoinSide(source.right, ctx);
      const on = translate(source.on, ctx.dialect, { columnType: scopeTypes(set.scope) });
      return { sql: `${left}\n${JOIN_KEYWORDS[source.joinKind]} ${right} ON ${grouped(source.on, on)}` };
    }
  }
}

function renderSelectItem(item: SelectItem, set: ClauseSet, ctx: RenderContext): string {
  if (item.kind === 'star') {
    return item.table === undefined ? '*' : `${quoteIdentifier(item.table, ctx.dialect)}.*`;
  }
  const sql = translate(item.expr, ctx.dialect, {
    columnType: scopeTypes(set.scope),
    allowAggregates: set.grouped,
  });
  if (item.expr.type === 'column' && item.expr.name === item.name) return sql;
  return `${sql} AS ${quoteIdentifier(item.name, ctx.dialect)}`;
}

/**
 * ORDER BY resolves a bare name to an output column before a source column.
 * A source column whose name an output carries for another value is qualified.
 */
function unshadow(expr: Expr, set: ClauseSet, qualifier: string | undefined): Expr {
  const shadowing = new Set(
    (set.select ?? [])
      .filter(isExprItem)
      .filter((i) => i.expr.type !== 'column' || i.expr.name !== i.name)
      .map((i) => i.name),
  );
  if (shadowing.size === 0) return expr;
  return mapColumns(expr, (ref) => {
    if (ref.table !== undefined || !shadowing.has(ref.name)) return ref;
    const table =
      qualifier ?? set.scope.columns.find((c) => c.name === ref.name)?.table ?? set.scope.openTable;
    return table === undefined ? ref : { ...ref, table };
  });
}

function renderOrderKey(
  key: SortKey,
  set: ClauseSet,
  qualifier: string | undefined,
  ctx: RenderContext,
): string {
  // A key that is a derived output is referenced by its alias.
  const item = (set.select ?? [])
    .filter(isExprItem)
    .find((i) => i.expr.type !== 'column' && exprEquals(i.expr, key.expr));
  const sql =
    item !== undefined
      ? quoteIdentifier(item.name, ctx.dialect)
      : translate(unshadow(key.expr, set, qualifier), ctx.dialect, {
          columnType: scopeTypes(set.scope),
          allowAggregates: set.grouped,
        });
  return key.direction === 'desc' ? `${sql} DESC` : sql;
}

function renderSet(set: ClauseSet, ctx: RenderContext): string {
  const types = scopeTypes(set.scope);
  const select =
    set.select === null ? '*' : set.select.map((i) => renderSelectItem(i, set, ctx)).join(', ');
  const lines = [`SELECT ${set.distinct ? 'DISTINCT ' : ''}${select}`];

  const from = renderSource(set.source, set, ctx);
  lines.push(`FROM ${from.sql}`);

  const conditions = set.where.map((p) => {
    const sql = translate(p, ctx.dialect, { columnType: types });
    return set.where.length === 1 ? sql : grouped(p, sql);
  });
  if (conditions.length > 0) {
    lines.push(`WHERE ${conditions.join(' AND ')}`);
  }

  if (set.groupBy.length > 0) {
    const keys = set.groupBy.map((g) => translate(g, ctx.dialect, { columnType: types }));
    lines.push(`GROUP BY ${keys.join(', ')}`);
  }

  if (set.orderBy.length > 0) {
    lines.push(`ORDER BY ${set.orderBy.map((k) => renderOrderKey(k, set, from.qualifier, ctx)).join(', ')}`);
  }

  if (set.limit !== undefined) {
    lines.push(`LIMIT ${set.limit}`);
  }

  return lines.join('\n');
}

export interface RenderedSet {
  sql: string;
  /** Base tables in the order the statement first references them. */
  tables: TableRef[];
}

export function renderClauseSet(set: ClauseSet, dialect: ResolvedDialect): RenderedSet {
  const ctx: RenderContext = { dialect, aliases: { n: 0 }, tables: [] };
  const sql = renderSet(set, ctx);
  return { sql, tables: ctx.tables };
}
