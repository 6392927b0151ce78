import type { ColumnType, Expr } from '../expr/types.js';
import type { JoinKind, SortKey, TableRef } from './types.js';

export interface ScopeColumn {
  readonly name: string;
  /** Join-side alias; absent in single-source scopes. */
  readonly table?: string;
  readonly type: ColumnType;
}

/**
 * Names an expression may reference. An open scope has columns nobody
 * declared; in a join, `openTable` names the side they belong to.
 */
export interface Scope {
  readonly columns: readonly ScopeColumn[];
  readonly open: boolean;
  readonly openTable?: string;
  readonly join: boolean;
}

export interface JoinSide {
  readonly source: TableSource | SubquerySource;
  readonly alias: string;
}

export interface TableSource {
  readonly kind: 'table';
  readonly table: TableRef;
  readonly alias?: string;
}

export interface SubquerySource {
  readonly kind: 'subquery';
  readonly query: ClauseSet;
}

export interface JoinSource {
  readonly kind: 'join';
  readonly left: JoinSide;
  readonly right: JoinSide;
  readonly joinKind: JoinKind;
  readonly on: Expr;
}

export type Source = TableSource | SubquerySource | JoinSource;

export type SelectItem =
  | {
      readonly kind: 'expr';
      readonly name: string;
      /** In terms of the set's source scope. */
      readonly expr: Expr;
      /** Hoisted sort key: selected here, never visible to the enclosing set. */
      readonly hidden: boolean;
    }
  | { readonly kind: 'star'; readonly table?: string };

/**
 * One flat SELECT statement. Every expression in it references only names
 * of `scope`, the set's immediate source.
 */
export interface ClauseSet {
  readonly source: Source;
  readonly scope: Scope;
  /** Qualifiers that refer to this set's single source, e.g. its table name. */
  readonly names: readonly string[];
  /** `null` selects every scope column (`SELECT *`). */
  readonly select: readonly SelectItem[] | null;
  readonly where: readonly Expr[];
  readonly groupBy: readonly Expr[];
  readonly grouped: boolean;
  /** Keys in terms of the source scope. */
  readonly orderBy: readonly SortKey[];
  readonly distinct: boolean;
  readonly limit?: number;
}

export type ExprItem = Extract<SelectItem, { kind: 'expr' }>;

export function isExprItem(item: SelectItem): item is ExprItem {
  return item.kind === 'expr';
}

/** A set that any further step (except limit) must wrap. */
export function isSealed(set: ClauseSet): boolean {
  return set.distinct || set.limit !== undefined;
}
