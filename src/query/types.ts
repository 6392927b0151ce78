import type { ColumnType, Expr } from '../expr/types.js';

export interface ColumnSchema {
  readonly name: string;
  readonly type: ColumnType;
}

/** A base table. Without `columns` its scope is open: any name resolves. */
export interface TableRef {
  readonly kind: 'table';
  readonly name: string;
  readonly schema?: string;
  readonly columns?: readonly ColumnSchema[];
}

export type JoinKind = 'inner' | 'left' | 'right' | 'full';

export type SortDirection = 'asc' | 'desc';

export interface SortKey {
  readonly expr: Expr;
  readonly direction: SortDirection;
}

export interface OutputColumn {
  readonly name: string;
  readonly expr: Expr;
  /** Rename: takes the position of this column and hides it. */
  readonly replaces?: string;
}

/**
 * One relational step. Every node holds its predecessor; nodes are never
 * edited after construction, so plans share their common prefix.
 */
export type Operation =
  | {
      readonly kind: 'project';
      readonly input: PlanNode;
      readonly outputs: readonly OutputColumn[];
      /** Keep every visible column not redefined by `outputs` (mutate). */
      readonly keep: boolean;
    }
  | { readonly kind: 'filter'; readonly input: PlanNode; readonly predicate: Expr }
  | { readonly kind: 'sort'; readonly input: PlanNode; readonly keys: readonly SortKey[] }
  | {
      readonly kind: 'aggregate';
      readonly input: PlanNode;
      readonly groupKeys: readonly OutputColumn[];
      readonly aggregates: readonly OutputColumn[];
    }
  | {
      readonly kind: 'join';
      readonly input: PlanNode;
      readonly other: PlanNode;
      readonly joinKind: JoinKind;
      readonly on: Expr;
    }
  | { readonly kind: 'distinct'; readonly input: PlanNode }
  | { readonly kind: 'limit'; readonly input: PlanNode; readonly count: number }
  | { readonly kind: 'alias'; readonly input: PlanNode; readonly name: string };

export type PlanNode = TableRef | Operation;

export type OperationKind = Operation['kind'];

/**
 * Opaque lazy query passed to render() and collect().
 * Built exclusively via table() and the builder methods.
 */
export interface QueryDefinition {
  readonly _node: PlanNode;
}
