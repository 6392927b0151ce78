import { AmbiguousColumnError, UnresolvedColumnError } from '../errors.js';
import type { ColumnTypeLookup } from '../expr/infer.js';
import type { ColumnExpr } from '../expr/types.js';
import type { Scope, ScopeColumn } from './clause-set.js';
import type { TableRef } from './types.js';

export function displayName(column: { name: string; table?: string }): string {
  return column.table === undefined ? column.name : `${column.table}.${column.name}`;
}

export function tableScope(table: TableRef): Scope {
  if (table.columns === undefined) {
    return { columns: [], open: true, join: false };
  }
  return {
    columns: table.columns.map((c) => ({ name: c.name, type: c.type })),
    open: false,
    join: false,
  };
}

/** Tags every column of a single-source scope with a join-side alias. */
export function tagScope(scope: Scope, table: string): ScopeColumn[] {
  return scope.columns.map((c) => ({ name: c.name, table, type: c.type }));
}

function available(scope: Scope): string[] {
  return scope.columns.map((c) => (scope.join ? displayName(c) : c.name));
}

/**
 * Resolves a column reference against a source scope and returns the
 * reference as it must be written in the set's clauses.
 *
 * Single-source sets drop the qualifier (`names` lists the accepted ones).
 * Join sets qualify a column when its name exists on both sides, or when
 * one side is open and could hold any name.
 */
export function resolveColumn(
  scope: Scope,
  names: readonly string[],
  ref: ColumnExpr,
): ColumnExpr {
  if (!scope.join) {
    if (ref.table !== undefined && !names.includes(ref.table)) {
      throw new UnresolvedColumnError(displayName(ref), available(scope));
    }
    if (scope.open || scope.columns.some((c) => c.name === ref.name)) {
      return { type: 'column', name: ref.name };
    }
    throw new UnresolvedColumnError(ref.name, available(scope));
  }

  if (ref.table !== undefined) {
    const hit = scope.columns.some((c) => c.table === ref.table && c.name === ref.name);
    if (hit || scope.openTable === ref.table) {
      return { type: 'column', name: ref.name, table: ref.table };
    }
    throw new UnresolvedColumnError(displayName(ref), available(scope));
  }

  const matches = scope.columns.filter((c) => c.name === ref.name);
  const [first, ...others] = matches;
  if (others.length > 0) {
    throw new AmbiguousColumnError(
      ref.name,
      matches.map((m) => m.table ?? ''),
    );
  }
  if (first !== undefined) {
    return scope.openTable === undefined
      ? { type: 'column', name: ref.name }
      : { type: 'column', name: ref.name, table: first.table ?? scope.openTable };
  }
  if (scope.openTable !== undefined) {
    return { type: 'column', name: ref.name, table: scope.openTable };
  }
  throw new UnresolvedColumnError(ref.name, available(scope));
}

/** Column types of a scope, for the translator's integer-division check. */
export function scopeTypes(scope: Scope): ColumnTypeLookup {
  return (ref) => {
    const hit = scope.columns.find(
      (c) =>
        c.name === ref.name &&
        (ref.table === undefined || c.table === undefined || c.table === ref.table),
    );
    return hit?.type ?? 'unknown';
  };
}
