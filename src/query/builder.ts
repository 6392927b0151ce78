import { and, col, count as countRows, eq, isExpr } from '../expr/builders.js';
import type { Expr } from '../expr/types.js';
import { mapColumns } from '../expr/walk.js';
import { LazyQueryError } from '../errors.js';
import type { ResolvedDialect } from '../dialect/types.js';
import { columns, render, renderQuery, type RenderedQuery } from './compiler.js';
import { refName } from './planner.js';
import type {
  JoinKind,
  Operation,
  OutputColumn,
  PlanNode,
  QueryDefinition,
  SortDirection,
  SortKey,
} from './types.js';

/** A string names a column; anything else is an expression. */
export type ColumnInput = Expr | string;

export type ColumnMapping = Readonly<Record<string, ColumnInput>>;

export type SortInput = ColumnInput | { readonly expr: ColumnInput; readonly direction: SortDirection };

/** Join condition: an expression, or the names of columns both sides share. */
export type JoinOn = Expr | string | readonly string[];

export type GroupKeys = readonly string[] | ColumnMapping;

function toColumn(input: ColumnInput): Expr {
  return typeof input === 'string' ? col(input) : input;
}

function toOutputs(mapping: ColumnMapping): OutputColumn[] {
  return Object.entries(mapping).map(([name, value]) => ({ name, expr: toColumn(value) }));
}

function toSortKey(input: SortInput): SortKey {
  if (typeof input === 'string' || isExpr(input)) {
    return { expr: toColumn(input), direction: 'asc' };
  }
  return { expr: toColumn(input.expr), direction: input.direction };
}

export function asc(input: ColumnInput): SortKey {
  return { expr: toColumn(input), direction: 'asc' };
}

export function desc(input: ColumnInput): SortKey {
  return { expr: toColumn(input), direction: 'desc' };
}

/**
 * Substitutes the outputs of an earlier projection into a later one when
 * every reference goes through a bare-column output and every earlier
 * output is referenced. An output the merge would drop keeps its own node,
 * so the planner still resolves its columns. Returns undefined when the
 * two cannot share a node.
 */
function mergeProjections(
  earlier: readonly OutputColumn[],
  later: readonly OutputColumn[],
): OutputColumn[] | undefined {
  const byName = new Map(earlier.map((o) => [o.name, o]));
  const used = new Set<string>();
  let mergeable = true;
  const merged = later.map((o) => ({
    name: o.name,
    expr: mapColumns(o.expr, (ref) => {
      const source = ref.table === undefined ? byName.get(ref.name) : undefined;
      if (source === undefined || source.expr.type !== 'column') {
        mergeable = false;
        return ref;
      }
      used.add(source.name);
      return source.expr;
    }),
  }));
  return mergeable && used.size === byName.size ? merged : undefined;
}

function groupOutputs(keys: GroupKeys): OutputColumn[] {
  if (isStringList(keys)) {
    return keys.map((k) => {
      const expr = col(k);
      return { name: expr.name, expr };
    });
  }
  return toOutputs(keys);
}

function isStringList(keys: GroupKeys): keys is readonly string[] {
  return Array.isArray(keys);
}

function joinCondition(on: JoinOn, left: PlanNode, right: PlanNode): Expr {
  if (isExpr(on)) return on;
  const keys = typeof on === 'string' ? [on] : on;
  const [first, second, ...rest] = keys.map((k) => eq(col(k, refName(left)), col(k, refName(right))));
  if (first === undefined) {
    throw new LazyQueryError('join() needs at least one key column');
  }
  return second === undefined ? first : and(first, second, ...rest);
}

/**
 * Immutable lazy query. Every method returns a new Plan that shares this
 * one's node chain; nothing is compiled until render() or collect().
 *
 * @example
 * table('flights')
 *   .filter(eq(col('dest'), 'IAH'))
 *   .mutate({ gain: sub(col('dep_delay'), col('arr_delay')) })
 *   .sort(desc('gain'))
 */
export class Plan implements QueryDefinition {
  constructor(readonly _node: PlanNode) {}

  private next(op: Operation): Plan {
    return new Plan(op);
  }

  /** Outputs exactly the mapped columns. */
  project(mapping: ColumnMapping): Plan {
    const outputs = toOutputs(mapping);
    if (outputs.length === 0) {
      throw new LazyQueryError('project() needs at least one output column');
    }
    const prev = this._node;
    if (prev.kind === 'project' && !prev.keep) {
      const merged = mergeProjections(prev.outputs, outputs);
      if (merged !== undefined) {
        return this.next({ kind: 'project', input: prev.input, outputs: merged, keep: false });
      }
    }
    return this.next({ kind: 'project', input: prev, outputs, keep: false });
  }

  select(...names: string[]): Plan {
    return this.project(
      Object.fromEntries(names.map((n) => {
        const ref = col(n);
        return [ref.name, ref];
      })),
    );
  }

  /** Adds or replaces columns, keeping every other visible column. */
  mutate(mapping: ColumnMapping): Plan {
    return this.next({ kind: 'project', input: this._node, outputs: toOutputs(mapping), keep: true });
  }

  /** `{ newName: 'oldName' }`; the column keeps its position. */
  rename(mapping: Readonly<Record<string, string>>): Plan {
    const olds = Object.values(mapping);
    const twice = olds.find((old, i) => olds.indexOf(old) !== i);
    if (twice !== undefined) {
      throw new LazyQueryError(`rename() maps "${twice}" more than once`);
    }
    const outputs = Object.entries(mapping).map(([name, old]) => ({
      name,
      expr: col(old),
      replaces: old,
    }));
    return this.next({ kind: 'project', input: this._node, outputs, keep: true });
  }

  filter(predicate: Expr): Plan {
    return this.next({ kind: 'filter', input: this._node, predicate });
  }

  /** Replaces any earlier ordering. */
  sort(...keys: SortInput[]): Plan {
    if (keys.length === 0) {
      throw new LazyQueryError('sort() needs at least one key');
    }
    return this.next({ kind: 'sort', input: this._node, keys: keys.map(toSortKey) });
  }

  aggregate(groupKeys: GroupKeys, aggregates: Readonly<Record<string, Expr>>): Plan {
    const keys = groupOutputs(groupKeys);
    const values = Object.entries(aggregates).map(([name, expr]) => ({ name, expr }));
    if (keys.length === 0 && values.length === 0) {
      throw new LazyQueryError('aggregate() needs at least one group key or aggregate');
    }
    const seen = new Set<string>();
    for (const { name } of [...keys, ...values]) {
      if (seen.has(name)) {
        throw new LazyQueryError(`aggregate() defines "${name}" more than once`);
      }
      seen.add(name);
    }
    return this.next({ kind: 'aggregate', input: this._node, groupKeys: keys, aggregates: values });
  }

  /** Row count per group, in a column named `name`. */
  count(groupKeys: GroupKeys = [], name = 'n'): Plan {
    return this.aggregate(groupKeys, { [name]: countRows() });
  }

  join(other: QueryDefinition, kind: JoinKind, on: JoinOn): Plan {
    return this.next({
      kind: 'join',
      input: this._node,
      other: other._node,
      joinKind: kind,
      on: joinCondition(on, this._node, other._node),
    });
  }

  innerJoin(other: QueryDefinition, on: JoinOn): Plan {
    return this.join(other, 'inner', on);
  }

  leftJoin(other: QueryDefinition, on: JoinOn): Plan {
    return this.join(other, 'left', on);
  }

  rightJoin(other: QueryDefinition, on: JoinOn): Plan {
    return this.join(other, 'right', on);
  }

  fullJoin(other: QueryDefinition, on: JoinOn): Plan {
    return this.join(other, 'full', on);
  }

  distinct(): Plan {
    return this.next({ kind: 'distinct', input: this._node });
  }

  limit(n: number): Plan {
    if (!Number.isInteger(n) || n < 0) {
      throw new LazyQueryError(`limit() expects a non-negative integer, got ${n}`);
    }
    return this.next({ kind: 'limit', input: this._node, count: n });
  }

  /** Names this plan for qualified references, e.g. in a self-join. */
  as(alias: string): Plan {
    if (alias.length === 0) {
      throw new LazyQueryError('as() expects a non-empty alias');
    }
    return this.next({ kind: 'alias', input: this._node, name: alias });
  }

  render(dialect?: string | ResolvedDialect): string {
    return render(this, dialect);
  }

  renderQuery(dialect?: string | ResolvedDialect): RenderedQuery {
    return renderQuery(this, dialect);
  }

  columns(dialect?: string | ResolvedDialect): string[] | undefined {
    return columns(this, dialect);
  }
}

function asPlan(query: QueryDefinition): Plan {
  return query instanceof Plan ? query : new Plan(query._node);
}

// ── Free-function forms, plan first ──

export const project = (q: QueryDefinition, mapping: ColumnMapping): Plan => asPlan(q).project(mapping);
export const select = (q: QueryDefinition, ...names: string[]): Plan => asPlan(q).select(...names);
export const mutate = (q: QueryDefinition, mapping: ColumnMapping): Plan => asPlan(q).mutate(mapping);
export const rename = (q: QueryDefinition, mapping: Readonly<Record<string, string>>): Plan =>
  asPlan(q).rename(mapping);
export const filter = (q: QueryDefinition, predicate: Expr): Plan => asPlan(q).filter(predicate);
export const sort = (q: QueryDefinition, ...keys: SortInput[]): Plan => asPlan(q).sort(...keys);
export const aggregate = (
  q: QueryDefinition,
  groupKeys: GroupKeys,
  aggregates: Readonly<Record<string, Expr>>,
): Plan => asPlan(q).aggregate(groupKeys, aggregates);
export const countBy = (q: QueryDefinition, groupKeys: GroupKeys = [], name = 'n'): Plan =>
  asPlan(q).count(groupKeys, name);
export const join = (q: QueryDefinition, other: QueryDefinition, kind: JoinKind, on: JoinOn): Plan =>
  asPlan(q).join(other, kind, on);
export const distinct = (q: QueryDefinition): Plan => asPlan(q).distinct();
export const limit = (q: QueryDefinition, n: number): Plan => asPlan(q).limit(n);
export const alias = (q: QueryDefinition, name: string): Plan => asPlan(q).as(name);
