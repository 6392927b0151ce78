import type { ResolvedDialect } from '../dialect/types.js';
import {
  AmbiguousColumnError,
  DialectCapabilityError,
  LazyQueryError,
  UnresolvedColumnError,
  UnsupportedExpressionError,
} from '../errors.js';
import { inferType } from '../expr/infer.js';
import type { ColumnExpr, Expr } from '../expr/types.js';
import { columnRefs, exprEquals, findAggregate, mapColumns } from '../expr/walk.js';
import {
  isExprItem,
  isSealed,
  type ClauseSet,
  type ExprItem,
  type JoinSide,
  type Scope,
  type SelectItem,
} from './clause-set.js';
import { displayName, resolveColumn, scopeTypes, tableScope, tagScope } from './scope.js';
import type { Operation, OutputColumn, PlanNode, QueryDefinition, SortKey, TableRef } from './types.js';

export interface PlanContext {
  readonly dialect: ResolvedDialect;
  /** Shared counter for hoisted sort-key names. */
  readonly counter: { n: number };
}

function column(name: string, table?: string): ColumnExpr {
  return table === undefined ? { type: 'column', name } : { type: 'column', name, table };
}

function exprItem(name: string, expr: Expr, hidden = false): ExprItem {
  return { kind: 'expr', name, expr, hidden };
}

/** Name other plans use to qualify this plan's columns, e.g. in join predicates. */
export function refName(node: PlanNode): string {
  switch (node.kind) {
    case 'table':
    case 'alias':
      return node.name;
    default:
      return refName(node.input);
  }
}

function baseSet(table: TableRef): ClauseSet {
  return {
    source: { kind: 'table', table },
    scope: tableScope(table),
    names: [table.name],
    select: null,
    where: [],
    groupBy: [],
    grouped: false,
    orderBy: [],
    distinct: false,
  };
}

function visibleItems(set: ClauseSet): ExprItem[] {
  return (set.select ?? []).filter(isExprItem).filter((i) => !i.hidden);
}

function hasStar(set: ClauseSet): boolean {
  return set.select !== null && set.select.some((i) => i.kind === 'star');
}

/** Columns the next step sees: the set's output, always single-source. */
export function visibleScope(set: ClauseSet, ctx: PlanContext): Scope {
  if (set.select === null) {
    return {
      columns: set.scope.columns.map((c) => ({ name: c.name, type: c.type })),
      open: set.scope.open,
      join: false,
    };
  }
  const types = scopeTypes(set.scope);
  return {
    columns: visibleItems(set).map((i) => ({
      name: i.name,
      type: inferType(i.expr, ctx.dialect, types),
    })),
    open: hasStar(set),
    join: false,
  };
}

function visibleNames(set: ClauseSet, ctx: PlanContext): string[] {
  return visibleScope(set, ctx).columns.map((c) => c.name);
}

/** Closed scopes list their columns explicitly; open ones select `*`. */
function expandSelect(set: ClauseSet): SelectItem[] {
  if (set.select !== null) return [...set.select];
  if (set.scope.open) return [{ kind: 'star' }];
  return set.scope.columns.map((c) => exprItem(c.name, column(c.name)));
}

function assertNoAggregate(expr: Expr, ctx: PlanContext): void {
  const found = findAggregate(expr);
  if (found !== undefined) {
    throw new UnsupportedExpressionError(
      found.fn,
      ctx.dialect.name,
      `Aggregate "${found.fn}" is only allowed inside aggregate()`,
    );
  }
}

interface SourceExpr {
  expr: Expr;
  /** References a column the set itself derives. */
  derived: boolean;
}

/**
 * Rewrites a user expression, written against the names visible after
 * `set`, into the terms of the set's source scope. Passthrough outputs are
 * substituted; a reference to a derived output is flagged unless
 * `inlineDerived` is set (ORDER BY may inline any output).
 */
function toSource(expr: Expr, set: ClauseSet, ctx: PlanContext, inlineDerived = false): SourceExpr {
  let derived = false;
  const select = set.select;
  const out = mapColumns(expr, (ref) => {
    if (select === null || (ref.table !== undefined && set.scope.join)) {
      return resolveColumn(set.scope, set.names, ref);
    }
    if (ref.table !== undefined && !set.names.includes(ref.table)) {
      throw new UnresolvedColumnError(displayName(ref), visibleNames(set, ctx));
    }
    const item = visibleItems(set).find((i) => i.name === ref.name);
    if (item !== undefined) {
      if (item.expr.type === 'column' || inlineDerived) return item.expr;
      derived = true;
      return column(ref.name);
    }
    const star = select.find((i) => i.kind === 'star');
    if (star !== undefined && star.kind === 'star') {
      return resolveColumn(set.scope, set.names, column(ref.name, star.table));
    }
    const sides = set.scope.columns.filter((c) => c.name === ref.name);
    if (set.scope.join && sides.length > 1) {
      throw new AmbiguousColumnError(ref.name, sides.map((c) => c.table ?? ''));
    }
    throw new UnresolvedColumnError(ref.name, visibleNames(set, ctx));
  });
  return { expr: out, derived };
}

/**
 * Resolves several expressions against `set`, wrapping it once if any of
 * them references a derived output. After a wrap every visible column is a
 * passthrough, so the second attempt cannot be derived.
 */
function resolveAll(
  exprs: readonly Expr[],
  set: ClauseSet,
  ctx: PlanContext,
): { set: ClauseSet; exprs: Expr[] } {
  let current = set;
  for (let attempt = 0; attempt < 2; attempt++) {
    const resolved = exprs.map((e) => toSource(e, current, ctx));
    if (!resolved.some((r) => r.derived)) {
      return { set: current, exprs: resolved.map((r) => r.expr) };
    }
    current = wrap(current, ctx);
  }
  throw new LazyQueryError('Expression still references a derived column after nesting');
}

/**
 * Rewrites an ORDER BY key of `set` (source terms) into the terms of the
 * set's output, or returns undefined when an output does not carry it.
 */
function orderKeyForOuter(key: Expr, set: ClauseSet): Expr | undefined {
  if (set.select === null) return key;
  const items = visibleItems(set);
  const whole = items.find((i) => exprEquals(i.expr, key));
  if (whole !== undefined) return column(whole.name);

  const star = set.select.find((i) => i.kind === 'star');
  let missing = false;
  const rewritten = mapColumns(key, (ref) => {
    const item = items.find((i) => exprEquals(i.expr, ref));
    if (item !== undefined) return column(item.name);
    const overridden = items.some((i) => i.name === ref.name);
    if (star !== undefined && star.kind === 'star' && star.table === ref.table && !overridden) {
      return column(ref.name);
    }
    missing = true;
    return ref;
  });
  return missing ? undefined : rewritten;
}

/**
 * Closes `set` as a subquery and starts a new set over it. Its ordering
 * moves outwards; keys the output does not carry are hoisted into the
 * inner projection as hidden columns.
 */
function wrap(set: ClauseSet, ctx: PlanContext): ClauseSet {
  const carried: SortKey[] = [];
  const hoisted: ExprItem[] = [];
  for (const key of set.orderBy) {
    const outer = orderKeyForOuter(key.expr, set);
    if (outer !== undefined) {
      carried.push({ expr: outer, direction: key.direction });
    } else if (!set.distinct && !set.grouped) {
      ctx.counter.n += 1;
      const name = `__order_${ctx.counter.n}`;
      hoisted.push(exprItem(name, key.expr, true));
      carried.push({ expr: column(name), direction: key.direction });
    }
    // A DISTINCT or grouped set cannot select extra columns: the key is dropped.
  }

  const inner: ClauseSet = {
    ...set,
    select: hoisted.length > 0 ? [...expandSelect(set), ...hoisted] : set.select,
    orderBy: set.limit !== undefined ? set.orderBy : [],
  };
  const scope = visibleScope(inner, ctx);
  const select =
    hoisted.length > 0 && !scope.open
      ? scope.columns.map((c) => exprItem(c.name, column(c.name)))
      : null;

  return {
    source: { kind: 'subquery', query: inner },
    scope,
    names: set.names,
    select,
    where: [],
    groupBy: [],
    grouped: false,
    orderBy: carried,
    distinct: false,
  };
}

function applyProject(
  set: ClauseSet,
  op: Extract<Operation, { kind: 'project' }>,
  ctx: PlanContext,
): ClauseSet {
  op.outputs.forEach((o) => assertNoAggregate(o.expr, ctx));
  const start = isSealed(set) ? wrap(set, ctx) : set;
  const { set: current, exprs } = resolveAll(op.outputs.map((o) => o.expr), start, ctx);

  const resolved: OutputColumn[] = op.outputs.map((o, i) => ({ ...o, expr: exprs[i] ?? o.expr }));
  if (!op.keep) {
    return { ...current, select: resolved.map((o) => exprItem(o.name, o.expr)) };
  }

  const items = expandSelect(current).filter((i) => i.kind === 'star' || !i.hidden);
  // Positions are looked up by the names before this step, so renames may swap.
  const positions = items.map((i) => (i.kind === 'expr' ? i.name : undefined));
  const behindStar = starColumns(items, exprs);
  for (const o of resolved) {
    const at = positions.indexOf(o.replaces ?? o.name);
    const next = exprItem(o.name, o.expr);
    if (at >= 0) {
      items[at] = next;
    } else if (behindStar.has(o.name)) {
      throw new AmbiguousColumnError(
        o.name,
        current.names,
        `Cannot replace column "${o.name}": the columns behind * are not declared`,
      );
    } else {
      // In an open scope a renamed column stays in `*` as well.
      items.push(next);
    }
  }
  assertUniqueNames(items, current.names);
  return { ...current, select: items };
}

/** Names the expressions read through the set's `*`, which therefore exist behind it. */
function starColumns(items: readonly SelectItem[], exprs: readonly Expr[]): Set<string> {
  const star = items.find((i) => i.kind === 'star');
  if (star === undefined || star.kind !== 'star') return new Set();
  return new Set(
    exprs
      .flatMap(columnRefs)
      .filter((ref) => ref.table === star.table)
      .map((ref) => ref.name),
  );
}

function assertUniqueNames(items: readonly SelectItem[], tables: readonly string[]): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (item.kind !== 'expr') continue;
    if (seen.has(item.name)) {
      throw new AmbiguousColumnError(
        item.name,
        tables,
        `Column "${item.name}" would appear twice in the output; rename or drop one of them first`,
      );
    }
    seen.add(item.name);
  }
}

function applyFilter(set: ClauseSet, predicate: Expr, ctx: PlanContext): ClauseSet {
  assertNoAggregate(predicate, ctx);
  const start = isSealed(set) ? wrap(set, ctx) : set;
  const { set: current, exprs } = resolveAll([predicate], start, ctx);
  return { ...current, where: [...current.where, ...exprs] };
}

function applySort(set: ClauseSet, keys: readonly SortKey[], ctx: PlanContext): ClauseSet {
  keys.forEach((k) => assertNoAggregate(k.expr, ctx));
  const current = isSealed(set) ? wrap(set, ctx) : set;
  const orderBy = keys.map((k) => ({
    expr: toSource(k.expr, current, ctx, true).expr,
    direction: k.direction,
  }));
  return { ...current, orderBy };
}

/**
 * Non-aggregated references in aggregate outputs must name a group key.
 * References to a group key's output name are replaced by its expression.
 */
function bindGroupKeys(
  output: OutputColumn,
  groupKeys: readonly OutputColumn[],
): Expr {
  return mapColumns(
    output.expr,
    (ref) => {
      const byName = ref.table === undefined ? groupKeys.find((g) => g.name === ref.name) : undefined;
      if (byName !== undefined) return byName.expr;
      if (groupKeys.some((g) => exprEquals(g.expr, ref))) return ref;
      throw new UnresolvedColumnError(
        displayName(ref),
        groupKeys.map((g) => g.name),
        `Column "${displayName(ref)}" in "${output.name}" must be a group key or inside an aggregate`,
      );
    },
    true,
  );
}

function applyAggregate(
  set: ClauseSet,
  op: Extract<Operation, { kind: 'aggregate' }>,
  ctx: PlanContext,
): ClauseSet {
  op.groupKeys.forEach((g) => assertNoAggregate(g.expr, ctx));
  const bound = op.aggregates.map((a) => bindGroupKeys(a, op.groupKeys));

  const start = isSealed(set) || set.grouped ? wrap(set, ctx) : set;
  const { set: current, exprs } = resolveAll(
    [...op.groupKeys.map((g) => g.expr), ...bound],
    start,
    ctx,
  );
  const groupExprs = exprs.slice(0, op.groupKeys.length);
  const aggExprs = exprs.slice(op.groupKeys.length);

  const select: ExprItem[] = [
    ...op.groupKeys.map((g, i) => exprItem(g.name, groupExprs[i] ?? g.expr)),
    ...op.aggregates.map((a, i) => exprItem(a.name, aggExprs[i] ?? a.expr)),
  ];
  return {
    ...current,
    select,
    groupBy: groupExprs,
    grouped: true,
    // Row grain changed: an earlier ordering no longer applies.
    orderBy: [],
  };
}

function applyDistinct(set: ClauseSet, ctx: PlanContext): ClauseSet {
  const current = set.limit !== undefined ? wrap(set, ctx) : set;
  if (current.distinct) return current;
  // SELECT DISTINCT can only be ordered by selected expressions.
  const orderBy =
    current.select === null || hasStar(current)
      ? current.orderBy
      : current.orderBy.filter((k) => visibleItems(current).some((i) => exprEquals(i.expr, k.expr)));
  return { ...current, distinct: true, orderBy };
}

function applyLimit(set: ClauseSet, count: number): ClauseSet {
  return { ...set, limit: set.limit === undefined ? count : Math.min(set.limit, count) };
}

function isTrivial(set: ClauseSet): boolean {
  return (
    set.source.kind === 'table' &&
    set.select === null &&
    set.where.length === 0 &&
    !set.grouped &&
    set.orderBy.length === 0 &&
    !set.distinct &&
    set.limit === undefined
  );
}

function applyAlias(set: ClauseSet, name: string): ClauseSet {
  if (isTrivial(set) && set.source.kind === 'table') {
    return { ...set, source: { kind: 'table', table: set.source.table, alias: name }, names: [name] };
  }
  return { ...set, names: [name] };
}

function toJoinSide(set: ClauseSet, alias: string): JoinSide {
  // Ordering of a join input is meaningless unless it feeds a LIMIT.
  const unordered = set.limit === undefined ? { ...set, orderBy: [] } : set;
  if (isTrivial(unordered) && unordered.source.kind === 'table') {
    return { source: { kind: 'table', table: unordered.source.table, alias }, alias };
  }
  return { source: { kind: 'subquery', query: unordered }, alias };
}

/** Same-named columns compared with `=` across the two sides, under AND only. */
function equiJoinKeys(on: Expr, left: string, right: string): Set<string> {
  const keys = new Set<string>();
  const visit = (e: Expr): void => {
    if (e.type !== 'binary') return;
    if (e.op === 'and') {
      visit(e.left);
      visit(e.right);
      return;
    }
    if (e.op !== '=' || e.left.type !== 'column' || e.right.type !== 'column') return;
    const [a, b] = [e.left, e.right];
    const sides = new Set([a.table, b.table]);
    if (a.name === b.name && sides.has(left) && sides.has(right)) {
      keys.add(a.name);
    }
  };
  visit(on);
  return keys;
}

function applyJoin(
  set: ClauseSet,
  op: Extract<Operation, { kind: 'join' }>,
  ctx: PlanContext,
): ClauseSet {
  const leftName = refName(op.input);
  const rightName = refName(op.other);
  if (leftName === rightName) {
    throw new AmbiguousColumnError(
      leftName,
      [leftName, rightName],
      `Both join inputs are named "${leftName}"; rename one with as()`,
    );
  }
  if (op.joinKind === 'full' && !ctx.dialect.supportsFullJoin) {
    throw new DialectCapabilityError('FULL JOIN', ctx.dialect.name);
  }

  const right = planNode(op.other, ctx);
  const leftScope = visibleScope(set, ctx);
  const rightScope = visibleScope(right, ctx);
  if (leftScope.open && rightScope.open) {
    throw new AmbiguousColumnError(
      '*',
      [leftName, rightName],
      `Cannot tell which columns "${leftName}" and "${rightName}" share: declare the columns of at least one side`,
    );
  }
  const openTable = leftScope.open ? leftName : rightScope.open ? rightName : undefined;
  const scope: Scope = {
    columns: [...tagScope(leftScope, leftName), ...tagScope(rightScope, rightName)],
    open: openTable !== undefined,
    ...(openTable !== undefined ? { openTable } : {}),
    join: true,
  };

  assertNoAggregate(op.on, ctx);
  const on = mapColumns(op.on, (ref) => resolveColumn(scope, [], ref));

  if (openTable !== undefined) {
    const closed = leftScope.open ? rightScope : leftScope;
    const closedName = leftScope.open ? rightName : leftName;
    const shared = columnRefs(on).find(
      (ref) => ref.table === openTable && closed.columns.some((c) => c.name === ref.name),
    );
    if (shared !== undefined) {
      throw new AmbiguousColumnError(
        shared.name,
        [leftName, rightName],
        `Column "${shared.name}" exists in both "${openTable}" and "${closedName}", but the columns of "${openTable}" are not declared; declare them or rename the column on one side`,
      );
    }
  }

  // Keys are shared only when both sides list their columns.
  const keys = openTable === undefined ? equiJoinKeys(on, leftName, rightName) : new Set<string>();
  const leftNames = new Set(leftScope.columns.map((c) => c.name));
  const rightNames = new Set(rightScope.columns.map((c) => c.name));
  const collides = (name: string): boolean => leftNames.has(name) && rightNames.has(name);

  const sideItems = (side: Scope, alias: string, isLeft: boolean): SelectItem[] => {
    if (side.open) return [{ kind: 'star', table: alias }];
    // Any name of the declared side may also exist behind the other side's `*`.
    if (openTable !== undefined) {
      return side.columns.map((c) => exprItem(`${alias}_${c.name}`, column(c.name, alias)));
    }
    const items: SelectItem[] = [];
    for (const c of side.columns) {
      if (keys.has(c.name)) {
        if (!isLeft) continue;
        const l = column(c.name, leftName);
        const r = column(c.name, rightName);
        const key: Expr =
          op.joinKind === 'full'
            ? { type: 'func', name: 'coalesce', args: [l, r] }
            : op.joinKind === 'right'
              ? r
              : l;
        items.push(exprItem(c.name, key));
      } else if (collides(c.name)) {
        items.push(exprItem(`${alias}_${c.name}`, column(c.name, alias)));
      } else {
        items.push(exprItem(c.name, column(c.name)));
      }
    }
    return items;
  };
  const select = [...sideItems(leftScope, leftName, true), ...sideItems(rightScope, rightName, false)];
  assertUniqueNames(select, [leftName, rightName]);

  return {
    source: {
      kind: 'join',
      left: toJoinSide(set, leftName),
      right: toJoinSide(right, rightName),
      joinKind: op.joinKind,
      on,
    },
    scope,
    names: [],
    select,
    where: [],
    groupBy: [],
    grouped: false,
    orderBy: [],
    distinct: false,
  };
}

function applyOperation(set: ClauseSet, op: Operation, ctx: PlanContext): ClauseSet {
  switch (op.kind) {
    case 'project':
      return applyProject(set, op, ctx);
    case 'filter':
      return applyFilter(set, op.predicate, ctx);
    case 'sort':
      return applySort(set, op.keys, ctx);
    case 'aggregate':
      return applyAggregate(set, op, ctx);
    case 'join':
      return applyJoin(set, op, ctx);
    case 'distinct':
      return applyDistinct(set, ctx);
    case 'limit':
      return applyLimit(set, op.count);
    case 'alias':
      return applyAlias(set, op.name);
  }
}

export function planNode(node: PlanNode, ctx: PlanContext): ClauseSet {
  if (node.kind === 'table') return baseSet(node);
  return applyOperation(planNode(node.input, ctx), node, ctx);
}

/**
 * Folds the operation chain into as few nested ClauseSets as scoping
 * allows. Throws before anything is rendered when a name does not resolve.
 */
export function planQuery(query: QueryDefinition, dialect: ResolvedDialect): ClauseSet {
  return planNode(query._node, { dialect, counter: { n: 0 } });
}
