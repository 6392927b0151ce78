import type { AggregateExpr, ColumnExpr, Expr } from './types.js';

/** Direct sub-expressions, in rendering order. */
function children(expr: Expr): readonly Expr[] {
  switch (expr.type) {
    case 'column':
    case 'literal':
      return [];
    case 'unary':
      return [expr.arg];
    case 'binary':
      return [expr.left, expr.right];
    case 'in':
      return [expr.arg, ...expr.values];
    case 'func':
      return expr.args;
    case 'case': {
      const parts = expr.branches.flatMap((b) => [b.when, b.then]);
      return expr.otherwise === undefined ? parts : [...parts, expr.otherwise];
    }
    case 'cast':
      return [expr.arg];
    case 'aggregate':
      return expr.arg === undefined ? [] : [expr.arg];
  }
}

/** Column references in order of appearance. */
export function columnRefs(expr: Expr): ColumnExpr[] {
  if (expr.type === 'column') return [expr];
  return children(expr).flatMap(columnRefs);
}

/** First aggregate in the expression, depth-first. */
export function findAggregate(expr: Expr): AggregateExpr | undefined {
  if (expr.type === 'aggregate') return expr;
  for (const child of children(expr)) {
    const found = findAggregate(child);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Rebuilds the expression with every column reference replaced by
 * `replace(column)`. With `outsideAggregates`, aggregate nodes are kept as-is.
 */
export function mapColumns(
  expr: Expr,
  replace: (column: ColumnExpr) => Expr,
  outsideAggregates = false,
): Expr {
  const go = (e: Expr): Expr => mapColumns(e, replace, outsideAggregates);
  switch (expr.type) {
    case 'column':
      return replace(expr);
    case 'literal':
      return expr;
    case 'unary':
      return { ...expr, arg: go(expr.arg) };
    case 'binary':
      return { ...expr, left: go(expr.left), right: go(expr.right) };
    case 'in':
      return { ...expr, arg: go(expr.arg) };
    case 'func':
      return { ...expr, args: expr.args.map(go) };
    case 'case': {
      const branches = expr.branches.map((b) => ({ when: go(b.when), then: go(b.then) }));
      return expr.otherwise === undefined
        ? { type: 'case', branches }
        : { type: 'case', branches, otherwise: go(expr.otherwise) };
    }
    case 'cast':
      return { ...expr, arg: go(expr.arg) };
    case 'aggregate':
      if (outsideAggregates || expr.arg === undefined) return expr;
      return { ...expr, arg: go(expr.arg) };
  }
}

/** Structural equality; used to match sort keys against projected outputs. */
export function exprEquals(a: Expr, b: Expr): boolean {
  if (a.type !== b.type) return false;
  switch (a.type) {
    case 'column':
      return b.type === 'column' && a.name === b.name && a.table === b.table;
    case 'literal':
      return b.type === 'literal' && a.value === b.value && a.numeric === b.numeric;
    case 'unary':
      return b.type === 'unary' && a.op === b.op && exprEquals(a.arg, b.arg);
    case 'binary':
      return b.type === 'binary' && a.op === b.op && sameChildren(a, b);
    case 'in':
      return b.type === 'in' && a.negated === b.negated && sameChildren(a, b);
    case 'func':
      return b.type === 'func' && a.name === b.name && sameChildren(a, b);
    case 'case':
      return b.type === 'case' && a.branches.length === b.branches.length && sameChildren(a, b);
    case 'cast':
      return b.type === 'cast' && a.to === b.to && exprEquals(a.arg, b.arg);
    case 'aggregate':
      return b.type === 'aggregate' && a.fn === b.fn && a.distinct === b.distinct && sameChildren(a, b);
  }
}

function sameChildren(a: Expr, b: Expr): boolean {
  const ca = children(a);
  const cb = children(b);
  return ca.length === cb.length && ca.every((c, i) => {
    const other = cb[i];
    return other !== undefined && exprEquals(c, other);
  });
}
