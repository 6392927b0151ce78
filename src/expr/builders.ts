import type {
  AggregateExpr,
  BinaryExpr,
  BinaryOp,
  CaseExpr,
  CastExpr,
  ColumnExpr,
  ColumnType,
  Expr,
  ExprInput,
  FuncCallExpr,
  InExpr,
  LiteralExpr,
  LiteralValue,
  UnaryExpr,
} from './types.js';

export function isExpr(value: unknown): value is Expr {
  return typeof value === 'object' && value !== null && 'type' in value;
}

/** Literal values are wrapped; expressions pass through unchanged. */
export function toExpr(input: ExprInput): Expr {
  return isExpr(input) ? input : lit(input);
}

// ── Expression factories ──

/**
 * Column reference. A dotted name is split into table and column:
 * `col('flights.tailnum')` is the same as `col('tailnum', 'flights')`.
 */
export function col(name: string, table?: string): ColumnExpr {
  if (table === undefined) {
    const dot = name.indexOf('.');
    if (dot > 0 && dot < name.length - 1) {
      return { type: 'column', name: name.slice(dot + 1), table: name.slice(0, dot) };
    }
    return { type: 'column', name };
  }
  return { type: 'column', name, table };
}

export function lit(value: LiteralValue): LiteralExpr {
  return { type: 'literal', value };
}

/** Numeric literal that keeps floating semantics even for whole numbers. */
export function float(value: number): LiteralExpr {
  return { type: 'literal', value, numeric: 'float' };
}

export function binary(op: BinaryOp, left: ExprInput, right: ExprInput): BinaryExpr {
  return { type: 'binary', op, left: toExpr(left), right: toExpr(right) };
}

export const add = (l: ExprInput, r: ExprInput): BinaryExpr => binary('+', l, r);
export const sub = (l: ExprInput, r: ExprInput): BinaryExpr => binary('-', l, r);
export const mul = (l: ExprInput, r: ExprInput): BinaryExpr => binary('*', l, r);
export const div = (l: ExprInput, r: ExprInput): BinaryExpr => binary('/', l, r);
export const mod = (l: ExprInput, r: ExprInput): BinaryExpr => binary('%', l, r);

export const eq = (l: ExprInput, r: ExprInput): BinaryExpr => binary('=', l, r);
export const neq = (l: ExprInput, r: ExprInput): BinaryExpr => binary('!=', l, r);
export const lt = (l: ExprInput, r: ExprInput): BinaryExpr => binary('<', l, r);
export const lte = (l: ExprInput, r: ExprInput): BinaryExpr => binary('<=', l, r);
export const gt = (l: ExprInput, r: ExprInput): BinaryExpr => binary('>', l, r);
export const gte = (l: ExprInput, r: ExprInput): BinaryExpr => binary('>=', l, r);
export const like = (l: ExprInput, pattern: string): BinaryExpr => binary('like', l, pattern);

/**
 * Left-folds two or more operands: and(a, b, c) => and(and(a, b), c).
 * The translator flattens same-operator chains back into one group.
 */
export function and(first: ExprInput, second: ExprInput, ...rest: ExprInput[]): BinaryExpr {
  return rest.reduce<BinaryExpr>((acc, e) => binary('and', acc, e), binary('and', first, second));
}

export function or(first: ExprInput, second: ExprInput, ...rest: ExprInput[]): BinaryExpr {
  return rest.reduce<BinaryExpr>((acc, e) => binary('or', acc, e), binary('or', first, second));
}

export function not(arg: ExprInput): UnaryExpr {
  return { type: 'unary', op: 'not', arg: toExpr(arg) };
}

export function negate(arg: ExprInput): UnaryExpr {
  return { type: 'unary', op: 'negate', arg: toExpr(arg) };
}

export function isNull(arg: ExprInput): UnaryExpr {
  return { type: 'unary', op: 'is_null', arg: toExpr(arg) };
}

export function isNotNull(arg: ExprInput): UnaryExpr {
  return { type: 'unary', op: 'is_not_null', arg: toExpr(arg) };
}

export function isIn(arg: ExprInput, values: readonly LiteralValue[]): InExpr {
  return { type: 'in', arg: toExpr(arg), values: values.map(lit), negated: false };
}

export function notIn(arg: ExprInput, values: readonly LiteralValue[]): InExpr {
  return { type: 'in', arg: toExpr(arg), values: values.map(lit), negated: true };
}

export function fn(name: string, ...args: ExprInput[]): FuncCallExpr {
  return { type: 'func', name, args: args.map(toExpr) };
}

export function cast(arg: ExprInput, to: Exclude<ColumnType, 'unknown'>): CastExpr {
  return { type: 'cast', arg: toExpr(arg), to };
}

/**
 * CASE WHEN … THEN … [ELSE …] END
 *
 * @example
 * caseWhen([[gt(col('dep_delay'), 60), 'late']], 'on time')
 */
export function caseWhen(
  branches: ReadonlyArray<readonly [ExprInput, ExprInput]>,
  otherwise?: ExprInput,
): CaseExpr {
  if (branches.length === 0) {
    throw new Error('caseWhen requires at least one branch');
  }
  const mapped = branches.map(([when, then]) => ({ when: toExpr(when), then: toExpr(then) }));
  return otherwise === undefined
    ? { type: 'case', branches: mapped }
    : { type: 'case', branches: mapped, otherwise: toExpr(otherwise) };
}

// ── Aggregates ──

export function agg(fnName: string, arg?: ExprInput, distinct = false): AggregateExpr {
  return arg === undefined
    ? { type: 'aggregate', fn: fnName, distinct }
    : { type: 'aggregate', fn: fnName, arg: toExpr(arg), distinct };
}

export const count = (arg?: ExprInput): AggregateExpr => agg('count', arg);
export const countDistinct = (arg: ExprInput): AggregateExpr => agg('count', arg, true);
export const sum = (arg: ExprInput): AggregateExpr => agg('sum', arg);
export const mean = (arg: ExprInput): AggregateExpr => agg('mean', arg);
export const min = (arg: ExprInput): AggregateExpr => agg('min', arg);
export const max = (arg: ExprInput): AggregateExpr => agg('max', arg);
