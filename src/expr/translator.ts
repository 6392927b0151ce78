import { UnsupportedExpressionError } from '../errors.js';
import type { FunctionTranslation, ResolvedDialect } from '../dialect/types.js';
import { inferType, type ColumnTypeLookup } from './infer.js';
import type {
  AggregateExpr,
  BinaryExpr,
  BinaryOp,
  CaseExpr,
  ColumnExpr,
  Expr,
  FuncCallExpr,
  InExpr,
  LiteralExpr,
  UnaryExpr,
} from './types.js';

export interface TranslateOptions {
  /** Column types, used to detect integer division. */
  columnType?: ColumnTypeLookup;
  /** Aggregates are only valid in the SELECT list of a grouped query. */
  allowAggregates?: boolean;
}

interface Context {
  dialect: ResolvedDialect;
  columnType: ColumnTypeLookup | undefined;
  allowAggregates: boolean;
}

/** Unquoted identifiers must be lower-case so that case-folding dialects keep them intact. */
const PLAIN_IDENTIFIER_RE = /^[a-z_][a-z0-9_]*$/;

const PLACEHOLDER_RE = /\{(\*|\d+)\}/g;

const NATIVE_AGGREGATES: Readonly<Record<string, string>> = {
  count: 'COUNT',
  sum: 'SUM',
  mean: 'AVG',
  avg: 'AVG',
  min: 'MIN',
  max: 'MAX',
};

const SQL_OPERATORS: Readonly<Record<BinaryOp, string>> = {
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  '%': '%',
  '=': '=',
  '!=': '<>',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
  like: 'LIKE',
  and: 'AND',
  or: 'OR',
};

function precedence(op: BinaryOp): number {
  switch (op) {
    case 'or':
    case 'and':
      // always parenthesized as a group
      return 6;
    case '*':
    case '/':
    case '%':
      return 5;
    case '+':
    case '-':
      return 4;
    default:
      return 3;
  }
}

export function quoteIdentifier(name: string, dialect: ResolvedDialect): string {
  const needsQuotes =
    dialect.quoteAll ||
    !PLAIN_IDENTIFIER_RE.test(name) ||
    dialect.reservedWords.has(name.toUpperCase());
  if (!needsQuotes) return name;
  const q = dialect.identifierQuote;
  return `${q}${name.split(q).join(q + q)}${q}`;
}

function compileColumn(expr: ColumnExpr, ctx: Context): string {
  const name = quoteIdentifier(expr.name, ctx.dialect);
  return expr.table === undefined ? name : `${quoteIdentifier(expr.table, ctx.dialect)}.${name}`;
}

function compileLiteral(expr: LiteralExpr, ctx: Context): string {
  const v = expr.value;
  if (v === null) return 'NULL';
  if (typeof v === 'boolean') {
    return v ? ctx.dialect.booleanLiterals[0] : ctx.dialect.booleanLiterals[1];
  }
  if (typeof v === 'number') {
    if (!Number.isFinite(v)) {
      throw new UnsupportedExpressionError(String(v), ctx.dialect.name, `Numeric literal ${v} has no SQL form`);
    }
    return expr.numeric === 'float' && Number.isInteger(v) ? `${v}.0` : String(v);
  }
  // Standard SQL escaping: a quote inside a string literal is doubled
  return `'${v.replace(/'/g, "''")}'`;
}

function isNullLiteral(expr: Expr): boolean {
  return expr.type === 'literal' && expr.value === null;
}

function compileUnary(expr: UnaryExpr, ctx: Context): string {
  const arg = compileExpr(expr.arg, ctx);
  switch (expr.op) {
    case 'not':
      // logical groups already carry their parentheses
      return expr.arg.type === 'binary' && precedence(expr.arg.op) === 6 ? `NOT ${arg}` : `NOT(${arg})`;
    case 'negate':
      return expr.arg.type === 'column' ? `-${arg}` : `-(${arg})`;
    case 'is_null':
      return `${wrapOperand(expr.arg, arg)} IS NULL`;
    case 'is_not_null':
      return `${wrapOperand(expr.arg, arg)} IS NOT NULL`;
  }
}

/** Comparison and arithmetic operands that are themselves comparisons need parentheses. */
function wrapOperand(operand: Expr, sql: string): string {
  return operand.type === 'binary' && precedence(operand.op) === 3 ? `(${sql})` : sql;
}

/**
 * Flatten same-operator AND/OR chains into one parenthesized group.
 * e.g. or(or(a, b), c) => (a OR b OR c)
 */
function compileLogical(expr: BinaryExpr, ctx: Context): string {
  const parts: string[] = [];
  const collect = (e: Expr): void => {
    if (e.type === 'binary' && e.op === expr.op) {
      collect(e.left);
      collect(e.right);
    } else {
      parts.push(compileExpr(e, ctx));
    }
  };
  collect(expr);
  return `(${parts.join(` ${SQL_OPERATORS[expr.op]} `)})`;
}

function compileBinary(expr: BinaryExpr, ctx: Context): string {
  const { op } = expr;
  if (op === 'and' || op === 'or') {
    return compileLogical(expr, ctx);
  }

  // Null-aware equality: `x = NULL` is never true in SQL
  if (op === '=' || op === '!=') {
    const nullSide = isNullLiteral(expr.right) ? expr.left : isNullLiteral(expr.left) ? expr.right : null;
    if (nullSide !== null) {
      if (isNullLiteral(nullSide)) {
        return op === '=' ? ctx.dialect.booleanLiterals[0] : ctx.dialect.booleanLiterals[1];
      }
      const operand = wrapOperand(nullSide, compileExpr(nullSide, ctx));
      return op === '=' ? `${operand} IS NULL` : `${operand} IS NOT NULL`;
    }
  }

  const prec = precedence(op);
  const side = (operand: Expr, isRight: boolean): string => {
    const sql = compileExpr(operand, ctx);
    if (operand.type !== 'binary') return sql;
    const childPrec = precedence(operand.op);
    if (childPrec === 6) return sql;
    if (childPrec < prec || (isRight && childPrec === prec) || (prec === 3 && childPrec === 3)) {
      return `(${sql})`;
    }
    return sql;
  };

  let left = side(expr.left, false);
  const right = side(expr.right, true);

  if (
    op === '/' &&
    ctx.dialect.integerDivisionRequiresCast &&
    inferType(expr.left, ctx.dialect, ctx.columnType) === 'integer' &&
    inferType(expr.right, ctx.dialect, ctx.columnType) === 'integer'
  ) {
    left = `CAST(${compileExpr(expr.left, ctx)} AS ${ctx.dialect.typeNames.float})`;
  }

  return `${left} ${SQL_OPERATORS[op]} ${right}`;
}

function compileIn(expr: InExpr, ctx: Context): string {
  const [trueSql, falseSql] = ctx.dialect.booleanLiterals;
  const arg = wrapOperand(expr.arg, compileExpr(expr.arg, ctx));
  const hasNull = expr.values.some(isNullLiteral);
  const values = expr.values.filter((v) => !isNullLiteral(v)).map((v) => compileLiteral(v, ctx));

  if (values.length === 0) {
    if (hasNull) return expr.negated ? `${arg} IS NOT NULL` : `${arg} IS NULL`;
    return expr.negated ? trueSql : falseSql;
  }

  const list = `${arg} ${expr.negated ? 'NOT IN' : 'IN'} (${values.join(', ')})`;
  if (!hasNull) return list;
  return expr.negated ? `(${list} AND ${arg} IS NOT NULL)` : `(${list} OR ${arg} IS NULL)`;
}

function lookupFunction(name: string, ctx: Context): FunctionTranslation {
  const translation = ctx.dialect.functionMap.get(name.toLowerCase());
  if (translation === undefined) {
    throw new UnsupportedExpressionError(name, ctx.dialect.name);
  }
  if (translation.aggregate === true && !ctx.allowAggregates) {
    throw new UnsupportedExpressionError(
      name,
      ctx.dialect.name,
      `Aggregate "${name}" is only allowed inside aggregate()`,
    );
  }
  return translation;
}

function applyTemplate(name: string, template: string, args: string[], ctx: Context): string {
  return template.replace(PLACEHOLDER_RE, (_match, slot: string) => {
    if (slot === '*') return args.join(', ');
    const arg = args[Number(slot)];
    if (arg === undefined) {
      throw new UnsupportedExpressionError(
        name,
        ctx.dialect.name,
        `Function "${name}" needs at least ${Number(slot) + 1} argument(s), got ${args.length}`,
      );
    }
    return arg;
  });
}

function compileFuncCall(expr: FuncCallExpr, ctx: Context): string {
  const translation = lookupFunction(expr.name, ctx);
  const args = expr.args.map((a) => compileExpr(a, ctx));
  return applyTemplate(expr.name, translation.template, args, ctx);
}

function compileAggregate(expr: AggregateExpr, ctx: Context): string {
  const fnName = expr.fn.toLowerCase();
  if (!ctx.allowAggregates) {
    throw new UnsupportedExpressionError(
      expr.fn,
      ctx.dialect.name,
      `Aggregate "${expr.fn}" is only allowed inside aggregate()`,
    );
  }
  // No nested aggregates
  const inner: Context = { ...ctx, allowAggregates: false };
  const arg = expr.arg === undefined ? undefined : compileExpr(expr.arg, inner);

  const native = NATIVE_AGGREGATES[fnName];
  if (native !== undefined) {
    if (arg === undefined) {
      if (fnName !== 'count') {
        throw new UnsupportedExpressionError(expr.fn, ctx.dialect.name, `Aggregate "${expr.fn}" needs an argument`);
      }
      return 'COUNT(*)';
    }
    return expr.distinct ? `${native}(DISTINCT ${arg})` : `${native}(${arg})`;
  }

  const translation = lookupFunction(expr.fn, ctx);
  if (translation.aggregate !== true) {
    throw new UnsupportedExpressionError(
      expr.fn,
      ctx.dialect.name,
      `"${expr.fn}" is not an aggregate function in dialect "${ctx.dialect.name}"`,
    );
  }
  if (expr.distinct) {
    throw new UnsupportedExpressionError(
      expr.fn,
      ctx.dialect.name,
      `Aggregate "${expr.fn}" does not support DISTINCT`,
    );
  }
  return applyTemplate(expr.fn, translation.template, arg === undefined ? [] : [arg], ctx);
}

function compileCase(expr: CaseExpr, ctx: Context): string {
  const parts = ['CASE'];
  for (const branch of expr.branches) {
    parts.push(`WHEN ${compileExpr(branch.when, ctx)} THEN ${compileExpr(branch.then, ctx)}`);
  }
  if (expr.otherwise !== undefined) {
    parts.push(`ELSE ${compileExpr(expr.otherwise, ctx)}`);
  }
  parts.push('END');
  return parts.join(' ');
}

function compileExpr(expr: Expr, ctx: Context): string {
  switch (expr.type) {
    case 'column':
      return compileColumn(expr, ctx);
    case 'literal':
      return compileLiteral(expr, ctx);
    case 'unary':
      return compileUnary(expr, ctx);
    case 'binary':
      return compileBinary(expr, ctx);
    case 'in':
      return compileIn(expr, ctx);
    case 'func':
      return compileFuncCall(expr, ctx);
    case 'case':
      return compileCase(expr, ctx);
    case 'cast':
      return `CAST(${compileExpr(expr.arg, ctx)} AS ${ctx.dialect.typeNames[expr.to]})`;
    case 'aggregate':
      return compileAggregate(expr, ctx);
  }
}

/**
 * Translates one expression into a SQL fragment for the given dialect.
 * Throws UnsupportedExpressionError for functions the dialect does not map.
 */
export function translate(expr: Expr, dialect: ResolvedDialect, options: TranslateOptions = {}): string {
  return compileExpr(expr, {
    dialect,
    columnType: options.columnType,
    allowAggregates: options.allowAggregates ?? false,
  });
}
