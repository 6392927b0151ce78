import type { ResolvedDialect } from '../dialect/types.js';
import type { ColumnExpr, ColumnType, Expr } from './types.js';

export type ColumnTypeLookup = (column: ColumnExpr) => ColumnType;

const unknownColumns: ColumnTypeLookup = () => 'unknown';

function numericResult(left: ColumnType, right: ColumnType): ColumnType {
  if (left === 'integer' && right === 'integer') return 'integer';
  const numeric = (t: ColumnType): boolean => t === 'integer' || t === 'float';
  if (numeric(left) && numeric(right)) return 'float';
  return 'unknown';
}

/**
 * Best-effort result type of an expression. Anything that cannot be
 * determined is `unknown`; nothing here throws.
 */
export function inferType(
  expr: Expr,
  dialect: ResolvedDialect,
  columnType: ColumnTypeLookup = unknownColumns,
): ColumnType {
  const infer = (e: Expr): ColumnType => inferType(e, dialect, columnType);
  switch (expr.type) {
    case 'column':
      return columnType(expr);
    case 'literal': {
      const v = expr.value;
      if (typeof v === 'number') {
        return expr.numeric === 'float' || !Number.isInteger(v) ? 'float' : 'integer';
      }
      if (typeof v === 'string') return 'string';
      if (typeof v === 'boolean') return 'boolean';
      return 'unknown';
    }
    case 'unary':
      return expr.op === 'negate' ? infer(expr.arg) : 'boolean';
    case 'binary':
      switch (expr.op) {
        case '+':
        case '-':
        case '*':
        case '%':
          return numericResult(infer(expr.left), infer(expr.right));
        case '/': {
          // Integer operands are cast first where the dialect would truncate.
          const t = numericResult(infer(expr.left), infer(expr.right));
          return t === 'integer' && dialect.integerDivisionRequiresCast ? 'float' : t;
        }
        default:
          return 'boolean';
      }
    case 'in':
      return 'boolean';
    case 'func': {
      const translation = dialect.functionMap.get(expr.name.toLowerCase());
      if (translation?.returns === undefined) return 'unknown';
      if (translation.returns === 'same') {
        const first = expr.args[0];
        return first === undefined ? 'unknown' : infer(first);
      }
      return translation.returns;
    }
    case 'case': {
      const first = expr.branches[0];
      return first === undefined ? 'unknown' : infer(first.then);
    }
    case 'cast':
      return expr.to;
    case 'aggregate':
      switch (expr.fn.toLowerCase()) {
        case 'count':
          return 'integer';
        case 'mean':
        case 'avg':
          return 'float';
        case 'sum':
        case 'min':
        case 'max':
          return expr.arg === undefined ? 'unknown' : infer(expr.arg);
        default: {
          const translation = dialect.functionMap.get(expr.fn.toLowerCase());
          return translation?.returns === undefined || translation.returns === 'same'
            ? 'unknown'
            : translation.returns;
        }
      }
  }
}
