export type ColumnType =
  | 'integer'
  | 'float'
  | 'string'
  | 'boolean'
  | 'date'
  | 'timestamp'
  | 'unknown';

export type LiteralValue = string | number | boolean | null;

export interface ColumnExpr {
  readonly type: 'column';
  readonly name: string;
  /** Table or join-side alias the column is qualified with. */
  readonly table?: string;
}

export interface LiteralExpr {
  readonly type: 'literal';
  readonly value: LiteralValue;
  /** Only meaningful for numbers: `float` renders integers as `2.0`. */
  readonly numeric?: 'integer' | 'float';
}

export type UnaryOp = 'not' | 'negate' | 'is_null' | 'is_not_null';

export interface UnaryExpr {
  readonly type: 'unary';
  readonly op: UnaryOp;
  readonly arg: Expr;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type ComparisonOp = '=' | '!=' | '<' | '<=' | '>' | '>=' | 'like';
export type LogicalOp = 'and' | 'or';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export interface BinaryExpr {
  readonly type: 'binary';
  readonly op: BinaryOp;
  readonly left: Expr;
  readonly right: Expr;
}

export interface InExpr {
  readonly type: 'in';
  readonly arg: Expr;
  readonly values: readonly LiteralExpr[];
  readonly negated: boolean;
}

export interface FuncCallExpr {
  readonly type: 'func';
  readonly name: string;
  readonly args: readonly Expr[];
}

export interface CaseBranch {
  readonly when: Expr;
  readonly then: Expr;
}

export interface CaseExpr {
  readonly type: 'case';
  readonly branches: readonly CaseBranch[];
  readonly otherwise?: Expr;
}

export interface CastExpr {
  readonly type: 'cast';
  readonly arg: Expr;
  readonly to: Exclude<ColumnType, 'unknown'>;
}

export interface AggregateExpr {
  readonly type: 'aggregate';
  readonly fn: string;
  /** Absent for `count()`, which renders `COUNT(*)`. */
  readonly arg?: Expr;
  readonly distinct: boolean;
}

export type Expr =
  | ColumnExpr
  | LiteralExpr
  | UnaryExpr
  | BinaryExpr
  | InExpr
  | FuncCallExpr
  | CaseExpr
  | CastExpr
  | AggregateExpr;

/** Anything the builder API accepts where an expression is expected. */
export type ExprInput = Expr | LiteralValue;
