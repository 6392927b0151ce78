export { table } from './query/query-object.js';
export type { TableOptions } from './query/query-object.js';
export {
  Plan,
  asc,
  desc,
  project,
  select,
  mutate,
  rename,
  filter,
  sort,
  aggregate,
  countBy,
  join,
  distinct,
  limit,
  alias,
} from './query/builder.js';
export type { ColumnInput, ColumnMapping, GroupKeys, JoinOn, SortInput } from './query/builder.js';
export { render, renderQuery, columns } from './query/compiler.js';
export type { RenderedQuery } from './query/compiler.js';
export type {
  ColumnSchema,
  JoinKind,
  PlanNode,
  QueryDefinition,
  SortDirection,
  SortKey,
  TableRef,
} from './query/types.js';

export {
  col,
  lit,
  float,
  add,
  sub,
  mul,
  div,
  mod,
  eq,
  neq,
  lt,
  lte,
  gt,
  gte,
  like,
  and,
  or,
  not,
  negate,
  isNull,
  isNotNull,
  isIn,
  notIn,
  fn,
  cast,
  caseWhen,
  agg,
  count,
  countDistinct,
  sum,
  mean,
  min,
  max,
} from './expr/builders.js';
export { translate, quoteIdentifier } from './expr/translator.js';
export type { TranslateOptions } from './expr/translator.js';
export type { ColumnType, Expr, ExprInput, LiteralValue } from './expr/types.js';

export { defineDialect } from './dialect/define.js';
export { registerDialect, getDialect, listDialects, DEFAULT_DIALECT } from './dialect/registry.js';
export type { BuiltinDialectName } from './dialect/registry.js';
export type { DialectConfig, FunctionTranslation, ResolvedDialect } from './dialect/types.js';

export { collect } from './execution/collect.js';
export type { CollectOptions } from './execution/collect.js';
export { PostgresExecutor } from './execution/postgres-executor.js';
export type { PostgresExecutorConfig } from './execution/postgres-executor.js';
export { columnValues } from './execution/row-mapper.js';
export type { QueryExecutor, QueryRows, ResultTable, Row } from './execution/types.js';

export {
  LazyQueryError,
  UnresolvedColumnError,
  UnsupportedExpressionError,
  AmbiguousColumnError,
  DialectCapabilityError,
  DialectError,
  ExecutionError,
} from './errors.js';
