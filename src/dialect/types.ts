import type { ColumnType } from '../expr/types.js';

export type CastType = Exclude<ColumnType, 'unknown'>;

/**
 * Translation of one function name.
 *
 * Template placeholders: `{0}`, `{1}` … are positional arguments,
 * `{*}` is every argument joined with `, `.
 */
export interface FunctionTranslation {
  template: string;
  /** Result type; `same` takes the type of the first argument. */
  returns?: ColumnType | 'same';
  /** Marks an aggregate, usable only inside aggregate(). */
  aggregate?: boolean;
}

/**
 * User-facing dialect configuration.
 * Use defineDialect() to validate it and fill in defaults.
 */
export interface DialectConfig {
  /** Registry key, e.g. `postgres`. */
  readonly name: string;

  /** Identifiers matching one of these words (case-insensitive) are quoted. */
  readonly reservedWords: Iterable<string>;

  /** Lower-case function name → SQL template. */
  readonly functionMap: Readonly<Record<string, string | FunctionTranslation>>;

  /**
   * `/` truncates when both operands are integers, so the translator casts
   * the left operand to the float type.
   */
  readonly integerDivisionRequiresCast: boolean;

  readonly supportsFullJoin: boolean;

  /** Quote every identifier, reserved or not. Default false. */
  readonly quoteAll?: boolean;

  /** Default `"`. */
  readonly identifierQuote?: string;

  /** SQL type names used by cast(); missing entries fall back to ANSI names. */
  readonly typeNames?: Partial<Readonly<Record<CastType, string>>>;

  /** Rendering of true/false. Default `['TRUE', 'FALSE']`. */
  readonly booleanLiterals?: readonly [string, string];
}

/** Internal: dialect with defaults applied. Treated as read-only. */
export interface ResolvedDialect {
  readonly name: string;
  readonly reservedWords: ReadonlySet<string>;
  readonly functionMap: ReadonlyMap<string, FunctionTranslation>;
  readonly integerDivisionRequiresCast: boolean;
  readonly supportsFullJoin: boolean;
  readonly quoteAll: boolean;
  readonly identifierQuote: string;
  readonly typeNames: Readonly<Record<CastType, string>>;
  readonly booleanLiterals: readonly [string, string];
}
