import { DialectError } from '../errors.js';
import type { CastType, DialectConfig, FunctionTranslation, ResolvedDialect } from './types.js';

const DIALECT_NAME_PATTERN = /^[a-z][a-z0-9_-]{0,63}$/;

const ANSI_TYPE_NAMES: Readonly<Record<CastType, string>> = {
  integer: 'INTEGER',
  float: 'DOUBLE PRECISION',
  string: 'VARCHAR',
  boolean: 'BOOLEAN',
  date: 'DATE',
  timestamp: 'TIMESTAMP',
};

function normalizeTranslation(name: string, entry: string | FunctionTranslation): FunctionTranslation {
  const translation = typeof entry === 'string' ? { template: entry } : entry;
  if (translation.template.trim() === '') {
    throw new DialectError(`defineDialect: function "${name}" has an empty template`);
  }
  return translation;
}

/**
 * Validates a DialectConfig and returns it resolved.
 * Throws if the name does not match the naming convention, the quote
 * character is not a single character, or a function template is empty.
 */
export function defineDialect(config: DialectConfig): ResolvedDialect {
  if (!DIALECT_NAME_PATTERN.test(config.name)) {
    throw new DialectError(
      `defineDialect: name "${config.name}" must match /^[a-z][a-z0-9_-]{0,63}$/`,
    );
  }
  const identifierQuote = config.identifierQuote ?? '"';
  if (identifierQuote.length !== 1) {
    throw new DialectError(
      `defineDialect: "${config.name}" identifierQuote must be a single character`,
    );
  }

  const reservedWords = new Set<string>();
  for (const word of config.reservedWords) {
    reservedWords.add(word.toUpperCase());
  }

  const functionMap = new Map<string, FunctionTranslation>();
  for (const [name, entry] of Object.entries(config.functionMap)) {
    functionMap.set(name.toLowerCase(), normalizeTranslation(name, entry));
  }

  return {
    name: config.name,
    reservedWords,
    functionMap,
    integerDivisionRequiresCast: config.integerDivisionRequiresCast,
    supportsFullJoin: config.supportsFullJoin,
    quoteAll: config.quoteAll ?? false,
    identifierQuote,
    typeNames: { ...ANSI_TYPE_NAMES, ...config.typeNames },
    booleanLiterals: config.booleanLiterals ?? ['TRUE', 'FALSE'],
  };
}
