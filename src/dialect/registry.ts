import { DialectError } from '../errors.js';
import { loadFunctionMap, loadReservedWords } from './catalog.js';
import { defineDialect } from './define.js';
import type { DialectConfig, ResolvedDialect } from './types.js';

const BUILTIN_NAMES = ['postgres', 'sqlite', 'mysql', 'ansi'] as const;

export type BuiltinDialectName = (typeof BUILTIN_NAMES)[number];

type BuiltinFlags = Omit<DialectConfig, 'name' | 'reservedWords' | 'functionMap'>;

const BUILTIN_FLAGS: Record<BuiltinDialectName, BuiltinFlags> = {
  postgres: {
    integerDivisionRequiresCast: true,
    supportsFullJoin: true,
  },
  sqlite: {
    integerDivisionRequiresCast: true,
    // FULL JOIN only exists from SQLite 3.39 on
    supportsFullJoin: false,
    typeNames: { float: 'REAL', string: 'TEXT', boolean: 'INTEGER', date: 'TEXT', timestamp: 'TEXT' },
    booleanLiterals: ['1', '0'],
  },
  mysql: {
    integerDivisionRequiresCast: false,
    supportsFullJoin: false,
    identifierQuote: '`',
    typeNames: { integer: 'SIGNED', float: 'DOUBLE', string: 'CHAR', boolean: 'SIGNED', timestamp: 'DATETIME' },
  },
  ansi: {
    integerDivisionRequiresCast: true,
    supportsFullJoin: true,
    quoteAll: true,
  },
};

function builtin(name: BuiltinDialectName): ResolvedDialect {
  return defineDialect({
    name,
    reservedWords: loadReservedWords(name),
    functionMap: loadFunctionMap(name),
    ...BUILTIN_FLAGS[name],
  });
}

const registry = new Map<string, ResolvedDialect>(
  BUILTIN_NAMES.map((name) => [name, builtin(name)]),
);

export const DEFAULT_DIALECT: BuiltinDialectName = 'postgres';

/**
 * Adds a dialect to the process-wide registry. Registered dialects are
 * never replaced: registering an existing name throws.
 */
export function registerDialect(config: DialectConfig): ResolvedDialect {
  if (registry.has(config.name)) {
    throw new DialectError(`Dialect "${config.name}" is already registered`);
  }
  const resolved = defineDialect(config);
  registry.set(resolved.name, resolved);
  return resolved;
}

export function getDialect(name: string): ResolvedDialect {
  const dialect = registry.get(name);
  if (dialect === undefined) {
    throw new DialectError(
      `Unknown dialect "${name}"; registered: ${[...registry.keys()].join(', ')}`,
    );
  }
  return dialect;
}

export function listDialects(): string[] {
  return [...registry.keys()];
}

/** Accepts a registered name or an already-resolved dialect. */
export function resolveDialect(dialect: string | ResolvedDialect = DEFAULT_DIALECT): ResolvedDialect {
  return typeof dialect === 'string' ? getDialect(dialect) : dialect;
}
