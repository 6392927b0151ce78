import { describe, it, expect } from 'vitest';
import { defineDialect } from '../../src/dialect/define.js';
import {
  DEFAULT_DIALECT,
  getDialect,
  listDialects,
  registerDialect,
  resolveDialect,
} from '../../src/dialect/registry.js';
import type { DialectConfig } from '../../src/dialect/types.js';
import { DialectError } from '../../src/errors.js';
import { translate } from '../../src/expr/translator.js';
import { col, div, fn } from '../../src/expr/builders.js';

function baseConfig(overrides: Partial<DialectConfig> = {}): DialectConfig {
  return {
    name: 'test-dialect',
    reservedWords: ['select', 'from'],
    functionMap: { upper: 'UPPER({0})' },
    integerDivisionRequiresCast: false,
    supportsFullJoin: true,
    ...overrides,
  };
}

describe('defineDialect()', () => {
  it('resolves defaults', () => {
    const d = defineDialect(baseConfig());
    expect(d.name).toBe('test-dialect');
    expect(d.quoteAll).toBe(false);
    expect(d.identifierQuote).toBe('"');
    expect(d.booleanLiterals).toEqual(['TRUE', 'FALSE']);
    expect(d.typeNames.float).toBe('DOUBLE PRECISION');
    expect(d.typeNames.string).toBe('VARCHAR');
  });

  it('upper-cases reserved words', () => {
    const d = defineDialect(baseConfig());
    expect(d.reservedWords.has('SELECT')).toBe(true);
    expect(d.reservedWords.has('select')).toBe(false);
  });

  it('accepts a Set of reserved words', () => {
    const d = defineDialect(baseConfig({ reservedWords: new Set(['order']) }));
    expect([...d.reservedWords]).toEqual(['ORDER']);
  });

  it('normalizes string templates and lower-cases function names', () => {
    const d = defineDialect(baseConfig({ functionMap: { Upper: 'UPPER({0})' } }));
    expect(d.functionMap.get('upper')).toEqual({ template: 'UPPER({0})' });
  });

  it('merges partial type names over the ANSI names', () => {
    const d = defineDialect(baseConfig({ typeNames: { float: 'REAL' } }));
    expect(d.typeNames.float).toBe('REAL');
    expect(d.typeNames.integer).toBe('INTEGER');
  });

  it('throws on an invalid name', () => {
    expect(() => defineDialect(baseConfig({ name: 'Bad Name' }))).toThrow(DialectError);
    expect(() => defineDialect(baseConfig({ name: '' }))).toThrow(DialectError);
  });

  it('throws on a multi-character quote', () => {
    expect(() => defineDialect(baseConfig({ identifierQuote: '[]' }))).toThrow(
      'defineDialect: "test-dialect" identifierQuote must be a single character',
    );
  });

  it('throws on an empty template', () => {
    expect(() => defineDialect(baseConfig({ functionMap: { upper: '  ' } }))).toThrow(
      'defineDialect: function "upper" has an empty template',
    );
  });
});

describe('built-in dialects', () => {
  it('registers postgres, sqlite, mysql and ansi', () => {
    expect(listDialects()).toEqual(expect.arrayContaining(['postgres', 'sqlite', 'mysql', 'ansi']));
  });

  it('defaults to postgres', () => {
    expect(DEFAULT_DIALECT).toBe('postgres');
    expect(resolveDialect().name).toBe('postgres');
  });

  it('passes a resolved dialect through', () => {
    const d = getDialect('mysql');
    expect(resolveDialect(d)).toBe(d);
  });

  it('carries the capability flags', () => {
    expect(getDialect('postgres').supportsFullJoin).toBe(true);
    expect(getDialect('sqlite').supportsFullJoin).toBe(false);
    expect(getDialect('mysql').integerDivisionRequiresCast).toBe(false);
    expect(getDialect('ansi').quoteAll).toBe(true);
    expect(getDialect('mysql').identifierQuote).toBe('`');
  });

  it('combines the shared reserved words with the dialect list', () => {
    expect(getDialect('postgres').reservedWords.has('ORDER')).toBe(true);
    expect(getDialect('postgres').reservedWords.has('LIMIT')).toBe(true);
    expect(getDialect('ansi').reservedWords.has('YEAR')).toBe(true);
    expect(getDialect('postgres').reservedWords.has('YEAR')).toBe(false);
  });

  it('removes shared functions a dialect sets to null', () => {
    expect(getDialect('postgres').functionMap.has('ceiling')).toBe(true);
    expect(getDialect('sqlite').functionMap.has('ceiling')).toBe(false);
  });

  it('marks mapped aggregates', () => {
    expect(getDialect('postgres').functionMap.get('median')?.aggregate).toBe(true);
  });

  it('throws DialectError for an unknown name', () => {
    expect(() => getDialect('oracle')).toThrow(DialectError);
  });
});

describe('registerDialect()', () => {
  it('makes a custom dialect available by name', () => {
    const registered = registerDialect(
      baseConfig({ name: 'duck-test', functionMap: { shout: 'UPPER({0}) || \'!\'' } }),
    );
    expect(getDialect('duck-test')).toBe(registered);
    expect(translate(fn('shout', col('s')), registered)).toBe("UPPER(s) || '!'");
    expect(translate(div(col('a'), col('b')), registered, { columnType: () => 'integer' })).toBe('a / b');
  });

  it('refuses to replace a registered dialect', () => {
    expect(() => registerDialect(baseConfig({ name: 'postgres' }))).toThrow(
      'Dialect "postgres" is already registered',
    );
  });
});
