import { readFileSync } from 'node:fs';
import type { ColumnType } from '../expr/types.js';
import { DialectError } from '../errors.js';
import type { FunctionTranslation } from './types.js';

// data/ sits two levels above both src/dialect and dist/dialect.
const DATA_DIR = new URL('../../data/', import.meta.url);

const RETURN_TYPES: ReadonlySet<string> = new Set<ColumnType | 'same'>([
  'integer', 'float', 'string', 'boolean', 'date', 'timestamp', 'unknown', 'same',
]);

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(new URL(file, DATA_DIR), 'utf8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReturnType(value: unknown): value is ColumnType | 'same' {
  return typeof value === 'string' && RETURN_TYPES.has(value);
}

function parseTranslation(file: string, name: string, raw: unknown): FunctionTranslation {
  if (!isRecord(raw) || typeof raw['template'] !== 'string') {
    throw new DialectError(`${file}: function "${name}" needs a string "template"`);
  }
  const translation: FunctionTranslation = { template: raw['template'] };
  const returns = raw['returns'];
  if (returns !== undefined) {
    if (!isReturnType(returns)) {
      throw new DialectError(`${file}: function "${name}" has unknown return type ${String(returns)}`);
    }
    translation.returns = returns;
  }
  if (raw['aggregate'] === true) {
    translation.aggregate = true;
  }
  return translation;
}

/** Reserved words for one built-in dialect: the shared list plus its own. */
export function loadReservedWords(dialect: string): string[] {
  const file = 'reserved-words.json';
  const data = readJson(file);
  if (!isRecord(data)) {
    throw new DialectError(`${file}: expected an object of word lists`);
  }
  const words: string[] = [];
  for (const key of ['common', dialect]) {
    const list = data[key];
    if (list === undefined) continue;
    if (!Array.isArray(list) || !list.every((w): w is string => typeof w === 'string')) {
      throw new DialectError(`${file}: "${key}" must be an array of strings`);
    }
    words.push(...list);
  }
  return words;
}

/**
 * Function map for one built-in dialect. Dialect entries override the
 * shared ones; a `null` entry removes a shared function.
 */
export function loadFunctionMap(dialect: string): Record<string, FunctionTranslation> {
  const file = 'functions.json';
  const data = readJson(file);
  if (!isRecord(data)) {
    throw new DialectError(`${file}: expected an object of function maps`);
  }
  const map: Record<string, FunctionTranslation> = {};
  for (const key of ['common', dialect]) {
    const section = data[key];
    if (section === undefined) continue;
    if (!isRecord(section)) {
      throw new DialectError(`${file}: "${key}" must be an object`);
    }
    for (const [name, raw] of Object.entries(section)) {
      if (raw === null) {
        delete map[name];
      } else {
        map[name] = parseTranslation(file, name, raw);
      }
    }
  }
  return map;
}
