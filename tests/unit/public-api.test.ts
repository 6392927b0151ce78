import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports table() returning a Plan', async () => {
    const { table, Plan } = await import('../../src/index.js');
    expect(table('flights')).toBeInstanceOf(Plan);
  });

  it('exports the compiler entry points', async () => {
    const { render, renderQuery, columns, collect } = await import('../../src/index.js');
    expect(typeof render).toBe('function');
    expect(typeof renderQuery).toBe('function');
    expect(typeof columns).toBe('function');
    expect(typeof collect).toBe('function');
  });

  it('exports PostgresExecutor class', async () => {
    const { PostgresExecutor } = await import('../../src/index.js');
    expect(typeof PostgresExecutor).toBe('function'); // class is a function
  });

  it('exports the error classes usable with instanceof', async () => {
    const { LazyQueryError, UnresolvedColumnError, ExecutionError } = await import('../../src/index.js');
    const err = new UnresolvedColumnError('c3', ['c1']);
    expect(err).toBeInstanceOf(UnresolvedColumnError);
    expect(err).toBeInstanceOf(LazyQueryError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnresolvedColumnError');
    expect(new ExecutionError('boom', 'SELECT 1').name).toBe('ExecutionError');
  });

  it('lists the built-in dialects', async () => {
    const { listDialects, DEFAULT_DIALECT } = await import('../../src/index.js');
    expect(listDialects()).toEqual(expect.arrayContaining(['postgres', 'sqlite', 'mysql', 'ansi']));
    expect(DEFAULT_DIALECT).toBe('postgres');
  });

  it('does NOT export planQuery (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['planQuery']).toBeUndefined();
  });

  it('does NOT export renderClauseSet (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['renderClauseSet']).toBeUndefined();
  });

  it('does NOT export mapRow (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['mapRow']).toBeUndefined();
  });

  it('renders end to end through the barrel', async () => {
    const { table, col, gt, desc } = await import('../../src/index.js');
    const sql = table('flights', { columns: { carrier: 'string', dep_delay: 'integer' } })
      .filter(gt(col('dep_delay'), 60))
      .sort(desc('dep_delay'))
      .limit(3)
      .render();
    expect(sql).toBe(
      ['SELECT *', 'FROM flights', 'WHERE dep_delay > 60', 'ORDER BY dep_delay DESC', 'LIMIT 3'].join('\n'),
    );
  });
});
