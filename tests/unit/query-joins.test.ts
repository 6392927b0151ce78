import { describe, it, expect } from 'vitest';
import { table } from '../../src/query/query-object.js';
import { columns, render, renderQuery } from '../../src/query/compiler.js';
import { and, col, eq, gt } from '../../src/expr/builders.js';
import { AmbiguousColumnError, DialectCapabilityError } from '../../src/errors.js';

const flights = table('flights', {
  columns: { year: 'integer', tailnum: 'string', dest: 'string' },
});
const planes = table('planes', {
  columns: { tailnum: 'string', year: 'integer', seats: 'integer' },
});

describe('join: column disambiguation', () => {
  it('qualifies colliding columns and keeps one copy of the key', () => {
    const q = flights.leftJoin(planes, eq(col('flights.tailnum'), col('planes.tailnum')));
    expect(render(q)).toBe(
      [
        'SELECT flights.year AS flights_year, flights.tailnum, dest, planes.year AS planes_year, seats',
        'FROM flights',
        'LEFT JOIN planes ON (flights.tailnum = planes.tailnum)',
      ].join('\n'),
    );
    expect(columns(q)).toEqual(['flights_year', 'tailnum', 'dest', 'planes_year', 'seats']);
  });

  it('accepts shared key names', () => {
    expect(render(flights.innerJoin(planes, 'tailnum'))).toBe(
      render(flights.join(planes, 'inner', eq(col('flights.tailnum'), col('planes.tailnum')))),
    );
    expect(render(flights.innerJoin(planes, ['tailnum']))).toContain(
      'INNER JOIN planes ON (flights.tailnum = planes.tailnum)',
    );
  });

  it('takes the key from the right side of a right join', () => {
    expect(render(flights.rightJoin(planes, 'tailnum'))).toBe(
      [
        'SELECT flights.year AS flights_year, planes.tailnum, dest, planes.year AS planes_year, seats',
        'FROM flights',
        'RIGHT JOIN planes ON (flights.tailnum = planes.tailnum)',
      ].join('\n'),
    );
  });

  it('coalesces the key of a full join', () => {
    expect(render(flights.fullJoin(planes, 'tailnum'))).toBe(
      [
        'SELECT flights.year AS flights_year, COALESCE(flights.tailnum, planes.tailnum) AS tailnum, dest, planes.year AS planes_year, seats',
        'FROM flights',
        'FULL JOIN planes ON (flights.tailnum = planes.tailnum)',
      ].join('\n'),
    );
  });

  it('renders a compound ON condition as one group', () => {
    const on = and(eq(col('flights.tailnum'), col('planes.tailnum')), gt(col('planes.seats'), 100));
    expect(render(flights.leftJoin(planes, on))).toContain(
      'LEFT JOIN planes ON (flights.tailnum = planes.tailnum AND planes.seats > 100)',
    );
  });
});

describe('join: steps after the join', () => {
  it('filters on an unambiguous column in the same statement', () => {
    const q = flights.leftJoin(planes, 'tailnum').filter(gt(col('seats'), 100));
    expect(render(q)).toBe(
      [
        'SELECT flights.year AS flights_year, flights.tailnum, dest, planes.year AS planes_year, seats',
        'FROM flights',
        'LEFT JOIN planes ON (flights.tailnum = planes.tailnum)',
        'WHERE seats > 100',
      ].join('\n'),
    );
  });

  it('resolves disambiguated and qualified names', () => {
    const q1 = flights.leftJoin(planes, 'tailnum').filter(gt(col('flights_year'), 2000));
    expect(render(q1)).toContain('WHERE flights.year > 2000');
    const q2 = flights.leftJoin(planes, 'tailnum').filter(gt(col('planes.year'), 2000));
    expect(render(q2)).toContain('WHERE planes.year > 2000');
  });

  it('raises AmbiguousColumnError for an unqualified colliding name', () => {
    const q = flights.leftJoin(planes, 'tailnum').filter(gt(col('year'), 2000));
    expect(() => render(q)).toThrow(AmbiguousColumnError);
  });

  it('raises AmbiguousColumnError inside the ON condition', () => {
    const q = flights.innerJoin(planes, eq(col('year'), 2000));
    expect(() => render(q)).toThrow(AmbiguousColumnError);
  });

  it('groups over the join', () => {
    const q = flights.leftJoin(planes, 'tailnum').count(['dest']);
    expect(render(q)).toBe(
      [
        'SELECT dest, COUNT(*) AS n',
        'FROM flights',
        'LEFT JOIN planes ON (flights.tailnum = planes.tailnum)',
        'GROUP BY dest',
      ].join('\n'),
    );
  });
});

describe('join: sides', () => {
  it('renders planned sides as aliased subqueries', () => {
    const q = flights
      .filter(gt(col('year'), 2010))
      .innerJoin(planes.select('tailnum', 'seats'), 'tailnum');
    const { sql, tables } = renderQuery(q);
    expect(sql).toBe(
      [
        'SELECT year, flights.tailnum, dest, seats',
        'FROM (',
        '  SELECT *',
        '  FROM flights',
        '  WHERE year > 2010',
        ') AS flights',
        'INNER JOIN (',
        '  SELECT tailnum, seats',
        '  FROM planes',
        ') AS planes ON (flights.tailnum = planes.tailnum)',
      ].join('\n'),
    );
    expect(tables.map((t) => t.name)).toEqual(['flights', 'planes']);
  });

  it('requires distinct names for the two sides', () => {
    expect(() => render(flights.innerJoin(flights, 'tailnum'))).toThrow(
      'Both join inputs are named "flights"; rename one with as()',
    );
  });

  it('self-joins through aliases', () => {
    const q = flights.as('f1').innerJoin(flights.as('f2'), 'tailnum');
    const { sql, tables } = renderQuery(q);
    expect(sql).toBe(
      [
        'SELECT f1.year AS f1_year, f1.tailnum, f1.dest AS f1_dest, f2.year AS f2_year, f2.dest AS f2_dest',
        'FROM flights AS f1',
        'INNER JOIN flights AS f2 ON (f1.tailnum = f2.tailnum)',
      ].join('\n'),
    );
    expect(tables).toHaveLength(1);
  });

  it('selects left.* and prefixes the declared side for an undeclared left side', () => {
    const q = table('flights').leftJoin(planes, eq(col('flights.plane_id'), col('planes.tailnum')));
    expect(render(q)).toBe(
      [
        'SELECT flights.*, planes.tailnum AS planes_tailnum, planes.year AS planes_year, planes.seats AS planes_seats',
        'FROM flights',
        'LEFT JOIN planes ON (flights.plane_id = planes.tailnum)',
      ].join('\n'),
    );
    expect(columns(q)).toBeUndefined();
  });

  it('reads unprefixed names from the undeclared side', () => {
    const q = table('flights')
      .leftJoin(planes, eq(col('flights.plane_id'), col('planes.tailnum')))
      .filter(and(gt(col('year'), 2000), gt(col('planes_seats'), 100)));
    expect(render(q)).toContain('WHERE (flights.year > 2000 AND planes.seats > 100)');
  });

  it('rejects a key that exists on both sides when one side is undeclared', () => {
    const q = table('flights').leftJoin(planes, 'tailnum');
    expect(() => render(q)).toThrow(AmbiguousColumnError);
    expect(() => render(q)).toThrow(
      'Column "tailnum" exists in both "flights" and "planes", but the columns of "flights" are not declared; declare them or rename the column on one side',
    );
  });

  it('rejects two undeclared sides', () => {
    const q = table('flights').innerJoin(table('planes'), 'tailnum');
    expect(() => render(q)).toThrow(AmbiguousColumnError);
  });
});

describe('join: dialect capabilities', () => {
  it('raises DialectCapabilityError for FULL JOIN where unsupported', () => {
    const q = flights.fullJoin(planes, 'tailnum');
    expect(() => render(q, 'sqlite')).toThrow(DialectCapabilityError);
    expect(() => render(q, 'mysql')).toThrow('Dialect "mysql" does not support FULL JOIN');
  });
});
