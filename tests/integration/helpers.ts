import { PGlite } from '@electric-sql/pglite';
import type { QueryExecutor, QueryRows, Row } from '../../src/execution/types.js';
import { table } from '../../src/query/query-object.js';

/** Runs statements against an in-process Postgres. */
export class PgliteExecutor implements QueryExecutor {
  readonly statements: string[] = [];

  constructor(private readonly db: PGlite) {}

  async execute(sql: string): Promise<QueryRows> {
    this.statements.push(sql);
    const result = await this.db.query<Row>(sql);
    return { fields: result.fields.map((f) => f.name), rows: result.rows };
  }
}

export async function createTestDatabase(): Promise<PGlite> {
  const db = new PGlite();
  await db.exec(`
    CREATE TABLE flights (
      year INTEGER NOT NULL,
      carrier TEXT NOT NULL,
      dest TEXT NOT NULL,
      dep_delay INTEGER NOT NULL,
      arr_delay INTEGER NOT NULL,
      tailnum TEXT NOT NULL
    );
    CREATE TABLE planes (
      tailnum TEXT PRIMARY KEY,
      year INTEGER NOT NULL,
      seats INTEGER NOT NULL
    );
  `);
  return db;
}

export async function seedFlights(
  db: PGlite,
  rows: Array<[number, string, string, number, number, string]>,
): Promise<void> {
  for (const row of rows) {
    await db.query(
      `INSERT INTO flights (year, carrier, dest, dep_delay, arr_delay, tailnum)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      row,
    );
  }
}

export async function seedPlanes(db: PGlite, rows: Array<[string, number, number]>): Promise<void> {
  for (const row of rows) {
    await db.query('INSERT INTO planes (tailnum, year, seats) VALUES ($1, $2, $3)', row);
  }
}

export const flights = table('flights', {
  columns: {
    year: 'integer',
    carrier: 'string',
    dest: 'string',
    dep_delay: 'integer',
    arr_delay: 'integer',
    tailnum: 'string',
  },
});

export const planes = table('planes', {
  columns: { tailnum: 'string', year: 'integer', seats: 'integer' },
});
