import { Pool, PoolClient, QueryResultRow, types } from 'pg';
import type { QueryRunner } from './lib/queryRunner';

// DATE columns (batch_date, expiry_date) stay "YYYY-MM-DD" strings; expiry math is date-only.
types.setTypeParser(1082, (value) => value);

if (!process.env.DATABASE_URL) {
  throw new Error('DATABASE_URL must be set before starting the API');
}

export const pool = new Pool({
  connectionString: process.env.DATABASE_URL
});

export const query: QueryRunner = <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
  pool.query<T>(text, params);

export function clientRunner(client: PoolClient): QueryRunner {
  return <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => client.query<T>(text, params);
}

export async function withTransaction<T>(handler: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
