import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    console.error('Unexpected DB pool error', err);
  });
  return pool;
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  pool: Pool,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return pool.query<T>(text, params);
}

export async function withTransaction<T>(pool: Pool, handler: (client: PoolClient) => Promise<T>): Promise<T> {
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
