import { Pool, QueryResult, QueryResultRow } from 'pg';
import { config } from './index';

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: 5,
});

pool.on('error', (err) => {
  console.error('Unexpected PostgreSQL pool error:', err);
});

/**
 * The slice of a pg Pool/Client the repositories use.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export function asQueryable(db: Pool): Queryable {
  return {
    query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
      db.query<R>(text, values),
  };
}

export default pool;
